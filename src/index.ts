/**
 * @module src
 * @description Source module entry point
 *
 * - core/: Errors, logging, seeded RNG, constraint evaluation
 * - game/: Normal-form games and payoff generators
 * - equilibrium/: Distributions, LP and swap-regret solvers
 * - models/: Numerical methods (linear algebra, simplex)
 */

// ==================== Core Framework ====================
export * as core from './core';

// ==================== Games ====================
export * as game from './game';

// ==================== Solvers ====================
export * as equilibrium from './equilibrium';

// ==================== Numerical Models ====================
export * as models from './models';
