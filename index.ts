/**
 * @packageDocumentation
 * @module correq
 *
 * correq: correlated equilibria of N-player normal-form games
 *
 * Two solvers share one contract: an exact linear-programming solver
 * (optionally welfare-maximizing) and an approximate swap-regret learner.
 * Both return a `Distribution` over joint action profiles plus diagnostics.
 *
 * ## Modules
 * - `core` - Errors, logging, seeded RNG, constraint evaluation
 * - `game` - Normal-form games and payoff generators
 * - `equilibrium` - Distributions and solvers
 * - `numeric` - Linear algebra and the simplex backend
 *
 * ## Usage Example
 * ```typescript
 * import { Game, LinearProgrammingSolver, SwapRegretSolver } from 'correq';
 *
 * const game = new Game(2, [2, 2], { kind: 'chicken' });
 * const exact = new LinearProgrammingSolver(game, true).solve();
 * exact.diagnostics.expectedWelfare;
 *
 * const learned = new SwapRegretSolver(game, { epsilon: 0.05, seed: 1 }).solve();
 * learned.diagnostics.maxSwapRegret;
 * ```
 *
 * @license MIT
 */

// ==================== Namespaces ====================
export * as core from './src/core';
export * as game from './src/game';
export * as equilibrium from './src/equilibrium';
export * as numeric from './src/models/numeric';

// ==================== Primary API ====================
export { Game, createGame } from './src/game';
export type { GameConfig, GameType, JointActionProfile, PayoffTensor } from './src/game';
export {
    Distribution,
    LinearProgrammingSolver,
    SwapRegretSolver,
} from './src/equilibrium';
export type {
    EquilibriumDiagnostics,
    EquilibriumResult,
    EquilibriumSolver,
    LinearProgrammingDiagnostics,
    SwapRegretDiagnostics,
} from './src/equilibrium';
export { CorreqError, ErrorCodes } from './src/core';

// ==================== Version ====================
export const VERSION = '1.0.0';
