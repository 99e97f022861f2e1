/**
 * @module optimization
 * @description Numerical optimization algorithms
 *
 * Provides:
 * - Simplex: two-phase dense simplex method for linear programs
 */

export * from './types';
export * from './simplex';
