/**
 * @module src/models
 * @description Numerical models behind the solvers
 *
 * - numeric/: Linear algebra helpers and the simplex LP backend
 */

export * as numeric from './numeric';
