/**
 * @module src/models/numeric
 * @description Numerical Methods and Optimization
 *
 * Contains:
 * - Linear algebra: vector/matrix helpers, linear solves, stationary distributions
 * - Optimization: two-phase simplex LP backend
 */

import * as math from './math';
import * as optimization from './optimization';

// Re-export as namespaces
export { math, optimization };

// Direct exports for common functions
export * from './optimization';
