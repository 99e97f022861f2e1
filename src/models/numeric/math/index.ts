/**
 * @module math
 * @description Dense vector and matrix helpers
 */

export * from './linear-algebra';
