/**
 * @module optimization/types
 * @description Type definitions for the linear-programming backend
 */

/**
 * Row sense of a linear constraint
 */
export type RowSense = 'le' | 'ge' | 'eq';

/**
 * One row `coefficients · x (<= | >= | =) rhs`
 */
export interface LinearConstraint {
    coefficients: number[];
    sense: RowSense;
    rhs: number;
}

/**
 * Linear program over x >= 0
 */
export interface LinearProgram {
    /** Objective vector, one entry per variable */
    objective: number[];
    /** Optimization direction */
    direction: 'maximize' | 'minimize';
    /** Constraint rows */
    constraints: LinearConstraint[];
}

/**
 * Simplex solver configuration
 */
export interface SimplexConfig {
    /** Maximum number of pivots over both phases (default scales with size) */
    maxIterations?: number;
    /** Reduced-cost and ratio-tie tolerance */
    tolerance: number;
    /** Smallest accepted pivot element */
    pivotTolerance: number;
    /** Largest phase-1 residual still accepted as feasible */
    feasibilityTolerance: number;
    /** Pivots between rebuilds of the tableau from the original rows */
    refactorInterval: number;
}

/**
 * Simplex status codes
 */
export enum SimplexStatus {
    /** Optimum found */
    OPTIMAL = 'OPTIMAL',
    /** No feasible point */
    INFEASIBLE = 'INFEASIBLE',
    /** Objective unbounded over the feasible set */
    UNBOUNDED = 'UNBOUNDED',
    /** Pivot limit reached before optimality */
    ITERATION_LIMIT = 'ITERATION_LIMIT',
    /** Basis stayed numerically singular after every recovery attempt */
    NUMERICAL_ERROR = 'NUMERICAL_ERROR',
}

/**
 * Simplex result
 */
export interface SimplexResult {
    status: SimplexStatus;
    /** Primal point (zeros unless status is OPTIMAL) */
    x: number[];
    /** Objective value at x, in the caller's direction */
    objectiveValue: number;
    /** Pivots performed over both phases */
    iterations: number;
}
