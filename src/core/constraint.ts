/**
 * @module core/constraint
 * @description Named lower-bound constraints and their reports
 *
 * A spec reads one value from a state and requires it to stay at or above a
 * bound, up to a tolerance. Hard specs decide feasibility; soft specs are
 * only reported. The equilibrium module states every incentive constraint as
 * a soft spec with bound 0 over a Distribution.
 */

// ==================== Types ====================

/**
 * - hard: a shortfall makes the state infeasible
 * - soft: a shortfall is listed, the state stays usable
 */
export type ConstraintSeverity = 'hard' | 'soft';

/**
 * `evaluate(state) >= bound - tolerance`
 */
export interface ConstraintSpec<S> {
    id: string;
    description: string;
    severity: ConstraintSeverity;
    bound: number;
    /** Shortfall below `bound` still counted as satisfied */
    tolerance: number;
    evaluate: (state: S) => number;
}

export interface ConstraintResult {
    id: string;
    value: number;
    bound: number;
    severity: ConstraintSeverity;
    satisfied: boolean;
    /** bound - value for an unsatisfied spec, else 0 */
    shortfall: number;
}

export interface ConstraintReport {
    /** One result per spec, in input order */
    results: ConstraintResult[];
    /** No hard spec falls short */
    feasible: boolean;
    /** Largest shortfall (0 if none) */
    maxViolation: number;
    /** Unsatisfied results, hard and soft */
    violations: ConstraintResult[];
    timestamp: number;
}

export const DEFAULT_CONSTRAINT_TOLERANCE = 1e-6;

// ==================== Builders ====================

export interface LowerBoundOptions {
    severity?: ConstraintSeverity;
    tolerance?: number;
    description?: string;
}

/**
 * Spec requiring `evaluate(state) >= bound`; hard unless stated otherwise
 */
export function lowerBound<S>(
    id: string,
    evaluate: (state: S) => number,
    bound: number,
    options: LowerBoundOptions = {}
): ConstraintSpec<S> {
    return {
        id,
        description: options.description ?? `${id} >= ${bound}`,
        severity: options.severity ?? 'hard',
        bound,
        tolerance: options.tolerance ?? DEFAULT_CONSTRAINT_TOLERANCE,
        evaluate,
    };
}

// ==================== Evaluation ====================

/**
 * Evaluate every spec against one state
 */
export function evaluateConstraints<S>(specs: readonly ConstraintSpec<S>[], state: S): ConstraintReport {
    const results = specs.map((spec): ConstraintResult => {
        const value = spec.evaluate(state);
        const gap = spec.bound - value;
        const satisfied = gap <= spec.tolerance;
        return {
            id: spec.id,
            value,
            bound: spec.bound,
            severity: spec.severity,
            satisfied,
            shortfall: satisfied ? 0 : gap,
        };
    });

    const violations = results.filter(r => !r.satisfied);

    return {
        results,
        feasible: violations.every(r => r.severity === 'soft'),
        maxViolation: violations.reduce((max, r) => Math.max(max, r.shortfall), 0),
        violations,
        timestamp: Date.now(),
    };
}
