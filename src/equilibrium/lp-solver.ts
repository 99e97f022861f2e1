/**
 * @module equilibrium/lp-solver
 * @description Exact correlated equilibria by linear programming
 *
 * The feasible region
 *
 *   { x >= 0 : sum(x) = 1, slack(i, a, a') >= 0 for all i, a != a' }
 *
 * is exactly the set of correlated equilibria (Aumann, 1987). It is never
 * empty, so the solver either returns a point of it or fails loudly.
 */

import { InfeasibleError, SolverFailureError } from '../core/errors';
import { computeConfigHash } from '../core/repro';
import type { Game } from '../game';
import { infNorm, projectToSimplex } from '../models/numeric/math';
import {
    SimplexStatus,
    solveLinearProgram,
    type LinearConstraint,
    type LinearProgram,
} from '../models/numeric/optimization';
import {
    resolveLinearProgrammingConfig,
    type LinearProgrammingSolverConfig,
    type LinearProgrammingSolverOptions,
} from './config';
import { Distribution, PROBABILITY_SUM_TOLERANCE } from './distribution';
import { incentiveCoefficients, incentiveConstraintKeys } from './incentive';
import type {
    EquilibriumDiagnostics,
    EquilibriumResult,
    EquilibriumSolver,
    IncentiveConstraintKey,
} from './types';

// ==================== Program Builder ====================

/**
 * Correlated-equilibrium LP of a game
 */
export interface EquilibriumProgram {
    program: LinearProgram;
    /** Key of constraint row k + 1 (row 0 is the simplex equality) */
    incentiveRows: IncentiveConstraintKey[];
    /** Factor taking the program's objective back to payoff units */
    objectiveScale: number;
}

/**
 * Divide by the largest absolute entry; an all-zero vector is returned as is
 */
function normalizeRow(values: number[]): { row: number[]; scale: number } {
    const scale = infNorm(values);
    if (scale === 0) {
        return { row: values, scale: 1 };
    }
    return { row: values.map(v => v / scale), scale };
}

/**
 * Build the correlated-equilibrium LP.
 *
 * One variable per profile in flat-index order. Row 0 is sum(x) = 1, then one
 * `>= 0` row per incentive constraint. The objective is zero in feasibility
 * mode and the per-profile welfare when `maximizeWelfare` is set.
 *
 * Every incentive row and the welfare objective are divided by their largest
 * absolute entry. This leaves the feasible set and the optimal vertices
 * unchanged and keeps the simplex tolerances independent of payoff units.
 */
export function buildEquilibriumProgram(game: Game, maximizeWelfare: boolean): EquilibriumProgram {
    const size = game.jointActionCount;
    const incentiveRows = incentiveConstraintKeys(game);

    const constraints: LinearConstraint[] = [
        { coefficients: new Array<number>(size).fill(1), sense: 'eq', rhs: 1 },
        ...incentiveRows.map((key): LinearConstraint => ({
            coefficients: normalizeRow(incentiveCoefficients(game, key)).row,
            sense: 'ge',
            rhs: 0,
        })),
    ];

    let objective = new Array<number>(size).fill(0);
    let objectiveScale = 1;
    if (maximizeWelfare) {
        const welfare = Array.from({ length: size }, (_, index) => game.welfareAtIndex(index));
        const normalized = normalizeRow(welfare);
        objective = normalized.row;
        objectiveScale = normalized.scale;
    }

    return {
        program: { objective, direction: 'maximize', constraints },
        incentiveRows,
        objectiveScale,
    };
}

// ==================== Solver ====================

/**
 * Diagnostics of an LP solve
 */
export interface LinearProgrammingDiagnostics extends EquilibriumDiagnostics {
    mode: 'feasibility' | 'max-welfare';
    status: SimplexStatus;
    /** Objective at the backend's optimum (0 in feasibility mode) */
    objectiveValue: number;
    /** Simplex pivots */
    iterations: number;
}

/**
 * Exact correlated-equilibrium solver.
 *
 * @example
 * ```typescript
 * const solver = new LinearProgrammingSolver(game, true);
 * const { distribution, diagnostics } = solver.solve();
 * diagnostics.expectedWelfare;
 * ```
 */
export class LinearProgrammingSolver implements EquilibriumSolver<LinearProgrammingDiagnostics> {
    readonly game: Game;
    readonly name: string;
    readonly config: Readonly<LinearProgrammingSolverConfig>;

    /**
     * @param maximizeWelfareOrOptions - `true` for the welfare-maximizing
     * equilibrium, or a full options object
     * @throws InvalidParameterError for out-of-range options
     */
    constructor(game: Game, maximizeWelfareOrOptions: boolean | LinearProgrammingSolverOptions = false) {
        this.game = game;
        this.config = resolveLinearProgrammingConfig(maximizeWelfareOrOptions);
        this.name = this.config.maximizeWelfare ? 'LP (max welfare)' : 'LP';
    }

    /**
     * Solve the program once.
     *
     * @throws InfeasibleError if the backend finds no feasible point
     * @throws SolverFailureError if it stops unbounded, at the pivot cap, on a
     * numerically singular basis, or returns no probability mass
     */
    solve(): EquilibriumResult<LinearProgrammingDiagnostics> {
        const start = performance.now();
        const { program, objectiveScale } = buildEquilibriumProgram(this.game, this.config.maximizeWelfare);
        const result = solveLinearProgram(program, { maxIterations: this.config.maxIterations });

        const failure = { status: result.status, iterations: result.iterations, solver: this.name };
        switch (result.status) {
            case SimplexStatus.OPTIMAL:
                break;
            case SimplexStatus.INFEASIBLE:
                throw new InfeasibleError(
                    `Correlated-equilibrium program for a ${this.game.actionCounts.join('x')} game is infeasible`,
                    failure
                );
            case SimplexStatus.UNBOUNDED:
                throw new SolverFailureError('Simplex backend reported an unbounded program', failure);
            case SimplexStatus.ITERATION_LIMIT:
                throw new SolverFailureError(
                    `Simplex backend stopped after ${result.iterations} pivots without reaching an optimum`,
                    failure
                );
            case SimplexStatus.NUMERICAL_ERROR:
                throw new SolverFailureError(
                    `Simplex backend lost numerical accuracy after ${result.iterations} pivots`,
                    failure
                );
        }

        // Round-off negatives are clipped; anything larger means a broken basis
        const mostNegative = result.x.reduce((min, v) => Math.min(min, v), 0);
        const probabilities = projectToSimplex(result.x);
        if (probabilities === null) {
            throw new SolverFailureError('Simplex backend returned no probability mass', failure);
        }
        if (mostNegative < -PROBABILITY_SUM_TOLERANCE) {
            throw new SolverFailureError(
                `Simplex backend returned a probability of ${mostNegative}`,
                { ...failure, mostNegative }
            );
        }

        const distribution = new Distribution(this.game, probabilities);
        const slacks = distribution.incentiveSlacks().map(s => ({ ...s }));
        const violations = distribution.violations(this.config.tolerance);
        const diagnostics: LinearProgrammingDiagnostics = {
            solver: this.name,
            mode: this.config.maximizeWelfare ? 'max-welfare' : 'feasibility',
            status: result.status,
            objectiveValue: result.objectiveValue * objectiveScale,
            iterations: result.iterations,
            expectedWelfare: distribution.expectedWelfare(),
            slacks,
            violations,
            maxViolation: distribution.maxViolation(),
            violationTolerance: this.config.tolerance,
            runtimeMs: performance.now() - start,
            configHash: computeConfigHash({
                solver: this.name,
                actionCounts: [...this.game.actionCounts],
                payoffs: this.game.toJSON().payoffs,
                maximizeWelfare: this.config.maximizeWelfare,
                tolerance: this.config.tolerance,
                maxIterations: this.config.maxIterations ?? null,
            }),
        };

        this.config.logger?.logSolve({
            solver: this.name,
            status: result.status,
            expectedWelfare: diagnostics.expectedWelfare,
            maxViolation: diagnostics.maxViolation,
            numViolations: violations.length,
            runtimeMs: diagnostics.runtimeMs,
            iterations: result.iterations,
        });

        return { distribution, diagnostics };
    }
}
