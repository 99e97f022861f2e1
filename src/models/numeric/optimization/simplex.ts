/**
 * @module optimization/simplex
 * @description Two-phase dense tableau simplex method.
 *
 * Solves max/min c^T x subject to rows a_i^T x (<=, >=, =) b_i and x >= 0.
 *
 * - Rows are flipped so every right-hand side is non-negative, and `>= 0`
 *   rows are flipped to `<= 0`.
 * - `<=` rows get a slack column, `>=` rows a surplus and an artificial
 *   column, `=` rows an artificial column.
 * - Phase 1 maximizes -sum(artificials); a negative optimum means the program
 *   is infeasible. Artificials left in the basis at zero are pivoted out, or
 *   stay parked on redundant rows.
 * - Phase 2 optimizes the real objective with artificial columns barred.
 *
 * Entering and leaving variables follow Bland's rule (smallest index), which
 * rules out cycling on degenerate programs. Pivots smaller than
 * `pivotTolerance` are never taken, and every `refactorInterval` pivots (and
 * once more before optimality is accepted) the tableau is recomputed from the
 * original rows for the current basis. If that basis turns out singular or
 * primal infeasible, the phase rolls back to the last basis that rebuilt
 * cleanly, raises the pivot tolerance tenfold and halves the interval. Past
 * MAX_PIVOT_TOLERANCE the solve stops with NUMERICAL_ERROR.
 *
 * Reference: Dantzig, G. B. (1963), "Linear Programming and Extensions";
 * Bland, R. G. (1977), "New finite pivoting rules for the simplex method",
 * Mathematics of Operations Research 2 (2): 103-107.
 */

import { InvalidParameterError } from '../../../core/errors';
import { dot, infNorm, solveLinearSystems, zeros } from '../math/linear-algebra';
import {
    SimplexStatus,
    type LinearProgram,
    type SimplexConfig,
    type SimplexResult,
} from './types';

export const DEFAULT_SIMPLEX_CONFIG: SimplexConfig = {
    tolerance: 1e-9,
    pivotTolerance: 1e-6,
    feasibilityTolerance: 1e-7,
    refactorInterval: 25,
};

/** Entries this small are zeroed when the tableau is rebuilt */
const REFACTOR_DROP_TOLERANCE = 1e-13;
/** Negative right-hand sides down to this are round-off and clamped to 0 */
const RHS_CLAMP_TOLERANCE = 1e-9;
/** Singularity threshold of the basis during a rebuild */
const BASIS_PIVOT_TOLERANCE = 1e-14;
/** Largest pivot tolerance tried before giving up */
const MAX_PIVOT_TOLERANCE = 1e-2;

// ==================== Tableau ====================

interface Tableau {
    /** Constraint rows, each of length width + 1 (last entry = rhs) */
    rows: number[][];
    /** Reduced-cost row z_j - c_j; last entry = current objective value */
    objective: number[];
    /** Basic column of each row */
    basis: number[];
    /** Number of columns excluding rhs */
    width: number;
    /** Rows as first built, for refactorization */
    original: number[][];
    /** Cost vector of the running phase */
    cost: number[];
}

interface PhaseSettings {
    enterLimit: number;
    tolerance: number;
    pivotTolerance: number;
    refactorInterval: number;
}

type PhaseOutcome = 'optimal' | 'unbounded' | 'limit' | 'breakdown';

function pivot(t: Tableau, r: number, c: number): void {
    const width = t.width;
    const pivotRow = t.rows[r];
    const p = pivotRow[c];
    for (let k = 0; k <= width; k++) {
        pivotRow[k] /= p;
    }
    pivotRow[c] = 1;

    for (let i = 0; i < t.rows.length; i++) {
        if (i === r) continue;
        const row = t.rows[i];
        const factor = row[c];
        if (factor === 0) continue;
        for (let k = 0; k <= width; k++) {
            row[k] -= factor * pivotRow[k];
        }
        row[c] = 0;
    }

    const factor = t.objective[c];
    if (factor !== 0) {
        for (let k = 0; k <= width; k++) {
            t.objective[k] -= factor * pivotRow[k];
        }
        t.objective[c] = 0;
    }

    t.basis[r] = c;
}

/**
 * Rebuild the reduced-cost row for cost vector `cost` (maximization).
 */
function setObjective(t: Tableau, cost: number[]): void {
    t.cost = cost;
    const width = t.width;
    const objective = zeros(width + 1);
    for (let j = 0; j < width; j++) {
        objective[j] = -cost[j];
    }
    for (let i = 0; i < t.rows.length; i++) {
        const cb = cost[t.basis[i]];
        if (cb === 0) continue;
        const row = t.rows[i];
        for (let k = 0; k <= width; k++) {
            objective[k] += cb * row[k];
        }
    }
    t.objective = objective;
}

/**
 * Recompute every row as B^-1 times the original row for the current basis B.
 * Leaves the tableau untouched and returns false when B is singular or its
 * basic solution is negative beyond round-off.
 */
function refactor(t: Tableau): boolean {
    const m = t.rows.length;
    const B = t.original.map(row => t.basis.map(col => row[col]));
    const rebuilt = solveLinearSystems(B, t.original, BASIS_PIVOT_TOLERANCE);
    if (rebuilt === null) {
        return false;
    }

    for (const row of rebuilt) {
        for (let k = 0; k <= t.width; k++) {
            if (Math.abs(row[k]) < REFACTOR_DROP_TOLERANCE) {
                row[k] = 0;
            }
        }
        if (row[t.width] < 0) {
            if (row[t.width] < -RHS_CLAMP_TOLERANCE) {
                return false;
            }
            row[t.width] = 0;
        }
    }
    t.basis.forEach((col, i) => {
        for (let r = 0; r < m; r++) {
            rebuilt[r][col] = r === i ? 1 : 0;
        }
    });
    t.rows = rebuilt;
    setObjective(t, t.cost);
    return true;
}

/**
 * Pivot until optimal. Only columns below `enterLimit` may enter the basis.
 */
function runPhase(
    t: Tableau,
    settings: PhaseSettings,
    budget: { used: number; max: number }
): PhaseOutcome {
    const { enterLimit, tolerance: tol } = settings;
    let { pivotTolerance, refactorInterval } = settings;
    const width = t.width;

    if (!refactor(t)) {
        return 'breakdown';
    }
    let lastGoodBasis = [...t.basis];
    let sinceRefactor = 0;

    // Rebuild the tableau, rolling back and tightening on failure
    const rebuild = (): boolean => {
        sinceRefactor = 0;
        if (refactor(t)) {
            lastGoodBasis = [...t.basis];
            return true;
        }
        pivotTolerance *= 10;
        refactorInterval = Math.max(1, Math.floor(refactorInterval / 2));
        if (pivotTolerance > MAX_PIVOT_TOLERANCE) {
            return false;
        }
        t.basis = [...lastGoodBasis];
        return refactor(t);
    };

    for (;;) {
        if (sinceRefactor >= refactorInterval && !rebuild()) {
            return 'breakdown';
        }

        let entering = -1;
        for (let j = 0; j < enterLimit; j++) {
            if (t.objective[j] < -tol) {
                entering = j;
                break;
            }
        }
        if (entering === -1) {
            // confirm on a fresh tableau
            if (sinceRefactor > 0) {
                if (!rebuild()) {
                    return 'breakdown';
                }
                continue;
            }
            return 'optimal';
        }

        let leaving = -1;
        let bestRatio = Infinity;
        for (let i = 0; i < t.rows.length; i++) {
            const a = t.rows[i][entering];
            if (a <= pivotTolerance) continue;
            const ratio = t.rows[i][width] / a;
            if (
                ratio < bestRatio - tol ||
                (Math.abs(ratio - bestRatio) <= tol && t.basis[i] < t.basis[leaving])
            ) {
                bestRatio = ratio;
                leaving = i;
            }
        }
        if (leaving === -1) {
            return 'unbounded';
        }

        if (budget.used >= budget.max) {
            return 'limit';
        }
        pivot(t, leaving, entering);
        budget.used++;
        sinceRefactor++;
    }
}

// ==================== Public API ====================

/**
 * Solve a linear program over x >= 0 with the two-phase simplex method
 */
export function solveLinearProgram(
    problem: LinearProgram,
    config: Partial<SimplexConfig> = {}
): SimplexResult {
    const {
        tolerance,
        pivotTolerance,
        feasibilityTolerance,
        refactorInterval,
        maxIterations,
    } = { ...DEFAULT_SIMPLEX_CONFIG, ...config };
    const n = problem.objective.length;
    const m = problem.constraints.length;

    if (!Number.isInteger(refactorInterval) || refactorInterval <= 0) {
        throw new InvalidParameterError('refactorInterval', `must be a positive integer, got ${refactorInterval}`);
    }
    problem.constraints.forEach((row, i) => {
        if (row.coefficients.length !== n) {
            throw new InvalidParameterError(
                'constraints',
                `row ${i} has ${row.coefficients.length} coefficients, expected ${n}`
            );
        }
    });

    // Normalize rows to rhs >= 0 and count auxiliary columns.
    // `a.x >= 0` becomes `-a.x <= 0` so it starts with a basic slack.
    const rows = problem.constraints.map(row => {
        const flip = row.rhs < 0 || (row.rhs === 0 && row.sense === 'ge');
        const sense = flip ? (row.sense === 'le' ? 'ge' : row.sense === 'ge' ? 'le' : 'eq') : row.sense;
        return {
            coefficients: flip ? row.coefficients.map(v => -v) : row.coefficients,
            rhs: flip ? -row.rhs : row.rhs,
            sense,
        };
    });
    const numSlack = rows.filter(r => r.sense !== 'eq').length;
    const numArtificial = rows.filter(r => r.sense !== 'le').length;
    const artificialStart = n + numSlack;
    const width = artificialStart + numArtificial;

    const tableau: Tableau = {
        rows: [],
        objective: zeros(width + 1),
        basis: [],
        width,
        original: [],
        cost: zeros(width),
    };

    let slackCol = n;
    let artificialCol = artificialStart;
    for (const row of rows) {
        const entries = zeros(width + 1);
        for (let j = 0; j < n; j++) {
            entries[j] = row.coefficients[j];
        }
        entries[width] = row.rhs;

        switch (row.sense) {
            case 'le':
                entries[slackCol] = 1;
                tableau.basis.push(slackCol++);
                break;
            case 'ge':
                entries[slackCol++] = -1;
                entries[artificialCol] = 1;
                tableau.basis.push(artificialCol++);
                break;
            case 'eq':
                entries[artificialCol] = 1;
                tableau.basis.push(artificialCol++);
                break;
        }
        tableau.rows.push(entries);
    }
    tableau.original = tableau.rows.map(row => [...row]);

    const budget = {
        used: 0,
        max: maxIterations ?? Math.max(1000, 25 * (m + width)),
    };
    const result = (status: SimplexStatus, x: number[] = zeros(n)): SimplexResult => ({
        status,
        x,
        objectiveValue: status === SimplexStatus.OPTIMAL ? dot(problem.objective, x) : NaN,
        iterations: budget.used,
    });

    // ---------- Phase 1 ----------
    if (numArtificial > 0) {
        const phaseOneCost = zeros(width);
        for (let j = artificialStart; j < width; j++) {
            phaseOneCost[j] = -1;
        }
        setObjective(tableau, phaseOneCost);

        const outcome = runPhase(
            tableau,
            { enterLimit: width, tolerance, pivotTolerance, refactorInterval },
            budget
        );
        if (outcome === 'breakdown') {
            return result(SimplexStatus.NUMERICAL_ERROR);
        }
        if (outcome !== 'optimal') {
            return result(SimplexStatus.ITERATION_LIMIT);
        }

        const rhsScale = Math.max(1, infNorm(rows.map(r => r.rhs)));
        if (-tableau.objective[width] > feasibilityTolerance * rhsScale) {
            return result(SimplexStatus.INFEASIBLE);
        }

        // Drive zero-valued artificials out of the basis
        for (let i = 0; i < m; i++) {
            if (tableau.basis[i] < artificialStart) continue;
            const row = tableau.rows[i];
            let best = -1;
            for (let j = 0; j < artificialStart; j++) {
                if (Math.abs(row[j]) > pivotTolerance && (best === -1 || Math.abs(row[j]) > Math.abs(row[best]))) {
                    best = j;
                }
            }
            if (best !== -1) {
                pivot(tableau, i, best);
            }
        }
    }

    // ---------- Phase 2 ----------
    const sign = problem.direction === 'maximize' ? 1 : -1;
    const phaseTwoCost = zeros(width);
    for (let j = 0; j < n; j++) {
        phaseTwoCost[j] = sign * problem.objective[j];
    }
    setObjective(tableau, phaseTwoCost);

    const outcome = runPhase(
        tableau,
        { enterLimit: artificialStart, tolerance, pivotTolerance, refactorInterval },
        budget
    );
    switch (outcome) {
        case 'unbounded':
            return result(SimplexStatus.UNBOUNDED);
        case 'limit':
            return result(SimplexStatus.ITERATION_LIMIT);
        case 'breakdown':
            return result(SimplexStatus.NUMERICAL_ERROR);
        case 'optimal':
            break;
    }

    const x = zeros(n);
    for (let i = 0; i < m; i++) {
        const col = tableau.basis[i];
        if (col < n) {
            x[col] = tableau.rows[i][width];
        }
    }
    return result(SimplexStatus.OPTIMAL, x);
}
