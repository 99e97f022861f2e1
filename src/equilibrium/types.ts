/**
 * @module equilibrium/types
 * @description Shared solver contract and diagnostic types
 */

import type { Game } from '../game';
import type { Distribution } from './distribution';

/**
 * Identifies one incentive constraint: `player`, told to play `action`,
 * must not gain by switching to `deviation`.
 */
export interface IncentiveConstraintKey {
    player: number;
    action: number;
    deviation: number;
}

/**
 * Signed slack of an incentive constraint (negative = violated)
 */
export interface IncentiveSlack extends IncentiveConstraintKey {
    slack: number;
}

/**
 * Incentive constraint violated by more than the tolerance
 */
export interface IncentiveViolation extends IncentiveConstraintKey {
    /** -slack, always > tolerance */
    magnitude: number;
}

/**
 * Diagnostics every solver reports
 */
export interface EquilibriumDiagnostics {
    /** Solver name, e.g. "LP" */
    solver: string;
    /** Expected sum of payoffs under the returned distribution */
    expectedWelfare: number;
    /** Slack of every incentive constraint */
    slacks: IncentiveSlack[];
    /** Constraints with slack below -violationTolerance */
    violations: IncentiveViolation[];
    /** Largest violation magnitude (0 if none) */
    maxViolation: number;
    violationTolerance: number;
    /** Wall-clock time of solve() */
    runtimeMs: number;
    /** Fingerprint of the resolved solver configuration */
    configHash: string;
}

/**
 * Distribution plus diagnostics
 */
export interface EquilibriumResult<D extends EquilibriumDiagnostics = EquilibriumDiagnostics> {
    distribution: Distribution;
    diagnostics: D;
}

/**
 * Capability shared by the LP and swap-regret solvers.
 *
 * Implementations are independent; there is no common base class.
 */
export interface EquilibriumSolver<D extends EquilibriumDiagnostics = EquilibriumDiagnostics> {
    readonly name: string;
    readonly game: Game;
    solve(): EquilibriumResult<D>;
}
