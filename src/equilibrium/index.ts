/**
 * @module equilibrium
 * @description Correlated-equilibrium solvers and distributions
 */

export type {
    IncentiveConstraintKey,
    IncentiveSlack,
    IncentiveViolation,
    EquilibriumDiagnostics,
    EquilibriumResult,
    EquilibriumSolver,
} from './types';

export {
    incentiveConstraintKeys,
    countIncentiveConstraints,
    incentiveCoefficients,
    computeIncentiveSlacks,
} from './incentive';

export type { SupportEntry, DistributionSnapshot } from './distribution';
export {
    Distribution,
    PROBABILITY_SUM_TOLERANCE,
    NEGATIVITY_TOLERANCE,
    DEFAULT_VIOLATION_TOLERANCE,
} from './distribution';

export type {
    LinearProgrammingSolverConfig,
    LinearProgrammingSolverOptions,
    SwapRegretSolverConfig,
    SwapRegretSolverOptions,
} from './config';
export {
    DEFAULT_LP_SOLVER_CONFIG,
    DEFAULT_SWAP_REGRET_CONFIG,
    resolveLinearProgrammingConfig,
    resolveSwapRegretConfig,
} from './config';

export type { EquilibriumProgram, LinearProgrammingDiagnostics } from './lp-solver';
export { buildEquilibriumProgram, LinearProgrammingSolver } from './lp-solver';

export type { RegretCheckpoint, SwapRegretDiagnostics } from './swap-regret';
export {
    SwapRegretLearner,
    SwapRegretSolver,
    averageSwapRegret,
    swapRegretBound,
} from './swap-regret';
