/**
 * @module equilibrium/config
 * @description Solver configuration, defaults and validation
 *
 * Options are merged over the defaults once, validated, and frozen in the
 * solver constructor. Nothing is computed before validation passes.
 */

import { InvalidParameterError } from '../core/errors';
import type { Logger } from '../core/logging';

// ==================== Linear Programming ====================

/**
 * LinearProgrammingSolver configuration
 */
export interface LinearProgrammingSolverConfig {
    /** Maximize expected welfare instead of returning any feasible point */
    maximizeWelfare: boolean;
    /** Violation tolerance of the reported diagnostics */
    tolerance: number;
    /** Simplex pivot cap (default scales with program size) */
    maxIterations?: number;
    /** Receives one summary per solve */
    logger?: Logger;
}

export type LinearProgrammingSolverOptions = Partial<LinearProgrammingSolverConfig>;

/**
 * Default configuration
 */
export const DEFAULT_LP_SOLVER_CONFIG: LinearProgrammingSolverConfig = {
    maximizeWelfare: false,
    tolerance: 1e-6,
};

export function resolveLinearProgrammingConfig(
    maximizeWelfareOrOptions: boolean | LinearProgrammingSolverOptions
): Readonly<LinearProgrammingSolverConfig> {
    const options = typeof maximizeWelfareOrOptions === 'boolean'
        ? { maximizeWelfare: maximizeWelfareOrOptions }
        : maximizeWelfareOrOptions;
    const config = { ...DEFAULT_LP_SOLVER_CONFIG, ...options };

    if (typeof config.maximizeWelfare !== 'boolean') {
        throw new InvalidParameterError('maximizeWelfare', `must be a boolean, got ${String(config.maximizeWelfare)}`);
    }
    requireNonNegative('tolerance', config.tolerance);
    if (config.maxIterations !== undefined) {
        requirePositiveInteger('maxIterations', config.maxIterations);
    }
    return Object.freeze(config);
}

// ==================== Swap Regret ====================

/**
 * SwapRegretSolver configuration
 */
export interface SwapRegretSolverConfig {
    /** Hedge learning rate of every internal learner (> 0) */
    epsilon: number;
    /** Rounds of play T */
    numRounds: number;
    /** Seed of the sampling RNG; a fresh one is drawn and reported when omitted */
    seed?: number;
    /** Record swap regret every this many rounds; 0 = only at the end */
    trackEvery?: number;
    /** Play the argmax without sampling once it has probability >= 1 - commitTolerance */
    commitTolerance: number;
    /** Violation tolerance of the reported diagnostics (default: epsilon) */
    violationTolerance?: number;
    /** Receives checkpoints and one summary per solve */
    logger?: Logger;
}

export type SwapRegretSolverOptions = Partial<SwapRegretSolverConfig>;

/**
 * Default configuration
 */
export const DEFAULT_SWAP_REGRET_CONFIG: SwapRegretSolverConfig = {
    epsilon: 0.1,
    numRounds: 10000,
    commitTolerance: 1e-12,
};

export function resolveSwapRegretConfig(
    epsilonOrOptions: number | SwapRegretSolverOptions
): Readonly<SwapRegretSolverConfig> {
    const options = typeof epsilonOrOptions === 'number'
        ? { epsilon: epsilonOrOptions }
        : epsilonOrOptions;
    const config = { ...DEFAULT_SWAP_REGRET_CONFIG, ...options };

    if (!Number.isFinite(config.epsilon) || config.epsilon <= 0) {
        throw new InvalidParameterError('epsilon', `must be a finite number > 0, got ${config.epsilon}`);
    }
    requirePositiveInteger('numRounds', config.numRounds);
    if (config.seed !== undefined && !Number.isInteger(config.seed)) {
        throw new InvalidParameterError('seed', `must be an integer, got ${config.seed}`);
    }
    if (config.trackEvery !== undefined && (!Number.isInteger(config.trackEvery) || config.trackEvery < 0)) {
        throw new InvalidParameterError('trackEvery', `must be an integer >= 0, got ${config.trackEvery}`);
    }
    if (!(config.commitTolerance >= 0 && config.commitTolerance < 1)) {
        throw new InvalidParameterError('commitTolerance', `must lie in [0, 1), got ${config.commitTolerance}`);
    }
    if (config.violationTolerance !== undefined) {
        requireNonNegative('violationTolerance', config.violationTolerance);
    }
    return Object.freeze(config);
}

// ==================== Helpers ====================

function requirePositiveInteger(name: string, value: number): void {
    if (!Number.isInteger(value) || value <= 0) {
        throw new InvalidParameterError(name, `must be a positive integer, got ${value}`);
    }
}

function requireNonNegative(name: string, value: number): void {
    if (!Number.isFinite(value) || value < 0) {
        throw new InvalidParameterError(name, `must be a finite number >= 0, got ${value}`);
    }
}
