/**
 * @module equilibrium/swap-regret
 * @description Approximate correlated equilibria by swap-regret learning
 *
 * Every player runs a no-swap-regret learner (Blum and Mansour, 2007): one
 * Hedge copy per own action, combined through the stationary distribution of
 * the copies' strategy matrix. The empirical distribution of joint play is an
 * approximate correlated equilibrium whose incentive violations shrink with
 * the players' average swap regret.
 */

import { computeConfigHash, createRng, resolveSeed, type SeededRandom } from '../core/repro';
import type { Game } from '../game';
import { argmax, softmax, stationaryDistribution, zeros, zerosMatrix } from '../models/numeric/math';
import {
    resolveSwapRegretConfig,
    type SwapRegretSolverConfig,
    type SwapRegretSolverOptions,
} from './config';
import { Distribution } from './distribution';
import type { EquilibriumDiagnostics, EquilibriumResult, EquilibriumSolver } from './types';

// ==================== Learner ====================

/**
 * Swap-regret learner over `numActions` actions.
 *
 * Copy j keeps cumulative gains G[j]; its strategy is softmax(learningRate * G[j]).
 * The player mixes by the stationary distribution p = pQ of those rows, and
 * copy j is charged p_j of each round's payoff vector.
 */
export class SwapRegretLearner {
    readonly numActions: number;
    readonly learningRate: number;
    private readonly gains: number[][];
    private current: number[];

    constructor(numActions: number, learningRate: number) {
        this.numActions = numActions;
        this.learningRate = learningRate;
        this.gains = zerosMatrix(numActions, numActions);
        this.current = new Array<number>(numActions).fill(1 / numActions);
    }

    /**
     * Mixed strategy for the coming round
     */
    strategy(): readonly number[] {
        return this.current;
    }

    /**
     * Observe the payoff of every own action (in [0, 1]) and recompute the strategy
     */
    update(payoffs: ArrayLike<number>): void {
        const n = this.numActions;
        for (let copy = 0; copy < n; copy++) {
            const weight = this.current[copy];
            if (weight === 0) continue;
            const row = this.gains[copy];
            for (let action = 0; action < n; action++) {
                row[action] += weight * payoffs[action];
            }
        }
        const Q = this.gains.map(row => softmax(row, this.learningRate));
        this.current = stationaryDistribution(Q);
    }
}

/**
 * Average swap regret bound of one learner, in payoff-range units
 */
export function swapRegretBound(numActions: number, learningRate: number, numRounds: number): number {
    if (numActions <= 1) return 0;
    return numActions * (Math.log(numActions) / (learningRate * numRounds) + learningRate / 8);
}

// ==================== Solver ====================

/**
 * One recorded point of the regret trajectory
 */
export interface RegretCheckpoint {
    round: number;
    maxSwapRegret: number;
}

/**
 * Diagnostics of a swap-regret run
 */
export interface SwapRegretDiagnostics extends EquilibriumDiagnostics {
    /** Seed actually used (drawn fresh when none was configured) */
    seed: number;
    epsilon: number;
    numRounds: number;
    /** Largest average swap regret over players at the end of the run */
    maxSwapRegret: number;
    /** Average swap regret of every player */
    swapRegrets: number[];
    /** swapRegrets divided by each player's payoff range (0 for a constant payoff) */
    normalizedSwapRegrets: number[];
    regretHistory: RegretCheckpoint[];
}

/**
 * Approximate correlated-equilibrium solver.
 *
 * @example
 * ```typescript
 * const solver = new SwapRegretSolver(game, { epsilon: 0.05, numRounds: 20000, seed: 7 });
 * const { distribution, diagnostics } = solver.solve();
 * diagnostics.maxSwapRegret;
 * ```
 */
export class SwapRegretSolver implements EquilibriumSolver<SwapRegretDiagnostics> {
    readonly game: Game;
    readonly name = 'Swap Regret';
    readonly config: Readonly<SwapRegretSolverConfig>;

    /**
     * @param epsilonOrOptions - learning rate, or a full options object
     * @throws InvalidParameterError for out-of-range options
     */
    constructor(game: Game, epsilonOrOptions: number | SwapRegretSolverOptions) {
        this.game = game;
        this.config = resolveSwapRegretConfig(epsilonOrOptions);
    }

    /**
     * Play `numRounds` rounds and return the empirical distribution of play
     */
    solve(): EquilibriumResult<SwapRegretDiagnostics> {
        const start = performance.now();
        const { game } = this;
        const { epsilon, numRounds, commitTolerance, logger } = this.config;
        const seed = resolveSeed(this.config.seed);
        const rng = createRng(seed);
        const trackEvery = this.config.trackEvery ?? Math.max(1, Math.floor(numRounds / 10));

        const learners = game.actionCounts.map(n => new SwapRegretLearner(n, epsilon));
        const ranges = game.actionCounts.map((_, player) => {
            const { min, max } = game.payoffRange(player);
            return { min, span: max - min };
        });
        // regrets[i][a][a'] = cumulative gain of playing a' whenever i played a
        const regrets = game.actionCounts.map(n => zerosMatrix(n, n));
        const counts = new Float64Array(game.jointActionCount);
        const history: RegretCheckpoint[] = [];
        const profile = zeros(game.numPlayers);

        for (let round = 1; round <= numRounds; round++) {
            for (let player = 0; player < game.numPlayers; player++) {
                profile[player] = sampleAction(learners[player].strategy(), rng, commitTolerance);
            }
            const index = game.profileIndex(profile);
            counts[index]++;

            for (let player = 0; player < game.numPlayers; player++) {
                const n = game.actionCounts[player];
                const played = profile[player];
                const realised = game.payoffAtIndex(player, index);
                const { min, span } = ranges[player];
                const normalised = zeros(n);
                for (let action = 0; action < n; action++) {
                    const counterfactual = game.payoffAtIndex(player, game.deviationIndex(index, player, action));
                    regrets[player][played][action] += counterfactual - realised;
                    normalised[action] = span > 0 ? (counterfactual - min) / span : 0;
                }
                learners[player].update(normalised);
            }

            if ((trackEvery > 0 && round % trackEvery === 0) || round === numRounds) {
                const maxSwapRegret = Math.max(...regrets.map(R => averageSwapRegret(R, round)));
                history.push({ round, maxSwapRegret });
                logger?.logRound({ solver: this.name, seed, round, totalRounds: numRounds, maxSwapRegret });
            }
        }

        const swapRegrets = regrets.map(R => averageSwapRegret(R, numRounds));
        const distribution = Distribution.fromCounts(game, counts);
        const violationTolerance = this.config.violationTolerance ?? epsilon;
        const violations = distribution.violations(violationTolerance);

        const diagnostics: SwapRegretDiagnostics = {
            solver: this.name,
            seed,
            epsilon,
            numRounds,
            maxSwapRegret: Math.max(...swapRegrets),
            swapRegrets,
            normalizedSwapRegrets: swapRegrets.map((r, player) =>
                ranges[player].span > 0 ? r / ranges[player].span : 0
            ),
            regretHistory: history,
            expectedWelfare: distribution.expectedWelfare(),
            slacks: distribution.incentiveSlacks().map(s => ({ ...s })),
            violations,
            maxViolation: distribution.maxViolation(),
            violationTolerance,
            runtimeMs: performance.now() - start,
            configHash: computeConfigHash({
                solver: this.name,
                actionCounts: [...game.actionCounts],
                payoffs: game.toJSON().payoffs,
                epsilon,
                numRounds,
                seed,
                commitTolerance,
            }),
        };

        logger?.logSolve({
            solver: this.name,
            seed,
            status: 'COMPLETED',
            expectedWelfare: diagnostics.expectedWelfare,
            maxViolation: diagnostics.maxViolation,
            numViolations: violations.length,
            runtimeMs: diagnostics.runtimeMs,
            iterations: numRounds,
        });

        return { distribution, diagnostics };
    }
}

// ==================== Helpers ====================

/**
 * Sum over played actions of the best remapping gain, averaged over `rounds`
 */
export function averageSwapRegret(regret: readonly (readonly number[])[], rounds: number): number {
    let total = 0;
    for (const row of regret) {
        // identity swap keeps every term >= 0
        total += Math.max(0, ...row);
    }
    return total / rounds;
}

function sampleAction(strategy: readonly number[], rng: SeededRandom, commitTolerance: number): number {
    const best = argmax(strategy);
    if (strategy[best] >= 1 - commitTolerance) {
        return best;
    }
    return rng.categorical(strategy);
}
