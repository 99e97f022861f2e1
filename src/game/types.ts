/**
 * @module game/types
 * @description Type definitions for normal-form games
 */

/**
 * One action index per player
 */
export type JointActionProfile = readonly number[];

/**
 * Payoff tensor of one player: nested arrays of shape `actionCounts`, or a
 * flat row-major array of length `prod(actionCounts)`.
 */
export type PayoffTensor = number[] | PayoffTensor[];

/**
 * How the payoff tensors of a game are produced.
 * Resolved once in the Game constructor.
 */
export type GameType =
    | {
        kind: 'random';
        /** Seed of the payoff RNG */
        seed: number;
        /** Lower payoff bound (inclusive, default -10) */
        low?: number;
        /** Upper payoff bound (exclusive, default 10) */
        high?: number;
    }
    | {
        kind: 'explicit';
        /** One tensor per player */
        payoffs: readonly PayoffTensor[];
    }
    | { kind: 'chicken' }
    | { kind: 'congestion' };

export type GameKind = GameType['kind'];

/**
 * Single-object game configuration for `createGame`
 */
export interface GameConfig {
    numPlayers: number;
    actionCounts: readonly number[];
    type: GameType;
}

/**
 * Plain-data rendering of a game
 */
export interface GameSnapshot {
    kind: GameKind;
    numPlayers: number;
    actionCounts: number[];
    /** Row-major payoffs, one array per player */
    payoffs: number[][];
}

/**
 * Default bounds of uniformly drawn payoffs
 */
export const DEFAULT_PAYOFF_RANGE = {
    low: -10,
    high: 10,
} as const;
