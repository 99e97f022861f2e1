/**
 * @module game/game
 * @description Immutable N-player normal-form game
 */

import { InvalidGameError, ProfileOutOfRangeError } from '../core/errors';
import {
    chickenPayoffs,
    congestionPayoffs,
    explicitPayoffs,
    inferShape,
    randomPayoffs,
} from './generators';
import {
    computeStrides,
    enumerateProfiles,
    indexToProfile,
    jointActionCount,
    profileKey,
    profileToIndex,
} from './profile';
import type {
    GameConfig,
    GameKind,
    GameSnapshot,
    GameType,
    JointActionProfile,
    PayoffTensor,
} from './types';

/**
 * Finite N-player game in normal form.
 *
 * The construction mode is resolved once in the constructor; afterwards the
 * object only holds one row-major payoff tensor per player and never changes.
 *
 * @example
 * ```typescript
 * const pd = Game.fromPayoffs([
 *     [[3, 0], [5, 1]],
 *     [[3, 5], [0, 1]],
 * ]);
 * pd.payoff(0, [1, 0]); // 5
 *
 * const random = new Game(3, [2, 2, 2], { kind: 'random', seed: 7 });
 * ```
 */
export class Game {
    readonly numPlayers: number;
    readonly actionCounts: readonly number[];
    /** Number of joint action profiles */
    readonly jointActionCount: number;
    readonly kind: GameKind;

    private readonly strides: readonly number[];
    private readonly tensors: readonly Float64Array[];

    constructor(numPlayers: number, actionCounts: readonly number[], type: GameType) {
        validateShape(numPlayers, actionCounts);

        this.numPlayers = numPlayers;
        this.actionCounts = Object.freeze([...actionCounts]);
        this.jointActionCount = jointActionCount(actionCounts);
        this.strides = Object.freeze(computeStrides(actionCounts));
        this.kind = type.kind;
        this.tensors = Object.freeze(resolvePayoffs(numPlayers, this.actionCounts, type));
    }

    /**
     * Build a game from explicit nested tensors, inferring the shape from
     * the first player's tensor.
     */
    static fromPayoffs(payoffs: readonly PayoffTensor[]): Game {
        if (payoffs.length === 0) {
            throw new InvalidGameError('At least two payoff tensors are required');
        }
        return new Game(payoffs.length, inferShape(payoffs[0]), { kind: 'explicit', payoffs });
    }

    // ==================== Payoff Queries ====================

    /**
     * Payoff of `player` at `profile`
     * @throws ProfileOutOfRangeError if the player or any action is out of range
     */
    payoff(player: number, profile: JointActionProfile): number {
        this.checkPlayer(player);
        return this.tensors[player][this.profileIndex(profile)];
    }

    /**
     * Payoffs of every player at `profile`
     */
    payoffs(profile: JointActionProfile): number[] {
        const index = this.profileIndex(profile);
        return this.tensors.map(tensor => tensor[index]);
    }

    /**
     * Payoff by flat index. Unchecked: callers iterate valid indices.
     */
    payoffAtIndex(player: number, index: number): number {
        return this.tensors[player][index];
    }

    /**
     * Sum of all players' payoffs at `profile`
     */
    welfareAt(profile: JointActionProfile): number {
        return this.welfareAtIndex(this.profileIndex(profile));
    }

    /**
     * Sum of all players' payoffs at a flat index
     */
    welfareAtIndex(index: number): number {
        let total = 0;
        for (const tensor of this.tensors) {
            total += tensor[index];
        }
        return total;
    }

    /**
     * Smallest and largest payoff of a player
     */
    payoffRange(player: number): { min: number; max: number } {
        this.checkPlayer(player);
        let min = Infinity;
        let max = -Infinity;
        for (const value of this.tensors[player]) {
            if (value < min) min = value;
            if (value > max) max = value;
        }
        return { min, max };
    }

    // ==================== Indexing ====================

    /**
     * Flat index of a profile
     * @throws ProfileOutOfRangeError on a malformed or out-of-range profile
     */
    profileIndex(profile: JointActionProfile): number {
        if (profile.length !== this.numPlayers) {
            throw new ProfileOutOfRangeError(
                `Profile has ${profile.length} actions, game has ${this.numPlayers} players`,
                { profile: [...profile] }
            );
        }
        profile.forEach((action, player) => {
            if (!Number.isInteger(action) || action < 0 || action >= this.actionCounts[player]) {
                throw new ProfileOutOfRangeError(
                    `Action ${action} of player ${player} is outside 0..${this.actionCounts[player] - 1}`,
                    { profile: [...profile], player }
                );
            }
        });
        return profileToIndex(profile, this.strides);
    }

    /**
     * Profile at a flat index
     * @throws ProfileOutOfRangeError if the index is outside the joint action space
     */
    profileAt(index: number): number[] {
        if (!Number.isInteger(index) || index < 0 || index >= this.jointActionCount) {
            throw new ProfileOutOfRangeError(
                `Profile index ${index} is outside 0..${this.jointActionCount - 1}`
            );
        }
        return indexToProfile(index, this.actionCounts);
    }

    /**
     * Action of `player` in the profile at a flat index (unchecked)
     */
    actionAt(index: number, player: number): number {
        return Math.floor(index / this.strides[player]) % this.actionCounts[player];
    }

    /**
     * Flat index of the profile at `index` after `player` switches to
     * `action` (unchecked)
     */
    deviationIndex(index: number, player: number, action: number): number {
        return index + (action - this.actionAt(index, player)) * this.strides[player];
    }

    /**
     * Every joint profile in flat-index order
     */
    profiles(): Generator<number[]> {
        return enumerateProfiles(this.actionCounts);
    }

    // ==================== Rendering ====================

    toJSON(): GameSnapshot {
        return {
            kind: this.kind,
            numPlayers: this.numPlayers,
            actionCounts: [...this.actionCounts],
            payoffs: this.tensors.map(tensor => Array.from(tensor)),
        };
    }

    /**
     * Human-readable payoff listing
     */
    describe(digits = 2): string {
        const lines = [`Game (${this.kind}) with ${this.numPlayers} players, actions [${this.actionCounts.join(', ')}]`];
        for (let index = 0; index < this.jointActionCount; index++) {
            const payoffs = this.tensors.map(tensor => tensor[index].toFixed(digits));
            lines.push(`  (${profileKey(indexToProfile(index, this.actionCounts))}): ${payoffs.join(', ')}`);
        }
        return lines.join('\n');
    }

    private checkPlayer(player: number): void {
        if (!Number.isInteger(player) || player < 0 || player >= this.numPlayers) {
            throw new ProfileOutOfRangeError(`Player ${player} is outside 0..${this.numPlayers - 1}`);
        }
    }
}

// ==================== Factory ====================

/**
 * Create a game from a single configuration object
 */
export function createGame(config: GameConfig): Game {
    return new Game(config.numPlayers, config.actionCounts, config.type);
}

// ==================== Helpers ====================

function validateShape(numPlayers: number, actionCounts: readonly number[]): void {
    if (!Number.isInteger(numPlayers) || numPlayers < 2) {
        throw new InvalidGameError(`A game needs an integer number of players >= 2, got ${numPlayers}`);
    }
    if (!Array.isArray(actionCounts) || actionCounts.length !== numPlayers) {
        throw new InvalidGameError(
            `Expected ${numPlayers} action counts, got ${Array.isArray(actionCounts) ? actionCounts.length : typeof actionCounts}`
        );
    }
    actionCounts.forEach((count, player) => {
        if (!Number.isInteger(count) || count < 1) {
            throw new InvalidGameError(
                `Player ${player} must have a positive integer number of actions, got ${count}`,
                { player, count }
            );
        }
    });
}

function resolvePayoffs(numPlayers: number, actionCounts: readonly number[], type: GameType): Float64Array[] {
    switch (type.kind) {
        case 'random':
            return randomPayoffs(numPlayers, actionCounts, type.seed, type.low, type.high);
        case 'explicit':
            return explicitPayoffs(numPlayers, actionCounts, type.payoffs);
        case 'chicken':
            return chickenPayoffs(numPlayers, actionCounts);
        case 'congestion':
            return congestionPayoffs(numPlayers, actionCounts);
        default:
            throw new InvalidGameError(`Unknown game kind: ${JSON.stringify(type)}`);
    }
}
