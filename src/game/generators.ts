/**
 * @module game/generators
 * @description Payoff tensor generators, one per game kind
 *
 * Every generator returns one row-major Float64Array per player and throws
 * InvalidGameError when the requested shape does not fit the kind.
 */

import { InvalidGameError } from '../core/errors';
import { createRng } from '../core/repro';
import { indexToProfile, jointActionCount } from './profile';
import { DEFAULT_PAYOFF_RANGE } from './types';

// ==================== Random ====================

/**
 * I.i.d. uniform payoffs in [low, high), drawn player by player in flat-index
 * order from a Mulberry32 stream seeded with `seed`.
 */
export function randomPayoffs(
    numPlayers: number,
    actionCounts: readonly number[],
    seed: number,
    low: number = DEFAULT_PAYOFF_RANGE.low,
    high: number = DEFAULT_PAYOFF_RANGE.high
): Float64Array[] {
    if (!Number.isFinite(seed)) {
        throw new InvalidGameError(`Random game seed must be a finite number, got ${seed}`);
    }
    if (!Number.isFinite(low) || !Number.isFinite(high) || !(low < high)) {
        throw new InvalidGameError(`Random payoff bounds must satisfy low < high, got [${low}, ${high})`, { low, high });
    }

    const rng = createRng(seed);
    const size = jointActionCount(actionCounts);
    const tensors: Float64Array[] = [];
    for (let player = 0; player < numPlayers; player++) {
        const tensor = new Float64Array(size);
        for (let index = 0; index < size; index++) {
            tensor[index] = rng.uniform(low, high);
        }
        tensors.push(tensor);
    }
    return tensors;
}

// ==================== Chicken ====================

const CHICKEN_PAYOFFS: readonly (readonly number[])[] = [
    [0, 1, -1, -10],
    [0, -1, 1, -10],
];

/**
 * The two-player game of Chicken.
 *
 * Player 0: [[0, 1], [-1, -10]], player 1: [[0, -1], [1, -10]].
 */
export function chickenPayoffs(numPlayers: number, actionCounts: readonly number[]): Float64Array[] {
    if (numPlayers !== 2) {
        throw new InvalidGameError(`Chicken is a two-player game, got ${numPlayers} players`);
    }
    if (actionCounts[0] !== 2 || actionCounts[1] !== 2) {
        throw new InvalidGameError(
            `Chicken requires two actions per player, got [${actionCounts.join(', ')}]`
        );
    }
    return CHICKEN_PAYOFFS.map(payoffs => Float64Array.from(payoffs));
}

// ==================== Congestion ====================

/**
 * Symmetric congestion game over resources 0..n-1.
 *
 * A player on resource r pays (r + 1) per player using r, itself included.
 */
export function congestionPayoffs(numPlayers: number, actionCounts: readonly number[]): Float64Array[] {
    const resources = actionCounts[0];
    if (actionCounts.some(count => count !== resources)) {
        throw new InvalidGameError(
            `Congestion games need the same number of actions for every player, got [${actionCounts.join(', ')}]`
        );
    }

    const size = jointActionCount(actionCounts);
    const tensors = Array.from({ length: numPlayers }, () => new Float64Array(size));
    const load = new Array<number>(resources);

    for (let index = 0; index < size; index++) {
        const profile = indexToProfile(index, actionCounts);
        load.fill(0);
        for (const resource of profile) {
            load[resource]++;
        }
        for (let player = 0; player < numPlayers; player++) {
            const resource = profile[player];
            tensors[player][index] = -(resource + 1) * load[resource];
        }
    }
    return tensors;
}

// ==================== Explicit ====================

/**
 * Shape of a nested tensor, read along its first elements
 */
export function inferShape(tensor: unknown): number[] {
    const shape: number[] = [];
    let node = tensor;
    while (Array.isArray(node)) {
        shape.push(node.length);
        node = node[0];
    }
    return shape;
}

function flattenInto(
    node: unknown,
    shape: readonly number[],
    depth: number,
    out: number[],
    player: number
): void {
    if (depth === shape.length) {
        if (typeof node !== 'number' || !Number.isFinite(node)) {
            throw new InvalidGameError(
                `Payoff tensor for player ${player} contains a non-finite entry: ${String(node)}`
            );
        }
        out.push(node);
        return;
    }
    if (!Array.isArray(node) || node.length !== shape[depth]) {
        throw new InvalidGameError(
            `Payoff tensor for player ${player} has incorrect shape: expected [${shape.join(', ')}], ` +
            `got [${inferShape(node).join(', ')}] at depth ${depth}`,
            { player, expected: [...shape], depth }
        );
    }
    for (const child of node) {
        flattenInto(child, shape, depth + 1, out, player);
    }
}

/**
 * Validate and copy caller-supplied tensors.
 *
 * A tensor made only of numbers with length prod(actionCounts) is taken as
 * row-major; anything else must nest exactly to `actionCounts`.
 */
export function explicitPayoffs(
    numPlayers: number,
    actionCounts: readonly number[],
    payoffs: readonly unknown[]
): Float64Array[] {
    if (!Array.isArray(payoffs) || payoffs.length !== numPlayers) {
        throw new InvalidGameError(
            `Expected ${numPlayers} payoff tensors, got ${Array.isArray(payoffs) ? payoffs.length : typeof payoffs}`
        );
    }

    const size = jointActionCount(actionCounts);
    return payoffs.map((tensor, player) => {
        const out: number[] = [];
        if (Array.isArray(tensor) && tensor.length === size && tensor.every(v => typeof v === 'number')) {
            flattenInto(tensor, [size], 0, out, player);
        } else {
            flattenInto(tensor, actionCounts, 0, out, player);
        }
        return Float64Array.from(out);
    });
}
