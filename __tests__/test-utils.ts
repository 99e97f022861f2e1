/**
 * Test Utilities
 * Numeric helpers and small fixture games shared by the test files
 */

import fc from 'fast-check';
import { Game } from '../src/game';

/**
 * Check if two numbers are approximately equal
 */
export function isClose(a: number, b: number, rtol = 1e-5, atol = 1e-8): boolean {
    return Math.abs(a - b) <= atol + rtol * Math.abs(b);
}

/**
 * Check if two arrays are approximately equal element-wise
 */
export function arraysClose(
    a: readonly number[],
    b: readonly number[],
    rtol = 1e-5,
    atol = 1e-8
): boolean {
    if (a.length !== b.length) return false;
    return a.every((val, i) => isClose(val, b[i], rtol, atol));
}

/**
 * Sum of an array
 */
export function total(arr: ArrayLike<number>): number {
    let acc = 0;
    for (let i = 0; i < arr.length; i++) {
        acc += arr[i];
    }
    return acc;
}

// ==================== Fixture Games ====================

/**
 * Prisoner's dilemma: action 1 (defect) strictly dominates for both players
 */
export function prisonersDilemma(): Game {
    return Game.fromPayoffs([
        [[3, 0], [5, 1]],
        [[3, 5], [0, 1]],
    ]);
}

/**
 * Matching pennies: the unique correlated equilibrium is uniform
 */
export function matchingPennies(): Game {
    return Game.fromPayoffs([
        [[1, -1], [-1, 1]],
        [[-1, 1], [1, -1]],
    ]);
}

/**
 * Every payoff zero: every distribution is a correlated equilibrium
 */
export function constantGame(actionCounts: number[]): Game {
    const size = actionCounts.reduce((a, b) => a * b, 1);
    return new Game(actionCounts.length, actionCounts, {
        kind: 'explicit',
        payoffs: actionCounts.map(() => new Array<number>(size).fill(0)),
    });
}

// ==================== Arbitraries ====================

/**
 * Small random games: 2-3 players, 1-3 actions each, random seed
 */
export const smallGameArbitrary: fc.Arbitrary<Game> = fc
    .record({
        actionCounts: fc.array(fc.integer({ min: 1, max: 3 }), { minLength: 2, maxLength: 3 }),
        seed: fc.integer({ min: 0, max: 0x7fffffff }),
    })
    .map(({ actionCounts, seed }) => new Game(actionCounts.length, actionCounts, { kind: 'random', seed }));
