/**
 * @module equilibrium/incentive
 * @description Correlated-equilibrium incentive constraints
 *
 * For player i, recommended action a and deviation a' != a:
 *
 *   slack(i, a, a') = sum over profiles p with p_i = a of
 *                     x(p) * (u_i(p) - u_i(p with p_i := a'))
 *
 * x is a correlated equilibrium iff every slack is >= 0.
 */

import type { Game } from '../game';
import type { IncentiveConstraintKey, IncentiveSlack } from './types';

/**
 * Every (player, action, deviation) triple, ordered by player, then action,
 * then deviation
 */
export function incentiveConstraintKeys(game: Game): IncentiveConstraintKey[] {
    const keys: IncentiveConstraintKey[] = [];
    for (let player = 0; player < game.numPlayers; player++) {
        const n = game.actionCounts[player];
        for (let action = 0; action < n; action++) {
            for (let deviation = 0; deviation < n; deviation++) {
                if (deviation !== action) {
                    keys.push({ player, action, deviation });
                }
            }
        }
    }
    return keys;
}

/**
 * Number of incentive constraints: sum of n_i (n_i - 1)
 */
export function countIncentiveConstraints(game: Game): number {
    return game.actionCounts.reduce((total, n) => total + n * (n - 1), 0);
}

/**
 * Coefficient of every profile in one incentive constraint
 */
export function incentiveCoefficients(game: Game, key: IncentiveConstraintKey): number[] {
    const { player, action, deviation } = key;
    const coefficients = new Array<number>(game.jointActionCount).fill(0);
    for (let index = 0; index < game.jointActionCount; index++) {
        if (game.actionAt(index, player) !== action) continue;
        const deviated = game.deviationIndex(index, player, deviation);
        coefficients[index] = game.payoffAtIndex(player, index) - game.payoffAtIndex(player, deviated);
    }
    return coefficients;
}

/**
 * Slack of every incentive constraint under `probabilities`
 * (flat-index order), in incentiveConstraintKeys order
 */
export function computeIncentiveSlacks(game: Game, probabilities: ArrayLike<number>): IncentiveSlack[] {
    const slacks: IncentiveSlack[] = [];

    for (let player = 0; player < game.numPlayers; player++) {
        const n = game.actionCounts[player];
        // gain[a][a'] accumulates the slack of (player, a, a')
        const gain = Array.from({ length: n }, () => new Array<number>(n).fill(0));

        for (let index = 0; index < game.jointActionCount; index++) {
            const mass = probabilities[index];
            if (mass === 0) continue;
            const action = game.actionAt(index, player);
            const base = game.payoffAtIndex(player, index);
            for (let deviation = 0; deviation < n; deviation++) {
                if (deviation === action) continue;
                const deviated = game.deviationIndex(index, player, deviation);
                gain[action][deviation] += mass * (base - game.payoffAtIndex(player, deviated));
            }
        }

        for (let action = 0; action < n; action++) {
            for (let deviation = 0; deviation < n; deviation++) {
                if (deviation !== action) {
                    slacks.push({ player, action, deviation, slack: gain[action][deviation] });
                }
            }
        }
    }

    return slacks;
}
