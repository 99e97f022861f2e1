/**
 * @module equilibrium/distribution
 * @description Probability distribution over joint action profiles
 */

import {
    evaluateConstraints,
    lowerBound,
    type ConstraintReport,
    type ConstraintSpec,
} from '../core/constraint';
import { InvalidParameterError } from '../core/errors';
import { parseProfileKey, profileKey, type Game, type JointActionProfile } from '../game';
import { computeIncentiveSlacks } from './incentive';
import type { IncentiveSlack, IncentiveViolation } from './types';

/** Allowed deviation of the total mass from 1 */
export const PROBABILITY_SUM_TOLERANCE = 1e-6;
/** Entries down to -NEGATIVITY_TOLERANCE are numerical noise and clipped to 0 */
export const NEGATIVITY_TOLERANCE = 1e-9;
/** Default tolerance of violation listings */
export const DEFAULT_VIOLATION_TOLERANCE = 1e-6;

/**
 * One profile with positive probability
 */
export interface SupportEntry {
    profile: number[];
    probability: number;
}

/**
 * Plain-data rendering of a distribution
 */
export interface DistributionSnapshot {
    actionCounts: number[];
    /** Probability of each supported profile, keyed "a0,a1,..." */
    probabilities: Record<string, number>;
}

/**
 * Joint distribution over the profiles of one game.
 *
 * Immutable; every query is answered against the game it was built for.
 */
export class Distribution {
    readonly game: Game;
    private readonly probabilities: Float64Array;
    private slackCache: readonly Readonly<IncentiveSlack>[] | null = null;

    /**
     * @param probabilities - one entry per profile in flat-index order
     * @throws InvalidParameterError on wrong length, non-finite or negative
     * entries, or a total mass away from 1
     */
    constructor(game: Game, probabilities: ArrayLike<number>) {
        if (probabilities.length !== game.jointActionCount) {
            throw new InvalidParameterError(
                'probabilities',
                `expected ${game.jointActionCount} entries, got ${probabilities.length}`
            );
        }

        const copy = new Float64Array(probabilities.length);
        let total = 0;
        for (let i = 0; i < probabilities.length; i++) {
            const p = probabilities[i];
            if (!Number.isFinite(p)) {
                throw new InvalidParameterError('probabilities', `entry ${i} is not finite (${p})`);
            }
            if (p < -NEGATIVITY_TOLERANCE) {
                throw new InvalidParameterError('probabilities', `entry ${i} is negative (${p})`);
            }
            copy[i] = p > 0 ? p : 0;
            total += copy[i];
        }
        if (Math.abs(total - 1) > PROBABILITY_SUM_TOLERANCE) {
            throw new InvalidParameterError('probabilities', `entries sum to ${total}, expected 1`);
        }

        this.game = game;
        this.probabilities = copy;
    }

    /**
     * Empirical distribution from per-profile counts
     */
    static fromCounts(game: Game, counts: ArrayLike<number>): Distribution {
        let total = 0;
        for (let i = 0; i < counts.length; i++) {
            if (!(counts[i] >= 0)) {
                throw new InvalidParameterError('counts', `entry ${i} must be a non-negative number, got ${counts[i]}`);
            }
            total += counts[i];
        }
        if (!(total > 0)) {
            throw new InvalidParameterError('counts', 'at least one profile must have a positive count');
        }
        return new Distribution(game, Array.from(counts, c => c / total));
    }

    /**
     * Distribution from a `toRecord()`-style map; missing profiles get 0
     */
    static fromRecord(game: Game, record: Readonly<Record<string, number>>): Distribution {
        const probabilities = new Float64Array(game.jointActionCount);
        for (const [key, probability] of Object.entries(record)) {
            probabilities[game.profileIndex(parseProfileKey(key))] = probability;
        }
        return new Distribution(game, probabilities);
    }

    // ==================== Queries ====================

    /**
     * Probability of a joint profile
     * @throws ProfileOutOfRangeError for a profile outside the game
     */
    probability(profile: JointActionProfile): number {
        return this.probabilities[this.game.profileIndex(profile)];
    }

    /**
     * Probability by flat index
     */
    probabilityAt(index: number): number {
        return this.probabilities[index];
    }

    /**
     * Sum of all entries (1 within PROBABILITY_SUM_TOLERANCE)
     */
    totalMass(): number {
        let total = 0;
        for (const p of this.probabilities) {
            total += p;
        }
        return total;
    }

    /**
     * Profiles with positive probability, in flat-index order
     */
    support(): SupportEntry[] {
        const entries: SupportEntry[] = [];
        this.probabilities.forEach((probability, index) => {
            if (probability > 0) {
                entries.push({ profile: this.game.profileAt(index), probability });
            }
        });
        return entries;
    }

    /**
     * Expected payoff of every player
     */
    expectedPayoffs(): number[] {
        const expected = new Array<number>(this.game.numPlayers).fill(0);
        this.probabilities.forEach((probability, index) => {
            if (probability === 0) return;
            for (let player = 0; player < this.game.numPlayers; player++) {
                expected[player] += probability * this.game.payoffAtIndex(player, index);
            }
        });
        return expected;
    }

    /**
     * Expected social welfare: sum over profiles of x(p) * sum_i u_i(p)
     */
    expectedWelfare(): number {
        let welfare = 0;
        this.probabilities.forEach((probability, index) => {
            if (probability > 0) {
                welfare += probability * this.game.welfareAtIndex(index);
            }
        });
        return welfare;
    }

    // ==================== Incentive Constraints ====================

    /**
     * Signed slack of every incentive constraint
     */
    incentiveSlacks(): readonly Readonly<IncentiveSlack>[] {
        if (this.slackCache === null) {
            this.slackCache = Object.freeze(
                computeIncentiveSlacks(this.game, this.probabilities).map(s => Object.freeze(s))
            );
        }
        return this.slackCache;
    }

    /**
     * Constraints violated by more than `tolerance`
     */
    violations(tolerance: number = DEFAULT_VIOLATION_TOLERANCE): IncentiveViolation[] {
        checkTolerance(tolerance);
        return this.incentiveSlacks()
            .filter(s => s.slack < -tolerance)
            .map(({ player, action, deviation, slack }) => ({ player, action, deviation, magnitude: -slack }));
    }

    /**
     * Largest violation magnitude, 0 when every slack is non-negative
     */
    maxViolation(): number {
        return this.incentiveSlacks().reduce((max, s) => Math.max(max, -s.slack), 0);
    }

    isCorrelatedEquilibrium(tolerance: number = DEFAULT_VIOLATION_TOLERANCE): boolean {
        return this.violations(tolerance).length === 0;
    }

    /**
     * Incentive constraints evaluated as soft `>= 0` constraint specs
     */
    constraintReport(tolerance: number = DEFAULT_VIOLATION_TOLERANCE): ConstraintReport {
        checkTolerance(tolerance);
        const specs: ConstraintSpec<Distribution>[] = this.incentiveSlacks().map(
            ({ player, action, deviation }, k) => lowerBound<Distribution>(
                `player${player}:${action}->${deviation}`,
                d => d.incentiveSlacks()[k].slack,
                0,
                {
                    severity: 'soft',
                    tolerance,
                    description: `player ${player} recommended ${action} gains nothing by playing ${deviation}`,
                }
            )
        );
        return evaluateConstraints(specs, this);
    }

    /**
     * n x n matrix of violation magnitudes for one player
     * (row = recommended action, column = deviation)
     */
    violationMatrix(player: number, tolerance: number = DEFAULT_VIOLATION_TOLERANCE): number[][] {
        if (!Number.isInteger(player) || player < 0 || player >= this.game.numPlayers) {
            throw new InvalidParameterError('player', `${player} is outside 0..${this.game.numPlayers - 1}`);
        }
        const n = this.game.actionCounts[player];
        const matrix = Array.from({ length: n }, () => new Array<number>(n).fill(0));
        for (const v of this.violations(tolerance)) {
            if (v.player === player) {
                matrix[v.action][v.deviation] = v.magnitude;
            }
        }
        return matrix;
    }

    // ==================== Rendering ====================

    /**
     * Probabilities in flat-index order
     */
    toArray(): number[] {
        return Array.from(this.probabilities);
    }

    /**
     * Supported profiles keyed "a0,a1,..."
     */
    toRecord(): Record<string, number> {
        const record: Record<string, number> = {};
        for (const { profile, probability } of this.support()) {
            record[profileKey(profile)] = probability;
        }
        return record;
    }

    toJSON(): DistributionSnapshot {
        return {
            actionCounts: [...this.game.actionCounts],
            probabilities: this.toRecord(),
        };
    }
}

function checkTolerance(tolerance: number): void {
    if (!Number.isFinite(tolerance) || tolerance < 0) {
        throw new InvalidParameterError('tolerance', `must be a finite number >= 0, got ${tolerance}`);
    }
}
