/**
 * Incentive Constraint and Distribution Tests
 *
 * Coverage:
 * - Incentive constraint enumeration and coefficients
 * - Distribution validation, queries and rendering
 * - Slacks, violations, violation matrices and constraint reports
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
    Distribution,
    computeIncentiveSlacks,
    countIncentiveConstraints,
    incentiveCoefficients,
    incentiveConstraintKeys,
} from '../src/equilibrium';
import { Game } from '../src/game';
import { InvalidParameterError, ProfileOutOfRangeError } from '../src/core';
import { dot } from '../src/models/numeric/math';
import { constantGame, matchingPennies, prisonersDilemma, smallGameArbitrary } from './test-utils';

// ==================== Incentive Constraints ====================

describe('incentive constraints', () => {
    it('should enumerate sum n_i (n_i - 1) keys in player, action, deviation order', () => {
        const game = new Game(3, [2, 3, 4], { kind: 'random', seed: 1 });
        const keys = incentiveConstraintKeys(game);
        expect(countIncentiveConstraints(game)).toBe(20);
        expect(keys).toHaveLength(20);
        expect(keys[0]).toEqual({ player: 0, action: 0, deviation: 1 });
        expect(keys[2]).toEqual({ player: 1, action: 0, deviation: 1 });
        expect(keys[19]).toEqual({ player: 2, action: 3, deviation: 2 });
    });

    it('should skip players with a single action', () => {
        const game = new Game(2, [1, 2], { kind: 'random', seed: 1 });
        expect(incentiveConstraintKeys(game)).toEqual([
            { player: 1, action: 0, deviation: 1 },
            { player: 1, action: 1, deviation: 0 },
        ]);
    });

    it('should compute the coefficients of a 2 x 2 game by hand', () => {
        const game = prisonersDilemma();
        expect(incentiveCoefficients(game, { player: 0, action: 0, deviation: 1 })).toEqual([-2, -1, 0, 0]);
        expect(incentiveCoefficients(game, { player: 0, action: 1, deviation: 0 })).toEqual([0, 0, 2, 1]);
        expect(incentiveCoefficients(game, { player: 1, action: 0, deviation: 1 })).toEqual([-2, 0, -1, 0]);
        expect(incentiveCoefficients(game, { player: 1, action: 1, deviation: 0 })).toEqual([0, 2, 0, 1]);
    });

    it('slacks should equal coefficient rows times probabilities', () => {
        fc.assert(fc.property(
            smallGameArbitrary.chain(game => fc.tuple(
                fc.constant(game),
                fc.array(fc.double({ min: 0, max: 1, noNaN: true }), {
                    minLength: game.jointActionCount,
                    maxLength: game.jointActionCount,
                })
            )),
            ([game, weights]) => {
                const slacks = computeIncentiveSlacks(game, weights);
                const keys = incentiveConstraintKeys(game);
                return slacks.length === keys.length && keys.every((key, k) =>
                    Math.abs(slacks[k].slack - dot(incentiveCoefficients(game, key), weights)) <= 1e-9
                );
            }
        ), { numRuns: 50 });
    });
});

// ==================== Distribution ====================

describe('Distribution construction', () => {
    const game = prisonersDilemma();

    it('should reject the wrong number of entries', () => {
        expect(() => new Distribution(game, [0.5, 0.5])).toThrow(InvalidParameterError);
    });

    it('should reject non-finite and negative entries', () => {
        expect(() => new Distribution(game, [NaN, 0.5, 0.5, 0])).toThrow(/not finite/);
        expect(() => new Distribution(game, [-0.1, 0.6, 0.5, 0])).toThrow(/negative/);
    });

    it('should reject a total mass away from 1', () => {
        expect(() => new Distribution(game, [0.3, 0.3, 0.3, 0])).toThrow(/sum to/);
    });

    it('should clip numerical noise below zero', () => {
        const distribution = new Distribution(game, [0.5, 0.5, -1e-10, 0]);
        expect(distribution.probabilityAt(2)).toBe(0);
    });

    it('should build empirical distributions from counts', () => {
        const distribution = Distribution.fromCounts(game, [1, 0, 0, 3]);
        expect(distribution.toArray()).toEqual([0.25, 0, 0, 0.75]);
        expect(() => Distribution.fromCounts(game, [0, 0, 0, 0])).toThrow(InvalidParameterError);
        expect(() => Distribution.fromCounts(game, [-1, 1, 1, 1])).toThrow(InvalidParameterError);
    });

    it('should round-trip through records', () => {
        const distribution = Distribution.fromRecord(game, { '1,1': 0.5, '0,1': 0.5 });
        expect(distribution.toRecord()).toEqual({ '0,1': 0.5, '1,1': 0.5 });
        expect(() => Distribution.fromRecord(game, { '2,0': 1 })).toThrow(ProfileOutOfRangeError);
    });
});

describe('Distribution queries', () => {
    const game = prisonersDilemma();
    const pointMass = new Distribution(game, [0, 0, 0, 1]);
    const uniform = new Distribution(game, [0.25, 0.25, 0.25, 0.25]);

    it('should answer probability queries', () => {
        expect(pointMass.probability([1, 1])).toBe(1);
        expect(pointMass.probability([0, 1])).toBe(0);
        expect(pointMass.totalMass()).toBe(1);
        expect(() => pointMass.probability([0, 2])).toThrow(ProfileOutOfRangeError);
    });

    it('should list the support', () => {
        expect(pointMass.support()).toEqual([{ profile: [1, 1], probability: 1 }]);
        expect(uniform.support()).toHaveLength(4);
    });

    it('should compute expected payoffs and welfare', () => {
        expect(uniform.expectedPayoffs()).toEqual([2.25, 2.25]);
        expect(uniform.expectedWelfare()).toBe(4.5);
        expect(pointMass.expectedWelfare()).toBe(2);
    });

    it('should recognise the dominant-strategy equilibrium', () => {
        expect(pointMass.incentiveSlacks().map(s => s.slack)).toEqual([0, 1, 0, 1]);
        expect(pointMass.violations()).toEqual([]);
        expect(pointMass.maxViolation()).toBe(0);
        expect(pointMass.isCorrelatedEquilibrium()).toBe(true);
    });

    it('should share read-only slack entries', () => {
        const slacks = pointMass.incentiveSlacks();
        expect(Object.isFrozen(slacks)).toBe(true);
        expect(slacks.every(s => Object.isFrozen(s))).toBe(true);
        expect(pointMass.incentiveSlacks()).toBe(slacks);
    });

    it('should report the violations of the uniform distribution', () => {
        expect(uniform.violations()).toEqual([
            { player: 0, action: 0, deviation: 1, magnitude: 0.75 },
            { player: 1, action: 0, deviation: 1, magnitude: 0.75 },
        ]);
        expect(uniform.maxViolation()).toBe(0.75);
        expect(uniform.isCorrelatedEquilibrium()).toBe(false);
        expect(uniform.isCorrelatedEquilibrium(1)).toBe(true);
    });

    it('should lay violations out per player', () => {
        expect(uniform.violationMatrix(0)).toEqual([[0, 0.75], [0, 0]]);
        expect(uniform.violationMatrix(1, 0.8)).toEqual([[0, 0], [0, 0]]);
        expect(() => uniform.violationMatrix(2)).toThrow(InvalidParameterError);
    });

    it('should reject negative tolerances', () => {
        expect(() => uniform.violations(-1)).toThrow(InvalidParameterError);
    });

    it('should evaluate incentive constraints as soft constraint specs', () => {
        const report = uniform.constraintReport();
        expect(report.results).toHaveLength(4);
        expect(report.feasible).toBe(true);
        expect(report.maxViolation).toBe(0.75);
        expect(report.violations.map(v => v.id)).toEqual(['player0:0->1', 'player1:0->1']);
    });

    it('should serialize the support', () => {
        expect(pointMass.toJSON()).toEqual({ actionCounts: [2, 2], probabilities: { '1,1': 1 } });
    });
});

describe('equilibrium recognition', () => {
    it('uniform play of matching pennies is a correlated equilibrium', () => {
        const uniform = new Distribution(matchingPennies(), [0.25, 0.25, 0.25, 0.25]);
        expect(uniform.incentiveSlacks().every(s => s.slack === 0)).toBe(true);
        expect(uniform.isCorrelatedEquilibrium(0)).toBe(true);
    });

    it('every distribution of a constant game is a correlated equilibrium', () => {
        const game = constantGame([2, 3]);
        const distribution = Distribution.fromCounts(game, [1, 2, 3, 4, 5, 6]);
        expect(distribution.maxViolation()).toBe(0);
    });
});
