/**
 * Command-Line Pipeline Tests
 */

import { describe, it, expect } from 'vitest';
import {
    DEFAULT_CLI_ARGS,
    buildGame,
    formatSummary,
    parseArgs,
    runSolvers,
} from '../src/cli/run';
import { InvalidParameterError, MemoryLogger } from '../src/core';

describe('parseArgs', () => {
    it('should return the defaults for no flags', () => {
        expect(parseArgs([])).toEqual(DEFAULT_CLI_ARGS);
    });

    it('should read long and short flags', () => {
        expect(parseArgs(['--players', '3', '-a', '2', '-s', '7', '-t', '500', '-e', '0.05', '-g', 'congestion', '-v']))
            .toEqual({
                players: 3,
                actions: 2,
                seed: 7,
                rounds: 500,
                epsilon: 0.05,
                game: 'congestion',
                verbose: true,
                help: false,
            });
        expect(parseArgs(['-h']).help).toBe(true);
    });

    it('should reject an unknown flag', () => {
        expect(() => parseArgs(['--bogus'])).toThrow('Invalid argument: unknown flag --bogus');
    });

    it('should reject a flag without its value', () => {
        expect(() => parseArgs(['--seed'])).toThrow('Invalid --seed: missing value');
    });

    it('should reject malformed numbers', () => {
        expect(() => parseArgs(['--players', 'two'])).toThrow('Invalid --players: expected an integer, got "two"');
        expect(() => parseArgs(['--rounds', '1.5'])).toThrow(InvalidParameterError);
        expect(() => parseArgs(['--epsilon', 'abc'])).toThrow('Invalid --epsilon: expected a number, got "abc"');
    });

    it('should reject an unknown game kind', () => {
        expect(() => parseArgs(['--game', 'poker'])).toThrow(
            'Invalid --game: expected one of random, chicken, congestion, got "poker"'
        );
    });
});

describe('buildGame', () => {
    it('should build a seeded random game', () => {
        const args = { ...DEFAULT_CLI_ARGS, players: 3, actions: 2, seed: 5 };
        const game = buildGame(args);
        expect(game.actionCounts).toEqual([2, 2, 2]);
        expect(buildGame(args).payoff(1, [0, 1, 1])).toBe(game.payoff(1, [0, 1, 1]));
    });

    it('should always build chicken as 2 x 2', () => {
        const game = buildGame({ ...DEFAULT_CLI_ARGS, game: 'chicken', players: 4, actions: 5 });
        expect(game.numPlayers).toBe(2);
        expect(game.actionCounts).toEqual([2, 2]);
    });

    it('should give every congestion player the same action count', () => {
        const game = buildGame({ ...DEFAULT_CLI_ARGS, game: 'congestion', players: 3, actions: 2 });
        expect(game.actionCounts).toEqual([2, 2, 2]);
    });

    it('should surface invalid sizes as game errors', () => {
        expect(() => buildGame({ ...DEFAULT_CLI_ARGS, players: 1 })).toThrow();
    });
});

describe('runSolvers', () => {
    it('should run the three solvers in order and log one summary each', () => {
        const args = { ...DEFAULT_CLI_ARGS, actions: 2, rounds: 300, seed: 9 };
        const logger = new MemoryLogger();
        const summaries = runSolvers(buildGame(args), args, logger);

        expect(summaries.map(s => s.solver)).toEqual(['LP', 'LP (max welfare)', 'Swap Regret']);
        expect(logger.solves.map(e => e.solver)).toEqual(['LP', 'LP (max welfare)', 'Swap Regret']);
        expect(logger.solves[2].seed).toBe(9);
        expect(summaries[0].numViolations).toBe(0);
        expect(summaries[1].numViolations).toBe(0);
        expect(summaries[1].expectedWelfare).toBeGreaterThanOrEqual(summaries[0].expectedWelfare - 1e-9);
    });
});

describe('formatSummary', () => {
    it('should render a fixed-width table', () => {
        const table = formatSummary([
            { solver: 'LP', expectedWelfare: 1.5, maxViolation: 0, numViolations: 0, runtimeMs: 2.25 },
            { solver: 'Swap Regret', expectedWelfare: -3, maxViolation: 0.0123, numViolations: 1, runtimeMs: 40 },
        ]);
        expect(table.split('\n')).toEqual([
            'Solver' + ' '.repeat(12) + ' '.repeat(5) + 'Welfare' + ' '.repeat(2) + 'MaxViolation' + ' '.repeat(5) + 'Runtime',
            'LP' + ' '.repeat(16) + ' '.repeat(6) + '1.5000' + ' '.repeat(7) + '0.00e+0' + ' '.repeat(7) + '2.3ms',
            'Swap Regret' + ' '.repeat(7) + ' '.repeat(5) + '-3.0000' + ' '.repeat(7) + '1.23e-2' + ' '.repeat(6) + '40.0ms',
        ]);
    });
});
