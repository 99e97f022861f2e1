/**
 * @module cli/run
 * @description Argument parsing and the solve pipeline behind the command line
 */

import { InvalidParameterError } from '../core/errors';
import type { Logger } from '../core/logging';
import {
    LinearProgrammingSolver,
    SwapRegretSolver,
    type EquilibriumDiagnostics,
    type EquilibriumSolver,
} from '../equilibrium';
import { Game, type GameType } from '../game';

// ==================== Argument Parsing ====================

export type CliGameKind = 'random' | 'chicken' | 'congestion';

export interface CliArgs {
    players: number;
    actions: number;
    seed: number;
    rounds: number;
    epsilon: number;
    game: CliGameKind;
    verbose: boolean;
    help: boolean;
}

export const DEFAULT_CLI_ARGS: CliArgs = {
    players: 2,
    actions: 3,
    seed: 42,
    rounds: 10000,
    epsilon: 0.1,
    game: 'random',
    verbose: false,
    help: false,
};

const GAME_KINDS: readonly CliGameKind[] = ['random', 'chicken', 'congestion'];

/**
 * Parse command-line flags (without the node and script entries)
 * @throws InvalidParameterError on an unknown flag or a malformed value
 */
export function parseArgs(argv: readonly string[]): CliArgs {
    const args: CliArgs = { ...DEFAULT_CLI_ARGS };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        const value = (): string => {
            const next = argv[++i];
            if (next === undefined) {
                throw new InvalidParameterError(arg, 'missing value');
            }
            return next;
        };

        if (arg === '--help' || arg === '-h') {
            args.help = true;
        } else if (arg === '--verbose' || arg === '-v') {
            args.verbose = true;
        } else if (arg === '--players' || arg === '-p') {
            args.players = parseInteger(arg, value());
        } else if (arg === '--actions' || arg === '-a') {
            args.actions = parseInteger(arg, value());
        } else if (arg === '--seed' || arg === '-s') {
            args.seed = parseInteger(arg, value());
        } else if (arg === '--rounds' || arg === '-t') {
            args.rounds = parseInteger(arg, value());
        } else if (arg === '--epsilon' || arg === '-e') {
            args.epsilon = parseNumber(arg, value());
        } else if (arg === '--game' || arg === '-g') {
            args.game = parseGameKind(value());
        } else {
            throw new InvalidParameterError('argument', `unknown flag ${arg}`);
        }
    }

    return args;
}

function parseInteger(flag: string, raw: string): number {
    const value = Number(raw);
    if (raw.trim() === '' || !Number.isInteger(value)) {
        throw new InvalidParameterError(flag, `expected an integer, got "${raw}"`);
    }
    return value;
}

function parseNumber(flag: string, raw: string): number {
    const value = Number(raw);
    if (raw.trim() === '' || !Number.isFinite(value)) {
        throw new InvalidParameterError(flag, `expected a number, got "${raw}"`);
    }
    return value;
}

function parseGameKind(raw: string): CliGameKind {
    const kind = GAME_KINDS.find(k => k === raw);
    if (kind === undefined) {
        throw new InvalidParameterError('--game', `expected one of ${GAME_KINDS.join(', ')}, got "${raw}"`);
    }
    return kind;
}

// ==================== Pipeline ====================

/**
 * Game described by the arguments. Chicken is always 2 x 2.
 */
export function buildGame(args: CliArgs): Game {
    if (args.game === 'chicken') {
        return new Game(2, [2, 2], { kind: 'chicken' });
    }
    const type: GameType = args.game === 'random'
        ? { kind: 'random', seed: args.seed }
        : { kind: 'congestion' };
    return new Game(args.players, new Array<number>(args.players).fill(args.actions), type);
}

/**
 * One line of the final summary table
 */
export interface SolverSummary {
    solver: string;
    expectedWelfare: number;
    maxViolation: number;
    numViolations: number;
    runtimeMs: number;
}

/**
 * Run LP, LP (max welfare) and swap regret on `game`
 */
export function runSolvers(game: Game, args: CliArgs, logger: Logger): SolverSummary[] {
    const solvers: EquilibriumSolver<EquilibriumDiagnostics>[] = [
        new LinearProgrammingSolver(game, { logger }),
        new LinearProgrammingSolver(game, { maximizeWelfare: true, logger }),
        new SwapRegretSolver(game, {
            epsilon: args.epsilon,
            numRounds: args.rounds,
            seed: args.seed,
            logger,
        }),
    ];

    const summaries = solvers.map(solver => {
        const { diagnostics } = solver.solve();
        return {
            solver: solver.name,
            expectedWelfare: diagnostics.expectedWelfare,
            maxViolation: diagnostics.maxViolation,
            numViolations: diagnostics.violations.length,
            runtimeMs: diagnostics.runtimeMs,
        };
    });
    logger.flush();
    return summaries;
}

/**
 * Fixed-width summary table
 */
export function formatSummary(summaries: readonly SolverSummary[]): string {
    const header = `${'Solver'.padEnd(18)}${'Welfare'.padStart(12)}${'MaxViolation'.padStart(14)}${'Runtime'.padStart(12)}`;
    const rows = summaries.map(s =>
        `${s.solver.padEnd(18)}` +
        `${s.expectedWelfare.toFixed(4).padStart(12)}` +
        `${s.maxViolation.toExponential(2).padStart(14)}` +
        `${`${s.runtimeMs.toFixed(1)}ms`.padStart(12)}`
    );
    return [header, ...rows].join('\n');
}
