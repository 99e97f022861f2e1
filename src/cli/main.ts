#!/usr/bin/env npx tsx
/**
 * @module cli/main
 * @description Command-line interface: solve one game with every solver
 *
 * Usage:
 *   npx tsx src/cli/main.ts
 *   npx tsx src/cli/main.ts --players 3 --actions 2 --seed 7
 *   npm run solve -- --game chicken
 */

import { isCorreqError } from '../core/errors';
import { ConsoleLogger } from '../core/logging';
import { buildGame, formatSummary, parseArgs, runSolvers } from './run';

function printHelp(): void {
    console.log(`
correq - correlated equilibria of normal-form games

Usage:
  npx tsx src/cli/main.ts [options]

Options:
  -h, --help          Show this help message
  -p, --players N     Number of players (default: 2)
  -a, --actions M     Actions per player (default: 3)
  -s, --seed S        Seed of the payoffs and the learners (default: 42)
  -t, --rounds T      Swap-regret rounds (default: 10000)
  -e, --epsilon E     Swap-regret learning rate (default: 0.1)
  -g, --game KIND     random | chicken | congestion (default: random; chicken is always 2x2)
  -v, --verbose       Also print swap-regret checkpoints
`);
}

function main(): void {
    try {
        const args = parseArgs(process.argv.slice(2));
        if (args.help) {
            printHelp();
            return;
        }

        const game = buildGame(args);
        console.log(game.describe());
        console.log('');

        const logger = new ConsoleLogger(args.verbose ? 'debug' : 'info');
        const summaries = runSolvers(game, args, logger);
        logger.close();

        console.log('');
        console.log(formatSummary(summaries));
    } catch (error) {
        const code = isCorreqError(error) ? error.code : 'INTERNAL_ERROR';
        console.error(`[FAILED] ${code}: ${error instanceof Error ? error.message : String(error)}`);
        process.exitCode = 1;
    }
}

main();
