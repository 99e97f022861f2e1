/**
 * Logging Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
    ConsoleLogger,
    LOG_SCHEMA_VERSION,
    MemoryLogger,
    MultiLogger,
    createLogger,
    type RoundLogInput,
    type SolveLogInput,
} from '../src/core';

const ROUND: RoundLogInput = {
    solver: 'Swap Regret',
    seed: 3,
    round: 10,
    totalRounds: 100,
    maxSwapRegret: 0.25,
};

const SOLVE: SolveLogInput = {
    solver: 'LP',
    status: 'OPTIMAL',
    expectedWelfare: 1.5,
    maxViolation: 0.5,
    numViolations: 0,
    runtimeMs: 12.5,
    iterations: 4,
};

afterEach(() => {
    vi.restoreAllMocks();
});

describe('ConsoleLogger', () => {
    it('should print one summary line at info', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        const logger = new ConsoleLogger('info');
        logger.logRound(ROUND);
        logger.logSolve(SOLVE);
        expect(log).toHaveBeenCalledTimes(1);
        expect(log).toHaveBeenCalledWith(
            '[SOLVE] LP: status=OPTIMAL, welfare=1.5000, maxViolation=5.00e-1, violations=0, runtime=12.5ms'
        );
    });

    it('should print checkpoints at debug', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        new ConsoleLogger({ level: 'debug' }).logRound(ROUND);
        expect(log).toHaveBeenCalledWith('[ROUND] Swap Regret 10/100: maxSwapRegret=0.2500');
    });

    it('should stay silent at warn', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        const logger = new ConsoleLogger('warn');
        logger.logRound(ROUND);
        logger.logSolve(SOLVE);
        expect(log).not.toHaveBeenCalled();
    });
});

describe('MemoryLogger', () => {
    it('should stamp entries with type and schema version', () => {
        const logger = new MemoryLogger();
        logger.logRound(ROUND);
        logger.logSolve(SOLVE);
        expect(logger.rounds[0]).toMatchObject({ ...ROUND, logType: 'round', schemaVersion: LOG_SCHEMA_VERSION });
        expect(logger.solves[0]).toMatchObject({ ...SOLVE, logType: 'solve', schemaVersion: LOG_SCHEMA_VERSION });
        expect(typeof logger.solves[0].timestamp).toBe('number');
        expect(logger.getAllLogs().map(e => e.logType)).toEqual(['round', 'solve']);
    });

    it('should drop checkpoints when logRounds is off', () => {
        const logger = new MemoryLogger({ logRounds: false, schemaVersion: '0.9.0' });
        logger.logRound(ROUND);
        logger.logSolve(SOLVE);
        expect(logger.rounds).toHaveLength(0);
        expect(logger.solves[0].schemaVersion).toBe('0.9.0');
    });

    it('should export JSON and JSONL', () => {
        const logger = new MemoryLogger();
        logger.logRound(ROUND);
        logger.logSolve(SOLVE);
        const parsed: unknown = JSON.parse(logger.toJSON());
        expect(parsed).toMatchObject({ rounds: [{ round: 10 }], solves: [{ status: 'OPTIMAL' }] });
        const lines = logger.toJSONL().split('\n');
        expect(lines).toHaveLength(2);
        expect(JSON.parse(lines[1])).toMatchObject({ logType: 'solve', iterations: 4 });
    });

    it('should clear stored entries', () => {
        const logger = new MemoryLogger();
        logger.logSolve(SOLVE);
        logger.clear();
        expect(logger.getAllLogs()).toEqual([]);
    });
});

describe('MultiLogger', () => {
    it('should forward every call to each logger', () => {
        const a = new MemoryLogger();
        const b = new MemoryLogger();
        const multi = new MultiLogger([a, b]);
        multi.logRound(ROUND);
        multi.logSolve(SOLVE);
        multi.flush();
        multi.close();
        expect(a.getAllLogs()).toHaveLength(2);
        expect(b.getAllLogs()).toHaveLength(2);
    });
});

describe('createLogger', () => {
    it('should build loggers by format', () => {
        expect(createLogger('console')).toBeInstanceOf(ConsoleLogger);
        expect(createLogger('memory', { logRounds: false })).toBeInstanceOf(MemoryLogger);
    });
});
