/**
 * @module core/logging
 * @description Structured logging for solver runs
 *
 * Two entry kinds with a fixed, versioned field schema:
 * - `round`: swap-regret checkpoint (round number, regret so far)
 * - `solve`: one summary per finished solve
 *
 * ConsoleLogger and MemoryLogger work in browser and Node.js alike.
 */

// ==================== Types ====================

/**
 * Log level for console output
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Base log entry structure (all logs must include these fields)
 */
export interface BaseLogEntry {
    /** Schema version for compatibility */
    schemaVersion: string;
    /** Solver name, e.g. "LP" or "Swap Regret" */
    solver: string;
    /** Random seed of the run; absent for deterministic solvers */
    seed?: number;
    /** Timestamp in milliseconds */
    timestamp: number;
}

/**
 * Swap-regret convergence checkpoint
 */
export interface RoundLogEntry extends BaseLogEntry {
    logType: 'round';
    round: number;
    totalRounds: number;
    maxSwapRegret: number;
}

/**
 * Summary of a finished solve
 */
export interface SolveLogEntry extends BaseLogEntry {
    logType: 'solve';
    status: string;
    expectedWelfare: number;
    maxViolation: number;
    numViolations: number;
    runtimeMs: number;
    /** Simplex pivots (LP) or rounds played (swap regret) */
    iterations: number;
}

/**
 * Union of all log entry types
 */
export type LogEntry = RoundLogEntry | SolveLogEntry;

export type RoundLogInput = Omit<RoundLogEntry, 'logType' | 'schemaVersion' | 'timestamp'>;
export type SolveLogInput = Omit<SolveLogEntry, 'logType' | 'schemaVersion' | 'timestamp'>;

/**
 * Logger interface
 */
export interface Logger {
    /** Log a convergence checkpoint */
    logRound(entry: RoundLogInput): void;
    /** Log a solve summary */
    logSolve(entry: SolveLogInput): void;
    /** Flush pending writes */
    flush(): void;
    /** Close the logger */
    close(): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
    /** Minimum level printed by console loggers */
    level?: LogLevel;
    /** Schema version */
    schemaVersion?: string;
    /** Whether round checkpoints are kept (can be verbose) */
    logRounds?: boolean;
}

// ==================== Constants ====================

export const LOG_SCHEMA_VERSION = '1.0.0';

// ==================== Console Logger (Browser-compatible) ====================

/**
 * Console Logger: print one line per entry.
 *
 * Round checkpoints only at `debug`; summaries at `debug` and `info`.
 */
export class ConsoleLogger implements Logger {
    private level: LogLevel;

    constructor(levelOrConfig: LogLevel | LoggerConfig = 'info') {
        if (typeof levelOrConfig === 'string') {
            this.level = levelOrConfig;
        } else {
            this.level = levelOrConfig.level ?? 'info';
        }
    }

    logRound(entry: RoundLogInput): void {
        if (this.level === 'debug') {
            console.log(
                `[ROUND] ${entry.solver} ${entry.round}/${entry.totalRounds}: ` +
                `maxSwapRegret=${entry.maxSwapRegret.toFixed(4)}`
            );
        }
    }

    logSolve(entry: SolveLogInput): void {
        if (this.level === 'debug' || this.level === 'info') {
            console.log(
                `[SOLVE] ${entry.solver}: status=${entry.status}, ` +
                `welfare=${entry.expectedWelfare.toFixed(4)}, ` +
                `maxViolation=${entry.maxViolation.toExponential(2)}, ` +
                `violations=${entry.numViolations}, ` +
                `runtime=${entry.runtimeMs.toFixed(1)}ms`
            );
        }
    }

    flush(): void { /* no-op */ }
    close(): void { /* no-op */ }
}

// ==================== Memory Logger (Browser-compatible) ====================

/**
 * Memory Logger: Store logs in memory.
 * Useful for testing and for callers that serialize results themselves.
 */
export class MemoryLogger implements Logger {
    private schemaVersion: string;
    private logRounds: boolean;
    public rounds: RoundLogEntry[] = [];
    public solves: SolveLogEntry[] = [];

    constructor(config: LoggerConfig = {}) {
        this.schemaVersion = config.schemaVersion ?? LOG_SCHEMA_VERSION;
        this.logRounds = config.logRounds ?? true;
    }

    logRound(entry: RoundLogInput): void {
        if (!this.logRounds) return;
        this.rounds.push({
            schemaVersion: this.schemaVersion,
            timestamp: Date.now(),
            logType: 'round',
            ...entry,
        });
    }

    logSolve(entry: SolveLogInput): void {
        this.solves.push({
            schemaVersion: this.schemaVersion,
            timestamp: Date.now(),
            logType: 'solve',
            ...entry,
        });
    }

    /** Get all logs */
    getAllLogs(): LogEntry[] {
        return [...this.rounds, ...this.solves];
    }

    /** Export to JSON string */
    toJSON(): string {
        return JSON.stringify({
            rounds: this.rounds,
            solves: this.solves,
        }, null, 2);
    }

    /** Export to JSONL string */
    toJSONL(): string {
        return this.getAllLogs().map(entry => JSON.stringify(entry)).join('\n');
    }

    clear(): void {
        this.rounds = [];
        this.solves = [];
    }

    flush(): void { /* no-op for memory logger */ }
    close(): void { /* no-op for memory logger */ }
}

// ==================== Multi-Logger (Browser-compatible) ====================

/**
 * Multi-Logger: Write to multiple loggers simultaneously
 */
export class MultiLogger implements Logger {
    private loggers: Logger[];

    constructor(loggers: Logger[]) {
        this.loggers = loggers;
    }

    logRound(entry: RoundLogInput): void {
        for (const logger of this.loggers) {
            logger.logRound(entry);
        }
    }

    logSolve(entry: SolveLogInput): void {
        for (const logger of this.loggers) {
            logger.logSolve(entry);
        }
    }

    flush(): void {
        for (const logger of this.loggers) {
            logger.flush();
        }
    }

    close(): void {
        for (const logger of this.loggers) {
            logger.close();
        }
    }
}

// ==================== Factory Functions ====================

/**
 * Create a logger by format
 */
export function createLogger(
    format: 'console' | 'memory',
    config: LoggerConfig = {}
): Logger {
    switch (format) {
        case 'console':
            return new ConsoleLogger(config);
        case 'memory':
            return new MemoryLogger(config);
    }
}
