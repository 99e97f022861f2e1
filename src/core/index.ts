/**
 * @module core
 * @description Shared infrastructure for games and solvers
 *
 * ## Modules
 * - `errors`: Coded error hierarchy
 * - `logging`: Solver logging (console, memory, fan-out)
 * - `repro`: Seeded RNG and configuration fingerprints
 * - `constraint`: Named lower-bound constraints and reports
 */

// ==================== Errors ====================

export {
    ErrorCodes,
    CorreqError,
    InvalidGameError,
    InvalidParameterError,
    ProfileOutOfRangeError,
    InfeasibleError,
    SolverFailureError,
    isCorreqError,
    hasErrorCode,
    wrapError,
} from './errors';

export type { ErrorCode } from './errors';

// ==================== Logging ====================

export type {
    LogLevel,
    BaseLogEntry,
    RoundLogEntry,
    SolveLogEntry,
    LogEntry,
    RoundLogInput,
    SolveLogInput,
    Logger,
    LoggerConfig,
} from './logging';

export {
    LOG_SCHEMA_VERSION,
    ConsoleLogger,
    MemoryLogger,
    MultiLogger,
    createLogger,
} from './logging';

// ==================== Repro ====================

export {
    LIBRARY_VERSION,
    computeConfigHash,
    SeededRandom,
    createRng,
    resolveSeed,
} from './repro';

// ==================== Constraint ====================

export type {
    ConstraintSeverity,
    ConstraintSpec,
    ConstraintResult,
    ConstraintReport,
    LowerBoundOptions,
} from './constraint';

export {
    DEFAULT_CONSTRAINT_TOLERANCE,
    lowerBound,
    evaluateConstraints,
} from './constraint';
