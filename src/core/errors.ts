/**
 * @module core/errors
 * @description Unified error types and error codes for game construction and solving
 *
 * Every failure the library raises carries one of the codes below, so callers
 * can branch on `code` instead of on class identity or message text.
 */

// ==================== Error Codes ====================

/**
 * Standard error codes for the correq library
 */
export const ErrorCodes = {
    // Construction Errors
    /** Malformed action counts or payoff tensors */
    INVALID_GAME: 'INVALID_GAME',
    /** Solver or distribution parameter out of range */
    INVALID_PARAMETER: 'INVALID_PARAMETER',
    /** Player index or joint profile outside the game's action space */
    OUT_OF_RANGE: 'OUT_OF_RANGE',

    // Optimization Errors
    /** Infeasible problem (no valid solution exists) */
    INFEASIBLE: 'INFEASIBLE',
    /** Numerical backend did not converge or reported an unbounded program */
    SOLVER_FAILURE: 'SOLVER_FAILURE',

    /** Internal error */
    INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ==================== Error Classes ====================

/**
 * Base error class for correq
 */
export class CorreqError extends Error {
    readonly code: ErrorCode;
    readonly details?: unknown;
    readonly timestamp: number;

    constructor(code: ErrorCode, message: string, details?: unknown) {
        super(message);
        this.name = 'CorreqError';
        this.code = code;
        this.details = details;
        this.timestamp = Date.now();

        // Maintain proper stack trace in V8
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, CorreqError);
        }
    }

    /**
     * Convert to JSON-serializable object
     */
    toJSON(): {
        name: string;
        code: ErrorCode;
        message: string;
        details: unknown;
        timestamp: number;
    } {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            details: this.details,
            timestamp: this.timestamp,
        };
    }
}

/**
 * Malformed game: bad player count, action counts or payoff tensor shape.
 * Only ever thrown while a Game is being constructed.
 */
export class InvalidGameError extends CorreqError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.INVALID_GAME, message, details);
        this.name = 'InvalidGameError';
    }
}

/**
 * Out-of-range solver option or distribution input
 */
export class InvalidParameterError extends CorreqError {
    readonly parameter: string;

    constructor(parameter: string, message: string, details?: unknown) {
        super(ErrorCodes.INVALID_PARAMETER, `Invalid ${parameter}: ${message}`, details);
        this.name = 'InvalidParameterError';
        this.parameter = parameter;
    }
}

/**
 * Player or joint profile outside the action space
 */
export class ProfileOutOfRangeError extends CorreqError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.OUT_OF_RANGE, message, details);
        this.name = 'ProfileOutOfRangeError';
    }
}

/**
 * The LP backend found no feasible point.
 *
 * The correlated-equilibrium polytope is never empty, so this always points
 * at a defect in how the program was built.
 */
export class InfeasibleError extends CorreqError {
    constructor(message = 'Linear program is infeasible', details?: unknown) {
        super(ErrorCodes.INFEASIBLE, message, details);
        this.name = 'InfeasibleError';
    }
}

/**
 * The LP backend stopped without an optimal point
 */
export class SolverFailureError extends CorreqError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.SOLVER_FAILURE, message, details);
        this.name = 'SolverFailureError';
    }
}

// ==================== Error Utilities ====================

/**
 * Check if an error is a CorreqError
 */
export function isCorreqError(error: unknown): error is CorreqError {
    return error instanceof CorreqError;
}

/**
 * Check if an error has a specific error code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
    return isCorreqError(error) && error.code === code;
}

/**
 * Wrap any error into a CorreqError
 */
export function wrapError(error: unknown, defaultCode: ErrorCode = ErrorCodes.INTERNAL_ERROR): CorreqError {
    if (isCorreqError(error)) {
        return error;
    }

    if (error instanceof Error) {
        return new CorreqError(defaultCode, error.message, {
            originalName: error.name,
            originalStack: error.stack,
        });
    }

    return new CorreqError(defaultCode, String(error));
}
