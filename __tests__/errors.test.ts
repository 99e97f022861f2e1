/**
 * Error Hierarchy Tests
 *
 * Coverage:
 * - Error codes and names of every subclass
 * - isCorreqError / hasErrorCode / wrapError
 * - JSON rendering
 */

import { describe, it, expect } from 'vitest';
import {
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
} from '../src/core';

describe('error classes', () => {
    it('should carry the code and name of each subclass', () => {
        const cases: [CorreqError, string, string][] = [
            [new InvalidGameError('bad shape'), ErrorCodes.INVALID_GAME, 'InvalidGameError'],
            [new InvalidParameterError('epsilon', 'must be > 0'), ErrorCodes.INVALID_PARAMETER, 'InvalidParameterError'],
            [new ProfileOutOfRangeError('too big'), ErrorCodes.OUT_OF_RANGE, 'ProfileOutOfRangeError'],
            [new InfeasibleError(), ErrorCodes.INFEASIBLE, 'InfeasibleError'],
            [new SolverFailureError('stalled'), ErrorCodes.SOLVER_FAILURE, 'SolverFailureError'],
        ];

        for (const [error, code, name] of cases) {
            expect(error).toBeInstanceOf(CorreqError);
            expect(error).toBeInstanceOf(Error);
            expect(error.code).toBe(code);
            expect(error.name).toBe(name);
        }
    });

    it('should prefix parameter errors with the parameter name', () => {
        const error = new InvalidParameterError('numRounds', 'must be a positive integer, got 0');
        expect(error.message).toBe('Invalid numRounds: must be a positive integer, got 0');
        expect(error.parameter).toBe('numRounds');
    });

    it('should default the infeasibility message', () => {
        expect(new InfeasibleError().message).toBe('Linear program is infeasible');
    });

    it('should serialize to JSON with details', () => {
        const error = new SolverFailureError('stalled', { iterations: 12 });
        const json = error.toJSON();
        expect(json.name).toBe('SolverFailureError');
        expect(json.code).toBe('SOLVER_FAILURE');
        expect(json.message).toBe('stalled');
        expect(json.details).toEqual({ iterations: 12 });
        expect(json.timestamp).toBe(error.timestamp);
    });
});

describe('error utilities', () => {
    it('isCorreqError should recognise library errors only', () => {
        expect(isCorreqError(new InvalidGameError('x'))).toBe(true);
        expect(isCorreqError(new Error('x'))).toBe(false);
        expect(isCorreqError('x')).toBe(false);
    });

    it('hasErrorCode should compare codes', () => {
        const error = new InfeasibleError();
        expect(hasErrorCode(error, ErrorCodes.INFEASIBLE)).toBe(true);
        expect(hasErrorCode(error, ErrorCodes.SOLVER_FAILURE)).toBe(false);
        expect(hasErrorCode(new Error('x'), ErrorCodes.INFEASIBLE)).toBe(false);
    });

    it('wrapError should pass library errors through unchanged', () => {
        const error = new InvalidGameError('x');
        expect(wrapError(error)).toBe(error);
    });

    it('wrapError should wrap foreign errors with the default code', () => {
        const wrapped = wrapError(new TypeError('boom'));
        expect(wrapped.code).toBe(ErrorCodes.INTERNAL_ERROR);
        expect(wrapped.message).toBe('boom');
        expect(wrapped.details).toMatchObject({ originalName: 'TypeError' });
    });

    it('wrapError should stringify non-errors', () => {
        const wrapped = wrapError(42, ErrorCodes.SOLVER_FAILURE);
        expect(wrapped.code).toBe(ErrorCodes.SOLVER_FAILURE);
        expect(wrapped.message).toBe('42');
    });
});
