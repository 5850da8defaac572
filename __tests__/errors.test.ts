/**
 * Error Module Tests
 */

import { describe, it, expect } from 'vitest';
import {
    ErrorCodes,
    RLBridgeError,
    TypeIncompatibilityError,
    UnboundedConversionError,
    ShapeMismatchError,
    InvalidActionError,
    InsufficientDataError,
    IncompatibleRestoreError,
    RegistryError,
    ProtocolError,
    SequenceError,
    isRLBridgeError,
    hasErrorCode,
    isRecoverable,
    wrapError,
} from '../src/core/errors';

describe('Error classes', () => {
    it('UnboundedConversionError is a TypeIncompatibilityError with its own code', () => {
        const error = new UnboundedConversionError(2, -Infinity, 1);
        expect(error).toBeInstanceOf(TypeIncompatibilityError);
        expect(error).toBeInstanceOf(RLBridgeError);
        expect(error.code).toBe(ErrorCodes.UNBOUNDED_CONVERSION);
        expect(error.dimension).toBe(2);
        expect(error.message).toBe('Cannot discretize unbounded dimension 2 (low=-Infinity, high=1)');
        expect(error.name).toBe('UnboundedConversionError');
    });

    it('ShapeMismatchError reports expected and actual sizes', () => {
        const error = new ShapeMismatchError(4, 3, 'Box([4])');
        expect(error.expected).toBe(4);
        expect(error.actual).toBe(3);
        expect(error.message).toBe('Shape mismatch for Box([4]): expected 4 elements, got 3');
    });

    it('InsufficientDataError carries counts', () => {
        const error = new InsufficientDataError(2, 4);
        expect(error.available).toBe(2);
        expect(error.required).toBe(4);
        expect(error.message).toBe('Insufficient data for training: 2 of 4 samples available');
    });

    it('RegistryError formats both codes', () => {
        expect(new RegistryError(ErrorCodes.NOT_REGISTERED, 'Environment', 'Maze').message)
            .toBe("Environment 'Maze' is not registered");
        expect(new RegistryError(ErrorCodes.ALREADY_REGISTERED, 'Algorithm', 'ql').message)
            .toBe("Algorithm 'ql' is already registered");
    });

    it('marks runtime errors recoverable and construction errors fatal', () => {
        expect(new InvalidActionError('bad', 0).recoverable).toBe(true);
        expect(new InsufficientDataError(0, 1).recoverable).toBe(true);
        expect(new ProtocolError('bad').recoverable).toBe(true);
        expect(new TypeIncompatibilityError('bad').recoverable).toBe(false);
        expect(new IncompatibleRestoreError('bad').recoverable).toBe(false);
        expect(new SequenceError('bad').recoverable).toBe(false);
    });

    it('serializes to JSON', () => {
        const error = new InvalidActionError('Action 7 is currently invalid', 1, { action: 7 });
        const json = error.toJSON();
        expect(json.name).toBe('InvalidActionError');
        expect(json.code).toBe('INVALID_ACTION');
        expect(json.details).toEqual({ action: 7 });
        expect(json.recoverable).toBe(true);
        expect(error.playerIndex).toBe(1);
    });
});

describe('Error utilities', () => {
    it('identifies framework errors by code', () => {
        const error = new ProtocolError('bad');
        expect(isRLBridgeError(error)).toBe(true);
        expect(isRLBridgeError(new Error('plain'))).toBe(false);
        expect(hasErrorCode(error, ErrorCodes.PROTOCOL_ERROR)).toBe(true);
        expect(hasErrorCode(error, ErrorCodes.INVALID_ACTION)).toBe(false);
        expect(isRecoverable(error)).toBe(true);
        expect(isRecoverable(new Error('plain'))).toBe(false);
    });

    it('wraps foreign errors', () => {
        const original = new ProtocolError('kept');
        expect(wrapError(original)).toBe(original);

        const wrapped = wrapError(new TypeError('boom'));
        expect(wrapped.code).toBe(ErrorCodes.INTERNAL_ERROR);
        expect(wrapped.message).toBe('boom');

        const fromString = wrapError('text', ErrorCodes.VALIDATION_ERROR);
        expect(fromString.code).toBe(ErrorCodes.VALIDATION_ERROR);
        expect(fromString.message).toBe('text');
    });
});
