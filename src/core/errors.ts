/**
 * @module core/errors
 * @description Error types and error codes shared by every layer of the framework
 *
 * Errors fall into two groups. Construction-time errors (type incompatibility,
 * invalid configuration) are fatal for the component being built. Runtime errors
 * (invalid action, insufficient data, malformed sync message) are recoverable:
 * the caller may retry or skip and the component stays usable.
 */

// ==================== Error Codes ====================

/**
 * Standard error codes
 */
export const ErrorCodes = {
    // Type & Conversion Errors
    /** Environment and algorithm representations cannot be reconciled */
    TYPE_INCOMPATIBLE: 'TYPE_INCOMPATIBLE',
    /** Continuous → discrete conversion requested on an unbounded dimension */
    UNBOUNDED_CONVERSION: 'UNBOUNDED_CONVERSION',
    /** Vector length does not match the space size */
    SHAPE_MISMATCH: 'SHAPE_MISMATCH',

    // Validation Errors
    /** Generic validation failure */
    VALIDATION_ERROR: 'VALIDATION_ERROR',
    /** Action out of space, not the acting player's turn, or listed as invalid */
    INVALID_ACTION: 'INVALID_ACTION',

    // Checkpoint Errors
    /** Blob type, version, context or integrity mismatch on restore */
    INCOMPATIBLE_RESTORE: 'INCOMPATIBLE_RESTORE',

    // Training Errors
    /** Not enough samples in memory for a training step */
    INSUFFICIENT_DATA: 'INSUFFICIENT_DATA',

    // Lifecycle Errors
    /** step() called before reset() */
    NOT_INITIALIZED: 'NOT_INITIALIZED',
    /** step() called after the episode ended */
    EPISODE_TERMINATED: 'EPISODE_TERMINATED',
    /** Worker hooks invoked out of order */
    SEQUENCE_VIOLATION: 'SEQUENCE_VIOLATION',

    // Registry Errors
    /** Environment or algorithm id not registered */
    NOT_REGISTERED: 'NOT_REGISTERED',
    /** Id registered twice */
    ALREADY_REGISTERED: 'ALREADY_REGISTERED',

    // Transport Errors
    /** Malformed or out-of-protocol sync message */
    PROTOCOL_ERROR: 'PROTOCOL_ERROR',

    /** Internal framework error */
    INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

const RECOVERABLE_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
    ErrorCodes.INVALID_ACTION,
    ErrorCodes.INSUFFICIENT_DATA,
    ErrorCodes.PROTOCOL_ERROR,
]);

// ==================== Error Classes ====================

/**
 * Base error class for the framework
 */
export class RLBridgeError extends Error {
    readonly code: ErrorCode;
    readonly details?: unknown;
    readonly timestamp: number;

    constructor(code: ErrorCode, message: string, details?: unknown) {
        super(message);
        this.name = 'RLBridgeError';
        this.code = code;
        this.details = details;
        this.timestamp = Date.now();

        // Maintain proper stack trace in V8
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, new.target);
        }
    }

    /** Whether the caller may retry or skip and keep using the component */
    get recoverable(): boolean {
        return RECOVERABLE_CODES.has(this.code);
    }

    /**
     * Convert to JSON-serializable object
     */
    toJSON(): {
        name: string;
        code: ErrorCode;
        message: string;
        details: unknown;
        recoverable: boolean;
        timestamp: number;
    } {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            details: this.details,
            recoverable: this.recoverable,
            timestamp: this.timestamp,
        };
    }
}

/**
 * Environment and algorithm representations cannot be reconciled.
 * Raised when a worker or converter is constructed, never mid-episode.
 */
export class TypeIncompatibilityError extends RLBridgeError {
    constructor(message: string, details?: unknown, code: ErrorCode = ErrorCodes.TYPE_INCOMPATIBLE) {
        super(code, message, details);
        this.name = 'TypeIncompatibilityError';
    }
}

/**
 * Continuous → discrete conversion over a dimension with infinite bounds
 */
export class UnboundedConversionError extends TypeIncompatibilityError {
    readonly dimension: number;

    constructor(dimension: number, low: number, high: number) {
        super(
            `Cannot discretize unbounded dimension ${dimension} (low=${low}, high=${high})`,
            { dimension, low, high },
            ErrorCodes.UNBOUNDED_CONVERSION
        );
        this.name = 'UnboundedConversionError';
        this.dimension = dimension;
    }
}

/**
 * Vector length differs from the space's flat size
 */
export class ShapeMismatchError extends TypeIncompatibilityError {
    readonly expected: number;
    readonly actual: number;

    constructor(expected: number, actual: number, context = 'value') {
        super(
            `Shape mismatch for ${context}: expected ${expected} elements, got ${actual}`,
            { expected, actual, context },
            ErrorCodes.SHAPE_MISMATCH
        );
        this.name = 'ShapeMismatchError';
        this.expected = expected;
        this.actual = actual;
    }
}

/**
 * Action rejected by the environment run. State is left untouched.
 */
export class InvalidActionError extends RLBridgeError {
    readonly playerIndex: number;

    constructor(message: string, playerIndex: number, details?: unknown) {
        super(ErrorCodes.INVALID_ACTION, message, details);
        this.name = 'InvalidActionError';
        this.playerIndex = playerIndex;
    }
}

/**
 * Memory holds fewer samples than a training step needs
 */
export class InsufficientDataError extends RLBridgeError {
    readonly available: number;
    readonly required: number;

    constructor(available: number, required: number) {
        super(
            ErrorCodes.INSUFFICIENT_DATA,
            `Insufficient data for training: ${available} of ${required} samples available`,
            { available, required }
        );
        this.name = 'InsufficientDataError';
        this.available = available;
        this.required = required;
    }
}

/**
 * Blob cannot be restored into this component. Local state is unchanged.
 */
export class IncompatibleRestoreError extends RLBridgeError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.INCOMPATIBLE_RESTORE, message, details);
        this.name = 'IncompatibleRestoreError';
    }
}

/**
 * Validation error (invalid space bounds, config, or value)
 */
export class ValidationError extends RLBridgeError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.VALIDATION_ERROR, message, details);
        this.name = 'ValidationError';
    }
}

/**
 * Not initialized error (step called before reset)
 */
export class NotInitializedError extends RLBridgeError {
    constructor(message = 'Environment run not initialized. Call reset() first.') {
        super(ErrorCodes.NOT_INITIALIZED, message);
        this.name = 'NotInitializedError';
    }
}

/**
 * Step requested on a finished episode
 */
export class EpisodeTerminatedError extends RLBridgeError {
    constructor(message = 'Episode is done. Call reset() to start a new one.') {
        super(ErrorCodes.EPISODE_TERMINATED, message);
        this.name = 'EpisodeTerminatedError';
    }
}

/**
 * Worker hook called out of order (policy/onStep pairing broken)
 */
export class SequenceError extends RLBridgeError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.SEQUENCE_VIOLATION, message, details);
        this.name = 'SequenceError';
    }
}

/**
 * Unknown or duplicate registry id
 */
export class RegistryError extends RLBridgeError {
    readonly id: string;

    constructor(code: typeof ErrorCodes.NOT_REGISTERED | typeof ErrorCodes.ALREADY_REGISTERED, kind: string, id: string) {
        super(
            code,
            code === ErrorCodes.NOT_REGISTERED
                ? `${kind} '${id}' is not registered`
                : `${kind} '${id}' is already registered`,
            { kind, id }
        );
        this.name = 'RegistryError';
        this.id = id;
    }
}

/**
 * Protocol error (version mismatch, invalid message format)
 */
export class ProtocolError extends RLBridgeError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.PROTOCOL_ERROR, message, details);
        this.name = 'ProtocolError';
    }
}

// ==================== Error Utilities ====================

/**
 * Check if an error is an RLBridgeError
 */
export function isRLBridgeError(error: unknown): error is RLBridgeError {
    return error instanceof RLBridgeError;
}

/**
 * Check if an error has a specific error code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
    return isRLBridgeError(error) && error.code === code;
}

export function isRecoverable(error: unknown): boolean {
    return isRLBridgeError(error) && error.recoverable;
}

/**
 * Wrap any error into an RLBridgeError
 */
export function wrapError(error: unknown, defaultCode: ErrorCode = ErrorCodes.INTERNAL_ERROR): RLBridgeError {
    if (isRLBridgeError(error)) {
        return error;
    }

    if (error instanceof Error) {
        return new RLBridgeError(defaultCode, error.message, {
            originalName: error.name,
            originalStack: error.stack,
        });
    }

    return new RLBridgeError(defaultCode, String(error));
}
