/**
 * @module core
 * @description Framework-independent building blocks
 *
 * ## Modules
 * - `space`: Space kinds, membership, sampling and schema hashing
 * - `conversion`: Discrete/continuous conversion between spaces
 * - `blob`: Self-describing state blobs and the checkpoint base class
 * - `logging`: Structured step/episode/report/event logging
 * - `repro`: Seeded RNG, canonical JSON and hashing
 * - `errors`: Error types and codes
 */

// ==================== Space ====================

export type {
    DiscreteSpace,
    ArrayDiscreteSpace,
    ContinuousSpace,
    ArrayContinuousSpace,
    BoxSpace,
    Space,
    SpaceKind,
    ElementType,
    SpaceValue,
    SpaceValueOf,
} from './space';

export {
    discrete,
    arrayDiscrete,
    continuous,
    arrayContinuous,
    box,
    getElementType,
    isDiscreteSpace,
    isScalarSpace,
    getSize,
    getLow,
    getHigh,
    isBounded,
    getCardinality,
    describeSpace,
    toFlat,
    fromFlat,
    sample,
    contains,
    serializeSpace,
    computeSchemaHash,
} from './space';

// ==================== Conversion ====================

export type { BinSpec } from './conversion';

export {
    DEFAULT_BINS,
    assertBounded,
    discreteCount,
    toDiscrete,
    fromDiscrete,
    quantizationTolerance,
    toContinuous,
    fromContinuous,
    encodeIndex,
    decodeIndex,
    SpaceConverter,
    createConverter,
} from './conversion';

// ==================== Blob ====================

export type {
    StateBlob,
    Checkpointable,
    CheckpointDescriptor,
    BlobHeader,
    DecodedBlob,
} from './blob';

export {
    BLOB_MAGIC,
    BLOB_FORMAT_VERSION,
    BlobHeaderSchema,
    JsonValueSchema,
    encodeBlob,
    peekBlobHeader,
    decodeBlob,
    CheckpointableState,
    blobToBase64,
    blobFromBase64,
} from './blob';

// ==================== Logging ====================

export type {
    LogLevel,
    BaseLogEntry,
    StepLogEntry,
    EpisodeLogEntry,
    ReportLogEntry,
    EventLogEntry,
    LogEntry,
    StepLogInput,
    EpisodeLogInput,
    ReportLogInput,
    EventLogInput,
    Logger,
    LoggerConfig,
} from './logging';

export {
    LOG_SCHEMA_VERSION,
    ConsoleLogger,
    MemoryLogger,
} from './logging';

// ==================== Repro ====================

export type { JsonValue } from './repro';

export {
    CORE_VERSION,
    simpleHash,
    hashString,
    sortObjectKeys,
    canonicalJson,
    SeededRandom,
    createRng,
    deriveSeed,
} from './repro';

export { formatIssues, parseWithSchema } from './validation';

// ==================== Errors ====================

export {
    ErrorCodes,
    RLBridgeError,
    TypeIncompatibilityError,
    UnboundedConversionError,
    ShapeMismatchError,
    InvalidActionError,
    InsufficientDataError,
    IncompatibleRestoreError,
    ValidationError,
    NotInitializedError,
    EpisodeTerminatedError,
    SequenceError,
    RegistryError,
    ProtocolError,
    isRLBridgeError,
    hasErrorCode,
    isRecoverable,
    wrapError,
} from './errors';

export type { ErrorCode } from './errors';
