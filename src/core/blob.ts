/**
 * @module core/blob
 * @description Versioned, self-describing state blobs and the Checkpointable protocol
 *
 * Binary layout:
 *
 * ```
 * [0..4)   magic "RLB1"
 * [4..8)   header length (uint32, big endian)
 * [8..h)   header JSON (utf-8)
 * [h..)    payload JSON (utf-8, non-finite numbers tagged)
 * ```
 *
 * The header names the producer type, its schema version and an optional
 * compatibility context (e.g. the RLConfig hash). Restores verify all three
 * plus a payload checksum before touching any state.
 */

import { z } from 'zod';
import { IncompatibleRestoreError } from './errors';
import { CORE_VERSION, simpleHash, type JsonValue } from './repro';

// ==================== Types ====================

/**
 * Opaque serialized state of a Checkpointable component
 */
export type StateBlob = Uint8Array;

/**
 * Component whose full state round-trips through a StateBlob
 */
export interface Checkpointable {
    /** Serialize the complete state */
    backup(): StateBlob;
    /**
     * Replace the state with a blob's contents.
     * On failure throws IncompatibleRestoreError and leaves the state unchanged.
     */
    restore(blob: StateBlob): void;
}

/**
 * What a blob claims to be
 */
export interface CheckpointDescriptor {
    /** Producer type, e.g. `parameter:ql` or `env:Grid` */
    type: string;
    /** Version of the producer's payload schema */
    schemaVersion: number;
    /** Compatibility context that must match on restore */
    context?: string;
}

// ==================== Header ====================

export const BLOB_MAGIC = 'RLB1';
export const BLOB_FORMAT_VERSION = 1;

const MAGIC_BYTES = new TextEncoder().encode(BLOB_MAGIC);
const PREFIX_LENGTH = MAGIC_BYTES.length + 4;

export const BlobHeaderSchema = z.object({
    version: z.literal(BLOB_FORMAT_VERSION),
    type: z.string().min(1),
    schemaVersion: z.number().int().nonnegative(),
    context: z.string().optional(),
    coreVersion: z.string(),
    createdAt: z.number(),
    checksum: z.string(),
    payloadLength: z.number().int().nonnegative(),
});

export type BlobHeader = z.infer<typeof BlobHeaderSchema>;

/**
 * Schema accepting any JSON-compatible value (payload numbers may be non-finite)
 */
export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
    z.union([
        z.string(),
        z.number(),
        z.boolean(),
        z.null(),
        z.array(JsonValueSchema),
        z.record(JsonValueSchema),
    ])
);

export interface DecodedBlob {
    header: BlobHeader;
    payload: unknown;
}

// ==================== Payload Encoding ====================

// Non-finite numbers become `{"$f": "Infinity"}`. Object keys of the payload
// that start with `$` get one more `$` so they never read back as the tag.
const NON_FINITE_TAG = '$f';
const KEY_ESCAPE = '$';

function isPlainObject(value: unknown): value is Record<string, unknown> {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        return false;
    }
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

function encodePayload(payload: unknown): string {
    return JSON.stringify(payload, (_key, value: unknown) => {
        if (typeof value === 'number' && !Number.isFinite(value)) {
            return { [NON_FINITE_TAG]: String(value) };
        }
        if (isPlainObject(value) && Object.keys(value).some(key => key.startsWith(KEY_ESCAPE))) {
            const escaped: Record<string, unknown> = {};
            for (const [key, inner] of Object.entries(value)) {
                escaped[key.startsWith(KEY_ESCAPE) ? KEY_ESCAPE + key : key] = inner;
            }
            return escaped;
        }
        return value;
    });
}

function decodePayload(text: string): unknown {
    return JSON.parse(text, (_key, value: unknown) => {
        if (!isPlainObject(value)) {
            return value;
        }
        const entries = Object.entries(value);
        if (entries.length === 1 && entries[0][0] === NON_FINITE_TAG) {
            return Number(entries[0][1]);
        }
        if (!entries.some(([key]) => key.startsWith(KEY_ESCAPE))) {
            return value;
        }
        const unescaped: Record<string, unknown> = {};
        for (const [key, inner] of entries) {
            unescaped[key.startsWith(KEY_ESCAPE) ? key.slice(KEY_ESCAPE.length) : key] = inner;
        }
        return unescaped;
    });
}

// ==================== Codec ====================

/**
 * Encode a payload under a descriptor
 */
export function encodeBlob(descriptor: CheckpointDescriptor, payload: unknown): StateBlob {
    const encoder = new TextEncoder();
    const payloadText = encodePayload(payload);
    const payloadBytes = encoder.encode(payloadText);
    const header: BlobHeader = {
        version: BLOB_FORMAT_VERSION,
        type: descriptor.type,
        schemaVersion: descriptor.schemaVersion,
        ...(descriptor.context !== undefined ? { context: descriptor.context } : {}),
        coreVersion: CORE_VERSION,
        createdAt: Date.now(),
        checksum: simpleHash(payloadText),
        payloadLength: payloadBytes.length,
    };
    const headerBytes = encoder.encode(JSON.stringify(header));

    const out = new Uint8Array(PREFIX_LENGTH + headerBytes.length + payloadBytes.length);
    out.set(MAGIC_BYTES, 0);
    new DataView(out.buffer).setUint32(MAGIC_BYTES.length, headerBytes.length);
    out.set(headerBytes, PREFIX_LENGTH);
    out.set(payloadBytes, PREFIX_LENGTH + headerBytes.length);
    return out;
}

function readHeader(blob: StateBlob): { header: BlobHeader; payloadOffset: number } {
    if (!(blob instanceof Uint8Array) || blob.length < PREFIX_LENGTH) {
        throw new IncompatibleRestoreError('Blob is truncated or not binary');
    }
    for (let i = 0; i < MAGIC_BYTES.length; i++) {
        if (blob[i] !== MAGIC_BYTES[i]) {
            throw new IncompatibleRestoreError('Blob magic mismatch');
        }
    }
    const view = new DataView(blob.buffer, blob.byteOffset, blob.byteLength);
    const headerLength = view.getUint32(MAGIC_BYTES.length);
    const payloadOffset = PREFIX_LENGTH + headerLength;
    if (payloadOffset > blob.length) {
        throw new IncompatibleRestoreError('Blob header is truncated', { headerLength });
    }

    let raw: unknown;
    try {
        raw = JSON.parse(new TextDecoder().decode(blob.subarray(PREFIX_LENGTH, payloadOffset)));
    } catch (error) {
        throw new IncompatibleRestoreError('Blob header is not valid JSON', {
            cause: error instanceof Error ? error.message : String(error),
        });
    }
    const parsed = BlobHeaderSchema.safeParse(raw);
    if (!parsed.success) {
        throw new IncompatibleRestoreError('Unsupported blob header', { issues: parsed.error.issues });
    }
    return { header: parsed.data, payloadOffset };
}

/**
 * Read only the header (no payload checks)
 */
export function peekBlobHeader(blob: StateBlob): BlobHeader {
    return readHeader(blob).header;
}

/**
 * Decode and verify a blob against the expected descriptor
 *
 * @throws {IncompatibleRestoreError} on any mismatch or corruption
 */
export function decodeBlob(blob: StateBlob, expected: CheckpointDescriptor): DecodedBlob {
    const { header, payloadOffset } = readHeader(blob);

    if (header.type !== expected.type) {
        throw new IncompatibleRestoreError(
            `Blob type mismatch: expected '${expected.type}', got '${header.type}'`,
            { expected: expected.type, actual: header.type }
        );
    }
    if (header.schemaVersion !== expected.schemaVersion) {
        throw new IncompatibleRestoreError(
            `Blob schema version mismatch: expected ${expected.schemaVersion}, got ${header.schemaVersion}`,
            { expected: expected.schemaVersion, actual: header.schemaVersion }
        );
    }
    if (expected.context !== undefined && header.context !== expected.context) {
        throw new IncompatibleRestoreError(
            `Blob context mismatch: expected ${expected.context}, got ${header.context ?? 'none'}`,
            { expected: expected.context, actual: header.context }
        );
    }

    const payloadBytes = blob.subarray(payloadOffset);
    if (payloadBytes.length !== header.payloadLength) {
        throw new IncompatibleRestoreError('Blob payload is truncated', {
            expected: header.payloadLength,
            actual: payloadBytes.length,
        });
    }
    const payloadText = new TextDecoder().decode(payloadBytes);
    if (simpleHash(payloadText) !== header.checksum) {
        throw new IncompatibleRestoreError('Blob checksum mismatch');
    }

    try {
        return { header, payload: decodePayload(payloadText) };
    } catch (error) {
        throw new IncompatibleRestoreError('Blob payload is not valid JSON', {
            cause: error instanceof Error ? error.message : String(error),
        });
    }
}

// ==================== Checkpointable Base ====================

/**
 * Checkpointable backed by a zod-validated snapshot
 *
 * Restore decodes and validates the whole payload before `applySnapshot`
 * runs, so a rejected blob never leaves partial state behind.
 */
export abstract class CheckpointableState<TSnapshot> implements Checkpointable {
    protected abstract readonly snapshotSchema: z.ZodType<TSnapshot, z.ZodTypeDef, unknown>;

    /** Descriptor written to and expected from blobs */
    protected abstract describeCheckpoint(): CheckpointDescriptor;

    /** Capture the current state */
    protected abstract snapshot(): TSnapshot;

    /** Replace the current state. Must not throw for a validated snapshot. */
    protected abstract applySnapshot(snapshot: TSnapshot): void;

    backup(): StateBlob {
        return encodeBlob(this.describeCheckpoint(), this.snapshot());
    }

    restore(blob: StateBlob): void {
        this.applySnapshot(this.readSnapshot(blob));
    }

    /** Decode and validate a blob without applying it */
    protected readSnapshot(blob: StateBlob): TSnapshot {
        const { payload } = decodeBlob(blob, this.describeCheckpoint());
        const parsed = this.snapshotSchema.safeParse(payload);
        if (!parsed.success) {
            throw new IncompatibleRestoreError('Blob payload does not match snapshot schema', {
                issues: parsed.error.issues,
            });
        }
        return parsed.data;
    }
}

// ==================== Transport Encoding ====================

export function blobToBase64(blob: StateBlob): string {
    return Buffer.from(blob.buffer, blob.byteOffset, blob.byteLength).toString('base64');
}

export function blobFromBase64(text: string): StateBlob {
    return new Uint8Array(Buffer.from(text, 'base64'));
}
