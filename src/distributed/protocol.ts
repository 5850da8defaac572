/**
 * @module distributed/protocol
 * @description Wire format of learner/actor synchronization messages
 *
 * Every message is one JSON envelope:
 * `{ v: 1, type: 'parameter' | 'experience', senderId, seq, timestamp, blob }`
 * where `blob` is a base64 encoded StateBlob. `seq` increases per sender and
 * type; receivers use it to discard stale parameters.
 */

import { z } from 'zod';
import { blobFromBase64, blobToBase64, type StateBlob } from '../core/blob';
import { ProtocolError } from '../core/errors';
import { formatIssues } from '../core/validation';

export const SYNC_PROTOCOL_VERSION = 1;

export const SyncMessageTypes = {
    PARAMETER: 'parameter',
    EXPERIENCE: 'experience',
} as const;

export type SyncMessageType = (typeof SyncMessageTypes)[keyof typeof SyncMessageTypes];

export const SyncMessageSchema = z.object({
    v: z.literal(SYNC_PROTOCOL_VERSION),
    type: z.enum([SyncMessageTypes.PARAMETER, SyncMessageTypes.EXPERIENCE]),
    senderId: z.string().min(1),
    seq: z.number().int().nonnegative(),
    timestamp: z.number(),
    blob: z.string().regex(/^[A-Za-z0-9+/]*={0,2}$/, 'blob must be base64'),
});

export type SyncMessage = z.infer<typeof SyncMessageSchema>;

/**
 * A validated message with its blob decoded
 */
export interface ReceivedSync {
    type: SyncMessageType;
    senderId: string;
    seq: number;
    timestamp: number;
    blob: StateBlob;
}

/**
 * Build the JSON text of a sync message
 */
export function encodeSyncMessage(type: SyncMessageType, senderId: string, seq: number, blob: StateBlob): string {
    const message: SyncMessage = {
        v: SYNC_PROTOCOL_VERSION,
        type,
        senderId,
        seq,
        timestamp: Date.now(),
        blob: blobToBase64(blob),
    };
    return JSON.stringify(message);
}

/**
 * Parse and validate a received message
 *
 * @throws {ProtocolError} not JSON, or not a sync message
 */
export function decodeSyncMessage(raw: string): ReceivedSync {
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (e) {
        throw new ProtocolError('Sync message is not valid JSON', {
            error: e instanceof Error ? e.message : String(e),
        });
    }
    const parsed = SyncMessageSchema.safeParse(json);
    if (!parsed.success) {
        throw new ProtocolError('Malformed sync message', { issues: formatIssues(parsed.error.issues) });
    }
    const { type, senderId, seq, timestamp, blob } = parsed.data;
    return { type, senderId, seq, timestamp, blob: blobFromBase64(blob) };
}
