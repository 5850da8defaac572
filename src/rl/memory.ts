/**
 * @module rl/memory
 * @description Experience store shared by workers (producers) and trainers (consumers)
 *
 * Every stored batch carries an id `<originId>:<incarnation>:<sequence>`.
 * The incarnation is drawn per memory instance and again on restore, so a
 * restarted actor or two actors sharing an origin never reuse an id.
 * Ingest drops ids seen recently, which makes experience delivery idempotent:
 * an actor may resend a blob and the learner's memory is unaffected.
 */

import { z } from 'zod';
import {
    CheckpointableState,
    decodeBlob,
    encodeBlob,
    type CheckpointDescriptor,
    type StateBlob,
} from '../core/blob';
import { IncompatibleRestoreError, ValidationError } from '../core/errors';
import { computeRLConfigHash, type RLConfig } from './config';

// ==================== Types ====================

/**
 * One stored experience batch
 */
export interface ExperienceItem<TBatch> {
    id: string;
    batch: TBatch;
    /** Sampling priority (ignored by memories without priorities) */
    priority: number;
}

export interface MemoryOptions {
    /** Maximum stored batches; the oldest/lowest priority is evicted first */
    capacity?: number;
    /** Prefix of generated ids (one per actor) */
    originId?: string;
    /** Fixed incarnation for the first ids; a random one is drawn otherwise */
    incarnation?: string;
    /** How many recent ids are remembered for duplicate detection */
    dedupWindow?: number;
    /** Keep locally added batches for takeOutgoing() */
    trackOutgoing?: boolean;
}

export interface MergeResult {
    accepted: number;
    duplicates: number;
}

interface MemorySnapshot<TBatch> {
    originId: string;
    seen: string[];
    items: ExperienceItem<TBatch>[];
}

const RawItemSchema = z.object({
    id: z.string().min(1),
    batch: z.unknown(),
    priority: z.number(),
});

const RawSnapshotSchema = z.object({
    originId: z.string(),
    seen: z.array(z.string()),
    items: z.array(RawItemSchema),
});

const RawExperienceSchema = z.object({
    items: z.array(RawItemSchema),
});

/**
 * Validate every batch with the algorithm's schema, reporting failures on ctx
 */
function parseItems<TBatch>(
    batchSchema: z.ZodType<TBatch, z.ZodTypeDef, unknown>,
    raw: readonly z.infer<typeof RawItemSchema>[],
    ctx: z.RefinementCtx
): ExperienceItem<TBatch>[] {
    const items: ExperienceItem<TBatch>[] = [];
    raw.forEach((item, index) => {
        const parsed = batchSchema.safeParse(item.batch);
        if (parsed.success) {
            items.push({ id: item.id, batch: parsed.data, priority: item.priority });
        } else {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['items', index, 'batch'],
                message: parsed.error.issues.map(issue => issue.message).join('; '),
            });
        }
    });
    return items;
}

const EXPERIENCE_SCHEMA_VERSION = 1;
const MEMORY_SCHEMA_VERSION = 1;
export const DEFAULT_MEMORY_CAPACITY = 10_000;

/**
 * Generate a token that tells apart memories sharing an origin id
 */
export function generateIncarnation(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).slice(2, 10);
    return `${timestamp}-${random}`;
}

// ==================== RLRemoteMemory ====================

/**
 * Base class for experience stores
 */
export abstract class RLRemoteMemory<TBatch> extends CheckpointableState<MemorySnapshot<TBatch>> {
    protected readonly snapshotSchema: z.ZodType<MemorySnapshot<TBatch>, z.ZodTypeDef, unknown>;
    private readonly experienceSchema: z.ZodType<{ items: ExperienceItem<TBatch>[] }, z.ZodTypeDef, unknown>;

    readonly capacity: number;
    readonly configHash: string;
    private _originId: string;
    private _incarnation: string;
    private sequence = 0;
    private readonly dedupWindow: number;
    private seen: Set<string> = new Set();
    private seenOrder: string[] = [];
    private readonly trackOutgoing: boolean;
    private outgoing: ExperienceItem<TBatch>[] = [];

    constructor(
        readonly config: RLConfig,
        readonly batchSchema: z.ZodType<TBatch, z.ZodTypeDef, unknown>,
        options: MemoryOptions = {}
    ) {
        super();
        this.capacity = options.capacity ?? DEFAULT_MEMORY_CAPACITY;
        if (!Number.isInteger(this.capacity) || this.capacity < 1) {
            throw new ValidationError(`Memory capacity must be a positive integer, got ${this.capacity}`);
        }
        this._originId = options.originId ?? 'local';
        this._incarnation = options.incarnation ?? generateIncarnation();
        this.dedupWindow = options.dedupWindow ?? Math.max(this.capacity * 4, 1024);
        this.trackOutgoing = options.trackOutgoing ?? false;
        this.configHash = computeRLConfigHash(config);

        this.snapshotSchema = RawSnapshotSchema.transform((raw, ctx) => ({
            originId: raw.originId,
            seen: raw.seen,
            items: parseItems(batchSchema, raw.items, ctx),
        }));
        this.experienceSchema = RawExperienceSchema.transform((raw, ctx) => ({
            items: parseItems(batchSchema, raw.items, ctx),
        }));
    }

    get originId(): string {
        return this._originId;
    }

    get incarnation(): string {
        return this._incarnation;
    }

    // ==================== Storage (implemented by subclasses) ====================

    /** Number of stored batches */
    abstract get length(): number;

    /** Insert one item, evicting if over capacity */
    protected abstract store(item: ExperienceItem<TBatch>): void;

    /** Stored items in a stable order */
    protected abstract storedItems(): ExperienceItem<TBatch>[];

    protected abstract clearStore(): void;

    // ==================== Ingest ====================

    /**
     * Add a locally produced batch
     *
     * @returns the generated id
     */
    add(batch: TBatch, priority = 0): string {
        const id = `${this._originId}:${this._incarnation}:${this.sequence++}`;
        const item: ExperienceItem<TBatch> = { id, batch, priority };
        this.ingest(item);
        if (this.trackOutgoing) {
            this.outgoing.push(item);
            if (this.outgoing.length > this.capacity) {
                this.outgoing.shift();
            }
        }
        return id;
    }

    /**
     * Store an item unless its id was seen recently
     *
     * @returns false for duplicates
     */
    ingest(item: ExperienceItem<TBatch>): boolean {
        if (this.seen.has(item.id)) {
            return false;
        }
        this.remember(item.id);
        this.store(item);
        return true;
    }

    private remember(id: string): void {
        this.seen.add(id);
        this.seenOrder.push(id);
        while (this.seenOrder.length > this.dedupWindow) {
            const old = this.seenOrder.shift();
            if (old !== undefined) this.seen.delete(old);
        }
    }

    // ==================== Experience Transfer ====================

    private experienceDescriptor(): CheckpointDescriptor {
        return {
            type: `experience:${this.config.name}`,
            schemaVersion: EXPERIENCE_SCHEMA_VERSION,
            context: this.configHash,
        };
    }

    /** Batches added locally and not yet taken */
    get outgoingCount(): number {
        return this.outgoing.length;
    }

    /**
     * Package locally added batches into an experience blob, keeping the queue
     *
     * Pair with commitOutgoing() once the blob was handed off.
     */
    peekOutgoing(): StateBlob {
        return encodeBlob(this.experienceDescriptor(), { items: this.outgoing });
    }

    /**
     * Drop the oldest `count` outgoing batches
     */
    commitOutgoing(count: number): void {
        this.outgoing.splice(0, count);
    }

    /**
     * Package locally added batches into an experience blob and clear the queue
     */
    takeOutgoing(): StateBlob {
        const blob = this.peekOutgoing();
        this.outgoing = [];
        return blob;
    }

    /**
     * Ingest an experience blob from another memory
     *
     * @throws {IncompatibleRestoreError} wrong algorithm, config or corrupt blob (nothing ingested)
     */
    merge(blob: StateBlob): MergeResult {
        const { payload } = decodeBlob(blob, this.experienceDescriptor());
        const parsed = this.experienceSchema.safeParse(payload);
        if (!parsed.success) {
            throw new IncompatibleRestoreError('Experience payload does not match batch schema', {
                issues: parsed.error.issues,
            });
        }
        let accepted = 0;
        let duplicates = 0;
        for (const item of parsed.data.items) {
            if (this.ingest(item)) {
                accepted++;
            } else {
                duplicates++;
            }
        }
        return { accepted, duplicates };
    }

    // ==================== Checkpoint ====================

    protected describeCheckpoint(): CheckpointDescriptor {
        return {
            type: `memory:${this.config.name}`,
            schemaVersion: MEMORY_SCHEMA_VERSION,
            context: this.configHash,
        };
    }

    protected snapshot(): MemorySnapshot<TBatch> {
        return {
            originId: this._originId,
            seen: [...this.seenOrder],
            items: this.storedItems().map(item => ({ ...item })),
        };
    }

    protected applySnapshot(snapshot: MemorySnapshot<TBatch>): void {
        this._originId = snapshot.originId;
        this._incarnation = generateIncarnation();
        this.sequence = 0;
        this.seen = new Set();
        this.seenOrder = [];
        for (const id of snapshot.seen) {
            this.remember(id);
        }
        this.clearStore();
        for (const item of snapshot.items) {
            this.store(item);
        }
        this.outgoing = [];
    }

    clear(): void {
        this.clearStore();
        this.outgoing = [];
    }
}
