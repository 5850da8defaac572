/**
 * @module rl/memories/sequence
 * @description FIFO experience store consumed in arrival order
 */

import type { z } from 'zod';
import type { RLConfig } from '../config';
import { RLRemoteMemory, type ExperienceItem, type MemoryOptions } from '../memory';

/**
 * First-in first-out memory. Trainers drain batches; when full the oldest is dropped.
 */
export class SequenceMemory<TBatch> extends RLRemoteMemory<TBatch> {
    private buffer: ExperienceItem<TBatch>[] = [];

    constructor(config: RLConfig, batchSchema: z.ZodType<TBatch, z.ZodTypeDef, unknown>, options: MemoryOptions = {}) {
        super(config, batchSchema, options);
    }

    get length(): number {
        return this.buffer.length;
    }

    /**
     * Remove and return up to `count` of the oldest batches
     */
    drain(count: number = this.buffer.length): TBatch[] {
        return this.buffer.splice(0, Math.max(0, count)).map(item => item.batch);
    }

    /** Oldest batches without removing them */
    peek(count: number = this.buffer.length): TBatch[] {
        return this.buffer.slice(0, Math.max(0, count)).map(item => item.batch);
    }

    protected store(item: ExperienceItem<TBatch>): void {
        this.buffer.push({ ...item });
        if (this.buffer.length > this.capacity) {
            this.buffer.shift();
        }
    }

    protected storedItems(): ExperienceItem<TBatch>[] {
        return this.buffer;
    }

    protected clearStore(): void {
        this.buffer = [];
    }
}
