/**
 * @module rl/memories/replay
 * @description Uniform experience replay
 */

import type { z } from 'zod';
import type { SeededRandom } from '../../core/repro';
import type { RLConfig } from '../config';
import { RLRemoteMemory, type ExperienceItem, type MemoryOptions } from '../memory';

/**
 * Ring buffer sampled uniformly without replacement. Sampling does not remove batches.
 */
export class ReplayMemory<TBatch> extends RLRemoteMemory<TBatch> {
    private buffer: ExperienceItem<TBatch>[] = [];
    /** Next slot to overwrite once the buffer is full */
    private cursor = 0;

    constructor(config: RLConfig, batchSchema: z.ZodType<TBatch, z.ZodTypeDef, unknown>, options: MemoryOptions = {}) {
        super(config, batchSchema, options);
    }

    get length(): number {
        return this.buffer.length;
    }

    sample(count: number, rng: SeededRandom): TBatch[] {
        return rng.sample(this.buffer, Math.min(count, this.buffer.length)).map(item => item.batch);
    }

    protected store(item: ExperienceItem<TBatch>): void {
        if (this.buffer.length < this.capacity) {
            this.buffer.push({ ...item });
            return;
        }
        this.buffer[this.cursor] = { ...item };
        this.cursor = (this.cursor + 1) % this.capacity;
    }

    /** Oldest first, so a restore reproduces the eviction order */
    protected storedItems(): ExperienceItem<TBatch>[] {
        return [...this.buffer.slice(this.cursor), ...this.buffer.slice(0, this.cursor)];
    }

    protected clearStore(): void {
        this.buffer = [];
        this.cursor = 0;
    }
}
