/**
 * @module rl/memories/rankBased
 * @description Rank-based prioritized replay with linear rank weights
 *
 * Items are kept sorted by ascending priority. The item at rank i (0 = lowest
 * priority) is drawn with weight `1 + alpha * i`; importance weights
 * `(N * p)^-beta` are normalized by their maximum, with beta annealed from
 * `betaInitial` to 1 over `betaSteps` training steps.
 *
 * Sampled items leave the memory until update() reinserts them with their
 * new priorities, so they are absent from backups taken in between.
 */

import type { z } from 'zod';
import { InsufficientDataError, ValidationError } from '../../core/errors';
import type { SeededRandom } from '../../core/repro';
import type { RLConfig } from '../config';
import { RLRemoteMemory, type ExperienceItem, type MemoryOptions } from '../memory';

export interface RankBasedMemoryOptions extends MemoryOptions {
    /** Slope of the linear rank weight (0 = uniform) */
    alpha?: number;
    betaInitial?: number;
    betaSteps?: number;
}

export interface RankedSample<TBatch> {
    items: ExperienceItem<TBatch>[];
    /** Importance-sampling weights, max 1 */
    weights: number[];
}

/**
 * Sum of linear rank weights for ranks [0, k)
 */
export function rankSum(k: number, alpha: number): number {
    return (k * (2 + (k - 1) * alpha)) / 2;
}

/**
 * Inverse of rankSum in k
 */
export function rankSumInverse(total: number, alpha: number): number {
    if (alpha === 0) {
        return total;
    }
    const t = alpha - 2 + Math.sqrt((2 - alpha) ** 2 + 8 * alpha * total);
    return t / (2 * alpha);
}

export class RankBasedMemory<TBatch> extends RLRemoteMemory<TBatch> {
    readonly alpha: number;
    readonly betaInitial: number;
    readonly betaSteps: number;

    /** Ascending priority */
    private sorted: ExperienceItem<TBatch>[] = [];
    private maxPriority = 1;

    constructor(
        config: RLConfig,
        batchSchema: z.ZodType<TBatch, z.ZodTypeDef, unknown>,
        options: RankBasedMemoryOptions = {}
    ) {
        super(config, batchSchema, options);
        this.alpha = options.alpha ?? 1;
        this.betaInitial = options.betaInitial ?? 0.4;
        this.betaSteps = options.betaSteps ?? 1_000_000;
        if (this.alpha < 0 || this.betaSteps < 1) {
            throw new ValidationError('alpha must be >= 0 and betaSteps >= 1', {
                alpha: this.alpha,
                betaSteps: this.betaSteps,
            });
        }
    }

    get length(): number {
        return this.sorted.length;
    }

    /**
     * Add a batch. Without a TD error it gets the highest priority seen so far.
     */
    override add(batch: TBatch, tdError?: number): string {
        return super.add(batch, tdError === undefined ? this.maxPriority : Math.abs(tdError));
    }

    /**
     * Draw `batchSize` distinct items, removing them until update()
     */
    sample(batchSize: number, step: number, rng: SeededRandom): RankedSample<TBatch> {
        const size = this.sorted.length;
        if (size < batchSize) {
            throw new InsufficientDataError(size, batchSize);
        }
        const beta = Math.min(1, this.betaInitial + ((1 - this.betaInitial) * step) / this.betaSteps);
        const total = rankSum(size, this.alpha);

        const picked = new Set<number>();
        while (picked.size < batchSize) {
            const r = rng.random() * total;
            picked.add(Math.min(size - 1, Math.floor(rankSumInverse(r, this.alpha))));
        }

        // pop from the back so lower indices stay valid
        const indices = [...picked].sort((a, b) => b - a);
        const items: ExperienceItem<TBatch>[] = [];
        const weights: number[] = [];
        for (const index of indices) {
            items.push(this.sorted.splice(index, 1)[0]);
            const prob = (rankSum(index + 1, this.alpha) - rankSum(index, this.alpha)) / total;
            weights.push((size * prob) ** -beta);
        }
        const maxWeight = Math.max(...weights);
        return { items, weights: weights.map(w => w / maxWeight) };
    }

    /**
     * Reinsert sampled items with priorities |tdError|
     */
    update(items: readonly ExperienceItem<TBatch>[], tdErrors: readonly number[]): void {
        if (items.length !== tdErrors.length) {
            throw new ValidationError(`Got ${tdErrors.length} TD errors for ${items.length} items`);
        }
        items.forEach((item, i) => {
            this.store({ ...item, priority: Math.abs(tdErrors[i]) });
        });
    }

    protected store(item: ExperienceItem<TBatch>): void {
        this.maxPriority = Math.max(this.maxPriority, item.priority);
        if (this.sorted.length >= this.capacity) {
            this.sorted.shift();
        }
        // insert after equal priorities
        let lo = 0;
        let hi = this.sorted.length;
        while (lo < hi) {
            const mid = (lo + hi) >> 1;
            if (item.priority < this.sorted[mid].priority) {
                hi = mid;
            } else {
                lo = mid + 1;
            }
        }
        this.sorted.splice(lo, 0, { ...item });
    }

    protected storedItems(): ExperienceItem<TBatch>[] {
        return this.sorted;
    }

    protected clearStore(): void {
        this.sorted = [];
        this.maxPriority = 1;
    }
}
