/**
 * @module algorithms/ql/parameter
 * @description Q-table keyed by discretized observation
 */

import { z } from 'zod';
import type { RLConfig } from '../../rl/config';
import { RLParameter } from '../../rl/parameter';
import { readQLHyperparams } from './config';

const QLSnapshotSchema = z.object({
    table: z.record(z.array(z.number())),
});

type QLSnapshot = z.infer<typeof QLSnapshotSchema>;

export class QLParameter extends RLParameter<QLSnapshot> {
    protected readonly snapshotSchema = QLSnapshotSchema;
    private readonly initialQ: number;
    private table: Map<string, number[]> = new Map();

    constructor(config: RLConfig) {
        super(config);
        this.initialQ = readQLHyperparams(config).initialQ;
    }

    /** Number of visited states */
    get size(): number {
        return this.table.size;
    }

    /**
     * Q values of a state (a fresh row for unvisited states; not stored)
     */
    getQ(state: string, actionCount: number): number[] {
        const row = this.table.get(state);
        if (!row) {
            return new Array<number>(actionCount).fill(this.initialQ);
        }
        if (row.length < actionCount) {
            return [...row, ...new Array<number>(actionCount - row.length).fill(this.initialQ)];
        }
        return [...row];
    }

    setQ(state: string, values: readonly number[]): void {
        this.table.set(state, [...values]);
    }

    /**
     * Best value among the given actions (initialQ when the list is empty)
     */
    maxQ(state: string, actionCount: number, actions: readonly number[]): number {
        const q = this.getQ(state, actionCount);
        return actions.length === 0 ? this.initialQ : Math.max(...actions.map(a => q[a]));
    }

    override summary(): string {
        return `ql parameter: ${this.table.size} states`;
    }

    protected snapshot(): QLSnapshot {
        const table: Record<string, number[]> = {};
        for (const [key, row] of this.table) {
            table[key] = [...row];
        }
        return { table };
    }

    protected applySnapshot(snapshot: QLSnapshot): void {
        this.table = new Map(Object.entries(snapshot.table).map(([key, row]) => [key, [...row]]));
    }
}
