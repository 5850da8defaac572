/**
 * @module algorithms/ql/trainer
 * @description One-step Q-learning update over FIFO batches
 */

import type { RLConfig } from '../../rl/config';
import { RLTrainer, type TrainInfo } from '../../rl/trainer';
import { readQLHyperparams, type QLHyperparams } from './config';
import type { QLMemory } from './memory';
import type { QLParameter } from './parameter';

export class QLTrainer extends RLTrainer {
    private readonly hp: QLHyperparams;

    constructor(config: RLConfig, private readonly table: QLParameter, private readonly transitions: QLMemory) {
        super(config, table, transitions);
        this.hp = readQLHyperparams(config);
    }

    requiredSamples(): number {
        return this.hp.batchSize;
    }

    protected trainStep(): TrainInfo {
        const batch = this.transitions.drain(this.hp.batchSize);
        let tdErrorSum = 0;
        for (const t of batch) {
            const q = this.table.getQ(t.state, t.actionCount);
            let target = t.reward;
            if (!t.done) {
                const invalid = new Set(t.nextInvalidActions);
                const valid: number[] = [];
                for (let a = 0; a < t.actionCount; a++) {
                    if (!invalid.has(a)) valid.push(a);
                }
                target += this.hp.gamma * this.table.maxQ(t.nextState, t.actionCount, valid);
            }
            const td = target - q[t.action];
            q[t.action] += this.hp.lr * td;
            this.table.setQ(t.state, q);
            tdErrorSum += Math.abs(td);
        }
        return {
            tdError: batch.length > 0 ? tdErrorSum / batch.length : 0,
            states: this.table.size,
        };
    }
}
