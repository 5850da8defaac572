/**
 * @module algorithms/ql/worker
 * @description Epsilon-greedy policy over the Q-table
 */

import { TypeIncompatibilityError } from '../../core/errors';
import { toFlat, type SpaceValue } from '../../core/space';
import type { RLConfig } from '../../rl/config';
import type { RLWorkerContext, RLWorkerHooks } from '../../rl/worker';
import { readQLHyperparams, type QLHyperparams } from './config';
import type { QLMemory } from './memory';
import type { QLParameter } from './parameter';

/**
 * Q-table key of an observation
 */
export function observationKey(observation: SpaceValue): string {
    return toFlat(observation).join(',');
}

function validActions(ctx: RLWorkerContext, actionCount: number): number[] {
    const invalid = new Set(ctx.invalidActions);
    const valid: number[] = [];
    for (let a = 0; a < actionCount; a++) {
        if (!invalid.has(a)) valid.push(a);
    }
    return valid;
}

export class QLWorkerHooks implements RLWorkerHooks {
    private readonly hp: QLHyperparams;
    private prevState = '';
    private prevAction = -1;

    constructor(
        config: RLConfig,
        private readonly parameter: QLParameter,
        private readonly memory: QLMemory | null,
        private readonly actionCount: number
    ) {
        this.hp = readQLHyperparams(config);
    }

    onReset(observation: SpaceValue): void {
        this.prevState = observationKey(observation);
        this.prevAction = -1;
    }

    policy(observation: SpaceValue, ctx: RLWorkerContext): number {
        const state = observationKey(observation);
        const valid = validActions(ctx, this.actionCount);
        if (valid.length === 0) {
            throw new TypeIncompatibilityError('No valid action left for the Q-learning policy', {
                invalidActions: [...ctx.invalidActions],
            });
        }

        const epsilon = ctx.training ? this.hp.epsilon : this.hp.testEpsilon;
        let action: number;
        if (ctx.rng.random() < epsilon) {
            action = ctx.rng.choice(valid);
        } else {
            const q = this.parameter.getQ(state, this.actionCount);
            action = valid[0];
            for (const a of valid) {
                if (q[a] > q[action]) action = a;
            }
        }

        this.prevState = state;
        this.prevAction = action;
        return action;
    }

    onStep(observation: SpaceValue, ctx: RLWorkerContext): void {
        if (!ctx.training || !this.memory || this.prevAction < 0) {
            return;
        }
        this.memory.add({
            state: this.prevState,
            action: this.prevAction,
            reward: ctx.reward,
            nextState: observationKey(observation),
            done: ctx.done,
            nextInvalidActions: [...ctx.invalidActions],
            actionCount: this.actionCount,
        });
    }

    renderTerminal(observation: SpaceValue): string {
        const q = this.parameter.getQ(observationKey(observation), this.actionCount);
        return q.map((v, a) => `${a}: ${v.toFixed(3)}`).join('\n');
    }
}
