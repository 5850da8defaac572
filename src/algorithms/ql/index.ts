/**
 * @module algorithms/ql
 * @description Tabular Q-learning
 *
 * DISCRETE actions and observations. Workers record transitions into a FIFO
 * memory; the trainer drains `batchSize` transitions per step.
 */

import { TypeIncompatibilityError } from '../../core/errors';
import { RLTypes } from '../../rl/config';
import type { AlgorithmModule } from '../../rl/registry';
import { QL_DEFAULT_HYPERPARAMS, QL_NAME, readQLHyperparams } from './config';
import { QLMemory } from './memory';
import { QLParameter } from './parameter';
import { QLTrainer } from './trainer';
import { QLWorkerHooks } from './worker';

export * from './config';
export { QLMemory, QLTransitionSchema } from './memory';
export type { QLTransition } from './memory';
export { QLParameter } from './parameter';
export { QLTrainer } from './trainer';
export { QLWorkerHooks, observationKey } from './worker';

function expectParameter(parameter: unknown): QLParameter {
    if (!(parameter instanceof QLParameter)) {
        throw new TypeIncompatibilityError('ql needs a QLParameter');
    }
    return parameter;
}

function expectMemory(memory: unknown): QLMemory {
    if (!(memory instanceof QLMemory)) {
        throw new TypeIncompatibilityError('ql needs a QLMemory');
    }
    return memory;
}

export const qlModule: AlgorithmModule = {
    name: QL_NAME,
    actionType: RLTypes.DISCRETE,
    observationType: RLTypes.DISCRETE,
    defaultHyperparams: QL_DEFAULT_HYPERPARAMS,

    createParameter: config => new QLParameter(config),

    createRemoteMemory: (config, options) =>
        new QLMemory(config, { capacity: readQLHyperparams(config).memoryCapacity, ...options }),

    createTrainer: (config, parameter, memory) =>
        new QLTrainer(config, expectParameter(parameter), expectMemory(memory)),

    createWorkerHooks: (config, parameter, memory, adapter) => {
        if (adapter.actionCount === null) {
            throw new TypeIncompatibilityError('ql needs a discrete action view');
        }
        return new QLWorkerHooks(
            config,
            expectParameter(parameter),
            memory === null ? null : expectMemory(memory),
            adapter.actionCount
        );
    },
};
