/**
 * @module algorithms/ql/config
 * @description Tabular Q-learning hyperparameters
 */

import { z } from 'zod';
import { parseWithSchema } from '../../core/validation';
import type { RLConfig } from '../../rl/config';

export const QL_NAME = 'ql';

export const QLHyperparamsSchema = z.object({
    /** Exploration rate while training */
    epsilon: z.number().min(0).max(1).default(0.1),
    /** Exploration rate while evaluating */
    testEpsilon: z.number().min(0).max(1).default(0),
    /** Discount factor */
    gamma: z.number().min(0).max(1).default(0.9),
    /** Learning rate */
    lr: z.number().positive().max(1).default(0.1),
    /** Transitions consumed per training step */
    batchSize: z.number().int().positive().default(4),
    memoryCapacity: z.number().int().positive().default(10_000),
    /** Value of unvisited state-action pairs */
    initialQ: z.number().default(0),
});

export type QLHyperparams = z.infer<typeof QLHyperparamsSchema>;

export const QL_DEFAULT_HYPERPARAMS: QLHyperparams = QLHyperparamsSchema.parse({});

export function readQLHyperparams(config: RLConfig): QLHyperparams {
    return parseWithSchema(QLHyperparamsSchema, config.hyperparams, 'ql hyperparams');
}
