/**
 * @module algorithms/ql/memory
 * @description Transition record and FIFO memory for Q-learning
 */

import { z } from 'zod';
import type { RLConfig } from '../../rl/config';
import type { MemoryOptions } from '../../rl/memory';
import { SequenceMemory } from '../../rl/memories/sequence';

export const QLTransitionSchema = z.object({
    state: z.string(),
    action: z.number().int().nonnegative(),
    reward: z.number(),
    nextState: z.string(),
    done: z.boolean(),
    /** Invalid actions in nextState, excluded from the bootstrap max */
    nextInvalidActions: z.array(z.number().int().nonnegative()),
    actionCount: z.number().int().positive(),
});

export type QLTransition = z.infer<typeof QLTransitionSchema>;

export class QLMemory extends SequenceMemory<QLTransition> {
    constructor(config: RLConfig, options: MemoryOptions = {}) {
        super(config, QLTransitionSchema, options);
    }
}
