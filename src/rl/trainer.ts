/**
 * @module rl/trainer
 * @description Optimization loop: reads experience, updates parameters
 */

import { InsufficientDataError } from '../core/errors';
import type { RLConfig } from './config';
import type { RLRemoteMemory } from './memory';
import type { RLParameter } from './parameter';

/** Numeric diagnostics of one training step (loss, td error, ...) */
export type TrainInfo = Record<string, number>;

export type TrainOutcome =
    | { trained: true; info: TrainInfo }
    | { trained: false; error: InsufficientDataError };

/**
 * Base class for trainers
 *
 * Subclasses implement `requiredSamples` and `trainStep`; `train` guards the
 * data requirement and counts completed steps.
 */
export abstract class RLTrainer {
    private trainCount = 0;
    private _lastInfo: TrainInfo = {};

    constructor(
        readonly config: RLConfig,
        readonly parameter: RLParameter,
        readonly memory: RLRemoteMemory<unknown>
    ) {}

    /** Samples the memory must hold before a step can run */
    abstract requiredSamples(): number;

    /** One optimization step; called only when enough samples exist */
    protected abstract trainStep(): TrainInfo;

    /**
     * Run one training step
     *
     * @throws {InsufficientDataError} memory holds fewer than requiredSamples() (recoverable)
     */
    train(): TrainInfo {
        const required = this.requiredSamples();
        if (this.memory.length < required) {
            throw new InsufficientDataError(this.memory.length, required);
        }
        const info = this.trainStep();
        this.trainCount++;
        this._lastInfo = info;
        return info;
    }

    /**
     * Like train(), but reports insufficient data as a value
     */
    tryTrain(): TrainOutcome {
        try {
            return { trained: true, info: this.train() };
        } catch (error) {
            if (error instanceof InsufficientDataError) {
                return { trained: false, error };
            }
            throw error;
        }
    }

    /** Completed training steps; never decreases */
    getTrainCount(): number {
        return this.trainCount;
    }

    get lastInfo(): Readonly<TrainInfo> {
        return this._lastInfo;
    }
}
