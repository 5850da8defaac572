/**
 * @module rl/parameter
 * @description Learned state of an algorithm
 *
 * Parameters are checkpointable: backups carry the RLConfig hash, so a blob
 * produced under a different configuration is rejected on restore.
 */

import { CheckpointableState, type CheckpointDescriptor } from '../core/blob';
import { computeRLConfigHash, type RLConfig } from './config';

/**
 * Base class for algorithm parameters
 */
export abstract class RLParameter<TSnapshot = unknown> extends CheckpointableState<TSnapshot> {
    /** Bump when the snapshot layout changes */
    protected readonly schemaVersion: number = 1;
    readonly configHash: string;

    constructor(readonly config: RLConfig) {
        super();
        this.configHash = computeRLConfigHash(config);
    }

    protected describeCheckpoint(): CheckpointDescriptor {
        return {
            type: `parameter:${this.config.name}`,
            schemaVersion: this.schemaVersion,
            context: this.configHash,
        };
    }

    /** Short human readable description */
    summary(): string {
        return `${this.config.name} parameter`;
    }
}
