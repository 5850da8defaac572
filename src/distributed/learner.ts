/**
 * @module distributed/learner
 * @description Learner side of learner/actor synchronization
 *
 * Experience blobs from any number of actors are merged into one memory in
 * arrival order; ids already seen are counted as duplicates and skipped.
 * Parameters are broadcast with an increasing sequence number.
 */

import { ConsoleLogger, type Logger } from '../core/logging';
import { IncompatibleRestoreError, ProtocolError } from '../core/errors';
import type { RLRemoteMemory } from '../rl/memory';
import type { RLParameter } from '../rl/parameter';
import { decodeSyncMessage, encodeSyncMessage, SyncMessageTypes } from './protocol';
import type { Transport, TransportEvent, TransportEventHandler } from './transport';

export interface LearnerSyncOptions {
    learnerId?: string;
    logger?: Logger;
}

export interface LearnerSyncStats {
    /** Batches stored */
    accepted: number;
    /** Batches skipped because their id was already stored */
    duplicates: number;
    /** Experience blobs the memory refused (wrong algorithm/config, corrupt) */
    rejected: number;
    /** Messages that failed validation or had an unexpected type */
    malformed: number;
    parametersPublished: number;
}

export class LearnerSync {
    readonly learnerId: string;
    private readonly logger: Logger;
    private readonly handlers: Map<Transport, TransportEventHandler> = new Map();
    private seq = 0;
    private stats: LearnerSyncStats = {
        accepted: 0,
        duplicates: 0,
        rejected: 0,
        malformed: 0,
        parametersPublished: 0,
    };

    constructor(private readonly memory: RLRemoteMemory<unknown>, options: LearnerSyncOptions = {}) {
        this.learnerId = options.learnerId ?? 'learner';
        this.logger = options.logger ?? new ConsoleLogger('warn');
    }

    /**
     * Start listening on an actor's transport
     */
    attach(transport: Transport): this {
        if (!this.handlers.has(transport)) {
            const handler = (event: TransportEvent) => this.handleEvent(event);
            this.handlers.set(transport, handler);
            transport.onEvent(handler);
        }
        return this;
    }

    detach(transport: Transport): void {
        const handler = this.handlers.get(transport);
        if (handler) {
            transport.offEvent(handler);
            this.handlers.delete(transport);
        }
    }

    get actorCount(): number {
        return this.handlers.size;
    }

    getStats(): Readonly<LearnerSyncStats> {
        return { ...this.stats };
    }

    /**
     * Send a backup of `parameter` to every connected actor
     *
     * @returns the sequence number used
     */
    publishParameter(parameter: RLParameter): number {
        const seq = this.seq++;
        const message = encodeSyncMessage(SyncMessageTypes.PARAMETER, this.learnerId, seq, parameter.backup());
        for (const transport of this.handlers.keys()) {
            if (transport.isConnected()) {
                transport.send(message);
            }
        }
        this.stats.parametersPublished++;
        return seq;
    }

    close(): void {
        for (const [transport, handler] of this.handlers) {
            transport.offEvent(handler);
        }
        this.handlers.clear();
    }

    private handleEvent(event: TransportEvent): void {
        if (event.type !== 'message' || event.data === undefined) {
            return;
        }
        try {
            const message = decodeSyncMessage(event.data);
            if (message.type !== SyncMessageTypes.EXPERIENCE) {
                throw new ProtocolError(`Learner does not accept '${message.type}' messages`, {
                    senderId: message.senderId,
                });
            }
            const { accepted, duplicates } = this.memory.merge(message.blob);
            this.stats.accepted += accepted;
            this.stats.duplicates += duplicates;
            if (duplicates > 0) {
                this.logger.logEvent({
                    level: 'debug',
                    source: this.learnerId,
                    message: `Skipped ${duplicates} duplicate batches from ${message.senderId}`,
                    data: { seq: message.seq },
                });
            }
        } catch (error) {
            if (error instanceof ProtocolError) {
                this.stats.malformed++;
                this.logger.logEvent({
                    level: 'warn',
                    source: this.learnerId,
                    message: `Dropped message: ${error.message}`,
                    data: { details: error.details },
                });
            } else if (error instanceof IncompatibleRestoreError) {
                this.stats.rejected++;
                this.logger.logEvent({
                    level: 'warn',
                    source: this.learnerId,
                    message: `Rejected experience: ${error.message}`,
                    data: { details: error.details },
                });
            } else {
                throw error;
            }
        }
    }
}
