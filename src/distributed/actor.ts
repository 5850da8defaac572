/**
 * @module distributed/actor
 * @description Actor side of learner/actor synchronization
 *
 * Parameters are last-write-wins: only the blob with the highest sequence
 * number is kept, so a parameter overtaken in flight is never applied.
 * Experience is shipped as blobs of locally added batches; they leave the
 * memory's outgoing queue only after the transport accepted the message.
 */

import { ConsoleLogger, type Logger } from '../core/logging';
import { IncompatibleRestoreError, ProtocolError } from '../core/errors';
import type { StateBlob } from '../core/blob';
import type { RLRemoteMemory } from '../rl/memory';
import type { RLParameter } from '../rl/parameter';
import { decodeSyncMessage, encodeSyncMessage, SyncMessageTypes } from './protocol';
import type { Transport, TransportEvent, TransportEventHandler } from './transport';

export interface ActorSyncOptions {
    actorId: string;
    logger?: Logger;
}

export interface ActorSyncStats {
    /** Parameter blobs kept as the newest so far */
    parametersReceived: number;
    /** Parameter blobs older than one already received */
    staleParameters: number;
    /** Messages that failed validation or had an unexpected type */
    malformed: number;
    experienceSent: number;
}

export class ActorSync {
    readonly actorId: string;
    private readonly logger: Logger;
    private readonly handler: TransportEventHandler;

    private latest: { seq: number; blob: StateBlob } | null = null;
    private appliedSeq = -1;
    private sendSeq = 0;
    private stats: ActorSyncStats = {
        parametersReceived: 0,
        staleParameters: 0,
        malformed: 0,
        experienceSent: 0,
    };

    constructor(private readonly transport: Transport, options: ActorSyncOptions) {
        this.actorId = options.actorId;
        this.logger = options.logger ?? new ConsoleLogger('warn');
        this.handler = (event: TransportEvent) => this.handleEvent(event);
        transport.onEvent(this.handler);
    }

    /** Sequence number of the newest parameter received (-1 before any) */
    get latestSeq(): number {
        return this.latest?.seq ?? -1;
    }

    /** A parameter newer than the applied one is waiting */
    get hasPendingParameter(): boolean {
        return this.latest !== null && this.latest.seq > this.appliedSeq;
    }

    getStats(): Readonly<ActorSyncStats> {
        return { ...this.stats };
    }

    /**
     * Restore the newest received parameter into `parameter` if it was not applied yet
     *
     * @returns true when a parameter was applied
     * @throws {IncompatibleRestoreError} the blob does not fit `parameter` (it is discarded)
     */
    applyLatestParameter(parameter: RLParameter): boolean {
        const latest = this.latest;
        if (latest === null || latest.seq <= this.appliedSeq) {
            return false;
        }
        this.appliedSeq = latest.seq;
        try {
            parameter.restore(latest.blob);
        } catch (error) {
            if (error instanceof IncompatibleRestoreError) {
                this.logger.logEvent({
                    level: 'error',
                    source: this.actorId,
                    message: `Parameter seq ${latest.seq} rejected`,
                    data: { code: error.code, reason: error.message },
                });
            }
            throw error;
        }
        return true;
    }

    /**
     * Ship the batches added to `memory` since the last successful call
     *
     * @returns number of batches sent
     * @throws {ProtocolError} the transport refused the message (the batches stay queued)
     */
    sendExperience(memory: RLRemoteMemory<unknown>): number {
        const count = memory.outgoingCount;
        if (count === 0) {
            return 0;
        }
        const blob = memory.peekOutgoing();
        this.transport.send(encodeSyncMessage(SyncMessageTypes.EXPERIENCE, this.actorId, this.sendSeq, blob));
        memory.commitOutgoing(count);
        this.sendSeq++;
        this.stats.experienceSent += count;
        return count;
    }

    close(): void {
        this.transport.offEvent(this.handler);
    }

    private handleEvent(event: TransportEvent): void {
        if (event.type !== 'message' || event.data === undefined) {
            return;
        }
        try {
            const message = decodeSyncMessage(event.data);
            if (message.type !== SyncMessageTypes.PARAMETER) {
                throw new ProtocolError(`Actor does not accept '${message.type}' messages`, {
                    senderId: message.senderId,
                });
            }
            if (message.seq <= this.latestSeq) {
                this.stats.staleParameters++;
                this.logger.logEvent({
                    level: 'debug',
                    source: this.actorId,
                    message: `Discarded stale parameter seq ${message.seq}`,
                    data: { latestSeq: this.latestSeq },
                });
                return;
            }
            this.latest = { seq: message.seq, blob: message.blob };
            this.stats.parametersReceived++;
        } catch (error) {
            if (!(error instanceof ProtocolError)) {
                throw error;
            }
            this.stats.malformed++;
            this.logger.logEvent({
                level: 'warn',
                source: this.actorId,
                message: `Dropped message: ${error.message}`,
                data: { details: error.details },
            });
        }
    }
}
