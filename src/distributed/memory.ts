/**
 * @module distributed/memory
 * @description In-memory transport for single-process runs and tests
 */

import { ProtocolError } from '../core/errors';
import { BaseTransport, type TransportOptions } from './transport';

/**
 * In-memory transport
 *
 * Creates pairs of connected transports that communicate without any I/O.
 * Messages are delivered on a microtask, in send order; messages sent to a
 * peer that is not connected yet are queued until it connects.
 *
 * @example
 * ```typescript
 * const [actorSide, learnerSide] = InMemoryTransport.createPair();
 * learnerSide.onEvent((e) => {
 *   if (e.type === 'message') console.log('learner received', e.data);
 * });
 * await actorSide.connect();
 * await learnerSide.connect();
 * actorSide.send('{"type":"experience"}');
 * ```
 */
export class InMemoryTransport extends BaseTransport {
    private peer: InMemoryTransport | null = null;
    private messageQueue: string[] = [];
    private dropped = 0;
    private everConnected = false;

    constructor(options: TransportOptions = {}) {
        super({ name: 'memory', ...options });
    }

    /**
     * Create a connected pair of transports
     *
     * @returns Tuple of [a, b] transports
     */
    static createPair(options: { names?: [string, string] } & Omit<TransportOptions, 'name'> = {}): [
        InMemoryTransport,
        InMemoryTransport,
    ] {
        const [nameA, nameB] = options.names ?? ['memory-a', 'memory-b'];
        const a = new InMemoryTransport({ logger: options.logger, name: nameA });
        const b = new InMemoryTransport({ logger: options.logger, name: nameB });
        a.peer = b;
        b.peer = a;
        return [a, b];
    }

    async connect(): Promise<void> {
        if (this.state === 'connected') return;

        this.setState('connecting');
        this.setState('connected');
        this.everConnected = true;
        this.emit({ type: 'connected' });

        this.flushQueue();
    }

    disconnect(): void {
        this.setState('disconnected');
        this.emit({ type: 'disconnected' });
    }

    /**
     * Send a message to the peer
     *
     * @throws {ProtocolError} when this side is not connected or has no peer
     */
    send(message: string): void {
        if (this.state !== 'connected') {
            throw new ProtocolError(`Transport ${this.name} is not connected`);
        }
        if (!this.peer) {
            throw new ProtocolError(`Transport ${this.name} has no peer`);
        }
        this.peer.receiveMessage(message);
    }

    /** Messages that arrived after this side disconnected */
    get droppedCount(): number {
        return this.dropped;
    }

    private receiveMessage(message: string): void {
        if (this.state === 'connected') {
            // microtask delivery keeps ordering deterministic
            queueMicrotask(() => this.deliver(message));
        } else if (this.state === 'disconnected' && this.everConnected) {
            this.dropped++;
        } else {
            this.messageQueue.push(message);
        }
    }

    private deliver(message: string): void {
        if (this.state !== 'connected') {
            this.dropped++;
            return;
        }
        this.emit({ type: 'message', data: message });
    }

    /**
     * Inject a message as if the peer had sent it
     */
    simulateReceive(message: string): void {
        this.receiveMessage(message);
    }

    private flushQueue(): void {
        const queued = this.messageQueue;
        this.messageQueue = [];
        for (const message of queued) {
            queueMicrotask(() => this.deliver(message));
        }
    }
}
