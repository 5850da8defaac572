/**
 * @module distributed/transport
 * @description Message transport between a learner and its actors
 *
 * The sync layer only needs to send strings and receive them as events;
 * any channel (in-memory pair, socket, worker thread port) can implement it.
 */

import { ConsoleLogger, type Logger } from '../core/logging';

// ==================== Transport Interface ====================

export interface TransportOptions {
    /** Endpoint name used in log events */
    name?: string;
    /** Receives handler failures (default: console at warn level) */
    logger?: Logger;
}

export type TransportState = 'disconnected' | 'connecting' | 'connected' | 'error';

export type TransportEventType = 'connected' | 'disconnected' | 'message' | 'error';

export interface TransportEvent {
    type: TransportEventType;
    data?: string;
    error?: Error;
}

export type TransportEventHandler = (event: TransportEvent) => void;

/**
 * Abstract transport interface
 */
export interface Transport {
    /**
     * Connect to the remote endpoint
     * @returns Promise that resolves when connected
     */
    connect(): Promise<void>;

    disconnect(): void;

    /**
     * Send a message
     * @throws {ProtocolError} when not connected
     */
    send(message: string): void;

    onEvent(handler: TransportEventHandler): void;
    offEvent(handler: TransportEventHandler): void;

    isConnected(): boolean;
    getState(): TransportState;
}

// ==================== Base Transport Class ====================

/**
 * Base transport class with handler bookkeeping
 */
export abstract class BaseTransport implements Transport {
    protected state: TransportState = 'disconnected';
    protected eventHandlers: TransportEventHandler[] = [];
    readonly name: string;
    protected readonly logger: Logger;

    constructor(options: TransportOptions = {}) {
        this.name = options.name ?? 'transport';
        this.logger = options.logger ?? new ConsoleLogger('warn');
    }

    abstract connect(): Promise<void>;
    abstract disconnect(): void;
    abstract send(message: string): void;

    onEvent(handler: TransportEventHandler): void {
        this.eventHandlers.push(handler);
    }

    offEvent(handler: TransportEventHandler): void {
        const index = this.eventHandlers.indexOf(handler);
        if (index >= 0) {
            this.eventHandlers.splice(index, 1);
        }
    }

    isConnected(): boolean {
        return this.state === 'connected';
    }

    getState(): TransportState {
        return this.state;
    }

    /**
     * Deliver an event to every handler; one failing handler does not stop the others
     */
    protected emit(event: TransportEvent): void {
        for (const handler of [...this.eventHandlers]) {
            try {
                handler(event);
            } catch (e) {
                this.logger.logEvent({
                    level: 'error',
                    source: this.name,
                    message: `Event handler failed on '${event.type}'`,
                    data: { error: e instanceof Error ? e.message : String(e) },
                });
            }
        }
    }

    protected setState(state: TransportState): void {
        this.state = state;
    }
}
