import { EventEmitter } from 'events';
import { createLogger } from '../../utils/logger.js';
import { toError } from '../../utils/errors.js';

const logger = createLogger('FailoverEventBus');

/**
 * Every notification the failover services publish
 */
export type FailoverEvent =
    | { type: 'connection:healthy'; connectionName: string }
    | { type: 'primary:down'; connectionName: string }
    | { type: 'failover:down'; connectionName: string }
    | { type: 'primary:restored'; connectionName: string }
    | { type: 'failover:restored'; connectionName: string }
    | { type: 'switched:primary'; previousConnectionName: string | null; connectionName: string }
    | { type: 'switched:failover'; previousConnectionName: string | null; connectionName: string }
    | { type: 'limited-mode:activated'; connectionName: string }
    | { type: 'limited-mode:exited'; connectionName: string }
    | { type: 'cache:unavailable'; error: Error }
    | { type: 'health-check:started'; connections: string[] }
    | { type: 'health-check:finished'; connections: string[]; success: boolean };

export type FailoverEventType = FailoverEvent['type'];

export type FailoverEventOf<K extends FailoverEventType> = Extract<FailoverEvent, { type: K }>;

/**
 * Pub/sub sink the core publishes into
 */
export interface NotificationSink {
    dispatch(event: FailoverEvent): void;
}

/**
 * In-process event bus.
 *
 * Each event is emitted under its own `type` and again on the catch-all
 * `event` channel. Listener failures are logged and stay on the bus.
 */
export class FailoverEventBus extends EventEmitter implements NotificationSink {
    public dispatch(event: FailoverEvent): void {
        this.safeEmit(event.type, event);
        this.safeEmit('event', event);
    }

    /**
     * Typed subscription to one event kind
     */
    public onEvent<K extends FailoverEventType>(
        type: K,
        listener: (event: FailoverEventOf<K>) => void
    ): this {
        return this.on(type, listener);
    }

    /**
     * Subscription to every event
     */
    public onAny(listener: (event: FailoverEvent) => void): this {
        return this.on('event', listener);
    }

    private safeEmit(channel: string, event: FailoverEvent): void {
        try {
            this.emit(channel, event);
        } catch (error) {
            logger.error(`Listener for '${event.type}' on '${channel}' threw: ${toError(error).message}`);
        }
    }
}
