/**
 * @swarmplan/core — Typed event bus
 *
 * Synchronous dispatch: handlers run in subscription order before emit() returns.
 * With `onHandlerError` set, a throwing handler is reported and the rest still run;
 * without it the error propagates out of emit().
 */

export type EventHandler<T> = (payload: T) => void;

type HandlerTable<Events> = { [K in keyof Events]?: Array<EventHandler<Events[K]>> };

export interface EventBusOptions<Events> {
    onHandlerError?: (error: unknown, event: keyof Events) => void;
}

export class EventBus<Events extends Record<string, unknown>> {
    private handlers: HandlerTable<Events> = {};
    private onHandlerError?: (error: unknown, event: keyof Events) => void;

    constructor(options: EventBusOptions<Events> = {}) {
        this.onHandlerError = options.onHandlerError;
    }

    /** Subscribe; returns an unsubscribe function */
    on<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): () => void {
        const existing = this.handlers[event] ?? [];
        existing.push(handler);
        this.handlers[event] = existing;
        return () => this.off(event, handler);
    }

    off<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): void {
        const existing = this.handlers[event];
        if (existing) {
            const index = existing.indexOf(handler);
            if (index > -1) {
                existing.splice(index, 1);
            }
        }
    }

    emit<K extends keyof Events>(event: K, payload: Events[K]): void {
        const handlers = this.handlers[event] ?? [];
        for (const handler of [...handlers]) {
            if (!this.onHandlerError) {
                handler(payload);
                continue;
            }
            try {
                handler(payload);
            } catch (error) {
                this.onHandlerError(error, event);
            }
        }
    }

    listenerCount(event: keyof Events): number {
        return this.handlers[event]?.length ?? 0;
    }
}
