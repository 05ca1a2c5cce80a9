/**
 * @fileoverview EventBus Contract
 *
 * Per-document outcomes and corpus progress, published to observers such
 * as the CLI progress line or an audit log. Dispatch is synchronous and
 * in emission order; the engine never waits on an observer.
 *
 * @module @scriptorium/engine/contracts/EventBus
 */

export interface EventPayload {
    readonly type: string;

    /** ISO time of emission */
    readonly timestamp: string;

    /** Trace id of the document the event is about */
    readonly traceId?: string;

    readonly data?: Record<string, unknown>;
}

/** Emitted once per corpus run (`corpus:registered` once per registration) */
export type CorpusEventType =
    | "corpus:registered"
    | "corpus:starting"
    | "corpus:completed"
    | "corpus:error";

/** Emitted while a single document moves through the pipeline and sinks */
export type DocumentEventType =
    | "document:received"
    | "document:stage"
    | "document:accepted"
    | "document:rejected"
    | "document:sinkExecuted"
    | "document:sinkError"
    | "document:error";

export type EventType = CorpusEventType | DocumentEventType | (string & {});

/**
 * An async handler's rejection is logged by the bus, never awaited.
 */
export type EventHandler<T extends EventPayload = EventPayload> = (event: T) => void | Promise<void>;

export interface Subscription {
    unsubscribe(): void;
}

export interface EventBus {
    emit(event: EventPayload): void;

    /** `"*"` receives every event, after the type's own handlers */
    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription;

    /** Unsubscribes before the handler runs */
    once(eventType: EventType, handler: EventHandler): Subscription;

    /** Drops one type's handlers; no argument or `"*"` drops all */
    clear(eventType?: EventType | "*"): void;
}

export function createEvent(
    type: EventType,
    data?: Record<string, unknown>,
    traceId?: string
): EventPayload {
    return {
        type,
        timestamp: new Date().toISOString(),
        traceId,
        data,
    };
}
