/**
 * @fileoverview In-Memory EventBus Implementation
 *
 * Synchronous event bus for a single process. The engine creates one
 * per instance, logging handler failures through the engine logger.
 *
 * @module @scriptorium/engine/impl/InMemoryEventBus
 */

import type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    Subscription,
} from "../contracts/EventBus.js";
import { createConsoleLogger, type EngineLogger } from "../logging/ConsoleLogger.js";
import { errorMessage } from "../errors/CurationError.js";

/**
 * Handlers are called on the emitting call stack. A handler that throws
 * or rejects is logged and the remaining handlers still run.
 */
export class InMemoryEventBus implements EventBus {
    private handlers: Map<string, Set<EventHandler>> = new Map();
    private readonly logger: EngineLogger;

    constructor(logger: EngineLogger = createConsoleLogger("[EventBus]")) {
        this.logger = logger;
    }

    /**
     * Dispatch to the type's handlers, then to `"*"`. A handler list is
     * copied before it is walked: a handler removed mid-walk still sees
     * the current event.
     */
    emit(event: EventPayload): void {
        const specificHandlers = this.handlers.get(event.type);
        if (specificHandlers) {
            for (const handler of [...specificHandlers]) {
                this.dispatch(handler, event, event.type);
            }
        }

        const wildcardHandlers = this.handlers.get("*");
        if (wildcardHandlers) {
            for (const handler of [...wildcardHandlers]) {
                this.dispatch(handler, event, "*");
            }
        }
    }

    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription {
        let handlers = this.handlers.get(eventType);
        if (!handlers) {
            handlers = new Set();
            this.handlers.set(eventType, handlers);
        }

        handlers.add(handler);

        return {
            unsubscribe: () => {
                const current = this.handlers.get(eventType);
                if (current) {
                    current.delete(handler);
                    if (current.size === 0) {
                        this.handlers.delete(eventType);
                    }
                }
            },
        };
    }

    once(eventType: EventType, handler: EventHandler): Subscription {
        const wrappedHandler: EventHandler = (event) => {
            subscription.unsubscribe();
            return handler(event);
        };

        const subscription = this.subscribe(eventType, wrappedHandler);
        return subscription;
    }

    clear(eventType?: EventType | "*"): void {
        if (eventType === undefined || eventType === "*") {
            this.handlers.clear();
        }
        else {
            this.handlers.delete(eventType);
        }
    }

    /** Handlers currently registered for one type (or `"*"`) */
    handlerCount(eventType: EventType | "*"): number {
        return this.handlers.get(eventType)?.size ?? 0;
    }

    private dispatch(handler: EventHandler, event: EventPayload, subscribedTo: string): void {
        try {
            const result = handler(event);
            if (result instanceof Promise) {
                result.catch((error: unknown) => {
                    this.logger.error("Async event handler failed", {
                        eventType: event.type,
                        subscribedTo,
                        error    : errorMessage(error),
                    });
                });
            }
        }
        catch (error) {
            this.logger.error("Event handler failed", {
                eventType: event.type,
                subscribedTo,
                error    : errorMessage(error),
            });
        }
    }
}
