/**
 * @fileoverview In-Memory EventBus Implementation
 *
 * A synchronous, in-memory event bus for engine observability.
 *
 * @module @staterelay/engine/impl/InMemoryEventBus
 */

import type {
    EventBus,
    RelayEvent,
    RelayEventHandler,
    RelayEventType,
    Subscription,
} from "../contracts/EventBus.js";
import type { RelayLogger } from "../contracts/RelayLogger.js";
import { createConsoleLogger } from "./ConsoleLogger.js";

type Delivery = (event: RelayEvent) => void | Promise<void>;

function isEventOfType<K extends RelayEventType>(event: RelayEvent, eventType: K): event is RelayEvent<K> {
    return event.type === eventType;
}

/**
 * In-memory EventBus implementation.
 *
 * Features:
 * - Synchronous event dispatch
 * - Wildcard subscription via subscribeAll()
 * - One-time subscriptions via once()
 * - Handler failures (thrown or rejected) are logged and isolated
 *
 * @example
 * ```typescript
 * const bus = new InMemoryEventBus();
 *
 * bus.subscribe("topic:published", (event) => {
 *     console.log("Published to", event.data.topic);
 * });
 *
 * bus.emit(createEvent("topic:published", { entityId: "sensor.a", topic: "all" }));
 * ```
 */
export class InMemoryEventBus implements EventBus {
    private readonly handlers: Map<RelayEventType | "*", Set<Delivery>> = new Map();
    private readonly logger: RelayLogger;

    constructor(logger?: RelayLogger) {
        this.logger = logger ?? createConsoleLogger({ prefix: "EventBus" });
    }

    /**
     * Emit an event to all subscribers.
     *
     * Type-specific handlers run first, then wildcard handlers.
     *
     * @param event - The event payload to emit
     */
    emit<K extends RelayEventType>(event: RelayEvent<K>): void {
        const specificHandlers = this.handlers.get(event.type);
        if (specificHandlers) {
            for (const deliver of [...specificHandlers]) {
                this.invoke(deliver, event);
            }
        }

        const wildcardHandlers = this.handlers.get("*");
        if (wildcardHandlers) {
            for (const deliver of [...wildcardHandlers]) {
                this.invoke(deliver, event);
            }
        }
    }

    subscribe<K extends RelayEventType>(eventType: K, handler: RelayEventHandler<K>): Subscription {
        const deliver: Delivery = (event) => {
            if (isEventOfType(event, eventType)) {
                return handler(event);
            }
            return undefined;
        };

        return this.register(eventType, deliver);
    }

    subscribeAll(handler: RelayEventHandler): Subscription {
        return this.register("*", handler);
    }

    once<K extends RelayEventType>(eventType: K, handler: RelayEventHandler<K>): Subscription {
        const subscription = this.subscribe(eventType, (event) => {
            subscription.unsubscribe();
            return handler(event);
        });

        return subscription;
    }

    clear(eventType?: RelayEventType | "*"): void {
        if (eventType === undefined) {
            this.handlers.clear();
        }
        else {
            this.handlers.delete(eventType);
        }
    }

    /**
     * Get the number of handlers for a specific event type.
     * Useful for testing.
     *
     * @param eventType - The event type to check, or "*" for wildcard handlers
     */
    handlerCount(eventType: RelayEventType | "*"): number {
        return this.handlers.get(eventType)?.size ?? 0;
    }

    private register(key: RelayEventType | "*", deliver: Delivery): Subscription {
        let handlers = this.handlers.get(key);
        if (!handlers) {
            handlers = new Set();
            this.handlers.set(key, handlers);
        }
        handlers.add(deliver);

        return {
            unsubscribe: () => {
                const current = this.handlers.get(key);
                if (current) {
                    current.delete(deliver);
                    if (current.size === 0) {
                        this.handlers.delete(key);
                    }
                }
            },
        };
    }

    private invoke(deliver: Delivery, event: RelayEvent): void {
        try {
            const result = deliver(event);
            if (result instanceof Promise) {
                result.catch((error: unknown) => this.reportHandlerError(event.type, error));
            }
        }
        catch (error) {
            // One handler failure shouldn't break the others
            this.reportHandlerError(event.type, error);
        }
    }

    private reportHandlerError(eventType: RelayEventType, error: unknown): void {
        this.logger.error("Event handler error", {
            eventType,
            error: error instanceof Error ? error.message : String(error),
        });
    }
}
