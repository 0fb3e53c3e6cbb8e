/**
 * @fileoverview EventBus Contract
 *
 * Defines the contract for internal event flow within the relay engine.
 * Events make lifecycle and dispatch outcomes observable without the
 * engine knowing who is listening.
 *
 * Design decisions:
 * - Synchronous emission (handlers must not block dispatch)
 * - Every event type has a typed data shape
 * - Ordering is preserved within a single event type
 *
 * @module @staterelay/engine/contracts/EventBus
 */

/**
 * Why an event was dropped before filtering.
 */
export type SkipReason =
    | "entity_removed"
    | "state_unknown"
    | "state_unavailable"
    | "state_empty"
    | "unserializable";

/**
 * Data carried by each engine event type.
 */
export interface RelayEventDataMap {
    "engine:starting": { readonly topics: readonly string[] };
    "engine:started": { readonly topics: readonly string[]; readonly publisherId: string; readonly sourceId?: string };
    "engine:stopping": { readonly topics: readonly string[] };
    "engine:stopped": { readonly topics: readonly string[] };
    "engine:error": { readonly stage: "initialize" | "shutdown" | "source"; readonly error: string };
    "event:received": { readonly entityId: string };
    "event:skipped": { readonly entityId: string; readonly reason: SkipReason };
    "topic:published": { readonly entityId: string; readonly topic: string };
    "topic:failed": { readonly entityId: string; readonly topic: string; readonly error: string };
    "event:dispatched": {
        readonly entityId: string;
        readonly matched: readonly string[];
        readonly failed: readonly string[];
        readonly duration: number;
    };
}

/**
 * All known event types.
 */
export type RelayEventType = keyof RelayEventDataMap;

/**
 * Event payload emitted on the bus.
 */
export interface RelayEvent<K extends RelayEventType = RelayEventType> {
    /** Event type identifier */
    readonly type: K;

    /** ISO timestamp when event was emitted */
    readonly timestamp: string;

    /** Trace ID of the state change being dispatched */
    readonly traceId?: string;

    /** Event-specific data */
    readonly data: RelayEventDataMap[K];
}

/**
 * Event handler function signature.
 */
export type RelayEventHandler<K extends RelayEventType = RelayEventType> =
    (event: RelayEvent<K>) => void | Promise<void>;

/**
 * Subscription handle returned when subscribing to events.
 */
export interface Subscription {
    /** Unsubscribe from the event */
    unsubscribe(): void;
}

/**
 * EventBus interface.
 *
 * @example
 * ```typescript
 * const bus: EventBus = new InMemoryEventBus();
 *
 * const sub = bus.subscribe("topic:failed", (event) => {
 *     console.log(`${event.data.topic} rejected ${event.data.entityId}`);
 * });
 *
 * bus.emit(createEvent("topic:failed", {
 *     entityId: "sensor.sun_next_dusk",
 *     topic   : "dusk",
 *     error   : "broker unavailable",
 * }));
 *
 * sub.unsubscribe();
 * ```
 */
export interface EventBus {
    /**
     * Emit an event to all subscribers of its type and to wildcard subscribers.
     *
     * @param event - The event payload to emit
     */
    emit<K extends RelayEventType>(event: RelayEvent<K>): void;

    /**
     * Subscribe to events of a specific type.
     *
     * @param eventType - The event type to subscribe to
     * @param handler - Handler function called when event is emitted
     * @returns Subscription handle for unsubscribing
     */
    subscribe<K extends RelayEventType>(eventType: K, handler: RelayEventHandler<K>): Subscription;

    /**
     * Subscribe to every event regardless of type.
     *
     * @param handler - Handler function called for each event
     * @returns Subscription handle for unsubscribing
     */
    subscribeAll(handler: RelayEventHandler): Subscription;

    /**
     * Subscribe to events of a specific type, auto-unsubscribe after first event.
     *
     * @param eventType - The event type to subscribe to
     * @param handler - Handler function called when event is emitted
     * @returns Subscription handle for manual unsubscription if needed
     */
    once<K extends RelayEventType>(eventType: K, handler: RelayEventHandler<K>): Subscription;

    /**
     * Remove subscriptions for one event type, for wildcard subscribers ("*"),
     * or for everything when called without an argument.
     */
    clear(eventType?: RelayEventType | "*"): void;
}

/**
 * Factory function to create an event payload.
 *
 * @param type - Event type
 * @param data - Event data
 * @param traceId - Optional trace ID
 * @returns Event payload with timestamp
 */
export function createEvent<K extends RelayEventType>(
    type: K,
    data: RelayEventDataMap[K],
    traceId?: string
): RelayEvent<K> {
    return {
        type,
        timestamp: new Date().toISOString(),
        traceId,
        data,
    };
}
