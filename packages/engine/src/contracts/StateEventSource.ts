/**
 * State Event Source Contract
 *
 * Sources push state-change events from the state bus into the engine.
 * Unlike a polled provider, a source owns its own read loop and calls the
 * listener once per event, in arrival order.
 */

import type { StateChangeEvent } from "./StateChangeEvent.js";

/**
 * Callback invoked for every inbound event.
 * A source waits for the returned promise before delivering the next event.
 */
export type StateChangeListener = (event: StateChangeEvent) => void | Promise<void>;

/**
 * StateEventSource interface.
 *
 * @example
 * ```typescript
 * class ReplaySource implements StateEventSource {
 *     readonly id = "replay";
 *     readonly name = "Replay Source";
 *
 *     constructor(private readonly events: StateChangeEvent[]) {}
 *
 *     async start(listener: StateChangeListener) {
 *         for (const event of this.events) {
 *             await listener(event);
 *         }
 *     }
 *
 *     async stop() {}
 * }
 * ```
 */
export interface StateEventSource {
    /** Unique identifier for this source */
    readonly id: string;

    /** Human-readable name */
    readonly name: string;

    /**
     * Begin delivering events to the listener.
     *
     * @param listener - Called once per event
     */
    start(listener: StateChangeListener): Promise<void>;

    /**
     * Stop delivering events and release the underlying stream.
     * Resolves after the last in-flight event has been handled.
     */
    stop(): Promise<void>;
}
