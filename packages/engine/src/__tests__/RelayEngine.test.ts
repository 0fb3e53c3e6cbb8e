/**
 * @fileoverview Unit tests for RelayEngine
 *
 * Tests cover:
 * - Engine lifecycle (start/stop) with publisher and source
 * - Admission skips
 * - Fan-out with a single serialization per event
 * - Per-topic failure isolation
 * - Event emission
 * - Configuration errors
 *
 * @module @staterelay/engine/__tests__/RelayEngine
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { RelayEngine } from "../engine/RelayEngine.js";
import { serializeState } from "../engine/serializeState.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import { ConfigurationError } from "../contracts/ConfigurationError.js";
import { createFilterSpecification } from "../contracts/FilterSpecification.js";
import { createTopicConfiguration } from "../contracts/TopicConfiguration.js";
import type { RelayEvent } from "../contracts/EventBus.js";
import type { Publisher, PublishResult } from "../contracts/Publisher.js";
import type { RelayLogger } from "../contracts/RelayLogger.js";
import type { EntityState, StateChangeEvent } from "../contracts/StateChangeEvent.js";
import type { StateChangeListener, StateEventSource } from "../contracts/StateEventSource.js";

/**
 * Create a state_changed event for testing
 */
function createStateChange(entityId: string, state: string | null = "on"): StateChangeEvent {
    const newState: EntityState | null = state === null ? null : {
        entity_id   : entityId,
        state,
        attributes  : { friendly_name: entityId },
        last_changed: "2025-01-15T10:00:00.000Z",
        last_updated: "2025-01-15T10:00:00.000Z",
    };

    return { entity_id: entityId, old_state: null, new_state: newState };
}

/**
 * Create a mock publisher; topics listed in `failing` report a failure
 */
function createMockPublisher(failing: string[] = []) {
    return {
        id        : "mock-publisher",
        initialize: vi.fn(async (): Promise<void> => undefined),
        shutdown  : vi.fn(async (): Promise<void> => undefined),
        publish   : vi.fn(async (topic: string, _payload: Buffer): Promise<PublishResult> => (
            failing.includes(topic)
                ? { topic, success: false, error: "broker unavailable" }
                : { topic, success: true }
        )),
    } satisfies Publisher;
}

/**
 * Create a mock source that hands events to the engine on demand
 */
function createMockSource() {
    let listener: StateChangeListener | undefined;

    const source = {
        id   : "mock-source",
        name : "Mock Source",
        start: vi.fn(async (handler: StateChangeListener): Promise<void> => {
            listener = handler;
        }),
        stop : vi.fn(async (): Promise<void> => undefined),
    } satisfies StateEventSource;

    return {
        source,
        push: async (event: StateChangeEvent): Promise<void> => {
            if (listener) {
                await listener(event);
            }
        },
    };
}

function createMockLogger(): RelayLogger {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

const kTOPICS = [
    createTopicConfiguration("everything"),
    createTopicConfiguration("dusk", createFilterSpecification({ include_entities: ["sensor.sun_next_dusk"] })),
];

describe("RelayEngine", () => {
    let logger: RelayLogger;
    let eventBus: InMemoryEventBus;
    let events: RelayEvent[];

    beforeEach(() => {
        logger = createMockLogger();
        eventBus = new InMemoryEventBus(logger);
        events = [];
        eventBus.subscribeAll((event) => {
            events.push(event);
        });
    });

    describe("construction", () => {
        it("should expose topic names in configuration order", () => {
            const engine = new RelayEngine({ topics: kTOPICS, publisher: createMockPublisher(), eventBus, logger });

            expect(engine.topics).toEqual(["everything", "dusk"]);
            expect(engine.isRunning).toBe(false);
        });

        it("should log the effective filter of each topic", () => {
            const globalFilter = createFilterSpecification({ exclude_domains: ["automation"] });

            new RelayEngine({ topics: kTOPICS, globalFilter, publisher: createMockPublisher(), eventBus, logger });

            expect(logger.info).toHaveBeenCalledWith("Topic configured", {
                topic : "everything",
                origin: "global",
                filter: { exclude_domains: ["automation"] },
            });
            expect(logger.info).toHaveBeenCalledWith("Topic configured", {
                topic : "dusk",
                origin: "topic",
                filter: { include_entities: ["sensor.sun_next_dusk"] },
            });
        });

        it("should reject an empty topic list", () => {
            expect(() => new RelayEngine({ topics: [], publisher: createMockPublisher(), logger }))
                .toThrow(ConfigurationError);
        });

        // Scenario: Duplicate topic names would double-publish
        it("should reject duplicate topic names", () => {
            const topics = [createTopicConfiguration("dusk"), createTopicConfiguration("dusk")];

            expect(() => new RelayEngine({ topics, publisher: createMockPublisher(), logger }))
                .toThrow("topics[1].topic: duplicate topic 'dusk'");
        });
    });

    describe("lifecycle", () => {
        it("should initialize the publisher and start the source", async () => {
            const publisher = createMockPublisher();
            const { source } = createMockSource();
            const engine = new RelayEngine({ topics: kTOPICS, publisher, source, eventBus, logger });

            await engine.start();

            expect(publisher.initialize).toHaveBeenCalledTimes(1);
            expect(source.start).toHaveBeenCalledTimes(1);
            expect(engine.isRunning).toBe(true);
            expect(events.map((event) => event.type)).toEqual(["engine:starting", "engine:started"]);
            expect(events[1]?.data).toEqual({
                topics     : ["everything", "dusk"],
                publisherId: "mock-publisher",
                sourceId   : "mock-source",
            });
        });

        it("should warn when started twice", async () => {
            const publisher = createMockPublisher();
            const engine = new RelayEngine({ topics: kTOPICS, publisher, eventBus, logger });

            await engine.start();
            await engine.start();

            expect(publisher.initialize).toHaveBeenCalledTimes(1);
            expect(logger.warn).toHaveBeenCalledWith("Engine already running");
        });

        it("should stop the source before shutting down the publisher", async () => {
            const calls: string[] = [];
            const publisher = createMockPublisher();
            const { source } = createMockSource();
            publisher.shutdown.mockImplementation(async () => {
                calls.push("publisher");
            });
            source.stop.mockImplementation(async () => {
                calls.push("source");
            });
            const engine = new RelayEngine({ topics: kTOPICS, publisher, source, eventBus, logger });

            await engine.start();
            await engine.stop();

            expect(calls).toEqual(["source", "publisher"]);
            expect(engine.isRunning).toBe(false);
            expect(events.map((event) => event.type)).toEqual([
                "engine:starting",
                "engine:started",
                "engine:stopping",
                "engine:stopped",
            ]);
        });

        it("should do nothing when stopped before starting", async () => {
            const publisher = createMockPublisher();
            const engine = new RelayEngine({ topics: kTOPICS, publisher, eventBus, logger });

            await engine.stop();

            expect(publisher.shutdown).not.toHaveBeenCalled();
            expect(events).toEqual([]);
        });

        // Scenario: Publisher initialization failure is fatal
        it("should rethrow a publisher initialization failure", async () => {
            const publisher = createMockPublisher();
            publisher.initialize.mockRejectedValue(new Error("connection refused"));
            const engine = new RelayEngine({ topics: kTOPICS, publisher, eventBus, logger });

            await expect(engine.start()).rejects.toThrow("connection refused");

            expect(engine.isRunning).toBe(false);
            expect(events.map((event) => event.type)).toEqual(["engine:starting", "engine:error"]);
            expect(events[1]?.data).toEqual({ stage: "initialize", error: "connection refused" });
        });

        it("should shut down the publisher when the source fails to start", async () => {
            const publisher = createMockPublisher();
            const { source } = createMockSource();
            source.start.mockRejectedValue(new Error("stream closed"));
            const engine = new RelayEngine({ topics: kTOPICS, publisher, source, eventBus, logger });

            await expect(engine.start()).rejects.toThrow("stream closed");

            expect(engine.isRunning).toBe(false);
            expect(publisher.shutdown).toHaveBeenCalledTimes(1);
        });

        it("should log, not throw, a publisher shutdown failure", async () => {
            const publisher = createMockPublisher();
            publisher.shutdown.mockRejectedValue(new Error("already closed"));
            const engine = new RelayEngine({ topics: kTOPICS, publisher, eventBus, logger });

            await engine.start();
            await expect(engine.stop()).resolves.toBeUndefined();

            expect(logger.error).toHaveBeenCalledWith("Publisher shutdown error", {
                publisherId: "mock-publisher",
                error      : "already closed",
            });
        });
    });

    describe("handleEvent", () => {
        // Scenario: Fan-out to both topics
        it("should publish a matching event to every matching topic", async () => {
            const publisher = createMockPublisher();
            const engine = new RelayEngine({ topics: kTOPICS, publisher, eventBus, logger });

            const report = await engine.handleEvent(createStateChange("sensor.sun_next_dusk"));

            expect(report.entityId).toBe("sensor.sun_next_dusk");
            expect(report.skipped).toBeUndefined();
            expect(report.deliveries.map((delivery) => delivery.topic)).toEqual(["everything", "dusk"]);
            expect(publisher.publish).toHaveBeenCalledTimes(2);
        });

        it("should only publish to topics whose filter matches", async () => {
            const publisher = createMockPublisher();
            const engine = new RelayEngine({ topics: kTOPICS, publisher, eventBus, logger });

            await engine.handleEvent(createStateChange("sensor.sun_next_dawn"));

            expect(publisher.publish).toHaveBeenCalledTimes(1);
            expect(publisher.publish).toHaveBeenCalledWith("everything", expect.any(Buffer));
        });

        // Scenario: Serialize once, publish the same bytes everywhere
        it("should serialize the new state once per event", async () => {
            const publisher = createMockPublisher();
            const serializer = vi.fn(serializeState);
            const engine = new RelayEngine({ topics: kTOPICS, publisher, serializer, eventBus, logger });
            const event = createStateChange("sensor.sun_next_dusk");

            await engine.handleEvent(event);

            expect(serializer).toHaveBeenCalledTimes(1);
            expect(serializer).toHaveBeenCalledWith(event.new_state);

            const firstPayload = publisher.publish.mock.calls[0]?.[1];
            const secondPayload = publisher.publish.mock.calls[1]?.[1];
            expect(firstPayload).toBe(secondPayload);
            expect(firstPayload?.toString("utf-8")).toBe(JSON.stringify(event.new_state));
        });

        it("should skip placeholder states without publishing", async () => {
            const publisher = createMockPublisher();
            const engine = new RelayEngine({ topics: kTOPICS, publisher, eventBus, logger });

            const report = await engine.handleEvent(createStateChange("sensor.sun_next_dusk", "unavailable"));

            expect(report.skipped).toBe("state_unavailable");
            expect(report.deliveries).toEqual([]);
            expect(publisher.publish).not.toHaveBeenCalled();
            expect(events.map((event) => event.type)).toEqual(["event:received", "event:skipped"]);
            expect(events[1]?.data).toEqual({ entityId: "sensor.sun_next_dusk", reason: "state_unavailable" });
        });

        it("should skip removed entities", async () => {
            const engine = new RelayEngine({ topics: kTOPICS, publisher: createMockPublisher(), eventBus, logger });

            const report = await engine.handleEvent(createStateChange("light.kitchen", null));

            expect(report.skipped).toBe("entity_removed");
            expect(report.entityId).toBe("light.kitchen");
        });

        it("should report an event that matches no topic", async () => {
            const publisher = createMockPublisher();
            const topics = [createTopicConfiguration("lights", createFilterSpecification({ include_domains: ["light"] }))];
            const engine = new RelayEngine({ topics, publisher, eventBus, logger });

            const report = await engine.handleEvent(createStateChange("sensor.sun_next_dusk"));

            expect(report.decisions).toEqual([{ topic: "lights", shouldPublish: false, rule: "default_deny" }]);
            expect(report.deliveries).toEqual([]);
            expect(publisher.publish).not.toHaveBeenCalled();
            expect(events.map((event) => event.type)).toEqual(["event:received", "event:dispatched"]);
        });

        it("should skip a state that cannot be serialized", async () => {
            const publisher = createMockPublisher();
            const serializer = vi.fn((): Buffer => {
                throw new TypeError("Do not know how to serialize a BigInt");
            });
            const engine = new RelayEngine({ topics: kTOPICS, publisher, serializer, eventBus, logger });

            const report = await engine.handleEvent(createStateChange("sensor.sun_next_dusk"));

            expect(report.skipped).toBe("unserializable");
            expect(report.decisions).toHaveLength(2);
            expect(publisher.publish).not.toHaveBeenCalled();
        });

        // Scenario: A failing topic does not stop delivery to the others
        it("should isolate a failed topic from the other topics", async () => {
            const publisher = createMockPublisher(["everything"]);
            const engine = new RelayEngine({ topics: kTOPICS, publisher, eventBus, logger });

            const report = await engine.handleEvent(createStateChange("sensor.sun_next_dusk"));

            expect(report.deliveries).toEqual([
                { topic: "everything", success: false, error: "broker unavailable", threw: false },
                { topic: "dusk", success: true, threw: false },
            ]);
            expect(logger.warn).toHaveBeenCalledWith("Publish failed", {
                entityId: "sensor.sun_next_dusk",
                topic   : "everything",
                traceId : report.traceId,
                error   : "broker unavailable",
            });
        });

        it("should isolate a publisher that throws", async () => {
            const publisher = createMockPublisher();
            publisher.publish.mockImplementation(async (topic: string): Promise<PublishResult> => {
                if (topic === "everything") {
                    throw new Error("connection reset");
                }
                return { topic, success: true };
            });
            const engine = new RelayEngine({ topics: kTOPICS, publisher, eventBus, logger });

            const report = await engine.handleEvent(createStateChange("sensor.sun_next_dusk"));

            expect(report.deliveries[1]).toEqual({ topic: "dusk", success: true, threw: false });
            expect(logger.error).toHaveBeenCalledWith("Publish error", {
                entityId: "sensor.sun_next_dusk",
                topic   : "everything",
                traceId : report.traceId,
                error   : "connection reset",
            });
        });

        it("should emit per-topic and dispatch events with the trace id", async () => {
            const publisher = createMockPublisher(["dusk"]);
            const engine = new RelayEngine({ topics: kTOPICS, publisher, eventBus, logger });

            const report = await engine.handleEvent(createStateChange("sensor.sun_next_dusk"));

            expect(events.map((event) => event.type)).toEqual([
                "event:received",
                "topic:published",
                "topic:failed",
                "event:dispatched",
            ]);
            expect(events.every((event) => event.traceId === report.traceId)).toBe(true);
            expect(report.traceId).toMatch(/^tr_[0-9a-z]+_[0-9a-z]*$/);
            expect(events[2]?.data).toEqual({
                entityId: "sensor.sun_next_dusk",
                topic   : "dusk",
                error   : "broker unavailable",
            });
            expect(events[3]?.data).toMatchObject({
                entityId: "sensor.sun_next_dusk",
                matched : ["everything", "dusk"],
                failed  : ["dusk"],
            });
        });

        it("should handle events delivered by the source", async () => {
            const publisher = createMockPublisher();
            const { source, push } = createMockSource();
            const engine = new RelayEngine({ topics: kTOPICS, publisher, source, eventBus, logger });

            await engine.start();
            await push(createStateChange("sensor.sun_next_dusk"));
            await push(createStateChange("light.kitchen", "unknown"));

            expect(publisher.publish).toHaveBeenCalledTimes(2);
            expect(events.filter((event) => event.type === "event:skipped")).toHaveLength(1);
        });
    });
});
