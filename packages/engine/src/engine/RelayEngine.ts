/**
 * @fileoverview RelayEngine
 *
 * Relays state changes from the state bus to broker topics.
 *
 * Pipeline flow:
 * 1. Event received from the source
 * 2. Admission: removed / unknown / unavailable states are dropped
 * 3. Every topic's effective filter is evaluated
 * 4. The state is serialized once and published to each matching topic
 *
 * Design principles:
 * - Broker-agnostic: publishing goes through the Publisher contract
 * - Immutable configuration: effective filters are compiled at construction
 * - Isolated topics: one topic failing never stops the others
 * - Observable: emits events at each lifecycle stage
 *
 * @module @staterelay/engine/engine/RelayEngine
 */

import { ConfigurationError } from "../contracts/ConfigurationError.js";
import type { EventBus, RelayEvent, RelayEventType, SkipReason } from "../contracts/EventBus.js";
import { createEvent } from "../contracts/EventBus.js";
import type { FilterSpecification } from "../contracts/FilterSpecification.js";
import { describeFilter } from "../contracts/FilterSpecification.js";
import type { Publisher } from "../contracts/Publisher.js";
import type { RelayLogger } from "../contracts/RelayLogger.js";
import type { StateChangeEvent } from "../contracts/StateChangeEvent.js";
import type { StateEventSource } from "../contracts/StateEventSource.js";
import type { TopicConfiguration } from "../contracts/TopicConfiguration.js";
import { createConsoleLogger } from "../impl/ConsoleLogger.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import type { ResolvedTopic, TopicDecision, TopicDelivery } from "./dispatch.js";
import { admitEvent, decideTopics, publishToTopics, resolveTopics } from "./dispatch.js";
import type { StateSerializer } from "./serializeState.js";
import { serializeState } from "./serializeState.js";

/**
 * Engine configuration options.
 */
export interface RelayEngineConfig {
    /** Destination topics, in configuration order */
    readonly topics: readonly TopicConfiguration[];

    /** Filter for topics without their own */
    readonly globalFilter?: FilterSpecification;

    /** Broker collaborator */
    readonly publisher: Publisher;

    /** Optional event source; without one, call handleEvent() directly */
    readonly source?: StateEventSource;

    /** Payload encoder (default: UTF-8 JSON) */
    readonly serializer?: StateSerializer;

    /** Custom EventBus (default: InMemoryEventBus) */
    readonly eventBus?: EventBus;

    /** Logger for engine operations */
    readonly logger?: RelayLogger;
}

/**
 * What happened to one inbound event.
 */
export interface DispatchReport {
    readonly traceId: string;
    readonly entityId: string;

    /** Set when the event was dropped before publishing */
    readonly skipped?: SkipReason;

    /** Per-topic filter decisions, in configuration order */
    readonly decisions: readonly TopicDecision[];

    /** Publish attempts, one per matching topic */
    readonly deliveries: readonly TopicDelivery[];
}

/**
 * Generate a unique trace ID for event processing.
 */
function generateTraceId(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 8);
    return `tr_${timestamp}_${random}`;
}

/**
 * RelayEngine - fans state changes out to filtered topics.
 *
 * @example
 * ```typescript
 * const engine = new RelayEngine({
 *     topics      : parseTopicDefinitions(config.topics),
 *     globalFilter: parseGlobalFilter(config.filter),
 *     publisher   : new KafkaPublisher({ broker }),
 *     source      : new JsonLinesEventSource(),
 * });
 *
 * engine.eventBus.subscribe("topic:failed", (event) => {
 *     console.warn("Publish failed:", event.data);
 * });
 *
 * await engine.start();
 * ```
 */
export class RelayEngine {
    private readonly publisher: Publisher;
    private readonly source?: StateEventSource;
    private readonly serializer: StateSerializer;
    private readonly logger: RelayLogger;
    private readonly resolvedTopics: readonly ResolvedTopic[];
    private running = false;

    /** Public access to the event bus for external subscriptions */
    public readonly eventBus: EventBus;

    /**
     * @throws ConfigurationError if no topics are given or a name repeats
     */
    constructor(config: RelayEngineConfig) {
        assertTopicNames(config.topics);

        this.logger = config.logger ?? createConsoleLogger({ prefix: "RelayEngine" });
        this.eventBus = config.eventBus ?? new InMemoryEventBus(this.logger);
        this.publisher = config.publisher;
        this.source = config.source;
        this.serializer = config.serializer ?? serializeState;
        this.resolvedTopics = Object.freeze(resolveTopics(config.topics, config.globalFilter));

        for (const topic of this.resolvedTopics) {
            this.logger.info("Topic configured", {
                topic : topic.name,
                origin: topic.origin,
                filter: describeFilter(topic.filter.source),
            });
        }
    }

    /**
     * Topic names in configuration order.
     */
    get topics(): readonly string[] {
        return this.resolvedTopics.map((topic) => topic.name);
    }

    /**
     * Check if the engine is running.
     */
    get isRunning(): boolean {
        return this.running;
    }

    /**
     * Start the engine.
     *
     * Connects the publisher, then starts the source.
     *
     * @throws Error if the publisher or source fails to start
     */
    async start(): Promise<void> {
        if (this.running) {
            this.logger.warn("Engine already running");
            return;
        }

        this.emit(createEvent("engine:starting", { topics: this.topics }));
        this.logger.info("Engine starting...");

        try {
            if (this.publisher.initialize) {
                await this.publisher.initialize();
            }
            this.logger.info("Publisher initialized", { publisherId: this.publisher.id });
        }
        catch (error) {
            this.reportFailure("initialize", "Publisher initialization failed", error);
            throw error;
        }

        this.running = true;

        if (this.source) {
            try {
                await this.source.start(async (event) => {
                    await this.handleEvent(event);
                });
            }
            catch (error) {
                this.running = false;
                this.reportFailure("source", "Source failed to start", error);
                await this.shutdownPublisher();
                throw error;
            }
        }

        this.emit(createEvent("engine:started", {
            topics     : this.topics,
            publisherId: this.publisher.id,
            sourceId   : this.source?.id,
        }));

        this.logger.info("Engine started", {
            topics  : this.resolvedTopics.length,
            sourceId: this.source?.id,
        });
    }

    /**
     * Stop the engine.
     *
     * Stops the source first so in-flight events finish, then disconnects
     * the publisher. Errors are logged, not thrown.
     */
    async stop(): Promise<void> {
        if (!this.running) {
            return;
        }

        this.emit(createEvent("engine:stopping", { topics: this.topics }));
        this.logger.info("Engine stopping...");

        this.running = false;

        if (this.source) {
            try {
                await this.source.stop();
            }
            catch (error) {
                this.reportFailure("source", "Source stop error", error);
            }
        }

        await this.shutdownPublisher();

        this.emit(createEvent("engine:stopped", { topics: this.topics }));
        this.logger.info("Engine stopped");
    }

    /**
     * Relay one state change.
     *
     * Never throws: admission skips, serialization failures and publish
     * failures are all reported in the returned DispatchReport.
     *
     * @param event - Inbound state change
     */
    async handleEvent(event: StateChangeEvent): Promise<DispatchReport> {
        const traceId = generateTraceId();
        const startTime = Date.now();
        const admission = admitEvent(event);
        const entityId = admission.entityId;

        this.emit(createEvent("event:received", { entityId }, traceId));

        if (!admission.admitted) {
            return this.skip(traceId, entityId, admission.reason, []);
        }

        const decisions = decideTopics(entityId, this.resolvedTopics);
        const matched = decisions.filter((decision) => decision.shouldPublish).map((decision) => decision.topic);

        this.logger.debug("Topics evaluated", {
            entityId,
            traceId,
            decisions: decisions.map((decision) => `${decision.topic}:${decision.rule}`),
        });

        if (matched.length === 0) {
            this.emit(createEvent("event:dispatched", {
                entityId,
                matched : [],
                failed  : [],
                duration: Date.now() - startTime,
            }, traceId));
            return { traceId, entityId, decisions, deliveries: [] };
        }

        let payload: Buffer;
        try {
            payload = this.serializer(admission.state);
        }
        catch (error) {
            this.logger.error("State serialization failed", {
                entityId,
                traceId,
                error: error instanceof Error ? error.message : String(error),
            });
            return this.skip(traceId, entityId, "unserializable", decisions);
        }

        const deliveries = await publishToTopics(matched, payload, this.publisher);
        const failed: string[] = [];

        for (const delivery of deliveries) {
            if (delivery.success) {
                this.emit(createEvent("topic:published", { entityId, topic: delivery.topic }, traceId));
                continue;
            }

            const error = delivery.error ?? "unknown publish error";
            failed.push(delivery.topic);

            this.emit(createEvent("topic:failed", { entityId, topic: delivery.topic, error }, traceId));

            if (delivery.threw) {
                this.logger.error("Publish error", { entityId, topic: delivery.topic, traceId, error });
            }
            else {
                this.logger.warn("Publish failed", { entityId, topic: delivery.topic, traceId, error });
            }
        }

        const duration = Date.now() - startTime;
        this.emit(createEvent("event:dispatched", { entityId, matched, failed, duration }, traceId));

        this.logger.debug("Event dispatched", {
            entityId,
            traceId,
            matched,
            failed,
            duration,
        });

        return { traceId, entityId, decisions, deliveries };
    }

    private skip(
        traceId: string,
        entityId: string,
        reason: SkipReason,
        decisions: readonly TopicDecision[]
    ): DispatchReport {
        this.emit(createEvent("event:skipped", { entityId, reason }, traceId));
        this.logger.debug("Event skipped", { entityId, reason, traceId });
        return { traceId, entityId, skipped: reason, decisions, deliveries: [] };
    }

    private async shutdownPublisher(): Promise<void> {
        try {
            if (this.publisher.shutdown) {
                await this.publisher.shutdown();
            }
        }
        catch (error) {
            this.reportFailure("shutdown", "Publisher shutdown error", error);
        }
    }

    private reportFailure(
        stage: "initialize" | "shutdown" | "source",
        message: string,
        error: unknown
    ): void {
        const description = error instanceof Error ? error.message : String(error);

        this.logger.error(message, { publisherId: this.publisher.id, error: description });
        this.emit(createEvent("engine:error", { stage, error: description }));
    }

    /**
     * Emit an event to the event bus.
     */
    private emit<K extends RelayEventType>(event: RelayEvent<K>): void {
        this.eventBus.emit(event);
    }
}

/**
 * Topic names must be present and unique; a duplicate would publish the
 * same event twice to one topic.
 */
function assertTopicNames(topics: readonly TopicConfiguration[]): void {
    if (topics.length === 0) {
        throw new ConfigurationError("topics", "at least one topic is required");
    }

    const seen = new Set<string>();
    topics.forEach((topic, index) => {
        if (topic.name.trim() === "") {
            throw new ConfigurationError(`topics[${index}].topic`, "expected a non-empty string");
        }
        if (seen.has(topic.name)) {
            throw new ConfigurationError(`topics[${index}].topic`, `duplicate topic '${topic.name}'`);
        }
        seen.add(topic.name);
    });
}
