/**
 * @fileoverview Dispatch
 *
 * The stateless core of the relay: decides per topic whether an event
 * passes the topic's effective filter, and fans a serialized payload out
 * to the matching topics with per-topic failure isolation.
 *
 * @module @staterelay/engine/engine/dispatch
 */

import type { EntityReference } from "../contracts/EntityReference.js";
import type { SkipReason } from "../contracts/EventBus.js";
import type { FilterSpecification } from "../contracts/FilterSpecification.js";
import type { Publisher, PublishResult } from "../contracts/Publisher.js";
import type { EntityState, StateChangeEvent } from "../contracts/StateChangeEvent.js";
import type { FilterOrigin, TopicConfiguration } from "../contracts/TopicConfiguration.js";
import { resolveEffectiveFilter } from "../contracts/TopicConfiguration.js";
import type { CompiledFilter, FilterRule } from "../filters/FilterEvaluator.js";
import { compileFilter, explainFilter } from "../filters/FilterEvaluator.js";

/**
 * A topic with its effective filter resolved and compiled.
 */
export interface ResolvedTopic {
    readonly name: string;
    readonly filter: CompiledFilter;
    readonly origin: FilterOrigin;
}

/**
 * Per-topic dispatch decision.
 */
export interface TopicDecision {
    readonly topic: string;
    readonly shouldPublish: boolean;
    readonly rule: FilterRule;
}

/**
 * Publish result plus whether the publisher threw instead of reporting.
 */
export interface TopicDelivery extends PublishResult {
    readonly threw: boolean;
}

/**
 * Outcome of the admission check.
 */
export type Admission =
    | { readonly admitted: true; readonly entityId: EntityReference; readonly state: EntityState }
    | { readonly admitted: false; readonly entityId: EntityReference; readonly reason: SkipReason };

const kSKIPPED_STATES: ReadonlyMap<string, SkipReason> = new Map<string, SkipReason>([
    ["unknown", "state_unknown"],
    ["unavailable", "state_unavailable"],
    ["", "state_empty"],
]);

/**
 * Decide whether an event is relayed at all.
 *
 * Removed entities (`new_state` null) and placeholder states
 * (`unknown`, `unavailable`, empty) are never published.
 */
export function admitEvent(event: StateChangeEvent): Admission {
    const state = event.new_state;

    if (state === null) {
        return { admitted: false, entityId: event.entity_id, reason: "entity_removed" };
    }

    const reason = kSKIPPED_STATES.get(state.state);
    if (reason) {
        return { admitted: false, entityId: state.entity_id, reason };
    }

    return { admitted: true, entityId: state.entity_id, state };
}

/**
 * Resolve and compile the effective filter of every topic.
 *
 * @param topics - Topics in configuration order
 * @param globalFilter - Root-level filter, if any
 */
export function resolveTopics(
    topics: readonly TopicConfiguration[],
    globalFilter?: FilterSpecification
): ResolvedTopic[] {
    return topics.map((topic) => {
        const effective = resolveEffectiveFilter(topic, globalFilter);
        return {
            name  : topic.name,
            filter: compileFilter(effective.filter),
            origin: effective.origin,
        };
    });
}

/**
 * Evaluate an entity against every resolved topic, in order.
 */
export function decideTopics(entityId: EntityReference, topics: readonly ResolvedTopic[]): TopicDecision[] {
    return topics.map((topic) => {
        const decision = explainFilter(entityId, topic.filter);
        return {
            topic        : topic.name,
            shouldPublish: decision.pass,
            rule         : decision.rule,
        };
    });
}

/**
 * Decide, per topic, whether an event should be published.
 *
 * Events that fail admission are published nowhere.
 *
 * @example
 * ```typescript
 * const topics = [
 *     createTopicConfiguration("A"),
 *     createTopicConfiguration("B", createFilterSpecification({ include_entities: ["sensor.sun_next_dusk"] })),
 * ];
 *
 * dispatch(duskEvent, topics);
 * // [{ topic: "A", shouldPublish: true, ... }, { topic: "B", shouldPublish: true, ... }]
 * ```
 */
export function dispatch(
    event: StateChangeEvent,
    topics: readonly TopicConfiguration[],
    globalFilter?: FilterSpecification
): TopicDecision[] {
    const admission = admitEvent(event);
    const decisions = decideTopics(admission.entityId, resolveTopics(topics, globalFilter));

    if (admission.admitted) {
        return decisions;
    }

    return decisions.map((decision) => ({ ...decision, shouldPublish: false }));
}

/**
 * Publish one payload to several topics.
 *
 * Every publish is started before any is awaited, so a slow or failing
 * topic does not hold back the others. Thrown errors and rejections are
 * converted into failed results.
 *
 * @param topics - Topic names, in configuration order
 * @param payload - Serialized event
 * @param publisher - Broker collaborator
 * @returns One delivery per topic, in the same order
 */
export async function publishToTopics(
    topics: readonly string[],
    payload: Buffer,
    publisher: Publisher
): Promise<TopicDelivery[]> {
    return Promise.all(topics.map(async (topic): Promise<TopicDelivery> => {
        try {
            const result = await publisher.publish(topic, payload);
            return { ...result, topic, threw: false };
        }
        catch (error) {
            return {
                topic,
                success: false,
                error  : error instanceof Error ? error.message : String(error),
                threw  : true,
            };
        }
    }));
}
