/**
 * Topic Configuration Contract
 *
 * Binds a broker topic name to an optional per-topic filter.
 * Topic configurations are created once at startup and are read-only
 * for the lifetime of the process.
 */

import type { FilterSpecification } from "./FilterSpecification.js";
import { MATCH_ALL_FILTER } from "./FilterSpecification.js";

/**
 * A configured destination topic.
 */
export interface TopicConfiguration {
    /** Topic name on the broker, used as the routing key */
    readonly name: string;

    /** Per-topic filter; `undefined` inherits the global filter */
    readonly filter?: FilterSpecification;
}

/**
 * Where a topic's effective filter came from.
 */
export type FilterOrigin = "topic" | "global" | "default";

/**
 * The filter actually applied to a topic, with its origin.
 */
export interface EffectiveFilter {
    readonly filter: FilterSpecification;
    readonly origin: FilterOrigin;
}

/**
 * Create a frozen topic configuration.
 *
 * @param name - Topic name
 * @param filter - Optional per-topic filter
 */
export function createTopicConfiguration(name: string, filter?: FilterSpecification): TopicConfiguration {
    return Object.freeze(filter ? { name, filter } : { name });
}

/**
 * Resolve the effective filter of a topic.
 *
 * A per-topic filter fully replaces the global one (no merging).
 * Without either, the always-match filter applies.
 *
 * @param topic - Topic configuration
 * @param globalFilter - Root-level filter, if configured
 */
export function resolveEffectiveFilter(
    topic: TopicConfiguration,
    globalFilter?: FilterSpecification
): EffectiveFilter {
    if (topic.filter) {
        return { filter: topic.filter, origin: "topic" };
    }

    if (globalFilter) {
        return { filter: globalFilter, origin: "global" };
    }

    return { filter: MATCH_ALL_FILTER, origin: "default" };
}
