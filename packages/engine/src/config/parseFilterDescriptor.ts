/**
 * @fileoverview Filter and topic definition parsing
 *
 * Turns untrusted configuration values (usually parsed YAML) into
 * immutable filters and topic configurations. Every problem is reported
 * as a ConfigurationError naming the offending path.
 *
 * @module @staterelay/engine/config/parseFilterDescriptor
 */

import { ConfigurationError } from "../contracts/ConfigurationError.js";
import type { FilterRuleKey, FilterSpecification } from "../contracts/FilterSpecification.js";
import { FILTER_RULE_KEYS, createFilterSpecification } from "../contracts/FilterSpecification.js";
import type { TopicConfiguration } from "../contracts/TopicConfiguration.js";
import { createTopicConfiguration } from "../contracts/TopicConfiguration.js";

const kTOPIC_KEYS: readonly string[] = ["topic", "filter"];

function isMapping(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isFilterRuleKey(key: string): key is FilterRuleKey {
    return FILTER_RULE_KEYS.some((ruleKey) => ruleKey === key);
}

/**
 * Parse one rule list. A single string is accepted as a one-element list.
 */
function parseRuleList(raw: unknown, path: string): string[] {
    const values = typeof raw === "string" ? [raw] : raw;

    if (!Array.isArray(values)) {
        throw new ConfigurationError(path, "expected a string or a list of strings");
    }

    return values.map((value: unknown, index) => {
        if (typeof value !== "string" || value.trim() === "") {
            throw new ConfigurationError(`${path}[${index}]`, "expected a non-empty string");
        }
        return value.trim();
    });
}

/**
 * Parse a filter descriptor.
 *
 * `null` and `{}` both produce the empty (match everything) filter.
 *
 * @param raw - Untrusted value
 * @param path - Location used in error messages, e.g. `topics[0].filter`
 * @throws ConfigurationError on unknown keys or wrong value types
 *
 * @example
 * ```typescript
 * const filter = parseFilterDescriptor({ include_domains: ["sensor"] }, "filter");
 * ```
 */
export function parseFilterDescriptor(raw: unknown, path = "filter"): FilterSpecification {
    if (raw === null || raw === undefined) {
        return createFilterSpecification();
    }

    if (!isMapping(raw)) {
        throw new ConfigurationError(path, "expected a mapping of filter rules");
    }

    const descriptor: { -readonly [K in FilterRuleKey]?: string[] } = {};

    for (const [key, value] of Object.entries(raw)) {
        if (!isFilterRuleKey(key)) {
            throw new ConfigurationError(
                `${path}.${key}`,
                `unknown filter rule (expected one of ${FILTER_RULE_KEYS.join(", ")})`
            );
        }

        if (value === null || value === undefined) {
            continue;
        }

        descriptor[key] = parseRuleList(value, `${path}.${key}`);
    }

    return createFilterSpecification(descriptor);
}

/**
 * Parse the optional root-level filter.
 *
 * @param raw - Untrusted value; `undefined` means no global filter
 */
export function parseGlobalFilter(raw: unknown, path = "filter"): FilterSpecification | undefined {
    return raw === undefined ? undefined : parseFilterDescriptor(raw, path);
}

/**
 * Parse the list of topic definitions.
 *
 * A single mapping is accepted in place of a one-element list. A topic
 * without a `filter` key inherits the global filter.
 *
 * @param raw - Untrusted value
 * @param path - Location used in error messages
 * @throws ConfigurationError on malformed entries or duplicate names
 */
export function parseTopicDefinitions(raw: unknown, path = "topics"): TopicConfiguration[] {
    if (raw === null || raw === undefined) {
        throw new ConfigurationError(path, "at least one topic is required");
    }

    const entries: unknown[] = Array.isArray(raw) ? raw : [raw];

    if (entries.length === 0) {
        throw new ConfigurationError(path, "at least one topic is required");
    }

    const seen = new Set<string>();

    return entries.map((entry, index) => {
        const entryPath = `${path}[${index}]`;

        if (!isMapping(entry)) {
            throw new ConfigurationError(entryPath, "expected a mapping with a 'topic' key");
        }

        for (const key of Object.keys(entry)) {
            if (!kTOPIC_KEYS.includes(key)) {
                throw new ConfigurationError(`${entryPath}.${key}`, "unknown topic option");
            }
        }

        const name = entry.topic;
        if (typeof name !== "string" || name.trim() === "") {
            throw new ConfigurationError(`${entryPath}.topic`, "expected a non-empty string");
        }

        const topicName = name.trim();
        if (seen.has(topicName)) {
            throw new ConfigurationError(`${entryPath}.topic`, `duplicate topic '${topicName}'`);
        }
        seen.add(topicName);

        const filter = "filter" in entry
            ? parseFilterDescriptor(entry.filter, `${entryPath}.filter`)
            : undefined;

        return createTopicConfiguration(topicName, filter);
    });
}
