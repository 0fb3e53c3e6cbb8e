/**
 * Filter Specification Contract
 *
 * An immutable bundle of include/exclude rules deciding whether an
 * entity's state changes reach a topic.
 *
 * Design decisions:
 * - Absent (`undefined`) and empty are different: absent inherits the
 *   global filter, empty matches everything
 * - Each rule set is a set of exact ids, domain names or glob patterns
 * - Filters are built once from configuration and never patched
 */

/**
 * Filter descriptor as written in configuration.
 *
 * @example
 * ```yaml
 * filter:
 *   include_domains: [sensor]
 *   exclude_entities: [sensor.sun_next_dusk]
 * ```
 */
export interface FilterDescriptor {
    readonly include_entities?: readonly string[];
    readonly include_domains?: readonly string[];
    readonly exclude_entities?: readonly string[];
    readonly exclude_domains?: readonly string[];
}

/**
 * Names of the four rule sets, as they appear in configuration.
 */
export const FILTER_RULE_KEYS = [
    "exclude_domains",
    "exclude_entities",
    "include_domains",
    "include_entities",
] as const;

export type FilterRuleKey = typeof FILTER_RULE_KEYS[number];

/**
 * Immutable filter value.
 */
export interface FilterSpecification {
    readonly excludeDomains: ReadonlySet<string>;
    readonly excludeEntities: ReadonlySet<string>;
    readonly includeDomains: ReadonlySet<string>;
    readonly includeEntities: ReadonlySet<string>;
}

/**
 * Build a frozen FilterSpecification from a descriptor.
 * Missing rule sets become empty sets; duplicates collapse.
 *
 * @param descriptor - Rule lists keyed by configuration name
 */
export function createFilterSpecification(descriptor: FilterDescriptor = {}): FilterSpecification {
    return Object.freeze({
        excludeDomains : new Set(descriptor.exclude_domains ?? []),
        excludeEntities: new Set(descriptor.exclude_entities ?? []),
        includeDomains : new Set(descriptor.include_domains ?? []),
        includeEntities: new Set(descriptor.include_entities ?? []),
    });
}

/**
 * The always-match filter: no rules, everything passes.
 */
export const MATCH_ALL_FILTER: FilterSpecification = createFilterSpecification();

/**
 * True when all four rule sets are empty.
 */
export function isEmptyFilter(filter: FilterSpecification): boolean {
    return (
        filter.excludeDomains.size === 0 &&
        filter.excludeEntities.size === 0 &&
        filter.includeDomains.size === 0 &&
        filter.includeEntities.size === 0
    );
}

/**
 * Convert a filter back to its configuration shape, omitting empty sets.
 * Used for logging the effective filter of each topic.
 */
export function describeFilter(filter: FilterSpecification): FilterDescriptor {
    const descriptor: { -readonly [K in FilterRuleKey]?: string[] } = {};

    if (filter.excludeDomains.size > 0) {
        descriptor.exclude_domains = [...filter.excludeDomains];
    }
    if (filter.excludeEntities.size > 0) {
        descriptor.exclude_entities = [...filter.excludeEntities];
    }
    if (filter.includeDomains.size > 0) {
        descriptor.include_domains = [...filter.includeDomains];
    }
    if (filter.includeEntities.size > 0) {
        descriptor.include_entities = [...filter.includeEntities];
    }

    return descriptor;
}
