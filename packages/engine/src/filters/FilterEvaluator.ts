/**
 * @fileoverview Filter Evaluator
 *
 * Decides whether an entity passes a filter. Rule categories are checked
 * in a fixed order and the first one that applies wins:
 *
 * 1. `exclude_entities` matches                              → reject
 * 2. domain in `exclude_domains`, not in `include_entities`  → reject
 * 3. `include_entities` matches                              → pass
 * 4. domain in `include_domains`                             → pass
 * 5. any include rule configured                             → reject
 * 6. otherwise                                               → pass
 *
 * Within a category, rules form a set and order does not matter.
 * Evaluation is pure: the same id and filter always give the same answer.
 *
 * @module @staterelay/engine/filters/FilterEvaluator
 */

import type { EntityReference } from "../contracts/EntityReference.js";
import { extractDomain } from "../contracts/EntityReference.js";
import type { FilterSpecification } from "../contracts/FilterSpecification.js";
import { PatternSet } from "./PatternMatcher.js";

/**
 * The rule category that decided an evaluation.
 */
export type FilterRule =
    | "exclude_entities"
    | "exclude_domains"
    | "include_entities"
    | "include_domains"
    | "default_deny"
    | "default_allow";

/**
 * Outcome of evaluating one entity against one filter.
 */
export interface FilterDecision {
    readonly pass: boolean;
    readonly rule: FilterRule;
}

/**
 * A filter with every rule set compiled to matchers.
 */
export interface CompiledFilter {
    readonly source: FilterSpecification;
    readonly excludeDomains: PatternSet;
    readonly excludeEntities: PatternSet;
    readonly includeDomains: PatternSet;
    readonly includeEntities: PatternSet;
}

// Filters are immutable, so compiled forms can be shared
const compiledFilters = new WeakMap<FilterSpecification, CompiledFilter>();

/**
 * Compile a filter, reusing an earlier compilation of the same object.
 *
 * @param filter - Filter specification
 */
export function compileFilter(filter: FilterSpecification): CompiledFilter {
    const cached = compiledFilters.get(filter);
    if (cached) {
        return cached;
    }

    const compiled: CompiledFilter = Object.freeze({
        source         : filter,
        excludeDomains : new PatternSet(filter.excludeDomains),
        excludeEntities: new PatternSet(filter.excludeEntities),
        includeDomains : new PatternSet(filter.includeDomains),
        includeEntities: new PatternSet(filter.includeEntities),
    });

    compiledFilters.set(filter, compiled);
    return compiled;
}

/**
 * Evaluate an entity against a compiled filter and report which rule decided.
 *
 * @param entityId - Entity reference, e.g. `sensor.sun_next_dusk`
 * @param filter - Compiled filter
 */
export function explainFilter(entityId: EntityReference, filter: CompiledFilter): FilterDecision {
    if (filter.excludeEntities.matches(entityId)) {
        return { pass: false, rule: "exclude_entities" };
    }

    const domain = extractDomain(entityId);
    const includedEntity = filter.includeEntities.matches(entityId);

    if (filter.excludeDomains.matches(domain) && !includedEntity) {
        return { pass: false, rule: "exclude_domains" };
    }

    if (includedEntity) {
        return { pass: true, rule: "include_entities" };
    }

    if (filter.includeDomains.matches(domain)) {
        return { pass: true, rule: "include_domains" };
    }

    if (!filter.includeDomains.isEmpty || !filter.includeEntities.isEmpty) {
        return { pass: false, rule: "default_deny" };
    }

    return { pass: true, rule: "default_allow" };
}

/**
 * Evaluate an entity against a compiled filter.
 *
 * @param entityId - Entity reference
 * @param filter - Compiled filter
 * @returns True when the entity passes
 */
export function evaluateFilter(entityId: EntityReference, filter: CompiledFilter): boolean {
    return explainFilter(entityId, filter).pass;
}

/**
 * Evaluate an entity against a filter specification.
 *
 * @example
 * ```typescript
 * const filter = createFilterSpecification({
 *     include_domains : ["sensor"],
 *     exclude_entities: ["sensor.sun_next_dusk"],
 * });
 *
 * evaluate("sensor.sun_next_dawn", filter); // true
 * evaluate("sensor.sun_next_dusk", filter); // false
 * evaluate("light.kitchen", filter);        // false
 * ```
 */
export function evaluate(entityId: EntityReference, filter: FilterSpecification): boolean {
    return evaluateFilter(entityId, compileFilter(filter));
}
