/**
 * @fileoverview State Relay Engine
 *
 * Filter evaluation and multi-topic dispatch for state-change events.
 *
 * The engine provides:
 * - Immutable include/exclude filters with exact and glob rules
 * - Per-topic filters with a global fallback
 * - One serialization per event, fanned out to every matching topic
 * - Per-topic failure isolation and observable dispatch events
 *
 * @module @staterelay/engine
 * @example
 * ```typescript
 * import {
 *     RelayEngine,
 *     parseGlobalFilter,
 *     parseTopicDefinitions,
 *     type Publisher,
 * } from "@staterelay/engine";
 *
 * const engine = new RelayEngine({
 *     topics      : parseTopicDefinitions(raw.topics),
 *     globalFilter: parseGlobalFilter(raw.filter),
 *     publisher,
 * });
 *
 * await engine.start();
 * await engine.handleEvent(stateChange);
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

export type {
    EffectiveFilter,
    EntityReference,
    EntityState,
    EventBus,
    FilterDescriptor,
    FilterOrigin,
    FilterRuleKey,
    FilterSpecification,
    LogLevel,
    Publisher,
    PublishResult,
    RelayEvent,
    RelayEventDataMap,
    RelayEventHandler,
    RelayEventType,
    RelayLogger,
    SkipReason,
    StateChangeEvent,
    StateChangeListener,
    StateContext,
    StateEventSource,
    Subscription,
    TopicConfiguration,
} from "./contracts/index.js";
export {
    ConfigurationError,
    FILTER_RULE_KEYS,
    LOG_LEVELS,
    MATCH_ALL_FILTER,
    createEvent,
    createFilterSpecification,
    createTopicConfiguration,
    describeFilter,
    extractDomain,
    isEmptyFilter,
    isEntityState,
    isStateChangeEvent,
    kDOMAIN_SEPARATOR,
    resolveEffectiveFilter,
} from "./contracts/index.js";

// ============================================================================
// Filter exports
// ============================================================================

export {
    PatternSet,
    compileFilter,
    compilePattern,
    evaluate,
    evaluateFilter,
    explainFilter,
    isGlobPattern,
    type CompiledFilter,
    type FilterDecision,
    type FilterRule,
    type PatternMatcher,
} from "./filters/index.js";

// ============================================================================
// Configuration parsing exports
// ============================================================================

export {
    parseFilterDescriptor,
    parseGlobalFilter,
    parseTopicDefinitions,
} from "./config/index.js";

// ============================================================================
// Implementation exports
// ============================================================================

export {
    InMemoryEventBus,
    createConsoleLogger,
    parseLogLevel,
    type ConsoleLoggerOptions,
} from "./impl/index.js";

// ============================================================================
// Engine exports
// ============================================================================

export {
    RelayEngine,
    admitEvent,
    decideTopics,
    dispatch,
    publishToTopics,
    resolveTopics,
    serializeState,
    type Admission,
    type DispatchReport,
    type RelayEngineConfig,
    type ResolvedTopic,
    type StateSerializer,
    type TopicDecision,
    type TopicDelivery,
} from "./engine/index.js";
