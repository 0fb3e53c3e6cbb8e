/**
 * @fileoverview Contract barrel exports
 *
 * All interfaces and value types that define the relay engine contract.
 *
 * @module @staterelay/engine/contracts
 */

// Entity references
export type { EntityReference } from "./EntityReference.js";
export { extractDomain, kDOMAIN_SEPARATOR } from "./EntityReference.js";

// Filter specification
export type {
    FilterDescriptor,
    FilterRuleKey,
    FilterSpecification,
} from "./FilterSpecification.js";
export {
    FILTER_RULE_KEYS,
    MATCH_ALL_FILTER,
    createFilterSpecification,
    describeFilter,
    isEmptyFilter,
} from "./FilterSpecification.js";

// Topic configuration
export type {
    EffectiveFilter,
    FilterOrigin,
    TopicConfiguration,
} from "./TopicConfiguration.js";
export {
    createTopicConfiguration,
    resolveEffectiveFilter,
} from "./TopicConfiguration.js";

// State change events
export type {
    EntityState,
    StateChangeEvent,
    StateContext,
} from "./StateChangeEvent.js";
export { isEntityState, isStateChangeEvent } from "./StateChangeEvent.js";

// Publisher contract
export type { Publisher, PublishResult } from "./Publisher.js";

// Event source contract
export type { StateChangeListener, StateEventSource } from "./StateEventSource.js";

// Logging
export type { LogLevel, RelayLogger } from "./RelayLogger.js";
export { LOG_LEVELS } from "./RelayLogger.js";

// Errors
export { ConfigurationError } from "./ConfigurationError.js";

// EventBus contract
export type {
    EventBus,
    RelayEvent,
    RelayEventDataMap,
    RelayEventHandler,
    RelayEventType,
    SkipReason,
    Subscription,
} from "./EventBus.js";
export { createEvent } from "./EventBus.js";
