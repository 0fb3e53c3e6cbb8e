/**
 * @fileoverview Engine barrel exports
 *
 * @module @staterelay/engine/engine
 */

export {
    RelayEngine,
    type DispatchReport,
    type RelayEngineConfig,
} from "./RelayEngine.js";
export {
    admitEvent,
    decideTopics,
    dispatch,
    publishToTopics,
    resolveTopics,
    type Admission,
    type ResolvedTopic,
    type TopicDecision,
    type TopicDelivery,
} from "./dispatch.js";
export { serializeState, type StateSerializer } from "./serializeState.js";
