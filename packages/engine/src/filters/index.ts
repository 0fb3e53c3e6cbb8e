/**
 * @fileoverview Filter barrel exports
 *
 * @module @staterelay/engine/filters
 */

export {
    PatternSet,
    compilePattern,
    isGlobPattern,
    type PatternMatcher,
} from "./PatternMatcher.js";
export {
    compileFilter,
    evaluate,
    evaluateFilter,
    explainFilter,
    type CompiledFilter,
    type FilterDecision,
    type FilterRule,
} from "./FilterEvaluator.js";
