/**
 * @fileoverview Configuration parsing barrel exports
 *
 * @module @staterelay/engine/config
 */

export {
    parseFilterDescriptor,
    parseGlobalFilter,
    parseTopicDefinitions,
} from "./parseFilterDescriptor.js";
