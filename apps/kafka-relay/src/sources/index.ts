/**
 * @fileoverview Event source barrel exports
 *
 * @module sources
 */

export {
    JsonLinesEventSource,
    type JsonLinesEventSourceConfig,
    type JsonLinesStats,
} from "./JsonLinesEventSource.js";
