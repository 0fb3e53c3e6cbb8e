/**
 * @fileoverview Implementation barrel exports
 *
 * Concrete implementations of engine contracts.
 *
 * @module @staterelay/engine/impl
 */

export { InMemoryEventBus } from "./InMemoryEventBus.js";
export {
    createConsoleLogger,
    parseLogLevel,
    type ConsoleLoggerOptions,
} from "./ConsoleLogger.js";
