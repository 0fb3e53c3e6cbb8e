/**
 * @fileoverview Console Logger
 *
 * Default RelayLogger writing level-prefixed lines to the console.
 *
 * @module @staterelay/engine/impl/ConsoleLogger
 */

import type { LogLevel, RelayLogger } from "../contracts/RelayLogger.js";
import { LOG_LEVELS } from "../contracts/RelayLogger.js";

/**
 * Console logger options.
 */
export interface ConsoleLoggerOptions {
    /** Minimum level written (default: "debug") */
    readonly level?: LogLevel;

    /** Optional component tag, rendered as `[INFO] [tag] message` */
    readonly prefix?: string;
}

/**
 * Parse a log level name, falling back when it is missing or unknown.
 *
 * @param value - Raw value, typically from LOG_LEVEL
 * @param fallback - Level used when value is not a known level
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
    const normalized = value?.trim().toLowerCase();
    return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
}

/**
 * Create a console logger.
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger({ level: "info", prefix: "KafkaPublisher" });
 * logger.info("Connected", { brokers: ["127.0.0.1:9092"] });
 * // [INFO] [KafkaPublisher] Connected { brokers: [ '127.0.0.1:9092' ] }
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): RelayLogger {
    const threshold = LOG_LEVELS.indexOf(options.level ?? "debug");
    const tag = options.prefix ? ` [${options.prefix}]` : "";
    const enabled = (level: LogLevel): boolean => LOG_LEVELS.indexOf(level) >= threshold;

    return {
        debug: (msg, data) => {
            if (enabled("debug")) console.debug(`[DEBUG]${tag} ${msg}`, data ?? "");
        },
        info : (msg, data) => {
            if (enabled("info")) console.info(`[INFO]${tag} ${msg}`, data ?? "");
        },
        warn : (msg, data) => {
            if (enabled("warn")) console.warn(`[WARN]${tag} ${msg}`, data ?? "");
        },
        error: (msg, data) => {
            if (enabled("error")) console.error(`[ERROR]${tag} ${msg}`, data ?? "");
        },
    };
}
