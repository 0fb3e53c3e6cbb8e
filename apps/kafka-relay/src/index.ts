/**
 * @fileoverview Kafka Relay - Main Entry Point
 *
 * Reads state_changed records as JSON lines on stdin and relays each
 * admitted state to every Kafka topic whose filter matches it.
 *
 * Startup order:
 * 1. Environment (.env) and relay.yml
 * 2. Kafka publisher
 * 3. RelayEngine with the stdin source
 *
 * @module kafka-relay
 */

// Load .env before any other imports that depend on environment variables
import "dotenv/config";

import { join, dirname } from "path";
import { fileURLToPath } from "url";

import {
    RelayEngine,
    createConsoleLogger,
    parseLogLevel,
    type RelayLogger,
} from "@staterelay/engine";

import { loadRelayConfig, resolveConfigPath } from "./config/index.js";
import { KafkaPublisher } from "./publishers/index.js";
import { JsonLinesEventSource } from "./sources/index.js";

// Get directory of this file
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const kDEFAULT_CONFIG_PATH = join(__dirname, "..", "config", "relay.yml");

/**
 * Log engine events at the level an operator cares about.
 */
function observeEngine(engine: RelayEngine, logger: RelayLogger): void {
    engine.eventBus.subscribe("engine:started", (event) => {
        logger.info(`[ENGINE] Started - relaying to ${event.data.topics.join(", ")}`);
    });

    engine.eventBus.subscribe("engine:stopped", () => {
        logger.info("[ENGINE] Stopped");
    });

    engine.eventBus.subscribe("event:dispatched", (event) => {
        const { entityId, matched, failed, duration } = event.data;
        if (matched.length > 0) {
            logger.debug(`[DISPATCHED] ${entityId} -> ${matched.length - failed.length}/${matched.length} topics (${duration}ms)`);
        }
    });

    engine.eventBus.subscribe("engine:error", (event) => {
        logger.error(`[ENGINE ERROR] ${event.data.stage}: ${event.data.error}`);
    });
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
    const logger = createConsoleLogger({ level: parseLogLevel(process.env.LOG_LEVEL) });
    const configPath = resolveConfigPath(process.env, kDEFAULT_CONFIG_PATH);

    let engine: RelayEngine;
    let source: JsonLinesEventSource;

    try {
        const config = loadRelayConfig(configPath, process.env);
        logger.info(`Loaded ${config.topics.length} topics from ${configPath}`);

        source = new JsonLinesEventSource({ logger });
        engine = new RelayEngine({
            topics      : config.topics,
            globalFilter: config.globalFilter,
            publisher   : new KafkaPublisher({ broker: config.broker, logger }),
            source,
            logger,
        });

        observeEngine(engine, logger);
        await engine.start();
    }
    catch (error) {
        console.error("[FATAL] Failed to start relay:", error instanceof Error ? error.message : String(error));
        process.exit(1);
    }

    const shutdown = (signal: string): void => {
        logger.info(`Received ${signal}, shutting down...`);
        engine.stop()
            .then(() => process.exit(0))
            .catch((error: unknown) => {
                console.error("[FATAL] Shutdown failed:", error);
                process.exit(1);
            });
    };

    process.on("SIGINT", () => shutdown("SIGINT"));
    process.on("SIGTERM", () => shutdown("SIGTERM"));

    await source.whenClosed();
    await engine.stop();
}

main().catch((error: unknown) => {
    console.error("[FATAL]", error);
    process.exit(1);
});
