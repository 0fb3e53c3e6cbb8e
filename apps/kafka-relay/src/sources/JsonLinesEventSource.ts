/**
 * @fileoverview JSON Lines Event Source
 *
 * Reads state_changed records from a stream, one JSON object per line,
 * and hands them to the engine in arrival order.
 *
 * @module sources/JsonLinesEventSource
 */

import { createInterface, type Interface } from "readline";
import {
    createConsoleLogger,
    isStateChangeEvent,
    type RelayLogger,
    type StateChangeListener,
    type StateEventSource,
} from "@staterelay/engine";

/**
 * Configuration for JsonLinesEventSource
 */
export interface JsonLinesEventSourceConfig {
    /** Stream to read (default: process.stdin) */
    readonly input?: NodeJS.ReadableStream;

    /** Logger for skipped lines and listener failures */
    readonly logger?: RelayLogger;
}

/**
 * Line counters, for shutdown logging and tests.
 */
export type JsonLinesStats = {
    readonly lines: number;
    readonly delivered: number;
    readonly malformed: number;
};

interface Signal {
    readonly promise: Promise<void>;
    readonly resolve: () => void;
}

function createSignal(): Signal {
    let resolve: () => void = () => undefined;
    const promise = new Promise<void>((done) => {
        resolve = done;
    });
    return { promise, resolve };
}

/**
 * JSON Lines Event Source
 *
 * Blank lines are ignored. Lines that are not valid JSON, or not a
 * state_changed record, are logged and skipped. The input stays paused
 * while an event is being delivered.
 *
 * @example
 * ```typescript
 * const source = new JsonLinesEventSource({ input: process.stdin });
 * const engine = new RelayEngine({ topics, publisher, source });
 *
 * await engine.start();
 * await source.whenClosed();
 * await engine.stop();
 * ```
 */
export class JsonLinesEventSource implements StateEventSource {
    readonly id = "jsonl";
    readonly name = "JSON Lines Event Source";

    private readonly input: NodeJS.ReadableStream;
    private readonly logger: RelayLogger;
    private readonly closed = createSignal();
    private reader?: Interface;
    private pending: Promise<void> = Promise.resolve();
    private inFlight = 0;
    private inputClosed = false;
    private counters = { lines: 0, delivered: 0, malformed: 0 };

    constructor(config: JsonLinesEventSourceConfig = {}) {
        this.input = config.input ?? process.stdin;
        this.logger = config.logger ?? createConsoleLogger({ prefix: "JsonLinesEventSource" });
    }

    /**
     * Current line counters.
     */
    get stats(): JsonLinesStats {
        return { ...this.counters };
    }

    /**
     * Begin reading. Resolves once the reader is attached; events are
     * delivered as lines arrive.
     *
     * @throws Error if the source was already started
     */
    async start(listener: StateChangeListener): Promise<void> {
        if (this.reader) {
            throw new Error("Source already started");
        }

        const reader = createInterface({ input: this.input, crlfDelay: Infinity, terminal: false });
        this.reader = reader;

        // Lines already split from the current chunk still arrive after
        // pause(); reading resumes once every queued line is handled.
        reader.on("line", (line: string) => {
            this.inFlight++;
            reader.pause();
            this.pending = this.pending
                .then(() => this.deliver(line, listener))
                .finally(() => {
                    this.inFlight--;
                    if (this.inFlight === 0 && !this.inputClosed) {
                        reader.resume();
                    }
                });
        });

        reader.on("close", () => {
            this.inputClosed = true;
            this.pending = this.pending.then(() => {
                this.logger.info("Input closed", this.stats);
                this.closed.resolve();
            });
        });

        this.logger.info("Reading state changes");
    }

    /**
     * Stop reading and wait for in-flight events.
     */
    async stop(): Promise<void> {
        if (!this.reader) {
            return;
        }

        this.reader.close();
        await this.pending;
    }

    /**
     * Resolves after the input ends and every line read has been handled.
     */
    whenClosed(): Promise<void> {
        return this.closed.promise;
    }

    private async deliver(line: string, listener: StateChangeListener): Promise<void> {
        const text = line.trim();
        if (text === "") {
            return;
        }

        this.counters.lines++;
        const lineNumber = this.counters.lines;

        let parsed: unknown;
        try {
            parsed = JSON.parse(text);
        }
        catch (error) {
            this.counters.malformed++;
            this.logger.warn("Skipping malformed line", {
                line : lineNumber,
                error: error instanceof Error ? error.message : String(error),
            });
            return;
        }

        if (!isStateChangeEvent(parsed)) {
            this.counters.malformed++;
            this.logger.warn("Skipping line that is not a state change", { line: lineNumber });
            return;
        }

        try {
            await listener(parsed);
            this.counters.delivered++;
        }
        catch (error) {
            this.logger.error("State change listener failed", {
                line    : lineNumber,
                entityId: parsed.entity_id,
                error   : error instanceof Error ? error.message : String(error),
            });
        }
    }
}
