/**
 * @fileoverview Kafka Publisher
 *
 * Implements the Publisher contract on top of a kafkajs producer.
 * Messages are gzip-compressed; SASL_SSL brokers are reached with
 * SASL PLAIN over TLS.
 *
 * @module publishers/KafkaPublisher
 */

import {
    CompressionTypes,
    Kafka,
    logLevel,
    type KafkaConfig,
    type LogEntry,
    type Producer,
} from "kafkajs";
import {
    createConsoleLogger,
    type Publisher,
    type PublishResult,
    type RelayLogger,
} from "@staterelay/engine";
import type { BrokerSettings } from "../config/loadConfig.js";

/**
 * The part of a kafkajs producer the publisher uses.
 */
export type KafkaProducer = Pick<Producer, "connect" | "disconnect" | "send">;

/**
 * Configuration for KafkaPublisher
 */
export interface KafkaPublisherConfig {
    /** Broker address, security protocol and credentials */
    readonly broker: BrokerSettings;

    /** Logger for publisher and kafkajs client messages */
    readonly logger?: RelayLogger;

    /**
     * Producer factory. Defaults to `new Kafka(config).producer()`.
     */
    readonly createProducer?: (config: KafkaConfig) => KafkaProducer;
}

/**
 * Build the kafkajs client configuration for a broker.
 *
 * @param broker - Validated broker settings
 * @param logger - Destination for kafkajs' own log lines
 */
export function createKafkaClientConfig(broker: BrokerSettings, logger?: RelayLogger): KafkaConfig {
    const config: KafkaConfig = {
        clientId: broker.clientId,
        brokers : [`${broker.ipAddress}:${broker.port}`],
    };

    if (logger) {
        config.logLevel = logLevel.INFO;
        config.logCreator = () => (entry) => forwardKafkaLog(logger, entry);
    }

    if (broker.securityProtocol === "SASL_SSL" && broker.username && broker.password) {
        config.ssl = true;
        config.sasl = {
            mechanism: "plain",
            username : broker.username,
            password : broker.password,
        };
    }

    return config;
}

/**
 * Route a kafkajs log entry to a RelayLogger.
 */
function forwardKafkaLog(logger: RelayLogger, entry: LogEntry): void {
    const { message, ...details } = entry.log;
    const text = `[kafkajs:${entry.namespace}] ${message}`;

    switch (entry.level) {
        case logLevel.ERROR:
            logger.error(text, details);
            break;
        case logLevel.WARN:
            logger.warn(text, details);
            break;
        case logLevel.INFO:
            logger.info(text, details);
            break;
        default:
            logger.debug(text, details);
    }
}

/**
 * Kafka Publisher
 *
 * @example
 * ```typescript
 * const publisher = new KafkaPublisher({ broker: config.broker });
 *
 * await publisher.initialize();
 * await publisher.publish("everything", Buffer.from("{}"));
 * await publisher.shutdown();
 * ```
 */
export class KafkaPublisher implements Publisher {
    readonly id = "kafka";

    private readonly producer: KafkaProducer;
    private readonly logger: RelayLogger;
    private readonly brokers: readonly string[];
    private connected = false;

    constructor(config: KafkaPublisherConfig) {
        this.logger = config.logger ?? createConsoleLogger({ prefix: "KafkaPublisher" });

        const clientConfig = createKafkaClientConfig(config.broker, this.logger);
        const createProducer = config.createProducer ?? ((kafkaConfig: KafkaConfig) => new Kafka(kafkaConfig).producer());

        this.brokers = [`${config.broker.ipAddress}:${config.broker.port}`];
        this.producer = createProducer(clientConfig);
    }

    /**
     * Connect the producer.
     */
    async initialize(): Promise<void> {
        await this.producer.connect();
        this.connected = true;
        this.logger.info("Kafka producer connected", { brokers: this.brokers });
    }

    /**
     * Send one payload and wait for the broker acknowledgement.
     *
     * @param topic - Destination topic
     * @param payload - Serialized state
     * @returns Result with `success: false` on any broker error
     */
    async publish(topic: string, payload: Buffer): Promise<PublishResult> {
        try {
            await this.producer.send({
                topic,
                compression: CompressionTypes.GZIP,
                messages   : [{ value: payload }],
            });

            return { topic, success: true };
        }
        catch (error) {
            return {
                topic,
                success: false,
                error  : error instanceof Error ? error.message : String(error),
            };
        }
    }

    /**
     * Disconnect the producer, if it was connected.
     */
    async shutdown(): Promise<void> {
        if (!this.connected) {
            return;
        }

        await this.producer.disconnect();
        this.connected = false;
        this.logger.info("Kafka producer disconnected");
    }
}
