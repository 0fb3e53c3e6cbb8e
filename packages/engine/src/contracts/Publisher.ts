/**
 * Publisher Contract
 *
 * The broker-facing collaborator. The engine hands it an already
 * serialized payload and a topic name; connection setup, reconnection,
 * retries and delivery acknowledgement are the publisher's concern.
 *
 * Design principles:
 * - Independent: each topic's publish is attempted on its own
 * - Reporting: failures come back as results rather than crashes
 * - Owned externally: the engine only calls initialize/shutdown
 */

/**
 * Result of publishing one payload to one topic.
 */
export interface PublishResult {
    /** Topic the payload was sent to */
    readonly topic: string;

    /** Whether the broker accepted the payload */
    readonly success: boolean;

    /** Error message if the publish failed */
    readonly error?: string;
}

/**
 * Publisher interface.
 *
 * @example
 * ```typescript
 * const stdoutPublisher: Publisher = {
 *     id: "stdout",
 *     async publish(topic, payload) {
 *         process.stdout.write(`${topic} ${payload.toString("utf-8")}\n`);
 *         return { topic, success: true };
 *     },
 * };
 * ```
 */
export interface Publisher {
    /** Unique identifier for this publisher */
    readonly id: string;

    /**
     * Connect to the broker.
     * Called once when the engine starts; a rejection aborts startup.
     */
    initialize?(): Promise<void>;

    /**
     * Publish a payload to a topic.
     *
     * Implementations should resolve with `success: false` for broker
     * errors. A rejection is tolerated and treated the same way.
     *
     * @param topic - Topic name (routing key)
     * @param payload - Serialized event, identical for every topic
     */
    publish(topic: string, payload: Buffer): Promise<PublishResult>;

    /**
     * Disconnect from the broker.
     * Called once when the engine stops.
     */
    shutdown?(): Promise<void>;
}
