/**
 * @fileoverview Publisher barrel exports
 *
 * @module publishers
 */

export {
    KafkaPublisher,
    createKafkaClientConfig,
    type KafkaProducer,
    type KafkaPublisherConfig,
} from "./KafkaPublisher.js";
