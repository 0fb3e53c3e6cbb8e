/**
 * @fileoverview State serialization
 *
 * Encodes an entity state as UTF-8 JSON. Dates become ISO-8601 strings.
 * The payload is built once per event and shared by every topic.
 *
 * @module @staterelay/engine/engine/serializeState
 */

import type { EntityState } from "../contracts/StateChangeEvent.js";

/**
 * Serializer signature accepted by the engine.
 */
export type StateSerializer = (state: EntityState) => Buffer;

/**
 * Default serializer.
 *
 * @throws TypeError when the state contains values JSON cannot encode
 * (circular references, bigint)
 */
export const serializeState: StateSerializer = (state) => {
    return Buffer.from(JSON.stringify(state), "utf-8");
};
