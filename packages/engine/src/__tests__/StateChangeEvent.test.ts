/**
 * @fileoverview Unit tests for contract type guards
 *
 * @module @staterelay/engine/__tests__/StateChangeEvent
 */

import { describe, it, expect } from "vitest";
import { isEntityState, isStateChangeEvent } from "../contracts/StateChangeEvent.js";
import { ConfigurationError } from "../contracts/ConfigurationError.js";

const kSTATE = {
    entity_id   : "sensor.sun_next_dusk",
    state       : "2025-01-15T17:04:00+00:00",
    attributes  : { device_class: "timestamp" },
    last_changed: "2025-01-15T10:00:00.000Z",
    last_updated: new Date("2025-01-15T10:00:00.000Z"),
    context     : { id: "ctx-1", parent_id: null, user_id: null },
};

describe("isEntityState", () => {
    it("should accept a complete state snapshot", () => {
        expect(isEntityState(kSTATE)).toBe(true);
    });

    it("should reject snapshots with missing or mistyped fields", () => {
        expect(isEntityState({ ...kSTATE, state: 21.5 })).toBe(false);
        expect(isEntityState({ ...kSTATE, attributes: null })).toBe(false);
        expect(isEntityState({ ...kSTATE, last_changed: 1736935200 })).toBe(false);
        expect(isEntityState({ entity_id: "sensor.sun_next_dusk" })).toBe(false);
    });
});

describe("isStateChangeEvent", () => {
    it("should accept added, changed and removed entities", () => {
        expect(isStateChangeEvent({ entity_id: kSTATE.entity_id, old_state: null, new_state: kSTATE })).toBe(true);
        expect(isStateChangeEvent({ entity_id: kSTATE.entity_id, old_state: kSTATE, new_state: kSTATE })).toBe(true);
        expect(isStateChangeEvent({ entity_id: kSTATE.entity_id, old_state: kSTATE, new_state: null })).toBe(true);
    });

    it("should reject records without both state keys", () => {
        expect(isStateChangeEvent({ entity_id: kSTATE.entity_id, new_state: kSTATE })).toBe(false);
        expect(isStateChangeEvent({ entity_id: "light.kitchen" })).toBe(false);
        expect(isStateChangeEvent([])).toBe(false);
        expect(isStateChangeEvent(null)).toBe(false);
    });
});

describe("ConfigurationError", () => {
    it("should prefix the message with the path", () => {
        const error = new ConfigurationError("topics[0].topic", "expected a non-empty string");

        expect(error).toBeInstanceOf(Error);
        expect(error.name).toBe("ConfigurationError");
        expect(error.path).toBe("topics[0].topic");
        expect(error.message).toBe("topics[0].topic: expected a non-empty string");
    });

    it("should use the bare message without a path", () => {
        expect(new ConfigurationError("", "Config file not found: relay.yml").message).toBe("Config file not found: relay.yml");
    });
});
