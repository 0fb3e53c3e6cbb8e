/**
 * State Change Event Contract
 *
 * The record published on the state bus whenever an entity changes.
 * The relay reads the entity id and serializes `new_state`; the rest of
 * the payload passes through untouched.
 */

import type { EntityReference } from "./EntityReference.js";

/**
 * Origin of a state change.
 */
export interface StateContext {
    readonly id: string;
    readonly parent_id: string | null;
    readonly user_id: string | null;
}

/**
 * Snapshot of one entity's state.
 */
export interface EntityState {
    readonly entity_id: EntityReference;
    readonly state: string;
    readonly attributes: Readonly<Record<string, unknown>>;
    readonly last_changed: string | Date;
    readonly last_updated: string | Date;
    readonly last_reported?: string | Date;
    readonly context?: StateContext;
}

/**
 * A state_changed event.
 *
 * `new_state` is null when the entity was removed; `old_state` is null
 * when it was just added.
 */
export interface StateChangeEvent {
    readonly entity_id: EntityReference;
    readonly old_state: EntityState | null;
    readonly new_state: EntityState | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isTimestamp(value: unknown): boolean {
    return typeof value === "string" || value instanceof Date;
}

/**
 * Structural check for an entity state snapshot.
 *
 * @param obj - The value to check
 */
export function isEntityState(obj: unknown): obj is EntityState {
    return (
        isRecord(obj) &&
        typeof obj.entity_id === "string" &&
        typeof obj.state === "string" &&
        isRecord(obj.attributes) &&
        isTimestamp(obj.last_changed) &&
        isTimestamp(obj.last_updated) &&
        (obj.last_reported === undefined || isTimestamp(obj.last_reported)) &&
        (obj.context === undefined || isRecord(obj.context))
    );
}

/**
 * Structural check for a state_changed event.
 * Attribute contents are not validated.
 *
 * @param obj - The value to check
 */
export function isStateChangeEvent(obj: unknown): obj is StateChangeEvent {
    return (
        isRecord(obj) &&
        typeof obj.entity_id === "string" &&
        (obj.old_state === null || isEntityState(obj.old_state)) &&
        (obj.new_state === null || isEntityState(obj.new_state))
    );
}
