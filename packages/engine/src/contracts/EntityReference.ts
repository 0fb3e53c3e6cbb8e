/**
 * Entity Reference Contract
 *
 * Entities on the state bus are addressed as `<domain>.<object_id>`,
 * e.g. `sensor.sun_next_dusk`. The domain is everything before the
 * first separator.
 */

/**
 * A domain-qualified entity identifier.
 */
export type EntityReference = string;

/**
 * Separator between domain and object id.
 */
export const kDOMAIN_SEPARATOR = ".";

/**
 * Extract the domain from an entity id.
 *
 * Ids without a separator, or starting with one, have no domain and
 * therefore never match a domain rule.
 *
 * @example
 * ```typescript
 * extractDomain("sensor.sun_next_dusk"); // "sensor"
 * extractDomain("sun_next_dusk");        // undefined
 * ```
 */
export function extractDomain(entityId: EntityReference): string | undefined {
    const separatorIndex = entityId.indexOf(kDOMAIN_SEPARATOR);
    return separatorIndex > 0 ? entityId.slice(0, separatorIndex) : undefined;
}
