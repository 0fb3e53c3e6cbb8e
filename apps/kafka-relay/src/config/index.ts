/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export {
    SECURITY_PROTOCOLS,
    loadRelayConfig,
    parseRelayConfig,
    resolveConfigPath,
    type BrokerSettings,
    type RelayConfig,
    type SecurityProtocol,
} from "./loadConfig.js";
