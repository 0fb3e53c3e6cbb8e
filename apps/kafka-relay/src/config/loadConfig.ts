/**
 * @fileoverview Relay Configuration Loader
 *
 * Loads broker settings, topics and the global filter from a YAML file.
 *
 * @module config/loadConfig
 */

import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import {
    ConfigurationError,
    parseGlobalFilter,
    parseTopicDefinitions,
    type FilterSpecification,
    type TopicConfiguration,
} from "@staterelay/engine";

/**
 * Supported broker security protocols.
 */
export const SECURITY_PROTOCOLS = ["PLAINTEXT", "SASL_SSL"] as const;

export type SecurityProtocol = typeof SECURITY_PROTOCOLS[number];

/**
 * Broker connection settings. The engine never reads these; they are
 * handed to the publisher.
 */
export interface BrokerSettings {
    readonly ipAddress: string;
    readonly port: number;
    readonly securityProtocol: SecurityProtocol;
    readonly clientId: string;
    readonly username?: string;
    readonly password?: string;
}

/**
 * Fully validated relay configuration.
 */
export interface RelayConfig {
    readonly broker: BrokerSettings;
    readonly topics: readonly TopicConfiguration[];
    readonly globalFilter?: FilterSpecification;
}

/**
 * YAML file structure
 */
interface RelayYamlFile {
    ip_address?: unknown;
    port?: unknown;
    security_protocol?: unknown;
    client_id?: unknown;
    username?: unknown;
    password?: unknown;
    filter?: unknown;
    topics?: unknown;
}

const kDEFAULT_CLIENT_ID = "state-relay";

function isSecurityProtocol(value: unknown): value is SecurityProtocol {
    return SECURITY_PROTOCOLS.some((protocol) => protocol === value);
}

function optionalString(value: unknown, path: string): string | undefined {
    if (value === undefined || value === null) {
        return undefined;
    }
    if (typeof value !== "string") {
        throw new ConfigurationError(path, "expected a string");
    }
    return value;
}

function parsePort(value: unknown): number {
    const port = typeof value === "string" && value.trim() !== "" ? Number(value) : value;

    if (typeof port !== "number" || !Number.isInteger(port) || port < 1 || port > 65535) {
        throw new ConfigurationError("port", "expected an integer between 1 and 65535");
    }

    return port;
}

/**
 * Validate a parsed configuration document.
 *
 * Unknown top-level keys are ignored so the file can carry other
 * sections; unknown keys inside topics and filters are errors.
 *
 * @param raw - Parsed YAML
 * @param env - Environment; `KAFKA_PASSWORD` overrides `password`
 * @throws ConfigurationError on any invalid value
 */
export function parseRelayConfig(raw: unknown, env: NodeJS.ProcessEnv = {}): RelayConfig {
    if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
        throw new ConfigurationError("", "Invalid config file format: expected a mapping");
    }

    const parsed: RelayYamlFile = raw;

    const ipAddress = optionalString(parsed.ip_address, "ip_address");
    if (!ipAddress) {
        throw new ConfigurationError("ip_address", "required");
    }

    const securityProtocol = parsed.security_protocol ?? "PLAINTEXT";
    if (!isSecurityProtocol(securityProtocol)) {
        throw new ConfigurationError(
            "security_protocol",
            `expected one of ${SECURITY_PROTOCOLS.join(", ")}`
        );
    }

    const username = optionalString(parsed.username, "username");
    const password = env.KAFKA_PASSWORD || optionalString(parsed.password, "password");

    if (securityProtocol === "SASL_SSL" && (!username || !password)) {
        throw new ConfigurationError("security_protocol", "SASL_SSL requires username and password");
    }

    const broker: BrokerSettings = {
        ipAddress,
        port    : parsePort(parsed.port),
        securityProtocol,
        clientId: optionalString(parsed.client_id, "client_id") ?? kDEFAULT_CLIENT_ID,
        username,
        password,
    };

    return {
        broker,
        topics      : parseTopicDefinitions(parsed.topics),
        globalFilter: parseGlobalFilter(parsed.filter),
    };
}

/**
 * Load the relay configuration from a YAML file.
 *
 * @param filePath - Path to relay.yml
 * @param env - Environment used for secret overrides
 * @throws ConfigurationError if the file is missing or invalid
 *
 * @example
 * ```typescript
 * const config = loadRelayConfig("./config/relay.yml", process.env);
 * console.log(config.topics.map((topic) => topic.name));
 * // ["everything", "dusk"]
 * ```
 */
export function loadRelayConfig(filePath: string, env: NodeJS.ProcessEnv = process.env): RelayConfig {
    if (!existsSync(filePath)) {
        throw new ConfigurationError("", `Config file not found: ${filePath}`);
    }

    const content = readFileSync(filePath, "utf-8");
    let document: unknown;

    try {
        document = parseYaml(content);
    }
    catch (error) {
        throw new ConfigurationError(
            "",
            `Invalid YAML in ${filePath}: ${error instanceof Error ? error.message : String(error)}`
        );
    }

    return parseRelayConfig(document, env);
}

/**
 * Pick the configuration path: `RELAY_CONFIG` when set, else the fallback.
 */
export function resolveConfigPath(env: NodeJS.ProcessEnv, fallback: string): string {
    const configured = env.RELAY_CONFIG?.trim();
    return configured ? configured : fallback;
}
