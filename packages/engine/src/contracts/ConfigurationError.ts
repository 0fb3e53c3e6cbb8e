/**
 * Raised when the relay configuration is malformed.
 *
 * Configuration errors are detected at startup only and are fatal
 * to process initialization.
 */
export class ConfigurationError extends Error {
    /** Location of the offending value, e.g. `topics[1].filter.include_entities` */
    readonly path: string;

    constructor(path: string, message: string) {
        super(path ? `${path}: ${message}` : message);
        this.name = "ConfigurationError";
        this.path = path;
    }
}
