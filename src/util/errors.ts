/**
 * Thrown when an index falls outside the elements a list currently holds.
 */
export class IndexOutOfRangeError extends RangeError {
    name = "IndexOutOfRangeError";

    constructor(
        public readonly index: number,
        public readonly length: number,
    ) {
        super(`Index out of range: ${index} (length ${length})`);
    }
}

/**
 * Thrown when a configuration value cannot be parsed.
 */
export class ConfigError extends Error {
    name = "ConfigError";

    constructor(
        public readonly key: string,
        message: string,
    ) {
        super(`${key}: ${message}`);
    }
}
