import { INFO, LOG_LEVELS } from "../logging/log-levels";
import { ConfigError } from "../util/errors";

/**
 * How `LinkedList.concat` takes the other list's elements.
 * - `move`: the other list's nodes are relinked into the receiver and the other list is left empty.
 * - `copy`: the other list's values are copied into new nodes; the other list is untouched.
 */
export type ConcatPolicy = "move" | "copy";

export type LinkedListConfig = {
    logLevel: string; // Default: info
    concatPolicy: ConcatPolicy; // Default: move
};

export const DEFAULT_CONFIG: LinkedListConfig = {
    logLevel: INFO,
    concatPolicy: "move",
};

function isConcatPolicy(value: string): value is ConcatPolicy {
    return value === "move" || value === "copy";
}

function readVariable(env: NodeJS.ProcessEnv, key: string): string | undefined {
    const value = env[key]?.trim().toLowerCase();
    return value ? value : undefined;
}

/**
 * Reads the configuration from environment variables, falling back to {@link DEFAULT_CONFIG} for those not set.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LinkedListConfig {
    const config: LinkedListConfig = { ...DEFAULT_CONFIG };

    const logLevel = readVariable(env, "LINKED_LIST_LOG_LEVEL");
    if (logLevel !== undefined) {
        if (!LOG_LEVELS.includes(logLevel)) {
            throw new ConfigError("LINKED_LIST_LOG_LEVEL", `unknown log level '${logLevel}'`);
        }
        config.logLevel = logLevel;
    }

    const concatPolicy = readVariable(env, "LINKED_LIST_CONCAT_POLICY");
    if (concatPolicy !== undefined) {
        if (!isConcatPolicy(concatPolicy)) {
            throw new ConfigError("LINKED_LIST_CONCAT_POLICY", `unknown concat policy '${concatPolicy}'`);
        }
        config.concatPolicy = concatPolicy;
    }

    return config;
}
