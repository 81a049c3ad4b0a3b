import * as fs from "fs/promises";
import * as path from "path";
import * as yaml from "js-yaml";

export const DEFAULT_CONFIG_FILE = "treelox.yml";

export interface CliConfig {
    prompt: string;
    color: boolean;
    // Print the offending source line under each diagnostic.
    excerpt: boolean;
    // Print the parsed tree before its value.
    ast: boolean;
}

export const DEFAULT_CONFIG: CliConfig = {
    prompt: "> ",
    color: true,
    excerpt: false,
    ast: false,
};

export class ConfigError extends Error {
    constructor(
        message: string,
        public file: string,
    ) {
        super(message);
        this.name = "ConfigError";
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Errors raised by Node's fs may come from another realm, so these checks
// look at the shape rather than using instanceof.
export function errorMessage(e: unknown): string {
    if (typeof e === "object" && e !== null && "message" in e) {
        return String(e.message);
    }
    return String(e);
}

function errorCode(e: unknown): unknown {
    return typeof e === "object" && e !== null && "code" in e
        ? e.code
        : undefined;
}

export function parseConfig(content: string, file: string): CliConfig {
    let raw: unknown;
    try {
        raw = yaml.load(content);
    } catch (e) {
        throw new ConfigError(errorMessage(e), file);
    }

    if (raw === undefined || raw === null) return { ...DEFAULT_CONFIG };
    if (!isRecord(raw)) {
        throw new ConfigError("config must be a mapping", file);
    }

    const config: CliConfig = { ...DEFAULT_CONFIG };

    if (raw.prompt !== undefined) {
        if (typeof raw.prompt !== "string") {
            throw new ConfigError("'prompt' must be a string", file);
        }
        config.prompt = raw.prompt;
    }

    for (const key of ["color", "excerpt", "ast"] as const) {
        const value = raw[key];
        if (value === undefined) continue;
        if (typeof value !== "boolean") {
            throw new ConfigError(`'${key}' must be a boolean`, file);
        }
        config[key] = value;
    }

    return config;
}

/**
 * Loads the CLI configuration. An explicit path must exist; the default
 * treelox.yml in `cwd` is optional.
 */
export async function loadConfig(
    explicitPath: string | undefined,
    cwd: string,
): Promise<CliConfig> {
    const file = path.resolve(cwd, explicitPath ?? DEFAULT_CONFIG_FILE);

    let content: string;
    try {
        content = await fs.readFile(file, "utf-8");
    } catch (e) {
        if (explicitPath === undefined && errorCode(e) === "ENOENT") {
            return { ...DEFAULT_CONFIG };
        }
        throw new ConfigError(`cannot read config: ${errorMessage(e)}`, file);
    }

    return parseConfig(content, file);
}
