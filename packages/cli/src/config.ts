import * as fs from "fs";
import * as path from "path";
import yaml from "js-yaml";
import {
    DEFAULT_KEYWORDS,
    KeywordTable,
    KeywordTableError,
    TokenKind,
    parseTokenKind,
} from "@azula/core";

export const CONFIG_FILE_NAMES = ["azula.yml", "azula.yaml"];

export type OutputFormat = "text" | "json";

export interface AzulaConfig {
    color: boolean;
    format: OutputFormat;
    keywords: KeywordTable;
}

export const DEFAULT_CONFIG: AzulaConfig = {
    color: true,
    format: "text",
    keywords: DEFAULT_KEYWORDS,
};

export class ConfigError extends Error {
    public configPath: string;

    constructor(message: string, configPath: string) {
        super(`${configPath}: ${message}`);
        this.name = "ConfigError";
        this.configPath = configPath;
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Walks from `startDir` up to the filesystem root
export function findConfigFile(startDir: string): string | null {
    let currentDir = path.resolve(startDir);

    while (true) {
        for (const name of CONFIG_FILE_NAMES) {
            const configPath = path.join(currentDir, name);
            if (fs.existsSync(configPath)) {
                return configPath;
            }
        }

        const parent = path.dirname(currentDir);
        if (parent === currentDir) return null;
        currentDir = parent;
    }
}

function parseKeywords(value: unknown, configPath: string): KeywordTable {
    if (value === undefined || value === null) return DEFAULT_KEYWORDS;
    if (!isRecord(value)) {
        throw new ConfigError("'keywords' must be a mapping of word to kind", configPath);
    }

    const extra: Array<[string, TokenKind]> = [];
    for (const [word, kindName] of Object.entries(value)) {
        const kind = typeof kindName === "string" ? parseTokenKind(kindName) : undefined;
        if (kind === undefined) {
            throw new ConfigError(
                `Unknown token kind '${String(kindName)}' for keyword '${word}'`,
                configPath,
            );
        }
        extra.push([word, kind]);
    }

    try {
        return DEFAULT_KEYWORDS.extendWith(extra);
    } catch (e) {
        if (e instanceof KeywordTableError) {
            throw new ConfigError(e.message, configPath);
        }
        throw e;
    }
}

export function parseConfig(text: string, configPath: string): AzulaConfig {
    let raw: unknown;
    try {
        raw = yaml.load(text);
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new ConfigError(`Invalid YAML: ${reason}`, configPath);
    }

    // An empty file means "all defaults"
    if (raw === undefined || raw === null) return DEFAULT_CONFIG;
    if (!isRecord(raw)) {
        throw new ConfigError("Configuration must be a mapping", configPath);
    }

    const config: AzulaConfig = { ...DEFAULT_CONFIG };

    if (raw.color !== undefined) {
        if (typeof raw.color !== "boolean") {
            throw new ConfigError("'color' must be true or false", configPath);
        }
        config.color = raw.color;
    }

    if (raw.format !== undefined) {
        if (raw.format !== "text" && raw.format !== "json") {
            throw new ConfigError("'format' must be \"text\" or \"json\"", configPath);
        }
        config.format = raw.format;
    }

    config.keywords = parseKeywords(raw.keywords, configPath);
    return config;
}

/** Loads the nearest config file above `startDir`, or the defaults. */
export function loadConfig(startDir: string): AzulaConfig {
    const configPath = findConfigFile(startDir);
    if (!configPath) return DEFAULT_CONFIG;

    const text = fs.readFileSync(configPath, "utf-8");
    return parseConfig(text, configPath);
}
