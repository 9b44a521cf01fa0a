import { cosmiconfig } from 'cosmiconfig';
import {
    DEFAULT_CONFIG,
    type PaperAskConfig,
    type RetrievalConfig,
    type CacheConfig,
    type LlmConfig,
    type EmbeddingConfig,
} from '../types/index.js';
import { ConfigurationError } from './errors.js';
import { getLogger, parseLogLevel } from './logger.js';

/**
 * Partial configuration as given by a config file, the environment, or CLI flags.
 */
export type ConfigOverrides = Partial<Pick<PaperAskConfig, 'db' | 'logLevel' | 'jsonLogs'>> & {
    retrieval?: Partial<RetrievalConfig>;
    cache?: Partial<CacheConfig>;
    llm?: Partial<LlmConfig>;
    embedding?: Partial<EmbeddingConfig>;
};

/**
 * Load configuration from paperask.config.json using cosmiconfig.
 * Returns null if no config file is found (which is fine — defaults are used).
 */
async function loadConfigFile(searchFrom?: string): Promise<ConfigOverrides | null> {
    const explorer = cosmiconfig('paperask', {
        searchPlaces: ['paperask.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return result.config as ConfigOverrides;
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
    const overrides: ConfigOverrides = {};

    if (env['PAPERASK_DB']) {
        overrides.db = env['PAPERASK_DB'];
    }

    const level = parseLogLevel(env['PAPERASK_LOG_LEVEL']);
    if (level) {
        overrides.logLevel = level;
    }

    // API keys are accessed directly where needed (not stored in config)
    return overrides;
}

/**
 * Overlay the defined values of `patch` onto `base`.
 * Undefined values don't shadow lower-precedence sources.
 */
function overlay<T extends object>(base: T, patch: Partial<T> | undefined): T {
    const out = { ...base };
    if (!patch) return out;

    for (const key in patch) {
        const value = patch[key];
        if (value !== undefined) {
            out[key] = value;
        }
    }
    return out;
}

/**
 * Merge configuration from multiple sources, later sources winning.
 * Nested sections are merged key by key.
 */
export function mergeConfig(...sources: Array<ConfigOverrides | null>): PaperAskConfig {
    let merged: PaperAskConfig = DEFAULT_CONFIG;

    for (const source of sources) {
        if (!source) continue;
        merged = {
            ...overlay(merged, { db: source.db, logLevel: source.logLevel, jsonLogs: source.jsonLogs }),
            retrieval: overlay(merged.retrieval, source.retrieval),
            cache: overlay(merged.cache, source.cache),
            llm: overlay(merged.llm, source.llm),
            embedding: overlay(merged.embedding, source.embedding),
        };
    }

    return merged;
}

/**
 * Reject values the pipeline cannot run with.
 */
export function validateConfig(config: PaperAskConfig): PaperAskConfig {
    const providers = ['openai', 'ollama'];

    if (!Number.isInteger(config.retrieval.topK) || config.retrieval.topK < 1) {
        throw new ConfigurationError(`retrieval.topK must be a positive integer, got ${config.retrieval.topK}`);
    }
    if (!Number.isInteger(config.embedding.dimensions) || config.embedding.dimensions < 1) {
        throw new ConfigurationError(`embedding.dimensions must be a positive integer, got ${config.embedding.dimensions}`);
    }
    if (!providers.includes(config.llm.provider)) {
        throw new ConfigurationError(`Unknown llm.provider '${config.llm.provider}'`);
    }
    if (!providers.includes(config.embedding.provider)) {
        throw new ConfigurationError(`Unknown embedding.provider '${config.embedding.provider}'`);
    }

    return config;
}

/**
 * Resolve the effective configuration for a CLI run.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides,
    options: { searchFrom?: string } = {}
): Promise<PaperAskConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars();

    return validateConfig(mergeConfig(fileConfig, envConfig, cliFlags));
}

/**
 * Get API key from environment variable.
 * @param name - Environment variable name
 * @returns The API key or undefined
 */
export function getApiKey(name: string): string | undefined {
    return process.env[name];
}
