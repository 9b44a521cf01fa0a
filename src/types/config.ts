/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * Providers that can back the embedding and generation capabilities.
 */
export type ProviderName = 'openai' | 'ollama';

/**
 * Answer generation configuration.
 */
export interface LlmConfig {
    provider: ProviderName;
    model: string;
    baseUrl?: string;
    temperature: number;
    maxOutputTokens: number;
    timeoutMs: number;
    /** Transport retries for 5xx/network errors; 429 is never retried */
    maxRetries: number;
    /** Wait hint used when a rate-limited response carries no Retry-After */
    defaultRetryAfterMs: number;
}

/**
 * Embedding configuration.
 */
export interface EmbeddingConfig {
    provider: ProviderName;
    model: string;
    baseUrl?: string;
    /** Vector length; checked against provider and stored passages at startup */
    dimensions: number;
    timeoutMs: number;
    maxRetries: number;
}

/**
 * Retrieval configuration.
 */
export interface RetrievalConfig {
    /** Passages sent to the generator */
    topK: number;
    /** Put the paper's metadata block first in the context */
    metadataInContext: boolean;
}

/**
 * Answer cache configuration.
 */
export interface CacheConfig {
    enabled: boolean;
    /** Share one generation between concurrent identical misses in this process */
    singleFlight: boolean;
}

/**
 * Full paperask configuration merged from CLI flags, env vars, and config file.
 */
export interface PaperAskConfig {
    /** SQLite database path */
    db: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    retrieval: RetrievalConfig;
    cache: CacheConfig;
    llm: LlmConfig;
    embedding: EmbeddingConfig;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: PaperAskConfig = {
    db: './paperask.db',
    logLevel: 'info',
    jsonLogs: false,
    retrieval: {
        topK: 5,
        metadataInContext: true,
    },
    cache: {
        enabled: true,
        singleFlight: true,
    },
    llm: {
        provider: 'openai',
        model: 'gpt-4.1-mini',
        temperature: 0.3,
        maxOutputTokens: 1024,
        timeoutMs: 60000,
        maxRetries: 0,
        defaultRetryAfterMs: 60000,
    },
    embedding: {
        provider: 'openai',
        model: 'text-embedding-3-small',
        dimensions: 768,
        timeoutMs: 30000,
        maxRetries: 2,
    },
};
