import type { AnswerGenerator, EmbeddingConfig, EmbeddingProvider, LlmConfig } from '../types/index.js';
import { getApiKey } from '../utils/config.js';
import { ConfigurationError } from '../utils/errors.js';
import type { HttpClient } from '../utils/http-client.js';
import { OllamaAnswerGenerator, OllamaEmbeddingProvider } from './ollama.js';
import { OpenAiAnswerGenerator, OpenAiEmbeddingProvider } from './openai.js';

/**
 * OPENAI_API_KEY, required unless a custom OpenAI-compatible base URL is configured.
 */
function openAiKey(baseUrl: string | undefined): string | undefined {
    const apiKey = getApiKey('OPENAI_API_KEY');
    if (!apiKey && !baseUrl) {
        throw new ConfigurationError('OPENAI_API_KEY is not set');
    }
    return apiKey;
}

/**
 * Build the embedding capability selected by config.
 */
export function createEmbeddingProvider(config: EmbeddingConfig, http: HttpClient): EmbeddingProvider {
    const options = {
        model: config.model,
        baseUrl: config.baseUrl,
        dimensions: config.dimensions,
        timeoutMs: config.timeoutMs,
        maxRetries: config.maxRetries,
    };

    switch (config.provider) {
        case 'ollama':
            return new OllamaEmbeddingProvider(http, options);
        case 'openai':
        default:
            return new OpenAiEmbeddingProvider(http, { ...options, apiKey: openAiKey(config.baseUrl) });
    }
}

/**
 * Build the answer generation capability selected by config.
 */
export function createAnswerGenerator(config: LlmConfig, http: HttpClient): AnswerGenerator {
    const options = {
        model: config.model,
        baseUrl: config.baseUrl,
        temperature: config.temperature,
        maxOutputTokens: config.maxOutputTokens,
        timeoutMs: config.timeoutMs,
        maxRetries: config.maxRetries,
        defaultRetryAfterMs: config.defaultRetryAfterMs,
    };

    switch (config.provider) {
        case 'ollama':
            return new OllamaAnswerGenerator(http, options);
        case 'openai':
        default:
            return new OpenAiAnswerGenerator(http, { ...options, apiKey: openAiKey(config.baseUrl) });
    }
}
