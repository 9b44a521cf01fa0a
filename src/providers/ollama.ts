import type {
    AnswerGenerator,
    CallOptions,
    EmbeddingProvider,
    GeneratedAnswer,
    LlmProviderOptions,
} from '../types/index.js';
import type { HttpClient, HttpResponse } from '../utils/http-client.js';
import { ProviderError } from '../utils/errors.js';
import { SYSTEM_PROMPT, buildAnswerPrompt, checkVector, toProviderError, trimBaseUrl } from './common.js';

const OLLAMA_BASE = 'http://localhost:11434';

/**
 * Ollama API response types (only the fields read here).
 */
interface OllamaEmbedResponse {
    embeddings?: unknown[];
}

interface OllamaChatResponse {
    model?: string;
    message?: { content?: string };
    prompt_eval_count?: number;
    eval_count?: number;
}

/**
 * Embeddings from a local Ollama server (`/api/embed`).
 */
export class OllamaEmbeddingProvider implements EmbeddingProvider {
    readonly name = 'ollama';
    readonly model: string;
    readonly dimensions: number;
    private readonly baseUrl: string;

    constructor(
        private readonly http: HttpClient,
        private readonly options: LlmProviderOptions & { dimensions: number }
    ) {
        this.model = options.model;
        this.dimensions = options.dimensions;
        this.baseUrl = trimBaseUrl(options.baseUrl ?? OLLAMA_BASE);
    }

    async embed(text: string, callOptions: CallOptions = {}): Promise<number[]> {
        let response: HttpResponse<OllamaEmbedResponse>;
        try {
            response = await this.http.post<OllamaEmbedResponse>(
                `${this.baseUrl}/api/embed`,
                { model: this.model, input: text },
                {
                    source: 'ollama',
                    timeout: this.options.timeoutMs,
                    maxRetries: this.options.maxRetries,
                    signal: callOptions.signal,
                }
            );
        } catch (error) {
            if (callOptions.signal?.aborted) throw error;
            throw toProviderError(error, this.name, 60000);
        }

        return checkVector(response.data.embeddings?.[0], this.dimensions, this.name);
    }
}

/**
 * Answers from a local Ollama server (`/api/chat`, non-streaming).
 */
export class OllamaAnswerGenerator implements AnswerGenerator {
    readonly name = 'ollama';
    readonly model: string;
    private readonly baseUrl: string;

    constructor(
        private readonly http: HttpClient,
        private readonly options: LlmProviderOptions & {
            temperature: number;
            maxOutputTokens: number;
            defaultRetryAfterMs: number;
        }
    ) {
        this.model = options.model;
        this.baseUrl = trimBaseUrl(options.baseUrl ?? OLLAMA_BASE);
    }

    async generate(question: string, context: string[], callOptions: CallOptions = {}): Promise<GeneratedAnswer> {
        let response: HttpResponse<OllamaChatResponse>;
        try {
            response = await this.http.post<OllamaChatResponse>(
                `${this.baseUrl}/api/chat`,
                {
                    model: this.model,
                    stream: false,
                    options: {
                        temperature: this.options.temperature,
                        num_predict: this.options.maxOutputTokens,
                    },
                    messages: [
                        { role: 'system', content: SYSTEM_PROMPT },
                        { role: 'user', content: buildAnswerPrompt(question, context) },
                    ],
                },
                {
                    source: 'ollama',
                    timeout: this.options.timeoutMs,
                    maxRetries: this.options.maxRetries,
                    signal: callOptions.signal,
                }
            );
        } catch (error) {
            if (callOptions.signal?.aborted) throw error;
            throw toProviderError(error, this.name, this.options.defaultRetryAfterMs);
        }

        const body = response.data;
        const text = body.message?.content;
        if (!text) {
            throw new ProviderError('ollama returned an empty answer', this.name, body);
        }

        return {
            text,
            tokensUsed: (body.prompt_eval_count ?? 0) + (body.eval_count ?? 0),
            model: body.model ?? this.model,
        };
    }
}
