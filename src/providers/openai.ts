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

const OPENAI_BASE = 'https://api.openai.com/v1';

/**
 * OpenAI API response types (only the fields read here).
 */
interface OpenAiEmbeddingResponse {
    data?: Array<{ embedding?: unknown; index?: number }>;
}

interface OpenAiChatResponse {
    model?: string;
    choices?: Array<{ message?: { content?: string | null } }>;
    usage?: {
        prompt_tokens?: number;
        completion_tokens?: number;
        total_tokens?: number;
    };
}

function authHeaders(apiKey: string | undefined): Record<string, string> {
    return apiKey ? { Authorization: `Bearer ${apiKey}` } : {};
}

/**
 * Embeddings from any OpenAI-compatible `/embeddings` endpoint.
 */
export class OpenAiEmbeddingProvider implements EmbeddingProvider {
    readonly name = 'openai';
    readonly model: string;
    readonly dimensions: number;
    private readonly baseUrl: string;

    constructor(
        private readonly http: HttpClient,
        private readonly options: LlmProviderOptions & { dimensions: number; defaultRetryAfterMs?: number }
    ) {
        this.model = options.model;
        this.dimensions = options.dimensions;
        this.baseUrl = trimBaseUrl(options.baseUrl ?? OPENAI_BASE);
    }

    async embed(text: string, callOptions: CallOptions = {}): Promise<number[]> {
        let response: HttpResponse<OpenAiEmbeddingResponse>;
        try {
            response = await this.http.post<OpenAiEmbeddingResponse>(
                `${this.baseUrl}/embeddings`,
                { model: this.model, input: text, dimensions: this.dimensions },
                {
                    source: 'openai',
                    headers: authHeaders(this.options.apiKey),
                    timeout: this.options.timeoutMs,
                    maxRetries: this.options.maxRetries,
                    signal: callOptions.signal,
                }
            );
        } catch (error) {
            if (callOptions.signal?.aborted) throw error;
            throw toProviderError(error, this.name, this.options.defaultRetryAfterMs ?? 60000);
        }

        return checkVector(response.data.data?.[0]?.embedding, this.dimensions, this.name);
    }
}

/**
 * Answers from any OpenAI-compatible `/chat/completions` endpoint.
 */
export class OpenAiAnswerGenerator implements AnswerGenerator {
    readonly name = 'openai';
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
        this.baseUrl = trimBaseUrl(options.baseUrl ?? OPENAI_BASE);
    }

    async generate(question: string, context: string[], callOptions: CallOptions = {}): Promise<GeneratedAnswer> {
        let response: HttpResponse<OpenAiChatResponse>;
        try {
            response = await this.http.post<OpenAiChatResponse>(
                `${this.baseUrl}/chat/completions`,
                {
                    model: this.model,
                    temperature: this.options.temperature,
                    max_tokens: this.options.maxOutputTokens,
                    messages: [
                        { role: 'system', content: SYSTEM_PROMPT },
                        { role: 'user', content: buildAnswerPrompt(question, context) },
                    ],
                },
                {
                    source: 'openai',
                    headers: authHeaders(this.options.apiKey),
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
        const text = body.choices?.[0]?.message?.content;
        if (!text) {
            throw new ProviderError('openai returned an empty answer', this.name, body);
        }

        const usage = body.usage;
        const tokensUsed = usage?.total_tokens ?? (usage?.prompt_tokens ?? 0) + (usage?.completion_tokens ?? 0);

        return { text, tokensUsed, model: body.model ?? this.model };
    }
}
