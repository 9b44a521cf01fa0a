import type { ScoredPassage } from './paper.js';

/**
 * Options shared by every capability call.
 */
export interface CallOptions {
    /** Aborts the underlying request when the caller gives up */
    signal?: AbortSignal;
}

/**
 * Maps text to a fixed-dimension vector.
 */
export interface EmbeddingProvider {
    /** Provider name */
    readonly name: string;

    /** Embedding model */
    readonly model: string;

    /** Length of every vector this provider returns */
    readonly dimensions: number;

    embed(text: string, options?: CallOptions): Promise<number[]>;
}

/**
 * Similarity search over the stored passages of one paper.
 */
export interface PassageIndex {
    /**
     * Return the `k` passages of `paperId` most similar to `queryVector`,
     * ordered by descending similarity.
     */
    topK(paperId: string, queryVector: number[], k: number): Promise<ScoredPassage[]>;
}

/**
 * Result of a generation call.
 */
export interface GeneratedAnswer {
    /** Answer text */
    text: string;

    /** Prompt + completion tokens consumed */
    tokensUsed: number;

    /** Model that produced the answer */
    model: string;
}

/**
 * Maps a question and its ordered context to an answer.
 *
 * Implementations throw `RateLimitError` when the upstream quota is exhausted
 * and any other error for remaining failures.
 */
export interface AnswerGenerator {
    /** Provider name */
    readonly name: string;

    /** Default model recorded with cached answers */
    readonly model: string;

    generate(question: string, context: string[], options?: CallOptions): Promise<GeneratedAnswer>;
}

/**
 * LLM provider initialization options.
 */
export interface LlmProviderOptions {
    /** API key (for cloud providers like OpenAI) */
    apiKey?: string;
    /** Base URL (for Ollama or custom OpenAI-compatible endpoints) */
    baseUrl?: string;
    /** Default model */
    model: string;
    /** Request timeout in ms */
    timeoutMs?: number;
    /** Transport retries for 5xx and network errors */
    maxRetries?: number;
}
