import { HttpError } from '../utils/http-client.js';
import { ProviderError, RateLimitError } from '../utils/errors.js';

/** Separator placed between context elements in the prompt */
export const CONTEXT_SEPARATOR = '\n\n---\n\n';

export const SYSTEM_PROMPT = [
    'You are a helpful research assistant that answers questions about academic papers.',
    "You have access to the paper's metadata (title, authors, publication date, abstract,",
    'categories, references) and to passages retrieved from its text.',
    'Answer the question accurately based on the provided context.',
    'For factual questions (who wrote it, when it was published, how many references),',
    'answer directly from the metadata.',
    'For conceptual questions, add background knowledge that helps a student understand.',
    "If the context doesn't fully answer the question, supplement it with general knowledge",
    'and say clearly when you are doing so.',
].join(' ');

/**
 * User message: the context elements joined by `CONTEXT_SEPARATOR`, then the question.
 */
export function buildAnswerPrompt(question: string, context: string[]): string {
    return `Context:\n${context.join(CONTEXT_SEPARATOR)}\n\nQuestion: ${question}`;
}

/**
 * Classify a failed provider call.
 * 429 becomes RateLimitError; everything else a ProviderError carrying the detail for logs.
 */
export function toProviderError(error: unknown, provider: string, defaultRetryAfterMs: number): Error {
    if (error instanceof RateLimitError || error instanceof ProviderError) {
        return error;
    }

    if (error instanceof HttpError) {
        if (error.status === 429) {
            return new RateLimitError(
                `${provider} rate limit reached`,
                error.retryAfterMs ?? defaultRetryAfterMs
            );
        }
        return new ProviderError(`${provider} request failed: ${error.message}`, provider, error.response);
    }

    return new ProviderError(
        `${provider} request failed: ${error instanceof Error ? error.message : String(error)}`,
        provider,
        error
    );
}

/**
 * Validate an embedding vector returned by a provider.
 */
export function checkVector(value: unknown, dimensions: number, provider: string): number[] {
    if (!Array.isArray(value) || !value.every((v): v is number => typeof v === 'number')) {
        throw new ProviderError(`${provider} returned no embedding`, provider, value);
    }
    if (value.length !== dimensions) {
        throw new ProviderError(
            `${provider} returned a ${value.length}-dim embedding, expected ${dimensions}`,
            provider
        );
    }
    return value;
}

/**
 * Strip trailing slashes so paths can be appended.
 */
export function trimBaseUrl(url: string): string {
    return url.replace(/\/+$/, '');
}
