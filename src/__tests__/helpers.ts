import { vi } from 'vitest';
import type {
    AnswerGenerator,
    CallOptions,
    EmbeddingProvider,
    GeneratedAnswer,
    Paper,
    PaperAskConfig,
} from '../types/index.js';
import { mergeConfig, type ConfigOverrides } from '../utils/config.js';

/** Embedding length used throughout the tests */
export const TEST_DIMS = 3;

/**
 * Embedding provider that maps every text through `vectorFor`.
 */
export function fakeEmbeddings(vectorFor: (text: string) => number[] = () => [1, 0, 0]) {
    const embed = vi.fn(async (text: string, _options?: CallOptions): Promise<number[]> => vectorFor(text));
    const provider: EmbeddingProvider = { name: 'fake', model: 'fake-embed', dimensions: TEST_DIMS, embed };
    return { provider, embed };
}

/**
 * Answer generator returning a fixed answer worth 42 tokens.
 */
export function fakeGenerator(text = 'Generated answer') {
    const generate = vi.fn(
        async (_question: string, _context: string[], _options?: CallOptions): Promise<GeneratedAnswer> => ({
            text,
            tokensUsed: 42,
            model: 'fake-llm',
        })
    );
    const generator: AnswerGenerator = { name: 'fake', model: 'fake-llm', generate };
    return { generator, generate };
}

export function testConfig(overrides: ConfigOverrides = {}): PaperAskConfig {
    return mergeConfig({ db: ':memory:', embedding: { dimensions: TEST_DIMS } }, overrides);
}

export function makePaper(overrides: Partial<Paper> = {}): Paper {
    return {
        id: 'paper-1',
        arxiv_id: '2401.00001',
        title: 'Attention Study',
        abstract: 'We study attention.',
        authors: [],
        categories: [],
        published_date: null,
        pdf_url: null,
        references: [],
        cited_by: [],
        is_processed: false,
        chunk_count: 0,
        ...overrides,
    };
}

/**
 * A promise with its settle functions exposed.
 */
export function deferred<T>(): {
    promise: Promise<T>;
    resolve: (value: T) => void;
    reject: (reason: unknown) => void;
} {
    let resolve: (value: T) => void = () => undefined;
    let reject: (reason: unknown) => void = () => undefined;
    const promise = new Promise<T>((res, rej) => {
        resolve = res;
        reject = rej;
    });
    return { promise, resolve, reject };
}
