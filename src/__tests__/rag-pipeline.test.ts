import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { PaperQaDatabase } from '../storage/database.js';
import { createPipeline } from '../pipeline/create-pipeline.js';
import type { RagPipeline } from '../pipeline/rag-pipeline.js';
import { fingerprintQuestion } from '../cache/question-key.js';
import { createHttpClient } from '../utils/http-client.js';
import { paperIdFor } from '../utils/identifiers.js';
import { ProviderError, RateLimitError } from '../utils/errors.js';
import type { ConfigOverrides } from '../utils/config.js';
import { deferred, fakeEmbeddings, fakeGenerator, testConfig } from './helpers.js';

const P_METADATA = [
    'Title: Attention Study',
    'arXiv ID: 2401.00001',
    'Authors: Ada Lovelace, Alan Turing',
    'Number of authors: 2',
    'Published: 2024-01-05',
    'Categories: cs.LG',
    '',
    'Abstract:',
    'We study attention.',
].join('\n');

const Q_METADATA = ['Title: Abstract Only', 'arXiv ID: 2401.00002', '', 'Abstract:', 'Only an abstract.'].join('\n');

describe('RagPipeline', () => {
    let db: PaperQaDatabase;
    let passageIds: string[];
    let embeddings: ReturnType<typeof fakeEmbeddings>;
    let llm: ReturnType<typeof fakeGenerator>;

    function pipeline(overrides: ConfigOverrides = {}): RagPipeline {
        return createPipeline(testConfig(overrides), db, createHttpClient(), {
            embeddings: embeddings.provider,
            generator: llm.generator,
        });
    }

    beforeEach(() => {
        db = new PaperQaDatabase(':memory:');

        // P: three embedded passages
        const p = db.upsertPaper({
            arxiv_id: '2401.00001',
            title: 'Attention Study',
            abstract: 'We study attention.',
            authors: ['Ada Lovelace', 'Alan Turing'],
            categories: ['cs.LG'],
            published_date: '2024-01-05T00:00:00Z',
        });
        passageIds = db.insertPassages(p.id, [
            { content: 'Passage about methods', chunk_index: 0, embedding: [1, 0, 0] },
            { content: 'Passage about results', chunk_index: 1, embedding: [0, 1, 0] },
            { content: 'Passage about authors', chunk_index: 2, embedding: [0.9, 0.1, 0] },
        ]);

        // Q: abstract only
        db.upsertPaper({ arxiv_id: '2401.00002', title: 'Abstract Only', abstract: 'Only an abstract.' });

        // R: nothing to answer from
        db.upsertPaper({ arxiv_id: '2401.00003', title: 'Empty Paper' });

        embeddings = fakeEmbeddings();
        llm = fakeGenerator();
    });

    afterEach(() => {
        db.close();
        vi.restoreAllMocks();
    });

    describe('end-to-end scenarios', () => {
        it('A: generates on a miss, then serves the same answer from cache', async () => {
            const rag = pipeline();

            const first = await rag.ask({ paperId: '2401.00001', question: 'Who are the authors?' });
            expect(first).toEqual({
                ok: true,
                response: {
                    answer: 'Generated answer',
                    source: 'llm',
                    context_used: [P_METADATA, 'Passage about methods', 'Passage about authors', 'Passage about results'],
                },
            });

            const entry = db.findCacheEntry(paperIdFor('2401.00001'), fingerprintQuestion('Who are the authors?'));
            expect(entry?.context_chunk_ids).toEqual([passageIds[0], passageIds[2], passageIds[1]]);
            expect(entry?.tokens_used).toBe(42);
            expect(entry?.model_used).toBe('fake-llm');
            expect(entry?.question).toBe('Who are the authors?');

            const second = await rag.ask({ paperId: '2401.00001', question: '  who are the AUTHORS?  ' });
            expect(second).toEqual({
                ok: true,
                response: {
                    answer: 'Generated answer',
                    source: 'cache',
                    context_used: ['Passage about methods', 'Passage about authors', 'Passage about results'],
                },
            });

            expect(llm.generate).toHaveBeenCalledTimes(1);
            expect(embeddings.embed).toHaveBeenCalledTimes(1);
            expect(db.getCacheEntryById(entry?.id ?? '')?.hit_count).toBe(1);
        });

        it('A: caps retrieved passages at topK', async () => {
            const result = await pipeline({ retrieval: { topK: 2 } }).ask({
                paperId: '2401.00001',
                question: 'Who are the authors?',
            });

            expect(result.ok && result.response.context_used).toEqual([
                P_METADATA,
                'Passage about methods',
                'Passage about authors',
            ]);
            expect(
                db.findCacheEntry(paperIdFor('2401.00001'), fingerprintQuestion('Who are the authors?'))?.context_chunk_ids
            ).toEqual([passageIds[0], passageIds[2]]);
        });

        it('B: answers from metadata alone when the paper has no passages', async () => {
            const result = await pipeline().ask({ paperId: '2401.00002', question: 'What is it about?' });

            expect(result).toEqual({
                ok: true,
                response: { answer: 'Generated answer', source: 'llm', context_used: [Q_METADATA] },
            });
            expect(embeddings.embed).not.toHaveBeenCalled();
            expect(llm.generate).toHaveBeenCalledWith('What is it about?', [Q_METADATA], expect.anything());
            expect(
                db.findCacheEntry(paperIdFor('2401.00002'), fingerprintQuestion('What is it about?'))?.context_chunk_ids
            ).toEqual([]);
        });

        it('C: reports no content when there are neither passages nor an abstract', async () => {
            const result = await pipeline().ask({ paperId: '2401.00003', question: 'Anything?' });

            expect(result).toEqual({
                ok: false,
                error: { kind: 'no_content', paperId: '2401.00003', message: 'No content found for this paper' },
            });
            expect(llm.generate).not.toHaveBeenCalled();
            expect(db.getStats().cacheEntries).toBe(0);
        });

        it('D: drops passages removed since the answer was cached', async () => {
            const rag = pipeline();
            await rag.ask({ paperId: '2401.00001', question: 'Who are the authors?' });

            expect(db.removePassages([passageIds[2] ?? ''])).toBe(1);

            const replay = await rag.ask({ paperId: '2401.00001', question: 'Who are the authors?' });
            expect(replay).toEqual({
                ok: true,
                response: {
                    answer: 'Generated answer',
                    source: 'cache',
                    context_used: ['Passage about methods', 'Passage about results'],
                },
            });
        });
    });

    describe('paper resolution', () => {
        it('returns paper_not_found before any upstream call', async () => {
            const result = await pipeline().ask({ paperId: '2401.09999', question: 'Who wrote this?' });

            expect(result).toEqual({
                ok: false,
                error: { kind: 'paper_not_found', paperId: '2401.09999', message: "Paper '2401.09999' not found" },
            });
            expect(embeddings.embed).not.toHaveBeenCalled();
            expect(llm.generate).not.toHaveBeenCalled();
        });

        it('shares cache entries between the internal id and arXiv id forms', async () => {
            const rag = pipeline();
            await rag.ask({ paperId: 'https://arxiv.org/abs/2401.00002v2', question: 'What is it about?' });

            const byId = await rag.ask({ paperId: paperIdFor('2401.00002'), question: 'What is it about?' });
            const byPrefix = await rag.ask({ paperId: 'arXiv:2401.00002', question: 'what is it about?' });

            expect(byId.ok && byId.response.source).toBe('cache');
            expect(byPrefix.ok && byPrefix.response.source).toBe('cache');
            expect(llm.generate).toHaveBeenCalledTimes(1);
        });

        it('rejects an empty question', async () => {
            const result = await pipeline().ask({ paperId: '2401.00001', question: '   ' });

            expect(result).toEqual({
                ok: false,
                error: { kind: 'invalid_request', message: 'Question must not be empty' },
            });
        });
    });

    describe('upstream failures', () => {
        it('maps generator quota exhaustion to rate_limited', async () => {
            llm.generate.mockRejectedValueOnce(new RateLimitError('quota exhausted', 30000));

            const result = await pipeline().ask({ paperId: '2401.00002', question: 'What is it about?' });

            expect(result).toEqual({
                ok: false,
                error: {
                    kind: 'rate_limited',
                    retryAfterMs: 30000,
                    message: 'Rate limit reached. Please wait about 30 seconds and try again.',
                },
            });
            expect(db.getStats().cacheEntries).toBe(0);
        });

        it('maps embedding quota exhaustion to rate_limited', async () => {
            embeddings.embed.mockRejectedValueOnce(new RateLimitError('quota exhausted', 1500));

            const result = await pipeline().ask({ paperId: '2401.00001', question: 'Who are the authors?' });

            expect(!result.ok && result.error.kind).toBe('rate_limited');
            expect(!result.ok && result.error.message).toBe('Rate limit reached. Please wait about 2 seconds and try again.');
            expect(llm.generate).not.toHaveBeenCalled();
        });

        it('hides provider detail behind upstream_error', async () => {
            llm.generate.mockRejectedValueOnce(new ProviderError('openai request failed: HTTP 500', 'openai'));

            const result = await pipeline().ask({ paperId: '2401.00002', question: 'What is it about?' });

            expect(result).toEqual({
                ok: false,
                error: { kind: 'upstream_error', message: 'The answer could not be generated. Please try again later.' },
            });
        });

        it('still returns the answer when the cache write fails', async () => {
            vi.spyOn(db, 'insertCacheEntry').mockImplementation(() => {
                throw new Error('disk I/O error');
            });

            const result = await pipeline().ask({ paperId: '2401.00002', question: 'What is it about?' });

            expect(result).toEqual({
                ok: true,
                response: { answer: 'Generated answer', source: 'llm', context_used: [Q_METADATA] },
            });
        });

        it('treats a failing cache probe as a miss', async () => {
            vi.spyOn(db, 'findCacheEntry').mockImplementation(() => {
                throw new Error('database is locked');
            });

            const result = await pipeline().ask({ paperId: '2401.00002', question: 'What is it about?' });

            expect(result.ok && result.response.source).toBe('llm');
        });

        it('treats a failing context replay as a miss', async () => {
            const rag = pipeline();
            await rag.ask({ paperId: '2401.00001', question: 'Who are the authors?' });
            vi.spyOn(db, 'getPassagesByIds').mockImplementation(() => {
                throw new Error('database is locked');
            });

            const result = await rag.ask({ paperId: '2401.00001', question: 'Who are the authors?' });

            expect(result.ok && result.response.source).toBe('llm');
            expect(llm.generate).toHaveBeenCalledTimes(2);
            const entry = db.findCacheEntry(paperIdFor('2401.00001'), fingerprintQuestion('Who are the authors?'));
            expect(entry?.hit_count).toBe(0);
        });
    });

    describe('cache switch', () => {
        it('neither reads nor writes the cache when disabled', async () => {
            const rag = pipeline({ cache: { enabled: false } });

            await rag.ask({ paperId: '2401.00002', question: 'What is it about?' });
            const second = await rag.ask({ paperId: '2401.00002', question: 'What is it about?' });

            expect(second.ok && second.response.source).toBe('llm');
            expect(llm.generate).toHaveBeenCalledTimes(2);
            expect(db.getStats().cacheEntries).toBe(0);
        });
    });

    describe('concurrency', () => {
        it('shares one generation between concurrent identical misses', async () => {
            const pending = deferred<{ text: string; tokensUsed: number; model: string }>();
            llm.generate.mockImplementationOnce(() => pending.promise);

            const rag = pipeline();
            const first = rag.ask({ paperId: '2401.00002', question: 'What is it about?' });
            const second = rag.ask({ paperId: '2401.00002', question: 'WHAT is it about?' });

            await vi.waitFor(() => expect(llm.generate).toHaveBeenCalledTimes(1));
            pending.resolve({ text: 'Shared answer', tokensUsed: 7, model: 'fake-llm' });

            const results = await Promise.all([first, second]);
            for (const result of results) {
                expect(result).toEqual({
                    ok: true,
                    response: { answer: 'Shared answer', source: 'llm', context_used: [Q_METADATA] },
                });
            }
            expect(llm.generate).toHaveBeenCalledTimes(1);
            expect(db.getStats().cacheEntries).toBe(1);
        });

        it('tolerates duplicate generation without single-flight and keeps one entry', async () => {
            const rag = pipeline({ cache: { singleFlight: false } });

            const results = await Promise.all([
                rag.ask({ paperId: '2401.00002', question: 'What is it about?' }),
                rag.ask({ paperId: '2401.00002', question: 'What is it about?' }),
            ]);

            expect(results.every((r) => r.ok && r.response.source === 'llm')).toBe(true);
            expect(llm.generate).toHaveBeenCalledTimes(2);
            expect(db.getStats().cacheEntries).toBe(1);
        });

        it('rejects with the reason when the signal is already aborted', async () => {
            const controller = new AbortController();
            controller.abort(new Error('cancelled'));

            await expect(
                pipeline().ask({ paperId: '2401.00002', question: 'What is it about?' }, { signal: controller.signal })
            ).rejects.toThrow('cancelled');
            expect(llm.generate).not.toHaveBeenCalled();
        });

        it('aborts the generation call when the only caller gives up', async () => {
            let generationSignal: AbortSignal | undefined;
            llm.generate.mockImplementationOnce(
                (_question, _context, options) =>
                    new Promise((_resolve, reject) => {
                        generationSignal = options?.signal;
                        options?.signal?.addEventListener('abort', () => reject(options?.signal?.reason));
                    })
            );

            const controller = new AbortController();
            const asked = pipeline().ask(
                { paperId: '2401.00002', question: 'What is it about?' },
                { signal: controller.signal }
            );

            await vi.waitFor(() => expect(llm.generate).toHaveBeenCalledTimes(1));
            controller.abort(new Error('user gave up'));

            await expect(asked).rejects.toThrow('user gave up');
            expect(generationSignal?.aborted).toBe(true);
            expect(db.getStats().cacheEntries).toBe(0);
        });
    });
});
