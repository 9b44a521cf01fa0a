import type {
    AnswerGenerator,
    AskFailure,
    AskRequest,
    AskResult,
    CacheEntry,
    CallOptions,
    GeneratedAnswer,
    PaperStore,
} from '../types/index.js';
import type { AnswerCache } from '../cache/answer-cache.js';
import { fingerprintQuestion } from '../cache/question-key.js';
import { canonicalPaperId } from '../utils/identifiers.js';
import { NoContentError, RateLimitError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import type { AssembledContext, ContextAssembler } from './context-assembler.js';
import { SingleFlight } from './single-flight.js';

/**
 * Collaborators, constructed once at startup.
 */
export interface RagPipelineDeps {
    papers: PaperStore;
    cache: AnswerCache;
    assembler: ContextAssembler;
    generator: AnswerGenerator;
}

export interface RagPipelineOptions {
    /** Probe and write the answer cache */
    cacheEnabled: boolean;
    /** Share one generation between concurrent identical misses */
    singleFlight: boolean;
}

function fail(error: AskFailure): AskResult {
    return { ok: false, error };
}

/**
 * End-to-end "ask a question about a paper".
 *
 * Start → CacheProbe → CacheHit
 *                    → PaperResolve → ContextAssembly → Generation → CacheWrite
 *
 * PaperResolve, ContextAssembly and Generation may end in a failure result.
 * CacheWrite never fails the request. Nothing is retried here.
 */
export class RagPipeline {
    private readonly inflight = new SingleFlight<AskResult>();

    constructor(
        private readonly deps: RagPipelineDeps,
        private readonly options: RagPipelineOptions
    ) {}

    /**
     * Answer a question. Rejects only when `options.signal` aborts or the store fails.
     */
    async ask(request: AskRequest, options: CallOptions = {}): Promise<AskResult> {
        const { signal } = options;
        const question = request.question.trim();
        const paperRef = request.paperId.trim();

        if (!question) {
            return fail({ kind: 'invalid_request', message: 'Question must not be empty' });
        }
        if (!paperRef) {
            return fail({ kind: 'invalid_request', message: 'Paper id must not be empty' });
        }

        signal?.throwIfAborted();

        const fingerprint = fingerprintQuestion(question);
        const paperKey = canonicalPaperId(paperRef);

        if (this.options.cacheEnabled) {
            const hit = await this.probeCache(paperKey, fingerprint);
            if (hit) return hit;
        }

        const generate = (flightSignal?: AbortSignal) =>
            this.answerFromSources(paperRef, question, fingerprint, flightSignal);

        if (this.options.singleFlight) {
            return this.inflight.run(`${paperKey}:${fingerprint}`, generate, signal);
        }
        return generate(signal);
    }

    private async probeCache(paperKey: string, fingerprint: string): Promise<AskResult | null> {
        const { cache } = this.deps;
        const logger = getLogger();

        let entry: CacheEntry | null;
        let contextUsed: string[];
        try {
            entry = await cache.lookup(paperKey, fingerprint);
            if (!entry) return null;
            contextUsed = await cache.resolveContext(entry.context_chunk_ids);
        } catch (error) {
            logger.warn({ error, paperId: paperKey }, 'Cache read failed, treating as miss');
            return null;
        }

        // Fire-and-forget; recordHit logs its own failures
        void cache.recordHit(entry.id);

        logger.info(
            { paperId: paperKey, entryId: entry.id, hits: entry.hit_count + 1, context: contextUsed.length },
            'Answer served from cache'
        );

        return {
            ok: true,
            response: { answer: entry.answer, source: 'cache', context_used: contextUsed },
        };
    }

    private async answerFromSources(
        paperRef: string,
        question: string,
        fingerprint: string,
        signal?: AbortSignal
    ): Promise<AskResult> {
        const { papers, assembler, generator, cache } = this.deps;
        const logger = getLogger();

        // ── PaperResolve ──
        const paper = await papers.findPaper(paperRef);
        if (!paper) {
            return fail({ kind: 'paper_not_found', paperId: paperRef, message: `Paper '${paperRef}' not found` });
        }

        // ── ContextAssembly ──
        let assembled: AssembledContext;
        try {
            assembled = await assembler.assemble(paper, question, { signal });
        } catch (error) {
            if (error instanceof NoContentError) {
                return fail({ kind: 'no_content', paperId: paperRef, message: 'No content found for this paper' });
            }
            return this.upstreamFailure(error, 'retrieval', signal);
        }

        // ── Generation ──
        let generated: GeneratedAnswer;
        try {
            signal?.throwIfAborted();
            generated = await generator.generate(question, assembled.context, { signal });
        } catch (error) {
            return this.upstreamFailure(error, 'generation', signal);
        }

        logger.info(
            { paperId: paper.id, model: generated.model, tokens: generated.tokensUsed, passages: assembled.passageIds.length },
            'Answer generated'
        );

        // ── CacheWrite ──
        if (this.options.cacheEnabled) {
            try {
                await cache.store({
                    paperId: paper.id,
                    question,
                    fingerprint,
                    answer: generated.text,
                    passageIds: assembled.passageIds,
                    model: generated.model,
                    tokensUsed: generated.tokensUsed,
                });
            } catch (error) {
                logger.warn({ error, paperId: paper.id }, 'Cache persistence warning: answer returned but not cached');
            }
        }

        return {
            ok: true,
            response: { answer: generated.text, source: 'llm', context_used: assembled.context },
        };
    }

    /**
     * Map a provider failure to a result. Caller aborts are rethrown, not mapped.
     */
    private upstreamFailure(error: unknown, stage: 'retrieval' | 'generation', signal?: AbortSignal): AskResult {
        if (signal?.aborted) {
            throw signal.reason;
        }

        if (error instanceof RateLimitError) {
            const seconds = Math.ceil(error.retryAfterMs / 1000);
            getLogger().warn({ stage, retryAfterMs: error.retryAfterMs }, 'Upstream rate limit reached');
            return fail({
                kind: 'rate_limited',
                retryAfterMs: error.retryAfterMs,
                message: `Rate limit reached. Please wait about ${seconds} seconds and try again.`,
            });
        }

        getLogger().error({ error, stage }, 'Upstream provider failed');
        return fail({ kind: 'upstream_error', message: 'The answer could not be generated. Please try again later.' });
    }
}
