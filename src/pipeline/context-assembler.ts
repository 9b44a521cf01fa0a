import type { CallOptions, EmbeddingProvider, Paper, PaperStore, PassageIndex } from '../types/index.js';
import { NoContentError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { buildAbstractContext, buildMetadataContext } from './metadata-context.js';

/**
 * Ordered context for one question, plus the passages it was drawn from.
 */
export interface AssembledContext {
    context: string[];

    /** Ids of the passages in `context`, in order; empty for metadata-only context */
    passageIds: string[];
}

export interface ContextAssemblerOptions {
    /** Passages to retrieve */
    topK: number;
    /** Prepend the paper's metadata block */
    metadataInContext: boolean;
}

/**
 * Decides, per paper, between similarity-ranked passages and a metadata fallback.
 *
 * 1. Indexed passages → top K by similarity (metadata block first when enabled)
 * 2. Abstract only    → one metadata-derived element
 * 3. Neither          → NoContentError
 */
export class ContextAssembler {
    constructor(
        private readonly deps: {
            papers: Pick<PaperStore, 'countIndexedPassages'>;
            embeddings: EmbeddingProvider;
            index: PassageIndex;
        },
        private readonly options: ContextAssemblerOptions
    ) {}

    async assemble(paper: Paper, question: string, options: CallOptions = {}): Promise<AssembledContext> {
        const { papers, embeddings, index } = this.deps;
        const { topK, metadataInContext } = this.options;
        const logger = getLogger();

        const indexed = await papers.countIndexedPassages(paper.id);

        if (indexed > 0) {
            options.signal?.throwIfAborted();
            const queryVector = await embeddings.embed(question, { signal: options.signal });

            options.signal?.throwIfAborted();
            const passages = await index.topK(paper.id, queryVector, topK);

            logger.debug(
                { paperId: paper.id, indexed, retrieved: passages.length, topScore: passages[0]?.similarity },
                'Retrieved passages'
            );

            const context = passages.map((p) => p.content);
            return {
                context: metadataInContext ? [buildMetadataContext(paper), ...context] : context,
                passageIds: passages.map((p) => p.id),
            };
        }

        if (paper.abstract?.trim()) {
            logger.debug({ paperId: paper.id }, 'No indexed passages, using metadata context');
            return {
                context: [metadataInContext ? buildMetadataContext(paper) : buildAbstractContext(paper)],
                passageIds: [],
            };
        }

        throw new NoContentError(paper.id);
    }
}
