import type { AnswerGenerator, EmbeddingProvider, PaperAskConfig } from '../types/index.js';
import { AnswerCache } from '../cache/answer-cache.js';
import { createAnswerGenerator, createEmbeddingProvider } from '../providers/index.js';
import type { PaperQaDatabase } from '../storage/database.js';
import { SqlitePassageIndex } from '../storage/passage-index.js';
import { SqlitePaperStore } from '../storage/sqlite-store.js';
import type { HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { ContextAssembler } from './context-assembler.js';
import { checkEmbeddingDimensions } from './preflight.js';
import { RagPipeline } from './rag-pipeline.js';

/**
 * Wire the pipeline over an open database. Providers default to the ones named
 * in config; pass them explicitly to substitute other implementations.
 */
export function createPipeline(
    config: PaperAskConfig,
    db: PaperQaDatabase,
    http: HttpClient,
    overrides: { embeddings?: EmbeddingProvider; generator?: AnswerGenerator } = {}
): RagPipeline {
    const embeddings = overrides.embeddings ?? createEmbeddingProvider(config.embedding, http);
    const generator = overrides.generator ?? createAnswerGenerator(config.llm, http);

    checkEmbeddingDimensions(config.embedding.dimensions, embeddings, db.getEmbeddingDimensions());

    const store = new SqlitePaperStore(db);
    const assembler = new ContextAssembler(
        { papers: store, embeddings, index: new SqlitePassageIndex(db) },
        { topK: config.retrieval.topK, metadataInContext: config.retrieval.metadataInContext }
    );

    getLogger().debug(
        { embeddings: `${embeddings.name}/${embeddings.model}`, generator: `${generator.name}/${generator.model}`, topK: config.retrieval.topK },
        'Pipeline ready'
    );

    return new RagPipeline(
        { papers: store, cache: new AnswerCache(store, store), assembler, generator },
        { cacheEnabled: config.cache.enabled, singleFlight: config.cache.singleFlight }
    );
}
