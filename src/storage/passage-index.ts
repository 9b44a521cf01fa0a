import type { PassageIndex, ScoredPassage } from '../types/index.js';
import { findTopKSimilar } from '../nlp/similarity.js';
import { getLogger } from '../utils/logger.js';
import type { PaperQaDatabase } from './database.js';

/**
 * Exact cosine search over the embeddings stored in `paper_chunks`.
 * Candidates are loaded per paper, so the scan is bounded by one paper's passages.
 */
export class SqlitePassageIndex implements PassageIndex {
    constructor(private readonly db: PaperQaDatabase) {}

    async topK(paperId: string, queryVector: number[], k: number): Promise<ScoredPassage[]> {
        const candidates = this.db.getIndexedPassages(paperId);
        const mismatched = candidates.filter((c) => c.embedding.length !== queryVector.length);

        if (mismatched.length > 0) {
            getLogger().warn(
                { paperId, expected: queryVector.length, mismatched: mismatched.length },
                'Ignoring passages whose embedding dimension differs from the query'
            );
        }

        const ranked = findTopKSimilar(
            queryVector,
            candidates.filter((c) => c.embedding.length === queryVector.length),
            k
        );

        return ranked.map(({ item, similarity }) => ({
            id: item.id,
            content: item.content,
            similarity,
        }));
    }
}
