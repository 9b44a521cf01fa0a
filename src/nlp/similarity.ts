/**
 * Compute cosine similarity between two dense vectors.
 * Returns value in [-1, 1]; 0 for mismatched lengths or zero vectors.
 */
export function cosineSimilarity(vecA: readonly number[], vecB: readonly number[]): number {
    if (vecA.length === 0 || vecA.length !== vecB.length) return 0;

    let dotProduct = 0;
    let normA = 0;
    let normB = 0;

    for (let i = 0; i < vecA.length; i++) {
        const a = vecA[i] ?? 0;
        const b = vecB[i] ?? 0;
        dotProduct += a * b;
        normA += a * a;
        normB += b * b;
    }

    const denominator = Math.sqrt(normA) * Math.sqrt(normB);
    if (denominator === 0) return 0;

    return dotProduct / denominator;
}

/**
 * Rank candidates by similarity to `query` and take the top K.
 * Sorting is stable, so equal scores keep the candidates' input order.
 */
export function findTopKSimilar<T extends { embedding: readonly number[] }>(
    query: readonly number[],
    candidates: readonly T[],
    k: number
): Array<{ item: T; similarity: number }> {
    if (k <= 0) return [];

    const similarities = candidates.map((item) => ({ item, similarity: cosineSimilarity(query, item.embedding) }));

    // Sort by similarity descending and take top K
    similarities.sort((a, b) => b.similarity - a.similarity);
    return similarities.slice(0, k);
}
