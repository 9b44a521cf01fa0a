/**
 * CacheEntry — a generated answer keyed by paper and question fingerprint.
 */
export interface CacheEntry {
    id: string;
    paper_id: string;

    /** Question as the user asked it (trimmed) */
    question: string;

    /** SHA-256 hex digest of the normalized question */
    question_hash: string;

    answer: string;

    /** Passage ids used as context, in context order (empty for metadata-only answers) */
    context_chunk_ids: string[];

    model_used: string | null;
    tokens_used: number | null;
    hit_count: number;
    created_at: string;
    last_accessed_at: string;
}

/**
 * Row shape of the `chat_cache` table.
 */
export interface CacheEntryRow {
    id: string;
    paper_id: string;
    question: string;
    question_hash: string;
    answer: string;
    context_chunk_ids_json: string;
    model_used: string | null;
    tokens_used: number | null;
    hit_count: number;
    created_at: string;
    last_accessed_at: string;
}

/**
 * Values written on a cache miss.
 */
export interface NewCacheEntry {
    paperId: string;
    question: string;
    fingerprint: string;
    answer: string;
    passageIds: string[];
    model: string | null;
    tokensUsed: number | null;
}
