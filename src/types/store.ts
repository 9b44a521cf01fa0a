import type { Paper } from './paper.js';
import type { CacheEntry, NewCacheEntry } from './cache.js';

/**
 * Read-only paper lookups used on the query path.
 */
export interface PaperStore {
    /** Resolve a paper by internal id or arXiv id */
    findPaper(idOrArxivId: string): Promise<Paper | null>;

    /** Number of passages of the paper that carry an embedding */
    countIndexedPassages(paperId: string): Promise<number>;

    /** Current content of the given passages; unknown ids are absent from the result */
    getPassageContents(ids: string[]): Promise<Array<{ id: string; content: string }>>;
}

/**
 * Persistence for generated answers.
 */
export interface CacheStore {
    findCacheEntry(paperId: string, fingerprint: string): Promise<CacheEntry | null>;

    /**
     * Insert a new entry. When an entry for the same (paper, fingerprint) already
     * exists, nothing is written and the stored entry is returned.
     */
    insertCacheEntry(entry: NewCacheEntry): Promise<CacheEntry>;

    /** Bump `hit_count` and `last_accessed_at` */
    incrementCacheHit(entryId: string): Promise<void>;
}
