import type { CacheEntry, CacheStore, NewCacheEntry, PaperStore } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * Persistent answer cache keyed by (paper id, question fingerprint).
 *
 * Entries are append-only: once written, only the hit counter and last access
 * time change. Concurrent writers for the same key are resolved by the store,
 * which keeps the first entry and hands it back to the loser.
 */
export class AnswerCache {
    constructor(
        private readonly entries: CacheStore,
        private readonly papers: Pick<PaperStore, 'getPassageContents'>
    ) {}

    /**
     * Get the cached entry for a paper and fingerprint, or null.
     */
    async lookup(paperId: string, fingerprint: string): Promise<CacheEntry | null> {
        return this.entries.findCacheEntry(paperId, fingerprint);
    }

    /**
     * Count a reuse of `entryId`. Failures are logged, never thrown.
     */
    async recordHit(entryId: string): Promise<void> {
        try {
            await this.entries.incrementCacheHit(entryId);
        } catch (error) {
            getLogger().warn({ error, entryId }, 'Failed to record cache hit');
        }
    }

    /**
     * Persist a generated answer. Returns the entry now stored for the key,
     * which is an earlier one when another request cached the answer first.
     */
    async store(entry: NewCacheEntry): Promise<CacheEntry> {
        const stored = await this.entries.insertCacheEntry(entry);
        getLogger().debug(
            { paperId: entry.paperId, entryId: stored.id, passages: entry.passageIds.length },
            'Answer cached'
        );
        return stored;
    }

    /**
     * Current text of the passages an entry was generated from, in recorded order.
     * Passages deleted since then are dropped.
     */
    async resolveContext(passageIds: string[]): Promise<string[]> {
        if (passageIds.length === 0) return [];

        const rows = await this.papers.getPassageContents(passageIds);
        const byId = new Map(rows.map((row) => [row.id, row.content]));

        const context: string[] = [];
        for (const id of passageIds) {
            const content = byId.get(id);
            if (content !== undefined) context.push(content);
        }
        return context;
    }
}
