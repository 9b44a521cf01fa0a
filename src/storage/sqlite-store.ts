import { v4 as uuidv4 } from 'uuid';
import type { CacheEntry, CacheStore, NewCacheEntry, Paper, PaperStore } from '../types/index.js';
import { isUuid, normalizeArxivId } from '../utils/identifiers.js';
import { getLogger } from '../utils/logger.js';
import type { PaperQaDatabase } from './database.js';

/**
 * Query-path view of the SQLite database: paper lookups and the answer cache table.
 */
export class SqlitePaperStore implements PaperStore, CacheStore {
    private readonly now: () => Date;

    constructor(
        private readonly db: PaperQaDatabase,
        options: { now?: () => Date } = {}
    ) {
        this.now = options.now ?? (() => new Date());
    }

    async findPaper(idOrArxivId: string): Promise<Paper | null> {
        const trimmed = idOrArxivId.trim();
        if (!trimmed) return null;

        if (isUuid(trimmed)) {
            return this.db.getPaperById(trimmed.toLowerCase()) ?? null;
        }

        return this.db.getPaperByArxivId(normalizeArxivId(trimmed))
            ?? this.db.getPaperByArxivId(trimmed)
            ?? null;
    }

    async countIndexedPassages(paperId: string): Promise<number> {
        return this.db.countIndexedPassages(paperId);
    }

    async getPassageContents(ids: string[]): Promise<Array<{ id: string; content: string }>> {
        return this.db.getPassagesByIds(ids);
    }

    async findCacheEntry(paperId: string, fingerprint: string): Promise<CacheEntry | null> {
        return this.db.findCacheEntry(paperId, fingerprint) ?? null;
    }

    async insertCacheEntry(entry: NewCacheEntry): Promise<CacheEntry> {
        const id = uuidv4();
        const inserted = this.db.insertCacheEntry(entry, id, this.now().toISOString());

        const stored = inserted
            ? this.db.getCacheEntryById(id)
            : this.db.findCacheEntry(entry.paperId, entry.fingerprint);

        if (!inserted) {
            getLogger().debug(
                { paperId: entry.paperId, fingerprint: entry.fingerprint },
                'Answer already cached by a concurrent request'
            );
        }
        if (!stored) {
            throw new Error(`Cache entry for paper ${entry.paperId} could not be read back`);
        }
        return stored;
    }

    async incrementCacheHit(entryId: string): Promise<void> {
        if (!this.db.incrementCacheHit(entryId, this.now().toISOString())) {
            getLogger().debug({ entryId }, 'Cache hit recorded for unknown entry');
        }
    }
}
