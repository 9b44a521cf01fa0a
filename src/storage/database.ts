import Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import type {
    Paper,
    PaperRow,
    PaperInput,
    PassageInput,
    CacheEntry,
    CacheEntryRow,
    NewCacheEntry,
} from '../types/index.js';
import { normalizeArxivId, paperIdFor } from '../utils/identifiers.js';
import { getLogger } from '../utils/logger.js';

/**
 * SQLite schema migration v1.
 * Creates the papers, paper_chunks and chat_cache tables.
 */
const MIGRATION_V1 = `
-- Papers: arXiv metadata, id is UUIDv5(arxiv_id)
CREATE TABLE IF NOT EXISTS papers (
  id TEXT PRIMARY KEY,
  arxiv_id TEXT NOT NULL UNIQUE,
  title TEXT NOT NULL,
  abstract TEXT,
  authors_json TEXT NOT NULL DEFAULT '[]',
  categories_json TEXT NOT NULL DEFAULT '[]',
  published_date TEXT,
  pdf_url TEXT,
  references_json TEXT NOT NULL DEFAULT '[]',
  cited_by_json TEXT NOT NULL DEFAULT '[]',
  is_processed INTEGER NOT NULL DEFAULT 0,
  chunk_count INTEGER NOT NULL DEFAULT 0,
  created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
  updated_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
);

-- Paper chunks: passages with their embedding vectors
CREATE TABLE IF NOT EXISTS paper_chunks (
  id TEXT PRIMARY KEY,
  paper_id TEXT NOT NULL REFERENCES papers(id) ON DELETE CASCADE,
  content TEXT NOT NULL,
  chunk_index INTEGER NOT NULL,
  page_number INTEGER,
  section_title TEXT,
  embedding_json TEXT,
  token_count INTEGER,
  created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
);

-- Chat cache: generated answers keyed by paper + question hash
CREATE TABLE IF NOT EXISTS chat_cache (
  id TEXT PRIMARY KEY,
  paper_id TEXT NOT NULL REFERENCES papers(id) ON DELETE CASCADE,
  question TEXT NOT NULL,
  question_hash TEXT NOT NULL,
  answer TEXT NOT NULL,
  context_chunk_ids_json TEXT NOT NULL DEFAULT '[]',
  model_used TEXT,
  tokens_used INTEGER,
  hit_count INTEGER NOT NULL DEFAULT 0,
  created_at TEXT NOT NULL,
  last_accessed_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_paper_chunks_paper_id ON paper_chunks(paper_id);
CREATE UNIQUE INDEX IF NOT EXISTS idx_chat_cache_lookup ON chat_cache(paper_id, question_hash);
`;

/**
 * Passage with a stored embedding, as loaded for similarity ranking.
 */
export interface IndexedPassage {
    id: string;
    content: string;
    chunk_index: number;
    embedding: number[];
}

interface PassageRow {
    id: string;
    paper_id: string;
    content: string;
    chunk_index: number;
    page_number: number | null;
    section_title: string | null;
    embedding_json: string | null;
    token_count: number | null;
}

/**
 * Parse a JSON text column holding a list of strings.
 * Malformed or non-list values read as an empty list.
 */
export function parseStringList(value: string | null | undefined): string[] {
    if (!value) return [];
    try {
        const parsed: unknown = JSON.parse(value);
        if (!Array.isArray(parsed)) return [];
        return parsed.filter((item): item is string | number => typeof item === 'string' || typeof item === 'number').map(String);
    } catch {
        return [];
    }
}

/**
 * Parse a stored embedding. Anything but a list of finite numbers reads as null.
 */
export function parseEmbedding(value: string | null | undefined): number[] | null {
    if (!value) return null;
    try {
        const parsed: unknown = JSON.parse(value);
        if (!Array.isArray(parsed) || parsed.length === 0) return null;
        const vector: number[] = [];
        for (const item of parsed) {
            if (typeof item !== 'number' || !Number.isFinite(item)) return null;
            vector.push(item);
        }
        return vector;
    } catch {
        return null;
    }
}

function rowToPaper(row: PaperRow): Paper {
    return {
        id: row.id,
        arxiv_id: row.arxiv_id,
        title: row.title,
        abstract: row.abstract,
        authors: parseStringList(row.authors_json),
        categories: parseStringList(row.categories_json),
        published_date: row.published_date,
        pdf_url: row.pdf_url,
        references: parseStringList(row.references_json),
        cited_by: parseStringList(row.cited_by_json),
        is_processed: row.is_processed === 1,
        chunk_count: row.chunk_count,
        created_at: row.created_at,
        updated_at: row.updated_at,
    };
}

function rowToCacheEntry(row: CacheEntryRow): CacheEntry {
    return {
        id: row.id,
        paper_id: row.paper_id,
        question: row.question,
        question_hash: row.question_hash,
        answer: row.answer,
        context_chunk_ids: parseStringList(row.context_chunk_ids_json),
        model_used: row.model_used,
        tokens_used: row.tokens_used,
        hit_count: row.hit_count,
        created_at: row.created_at,
        last_accessed_at: row.last_accessed_at,
    };
}

/**
 * paperask database wrapper around better-sqlite3.
 * Handles schema migration, WAL mode, foreign keys, and row operations.
 */
export class PaperQaDatabase {
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);

        // Set pragmas
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');

        // Run migrations
        this.migrate();

        getLogger().debug({ dbPath }, 'Database initialized');
    }

    /**
     * Run schema migrations.
     */
    private migrate(): void {
        const currentVersion = this.db.pragma('user_version', { simple: true });

        if (typeof currentVersion !== 'number' || currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            getLogger().info('Database migrated to v1');
        }
    }

    // ─── Papers ───────────────────────────────────────────────

    /**
     * Insert or update a paper keyed by its arXiv id.
     * List fields given as undefined keep their stored value.
     */
    upsertPaper(input: PaperInput): Paper {
        const arxivId = normalizeArxivId(input.arxiv_id);
        const id = paperIdFor(arxivId);

        this.db.prepare(`
      INSERT INTO papers (id, arxiv_id, title, abstract, authors_json, categories_json, published_date, pdf_url, references_json, cited_by_json)
      VALUES (@id, @arxiv_id, @title, @abstract, COALESCE(@authors_json, '[]'), COALESCE(@categories_json, '[]'), @published_date, @pdf_url, COALESCE(@references_json, '[]'), COALESCE(@cited_by_json, '[]'))
      ON CONFLICT(arxiv_id) DO UPDATE SET
        title = excluded.title,
        abstract = COALESCE(excluded.abstract, abstract),
        authors_json = COALESCE(@authors_json, authors_json),
        categories_json = COALESCE(@categories_json, categories_json),
        published_date = COALESCE(excluded.published_date, published_date),
        pdf_url = COALESCE(excluded.pdf_url, pdf_url),
        references_json = COALESCE(@references_json, references_json),
        cited_by_json = COALESCE(@cited_by_json, cited_by_json),
        updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
    `).run({
            id,
            arxiv_id: arxivId,
            title: input.title,
            abstract: input.abstract ?? null,
            authors_json: input.authors ? JSON.stringify(input.authors) : null,
            categories_json: input.categories ? JSON.stringify(input.categories) : null,
            published_date: input.published_date ?? null,
            pdf_url: input.pdf_url ?? null,
            references_json: input.references ? JSON.stringify(input.references) : null,
            cited_by_json: input.cited_by ? JSON.stringify(input.cited_by) : null,
        });

        const paper = this.getPaperById(id);
        if (!paper) {
            throw new Error(`Paper ${arxivId} vanished after upsert`);
        }
        return paper;
    }

    getPaperById(id: string): Paper | undefined {
        const row = this.db.prepare('SELECT * FROM papers WHERE id = ?').get(id) as PaperRow | undefined;
        return row ? rowToPaper(row) : undefined;
    }

    getPaperByArxivId(arxivId: string): Paper | undefined {
        const row = this.db.prepare('SELECT * FROM papers WHERE arxiv_id = ?').get(arxivId) as PaperRow | undefined;
        return row ? rowToPaper(row) : undefined;
    }

    getPaperCount(): number {
        const row = this.db.prepare('SELECT COUNT(*) as count FROM papers').get() as { count: number };
        return row.count;
    }

    // ─── Passages ─────────────────────────────────────────────

    /**
     * Insert passages for a paper in a single transaction and refresh its chunk count.
     * Returns the new passage IDs in input order.
     */
    insertPassages(paperId: string, passages: PassageInput[]): string[] {
        const stmt = this.db.prepare(`
      INSERT INTO paper_chunks (id, paper_id, content, chunk_index, page_number, section_title, embedding_json, token_count)
      VALUES (@id, @paper_id, @content, @chunk_index, @page_number, @section_title, @embedding_json, @token_count)
    `);

        return this.transaction(() => {
            const ids: string[] = [];
            for (const passage of passages) {
                const id = uuidv4();
                stmt.run({
                    id,
                    paper_id: paperId,
                    content: passage.content,
                    chunk_index: passage.chunk_index,
                    page_number: passage.page_number ?? null,
                    section_title: passage.section_title ?? null,
                    embedding_json: passage.embedding ? JSON.stringify(passage.embedding) : null,
                    token_count: passage.token_count ?? null,
                });
                ids.push(id);
            }
            this.refreshChunkCount(paperId);
            return ids;
        });
    }

    /**
     * Delete passages by id. Cache entries keep referencing them by value.
     * Returns the number of passages removed.
     */
    removePassages(ids: string[]): number {
        if (ids.length === 0) return 0;
        const idsJson = JSON.stringify(ids);

        return this.transaction(() => {
            const owners = this.db
                .prepare('SELECT DISTINCT paper_id FROM paper_chunks WHERE id IN (SELECT value FROM json_each(?))')
                .all(idsJson) as Array<{ paper_id: string }>;
            const result = this.db
                .prepare('DELETE FROM paper_chunks WHERE id IN (SELECT value FROM json_each(?))')
                .run(idsJson);
            for (const owner of owners) {
                this.refreshChunkCount(owner.paper_id);
            }
            return result.changes;
        });
    }

    private refreshChunkCount(paperId: string): void {
        this.db.prepare(`
      UPDATE papers SET
        chunk_count = (SELECT COUNT(*) FROM paper_chunks WHERE paper_id = @id),
        is_processed = (SELECT COUNT(*) > 0 FROM paper_chunks WHERE paper_id = @id),
        updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
      WHERE id = @id
    `).run({ id: paperId });
    }

    /**
     * Passages of a paper that carry an embedding, in insertion order.
     */
    getIndexedPassages(paperId: string): IndexedPassage[] {
        const rows = this.db
            .prepare('SELECT id, content, chunk_index, embedding_json FROM paper_chunks WHERE paper_id = ? AND embedding_json IS NOT NULL ORDER BY rowid')
            .all(paperId) as Array<Pick<PassageRow, 'id' | 'content' | 'chunk_index' | 'embedding_json'>>;

        const passages: IndexedPassage[] = [];
        for (const row of rows) {
            const embedding = parseEmbedding(row.embedding_json);
            if (!embedding) {
                getLogger().warn({ passageId: row.id }, 'Skipping passage with malformed embedding');
                continue;
            }
            passages.push({ id: row.id, content: row.content, chunk_index: row.chunk_index, embedding });
        }
        return passages;
    }

    countIndexedPassages(paperId: string): number {
        const row = this.db
            .prepare('SELECT COUNT(*) as count FROM paper_chunks WHERE paper_id = ? AND embedding_json IS NOT NULL')
            .get(paperId) as { count: number };
        return row.count;
    }

    /**
     * Passage contents for the given ids. Ids with no row are absent from the result.
     */
    getPassagesByIds(ids: string[]): Array<{ id: string; content: string }> {
        if (ids.length === 0) return [];
        return this.db
            .prepare('SELECT id, content FROM paper_chunks WHERE id IN (SELECT value FROM json_each(?))')
            .all(JSON.stringify(ids)) as Array<{ id: string; content: string }>;
    }

    /**
     * Distinct embedding lengths among stored passages.
     */
    getEmbeddingDimensions(): number[] {
        const rows = this.db
            .prepare('SELECT DISTINCT json_array_length(embedding_json) as dims FROM paper_chunks WHERE embedding_json IS NOT NULL ORDER BY dims')
            .all() as Array<{ dims: number }>;
        return rows.map((row) => row.dims);
    }

    // ─── Chat cache ───────────────────────────────────────────

    findCacheEntry(paperId: string, questionHash: string): CacheEntry | undefined {
        const row = this.db
            .prepare('SELECT * FROM chat_cache WHERE paper_id = ? AND question_hash = ? ORDER BY created_at LIMIT 1')
            .get(paperId, questionHash) as CacheEntryRow | undefined;
        return row ? rowToCacheEntry(row) : undefined;
    }

    getCacheEntryById(id: string): CacheEntry | undefined {
        const row = this.db.prepare('SELECT * FROM chat_cache WHERE id = ?').get(id) as CacheEntryRow | undefined;
        return row ? rowToCacheEntry(row) : undefined;
    }

    /**
     * Insert a cache entry unless one already exists for (paper_id, question_hash).
     * Returns false when the insert lost to an existing entry.
     */
    insertCacheEntry(entry: NewCacheEntry, id: string, now: string): boolean {
        const result = this.db.prepare(`
      INSERT INTO chat_cache (id, paper_id, question, question_hash, answer, context_chunk_ids_json, model_used, tokens_used, hit_count, created_at, last_accessed_at)
      VALUES (@id, @paper_id, @question, @question_hash, @answer, @context_chunk_ids_json, @model_used, @tokens_used, 0, @now, @now)
      ON CONFLICT(paper_id, question_hash) DO NOTHING
    `).run({
            id,
            paper_id: entry.paperId,
            question: entry.question,
            question_hash: entry.fingerprint,
            answer: entry.answer,
            context_chunk_ids_json: JSON.stringify(entry.passageIds),
            model_used: entry.model,
            tokens_used: entry.tokensUsed,
            now,
        });
        return result.changes > 0;
    }

    /**
     * Bump hit_count and last_accessed_at. Returns false for an unknown entry.
     */
    incrementCacheHit(id: string, now: string): boolean {
        const result = this.db
            .prepare('UPDATE chat_cache SET hit_count = hit_count + 1, last_accessed_at = ? WHERE id = ?')
            .run(now, id);
        return result.changes > 0;
    }

    /**
     * Most reused cache entries first.
     */
    getTopCacheEntries(limit: number): CacheEntry[] {
        const rows = this.db
            .prepare('SELECT * FROM chat_cache ORDER BY hit_count DESC, created_at LIMIT ?')
            .all(limit) as CacheEntryRow[];
        return rows.map(rowToCacheEntry);
    }

    // ─── Stats ────────────────────────────────────────────────

    getStats(): {
        papers: number;
        passages: number;
        indexedPassages: number;
        cacheEntries: number;
        cacheHits: number;
        tokensSaved: number;
    } {
        const count = (sql: string): number => (this.db.prepare(sql).get() as { count: number | null }).count ?? 0;

        return {
            papers: this.getPaperCount(),
            passages: count('SELECT COUNT(*) as count FROM paper_chunks'),
            indexedPassages: count('SELECT COUNT(*) as count FROM paper_chunks WHERE embedding_json IS NOT NULL'),
            cacheEntries: count('SELECT COUNT(*) as count FROM chat_cache'),
            cacheHits: count('SELECT SUM(hit_count) as count FROM chat_cache'),
            tokensSaved: count('SELECT SUM(hit_count * COALESCE(tokens_used, 0)) as count FROM chat_cache'),
        };
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Execute a function within a transaction.
     */
    transaction<T>(fn: () => T): T {
        return this.db.transaction(fn)();
    }

    /**
     * Close the database connection.
     */
    close(): void {
        this.db.close();
        getLogger().debug('Database closed');
    }

    /**
     * Get the raw better-sqlite3 instance (for advanced queries).
     */
    getRawDb(): Database.Database {
        return this.db;
    }
}
