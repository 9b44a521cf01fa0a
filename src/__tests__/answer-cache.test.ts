import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AnswerCache } from '../cache/answer-cache.js';
import { PaperQaDatabase } from '../storage/database.js';
import { SqlitePaperStore } from '../storage/sqlite-store.js';
import type { CacheStore, NewCacheEntry } from '../types/index.js';

const NOW = new Date('2026-01-02T03:04:05.000Z');

describe('AnswerCache', () => {
    let db: PaperQaDatabase;
    let store: SqlitePaperStore;
    let cache: AnswerCache;
    let paperId: string;

    const newEntry = (answer: string): NewCacheEntry => ({
        paperId,
        question: 'What is X?',
        fingerprint: 'fp-1',
        answer,
        passageIds: [],
        model: 'fake-llm',
        tokensUsed: 10,
    });

    beforeEach(() => {
        db = new PaperQaDatabase(':memory:');
        store = new SqlitePaperStore(db, { now: () => NOW });
        cache = new AnswerCache(store, store);
        paperId = db.upsertPaper({ arxiv_id: '2401.00001', title: 'Paper' }).id;
    });

    afterEach(() => {
        db.close();
    });

    it('should miss before anything is stored', async () => {
        expect(await cache.lookup(paperId, 'fp-1')).toBeNull();
    });

    it('should return the stored entry on lookup', async () => {
        const stored = await cache.store(newEntry('X is a thing.'));

        expect(stored.answer).toBe('X is a thing.');
        expect(stored.created_at).toBe('2026-01-02T03:04:05.000Z');
        expect(await cache.lookup(paperId, 'fp-1')).toEqual(stored);
    });

    it('should answer a duplicate store with the entry already cached', async () => {
        const first = await cache.store(newEntry('First answer'));
        const second = await cache.store(newEntry('Second answer'));

        expect(second.id).toBe(first.id);
        expect(second.answer).toBe('First answer');
        expect((await cache.lookup(paperId, 'fp-1'))?.answer).toBe('First answer');
        expect(db.getStats().cacheEntries).toBe(1);
    });

    it('should reject when the store fails', async () => {
        await expect(cache.store({ ...newEntry('Answer'), paperId: 'no-such-paper' })).rejects.toThrow();
    });

    it('should record hits', async () => {
        const stored = await cache.store(newEntry('Answer'));
        await cache.recordHit(stored.id);
        await cache.recordHit(stored.id);

        expect((await cache.lookup(paperId, 'fp-1'))?.hit_count).toBe(2);
    });

    it('should not throw when recording a hit fails', async () => {
        const failing: CacheStore = {
            findCacheEntry: async () => null,
            insertCacheEntry: async () => {
                throw new Error('read-only database');
            },
            incrementCacheHit: vi.fn(async () => {
                throw new Error('read-only database');
            }),
        };

        await expect(new AnswerCache(failing, store).recordHit('entry-1')).resolves.toBeUndefined();
        expect(failing.incrementCacheHit).toHaveBeenCalledWith('entry-1');
    });

    describe('resolveContext', () => {
        it('should keep the recorded order and drop ids that no longer resolve', async () => {
            const [a, b, c] = db.insertPassages(paperId, [
                { content: 'Alpha', chunk_index: 0 },
                { content: 'Beta', chunk_index: 1 },
                { content: 'Gamma', chunk_index: 2 },
            ]);
            db.removePassages([b ?? '']);

            expect(await cache.resolveContext([c ?? '', b ?? '', 'never-existed', a ?? ''])).toEqual(['Gamma', 'Alpha']);
        });

        it('should resolve an empty list without touching the store', async () => {
            const spy = vi.spyOn(store, 'getPassageContents');

            expect(await cache.resolveContext([])).toEqual([]);
            expect(spy).not.toHaveBeenCalled();
        });
    });
});
