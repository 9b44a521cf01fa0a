import { readFileSync } from 'node:fs';
import type { PaperInput, PassageInput } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import type { PaperQaDatabase } from './database.js';

/**
 * A paper entry in a seed file, optionally with pre-embedded passages.
 */
export interface SeedPaper extends PaperInput {
    passages?: PassageInput[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(record: Record<string, unknown>, key: string, where: string): string | null | undefined {
    const value = record[key];
    if (value === undefined || value === null) return value;
    if (typeof value !== 'string') throw new Error(`${where}: "${key}" must be a string`);
    return value;
}

function optionalStringList(record: Record<string, unknown>, key: string, where: string): string[] | undefined {
    const value = record[key];
    if (value === undefined || value === null) return undefined;
    if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
        throw new Error(`${where}: "${key}" must be a list of strings`);
    }
    return value;
}

function optionalNumber(record: Record<string, unknown>, key: string, where: string): number | null | undefined {
    const value = record[key];
    if (value === undefined || value === null) return value;
    if (typeof value !== 'number' || !Number.isFinite(value)) throw new Error(`${where}: "${key}" must be a number`);
    return value;
}

function parsePassage(raw: unknown, index: number, where: string): PassageInput {
    const at = `${where}.passages[${index}]`;
    if (!isRecord(raw)) throw new Error(`${at}: expected an object`);

    const content = raw['content'];
    if (typeof content !== 'string' || !content.trim()) {
        throw new Error(`${at}: "content" is required`);
    }

    let embedding: number[] | null = null;
    const rawEmbedding = raw['embedding'];
    if (rawEmbedding !== undefined && rawEmbedding !== null) {
        if (!Array.isArray(rawEmbedding) || !rawEmbedding.every((v): v is number => typeof v === 'number' && Number.isFinite(v))) {
            throw new Error(`${at}: "embedding" must be a list of numbers`);
        }
        embedding = rawEmbedding;
    }

    return {
        content,
        chunk_index: optionalNumber(raw, 'chunk_index', at) ?? index,
        page_number: optionalNumber(raw, 'page_number', at),
        section_title: optionalString(raw, 'section_title', at),
        embedding,
        token_count: optionalNumber(raw, 'token_count', at),
    };
}

/**
 * Validate the contents of a seed file: either a list of papers or `{ "papers": [...] }`.
 */
export function parseSeedData(data: unknown): SeedPaper[] {
    const list = isRecord(data) ? data['papers'] : data;
    if (!Array.isArray(list)) {
        throw new Error('Seed data must be a list of papers or an object with a "papers" list');
    }

    return list.map((raw, index): SeedPaper => {
        const where = `papers[${index}]`;
        if (!isRecord(raw)) throw new Error(`${where}: expected an object`);

        const arxivId = raw['arxiv_id'];
        const title = raw['title'];
        if (typeof arxivId !== 'string' || !arxivId.trim()) throw new Error(`${where}: "arxiv_id" is required`);
        if (typeof title !== 'string' || !title.trim()) throw new Error(`${where}: "title" is required`);

        const passages = raw['passages'];
        if (passages !== undefined && !Array.isArray(passages)) {
            throw new Error(`${where}: "passages" must be a list`);
        }

        return {
            arxiv_id: arxivId,
            title,
            abstract: optionalString(raw, 'abstract', where),
            authors: optionalStringList(raw, 'authors', where),
            categories: optionalStringList(raw, 'categories', where),
            published_date: optionalString(raw, 'published_date', where),
            pdf_url: optionalString(raw, 'pdf_url', where),
            references: optionalStringList(raw, 'references', where),
            cited_by: optionalStringList(raw, 'cited_by', where),
            passages: passages?.map((p: unknown, i: number) => parsePassage(p, i, where)),
        };
    });
}

/**
 * Upsert seed papers. Passages are only added to papers that have none yet,
 * so seeding twice does not duplicate them.
 */
export function seedDatabase(db: PaperQaDatabase, papers: SeedPaper[]): { papers: number; passages: number } {
    const logger = getLogger();
    let passageCount = 0;

    db.transaction(() => {
        for (const { passages, ...input } of papers) {
            const paper = db.upsertPaper(input);

            if (!passages?.length) continue;
            if (paper.chunk_count > 0) {
                logger.info({ arxivId: paper.arxiv_id }, 'Paper already has passages, skipping them');
                continue;
            }
            passageCount += db.insertPassages(paper.id, passages).length;
        }
    });

    return { papers: papers.length, passages: passageCount };
}

/**
 * Read and validate a seed file.
 */
export function loadSeedFile(path: string): SeedPaper[] {
    const data: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    return parseSeedData(data);
}
