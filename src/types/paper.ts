/**
 * Paper — the unit a question is asked about.
 * List attributes are stored as JSON text columns and parsed into arrays on read.
 */
export interface Paper {
    /** Deterministic UUIDv5 of `arxiv_id` (URL namespace) */
    id: string;

    /** arXiv identifier without version suffix (e.g., "2401.01234") */
    arxiv_id: string;

    title: string;

    /** May be null — some papers are ingested from metadata only */
    abstract: string | null;

    authors: string[];
    categories: string[];

    /** ISO timestamp of first publication */
    published_date: string | null;

    pdf_url: string | null;

    /** arXiv ids this paper references */
    references: string[];

    /** arXiv ids of papers citing this one */
    cited_by: string[];

    /** Set by ingestion once passages were populated */
    is_processed: boolean;

    /** Number of stored passages */
    chunk_count: number;

    created_at?: string;
    updated_at?: string;
}

/**
 * Row shape of the `papers` table.
 */
export interface PaperRow {
    id: string;
    arxiv_id: string;
    title: string;
    abstract: string | null;
    authors_json: string | null;
    categories_json: string | null;
    published_date: string | null;
    pdf_url: string | null;
    references_json: string | null;
    cited_by_json: string | null;
    is_processed: number;
    chunk_count: number;
    created_at: string;
    updated_at: string;
}

/**
 * Paper data accepted by ingestion. The id is always derived from `arxiv_id`.
 */
export interface PaperInput {
    arxiv_id: string;
    title: string;
    abstract?: string | null;
    authors?: string[];
    categories?: string[];
    published_date?: string | null;
    pdf_url?: string | null;
    references?: string[];
    cited_by?: string[];
}

/**
 * Passage data accepted by ingestion.
 */
export interface PassageInput {
    content: string;
    chunk_index: number;
    page_number?: number | null;
    section_title?: string | null;
    embedding?: number[] | null;
    token_count?: number | null;
}

/**
 * Passage returned by a similarity query.
 */
export interface ScoredPassage {
    id: string;
    content: string;

    /** Cosine similarity to the query vector */
    similarity: number;
}
