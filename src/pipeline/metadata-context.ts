import type { Paper } from '../types/index.js';

/** References listed by id in the metadata block; the count line covers the rest */
const MAX_LISTED_REFERENCES = 20;

/**
 * Render a stored publication timestamp as YYYY-MM-DD when it has that prefix.
 */
function formatDate(value: string): string {
    const match = value.match(/^\d{4}-\d{2}-\d{2}/);
    return match ? match[0] : value;
}

/**
 * Build the structured metadata block sent to the generator ahead of passages.
 *
 * Factual questions (authors, dates, counts) are answered from these lines rather
 * than from similarity-ranked prose. Each line is omitted when its field is empty.
 */
export function buildMetadataContext(paper: Paper): string {
    const parts: string[] = [];

    parts.push(`Title: ${paper.title.trim() || 'Unknown'}`);

    if (paper.arxiv_id) {
        parts.push(`arXiv ID: ${paper.arxiv_id}`);
    }

    if (paper.authors.length > 0) {
        parts.push(`Authors: ${paper.authors.join(', ')}`);
        parts.push(`Number of authors: ${paper.authors.length}`);
    }

    if (paper.published_date) {
        parts.push(`Published: ${formatDate(paper.published_date)}`);
    }

    if (paper.categories.length > 0) {
        parts.push(`Categories: ${paper.categories.join(', ')}`);
    }

    if (paper.pdf_url) {
        parts.push(`PDF URL: ${paper.pdf_url}`);
    }

    if (paper.references.length > 0) {
        parts.push(`Number of references: ${paper.references.length}`);
        parts.push(`References (arXiv IDs): ${paper.references.slice(0, MAX_LISTED_REFERENCES).join(', ')}`);
    }

    if (paper.cited_by.length > 0) {
        parts.push(`Cited by: ${paper.cited_by.length} papers`);
    }

    const abstract = paper.abstract?.trim();
    if (abstract) {
        parts.push(`\nAbstract:\n${abstract}`);
    }

    return parts.join('\n');
}

/**
 * Title and abstract only, for when the metadata block is switched off.
 */
export function buildAbstractContext(paper: Paper): string {
    return `Title: ${paper.title.trim() || 'Unknown'}\n\nAbstract:\n${paper.abstract?.trim() ?? ''}`;
}
