import { v5 as uuidv5, validate as uuidValidate } from 'uuid';

/**
 * Extract an arXiv ID from various formats, without its version suffix.
 * "https://arxiv.org/abs/2401.01234v2" → "2401.01234"
 * "https://arxiv.org/pdf/2401.01234"   → "2401.01234"
 * "arXiv:2401.01234"                   → "2401.01234"
 * "hep-th/9901001v1"                   → "hep-th/9901001"
 */
export function extractArxivId(input: string | null | undefined): string | null {
    if (!input) return null;

    const patterns = [
        /arxiv\.org\/(?:abs|pdf)\/([a-z-]+(?:\.[a-z]{2})?\/\d{7}|\d{4}\.\d{4,5})(?:v\d+)?(?:\.pdf)?$/i,
        /^arxiv:([a-z-]+(?:\.[a-z]{2})?\/\d{7}|\d{4}\.\d{4,5})(?:v\d+)?$/i,
        /^([a-z-]+(?:\.[a-z]{2})?\/\d{7}|\d{4}\.\d{4,5})(?:v\d+)?$/i,
    ];

    const trimmed = input.trim();
    for (const pattern of patterns) {
        const match = trimmed.match(pattern);
        if (match?.[1]) return match[1];
    }

    return null;
}

/**
 * Deterministic paper id: UUIDv5 of the arXiv id in the URL namespace.
 * Re-ingesting the same paper always yields the same id.
 */
export function paperIdFor(arxivId: string): string {
    return uuidv5(arxivId, uuidv5.URL);
}

export function isUuid(value: string): boolean {
    return uuidValidate(value);
}

/**
 * Canonical form of an arXiv-style identifier. Inputs that don't look like
 * arXiv ids are kept as given (trimmed).
 */
export function normalizeArxivId(input: string): string {
    return extractArxivId(input) ?? input.trim();
}

/**
 * Map a user-supplied paper identifier to the internal id it is stored under,
 * without touching the store.
 */
export function canonicalPaperId(input: string): string {
    const trimmed = input.trim();
    if (isUuid(trimmed)) return trimmed.toLowerCase();

    return paperIdFor(normalizeArxivId(trimmed));
}
