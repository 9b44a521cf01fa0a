import { createHash } from 'node:crypto';

/**
 * Canonical form of a question: surrounding whitespace trimmed, lowercased.
 */
export function normalizeQuestion(question: string): string {
    return question.trim().toLowerCase();
}

/**
 * Cache fingerprint = SHA-256 (hex) of the normalized question.
 * Questions that differ only in case or surrounding whitespace share a fingerprint.
 */
export function fingerprintQuestion(question: string): string {
    return createHash('sha256').update(normalizeQuestion(question)).digest('hex');
}
