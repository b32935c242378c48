import type { SourceCondition, SourceTier } from '../types/index.js';
import { HttpError } from '../utils/http-client.js';

/**
 * Shared utilities for source adapters and the merger.
 */

/**
 * Strip DOI prefix URLs to get just the DOI identifier.
 * "https://doi.org/10.1234/test" → "10.1234/test"
 */
export function stripDoiPrefix(doi: string | null | undefined): string | null {
    if (!doi) return null;
    return doi
        .replace('https://doi.org/', '')
        .replace('http://doi.org/', '')
        .trim() || null;
}

/**
 * Extract arXiv ID from various formats.
 * "https://arxiv.org/abs/2401.01234" → "2401.01234"
 * "arXiv:2401.01234" → "2401.01234"
 * "2401.01234v2" → "2401.01234v2"
 * "http://arxiv.org/abs/cs/0112017v1" → "cs/0112017v1"
 */
export function extractArxivId(input: string | null | undefined): string | null {
    if (!input) return null;

    const patterns = [
        /arxiv\.org\/(?:abs|pdf)\/(\d{4}\.\d{4,5}(?:v\d+)?)/i,
        /arxiv\.org\/(?:abs|pdf)\/([a-z-]+(?:\.[A-Z]{2})?\/\d{7}(?:v\d+)?)/i,
        /arxiv:(\d{4}\.\d{4,5}(?:v\d+)?)/i,
        /^(\d{4}\.\d{4,5}(?:v\d+)?)$/,
    ];

    for (const pattern of patterns) {
        const match = input.match(pattern);
        if (match?.[1]) return match[1];
    }

    return null;
}

/**
 * Normalize a paper title for duplicate detection:
 * lower-case, strip diacritics and punctuation, collapse whitespace.
 */
export function normalizeTitle(title: string): string {
    return title
        .normalize('NFKD')
        .replace(/[\u0300-\u036f]/g, '')   // Combining marks left by NFKD
        .toLowerCase()
        .replace(/[^\p{L}\p{N}\s]/gu, ' ')  // Remove punctuation
        .replace(/\s+/g, ' ')               // Collapse whitespace
        .trim();
}

/**
 * Levenshtein distance with a two-row table.
 */
export function levenshteinDistance(a: string, b: string): number {
    const m = a.length;
    const n = b.length;

    if (m === 0) return n;
    if (n === 0) return m;

    let previous = Array.from({ length: n + 1 }, (_, j) => j);
    let current = new Array<number>(n + 1).fill(0);

    for (let i = 1; i <= m; i++) {
        current[0] = i;
        for (let j = 1; j <= n; j++) {
            const cost = a[i - 1] === b[j - 1] ? 0 : 1;
            current[j] = Math.min(
                (previous[j] ?? 0) + 1,        // deletion
                (current[j - 1] ?? 0) + 1,     // insertion
                (previous[j - 1] ?? 0) + cost  // substitution
            );
        }
        [previous, current] = [current, previous];
    }

    return previous[n] ?? 0;
}

/**
 * Similarity of two already-normalized titles: 1 − Levenshtein distance / longer length.
 */
export function normalizedSimilarity(normA: string, normB: string): number {
    if (normA === normB) return 1.0;

    const maxLen = Math.max(normA.length, normB.length);
    if (maxLen === 0) return 1.0;

    return 1.0 - levenshteinDistance(normA, normB) / maxLen;
}

/**
 * Compute normalized Levenshtein similarity (0.0 to 1.0) of two titles.
 * 1.0 = identical after normalization, 0.0 = completely different.
 */
export function titleSimilarity(a: string, b: string): number {
    return normalizedSimilarity(normalizeTitle(a), normalizeTitle(b));
}

/**
 * Collapse runs of whitespace (arXiv titles carry hard line breaks).
 */
export function collapseWhitespace(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

/**
 * Classify a failed adapter call into a reported condition.
 */
export function conditionFromError(
    error: unknown,
    tier: SourceTier,
    source: string,
    signal?: AbortSignal
): SourceCondition {
    const message = error instanceof Error ? error.message : String(error);

    if (signal?.aborted) {
        return { tier, source, kind: 'cancelled', message };
    }
    if (error instanceof HttpError) {
        if (error.timedOut) return { tier, source, kind: 'timeout', message };
        if (error.status === 429) return { tier, source, kind: 'rate-limit', message };
        if (error.status === 401 || error.status === 403) return { tier, source, kind: 'auth', message };
        if (error.status === 0) return { tier, source, kind: 'network', message };
        return { tier, source, kind: 'http', message };
    }
    return { tier, source, kind: 'parse', message };
}
