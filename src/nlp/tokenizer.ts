import { STOPWORDS } from './stopwords.js';

/**
 * Tokenize text into an array of lowercase tokens.
 * - Lowercase, diacritics folded
 * - Split on whitespace and punctuation
 * - Remove stopwords
 * - Remove single-character tokens and pure numbers
 * - No stemming (deterministic)
 */
export function tokenize(text: string | null | undefined): string[] {
    if (!text) return [];

    return text
        .normalize('NFKD')
        .replace(/[\u0300-\u036f]/g, '')
        .toLowerCase()
        .replace(/[^a-z0-9\s-]/g, ' ')  // Remove non-alphanumeric except hyphens
        .split(/\s+/)
        .map((token) => token.replace(/^-+|-+$/g, ''))  // Trim hyphens at edges
        .filter((token) =>
            token.length > 1 &&
            !STOPWORDS.has(token) &&
            !/^\d+$/.test(token)  // Remove pure numbers
        );
}

/**
 * Tokens in first-seen order without repeats.
 */
export function uniqueTokens(text: string | null | undefined): string[] {
    return [...new Set(tokenize(text))];
}
