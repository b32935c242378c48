import type { PaperRecord } from '../types/index.js';
import { tokenize, uniqueTokens } from '../nlp/tokenizer.js';

export interface SearchTermOptions {
    /** Paper title; its terms come first */
    title?: string;
    /** Upper bound on the number of terms */
    maxTerms?: number;
}

const DEFAULT_MAX_TERMS = 5;

/** Abstract terms are taken from the first sentence only */
function firstSentence(text: string): string {
    const end = text.search(/[.!?](\s|$)/);
    return end === -1 ? text : text.slice(0, end);
}

/**
 * Reduce an abstract (and optional title) to a handful of search terms:
 * title terms first, then terms from the abstract's first sentence.
 */
export function extractSearchTerms(queryText: string, options: SearchTermOptions = {}): string[] {
    const maxTerms = options.maxTerms ?? DEFAULT_MAX_TERMS;
    const terms: string[] = [];

    const add = (candidates: string[]): void => {
        for (const term of candidates) {
            if (terms.length >= maxTerms) return;
            if (!terms.includes(term)) terms.push(term);
        }
    };

    add(uniqueTokens(options.title));
    add(uniqueTokens(firstSentence(queryText)));
    // Short first sentence: fall back to the rest of the text
    add(uniqueTokens(queryText));

    return terms;
}

/**
 * Search-term string sent to remote APIs. Never empty for a non-blank input.
 */
export function buildSearchQuery(queryText: string, options: SearchTermOptions = {}): string {
    const terms = extractSearchTerms(queryText, options);
    if (terms.length > 0) return terms.join(' ');
    return (options.title ?? queryText).replace(/\s+/g, ' ').trim().slice(0, 100);
}

/**
 * Number of search terms occurring in the record's title, abstract or keywords.
 */
export function relevanceScore(record: PaperRecord, terms: readonly string[]): number {
    const tokens = new Set([
        ...tokenize(record.title),
        ...tokenize(record.abstract),
        ...record.keywords.flatMap((keyword) => tokenize(keyword)),
    ]);
    return terms.filter((term) => tokens.has(term)).length;
}

/**
 * Local records sharing at least one term with the query, most relevant first:
 * matched terms, then year, then citation count. Ties keep store order.
 */
export function rankLocalRecords(records: PaperRecord[], terms: readonly string[]): PaperRecord[] {
    return records
        .map((record, position) => ({ record, position, score: relevanceScore(record, terms) }))
        .filter((entry) => entry.score > 0)
        .sort((a, b) =>
            b.score - a.score ||
            (b.record.year ?? 0) - (a.record.year ?? 0) ||
            (b.record.citationCount ?? 0) - (a.record.citationCount ?? 0) ||
            a.position - b.position
        )
        .map((entry) => entry.record);
}
