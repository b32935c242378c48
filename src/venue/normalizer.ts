import type { PaperRecord, VenueInput, VenueMatch, VenueTag, VenueConfidence } from '../types/index.js';
import { getDefaultLexicon, type VenueLexicon } from './venue-table.js';

/**
 * Phrases announcing where a paper appears. Each is tried in order;
 * the text following the phrase is scanned for a venue.
 */
const ACCEPTANCE_PHRASES: readonly RegExp[] = [
    /\baccepted\s+(?:as\s+an?\s+(?:full\s+|short\s+|regular\s+)?(?:paper|poster|article)\s+)?(?:at|to|in|by|for)\b/i,
    /\bto\s+appear\s+(?:at|in)\b/i,
    /\bpublished\s+(?:at|in)\b/i,
    /\bcamera[-\s]ready(?:\s+version)?\s+(?:for|of)\b/i,
    /\bpresented\s+at\b/i,
    /\bappear(?:s|ed)?\s+in\b/i,
];

/** How far past an acceptance phrase a venue may appear */
const WINDOW_CHARS = 80;

const GENERIC_ACRONYM = /(?<![A-Za-z0-9])([A-Z][A-Za-z&]{1,6})(?![A-Za-z])/g;
const ACRONYM_WITH_YEAR = /(?<![A-Za-z0-9])([A-Z][A-Z&]{1,6})\s*'?((?:19|20)\d{2}|\d{2})(?!\d)/g;
const FOUR_DIGIT_YEAR = /(?<!\d)((?:19|20)\d{2})(?!\d)/g;

interface VenueRule {
    name: string;
    confidence: VenueConfidence;
    apply(input: VenueInput, lexicon: VenueLexicon): VenueTag | null;
}

/**
 * Convert a two-digit year with a fixed pivot (00–49 → 20xx).
 */
function expandTwoDigitYear(yy: number): number {
    return yy < 50 ? 2000 + yy : 1900 + yy;
}

/**
 * Find the year closest to the span [start, end) of `text`.
 * A two-digit suffix glued to the acronym ("ICSE'24") wins outright.
 */
export function findAdjacentYear(text: string, start: number, end: number): number | null {
    const suffix = /^\s*'?(\d{2})(?!\d)/.exec(text.slice(end));
    if (suffix?.[1]) {
        return expandTwoDigitYear(parseInt(suffix[1], 10));
    }

    let best: { year: number; distance: number } | null = null;
    for (const match of text.matchAll(FOUR_DIGIT_YEAR)) {
        const index = match.index ?? 0;
        const yearText = match[1] ?? '';
        const distance = index >= end ? index - end : start - (index + yearText.length);
        if (distance < 0) continue;
        // Ties go to the year after the acronym
        if (!best || distance < best.distance || (distance === best.distance && index >= end)) {
            best = { year: parseInt(yearText, 10), distance };
        }
    }

    return best?.year ?? null;
}

/**
 * Text following the first acceptance phrase, cut at a clause break.
 */
function acceptanceWindow(text: string): string | null {
    for (const phrase of ACCEPTANCE_PHRASES) {
        const match = phrase.exec(text);
        if (!match) continue;

        const rest = text.slice(match.index + match[0].length, match.index + match[0].length + WINDOW_CHARS);
        const cut = rest.search(/[;\n]/);
        return cut === -1 ? rest : rest.slice(0, cut);
    }
    return null;
}

/**
 * First venue-looking acronym in a window: a known variant, else a 2–6 letter
 * capitalized token that is not a publisher.
 */
function nearestAcronym(
    window: string,
    lexicon: VenueLexicon
): { abbreviation: string; index: number; end: number } | null {
    const known = lexicon.findFirst(window);

    for (const match of window.matchAll(GENERIC_ACRONYM)) {
        const token = match[1] ?? '';
        const index = match.index ?? 0;
        if (known && known.index <= index) break;

        const letters = token.replace(/&/g, '');
        const upperCount = (letters.match(/[A-Z]/g) ?? []).length;
        if (letters.length < 2 || letters.length > 6 || upperCount < 2) continue;
        if (lexicon.isPublisher(letters)) continue;

        return { abbreviation: letters, index, end: index + token.length };
    }

    return known;
}

function fieldsOf(input: VenueInput, order: Array<keyof VenueInput>): string[] {
    const fields: string[] = [];
    for (const key of order) {
        const value = input[key];
        if (typeof value === 'string' && value.trim()) fields.push(value);
    }
    return fields;
}

/**
 * Ordered rules; the first rule producing a tag wins.
 */
const RULES: readonly VenueRule[] = [
    {
        // "Accepted at FSE 2024", "To appear in IEEE S&P'25"
        name: 'acceptance-phrase',
        confidence: 'high',
        apply(input, lexicon) {
            for (const text of fieldsOf(input, ['comment', 'journalRef'])) {
                const window = acceptanceWindow(text);
                if (window === null) continue;

                const acronym = nearestAcronym(window, lexicon);
                if (!acronym) continue;

                const year = findAdjacentYear(window, acronym.index, acronym.end) ?? input.year ?? null;
                return { abbreviation: acronym.abbreviation, year, isPublished: true };
            }
            return null;
        },
    },
    {
        // "Proc. of the 45th International Conference on Software Engineering (2023)"
        name: 'known-venue',
        confidence: 'low',
        apply(input, lexicon) {
            for (const text of fieldsOf(input, ['journalRef', 'venue', 'comment'])) {
                const mention = lexicon.findFirst(text);
                if (!mention) continue;

                const year = findAdjacentYear(text, mention.index, mention.end) ?? input.year ?? null;
                return { abbreviation: mention.abbreviation, year, isPublished: true };
            }
            return null;
        },
    },
    {
        // "SANER 2022", "MODELS'23"
        name: 'acronym-year',
        confidence: 'low',
        apply(input, lexicon) {
            for (const text of fieldsOf(input, ['journalRef', 'venue', 'comment'])) {
                for (const match of text.matchAll(ACRONYM_WITH_YEAR)) {
                    const token = (match[1] ?? '').replace(/&/g, '');
                    const yearText = match[2] ?? '';
                    if (token.length < 2 || token.length > 6 || lexicon.isPublisher(token)) continue;

                    const year = yearText.length === 2
                        ? expandTwoDigitYear(parseInt(yearText, 10))
                        : parseInt(yearText, 10);
                    return { abbreviation: lexicon.canonicalize(token) ?? token, year, isPublished: true };
                }
            }
            return null;
        },
    },
];

/**
 * Archival fallback: "arXiv" + compacted primary category ("cs.CR" → "arXivCSCR").
 */
export function archivalTag(primaryCategory: string | null | undefined, year: number | null | undefined): VenueTag {
    const compact = (primaryCategory ?? '').replace(/[^A-Za-z0-9]/g, '').toUpperCase();
    return { abbreviation: `arXiv${compact}`, year: year ?? null, isPublished: false };
}

/**
 * Run the rules in order and report which one matched.
 * Never fails: unrecognized text yields the archival fallback.
 */
export function matchVenue(input: VenueInput, lexicon: VenueLexicon = getDefaultLexicon()): VenueMatch {
    for (const rule of RULES) {
        const tag = rule.apply(input, lexicon);
        if (tag) {
            return { tag, rule: rule.name, confidence: rule.confidence };
        }
    }

    return {
        tag: archivalTag(input.primaryCategory, input.year),
        rule: 'archival-fallback',
        confidence: 'fallback',
    };
}

/**
 * Parse free-text venue metadata into a canonical venue tag.
 */
export function normalizeVenue(input: VenueInput, lexicon?: VenueLexicon): VenueTag {
    return matchVenue(input, lexicon).tag;
}

/**
 * Venue hints carried by a paper record.
 */
export function venueInputOf(record: PaperRecord): VenueInput {
    return {
        journalRef: record.journalRef ?? null,
        comment: record.comment ?? null,
        venue: record.venue || null,
        primaryCategory: record.primaryCategory ?? null,
        year: record.year,
    };
}
