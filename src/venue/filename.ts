import type { VenueTag } from '../types/index.js';

/** Default character budget for the title part of a base name */
export const DEFAULT_MAX_TITLE_LENGTH = 60;

export interface BaseNameOptions {
    /** Character budget for the slug */
    maxTitleLength?: number;
    /** Used when the title normalizes to an empty slug */
    fallbackId?: string;
}

/**
 * Filesystem-safe slug: ASCII letters and digits joined by single underscores,
 * truncated to `maxLength` without a trailing underscore.
 */
export function slugifyTitle(title: string, maxLength = DEFAULT_MAX_TITLE_LENGTH): string {
    return title
        .normalize('NFKD')
        .replace(/[\u0300-\u036f]/g, '')
        .replace(/[-\u2013\u2014/:_]+/g, ' ')       // Word separators become spaces
        .replace(/[^A-Za-z0-9\s]/g, '')     // Strip remaining punctuation
        .trim()
        .replace(/\s+/g, '_')
        .slice(0, Math.max(1, maxLength))
        .replace(/^_+|_+$/g, '');
}

/**
 * Two-digit year suffix ("24" for 2024, "05" for 2005), empty when unknown.
 */
export function yearSuffix(year: number | null): string {
    if (year === null) return '';
    return String(((year % 100) + 100) % 100).padStart(2, '0');
}

/**
 * Venue prefix of a base name: `{abbreviation}{yy}`.
 */
export function venuePrefix(tag: VenueTag): string {
    return `${tag.abbreviation.replace(/[^A-Za-z0-9]/g, '')}${yearSuffix(tag.year)}`;
}

/**
 * Deterministic base name shared by a paper's metadata and PDF file:
 * `{abbreviation}{yy}_{slug}`, e.g. "FSE24_Detecting_Reentrancy_Vulnerabilities".
 */
export function assignBaseName(tag: VenueTag, title: string, options: BaseNameOptions = {}): string {
    const maxLength = options.maxTitleLength ?? DEFAULT_MAX_TITLE_LENGTH;

    const slug =
        slugifyTitle(title, maxLength) ||
        slugifyTitle(options.fallbackId ?? '', maxLength) ||
        'untitled';

    const prefix = venuePrefix(tag);
    return prefix ? `${prefix}_${slug}` : slug;
}

/**
 * The n-th candidate name for a base name; the first candidate is the name itself.
 */
export function disambiguate(baseName: string, attempt: number): string {
    return attempt <= 1 ? baseName : `${baseName}_${attempt}`;
}
