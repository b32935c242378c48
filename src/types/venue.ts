/**
 * Normalized venue tag derived from free-text venue metadata.
 * Computed once per paper at naming time; never mutated afterward.
 */
export interface VenueTag {
    /** Canonical abbreviation ("FSE", "SP") or archival tag ("arXivCSCR") */
    abbreviation: string;

    year: number | null;

    /** False when the tag is the archival-category fallback */
    isPublished: boolean;
}

/**
 * Raw venue hints taken from a paper record.
 */
export interface VenueInput {
    journalRef?: string | null;
    comment?: string | null;
    /** Venue string reported by a citation API */
    venue?: string | null;
    /** arXiv primary category, e.g. "cs.CR" */
    primaryCategory?: string | null;
    /** Publication year reported by the source */
    year?: number | null;
}

export type VenueConfidence = 'high' | 'low' | 'fallback';

/**
 * A tag together with the rule that produced it.
 */
export interface VenueMatch {
    tag: VenueTag;
    rule: string;
    confidence: VenueConfidence;
}
