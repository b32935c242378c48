/**
 * Source tiers in merge priority order (highest first).
 * Attached to records during retrieval; never persisted.
 */
export enum SourceTier {
    CURATED = 'CURATED',
    CACHED = 'CACHED',
    ARCHIVAL_API = 'ARCHIVAL_API',
    CITATION_API = 'CITATION_API',
}

/** Priority order used by the merger and for result ordering */
export const TIER_PRIORITY: readonly SourceTier[] = [
    SourceTier.CURATED,
    SourceTier.CACHED,
    SourceTier.ARCHIVAL_API,
    SourceTier.CITATION_API,
];

/** Physical storage tiers */
export type StorageTierName = 'curated' | 'cached';

/** Adapter that first produced a record */
export type PaperSource = 'arxiv' | 'semantic_scholar' | 'manual' | 'unknown';

/**
 * PaperRecord: the canonical unit.
 * Normalized from any source (arXiv, Semantic Scholar, local tiers) into this common shape.
 */
export interface PaperRecord {
    /** Source-qualified unique identifier (e.g. "arXiv_2401.01234v1", "SS_<paperId>") */
    paperId: string;

    title: string;

    /** Ordered author names */
    authors: string[];

    year: number | null;

    /** Free-text venue as reported by the source (pre-normalization) */
    venue: string;

    abstract: string | null;

    keywords: string[];

    topics: string[];

    /** Absolute path of the local PDF, absent until materialized */
    pdfPath?: string;

    /** Pre-rendered citation */
    bibtex?: string;

    /** Provenance attached during merge; not persisted */
    sourceTier?: SourceTier;

    // ─── Provenance fields ────────────────────────────────

    source?: PaperSource;
    url?: string | null;
    pdfUrl?: string | null;
    doi?: string | null;
    arxivId?: string | null;
    citationCount?: number;

    /** arXiv journal reference (e.g. "Proc. ICSE 2023, pp. 1-12") */
    journalRef?: string | null;

    /** arXiv author comment (e.g. "Accepted at FSE 2024") */
    comment?: string | null;

    /** arXiv primary category (e.g. "cs.CR") */
    primaryCategory?: string | null;

    /** ISO timestamp of first persistence */
    addedAt?: string;
}

/**
 * Build a record with empty defaults for every optional collection.
 */
export function createPaperRecord(
    fields: Pick<PaperRecord, 'paperId' | 'title'> & Partial<PaperRecord>
): PaperRecord {
    return {
        authors: [],
        year: null,
        venue: '',
        abstract: null,
        keywords: [],
        topics: [],
        ...fields,
    };
}
