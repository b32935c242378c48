import { z } from 'zod';
import { createPaperRecord, type PaperRecord, type PaperSource } from '../types/index.js';

/**
 * Metadata file schema (`metadata/<base>.json`).
 * Field names are snake_case; unknown fields are ignored on read.
 */
export const storedMetadataSchema = z.object({
    paper_id: z.string().min(1),
    title: z.string(),
    authors: z.array(z.string()).default([]),
    year: z.number().int().nullable().default(null),
    venue: z.string().nullable().default(null),
    abstract: z.string().nullable().default(null),
    keywords: z.array(z.string()).default([]),
    topics: z.array(z.string()).default([]),
    pdf_path: z.string().nullable().optional(),
    bibtex: z.string().nullable().optional(),
    doi: z.string().nullable().optional(),
    arxiv_id: z.string().nullable().optional(),
    url: z.string().nullable().optional(),
    pdf_url: z.string().nullable().optional(),
    citations: z.number().int().nonnegative().optional(),
    journal_ref: z.string().nullable().optional(),
    comment: z.string().nullable().optional(),
    primary_category: z.string().nullable().optional(),
    source: z.string().optional(),
    added_date: z.string().optional(),
});

export type StoredMetadata = z.infer<typeof storedMetadataSchema>;

const PAPER_SOURCES: readonly PaperSource[] = ['arxiv', 'semantic_scholar', 'manual', 'unknown'];

function toPaperSource(value: string | undefined): PaperSource | undefined {
    if (value === undefined) return undefined;
    return PAPER_SOURCES.find((source) => source === value) ?? 'unknown';
}

/**
 * Serialize a record. `pdfRelPath` is written only once the PDF is on disk.
 * `sourceTier` is never persisted.
 */
export function toStoredMetadata(record: PaperRecord, pdfRelPath: string | null): StoredMetadata {
    const stored: StoredMetadata = {
        paper_id: record.paperId,
        title: record.title,
        authors: record.authors,
        year: record.year,
        venue: record.venue,
        abstract: record.abstract,
        keywords: record.keywords,
        topics: record.topics,
    };

    if (pdfRelPath) stored.pdf_path = pdfRelPath;
    if (record.bibtex) stored.bibtex = record.bibtex;
    if (record.doi) stored.doi = record.doi;
    if (record.arxivId) stored.arxiv_id = record.arxivId;
    if (record.url) stored.url = record.url;
    if (record.pdfUrl) stored.pdf_url = record.pdfUrl;
    if (record.citationCount !== undefined) stored.citations = record.citationCount;
    if (record.journalRef) stored.journal_ref = record.journalRef;
    if (record.comment) stored.comment = record.comment;
    if (record.primaryCategory) stored.primary_category = record.primaryCategory;
    if (record.source) stored.source = record.source;
    if (record.addedAt) stored.added_date = record.addedAt;

    return stored;
}

/**
 * Rebuild a record from validated metadata. `pdfPath` is resolved by the caller.
 */
export function fromStoredMetadata(stored: StoredMetadata): PaperRecord {
    const record = createPaperRecord({
        paperId: stored.paper_id,
        title: stored.title,
        authors: stored.authors,
        year: stored.year,
        venue: stored.venue ?? '',
        abstract: stored.abstract,
        keywords: stored.keywords,
        topics: stored.topics,
    });

    if (stored.bibtex) record.bibtex = stored.bibtex;
    if (stored.doi) record.doi = stored.doi;
    if (stored.arxiv_id) record.arxivId = stored.arxiv_id;
    if (stored.url) record.url = stored.url;
    if (stored.pdf_url) record.pdfUrl = stored.pdf_url;
    if (stored.citations !== undefined) record.citationCount = stored.citations;
    if (stored.journal_ref) record.journalRef = stored.journal_ref;
    if (stored.comment) record.comment = stored.comment;
    if (stored.primary_category) record.primaryCategory = stored.primary_category;
    const source = toPaperSource(stored.source);
    if (source) record.source = source;
    if (stored.added_date) record.addedAt = stored.added_date;

    return record;
}
