import pLimit from 'p-limit';
import { SourceTier } from '../types/index.js';
import type { ByteFetcher, DownloadConfig, PaperRecord } from '../types/index.js';
import type { TierStore } from '../storage/tier-store.js';
import { HttpError } from '../utils/http-client.js';
import { StorageError, errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

export type SkipReason = 'no-url' | 'timeout' | 'fetch-failed' | 'not-pdf' | 'disabled' | 'cancelled';

/**
 * A per-paper skipped-download condition. Never aborts the batch.
 */
export interface SkippedDownload {
    paperId: string;
    reason: SkipReason;
    message: string;
}

export interface MaterializeReport {
    /** Input records in input order, with `pdfPath` set where a PDF is now local */
    records: PaperRecord[];
    /** Paper ids whose PDF was downloaded in this run */
    downloaded: string[];
    /** Records that already had a local PDF (no-op) */
    alreadyLocal: number;
    skipped: SkippedDownload[];
}

export interface MaterializeOptions {
    /** Fetch PDFs; when false only metadata is persisted */
    download?: boolean;
    signal?: AbortSignal;
}

export interface MaterializerOptions {
    /** Target tier; always the cached tier in automated retrieval */
    store: TierStore;
    fetcher: ByteFetcher;
    config: Pick<DownloadConfig, 'enabled' | 'timeoutMs' | 'concurrency'>;
}

const PDF_MAGIC = [0x25, 0x50, 0x44, 0x46]; // "%PDF"

/**
 * True when the bytes start with the PDF signature (leading whitespace tolerated).
 */
export function looksLikePdf(bytes: Uint8Array): boolean {
    let start = 0;
    while (start < bytes.length && start < 1024 && isWhitespace(bytes[start])) start++;
    return PDF_MAGIC.every((byte, i) => bytes[start + i] === byte);
}

function isWhitespace(byte: number | undefined): boolean {
    return byte === 0x20 || byte === 0x09 || byte === 0x0a || byte === 0x0d;
}

/**
 * Download URL from the record's provenance: an explicit PDF link, else the
 * arXiv PDF for its arXiv id.
 */
export function downloadUrlOf(record: PaperRecord): string | null {
    if (record.pdfUrl) return record.pdfUrl;
    if (record.arxivId) return `https://arxiv.org/pdf/${record.arxivId}`;
    return null;
}

/**
 * Fetches missing PDFs and commits them into the cached tier.
 *
 * For a record not yet stored locally the metadata is saved first, so a
 * failed download leaves a pending pair that a later run completes.
 * Curated records are never copied as metadata-only; they reach the cached
 * tier only with their PDF.
 */
export class PdfMaterializer {
    private readonly store: TierStore;
    private readonly fetcher: ByteFetcher;
    private readonly config: MaterializerOptions['config'];

    constructor(options: MaterializerOptions) {
        this.store = options.store;
        this.fetcher = options.fetcher;
        this.config = options.config;
    }

    async materialize(records: PaperRecord[], options: MaterializeOptions = {}): Promise<MaterializeReport> {
        const download = options.download ?? this.config.enabled;
        const { signal } = options;
        const limit = pLimit(Math.max(1, this.config.concurrency));

        const report: MaterializeReport = { records: [], downloaded: [], alreadyLocal: 0, skipped: [] };

        const results = await Promise.all(
            records.map((record) => limit(() => this.materializeOne(record, download, report, signal)))
        );
        report.records = results;

        logger.info(
            {
                downloaded: report.downloaded.length,
                alreadyLocal: report.alreadyLocal,
                skipped: report.skipped.length,
            },
            'PDF materialization complete'
        );
        return report;
    }

    private async materializeOne(
        record: PaperRecord,
        download: boolean,
        report: MaterializeReport,
        signal?: AbortSignal
    ): Promise<PaperRecord> {
        if (record.pdfPath !== undefined || await this.store.hasPdf(record.paperId)) {
            report.alreadyLocal++;
            const stored = record.pdfPath === undefined ? await this.store.get(record.paperId) : undefined;
            return stored?.pdfPath ? { ...record, pdfPath: stored.pdfPath } : record;
        }

        // Record of intent: remote results are cached even when the download fails
        if (record.sourceTier !== SourceTier.CURATED) {
            await this.store.save(record);
        }

        const skip = (reason: SkipReason, message: string): PaperRecord => {
            report.skipped.push({ paperId: record.paperId, reason, message });
            logger.debug({ paperId: record.paperId, reason, message }, 'PDF download skipped');
            return record;
        };

        if (!download) return skip('disabled', 'PDF downloads are disabled');
        if (signal?.aborted) return skip('cancelled', 'Materialization cancelled');

        const url = downloadUrlOf(record);
        if (!url) return skip('no-url', 'No download URL in record provenance');

        let bytes: Uint8Array;
        try {
            bytes = await this.fetcher.fetchBytes(url, { timeoutMs: this.config.timeoutMs, signal });
        } catch (error) {
            if (signal?.aborted) return skip('cancelled', errorMessage(error));
            if (error instanceof HttpError && error.timedOut) return skip('timeout', error.message);
            logger.warn({ paperId: record.paperId, url, error: errorMessage(error) }, 'PDF download failed');
            return skip('fetch-failed', errorMessage(error));
        }

        if (!looksLikePdf(bytes)) {
            return skip('not-pdf', `Response from ${url} is not a PDF (${bytes.length} bytes)`);
        }

        try {
            const baseName = await this.store.save(record, bytes);
            report.downloaded.push(record.paperId);
            logger.info({ paperId: record.paperId, baseName }, 'PDF materialized');
            return { ...record, pdfPath: this.store.pdfPathFor(baseName) };
        } catch (error) {
            // The pair is left pending on disk; the filesystem failure is fatal
            if (error instanceof StorageError) throw error;
            throw new StorageError(
                `Cannot store PDF for ${record.paperId}: ${errorMessage(error)}`,
                this.store.name, this.store.rootDir, 'pdf', { cause: error }
            );
        }
    }
}
