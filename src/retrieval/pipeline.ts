import { readFile } from 'node:fs/promises';
import type { ByteFetcher, Indexer, PaperRecord, RelworkConfig, SourceAdapter } from '../types/index.js';
import { createPaperRecord } from '../types/index.js';
import { TieredStore } from '../storage/tiered-store.js';
import type { TierStore } from '../storage/tier-store.js';
import { ArxivAdapter } from '../sources/arxiv.js';
import { SemanticScholarAdapter } from '../sources/semantic-scholar.js';
import { KeywordIndexer } from '../nlp/indexer.js';
import type { VenueLexicon } from '../venue/venue-table.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { InvalidRequestError, errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { DeduplicatingMerger, type RetrievalRequest, type RetrievalResult } from './merger.js';
import { PdfMaterializer, looksLikePdf, type MaterializeReport } from './materializer.js';

const logger = getLogger();

/**
 * Collaborators that can be swapped out (tests inject fakes here).
 */
export interface EngineDeps {
    store?: TieredStore;
    adapters?: SourceAdapter[];
    fetcher?: ByteFetcher;
    /** Client whose request counts are reported per run */
    httpClient?: HttpClient;
    indexer?: Indexer;
    lexicon?: VenueLexicon;
}

export interface Engine {
    store: TieredStore;
    merger: DeduplicatingMerger;
    materializer: PdfMaterializer;
    httpClient: HttpClient;
}

export interface RelatedPapersRequest extends RetrievalRequest {
    /** Overrides `download.enabled` */
    download?: boolean;
}

export interface RelatedPapersResult {
    papers: PaperRecord[];
    retrieval: RetrievalResult;
    materialization: MaterializeReport;
    /** HTTP requests sent during the run, per rate-limit source */
    requests: Record<string, number>;
}

/**
 * Wire the store, adapters, merger and materializer from one config object.
 */
export function createEngine(config: RelworkConfig, deps: EngineDeps = {}): Engine {
    const httpClient = deps.httpClient ?? getHttpClient();
    const store = deps.store ?? new TieredStore(config.storage, {
        indexer: deps.indexer ?? new KeywordIndexer(),
        lexicon: deps.lexicon,
    });

    const adapters = deps.adapters ?? defaultAdapters(config, httpClient);

    const merger = new DeduplicatingMerger({ store, adapters, config: config.retrieval });
    const materializer = new PdfMaterializer({
        store: store.cached,
        fetcher: deps.fetcher ?? httpClient,
        config: config.download,
    });

    return { store, merger, materializer, httpClient };
}

function defaultAdapters(config: RelworkConfig, httpClient: HttpClient): SourceAdapter[] {
    const arxiv = new ArxivAdapter({ baseUrl: config.sources.arxivBaseUrl, timeoutMs: config.sources.timeoutMs });
    const s2 = new SemanticScholarAdapter({
        baseUrl: config.sources.semanticScholarBaseUrl,
        apiKey: config.sources.semanticScholarApiKey,
        timeoutMs: config.sources.timeoutMs,
    });
    arxiv.setHttpClient(httpClient);
    s2.setHttpClient(httpClient);
    return [arxiv, s2];
}

/**
 * Full retrieval run:
 *
 * 1. Merge curated, cached and remote candidates (deduplicated, priority ordered)
 * 2. Persist remote results into the cached tier and fetch missing PDFs
 */
export async function retrieveRelatedPapers(engine: Engine, request: RelatedPapersRequest): Promise<RelatedPapersResult> {
    const startTime = Date.now();
    engine.httpClient.resetCounts();

    // ──────────────────────────────────────────────────
    // Step 1: Merge
    // ──────────────────────────────────────────────────
    const retrieval = await engine.merger.retrieve(request);

    // ──────────────────────────────────────────────────
    // Step 2: Materialize
    // ──────────────────────────────────────────────────
    const materialization = await engine.materializer.materialize(retrieval.papers, {
        download: request.download,
        signal: request.signal,
    });

    const requests = engine.httpClient.getAllRequestCounts();
    logger.info(
        { papers: materialization.records.length, requests, durationMs: Date.now() - startTime },
        'Related papers ready'
    );

    return { papers: materialization.records, retrieval, materialization, requests };
}

export interface ManualAddition {
    title: string;
    authors?: string[];
    year?: number | null;
    venue?: string;
    abstract?: string | null;
    /** Local PDF to store with the record */
    pdfFile?: string;
    paperId?: string;
    doi?: string | null;
    url?: string | null;
}

/**
 * Manual-addition path into the curated tier. Returns the stored record.
 */
export async function addManualPaper(store: TierStore, addition: ManualAddition): Promise<PaperRecord> {
    if (!addition.title.trim()) {
        throw new InvalidRequestError('Title must not be empty', 'title');
    }

    let pdfBytes: Uint8Array | undefined;
    if (addition.pdfFile) {
        try {
            pdfBytes = new Uint8Array(await readFile(addition.pdfFile));
        } catch (error) {
            throw new InvalidRequestError(`Cannot read ${addition.pdfFile}: ${errorMessage(error)}`, 'pdfFile');
        }
        if (!looksLikePdf(pdfBytes)) {
            throw new InvalidRequestError(`${addition.pdfFile} is not a PDF`, 'pdfFile');
        }
    }

    const record = createPaperRecord({
        paperId: addition.paperId ?? manualPaperId(addition),
        title: addition.title.trim(),
        authors: addition.authors ?? [],
        year: addition.year ?? null,
        venue: addition.venue ?? '',
        abstract: addition.abstract ?? null,
        source: 'manual',
        doi: addition.doi ?? null,
        url: addition.url ?? null,
    });

    const baseName = await store.save(record, pdfBytes);
    logger.info({ tier: store.name, paperId: record.paperId, baseName }, 'Paper added');

    const stored = await store.get(record.paperId);
    if (!stored) {
        throw new Error(`Paper ${record.paperId} missing after save`);
    }
    return stored;
}

/**
 * Deterministic id for manual additions: DOI when known, else year + title words.
 */
export function manualPaperId(addition: Pick<ManualAddition, 'title' | 'year' | 'doi'>): string {
    if (addition.doi) return `DOI_${addition.doi}`;
    const words = addition.title
        .toLowerCase()
        .replace(/[^a-z0-9\s]/g, ' ')
        .split(/\s+/)
        .filter((word) => word.length > 0)
        .slice(0, 6)
        .join('-');
    return `manual_${addition.year ?? 'nd'}_${words || 'untitled'}`;
}
