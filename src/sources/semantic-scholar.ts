import { createPaperRecord, SourceTier } from '../types/index.js';
import type {
    PaperRecord,
    SourceAdapter,
    SourceAdapterOptions,
    SourceQueryOptions,
    SourceResult,
} from '../types/index.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { conditionFromError, extractArxivId, stripDoiPrefix } from './utils.js';

const logger = getLogger();

const S2_BASE = 'https://api.semanticscholar.org/graph/v1';

/** The search endpoint returns at most 100 results per page */
const MAX_PAGE_SIZE = 100;

/** Fields to request from S2 API */
const PAPER_FIELDS = [
    'paperId', 'externalIds', 'title', 'abstract', 'year', 'venue', 'journal',
    'citationCount', 'authors', 'url', 'openAccessPdf', 'fieldsOfStudy',
].join(',');

/**
 * Semantic Scholar API response types.
 */
export interface S2Paper {
    paperId: string;
    externalIds?: {
        DOI?: string;
        ArXiv?: string;
        CorpusId?: number;
    } | null;
    title?: string | null;
    abstract?: string | null;
    year?: number | null;
    venue?: string | null;
    journal?: {
        name?: string;
        volume?: string;
        pages?: string;
    } | null;
    citationCount?: number | null;
    fieldsOfStudy?: string[] | null;
    authors?: Array<{
        authorId?: string | null;
        name?: string | null;
    }>;
    url?: string | null;
    openAccessPdf?: {
        url?: string | null;
        status?: string | null;
    } | null;
}

interface S2SearchResponse {
    total?: number;
    offset?: number;
    next?: number;
    data?: S2Paper[];
}

/**
 * Semantic Scholar source adapter (citation-graph search engine).
 * Pages through `/paper/search` until the cap or the result set is exhausted.
 *
 * @see https://api.semanticscholar.org/
 */
export class SemanticScholarAdapter implements SourceAdapter {
    readonly name = 'Semantic Scholar';
    readonly tier = SourceTier.CITATION_API;
    private httpClient: HttpClient;
    private readonly apiKey?: string;
    private readonly baseUrl: string;
    private readonly timeoutMs?: number;

    constructor(options?: SourceAdapterOptions) {
        this.apiKey = options?.apiKey;
        this.baseUrl = options?.baseUrl ?? S2_BASE;
        this.timeoutMs = options?.timeoutMs;
        this.httpClient = getHttpClient();
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    async query(queryText: string, maxResults: number, options: SourceQueryOptions = {}): Promise<SourceResult> {
        const cleanedQuery = this.cleanSearchQuery(queryText);
        if (!cleanedQuery || maxResults <= 0) {
            return { papers: [], condition: null };
        }

        const papers: PaperRecord[] = [];
        let offset = 0;

        try {
            while (papers.length < maxResults) {
                const limit = Math.min(MAX_PAGE_SIZE, maxResults - papers.length);
                const params = new URLSearchParams({
                    query: cleanedQuery,
                    offset: String(offset),
                    limit: String(limit),
                    fields: PAPER_FIELDS,
                });

                const url = `${this.baseUrl}/paper/search?${params.toString()}`;
                logger.debug({ url }, 'S2 search');

                const response = await this.httpClient.get<S2SearchResponse>(url, {
                    source: 's2',
                    headers: this.buildHeaders(),
                    timeout: this.timeoutMs,
                    signal: options.signal,
                });

                const batch = (response.data.data ?? []).filter((paper) => paper.paperId && paper.title);
                papers.push(...batch.map((paper) => normalizeS2Paper(paper)));

                offset += limit;
                const total = response.data.total ?? 0;
                if ((response.data.data ?? []).length === 0 || response.data.next === undefined || offset >= total) {
                    break;
                }
            }
        } catch (error) {
            const condition = conditionFromError(error, this.tier, this.name, options.signal);
            logger.warn({ kind: condition.kind, error: condition.message }, 'S2 search failed');
            return { papers: [], condition };
        }

        logger.debug({ count: papers.length }, 'S2 results');
        return { papers: papers.slice(0, maxResults), condition: null };
    }

    // ─── Private helpers ──────────────────────────────────────

    /**
     * Clean search query; S2 treats hyphens and plus signs as operators.
     */
    private cleanSearchQuery(query: string): string {
        return query
            .replace(/[-+]/g, ' ')
            .replace(/\s+/g, ' ')
            .trim();
    }

    private buildHeaders(): Record<string, string> {
        const headers: Record<string, string> = {};
        if (this.apiKey) {
            headers['x-api-key'] = this.apiKey;
        }
        return headers;
    }
}

/**
 * Map an S2 paper onto a record. The venue stays raw; the journal name
 * stands in when S2 reports no venue.
 */
export function normalizeS2Paper(paper: S2Paper): PaperRecord {
    const doi = stripDoiPrefix(paper.externalIds?.DOI ?? null);
    const arxivId = extractArxivId(paper.externalIds?.ArXiv ?? null);
    const pdfUrl = paper.openAccessPdf?.url || (arxivId ? `https://arxiv.org/pdf/${arxivId}` : null);

    return createPaperRecord({
        paperId: `SS_${paper.paperId}`,
        title: (paper.title ?? '').trim() || 'Untitled',
        authors: (paper.authors ?? [])
            .map((author) => author.name?.trim() ?? '')
            .filter((name) => name.length > 0),
        year: paper.year ?? null,
        venue: paper.venue || paper.journal?.name || '',
        abstract: paper.abstract?.trim() || null,
        keywords: paper.fieldsOfStudy ?? [],
        source: 'semantic_scholar',
        url: paper.url ?? (doi ? `https://doi.org/${doi}` : null),
        pdfUrl,
        doi,
        arxivId,
        citationCount: paper.citationCount ?? 0,
    });
}
