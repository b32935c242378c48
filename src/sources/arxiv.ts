import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';
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
import { collapseWhitespace, conditionFromError, extractArxivId, stripDoiPrefix } from './utils.js';

const logger = getLogger();

const ARXIV_BASE = 'https://export.arxiv.org/api/query';

/** arXiv caps a single response page */
const MAX_PAGE_SIZE = 2000;

// ─── Atom feed schema ────────────────────────────────────

/** Text node, possibly carrying attributes (`{ '#text': ..., '@_xmlns:arxiv': ... }`) */
const textNode = z.union([
    z.string(),
    z.object({ '#text': z.string().optional() }).transform((node) => node['#text'] ?? ''),
]);

const atomLink = z.object({
    '@_href': z.string(),
    '@_rel': z.string().optional(),
    '@_type': z.string().optional(),
    '@_title': z.string().optional(),
});

const atomEntry = z.object({
    id: textNode,
    title: textNode.default(''),
    summary: textNode.optional(),
    published: textNode.optional(),
    author: z.array(z.object({ name: textNode })).default([]),
    link: z.array(atomLink).default([]),
    'arxiv:comment': textNode.optional(),
    'arxiv:journal_ref': textNode.optional(),
    'arxiv:doi': textNode.optional(),
    'arxiv:primary_category': z.object({ '@_term': z.string() }).optional(),
});

const atomFeed = z.object({
    feed: z.object({
        entry: z.array(atomEntry).default([]),
    }),
});

type AtomEntry = z.infer<typeof atomEntry>;

const xmlParser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    parseTagValue: false,
    parseAttributeValue: false,
    isArray: (name) => name === 'entry' || name === 'author' || name === 'link',
});

/**
 * Build an arXiv `search_query`: every term searched in all fields, any term may match.
 */
export function buildArxivQuery(queryText: string): string {
    const terms = queryText
        .split(/\s+/)
        .map((term) => term.replace(/[^\p{L}\p{N}-]/gu, ''))
        .filter((term) => term.length > 0);

    return terms.map((term) => `all:${term}`).join(' OR ');
}

export interface ArxivFeed {
    papers: PaperRecord[];
    /** Query error reported inside the feed, if any */
    error: string | null;
}

/**
 * Parse an Atom response body. The API reports query errors as a single
 * entry whose id points at /api/errors.
 */
export function parseArxivFeed(xml: string): ArxivFeed {
    const parsed = atomFeed.parse(xmlParser.parse(xml));
    const errorEntry = parsed.feed.entry.find((entry) => entry.id.includes('/api/errors'));
    if (errorEntry) {
        return { papers: [], error: collapseWhitespace(errorEntry.summary ?? errorEntry.title) };
    }
    return { papers: parsed.feed.entry.map((entry) => normalizeArxivEntry(entry)), error: null };
}

function normalizeArxivEntry(entry: AtomEntry): PaperRecord {
    const arxivId = extractArxivId(entry.id) ?? entry.id.split('/abs/').pop() ?? entry.id;
    const published = entry.published ? new Date(entry.published) : null;
    const year = published && !isNaN(published.getTime()) ? published.getUTCFullYear() : null;

    const pdfLink = entry.link.find((link) => link['@_title'] === 'pdf' || link['@_type'] === 'application/pdf');
    const absLink = entry.link.find((link) => link['@_rel'] === 'alternate');

    const journalRef = entry['arxiv:journal_ref'] ? collapseWhitespace(entry['arxiv:journal_ref']) : null;
    const comment = entry['arxiv:comment'] ? collapseWhitespace(entry['arxiv:comment']) : null;

    return createPaperRecord({
        paperId: `arXiv_${arxivId}`,
        title: collapseWhitespace(entry.title),
        authors: entry.author.map((author) => collapseWhitespace(author.name)).filter((name) => name.length > 0),
        year,
        venue: journalRef ?? '',
        abstract: entry.summary ? collapseWhitespace(entry.summary) : null,
        source: 'arxiv',
        url: absLink?.['@_href'] ?? entry.id,
        pdfUrl: pdfLink?.['@_href'] ?? `https://arxiv.org/pdf/${arxivId}`,
        doi: stripDoiPrefix(entry['arxiv:doi'] ?? null),
        arxivId,
        citationCount: 0,
        journalRef,
        comment,
        primaryCategory: entry['arxiv:primary_category']?.['@_term'] ?? null,
    });
}

/**
 * arXiv adapter (archival preprint index).
 * Raw venue hints (`journal_ref`, `comment`, primary category) are kept on the
 * record for the venue normalizer.
 *
 * @see https://info.arxiv.org/help/api/user-manual.html
 */
export class ArxivAdapter implements SourceAdapter {
    readonly name = 'arXiv';
    readonly tier = SourceTier.ARCHIVAL_API;
    private httpClient: HttpClient;
    private readonly baseUrl: string;
    private readonly timeoutMs?: number;

    constructor(options?: SourceAdapterOptions) {
        this.baseUrl = options?.baseUrl ?? ARXIV_BASE;
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
        const searchQuery = buildArxivQuery(queryText);
        if (!searchQuery || maxResults <= 0) {
            return { papers: [], condition: null };
        }

        const params = new URLSearchParams({
            search_query: searchQuery,
            start: '0',
            max_results: String(Math.min(maxResults, MAX_PAGE_SIZE)),
            sortBy: 'relevance',
            sortOrder: 'descending',
        });
        const url = `${this.baseUrl}?${params.toString()}`;
        logger.debug({ url }, 'arXiv search');

        try {
            const xml = await this.httpClient.getText(url, {
                source: 'arxiv',
                timeout: this.timeoutMs,
                signal: options.signal,
            });

            const feed = parseArxivFeed(xml);
            if (feed.error) {
                logger.warn({ error: feed.error }, 'arXiv rejected the query');
                return { papers: [], condition: { tier: this.tier, source: this.name, kind: 'http', message: feed.error } };
            }

            const papers = feed.papers.slice(0, maxResults);
            logger.debug({ count: papers.length }, 'arXiv results');
            return { papers, condition: null };
        } catch (error) {
            const condition = conditionFromError(error, this.tier, this.name, options.signal);
            logger.warn({ kind: condition.kind, error: condition.message }, 'arXiv search failed');
            return { papers: [], condition };
        }
    }
}
