import { describe, it, expect, vi, afterEach } from 'vitest';
import {
    stripDoiPrefix,
    extractArxivId,
    normalizeTitle,
    titleSimilarity,
    levenshteinDistance,
    conditionFromError,
} from '../sources/utils.js';
import { ArxivAdapter, buildArxivQuery, parseArxivFeed } from '../sources/arxiv.js';
import { SemanticScholarAdapter, normalizeS2Paper } from '../sources/semantic-scholar.js';
import { createHttpClient, HttpError } from '../utils/http-client.js';
import { SourceTier } from '../types/index.js';

const FAST_LIMITS = {
    arxiv: { tokensPerSecond: 1000, maxBurst: 100 },
    s2: { tokensPerSecond: 1000, maxBurst: 100 },
};

const ATOM_FEED = `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title type="html">ArXiv Query: search_query=all:reentrancy</title>
  <entry>
    <id>http://arxiv.org/abs/2401.01234v2</id>
    <published>2024-01-03T18:00:00Z</published>
    <title>Detecting Reentrancy
      in Smart Contracts</title>
    <summary>  We study reentrancy.
    </summary>
    <author><name>Alice Example</name></author>
    <author><name>Bob Sample</name></author>
    <arxiv:comment xmlns:arxiv="http://arxiv.org/schemas/atom">Accepted at FSE 2024</arxiv:comment>
    <arxiv:doi xmlns:arxiv="http://arxiv.org/schemas/atom">10.1145/1234567</arxiv:doi>
    <link href="http://arxiv.org/abs/2401.01234v2" rel="alternate" type="text/html"/>
    <link title="pdf" href="http://arxiv.org/pdf/2401.01234v2" rel="related" type="application/pdf"/>
    <arxiv:primary_category xmlns:arxiv="http://arxiv.org/schemas/atom" term="cs.CR" scheme="http://arxiv.org/schemas/atom"/>
  </entry>
  <entry>
    <id>http://arxiv.org/abs/2312.00001v1</id>
    <published>2023-12-01T00:00:00Z</published>
    <title>Second Paper</title>
    <summary>Another abstract.</summary>
    <author><name>Carol Test</name></author>
    <arxiv:journal_ref>Proc. ICSE 2023, pp. 1-12</arxiv:journal_ref>
    <arxiv:primary_category term="cs.SE"/>
  </entry>
</feed>`;

const ERROR_FEED = `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <entry>
    <id>http://arxiv.org/api/errors#incorrect_id_format_for_1234</id>
    <title>Error</title>
    <summary>incorrect id format for 1234</summary>
  </entry>
</feed>`;

function stubFetch(respond: () => Response | Promise<Response>) {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => respond());
    vi.stubGlobal('fetch', fetchMock);
    return fetchMock;
}

function arxivAdapter(): ArxivAdapter {
    const adapter = new ArxivAdapter({ baseUrl: 'http://arxiv.test/api/query' });
    adapter.setHttpClient(createHttpClient({ maxRetries: 0, rateLimits: FAST_LIMITS }));
    return adapter;
}

function s2Adapter(apiKey?: string): SemanticScholarAdapter {
    const adapter = new SemanticScholarAdapter({ baseUrl: 'http://s2.test/graph/v1', apiKey });
    adapter.setHttpClient(createHttpClient({ maxRetries: 0, rateLimits: FAST_LIMITS }));
    return adapter;
}

afterEach(() => {
    vi.unstubAllGlobals();
});

describe('Source Utils', () => {
    describe('stripDoiPrefix', () => {
        it('should strip https://doi.org/ prefix', () => {
            expect(stripDoiPrefix('https://doi.org/10.1234/test')).toBe('10.1234/test');
        });

        it('should handle null and plain DOIs', () => {
            expect(stripDoiPrefix(null)).toBeNull();
            expect(stripDoiPrefix('10.1234/test')).toBe('10.1234/test');
        });
    });

    describe('extractArxivId', () => {
        it('should extract from URL', () => {
            expect(extractArxivId('https://arxiv.org/abs/2401.01234')).toBe('2401.01234');
        });

        it('should extract from arxiv: prefix', () => {
            expect(extractArxivId('arXiv:2401.01234')).toBe('2401.01234');
        });

        it('should keep the version', () => {
            expect(extractArxivId('2401.01234v2')).toBe('2401.01234v2');
        });

        it('should extract old-style identifiers from URLs', () => {
            expect(extractArxivId('http://arxiv.org/abs/cs/0112017v1')).toBe('cs/0112017v1');
        });

        it('should handle null', () => {
            expect(extractArxivId(null)).toBeNull();
        });
    });

    describe('normalizeTitle', () => {
        it('should fold case, punctuation, diacritics and whitespace', () => {
            expect(normalizeTitle('  Déjà-Vu:  Fuzzing   Smart Contracts! ')).toBe('deja vu fuzzing smart contracts');
        });
    });

    describe('titleSimilarity', () => {
        it('should return 1.0 for identical titles', () => {
            expect(titleSimilarity('Attention Is All You Need', 'Attention Is All You Need')).toBe(1.0);
        });

        it('should return 1.0 for case-insensitive match', () => {
            expect(titleSimilarity('attention is all you need', 'ATTENTION IS ALL YOU NEED')).toBe(1.0);
        });

        it('should return high similarity for near matches', () => {
            expect(titleSimilarity('Attention Is All You Need', 'Attention Is All We Need')).toBeGreaterThan(0.85);
        });

        it('should return low similarity for different titles', () => {
            expect(titleSimilarity('Attention Is All You Need', 'ImageNet Classification with Deep CNNs')).toBeLessThan(0.5);
        });
    });

    describe('levenshteinDistance', () => {
        it('should count edits', () => {
            expect(levenshteinDistance('kitten', 'sitting')).toBe(3);
            expect(levenshteinDistance('', 'abc')).toBe(3);
            expect(levenshteinDistance('same', 'same')).toBe(0);
        });
    });

    describe('conditionFromError', () => {
        const tier = SourceTier.ARCHIVAL_API;

        it('should classify HTTP failures', () => {
            expect(conditionFromError(new HttpError('HTTP 429', 429, true), tier, 'arXiv').kind).toBe('rate-limit');
            expect(conditionFromError(new HttpError('HTTP 403', 403, false), tier, 'arXiv').kind).toBe('auth');
            expect(conditionFromError(new HttpError('HTTP 500', 500, true), tier, 'arXiv').kind).toBe('http');
            expect(conditionFromError(new HttpError('Network error', 0, false), tier, 'arXiv').kind).toBe('network');
            expect(conditionFromError(new HttpError('timeout', 0, true, undefined, true), tier, 'arXiv').kind).toBe('timeout');
        });

        it('should treat other errors as parse failures', () => {
            expect(conditionFromError(new SyntaxError('bad'), tier, 'arXiv')).toEqual({
                tier, source: 'arXiv', kind: 'parse', message: 'bad',
            });
        });

        it('should report cancellation when the signal is aborted', () => {
            const controller = new AbortController();
            controller.abort();
            expect(conditionFromError(new HttpError('Request cancelled', 0, false), tier, 'arXiv', controller.signal).kind).toBe('cancelled');
        });
    });
});

describe('arXiv adapter', () => {
    it('should build an any-term search query', () => {
        expect(buildArxivQuery('reentrancy smart-contract (EVM)')).toBe('all:reentrancy OR all:smart-contract OR all:EVM');
        expect(buildArxivQuery('  ')).toBe('');
    });

    it('should normalize feed entries', () => {
        const { papers, error } = parseArxivFeed(ATOM_FEED);

        expect(error).toBeNull();
        expect(papers).toHaveLength(2);
        expect(papers[0]).toEqual({
            paperId: 'arXiv_2401.01234v2',
            title: 'Detecting Reentrancy in Smart Contracts',
            authors: ['Alice Example', 'Bob Sample'],
            year: 2024,
            venue: '',
            abstract: 'We study reentrancy.',
            keywords: [],
            topics: [],
            source: 'arxiv',
            url: 'http://arxiv.org/abs/2401.01234v2',
            pdfUrl: 'http://arxiv.org/pdf/2401.01234v2',
            doi: '10.1145/1234567',
            arxivId: '2401.01234v2',
            citationCount: 0,
            journalRef: null,
            comment: 'Accepted at FSE 2024',
            primaryCategory: 'cs.CR',
        });
        expect(papers[1]).toMatchObject({
            paperId: 'arXiv_2312.00001v1',
            venue: 'Proc. ICSE 2023, pp. 1-12',
            journalRef: 'Proc. ICSE 2023, pp. 1-12',
            pdfUrl: 'https://arxiv.org/pdf/2312.00001v1',
            url: 'http://arxiv.org/abs/2312.00001v1',
            primaryCategory: 'cs.SE',
        });
    });

    it('should report a query error carried in the feed', () => {
        expect(parseArxivFeed(ERROR_FEED)).toEqual({ papers: [], error: 'incorrect id format for 1234' });
    });

    it('should query the API and cap the results', async () => {
        const fetchMock = stubFetch(() => new Response(ATOM_FEED, { headers: { 'content-type': 'application/atom+xml' } }));

        const result = await arxivAdapter().query('reentrancy smart', 1);

        expect(result.condition).toBeNull();
        expect(result.papers.map((p) => p.paperId)).toEqual(['arXiv_2401.01234v2']);
        const url = new URL(fetchMock.mock.calls[0]?.[0] ?? '');
        expect(url.searchParams.get('search_query')).toBe('all:reentrancy OR all:smart');
        expect(url.searchParams.get('max_results')).toBe('1');
    });

    it('should not call the API for a blank query', async () => {
        const fetchMock = stubFetch(() => new Response(ATOM_FEED));
        expect(await arxivAdapter().query('  ', 5)).toEqual({ papers: [], condition: null });
        expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should fail soft on rate limiting', async () => {
        stubFetch(() => new Response('Rate exceeded', { status: 429, statusText: 'Too Many Requests' }));

        const result = await arxivAdapter().query('reentrancy', 5);

        expect(result.papers).toEqual([]);
        expect(result.condition).toEqual({
            tier: SourceTier.ARCHIVAL_API, source: 'arXiv', kind: 'rate-limit', message: 'HTTP 429: Too Many Requests',
        });
    });

    it('should fail soft on a network error', async () => {
        stubFetch(() => {
            throw new TypeError('fetch failed');
        });

        const result = await arxivAdapter().query('reentrancy', 5);

        expect(result.condition?.kind).toBe('network');
    });

    it('should fail soft on a malformed body', async () => {
        stubFetch(() => new Response('definitely not a feed'));

        const result = await arxivAdapter().query('reentrancy', 5);

        expect(result).toMatchObject({ papers: [], condition: { kind: 'parse' } });
    });

    it('should surface a feed error as an HTTP condition', async () => {
        stubFetch(() => new Response(ERROR_FEED));

        const result = await arxivAdapter().query('reentrancy', 5);

        expect(result.condition).toMatchObject({ kind: 'http', message: 'incorrect id format for 1234' });
    });

    it('should report cancellation', async () => {
        stubFetch(() => new Response(ATOM_FEED));
        const controller = new AbortController();
        controller.abort();

        const result = await arxivAdapter().query('reentrancy', 5, { signal: controller.signal });

        expect(result.condition?.kind).toBe('cancelled');
    });
});

describe('Semantic Scholar adapter', () => {
    it('should normalize a paper', () => {
        expect(normalizeS2Paper({
            paperId: 'abc123',
            externalIds: { DOI: '10.1145/999', ArXiv: '2401.00042' },
            title: ' Flash Loan Attacks ',
            abstract: 'Abstract text.',
            year: 2023,
            venue: '',
            journal: { name: 'IEEE Transactions on Software Engineering' },
            citationCount: 12,
            fieldsOfStudy: ['Computer Science'],
            authors: [{ name: 'Dana Example' }, { name: null }],
            url: 'https://www.semanticscholar.org/paper/abc123',
            openAccessPdf: null,
        })).toEqual({
            paperId: 'SS_abc123',
            title: 'Flash Loan Attacks',
            authors: ['Dana Example'],
            year: 2023,
            venue: 'IEEE Transactions on Software Engineering',
            abstract: 'Abstract text.',
            keywords: ['Computer Science'],
            topics: [],
            source: 'semantic_scholar',
            url: 'https://www.semanticscholar.org/paper/abc123',
            pdfUrl: 'https://arxiv.org/pdf/2401.00042',
            doi: '10.1145/999',
            arxivId: '2401.00042',
            citationCount: 12,
        });
    });

    it('should fill defaults for sparse papers', () => {
        expect(normalizeS2Paper({ paperId: 'x', title: '   ', openAccessPdf: { url: 'https://example.org/x.pdf' } })).toMatchObject({
            title: 'Untitled',
            authors: [],
            year: null,
            venue: '',
            abstract: null,
            pdfUrl: 'https://example.org/x.pdf',
            doi: null,
            url: null,
            citationCount: 0,
        });
    });

    it('should search with the API key and drop untitled results', async () => {
        const fetchMock = stubFetch(() => Response.json({
            total: 2,
            offset: 0,
            data: [
                { paperId: 'p1', title: 'Reentrancy Guards', year: 2022 },
                { paperId: 'p2', title: null },
            ],
        }));

        const result = await s2Adapter('test-key').query('smart-contract reentrancy', 10);

        expect(result.papers.map((p) => p.paperId)).toEqual(['SS_p1']);
        expect(fetchMock).toHaveBeenCalledTimes(1);
        const [url, init] = fetchMock.mock.calls[0] ?? [];
        expect(new URL(url ?? '').searchParams.get('query')).toBe('smart contract reentrancy');
        expect(init?.headers).toMatchObject({ 'x-api-key': 'test-key' });
    });

    it('should page until the cap is reached', async () => {
        const page = (start: number, count: number, next?: number) => Response.json({
            total: 250,
            offset: start,
            next,
            data: Array.from({ length: count }, (_, i) => ({ paperId: `p${start + i}`, title: `Paper ${start + i}` })),
        });
        const fetchMock = vi.fn(async (url: string, _init?: RequestInit) => {
            const offset = Number(new URL(url).searchParams.get('offset'));
            return offset === 0 ? page(0, 100, 100) : page(100, 50, 150);
        });
        vi.stubGlobal('fetch', fetchMock);

        const result = await s2Adapter().query('reentrancy', 150);

        expect(result.papers).toHaveLength(150);
        expect(fetchMock.mock.calls.map(([url]) => new URL(url).searchParams.get('limit'))).toEqual(['100', '50']);
        expect(result.papers[149]?.paperId).toBe('SS_p149');
    });

    it('should fail soft on an auth error', async () => {
        stubFetch(() => new Response('Forbidden', { status: 403, statusText: 'Forbidden' }));

        const result = await s2Adapter('test-key').query('reentrancy', 5);

        expect(result).toEqual({
            papers: [],
            condition: { tier: SourceTier.CITATION_API, source: 'Semantic Scholar', kind: 'auth', message: 'HTTP 403: Forbidden' },
        });
    });

    it('should not call the API for an operator-only query', async () => {
        const fetchMock = stubFetch(() => Response.json({ total: 0, data: [] }));
        expect(await s2Adapter().query(' - + ', 5)).toEqual({ papers: [], condition: null });
        expect(fetchMock).not.toHaveBeenCalled();
    });
});
