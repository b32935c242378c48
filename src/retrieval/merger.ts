import { SourceTier, TIER_PRIORITY } from '../types/index.js';
import type {
    PaperRecord,
    RetrievalConfig,
    SourceAdapter,
    SourceCondition,
    SourceResult,
} from '../types/index.js';
import type { TieredStore } from '../storage/tiered-store.js';
import type { TierStore } from '../storage/tier-store.js';
import { InvalidRequestError, RetrievalCancelledError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { normalizeTitle, normalizedSimilarity } from '../sources/utils.js';
import { tokenize } from '../nlp/tokenizer.js';
import { buildSearchQuery, extractSearchTerms, rankLocalRecords } from './query.js';

const logger = getLogger();

// ─── Types ───────────────────────────────────────────────

export interface RetrievalRequest {
    /** Query abstract or title */
    query: string;
    /** Optional title of the paper being written; its terms lead the search */
    title?: string;
    /** Defaults to `retrieval.maxResults` */
    maxResults?: number;
    /** Enabled sources; defaults to `retrieval.sources` */
    sources?: Iterable<SourceTier>;
    signal?: AbortSignal;
}

export interface SourceReport {
    tier: SourceTier;
    source: string;
    /** False when skipped because the quota was already met */
    queried: boolean;
    /** Candidates returned by the source */
    candidates: number;
    /** Candidates kept after deduplication */
    retained: number;
    condition: SourceCondition | null;
}

export interface RetrievalResult {
    /** Unique records in priority order, then source relevance order */
    papers: PaperRecord[];
    /** Search terms sent to the sources */
    searchQuery: string;
    sources: SourceReport[];
    duplicatesRemoved: number;
    conditions: SourceCondition[];
}

export type MergerConfig = Pick<
    RetrievalConfig,
    'maxResults' | 'sources' | 'dedupThreshold' | 'overfetchFactor' | 'parallelRemote'
>;

export interface MergerOptions {
    store: TieredStore;
    /** Remote adapters; each feeds the tier it declares */
    adapters: SourceAdapter[];
    config: MergerConfig;
}

// ─── Deduplication ───────────────────────────────────────

/** Significant words one title may have that the other lacks, on either side */
const MAX_WORD_DIFFERENCE = 1;

interface TitleKey {
    normalized: string;
    /** Title words without stopwords */
    words: ReadonlySet<string>;
}

function titleKey(title: string): TitleKey {
    const normalized = normalizeTitle(title);
    return { normalized, words: new Set(tokenize(normalized)) };
}

function countMissing(words: ReadonlySet<string>, other: ReadonlySet<string>): number {
    let missing = 0;
    for (const word of words) {
        if (!other.has(word)) missing++;
    }
    return missing;
}

/**
 * Equal normalized titles always match. Otherwise the titles may differ by at
 * most one significant word on each side, and their similarity must reach `threshold`.
 */
function titlesMatch(a: TitleKey, b: TitleKey, threshold: number): boolean {
    if (a.normalized === b.normalized) return true;
    if (countMissing(a.words, b.words) > MAX_WORD_DIFFERENCE || countMissing(b.words, a.words) > MAX_WORD_DIFFERENCE) {
        return false;
    }
    return normalizedSimilarity(a.normalized, b.normalized) >= threshold;
}

/**
 * Two records are duplicates when they share a paper id or their titles match.
 */
export function isDuplicate(a: PaperRecord, b: PaperRecord, threshold: number): boolean {
    if (a.paperId === b.paperId) return true;
    return titlesMatch(titleKey(a.title), titleKey(b.title), threshold);
}

interface RetainedRecord {
    record: PaperRecord;
    title: TitleKey;
}

/**
 * Insertion-ordered set of unique records. Records are offered in priority
 * order, so on a duplicate the retained record always wins; it only picks up
 * a local PDF or download provenance it lacks.
 */
export class DedupSet {
    private readonly retained: RetainedRecord[] = [];
    private readonly ids = new Set<string>();
    duplicates = 0;

    constructor(private readonly threshold: number) {}

    get size(): number {
        return this.retained.length;
    }

    /**
     * Returns true when the record was retained.
     */
    offer(record: PaperRecord): boolean {
        const title = titleKey(record.title);
        const match = this.findDuplicate(record.paperId, title);

        if (match) {
            this.duplicates++;
            adoptMissing(match.record, record);
            logger.debug(
                { kept: match.record.paperId, dropped: record.paperId, keptTier: match.record.sourceTier, droppedTier: record.sourceTier },
                'Duplicate dropped'
            );
            return false;
        }

        this.retained.push({ record, title });
        this.ids.add(record.paperId);
        return true;
    }

    records(): PaperRecord[] {
        return this.retained.map((entry) => entry.record);
    }

    private findDuplicate(paperId: string, title: TitleKey): RetainedRecord | undefined {
        if (this.ids.has(paperId)) {
            return this.retained.find((entry) => entry.record.paperId === paperId);
        }
        return this.retained.find((entry) => titlesMatch(entry.title, title, this.threshold));
    }
}

function adoptMissing(kept: PaperRecord, dropped: PaperRecord): void {
    if (kept.pdfPath === undefined && dropped.pdfPath !== undefined) kept.pdfPath = dropped.pdfPath;
    kept.pdfUrl ??= dropped.pdfUrl;
    kept.arxivId ??= dropped.arxivId;
    kept.doi ??= dropped.doi;
}

// ─── Merger ──────────────────────────────────────────────

/**
 * Queries the curated tier, the cached tier, then the remote adapters for the
 * shortfall only, deduplicating as it goes.
 */
export class DeduplicatingMerger {
    private readonly store: TieredStore;
    private readonly adapters: Map<SourceTier, SourceAdapter>;
    private readonly config: MergerConfig;

    constructor(options: MergerOptions) {
        this.store = options.store;
        this.adapters = new Map(options.adapters.map((adapter) => [adapter.tier, adapter]));
        this.config = options.config;

        if (!(this.config.dedupThreshold > 0 && this.config.dedupThreshold <= 1)) {
            throw new InvalidRequestError(`dedupThreshold must be in (0, 1], got ${this.config.dedupThreshold}`, 'dedupThreshold');
        }
    }

    async retrieve(request: RetrievalRequest): Promise<RetrievalResult> {
        const { maxResults, enabled } = this.validate(request);
        const { signal } = request;

        const terms = extractSearchTerms(request.query, { title: request.title });
        const searchQuery = buildSearchQuery(request.query, { title: request.title });
        logger.info({ searchQuery, maxResults, sources: [...enabled] }, 'Retrieving related papers');

        // The directory scan is the source of truth for each call
        this.store.invalidate();

        const unique = new DedupSet(this.config.dedupThreshold);
        const reports: SourceReport[] = [];

        // ─── Local tiers ─────────────────────────────────────
        for (const [tier, store] of [
            [SourceTier.CURATED, this.store.curated],
            [SourceTier.CACHED, this.store.cached],
        ] as const) {
            if (!enabled.has(tier)) continue;
            throwIfCancelled(signal);

            if (unique.size >= maxResults) {
                reports.push(skippedReport(tier, store.name));
                continue;
            }
            reports.push(await this.collectLocal(tier, store, terms, unique, maxResults));
        }

        // ─── Remote adapters ─────────────────────────────────
        const remote = [SourceTier.ARCHIVAL_API, SourceTier.CITATION_API]
            .filter((tier) => enabled.has(tier))
            .map((tier) => ({ tier, adapter: this.adapters.get(tier) }));

        for (const { tier, adapter } of remote) {
            if (!adapter) {
                logger.warn({ tier }, 'No adapter configured for enabled source');
            }
        }
        const adapters = remote.flatMap(({ adapter }) => (adapter ? [adapter] : []));

        if (this.config.parallelRemote && adapters.length > 1 && unique.size < maxResults) {
            reports.push(...await this.collectRemoteParallel(adapters, searchQuery, unique, maxResults, signal));
        } else {
            for (const adapter of adapters) {
                throwIfCancelled(signal);
                if (unique.size >= maxResults) {
                    reports.push(skippedReport(adapter.tier, adapter.name));
                    continue;
                }
                const shortfall = maxResults - unique.size;
                const result = await adapter.query(searchQuery, this.requestSize(shortfall), { signal });
                throwIfCancelled(signal);
                reports.push(this.offerAll(adapter.tier, adapter.name, result, unique, maxResults));
            }
        }

        const conditions = reports.flatMap((report) => (report.condition ? [report.condition] : []));
        const papers = unique.records();

        logger.info(
            { papers: papers.length, duplicatesRemoved: unique.duplicates, conditions: conditions.length },
            'Retrieval complete'
        );

        return { papers, searchQuery, sources: reports, duplicatesRemoved: unique.duplicates, conditions };
    }

    private validate(request: RetrievalRequest): { maxResults: number; enabled: Set<SourceTier> } {
        if (!request.query.trim() && !request.title?.trim()) {
            throw new InvalidRequestError('Query must not be empty', 'query');
        }

        const maxResults = request.maxResults ?? this.config.maxResults;
        if (!Number.isInteger(maxResults) || maxResults <= 0) {
            throw new InvalidRequestError(`maxResults must be a positive integer, got ${maxResults}`, 'maxResults');
        }

        const enabled = new Set(request.sources ?? this.config.sources);
        if (enabled.size === 0) {
            throw new InvalidRequestError('At least one source must be enabled', 'sources');
        }
        for (const tier of enabled) {
            if (!TIER_PRIORITY.includes(tier)) {
                throw new InvalidRequestError(`Unknown source: ${String(tier)}`, 'sources');
            }
        }

        return { maxResults, enabled };
    }

    /**
     * Remote adapters are asked for more than the shortfall to absorb duplicates.
     */
    private requestSize(shortfall: number): number {
        return Math.max(shortfall, Math.ceil(shortfall * this.config.overfetchFactor));
    }

    private async collectLocal(
        tier: SourceTier,
        store: TierStore,
        terms: string[],
        unique: DedupSet,
        maxResults: number
    ): Promise<SourceReport> {
        const candidates = rankLocalRecords(await store.list(), terms);
        let retained = 0;

        for (const record of candidates) {
            if (unique.size >= maxResults) break;
            if (unique.offer({ ...record, sourceTier: tier })) retained++;
        }

        logger.debug({ tier, candidates: candidates.length, retained }, 'Local tier searched');
        return { tier, source: store.name, queried: true, candidates: candidates.length, retained, condition: null };
    }

    /**
     * Fan-out to every remote adapter for the same shortfall, then fan-in in priority order.
     */
    private async collectRemoteParallel(
        adapters: SourceAdapter[],
        searchQuery: string,
        unique: DedupSet,
        maxResults: number,
        signal?: AbortSignal
    ): Promise<SourceReport[]> {
        throwIfCancelled(signal);
        const requested = this.requestSize(maxResults - unique.size);
        const results = await Promise.all(
            adapters.map((adapter) => adapter.query(searchQuery, requested, { signal }))
        );
        throwIfCancelled(signal);

        return adapters.map((adapter, i) => {
            const result = results[i] ?? { papers: [], condition: null };
            return this.offerAll(adapter.tier, adapter.name, result, unique, maxResults);
        });
    }

    private offerAll(
        tier: SourceTier,
        source: string,
        result: SourceResult,
        unique: DedupSet,
        maxResults: number
    ): SourceReport {
        let retained = 0;
        for (const record of result.papers) {
            if (unique.size >= maxResults) break;
            if (unique.offer({ ...record, sourceTier: tier })) retained++;
        }

        if (result.condition) {
            logger.warn({ tier, source, kind: result.condition.kind }, result.condition.message);
        }
        return { tier, source, queried: true, candidates: result.papers.length, retained, condition: result.condition };
    }
}

function skippedReport(tier: SourceTier, source: string): SourceReport {
    logger.debug({ tier, source }, 'Quota met, source not queried');
    return { tier, source, queried: false, candidates: 0, retained: 0, condition: null };
}

function throwIfCancelled(signal?: AbortSignal): void {
    if (signal?.aborted) {
        throw new RetrievalCancelledError();
    }
}
