import type { PaperRecord, SourceTier } from './paper.js';

/**
 * Soft-failure kinds an adapter or the materializer can report.
 */
export type ConditionKind = 'network' | 'rate-limit' | 'timeout' | 'http' | 'parse' | 'auth' | 'cancelled';

/**
 * A reported, non-fatal condition from one source.
 */
export interface SourceCondition {
    tier: SourceTier;
    source: string;
    kind: ConditionKind;
    message: string;
}

/**
 * Result of a single adapter query: an ordered candidate list, or an empty list plus a condition.
 */
export interface SourceResult {
    papers: PaperRecord[];
    condition: SourceCondition | null;
}

export interface SourceQueryOptions {
    /** Caller cancellation */
    signal?: AbortSignal;
}

/**
 * Interface for remote search adapters (arXiv, Semantic Scholar).
 * Each adapter maps its API's native response into PaperRecord
 * and must never throw for network, rate-limit or parse failures.
 */
export interface SourceAdapter {
    /** Human-readable source name */
    readonly name: string;

    /** Merge tier this adapter feeds */
    readonly tier: SourceTier;

    /**
     * Search by free-text query. Results are in source relevance order and
     * never exceed `maxResults`.
     */
    query(queryText: string, maxResults: number, options?: SourceQueryOptions): Promise<SourceResult>;
}

/**
 * Options for source adapter initialization.
 */
export interface SourceAdapterOptions {
    /** API key, passed in from configuration */
    apiKey?: string;

    /** Override the API base URL */
    baseUrl?: string;

    /** Per-request timeout */
    timeoutMs?: number;
}
