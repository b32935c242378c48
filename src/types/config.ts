import { SourceTier } from './paper.js';

/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * Two-tier storage locations.
 */
export interface StorageConfig {
    /** Manually curated papers (highest priority) */
    curatedDir: string;
    /** Papers downloaded during automated retrieval */
    cachedDir: string;
    /** Character budget for the title part of a base name */
    maxTitleLength: number;
}

/**
 * Deduplicating merger configuration.
 */
export interface RetrievalConfig {
    maxResults: number;
    sources: SourceTier[];
    /** Normalized-title similarity at or above which two records are duplicates */
    dedupThreshold: number;
    /** Remote adapters are asked for shortfall × this factor */
    overfetchFactor: number;
    /** Query both remote adapters concurrently instead of one after the other */
    parallelRemote: boolean;
}

/**
 * Remote adapter configuration.
 */
export interface SourcesConfig {
    timeoutMs: number;
    semanticScholarApiKey?: string;
    arxivBaseUrl: string;
    semanticScholarBaseUrl: string;
}

/**
 * PDF materializer configuration.
 */
export interface DownloadConfig {
    enabled: boolean;
    timeoutMs: number;
    concurrency: number;
}

/**
 * Full relwork configuration merged from CLI flags, env vars, and config file.
 */
export interface RelworkConfig {
    storage: StorageConfig;
    retrieval: RetrievalConfig;
    sources: SourcesConfig;
    download: DownloadConfig;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: RelworkConfig = {
    storage: {
        curatedDir: 'papers_internal',
        cachedDir: 'papers_external',
        maxTitleLength: 60,
    },
    retrieval: {
        maxResults: 10,
        sources: [
            SourceTier.CURATED,
            SourceTier.CACHED,
            SourceTier.ARCHIVAL_API,
            SourceTier.CITATION_API,
        ],
        dedupThreshold: 0.9,
        overfetchFactor: 2,
        parallelRemote: false,
    },
    sources: {
        timeoutMs: 30000,
        arxivBaseUrl: 'https://export.arxiv.org/api/query',
        semanticScholarBaseUrl: 'https://api.semanticscholar.org/graph/v1',
    },
    download: {
        enabled: true,
        timeoutMs: 30000,
        concurrency: 3,
    },
    logLevel: 'info',
    jsonLogs: false,
};

/**
 * Partial configuration as found in a config file or built from CLI flags.
 */
export interface RelworkConfigOverrides {
    storage?: Partial<StorageConfig>;
    retrieval?: Partial<RetrievalConfig>;
    sources?: Partial<SourcesConfig>;
    download?: Partial<DownloadConfig>;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}
