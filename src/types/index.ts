/**
 * Barrel export for all shared types.
 */
export { SourceTier, TIER_PRIORITY, createPaperRecord } from './paper.js';
export type { PaperRecord, PaperSource, StorageTierName } from './paper.js';
export type { VenueTag, VenueInput, VenueMatch, VenueConfidence } from './venue.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    RelworkConfig,
    RelworkConfigOverrides,
    LogLevel,
    StorageConfig,
    RetrievalConfig,
    SourcesConfig,
    DownloadConfig,
} from './config.js';
export type {
    SourceAdapter,
    SourceAdapterOptions,
    SourceCondition,
    SourceResult,
    SourceQueryOptions,
    ConditionKind,
} from './source-adapter.js';
export type { Indexer, ByteFetcher, FetchBytesOptions, RelatedWorkGenerator } from './collaborators.js';
