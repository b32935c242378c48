/**
 * Library entry point. The CLI lives in ./cli/index.ts.
 */
export * from './types/index.js';

export { normalizeVenue, matchVenue, archivalTag, venueInputOf } from './venue/normalizer.js';
export { VenueLexicon, loadVenueTable, getDefaultLexicon } from './venue/venue-table.js';
export { assignBaseName, disambiguate, slugifyTitle } from './venue/filename.js';

export { TierStore, PDF_DIR, METADATA_DIR } from './storage/tier-store.js';
export type { TierStoreOptions, TierAudit, TierStats } from './storage/tier-store.js';
export { TieredStore } from './storage/tiered-store.js';
export type { StoreStats } from './storage/tiered-store.js';

export { ArxivAdapter, parseArxivFeed } from './sources/arxiv.js';
export { SemanticScholarAdapter } from './sources/semantic-scholar.js';

export { DeduplicatingMerger, DedupSet, isDuplicate } from './retrieval/merger.js';
export type { RetrievalRequest, RetrievalResult, SourceReport } from './retrieval/merger.js';
export { PdfMaterializer, looksLikePdf } from './retrieval/materializer.js';
export type { MaterializeReport, SkippedDownload, SkipReason } from './retrieval/materializer.js';
export { createEngine, retrieveRelatedPapers, addManualPaper } from './retrieval/pipeline.js';
export type { Engine, EngineDeps, ManualAddition, RelatedPapersRequest, RelatedPapersResult } from './retrieval/pipeline.js';

export { KeywordIndexer } from './nlp/indexer.js';
export { renderBibtex, renderBibliography, citationKey } from './exporters/bibtex.js';
export { exportRecords, renderRecords } from './exporters/export.js';
export type { ExportFormat } from './exporters/export.js';
export { MarkdownDigestGenerator } from './generator/markdown-generator.js';

export { resolveConfig, mergeConfig } from './utils/config.js';
export { initLogger, getLogger } from './utils/logger.js';
export { HttpClient, HttpError, createHttpClient, getHttpClient } from './utils/http-client.js';
export { InvalidRequestError, StorageError, RetrievalCancelledError } from './utils/errors.js';
