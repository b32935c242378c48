import type { PaperRecord } from './paper.js';

/**
 * Keyword/topic extractor invoked by the store at save time.
 * Purely additive to the record.
 */
export interface Indexer {
    extract(title: string, abstract: string | null): { keywords: string[]; topics: string[] };
}

/**
 * Options for a byte download.
 */
export interface FetchBytesOptions {
    timeoutMs: number;
    signal?: AbortSignal;
}

/**
 * Fetch-bytes collaborator: `fetch(url, timeout) -> bytes | failure`.
 * Failures are thrown and converted to skipped downloads by the materializer.
 */
export interface ByteFetcher {
    fetchBytes(url: string, options: FetchBytesOptions): Promise<Uint8Array>;
}

/**
 * Downstream text generator: `generate(query_abstract, ranked_papers) -> text`.
 */
export interface RelatedWorkGenerator {
    readonly name: string;
    generate(queryAbstract: string, papers: PaperRecord[], options?: { title?: string }): Promise<string>;
}
