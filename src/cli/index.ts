#!/usr/bin/env node
import { writeFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { Command } from 'commander';
import { resolveConfig } from '../utils/config.js';
import { initLogger, getLogger, parseLogLevel } from '../utils/logger.js';
import { getHttpClient } from '../utils/http-client.js';
import { InvalidRequestError, RetrievalCancelledError, StorageError, errorMessage } from '../utils/errors.js';
import { SourceTier, type RelworkConfigOverrides } from '../types/index.js';
import { TieredStore } from '../storage/tiered-store.js';
import { KeywordIndexer } from '../nlp/indexer.js';
import { createEngine, retrieveRelatedPapers, addManualPaper } from '../retrieval/pipeline.js';
import { exportRecords, isExportFormat, EXPORT_FORMATS } from '../exporters/export.js';
import { MarkdownDigestGenerator } from '../generator/markdown-generator.js';
import { readInputFile } from './input.js';

const VERSION = '1.0.0';

const SOURCE_NAMES: Record<string, SourceTier[]> = {
    curated: [SourceTier.CURATED],
    cached: [SourceTier.CACHED],
    local: [SourceTier.CURATED, SourceTier.CACHED],
    arxiv: [SourceTier.ARCHIVAL_API],
    semantic_scholar: [SourceTier.CITATION_API],
    s2: [SourceTier.CITATION_API],
};

// ─── Option types ─────────────────────────────────────────

interface CommonOptions {
    curatedDir?: string;
    cachedDir?: string;
    logLevel?: string;
    jsonLogs?: boolean;
}

interface RetrieveOptions extends CommonOptions {
    input?: string;
    abstract?: string;
    title?: string;
    maxPapers?: string;
    sources?: string[];
    downloadPdfs?: boolean;
    parallel?: boolean;
    dedupThreshold?: string;
    output?: string;
    groupByTopic?: boolean;
    export?: string;
    format: string;
}

interface AddOptions extends CommonOptions {
    title: string;
    authors?: string[];
    year?: string;
    venue?: string;
    abstract?: string;
    pdf?: string;
    doi?: string;
    id?: string;
}

// ─── Helpers ──────────────────────────────────────────────

function parseInteger(value: string | undefined, name: string): number | undefined {
    if (value === undefined) return undefined;
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
        throw new InvalidRequestError(`${name} must be an integer, got "${value}"`, name);
    }
    return parsed;
}

function parseSources(names: string[] | undefined): SourceTier[] | undefined {
    if (!names) return undefined;
    const tiers = new Set<SourceTier>();
    for (const name of names.flatMap((n) => n.split(','))) {
        const mapped = SOURCE_NAMES[name.trim().toLowerCase()];
        if (!mapped) {
            throw new InvalidRequestError(
                `Unknown source "${name}". Valid: ${Object.keys(SOURCE_NAMES).join(', ')}`,
                'sources'
            );
        }
        mapped.forEach((tier) => tiers.add(tier));
    }
    return [...tiers];
}

/**
 * Config overrides from CLI flags; flags that were not given are left out.
 */
function commonOverrides(opts: CommonOptions): RelworkConfigOverrides {
    const overrides: RelworkConfigOverrides = {};
    const storage: NonNullable<RelworkConfigOverrides['storage']> = {};
    if (opts.curatedDir) storage.curatedDir = opts.curatedDir;
    if (opts.cachedDir) storage.cachedDir = opts.cachedDir;
    if (Object.keys(storage).length > 0) overrides.storage = storage;
    if (opts.logLevel) overrides.logLevel = parseLogLevel(opts.logLevel);
    if (opts.jsonLogs) overrides.jsonLogs = true;
    return overrides;
}

async function setup(overrides: RelworkConfigOverrides) {
    const config = await resolveConfig(overrides);
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    getHttpClient({ timeout: config.sources.timeoutMs, version: VERSION });
    return config;
}

function fail(error: unknown): never {
    const logger = getLogger();
    if (error instanceof InvalidRequestError) {
        console.error(`Error: ${error.message}`);
        process.exit(2);
    }
    if (error instanceof RetrievalCancelledError) {
        console.error('Cancelled.');
        process.exit(130);
    }
    if (error instanceof StorageError) {
        logger.error({ tier: error.tier, path: error.path, phase: error.phase }, error.message);
    } else {
        logger.error({ error: errorMessage(error) }, 'Command failed');
    }
    process.exit(1);
}

const program = new Command();

program
    .name('relwork')
    .description('Retrieve, deduplicate and store related papers for a related-work section.')
    .version(VERSION);

function withCommonOptions(command: Command): Command {
    return command
        .option('--curated-dir <dir>', 'Curated tier directory')
        .option('--cached-dir <dir>', 'Cached tier directory')
        .option('--log-level <level>', 'Log level: debug | info | warn | error | silent')
        .option('--json-logs', 'Output JSON logs', false);
}

// ─── RETRIEVE command ─────────────────────────────────────

withCommonOptions(
    program
        .command('retrieve')
        .description('Retrieve related papers for an abstract')
        .option('-i, --input <file>', 'Input file ("Title: ..." / "Abstract: ...")')
        .option('-a, --abstract <text>', 'Paper abstract')
        .option('-t, --title <title>', 'Paper title (overrides the input file)')
        .option('-n, --max-papers <n>', 'Maximum number of related papers')
        .option('-s, --sources <sources...>', `Sources: ${Object.keys(SOURCE_NAMES).join(' | ')}`)
        .option('--download-pdfs', 'Download missing PDFs into the cached tier')
        .option('--no-download-pdfs', 'Do not download PDFs')
        .option('--parallel', 'Query the remote sources concurrently')
        .option('--dedup-threshold <ratio>', 'Title similarity at which papers are duplicates')
        .option('-o, --output <file>', 'Write the related-work digest to a file')
        .option('--group-by-topic', 'Group the digest by topic', false)
        .option('--export <file>', 'Export the retrieved papers')
        .option('-f, --format <format>', `Export format: ${EXPORT_FORMATS.join(' | ')}`, 'bibtex')
).action(async (opts: RetrieveOptions) => {
    const controller = new AbortController();
    process.once('SIGINT', () => controller.abort());

    try {
        const fromFile = opts.input ? readInputFile(opts.input) : null;
        const title = opts.title ?? fromFile?.title ?? undefined;
        const abstract = opts.abstract ?? fromFile?.abstract ?? '';
        if (!isExportFormat(opts.format)) {
            throw new InvalidRequestError(`Invalid format: ${opts.format}. Valid: ${EXPORT_FORMATS.join(', ')}`, 'format');
        }

        const overrides = commonOverrides(opts);
        const retrieval: NonNullable<RelworkConfigOverrides['retrieval']> = {};
        const maxResults = parseInteger(opts.maxPapers, 'maxPapers');
        if (maxResults !== undefined) retrieval.maxResults = maxResults;
        if (opts.parallel) retrieval.parallelRemote = true;
        if (opts.dedupThreshold !== undefined) retrieval.dedupThreshold = Number(opts.dedupThreshold);
        if (Object.keys(retrieval).length > 0) overrides.retrieval = retrieval;

        const config = await setup(overrides);
        const engine = createEngine(config);

        const result = await retrieveRelatedPapers(engine, {
            query: abstract,
            title,
            sources: parseSources(opts.sources),
            download: opts.downloadPdfs,
            signal: controller.signal,
        });

        console.log(`\nRetrieved ${result.papers.length} related papers (search: "${result.retrieval.searchQuery}"):`);
        result.papers.forEach((paper, i) => {
            const pdf = paper.pdfPath ? 'pdf' : '   ';
            console.log(`  ${pdf} ${i + 1}. [${paper.sourceTier ?? '?'}] ${paper.title} (${paper.year ?? 'n.d.'})`);
        });

        console.log('\nSources:');
        for (const report of result.retrieval.sources) {
            const status = !report.queried
                ? 'skipped (quota met)'
                : `${report.retained}/${report.candidates} kept${report.condition ? `, ${report.condition.kind}: ${report.condition.message}` : ''}`;
            console.log(`  ${report.tier.padEnd(12)} ${report.source}: ${status}`);
        }
        console.log(`  duplicates removed: ${result.retrieval.duplicatesRemoved}`);

        const { materialization } = result;
        console.log(
            `\nPDFs: ${materialization.downloaded.length} downloaded, ` +
            `${materialization.alreadyLocal} already local, ${materialization.skipped.length} skipped`
        );
        for (const skipped of materialization.skipped.filter((s) => s.reason !== 'disabled')) {
            console.log(`  ${skipped.paperId}: ${skipped.reason} (${skipped.message})`);
        }

        const requests = Object.entries(result.requests).map(([source, count]) => `${source}=${count}`);
        console.log(`\nHTTP requests: ${requests.length > 0 ? requests.join(', ') : 'none'}`);

        if (opts.export) {
            exportRecords(result.papers, opts.export, opts.format);
            console.log(`\nExported to ${opts.export}`);
        }

        const generator = new MarkdownDigestGenerator({ groupByTopic: opts.groupByTopic });
        const digest = await generator.generate(abstract, result.papers, { title });
        if (opts.output) {
            mkdirSync(dirname(opts.output), { recursive: true });
            writeFileSync(opts.output, digest, 'utf-8');
            console.log(`Digest written to ${opts.output}`);
        } else {
            console.log(`\n${digest}`);
        }
    } catch (error) {
        fail(error);
    }
});

// ─── ADD command ──────────────────────────────────────────

withCommonOptions(
    program
        .command('add')
        .description('Add a paper to the curated tier')
        .requiredOption('--title <title>', 'Paper title')
        .option('--authors <names...>', 'Author names, in order')
        .option('--year <year>', 'Publication year')
        .option('--venue <venue>', 'Venue, e.g. "Accepted at FSE 2024"')
        .option('--abstract <text>', 'Abstract')
        .option('--pdf <file>', 'Local PDF file to store with the metadata')
        .option('--doi <doi>', 'DOI')
        .option('--id <paperId>', 'Explicit paper id')
).action(async (opts: AddOptions) => {
    try {
        const config = await setup(commonOverrides(opts));
        const store = new TieredStore(config.storage, { indexer: new KeywordIndexer() });

        const record = await addManualPaper(store.curated, {
            title: opts.title,
            authors: opts.authors,
            year: parseInteger(opts.year, 'year') ?? null,
            venue: opts.venue,
            abstract: opts.abstract ?? null,
            pdfFile: opts.pdf,
            doi: opts.doi ?? null,
            paperId: opts.id,
        });

        const baseName = await store.curated.baseNameOf(record.paperId);
        console.log(`Added ${record.paperId} as ${baseName ?? '?'}${record.pdfPath ? ' (with PDF)' : ''}`);
    } catch (error) {
        fail(error);
    }
});

// ─── STATS command ────────────────────────────────────────

withCommonOptions(
    program
        .command('stats')
        .description('Show storage statistics')
).action(async (opts: CommonOptions) => {
    try {
        const config = await setup(commonOverrides(opts));
        const stats = await new TieredStore(config.storage).stats();

        console.log('\nStorage Statistics\n');
        for (const tier of stats.tiers) {
            console.log(`  ${tier.tier.padEnd(8)} ${tier.papers} papers, ${tier.withPdf} with PDF`);
        }
        console.log(`  total    ${stats.totalPapers} papers, ${stats.papersWithPdf} with PDF\n`);
    } catch (error) {
        fail(error);
    }
});

// ─── AUDIT command ────────────────────────────────────────

withCommonOptions(
    program
        .command('audit')
        .description('List orphan PDFs, pending metadata and invalid metadata files')
).action(async (opts: CommonOptions) => {
    try {
        const config = await setup(commonOverrides(opts));
        const audits = await new TieredStore(config.storage).audit();

        let problems = 0;
        for (const audit of audits) {
            console.log(`\n${audit.tier}:`);
            console.log(`  orphan PDFs:      ${audit.orphanPdfs.length}`);
            audit.orphanPdfs.forEach((name) => console.log(`    ${name}.pdf`));
            console.log(`  pending metadata: ${audit.pendingMetadata.length}`);
            audit.pendingMetadata.forEach((name) => console.log(`    ${name}.json`));
            console.log(`  invalid metadata: ${audit.invalidMetadata.length}`);
            audit.invalidMetadata.forEach((name) => console.log(`    ${name}.json`));
            problems += audit.orphanPdfs.length + audit.invalidMetadata.length;
        }
        console.log('');
        process.exitCode = problems > 0 ? 1 : 0;
    } catch (error) {
        fail(error);
    }
});

await program.parseAsync();
