import { mkdir, readdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises';
import { join, relative, resolve, sep } from 'node:path';
import pLimit from 'p-limit';
import type { Indexer, PaperRecord, StorageTierName } from '../types/index.js';
import { StorageError, errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { normalizeVenue, venueInputOf } from '../venue/normalizer.js';
import type { VenueLexicon } from '../venue/venue-table.js';
import { assignBaseName, disambiguate, DEFAULT_MAX_TITLE_LENGTH } from '../venue/filename.js';
import { mergeTerms } from '../nlp/indexer.js';
import { renderBibtex } from '../exporters/bibtex.js';
import { fromStoredMetadata, storedMetadataSchema, toStoredMetadata } from './metadata.js';

const logger = getLogger();

export const PDF_DIR = 'pdfs';
export const METADATA_DIR = 'metadata';

export interface TierStoreOptions {
    name: StorageTierName;
    rootDir: string;
    maxTitleLength?: number;
    /** Keyword/topic extractor run at save time */
    indexer?: Indexer;
    lexicon?: VenueLexicon;
    /** Clock for `added_date` */
    now?: () => Date;
}

export interface TierAudit {
    tier: StorageTierName;
    /** PDFs with no metadata file (tolerated on read, never written) */
    orphanPdfs: string[];
    /** Metadata files whose PDF has not been materialized yet */
    pendingMetadata: string[];
    /** Metadata files that failed to parse or validate */
    invalidMetadata: string[];
}

export interface TierStats {
    tier: StorageTierName;
    papers: number;
    withPdf: number;
}

interface IndexEntry {
    baseName: string;
    record: PaperRecord;
}

interface TierIndex {
    byId: Map<string, IndexEntry>;
    /** Base name → owning paper id */
    byBaseName: Map<string, string>;
    invalid: string[];
}

function cloneRecord(record: PaperRecord): PaperRecord {
    return { ...record, authors: [...record.authors], keywords: [...record.keywords], topics: [...record.topics] };
}

async function pathExists(path: string): Promise<boolean> {
    try {
        await stat(path);
        return true;
    } catch {
        return false;
    }
}

/**
 * Write through a temporary file and rename, so readers never see a partial file.
 */
async function writeFileAtomic(path: string, data: string | Uint8Array): Promise<void> {
    const tmpPath = `${path}.${process.pid}.tmp`;
    try {
        await writeFile(tmpPath, data);
        await rename(tmpPath, path);
    } catch (error) {
        await rm(tmpPath, { force: true });
        throw error;
    }
}

/**
 * One storage tier: paired `pdfs/<base>.pdf` and `metadata/<base>.json` files.
 *
 * The directory is the source of truth. An in-memory index (paper id → base name)
 * is built lazily from a scan of `metadata/` and dropped by `invalidate()`.
 * Writes are serialized by a per-tier lock.
 */
export class TierStore {
    readonly name: StorageTierName;
    readonly rootDir: string;
    readonly pdfDir: string;
    readonly metadataDir: string;

    private readonly maxTitleLength: number;
    private readonly indexer?: Indexer;
    private readonly lexicon?: VenueLexicon;
    private readonly now: () => Date;
    private readonly writeLock = pLimit(1);
    private index: Promise<TierIndex> | null = null;

    constructor(options: TierStoreOptions) {
        this.name = options.name;
        this.rootDir = resolve(options.rootDir);
        this.pdfDir = join(this.rootDir, PDF_DIR);
        this.metadataDir = join(this.rootDir, METADATA_DIR);
        this.maxTitleLength = options.maxTitleLength ?? DEFAULT_MAX_TITLE_LENGTH;
        this.indexer = options.indexer;
        this.lexicon = options.lexicon;
        this.now = options.now ?? (() => new Date());
    }

    // ─── Reads ───────────────────────────────────────────────

    /**
     * All records in this tier, ordered by base name.
     */
    async list(): Promise<PaperRecord[]> {
        const index = await this.loadIndex();
        return Array.from(index.byId.values())
            .sort((a, b) => a.baseName.localeCompare(b.baseName))
            .map((entry) => cloneRecord(entry.record));
    }

    async get(paperId: string): Promise<PaperRecord | undefined> {
        const entry = (await this.loadIndex()).byId.get(paperId);
        return entry ? cloneRecord(entry.record) : undefined;
    }

    async hasPdf(paperId: string): Promise<boolean> {
        const entry = (await this.loadIndex()).byId.get(paperId);
        return entry?.record.pdfPath !== undefined;
    }

    async baseNameOf(paperId: string): Promise<string | undefined> {
        return (await this.loadIndex()).byId.get(paperId)?.baseName;
    }

    metadataPathFor(baseName: string): string {
        return join(this.metadataDir, `${baseName}.json`);
    }

    pdfPathFor(baseName: string): string {
        return join(this.pdfDir, `${baseName}.pdf`);
    }

    /**
     * Drop the in-memory index; the next read rescans the directory.
     */
    invalidate(): void {
        this.index = null;
    }

    // ─── Writes ──────────────────────────────────────────────

    /**
     * Create `pdfs/` and `metadata/` if missing.
     */
    async init(): Promise<void> {
        for (const dir of [this.pdfDir, this.metadataDir]) {
            try {
                await mkdir(dir, { recursive: true });
            } catch (error) {
                throw new StorageError(
                    `Cannot create ${this.name} tier directory ${dir}: ${errorMessage(error)}`,
                    this.name, dir, 'init', { cause: error }
                );
            }
        }
    }

    /**
     * Persist a record, and its PDF when bytes are given. Returns the base name.
     *
     * Metadata is written first. If the PDF write fails the pair stays in the
     * "metadata without PDF" state and a `StorageError` is thrown.
     * Re-saving a paper id reuses its base name.
     */
    async save(record: PaperRecord, pdfBytes?: Uint8Array): Promise<string> {
        return this.writeLock(() => this.saveLocked(record, pdfBytes));
    }

    private async saveLocked(record: PaperRecord, pdfBytes?: Uint8Array): Promise<string> {
        await this.init();
        const index = await this.loadIndex();

        const existing = index.byId.get(record.paperId);
        const baseName = existing?.baseName ?? await this.claimBaseName(record, index);

        const stored = this.prepareRecord(record, existing?.record);
        const metadataPath = this.metadataPathFor(baseName);
        const pdfPath = this.pdfPathFor(baseName);
        const pdfRelPath = `${PDF_DIR}/${baseName}.pdf`;

        // Keep a PDF that is already on disk when no new bytes are given
        const keptPdf = pdfBytes ? undefined : existing?.record.pdfPath;

        // 1. Metadata: the record of intent
        await this.writeMetadata(metadataPath, toStoredMetadata(stored, keptPdf ? this.relativePdfPath(keptPdf) : null));
        this.remember(index, baseName, keptPdf ? { ...stored, pdfPath: keptPdf } : stored);

        if (!pdfBytes) {
            logger.debug({ tier: this.name, paperId: record.paperId, baseName }, 'Metadata saved');
            return baseName;
        }

        // 2. PDF bytes
        try {
            await writeFileAtomic(pdfPath, pdfBytes);
        } catch (error) {
            throw new StorageError(
                `Cannot write PDF ${pdfPath}: ${errorMessage(error)}`,
                this.name, pdfPath, 'pdf', { cause: error }
            );
        }

        // 3. Metadata again, now pointing at the PDF
        await this.writeMetadata(metadataPath, toStoredMetadata(stored, pdfRelPath));
        this.remember(index, baseName, { ...stored, pdfPath });

        logger.debug({ tier: this.name, paperId: record.paperId, baseName, bytes: pdfBytes.length }, 'Paper saved with PDF');
        return baseName;
    }

    private relativePdfPath(absolutePath: string): string {
        return relative(this.rootDir, absolutePath).split(sep).join('/');
    }

    private async writeMetadata(path: string, metadata: object): Promise<void> {
        try {
            await writeFileAtomic(path, JSON.stringify(metadata, null, 2) + '\n');
        } catch (error) {
            throw new StorageError(
                `Cannot write metadata ${path}: ${errorMessage(error)}`,
                this.name, path, 'metadata', { cause: error }
            );
        }
    }

    /**
     * First free name for a new paper id: taken names, and names already
     * occupied on disk (unparsable metadata, orphan PDFs), get a numeric suffix.
     */
    private async claimBaseName(record: PaperRecord, index: TierIndex): Promise<string> {
        const tag = normalizeVenue(venueInputOf(record), this.lexicon);
        const base = assignBaseName(tag, record.title, {
            maxTitleLength: this.maxTitleLength,
            fallbackId: record.paperId,
        });

        for (let attempt = 1; ; attempt++) {
            const candidate = disambiguate(base, attempt);
            if (index.byBaseName.has(candidate)) continue;
            if (await pathExists(this.metadataPathFor(candidate))) continue;
            if (await pathExists(this.pdfPathFor(candidate))) continue;

            if (attempt > 1) {
                logger.info({ tier: this.name, paperId: record.paperId, base, baseName: candidate }, 'Base name collision, using suffix');
            }
            return candidate;
        }
    }

    /**
     * Apply save-time enrichment: indexer terms, BibTeX, first-seen timestamp.
     * `sourceTier` and `pdfPath` are stripped; the store decides the latter.
     */
    private prepareRecord(record: PaperRecord, previous?: PaperRecord): PaperRecord {
        const { sourceTier: _tier, pdfPath: _pdf, ...rest } = record;
        const prepared: PaperRecord = { ...rest, authors: [...record.authors] };

        if (this.indexer) {
            const extracted = this.indexer.extract(record.title, record.abstract);
            prepared.keywords = mergeTerms(record.keywords, extracted.keywords);
            prepared.topics = mergeTerms(record.topics, extracted.topics);
        }

        prepared.addedAt = previous?.addedAt ?? record.addedAt ?? this.now().toISOString();
        prepared.bibtex = record.bibtex ?? renderBibtex(prepared);
        return prepared;
    }

    private remember(index: TierIndex, baseName: string, record: PaperRecord): void {
        index.byId.set(record.paperId, { baseName, record });
        index.byBaseName.set(baseName, record.paperId);
    }

    // ─── Scan ────────────────────────────────────────────────

    private loadIndex(): Promise<TierIndex> {
        if (!this.index) {
            // A failed scan is not cached
            this.index = this.scan().catch((error: unknown) => {
                this.index = null;
                throw error;
            });
        }
        return this.index;
    }

    private async scan(): Promise<TierIndex> {
        const index: TierIndex = { byId: new Map(), byBaseName: new Map(), invalid: [] };

        const files = await this.readDir(this.metadataDir);
        const jsonFiles = files.filter((file) => file.endsWith('.json')).sort();

        for (const file of jsonFiles) {
            const baseName = file.slice(0, -'.json'.length);
            const path = join(this.metadataDir, file);

            let raw: unknown;
            try {
                raw = JSON.parse(await readFile(path, 'utf-8'));
            } catch (error) {
                logger.warn({ tier: this.name, path, error: errorMessage(error) }, 'Skipping unreadable metadata file');
                index.invalid.push(baseName);
                continue;
            }

            const parsed = storedMetadataSchema.safeParse(raw);
            if (!parsed.success) {
                logger.warn({ tier: this.name, path, issues: parsed.error.issues.length }, 'Skipping invalid metadata file');
                index.invalid.push(baseName);
                continue;
            }

            const record = fromStoredMetadata(parsed.data);
            const duplicate = index.byId.get(record.paperId);
            if (duplicate) {
                logger.warn(
                    { tier: this.name, paperId: record.paperId, kept: duplicate.baseName, skipped: baseName },
                    'Duplicate paper id in tier'
                );
                index.byBaseName.set(baseName, record.paperId);
                continue;
            }

            const pdfPath = await this.resolvePdf(baseName, parsed.data.pdf_path);
            if (pdfPath) record.pdfPath = pdfPath;

            this.remember(index, baseName, record);
        }

        logger.debug({ tier: this.name, papers: index.byId.size, invalid: index.invalid.length }, 'Tier scanned');
        return index;
    }

    /**
     * Absolute PDF path if the file exists: the recorded `pdf_path` first,
     * then the conventional `pdfs/<base>.pdf` (PDF written, metadata not yet updated).
     */
    private async resolvePdf(baseName: string, recorded: string | null | undefined): Promise<string | null> {
        if (recorded) {
            const path = resolve(this.rootDir, recorded);
            if (await pathExists(path)) return path;
        }
        const conventional = this.pdfPathFor(baseName);
        return await pathExists(conventional) ? conventional : null;
    }

    private async readDir(dir: string): Promise<string[]> {
        try {
            return await readdir(dir);
        } catch (error) {
            if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return [];
            throw new StorageError(
                `Cannot scan ${this.name} tier directory ${dir}: ${errorMessage(error)}`,
                this.name, dir, 'scan', { cause: error }
            );
        }
    }

    // ─── Maintenance ─────────────────────────────────────────

    async audit(): Promise<TierAudit> {
        const index = await this.loadIndex();
        const metadataNames = new Set(index.byBaseName.keys());
        for (const name of index.invalid) metadataNames.add(name);

        const pdfs = (await this.readDir(this.pdfDir)).filter((file) => file.endsWith('.pdf')).sort();
        const orphanPdfs = pdfs
            .map((file) => file.slice(0, -'.pdf'.length))
            .filter((baseName) => !metadataNames.has(baseName));

        const pendingMetadata = Array.from(index.byId.values())
            .filter((entry) => entry.record.pdfPath === undefined)
            .map((entry) => entry.baseName)
            .sort();

        return { tier: this.name, orphanPdfs, pendingMetadata, invalidMetadata: [...index.invalid].sort() };
    }

    async stats(): Promise<TierStats> {
        const records = Array.from((await this.loadIndex()).byId.values());
        return {
            tier: this.name,
            papers: records.length,
            withPdf: records.filter((entry) => entry.record.pdfPath !== undefined).length,
        };
    }
}
