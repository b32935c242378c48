import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { TierStore } from '../storage/tier-store.js';
import { TieredStore } from '../storage/tiered-store.js';
import { createPaperRecord, SourceTier, type PaperRecord } from '../types/index.js';

const PDF = new TextEncoder().encode('%PDF-1.7 test document');
const BASE = 'arXiv23_Gas_Optimization_Patterns';

function gasPaper(overrides: Partial<PaperRecord> = {}): PaperRecord {
    return createPaperRecord({ paperId: 'p1', title: 'Gas Optimization Patterns', year: 2023, ...overrides });
}

async function readJson(path: string): Promise<unknown> {
    return JSON.parse(await readFile(path, 'utf-8'));
}

describe('TierStore', () => {
    let root: string;
    let store: TierStore;

    beforeEach(async () => {
        root = await mkdtemp(join(tmpdir(), 'relwork-tier-'));
        store = new TierStore({ name: 'cached', rootDir: root, now: () => new Date('2024-05-01T00:00:00.000Z') });
    });

    afterEach(async () => {
        await rm(root, { recursive: true, force: true });
    });

    describe('save', () => {
        it('should write metadata under the assigned base name', async () => {
            const baseName = await store.save(gasPaper());

            expect(baseName).toBe(BASE);
            expect(await readJson(store.metadataPathFor(BASE))).toEqual({
                paper_id: 'p1',
                title: 'Gas Optimization Patterns',
                authors: [],
                year: 2023,
                venue: '',
                abstract: null,
                keywords: [],
                topics: [],
                bibtex: '@article{Unknown2023,\n  title={Gas Optimization Patterns},\n  author={Unknown},\n  year={2023}\n}',
                added_date: '2024-05-01T00:00:00.000Z',
            });
            expect(await store.hasPdf('p1')).toBe(false);
        });

        it('should name the pair from the venue tag', async () => {
            const baseName = await store.save(gasPaper({ comment: 'Accepted at FSE 2024', year: 2024 }));
            expect(baseName).toBe('FSE24_Gas_Optimization_Patterns');
        });

        it('should write the PDF and record its relative path', async () => {
            await store.save(gasPaper(), PDF);

            const metadata = await readJson(store.metadataPathFor(BASE));
            expect(metadata).toMatchObject({ pdf_path: `pdfs/${BASE}.pdf` });
            expect(new Uint8Array(await readFile(store.pdfPathFor(BASE)))).toEqual(PDF);
            expect((await store.get('p1'))?.pdfPath).toBe(store.pdfPathFor(BASE));
        });

        it('should reuse the base name when re-saving a paper id', async () => {
            let tick = 0;
            const clocked = new TierStore({ name: 'cached', rootDir: root, now: () => new Date(Date.UTC(2024, 0, 1 + tick++)) });

            const first = await clocked.save(gasPaper());
            const second = await clocked.save(gasPaper({ abstract: 'Updated abstract' }));

            expect(second).toBe(first);
            expect(await readdir(join(root, 'metadata'))).toEqual([`${BASE}.json`]);
            const stored = await clocked.get('p1');
            expect(stored?.abstract).toBe('Updated abstract');
            expect(stored?.addedAt).toBe('2024-01-01T00:00:00.000Z');
        });

        it('should keep an existing PDF when re-saved without bytes', async () => {
            await store.save(gasPaper(), PDF);
            await store.save(gasPaper({ abstract: 'New abstract' }));

            expect(await readJson(store.metadataPathFor(BASE))).toMatchObject({ pdf_path: `pdfs/${BASE}.pdf` });
            expect(await store.hasPdf('p1')).toBe(true);
        });

        it('should suffix a colliding base name for a different paper', async () => {
            const first = await store.save(gasPaper());
            const second = await store.save(gasPaper({ paperId: 'p2' }));

            expect(first).toBe(BASE);
            expect(second).toBe(`${BASE}_2`);
        });

        it('should serialize concurrent saves', async () => {
            const names = await Promise.all([
                store.save(gasPaper()),
                store.save(gasPaper({ paperId: 'p2' })),
                store.save(gasPaper({ paperId: 'p3' })),
            ]);
            expect(names).toEqual([BASE, `${BASE}_2`, `${BASE}_3`]);
        });

        it('should not overwrite an unparsable metadata file with the same name', async () => {
            await store.init();
            await writeFile(store.metadataPathFor(BASE), '{not json');

            expect(await store.save(gasPaper())).toBe(`${BASE}_2`);
            expect(await readFile(store.metadataPathFor(BASE), 'utf-8')).toBe('{not json');
        });

        it('should not persist the merge tier', async () => {
            await store.save(gasPaper({ sourceTier: SourceTier.ARCHIVAL_API }));

            const metadata = await readJson(store.metadataPathFor(BASE));
            expect(metadata).not.toHaveProperty('source_tier');
            expect(metadata).not.toHaveProperty('sourceTier');
            expect((await store.get('p1'))?.sourceTier).toBeUndefined();
        });

        it('should merge indexer terms into existing keywords', async () => {
            const indexed = new TierStore({
                name: 'cached',
                rootDir: root,
                indexer: { extract: () => ({ keywords: ['gas', 'patterns'], topics: ['gas optimization'] }) },
            });

            await indexed.save(gasPaper({ keywords: ['Gas', 'solidity'] }));

            const stored = await indexed.get('p1');
            expect(stored?.keywords).toEqual(['Gas', 'solidity', 'patterns']);
            expect(stored?.topics).toEqual(['gas optimization']);
        });
    });

    describe('scan', () => {
        it('should treat a missing directory as an empty tier', async () => {
            const empty = new TierStore({ name: 'curated', rootDir: join(root, 'does-not-exist') });
            expect(await empty.list()).toEqual([]);
            expect(await empty.stats()).toEqual({ tier: 'curated', papers: 0, withPdf: 0 });
        });

        it('should skip unreadable and invalid metadata files', async () => {
            await store.save(gasPaper());
            await writeFile(join(root, 'metadata', 'broken.json'), '{not json');
            await writeFile(join(root, 'metadata', 'bad.json'), JSON.stringify({ title: 'No id' }));
            store.invalidate();

            const records = await store.list();
            expect(records.map((r) => r.paperId)).toEqual(['p1']);
            expect((await store.audit()).invalidMetadata).toEqual(['bad', 'broken']);
        });

        it('should detect a PDF whose metadata lacks pdf_path', async () => {
            await mkdir(join(root, 'metadata'), { recursive: true });
            await mkdir(join(root, 'pdfs'), { recursive: true });
            await writeFile(join(root, 'metadata', 'Manual_Entry.json'), JSON.stringify({ paper_id: 'm1', title: 'Manual Entry' }));
            await writeFile(join(root, 'pdfs', 'Manual_Entry.pdf'), PDF);

            const record = await store.get('m1');
            expect(record?.pdfPath).toBe(store.pdfPathFor('Manual_Entry'));
            expect(record?.authors).toEqual([]);
            expect(record?.venue).toBe('');
        });

        it('should keep the first file for a duplicated paper id', async () => {
            await mkdir(join(root, 'metadata'), { recursive: true });
            await writeFile(join(root, 'metadata', 'A.json'), JSON.stringify({ paper_id: 'dup', title: 'First' }));
            await writeFile(join(root, 'metadata', 'B.json'), JSON.stringify({ paper_id: 'dup', title: 'Second' }));

            expect(await store.list()).toHaveLength(1);
            expect(await store.baseNameOf('dup')).toBe('A');
            expect((await store.get('dup'))?.title).toBe('First');
        });

        it('should reflect external changes after invalidate', async () => {
            await store.save(gasPaper());
            await rm(store.metadataPathFor(BASE));

            expect(await store.get('p1')).toBeDefined();
            store.invalidate();
            expect(await store.get('p1')).toBeUndefined();
        });

        it('should return copies from list', async () => {
            await store.save(gasPaper());
            const [record] = await store.list();
            if (record) record.title = 'Changed';

            expect((await store.get('p1'))?.title).toBe('Gas Optimization Patterns');
        });

        it('should not share list arrays with the index', async () => {
            await store.save(gasPaper({ authors: ['Ada Lovelace'], keywords: ['gas'], topics: ['optimization'] }));
            const [listed] = await store.list();
            listed?.authors.push('Mallory');
            listed?.keywords.push('injected');
            listed?.topics.splice(0);

            const fetched = await store.get('p1');
            expect(fetched).toMatchObject({ authors: ['Ada Lovelace'], keywords: ['gas'], topics: ['optimization'] });

            fetched?.authors.splice(0);
            fetched?.keywords.push('again');
            expect(await store.get('p1')).toMatchObject({ authors: ['Ada Lovelace'], keywords: ['gas'], topics: ['optimization'] });
        });
    });

    describe('audit', () => {
        it('should report orphan PDFs and pending metadata', async () => {
            await store.save(gasPaper());
            await writeFile(join(root, 'pdfs', 'Orphan.pdf'), PDF);

            expect(await store.audit()).toEqual({
                tier: 'cached',
                orphanPdfs: ['Orphan'],
                pendingMetadata: [BASE],
                invalidMetadata: [],
            });
        });

        it('should complete a pending pair on the next save with bytes', async () => {
            await store.save(gasPaper());
            await store.save(gasPaper(), PDF);

            expect((await store.audit()).pendingMetadata).toEqual([]);
            expect(await store.stats()).toEqual({ tier: 'cached', papers: 1, withPdf: 1 });
        });

        it('should avoid a base name held by an orphan PDF', async () => {
            await store.init();
            await writeFile(store.pdfPathFor(BASE), PDF);

            expect(await store.save(gasPaper())).toBe(`${BASE}_2`);
        });
    });
});

describe('TieredStore', () => {
    let root: string;
    let tiered: TieredStore;

    beforeEach(async () => {
        root = await mkdtemp(join(tmpdir(), 'relwork-tiers-'));
        tiered = new TieredStore({
            curatedDir: join(root, 'papers_internal'),
            cachedDir: join(root, 'papers_external'),
            maxTitleLength: 60,
        });
    });

    afterEach(async () => {
        await rm(root, { recursive: true, force: true });
    });

    it('should create both tiers on init', async () => {
        await tiered.init();
        for (const dir of ['papers_internal', 'papers_external']) {
            expect(existsSync(join(root, dir, 'pdfs'))).toBe(true);
            expect(existsSync(join(root, dir, 'metadata'))).toBe(true);
        }
    });

    it('should find a paper in the curated tier first', async () => {
        await tiered.cached.save(gasPaper({ abstract: 'cached copy' }));
        await tiered.curated.save(gasPaper({ abstract: 'curated copy' }));

        const found = await tiered.find('p1');
        expect(found?.tier).toBe('curated');
        expect(found?.record.abstract).toBe('curated copy');
        expect(await tiered.find('missing')).toBeUndefined();
    });

    it('should total statistics across tiers', async () => {
        await tiered.curated.save(gasPaper(), PDF);
        await tiered.cached.save(gasPaper({ paperId: 'p2', title: 'Another Paper' }));

        const stats = await tiered.stats();
        expect(stats.totalPapers).toBe(2);
        expect(stats.papersWithPdf).toBe(1);
        expect(stats.tiers.map((t) => t.tier)).toEqual(['curated', 'cached']);
    });

    it('should select a tier by name', () => {
        expect(tiered.tier('curated')).toBe(tiered.curated);
        expect(tiered.tier('cached')).toBe(tiered.cached);
    });
});
