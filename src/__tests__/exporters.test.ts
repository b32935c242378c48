import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { citationKey, entryTypeOf, renderBibliography, renderBibtex } from '../exporters/bibtex.js';
import { exportRecords, isExportFormat, renderRecords } from '../exporters/export.js';
import { MarkdownDigestGenerator } from '../generator/markdown-generator.js';
import { createPaperRecord, SourceTier, type PaperRecord } from '../types/index.js';

function guardingPaper(overrides: Partial<PaperRecord> = {}): PaperRecord {
    return createPaperRecord({
        paperId: 'p1',
        title: 'Guarding Reentrancy',
        authors: ['Ada Lovelace', 'Alan Turing'],
        year: 2024,
        venue: 'Proceedings of the ACM Conference on Fuzzing',
        doi: '10.1000/guard',
        ...overrides,
    });
}

describe('BibTeX', () => {
    it('should key on the first author surname and year', () => {
        expect(citationKey({ authors: ['Ada Lovelace'], year: 2024 })).toBe('Lovelace2024');
        expect(citationKey({ authors: ['José Müller'], year: null })).toBe('Mullern.d.');
        expect(citationKey({ authors: [], year: 2023 })).toBe('Unknown2023');
    });

    it('should render a conference paper', () => {
        expect(renderBibtex(guardingPaper())).toBe(
            '@inproceedings{Lovelace2024,\n' +
            '  title={Guarding Reentrancy},\n' +
            '  author={Ada Lovelace and Alan Turing},\n' +
            '  year={2024},\n' +
            '  booktitle={Proceedings of the ACM Conference on Fuzzing},\n' +
            '  doi={10.1000/guard}\n' +
            '}'
        );
    });

    it('should render a preprint as misc', () => {
        const preprint = createPaperRecord({
            paperId: 'arXiv_2401.00001',
            title: 'Preprint',
            authors: ['Grace Hopper'],
            year: 2024,
            arxivId: '2401.00001',
            url: 'http://arxiv.org/abs/2401.00001',
        });

        expect(renderBibtex(preprint)).toBe(
            '@misc{Hopper2024,\n' +
            '  title={Preprint},\n' +
            '  author={Grace Hopper},\n' +
            '  year={2024},\n' +
            '  note={arXiv preprint arXiv:2401.00001},\n' +
            '  url={http://arxiv.org/abs/2401.00001}\n' +
            '}'
        );
    });

    it('should pick the entry type from venue hints', () => {
        expect(entryTypeOf(guardingPaper({ venue: 'IEEE Transactions on Software Engineering' }))).toBe('article');
        expect(entryTypeOf(guardingPaper({ venue: '', journalRef: 'Proc. ICSE 2023', arxivId: '2301.00001' }))).toBe('inproceedings');
    });

    it('should prefer stored entries in a bibliography', () => {
        const stored = guardingPaper({ paperId: 'p2', bibtex: '@misc{Stored,\n  title={Stored}\n}' });
        const rendered = guardingPaper({ venue: 'TSE' });

        expect(renderBibliography([stored, rendered])).toBe(
            '@misc{Stored,\n  title={Stored}\n}\n\n' +
            '@article{Lovelace2024,\n' +
            '  title={Guarding Reentrancy},\n' +
            '  author={Ada Lovelace and Alan Turing},\n' +
            '  year={2024},\n' +
            '  journal={TSE},\n' +
            '  doi={10.1000/guard}\n' +
            '}\n'
        );
    });
});

describe('Exporters', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'relwork-export-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('should recognize export formats', () => {
        expect(isExportFormat('csv')).toBe(true);
        expect(isExportFormat('yaml')).toBe(false);
    });

    it('should export JSON', () => {
        const out = join(dir, 'nested', 'papers.json');
        exportRecords([guardingPaper({ sourceTier: SourceTier.CURATED, pdfPath: '/papers/p1.pdf' })], out, 'json');

        const data = JSON.parse(readFileSync(out, 'utf-8'));
        expect(data.relwork.version).toBe('1.0.0');
        expect(data.papers).toEqual([{
            paper_id: 'p1',
            source_tier: 'CURATED',
            title: 'Guarding Reentrancy',
            authors: ['Ada Lovelace', 'Alan Turing'],
            year: 2024,
            venue: 'Proceedings of the ACM Conference on Fuzzing',
            abstract: null,
            doi: '10.1000/guard',
            url: null,
            pdf_path: '/papers/p1.pdf',
            keywords: [],
            topics: [],
        }]);
    });

    it('should export CSV with quoted fields', () => {
        const csv = renderRecords([
            guardingPaper({ title: 'Say "Hi"', venue: 'FSE', doi: null, sourceTier: SourceTier.CITATION_API }),
            createPaperRecord({ paperId: 'p2', title: 'Bare' }),
        ], 'csv');

        expect(csv.split('\n')).toEqual([
            'paper_id,source_tier,title,authors,year,venue,doi,pdf_path',
            '"p1",CITATION_API,"Say ""Hi""","Ada Lovelace; Alan Turing",2024,"FSE","",""',
            '"p2",,"Bare","",,"","",""',
            '',
        ]);
    });

    it('should export BibTeX', () => {
        const out = join(dir, 'refs.bib');
        exportRecords([guardingPaper()], out, 'bibtex');

        expect(readFileSync(out, 'utf-8')).toBe(`${renderBibtex(guardingPaper())}\n`);
    });
});

describe('MarkdownDigestGenerator', () => {
    it('should list papers in rank order', async () => {
        const generator = new MarkdownDigestGenerator();
        const paper = guardingPaper({
            authors: ['Ada Lovelace', 'Alan Turing', 'Grace Hopper'],
            venue: 'FSE',
            abstract: 'We guard\n against reentrancy.',
        });

        expect(await generator.generate('Detecting  reentrancy\nbugs.', [paper])).toBe(
            '# Related Work\n\n' +
            'Related work for: Detecting reentrancy bugs.\n\n' +
            '1. **Guarding Reentrancy** [Lovelace2024]\n' +
            '   Ada Lovelace et al. FSE, 2024.\n' +
            '   We guard against reentrancy.\n'
        );
    });

    it('should group papers by first topic', async () => {
        const generator = new MarkdownDigestGenerator({ groupByTopic: true });
        const papers = [
            createPaperRecord({ paperId: 'a', title: 'Alpha', topics: ['reentrancy'] }),
            createPaperRecord({ paperId: 'b', title: 'Beta' }),
            createPaperRecord({ paperId: 'c', title: 'Gamma', topics: ['reentrancy', 'testing'] }),
        ];

        expect(await generator.generate('ignored', papers, { title: 'My Paper' })).toBe(
            '# Related Work\n\n' +
            'Related work for *My Paper*.\n\n' +
            '## Reentrancy\n\n' +
            '1. **Alpha** [Unknownn.d.]\n\n' +
            '2. **Gamma** [Unknownn.d.]\n\n' +
            '## Other\n\n' +
            '3. **Beta** [Unknownn.d.]\n'
        );
    });

    it('should say when nothing was found', async () => {
        expect(await new MarkdownDigestGenerator().generate('x', [], { title: 'T' })).toBe(
            '# Related Work\n\nRelated work for *T*.\n\nNo related papers were found.\n'
        );
    });

    it('should truncate long abstracts', async () => {
        const generator = new MarkdownDigestGenerator({ abstractChars: 10 });
        const output = await generator.generate('x', [createPaperRecord({ paperId: 'a', title: 'A', abstract: 'abcdefghijklmnop' })]);

        expect(output.split('\n')).toContain('   abcdefg...');
    });
});
