import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { PaperRecord } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { renderBibliography } from './bibtex.js';

const logger = getLogger();

// ─── Types ───────────────────────────────────────────────

export type ExportFormat = 'bibtex' | 'json' | 'csv';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['bibtex', 'json', 'csv'];

export function isExportFormat(value: string): value is ExportFormat {
    return EXPORT_FORMATS.some((format) => format === value);
}

// ─── Main Export Function ────────────────────────────────

/**
 * Render retrieved records in the given format.
 */
export function renderRecords(records: PaperRecord[], format: ExportFormat): string {
    switch (format) {
        case 'bibtex':
            return renderBibliography(records);
        case 'json':
            return exportJson(records);
        case 'csv':
            return exportCSV(records);
    }
}

/**
 * Write retrieved records to `outputPath`, creating parent directories.
 */
export function exportRecords(records: PaperRecord[], outputPath: string, format: ExportFormat): void {
    mkdirSync(dirname(outputPath), { recursive: true });
    writeFileSync(outputPath, renderRecords(records, format), 'utf-8');
    logger.info({ format, outputPath, papers: records.length }, 'Records exported');
}

// ─── Format Implementations ─────────────────────────────

function exportJson(records: PaperRecord[]): string {
    return JSON.stringify({
        relwork: {
            version: '1.0.0',
            exported_at: new Date().toISOString(),
        },
        papers: records.map((p) => ({
            paper_id: p.paperId,
            source_tier: p.sourceTier ?? null,
            title: p.title,
            authors: p.authors,
            year: p.year,
            venue: p.venue,
            abstract: p.abstract,
            doi: p.doi ?? null,
            url: p.url ?? null,
            pdf_path: p.pdfPath ?? null,
            keywords: p.keywords,
            topics: p.topics,
        })),
    }, null, 2);
}

function exportCSV(records: PaperRecord[]): string {
    const quote = (value: string | null | undefined): string => `"${(value ?? '').replace(/"/g, '""')}"`;

    let csv = 'paper_id,source_tier,title,authors,year,venue,doi,pdf_path\n';
    for (const paper of records) {
        csv += [
            quote(paper.paperId),
            paper.sourceTier ?? '',
            quote(paper.title),
            quote(paper.authors.join('; ')),
            paper.year ?? '',
            quote(paper.venue),
            quote(paper.doi),
            quote(paper.pdfPath),
        ].join(',') + '\n';
    }

    return csv;
}
