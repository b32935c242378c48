import type { PaperRecord } from '../types/index.js';

export type BibtexEntryType = 'inproceedings' | 'article' | 'misc';

const PROCEEDINGS_HINT = /\b(conference|symposium|workshop|proceedings|proc\.)/i;

/**
 * Citation key: first author's last name (ASCII letters only) + year, e.g. "Smith2024".
 */
export function citationKey(record: Pick<PaperRecord, 'authors' | 'year'>): string {
    const firstAuthor = record.authors[0]?.trim() ?? '';
    const parts = firstAuthor.split(/\s+/);
    const lastName = (parts[parts.length - 1] ?? '')
        .normalize('NFKD')
        .replace(/[^A-Za-z]/g, '');

    return `${lastName || 'Unknown'}${record.year ?? 'n.d.'}`;
}

export function entryTypeOf(record: PaperRecord): BibtexEntryType {
    if (record.venue && PROCEEDINGS_HINT.test(record.venue)) return 'inproceedings';
    if (record.journalRef && PROCEEDINGS_HINT.test(record.journalRef)) return 'inproceedings';
    if (record.arxivId) return 'misc';
    return 'article';
}

/**
 * Render a record as a BibTeX entry (@inproceedings, @article or @misc for preprints).
 */
export function renderBibtex(record: PaperRecord): string {
    const type = entryTypeOf(record);
    const fields: Array<[string, string]> = [
        ['title', record.title],
        ['author', record.authors.length > 0 ? record.authors.join(' and ') : 'Unknown'],
    ];

    if (record.year !== null) fields.push(['year', String(record.year)]);

    const venue = record.venue || record.journalRef || '';
    switch (type) {
        case 'inproceedings':
            if (venue) fields.push(['booktitle', venue]);
            break;
        case 'article':
            if (venue) fields.push(['journal', venue]);
            break;
        case 'misc':
            fields.push(['note', `arXiv preprint arXiv:${record.arxivId ?? ''}`]);
            break;
    }

    if (record.doi) fields.push(['doi', record.doi]);
    if (record.url) fields.push(['url', record.url]);

    const body = fields.map(([name, value]) => `  ${name}={${value}}`).join(',\n');
    return `@${type}{${citationKey(record)},\n${body}\n}`;
}

/**
 * Concatenate the records' citations, separated by blank lines.
 * Records without a stored entry are rendered on the fly.
 */
export function renderBibliography(records: PaperRecord[]): string {
    return records.map((record) => record.bibtex ?? renderBibtex(record)).join('\n\n') + '\n';
}
