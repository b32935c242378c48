import type { PaperRecord, RelatedWorkGenerator } from '../types/index.js';
import { citationKey } from '../exporters/bibtex.js';

export interface MarkdownGeneratorOptions {
    /** Group papers under their first topic */
    groupByTopic?: boolean;
    /** Characters of abstract shown per paper */
    abstractChars?: number;
}

const UNGROUPED = 'Other';

/**
 * Deterministic related-work digest: one entry per ranked paper with its
 * citation key, venue line and the opening of its abstract. A stand-in for a
 * prose generator with the same interface.
 */
export class MarkdownDigestGenerator implements RelatedWorkGenerator {
    readonly name = 'markdown-digest';
    private readonly groupByTopic: boolean;
    private readonly abstractChars: number;

    constructor(options: MarkdownGeneratorOptions = {}) {
        this.groupByTopic = options.groupByTopic ?? false;
        this.abstractChars = options.abstractChars ?? 300;
    }

    async generate(queryAbstract: string, papers: PaperRecord[], options: { title?: string } = {}): Promise<string> {
        const lines: string[] = ['# Related Work', ''];

        if (options.title) {
            lines.push(`Related work for *${options.title}*.`, '');
        } else {
            lines.push(`Related work for: ${truncate(queryAbstract.replace(/\s+/g, ' ').trim(), 160)}`, '');
        }

        if (papers.length === 0) {
            lines.push('No related papers were found.', '');
            return lines.join('\n');
        }

        if (!this.groupByTopic) {
            papers.forEach((paper, i) => lines.push(...this.renderEntry(paper, i + 1)));
            return lines.join('\n');
        }

        const groups = new Map<string, PaperRecord[]>();
        for (const paper of papers) {
            const topic = paper.topics[0] ?? UNGROUPED;
            groups.set(topic, [...(groups.get(topic) ?? []), paper]);
        }

        let n = 1;
        for (const [topic, members] of groups) {
            lines.push(`## ${capitalize(topic)}`, '');
            for (const paper of members) {
                lines.push(...this.renderEntry(paper, n++));
            }
        }
        return lines.join('\n');
    }

    private renderEntry(paper: PaperRecord, n: number): string[] {
        const authors = formatAuthors(paper.authors);
        const where = [paper.venue, paper.year ?? undefined].filter((part) => part !== undefined && part !== '').join(', ');
        const header = `${n}. **${paper.title}** [${citationKey(paper)}]`;
        const byline = [authors, where]
            .filter((part) => part.length > 0)
            .map((part) => part.replace(/\.$/, ''))
            .join('. ');

        const lines = [header];
        if (byline) lines.push(`   ${byline}.`);
        if (paper.abstract) lines.push(`   ${truncate(paper.abstract.replace(/\s+/g, ' ').trim(), this.abstractChars)}`);
        lines.push('');
        return lines;
    }
}

function formatAuthors(authors: string[]): string {
    if (authors.length === 0) return '';
    if (authors.length <= 2) return authors.join(' and ');
    return `${authors[0] ?? ''} et al.`;
}

function truncate(text: string, max: number): string {
    return text.length <= max ? text : `${text.slice(0, max - 3).trimEnd()}...`;
}

function capitalize(text: string): string {
    return text.charAt(0).toUpperCase() + text.slice(1);
}
