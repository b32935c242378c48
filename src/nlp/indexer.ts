import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { Indexer } from '../types/index.js';
import { tokenize } from './tokenizer.js';

/**
 * Topic dictionary: each topic is assigned when any of its patterns
 * appears as a whole word in the title or abstract (case-insensitive).
 */
const topicTableSchema = z.object({
    topics: z.array(z.object({
        name: z.string().min(1),
        patterns: z.array(z.string().min(1)).min(1),
    })),
});

export type TopicTable = z.infer<typeof topicTableSchema>;

interface CompiledTopic {
    name: string;
    patterns: RegExp[];
}

export interface KeywordIndexerOptions {
    /** Maximum number of keywords per record */
    maxKeywords?: number;
    /** Topic dictionary; defaults to data/topics.json */
    topics?: TopicTable;
}

const DEFAULT_MAX_KEYWORDS = 8;

/** Title terms count this many times over abstract terms */
const TITLE_WEIGHT = 2;

export function loadTopicTable(path: URL | string): TopicTable {
    return topicTableSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
}

function compileTopics(table: TopicTable): CompiledTopic[] {
    return table.topics.map((topic) => ({
        name: topic.name,
        patterns: topic.patterns.map((pattern) => {
            // Whole-word match with flexible whitespace
            const escaped = pattern
                .replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
                .replace(/ /g, '\\s+');
            return new RegExp(`(?<![A-Za-z0-9])${escaped}(?![A-Za-z0-9])`, 'i');
        }),
    }));
}

let defaultTopics: TopicTable | null = null;

function getDefaultTopics(): TopicTable {
    if (!defaultTopics) {
        defaultTopics = loadTopicTable(new URL('../../data/topics.json', import.meta.url));
    }
    return defaultTopics;
}

/**
 * Deterministic keyword/topic extractor.
 *
 * Keywords are the most frequent non-stopword terms (title terms weighted up,
 * ties broken by first appearance). Topics come from the dictionary, in
 * dictionary order.
 */
export class KeywordIndexer implements Indexer {
    private readonly topics: CompiledTopic[];
    private readonly maxKeywords: number;

    constructor(options: KeywordIndexerOptions = {}) {
        this.topics = compileTopics(options.topics ?? getDefaultTopics());
        this.maxKeywords = options.maxKeywords ?? DEFAULT_MAX_KEYWORDS;
    }

    extract(title: string, abstract: string | null): { keywords: string[]; topics: string[] } {
        return {
            keywords: this.extractKeywords(title, abstract),
            topics: this.extractTopics(`${title} ${abstract ?? ''}`),
        };
    }

    extractKeywords(title: string, abstract: string | null): string[] {
        const scores = new Map<string, { score: number; firstSeen: number }>();
        let position = 0;

        const count = (tokens: string[], weight: number): void => {
            for (const token of tokens) {
                const entry = scores.get(token);
                if (entry) {
                    entry.score += weight;
                } else {
                    scores.set(token, { score: weight, firstSeen: position });
                }
                position++;
            }
        };

        count(tokenize(title), TITLE_WEIGHT);
        count(tokenize(abstract), 1);

        return Array.from(scores.entries())
            .sort((a, b) => b[1].score - a[1].score || a[1].firstSeen - b[1].firstSeen)
            .slice(0, this.maxKeywords)
            .map(([term]) => term);
    }

    extractTopics(text: string): string[] {
        return this.topics
            .filter((topic) => topic.patterns.some((pattern) => pattern.test(text)))
            .map((topic) => topic.name);
    }
}

/**
 * Merge extracted terms into existing ones without dropping or reordering what is there.
 */
export function mergeTerms(existing: readonly string[], extracted: readonly string[]): string[] {
    const seen = new Set(existing.map((term) => term.toLowerCase()));
    const merged = [...existing];
    for (const term of extracted) {
        if (!seen.has(term.toLowerCase())) {
            seen.add(term.toLowerCase());
            merged.push(term);
        }
    }
    return merged;
}
