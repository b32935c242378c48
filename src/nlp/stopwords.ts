import { readFileSync } from 'node:fs';

/**
 * English + academic stopword list, one word per line in data/stopwords.txt.
 * No stemming.
 */
export const STOPWORDS: ReadonlySet<string> = new Set(
    readFileSync(new URL('../../data/stopwords.txt', import.meta.url), 'utf-8')
        .split('\n')
        .map((line) => line.trim())
        .filter((line) => line.length > 0 && !line.startsWith('#'))
);
