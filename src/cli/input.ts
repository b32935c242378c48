import { readFileSync } from 'node:fs';

export interface PaperInput {
    title: string | null;
    abstract: string;
}

/**
 * Parse an input document. Accepted shapes:
 *
 *   Title: <title>
 *   Abstract: <abstract>
 *
 * `<title>\nAbstract: <abstract>`, or the bare abstract.
 */
export function parseInputText(content: string): PaperInput {
    const text = content.trim();

    if (text.startsWith('Title:')) {
        const newline = text.indexOf('\n');
        const title = (newline === -1 ? text : text.slice(0, newline)).slice('Title:'.length).trim();
        const rest = newline === -1 ? '' : text.slice(newline + 1).trim();
        const abstract = rest.startsWith('Abstract:') ? rest.slice('Abstract:'.length).trim() : rest;
        return { title: title || null, abstract };
    }

    const marker = text.indexOf('Abstract:');
    if (marker !== -1) {
        const title = text.slice(0, marker).trim();
        return { title: title || null, abstract: text.slice(marker + 'Abstract:'.length).trim() };
    }

    return { title: null, abstract: text };
}

export function readInputFile(path: string): PaperInput {
    return parseInputText(readFileSync(path, 'utf-8'));
}
