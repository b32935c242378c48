import { readFileSync } from 'node:fs';
import { z } from 'zod';

/**
 * Known venues and their synonym/variant spellings, read from data/venues.json.
 *
 * `acronyms` match case-sensitively ("SP" must not match "sp"),
 * `names` match case-insensitively with flexible whitespace.
 */
const venueTableSchema = z.object({
    publishers: z.array(z.string()),
    venues: z.array(z.object({
        abbreviation: z.string().min(1),
        acronyms: z.array(z.string()),
        names: z.array(z.string()),
    })),
});

export type VenueTable = z.infer<typeof venueTableSchema>;

interface VariantPattern {
    abbreviation: string;
    variant: string;
    regex: RegExp;
}

/**
 * A known-venue mention inside a text.
 */
export interface VenueMention {
    abbreviation: string;
    index: number;
    end: number;
}

function escapeRegex(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function compileVariants(table: VenueTable): VariantPattern[] {
    const patterns: VariantPattern[] = [];

    for (const venue of table.venues) {
        for (const acronym of venue.acronyms) {
            patterns.push({
                abbreviation: venue.abbreviation,
                variant: acronym,
                regex: new RegExp(`(?<![A-Za-z0-9])${escapeRegex(acronym).replace(/ /g, '\\s*')}(?![A-Za-z])`, 'g'),
            });
        }
        for (const name of venue.names) {
            patterns.push({
                abbreviation: venue.abbreviation,
                variant: name,
                regex: new RegExp(`(?<![A-Za-z])${escapeRegex(name).replace(/ /g, '\\s+')}(?![A-Za-z])`, 'gi'),
            });
        }
    }

    return patterns;
}

/**
 * Compiled lookup over a venue table.
 */
export class VenueLexicon {
    private readonly patterns: VariantPattern[];
    private readonly publishers: ReadonlySet<string>;

    constructor(table: VenueTable) {
        this.patterns = compileVariants(table);
        this.publishers = new Set(table.publishers.map((p) => p.toUpperCase()));
    }

    /**
     * Find the earliest known-venue mention in `text`.
     * Among mentions starting at the same index the longest wins.
     */
    findFirst(text: string): VenueMention | null {
        let best: VenueMention | null = null;

        for (const pattern of this.patterns) {
            pattern.regex.lastIndex = 0;
            const match = pattern.regex.exec(text);
            if (!match) continue;

            const mention = { abbreviation: pattern.abbreviation, index: match.index, end: match.index + match[0].length };
            if (
                !best ||
                mention.index < best.index ||
                (mention.index === best.index && mention.end > best.end)
            ) {
                best = mention;
            }
        }

        return best;
    }

    /**
     * Canonical abbreviation for a token that is exactly a known variant, else null.
     */
    canonicalize(token: string): string | null {
        const mention = this.findFirst(token);
        if (mention && mention.index === 0 && mention.end === token.length) {
            return mention.abbreviation;
        }
        return null;
    }

    /** Publisher or boilerplate tokens that are never venues */
    isPublisher(token: string): boolean {
        return this.publishers.has(token.toUpperCase());
    }
}

/**
 * Load and validate a venue table from disk.
 */
export function loadVenueTable(path: URL | string): VenueTable {
    return venueTableSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
}

let defaultLexicon: VenueLexicon | null = null;

/**
 * Lexicon built from the bundled data/venues.json.
 */
export function getDefaultLexicon(): VenueLexicon {
    if (!defaultLexicon) {
        defaultLexicon = new VenueLexicon(loadVenueTable(new URL('../../data/venues.json', import.meta.url)));
    }
    return defaultLexicon;
}
