import type { Indexer, PaperRecord, StorageConfig, StorageTierName } from '../types/index.js';
import type { VenueLexicon } from '../venue/venue-table.js';
import { TierStore, type TierAudit, type TierStats } from './tier-store.js';

export interface TieredStoreOptions {
    indexer?: Indexer;
    lexicon?: VenueLexicon;
    now?: () => Date;
}

export interface StoreStats {
    tiers: TierStats[];
    totalPapers: number;
    papersWithPdf: number;
}

/**
 * The two physical tiers: `curated` (manual additions, read-mostly) and
 * `cached` (written by automated retrieval).
 */
export class TieredStore {
    readonly curated: TierStore;
    readonly cached: TierStore;

    constructor(config: Pick<StorageConfig, 'curatedDir' | 'cachedDir' | 'maxTitleLength'>, options: TieredStoreOptions = {}) {
        const shared = {
            maxTitleLength: config.maxTitleLength,
            indexer: options.indexer,
            lexicon: options.lexicon,
            now: options.now,
        };
        this.curated = new TierStore({ ...shared, name: 'curated', rootDir: config.curatedDir });
        this.cached = new TierStore({ ...shared, name: 'cached', rootDir: config.cachedDir });
    }

    tier(name: StorageTierName): TierStore {
        return name === 'curated' ? this.curated : this.cached;
    }

    get tiers(): TierStore[] {
        return [this.curated, this.cached];
    }

    async init(): Promise<void> {
        await this.curated.init();
        await this.cached.init();
    }

    /**
     * Drop both in-memory indexes (called at the start of each retrieval).
     */
    invalidate(): void {
        this.curated.invalidate();
        this.cached.invalidate();
    }

    /**
     * Look a paper id up in priority order.
     */
    async find(paperId: string): Promise<{ tier: StorageTierName; record: PaperRecord } | undefined> {
        for (const store of this.tiers) {
            const record = await store.get(paperId);
            if (record) return { tier: store.name, record };
        }
        return undefined;
    }

    async stats(): Promise<StoreStats> {
        const tiers = [await this.curated.stats(), await this.cached.stats()];
        return {
            tiers,
            totalPapers: tiers.reduce((sum, t) => sum + t.papers, 0),
            papersWithPdf: tiers.reduce((sum, t) => sum + t.withPdf, 0),
        };
    }

    async audit(): Promise<TierAudit[]> {
        return [await this.curated.audit(), await this.cached.audit()];
    }
}
