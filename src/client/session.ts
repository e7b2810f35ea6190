import { MetadataIndex } from '../metadata/metadata-index.js';
import { groupByCorpusId } from '../storage/groups.js';
import type { PaperData, RecordStore } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * Per-client state: the open store, the records read or written this
 * session, and the metadata index. Duplicate edges the index creates are
 * written through to the store as they happen.
 */
export class CacheSession {
    private readonly records = new Map<string, PaperData>();
    private readonly logger = getLogger();
    private metadata: MetadataIndex;

    constructor(readonly store: RecordStore) {
        this.metadata = new MetadataIndex(store.loadMetadataIndex(), (key, canonical) =>
            this.persistDuplicate(key, canonical)
        );
        this.logger.debug(
            { backend: store.backend, entries: this.metadata.size, duplicates: this.metadata.duplicates().size },
            'Metadata index loaded'
        );
    }

    get index(): MetadataIndex {
        return this.metadata;
    }

    /**
     * The record for a canonical key: memory first, then the store.
     * An absent or unreadable stored record is a miss; the store warns
     * about unreadable ones.
     */
    checkCache(key: string): PaperData | null {
        const held = this.records.get(key);
        if (held) return held;

        const stored = this.store.get(key);
        if (stored === null) {
            this.logger.debug({ key }, 'Cache miss');
            return null;
        }
        this.records.set(key, stored);
        return stored;
    }

    /**
     * Write a record through to the store and keep it in memory.
     */
    save(key: string, data: PaperData, discardExisting = false): void {
        this.store.put(key, data, discardExisting);
        this.records.set(key, data);
    }

    forget(key: string): void {
        this.records.delete(key);
    }

    /**
     * Replace the index with one rebuilt from every stored record.
     */
    rebuildIndex(): number {
        const entries = this.store.rebuildMetadataIndex();
        this.metadata = new MetadataIndex(
            {
                entries,
                knownDuplicates: this.store.loadDuplicates(),
                inferredGroups: groupByCorpusId(entries),
            },
            (key, canonical) => this.persistDuplicate(key, canonical)
        );
        this.records.clear();
        return entries.length;
    }

    close(): void {
        this.records.clear();
        this.store.close();
    }

    private persistDuplicate(key: string, canonical: string): void {
        this.logger.debug({ key, canonical }, 'Recording duplicate');
        this.store.appendDuplicate(key, canonical);
    }
}
