import type { ExternalIdKind } from '../identifiers/id-registry.js';
import type { BackendName } from './config.js';
import type { PaperData } from './paper.js';

/**
 * External ids known for one canonical key. Every kind is present;
 * unknown values are `''`.
 */
export type MetadataEntry = Record<ExternalIdKind, string>;

/**
 * Everything the metadata index is rebuilt from at startup.
 */
export interface StoredMetadata {
    /** Entries in insertion order */
    entries: Array<[string, MetadataEntry]>;
    knownDuplicates: Map<string, string>;
    /** Corpus id → keys sharing it, in insertion order (only groups of two or more) */
    inferredGroups: Map<string, string[]>;
}

/**
 * Persistence contract shared by both backends. All calls are synchronous;
 * the single-writer assumption holds for one open store.
 */
export interface RecordStore {
    readonly backend: BackendName;

    /** The stored record, or null when absent or structurally invalid */
    get(key: string): PaperData | null;

    /**
     * Store the record for `key`. With `discardExisting` anything the backend
     * kept for the key beyond `data` is dropped first.
     */
    put(key: string, data: PaperData, discardExisting: boolean): void;

    /** Remove the record and its metadata. Returns false if nothing was stored. */
    delete(key: string): boolean;

    loadMetadataIndex(): StoredMetadata;
    appendMetadata(key: string, entry: MetadataEntry): void;

    /** Rescan every stored record and rewrite the metadata from it */
    rebuildMetadataIndex(): Array<[string, MetadataEntry]>;

    loadDuplicates(): Map<string, string>;
    appendDuplicate(key: string, canonical: string): void;

    /** Keys of every stored record */
    keys(): string[];

    close(): void;
}
