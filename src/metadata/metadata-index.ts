import {
    EXTERNAL_ID_KINDS,
    normalizeIdValue,
    type ExternalIdKind,
    type IdKind,
} from '../identifiers/id-registry.js';
import type { MetadataEntry, PaperDetails, StoredMetadata } from '../types/index.js';
import { entryFromDetails } from './entry.js';

/**
 * Outcome of resolving an id against the index.
 * `key` is '' when nothing is known; `redirectedFrom` is the key that was
 * followed through a duplicate link, if any.
 */
export interface Resolution {
    key: string;
    haveMetadata: boolean;
    redirectedFrom: string | null;
}

/** Called for every duplicate edge the index creates or rewrites */
export type DuplicateListener = (key: string, canonical: string) => void;

/**
 * In-memory metadata index: canonical key → external ids, the reverse
 * index per kind, and both duplicate relations.
 *
 * Known duplicates always point at a terminal key; every write goes through
 * `addDuplicate`, which rewrites edges into the new source so that chains
 * never grow past one hop.
 */
export class MetadataIndex {
    private readonly entries = new Map<string, MetadataEntry>();
    private readonly extidIndex = new Map<ExternalIdKind, Map<string, string>>();
    private readonly knownDuplicates = new Map<string, string>();
    private readonly inferredGroups = new Map<string, string[]>();
    private listener: DuplicateListener | null;

    constructor(stored?: StoredMetadata, listener?: DuplicateListener) {
        this.listener = null;
        for (const kind of EXTERNAL_ID_KINDS) {
            this.extidIndex.set(kind, new Map());
        }

        if (stored) {
            for (const [corpusId, group] of stored.inferredGroups) {
                const members = [...new Set(group)];
                this.inferredGroups.set(corpusId, members);
                const first = members[0];
                if (first !== undefined) this.reverse('CORPUSID').set(corpusId, first);
            }
            for (const [key, entry] of stored.entries) {
                this.setEntry(key, entry);
            }
            // Replaying in order collapses any chains in older files
            for (const [key, canonical] of stored.knownDuplicates) {
                this.addDuplicate(key, canonical);
            }
        }

        this.listener = listener ?? null;
    }

    get size(): number {
        return this.entries.size;
    }

    keys(): string[] {
        return [...this.entries.keys()];
    }

    entry(key: string): MetadataEntry | undefined {
        return this.entries.get(key);
    }

    has(key: string): boolean {
        return this.entries.has(key);
    }

    duplicates(): Map<string, string> {
        return new Map(this.knownDuplicates);
    }

    groups(): Map<string, string[]> {
        return new Map([...this.inferredGroups].map(([id, keys]) => [id, [...keys]]));
    }

    canonicalOf(key: string): string {
        return this.knownDuplicates.get(key) ?? key;
    }

    /**
     * Resolve an id to its canonical key.
     */
    resolve(kind: IdKind, value: string | number): Resolution {
        const normalized = normalizeIdValue(kind, value);
        const key = kind === 'SS' ? normalized : (this.reverse(kind).get(normalized) ?? '');
        if (!key) {
            return { key: '', haveMetadata: false, redirectedFrom: null };
        }

        const target = this.knownDuplicates.get(key);
        if (target !== undefined) {
            return { key: target, haveMetadata: this.entries.has(target), redirectedFrom: key };
        }

        const corpusId = this.entries.get(key)?.CORPUSID;
        const first = corpusId ? this.inferredGroups.get(corpusId)?.[0] : undefined;
        if (first !== undefined && first !== key) {
            // Promote the first member on first encounter
            this.addDuplicate(key, first);
            const promoted = this.canonicalOf(first);
            return { key: promoted, haveMetadata: this.entries.has(promoted), redirectedFrom: key };
        }

        return { key, haveMetadata: this.entries.has(key), redirectedFrom: null };
    }

    /**
     * Record the external ids of a freshly fetched paper.
     * `requestedKey` is the key the lookup started from.
     */
    record(details: PaperDetails, requestedKey: string): MetadataEntry {
        const key = details.paperId;
        const entry = entryFromDetails(details);
        const collision = this.setEntry(key, entry);

        if (collision !== null) {
            this.addDuplicate(key, collision);
        }
        if (requestedKey && requestedKey !== key) {
            this.addDuplicate(requestedKey, key);
        }
        return entry;
    }

    /**
     * Point `key` at `target` (or at whatever `target` already points to).
     */
    addDuplicate(key: string, target: string): void {
        if (this.knownDuplicates.get(target) === key) {
            // The newer statement wins over the reverse edge
            this.knownDuplicates.delete(target);
        }
        const terminal = this.canonicalOf(target);
        if (terminal === key || this.knownDuplicates.get(key) === terminal) {
            return;
        }

        this.knownDuplicates.set(key, terminal);
        this.emit(key, terminal);

        for (const [source, canonical] of this.knownDuplicates) {
            if (canonical === key) {
                this.knownDuplicates.set(source, terminal);
                this.emit(source, terminal);
            }
        }
    }

    /**
     * Drop an entry together with its reverse mappings and outgoing duplicate edge.
     */
    remove(key: string): boolean {
        const entry = this.entries.get(key);
        this.knownDuplicates.delete(key);
        if (!entry) return false;

        for (const kind of EXTERNAL_ID_KINDS) {
            this.unindex(kind, entry[kind], key);
        }
        this.entries.delete(key);
        return true;
    }

    /**
     * Insert or overwrite an entry. Returns the first member of the inferred
     * group when the entry's corpus id is already held by another key.
     */
    private setEntry(key: string, entry: MetadataEntry): string | null {
        const previous = this.entries.get(key);
        this.entries.set(key, entry);

        let collision: string | null = null;
        for (const kind of EXTERNAL_ID_KINDS) {
            const value = entry[kind];
            const old = previous?.[kind] ?? '';
            if (old !== value) {
                this.unindex(kind, old, key);
            }
            if (!value) continue;

            if (kind !== 'CORPUSID') {
                this.reverse(kind).set(value, key);
                continue;
            }
            const holder = this.reverse('CORPUSID').get(value);
            if (holder === undefined || holder === key) {
                this.reverse('CORPUSID').set(value, key);
                continue;
            }
            const group = this.inferredGroups.get(value) ?? [holder];
            if (!group.includes(key)) group.push(key);
            this.inferredGroups.set(value, group);
            const first = group[0];
            if (first !== undefined && first !== key) collision = first;
        }
        return collision;
    }

    private unindex(kind: ExternalIdKind, value: string, key: string): void {
        if (!value) return;
        const reverse = this.reverse(kind);
        if (kind !== 'CORPUSID') {
            if (reverse.get(value) === key) reverse.delete(value);
            return;
        }

        const group = this.inferredGroups.get(value)?.filter((member) => member !== key) ?? [];
        if (group.length > 1) {
            this.inferredGroups.set(value, group);
        } else {
            this.inferredGroups.delete(value);
        }
        const next = group[0];
        if (next !== undefined) {
            reverse.set(value, next);
        } else if (reverse.get(value) === key) {
            reverse.delete(value);
        }
    }

    private reverse(kind: ExternalIdKind): Map<string, string> {
        let map = this.extidIndex.get(kind);
        if (!map) {
            map = new Map();
            this.extidIndex.set(kind, map);
        }
        return map;
    }

    private emit(key: string, canonical: string): void {
        this.listener?.(key, canonical);
    }
}
