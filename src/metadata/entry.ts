import {
    EXTERNAL_ID_KINDS,
    classifyIdKind,
    externalIdKind,
    normalizeIdValue,
} from '../identifiers/id-registry.js';
import type { MetadataEntry, PaperDetails } from '../types/index.js';
import { isCacheError } from '../utils/errors.js';

export function emptyEntry(): MetadataEntry {
    return {
        ACL: '',
        ARXIV: '',
        CORPUSID: '',
        DOI: '',
        MAG: '',
        URL: '',
        DBLP: '',
        PUBMED: '',
        PMC: '',
    };
}

/**
 * Build a metadata entry from the external ids a paper carries.
 */
export function entryFromDetails(details: PaperDetails): MetadataEntry {
    const entry = emptyEntry();
    for (const [apiKey, value] of Object.entries(details.externalIds ?? {})) {
        const kind = externalIdKind(apiKey);
        if (kind && value !== null && value !== '') {
            entry[kind] = normalizeIdValue(kind, value);
        }
    }
    if (details.corpusId !== undefined && details.corpusId !== null) {
        entry.CORPUSID = String(details.corpusId);
    }
    return entry;
}

/**
 * Coerce a stored entry in any of the layouts written over time into the
 * current one. Objects may use older key names (`arxivid`, `pubmed`, ...)
 * or the remote `externalIds` names; arrays are positional in
 * `EXTERNAL_ID_KINDS` order. Missing kinds become `''`.
 * Returns null for anything else.
 */
export function normalizeEntry(raw: unknown): MetadataEntry | null {
    const entry = emptyEntry();

    if (Array.isArray(raw)) {
        EXTERNAL_ID_KINDS.forEach((kind, i) => {
            const value: unknown = raw[i];
            if (typeof value === 'string' || typeof value === 'number') {
                entry[kind] = normalizeIdValue(kind, value);
            }
        });
        return entry;
    }

    if (typeof raw !== 'object' || raw === null) return null;

    for (const [name, value] of Object.entries(raw)) {
        if (typeof value !== 'string' && typeof value !== 'number') continue;
        const classified = externalIdKind(name) ?? classifyIdKind(name);
        if (isCacheError(classified) || classified === 'SS') continue;
        entry[classified] = value === '' ? '' : normalizeIdValue(classified, value);
    }
    return entry;
}

export function entriesEqual(a: MetadataEntry, b: MetadataEntry): boolean {
    return EXTERNAL_ID_KINDS.every((kind) => a[kind] === b[kind]);
}
