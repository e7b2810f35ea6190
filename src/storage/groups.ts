import type { MetadataEntry } from '../types/index.js';

/**
 * Keys sharing a corpus id, in entry order. Only groups of two or more.
 */
export function groupByCorpusId(entries: Array<[string, MetadataEntry]>): Map<string, string[]> {
    const byCorpus = new Map<string, string[]>();
    for (const [key, entry] of entries) {
        if (!entry.CORPUSID) continue;
        const keys = byCorpus.get(entry.CORPUSID) ?? [];
        keys.push(key);
        byCorpus.set(entry.CORPUSID, keys);
    }
    for (const [corpusId, keys] of byCorpus) {
        if (keys.length < 2) byCorpus.delete(corpusId);
    }
    return byCorpus;
}
