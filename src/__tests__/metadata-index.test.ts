import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { emptyEntry } from '../metadata/entry.js';
import { MetadataIndex } from '../metadata/metadata-index.js';
import { JsonlRecordStore } from '../storage/jsonl-store.js';
import type { PaperDetails } from '../types/index.js';
import { hexId } from './helpers/fake-remote.js';

function details(paperId: string, extra: Partial<PaperDetails> = {}): PaperDetails {
    return { paperId, ...extra };
}

describe('MetadataIndex', () => {
    let emitted: Array<[string, string]>;
    let index: MetadataIndex;

    beforeEach(() => {
        emitted = [];
        index = new MetadataIndex(undefined, (key, canonical) => emitted.push([key, canonical]));
    });

    describe('record and resolve', () => {
        it('should resolve external ids of a recorded paper', () => {
            index.record(details('k1', { corpusId: 42, externalIds: { ArXiv: '2010.06775', DOI: '10.1/X' } }), 'k1');

            expect(index.resolve('ARXIV', 'arxiv:2010.06775v1')).toEqual({ key: 'k1', haveMetadata: true, redirectedFrom: null });
            expect(index.resolve('DOI', 'https://doi.org/10.1/X')).toEqual({ key: 'k1', haveMetadata: true, redirectedFrom: null });
            expect(index.resolve('CORPUSID', 42)).toEqual({ key: 'k1', haveMetadata: true, redirectedFrom: null });
            expect(emitted).toEqual([]);
        });

        it('should report unknown external ids with an empty key', () => {
            expect(index.resolve('DOI', '10.9/none')).toEqual({ key: '', haveMetadata: false, redirectedFrom: null });
        });

        it('should treat an unknown SS id as its own key without metadata', () => {
            expect(index.resolve('SS', 'k9')).toEqual({ key: 'k9', haveMetadata: false, redirectedFrom: null });
        });

        it('should register the requested key as a duplicate when the remote answers with another key', () => {
            index.record(details('canonical'), 'requested');

            expect(emitted).toEqual([['requested', 'canonical']]);
            expect(index.resolve('SS', 'requested')).toEqual({
                key: 'canonical',
                haveMetadata: true,
                redirectedFrom: 'requested',
            });
        });

        it('should drop reverse mappings that a newer entry no longer carries', () => {
            index.record(details('k1', { externalIds: { DOI: '10.1/old' } }), 'k1');
            index.record(details('k1', { externalIds: { DOI: '10.1/new' } }), 'k1');

            expect(index.resolve('DOI', '10.1/old').key).toBe('');
            expect(index.resolve('DOI', '10.1/new').key).toBe('k1');
        });
    });

    describe('duplicate chains', () => {
        it('should keep every duplicate one hop from its terminal key', () => {
            index.addDuplicate('a', 'b');
            index.addDuplicate('b', 'c');

            expect(index.duplicates()).toEqual(
                new Map([
                    ['a', 'c'],
                    ['b', 'c'],
                ])
            );
            expect(emitted).toEqual([
                ['a', 'b'],
                ['b', 'c'],
                ['a', 'c'],
            ]);
        });

        it('should point a new edge straight at the terminal key', () => {
            index.addDuplicate('b', 'c');
            index.addDuplicate('a', 'b');

            expect(index.duplicates().get('a')).toBe('c');
            expect(index.canonicalOf('a')).toBe('c');
        });

        it('should let the newer statement win over a reverse edge', () => {
            index.addDuplicate('a', 'b');
            index.addDuplicate('b', 'a');

            expect(index.duplicates()).toEqual(new Map([['b', 'a']]));
        });

        it('should ignore self loops and repeated edges', () => {
            index.addDuplicate('a', 'b');
            index.addDuplicate('a', 'b');
            index.addDuplicate('b', 'b');

            expect(emitted).toEqual([['a', 'b']]);
        });
    });

    describe('corpus id groups', () => {
        it('should promote the first key seen for a corpus id', () => {
            index.record(details('k1', { corpusId: 7 }), 'k1');
            index.record(details('k2', { corpusId: 7 }), 'k2');

            expect(emitted).toEqual([['k2', 'k1']]);
            expect(index.groups()).toEqual(new Map([['7', ['k1', 'k2']]]));
            expect(index.resolve('SS', 'k2')).toEqual({ key: 'k1', haveMetadata: true, redirectedFrom: 'k2' });
            expect(index.resolve('CORPUSID', '7')).toEqual({ key: 'k1', haveMetadata: true, redirectedFrom: null });
        });

        it('should promote loaded groups on first encounter only', () => {
            const entry = { ...emptyEntry(), CORPUSID: '9' };
            const loaded = new MetadataIndex(
                {
                    entries: [
                        ['k1', entry],
                        ['k2', entry],
                    ],
                    knownDuplicates: new Map(),
                    inferredGroups: new Map([['9', ['k1', 'k2']]]),
                },
                (key, canonical) => emitted.push([key, canonical])
            );

            expect(emitted).toEqual([]);
            expect(loaded.resolve('SS', 'k2')).toEqual({ key: 'k1', haveMetadata: true, redirectedFrom: 'k2' });
            expect(loaded.resolve('SS', 'k2')).toEqual({ key: 'k1', haveMetadata: true, redirectedFrom: 'k2' });
            expect(emitted).toEqual([['k2', 'k1']]);
        });
    });

    describe('loading', () => {
        it('should collapse chains from older files without reporting them', () => {
            const loaded = new MetadataIndex(
                {
                    entries: [['c', emptyEntry()]],
                    knownDuplicates: new Map([
                        ['a', 'b'],
                        ['b', 'c'],
                    ]),
                    inferredGroups: new Map(),
                },
                (key, canonical) => emitted.push([key, canonical])
            );

            expect(loaded.duplicates()).toEqual(
                new Map([
                    ['a', 'c'],
                    ['b', 'c'],
                ])
            );
            expect(emitted).toEqual([]);
        });

        it('should remove an entry with its reverse mappings', () => {
            index.record(details('k1', { externalIds: { ArXiv: '1111.2222' } }), 'k1');

            expect(index.remove('k1')).toBe(true);
            expect(index.has('k1')).toBe(false);
            expect(index.resolve('ARXIV', '1111.2222').key).toBe('');
            expect(index.remove('k1')).toBe(false);
        });
    });
});

describe('MetadataIndex from a stored metadata file', () => {
    let tmpDir: string;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'citecache-index-'));
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should hold one entry per key when duplicate lines are present', () => {
        const lines: string[] = [];
        for (let i = 1; i <= 31; i++) {
            lines.push(JSON.stringify({ [hexId(i)]: { ...emptyEntry(), CORPUSID: String(1000 + i) } }));
        }
        for (let i = 1; i <= 5; i++) {
            lines.push(JSON.stringify({ [hexId(i)]: { ...emptyEntry(), CORPUSID: String(1000 + i), DOI: `10.5/${i}` } }));
        }
        fs.writeFileSync(path.join(tmpDir, 'metadata.jsonl'), `${lines.join('\n')}\n`);
        const duplicates = [1, 2, 3, 4, 5].map((i) => `${hexId(100 + i)}:${hexId(i)}`);
        fs.writeFileSync(path.join(tmpDir, 'duplicates.csv'), `${duplicates.join('\n')}\n`);

        const store = new JsonlRecordStore(tmpDir);
        const index = new MetadataIndex(store.loadMetadataIndex());

        expect(index.size).toBe(31);
        expect(index.duplicates().size).toBe(5);
        expect(index.resolve('SS', hexId(102))).toEqual({ key: hexId(2), haveMetadata: true, redirectedFrom: hexId(102) });
        expect(index.keys()[0]).toBe(hexId(1));
        expect(index.resolve('DOI', '10.5/3').key).toBe(hexId(3));
        expect(fs.readFileSync(path.join(tmpDir, 'metadata.jsonl'), 'utf-8').trim().split('\n')).toHaveLength(31);
    });
});
