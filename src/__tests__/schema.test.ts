import { describe, it, expect } from 'vitest';
import {
    parseAuthorPapers,
    parseCitationsPage,
    parsePaperDetails,
    parseRecommendations,
    parseSearchResult,
    parseStoredRecord,
} from '../sources/schema.js';
import { CacheError, isCacheError } from '../utils/errors.js';

describe('parsePaperDetails', () => {
    it('should mirror the corpus id from externalIds', () => {
        const details = parsePaperDetails({ paperId: 'p1', title: 'T', externalIds: { CorpusId: 55 } });
        expect(isCacheError(details)).toBe(false);
        if (isCacheError(details)) return;
        expect(details.corpusId).toBe(55);
        expect(details.title).toBe('T');
    });

    it('should remap the older field layout', () => {
        const details = parsePaperDetails({
            paperId: 'p1',
            numCitedBy: 12,
            numCiting: 3,
            arxivId: '2010.06775',
            corpusId: 9,
            authors: [{ id: 'a1', name: 'Ada' }],
        });
        expect(details).toMatchObject({
            paperId: 'p1',
            citationCount: 12,
            referenceCount: 3,
            corpusId: 9,
            externalIds: { ArXiv: '2010.06775', CorpusId: 9 },
            authors: [{ authorId: 'a1', name: 'Ada' }],
        });
    });

    it('should fail with the raw payload when no paperId is present', () => {
        const raw = { title: 'orphan' };
        const details = parsePaperDetails(raw);
        expect(details).toBeInstanceOf(CacheError);
        if (!isCacheError(details)) return;
        expect(details.kind).toBe('ParseFailure');
        expect(details.payload).toBe(raw);
    });
});

describe('parseCitationsPage', () => {
    it('should drop entries without a counterpart id', () => {
        const page = parseCitationsPage({
            offset: 0,
            next: 2,
            data: [
                { citingPaper: { paperId: 'a' }, contexts: ['used here'], intents: null },
                { citingPaper: { paperId: null } },
            ],
        });
        if (isCacheError(page)) throw page;
        expect(page.next).toBe(2);
        expect(page.data).toHaveLength(1);
        expect(page.data[0]?.citingPaper.paperId).toBe('a');
        expect(page.data[0]?.contexts).toEqual(['used here']);
        expect(page.data[0]?.intents).toEqual([]);
    });

    it('should turn an error body into a network error', () => {
        const page = parseCitationsPage({ error: 'Paper not found' });
        expect(page).toBeInstanceOf(CacheError);
        if (!isCacheError(page)) return;
        expect(page.kind).toBe('NetworkError');
        expect(page.message).toBe('Paper not found');
    });
});

describe('parseStoredRecord', () => {
    it('should read the flat layout of older records', () => {
        const record = parseStoredRecord({
            paperId: 'p',
            title: 'Old',
            citations: [{ paperId: 'c1', intent: ['background'], isInfluential: true }],
            references: [],
        });
        expect(record).not.toBeNull();
        expect(record?.details.title).toBe('Old');
        expect(record?.citations.data[0]).toMatchObject({
            citingPaper: { paperId: 'c1' },
            contexts: [],
            intents: ['background'],
            isInfluential: true,
        });
        expect(record?.references.data).toEqual([]);
    });

    it('should reject records without edge lists', () => {
        expect(parseStoredRecord({ details: { paperId: 'p' } })).toBeNull();
        expect(parseStoredRecord('not a record')).toBeNull();
    });
});

describe('other endpoints', () => {
    it('should keep valid search hits only', () => {
        const result = parseSearchResult({ total: 2, offset: 0, next: 1, data: [{ paperId: 'a' }, { title: 'bad' }] });
        if (isCacheError(result)) throw result;
        expect(result.total).toBe(2);
        expect(result.next).toBe(1);
        expect(result.data.map((paper) => paper.paperId)).toEqual(['a']);
    });

    it('should attach papers to their author', () => {
        const result = parseAuthorPapers({ authorId: '42' }, { offset: 0, data: [{ paperId: 'a' }] });
        if (isCacheError(result)) throw result;
        expect(result.author.authorId).toBe('42');
        expect(result.papers.map((paper) => paper.paperId)).toEqual(['a']);
    });

    it('should require the recommendations envelope', () => {
        const result = parseRecommendations({ papers: [] });
        expect(isCacheError(result) && result.kind).toBe('ParseFailure');
    });
});
