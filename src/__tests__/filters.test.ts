import { describe, it, expect } from 'vitest';
import { applyFilters, parseFilters, type CitationFilters } from '../filters/filters.js';
import type { PaperDetails } from '../types/index.js';
import { isCacheError } from '../utils/errors.js';

const papers: PaperDetails[] = [
    {
        paperId: 'p1',
        title: 'Attention is all you need',
        year: 2017,
        venue: 'NeurIPS',
        citationCount: 5000,
        influentialCitationCount: 900,
        authors: [
            { authorId: 'a1', name: 'Ashish Vaswani' },
            { authorId: 'a2', name: 'Noam Shazeer' },
        ],
    },
    {
        paperId: 'p2',
        title: 'A survey of transformers',
        year: 2021,
        venue: 'AI Open',
        citationCount: 40,
        influentialCitationCount: 3,
        authors: [{ authorId: 'a3', name: 'Tianyang Lin' }],
    },
    {
        paperId: 'p3',
        title: 'Efficient attention',
        year: null,
        venue: 'arXiv',
        citationCount: 10,
        influentialCitationCount: 0,
        authors: [{ authorId: null, name: 'Noam Other' }],
    },
];

function ids(filters: CitationFilters, num = 0): string[] {
    return applyFilters(papers, filters, num).map((paper) => paper.paperId);
}

describe('applyFilters', () => {
    it('should keep papers inside an inclusive year range', () => {
        expect(ids({ year: { min: 2017, max: 2020 } })).toEqual(['p1']);
        expect(ids({ year: { min: 2018 } })).toEqual(['p2']);
    });

    it('should match authors by id before names', () => {
        expect(ids({ authors: { ids: ['a3'], names: ['Ashish Vaswani'], exact: true } })).toEqual(['p2']);
    });

    it('should match full names exactly or name words loosely', () => {
        expect(ids({ authors: { names: ['Noam Shazeer'], exact: true } })).toEqual(['p1']);
        expect(ids({ authors: { names: ['noam'] } })).toEqual(['p1', 'p3']);
    });

    it('should treat the citation count maximum as exclusive', () => {
        expect(ids({ citationCount: { min: 10, max: 5000 } })).toEqual(['p2', 'p3']);
        expect(ids({ influentialCount: { min: 1 } })).toEqual(['p1', 'p2']);
    });

    it('should match venues and titles from the start, ignoring case', () => {
        expect(ids({ venues: ['neur', 'ai'] })).toEqual(['p1', 'p2']);
        expect(ids({ venues: ['open'] })).toEqual([]);
        expect(ids({ title: { pattern: 'a' } })).toEqual(['p1', 'p2']);
        expect(ids({ title: { pattern: 'a', invert: true } })).toEqual(['p3']);
    });

    it('should combine filters and stop at num matches', () => {
        expect(ids({ title: { pattern: '.*attention' }, citationCount: { min: 100 } })).toEqual(['p1']);
        expect(ids({}, 2)).toEqual(['p1', 'p2']);
    });
});

describe('parseFilters', () => {
    it('should accept the older filter names', () => {
        expect(
            parseFilters({
                num_citing: { min: 10, max: 10000 },
                influential_count: 2,
                year: { min: 'any', max: 2020 },
                author: { author_names: ['noam'] },
                title: { title_re: 'attention', invert: true },
                venue: 'NeurIPS',
            })
        ).toEqual({
            citationCount: { min: 10, max: 10000 },
            influentialCount: { min: 2 },
            year: { min: undefined, max: 2020 },
            authors: { ids: undefined, names: ['noam'], exact: undefined },
            title: { pattern: 'attention', invert: true },
            venues: ['NeurIPS'],
        });
    });

    it('should reject unknown filters', () => {
        const result = parseFilters({ colour: 'blue' });
        expect(isCacheError(result) && result.kind).toBe('InvalidFilter');
        expect(isCacheError(result) && result.message).toBe('Unknown filter: colour');
    });

    it('should reject broken regular expressions', () => {
        const result = parseFilters({ title: '(' });
        expect(isCacheError(result) && result.kind).toBe('InvalidFilter');
    });

    it('should reject non-object input', () => {
        expect(isCacheError(parseFilters('year>2000'))).toBe(true);
    });
});
