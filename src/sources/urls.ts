import type { DataLimits } from '../types/index.js';

export const S2_ROOT = 'https://api.semanticscholar.org/graph/v1';
export const S2_RECOMMENDATIONS_ROOT = 'https://api.semanticscholar.org/recommendations/v1';

/** Fields requested for paper details */
export const DETAILS_FIELDS = [
    'paperId', 'corpusId', 'externalIds', 'url', 'title', 'abstract', 'venue',
    'publicationVenue', 'year', 'referenceCount', 'citationCount',
    'influentialCitationCount', 'isOpenAccess', 'openAccessPdf', 'fieldsOfStudy',
    's2FieldsOfStudy', 'publicationTypes', 'publicationDate', 'journal', 'authors',
] as const;

/** Fields requested on citation and reference pages */
export const EDGE_FIELDS = [...DETAILS_FIELDS, 'contexts', 'intents', 'isInfluential'] as const;

export const AUTHOR_FIELDS = [
    'authorId', 'name', 'url', 'affiliations', 'homepage', 'paperCount', 'citationCount', 'hIndex',
] as const;

/**
 * URL builders for the Graph API. Each encodes its `fields` selector and,
 * where paginated, `limit` and `offset`.
 */
export class S2Urls {
    constructor(
        private readonly limits: DataLimits,
        private readonly root: string = S2_ROOT,
        private readonly recommendationsRoot: string = S2_RECOMMENDATIONS_ROOT
    ) {}

    details(id: string): string {
        return `${this.root}/paper/${id}?fields=${DETAILS_FIELDS.join(',')}`;
    }

    citations(id: string, limit = 0, offset?: number): string {
        return this.edgeUrl(id, 'citations', limit || this.limits.citations.limit, offset);
    }

    references(id: string, limit = 0, offset?: number): string {
        return this.edgeUrl(id, 'references', limit || this.limits.references.limit, offset);
    }

    author(id: string): string {
        return `${this.root}/author/${id}?fields=${AUTHOR_FIELDS.join(',')}`;
    }

    authorPapers(id: string, limit = 0, offset?: number): string {
        const params = new URLSearchParams({
            fields: DETAILS_FIELDS.join(','),
            limit: String(limit || this.limits.authorPapers.limit),
        });
        if (offset !== undefined) params.set('offset', String(offset));
        return `${this.root}/author/${id}/papers?${params.toString()}`;
    }

    search(query: string, limit = 0, offset?: number): string {
        const params = new URLSearchParams({
            query,
            fields: DETAILS_FIELDS.join(','),
            limit: String(Math.min(limit || this.limits.search.limit, 100)),
        });
        if (offset !== undefined) params.set('offset', String(offset));
        return `${this.root}/paper/search?${params.toString()}`;
    }

    recommendations(limit: number): string {
        const params = new URLSearchParams({
            fields: DETAILS_FIELDS.join(','),
            limit: String(Math.min(limit, 500)),
        });
        return `${this.recommendationsRoot}/papers?${params.toString()}`;
    }

    recommendationsForPaper(id: string, limit: number): string {
        const params = new URLSearchParams({
            fields: DETAILS_FIELDS.join(','),
            limit: String(Math.min(limit, 500)),
        });
        return `${this.recommendationsRoot}/papers/forpaper/${id}?${params.toString()}`;
    }

    private edgeUrl(id: string, edge: 'citations' | 'references', limit: number, offset?: number): string {
        const url = `${this.root}/paper/${id}/${edge}?fields=${EDGE_FIELDS.join(',')}&limit=${limit}`;
        return offset === undefined ? url : `${url}&offset=${offset}`;
    }
}
