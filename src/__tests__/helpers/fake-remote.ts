import type { RemoteFetcher } from '../../sources/remote.js';
import { CacheError } from '../../utils/errors.js';

export type RawPaper = Record<string, unknown> & { paperId: string };

/**
 * Deterministic 40-character hex key for synthetic papers.
 */
export function hexId(n: number): string {
    return n.toString(16).padStart(40, '0');
}

/**
 * In-process stand-in for the Graph API, routing by URL path and query.
 */
export class FakeRemote implements RemoteFetcher {
    readonly requests: string[] = [];
    readonly posts: Array<{ url: string; body: object }> = [];
    private readonly papers = new Map<string, RawPaper>();
    private readonly citing = new Map<string, string[]>();
    private readonly cited = new Map<string, string[]>();
    private readonly aliases = new Map<string, string>();
    private readonly authors = new Map<string, Record<string, unknown>>();
    private readonly authorPapers = new Map<string, string[]>();
    private recommended: string[] = [];
    /** URLs containing any of these fail with a network error */
    readonly failing = new Set<string>();

    addPaper(
        paper: RawPaper,
        edges: { citations?: string[]; references?: string[]; aliases?: string[] } = {}
    ): this {
        this.papers.set(paper.paperId, paper);
        this.citing.set(paper.paperId, edges.citations ?? []);
        this.cited.set(paper.paperId, edges.references ?? []);
        for (const alias of edges.aliases ?? []) {
            this.aliases.set(alias, paper.paperId);
        }
        return this;
    }

    addAuthor(author: Record<string, unknown> & { authorId: string }, papers: string[]): this {
        this.authors.set(author.authorId, author);
        this.authorPapers.set(author.authorId, papers);
        return this;
    }

    setRecommendations(ids: string[]): this {
        this.recommended = ids;
        return this;
    }

    /** Replace the citing papers of `paperId` without touching its details */
    setCitations(paperId: string, citations: string[]): this {
        this.citing.set(paperId, citations);
        return this;
    }

    async fetchOne(url: string): Promise<unknown | CacheError> {
        this.requests.push(url);
        return this.route(url);
    }

    async fetchMany(urls: string[]): Promise<Array<unknown | CacheError>> {
        return Promise.all(urls.map((url) => this.fetchOne(url)));
    }

    async postOne(url: string, body: object): Promise<unknown | CacheError> {
        this.posts.push({ url, body });
        return { recommendedPapers: this.recommended.map((id) => this.payload(id)) };
    }

    requestsMatching(fragment: string): string[] {
        return this.requests.filter((url) => url.includes(fragment));
    }

    private route(url: string): unknown | CacheError {
        for (const fragment of this.failing) {
            if (url.includes(fragment)) return new CacheError('NetworkError', `Network error: ${url}`);
        }

        const parsed = new URL(url);
        const params = parsed.searchParams;
        const path = decodeURIComponent(parsed.pathname);

        if (path.startsWith('/recommendations/v1/papers/forpaper/')) {
            return { recommendedPapers: this.recommended.map((id) => this.payload(id)) };
        }

        const search = /^\/graph\/v1\/paper\/search$/.exec(path);
        if (search) {
            const query = (params.get('query') ?? '').toLowerCase();
            const hits = [...this.papers.values()].filter((paper) =>
                String(paper['title'] ?? '').toLowerCase().includes(query)
            );
            return { total: hits.length, offset: 0, data: hits };
        }

        const author = /^\/graph\/v1\/author\/([^/]+)(\/papers)?$/.exec(path);
        if (author?.[1]) {
            const record = this.authors.get(author[1]);
            if (!record) return notFound(url);
            if (author[2]) {
                return { offset: 0, data: (this.authorPapers.get(author[1]) ?? []).map((id) => this.payload(id)) };
            }
            return record;
        }

        const paper = /^\/graph\/v1\/paper\/(.+?)(?:\/(citations|references))?$/.exec(path);
        if (!paper?.[1]) return notFound(url);
        const key = this.aliases.get(paper[1]) ?? paper[1];
        const details = this.papers.get(key);
        if (!details) return notFound(url);

        if (paper[2] === undefined) return details;

        const ids = (paper[2] === 'citations' ? this.citing.get(key) : this.cited.get(key)) ?? [];
        const offset = Number(params.get('offset') ?? '0');
        const limit = Number(params.get('limit') ?? '100');
        const side = paper[2] === 'citations' ? 'citingPaper' : 'citedPaper';
        const data = ids.slice(offset, offset + limit).map((id) => ({
            [side]: this.payload(id),
            contexts: [],
            intents: [],
            isInfluential: false,
        }));
        const end = offset + data.length;
        return end < ids.length ? { offset, next: end, data } : { offset, data };
    }

    private payload(id: string): RawPaper {
        return this.papers.get(id) ?? { paperId: id, title: `Paper ${id}` };
    }
}

function notFound(url: string): CacheError {
    return new CacheError('NetworkError', `HTTP 404: Not Found ${url}`);
}
