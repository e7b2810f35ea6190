import fs from 'node:fs';
import { CorpusCitationIndex } from '../corpus/corpus-index.js';
import { OverflowCitationBuilder, type BatchFetchResult } from '../corpus/overflow-builder.js';
import { applyFilters, type CitationFilters } from '../filters/filters.js';
import {
    classifyIdKind,
    isDirectlyFetchable,
    normalizeIdValue,
    remoteId,
} from '../identifiers/id-registry.js';
import { entriesEqual } from '../metadata/entry.js';
import type { MetadataIndex } from '../metadata/metadata-index.js';
import {
    batchWindows,
    dedupe,
    ENUMERATION_CEILING,
    mergeCitations,
    mergeReferences,
} from '../merge/edge-merge.js';
import { HttpFetcher } from '../sources/http-fetcher.js';
import type { RemoteFetcher } from '../sources/remote.js';
import {
    parseAuthorDetails,
    parseAuthorPapers,
    parseCitationsPage,
    parsePaperDetails,
    parseRecommendations,
    parseReferencesPage,
    parseSearchResult,
} from '../sources/schema.js';
import { S2Urls } from '../sources/urls.js';
import { createRecordStore } from '../storage/record-store.js';
import type {
    AuthorDetails,
    AuthorPapers,
    CacheConfig,
    Citation,
    EdgeList,
    PaperData,
    PaperDetails,
    PaperView,
    RecordStore,
    Reference,
    SearchResult,
} from '../types/index.js';
import { CacheError, isCacheError } from '../utils/errors.js';
import { createHttpClient, sleep } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { CacheSession } from './session.js';

export interface ScholarCacheDeps {
    store: RecordStore;
    remote: RemoteFetcher;
    corpusIndex?: CorpusCitationIndex | null;
}

export interface FetchOptions {
    /** Go to the remote service even when the record is cached */
    force?: boolean;
    /** With `force`, replace the stored record instead of merging into it */
    discardExisting?: boolean;
}

/**
 * How one direction of the citation graph is read, written and fetched.
 */
interface EdgeSide<E> {
    readonly name: 'citations' | 'references';
    get(data: PaperData): EdgeList<E>;
    set(data: PaperData, list: EdgeList<E>): PaperData;
    reportedCount(details: PaperDetails): number;
    counterpart(entry: E): PaperDetails;
    merge(existing: EdgeList<E>, incoming: EdgeList<E>): EdgeList<E>;
    parse(raw: unknown): EdgeList<E> | CacheError;
    url(urls: S2Urls, key: string, limit: number, offset?: number): string;
}

const CITATIONS: EdgeSide<Citation> = {
    name: 'citations',
    get: (data) => data.citations,
    set: (data, citations) => ({ ...data, citations }),
    reportedCount: (details) => details.citationCount ?? 0,
    counterpart: (entry) => entry.citingPaper,
    merge: mergeCitations,
    parse: parseCitationsPage,
    url: (urls, key, limit, offset) => urls.citations(key, limit, offset),
};

const REFERENCES: EdgeSide<Reference> = {
    name: 'references',
    get: (data) => data.references,
    set: (data, references) => ({ ...data, references }),
    reportedCount: (details) => details.referenceCount ?? 0,
    counterpart: (entry) => entry.citedPaper,
    merge: mergeReferences,
    parse: parseReferencesPage,
    url: (urls, key, limit, offset) => urls.references(key, limit, offset),
};

/**
 * Raise the reported counts to at least the number of entries held.
 */
function reconcileCounts(data: PaperData): PaperData {
    const details = { ...data.details };
    if (data.citations.data.length > (details.citationCount ?? 0)) {
        details.citationCount = data.citations.data.length;
    }
    if (data.references.data.length > (details.referenceCount ?? 0)) {
        details.referenceCount = data.references.data.length;
    }
    return { ...data, details };
}

/** A copy of a held record the caller may change freely */
function withDuplicateId(data: PaperData, duplicateId: string | null): PaperData {
    const copy = structuredClone(data);
    copy.details.duplicateId = duplicateId;
    return copy;
}

function corpusIdsOf(list: EdgeList<Citation>): number[] {
    return list.data.flatMap((entry) =>
        typeof entry.citingPaper.corpusId === 'number' ? [entry.citingPaper.corpusId] : []
    );
}

/**
 * Local cache in front of the Semantic Scholar Graph API.
 *
 * Lookups by any supported id kind resolve to a canonical paper key through
 * the metadata index, are served from the record store when possible, and
 * otherwise fetched, merged into what was already stored and written back.
 * Caller-facing methods resolve to a value or a `CacheError`; they do not reject
 * for lookup failures.
 */
export class ScholarCache {
    private readonly session: CacheSession;
    private readonly remote: RemoteFetcher;
    private readonly urls: S2Urls;
    private readonly overflow: OverflowCitationBuilder | null;
    private readonly logger = getLogger();

    constructor(
        readonly config: CacheConfig,
        deps: ScholarCacheDeps
    ) {
        this.session = new CacheSession(deps.store);
        this.remote = deps.remote;
        this.urls = new S2Urls(config.data);
        this.overflow = deps.corpusIndex
            ? new OverflowCitationBuilder(deps.corpusIndex, this.urls, (urls) => this.fetchUrlsInBatches(urls))
            : null;
    }

    /**
     * Open the configured store and corpus index and talk to the remote
     * service over HTTP unless another fetcher is given.
     */
    static open(config: CacheConfig, remote?: RemoteFetcher): ScholarCache {
        const store = createRecordStore(config);
        const fetcher =
            remote ??
            new HttpFetcher(
                createHttpClient({
                    timeout: config.clientTimeout,
                    requestsPerSecond: config.apiKey ? 10 : 1,
                }),
                { apiKey: config.apiKey, timeout: config.clientTimeout }
            );

        let corpusIndex: CorpusCitationIndex | null = null;
        if (config.corpusCacheDir) {
            if (fs.existsSync(config.corpusCacheDir)) {
                corpusIndex = new CorpusCitationIndex(config.corpusCacheDir, {
                    maxLoadedShards: config.maxLoadedShards,
                });
            } else {
                getLogger().warn({ dir: config.corpusCacheDir }, 'Corpus cache directory not found, ignoring');
            }
        }

        return new ScholarCache(config, { store, remote: fetcher, corpusIndex });
    }

    private get index(): MetadataIndex {
        return this.session.index;
    }

    // ─── Records ──────────────────────────────────────────

    /**
     * The full record for an id of any supported kind.
     */
    async fetch(kindName: string, id: string | number, options: FetchOptions = {}): Promise<PaperData | CacheError> {
        const kind = classifyIdKind(kindName);
        if (isCacheError(kind)) return kind;

        const value = normalizeIdValue(kind, id);
        const resolution = this.index.resolve(kind, value);
        if (!resolution.key && !isDirectlyFetchable(kind)) {
            return new CacheError('UnsupportedDirectFetch', `${kind} ids can only be resolved once known: ${value}`, value);
        }

        if (resolution.haveMetadata && !options.force) {
            const cached = this.session.checkCache(resolution.key);
            if (cached) {
                this.logger.debug({ kind, id: value, key: resolution.key }, 'Cache hit');
                return withDuplicateId(cached, resolution.redirectedFrom);
            }
        }

        const requestedKey = resolution.key || (kind === 'SS' ? value : '');
        const remoteKey = resolution.key || remoteId(kind, value);
        const discardExisting = options.force === true && options.discardExisting === true;

        const data = await this.fetchAndStore(remoteKey, requestedKey, discardExisting);
        if (isCacheError(data)) return data;

        const duplicateId =
            resolution.redirectedFrom ?? (requestedKey && requestedKey !== data.details.paperId ? requestedKey : null);
        return withDuplicateId(data, duplicateId);
    }

    async paperData(id: string, force = false): Promise<PaperData | CacheError> {
        return this.fetch('SS', id, { force });
    }

    async paperDetails(id: string, force = false): Promise<PaperView | CacheError> {
        return this.getDetailsForId('SS', id, { force });
    }

    /**
     * Details for an id of any kind, as a view truncated to the configured
     * limits or, with `fullRecord`, as the whole record.
     */
    async getDetailsForId(
        kind: string,
        id: string | number,
        options: { force?: boolean; fullRecord: true }
    ): Promise<PaperData | CacheError>;
    async getDetailsForId(
        kind: string,
        id: string | number,
        options?: { force?: boolean; fullRecord?: false }
    ): Promise<PaperView | CacheError>;
    async getDetailsForId(
        kind: string,
        id: string | number,
        options: { force?: boolean; fullRecord?: boolean } = {}
    ): Promise<PaperData | PaperView | CacheError> {
        const data = await this.fetch(kind, id, { force: options.force });
        if (isCacheError(data)) return data;
        return options.fullRecord ? data : this.toView(data);
    }

    async idToCorpusId(kindName: string, id: string | number): Promise<number | CacheError> {
        const kind = classifyIdKind(kindName);
        if (isCacheError(kind)) return kind;

        const resolution = this.index.resolve(kind, normalizeIdValue(kind, id));
        const known = resolution.haveMetadata ? this.index.entry(resolution.key)?.CORPUSID : undefined;
        if (known) return Number(known);

        const data = await this.fetch(kind, id);
        if (isCacheError(data)) return data;
        const corpusId = data.details.corpusId;
        if (typeof corpusId !== 'number') {
            return new CacheError('NotCached', `No corpus id known for ${kind} ${String(id)}`, id);
        }
        return corpusId;
    }

    // ─── Edge windows ─────────────────────────────────────

    /**
     * Citing papers `[offset, offset + limit)`, fetching only the missing tail.
     */
    async citations(key: string, offset = 0, limit = this.config.data.citations.limit): Promise<PaperDetails[] | CacheError> {
        return this.edgeWindow(CITATIONS, key, offset, limit);
    }

    async references(key: string, offset = 0, limit = this.config.data.references.limit): Promise<PaperDetails[] | CacheError> {
        return this.edgeWindow(REFERENCES, key, offset, limit);
    }

    /**
     * Fetch the next `limit` citations after those cached. Past the
     * enumeration ceiling they come from the corpus index when one is open.
     */
    async nextCitations(key: string, limit = this.config.data.citations.limit): Promise<EdgeList<Citation> | CacheError> {
        const canonical = this.canonicalKey(key);
        const data = this.session.checkCache(canonical);
        if (!data) return new CacheError('NotCached', `No cached record for ${key}`, key);

        const offset = data.citations.data.length;
        const corpusId = data.details.corpusId;
        if (offset + limit > ENUMERATION_CEILING && this.overflow && typeof corpusId === 'number') {
            const page = await this.overflow.build({
                corpusId,
                existingCounterpartIds: corpusIdsOf(data.citations),
                totalCount: data.details.citationCount ?? 0,
                limit,
            });
            if (isCacheError(page)) return page;
            return structuredClone(this.persist(canonical, CITATIONS.set(data, mergeCitations(page, data.citations))).citations);
        }

        const next = await this.nextEdges(CITATIONS, canonical, data, limit);
        return isCacheError(next) ? next : structuredClone(next);
    }

    async nextReferences(key: string, limit = this.config.data.references.limit): Promise<EdgeList<Reference> | CacheError> {
        const canonical = this.canonicalKey(key);
        const data = this.session.checkCache(canonical);
        if (!data) return new CacheError('NotCached', `No cached record for ${key}`, key);
        const next = await this.nextEdges(REFERENCES, canonical, data, limit);
        return isCacheError(next) ? next : structuredClone(next);
    }

    /**
     * Citing papers that pass `filters`, at most `num` when non-zero. The
     * cached list is refreshed first when it drifts from the reported count.
     */
    async filterCitations(key: string, filters: CitationFilters, num = 0): Promise<PaperDetails[] | CacheError> {
        const canonical = this.canonicalKey(key);
        const cached = this.session.checkCache(canonical);
        if (!cached) return new CacheError('NotCached', `No cached record for ${key}`, key);

        let data = await this.ensureAll(CITATIONS, canonical, cached);
        const count = data.details.citationCount ?? 0;
        const corpusId = data.details.corpusId;
        if (count > ENUMERATION_CEILING && this.overflow && typeof corpusId === 'number') {
            const extra = await this.overflow.buildOnce({
                corpusId,
                existingCounterpartIds: corpusIdsOf(data.citations),
                totalCount: count,
            });
            if (isCacheError(extra)) {
                this.logger.warn({ key: canonical, error: extra.message }, 'Could not extend citations from corpus index');
            } else if (extra && extra.data.length > 0) {
                data = this.persist(canonical, CITATIONS.set(data, mergeCitations(extra, data.citations)));
            }
        }

        return structuredClone(applyFilters(data.citations.data.map(CITATIONS.counterpart), filters, num));
    }

    async filterReferences(key: string, filters: CitationFilters, num = 0): Promise<PaperDetails[] | CacheError> {
        const canonical = this.canonicalKey(key);
        const cached = this.session.checkCache(canonical);
        if (!cached) return new CacheError('NotCached', `No cached record for ${key}`, key);

        const data = await this.ensureAll(REFERENCES, canonical, cached);
        return structuredClone(applyFilters(data.references.data.map(REFERENCES.counterpart), filters, num));
    }

    // ─── Other endpoints ──────────────────────────────────

    async authorDetails(id: string): Promise<AuthorDetails | CacheError> {
        const raw = await this.remote.fetchOne(this.urls.author(id));
        if (isCacheError(raw)) return raw;
        return parseAuthorDetails(raw);
    }

    async authorPapers(id: string, limit = 0, offset?: number): Promise<AuthorPapers | CacheError> {
        const [rawAuthor, rawPapers] = await this.remote.fetchMany([
            this.urls.author(id),
            this.urls.authorPapers(id, limit, offset),
        ]);
        if (isCacheError(rawAuthor)) return rawAuthor;
        if (isCacheError(rawPapers)) return rawPapers;

        const author = parseAuthorDetails(rawAuthor);
        if (isCacheError(author)) return author;
        return parseAuthorPapers(author, rawPapers);
    }

    async search(query: string, options: { limit?: number; offset?: number } = {}): Promise<SearchResult | CacheError> {
        const raw = await this.remote.fetchOne(this.urls.search(query, options.limit, options.offset));
        if (isCacheError(raw)) return raw;
        return parseSearchResult(raw);
    }

    /**
     * Papers recommended from liked (and optionally disliked) paper keys.
     */
    async recommendations(positive: string[], negative: string[] = [], count = 10): Promise<PaperDetails[] | CacheError> {
        const [first] = positive;
        if (first === undefined) {
            return new CacheError('InvalidIdKind', 'Recommendations need at least one positive paper id', positive);
        }

        const raw =
            positive.length === 1 && negative.length === 0
                ? await this.remote.fetchOne(this.urls.recommendationsForPaper(first, count))
                : await this.remote.postOne(this.urls.recommendations(count), {
                      positivePaperIds: positive,
                      negativePaperIds: negative,
                  });
        if (isCacheError(raw)) return raw;

        const papers = parseRecommendations(raw);
        return isCacheError(papers) ? papers : papers.slice(0, count);
    }

    // ─── Administration ───────────────────────────────────

    /**
     * Delete a stored record and its metadata. Returns false if nothing was stored.
     */
    removePaper(key: string): boolean {
        const removed = this.session.store.delete(key);
        this.index.remove(key);
        this.session.forget(key);
        this.logger.info({ key, removed }, 'Removed paper');
        return removed;
    }

    /**
     * Rebuild the metadata index from the stored records. Returns the entry count.
     */
    rebuildMetadata(): number {
        const count = this.session.rebuildIndex();
        this.logger.info({ entries: count }, 'Metadata index rebuilt');
        return count;
    }

    allPapers(): string[] {
        return this.index.keys();
    }

    close(): void {
        this.session.close();
    }

    /**
     * Fetch `urls` `batchSize` at a time. A batch where every request failed
     * is retried after a random pause, up to `retry.maxAttempts` tries.
     * Results stay aligned with `urls`; failures are kept as `CacheError`s.
     */
    async fetchUrlsInBatches(urls: string[]): Promise<BatchFetchResult> {
        const { batchSize, retry } = this.config;
        const results: Array<unknown | CacheError> = [];
        let errors = 0;

        for (let start = 0; start < urls.length; start += Math.max(1, batchSize)) {
            const chunk = urls.slice(start, start + Math.max(1, batchSize));
            let batch = await this.remote.fetchMany(chunk);
            for (let attempt = 1; attempt < retry.maxAttempts && batch.every(isCacheError); attempt++) {
                const backoff = retry.minBackoffMs + Math.random() * (retry.maxBackoffMs - retry.minBackoffMs);
                this.logger.warn({ start, size: chunk.length, attempt, backoffMs: Math.round(backoff) }, 'Batch came back empty, retrying');
                await sleep(backoff);
                batch = await this.remote.fetchMany(chunk);
            }
            errors += batch.filter(isCacheError).length;
            results.push(...batch);
        }

        if (errors > 0) {
            this.logger.warn({ urls: urls.length, errors }, 'Some batched requests failed');
        }
        return { results, errors };
    }

    // ─── Internals ────────────────────────────────────────

    /**
     * Fetch details with the first page of each edge list, merge into the
     * stored record and write everything back.
     */
    private async fetchAndStore(remoteKey: string, requestedKey: string, discardExisting: boolean): Promise<PaperData | CacheError> {
        const [rawDetails, rawReferences, rawCitations] = await this.remote.fetchMany([
            this.urls.details(remoteKey),
            this.urls.references(remoteKey),
            this.urls.citations(remoteKey),
        ]);
        if (isCacheError(rawDetails)) return rawDetails;

        const details = parsePaperDetails(rawDetails);
        if (isCacheError(details)) return details;

        const key = details.paperId;
        let data: PaperData = {
            details,
            citations: this.pageOrEmpty(key, CITATIONS, rawCitations),
            references: this.pageOrEmpty(key, REFERENCES, rawReferences),
        };

        if (!discardExisting) {
            const existing = this.session.checkCache(key);
            if (existing) {
                data = {
                    details,
                    citations: mergeCitations(existing.citations, data.citations),
                    references: mergeReferences(existing.references, data.references),
                };
            }
        }

        const stored = this.persist(key, data, discardExisting);

        const previous = this.index.entry(key);
        const entry = this.index.record(details, requestedKey);
        if (!previous || !entriesEqual(previous, entry)) {
            this.session.store.appendMetadata(key, entry);
        }
        this.logger.debug({ key, requestedKey, citations: stored.citations.data.length }, 'Fetched and stored paper');
        return stored;
    }

    private pageOrEmpty<E>(key: string, side: EdgeSide<E>, raw: unknown): EdgeList<E> {
        const page = isCacheError(raw) ? raw : side.parse(raw);
        if (!isCacheError(page)) return { ...page, data: dedupe(page.data, side.counterpart) };
        this.logger.warn({ key, edges: side.name, error: page.message }, 'First page unavailable, keeping an empty list');
        return { offset: 0, data: [] };
    }

    /**
     * The key a stored record lives under, following known duplicates and
     * corpus-id groups.
     */
    private canonicalKey(key: string): string {
        return this.index.resolve('SS', key).key || key;
    }

    private persist(key: string, data: PaperData, discardExisting = false): PaperData {
        const reconciled = reconcileCounts(data);
        this.session.save(key, reconciled, discardExisting);
        return reconciled;
    }

    private toView(data: PaperData): PaperView {
        return {
            ...data.details,
            citations: data.citations.data.slice(0, this.config.data.citations.limit).map(CITATIONS.counterpart),
            references: data.references.data.slice(0, this.config.data.references.limit).map(REFERENCES.counterpart),
        };
    }

    private async edgeWindow<E>(side: EdgeSide<E>, key: string, offset: number, limit: number): Promise<PaperDetails[] | CacheError> {
        const data = await this.fetch('SS', key);
        if (isCacheError(data)) return data;

        const canonical = data.details.paperId;
        const total = side.reportedCount(data.details);
        const count = Math.max(0, Math.min(limit, total - offset));
        if (count === 0) return [];

        let entries = side.get(data).data;
        if (offset + count > entries.length) {
            const cached = this.session.checkCache(canonical);
            if (!cached) return new CacheError('NotCached', `No cached record for ${key}`, key);
            const extended = await this.nextEdges(side, canonical, cached, offset + count - entries.length);
            if (isCacheError(extended)) return extended;
            entries = extended.data;
        }
        return structuredClone(entries.slice(offset, offset + count).map((entry) => side.counterpart(entry)));
    }

    /**
     * One GET for the page after the cached entries, merged behind them.
     */
    private async nextEdges<E>(side: EdgeSide<E>, key: string, data: PaperData, limit: number): Promise<EdgeList<E> | CacheError> {
        const cached = side.get(data);
        const offset = cached.data.length;
        const capped = Math.min(limit, ENUMERATION_CEILING - 1 - offset);
        if (capped <= 0) {
            this.logger.warn({ key, edges: side.name, offset }, 'Cannot page past the enumeration ceiling');
            return cached;
        }

        const raw = await this.remote.fetchOne(side.url(this.urls, key, capped, offset));
        if (isCacheError(raw)) return raw;
        const page = side.parse(raw);
        if (isCacheError(page)) return page;

        // The cached list stays the head so positions already handed out hold
        const merged = side.merge(page, cached);
        return side.get(this.persist(key, side.set(data, merged)));
    }

    /**
     * Refetch every enumerable page when the cached list is off from the
     * reported count by more than the tolerance.
     */
    private async ensureAll<E>(side: EdgeSide<E>, key: string, data: PaperData): Promise<PaperData> {
        const cached = side.get(data);
        const count = side.reportedCount(data.details);
        if (Math.abs(count - cached.data.length) <= this.config.tolerance) return data;

        const windows = batchWindows(count, this.config.data[side.name].limit, ENUMERATION_CEILING);
        const urls = windows.map((window) => side.url(this.urls, key, window.limit, window.offset));
        const { results, errors } = await this.fetchUrlsInBatches(urls);

        const fresh: EdgeList<E> = { offset: 0, data: [], next: null };
        for (const raw of results) {
            if (isCacheError(raw)) continue;
            const page = side.parse(raw);
            if (isCacheError(page)) {
                this.logger.debug({ key, error: page.message }, 'Skipping unparseable page');
                continue;
            }
            fresh.data.push(...page.data);
            fresh.next = page.next ?? null;
        }
        this.logger.info(
            { key, edges: side.name, count, cached: cached.data.length, fetched: fresh.data.length, errors },
            'Refreshed edge list'
        );

        return this.persist(key, side.set(data, side.merge(cached, fresh)));
    }
}
