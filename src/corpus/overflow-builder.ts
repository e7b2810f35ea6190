import { remoteId } from '../identifiers/id-registry.js';
import { parsePaperDetails } from '../sources/schema.js';
import type { S2Urls } from '../sources/urls.js';
import type { Citation, Citations } from '../types/index.js';
import { CacheError, isCacheError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import type { CorpusCitationIndex } from './corpus-index.js';

/**
 * Results of fetching a list of URLs in batches, aligned with the input.
 */
export interface BatchFetchResult {
    results: Array<unknown | CacheError>;
    errors: number;
}

export type BatchFetch = (urls: string[]) => Promise<BatchFetchResult>;

export interface OverflowRequest {
    corpusId: number;
    /** Corpus ids of the citing papers already held */
    existingCounterpartIds: Iterable<number>;
    /** Citation count the remote service reports */
    totalCount: number;
    offset?: number;
    /** 0 fetches every remaining id */
    limit?: number;
}

/**
 * Builds citation entries past the enumeration ceiling from the offline
 * corpus index: the citing ids the index knows about that are not cached yet
 * are fetched one by one as details.
 */
export class OverflowCitationBuilder {
    private readonly attempted = new Set<number>();
    private readonly logger = getLogger();

    constructor(
        private readonly index: CorpusCitationIndex,
        private readonly urls: S2Urls,
        private readonly fetchInBatches: BatchFetch
    ) {}

    async build(request: OverflowRequest): Promise<Citations | CacheError> {
        const { corpusId, totalCount, offset = 0, limit = 0 } = request;
        const citing = this.index.getCitations(corpusId);
        if (citing === null) {
            return new CacheError('NotCached', `Corpus index has no citations for ${corpusId}`, corpusId);
        }

        const existing = new Set(request.existingCounterpartIds);
        existing.delete(-1);
        const fetchable = [...citing].filter((id) => !existing.has(id)).sort((a, b) => a - b);

        const gap = totalCount - fetchable.length - existing.size;
        if (gap !== 0) {
            this.logger.warn(
                { corpusId, totalCount, fetchable: fetchable.length, existing: existing.size, gap },
                'Corpus index and citation count disagree'
            );
        }

        const window = fetchable.slice(offset, limit > 0 ? offset + limit : undefined);
        if (window.length === 0) {
            return { offset: 0, data: [] };
        }

        const urls = window.map((id) => this.urls.details(remoteId('CORPUSID', String(id))));
        const { results, errors } = await this.fetchInBatches(urls);

        const data: Citation[] = [];
        for (const raw of results) {
            if (isCacheError(raw)) continue;
            const details = parsePaperDetails(raw);
            if (isCacheError(details)) {
                this.logger.debug({ error: details.message }, 'Dropping unparseable citing paper');
                continue;
            }
            data.push({ citingPaper: details, contexts: [], intents: [] });
        }

        this.logger.info(
            { corpusId, requested: window.length, fetched: data.length, errors },
            'Built citations from corpus index'
        );
        return { offset: 0, data };
    }

    /**
     * Like `build`, but at most once per corpus id for the lifetime of the
     * builder. Returns null when the id was already attempted.
     */
    async buildOnce(request: OverflowRequest): Promise<Citations | CacheError | null> {
        if (this.attempted.has(request.corpusId)) return null;
        this.attempted.add(request.corpusId);
        return this.build(request);
    }
}
