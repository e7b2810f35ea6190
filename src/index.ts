export { ScholarCache, type FetchOptions, type ScholarCacheDeps } from './client/scholar-cache.js';
export { CacheSession } from './client/session.js';
export { CorpusCitationIndex } from './corpus/corpus-index.js';
export { OverflowCitationBuilder, type BatchFetch, type BatchFetchResult, type OverflowRequest } from './corpus/overflow-builder.js';
export { applyFilters, compileFilters, parseFilters, type CitationFilters, type CountRange } from './filters/filters.js';
export {
    EXTERNAL_ID_KINDS,
    classifyIdKind,
    isDirectlyFetchable,
    normalizeIdValue,
    prefixFor,
    remoteId,
    type ExternalIdKind,
    type IdKind,
} from './identifiers/id-registry.js';
export { MetadataIndex, type DuplicateListener, type Resolution } from './metadata/metadata-index.js';
export { ENUMERATION_CEILING, batchWindows, mergeCitations, mergeEdgeLists, mergeReferences } from './merge/edge-merge.js';
export { HttpFetcher } from './sources/http-fetcher.js';
export type { RemoteFetcher } from './sources/remote.js';
export { S2Urls } from './sources/urls.js';
export { JsonlRecordStore } from './storage/jsonl-store.js';
export { createRecordStore } from './storage/record-store.js';
export { SqliteRecordStore } from './storage/sqlite-store.js';
export * from './types/index.js';
export { resolveConfig, type ConfigOverrides } from './utils/config.js';
export { CacheError, isCacheError, type CacheErrorKind } from './utils/errors.js';
export { HttpClient, HttpError, createHttpClient } from './utils/http-client.js';
export { getLogger, initLogger } from './utils/logger.js';
