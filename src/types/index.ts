/**
 * Barrel export for all shared types.
 */
export type {
    ExternalIds,
    Author,
    OpenAccessPdf,
    FieldOfStudy,
    PaperDetails,
    Citation,
    Reference,
    EdgeList,
    Citations,
    References,
    PaperData,
    PaperView,
    AuthorDetails,
    AuthorPapers,
    SearchResult,
} from './paper.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    CacheConfig,
    BackendName,
    LogLevel,
    EndpointLimit,
    DataLimits,
    RetryConfig,
} from './config.js';
export type {
    MetadataEntry,
    StoredMetadata,
    RecordStore,
} from './store.js';
