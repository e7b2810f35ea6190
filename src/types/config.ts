/**
 * Log level options.
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

/**
 * Storage backend options.
 */
export type BackendName = 'jsonl' | 'sqlite';

/**
 * Per-endpoint request limit.
 */
export interface EndpointLimit {
    limit: number;
}

/**
 * Default page sizes for each kind of remote request.
 */
export interface DataLimits {
    search: EndpointLimit;
    details: EndpointLimit;
    citations: EndpointLimit;
    references: EndpointLimit;
    author: EndpointLimit;
    authorPapers: EndpointLimit;
}

/**
 * Retry policy for batched fetches that come back empty.
 */
export interface RetryConfig {
    maxAttempts: number;
    minBackoffMs: number;
    maxBackoffMs: number;
}

/**
 * Full configuration merged from overrides, environment variables and config file.
 */
export interface CacheConfig {
    /** Directory holding the record store; must exist */
    cacheDir: string;
    backend: BackendName;

    /** Sent as `x-api-key`; raises the request rate */
    apiKey?: string;

    /** Number of URLs fetched concurrently by the batching helpers */
    batchSize: number;

    /** Per-request timeout in milliseconds */
    clientTimeout: number;

    /** Directory of the sharded offline citation index (optional) */
    corpusCacheDir?: string;

    /** Allowed gap between cached citations and the reported citation count */
    tolerance: number;

    /** How many index shards are kept in memory at once */
    maxLoadedShards: number;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    retry: RetryConfig;
    data: DataLimits;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: Omit<CacheConfig, 'cacheDir'> = {
    backend: 'sqlite',
    batchSize: 50,
    clientTimeout: 10000,
    tolerance: 10,
    maxLoadedShards: 4,
    logLevel: 'info',
    jsonLogs: false,
    retry: {
        maxAttempts: 5,
        minBackoffMs: 1000,
        maxBackoffMs: 5000,
    },
    data: {
        search: { limit: 10 },
        details: { limit: 100 },
        citations: { limit: 100 },
        references: { limit: 100 },
        author: { limit: 100 },
        authorPapers: { limit: 100 },
    },
};
