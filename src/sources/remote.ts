import type { CacheError } from '../utils/errors.js';

/**
 * Remote collaborator consulted by the cache. Every call resolves to the
 * parsed JSON body or a `CacheError`; none of them reject.
 */
export interface RemoteFetcher {
    fetchOne(url: string): Promise<unknown | CacheError>;

    /** Concurrent fetch; results keep the order of `urls` */
    fetchMany(urls: string[]): Promise<Array<unknown | CacheError>>;

    postOne(url: string, body: object): Promise<unknown | CacheError>;
}
