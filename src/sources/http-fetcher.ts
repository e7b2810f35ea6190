import { CacheError } from '../utils/errors.js';
import { HttpError, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import type { RemoteFetcher } from './remote.js';

/**
 * `RemoteFetcher` over the shared rate-limited `HttpClient`.
 * Transport errors are converted to `CacheError` here.
 */
export class HttpFetcher implements RemoteFetcher {
    private readonly logger = getLogger();

    constructor(
        private readonly client: HttpClient,
        private readonly options: { apiKey?: string; timeout?: number } = {}
    ) {}

    async fetchOne(url: string): Promise<unknown | CacheError> {
        this.logger.debug({ url }, 'GET');
        try {
            const response = await this.client.get(url, {
                headers: this.buildHeaders(),
                timeout: this.options.timeout,
            });
            return response.data;
        } catch (error) {
            return this.toCacheError(url, error);
        }
    }

    async fetchMany(urls: string[]): Promise<Array<unknown | CacheError>> {
        return Promise.all(urls.map((url) => this.fetchOne(url)));
    }

    async postOne(url: string, body: object): Promise<unknown | CacheError> {
        this.logger.debug({ url }, 'POST');
        try {
            const response = await this.client.post(url, body, {
                headers: this.buildHeaders(),
                timeout: this.options.timeout,
            });
            return response.data;
        } catch (error) {
            return this.toCacheError(url, error);
        }
    }

    private buildHeaders(): Record<string, string> {
        return this.options.apiKey ? { 'x-api-key': this.options.apiKey } : {};
    }

    private toCacheError(url: string, error: unknown): CacheError {
        if (error instanceof HttpError) {
            this.logger.debug({ url, status: error.status, timedOut: error.timedOut }, 'Request failed');
            return new CacheError(
                error.timedOut ? 'NetworkTimeout' : 'NetworkError',
                error.message,
                error.response
            );
        }
        const message = error instanceof Error ? error.message : String(error);
        return new CacheError('NetworkError', message);
    }
}
