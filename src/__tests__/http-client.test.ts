import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { HttpFetcher } from '../sources/http-fetcher.js';
import { isCacheError } from '../utils/errors.js';
import { HttpClient, HttpError } from '../utils/http-client.js';

function jsonResponse(body: unknown, status = 200, statusText = 'OK'): Response {
    return new Response(JSON.stringify(body), {
        status,
        statusText,
        headers: { 'content-type': 'application/json' },
    });
}

/** A fetch that never answers and rejects once its signal aborts */
function hangingFetch(_url: string, init?: RequestInit): Promise<Response> {
    return new Promise((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new DOMException('The operation was aborted.', 'AbortError')));
    });
}

describe('HttpClient', () => {
    let client: HttpClient;

    beforeEach(() => {
        client = new HttpClient({ timeout: 5000, requestsPerSecond: 100, initialBackoffMs: 0, maxRetries: 2 });
    });

    afterEach(() => {
        vi.unstubAllGlobals();
        vi.restoreAllMocks();
    });

    describe('HttpError', () => {
        it('should create error with status and retryable flag', () => {
            const error = new HttpError('Not Found', 404, false);
            expect(error.message).toBe('Not Found');
            expect(error.status).toBe(404);
            expect(error.retryable).toBe(false);
            expect(error.timedOut).toBe(false);
            expect(error.name).toBe('HttpError');
        });

        it('should include response data', () => {
            const responseData = { error: 'bad request' };
            const error = new HttpError('Bad Request', 400, false, responseData);
            expect(error.response).toEqual(responseData);
        });
    });

    describe('request', () => {
        it('should parse JSON bodies and count requests', async () => {
            const mockFetch = vi.fn((_url: string, _init?: RequestInit) => Promise.resolve(jsonResponse({ paperId: 'abc' })));
            vi.stubGlobal('fetch', mockFetch);

            const response = await client.get('https://api.example.com/paper/abc');
            expect(response.data).toEqual({ paperId: 'abc' });
            expect(response.status).toBe(200);
            expect(client.getRequestCount()).toBe(1);

            client.resetCounts();
            expect(client.getRequestCount()).toBe(0);
        });

        it('should return text bodies as strings', async () => {
            vi.stubGlobal(
                'fetch',
                vi.fn(() => Promise.resolve(new Response('plain', { headers: { 'content-type': 'text/plain' } })))
            );

            const response = await client.get('https://api.example.com/text');
            expect(response.data).toBe('plain');
        });

        it('should send JSON bodies with the user agent', async () => {
            const mockFetch = vi.fn((_url: string, _init?: RequestInit) => Promise.resolve(jsonResponse({})));
            vi.stubGlobal('fetch', mockFetch);

            await client.post('https://api.example.com/papers', { ids: ['a'] }, { headers: { 'x-api-key': 'test-secret' } });

            expect(mockFetch).toHaveBeenCalledWith(
                'https://api.example.com/papers',
                expect.objectContaining({
                    method: 'POST',
                    body: '{"ids":["a"]}',
                    headers: {
                        'User-Agent': 'citecache/0.3.0',
                        'x-api-key': 'test-secret',
                        'Content-Type': 'application/json',
                    },
                })
            );
        });

        it('should retry retryable statuses', async () => {
            const mockFetch = vi
                .fn((_url: string, _init?: RequestInit) => Promise.resolve(jsonResponse({ ok: true })))
                .mockImplementationOnce(() => Promise.resolve(jsonResponse({}, 503, 'Service Unavailable')));
            vi.stubGlobal('fetch', mockFetch);

            const response = await client.get('https://api.example.com/flaky');
            expect(response.data).toEqual({ ok: true });
            expect(mockFetch).toHaveBeenCalledTimes(2);
            expect(client.getRequestCount()).toBe(1);
        });

        it('should give up after the last retry', async () => {
            const mockFetch = vi.fn(() => Promise.resolve(jsonResponse({}, 503, 'Service Unavailable')));
            vi.stubGlobal('fetch', mockFetch);

            await expect(client.get('https://api.example.com/down')).rejects.toMatchObject({
                message: 'HTTP 503: Service Unavailable',
                status: 503,
                retryable: true,
            });
            expect(mockFetch).toHaveBeenCalledTimes(3);
        });

        it('should not retry client errors', async () => {
            const mockFetch = vi.fn(() => Promise.resolve(jsonResponse({ error: 'Paper not found' }, 404, 'Not Found')));
            vi.stubGlobal('fetch', mockFetch);

            await expect(client.get('https://api.example.com/missing')).rejects.toMatchObject({
                status: 404,
                retryable: false,
                response: { error: 'Paper not found' },
            });
            expect(mockFetch).toHaveBeenCalledTimes(1);
        });

        it('should report timeouts', async () => {
            const quick = new HttpClient({ timeout: 20, requestsPerSecond: 100, maxRetries: 0 });
            vi.stubGlobal('fetch', vi.fn(hangingFetch));

            await expect(quick.get('https://api.example.com/slow')).rejects.toMatchObject({
                status: 0,
                timedOut: true,
            });
        });
    });

    describe('rate limiting', () => {
        it('should throttle requests beyond the burst size', async () => {
            const limited = new HttpClient({ requestsPerSecond: 2 });
            vi.stubGlobal('fetch', vi.fn(() => Promise.resolve(jsonResponse({ data: 'ok' }))));

            const start = Date.now();
            await Promise.all([
                limited.get('https://api.example.com/1'),
                limited.get('https://api.example.com/2'),
                limited.get('https://api.example.com/3'),
            ]);
            const elapsed = Date.now() - start;

            // Two tokens are available at once; the third waits half a second
            expect(elapsed).toBeGreaterThanOrEqual(450);
            expect(limited.getRequestCount()).toBe(3);
        });
    });
});

describe('HttpFetcher', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('should return parsed bodies and send the API key', async () => {
        const mockFetch = vi.fn((_url: string, _init?: RequestInit) => Promise.resolve(jsonResponse({ paperId: 'abc' })));
        vi.stubGlobal('fetch', mockFetch);
        const fetcher = new HttpFetcher(new HttpClient({ requestsPerSecond: 100 }), { apiKey: 'test-secret' });

        expect(await fetcher.fetchOne('https://api.example.com/paper/abc')).toEqual({ paperId: 'abc' });
        expect(mockFetch.mock.calls[0]?.[1]?.headers).toEqual({
            'User-Agent': 'citecache/0.3.0',
            'x-api-key': 'test-secret',
        });
    });

    it('should keep the order of concurrent fetches', async () => {
        vi.stubGlobal(
            'fetch',
            vi.fn((url: string) => Promise.resolve(jsonResponse({ url })))
        );
        const fetcher = new HttpFetcher(new HttpClient({ requestsPerSecond: 100 }));

        const results = await fetcher.fetchMany(['https://api.example.com/a', 'https://api.example.com/b']);
        expect(results).toEqual([{ url: 'https://api.example.com/a' }, { url: 'https://api.example.com/b' }]);
    });

    it('should turn HTTP failures into cache errors', async () => {
        vi.stubGlobal(
            'fetch',
            vi.fn(() => Promise.resolve(jsonResponse({ error: 'Paper not found' }, 404, 'Not Found')))
        );
        const fetcher = new HttpFetcher(new HttpClient({ requestsPerSecond: 100 }));

        const result = await fetcher.fetchOne('https://api.example.com/paper/missing');
        expect(isCacheError(result)).toBe(true);
        expect(isCacheError(result) && result.toJSON()).toEqual({
            kind: 'NetworkError',
            message: 'HTTP 404: Not Found',
            payload: { error: 'Paper not found' },
        });
    });

    it('should turn timeouts into timeout errors', async () => {
        vi.stubGlobal('fetch', vi.fn(hangingFetch));
        const fetcher = new HttpFetcher(new HttpClient({ requestsPerSecond: 100, maxRetries: 0 }), { timeout: 20 });

        const result = await fetcher.postOne('https://api.example.com/papers', { ids: [] });
        expect(isCacheError(result) && result.kind).toBe('NetworkTimeout');
    });
});
