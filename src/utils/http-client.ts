import { getLogger } from './logger.js';

/**
 * Error classification for HTTP responses.
 */
const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);
const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

/**
 * Token bucket rate limiter.
 * Allows `tokensPerSecond` requests per second with burst capacity.
 */
class TokenBucket {
    private tokens: number;
    private lastRefill: number;

    constructor(
        private readonly tokensPerSecond: number,
        private readonly maxTokens: number
    ) {
        this.tokens = maxTokens;
        this.lastRefill = Date.now();
    }

    async acquire(): Promise<void> {
        this.refill();

        if (this.tokens >= 1) {
            this.tokens -= 1;
            return;
        }

        // Wait until a token is available
        const waitMs = ((1 - this.tokens) / this.tokensPerSecond) * 1000;
        await sleep(waitMs);
        this.refill();
        this.tokens -= 1;
    }

    private refill(): void {
        const now = Date.now();
        const elapsed = (now - this.lastRefill) / 1000;
        this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.tokensPerSecond);
        this.lastRefill = now;
    }
}

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    method?: 'GET' | 'POST';
    headers?: Record<string, string>;
    body?: string | object;
    timeout?: number;
}

/**
 * HTTP response wrapper.
 */
export interface HttpResponse {
    status: number;
    headers: Record<string, string>;
    data: unknown;
    ok: boolean;
}

/**
 * HTTP error with classification.
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly response?: unknown,
        public readonly timedOut: boolean = false
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

export interface HttpClientOptions {
    /** Default per-request timeout in milliseconds */
    timeout?: number;
    version?: string;
    /** Sustained request rate; also the burst size */
    requestsPerSecond?: number;
    /** Retries after the first attempt for retryable failures */
    maxRetries?: number;
    initialBackoffMs?: number;
    maxBackoffMs?: number;
}

/**
 * The Graph API allows one request per second without a key.
 */
const DEFAULT_REQUESTS_PER_SECOND = 1;

/**
 * Centralized HTTP client with rate limiting and retry logic.
 */
export class HttpClient {
    private readonly bucket: TokenBucket;
    private requestCount = 0;
    private readonly defaultTimeout: number;
    private readonly userAgent: string;
    private readonly maxRetries: number;
    private readonly initialBackoff: number;
    private readonly maxBackoff: number;
    private readonly logger = getLogger();

    constructor(options?: HttpClientOptions) {
        this.defaultTimeout = options?.timeout ?? 10000;
        const version = options?.version ?? '0.3.0';
        this.userAgent = `citecache/${version}`;
        const rate = options?.requestsPerSecond ?? DEFAULT_REQUESTS_PER_SECOND;
        this.bucket = new TokenBucket(rate, Math.max(1, rate));
        this.maxRetries = options?.maxRetries ?? 3;
        this.initialBackoff = options?.initialBackoffMs ?? 1000;
        this.maxBackoff = options?.maxBackoffMs ?? 30000;
    }

    /**
     * Make an HTTP request with rate limiting and retry.
     */
    async request(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
        const { method = 'GET', headers = {}, body, timeout = this.defaultTimeout } = options;

        // Acquire rate limit token
        await this.bucket.acquire();
        this.requestCount += 1;

        const requestHeaders: Record<string, string> = {
            'User-Agent': this.userAgent,
            ...headers,
        };

        let requestBody: string | undefined;
        if (body) {
            if (typeof body === 'object') {
                requestBody = JSON.stringify(body);
                requestHeaders['Content-Type'] = requestHeaders['Content-Type'] ?? 'application/json';
            } else {
                requestBody = body;
            }
        }

        for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
            const controller = new AbortController();
            const timeoutId = setTimeout(() => controller.abort(), timeout);
            try {
                const response = await fetch(url, {
                    method,
                    headers: requestHeaders,
                    body: requestBody,
                    signal: controller.signal,
                });

                // Parse response
                const contentType = response.headers.get('content-type') ?? '';
                const data: unknown = contentType.includes('application/json')
                    ? await response.json()
                    : await response.text();

                const responseHeaders: Record<string, string> = {};
                response.headers.forEach((value, key) => {
                    responseHeaders[key] = value;
                });

                if (!response.ok) {
                    const retryable = RETRYABLE_STATUS_CODES.has(response.status);

                    if (retryable && attempt < this.maxRetries) {
                        const retryAfter = this.parseRetryAfter(response.headers.get('retry-after'));
                        const backoff = retryAfter ?? this.calculateBackoff(attempt);

                        this.logger.warn(
                            { status: response.status, attempt: attempt + 1, backoffMs: backoff, url },
                            'Retryable HTTP error, backing off'
                        );
                        await sleep(backoff);
                        continue;
                    }

                    throw new HttpError(
                        `HTTP ${response.status}: ${response.statusText}`,
                        response.status,
                        retryable,
                        data
                    );
                }

                return { status: response.status, headers: responseHeaders, data, ok: true };
            } catch (error) {
                if (error instanceof HttpError) throw error;

                const code = errorCode(error);
                const timedOut = error instanceof Error && error.name === 'AbortError';
                const retryable = timedOut || (code !== undefined && RETRYABLE_ERROR_CODES.has(code));

                if (retryable && attempt < this.maxRetries) {
                    const backoff = this.calculateBackoff(attempt);
                    this.logger.warn(
                        { errorCode: code, timedOut, attempt: attempt + 1, backoffMs: backoff, url },
                        'Retryable network error, backing off'
                    );
                    await sleep(backoff);
                    continue;
                }

                if (timedOut) {
                    throw new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0, true, undefined, true);
                }

                throw new HttpError(
                    `Network error: ${error instanceof Error ? error.message : String(error)}`,
                    0,
                    retryable
                );
            } finally {
                clearTimeout(timeoutId);
            }
        }

        throw new HttpError(`Max retries exceeded for ${url}`, 0, false);
    }

    /**
     * Convenience method for GET requests.
     */
    async get(url: string, options?: Omit<HttpRequestOptions, 'method'>): Promise<HttpResponse> {
        return this.request(url, { ...options, method: 'GET' });
    }

    /**
     * Convenience method for POST requests.
     */
    async post(url: string, body: object, options?: Omit<HttpRequestOptions, 'method' | 'body'>): Promise<HttpResponse> {
        return this.request(url, { ...options, method: 'POST', body });
    }

    /**
     * Number of requests issued (retries not counted).
     */
    getRequestCount(): number {
        return this.requestCount;
    }

    resetCounts(): void {
        this.requestCount = 0;
    }

    private parseRetryAfter(header: string | null): number | null {
        if (!header) return null;

        // Try parsing as seconds
        const seconds = parseInt(header, 10);
        if (!isNaN(seconds)) return seconds * 1000;

        // Try parsing as HTTP date
        const date = new Date(header);
        if (!isNaN(date.getTime())) {
            return Math.max(0, date.getTime() - Date.now());
        }

        return null;
    }

    private calculateBackoff(attempt: number): number {
        // Exponential backoff with jitter
        const exponential = this.initialBackoff * Math.pow(2, attempt);
        const jitter = Math.random() * exponential * 0.5;
        return Math.min(this.maxBackoff, exponential + jitter);
    }
}

/**
 * System error code of a failed fetch, which undici puts on `cause`.
 */
function errorCode(error: unknown): string | undefined {
    if (!(error instanceof Error)) return undefined;
    for (const candidate of [error, error.cause]) {
        if (typeof candidate === 'object' && candidate !== null && 'code' in candidate && typeof candidate.code === 'string') {
            return candidate.code;
        }
    }
    return undefined;
}

/**
 * Sleep for the specified number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Create a new HTTP client (for testing or custom configuration).
 */
export function createHttpClient(options?: HttpClientOptions): HttpClient {
    return new HttpClient(options);
}
