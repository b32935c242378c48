import type { ByteFetcher, FetchBytesOptions } from '../types/index.js';
import { getLogger } from './logger.js';

const logger = getLogger();

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

    async acquire(signal?: AbortSignal): Promise<void> {
        this.refill();

        if (this.tokens >= 1) {
            this.tokens -= 1;
            return;
        }

        // Reserve the token now so concurrent callers queue behind each other
        const waitMs = ((1 - this.tokens) / this.tokensPerSecond) * 1000;
        this.tokens -= 1;
        try {
            await sleep(waitMs, signal);
        } catch (error) {
            // Give the reservation back to the queue
            this.tokens += 1;
            throw error;
        }
    }

    private refill(): void {
        const now = Date.now();
        const elapsed = (now - this.lastRefill) / 1000;
        this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.tokensPerSecond);
        this.lastRefill = now;
    }
}

export interface RateLimit {
    tokensPerSecond: number;
    maxBurst: number;
}

/**
 * Per-source rate limit configurations.
 */
const RATE_LIMITS: Record<string, RateLimit> = {
    arxiv: { tokensPerSecond: 1 / 3, maxBurst: 1 },   // arXiv asks for one request every 3 s
    s2: { tokensPerSecond: 1, maxBurst: 1 },           // 1/s public tier
    pdf: { tokensPerSecond: 5, maxBurst: 5 },
    default: { tokensPerSecond: 5, maxBurst: 5 },
};

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    method?: 'GET' | 'POST';
    headers?: Record<string, string>;
    body?: string | object;
    timeout?: number;
    source?: string;  // For per-source rate limiting
    signal?: AbortSignal;
    responseType?: 'auto' | 'bytes';
}

/**
 * HTTP response wrapper.
 */
export interface HttpResponse<T = unknown> {
    status: number;
    headers: Record<string, string>;
    data: T;
    ok: boolean;
}

/**
 * HTTP error with classification.
 * Status 0 means no response (network failure, timeout or cancellation).
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly response?: unknown,
        public readonly timedOut = false
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

export interface HttpClientOptions {
    timeout?: number;
    version?: string;
    email?: string;
    maxRetries?: number;
    initialBackoffMs?: number;
    rateLimits?: Record<string, RateLimit>;
}

/**
 * Centralized HTTP client with per-source rate limiting and retry logic.
 */
export class HttpClient implements ByteFetcher {
    private buckets = new Map<string, TokenBucket>();
    private requestCounts = new Map<string, number>();
    private readonly defaultTimeout: number;
    private readonly userAgent: string;
    private readonly maxRetries: number;
    private readonly initialBackoff: number;
    private readonly rateLimits: Record<string, RateLimit>;

    constructor(options?: HttpClientOptions) {
        this.defaultTimeout = options?.timeout ?? 30000;
        const version = options?.version ?? '1.0.0';
        const email = options?.email ?? 'relwork@example.com';
        this.userAgent = `relwork/${version} (mailto:${email})`;
        this.maxRetries = options?.maxRetries ?? 3;
        this.initialBackoff = options?.initialBackoffMs ?? 1000;
        this.rateLimits = { ...RATE_LIMITS, ...options?.rateLimits };
    }

    /**
     * Make an HTTP request with rate limiting and retry.
     */
    async request<T = unknown>(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse<T>> {
        const raw = await this.send(url, options);
        return { ...raw, data: raw.data as T };
    }

    /**
     * Convenience method for GET requests.
     */
    async get<T = unknown>(url: string, options?: Omit<HttpRequestOptions, 'method'>): Promise<HttpResponse<T>> {
        return this.request<T>(url, { ...options, method: 'GET' });
    }

    /**
     * GET a text body regardless of content type.
     */
    async getText(url: string, options?: Omit<HttpRequestOptions, 'method' | 'responseType'>): Promise<string> {
        const response = await this.send(url, { ...options, method: 'GET' });
        if (typeof response.data === 'string') return response.data;
        if (response.data instanceof Uint8Array) return new TextDecoder().decode(response.data);
        return JSON.stringify(response.data);
    }

    /**
     * Download raw bytes under a bounded timeout.
     */
    async fetchBytes(url: string, options: FetchBytesOptions): Promise<Uint8Array> {
        const response = await this.send(url, {
            method: 'GET',
            timeout: options.timeoutMs,
            signal: options.signal,
            source: 'pdf',
            responseType: 'bytes',
        });
        if (response.data instanceof Uint8Array) return response.data;
        throw new HttpError(`Expected binary body from ${url}`, response.status, false);
    }

    /**
     * Get all request counts.
     */
    getAllRequestCounts(): Record<string, number> {
        return Object.fromEntries(this.requestCounts.entries());
    }

    /**
     * Reset request counts.
     */
    resetCounts(): void {
        this.requestCounts.clear();
    }

    /**
     * `timeout` is a deadline for the whole call: every attempt and every
     * back-off sleep must fit inside it.
     */
    private async send(url: string, options: HttpRequestOptions): Promise<HttpResponse<unknown>> {
        const {
            method = 'GET',
            headers = {},
            body,
            timeout = this.defaultTimeout,
            source = 'default',
            signal,
            responseType = 'auto',
        } = options;

        // Acquire rate limit token
        const bucket = this.getBucket(source);
        await bucket.acquire(signal);

        // Track request count
        this.requestCounts.set(source, (this.requestCounts.get(source) ?? 0) + 1);

        // Build request options
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

        const deadline = Date.now() + timeout;
        const timedOut = (): HttpError =>
            new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0, true, undefined, true);

        // Sleep before the next attempt, unless the back-off would overrun the deadline
        const backOff = async (backoffMs: number): Promise<void> => {
            if (Date.now() + backoffMs >= deadline) {
                throw timedOut();
            }
            await sleep(backoffMs, signal, url);
        };

        // Retry loop
        const maxBackoff = 30000;

        for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
            if (signal?.aborted) {
                throw new HttpError(`Request cancelled: ${url}`, 0, false);
            }

            const remaining = deadline - Date.now();
            if (remaining <= 0) {
                throw timedOut();
            }

            const controller = new AbortController();
            const timeoutId = setTimeout(() => controller.abort(), remaining);
            const onCallerAbort = (): void => controller.abort();
            signal?.addEventListener('abort', onCallerAbort, { once: true });

            try {
                const response = await fetch(url, {
                    method,
                    headers: requestHeaders,
                    body: requestBody,
                    signal: controller.signal,
                });

                // Parse response
                const contentType = response.headers.get('content-type') ?? '';
                let data: unknown;
                if (responseType === 'bytes') {
                    data = new Uint8Array(await response.arrayBuffer());
                } else if (contentType.includes('application/json')) {
                    data = await response.json();
                } else {
                    data = await response.text();
                }

                // Build headers map
                const responseHeaders: Record<string, string> = {};
                response.headers.forEach((value, key) => {
                    responseHeaders[key] = value;
                });

                // Check for errors
                if (!response.ok) {
                    const retryable = RETRYABLE_STATUS_CODES.has(response.status);

                    if (retryable && attempt < this.maxRetries) {
                        const retryAfter = this.parseRetryAfter(response.headers.get('retry-after'));
                        const backoff = Math.min(
                            maxBackoff,
                            retryAfter ?? this.calculateBackoff(attempt, this.initialBackoff, maxBackoff)
                        );

                        logger.warn(
                            { status: response.status, attempt: attempt + 1, backoffMs: backoff, url },
                            `Retryable HTTP error, backing off`
                        );
                        await backOff(backoff);
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

                if (error instanceof Error && error.name === 'AbortError') {
                    if (signal?.aborted) {
                        throw new HttpError(`Request cancelled: ${url}`, 0, false);
                    }
                    throw timedOut();
                }

                const errorCode = networkErrorCode(error);
                const retryable = errorCode ? RETRYABLE_ERROR_CODES.has(errorCode) : false;

                if (retryable && attempt < this.maxRetries) {
                    const backoff = this.calculateBackoff(attempt, this.initialBackoff, maxBackoff);
                    logger.warn(
                        { errorCode, attempt: attempt + 1, backoffMs: backoff, url },
                        `Retryable network error, backing off`
                    );
                    await backOff(backoff);
                    continue;
                }

                throw new HttpError(
                    `Network error: ${error instanceof Error ? error.message : String(error)}`,
                    0,
                    retryable
                );
            } finally {
                clearTimeout(timeoutId);
                signal?.removeEventListener('abort', onCallerAbort);
            }
        }

        throw new HttpError(`Max retries exceeded for ${url}`, 0, false);
    }

    private getBucket(source: string): TokenBucket {
        let bucket = this.buckets.get(source);
        if (!bucket) {
            const config = this.rateLimits[source] ?? this.rateLimits['default'] ?? { tokensPerSecond: 5, maxBurst: 5 };
            bucket = new TokenBucket(config.tokensPerSecond, config.maxBurst);
            this.buckets.set(source, bucket);
        }
        return bucket;
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

    private calculateBackoff(attempt: number, initial: number, max: number): number {
        // Exponential backoff with jitter
        const exponential = initial * Math.pow(2, attempt);
        const jitter = Math.random() * exponential * 0.5;
        return Math.min(max, exponential + jitter);
    }
}

/**
 * Extract a Node/undici error code from a fetch failure (the code may sit on `cause`).
 */
function networkErrorCode(error: unknown): string | undefined {
    for (const candidate of [error, error instanceof Error ? error.cause : undefined]) {
        if (typeof candidate === 'object' && candidate !== null && 'code' in candidate) {
            const { code } = candidate;
            if (typeof code === 'string') return code;
        }
    }
    return undefined;
}

/**
 * Sleep for the specified number of milliseconds. Rejects with a cancellation
 * HttpError as soon as `signal` aborts.
 */
function sleep(ms: number, signal?: AbortSignal, url?: string): Promise<void> {
    return new Promise((resolve, reject) => {
        const cancelled = (): HttpError => new HttpError(url ? `Request cancelled: ${url}` : 'Request cancelled', 0, false);
        if (signal?.aborted) {
            reject(cancelled());
            return;
        }

        const onAbort = (): void => {
            clearTimeout(timer);
            reject(cancelled());
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Singleton HTTP client instance.
 */
let clientInstance: HttpClient | null = null;

/**
 * Get the shared HTTP client instance.
 */
export function getHttpClient(options?: HttpClientOptions): HttpClient {
    if (!clientInstance) {
        clientInstance = new HttpClient(options);
    }
    return clientInstance;
}

/**
 * Create a new HTTP client (for testing or custom configuration).
 */
export function createHttpClient(options?: HttpClientOptions): HttpClient {
    return new HttpClient(options);
}
