import { getLogger } from './logger.js';

/**
 * Error classification for HTTP responses.
 */
const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);
const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

const DEFAULT_MAX_RETRIES = 3;
const INITIAL_BACKOFF_MS = 1000;
const MAX_BACKOFF_MS = 30000;

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

        // Reserve the token now so concurrent callers queue behind each other
        const waitMs = ((1 - this.tokens) / this.tokensPerSecond) * 1000;
        this.tokens -= 1;
        await sleep(waitMs);
    }

    private refill(): void {
        const now = Date.now();
        const elapsed = (now - this.lastRefill) / 1000;
        this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.tokensPerSecond);
        this.lastRefill = now;
    }
}

interface RateLimit {
    tokensPerSecond: number;
    maxBurst: number;
}

const DEFAULT_RATE_LIMIT: RateLimit = { tokensPerSecond: 5, maxBurst: 5 };

/**
 * Per-source rate limit configurations.
 */
const RATE_LIMITS: Record<string, RateLimit> = {
    searxng: { tokensPerSecond: 5, maxBurst: 5 },      // Self-hosted instances throttle bursts
    openalex: { tokensPerSecond: 10, maxBurst: 10 },   // 10/s with polite pool
    s2: { tokensPerSecond: 1, maxBurst: 1 },           // 1/s without API key, 10/s with
};

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    headers?: Record<string, string>;
    timeout?: number;
    source?: string;  // For per-source rate limiting
    /** Retry budget for retryable failures; 0 issues exactly one request */
    retries?: number;
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
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly response?: unknown
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

export interface HttpClientOptions {
    timeout?: number;
    version?: string;
    email?: string;
}

/**
 * Centralized HTTP client with per-source rate limiting and retry logic.
 */
export class HttpClient {
    private buckets = new Map<string, TokenBucket>();
    private readonly defaultTimeout: number;
    private readonly userAgent: string;

    constructor(options?: HttpClientOptions) {
        this.defaultTimeout = options?.timeout ?? 30000;
        const version = options?.version ?? '0.1.0';
        const email = options?.email ?? 'paper-search@example.com';
        this.userAgent = `paper-search-kit/${version} (mailto:${email})`;
    }

    /**
     * GET with rate limiting and retry.
     * JSON responses are parsed; anything else is returned as text.
     */
    async get<T = unknown>(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse<T>> {
        return this.execute(url, options, async (response) => {
            const contentType = response.headers.get('content-type') ?? '';
            if (contentType.includes('application/json')) {
                return (await response.json()) as T;
            }
            return (await response.text()) as T;
        });
    }

    /**
     * GET a binary resource (e.g. a PDF).
     */
    async getBuffer(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse<Buffer>> {
        return this.execute(url, options, async (response) =>
            Buffer.from(await response.arrayBuffer())
        );
    }

    private async execute<T>(
        url: string,
        options: HttpRequestOptions,
        parse: (response: Response) => Promise<T>
    ): Promise<HttpResponse<T>> {
        const {
            headers = {},
            timeout = this.defaultTimeout,
            source = 'default',
            retries = DEFAULT_MAX_RETRIES,
        } = options;
        const logger = getLogger();

        // Build request options
        const requestHeaders: Record<string, string> = {
            'User-Agent': this.userAgent,
            ...headers,
        };

        for (let attempt = 0; attempt <= retries; attempt++) {
            // Every attempt, retries included, spends a rate limit token
            await this.getBucket(source).acquire();

            const controller = new AbortController();
            const timeoutId = setTimeout(() => controller.abort(), timeout);

            try {
                const response = await fetch(url, {
                    headers: requestHeaders,
                    signal: controller.signal,
                });

                if (!response.ok) {
                    const retryable = RETRYABLE_STATUS_CODES.has(response.status);

                    if (retryable && attempt < retries) {
                        const retryAfter = this.parseRetryAfter(response.headers.get('retry-after'));
                        const backoff = retryAfter ?? this.calculateBackoff(attempt);

                        logger.warn(
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
                        await readErrorBody(response)
                    );
                }

                const data = await parse(response);

                // Build headers map
                const responseHeaders: Record<string, string> = {};
                response.headers.forEach((value, key) => {
                    responseHeaders[key] = value;
                });

                return { status: response.status, headers: responseHeaders, data, ok: true };
            } catch (error) {
                if (error instanceof HttpError) throw error;

                const errorCode = networkErrorCode(error);
                const retryable = errorCode ? RETRYABLE_ERROR_CODES.has(errorCode) : false;

                if (retryable && attempt < retries) {
                    const backoff = this.calculateBackoff(attempt);
                    logger.warn(
                        { errorCode, attempt: attempt + 1, backoffMs: backoff, url },
                        'Retryable network error, backing off'
                    );
                    await sleep(backoff);
                    continue;
                }

                if (error instanceof Error && error.name === 'AbortError') {
                    throw new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0, true);
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

    private getBucket(source: string): TokenBucket {
        let bucket = this.buckets.get(source);
        if (!bucket) {
            const config = RATE_LIMITS[source] ?? DEFAULT_RATE_LIMIT;
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

    private calculateBackoff(attempt: number): number {
        // Exponential backoff with jitter
        const exponential = INITIAL_BACKOFF_MS * Math.pow(2, attempt);
        const jitter = Math.random() * exponential * 0.5;
        return Math.min(MAX_BACKOFF_MS, exponential + jitter);
    }
}

/**
 * Node's fetch reports socket failures as a TypeError whose `cause` carries the code.
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

async function readErrorBody(response: Response): Promise<string | undefined> {
    try {
        return await response.text();
    } catch (error) {
        getLogger().debug({ error, url: response.url }, 'Could not read error response body');
        return undefined;
    }
}

/**
 * Sleep for the specified number of milliseconds.
 */
function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
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
