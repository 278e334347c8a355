import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { HttpClient, HttpError } from '../utils/http-client.js';

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
    return new Response(JSON.stringify(body), {
        status: 200,
        ...init,
        headers: { 'content-type': 'application/json', ...init.headers },
    });
}

describe('HttpClient', () => {
    let client: HttpClient;

    beforeEach(() => {
        client = new HttpClient({ timeout: 5000 });
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
            expect(error.name).toBe('HttpError');
        });

        it('should include response data', () => {
            const responseData = { error: 'bad request' };
            const error = new HttpError('Bad Request', 400, false, responseData);
            expect(error.response).toEqual(responseData);
        });
    });

    describe('responses', () => {
        it('should parse JSON bodies', async () => {
            vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ results: [1, 2] })));

            const response = await client.get<{ results: number[] }>('https://api.example.com/json');
            expect(response.status).toBe(200);
            expect(response.ok).toBe(true);
            expect(response.data).toEqual({ results: [1, 2] });
            expect(response.headers['content-type']).toBe('application/json');
        });

        it('should return non-JSON bodies as text', async () => {
            vi.stubGlobal('fetch', vi.fn(async () => new Response('plain body', { status: 200 })));

            const response = await client.get<string>('https://api.example.com/text');
            expect(response.data).toBe('plain body');
        });

        it('should download binary content as a Buffer', async () => {
            vi.stubGlobal('fetch', vi.fn(async () => new Response('%PDF', { status: 200 })));

            const response = await client.getBuffer('https://files.example.com/paper.pdf', { source: 'openalex' });
            expect(Buffer.isBuffer(response.data)).toBe(true);
            expect(response.data.toString('latin1')).toBe('%PDF');
        });

        it('should pass caller headers alongside the User-Agent', async () => {
            const mockFetch = vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse({}));
            vi.stubGlobal('fetch', mockFetch);

            await client.get('https://api.example.com/items', { headers: { 'x-api-key': 'test-secret' } });

            const init = mockFetch.mock.calls[0]?.[1];
            expect(init?.method).toBeUndefined();
            expect(init?.headers).toMatchObject({
                'x-api-key': 'test-secret',
                'User-Agent': 'paper-search-kit/0.1.0 (mailto:paper-search@example.com)',
            });
        });

        it('should send a User-Agent naming the contact email', async () => {
            const mockFetch = vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse({}));
            vi.stubGlobal('fetch', mockFetch);

            const custom = new HttpClient({ version: '9.9.9', email: 'team@example.org' });
            await custom.get('https://api.example.com/ua');

            expect(mockFetch.mock.calls[0]?.[1]?.headers).toMatchObject({
                'User-Agent': 'paper-search-kit/9.9.9 (mailto:team@example.org)',
            });
        });
    });

    describe('errors and retries', () => {
        it('should throw a non-retryable HttpError on 404 without retrying', async () => {
            const mockFetch = vi.fn(async () => new Response('missing', { status: 404, statusText: 'Not Found' }));
            vi.stubGlobal('fetch', mockFetch);

            const error = await client.get('https://api.example.com/missing').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(HttpError);
            expect(error).toMatchObject({ status: 404, retryable: false, response: 'missing' });
            expect(mockFetch).toHaveBeenCalledTimes(1);
        });

        it('should make exactly one attempt when retries is 0', async () => {
            const mockFetch = vi.fn(async () => new Response('unavailable', { status: 503 }));
            vi.stubGlobal('fetch', mockFetch);

            const error = await client
                .get('https://api.example.com/busy', { retries: 0 })
                .catch((e: unknown) => e);

            expect(error).toBeInstanceOf(HttpError);
            expect(error).toMatchObject({ status: 503, retryable: true });
            expect(mockFetch).toHaveBeenCalledTimes(1);
        });

        it('should retry a retryable status, honouring Retry-After', async () => {
            const mockFetch = vi
                .fn<() => Promise<Response>>()
                .mockResolvedValueOnce(new Response('slow down', { status: 429, headers: { 'retry-after': '0' } }))
                .mockResolvedValueOnce(jsonResponse({ ok: true }));
            vi.stubGlobal('fetch', mockFetch);

            const response = await client.get('https://api.example.com/limited', { retries: 1 });

            expect(response.data).toEqual({ ok: true });
            expect(mockFetch).toHaveBeenCalledTimes(2);
        });

        it('should wrap non-retryable network failures', async () => {
            vi.stubGlobal('fetch', vi.fn(async () => {
                throw new TypeError('fetch failed', { cause: { code: 'ENOTFOUND' } });
            }));

            const error = await client.get('https://unreachable.example.com').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(HttpError);
            expect(error).toMatchObject({
                message: 'Network error: fetch failed',
                status: 0,
                retryable: false,
            });
        });
    });

    describe('rate limiting', () => {
        it('should throttle requests based on source rate limits', async () => {
            const mockFetch = vi.fn(async () => jsonResponse({ data: 'ok' }));
            vi.stubGlobal('fetch', mockFetch);

            const start = Date.now();

            // Make 3 requests with S2 source (1/sec rate limit)
            await Promise.all([
                client.get('https://api.example.com/1', { source: 's2' }),
                client.get('https://api.example.com/2', { source: 's2' }),
                client.get('https://api.example.com/3', { source: 's2' }),
            ]);

            const elapsed = Date.now() - start;

            // The first token is immediately available, so 3 requests need ~2 seconds
            expect(elapsed).toBeGreaterThanOrEqual(1900);
            expect(mockFetch).toHaveBeenCalledTimes(3);
        });
    });
});
