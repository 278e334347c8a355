import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SemanticScholarAdapter } from '../sources/semantic-scholar.js';
import { HttpClient } from '../utils/http-client.js';
import { PdfNotAvailableError } from '../utils/errors.js';

const S2_PAPER = {
    paperId: 'abc123',
    externalIds: { DOI: '10.2/xyz', ArXiv: '2101.00001' },
    title: 'Self-Supervised Learning',
    abstract: null,
    year: 2021,
    venue: '',
    publicationDate: '2021-01-05',
    citationCount: 3,
    influentialCitationCount: 1,
    openAccessPdf: { url: 'https://oa.example/ssl.pdf', status: 'GREEN' },
    fieldsOfStudy: ['Computer Science'],
    authors: [{ authorId: '1', name: 'Bo' }, { authorId: '2', name: null }],
    url: 'https://www.semanticscholar.org/paper/abc123',
};

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'content-type': 'application/json' },
    });
}

describe('SemanticScholarAdapter', () => {
    let adapter: SemanticScholarAdapter;

    beforeEach(() => {
        adapter = new SemanticScholarAdapter({ httpClient: new HttpClient(), apiKey: '' });
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    describe('search', () => {
        it('should clean the query and send the API key header', async () => {
            const mockFetch = vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse({ total: 0, offset: 0, data: [] }));
            vi.stubGlobal('fetch', mockFetch);

            const withKey = new SemanticScholarAdapter({ httpClient: new HttpClient(), apiKey: 'test-secret' });
            await withKey.search('self-supervised+learning', 250, 'Computer Science');

            const [calledUrl, init] = mockFetch.mock.calls[0] ?? [];
            const url = new URL(calledUrl ?? '');
            expect(url.origin + url.pathname).toBe('https://api.semanticscholar.org/graph/v1/paper/search');
            expect(url.searchParams.get('query')).toBe('self supervised learning');
            expect(url.searchParams.get('limit')).toBe('100');
            expect(url.searchParams.get('fieldsOfStudy')).toBe('Computer Science');
            expect(url.searchParams.get('fields')).toContain('openAccessPdf');
            expect(init?.headers).toMatchObject({ 'x-api-key': 'test-secret' });
        });

        it('should normalize papers', async () => {
            vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ total: 1, offset: 0, data: [S2_PAPER] })));

            const [paper] = await adapter.search('ssl', 10);

            expect(paper).toMatchObject({
                paper_id: 'abc123',
                title: 'Self-Supervised Learning',
                authors: ['Bo'],
                abstract: '',
                doi: '10.2/xyz',
                pdf_url: 'https://oa.example/ssl.pdf',
                url: 'https://www.semanticscholar.org/paper/abc123',
                source: 's2',
                keywords: ['Computer Science'],
                extra: {
                    s2_id: 'abc123',
                    venue: null,
                    citation_count: 3,
                    influential_citation_count: 1,
                    year: 2021,
                    arxiv_id: '2101.00001',
                },
            });
            expect(paper?.published_date.toISOString()).toBe('2021-01-05T00:00:00.000Z');
        });

        it('should skip papers without a paperId', async () => {
            vi.stubGlobal('fetch', vi.fn(async () =>
                jsonResponse({ total: 2, offset: 0, data: [{ ...S2_PAPER, paperId: '' }, S2_PAPER] })
            ));

            const papers = await adapter.search('ssl', 10);
            expect(papers).toHaveLength(1);
        });

        it('should treat a missing data array as no results', async () => {
            vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ total: 0, offset: 0 })));
            await expect(adapter.search('ssl', 10)).resolves.toEqual([]);
        });

        it('should return [] on HTTP failure', async () => {
            vi.stubGlobal('fetch', vi.fn(async () => new Response('forbidden', { status: 403 })));
            await expect(adapter.search('ssl', 10)).resolves.toEqual([]);
        });
    });

    describe('downloads', () => {
        let dir: string;

        beforeEach(async () => {
            dir = await mkdtemp(join(tmpdir(), 'paper-search-s2-'));
        });

        afterEach(async () => {
            await rm(dir, { recursive: true, force: true });
        });

        it('should download the open-access PDF', async () => {
            const mockFetch = vi.fn(async (url: string) => {
                if (url.startsWith('https://api.semanticscholar.org/graph/v1/paper/abc123?')) {
                    return jsonResponse({ paperId: 'abc123', openAccessPdf: { url: 'https://oa.example/ssl.pdf' } });
                }
                return new Response('%PDF-s2');
            });
            vi.stubGlobal('fetch', mockFetch);

            const filePath = await adapter.downloadPdf('abc123', dir);

            expect(filePath).toBe(join(dir, 'abc123.pdf'));
            expect(await readFile(filePath, 'utf8')).toBe('%PDF-s2');
            expect(mockFetch.mock.calls.map(([url]) => url)).toEqual([
                'https://api.semanticscholar.org/graph/v1/paper/abc123?fields=paperId,openAccessPdf',
                'https://oa.example/ssl.pdf',
            ]);
        });

        it('should throw PdfNotAvailableError without an open-access PDF', async () => {
            vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ paperId: 'abc123', openAccessPdf: null })));

            const error = await adapter.downloadPdf('abc123', dir).catch((e: unknown) => e);
            expect(error).toBeInstanceOf(PdfNotAvailableError);
            expect(error).toMatchObject({
                message: 'No open-access PDF available from Semantic Scholar for paper abc123',
            });
        });
    });
});
