import { createHash } from 'node:crypto';
import { z } from 'zod';
import type { Paper, SourceAdapter, SourceAdapterOptions } from '../types/index.js';
import { createPaper } from '../types/index.js';
import { UnsupportedCapabilityError } from '../utils/errors.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { mapResults, parseDate, stripDoiPrefix, validateSearchArgs } from './utils.js';

const DEFAULT_BASE_URL = 'http://localhost:8080';
const DEFAULT_CATEGORY = 'science';
const SEARCH_TIMEOUT_MS = 30000;
const ABSTRACT_MAX_LENGTH = 500;

/** Hosts whose landing pages are also direct routes to an open-access PDF */
const OPEN_ACCESS_PATTERNS = [
    /arxiv\.org/i,
    /biorxiv\.org/i,
    /medrxiv\.org/i,
    /ncbi\.nlm\.nih\.gov\/pmc/i,
];

/**
 * One SearXNG result. Every field is optional, but a result needs a title
 * or a URL to be usable. Science engines add authors, DOI and dates.
 */
const SearxngResultSchema = z
    .object({
        title: z.string().nullish(),
        url: z.string().nullish(),
        content: z.string().nullish(),
        author: z.string().nullish(),
        authors: z.array(z.string()).nullish(),
        tags: z.array(z.string()).nullish(),
        engine: z.string().nullish(),
        score: z.number().nullish(),
        category: z.string().nullish(),
        doi: z.string().nullish(),
        pdf_url: z.string().nullish(),
        publishedDate: z.string().nullish(),
    })
    .refine((item) => Boolean(item.title || item.url), {
        message: 'result has neither a title nor a url',
    });

type SearxngResult = z.infer<typeof SearxngResultSchema>;

const SearxngResponseSchema = z.object({
    results: z.array(z.unknown()).default([]),
});

/**
 * SearXNG metasearch adapter.
 * Discovery only: SearXNG aggregates other engines and delivers no documents.
 *
 * @see https://docs.searxng.org/dev/search_api.html
 */
export class SearxngAdapter implements SourceAdapter<'searxng'> {
    readonly name = 'SearXNG';
    readonly sourceId = 'searxng' as const;
    readonly baseUrl: string;
    private readonly defaultCategory: string;
    private httpClient: HttpClient;

    constructor(options?: SourceAdapterOptions) {
        this.baseUrl = (options?.baseUrl ?? process.env['SEARXNG_URL'] ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
        this.defaultCategory = options?.defaultCategory ?? DEFAULT_CATEGORY;
        this.httpClient = options?.httpClient ?? getHttpClient();
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    async search(query: string, maxResults = 10, category = this.defaultCategory): Promise<Paper<'searxng'>[]> {
        validateSearchArgs(query, maxResults);
        const logger = getLogger();

        const params = new URLSearchParams({
            q: query,
            format: 'json',
            categories: category,
            pageno: '1',
        });
        const url = `${this.baseUrl}/search?${params.toString()}`;
        logger.debug({ url }, 'SearXNG search');

        let body: unknown;
        try {
            const response = await this.httpClient.get<unknown>(url, {
                source: 'searxng',
                timeout: SEARCH_TIMEOUT_MS,
                retries: 0,
            });
            body = response.data;
        } catch (error) {
            logger.warn({ url, error }, 'SearXNG search failed');
            return [];
        }

        const parsed = SearxngResponseSchema.safeParse(body);
        if (!parsed.success) {
            logger.warn({ url, issues: parsed.error.issues }, 'Unexpected SearXNG response shape');
            return [];
        }

        const items = parsed.data.results.slice(0, maxResults);
        return mapResults(items, this.sourceId, (item, index) =>
            this.normalizeResult(SearxngResultSchema.parse(item), index, category)
        );
    }

    async downloadPdf(_paperId: string, _savePath: string): Promise<string> {
        throw new UnsupportedCapabilityError(
            this.name,
            'PDF downloads',
            "It is a metasearch engine; use the paper's url to reach the original source."
        );
    }

    async readPaper(_paperId: string, _savePath?: string): Promise<string> {
        throw new UnsupportedCapabilityError(
            this.name,
            'reading paper content',
            "It is a metasearch engine; use the paper's url to reach the original source."
        );
    }

    // ─── Private helpers ──────────────────────────────────────

    private normalizeResult(item: SearxngResult, index: number, category: string): Paper<'searxng'> {
        const url = item.url ?? '';
        const content = item.content ?? '';

        return createPaper<Paper<'searxng'>>({
            paper_id: `searxng_${index}_${hashUrl(url)}`,
            title: item.title || 'Untitled',
            authors: resolveAuthors(item),
            abstract: Array.from(content).slice(0, ABSTRACT_MAX_LENGTH).join(''),
            doi: stripDoiPrefix(item.doi) ?? '',
            published_date: parseDate(item.publishedDate),
            pdf_url: item.pdf_url || guessPdfUrl(url),
            url,
            source: 'searxng',
            keywords: item.tags ?? [],
            extra: {
                engine: item.engine ?? '',
                score: item.score ?? 0,
                category: item.category ?? category,
            },
        });
    }
}

/**
 * Short stable hash of a result URL, used to namespace paper ids.
 */
function hashUrl(url: string): string {
    return createHash('sha256').update(url).digest('hex').slice(0, 12);
}

function resolveAuthors(item: SearxngResult): string[] {
    const authors = item.authors?.filter((name) => name.trim().length > 0) ?? [];
    if (authors.length > 0) return authors;
    return [item.author || 'Unknown'];
}

/**
 * Treat the result URL as the PDF link when it looks like a PDF or points
 * at a known open-access host.
 */
export function guessPdfUrl(url: string): string {
    if (!url) return '';
    if (url.toLowerCase().includes('pdf')) return url;
    return OPEN_ACCESS_PATTERNS.some((pattern) => pattern.test(url)) ? url : '';
}
