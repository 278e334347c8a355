import type { Paper, SourceAdapter, SourceAdapterOptions } from '../types/index.js';
import { createPaper } from '../types/index.js';
import { extractPdfText } from '../document/pdf-converter.js';
import { PdfNotAvailableError } from '../utils/errors.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import {
    downloadPdfFile,
    invertedIndexToText,
    mapResults,
    parseDate,
    stripDoiPrefix,
    validateSearchArgs,
} from './utils.js';

const OPENALEX_BASE = 'https://api.openalex.org';
const DEFAULT_DOWNLOAD_DIR = './downloads';
const MAX_PER_PAGE = 200;

/**
 * OpenAlex API response types (subset of relevant fields).
 */
interface OpenAlexLocation {
    landing_page_url?: string | null;
    pdf_url?: string | null;
    source?: { display_name?: string | null } | null;
}

interface OpenAlexWork {
    id: string;
    doi?: string | null;
    title?: string | null;
    display_name?: string | null;
    publication_year?: number | null;
    publication_date?: string | null;
    abstract_inverted_index?: Record<string, number[]> | null;
    primary_location?: OpenAlexLocation | null;
    best_oa_location?: OpenAlexLocation | null;
    cited_by_count?: number;
    authorships?: Array<{
        author?: { id?: string; display_name?: string | null };
    }>;
    concepts?: Array<{ display_name?: string; score?: number; level?: number }>;
    keywords?: Array<{ display_name?: string; keyword?: string; score?: number }>;
}

interface OpenAlexSearchResponse {
    meta: { count: number; per_page: number; page: number };
    results: OpenAlexWork[];
}

/**
 * OpenAlex source adapter.
 * Open catalogue with abstracts and open-access PDF locations.
 *
 * @see https://docs.openalex.org/
 */
export class OpenAlexAdapter implements SourceAdapter<'openalex'> {
    readonly name = 'OpenAlex';
    readonly sourceId = 'openalex' as const;
    private httpClient: HttpClient;
    private apiKey?: string;
    private email?: string;
    private readonly defaultCategory?: string;
    private readonly downloadDir: string;

    constructor(options?: SourceAdapterOptions) {
        this.apiKey = options?.apiKey ?? process.env['OPENALEX_API_KEY'];
        this.email = options?.email ?? process.env['OPENALEX_EMAIL'];
        this.defaultCategory = options?.defaultCategory;
        this.downloadDir = options?.downloadDir ?? DEFAULT_DOWNLOAD_DIR;
        this.httpClient = options?.httpClient ?? getHttpClient();
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    /**
     * @param category - Raw OpenAlex filter expression, e.g. `publication_year:2023`
     */
    async search(query: string, maxResults = 10, category = this.defaultCategory): Promise<Paper<'openalex'>[]> {
        validateSearchArgs(query, maxResults);
        if (maxResults === 0) return [];

        const params = new URLSearchParams({
            search: query,
            per_page: String(Math.min(maxResults, MAX_PER_PAGE)),
        });
        if (category) {
            params.set('filter', category);
        }
        this.addAuthParams(params);

        const url = `${OPENALEX_BASE}/works?${params.toString()}`;
        getLogger().debug({ url }, 'OpenAlex search');

        let works: OpenAlexWork[];
        try {
            const response = await this.httpClient.get<OpenAlexSearchResponse>(url, { source: 'openalex' });
            works = Array.isArray(response.data.results) ? response.data.results : [];
        } catch (error) {
            getLogger().warn({ url, error }, 'OpenAlex search failed');
            return [];
        }

        return mapResults(works.slice(0, maxResults), this.sourceId, (work) => this.normalizeWork(work));
    }

    async downloadPdf(paperId: string, savePath: string): Promise<string> {
        const work = await this.fetchWork(paperId);
        const pdfUrl = work.best_oa_location?.pdf_url ?? work.primary_location?.pdf_url;
        if (!pdfUrl) {
            throw new PdfNotAvailableError(this.name, paperId);
        }

        return downloadPdfFile(this.httpClient, pdfUrl, savePath, this.toWorkId(work.id), 'openalex');
    }

    async readPaper(paperId: string, savePath = this.downloadDir): Promise<string> {
        const filePath = await this.downloadPdf(paperId, savePath);
        return extractPdfText(filePath);
    }

    // ─── Private helpers ──────────────────────────────────────

    private async fetchWork(paperId: string): Promise<OpenAlexWork> {
        const params = new URLSearchParams();
        this.addAuthParams(params);

        const query = params.toString();
        const url = `${OPENALEX_BASE}/works/${encodeURIComponent(this.toWorkId(paperId))}${query ? `?${query}` : ''}`;
        getLogger().debug({ url }, 'OpenAlex fetch work');

        const response = await this.httpClient.get<OpenAlexWork>(url, { source: 'openalex' });
        return response.data;
    }

    private normalizeWork(work: OpenAlexWork): Paper<'openalex'> {
        if (typeof work.id !== 'string' || work.id.length === 0) {
            throw new Error('OpenAlex work has no id');
        }

        const workId = this.toWorkId(work.id);
        const doi = stripDoiPrefix(work.doi);

        const authors = (work.authorships ?? [])
            .map((a) => a.author?.display_name)
            .filter((name): name is string => !!name);

        const keywords = (work.keywords ?? [])
            .map((k) => k.display_name ?? k.keyword)
            .filter((k): k is string => !!k);

        // Level 0-2 concepts only; deeper levels are too fine-grained to be useful
        const concepts = (work.concepts ?? [])
            .filter((c) => (c.level ?? 0) <= 2)
            .map((c) => c.display_name)
            .filter((name): name is string => !!name);

        return createPaper<Paper<'openalex'>>({
            paper_id: workId,
            title: work.display_name ?? work.title ?? 'Untitled',
            authors: authors.length > 0 ? authors : ['Unknown'],
            abstract: invertedIndexToText(work.abstract_inverted_index) ?? '',
            doi: doi ?? '',
            published_date: parseDate(work.publication_date),
            pdf_url: work.best_oa_location?.pdf_url ?? work.primary_location?.pdf_url ?? '',
            url: work.primary_location?.landing_page_url ?? (doi ? `https://doi.org/${doi}` : work.id),
            source: 'openalex',
            keywords,
            extra: {
                openalex_id: workId,
                venue: work.primary_location?.source?.display_name ?? null,
                citation_count: work.cited_by_count ?? 0,
                year: work.publication_year ?? null,
                concepts,
            },
        });
    }

    private toWorkId(id: string): string {
        return id.replace('https://openalex.org/', '');
    }

    private addAuthParams(params: URLSearchParams): void {
        if (this.apiKey) {
            params.set('api_key', this.apiKey);
        }
        if (this.email) {
            params.set('mailto', this.email);
        }
    }
}
