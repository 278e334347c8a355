import type { Paper, SourceAdapter, SourceAdapterOptions } from '../types/index.js';
import { createPaper } from '../types/index.js';
import { extractPdfText } from '../document/pdf-converter.js';
import { PdfNotAvailableError } from '../utils/errors.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import {
    downloadPdfFile,
    extractArxivId,
    mapResults,
    parseDate,
    stripDoiPrefix,
    validateSearchArgs,
} from './utils.js';

const S2_BASE = 'https://api.semanticscholar.org/graph/v1';
const DEFAULT_DOWNLOAD_DIR = './downloads';
const MAX_LIMIT = 100;

/** Fields to request from S2 API */
const PAPER_FIELDS = [
    'paperId', 'externalIds', 'title', 'abstract', 'year', 'venue',
    'publicationDate', 'citationCount', 'influentialCitationCount',
    'openAccessPdf', 'fieldsOfStudy', 'authors', 'url',
].join(',');

/**
 * Semantic Scholar API response types.
 */
interface S2Paper {
    paperId: string;
    externalIds?: {
        DOI?: string;
        ArXiv?: string;
        CorpusId?: number;
    } | null;
    title?: string | null;
    abstract?: string | null;
    year?: number | null;
    venue?: string | null;
    publicationDate?: string | null;
    citationCount?: number | null;
    influentialCitationCount?: number | null;
    openAccessPdf?: { url?: string | null; status?: string | null } | null;
    fieldsOfStudy?: string[] | null;
    authors?: Array<{
        authorId?: string | null;
        name?: string | null;
    }>;
    url?: string | null;
}

interface S2SearchResponse {
    total: number;
    offset: number;
    data?: S2Paper[];
    next?: number;
}

/**
 * Semantic Scholar source adapter.
 *
 * @see https://api.semanticscholar.org/
 */
export class SemanticScholarAdapter implements SourceAdapter<'s2'> {
    readonly name = 'Semantic Scholar';
    readonly sourceId = 's2' as const;
    private httpClient: HttpClient;
    private apiKey?: string;
    private readonly defaultCategory?: string;
    private readonly downloadDir: string;

    constructor(options?: SourceAdapterOptions) {
        this.apiKey = options?.apiKey ?? process.env['S2_API_KEY'];
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
     * @param category - Comma-separated fields of study, e.g. `Computer Science`
     */
    async search(query: string, maxResults = 10, category = this.defaultCategory): Promise<Paper<'s2'>[]> {
        validateSearchArgs(query, maxResults);
        if (maxResults === 0) return [];

        const params = new URLSearchParams({
            query: this.cleanSearchQuery(query),
            limit: String(Math.min(maxResults, MAX_LIMIT)),
            fields: PAPER_FIELDS,
        });
        if (category) {
            params.set('fieldsOfStudy', category);
        }

        const url = `${S2_BASE}/paper/search?${params.toString()}`;
        getLogger().debug({ url }, 'S2 search');

        let papers: S2Paper[];
        try {
            const response = await this.httpClient.get<S2SearchResponse>(url, {
                source: 's2',
                headers: this.buildHeaders(),
            });
            papers = Array.isArray(response.data.data) ? response.data.data : [];
        } catch (error) {
            getLogger().warn({ url, error }, 'S2 search failed');
            return [];
        }

        return mapResults(papers.slice(0, maxResults), this.sourceId, (paper) => this.normalizeS2Paper(paper));
    }

    async downloadPdf(paperId: string, savePath: string): Promise<string> {
        const url = `${S2_BASE}/paper/${encodeURIComponent(paperId)}?fields=paperId,openAccessPdf`;
        getLogger().debug({ url }, 'S2 fetch paper');

        const response = await this.httpClient.get<S2Paper>(url, {
            source: 's2',
            headers: this.buildHeaders(),
        });

        const pdfUrl = response.data.openAccessPdf?.url;
        if (!pdfUrl) {
            throw new PdfNotAvailableError(this.name, paperId);
        }

        return downloadPdfFile(this.httpClient, pdfUrl, savePath, paperId, 's2');
    }

    async readPaper(paperId: string, savePath = this.downloadDir): Promise<string> {
        const filePath = await this.downloadPdf(paperId, savePath);
        return extractPdfText(filePath);
    }

    // ─── Private helpers ──────────────────────────────────────

    private normalizeS2Paper(paper: S2Paper): Paper<'s2'> {
        if (typeof paper.paperId !== 'string' || paper.paperId.length === 0) {
            throw new Error('S2 paper has no paperId');
        }

        const doi = stripDoiPrefix(paper.externalIds?.DOI ?? null);
        const arxivId = extractArxivId(paper.externalIds?.ArXiv ?? null);

        const authors = (paper.authors ?? [])
            .map((a) => a.name)
            .filter((name): name is string => !!name);

        return createPaper<Paper<'s2'>>({
            paper_id: paper.paperId,
            title: paper.title ?? 'Untitled',
            authors: authors.length > 0 ? authors : ['Unknown'],
            abstract: paper.abstract ?? '',
            doi: doi ?? '',
            published_date: parseDate(paper.publicationDate),
            pdf_url: paper.openAccessPdf?.url ?? '',
            url: paper.url ?? (doi ? `https://doi.org/${doi}` : ''),
            source: 's2',
            keywords: paper.fieldsOfStudy ?? [],
            extra: {
                s2_id: paper.paperId,
                venue: paper.venue || null,
                citation_count: paper.citationCount ?? 0,
                influential_citation_count: paper.influentialCitationCount ?? 0,
                year: paper.year ?? null,
                arxiv_id: arxivId,
            },
        });
    }

    /**
     * Clean search query. S2 treats hyphens and plus signs as operators.
     */
    private cleanSearchQuery(query: string): string {
        return query
            .replace(/[-+]/g, ' ')
            .replace(/\s+/g, ' ')
            .trim();
    }

    private buildHeaders(): Record<string, string> {
        const headers: Record<string, string> = {};
        if (this.apiKey) {
            headers['x-api-key'] = this.apiKey;
        }
        return headers;
    }
}
