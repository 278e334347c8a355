import type { HttpClient } from '../utils/http-client.js';
import type { Paper, PaperSource } from './paper.js';

/**
 * Interface for data source adapters (SearXNG, OpenAlex, Semantic Scholar).
 * Each adapter normalizes results into the common Paper interface.
 */
export interface SourceAdapter<S extends PaperSource = PaperSource> {
    /** Human-readable source name */
    readonly name: string;

    /** Source identifier, also the `source` tag on every Paper it returns */
    readonly sourceId: S;

    /**
     * Search the backend. Transport failures are logged and yield an empty list;
     * malformed items are skipped individually.
     * @param maxResults - Truncates the backend's result list
     * @param category - Backend-specific filter; each adapter defines its default
     */
    search(query: string, maxResults?: number, category?: string): Promise<Paper<S>[]>;

    /**
     * Download the paper's PDF into `savePath` and return the file path.
     */
    downloadPdf(paperId: string, savePath: string): Promise<string>;

    /**
     * Download the paper and return its extracted plain text.
     */
    readPaper(paperId: string, savePath?: string): Promise<string>;
}

/**
 * Options for source adapter initialization.
 */
export interface SourceAdapterOptions {
    /** API key (defaults to the source's environment variable) */
    apiKey?: string;

    /** Contact email for polite pool (OpenAlex) */
    email?: string;

    /** Backend base URL (SearXNG instance) */
    baseUrl?: string;

    /** Directory `readPaper` downloads into when no savePath is given */
    downloadDir?: string;

    /** Category used when `search` is called without one */
    defaultCategory?: string;

    /** Shared HTTP client; the process-wide client when omitted */
    httpClient?: HttpClient;
}
