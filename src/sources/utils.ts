/**
 * Shared utilities for source adapters.
 */
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { HttpClient } from '../utils/http-client.js';
import { InvalidArgumentError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * Validate the arguments every adapter's `search` accepts.
 * Throws before any request is made.
 */
export function validateSearchArgs(query: string, maxResults: number): void {
    if (query.trim().length === 0) {
        throw new InvalidArgumentError('query', 'must be a non-empty string');
    }
    if (!Number.isInteger(maxResults) || maxResults < 0) {
        throw new InvalidArgumentError('maxResults', `must be a non-negative integer, got ${maxResults}`);
    }
}

/**
 * Map backend items one at a time. An item whose mapping throws is logged
 * and skipped; the rest of the batch is kept in order.
 */
export function mapResults<T, R>(
    items: readonly T[],
    source: string,
    map: (item: T, index: number) => R
): R[] {
    const mapped: R[] = [];

    items.forEach((item, index) => {
        try {
            mapped.push(map(item, index));
        } catch (error) {
            getLogger().warn({ source, index, error }, 'Skipping malformed search result');
        }
    });

    return mapped;
}

/**
 * Parse a date string from a backend, falling back to the ingestion time.
 */
export function parseDate(value: string | null | undefined, fallback: Date = new Date()): Date {
    if (!value) return fallback;
    const date = new Date(value);
    return isNaN(date.getTime()) ? fallback : date;
}

/**
 * Reconstruct abstract text from OpenAlex inverted index format.
 *
 * OpenAlex stores abstracts as inverted indexes: { "word": [position1, position2], ... }
 * This function reconstructs the original text.
 *
 * @param invertedIndex - The inverted index object or null
 * @returns Reconstructed abstract text or null
 */
export function invertedIndexToText(
    invertedIndex: Record<string, number[]> | null | undefined
): string | null {
    if (!invertedIndex || typeof invertedIndex !== 'object') {
        return null;
    }

    const words: Array<[number, string]> = [];

    for (const [word, positions] of Object.entries(invertedIndex)) {
        if (!Array.isArray(positions)) continue;
        for (const pos of positions) {
            if (typeof pos === 'number' && pos >= 0) {
                words.push([pos, word]);
            }
        }
    }

    if (words.length === 0) return null;

    // Sort by position
    words.sort((a, b) => a[0] - b[0]);

    return words.map(([, word]) => word).join(' ');
}

/**
 * Strip DOI prefix URLs to get just the DOI identifier.
 * "https://doi.org/10.1234/test" → "10.1234/test"
 */
export function stripDoiPrefix(doi: string | null | undefined): string | null {
    if (!doi) return null;
    return doi
        .replace('https://doi.org/', '')
        .replace('http://doi.org/', '')
        .trim() || null;
}

/**
 * Extract arXiv ID from various formats.
 * "https://arxiv.org/abs/2401.01234" → "2401.01234"
 * "arXiv:2401.01234" → "2401.01234"
 * "2401.01234v2" → "2401.01234v2"
 */
export function extractArxivId(input: string | null | undefined): string | null {
    if (!input) return null;

    const patterns = [
        /arxiv\.org\/(?:abs|pdf)\/(\d{4}\.\d{4,5}(?:v\d+)?)/i,
        /arxiv:(\d{4}\.\d{4,5}(?:v\d+)?)/i,
        /^(\d{4}\.\d{4,5}(?:v\d+)?)$/,
    ];

    for (const pattern of patterns) {
        const match = input.match(pattern);
        if (match?.[1]) return match[1];
    }

    return null;
}

/**
 * Make a paper id safe to use as a file name.
 */
export function toFileName(paperId: string): string {
    return paperId.replace(/[^\w.-]+/g, '_');
}

/**
 * Download a PDF into `savePath/{paperId}.pdf` and return the file path.
 * HTTP failures propagate.
 */
export async function downloadPdfFile(
    httpClient: HttpClient,
    pdfUrl: string,
    savePath: string,
    paperId: string,
    source: string
): Promise<string> {
    await mkdir(savePath, { recursive: true });
    const filePath = join(savePath, `${toFileName(paperId)}.pdf`);

    getLogger().debug({ pdfUrl, filePath, source }, 'Downloading PDF');
    const response = await httpClient.getBuffer(pdfUrl, { source });
    await writeFile(filePath, response.data);

    return filePath;
}
