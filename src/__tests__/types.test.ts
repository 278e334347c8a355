import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, EXPORT_FORMATS, createPaper, isExportFormat, type Paper } from '../types/index.js';
import {
    DocumentNotFoundError,
    InvalidArgumentError,
    PaperSearchError,
    RecordNotFoundError,
    UnsupportedCapabilityError,
} from '../utils/errors.js';

describe('Types', () => {
    describe('DEFAULT_CONFIG', () => {
        it('should point at a local SearXNG instance', () => {
            expect(DEFAULT_CONFIG.searxng).toEqual({ baseUrl: 'http://localhost:8080', defaultCategory: 'science' });
        });

        it('should keep the knowledge store under ./data', () => {
            expect(DEFAULT_CONFIG.knowledge).toEqual({ url: './data', namespace: 'paper_search', database: 'knowledge' });
        });

        it('should use a 30s HTTP timeout', () => {
            expect(DEFAULT_CONFIG.http.timeoutMs).toBe(30000);
        });
    });

    describe('createPaper', () => {
        const paper = createPaper<Paper<'openalex'>>({
            paper_id: 'W1',
            title: 'T',
            authors: ['A'],
            abstract: '',
            doi: '',
            published_date: new Date('2024-01-01T00:00:00Z'),
            pdf_url: '',
            url: '',
            source: 'openalex',
            keywords: ['k'],
            extra: { openalex_id: 'W1', venue: null, citation_count: 0, year: 2024, concepts: [] },
        });

        it('should freeze the paper and its collections', () => {
            expect(Object.isFrozen(paper)).toBe(true);
            expect(Object.isFrozen(paper.authors)).toBe(true);
            expect(Object.isFrozen(paper.keywords)).toBe(true);
            expect(Object.isFrozen(paper.extra)).toBe(true);
        });

        it('should narrow extra by source', () => {
            expect(paper.extra.openalex_id).toBe('W1');
        });
    });

    describe('export formats', () => {
        it('should whitelist the supported formats', () => {
            expect(EXPORT_FORMATS).toEqual(['markdown', 'html', 'json', 'text']);
            expect(isExportFormat('html')).toBe(true);
            expect(isExportFormat('pdf')).toBe(false);
        });
    });

    describe('errors', () => {
        it('should name errors after their class', () => {
            const error = new InvalidArgumentError('strength', 'must be between 0 and 1, got 2');

            expect(error).toBeInstanceOf(PaperSearchError);
            expect(error.name).toBe('InvalidArgumentError');
            expect(error.argument).toBe('strength');
            expect(error.message).toBe('Invalid strength: must be between 0 and 1, got 2');
        });

        it('should describe missing records and files', () => {
            expect(new RecordNotFoundError('paper', 7).message).toBe('No paper record with id 7');
            expect(new DocumentNotFoundError('/x.pdf').message).toBe('PDF file not found: /x.pdf');
        });

        it('should carry the fallback hint for unsupported capabilities', () => {
            const error = new UnsupportedCapabilityError('SearXNG', 'PDF downloads', 'Use paper.url.');
            expect(error.message).toBe('SearXNG does not support PDF downloads. Use paper.url.');
        });
    });
});
