import { stat } from 'node:fs/promises';
import { marked } from 'marked';
import { isExportFormat } from '../types/index.js';
import type {
    ConvertedDocument,
    DocumentConverter,
    ExtractedDocument,
    FailedDocument,
    PlainTextExtractor,
    ProcessedDocument,
} from '../types/index.js';
import { DocumentNotFoundError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { PdfParseConverter, PdfTextExtractor } from './pdf-converter.js';

export interface DocumentProcessorOptions {
    /** Rich conversion engine (pdf-parse based by default) */
    converter?: DocumentConverter;
    /** Degraded path used when the converter fails on a local file */
    fallback?: PlainTextExtractor;
}

/**
 * Turns PDFs (local files or URLs) into structured text.
 * Conversion failures degrade instead of throwing; callers inspect `format`.
 */
export class DocumentProcessor {
    private readonly converter: DocumentConverter;
    private readonly fallback: PlainTextExtractor;

    constructor(options: DocumentProcessorOptions = {}) {
        this.converter = options.converter ?? new PdfParseConverter();
        this.fallback = options.fallback ?? new PdfTextExtractor();
    }

    /**
     * Process a local PDF.
     * @throws DocumentNotFoundError when the path is not an existing file
     */
    async processPdf(pdfPath: string): Promise<ProcessedDocument> {
        if (!(await isFile(pdfPath))) {
            throw new DocumentNotFoundError(pdfPath);
        }

        try {
            const doc = await this.converter.convert(pdfPath);
            return toExtractedDocument(doc);
        } catch (error) {
            getLogger().warn({ pdfPath, converter: this.converter.name, error }, 'Conversion failed, falling back to plain text');
            return this.fallbackExtraction(pdfPath);
        }
    }

    /**
     * Process a document by URL. There is no plain-text fallback here:
     * a conversion failure yields the error payload.
     */
    async processUrl(url: string): Promise<ProcessedDocument> {
        try {
            const doc = await this.converter.convert(url);
            const extracted = toExtractedDocument(doc);
            return { ...extracted, metadata: { ...extracted.metadata, source_url: url } };
        } catch (error) {
            getLogger().warn({ url, converter: this.converter.name, error }, 'Failed to process document URL');
            return failedDocument(error, { source_url: url });
        }
    }

    /**
     * Render a processed document in the requested format (see `EXPORT_FORMATS`).
     * Unrecognized formats fall back to the raw text.
     */
    exportToFormat(doc: ProcessedDocument, format: string = 'markdown'): string {
        if (!isExportFormat(format)) {
            getLogger().debug({ format }, 'Unknown export format, returning raw text');
            return doc.text;
        }

        switch (format) {
            case 'html':
                return toHtml(doc);
            case 'json':
                return JSON.stringify(doc, null, 2);
            case 'markdown':
            case 'text':
            default:
                return doc.text;
        }
    }

    private async fallbackExtraction(pdfPath: string): Promise<ProcessedDocument> {
        try {
            const pages = await this.fallback.extractPages(pdfPath);
            const text = pages.map((page) => `${page}\n`).join('').trim();

            return {
                text,
                metadata: {
                    title: '',
                    num_pages: pages.length,
                    has_tables: false,
                    has_figures: false,
                },
                structure: {
                    sections: [],
                    tables: [],
                    figures: [],
                    references: [],
                },
                format: 'plain_text',
                extraction_method: 'fallback',
            };
        } catch (error) {
            getLogger().error({ pdfPath, error }, 'Fallback extraction failed');
            return failedDocument(error, {});
        }
    }
}

function toExtractedDocument(doc: ConvertedDocument): ExtractedDocument {
    const tables = doc.tables ?? [];
    const figures = doc.figures ?? [];

    return {
        text: doc.markdown,
        metadata: {
            title: doc.title ?? '',
            num_pages: doc.pageCount ?? 0,
            has_tables: tables.length > 0,
            has_figures: figures.length > 0,
        },
        structure: {
            sections: doc.sections ?? [],
            tables,
            figures,
            references: doc.references ?? [],
        },
        format: 'markdown',
        extraction_method: 'converter',
    };
}

function failedDocument(error: unknown, metadata: FailedDocument['metadata']): FailedDocument {
    return {
        text: '',
        metadata,
        structure: {},
        format: 'error',
        error: error instanceof Error ? error.message : String(error),
    };
}

function toHtml(doc: ProcessedDocument): string {
    if (doc.format !== 'markdown') {
        return doc.text ? `<pre>${escapeHtml(doc.text)}</pre>` : '';
    }

    const html = marked.parse(doc.text, { async: false });
    // async: false always yields a string; the union type covers async extensions
    return typeof html === 'string' ? html : escapeHtml(doc.text);
}

function escapeHtml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;');
}

async function isFile(path: string): Promise<boolean> {
    try {
        return (await stat(path)).isFile();
    } catch (error) {
        getLogger().debug({ path, error }, 'stat failed');
        return false;
    }
}
