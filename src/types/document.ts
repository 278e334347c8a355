/**
 * Document processing types: what a conversion engine hands back, and the
 * structured result the processor returns to callers.
 */

export interface DocumentSection {
    title: string;
    /** 1 for top-level headings, 2 for "2.1", and so on */
    level: number;
    content: string;
}

export interface DocumentTable {
    caption: string;
    /** Cell text by row; empty when the engine only found the caption */
    data: string[][];
    page: number;
}

export interface DocumentFigure {
    caption: string;
    page: number;
}

/**
 * Output of a conversion engine. Each structural facet is optional and is
 * only set when the engine actually supplies it.
 */
export interface ConvertedDocument {
    markdown: string;
    title?: string;
    pageCount?: number;
    sections?: DocumentSection[];
    tables?: DocumentTable[];
    figures?: DocumentFigure[];
    references?: string[];
}

/**
 * Rich document-understanding engine. `source` is a file path or a URL.
 */
export interface DocumentConverter {
    readonly name: string;
    convert(source: string): Promise<ConvertedDocument>;
}

/**
 * Degraded extraction path: one plain-text string per page.
 */
export interface PlainTextExtractor {
    extractPages(filePath: string): Promise<string[]>;
}

export interface DocumentMetadata {
    title: string;
    num_pages: number;
    has_tables: boolean;
    has_figures: boolean;
    source_url?: string;
}

export interface DocumentStructure {
    sections: DocumentSection[];
    tables: DocumentTable[];
    figures: DocumentFigure[];
    references: string[];
}

export type ExtractionMethod = 'converter' | 'fallback';

export interface ExtractedDocument {
    text: string;
    metadata: DocumentMetadata;
    structure: DocumentStructure;
    /** `markdown` from the engine, `plain_text` from the fallback */
    format: 'markdown' | 'plain_text';
    extraction_method: ExtractionMethod;
}

export interface FailedDocument {
    text: '';
    metadata: Partial<DocumentMetadata>;
    structure: Partial<DocumentStructure>;
    format: 'error';
    error: string;
}

/**
 * Callers check `format` to tell rich, degraded and failed extraction apart.
 */
export type ProcessedDocument = ExtractedDocument | FailedDocument;

export const EXPORT_FORMATS = ['markdown', 'html', 'json', 'text'] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export function isExportFormat(value: string): value is ExportFormat {
    return EXPORT_FORMATS.some((format) => format === value);
}
