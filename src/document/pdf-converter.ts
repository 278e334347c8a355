import { readFile } from 'node:fs/promises';
import { PDFParse } from 'pdf-parse';
import type { ConvertedDocument, DocumentConverter, PlainTextExtractor } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import {
    extractFigures,
    extractReferences,
    extractSections,
    extractTables,
    renderMarkdown,
} from './structure.js';

function isUrl(source: string): boolean {
    return /^https?:\/\//i.test(source);
}

async function openParser(source: string): Promise<PDFParse> {
    if (isUrl(source)) {
        return new PDFParse({ url: source });
    }
    return new PDFParse({ data: await readFile(source) });
}

/**
 * Read the document title from the PDF info dictionary, if it has one.
 */
function readTitle(info: unknown): string {
    if (typeof info === 'object' && info !== null && 'Title' in info) {
        const { Title } = info;
        if (typeof Title === 'string') return Title.trim();
    }
    return '';
}

/**
 * Default document converter built on pdf-parse.
 * Recovers title and page count from the PDF, and sections, captions and
 * references from the text layer.
 */
export class PdfParseConverter implements DocumentConverter {
    readonly name = 'pdf-parse';

    async convert(source: string): Promise<ConvertedDocument> {
        const parser = await openParser(source);

        try {
            const info = await parser.getInfo();
            const result = await parser.getText();
            const pages = result.pages.map((page) => page.text);

            const title = readTitle(info.info);
            const sections = extractSections(pages);

            getLogger().debug({ source, pages: result.total, sections: sections.length }, 'Converted PDF');

            return {
                markdown: renderMarkdown(title, sections, result.text),
                title,
                pageCount: result.total,
                sections,
                tables: extractTables(pages),
                figures: extractFigures(pages),
                references: extractReferences(sections),
            };
        } finally {
            await parser.destroy();
        }
    }
}

/**
 * Plain-text extraction, one string per page.
 */
export class PdfTextExtractor implements PlainTextExtractor {
    async extractPages(filePath: string): Promise<string[]> {
        const parser = await openParser(filePath);

        try {
            const result = await parser.getText();
            return result.pages.map((page) => page.text);
        } finally {
            await parser.destroy();
        }
    }
}

/**
 * Extract the whole text of a local PDF, pages separated by newlines.
 */
export async function extractPdfText(filePath: string): Promise<string> {
    const pages = await new PdfTextExtractor().extractPages(filePath);
    return pages.map((page) => `${page}\n`).join('').trim();
}
