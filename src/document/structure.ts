import type { DocumentFigure, DocumentSection, DocumentTable } from '../types/index.js';

/**
 * Heuristic structure recovery from per-page plain text, for engines that
 * only expose a text layer.
 */

/** Unnumbered headings that commonly open a section in research papers */
const KNOWN_HEADINGS = new Set([
    'abstract',
    'introduction',
    'background',
    'related work',
    'method',
    'methods',
    'methodology',
    'experiments',
    'results',
    'discussion',
    'conclusion',
    'conclusions',
    'acknowledgements',
    'acknowledgments',
    'references',
    'bibliography',
    'appendix',
]);

const REFERENCE_HEADINGS = new Set(['references', 'bibliography']);

/** "3 Results", "2.1. Datasets", "4.2.1 Ablation" */
const NUMBERED_HEADING = /^(\d{1,2}(?:\.\d{1,2}){0,3})\.?\s+([A-Z][^.!?]{1,80})$/;

const FIGURE_CAPTION = /^(?:Figure|Fig\.)\s*(\d+)\s*[.:]\s*(.+)$/i;
const TABLE_CAPTION = /^Table\s+(\d+)\s*[.:]\s*(.+)$/i;

/** "[12] Author, ..." or "12. Author, ..." */
const REFERENCE_MARKER = /^(?:\[\d+\]|\d{1,3}\.)\s+/;

interface Heading {
    title: string;
    level: number;
}

/**
 * Classify a single line as a heading, or null when it is body text.
 */
export function parseHeading(line: string): Heading | null {
    const trimmed = line.trim();
    if (trimmed.length === 0 || trimmed.length > 90) return null;

    const numbered = trimmed.match(NUMBERED_HEADING);
    if (numbered?.[1] && numbered[2]) {
        return {
            title: numbered[2].trim(),
            level: numbered[1].split('.').length,
        };
    }

    const bare = trimmed.replace(/[:.]$/, '');
    if (KNOWN_HEADINGS.has(bare.toLowerCase())) {
        return { title: bare, level: 1 };
    }

    return null;
}

/**
 * Split the document into sections at detected headings.
 * Text before the first heading is not part of any section.
 */
export function extractSections(pages: readonly string[]): DocumentSection[] {
    const sections: DocumentSection[] = [];
    let current: { heading: Heading; lines: string[] } | null = null;

    for (const line of pages.join('\n').split('\n')) {
        // "2. Devlin J, Chang M" reads like a numbered heading; inside a
        // reference list only a known unnumbered heading ends the section
        const inReferences: boolean = current !== null && isReferenceHeading(current.heading);
        const heading: Heading | null = inReferences && !isKnownHeading(line) ? null : parseHeading(line);
        if (heading) {
            if (current) sections.push(toSection(current.heading, current.lines));
            current = { heading, lines: [] };
        } else if (current) {
            current.lines.push(line);
        }
    }

    if (current) sections.push(toSection(current.heading, current.lines));
    return sections;
}

function isReferenceHeading(heading: Heading): boolean {
    return REFERENCE_HEADINGS.has(heading.title.toLowerCase());
}

function isKnownHeading(line: string): boolean {
    return KNOWN_HEADINGS.has(line.trim().replace(/[:.]$/, '').toLowerCase());
}

function toSection(heading: Heading, lines: string[]): DocumentSection {
    return {
        title: heading.title,
        level: heading.level,
        content: lines.join('\n').trim(),
    };
}

/**
 * Figure captions with the (1-based) page they appear on.
 */
export function extractFigures(pages: readonly string[]): DocumentFigure[] {
    const figures: DocumentFigure[] = [];
    pages.forEach((page, index) => {
        for (const line of page.split('\n')) {
            const match = line.trim().match(FIGURE_CAPTION);
            if (match?.[2]) {
                figures.push({ caption: `Figure ${match[1]}: ${match[2].trim()}`, page: index + 1 });
            }
        }
    });
    return figures;
}

/**
 * Table captions with their page. A text layer carries no cell grid, so
 * `data` stays empty.
 */
export function extractTables(pages: readonly string[]): DocumentTable[] {
    const tables: DocumentTable[] = [];
    pages.forEach((page, index) => {
        for (const line of page.split('\n')) {
            const match = line.trim().match(TABLE_CAPTION);
            if (match?.[2]) {
                tables.push({ caption: `Table ${match[1]}: ${match[2].trim()}`, data: [], page: index + 1 });
            }
        }
    });
    return tables;
}

/**
 * Reference entries from the references/bibliography section.
 * Entries split on "[n]" or "n." markers; without markers, one entry per line.
 */
export function extractReferences(sections: readonly DocumentSection[]): string[] {
    const section = sections.find(isReferenceHeading);
    if (!section) return [];

    const lines = section.content
        .split('\n')
        .map((line) => line.trim())
        .filter((line) => line.length > 0);

    if (!lines.some((line) => REFERENCE_MARKER.test(line))) {
        return lines;
    }

    const entries: string[] = [];
    for (const line of lines) {
        if (REFERENCE_MARKER.test(line) || entries.length === 0) {
            entries.push(line);
        } else {
            // Continuation of a wrapped entry
            entries[entries.length - 1] = `${entries[entries.length - 1]} ${line}`;
        }
    }
    return entries;
}

/**
 * Render sections as markdown: the title as `#`, sections one level below
 * their numbering depth (capped at `######`).
 */
export function renderMarkdown(
    title: string,
    sections: readonly DocumentSection[],
    fallbackText: string
): string {
    if (sections.length === 0) {
        return title ? `# ${title}\n\n${fallbackText.trim()}` : fallbackText.trim();
    }

    const blocks: string[] = [];
    if (title) blocks.push(`# ${title}`);
    for (const section of sections) {
        const hashes = '#'.repeat(Math.min(section.level + 1, 6));
        blocks.push(section.content ? `${hashes} ${section.title}\n\n${section.content}` : `${hashes} ${section.title}`);
    }
    return blocks.join('\n\n');
}
