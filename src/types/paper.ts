/**
 * Paper: the core data model for academic papers.
 * Normalized from any source (SearXNG, OpenAlex, Semantic Scholar) into this common shape.
 */
export type PaperSource = 'searxng' | 'openalex' | 's2';

/**
 * Source-specific metadata carried in `Paper.extra`, keyed by source.
 */
export type SearxngExtra = {
    /** Underlying engine that produced the hit (e.g. "arxiv", "google scholar") */
    engine: string;
    /** Relevance score assigned by SearXNG */
    score: number;
    category: string;
};

export type OpenAlexExtra = {
    openalex_id: string;
    venue: string | null;
    citation_count: number;
    year: number | null;
    /** Level 0-2 concept names */
    concepts: string[];
};

export type S2Extra = {
    s2_id: string;
    venue: string | null;
    citation_count: number;
    influential_citation_count: number;
    year: number | null;
    arxiv_id: string | null;
};

export interface PaperExtraMap {
    searxng: SearxngExtra;
    openalex: OpenAlexExtra;
    s2: S2Extra;
}

interface PaperFields {
    /** Source-namespaced id, unique only within one result set */
    readonly paper_id: string;
    readonly title: string;
    readonly authors: readonly string[];
    readonly abstract: string;
    /** Empty when unavailable */
    readonly doi: string;
    /**
     * Publication date. Falls back to ingestion time when the source has
     * no date, so it is not authoritative.
     */
    readonly published_date: Date;
    readonly pdf_url: string;
    readonly url: string;
    readonly keywords: readonly string[];
}

/**
 * A normalized paper. `extra` is typed by `source`.
 */
export type Paper<S extends PaperSource = PaperSource> = S extends PaperSource
    ? PaperFields & {
          readonly source: S;
          readonly extra: Readonly<PaperExtraMap[S]>;
      }
    : never;

/**
 * Freeze a freshly built Paper together with its arrays and `extra`.
 */
export function createPaper<P extends Paper>(fields: P): P {
    Object.freeze(fields.authors);
    Object.freeze(fields.keywords);
    Object.freeze(fields.extra);
    Object.freeze(fields);
    return fields;
}
