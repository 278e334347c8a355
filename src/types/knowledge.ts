/**
 * How a paper relates to a concept.
 */
export type RelationshipType = 'discusses' | 'introduces' | 'uses' | 'benchmarks';

/**
 * Paper-shaped input accepted by the knowledge store. A `Paper` fits as is.
 */
export interface PaperInput {
    paper_id: string;
    title: string;
    authors?: readonly string[];
    abstract?: string;
    doi?: string;
    published_date?: Date | string | null;
    source?: string;
    url?: string;
    pdf_url?: string;
    categories?: readonly string[];
    keywords?: readonly string[];
    extra?: object;
}

/**
 * A paper row as stored, with JSON columns decoded.
 */
export interface StoredPaper {
    /** Internal record id (SQLite rowid) */
    id: number;
    /** External id as given by the source */
    paper_id: string;
    title: string;
    authors: string[];
    abstract: string;
    doi: string;
    /** ISO timestamp, null when the input had no date */
    published_date: string | null;
    source: string;
    url: string;
    pdf_url: string;
    categories: string[];
    keywords: string[];
    extra: Record<string, unknown>;
    /** ISO timestamp of when the paper was stored */
    stored_at: string;
}

export interface Concept {
    id: number;
    name: string;
    description: string;
    category: string;
    /** Incremented on every repeated addConcept with the same name */
    frequency: number;
    created_at: string;
}

/**
 * A `relates_to` edge from a paper record (`in`) to a concept record (`out`).
 */
export interface Relationship {
    id: number;
    in: number;
    out: number;
    relationship_type: RelationshipType;
    /** 0.0 to 1.0 */
    strength: number;
    created_at: string;
}

export interface RelatedConcept {
    concept: Concept;
    relationship_type: RelationshipType;
    strength: number;
}

export interface SimilarPaper {
    id: number;
    paper_id: string;
    title: string;
    /** Distinct concepts shared with the origin paper */
    shared_concepts: number;
}

export interface KnowledgeStats {
    papers: number;
    concepts: number;
    relationships: number;
}
