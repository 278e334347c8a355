/**
 * Barrel export for all shared types.
 */
export { createPaper } from './paper.js';
export type {
    Paper,
    PaperSource,
    PaperExtraMap,
    SearxngExtra,
    OpenAlexExtra,
    S2Extra,
} from './paper.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    PaperSearchConfig,
    PaperSearchConfigInput,
    LogLevel,
    SearxngConfig,
    OpenAlexConfig,
    SemanticScholarConfig,
    KnowledgeConfig,
    HttpConfig,
} from './config.js';
export type { SourceAdapter, SourceAdapterOptions } from './source-adapter.js';
export { EXPORT_FORMATS, isExportFormat } from './document.js';
export type {
    ConvertedDocument,
    DocumentConverter,
    PlainTextExtractor,
    DocumentSection,
    DocumentTable,
    DocumentFigure,
    DocumentMetadata,
    DocumentStructure,
    ExtractionMethod,
    ExtractedDocument,
    FailedDocument,
    ProcessedDocument,
    ExportFormat,
} from './document.js';
export type {
    RelationshipType,
    PaperInput,
    StoredPaper,
    Concept,
    Relationship,
    RelatedConcept,
    SimilarPaper,
    KnowledgeStats,
} from './knowledge.js';
