/**
 * paper-search-kit: academic paper discovery, PDF processing and a
 * paper/concept knowledge graph.
 */
export * from './types/index.js';

export { SearxngAdapter, guessPdfUrl } from './sources/searxng.js';
export { OpenAlexAdapter } from './sources/openalex.js';
export { SemanticScholarAdapter } from './sources/semantic-scholar.js';

export { DocumentProcessor, type DocumentProcessorOptions } from './document/processor.js';
export { PdfParseConverter, PdfTextExtractor, extractPdfText } from './document/pdf-converter.js';

export { KnowledgeStore, type KnowledgeStoreOptions } from './storage/knowledge-store.js';

export { resolveConfig, loadEnvVars } from './utils/config.js';
export { initLogger, getLogger } from './utils/logger.js';
export {
    HttpClient,
    HttpError,
    createHttpClient,
    getHttpClient,
    type HttpClientOptions,
    type HttpRequestOptions,
    type HttpResponse,
} from './utils/http-client.js';
export {
    PaperSearchError,
    InvalidArgumentError,
    UnsupportedCapabilityError,
    PdfNotAvailableError,
    DocumentNotFoundError,
    RecordNotFoundError,
} from './utils/errors.js';

export {
    createPaperSearch,
    VERSION,
    type PaperSearch,
    type CreatePaperSearchOptions,
} from './toolkit.js';
