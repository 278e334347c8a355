import { DocumentProcessor } from './document/processor.js';
import { OpenAlexAdapter } from './sources/openalex.js';
import { SearxngAdapter } from './sources/searxng.js';
import { SemanticScholarAdapter } from './sources/semantic-scholar.js';
import { KnowledgeStore } from './storage/knowledge-store.js';
import type { PaperSearchConfig, PaperSearchConfigInput } from './types/index.js';
import { resolveConfig } from './utils/config.js';
import { createHttpClient } from './utils/http-client.js';
import { getLogger, initLogger } from './utils/logger.js';

export const VERSION = '0.1.0';

export interface PaperSearch {
    config: PaperSearchConfig;
    sources: {
        searxng: SearxngAdapter;
        openalex: OpenAlexAdapter;
        s2: SemanticScholarAdapter;
    };
    documents: DocumentProcessor;
    knowledge: KnowledgeStore;
    /** Close the knowledge store */
    close(): Promise<void>;
}

export interface CreatePaperSearchOptions {
    /** Directory to start the config file search from */
    searchFrom?: string;
    env?: NodeJS.ProcessEnv;
}

/**
 * Resolve configuration and wire up every component.
 * All adapters share one HTTP client, so rate limits apply across them.
 */
export async function createPaperSearch(
    overrides: PaperSearchConfigInput = {},
    options: CreatePaperSearchOptions = {}
): Promise<PaperSearch> {
    const config = await resolveConfig(overrides, options);
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

    const httpClient = createHttpClient({
        timeout: config.http.timeoutMs,
        version: VERSION,
        email: config.openalex.email,
    });

    const knowledge = new KnowledgeStore(config.knowledge);

    getLogger().debug(
        { searxng: config.searxng.baseUrl, knowledge: knowledge.location },
        'Paper search toolkit ready'
    );

    return {
        config,
        sources: {
            searxng: new SearxngAdapter({
                httpClient,
                baseUrl: config.searxng.baseUrl,
                defaultCategory: config.searxng.defaultCategory,
            }),
            openalex: new OpenAlexAdapter({
                httpClient,
                apiKey: config.openalex.apiKey,
                email: config.openalex.email,
                downloadDir: config.downloadDir,
            }),
            s2: new SemanticScholarAdapter({
                httpClient,
                apiKey: config.s2.apiKey,
                downloadDir: config.downloadDir,
            }),
        },
        documents: new DocumentProcessor(),
        knowledge,
        close: () => knowledge.close(),
    };
}
