/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * SearXNG metasearch backend configuration.
 */
export interface SearxngConfig {
    baseUrl: string;
    defaultCategory: string;
}

export interface OpenAlexConfig {
    apiKey?: string;
    /** Contact email for the polite pool */
    email?: string;
}

export interface SemanticScholarConfig {
    apiKey?: string;
}

/**
 * Knowledge store location. The database file lives at
 * `{url}/{namespace}/{database}.db`, or in memory when url is `:memory:`.
 */
export interface KnowledgeConfig {
    url: string;
    namespace: string;
    database: string;
}

export interface HttpConfig {
    timeoutMs: number;
}

/**
 * Full configuration merged from overrides, env vars, and config file.
 */
export interface PaperSearchConfig {
    searxng: SearxngConfig;
    openalex: OpenAlexConfig;
    s2: SemanticScholarConfig;
    knowledge: KnowledgeConfig;
    http: HttpConfig;

    /** Directory PDFs are downloaded into */
    downloadDir: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Partial configuration, as read from a config file or passed as overrides.
 */
export type PaperSearchConfigInput = Partial<
    Omit<PaperSearchConfig, 'searxng' | 'openalex' | 's2' | 'knowledge' | 'http'>
> & {
    searxng?: Partial<SearxngConfig>;
    openalex?: Partial<OpenAlexConfig>;
    s2?: Partial<SemanticScholarConfig>;
    knowledge?: Partial<KnowledgeConfig>;
    http?: Partial<HttpConfig>;
};

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: PaperSearchConfig = {
    searxng: {
        baseUrl: 'http://localhost:8080',
        defaultCategory: 'science',
    },
    openalex: {},
    s2: {},
    knowledge: {
        url: './data',
        namespace: 'paper_search',
        database: 'knowledge',
    },
    http: {
        timeoutMs: 30000,
    },
    downloadDir: './downloads',
    logLevel: 'info',
    jsonLogs: false,
};
