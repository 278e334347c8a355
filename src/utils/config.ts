import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import {
    DEFAULT_CONFIG,
    type KnowledgeConfig,
    type OpenAlexConfig,
    type PaperSearchConfig,
    type PaperSearchConfigInput,
    type SearxngConfig,
    type SemanticScholarConfig,
} from '../types/index.js';
import { getLogger, parseFlag, parseLogLevel } from './logger.js';

/**
 * Shape of paper-search.config.json. Every key is optional.
 */
const ConfigFileSchema = z
    .object({
        searxng: z.object({ baseUrl: z.string(), defaultCategory: z.string() }).partial(),
        openalex: z.object({ apiKey: z.string(), email: z.string() }).partial(),
        s2: z.object({ apiKey: z.string() }).partial(),
        knowledge: z.object({ url: z.string(), namespace: z.string(), database: z.string() }).partial(),
        http: z.object({ timeoutMs: z.number().int().positive() }).partial(),
        downloadDir: z.string(),
        logLevel: z.enum(['error', 'warn', 'info', 'debug']),
        jsonLogs: z.boolean(),
    })
    .partial();

/**
 * Load configuration from paper-search.config.json using cosmiconfig.
 * Returns null if no config file is found.
 */
async function loadConfigFile(searchFrom?: string): Promise<PaperSearchConfigInput | null> {
    const explorer = cosmiconfig('paper-search', {
        searchPlaces: ['paper-search.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            const parsed = ConfigFileSchema.safeParse(result.config);
            if (!parsed.success) {
                getLogger().warn({ path: result.filepath, issues: parsed.error.issues }, 'Invalid config file, using defaults');
                return null;
            }
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return parsed.data;
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables. Unset variables are left out so they
 * do not mask lower-precedence values.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): PaperSearchConfigInput {
    const searxng: Partial<SearxngConfig> = {};
    setIfDefined(searxng, 'baseUrl', env['SEARXNG_URL']);

    const openalex: Partial<OpenAlexConfig> = {};
    setIfDefined(openalex, 'apiKey', env['OPENALEX_API_KEY']);
    setIfDefined(openalex, 'email', env['OPENALEX_EMAIL']);

    const s2: Partial<SemanticScholarConfig> = {};
    setIfDefined(s2, 'apiKey', env['S2_API_KEY']);

    const knowledge: Partial<KnowledgeConfig> = {};
    setIfDefined(knowledge, 'url', env['KNOWLEDGE_DB_URL']);
    setIfDefined(knowledge, 'namespace', env['KNOWLEDGE_DB_NS']);
    setIfDefined(knowledge, 'database', env['KNOWLEDGE_DB_NAME']);

    const config: PaperSearchConfigInput = { searxng, openalex, s2, knowledge };
    setIfDefined(config, 'downloadDir', env['PAPER_SEARCH_DOWNLOAD_DIR']);
    setIfDefined(config, 'logLevel', parseLogLevel(env['LOG_LEVEL']));
    if (env['LOG_JSON'] !== undefined) config.jsonLogs = parseFlag(env['LOG_JSON']);

    return config;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: overrides > environment variables > config file > defaults
 */
export async function resolveConfig(
    overrides: PaperSearchConfigInput = {},
    options: { searchFrom?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<PaperSearchConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env);

    // Deep merge with precedence
    return {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...envConfig,
        ...overrides,
        searxng: {
            ...DEFAULT_CONFIG.searxng,
            ...fileConfig?.searxng,
            ...envConfig.searxng,
            ...overrides.searxng,
        },
        openalex: {
            ...DEFAULT_CONFIG.openalex,
            ...fileConfig?.openalex,
            ...envConfig.openalex,
            ...overrides.openalex,
        },
        s2: {
            ...DEFAULT_CONFIG.s2,
            ...fileConfig?.s2,
            ...envConfig.s2,
            ...overrides.s2,
        },
        knowledge: {
            ...DEFAULT_CONFIG.knowledge,
            ...fileConfig?.knowledge,
            ...envConfig.knowledge,
            ...overrides.knowledge,
        },
        http: {
            ...DEFAULT_CONFIG.http,
            ...fileConfig?.http,
            ...overrides.http,
        },
    };
}

function setIfDefined<T, K extends keyof T>(target: T, key: K, value: T[K] | undefined): void {
    if (value !== undefined) {
        target[key] = value;
    }
}
