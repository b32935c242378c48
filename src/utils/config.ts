import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import {
    DEFAULT_CONFIG,
    SourceTier,
    type RelworkConfig,
    type RelworkConfigOverrides,
} from '../types/index.js';
import { getLogger } from './logger.js';

const logLevelSchema = z.enum(['error', 'warn', 'info', 'debug', 'silent']);

/**
 * Shape accepted in relwork.config.json. Unknown keys are ignored.
 */
const configFileSchema = z.object({
    storage: z.object({
        curatedDir: z.string().min(1),
        cachedDir: z.string().min(1),
        maxTitleLength: z.number().int().min(8),
    }).partial().optional(),
    retrieval: z.object({
        maxResults: z.number().int().positive(),
        sources: z.array(z.nativeEnum(SourceTier)),
        dedupThreshold: z.number().min(0).max(1),
        overfetchFactor: z.number().min(1),
        parallelRemote: z.boolean(),
    }).partial().optional(),
    sources: z.object({
        timeoutMs: z.number().int().positive(),
        semanticScholarApiKey: z.string(),
        arxivBaseUrl: z.string().url(),
        semanticScholarBaseUrl: z.string().url(),
    }).partial().optional(),
    download: z.object({
        enabled: z.boolean(),
        timeoutMs: z.number().int().positive(),
        concurrency: z.number().int().positive(),
    }).partial().optional(),
    logLevel: logLevelSchema.optional(),
    jsonLogs: z.boolean().optional(),
});

/**
 * Load configuration from relwork.config.json using cosmiconfig.
 * Returns null if no config file is found or it fails validation.
 */
async function loadConfigFile(searchFrom?: string): Promise<RelworkConfigOverrides | null> {
    const explorer = cosmiconfig('relwork', {
        searchPlaces: ['relwork.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            const parsed = configFileSchema.safeParse(result.config);
            if (!parsed.success) {
                getLogger().warn(
                    { path: result.filepath, issues: parsed.error.issues },
                    'Invalid config file, using defaults'
                );
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
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv): RelworkConfigOverrides {
    const overrides: RelworkConfigOverrides = {};

    const apiKey = env['SEMANTIC_SCHOLAR_API_KEY'];
    if (apiKey) {
        overrides.sources = { semanticScholarApiKey: apiKey };
    }

    const maxPapers = parseInt(env['MAX_PAPERS'] ?? '', 10);
    if (!isNaN(maxPapers) && maxPapers > 0) {
        overrides.retrieval = { maxResults: maxPapers };
    }

    const download: RelworkConfigOverrides['download'] = {};
    const downloadPdfs = env['DOWNLOAD_PDFS'];
    if (downloadPdfs !== undefined) {
        download.enabled = downloadPdfs.toLowerCase() === 'true';
    }
    // Seconds, as in the other tools reading this variable
    const timeoutSeconds = parseInt(env['PDF_DOWNLOAD_TIMEOUT'] ?? '', 10);
    if (!isNaN(timeoutSeconds) && timeoutSeconds > 0) {
        download.timeoutMs = timeoutSeconds * 1000;
    }
    if (Object.keys(download).length > 0) {
        overrides.download = download;
    }

    return overrides;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: RelworkConfigOverrides,
    options: { env?: NodeJS.ProcessEnv; searchFrom?: string } = {}
): Promise<RelworkConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env ?? process.env);

    return mergeConfig(DEFAULT_CONFIG, fileConfig ?? {}, envConfig, cliFlags);
}

/**
 * Deep-merge override layers onto a base configuration, later layers winning.
 */
export function mergeConfig(base: RelworkConfig, ...layers: RelworkConfigOverrides[]): RelworkConfig {
    return layers.reduce<RelworkConfig>(
        (merged, layer) => ({
            storage: { ...merged.storage, ...layer.storage },
            retrieval: { ...merged.retrieval, ...layer.retrieval },
            sources: { ...merged.sources, ...layer.sources },
            download: { ...merged.download, ...layer.download },
            logLevel: layer.logLevel ?? merged.logLevel,
            jsonLogs: layer.jsonLogs ?? merged.jsonLogs,
        }),
        base
    );
}
