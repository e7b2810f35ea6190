import os from 'node:os';
import path from 'node:path';
import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type CacheConfig, type DataLimits, type RetryConfig } from '../types/index.js';
import { getLogger } from './logger.js';

export const DEFAULT_CACHE_DIR = path.join(os.homedir(), '.config', 'citecache');

/**
 * Values a config file, the environment or the caller may set.
 * Nested groups may be given partially.
 */
export type ConfigOverrides = Partial<Omit<CacheConfig, 'retry' | 'data'>> & {
    retry?: Partial<RetryConfig>;
    data?: Partial<DataLimits>;
};

const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const;

const limitSchema = z.object({ limit: z.number().int().positive() });

const overridesSchema: z.ZodType<ConfigOverrides, z.ZodTypeDef, unknown> = z
    .object({
        cacheDir: z.string().min(1),
        backend: z.enum(['jsonl', 'sqlite']),
        apiKey: z.string().min(1),
        batchSize: z.number().int().positive(),
        clientTimeout: z.number().int().positive(),
        corpusCacheDir: z.string().min(1),
        tolerance: z.number().int().nonnegative(),
        maxLoadedShards: z.number().int().positive(),
        logLevel: z.enum(LOG_LEVELS),
        jsonLogs: z.boolean(),
        retry: z
            .object({
                maxAttempts: z.number().int().positive(),
                minBackoffMs: z.number().nonnegative(),
                maxBackoffMs: z.number().nonnegative(),
            })
            .partial(),
        data: z
            .object({
                search: limitSchema,
                details: limitSchema,
                citations: limitSchema,
                references: limitSchema,
                author: limitSchema,
                authorPapers: limitSchema,
            })
            .partial(),
    })
    .partial()
    .strict();

/**
 * Load configuration from `citecache.config.json` or a `.citecacherc` using cosmiconfig.
 * Returns null if no config file is found (defaults are used then).
 * A file that does not validate is an error.
 */
async function loadConfigFile(options: { configFile?: string; searchFrom?: string }): Promise<ConfigOverrides | null> {
    const explorer = cosmiconfig('citecache', {
        searchPlaces: ['citecache.config.json', '.citecacherc', '.citecacherc.json', '.citecacherc.yaml'],
    });

    const result = options.configFile
        ? await explorer.load(options.configFile)
        : await explorer.search(options.searchFrom);
    if (!result || result.isEmpty) return null;

    const parsed = overridesSchema.safeParse(result.config);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        throw new Error(`Invalid config file ${result.filepath}: ${issues}`);
    }
    getLogger().debug({ path: result.filepath }, 'Loaded config file');
    return parsed.data;
}

/**
 * Read relevant environment variables.
 */
function loadEnvVars(env: NodeJS.ProcessEnv): ConfigOverrides {
    const config: ConfigOverrides = {};
    const apiKey = env['S2_API_KEY'];
    if (apiKey) config.apiKey = apiKey;
    const cacheDir = env['CITECACHE_DIR'];
    if (cacheDir) config.cacheDir = cacheDir;
    const logLevel = LOG_LEVELS.find((level) => level === env['CITECACHE_LOG_LEVEL']);
    if (logLevel) config.logLevel = logLevel;
    const jsonLogs = env['CITECACHE_JSON_LOGS'];
    if (jsonLogs) config.jsonLogs = jsonLogs === '1' || jsonLogs === 'true';
    return config;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: overrides > environment variables > config file > defaults
 */
export async function resolveConfig(
    overrides: ConfigOverrides = {},
    options: { configFile?: string; searchFrom?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<CacheConfig> {
    const fileConfig = await loadConfigFile(options);
    const envConfig = loadEnvVars(options.env ?? process.env);

    // Deep merge with precedence
    const merged: CacheConfig = {
        ...DEFAULT_CONFIG,
        cacheDir: DEFAULT_CACHE_DIR,
        ...fileConfig,
        ...envConfig,
        ...overrides,
        retry: {
            ...DEFAULT_CONFIG.retry,
            ...fileConfig?.retry,
            ...overrides.retry,
        },
        data: {
            ...DEFAULT_CONFIG.data,
            ...fileConfig?.data,
            ...overrides.data,
        },
    };

    return merged;
}
