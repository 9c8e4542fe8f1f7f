import { dirname, resolve } from 'node:path';
import { cosmiconfig } from 'cosmiconfig';
import {
    DEFAULT_CONFIG,
    EARLY_RETURN_POLICIES,
    LOG_LEVELS,
    type EarlyReturnPolicy,
    type KazstemConfig,
    type LogLevel,
} from '../types/index.js';
import { getLogger } from './logger.js';

function asPolicy(value: unknown): EarlyReturnPolicy | undefined {
    return EARLY_RETURN_POLICIES.find((p) => p === value);
}

function asLogLevel(value: unknown): LogLevel | undefined {
    return LOG_LEVELS.find((l) => l === value);
}

/**
 * Keep only well-typed fields of a config object, warning about the rest.
 * Undefined values are skipped.
 * Relative data paths are resolved against `baseDir`.
 */
export function sanitizeConfig(raw: unknown, origin: string, baseDir?: string): Partial<KazstemConfig> {
    const config: Partial<KazstemConfig> = {};
    if (typeof raw !== 'object' || raw === null) return config;

    const entries = new Map(Object.entries(raw));
    const rejected = (key: string) => getLogger().warn({ origin, key, value: entries.get(key) }, 'Ignoring invalid config value');
    const path = (p: string) => (baseDir ? resolve(baseDir, p) : p);

    for (const [key, value] of entries) {
        if (value === undefined) continue;
        switch (key) {
            case 'lemmas':
            case 'suffixes':
                if (typeof value === 'string' && value) config[key] = path(value);
                else rejected(key);
                break;
            case 'exceptions':
                if (Array.isArray(value) && value.every((v): v is string => typeof v === 'string')) {
                    config.exceptions = value;
                } else rejected(key);
                break;
            case 'earlyReturnPolicy': {
                const policy = asPolicy(value);
                if (policy) config.earlyReturnPolicy = policy;
                else rejected(key);
                break;
            }
            case 'logLevel': {
                const level = asLogLevel(value);
                if (level) config.logLevel = level;
                else rejected(key);
                break;
            }
            case 'jsonLogs':
                if (typeof value === 'boolean') config.jsonLogs = value;
                else rejected(key);
                break;
            default:
                rejected(key);
        }
    }

    return config;
}

/**
 * Load configuration from kazstem.config.json (or .kazstemrc.json, or a
 * `kazstem` key in package.json) using cosmiconfig.
 * Returns null if no config file is found.
 */
async function loadConfigFile(cwd: string): Promise<Partial<KazstemConfig> | null> {
    const explorer = cosmiconfig('kazstem', {
        searchPlaces: ['kazstem.config.json', '.kazstemrc.json', 'package.json'],
    });

    try {
        const result = await explorer.search(cwd);
        if (result && !result.isEmpty) {
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return sanitizeConfig(result.config, result.filepath, dirname(result.filepath));
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv): Partial<KazstemConfig> {
    return sanitizeConfig(
        {
            lemmas: env['KAZSTEM_LEMMAS'],
            suffixes: env['KAZSTEM_SUFFIXES'],
            earlyReturnPolicy: env['KAZSTEM_EARLY_RETURN'],
            logLevel: env['KAZSTEM_LOG_LEVEL'],
        },
        'env'
    );
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: Record<string, unknown>,
    options: { cwd?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<KazstemConfig> {
    const fileConfig = await loadConfigFile(options.cwd ?? process.cwd());
    const envConfig = loadEnvVars(options.env ?? process.env);

    const cliConfig = sanitizeConfig(cliFlags, 'cli');

    return {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...envConfig,
        ...cliConfig,
    };
}
