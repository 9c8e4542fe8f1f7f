/**
 * When a surface word is itself a known lemma:
 * - `always`: return it immediately
 * - `if_looks_uninflected`: return it unless the probe finds a plausible suffix
 * - `never`: always run the full search, falling back to the word
 */
export type EarlyReturnPolicy = 'always' | 'if_looks_uninflected' | 'never';

export const EARLY_RETURN_POLICIES: readonly EarlyReturnPolicy[] = ['always', 'if_looks_uninflected', 'never'];

/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'trace'];

/**
 * Full kazstem configuration merged from CLI flags, env vars, and config file.
 */
export interface KazstemConfig {
    // Data sources
    lemmas?: string;
    suffixes?: string;
    exceptions: string[];

    // Engine
    earlyReturnPolicy: EarlyReturnPolicy;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/** Words that are never stemmed unless configured otherwise. */
export const DEFAULT_EXCEPTIONS: readonly string[] = ['абай', 'алматы', 'туралы', 'және'];

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: KazstemConfig = {
    exceptions: [...DEFAULT_EXCEPTIONS],
    earlyReturnPolicy: 'if_looks_uninflected',
    logLevel: 'info',
    jsonLogs: false,
};

/** Maximum number of nested strips per word. */
export const SEARCH_DEPTH = 8;
