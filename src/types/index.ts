/**
 * Barrel export for all shared types.
 */
export { SuffixCategory, CATEGORY_ORDER, SOURCE_CATEGORIES } from './suffix.js';
export type { SuffixStrip } from './suffix.js';
export type {
    RepairKind,
    StemCheck,
    StemReason,
    StemOutcome,
    SearchEvent,
    SearchListener,
} from './result.js';
export {
    DEFAULT_CONFIG,
    DEFAULT_EXCEPTIONS,
    EARLY_RETURN_POLICIES,
    LOG_LEVELS,
    SEARCH_DEPTH,
} from './config.js';
export type { KazstemConfig, EarlyReturnPolicy, LogLevel } from './config.js';
