import { readUtf8 } from './read.js';
import { LoaderError } from './errors.js';
import { LemmaStore } from '../lexicon/lemma-store.js';
import { getLogger } from '../utils/logger.js';

/**
 * Parse a lemma list: one entry per line, `#` comments and blanks ignored.
 */
export function parseLemmaList(text: string): string[] {
    const lemmas: string[] = [];
    for (const line of text.split(/\r?\n/)) {
        const entry = line.trim();
        if (!entry || entry.startsWith('#')) continue;
        lemmas.push(entry);
    }
    return lemmas;
}

/**
 * Load a lemma list file into a LemmaStore.
 * Throws LoaderError.
 */
export function loadLemmas(path: string): LemmaStore {
    const store = new LemmaStore(parseLemmaList(readUtf8(path)));
    getLogger().debug({ path, lemmas: store.size }, 'Loaded lemma list');
    return store;
}

/**
 * Load a lemma list, degrading to an empty store on failure.
 * With no lemmas nothing resolves and words pass through unchanged.
 */
export function loadLemmasOrEmpty(path: string | undefined): LemmaStore {
    if (!path) {
        getLogger().warn('No lemma list configured, stemming will return words unchanged');
        return LemmaStore.empty();
    }

    try {
        return loadLemmas(path);
    } catch (error) {
        if (!(error instanceof LoaderError)) throw error;
        getLogger().warn({ path, code: error.code }, 'Failed to load lemma list, using empty set');
        return LemmaStore.empty();
    }
}
