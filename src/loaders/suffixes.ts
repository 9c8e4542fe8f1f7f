import { fileURLToPath } from 'node:url';
import { readUtf8 } from './read.js';
import { LoaderError } from './errors.js';
import { InventoryError, SuffixInventory } from '../lexicon/suffix-inventory.js';
import { getLogger } from '../utils/logger.js';

/** Suffix document shipped with the package. */
export const DEFAULT_SUFFIXES_PATH = fileURLToPath(new URL('../../data/suffixes.json', import.meta.url));

/**
 * Load and validate a JSON suffix document.
 * Throws LoaderError.
 */
export function loadSuffixes(path: string): SuffixInventory {
    const text = readUtf8(path);

    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (error) {
        throw new LoaderError(`Invalid JSON in ${path}`, 'MALFORMED_DATA', path, { cause: error });
    }

    try {
        const inventory = SuffixInventory.fromSource(parsed);
        getLogger().debug({ path, suffixes: inventory.size }, 'Loaded suffix inventory');
        return inventory;
    } catch (error) {
        if (error instanceof InventoryError) {
            throw new LoaderError(`${error.message} (${path})`, 'MALFORMED_DATA', path, { cause: error });
        }
        throw error;
    }
}

/**
 * Load a suffix document, degrading to an empty inventory on failure.
 */
export function loadSuffixesOrEmpty(path: string): SuffixInventory {
    try {
        return loadSuffixes(path);
    } catch (error) {
        if (!(error instanceof LoaderError)) throw error;
        getLogger().warn({ path, code: error.code }, 'Failed to load suffixes, using empty inventory');
        return SuffixInventory.empty();
    }
}

let defaultInventory: SuffixInventory | null = null;

/**
 * The bundled inventory, loaded once per process.
 */
export function loadDefaultInventory(): SuffixInventory {
    if (!defaultInventory) {
        defaultInventory = loadSuffixes(DEFAULT_SUFFIXES_PATH);
    }
    return defaultInventory;
}
