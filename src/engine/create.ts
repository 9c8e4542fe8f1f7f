import type pino from 'pino';
import { KazakhStemmer } from './stemmer.js';
import { loadLemmasOrEmpty } from '../loaders/lemmas.js';
import { loadDefaultInventory, loadSuffixesOrEmpty } from '../loaders/suffixes.js';
import type { KazstemConfig, SearchListener } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * Forward search events to the logger at trace level.
 */
export function traceToLogger(logger: pino.Logger): SearchListener {
    return (event) => logger.trace(event, `search ${event.type}`);
}

/**
 * Build a stemmer from resolved configuration.
 * Missing or broken data sources degrade to empty ones.
 */
export function createStemmer(config: KazstemConfig): KazakhStemmer {
    const logger = getLogger();

    const lemmas = loadLemmasOrEmpty(config.lemmas);
    const inventory = config.suffixes ? loadSuffixesOrEmpty(config.suffixes) : loadDefaultInventory();

    logger.debug(
        { lemmas: lemmas.size, suffixes: inventory.size, policy: config.earlyReturnPolicy },
        'Stemmer ready'
    );

    return new KazakhStemmer({
        lemmas,
        inventory,
        exceptions: config.exceptions,
        earlyReturnPolicy: config.earlyReturnPolicy,
        listener: logger.isLevelEnabled('trace') ? traceToLogger(logger) : undefined,
    });
}
