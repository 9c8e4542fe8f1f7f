import { search } from './search.js';
import { normalizeWord } from '../morphology/alphabet.js';
import { looksInflected } from '../morphology/candidates.js';
import { LemmaStore, buildExceptionSet } from '../lexicon/lemma-store.js';
import { SuffixInventory } from '../lexicon/suffix-inventory.js';
import { loadDefaultInventory } from '../loaders/suffixes.js';
import {
    DEFAULT_CONFIG,
    DEFAULT_EXCEPTIONS,
    SEARCH_DEPTH,
    type EarlyReturnPolicy,
    type SearchListener,
    type StemOutcome,
} from '../types/index.js';

export interface StemmerOptions {
    lemmas: LemmaStore | Iterable<string>;
    /** Defaults to the bundled inventory. */
    inventory?: SuffixInventory;
    /** Defaults to DEFAULT_EXCEPTIONS. */
    exceptions?: Iterable<string>;
    earlyReturnPolicy?: EarlyReturnPolicy;
    /** Receives structured trace events for every analysed word. */
    listener?: SearchListener;
}

/**
 * Kazakh lemmatizer: strips suffixes until the remainder is a known lemma.
 *
 * All data is fixed at construction. One instance can serve any number
 * of callers; `stem` keeps no state between calls.
 */
export class KazakhStemmer {
    readonly lemmas: LemmaStore;
    readonly inventory: SuffixInventory;
    readonly exceptions: ReadonlySet<string>;
    readonly earlyReturnPolicy: EarlyReturnPolicy;
    private readonly listener?: SearchListener;

    constructor(options: StemmerOptions) {
        this.lemmas = options.lemmas instanceof LemmaStore ? options.lemmas : new LemmaStore(options.lemmas);
        this.inventory = options.inventory ?? loadDefaultInventory();
        this.exceptions = buildExceptionSet(options.exceptions ?? DEFAULT_EXCEPTIONS);
        this.earlyReturnPolicy = options.earlyReturnPolicy ?? DEFAULT_CONFIG.earlyReturnPolicy;
        this.listener = options.listener;
    }

    /**
     * Lemma for `word`, or the normalized word when none is found.
     */
    stem(word: string): string {
        return this.analyze(word).lemma;
    }

    analyze(word: string): StemOutcome {
        const input = normalizeWord(word);
        const { lemmas, inventory, listener } = this;

        if (this.exceptions.has(input)) {
            listener?.({ type: 'early-return', word: input, depth: SEARCH_DEPTH, reason: 'exception' });
            return { kind: 'found', input, lemma: input, reason: 'exception', path: [] };
        }

        const isLemma = lemmas.has(input);
        let inflected = false;
        if (isLemma) {
            if (this.earlyReturnPolicy === 'always') {
                return this.earlyReturn(input);
            }
            inflected = looksInflected(input, inventory, lemmas);
            if (this.earlyReturnPolicy === 'if_looks_uninflected' && !inflected) {
                return this.earlyReturn(input);
            }
        }

        const result = search(input, SEARCH_DEPTH, new Set(), { lemmas, inventory, listener }, isLemma && inflected);
        if (result.kind === 'found') {
            return { kind: 'found', input, lemma: result.lemma, reason: result.repair, path: result.path };
        }

        return { kind: 'unchanged', input, lemma: input };
    }

    /**
     * Structural probe on a normalized word.
     */
    looksInflected(word: string): boolean {
        return looksInflected(normalizeWord(word), this.inventory, this.lemmas);
    }

    private earlyReturn(input: string): StemOutcome {
        this.listener?.({ type: 'early-return', word: input, depth: SEARCH_DEPTH, reason: 'lemma' });
        return { kind: 'found', input, lemma: input, reason: 'lemma', path: [] };
    }
}

/**
 * One-shot helper. Builds a throwaway stemmer; prefer a shared
 * KazakhStemmer instance when stemming many words.
 */
export function stem(
    word: string,
    lemmas: LemmaStore | Iterable<string>,
    exceptions: Iterable<string>,
    options: Omit<StemmerOptions, 'lemmas' | 'exceptions'> = {}
): string {
    return new KazakhStemmer({ ...options, lemmas, exceptions }).stem(word);
}
