import { normalizeWord } from '../morphology/alphabet.js';

/**
 * Immutable set of known base forms.
 *
 * Entries are normalized (NFC, lower case, trimmed) once at construction;
 * lookups expect the caller to pass an already normalized word.
 */
export class LemmaStore {
    private readonly entries: ReadonlySet<string>;

    constructor(lemmas: Iterable<string>) {
        const entries = new Set<string>();
        for (const lemma of lemmas) {
            const normalized = normalizeWord(lemma.trim());
            if (normalized) entries.add(normalized);
        }
        this.entries = entries;
        Object.freeze(this);
    }

    static empty(): LemmaStore {
        return new LemmaStore([]);
    }

    has(word: string): boolean {
        return this.entries.has(word);
    }

    get size(): number {
        return this.entries.size;
    }

    [Symbol.iterator](): IterableIterator<string> {
        return this.entries.values();
    }
}

/**
 * Normalize a list of never-stem words into a lookup set.
 */
export function buildExceptionSet(words: Iterable<string>): ReadonlySet<string> {
    const set = new Set<string>();
    for (const word of words) {
        const normalized = normalizeWord(word.trim());
        if (normalized) set.add(normalized);
    }
    return set;
}
