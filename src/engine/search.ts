import { candidateStrips, looksInflected } from '../morphology/candidates.js';
import { checkStem } from '../morphology/phonology.js';
import type { LemmaStore } from '../lexicon/lemma-store.js';
import type { SuffixInventory } from '../lexicon/suffix-inventory.js';
import type { RepairKind, SearchListener, SuffixStrip } from '../types/index.js';

/**
 * Terminal state of a search branch.
 */
export type SearchResult =
    | { kind: 'found'; lemma: string; repair: RepairKind; path: SuffixStrip[] }
    | { kind: 'exhausted' };

export interface SearchContext {
    lemmas: LemmaStore;
    inventory: SuffixInventory;
    listener?: SearchListener;
}

const EXHAUSTED: SearchResult = { kind: 'exhausted' };

/**
 * Depth-first backtracking search for the lemma of `word`.
 *
 * Every recursive step strips at least one character and decrements
 * `depth`, so a call visits at most `depth` levels. `seen` is shared by
 * every branch of one top-level call.
 *
 * With `preferStripFirst`, the word itself is only accepted after every
 * strip has failed.
 */
export function search(
    word: string,
    depth: number,
    seen: Set<string>,
    ctx: SearchContext,
    preferStripFirst = false
): SearchResult {
    const { lemmas, inventory, listener } = ctx;

    if (depth <= 0 || seen.has(word)) {
        listener?.({ type: 'exhausted', word, depth });
        return EXHAUSTED;
    }
    seen.add(word);
    listener?.({ type: 'enter', word, depth });

    let deferred: SearchResult = EXHAUSTED;
    const self = checkStem(word, lemmas);
    if (self.kind === 'hit') {
        const result: SearchResult = { kind: 'found', lemma: self.lemma, repair: self.repair, path: [] };
        if (!preferStripFirst && !looksInflected(word, inventory, lemmas)) {
            listener?.({ type: 'hit', word, depth, lemma: self.lemma, repair: self.repair });
            return result;
        }
        deferred = result;
    }

    const strips = candidateStrips(word, inventory, lemmas, {
        onBlocked: listener
            ? (category, suffix, rule) => listener({ type: 'blocked', word, depth, category, suffix, rule })
            : undefined,
    });

    for (const { category, suffix, base } of strips) {
        listener?.({ type: 'strip', word, depth, category, suffix, base });
        const strip: SuffixStrip = { category, suffix };

        const hit = checkStem(base, lemmas);
        if (hit.kind === 'hit') {
            listener?.({ type: 'hit', word: base, depth, lemma: hit.lemma, repair: hit.repair });
            return { kind: 'found', lemma: hit.lemma, repair: hit.repair, path: [strip] };
        }

        const found = search(base, depth - 1, seen, ctx);
        if (found.kind === 'found') {
            return { ...found, path: [strip, ...found.path] };
        }
    }

    if (deferred.kind === 'found') {
        listener?.({ type: 'hit', word, depth, lemma: deferred.lemma, repair: deferred.repair });
        return deferred;
    }

    listener?.({ type: 'exhausted', word, depth });
    return EXHAUSTED;
}
