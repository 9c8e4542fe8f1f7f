import { isVowel } from './alphabet.js';
import { ruleFor, CATEGORY_GUARDS } from './guards.js';
import { checkStem } from './phonology.js';
import { evaluateRule, type RuleViolation } from './rules.js';
import type { LemmaStore } from '../lexicon/lemma-store.js';
import type { SuffixInventory } from '../lexicon/suffix-inventory.js';
import { CATEGORY_ORDER, type SuffixCategory } from '../types/index.js';

export type BlockReason = RuleViolation | 'dualLemmaGuard' | 'singleVowelSafeguard';

/** An admissible strip of one suffix from a word. */
export interface Candidate {
    category: SuffixCategory;
    suffix: string;
    base: string;
}

export interface CandidateOptions {
    /**
     * Detection mode: skip the single-vowel safeguard, which only
     * concerns whether to strip, not whether a suffix is present.
     */
    probe?: boolean;
    onBlocked?: (category: SuffixCategory, suffix: string, reason: BlockReason) => void;
}

function blockReason(
    category: SuffixCategory,
    suffix: string,
    word: string,
    base: string,
    lemmas: LemmaStore,
    probe: boolean
): BlockReason | null {
    const rule = ruleFor(category, suffix);
    if (rule) {
        const violation = evaluateRule(rule, { word, base, lemmas });
        if (violation) return violation;
    }

    if (CATEGORY_GUARDS[category].dualLemmaGuard && lemmas.has(word) && lemmas.has(base)) {
        return 'dualLemmaGuard';
    }

    // keep a lemma ending in a vowel unless the strip itself resolves
    if (!probe && suffix.length === 1 && isVowel(suffix) && lemmas.has(word)) {
        if (checkStem(base, lemmas).kind === 'miss') return 'singleVowelSafeguard';
    }

    return null;
}

/**
 * Yield every admissible strip of `word` in probing order:
 * categories by CATEGORY_ORDER, suffixes longest-first within each.
 */
export function* candidateStrips(
    word: string,
    inventory: SuffixInventory,
    lemmas: LemmaStore,
    options: CandidateOptions = {}
): Generator<Candidate, void, undefined> {
    const probe = options.probe ?? false;

    for (const category of CATEGORY_ORDER) {
        for (const suffix of inventory.suffixes(category)) {
            if (suffix.length >= word.length || !word.endsWith(suffix)) continue;

            const base = word.slice(0, -suffix.length);
            const reason = blockReason(category, suffix, word, base, lemmas, probe);
            if (reason) {
                options.onBlocked?.(category, suffix, reason);
                continue;
            }

            yield { category, suffix, base };
        }
    }
}

/**
 * Structural check: does any admissible suffix match?
 * Performs no stem validation.
 */
export function looksInflected(word: string, inventory: SuffixInventory, lemmas: LemmaStore): boolean {
    const first = candidateStrips(word, inventory, lemmas, { probe: true }).next();
    return first.done !== true;
}
