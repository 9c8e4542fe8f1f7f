import { BACK_VOWELS, FRONT_VOWELS, REVERSE_MUTATION, isHarmonyVowel } from './alphabet.js';
import type { LemmaStore } from '../lexicon/lemma-store.js';
import type { StemCheck } from '../types/index.js';

/**
 * Undo final-consonant voicing: "кітаб" → "кітап" if that is a lemma.
 */
export function repairMutation(candidate: string, lemmas: LemmaStore): string | null {
    const last = candidate.at(-1);
    if (last === undefined) return null;

    const voiceless = REVERSE_MUTATION.get(last);
    if (!voiceless) return null;

    const restored = candidate.slice(0, -1) + voiceless;
    return lemmas.has(restored) ? restored : null;
}

/**
 * Restore an elided high vowel before the final consonant: "ауз" → "ауыз".
 *
 * Only mono-vocalic candidates of two or more characters qualify. The
 * inserted vowel follows the harmony class of the nearest vowel.
 */
export function repairElision(candidate: string, lemmas: LemmaStore): string | null {
    const chars = [...candidate];
    if (chars.length < 2) return null;

    const vowelCount = chars.filter(isHarmonyVowel).length;
    if (vowelCount !== 1) return null;

    let inserted: string | null = null;
    for (let i = chars.length - 1; i >= 0; i--) {
        const ch = chars[i] ?? '';
        if (BACK_VOWELS.has(ch)) {
            inserted = 'ы';
            break;
        }
        if (FRONT_VOWELS.has(ch)) {
            inserted = 'і';
            break;
        }
    }
    if (!inserted) return null;

    const restored = candidate.slice(0, -1) + inserted + candidate.slice(-1);
    return lemmas.has(restored) ? restored : null;
}

/**
 * Validate a candidate stem.
 *
 * Precedence is mutation, then direct membership, then elision. A stem
 * whose literal form and devoiced form are both lemmas resolves to the
 * devoiced one.
 */
export function checkStem(candidate: string, lemmas: LemmaStore): StemCheck {
    const mutated = repairMutation(candidate, lemmas);
    if (mutated !== null) return { kind: 'hit', lemma: mutated, repair: 'mutated' };

    if (lemmas.has(candidate)) return { kind: 'hit', lemma: candidate, repair: 'direct' };

    const elided = repairElision(candidate, lemmas);
    if (elided !== null) return { kind: 'hit', lemma: elided, repair: 'elided' };

    return { kind: 'miss' };
}
