import { isVowel } from './alphabet.js';
import type { LemmaStore } from '../lexicon/lemma-store.js';

/**
 * A tail the base must end in. With `afterVowel`, the character
 * right before the tail must also be a vowel.
 */
export interface BaseTail {
    tail: string;
    afterVowel?: boolean;
}

/**
 * Admissibility record attached to one suffix.
 * Every field is optional; an empty record admits everything.
 */
export interface SuffixRule {
    precedingClass?: 'vowel' | 'consonant';
    requiredBaseTails?: readonly BaseTail[];
    blockedBaseEndings?: readonly string[];
    blockedIfWordIsLemma?: boolean;
    /** Word minus its final vowel is a lemma, i.e. `lemma + -ы/-і`. */
    blockedIfPossessiveReading?: boolean;
    requireLemmaBase?: boolean;
    minBaseLength?: number;
    /** `true`, or only while the base is at most `maxBaseLength` long. */
    blockedIfBothLemmas?: boolean | { maxBaseLength: number };
}

/** Name of the rule field that refused a strip. */
export type RuleViolation = keyof SuffixRule;

export interface RuleContext {
    word: string;
    base: string;
    lemmas: LemmaStore;
}

function endsWithTail(base: string, { tail, afterVowel }: BaseTail): boolean {
    if (!base.endsWith(tail)) return false;
    if (!afterVowel) return true;
    return isVowel(base[base.length - tail.length - 1]);
}

/**
 * Evaluate a rule against a proposed strip.
 * Returns the first violated field, or null when the strip is admissible.
 */
export function evaluateRule(rule: SuffixRule, { word, base, lemmas }: RuleContext): RuleViolation | null {
    if (rule.minBaseLength !== undefined && base.length < rule.minBaseLength) {
        return 'minBaseLength';
    }

    if (rule.precedingClass) {
        const vowelFinal = isVowel(base.at(-1));
        if (base.length === 0 || vowelFinal !== (rule.precedingClass === 'vowel')) {
            return 'precedingClass';
        }
    }

    if (rule.requiredBaseTails && !rule.requiredBaseTails.some((t) => endsWithTail(base, t))) {
        return 'requiredBaseTails';
    }

    if (rule.blockedBaseEndings?.some((ending) => base.endsWith(ending))) {
        return 'blockedBaseEndings';
    }

    if (rule.blockedIfWordIsLemma && lemmas.has(word)) {
        return 'blockedIfWordIsLemma';
    }

    if (rule.blockedIfPossessiveReading && isVowel(word.at(-1)) && lemmas.has(word.slice(0, -1))) {
        return 'blockedIfPossessiveReading';
    }

    if (rule.requireLemmaBase && !lemmas.has(base)) {
        return 'requireLemmaBase';
    }

    if (rule.blockedIfBothLemmas) {
        const limit = rule.blockedIfBothLemmas === true ? Infinity : rule.blockedIfBothLemmas.maxBaseLength;
        if (base.length <= limit && lemmas.has(word) && lemmas.has(base)) {
            return 'blockedIfBothLemmas';
        }
    }

    return null;
}

/**
 * Build a suffix → rule table, giving every listed suffix the same rule.
 */
export function ruleTable(entries: ReadonlyArray<[readonly string[], SuffixRule]>): ReadonlyMap<string, SuffixRule> {
    const table = new Map<string, SuffixRule>();
    for (const [suffixes, rule] of entries) {
        for (const suffix of suffixes) {
            table.set(suffix, rule);
        }
    }
    return table;
}
