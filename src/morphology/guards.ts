import { CASE_RULES } from './constraints.js';
import { ruleTable, type SuffixRule } from './rules.js';
import { SuffixCategory } from '../types/index.js';

/** Negation-like verb markers. */
export const NEGATION_MARKERS: readonly string[] = ['ма', 'ме', 'ба', 'бе', 'па', 'пе'];

/** Comparative degree endings. */
export const COMPARATIVE_SUFFIXES: readonly string[] = ['ырақ', 'ірек', 'рақ', 'рек'];

export const VERB_RULES: ReadonlyMap<string, SuffixRule> = ruleTable([
    [['а', 'е'], { requireLemmaBase: true }],
    [NEGATION_MARKERS, { blockedIfBothLemmas: { maxBaseLength: 2 } }],
]);

export const PREDICATE_RULES: ReadonlyMap<string, SuffixRule> = ruleTable([
    [COMPARATIVE_SUFFIXES, { requireLemmaBase: true, minBaseLength: 4 }],
]);

/**
 * Guards attached to a whole category.
 */
export interface CategoryGuards {
    rules: ReadonlyMap<string, SuffixRule>;
    /** Applies to one-character suffixes without a rule of their own. */
    singleCharacterRule?: SuffixRule;
    /** Refuse a strip when the word and its base are both lemmas. */
    dualLemmaGuard: boolean;
}

const NO_RULES: ReadonlyMap<string, SuffixRule> = new Map();

export const CATEGORY_GUARDS: Readonly<Record<SuffixCategory, CategoryGuards>> = {
    [SuffixCategory.PRED_PRIORITY]: { rules: NO_RULES, dualLemmaGuard: false },
    [SuffixCategory.CASE]: { rules: CASE_RULES, dualLemmaGuard: true },
    [SuffixCategory.POSSESSIVE]: { rules: NO_RULES, dualLemmaGuard: true },
    [SuffixCategory.PLURAL]: { rules: NO_RULES, dualLemmaGuard: true },
    [SuffixCategory.VERB]: {
        rules: VERB_RULES,
        singleCharacterRule: { blockedIfBothLemmas: true },
        dualLemmaGuard: false,
    },
    [SuffixCategory.PREDICATE]: { rules: PREDICATE_RULES, dualLemmaGuard: false },
};

/**
 * Rule governing `suffix` within `category`, if any.
 */
export function ruleFor(category: SuffixCategory, suffix: string): SuffixRule | undefined {
    const guards = CATEGORY_GUARDS[category];
    const rule = guards.rules.get(suffix);
    if (rule) return rule;
    return [...suffix].length === 1 ? guards.singleCharacterRule : undefined;
}
