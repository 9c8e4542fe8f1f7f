import { ruleTable, type BaseTail, type SuffixRule } from './rules.js';

/**
 * Third-person possessive endings a case suffix may attach to.
 */
export const THIRD_PERSON_TAILS: readonly string[] = ['сы', 'сі', 'ы', 'і'];

const possessiveTails: BaseTail[] = [
    ...THIRD_PERSON_TAILS.map((tail) => ({ tail })),
    { tail: 'м', afterVowel: true },
    { tail: 'ң', afterVowel: true },
];

/**
 * Admissibility of case suffixes.
 *
 * Case endings are the layer most likely to match the tail of an
 * underived lemma, so each ambiguous one is pinned to the base shapes
 * it can actually follow.
 */
export const CASE_RULES: ReadonlyMap<string, SuffixRule> = ruleTable([
    // accusative after a vowel-final base; "-сы + н" is handled by the enclitic
    [['ны', 'ні'], {
        minBaseLength: 1,
        precedingClass: 'vowel',
        blockedBaseEndings: THIRD_PERSON_TAILS,
    }],
    // accusative after a consonant-final base
    [['ын', 'ін'], {
        precedingClass: 'consonant',
        blockedBaseEndings: ['с'],
    }],
    // dative only after a possessive
    [['а', 'е'], {
        requiredBaseTails: possessiveTails,
    }],
    // enclitic accusative
    [['н'], {
        requiredBaseTails: THIRD_PERSON_TAILS.map((tail) => ({ tail })),
        blockedIfWordIsLemma: true,
    }],
    [['ды', 'ді', 'ты', 'ті'], {
        precedingClass: 'consonant',
        blockedBaseEndings: ['ып', 'іп'],
        blockedIfPossessiveReading: true,
    }],
]);
