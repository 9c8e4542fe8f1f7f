/**
 * Kazakh Cyrillic letter classes used by the constraints and repairs.
 */

/** Every letter treated as a vowel when checking a segment boundary. */
export const VOWELS: ReadonlySet<string> = new Set([...'аәеёиіоуыөүұ']);

/** Back vowels; an elided stem built on one of these takes 'ы'. */
export const BACK_VOWELS: ReadonlySet<string> = new Set([...'аоұы']);

/** Front vowels; an elided stem built on one of these takes 'і'. */
export const FRONT_VOWELS: ReadonlySet<string> = new Set([...'әеөүі']);

/**
 * Voiced consonant at a stem boundary → the voiceless consonant
 * it alternates with in the dictionary form (кітабы ← кітап).
 */
export const REVERSE_MUTATION: ReadonlyMap<string, string> = new Map([
    ['б', 'п'],
    ['г', 'к'],
    ['ғ', 'қ'],
    ['д', 'т'],
]);

export function isVowel(ch: string | undefined): boolean {
    return ch !== undefined && VOWELS.has(ch);
}

export function isHarmonyVowel(ch: string): boolean {
    return BACK_VOWELS.has(ch) || FRONT_VOWELS.has(ch);
}

/**
 * Normalize a surface word: Unicode composed form, lower case.
 */
export function normalizeWord(word: string): string {
    return word.normalize('NFC').toLowerCase().normalize('NFC');
}
