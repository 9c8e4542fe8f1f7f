import { tokenize } from './tokenizer.js';
import type { KazakhStemmer } from '../engine/stemmer.js';

/**
 * Tokenize a text and replace every token with its lemma.
 */
export function stemText(text: string, stemmer: KazakhStemmer): string[] {
    return tokenize(text).map((token) => stemmer.stem(token));
}
