/**
 * Library entry point.
 */
export { KazakhStemmer, stem } from './engine/stemmer.js';
export type { StemmerOptions } from './engine/stemmer.js';
export { createStemmer, traceToLogger } from './engine/create.js';
export { search } from './engine/search.js';
export type { SearchResult, SearchContext } from './engine/search.js';
export { LemmaStore, buildExceptionSet } from './lexicon/lemma-store.js';
export { SuffixInventory, InventoryError, PRIORITY_PREDICATE_SUFFIXES } from './lexicon/suffix-inventory.js';
export type { SuffixSource } from './lexicon/suffix-inventory.js';
export { checkStem, repairElision, repairMutation } from './morphology/phonology.js';
export { candidateStrips, looksInflected } from './morphology/candidates.js';
export type { Candidate, BlockReason } from './morphology/candidates.js';
export { CASE_RULES, THIRD_PERSON_TAILS } from './morphology/constraints.js';
export { CATEGORY_GUARDS, VERB_RULES, PREDICATE_RULES, ruleFor } from './morphology/guards.js';
export { evaluateRule } from './morphology/rules.js';
export type { SuffixRule, BaseTail } from './morphology/rules.js';
export { normalizeWord } from './morphology/alphabet.js';
export { loadLemmas, loadLemmasOrEmpty, parseLemmaList } from './loaders/lemmas.js';
export { loadSuffixes, loadSuffixesOrEmpty, loadDefaultInventory } from './loaders/suffixes.js';
export { extractLexcLemmas } from './loaders/lexc.js';
export { LoaderError } from './loaders/errors.js';
export { tokenize } from './nlp/tokenizer.js';
export { stemText } from './nlp/stem-text.js';
export * from './types/index.js';
