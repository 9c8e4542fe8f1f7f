/**
 * Morphological layers a suffix can belong to.
 *
 * The five source categories come from the suffix document;
 * PRED_PRIORITY is derived from PREDICATE when the inventory is built.
 */
export enum SuffixCategory {
    CASE = 'CASE',
    POSSESSIVE = 'POSSESSIVE',
    PLURAL = 'PLURAL',
    PREDICATE = 'PREDICATE',
    VERB = 'VERB',
    PRED_PRIORITY = 'PRED_PRIORITY',
}

/**
 * Order in which categories are probed during a search.
 * PRED_PRIORITY goes first so plural personal endings pre-empt
 * the possessive/personal collisions further down.
 */
export const CATEGORY_ORDER: readonly SuffixCategory[] = [
    SuffixCategory.PRED_PRIORITY,
    SuffixCategory.CASE,
    SuffixCategory.POSSESSIVE,
    SuffixCategory.PLURAL,
    SuffixCategory.VERB,
    SuffixCategory.PREDICATE,
];

/** Categories accepted as keys of a suffix document. */
export const SOURCE_CATEGORIES: ReadonlySet<SuffixCategory> = new Set([
    SuffixCategory.CASE,
    SuffixCategory.POSSESSIVE,
    SuffixCategory.PLURAL,
    SuffixCategory.PREDICATE,
    SuffixCategory.VERB,
]);

/** One suffix removal on the way from a surface word to its lemma. */
export interface SuffixStrip {
    category: SuffixCategory;
    suffix: string;
}
