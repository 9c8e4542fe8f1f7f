import { normalizeWord } from '../morphology/alphabet.js';
import { CATEGORY_ORDER, SOURCE_CATEGORIES, SuffixCategory } from '../types/index.js';

/**
 * Plural personal endings that are probed before every other category.
 */
export const PRIORITY_PREDICATE_SUFFIXES: readonly string[] = ['сыңдар', 'сіңдер', 'сыздар', 'сіздер'];

/**
 * Suffix document shape: category name → suffix strings.
 */
export type SuffixSource = Readonly<Record<string, readonly string[]>>;

/**
 * Malformed suffix data rejected at construction.
 */
export class InventoryError extends Error {
    constructor(
        message: string,
        public readonly category?: string
    ) {
        super(message);
        this.name = 'InventoryError';
    }
}

function toSourceCategory(name: string): SuffixCategory | undefined {
    return [...SOURCE_CATEGORIES].find((category) => category === name);
}

/**
 * Suffixes partitioned by category, each list longest-first.
 *
 * Built once and never mutated; safe to share between stemmers.
 */
export class SuffixInventory {
    private readonly byCategory: ReadonlyMap<SuffixCategory, readonly string[]>;

    private constructor(byCategory: Map<SuffixCategory, readonly string[]>) {
        this.byCategory = byCategory;
        Object.freeze(this);
    }

    /**
     * Validate and normalize a parsed suffix document.
     * Throws InventoryError on unknown categories, non-string or empty entries.
     */
    static fromSource(source: unknown): SuffixInventory {
        if (typeof source !== 'object' || source === null || Array.isArray(source)) {
            throw new InventoryError('Suffix source must be an object of category → suffix list');
        }

        const collected = new Map<SuffixCategory, string[]>();

        for (const [key, value] of Object.entries(source)) {
            const name = toSourceCategory(key.trim().toUpperCase());
            if (!name) {
                throw new InventoryError(`Unknown suffix category: ${key}`, key);
            }
            if (!Array.isArray(value)) {
                throw new InventoryError(`Suffixes for ${key} must be an array`, key);
            }

            const list = collected.get(name) ?? [];
            for (const entry of value) {
                if (typeof entry !== 'string') {
                    throw new InventoryError(`Non-string suffix in ${key}: ${String(entry)}`, key);
                }
                const suffix = normalizeWord(entry.trim());
                if (!suffix) {
                    throw new InventoryError(`Empty suffix in ${key}`, key);
                }
                if (!list.includes(suffix)) list.push(suffix);
            }
            collected.set(name, list);
        }

        const predicate = collected.get(SuffixCategory.PREDICATE) ?? [];
        const priority = predicate.filter((s) => PRIORITY_PREDICATE_SUFFIXES.includes(s));
        collected.set(
            SuffixCategory.PREDICATE,
            predicate.filter((s) => !PRIORITY_PREDICATE_SUFFIXES.includes(s))
        );
        collected.set(SuffixCategory.PRED_PRIORITY, priority);

        const byCategory = new Map<SuffixCategory, readonly string[]>();
        for (const category of CATEGORY_ORDER) {
            // Array#sort is stable, so equal-length suffixes keep source order
            const sorted = [...(collected.get(category) ?? [])].sort((a, b) => b.length - a.length);
            byCategory.set(category, Object.freeze(sorted));
        }

        return new SuffixInventory(byCategory);
    }

    static empty(): SuffixInventory {
        return SuffixInventory.fromSource({});
    }

    suffixes(category: SuffixCategory): readonly string[] {
        return this.byCategory.get(category) ?? [];
    }

    /** Total number of suffixes across all categories. */
    get size(): number {
        let total = 0;
        for (const list of this.byCategory.values()) total += list.length;
        return total;
    }

    toJSON(): Record<SuffixCategory, readonly string[]> {
        return {
            [SuffixCategory.CASE]: this.suffixes(SuffixCategory.CASE),
            [SuffixCategory.POSSESSIVE]: this.suffixes(SuffixCategory.POSSESSIVE),
            [SuffixCategory.PLURAL]: this.suffixes(SuffixCategory.PLURAL),
            [SuffixCategory.PREDICATE]: this.suffixes(SuffixCategory.PREDICATE),
            [SuffixCategory.VERB]: this.suffixes(SuffixCategory.VERB),
            [SuffixCategory.PRED_PRIORITY]: this.suffixes(SuffixCategory.PRED_PRIORITY),
        };
    }
}
