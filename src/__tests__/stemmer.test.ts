import { describe, it, expect } from 'vitest';
import { KazakhStemmer, stem } from '../engine/stemmer.js';
import { SuffixInventory } from '../lexicon/suffix-inventory.js';
import { SEARCH_DEPTH, SuffixCategory, type SearchEvent } from '../types/index.js';

function recorder(): { events: SearchEvent[]; listener: (e: SearchEvent) => void } {
    const events: SearchEvent[] = [];
    return { events, listener: (e) => events.push(e) };
}

describe('KazakhStemmer', () => {
    describe('reference scenarios', () => {
        it('should strip a case ending to reach the lemma', () => {
            expect(stem('мектептің', ['мектеп'], [])).toBe('мектеп');
        });

        it('should restore an elided vowel', () => {
            expect(stem('аузы', ['ауыз'], [])).toBe('ауыз');
        });

        it('should reverse consonant mutation after stripping a possessive', () => {
            expect(stem('кітабым', ['кітап'], [])).toBe('кітап');
        });

        it('should return exceptions unchanged and case-folded', () => {
            expect(stem('Абай', ['мектеп'], ['абай'])).toBe('абай');
        });

        it('should keep an uninflected lemma as is', () => {
            expect(stem('алма', ['алма'], [], { earlyReturnPolicy: 'if_looks_uninflected' })).toBe('алма');
        });

        it('should return the normalized word when the lemma set is empty', () => {
            expect(stem('кез-келген', [], [])).toBe('кез-келген');
            expect(stem('Кез-Келген', [], [], { inventory: SuffixInventory.empty() })).toBe('кез-келген');
        });
    });

    describe('paradigms', () => {
        const stemmer = new KazakhStemmer({ lemmas: ['алма', 'сөз'], exceptions: [] });

        it.each([
            'алманың', 'алмаға', 'алманы', 'алмада', 'алмадағы', 'алмадан', 'алмамен',
            'алмалар', 'алмалардың', 'алмаларға', 'алмам', 'алмамның', 'алмаңа',
            'алмасы', 'алмасын', 'алмасына', 'алмалары', 'алмаларымның', 'алмаңыз',
            'алмасыңдар',
        ])('should stem %s to алма', (word) => {
            expect(stemmer.stem(word)).toBe('алма');
        });

        it.each([
            'сөздің', 'сөзге', 'сөзді', 'сөзін', 'сөздер', 'сөзім', 'сөзіме',
            'сөздеріңізге', 'сөзсіз', 'сөздерміз',
        ])('should stem %s to сөз', (word) => {
            expect(stemmer.stem(word)).toBe('сөз');
        });

        it('should strip comparative and diminutive endings', () => {
            const adjectives = new KazakhStemmer({ lemmas: ['қысқа', 'үлкен'], exceptions: [] });
            expect(adjectives.stem('қысқарақ')).toBe('қысқа');
            expect(adjectives.stem('қысқалау')).toBe('қысқа');
            expect(adjectives.stem('үлкенірек')).toBe('үлкен');
            expect(adjectives.stem('үлкендеу')).toBe('үлкен');
            expect(adjectives.stem('үлкен')).toBe('үлкен');
        });
    });

    describe('analyze', () => {
        const stemmer = new KazakhStemmer({ lemmas: ['алма', 'кітап', 'ауыз'], exceptions: ['абай'] });

        it('should report the strip path outermost first', () => {
            expect(stemmer.analyze('алмалардың')).toEqual({
                kind: 'found',
                input: 'алмалардың',
                lemma: 'алма',
                reason: 'direct',
                path: [
                    { category: SuffixCategory.CASE, suffix: 'дың' },
                    { category: SuffixCategory.PLURAL, suffix: 'лар' },
                ],
            });
        });

        it('should report repairs', () => {
            const mutated = stemmer.analyze('кітабым');
            expect(mutated.kind === 'found' && mutated.reason).toBe('mutated');

            const elided = stemmer.analyze('аузы');
            expect(elided.kind === 'found' && elided.reason).toBe('elided');
        });

        it('should accept a word that only needs a repair', () => {
            expect(stemmer.analyze('кітаб')).toEqual({
                kind: 'found', input: 'кітаб', lemma: 'кітап', reason: 'mutated', path: [],
            });
        });

        it('should mark exceptions and early returns', () => {
            expect(stemmer.analyze('АБАЙ')).toEqual({
                kind: 'found', input: 'абай', lemma: 'абай', reason: 'exception', path: [],
            });
            expect(stemmer.analyze('алма')).toEqual({
                kind: 'found', input: 'алма', lemma: 'алма', reason: 'lemma', path: [],
            });
        });

        it('should return unchanged when nothing resolves', () => {
            expect(stemmer.analyze('Қазан')).toEqual({ kind: 'unchanged', input: 'қазан', lemma: 'қазан' });
        });
    });

    describe('early return policy', () => {
        const lemmas = ['қысқа', 'қысқалау'];

        it('should return a known lemma immediately with "always"', () => {
            expect(stem('қысқалау', lemmas, [], { earlyReturnPolicy: 'always' })).toBe('қысқалау');
        });

        it('should keep stripping a lemma that looks inflected', () => {
            expect(stem('қысқалау', lemmas, [], { earlyReturnPolicy: 'if_looks_uninflected' })).toBe('қысқа');
            expect(stem('қысқалау', lemmas, [], { earlyReturnPolicy: 'never' })).toBe('қысқа');
        });

        it('should still accept an uninflected lemma with "never"', () => {
            const stemmer = new KazakhStemmer({ lemmas: ['алма'], exceptions: [], earlyReturnPolicy: 'never' });
            expect(stemmer.analyze('алма')).toEqual({
                kind: 'found', input: 'алма', lemma: 'алма', reason: 'direct', path: [],
            });
        });

        it('should fall back to the lemma itself when every strip fails', () => {
            expect(stem('мектеп', ['мектеп'], [])).toBe('мектеп');
            expect(stem('кітап', ['кітап'], [])).toBe('кітап');
        });
    });

    describe('ambiguity guards', () => {
        it('should keep the longer of two lemmas', () => {
            expect(stem('басы', ['бас', 'басы'], [])).toBe('басы');
            expect(stem('басы', ['бас'], [])).toBe('бас');
        });

        it('should accept a vowel verb marker only onto a lemma', () => {
            expect(stem('бара', ['бар'], [])).toBe('бар');
            expect(stem('бара', [], [])).toBe('бара');
        });

        it('should not strip a comparative from a short base', () => {
            expect(stem('тарақ', ['та'], [])).toBe('тарақ');
        });

        it('should prefer a possessive reading over an accusative one', () => {
            const stemmer = new KazakhStemmer({ lemmas: ['жұрт'], exceptions: [] });
            const outcome = stemmer.analyze('жұрты');
            expect(outcome.lemma).toBe('жұрт');
            expect(outcome.kind === 'found' && outcome.path).toEqual([
                { category: SuffixCategory.POSSESSIVE, suffix: 'ы' },
            ]);
        });

        it('should not treat a short lemma + negation as a strip when both are lemmas', () => {
            const inventory = SuffixInventory.fromSource({ VERB: ['ма'] });
            expect(stem('алма', ['ал', 'алма'], [], { inventory })).toBe('алма');
            expect(stem('алма', ['ал'], [], { inventory })).toBe('ал');
        });

        it('should not strip a single-letter verb marker between two lemmas', () => {
            const inventory = SuffixInventory.fromSource({ VERB: ['у'] });
            expect(stem('қалау', ['қала', 'қалау'], [], { inventory })).toBe('қалау');
            expect(stem('қалау', ['қала'], [], { inventory })).toBe('қала');
        });
    });

    describe('exceptions', () => {
        it('should win over every other rule', () => {
            expect(stem('абай', ['аба'], [])).toBe('аба');
            expect(stem('Абай', ['аба'], ['абай'])).toBe('абай');
        });

        it('should default to the built-in list', () => {
            const stemmer = new KazakhStemmer({ lemmas: ['алма'] });
            expect(stemmer.exceptions.has('алматы')).toBe(true);
            expect(stemmer.stem('Алматы')).toBe('алматы');
        });
    });

    describe('properties', () => {
        const lemmas = ['мектеп', 'ауыз', 'кітап', 'алма', 'сөз'];
        const stemmer = new KazakhStemmer({ lemmas, exceptions: [] });

        it('should be idempotent', () => {
            for (const word of ['мектептің', 'аузы', 'кітабым', 'алманың', 'сөзін', 'алмаларымның']) {
                const once = stemmer.stem(word);
                expect(stemmer.stem(once)).toBe(once);
            }
        });

        it('should never exceed the depth bound', () => {
            const { events, listener } = recorder();
            const inventory = SuffixInventory.fromSource({ PLURAL: ['а'] });
            const s = new KazakhStemmer({ lemmas: [], exceptions: [], inventory, listener });

            expect(s.stem('б' + 'а'.repeat(12))).toBe('б' + 'а'.repeat(12));

            const depths = events.flatMap((e) => (e.type === 'enter' ? [e.depth] : []));
            expect(depths).toEqual([8, 7, 6, 5, 4, 3, 2, 1]);
            expect(depths).toHaveLength(SEARCH_DEPTH);
        });

        it('should strictly shorten on every strip and visit each word once', () => {
            const { events, listener } = recorder();
            const s = new KazakhStemmer({ lemmas: [], exceptions: [], listener });
            s.stem('алмаларымыздағы');

            const strips = events.flatMap((e) => (e.type === 'strip' ? [e] : []));
            expect(strips.length).toBeGreaterThan(0);
            for (const e of strips) {
                expect(e.base.length).toBeLessThan(e.word.length);
                expect(e.base + e.suffix).toBe(e.word);
            }

            const entered = events.flatMap((e) => (e.type === 'enter' ? [e.word] : []));
            expect(new Set(entered).size).toBe(entered.length);
        });

        it('should emit an early-return event for exceptions', () => {
            const { events, listener } = recorder();
            new KazakhStemmer({ lemmas: [], exceptions: ['абай'], listener }).stem('абай');
            expect(events).toEqual([{ type: 'early-return', word: 'абай', depth: SEARCH_DEPTH, reason: 'exception' }]);
        });

        it('should not throw on an empty string', () => {
            expect(stem('', ['алма'], [])).toBe('');
        });
    });
});
