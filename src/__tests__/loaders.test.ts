import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { LoaderError, type LoaderErrorCode } from '../loaders/errors.js';
import { loadLemmas, loadLemmasOrEmpty, parseLemmaList } from '../loaders/lemmas.js';
import { loadSuffixes, loadSuffixesOrEmpty } from '../loaders/suffixes.js';
import { extractLexcLemmas, writeLexcLemmas } from '../loaders/lexc.js';
import { SuffixCategory } from '../types/index.js';

let dir: string;

function codeOf(fn: () => unknown): LoaderErrorCode | undefined {
    try {
        fn();
    } catch (error) {
        if (error instanceof LoaderError) return error.code;
        throw error;
    }
    return undefined;
}

beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'kazstem-loaders-'));
});

afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
});

describe('Lemma lists', () => {
    it('should skip blanks and comments', () => {
        expect(parseLemmaList('# nouns\nалма\r\n\n  сөз \n')).toEqual(['алма', 'сөз']);
    });

    it('should load a lemma file', () => {
        const path = join(dir, 'lemmas.txt');
        writeFileSync(path, '\uFEFFМектеп\nкітап\n', 'utf-8');

        const lemmas = loadLemmas(path);
        expect(lemmas.size).toBe(2);
        expect(lemmas.has('мектеп')).toBe(true);
    });

    it('should report a missing file', () => {
        expect(codeOf(() => loadLemmas(join(dir, 'missing.txt')))).toBe('SOURCE_NOT_FOUND');
        expect(codeOf(() => loadLemmas(dir))).toBe('SOURCE_NOT_FOUND');
    });

    it('should report invalid UTF-8', () => {
        const path = join(dir, 'latin1.txt');
        writeFileSync(path, Buffer.from([0x61, 0xff, 0x0a]));
        expect(codeOf(() => loadLemmas(path))).toBe('DECODE_FAILURE');
    });

    it('should degrade to an empty store', () => {
        expect(loadLemmasOrEmpty(join(dir, 'missing.txt')).size).toBe(0);
        expect(loadLemmasOrEmpty(undefined).size).toBe(0);
    });
});

describe('Suffix documents', () => {
    it('should load a valid document', () => {
        const path = join(dir, 'suffixes.json');
        writeFileSync(path, JSON.stringify({ PLURAL: ['лар', 'лер'] }), 'utf-8');
        expect(loadSuffixes(path).suffixes(SuffixCategory.PLURAL)).toEqual(['лар', 'лер']);
    });

    it('should reject invalid JSON', () => {
        const path = join(dir, 'broken.json');
        writeFileSync(path, '{ "CASE": [', 'utf-8');
        expect(codeOf(() => loadSuffixes(path))).toBe('MALFORMED_DATA');
    });

    it('should reject a malformed inventory', () => {
        const path = join(dir, 'bad-shape.json');
        writeFileSync(path, JSON.stringify({ CASE: [''] }), 'utf-8');
        expect(codeOf(() => loadSuffixes(path))).toBe('MALFORMED_DATA');
    });

    it('should degrade to an empty inventory', () => {
        expect(loadSuffixesOrEmpty(join(dir, 'missing.json')).size).toBe(0);
    });
});

describe('Lexc extraction', () => {
    const lexc = [
        'Multichar_Symbols %<n%> %<v%>',
        'LEXICON Root',
        'Common ;',
        'LEXICON Common',
        'сөз:сөз N1 ;',
        'алма:алма N1 ;',
        '# кітап:кітап N1 ;',
        'алма:алма N1 ;',
        'LEXICON Verbs',
        'бар:бар V-IV ;',
    ].join('\n');

    it('should collect stems from the selected lexicons', () => {
        expect(extractLexcLemmas(lexc, ['Common'])).toEqual(['алма', 'сөз']);
        expect(extractLexcLemmas(lexc, ['Common', 'Verbs'])).toEqual(['алма', 'бар', 'сөз']);
    });

    it('should ignore unselected lexicons', () => {
        expect(extractLexcLemmas(lexc, ['Adjectives'])).toEqual([]);
    });

    it('should write a lemma list', () => {
        const source = join(dir, 'kaz.lexc');
        const output = join(dir, 'extracted.txt');
        writeFileSync(source, lexc, 'utf-8');

        expect(writeLexcLemmas(source, ['Common'], output)).toBe(2);
        expect(readFileSync(output, 'utf-8')).toBe('алма\nсөз\n');
        expect(loadLemmas(output).size).toBe(2);
    });
});
