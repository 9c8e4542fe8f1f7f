import { writeFileSync } from 'node:fs';
import { readUtf8 } from './read.js';
import { getLogger } from '../utils/logger.js';

/**
 * Extract lemma stems from the selected sections of a `.lexc` lexicon.
 *
 * `LEXICON <Name>` opens a section; within a selected section every
 * entry containing `:` contributes the text before its first colon.
 * Returns a sorted, de-duplicated list.
 */
export function extractLexcLemmas(text: string, lexicons: Iterable<string>): string[] {
    const wanted = new Set(lexicons);
    const lemmas = new Set<string>();
    let current: string | null = null;

    for (const raw of text.split(/\r?\n/)) {
        const line = raw.trim();
        if (!line || line.startsWith('#')) continue;

        if (line.startsWith('LEXICON')) {
            current = line.split(/\s+/)[1] ?? null;
            continue;
        }

        if (current !== null && wanted.has(current) && line.includes(':')) {
            const stem = line.slice(0, line.indexOf(':')).trim();
            if (stem) lemmas.add(stem);
        }
    }

    return [...lemmas].sort();
}

/**
 * Extract lemmas from a `.lexc` file and write them as a lemma list.
 * Returns the number of lemmas written.
 */
export function writeLexcLemmas(lexcPath: string, lexicons: string[], outputPath: string): number {
    const lemmas = extractLexcLemmas(readUtf8(lexcPath), lexicons);
    writeFileSync(outputPath, lemmas.map((lemma) => `${lemma}\n`).join(''), 'utf-8');
    getLogger().info({ lexicons, outputPath, lemmas: lemmas.length }, 'Lemmas extracted');
    return lemmas.length;
}
