import { writeFileSync } from 'node:fs';
import { readUtf8 } from '../loaders/read.js';
import { tokenize } from '../nlp/tokenizer.js';
import { getLogger } from '../utils/logger.js';
import { VERSION } from '../version.js';
import type { KazakhStemmer } from '../engine/stemmer.js';
import type { StemOutcome } from '../types/index.js';

// ─── Types ───────────────────────────────────────────────

export type ExportFormat = 'json' | 'csv' | 'tsv';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['json', 'csv', 'tsv'];

export interface ResultRow {
    word: string;
    lemma: string;
    reason: string;
    /** Strips as `CATEGORY:suffix`, joined by `+` */
    path: string;
}

// ─── Main Export Function ────────────────────────────────

/**
 * Stem every distinct token of a text file and write the results.
 * Returns the number of rows written.
 */
export function exportBatch(
    inputPath: string,
    outputPath: string,
    format: ExportFormat,
    stemmer: KazakhStemmer
): number {
    const words = new Set(tokenize(readUtf8(inputPath)));
    const outcomes = [...words].map((word) => stemmer.analyze(word));

    writeFileSync(outputPath, renderResults(outcomes, format), 'utf-8');

    const changed = outcomes.filter((o) => o.lemma !== o.input).length;
    getLogger().info({ format, outputPath, words: outcomes.length, changed }, 'Batch exported');
    return outcomes.length;
}

export function toRow(outcome: StemOutcome): ResultRow {
    if (outcome.kind === 'unchanged') {
        return { word: outcome.input, lemma: outcome.lemma, reason: 'unchanged', path: '' };
    }
    return {
        word: outcome.input,
        lemma: outcome.lemma,
        reason: outcome.reason,
        path: outcome.path.map((s) => `${s.category}:${s.suffix}`).join('+'),
    };
}

/**
 * Render analysed words in the requested format.
 */
export function renderResults(outcomes: StemOutcome[], format: ExportFormat): string {
    const rows = outcomes.map(toRow);
    switch (format) {
        case 'json':
            return exportJson(rows);
        case 'csv':
            return exportDelimited(rows, ',', csvEscape);
        case 'tsv':
            return exportDelimited(rows, '\t', (s) => s);
        default:
            throw new Error(`Unsupported export format: ${String(format)}`);
    }
}

// ─── Format Implementations ─────────────────────────────

function exportJson(rows: ResultRow[]): string {
    return JSON.stringify({
        kazstem: {
            version: VERSION,
            exported_at: new Date().toISOString(),
        },
        results: rows,
    }, null, 2);
}

function csvEscape(value: string): string {
    return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function exportDelimited(rows: ResultRow[], sep: string, esc: (s: string) => string): string {
    const lines = ['word', 'lemma', 'reason', 'path'].join(sep) + '\n';
    return lines + rows
        .map((r) => [r.word, r.lemma, r.reason, r.path].map(esc).join(sep) + '\n')
        .join('');
}
