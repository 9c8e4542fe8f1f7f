#!/usr/bin/env node
import { Command } from 'commander';
import { readUtf8 } from '../loaders/read.js';
import { writeLexcLemmas } from '../loaders/lexc.js';
import { resolveConfig } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { createStemmer } from '../engine/create.js';
import { stemText } from '../nlp/stem-text.js';
import { exportBatch, EXPORT_FORMATS, toRow } from '../exporters/export.js';
import { VERSION } from '../version.js';
import type { KazakhStemmer } from '../engine/stemmer.js';

const program = new Command();

program
    .name('kazstem')
    .description('Reduce inflected Kazakh words to their dictionary base form.')
    .version(VERSION);

interface EngineOptions {
    lemmas?: string;
    suffixes?: string;
    policy?: string;
    logLevel?: string;
    jsonLogs?: boolean;
}

function withEngineOptions(command: Command): Command {
    return command
        .option('-l, --lemmas <path>', 'Lemma list (one per line)')
        .option('--suffixes <path>', 'Suffix document (JSON)')
        .option('--policy <policy>', 'Early return for known lemmas: always | if_looks_uninflected | never')
        .option('--log-level <level>', 'Log level: trace | debug | info | warn | error')
        .option('--json-logs', 'Output JSON logs');
}

async function setup(opts: EngineOptions): Promise<KazakhStemmer> {
    const config = await resolveConfig({
        lemmas: opts.lemmas,
        suffixes: opts.suffixes,
        earlyReturnPolicy: opts.policy,
        logLevel: opts.logLevel,
        jsonLogs: opts.jsonLogs,
    });
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    return createStemmer(config);
}

function fail(message: string, error: unknown): never {
    getLogger().error({ error }, message);
    process.exit(1);
}

// ─── STEM command ─────────────────────────────────────────

withEngineOptions(
    program
        .command('stem')
        .description('Stem words given on the command line')
        .argument('<words...>', 'Words to stem')
        .option('--explain', 'Show the reason and strip path', false)
).action(async (words: string[], opts: EngineOptions & { explain: boolean }) => {
    try {
        const stemmer = await setup(opts);
        for (const word of words) {
            if (!word.trim()) continue;
            const row = toRow(stemmer.analyze(word));
            const extra = opts.explain ? `\t${row.reason}\t${row.path}` : '';
            console.log(`${row.word}\t${row.lemma}${extra}`);
        }
    } catch (error) {
        fail('Stemming failed', error);
    }
});

// ─── TEXT command ─────────────────────────────────────────

withEngineOptions(
    program
        .command('text')
        .description('Stem every word of a text file, line by line')
        .argument('<file>', 'UTF-8 text file')
).action(async (file: string, opts: EngineOptions) => {
    try {
        const stemmer = await setup(opts);
        for (const line of readUtf8(file).split(/\r?\n/)) {
            console.log(stemText(line, stemmer).join(' '));
        }
    } catch (error) {
        fail('Text stemming failed', error);
    }
});

// ─── BATCH command ────────────────────────────────────────

withEngineOptions(
    program
        .command('batch')
        .description('Stem the distinct words of a file and export the results')
        .requiredOption('-i, --input <path>', 'Input text or word list')
        .requiredOption('-o, --out <path>', 'Output file path')
        .option('-f, --format <format>', 'Export format: json | csv | tsv', 'tsv')
).action(async (opts: EngineOptions & { input: string; out: string; format: string }) => {
    const format = EXPORT_FORMATS.find((f) => f === opts.format.toLowerCase());
    if (!format) {
        console.error(`Invalid format: ${opts.format}. Valid: ${EXPORT_FORMATS.join(', ')}`);
        process.exit(1);
    }

    try {
        const stemmer = await setup(opts);
        const count = exportBatch(opts.input, opts.out, format, stemmer);
        console.log(`Exported ${count} words to ${opts.out}`);
    } catch (error) {
        fail('Batch failed', error);
    }
});

// ─── EXTRACT-LEMMAS command ───────────────────────────────

program
    .command('extract-lemmas')
    .description('Extract a lemma list from a .lexc lexicon')
    .requiredOption('--lexc <path>', 'Lexicon source (.lexc)')
    .requiredOption('--lexicons <names...>', 'Lexicon sections to extract (e.g. Common)')
    .requiredOption('-o, --out <path>', 'Output lemma list')
    .option('--log-level <level>', 'Log level: trace | debug | info | warn | error')
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts: { lexc: string; lexicons: string[]; out: string; logLevel?: string; jsonLogs?: boolean }) => {
        const config = await resolveConfig({ logLevel: opts.logLevel, jsonLogs: opts.jsonLogs });
        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

        try {
            const count = writeLexcLemmas(opts.lexc, opts.lexicons, opts.out);
            console.log(`Extracted ${count} lemmas to ${opts.out}`);
        } catch (error) {
            fail('Extraction failed', error);
        }
    });

await program.parseAsync();
