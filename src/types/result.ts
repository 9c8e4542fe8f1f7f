import type { SuffixCategory, SuffixStrip } from './suffix.js';

/** How a candidate string was matched against the lemma store. */
export type RepairKind = 'direct' | 'mutated' | 'elided';

/**
 * Outcome of validating one candidate against the lemma store.
 */
export type StemCheck =
    | { kind: 'hit'; lemma: string; repair: RepairKind }
    | { kind: 'miss' };

/** Why a word resolved the way it did. */
export type StemReason = 'exception' | 'lemma' | RepairKind;

/**
 * Result of analysing one surface word.
 * `lemma` is always set: on `unchanged` it is the normalized input.
 */
export type StemOutcome =
    | {
          kind: 'found';
          input: string;
          lemma: string;
          reason: StemReason;
          /** Strips applied, outermost first */
          path: SuffixStrip[];
      }
    | { kind: 'unchanged'; input: string; lemma: string };

/**
 * Structured trace events emitted by the search.
 * Consumers decide how (and whether) to render them.
 */
export type SearchEvent =
    | { type: 'enter'; word: string; depth: number }
    | { type: 'strip'; word: string; depth: number; category: SuffixCategory; suffix: string; base: string }
    | { type: 'blocked'; word: string; depth: number; category: SuffixCategory; suffix: string; rule: string }
    | { type: 'hit'; word: string; depth: number; lemma: string; repair: RepairKind }
    | { type: 'exhausted'; word: string; depth: number }
    | { type: 'early-return'; word: string; depth: number; reason: 'exception' | 'lemma' };

export type SearchListener = (event: SearchEvent) => void;
