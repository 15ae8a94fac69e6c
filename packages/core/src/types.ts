// Core data types for segmentation, validation and conversion

import type { MethodId } from './constants.js';

// ============================================================================
// Table data
// ============================================================================

/**
 * Validity matrix for one method: `matrix[i][f]` is true when `initials[i]`
 * combines with `finals[f]`. The vowel-initial row uses the sentinel `ø`.
 */
export interface MethodParams {
  method: MethodId;
  initials: readonly string[];
  finals: readonly string[];
  matrix: readonly (readonly boolean[])[];
}

/** One row of the conversion table, one column per method plus metadata */
export type ConversionRow = Readonly<Record<MethodId, string>> & {
  /** "rare" marks a syllable with no equivalent in every method */
  readonly meta: string;
};

/** Everything the actions need, already loaded */
export interface RomanizationData {
  methods: Partial<Record<MethodId, MethodParams>>;
  conversion?: readonly ConversionRow[];
  stopwords?: ReadonlySet<string>;
}

// ============================================================================
// Parse results
// ============================================================================

export interface Syllable {
  /** Remaining text this syllable was parsed from, leading symbol removed, case-folded */
  readonly text: string;
  /** Empty for vowel-initial syllables */
  readonly initial: string;
  readonly final: string;
  /** initial + final, lower case, apostrophes normalized */
  readonly fullSyllable: string;
  /** The consumed input exactly as written */
  readonly originalSyllable: string;
  /** Input left over after this syllable, original case */
  readonly remainder: string;
  readonly valid: boolean;
  /** The apostrophe or dash that preceded this syllable in the input, or '' */
  readonly leadingSymbol: string;
  readonly hasApostrophe: boolean;
  readonly hasDash: boolean;
  readonly isAllUpper: boolean;
  readonly isTitle: boolean;
  readonly errors: readonly string[];
}

export interface WordChunk {
  kind: 'word';
  text: string;
  syllables: Syllable[];
}

export interface LiteralChunk {
  kind: 'literal';
  text: string;
}

export type Chunk = WordChunk | LiteralChunk;

// ============================================================================
// Action results
// ============================================================================

/** Per-word segmentation output: syllable spellings for words, raw text for literals */
export type SegmentedChunk = string[] | string;

export interface WordValidation {
  word: string;
  syllables: string[];
  valid: boolean[];
  errors?: string[];
}

export interface WordDetection {
  word: string;
  methods: MethodId[];
}

export interface ConversionReport {
  text: string;
  errors: string[];
}
