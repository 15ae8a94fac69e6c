// Character classes and method registry shared by every romanization method

// ============================================================================
// Character classes
// ============================================================================

export const VOWELS: ReadonlySet<string> = new Set(['a', 'e', 'i', 'o', 'u', 'ü', 'v', 'ê', 'ŭ']);

/** Apostrophe variants accepted in input. All are normalized to ASCII "'" before parsing. */
export const APOSTROPHES: ReadonlySet<string> = new Set(["'", '’', '‘', 'ʼ', 'ʻ', '`']);

export const DASHES: ReadonlySet<string> = new Set(['-', '–', '—']);

/** English contraction suffixes tolerated after an apostrophe when errors are skipped */
export const SUPPORTED_CONTRACTIONS: ReadonlySet<string> = new Set(['s', 'd', 'll']);

/** Sentinel initial for syllables that begin with a vowel */
export const NO_INITIAL = 'ø';

export const ERROR_MARKER = '(!)';
export const RARE_MARKER = '(!rare)';

/** Letters that can appear inside a romanized word */
export const LETTER_CLASS = 'a-zA-ZüÜêÊŭŬ';
export const APOSTROPHE_CLASS = "'’‘ʼʻ`";
export const DASH_CLASS = '\\-–—';

export function isVowel(ch: string | undefined): boolean {
  return ch !== undefined && VOWELS.has(ch);
}

export function isApostrophe(ch: string | undefined): boolean {
  return ch !== undefined && APOSTROPHES.has(ch);
}

export function isDash(ch: string | undefined): boolean {
  return ch !== undefined && DASHES.has(ch);
}

// ============================================================================
// Methods
// ============================================================================

export type MethodId = 'py' | 'wg';

export interface MethodInfo {
  shorthand: MethodId;
  /** Long name accepted on the command line */
  name: string;
  /** Display name */
  label: string;
}

export const METHODS: Readonly<Record<MethodId, MethodInfo>> = {
  py: { shorthand: 'py', name: 'pinyin', label: 'Pinyin' },
  wg: { shorthand: 'wg', name: 'wade-giles', label: 'Wade-Giles' },
};

export const METHOD_IDS: readonly MethodId[] = ['py', 'wg'];

export function isMethodId(value: string): value is MethodId {
  return value === 'py' || value === 'wg';
}

/** Every supported method with its shorthand and long name */
export function listMethods(): MethodInfo[] {
  return METHOD_IDS.map(id => METHODS[id]);
}
