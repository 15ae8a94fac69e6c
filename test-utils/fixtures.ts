// Shared test fixtures: the bundled tables, plus a small hand-written table for unit tests

import {
  Romanizer,
  SyllableEngine,
  createStrategy,
  type MethodId,
  type MethodParams,
  type RomanizerOptions,
} from '@roman-tools/core';
import { loadMethodParams, loadRomanizationData } from '@roman-tools/data';

/** Romanizer over the bundled tables */
export function loadTestRomanizer(options: RomanizerOptions = {}): Romanizer {
  return new Romanizer(loadRomanizationData(), options);
}

export function loadTestParams(method: MethodId): MethodParams {
  return loadMethodParams(method);
}

/** Fresh engine over the bundled table for `method` */
export function loadTestEngine(method: MethodId): SyllableEngine {
  return new SyllableEngine(createStrategy(loadMethodParams(method)));
}

/**
 * Build MethodParams from a list of valid initial+final pairs.
 * Initials and finals appear in first-seen order.
 */
export function paramsFromPairs(method: MethodId, pairs: readonly (readonly [string, string])[]): MethodParams {
  const initials: string[] = [];
  const finals: string[] = [];
  for (const [initial, final] of pairs) {
    if (!initials.includes(initial)) initials.push(initial);
    if (!finals.includes(final)) finals.push(final);
  }
  const valid = new Set(pairs.map(([initial, final]) => `${initial}|${final}`));
  const matrix = initials.map(initial => finals.map(final => valid.has(`${initial}|${final}`)));
  return { method, initials, finals, matrix };
}

/** A tiny Pinyin-like table: b, m, n, sh and vowel-initial syllables */
export const MINI_PINYIN = paramsFromPairs('py', [
  ['b', 'a'], ['b', 'an'], ['b', 'ang'], ['b', 'ao'],
  ['m', 'a'], ['m', 'an'], ['m', 'ing'],
  ['n', 'i'], ['n', 'an'], ['n', 'ü'],
  ['sh', 'i'], ['sh', 'an'],
  ['ø', 'a'], ['ø', 'an'], ['ø', 'ao'], ['ø', 'er'],
]);
