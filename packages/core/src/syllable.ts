// Syllable parsing: one initial + final split per call, memoized on the remaining text

import { LRUCache } from 'lru-cache';
import { NO_INITIAL, isApostrophe, isDash } from './constants.js';
import { NOOP_OBSERVER, type EngineObserver } from './observer.js';
import type { RomanizationStrategy } from './strategies/index.js';
import type { Syllable } from './types.js';

export const DEFAULT_CACHE_SIZE = 10000;

export interface SyllableEngineOptions {
  cacheSize?: number;
  observer?: EngineObserver;
}

/** Lower-case and normalize apostrophes without changing string length */
export function foldText(text: string): string {
  let folded = '';
  for (const ch of text) {
    if (isApostrophe(ch)) {
      folded += "'";
      continue;
    }
    const lower = ch.toLowerCase();
    folded += lower.length === ch.length ? lower : ch;
  }
  return folded;
}

function isAllUpper(text: string): boolean {
  return text !== text.toLowerCase() && text === text.toUpperCase();
}

function isTitle(text: string): boolean {
  const letters = text.replace(/[^\p{L}]/gu, '');
  if (letters.length === 0) return false;
  const first = letters.charAt(0);
  const rest = letters.slice(1);
  return first !== first.toLowerCase() && rest === rest.toLowerCase();
}

export class SyllableEngine {
  private readonly cache: LRUCache<string, Syllable>;
  private readonly observer: EngineObserver;
  private hits = 0;
  private misses = 0;

  constructor(readonly strategy: RomanizationStrategy, options: SyllableEngineOptions = {}) {
    this.cache = new LRUCache({ max: options.cacheSize ?? DEFAULT_CACHE_SIZE });
    this.observer = options.observer ?? NOOP_OBSERVER;
  }

  /** Parse the first syllable of `text`. The result's remainder holds the rest. */
  parse(text: string): Syllable {
    const cached = this.cache.get(text);
    if (cached) {
      this.hits++;
      this.observer.syllableValidated?.(cached, true);
      return cached;
    }
    this.misses++;
    const syllable = this.build(text);
    this.cache.set(text, syllable);
    this.observer.syllableValidated?.(syllable, false);
    return syllable;
  }

  /** Parse `text` into syllables until nothing remains */
  parseAll(text: string): Syllable[] {
    const syllables: Syllable[] = [];
    let rest = text;
    while (rest.length > 0) {
      const syllable = this.parse(rest);
      syllables.push(syllable);
      rest = syllable.remainder;
    }
    return syllables;
  }

  clearCache() {
    this.cache.clear();
    this.hits = 0;
    this.misses = 0;
  }

  getCacheStats() {
    return { size: this.cache.size, hits: this.hits, misses: this.misses };
  }

  private build(raw: string): Syllable {
    const first = raw.charAt(0);
    const hasApostrophe = isApostrophe(first);
    const hasDash = isDash(first);
    const strip = hasDash || (hasApostrophe && this.strategy.stripsLeadingApostrophe);
    const leadingSymbol = strip ? first : '';
    const source = raw.slice(leadingSymbol.length);
    const text = foldText(source);
    const errors: string[] = [];

    let initial = this.strategy.findInitial(text, errors);
    this.observer.initialFound?.(text, initial === NO_INITIAL ? '' : initial);
    let final: string;
    if (initial === NO_INITIAL) {
      final = this.strategy.findFinal(text, NO_INITIAL, errors);
      initial = '';
    } else {
      final = this.strategy.findFinal(text.slice(initial.length), initial, errors);
    }

    // Always consume something so parseAll terminates
    if (initial.length + final.length === 0 && text.length > 0) {
      final = text.charAt(0);
    }
    this.observer.finalFound?.(text, final);

    const fullSyllable = initial + final;
    const originalSyllable = source.slice(0, fullSyllable.length);
    const validationInitial = initial === '' ? NO_INITIAL : initial;
    const valid = fullSyllable.length > 0 && this.strategy.validate(validationInitial, final);
    if (!valid) {
      for (const reason of this.strategy.table.explain(validationInitial, final)) {
        if (!errors.includes(reason)) errors.push(reason);
      }
      errors.push(`invalid syllable: '${fullSyllable}'`);
    }

    return {
      text,
      initial,
      final,
      fullSyllable,
      originalSyllable,
      remainder: source.slice(fullSyllable.length),
      valid,
      leadingSymbol,
      hasApostrophe,
      hasDash,
      isAllUpper: isAllUpper(originalSyllable),
      isTitle: isTitle(originalSyllable),
      errors,
    };
  }
}
