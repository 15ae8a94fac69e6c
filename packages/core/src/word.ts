// Reassembles a parsed word in the target method: conversion, capitalization, separators

import { SUPPORTED_CONTRACTIONS } from './constants.js';
import type { SyllableConverter } from './converter.js';
import type { RomanizationStrategy } from './strategies/index.js';
import type { Syllable } from './types.js';

export interface WordOptions {
  skipErrors: boolean;
  stopwords?: ReadonlySet<string>;
}

/** The word as parsed, each syllable with its original apostrophe or dash, lower case */
export function previewWord(syllables: readonly Syllable[]): string {
  return syllables.map(s => (s.hasApostrophe ? "'" : s.hasDash ? '-' : '') + s.fullSyllable).join('');
}

/** A valid word followed by an English contraction such as "'s" */
export function isContraction(syllables: readonly Syllable[], skipErrors: boolean): boolean {
  const last = syllables[syllables.length - 1];
  if (!skipErrors || !last || syllables.length < 2) return false;
  return (
    syllables.slice(0, -1).every(s => s.valid) &&
    last.hasApostrophe &&
    SUPPORTED_CONTRACTIONS.has(last.fullSyllable)
  );
}

function applyCaps(text: string, syllable: Syllable): string {
  if (syllable.isAllUpper) return text.toUpperCase();
  if (syllable.isTitle) return text.charAt(0).toUpperCase() + text.slice(1).toLowerCase();
  return text;
}

export class WordReconstructor {
  constructor(
    private readonly converter: SyllableConverter,
    private readonly target: RomanizationStrategy,
    private readonly options: WordOptions,
  ) {}

  isConvertible(syllables: readonly Syllable[]): boolean {
    if (syllables.length === 0) return false;
    const valid = syllables.every(s => s.valid);
    if (!valid && !isContraction(syllables, this.options.skipErrors)) return false;
    return !(this.options.stopwords?.has(previewWord(syllables)) ?? false);
  }

  reconstruct(syllables: readonly Syllable[]): string {
    const convertible = this.isConvertible(syllables);

    if (!convertible) {
      if (this.options.skipErrors) {
        return syllables.map(s => s.leadingSymbol + s.originalSyllable).join('');
      }
      // Marked output: every syllable goes through the table, symbols as written
      return syllables.map(s => s.leadingSymbol + applyCaps(this.converter.convert(s.fullSyllable), s)).join('');
    }

    const contraction = isContraction(syllables, this.options.skipErrors);
    let output = '';
    let previous = '';
    syllables.forEach((syllable, i) => {
      if (contraction && i === syllables.length - 1) {
        output += "'" + syllable.originalSyllable;
        return;
      }
      const converted = applyCaps(this.converter.convert(syllable.fullSyllable), syllable);
      output += i === 0 ? converted : this.target.separatorBetween(previous, converted) + converted;
      previous = converted;
    });
    return output;
  }
}
