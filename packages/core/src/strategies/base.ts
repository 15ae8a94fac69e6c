// Shared parsing steps for romanization methods

import { APOSTROPHE_CLASS, DASH_CLASS, LETTER_CLASS, NO_INITIAL, isApostrophe, isDash, isVowel, type MethodId } from '../constants.js';
import type { ValidityTable } from '../table.js';

export interface RomanizationStrategy {
  readonly method: MethodId;
  readonly table: ValidityTable;
  /** Whether a leading apostrophe is stripped as a separator before parsing */
  readonly stripsLeadingApostrophe: boolean;
  /**
   * Initial at the start of `text`, `ø` when it starts with a vowel.
   * Unknown initials are still returned; a diagnostic goes into `errors`.
   */
  findInitial(text: string, errors: string[]): string;
  /** Final at the start of `text`, given the initial already consumed */
  findFinal(text: string, initial: string, errors: string[]): string;
  validate(initial: string, final: string): boolean;
  /** Split a word into the sub-runs that are parsed independently */
  splitWord(word: string): string[];
  /** Separator written between two converted syllables in this method's output */
  separatorBetween(previous: string, next: string): string;
}

export abstract class BaseStrategy implements RomanizationStrategy {
  abstract readonly method: MethodId;
  abstract readonly stripsLeadingApostrophe: boolean;
  protected abstract readonly splitPattern: RegExp;

  constructor(readonly table: ValidityTable) {}

  abstract findFinal(text: string, initial: string, errors: string[]): string;
  abstract separatorBetween(previous: string, next: string): string;

  findInitial(text: string, errors: string[]): string {
    for (let i = 0; i < text.length; i++) {
      const ch = text[i];
      if (isVowel(ch)) {
        if (i === 0) return NO_INITIAL;
        const initial = text.slice(0, i);
        if (!this.table.hasInitial(initial)) {
          errors.push(`invalid initial: '${initial}'`);
        }
        return initial;
      }
      if (isApostrophe(ch)) return this.handleApostropheInInitial(text, i);
      if (isDash(ch)) return this.handleDashInInitial(text, i);
    }
    return text;
  }

  validate(initial: string, final: string): boolean {
    return this.table.isValid(initial, final);
  }

  splitWord(word: string): string[] {
    const pieces = word.match(this.splitPattern) ?? [];
    return pieces.length > 1 ? pieces : [word];
  }

  protected handleApostropheInInitial(text: string, index: number): string {
    return text.slice(0, index);
  }

  protected handleDashInInitial(text: string, index: number): string {
    return text.slice(0, index);
  }
}

/** Letters, apostrophes and dashes as regex character-class bodies */
export const CLASSES = {
  letter: LETTER_CLASS,
  apostrophe: APOSTROPHE_CLASS,
  dash: DASH_CLASS,
} as const;
