// Wade-Giles: table-driven final search. Apostrophes mark aspiration and stay in the initial.

import { isApostrophe, isVowel, NO_INITIAL, type MethodId } from '../constants.js';
import { BaseStrategy, CLASSES } from './base.js';

const { letter, apostrophe, dash } = CLASSES;

export class WadeGilesStrategy extends BaseStrategy {
  readonly method: MethodId = 'wg';
  readonly stripsLeadingApostrophe = false;
  protected readonly splitPattern = new RegExp(`[${letter}${apostrophe}]+|[${dash}][${letter}${apostrophe}]+`, 'g');

  findFinal(text: string, initial: string): string {
    // An apostrophe ahead ends the final
    const apostropheAt = this.indexOfApostrophe(text);
    if (apostropheAt >= 0) return text.slice(0, apostropheAt);
    if (initial !== NO_INITIAL) return this.longestFinalFor(text, initial);
    return this.firstSyllableBoundary(text);
  }

  protected override handleApostropheInInitial(text: string, index: number): string {
    return text.slice(0, index) + "'";
  }

  separatorBetween(): string {
    return '-';
  }

  /** Longest valid final that leaves nothing, or a plausible start of another syllable */
  private longestFinalFor(text: string, initial: string): string {
    for (let end = text.length; end > 0; end--) {
      const candidate = text.slice(0, end);
      const rest = text.slice(end);
      if (this.validate(initial, candidate) && (rest === '' || this.canBeginSyllable(rest))) {
        return candidate;
      }
    }
    return text;
  }

  /** Shortest complete syllable at the start of a vowel-initial run */
  private firstSyllableBoundary(text: string): string {
    for (let end = 2; end <= text.length; end++) {
      const candidate = text.slice(0, end);
      const rest = text.slice(end);
      if (this.isCompleteSyllable(candidate) && (rest === '' || this.canBeginSyllable(rest))) {
        return candidate;
      }
    }
    return text;
  }

  private isCompleteSyllable(text: string): boolean {
    for (const initial of this.table.initialsByLength) {
      if (text.startsWith(initial) && this.validate(initial, text.slice(initial.length))) {
        return true;
      }
    }
    return isVowel(text[0]) && this.validate(NO_INITIAL, text);
  }

  private indexOfApostrophe(text: string): number {
    for (let i = 0; i < text.length; i++) {
      if (isApostrophe(text[i])) return i;
    }
    return -1;
  }

  private canBeginSyllable(text: string): boolean {
    if (text.length <= 1) return false;
    return this.table.initialsByLength.some(initial => text.startsWith(initial)) || isVowel(text[0]);
  }
}
