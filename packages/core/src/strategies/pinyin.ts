// Pinyin: greedy final scan with n/ng and er lookahead

import { VOWELS, isVowel, type MethodId } from '../constants.js';
import { BaseStrategy, CLASSES } from './base.js';

const { letter, apostrophe, dash } = CLASSES;

export class PinyinStrategy extends BaseStrategy {
  readonly method: MethodId = 'py';
  readonly stripsLeadingApostrophe = true;
  protected readonly splitPattern = new RegExp(`[${letter}]+|[${apostrophe}${dash}][${letter}]+`, 'g');

  findFinal(text: string, initial: string, errors: string[]): string {
    for (let i = 0; i < text.length; i++) {
      if (isVowel(text[i])) {
        const final = this.handleVowel(text, i, initial, errors);
        if (final !== undefined) return final;
      } else {
        return this.handleConsonant(text, i, initial);
      }
    }
    return text;
  }

  /** undefined means keep scanning */
  private handleVowel(text: string, i: number, initial: string, errors: string[]): string | undefined {
    if (i + 1 === text.length) return text;
    const candidates = this.table.finalsStartingWith(text.slice(0, i + 1), initial);
    if (candidates.length > 0) return undefined;
    if (i === 0) return undefined;
    errors.push(`invalid final: '${text.slice(0, i + 1)}'`);
    return text.slice(0, i);
  }

  private handleConsonant(text: string, i: number, initial: string): string {
    const remaining = text.length - i - 1;
    const next = text[i + 1];

    if (i > 0 && text[i - 1] === 'e' && text[i] === 'r' && (remaining === 0 || !isVowel(next))) {
      return text.slice(0, i + 1);
    }

    if (text[i] === 'n') {
      const nextIsG = remaining > 0 && next === 'g';
      // "ng" closes the final unless a vowel follows and the "n" final alone is valid
      const takesNg = nextIsG && (remaining === 1 || !isVowel(text[i + 2]) || !this.validate(initial, text.slice(0, i + 1)));
      if (takesNg) return text.slice(0, i + 2);
      if (nextIsG) return text.slice(0, i + 1);
      const takesN = remaining === 0 || !isVowel(next) || !this.validate(initial, text.slice(0, i));
      return takesN ? text.slice(0, i + 1) : text.slice(0, i);
    }

    return text.slice(0, i);
  }

  /** Apostrophe before a vowel-initial syllable that would otherwise merge with the previous one */
  separatorBetween(previous: string, next: string): string {
    const prev = previous.toLowerCase();
    const last = prev[prev.length - 1];
    const attaches = (last !== undefined && VOWELS.has(last)) || prev.endsWith('er') || prev.endsWith('n') || prev.endsWith('ng');
    return attaches && isVowel(next[0]?.toLowerCase()) ? "'" : '';
  }
}
