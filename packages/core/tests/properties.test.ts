// Whole-table and whole-engine properties
import { describe, test, expect } from 'vitest';
import { NO_INITIAL, METHOD_IDS } from '@roman-tools/core';
import { loadTestEngine, loadTestParams, loadTestRomanizer } from '@roman-tools/testing';

describe('every valid pair parses back to itself', () => {
  for (const method of METHOD_IDS) {
    test(method, () => {
      const { initials, finals, matrix } = loadTestParams(method);
      const engine = loadTestEngine(method);
      const mismatches: string[] = [];
      initials.forEach((initial, i) => {
        finals.forEach((final, f) => {
          if (!matrix[i]?.[f]) return;
          const expectedInitial = initial === NO_INITIAL ? '' : initial;
          const syllable = engine.parse(expectedInitial + final);
          if (syllable.initial !== expectedInitial || syllable.final !== final || !syllable.valid || syllable.remainder) {
            mismatches.push(`${initial}+${final} -> ${syllable.initial}+${syllable.final}`);
          }
        });
      });
      expect(mismatches).toEqual([]);
    });
  }
});

describe('parsing always terminates', () => {
  const inputs = ['', 'zzzz', "''''", '-a-b-', 'ŭêv', "ng'ng", 'Zhongguo'];

  for (const method of METHOD_IDS) {
    test(`${method} consumes every character exactly once`, () => {
      const engine = loadTestEngine(method);
      for (const input of inputs) {
        const syllables = engine.parseAll(input);
        expect(syllables.length).toBeLessThanOrEqual(input.length);
        expect(syllables.map(s => s.leadingSymbol + s.originalSyllable).join('')).toBe(input);
      }
    });
  }
});

describe('conversion round trip', () => {
  test('Pinyin -> Wade-Giles -> Pinyin keeps the spelling', () => {
    const romanizer = loadTestRomanizer();
    const words = ['Zhongguo', 'beijing', 'xiamen', "chang'an", 'guangzhou'];
    const wadeGiles = words.map(word => romanizer.convert(word, 'py', 'wg'));
    expect(wadeGiles).toEqual(['Chung-kuo', 'pei-ching', 'hsia-men', "ch'ang-an", 'kuang-chou']);
    expect(wadeGiles.map(word => romanizer.convert(word, 'wg', 'py'))).toEqual(words);
  });
});

describe('stopword guard', () => {
  test('cherry-pick leaves stopwords as written', () => {
    expect(loadTestRomanizer().cherryPick('Ping Pang bao', 'py', 'wg')).toBe('Ping Pang pao');
  });
});
