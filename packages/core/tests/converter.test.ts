// Syllable converter tests
import { describe, test, expect } from 'vitest';
import { SyllableConverter, type ConversionRow } from '@roman-tools/core';
import { loadConversionTable } from '@roman-tools/data';

const ROWS: ConversionRow[] = [
  { py: 'chang', wg: "ch'ang", meta: '' },
  { py: 'e', wg: 'o', meta: '' },
  { py: 'o', wg: 'o', meta: '' },
  { py: 'lo', wg: '', meta: 'rare' },
  { py: 'xyz', wg: '', meta: '' },
];

describe('SyllableConverter', () => {
  test('converts in both directions', () => {
    expect(new SyllableConverter(ROWS, 'py', 'wg').convert('chang')).toBe("ch'ang");
    expect(new SyllableConverter(ROWS, 'wg', 'py').convert("ch'ang")).toBe('chang');
  });

  test('uses the first row when several share a spelling', () => {
    expect(new SyllableConverter(ROWS, 'wg', 'py').convert('o')).toBe('e');
  });

  test('marks rare and unknown syllables', () => {
    const converter = new SyllableConverter(ROWS, 'py', 'wg');
    expect(converter.convert('lo')).toBe('lo(!rare)');
    expect(converter.convert('xyz')).toBe('xyz(!)');
    expect(converter.convert('zz')).toBe('zz(!)');
  });

  test('ignores case and caches by lower-cased syllable', () => {
    const converter = new SyllableConverter(ROWS, 'py', 'wg');
    expect(converter.convert('CHANG')).toBe("ch'ang");
    expect(converter.convert('chang')).toBe("ch'ang");
    expect(converter.getCacheStats()).toEqual({ size: 1, hits: 1, misses: 1 });
  });

  test('converts with the bundled table', () => {
    const converter = new SyllableConverter(loadConversionTable(), 'py', 'wg');
    expect(['zhong', 'xiong', 'ju', 'yi', 'ci', 'si', 'ri', 'yuan'].map(s => converter.convert(s)))
      .toEqual(['chung', 'hsiung', 'chü', 'i', "tz'u", 'ssu', 'jih', 'yüan']);
    expect(converter.convert('lo')).toBe('lo(!rare)');
  });
});
