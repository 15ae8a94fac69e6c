// Table parsing and loading tests
import { describe, test, expect } from 'vitest';
import path from 'path';
import { MissingTableDataError, TableFormatError } from '@roman-tools/core';
import {
  createRomanizer,
  getDataPath,
  loadConversionTable,
  loadMethodParams,
  loadStopwords,
  parseConversionTable,
  parseMethodTable,
  parseStopwords,
} from '../src/index.js';

describe('parseMethodTable', () => {
  test('reads finals from the header and one row per initial', () => {
    expect(parseMethodTable('py', ',a,an\nb,1,0\nø,1,1\n')).toEqual({
      method: 'py',
      initials: ['b', 'ø'],
      finals: ['a', 'an'],
      matrix: [[true, false], [true, true]],
    });
  });

  test('rejects short rows and non-boolean cells', () => {
    expect(() => parseMethodTable('py', ',a,an\nb,1\n')).toThrow(TableFormatError);
    expect(() => parseMethodTable('wg', ',a\np,x\n')).toThrow('row "p" has non-boolean cell "x"');
  });

  test('rejects a table without finals', () => {
    expect(() => parseMethodTable('py', '')).toThrow('missing header row of finals');
  });
});

describe('parseConversionTable', () => {
  test('reads one column per method plus meta', () => {
    expect(parseConversionTable("py,wg,meta\nchang,ch'ang,\nlo,,rare\n")).toEqual([
      { py: 'chang', wg: "ch'ang", meta: '' },
      { py: 'lo', wg: '', meta: 'rare' },
    ]);
  });

  test('rejects a table missing a method column', () => {
    expect(() => parseConversionTable('py,meta\na,\n')).toThrow('missing column "wg"');
  });
});

describe('parseStopwords', () => {
  test('skips comments and blank lines', () => {
    expect([...parseStopwords('# common words\nMan\n\nfan\r\n')]).toEqual(['man', 'fan']);
  });
});

describe('bundled tables', () => {
  test('loads the Pinyin and Wade-Giles matrices', () => {
    const py = loadMethodParams('py');
    expect(py.initials).toHaveLength(24);
    expect(py.finals).toHaveLength(37);
    expect(py.initials[py.initials.length - 1]).toBe('ø');

    const wg = loadMethodParams('wg');
    expect(wg.initials).toHaveLength(25);
    expect(wg.finals).toHaveLength(40);
    expect(wg.finals).toContain('ŭ');
    expect(wg.initials).toContain("ch'");
  });

  test('memoizes loaded tables', () => {
    expect(loadMethodParams('py')).toBe(loadMethodParams('py'));
    expect(loadConversionTable()).toBe(loadConversionTable());
  });

  test('loads the conversion table and stopwords', () => {
    const rows = loadConversionTable();
    expect(rows).toHaveLength(417);
    expect(rows.filter(row => row.meta === 'rare').map(row => row.py).sort()).toEqual(['den', 'lo', 'nou', 'rua']);
    expect(loadStopwords().has('man')).toBe(true);
  });

  test('resolves paths inside a custom directory', () => {
    expect(getDataPath('wg', '/srv/tables')).toBe(path.join('/srv/tables', 'wg.csv'));
  });

  test('fails on a missing directory', () => {
    expect(() => loadMethodParams('py', '/nonexistent/roman-tools')).toThrow(MissingTableDataError);
  });

  test('builds a romanizer over the bundled tables', () => {
    expect(createRomanizer().convert('Zhongguo', 'py', 'wg')).toBe('Chung-kuo');
  });
});
