// Action tests over the bundled tables
import { describe, test, expect } from 'vitest';
import { CrumbObserver, MissingTableDataError, Romanizer } from '@roman-tools/core';
import { MINI_PINYIN, loadTestRomanizer } from '@roman-tools/testing';

describe('segment', () => {
  const romanizer = loadTestRomanizer();

  test('segments Pinyin words', () => {
    expect(romanizer.segment("Zhongguo ti'an tianqi", 'py')).toEqual([['zhong', 'guo'], ['ti', 'an'], ['tian', 'qi']]);
    expect(romanizer.segment('changan', 'py')).toEqual([['chan', 'gan']]);
    expect(romanizer.segment('xiaoming changan wenxin liangxiao', 'py'))
      .toEqual([['xiao', 'ming'], ['chan', 'gan'], ['wen', 'xin'], ['liang', 'xiao']]);
    expect(romanizer.segment("chang'an shan'er li'an", 'py')).toEqual([['chang', 'an'], ['shan', 'er'], ['li', 'an']]);
    expect(romanizer.segment('anwei aiai ouyang ewei', 'py')).toEqual([['an', 'wei'], ['ai', 'ai'], ['ou', 'yang'], ['e', 'wei']]);
    expect(romanizer.segment('zhuangyuan wenxiang gangren', 'py'))
      .toEqual([['zhuang', 'yuan'], ['wen', 'xiang'], ['gang', 'ren']]);
  });

  test('segments text that does not parse', () => {
    expect(romanizer.segment('xa qo vei', 'py')).toEqual([['xa'], ['qo'], ['v', 'ei']]);
    expect(romanizer.segment('banp zhirr mingk', 'py')).toEqual([['ban', 'p'], ['zhi', 'rr'], ['ming', 'k']]);
  });

  test('segments Wade-Giles words', () => {
    expect(romanizer.segment("fenghuang hsiaoming ch’ankan shiherh yüanyang", 'wg'))
      .toEqual([['feng', 'huang'], ['hsiao', 'ming'], ["ch'an", 'kan'], ['shih', 'erh'], ['yüan', 'yang']]);
  });

  test('ends a Wade-Giles final at an apostrophe', () => {
    expect(romanizer.segment("linp’ing chungch'ing", 'wg')).toEqual([['linp', "'ing"], ['chungch', "'ing"]]);
    expect(romanizer.validate("linp’ing", 'wg')).toBe(false);
    expect(romanizer.validate("chungch'ing", 'wg')).toBe(false);
  });

  test('leaves a Wade-Giles run with no decomposition unsegmented', () => {
    expect(romanizer.segment('aqxz', 'wg')).toEqual([['aqxz']]);
    expect(romanizer.validate('aqxz', 'wg')).toBe(false);
  });

  test('keeps literals when errors are skipped', () => {
    const skipping = loadTestRomanizer({ config: { skipErrors: true } });
    expect(skipping.segment('ni hao!', 'py')).toEqual([['ni'], ' ', ['hao'], '!']);
  });
});

describe('validate', () => {
  const romanizer = loadTestRomanizer();

  test('accepts text made only of valid syllables', () => {
    expect(romanizer.validate('ni hao', 'py')).toBe(true);
    expect(romanizer.validate('ni hao xa', 'py')).toBe(false);
    expect(romanizer.validate('erh', 'wg')).toBe(true);
    expect(romanizer.validate("ch’anzkan", 'wg')).toBe(false);
  });

  test('reports each word', () => {
    const results = romanizer.validateWords("linpzing chazng'an iaoming yuanng shizer xiongew fengghuang", 'py');
    expect(results.map(r => [r.word, r.syllables, r.valid])).toEqual([
      ['linpzing', ['lin', 'pzing'], [true, false]],
      ['chazngan', ['cha', 'zng', 'an'], [true, false, true]],
      ['iaoming', ['i', 'ao', 'ming'], [false, true, true]],
      ['yuanng', ['yuan', 'ng'], [true, false]],
      ['shizer', ['shi', 'zer'], [true, false]],
      ['xiongew', ['xiong', 'e', 'w'], [true, true, false]],
      ['fengghuang', ['feng', 'ghu', 'ang'], [true, false, true]],
    ]);
    expect(results[0]?.errors).toBeUndefined();
  });

  test('adds diagnostics when errors are reported', () => {
    const reporting = loadTestRomanizer({ config: { reportErrors: true } });
    expect(reporting.validateWords('xa', 'py')).toEqual([
      {
        word: 'xa',
        syllables: ['xa'],
        valid: [false],
        errors: ["invalid combination: 'x' + 'a'", "invalid syllable: 'xa'"],
      },
    ]);
  });
});

describe('convert', () => {
  const romanizer = loadTestRomanizer();

  test('converts Pinyin to Wade-Giles', () => {
    expect(romanizer.convert("ni hao chang'an yuan", 'py', 'wg')).toBe("ni hao ch'ang-an yüan");
  });

  test('converts Wade-Giles to Pinyin', () => {
    expect(romanizer.convert("Ch'ang-an Chung-kuo", 'wg', 'py')).toBe("Chang'an Zhongguo");
  });

  test('reads the breve spellings of Wade-Giles', () => {
    expect(romanizer.convert("tzŭ ssŭ Tz'ŭ", 'wg', 'py')).toBe('zi si Ci');
    expect(romanizer.detectMethod('tzŭ')).toEqual(['wg']);
  });

  test('marks syllables it cannot convert', () => {
    expect(romanizer.convert('ni xa', 'py', 'wg')).toBe('ni xa(!)');
  });

  test('keeps punctuation and unparseable words when errors are skipped', () => {
    const skipping = loadTestRomanizer({ config: { skipErrors: true } });
    expect(skipping.convert('Zhongguo, hello!', 'py', 'wg')).toBe('Chung-kuo, hello!');
  });

  test('returns diagnostics with the text when errors are reported', () => {
    const reporting = loadTestRomanizer({ config: { reportErrors: true } });
    expect(reporting.convertWithReport('ni xa', 'py', 'wg')).toEqual({
      text: 'ni xa(!)',
      errors: ["xa: invalid combination: 'x' + 'a'", "xa: invalid syllable: 'xa'"],
    });
    expect(loadTestRomanizer().convertWithReport('ni xa', 'py', 'wg').errors).toEqual([]);
  });
});

describe('cherryPick', () => {
  const romanizer = loadTestRomanizer();

  test('converts only romanized words', () => {
    expect(romanizer.cherryPick('Welcome to Zhongguo', 'py', 'wg')).toBe('Welcome to Chung-kuo');
    expect(romanizer.cherryPick("We visited Ch'ang-an.", 'wg', 'py')).toBe("We visited Chang'an.");
  });

  test('returns text with nothing to convert unchanged', () => {
    expect(romanizer.cherryPick('Bring the red book, please.', 'py', 'wg')).toBe('Bring the red book, please.');
  });
});

describe('countSyllables', () => {
  test('counts syllables per word, 0 for invalid words', () => {
    expect(loadTestRomanizer().countSyllables('Zhongguo xa tianqi', 'py')).toEqual([2, 0, 2]);
  });
});

describe('detectMethod', () => {
  const romanizer = loadTestRomanizer();

  test('lists the methods the whole text is valid in', () => {
    expect(romanizer.detectMethod('zhongguo')).toEqual(['py']);
    expect(romanizer.detectMethod("ch'ang-an")).toEqual(['wg']);
    expect(romanizer.detectMethod("chang'an")).toEqual(['py']);
    expect(romanizer.detectMethod('an')).toEqual(['py', 'wg']);
    expect(romanizer.detectMethod('hello')).toEqual([]);
    expect(romanizer.detectMethod('')).toEqual([]);
  });

  test('detects per word', () => {
    expect(romanizer.detectMethodPerWord(' zhongguo  hsiao ')).toEqual([
      { word: 'zhongguo', methods: ['py'] },
      { word: 'hsiao', methods: ['wg'] },
    ]);
  });
});

describe('tables', () => {
  test('fails when a method table is missing', () => {
    const romanizer = new Romanizer({ methods: { py: MINI_PINYIN } });
    expect(romanizer.availableMethods()).toEqual(['py']);
    expect(() => romanizer.segment('ni', 'wg')).toThrow(MissingTableDataError);
    expect(() => romanizer.convert('ba', 'py', 'wg')).toThrow('Missing table data "conversion table"');
  });
});

describe('crumbs', () => {
  test('traces each parse step', () => {
    const lines: string[] = [];
    const romanizer = loadTestRomanizer({ observer: new CrumbObserver(line => lines.push(line)) });
    romanizer.segment('ni', 'py');
    expect(lines).toEqual([
      '# Word: processing "ni"',
      '## Initial: "n" in "ni"',
      '## Final: "i" in "ni"',
      '## Syllable: "ni" is valid',
      '# Assembled: "ni" -> [ni]',
      '---',
    ]);
  });

  test('marks cached syllables', () => {
    const lines: string[] = [];
    const romanizer = loadTestRomanizer({ observer: new CrumbObserver(line => lines.push(line)) });
    romanizer.segment('ni ni', 'py');
    expect(lines.filter(line => line.startsWith('## Syllable'))).toEqual([
      '## Syllable: "ni" is valid',
      '## Syllable: "ni" is valid (cached)',
    ]);
  });
});

describe('caches', () => {
  test('reports and clears cache statistics', () => {
    const romanizer = loadTestRomanizer();
    romanizer.convert('ni ni', 'py', 'wg');
    expect(romanizer.getCacheStats()).toEqual({
      'syllables:py': { size: 1, hits: 1, misses: 1 },
      'syllables:wg': { size: 0, hits: 0, misses: 0 },
      'conversion:py->wg': { size: 1, hits: 1, misses: 1 },
    });
    romanizer.clearCaches();
    expect(romanizer.getCacheStats()['syllables:py']).toEqual({ size: 0, hits: 0, misses: 0 });
  });
});
