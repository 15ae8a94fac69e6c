// Strategy registry. A new method needs a strategy class and a case here.

import type { MethodId } from '../constants.js';
import { ValidityTable } from '../table.js';
import type { MethodParams } from '../types.js';
import type { RomanizationStrategy } from './base.js';
import { PinyinStrategy } from './pinyin.js';
import { WadeGilesStrategy } from './wade-giles.js';

export { BaseStrategy, type RomanizationStrategy } from './base.js';
export { PinyinStrategy } from './pinyin.js';
export { WadeGilesStrategy } from './wade-giles.js';

export function createStrategy(params: MethodParams): RomanizationStrategy {
  const table = new ValidityTable(params);
  const method: MethodId = params.method;
  switch (method) {
    case 'py':
      return new PinyinStrategy(table);
    case 'wg':
      return new WadeGilesStrategy(table);
    default: {
      const unreachable: never = method;
      return unreachable;
    }
  }
}
