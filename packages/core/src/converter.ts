// Syllable conversion between methods through the conversion table

import { LRUCache } from 'lru-cache';
import { ERROR_MARKER, RARE_MARKER, type MethodId } from './constants.js';
import { NOOP_OBSERVER, type EngineObserver } from './observer.js';
import { DEFAULT_CACHE_SIZE } from './syllable.js';
import type { ConversionRow } from './types.js';

export interface ConverterOptions {
  cacheSize?: number;
  observer?: EngineObserver;
}

export class SyllableConverter {
  private readonly index = new Map<string, ConversionRow>();
  private readonly cache: LRUCache<string, string>;
  private readonly observer: EngineObserver;
  private hits = 0;
  private misses = 0;

  constructor(
    rows: readonly ConversionRow[],
    readonly from: MethodId,
    readonly to: MethodId,
    options: ConverterOptions = {},
  ) {
    // First row wins when several share a source spelling
    for (const row of rows) {
      const key = row[from].toLowerCase();
      if (key && !this.index.has(key)) this.index.set(key, row);
    }
    this.cache = new LRUCache({ max: options.cacheSize ?? DEFAULT_CACHE_SIZE });
    this.observer = options.observer ?? NOOP_OBSERVER;
  }

  /**
   * Target spelling for one syllable. Unknown syllables come back with "(!)",
   * syllables with no target equivalent with "(!rare)".
   */
  convert(syllable: string): string {
    const key = syllable.toLowerCase();
    let result = this.cache.get(key);
    if (result === undefined) {
      this.misses++;
      result = this.lookup(key);
      this.cache.set(key, result);
    } else {
      this.hits++;
    }
    this.observer.syllableConverted?.(key, result);
    return result;
  }

  clearCache() {
    this.cache.clear();
    this.hits = 0;
    this.misses = 0;
  }

  getCacheStats() {
    return { size: this.cache.size, hits: this.hits, misses: this.misses };
  }

  private lookup(key: string): string {
    const row = this.index.get(key);
    if (!row) return key + ERROR_MARKER;
    const target = row[this.to];
    if (target) return target;
    return key + (row.meta === 'rare' ? RARE_MARKER : ERROR_MARKER);
  }
}
