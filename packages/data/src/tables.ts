// Parsers and memoized loaders for the romanization tables

import fs from 'fs';
import { parse } from 'csv-parse/sync';
import {
  METHOD_IDS,
  MissingTableDataError,
  TableFormatError,
  dp,
  type ConversionRow,
  type MethodId,
  type MethodParams,
  type RomanizationData,
} from '@roman-tools/core';
import { getDataDir, getDataPath, type TableName } from './paths.js';

// ============================================================================
// Parsing
// ============================================================================

function parseCell(table: string, initial: string, value: string): boolean {
  switch (value.trim().toLowerCase()) {
    case '1':
    case 'true':
      return true;
    case '0':
    case 'false':
    case '':
      return false;
    default:
      throw new TableFormatError(table, `row "${initial}" has non-boolean cell "${value}"`);
  }
}

/**
 * Parse a validity matrix: a header row of finals (first cell empty),
 * then one row per initial with 0/1 cells.
 */
export function parseMethodTable(method: MethodId, content: string): MethodParams {
  const records: string[][] = parse(content, {
    skip_empty_lines: true,
    relax_column_count: true,
  });

  const [header, ...rows] = records;
  if (!header || header.length < 2) {
    throw new TableFormatError(method, 'missing header row of finals');
  }
  const finals = header.slice(1).map(final => final.trim());

  const initials: string[] = [];
  const matrix: boolean[][] = [];
  for (const [initial = '', ...cells] of rows) {
    const name = initial.trim();
    if (!name) {
      throw new TableFormatError(method, 'row without an initial');
    }
    if (cells.length !== finals.length) {
      throw new TableFormatError(method, `row "${name}" has ${cells.length} cells, expected ${finals.length}`);
    }
    initials.push(name);
    matrix.push(cells.map(cell => parseCell(method, name, cell)));
  }

  return { method, initials, finals, matrix };
}

/**
 * Parse the conversion table: one column per method plus "meta".
 */
export function parseConversionTable(content: string): ConversionRow[] {
  const records: Record<string, string>[] = parse(content, {
    columns: true,
    skip_empty_lines: true,
  });

  const first = records[0];
  if (first) {
    for (const column of [...METHOD_IDS, 'meta']) {
      if (!(column in first)) {
        throw new TableFormatError('conversion', `missing column "${column}"`);
      }
    }
  }

  return records.map(record => ({
    py: (record.py ?? '').trim(),
    wg: (record.wg ?? '').trim(),
    meta: (record.meta ?? '').trim(),
  }));
}

/** One word per line; blank lines and #-comments ignored */
export function parseStopwords(content: string): Set<string> {
  const words = new Set<string>();
  for (const line of content.split(/\r?\n/)) {
    const word = line.trim().toLowerCase();
    if (word && !word.startsWith('#')) words.add(word);
  }
  return words;
}

// ============================================================================
// Loading
// ============================================================================

const methodCache = new Map<string, MethodParams>();
const conversionCache = new Map<string, ConversionRow[]>();
const stopwordCache = new Map<string, Set<string>>();

function readTable(table: TableName, dataDir?: string): string {
  const filePath = getDataPath(table, dataDir);
  if (!fs.existsSync(filePath)) {
    throw new MissingTableDataError(table, filePath);
  }
  dp(`Loading ${table} table from ${filePath}`);
  return fs.readFileSync(filePath, 'utf-8');
}

function memoized<T>(cache: Map<string, T>, key: string, load: () => T): T {
  const cached = cache.get(key);
  if (cached !== undefined) return cached;
  const value = load();
  cache.set(key, value);
  return value;
}

export function loadMethodParams(method: MethodId, dataDir?: string): MethodParams {
  const key = `${getDataDir(dataDir)}:${method}`;
  return memoized(methodCache, key, () => parseMethodTable(method, readTable(method, dataDir)));
}

export function loadConversionTable(dataDir?: string): ConversionRow[] {
  return memoized(conversionCache, getDataDir(dataDir), () => parseConversionTable(readTable('conversion', dataDir)));
}

export function loadStopwords(dataDir?: string): Set<string> {
  return memoized(stopwordCache, getDataDir(dataDir), () => parseStopwords(readTable('stopwords', dataDir)));
}

/** Load every table for the given methods (all of them by default) */
export function loadRomanizationData(dataDir?: string, methods: readonly MethodId[] = METHOD_IDS): RomanizationData {
  const params: Partial<Record<MethodId, MethodParams>> = {};
  for (const method of methods) {
    params[method] = loadMethodParams(method, dataDir);
  }
  return {
    methods: params,
    conversion: loadConversionTable(dataDir),
    stopwords: loadStopwords(dataDir),
  };
}

export function clearTableCache() {
  methodCache.clear();
  conversionCache.clear();
  stopwordCache.clear();
}
