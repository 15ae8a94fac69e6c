/**
 * Data file locations
 * Uses import.meta.url to find the package root, regardless of working directory
 */

import path from 'path';
import { fileURLToPath } from 'url';
import type { MethodId } from '@roman-tools/core';

export const TABLE_FILES = {
  py: 'py.csv',
  wg: 'wg.csv',
  conversion: 'conversion.csv',
  stopwords: 'stopwords.txt',
} as const satisfies Record<MethodId | 'conversion' | 'stopwords', string>;

export type TableName = keyof typeof TABLE_FILES;

/**
 * Get the data directory: explicit path, then ROMAN_TOOLS_DATA_DIR, then the bundled tables
 */
export function getDataDir(customPath?: string): string {
  if (customPath) return customPath;
  if (process.env.ROMAN_TOOLS_DATA_DIR) return process.env.ROMAN_TOOLS_DATA_DIR;

  // packages/data/src/paths.ts -> packages/data/data
  const here = path.dirname(fileURLToPath(import.meta.url));
  return path.join(here, '../data');
}

export function getDataPath(table: TableName, dataDir?: string): string {
  return path.join(getDataDir(dataDir), TABLE_FILES[table]);
}
