// @roman-tools/data - Romanization tables and loaders

import { Romanizer, type RomanizerOptions } from '@roman-tools/core';
import { loadRomanizationData } from './tables.js';

export { getDataDir, getDataPath, TABLE_FILES, type TableName } from './paths.js';
export {
  parseMethodTable,
  parseConversionTable,
  parseStopwords,
  loadMethodParams,
  loadConversionTable,
  loadStopwords,
  loadRomanizationData,
  clearTableCache,
} from './tables.js';

export interface CreateRomanizerOptions extends RomanizerOptions {
  dataDir?: string;
}

/** A Romanizer over the bundled tables (or those in `dataDir`) */
export function createRomanizer(options: CreateRomanizerOptions = {}): Romanizer {
  const { dataDir, ...rest } = options;
  return new Romanizer(loadRomanizationData(dataDir), rest);
}
