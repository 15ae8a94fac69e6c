// @roman-tools/core - Syllable segmentation, validation and conversion for romanized Mandarin

// Characters and methods
export {
  VOWELS,
  APOSTROPHES,
  DASHES,
  SUPPORTED_CONTRACTIONS,
  NO_INITIAL,
  ERROR_MARKER,
  RARE_MARKER,
  METHODS,
  METHOD_IDS,
  isVowel,
  isApostrophe,
  isDash,
  isMethodId,
  listMethods,
  type MethodId,
  type MethodInfo,
} from './constants.js';

// Configuration
export {
  DEFAULT_CONFIG,
  createConfig,
  loadConfigFromEnv,
  parseMethod,
  type RomanizationConfig,
} from './config.js';

// Errors
export {
  RomanizationError,
  UnsupportedMethodError,
  MissingTableDataError,
  TableFormatError,
} from './errors.js';

// Tracing
export { setDebug, dp, DEBUG } from './debug.js';
export { CrumbObserver, NOOP_OBSERVER, type EngineObserver, type CrumbSink } from './observer.js';

// Parsing
export { ValidityTable } from './table.js';
export {
  createStrategy,
  BaseStrategy,
  PinyinStrategy,
  WadeGilesStrategy,
  type RomanizationStrategy,
} from './strategies/index.js';
export { SyllableEngine, foldText, DEFAULT_CACHE_SIZE, type SyllableEngineOptions } from './syllable.js';
export { TextChunker, type ChunkOptions } from './chunker.js';

// Conversion
export { SyllableConverter, type ConverterOptions } from './converter.js';
export { WordReconstructor, previewWord, isContraction, type WordOptions } from './word.js';

// Actions
export { Romanizer, collectErrors, type RomanizerOptions } from './romanizer.js';

// Types
export type {
  MethodParams,
  ConversionRow,
  RomanizationData,
  Syllable,
  Chunk,
  WordChunk,
  LiteralChunk,
  SegmentedChunk,
  WordValidation,
  WordDetection,
  ConversionReport,
} from './types.js';
