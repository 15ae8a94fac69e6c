// Actions over loaded tables: segment, validate, convert, cherry-pick, count, detect

import { METHOD_IDS, METHODS, type MethodId } from './constants.js';
import { createConfig, type RomanizationConfig } from './config.js';
import { SyllableConverter } from './converter.js';
import { MissingTableDataError } from './errors.js';
import { CrumbObserver, NOOP_OBSERVER, type EngineObserver } from './observer.js';
import { createStrategy } from './strategies/index.js';
import { TextChunker } from './chunker.js';
import { DEFAULT_CACHE_SIZE, SyllableEngine } from './syllable.js';
import type {
  Chunk,
  ConversionReport,
  ConversionRow,
  RomanizationData,
  SegmentedChunk,
  Syllable,
  WordChunk,
  WordDetection,
  WordValidation,
} from './types.js';
import { WordReconstructor } from './word.js';

export interface RomanizerOptions {
  config?: Partial<RomanizationConfig>;
  observer?: EngineObserver;
  cacheSize?: number;
}

function wordChunks(chunks: readonly Chunk[]): WordChunk[] {
  return chunks.filter((chunk): chunk is WordChunk => chunk.kind === 'word');
}

/** Diagnostics of every invalid syllable, prefixed with the word it came from */
export function collectErrors(chunks: readonly Chunk[]): string[] {
  const errors: string[] = [];
  for (const chunk of wordChunks(chunks)) {
    for (const syllable of chunk.syllables) {
      for (const error of syllable.errors) {
        errors.push(`${chunk.text}: ${error}`);
      }
    }
  }
  return errors;
}

export class Romanizer {
  readonly config: RomanizationConfig;
  private readonly observer: EngineObserver;
  private readonly cacheSize: number;
  private readonly engines = new Map<MethodId, SyllableEngine>();
  private readonly converters = new Map<string, SyllableConverter>();

  constructor(private readonly data: RomanizationData, options: RomanizerOptions = {}) {
    this.config = createConfig(options.config);
    this.observer = options.observer ?? (this.config.crumbs ? new CrumbObserver() : NOOP_OBSERVER);
    this.cacheSize = options.cacheSize ?? DEFAULT_CACHE_SIZE;
  }

  /** Methods whose validity tables are loaded */
  availableMethods(): MethodId[] {
    return METHOD_IDS.filter(id => this.data.methods[id] !== undefined);
  }

  // ============================================================================
  // Actions
  // ============================================================================

  /** Syllable spellings per word; literals appear as plain strings when errors are skipped */
  segment(text: string, method: MethodId): SegmentedChunk[] {
    return this.chunk(text, method, this.config.skipErrors).map(chunk =>
      chunk.kind === 'word' ? chunk.syllables.map(s => s.fullSyllable) : chunk.text,
    );
  }

  validate(text: string, method: MethodId): boolean {
    const chunks = this.chunk(text, method, this.config.skipErrors);
    const valid = wordChunks(chunks).every(chunk => chunk.syllables.every(s => s.valid));
    if (!valid) this.reportInvalid(chunks);
    return valid;
  }

  validateWords(text: string, method: MethodId): WordValidation[] {
    return wordChunks(this.chunk(text, method, this.config.skipErrors)).map(chunk => {
      const result: WordValidation = {
        word: chunk.syllables.map(s => s.fullSyllable).join(''),
        syllables: chunk.syllables.map(s => s.fullSyllable),
        valid: chunk.syllables.map(s => s.valid),
      };
      if (this.config.reportErrors) {
        result.errors = chunk.syllables.flatMap(s => [...s.errors]);
      }
      return result;
    });
  }

  convert(text: string, from: MethodId, to: MethodId): string {
    return this.convertWithReport(text, from, to).text;
  }

  convertWithReport(text: string, from: MethodId, to: MethodId): ConversionReport {
    return this.reconstruct(text, from, to, this.config.skipErrors);
  }

  /** Convert only the words that parse in `from`, leaving everything else as written */
  cherryPick(text: string, from: MethodId, to: MethodId): string {
    return this.cherryPickWithReport(text, from, to).text;
  }

  cherryPickWithReport(text: string, from: MethodId, to: MethodId): ConversionReport {
    return this.reconstruct(text, from, to, true);
  }

  /** Syllables per word, 0 for words that do not fully parse */
  countSyllables(text: string, method: MethodId): number[] {
    return wordChunks(this.chunk(text, method, false)).map(chunk =>
      chunk.syllables.every(s => s.valid) ? chunk.syllables.length : 0,
    );
  }

  /** Methods under which every syllable of `text` is valid */
  detectMethod(text: string): MethodId[] {
    return this.availableMethods().filter(method => {
      const syllables = this.syllablesOf(text, method);
      return syllables.length > 0 && syllables.every(s => s.valid);
    });
  }

  detectMethodPerWord(text: string): WordDetection[] {
    return text
      .split(/\s+/)
      .filter(word => word.length > 0)
      .map(word => ({ word, methods: this.detectMethod(word) }));
  }

  // ============================================================================
  // Caches
  // ============================================================================

  clearCaches() {
    for (const engine of this.engines.values()) engine.clearCache();
    for (const converter of this.converters.values()) converter.clearCache();
  }

  getCacheStats() {
    const stats: Record<string, { size: number; hits: number; misses: number }> = {};
    for (const [method, engine] of this.engines) stats[`syllables:${method}`] = engine.getCacheStats();
    for (const [pair, converter] of this.converters) stats[`conversion:${pair}`] = converter.getCacheStats();
    return stats;
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private engine(method: MethodId): SyllableEngine {
    let engine = this.engines.get(method);
    if (!engine) {
      const params = this.data.methods[method];
      if (!params) {
        throw new MissingTableDataError(`${METHODS[method].name} validity table`);
      }
      engine = new SyllableEngine(createStrategy(params), { cacheSize: this.cacheSize, observer: this.observer });
      this.engines.set(method, engine);
    }
    return engine;
  }

  private converter(from: MethodId, to: MethodId): SyllableConverter {
    const key = `${from}->${to}`;
    let converter = this.converters.get(key);
    if (!converter) {
      const rows: readonly ConversionRow[] | undefined = this.data.conversion;
      if (!rows) {
        throw new MissingTableDataError('conversion table');
      }
      converter = new SyllableConverter(rows, from, to, { cacheSize: this.cacheSize, observer: this.observer });
      this.converters.set(key, converter);
    }
    return converter;
  }

  private chunk(text: string, method: MethodId, keepLiterals: boolean): Chunk[] {
    return new TextChunker(this.engine(method)).chunk(text, { keepLiterals, observer: this.observer });
  }

  private syllablesOf(text: string, method: MethodId): Syllable[] {
    return wordChunks(this.chunk(text, method, false)).flatMap(chunk => chunk.syllables);
  }

  private reconstruct(text: string, from: MethodId, to: MethodId, skipErrors: boolean): ConversionReport {
    const chunks = this.chunk(text, from, skipErrors);
    const words = new WordReconstructor(this.converter(from, to), this.engine(to).strategy, {
      skipErrors,
      stopwords: this.data.stopwords,
    });
    const pieces = chunks.map(chunk => (chunk.kind === 'word' ? words.reconstruct(chunk.syllables) : chunk.text));
    const errors = this.config.reportErrors ? collectErrors(chunks) : [];
    if (errors.length > 0) this.reportInvalid(chunks);
    return {
      // Literals carry their own whitespace when kept
      text: skipErrors ? pieces.join('') : pieces.join(' '),
      errors,
    };
  }

  private reportInvalid(chunks: readonly Chunk[]) {
    if (!this.observer.validationFailed) return;
    for (const chunk of wordChunks(chunks)) {
      const errors = chunk.syllables.flatMap(s => [...s.errors]);
      if (errors.length > 0) this.observer.validationFailed(chunk.text, errors);
    }
  }
}
