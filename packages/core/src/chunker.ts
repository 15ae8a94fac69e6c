// Splits text into word chunks (parsed into syllables) and literal chunks

import { APOSTROPHE_CLASS, DASH_CLASS, LETTER_CLASS } from './constants.js';
import { NOOP_OBSERVER, type EngineObserver } from './observer.js';
import type { SyllableEngine } from './syllable.js';
import type { Chunk } from './types.js';

const WORD = `[${LETTER_CLASS}]+(?:[${APOSTROPHE_CLASS}${DASH_CLASS}][${LETTER_CLASS}]+)*`;
const WORDS_ONLY = new RegExp(WORD, 'g');
const WORDS_AND_LITERALS = new RegExp(`${WORD}|[^${LETTER_CLASS}]+`, 'g');

export interface ChunkOptions {
  /** Keep the text between words as literal chunks */
  keepLiterals: boolean;
  observer?: EngineObserver;
}

export class TextChunker {
  constructor(private readonly engine: SyllableEngine) {}

  chunk(text: string, options: ChunkOptions): Chunk[] {
    const observer = options.observer ?? NOOP_OBSERVER;
    const pattern = options.keepLiterals ? WORDS_AND_LITERALS : WORDS_ONLY;
    const chunks: Chunk[] = [];

    for (const [piece] of text.normalize('NFC').matchAll(pattern)) {
      if (!isWord(piece)) {
        observer.literalFound?.(piece);
        chunks.push({ kind: 'literal', text: piece });
        continue;
      }
      observer.wordStarted?.(piece);
      const syllables = this.engine.strategy.splitWord(piece).flatMap(run => this.engine.parseAll(run));
      observer.wordAssembled?.(piece, syllables);
      chunks.push({ kind: 'word', text: piece, syllables });
    }
    return chunks;
  }
}

const STARTS_WITH_LETTER = new RegExp(`^[${LETTER_CLASS}]`);

function isWord(piece: string): boolean {
  return STARTS_WITH_LETTER.test(piece);
}
