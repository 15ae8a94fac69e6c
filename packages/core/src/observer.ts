// Parse trace hooks. The engine reports each step here instead of printing.

import type { Syllable } from './types.js';

export interface EngineObserver {
  wordStarted?(word: string): void;
  initialFound?(text: string, initial: string): void;
  finalFound?(text: string, final: string): void;
  syllableValidated?(syllable: Syllable, cached: boolean): void;
  wordAssembled?(word: string, syllables: readonly Syllable[]): void;
  literalFound?(text: string): void;
  syllableConverted?(source: string, result: string): void;
  validationFailed?(word: string, errors: readonly string[]): void;
}

export const NOOP_OBSERVER: EngineObserver = {};

export type CrumbSink = (line: string) => void;

/**
 * Writes a human-readable trace: "# Stage: message" per word, "## Stage: message"
 * per parse step, and a "---" footer after each word.
 */
export class CrumbObserver implements EngineObserver {
  constructor(private readonly sink: CrumbSink = line => console.log(line)) {}

  /** One trace line; `level` sets the number of leading '#' */
  crumb(stage: string, message: string, level = 1) {
    this.sink(`${'#'.repeat(level)} ${stage}: ${message}`);
  }

  footer() {
    this.sink('---');
  }

  wordStarted(word: string) {
    this.crumb('Word', `processing "${word}"`);
  }

  initialFound(text: string, initial: string) {
    this.crumb('Initial', initial ? `"${initial}" in "${text}"` : `none in "${text}"`, 2);
  }

  finalFound(text: string, final: string) {
    this.crumb('Final', `"${final}" in "${text}"`, 2);
  }

  syllableValidated(syllable: Syllable, cached: boolean) {
    const verdict = syllable.valid ? 'valid' : 'invalid';
    this.crumb('Syllable', `"${syllable.fullSyllable}" is ${verdict}${cached ? ' (cached)' : ''}`, 2);
  }

  wordAssembled(word: string, syllables: readonly Syllable[]) {
    this.crumb('Assembled', `"${word}" -> [${syllables.map(s => s.fullSyllable).join(', ')}]`);
    this.footer();
  }

  literalFound(text: string) {
    this.crumb('Literal', JSON.stringify(text));
  }

  syllableConverted(source: string, result: string) {
    this.crumb('Convert', `"${source}" -> "${result}"`, 2);
  }

  validationFailed(word: string, errors: readonly string[]) {
    this.crumb('Invalid', `"${word}": ${errors.join('; ')}`);
  }
}
