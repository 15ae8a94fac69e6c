// Initial/final validity lookup over a loaded method matrix

import { NO_INITIAL, type MethodId } from './constants.js';
import { TableFormatError } from './errors.js';
import type { MethodParams } from './types.js';

export class ValidityTable {
  readonly method: MethodId;
  readonly initials: readonly string[];
  readonly finals: readonly string[];
  /** Real initials (sentinel excluded), longest first */
  readonly initialsByLength: readonly string[];

  private readonly initialIndex = new Map<string, number>();
  private readonly finalIndex = new Map<string, number>();
  private readonly matrix: readonly (readonly boolean[])[];

  constructor(params: MethodParams) {
    const { method, initials, finals, matrix } = params;
    if (matrix.length !== initials.length) {
      throw new TableFormatError(method, `expected ${initials.length} rows, got ${matrix.length}`);
    }
    matrix.forEach((row, i) => {
      if (row.length !== finals.length) {
        throw new TableFormatError(method, `row "${initials[i]}" has ${row.length} cells, expected ${finals.length}`);
      }
    });

    this.method = method;
    this.initials = initials;
    this.finals = finals;
    this.matrix = matrix;
    initials.forEach((initial, i) => this.initialIndex.set(initial, i));
    finals.forEach((final, i) => this.finalIndex.set(final, i));
    this.initialsByLength = initials
      .filter(initial => initial !== NO_INITIAL)
      .sort((a, b) => b.length - a.length);
  }

  hasInitial(initial: string): boolean {
    return this.initialIndex.has(initial);
  }

  hasFinal(final: string): boolean {
    return this.finalIndex.has(final);
  }

  /** True when both parts are known and the matrix marks the pair valid */
  isValid(initial: string, final: string): boolean {
    const row = this.initialIndex.get(initial);
    const col = this.finalIndex.get(final);
    if (row === undefined || col === undefined) return false;
    return this.matrix[row]?.[col] ?? false;
  }

  /** Finals beginning with `prefix` that combine with `initial` */
  finalsStartingWith(prefix: string, initial: string): string[] {
    return this.finals.filter(final => final.startsWith(prefix) && this.isValid(initial, final));
  }

  /** Diagnostics explaining why a pair does not validate */
  explain(initial: string, final: string): string[] {
    const reasons: string[] = [];
    if (!this.hasInitial(initial)) reasons.push(`invalid initial: '${initial}'`);
    if (!this.hasFinal(final)) reasons.push(`invalid final: '${final}'`);
    if (reasons.length === 0 && !this.isValid(initial, final)) {
      reasons.push(`invalid combination: '${initial}' + '${final}'`);
    }
    return reasons;
  }
}
