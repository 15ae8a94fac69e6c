// Error types raised by the engine and the table loaders

export class RomanizationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RomanizationError';
  }
}

export class UnsupportedMethodError extends RomanizationError {
  constructor(public method: string) {
    super(`Unsupported romanization method: "${method}" (expected pinyin/py or wade-giles/wg)`);
    this.name = 'UnsupportedMethodError';
  }
}

/** A table the requested method needs was never loaded or could not be found on disk */
export class MissingTableDataError extends RomanizationError {
  constructor(public table: string, public location?: string) {
    super(location ? `Missing table data "${table}" at ${location}` : `Missing table data "${table}"`);
    this.name = 'MissingTableDataError';
  }
}

export class TableFormatError extends RomanizationError {
  constructor(public table: string, public reason: string) {
    super(`Malformed table "${table}": ${reason}`);
    this.name = 'TableFormatError';
  }
}
