/**
 * TOON codec errors. Decode errors carry the 1-based line (and column where known).
 */

interface ErrorOptions {
  line?: number;
  column?: number;
  cause?: unknown;
}

export class ToonError extends Error {
  override readonly name: string = "ToonError";
  readonly line?: number;
  readonly column?: number;

  constructor(message: string, options?: ErrorOptions) {
    super(message);
    this.line = options?.line;
    this.column = options?.column;
    if (options?.cause !== undefined) this.cause = options.cause;
    Object.setPrototypeOf(this, ToonError.prototype);
  }

  /** Human-readable location string */
  get location(): string {
    if (this.line === undefined) return "";
    return this.column === undefined ? `line ${this.line}` : `line ${this.line}, column ${this.column}`;
  }

  override toString(): string {
    const loc = this.location;
    return loc ? `${this.name}: ${this.message} (${loc})` : `${this.name}: ${this.message}`;
  }
}

/** Unparseable line shape: malformed header, bad indentation, unterminated quote. */
export class ToonSyntaxError extends ToonError {
  override readonly name = "ToonSyntaxError";
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, ToonSyntaxError.prototype);
  }
}

/** A declared count disagrees with what follows, or a table's columns are unusable. */
export class ToonSchemaMismatchError extends ToonError {
  override readonly name = "ToonSchemaMismatchError";
  readonly expected?: number;
  readonly actual?: number;

  constructor(message: string, options?: ErrorOptions & { expected?: number; actual?: number }) {
    super(message, options);
    this.expected = options?.expected;
    this.actual = options?.actual;
    Object.setPrototypeOf(this, ToonSchemaMismatchError.prototype);
  }
}

/** A table cell does not fit the converter its column got from the first row. */
export class ToonTypeError extends ToonError {
  override readonly name = "ToonTypeError";
  readonly columnName?: string;
  readonly expectedKind?: string;

  constructor(
    message: string,
    options?: ErrorOptions & { columnName?: string; expectedKind?: string },
  ) {
    super(message, options);
    this.columnName = options?.columnName;
    this.expectedKind = options?.expectedKind;
    Object.setPrototypeOf(this, ToonTypeError.prototype);
  }
}

/** A list classified as tabular turned out not to be while its rows were written. */
export class ToonEncodingInvariantError extends ToonError {
  override readonly name = "ToonEncodingInvariantError";
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, ToonEncodingInvariantError.prototype);
  }
}

/** The value handed to the encoder has no TOON literal (e.g. NaN). */
export class ToonEncodeError extends ToonError {
  override readonly name = "ToonEncodeError";
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, ToonEncodeError.prototype);
  }
}
