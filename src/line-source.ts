import { ToonSyntaxError } from "./errors.js";

export interface SourceLine {
  /** Text after the indentation, trailing whitespace removed */
  content: string;
  /** Nesting level: indent divided by the document's indent unit */
  depth: number;
  /** Leading spaces */
  indent: number;
  /** 1-based physical line number */
  lineNumber: number;
}

/**
 * Yield the lines of a string one at a time, scanning for newlines as it goes.
 */
export function* linesOf(text: string): Generator<string> {
  let start = 0;
  for (;;) {
    const end = text.indexOf("\n", start);
    if (end === -1) {
      yield text.slice(start);
      return;
    }
    yield text.slice(start, end);
    start = end + 1;
  }
}

/**
 * Reassemble lines from chunks cut at arbitrary points (e.g. reads from a stream).
 */
export function* linesOfChunks(chunks: Iterable<string>): Generator<string> {
  let pending = "";
  for (const chunk of chunks) {
    pending += chunk;
    let end = pending.indexOf("\n");
    while (end !== -1) {
      yield pending.slice(0, end);
      pending = pending.slice(end + 1);
      end = pending.indexOf("\n");
    }
  }
  yield pending;
}

/**
 * Forward-only cursor over physical lines with a one-line pushback slot.
 *
 * Lines are pulled from the underlying iterable only when asked for, so a
 * decoder reading through it never holds more than the current line and the
 * pushed-back one. Blank lines never surface. The indent unit is taken from
 * the first indented line and every later indent must be a multiple of it.
 */
export class LineSource {
  private readonly lines: Iterator<string>;
  private lineNumber = 0;
  private unit: number | undefined;
  private pushed: SourceLine | undefined;
  private exhausted = false;

  constructor(lines: Iterable<string>) {
    this.lines = lines[Symbol.iterator]();
  }

  /** Lines held in the pushback slot (0 or 1). */
  get buffered(): number {
    return this.pushed ? 1 : 0;
  }

  /** Spaces per level, once the first indented line has been seen. */
  get indentUnit(): number | undefined {
    return this.unit;
  }

  next(): SourceLine | undefined {
    if (this.pushed) {
      const line = this.pushed;
      this.pushed = undefined;
      return line;
    }
    while (!this.exhausted) {
      const result = this.lines.next();
      if (result.done) {
        this.exhausted = true;
        break;
      }
      this.lineNumber++;
      const line = this.measure(result.value);
      if (line) return line;
    }
    return undefined;
  }

  pushback(line: SourceLine): void {
    if (this.pushed) {
      throw new Error(`Pushback slot already holds line ${this.pushed.lineNumber}`);
    }
    this.pushed = line;
  }

  peek(): SourceLine | undefined {
    const line = this.next();
    if (line) this.pushback(line);
    return line;
  }

  private measure(raw: string): SourceLine | undefined {
    const text = raw.trimEnd();
    if (text === "") return undefined;

    let indent = 0;
    while (text[indent] === " ") indent++;
    if (text[indent] === "\t") {
      throw new ToonSyntaxError("Tab in indentation", { line: this.lineNumber, column: indent + 1 });
    }
    if (indent === 0) {
      return { content: text, depth: 0, indent, lineNumber: this.lineNumber };
    }

    if (this.unit === undefined) this.unit = indent;
    if (indent % this.unit !== 0) {
      throw new ToonSyntaxError(
        `Indentation of ${indent} spaces is not a multiple of the ${this.unit}-space unit`,
        { line: this.lineNumber, column: indent + 1 },
      );
    }
    return { content: text.slice(indent), depth: indent / this.unit, indent, lineNumber: this.lineNumber };
  }
}
