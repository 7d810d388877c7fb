/**
 * TOON text to value tree. Recursive descent over indentation depth, pulling
 * one line at a time from a LineSource.
 */

import { ColumnSchema } from "./columns.js";
import { ToonSchemaMismatchError, ToonSyntaxError } from "./errors.js";
import { parseScalar, splitDelimited } from "./grammar.js";
import { LineSource, linesOf } from "./line-source.js";
import type { SourceLine } from "./line-source.js";
import { LIST_ITEM_MARKER, isListItem, parseLineHead } from "./syntax.js";
import type { ArrayHead, ArrayHeader, FieldHead } from "./syntax.js";
import { toonList } from "./value.js";
import type { ToonMap, ToonValue } from "./value.js";

export interface DecodeOptions {
  /** Max nesting depth (default 256) */
  maxDepth?: number;
}

export const DEFAULT_MAX_DEPTH = 256;

function mapOf(entries: Map<string, ToonValue>): ToonMap {
  return { kind: "map", entries };
}

export class Decoder {
  private readonly maxDepth: number;

  constructor(
    private readonly source: LineSource,
    options: DecodeOptions = {},
  ) {
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  /**
   * Decode a whole document. Empty input is an empty map; a lone line that is
   * neither a field nor an array header is a root scalar.
   */
  decodeDocument(): ToonValue {
    const first = this.source.peek();
    if (!first) return mapOf(new Map());
    if (first.depth !== 0) {
      throw new ToonSyntaxError("Document must start without indentation", { line: first.lineNumber });
    }

    let value: ToonValue;
    if (parseLineHead(first.content, first.lineNumber).kind === "text") {
      this.source.next();
      value = parseScalar(first.content, first.lineNumber);
    } else {
      value = this.decodeBlock(0);
    }

    const extra = this.source.next();
    if (extra) {
      throw new ToonSyntaxError(`Unexpected content after the document root: ${extra.content}`, {
        line: extra.lineNumber,
      });
    }
    return value;
  }

  /**
   * Decode the block whose lines sit at `depth`: a map of fields, or a lone
   * keyless array header with its body. Ends at the first shallower line,
   * which is handed back to the source. No lines at `depth` is an empty map.
   */
  decodeBlock(depth: number): ToonValue {
    const first = this.source.next();
    if (!first) return mapOf(new Map());
    if (first.depth < depth) {
      this.source.pushback(first);
      return mapOf(new Map());
    }
    this.checkLine(first, depth);

    const head = parseLineHead(first.content, first.lineNumber);
    if (head.kind === "list") {
      const list = this.decodeArray(head.header, head.inline, this.bodyDepthOf(head.header, depth), first);
      const next = this.source.peek();
      if (next && next.depth === depth) {
        throw new ToonSyntaxError(`Unexpected content after array: ${next.content}`, { line: next.lineNumber });
      }
      return list;
    }

    this.source.pushback(first);
    const entries = new Map<string, ToonValue>();
    this.decodeEntries(entries, depth);
    return mapOf(entries);
  }

  // A root table may keep its rows flush with the header: `[2]{id,name}` then `1,Ada`
  private bodyDepthOf(header: ArrayHeader, depth: number): number {
    if (depth !== 0 || !header.fields) return depth + 1;
    const next = this.source.peek();
    return next && next.depth === 0 ? 0 : 1;
  }

  private decodeEntries(entries: Map<string, ToonValue>, depth: number): void {
    for (;;) {
      const line = this.source.next();
      if (!line) return;
      if (line.depth < depth) {
        this.source.pushback(line);
        return;
      }
      this.checkLine(line, depth);

      const head = parseLineHead(line.content, line.lineNumber);
      if (head.kind === "text" || head.kind === "list") {
        throw new ToonSyntaxError(`Expected "key: value", got: ${line.content}`, { line: line.lineNumber });
      }
      this.decodeField(entries, head, line, depth);
    }
  }

  private decodeField(entries: Map<string, ToonValue>, head: FieldHead | ArrayHead, line: SourceLine, depth: number): void {
    if (entries.has(head.key)) {
      throw new ToonSyntaxError(`Duplicate key "${head.key}"`, { line: line.lineNumber });
    }
    if (head.kind === "array") {
      entries.set(head.key, this.decodeArray(head.header, head.inline, depth + 1, line));
    } else if (head.value === "") {
      this.checkDepth(depth + 1, line);
      entries.set(head.key, this.decodeBlock(depth + 1));
    } else {
      entries.set(head.key, parseScalar(head.value, line.lineNumber));
    }
  }

  private decodeArray(header: ArrayHeader, inline: string, bodyDepth: number, line: SourceLine): ToonValue {
    this.checkDepth(bodyDepth, line);
    const { length, fields } = header;
    if (fields) return this.decodeTable(length, fields, bodyDepth, line);
    if (inline !== "") return this.decodeInline(length, inline, line);
    return this.decodeBulleted(length, bodyDepth, line);
  }

  private decodeInline(length: number, text: string, line: SourceLine): ToonValue {
    const tokens = splitDelimited(text, line.lineNumber);
    if (tokens.length !== length) {
      throw new ToonSchemaMismatchError(`Array declares ${length} values, found ${tokens.length}`, {
        line: line.lineNumber,
        expected: length,
        actual: tokens.length,
      });
    }
    return toonList(tokens.map((token) => parseScalar(token, line.lineNumber)));
  }

  private decodeTable(length: number, fields: string[], bodyDepth: number, header: SourceLine): ToonValue {
    if (fields.length === 0) {
      throw new ToonSchemaMismatchError("Table header declares no columns", { line: header.lineNumber });
    }
    const seen = new Set<string>();
    for (const field of fields) {
      if (seen.has(field)) {
        throw new ToonSchemaMismatchError(`Duplicate column "${field}"`, { line: header.lineNumber });
      }
      seen.add(field);
    }

    const schema = new ColumnSchema(fields);
    const rows: ToonValue[] = [];
    for (let line = this.nextAt(bodyDepth); line; line = this.nextAt(bodyDepth)) {
      if (rows.length === length) {
        throw new ToonSchemaMismatchError(`Table declares ${length} rows, found more`, {
          line: line.lineNumber,
          expected: length,
          actual: length + 1,
        });
      }
      const cells = splitDelimited(line.content, line.lineNumber);
      if (cells.length !== fields.length) {
        throw new ToonSchemaMismatchError(`Row has ${cells.length} cells, header declares ${fields.length}`, {
          line: line.lineNumber,
          expected: fields.length,
          actual: cells.length,
        });
      }
      const values = schema.convertRow(cells, line.lineNumber);
      rows.push(mapOf(new Map(fields.map((field, i) => [field, values[i]]))));
    }

    if (rows.length !== length) {
      throw new ToonSchemaMismatchError(`Table declares ${length} rows, found ${rows.length}`, {
        line: header.lineNumber,
        expected: length,
        actual: rows.length,
      });
    }
    return toonList(rows);
  }

  private decodeBulleted(length: number, bodyDepth: number, header: SourceLine): ToonValue {
    const items: ToonValue[] = [];
    for (let line = this.nextAt(bodyDepth); line; line = this.nextAt(bodyDepth)) {
      if (!isListItem(line.content)) {
        throw new ToonSyntaxError(`Expected a "- " list item, got: ${line.content}`, { line: line.lineNumber });
      }
      if (items.length === length) {
        throw new ToonSchemaMismatchError(`List declares ${length} items, found more`, {
          line: line.lineNumber,
          expected: length,
          actual: length + 1,
        });
      }
      items.push(this.decodeListItem(line, bodyDepth));
    }

    if (items.length !== length) {
      throw new ToonSchemaMismatchError(`List declares ${length} items, found ${items.length}`, {
        line: header.lineNumber,
        expected: length,
        actual: items.length,
      });
    }
    return toonList(items);
  }

  /**
   * One `- ` item at `depth`. A keyless array header keeps its body at
   * depth + 1; a field starts a map whose first value nests at depth + 2 and
   * whose other fields sit at depth + 1.
   */
  private decodeListItem(line: SourceLine, depth: number): ToonValue {
    const rest = line.content === LIST_ITEM_MARKER ? "" : line.content.slice(2).trim();
    if (rest === "") return mapOf(new Map());

    const head = parseLineHead(rest, line.lineNumber);
    if (head.kind === "text") return parseScalar(rest, line.lineNumber);
    if (head.kind === "list") return this.decodeArray(head.header, head.inline, depth + 1, line);

    this.checkDepth(depth + 1, line);
    const entries = new Map<string, ToonValue>();
    this.decodeField(entries, head, line, depth + 1);
    this.decodeEntries(entries, depth + 1);
    return mapOf(entries);
  }

  /** Next line if it sits at `depth`; a shallower one goes back to the source. */
  private nextAt(depth: number): SourceLine | undefined {
    const line = this.source.next();
    if (!line) return undefined;
    if (line.depth < depth) {
      this.source.pushback(line);
      return undefined;
    }
    this.checkLine(line, depth);
    return line;
  }

  private checkLine(line: SourceLine, depth: number): void {
    if (line.depth > depth) {
      throw new ToonSyntaxError(`Unexpected indentation (expected depth ${depth}, got ${line.depth})`, {
        line: line.lineNumber,
        column: line.indent + 1,
      });
    }
  }

  private checkDepth(depth: number, line: SourceLine): void {
    if (depth > this.maxDepth) {
      throw new ToonSyntaxError(`Maximum nesting depth exceeded (${this.maxDepth})`, { line: line.lineNumber });
    }
  }
}

export function decodeLines(lines: Iterable<string>, options: DecodeOptions = {}): ToonValue {
  return new Decoder(new LineSource(lines), options).decodeDocument();
}

export function decode(text: string, options: DecodeOptions = {}): ToonValue {
  return decodeLines(linesOf(text), options);
}
