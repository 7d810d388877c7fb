/**
 * Adaptive column typing for tabular arrays.
 *
 * Phase 1 fixes one converter tag per column from the first row; phase 2
 * runs every later cell through its column's converter. A column whose
 * first cell is `null` stays open until its first non-null cell fixes it.
 * The encoder checks its columns with the same rules, so any table it
 * writes decodes back cell for cell.
 */

import { ToonTypeError } from "./errors.js";
import {
  FALSE_LITERAL,
  FLOAT_PATTERN,
  INT_PATTERN,
  NULL_LITERAL,
  TRUE_LITERAL,
  classifyBare,
  isQuoted,
  parseQuoted,
} from "./grammar.js";
import { toonBool, toonFloat, toonInt, toonNull, toonString } from "./value.js";
import type { ToonScalar } from "./value.js";

export type ColumnKind = "int" | "float" | "bool" | "string";

type Converter = (token: string, line?: number) => ToonScalar | undefined;

const convertInt: Converter = (token) => {
  if (token === NULL_LITERAL) return toonNull();
  return INT_PATTERN.test(token) ? toonInt(BigInt(token)) : undefined;
};

// An int-shaped cell in a float column reads as a float
const convertFloat: Converter = (token) => {
  if (token === NULL_LITERAL) return toonNull();
  return INT_PATTERN.test(token) || FLOAT_PATTERN.test(token) ? toonFloat(Number(token)) : undefined;
};

const convertBool: Converter = (token) => {
  if (token === TRUE_LITERAL) return toonBool(true);
  if (token === FALSE_LITERAL) return toonBool(false);
  if (token === NULL_LITERAL) return toonNull();
  return undefined;
};

const convertString: Converter = (token, line) => {
  if (isQuoted(token)) return toonString(parseQuoted(token, line));
  if (token === NULL_LITERAL) return toonNull();
  return classifyBare(token) === "string" ? toonString(token) : undefined;
};

const CONVERTERS: Record<ColumnKind, Converter> = {
  int: convertInt,
  float: convertFloat,
  bool: convertBool,
  string: convertString,
};

/** Whether a column fixed as `column` takes a cell value of kind `cell`. */
export function acceptsKind(column: ColumnKind, cell: ColumnKind): boolean {
  return column === cell;
}

/** Kind of a raw cell token; undefined for a bare `null`, which fits any column. */
export function kindOfToken(token: string): ColumnKind | undefined {
  if (isQuoted(token)) return "string";
  const kind = classifyBare(token);
  return kind === "null" ? undefined : kind;
}

function kindOfScalar(value: ToonScalar): ColumnKind | undefined {
  return value.kind === "null" ? undefined : value.kind;
}

/** Encoder-side check: would these cells, in order, decode under one column? */
export function isConsistentColumn(cells: Iterable<ToonScalar>): boolean {
  let fixed: ColumnKind | undefined;
  for (const cell of cells) {
    const kind = kindOfScalar(cell);
    if (kind === undefined) continue;
    if (fixed === undefined) fixed = kind;
    else if (!acceptsKind(fixed, kind)) return false;
  }
  return true;
}

export class ColumnSchema {
  private readonly kinds: (ColumnKind | undefined)[];

  constructor(readonly fields: readonly string[]) {
    this.kinds = fields.map(() => undefined);
  }

  /** Converter tag per column; undefined while a column has only seen nulls. */
  get columnKinds(): readonly (ColumnKind | undefined)[] {
    return this.kinds;
  }

  /** Convert one row of raw tokens. The caller checks the cell count. */
  convertRow(tokens: readonly string[], line?: number): ToonScalar[] {
    return tokens.map((token, index) => this.convertCell(index, token, line));
  }

  private convertCell(index: number, token: string, line?: number): ToonScalar {
    let kind = this.kinds[index];
    if (kind === undefined) {
      kind = kindOfToken(token);
      if (kind === undefined) return toonNull();
      this.kinds[index] = kind;
    }
    const value = CONVERTERS[kind](token, line);
    if (value === undefined) {
      const field = this.fields[index];
      throw new ToonTypeError(`Column "${field}" holds ${kind} values, got ${token}`, {
        line,
        columnName: field,
        expectedKind: kind,
      });
    }
    return value;
  }
}
