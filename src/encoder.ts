/**
 * TOON encoder, adapted from @toon-format/toon v2.1.0
 * Original: https://github.com/toon-format/toon (MIT, Johann Schopplich)
 */

import { ToonEncodeError, ToonEncodingInvariantError } from "./errors.js";
import { COMMA, INLINE_SEPARATOR, formatKey, formatScalar } from "./grammar.js";
import { classifyList } from "./layout.js";
import type { LayoutOptions } from "./layout.js";
import { LIST_ITEM_MARKER, LIST_ITEM_PREFIX } from "./syntax.js";
import { isScalar } from "./value.js";
import type { ToonMap, ToonScalar, ToonValue } from "./value.js";

export interface EncodeOptions extends LayoutOptions {
  /** Spaces per nesting level (default 2) */
  indent?: number;
}

export const DEFAULT_INDENT = 2;

interface EncodeContext {
  readonly unit: number;
  readonly layout: LayoutOptions;
}

// --- Indentation ---

function ind(ctx: EncodeContext, depth: number, content: string): string {
  return " ".repeat(ctx.unit * depth) + content;
}

function indList(ctx: EncodeContext, depth: number, content: string): string {
  return ind(ctx, depth, LIST_ITEM_PREFIX + content);
}

// --- Headers ---

function formatHeader(length: number, opts?: { key?: string; fields?: readonly string[] }): string {
  let h = "";
  if (opts?.key !== undefined) h += formatKey(opts.key);
  h += `[${length}]`;
  if (opts?.fields) h += `{${opts.fields.map((f) => formatKey(f)).join(COMMA)}}`;
  h += ":";
  return h;
}

function inlineList(values: readonly ToonScalar[], key?: string): string {
  const header = formatHeader(values.length, key !== undefined ? { key } : undefined);
  return values.length === 0 ? header : `${header} ${values.map(formatScalar).join(INLINE_SEPARATOR)}`;
}

// --- Generators ---

function* encodeRootLines(value: ToonValue, ctx: EncodeContext): Generator<string> {
  if (isScalar(value)) {
    yield formatScalar(value);
  } else if (value.kind === "list") {
    yield* encodeListLines(undefined, value.items, 0, ctx);
  } else {
    yield* encodeMapLines(value, 0, ctx);
  }
}

function* encodeMapLines(map: ToonMap, depth: number, ctx: EncodeContext): Generator<string> {
  for (const [key, value] of map.entries) {
    yield* encodeFieldLines(key, value, depth, ctx);
  }
}

function* encodeFieldLines(key: string, value: ToonValue, depth: number, ctx: EncodeContext): Generator<string> {
  if (isScalar(value)) {
    yield ind(ctx, depth, `${formatKey(key)}: ${formatScalar(value)}`);
  } else if (value.kind === "list") {
    yield* encodeListLines(key, value.items, depth, ctx);
  } else {
    yield ind(ctx, depth, `${formatKey(key)}:`);
    yield* encodeMapLines(value, depth + 1, ctx);
  }
}

function* encodeListLines(
  key: string | undefined,
  items: ToonValue[],
  depth: number,
  ctx: EncodeContext,
): Generator<string> {
  const layout = classifyList(items, ctx.layout);
  switch (layout.kind) {
    case "inline":
      yield ind(ctx, depth, inlineList(layout.values, key));
      return;
    case "tabular":
      yield ind(ctx, depth, formatHeader(items.length, { key, fields: layout.fields }));
      yield* tableRowLines(layout.fields, items, depth + 1, ctx);
      return;
    case "bulleted":
      yield ind(ctx, depth, formatHeader(items.length, key !== undefined ? { key } : undefined));
      for (const item of items) {
        yield* encodeListItemLines(item, depth + 1, ctx);
      }
      return;
  }
}

function* tableRowLines(
  fields: readonly string[],
  rows: readonly ToonValue[],
  depth: number,
  ctx: EncodeContext,
): Generator<string> {
  for (const [index, row] of rows.entries()) {
    if (row.kind !== "map" || row.entries.size !== fields.length) {
      throw new ToonEncodingInvariantError(`Table row ${index} does not have the ${fields.length} header fields`);
    }
    const cells: string[] = [];
    for (const field of fields) {
      const cell = row.entries.get(field);
      if (cell === undefined || !isScalar(cell)) {
        throw new ToonEncodingInvariantError(`Table row ${index} has no scalar value for "${field}"`);
      }
      cells.push(formatScalar(cell));
    }
    yield ind(ctx, depth, cells.join(COMMA));
  }
}

/** Re-emit `lines` with the first one moved onto a `- ` marker at `depth`. */
function* asListItem(
  lines: Iterable<string>,
  depth: number,
  contentDepth: number,
  ctx: EncodeContext,
): Generator<string> {
  let first = true;
  for (const line of lines) {
    yield first ? indList(ctx, depth, line.slice(ctx.unit * contentDepth)) : line;
    first = false;
  }
}

function* encodeListItemLines(value: ToonValue, depth: number, ctx: EncodeContext): Generator<string> {
  if (isScalar(value)) {
    yield indList(ctx, depth, formatScalar(value));
  } else if (value.kind === "list") {
    yield* asListItem(encodeListLines(undefined, value.items, depth, ctx), depth, depth, ctx);
  } else {
    yield* encodeMapAsListItem(value, depth, ctx);
  }
}

// First field rides on the "- " line; the rest follow one level in
function* encodeMapAsListItem(map: ToonMap, depth: number, ctx: EncodeContext): Generator<string> {
  const entries = [...map.entries];
  if (entries.length === 0) {
    yield ind(ctx, depth, LIST_ITEM_MARKER);
    return;
  }
  const [[firstKey, firstValue], ...rest] = entries;
  yield* asListItem(encodeFieldLines(firstKey, firstValue, depth + 1, ctx), depth, depth + 1, ctx);
  for (const [key, value] of rest) {
    yield* encodeFieldLines(key, value, depth + 1, ctx);
  }
}

function contextOf(options: EncodeOptions): EncodeContext {
  const unit = options.indent ?? DEFAULT_INDENT;
  if (!Number.isInteger(unit) || unit < 1) {
    throw new ToonEncodeError(`Indent must be a positive integer, got ${unit}`);
  }
  return { unit, layout: { maxInlineLength: options.maxInlineLength } };
}

// --- Public API ---

/**
 * Yield the document one line at a time (no trailing newlines).
 */
export function* encodeLines(value: ToonValue, options: EncodeOptions = {}): Generator<string> {
  yield* encodeRootLines(value, contextOf(options));
}

/**
 * Write rows of a table whose header has already been emitted. Exported so
 * the row invariant can be exercised without going through classifyList.
 */
export function* encodeTableRows(
  fields: readonly string[],
  rows: readonly ToonValue[],
  depth: number,
  options: EncodeOptions = {},
): Generator<string> {
  yield* tableRowLines(fields, rows, depth, contextOf(options));
}

export function encode(value: ToonValue, options: EncodeOptions = {}): string {
  const lines: string[] = [];
  for (const line of encodeLines(value, options)) {
    lines.push(line);
  }
  return lines.join("\n");
}
