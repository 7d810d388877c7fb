import { isConsistentColumn } from "./columns.js";
import { INLINE_SEPARATOR, formatScalar } from "./grammar.js";
import { isScalar } from "./value.js";
import type { ToonScalar, ToonValue } from "./value.js";

export interface LayoutOptions {
  /** Longest joined inline scalar list; longer lists are bulleted (default unlimited) */
  maxInlineLength?: number;
}

export type ListLayout =
  | { kind: "tabular"; fields: string[] }
  | { kind: "inline"; values: ToonScalar[] }
  | { kind: "bulleted" };

/**
 * Decide how a list is written: tabular, then inline scalars, then bulleted.
 * Pure; recomputed on every encode.
 */
export function classifyList(items: ToonValue[], options: LayoutOptions = {}): ListLayout {
  const fields = tabularFields(items);
  if (fields) return { kind: "tabular", fields };
  if (items.every(isScalar) && fitsInline(items, options.maxInlineLength)) {
    return { kind: "inline", values: items };
  }
  return { kind: "bulleted" };
}

/**
 * The shared column list when every item is a map with the same ordered,
 * non-empty keys, every cell is a scalar, and each column decodes under one
 * converter. Otherwise undefined.
 */
export function tabularFields(items: readonly ToonValue[]): string[] | undefined {
  const first = items[0];
  if (first === undefined || first.kind !== "map" || first.entries.size === 0) return undefined;
  const fields = [...first.entries.keys()];
  const columns: ToonScalar[][] = fields.map(() => []);

  for (const item of items) {
    if (item.kind !== "map" || item.entries.size !== fields.length) return undefined;
    let i = 0;
    for (const [key, value] of item.entries) {
      if (key !== fields[i] || !isScalar(value)) return undefined;
      columns[i].push(value);
      i++;
    }
  }

  return columns.every((cells) => isConsistentColumn(cells)) ? fields : undefined;
}

function fitsInline(values: readonly ToonScalar[], maxLength: number | undefined): boolean {
  if (maxLength === undefined) return true;
  return values.map(formatScalar).join(INLINE_SEPARATOR).length <= maxLength;
}
