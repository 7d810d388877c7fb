/**
 * Bridge between plain JavaScript values and the TOON value model.
 */

import { decode } from "./decoder.js";
import type { DecodeOptions } from "./decoder.js";
import { encode } from "./encoder.js";
import type { EncodeOptions } from "./encoder.js";
import { toonBool, toonFloat, toonInt, toonList, toonMap, toonNull, toonString } from "./value.js";
import type { ToonValue } from "./value.js";

export type NativePrimitive = string | number | bigint | boolean | null;
// Interfaces allow recursive references (type aliases don't)
export interface NativeArray extends Array<NativeValue> {}
export interface NativeObject { [key: string]: NativeValue; }
export type NativeValue = NativePrimitive | NativeArray | NativeObject;

const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);
const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);

/**
 * Normalize any JavaScript value into a ToonValue.
 *
 * Integral numbers become Int and the rest Float; NaN, Infinity, undefined,
 * functions and symbols become Null. A Date becomes its ISO string. Map
 * instances keep their insertion order; plain objects use Object.entries.
 */
export function fromNative(value: unknown): ToonValue {
  if (value === null || value === undefined) return toonNull();
  if (typeof value === "string") return toonString(value);
  if (typeof value === "boolean") return toonBool(value);
  if (typeof value === "bigint") return toonInt(value);
  if (typeof value === "number") {
    if (!Number.isFinite(value)) return toonNull();
    if (Object.is(value, -0)) return toonInt(0);
    return Number.isInteger(value) ? toonInt(value) : toonFloat(value);
  }
  if (value instanceof Date) return toonString(value.toISOString());
  if (Array.isArray(value)) return toonList(value.map(fromNative));
  if (value instanceof Map) {
    const entries: [string, ToonValue][] = [];
    for (const [key, item] of value) entries.push([String(key), fromNative(item)]);
    return toonMap(entries);
  }
  if (typeof value === "object") {
    return toonMap(Object.entries(value).map(([key, item]): [string, ToonValue] => [key, fromNative(item)]));
  }
  return toonNull();
}

/**
 * Convert a ToonValue into plain JavaScript. Ints outside the safe integer
 * range come back as bigint.
 */
export function toNative(value: ToonValue): NativeValue {
  switch (value.kind) {
    case "null":
      return null;
    case "bool":
    case "float":
    case "string":
      return value.value;
    case "int":
      return value.value >= MIN_SAFE && value.value <= MAX_SAFE ? Number(value.value) : value.value;
    case "list":
      return value.items.map(toNative);
    case "map":
      // fromEntries defines own properties, so a "__proto__" key stays a key
      return Object.fromEntries([...value.entries].map(([key, item]): [string, NativeValue] => [key, toNative(item)]));
  }
}

/** Encode a plain JavaScript value straight to TOON text. */
export function dumps(value: unknown, options: EncodeOptions = {}): string {
  return encode(fromNative(value), options);
}

/** Decode TOON text straight to plain JavaScript. */
export function loads(text: string, options: DecodeOptions = {}): NativeValue {
  return toNative(decode(text, options));
}
