// --- Types ---

export interface ToonNull { readonly kind: "null"; }
export interface ToonBool { readonly kind: "bool"; readonly value: boolean; }
// Held as bigint so 64-bit (and wider) integers survive exactly
export interface ToonInt { readonly kind: "int"; readonly value: bigint; }
export interface ToonFloat { readonly kind: "float"; readonly value: number; }
export interface ToonString { readonly kind: "string"; readonly value: string; }
export interface ToonList { readonly kind: "list"; readonly items: ToonValue[]; }
// Insertion order of the Map is the emitted and parsed key order
export interface ToonMap { readonly kind: "map"; readonly entries: Map<string, ToonValue>; }

export type ToonScalar = ToonNull | ToonBool | ToonInt | ToonFloat | ToonString;
export type ToonValue = ToonScalar | ToonList | ToonMap;

// --- Constructors ---

const NULL: ToonNull = { kind: "null" };

export function toonNull(): ToonNull {
  return NULL;
}

export function toonBool(value: boolean): ToonBool {
  return { kind: "bool", value };
}

export function toonInt(value: bigint | number): ToonInt {
  return { kind: "int", value: typeof value === "bigint" ? value : BigInt(value) };
}

export function toonFloat(value: number): ToonFloat {
  return { kind: "float", value };
}

export function toonString(value: string): ToonString {
  return { kind: "string", value };
}

export function toonList(items: ToonValue[] = []): ToonList {
  return { kind: "list", items };
}

/**
 * Build a map from entry pairs or a record. Later duplicates of a key
 * overwrite the earlier value but keep its position.
 */
export function toonMap(
  entries: Iterable<readonly [string, ToonValue]> | Record<string, ToonValue> = [],
): ToonMap {
  const map = new Map<string, ToonValue>();
  const pairs = isPairIterable(entries) ? entries : Object.entries(entries);
  for (const [key, value] of pairs) map.set(key, value);
  return { kind: "map", entries: map };
}

function isPairIterable(
  value: Iterable<readonly [string, ToonValue]> | Record<string, ToonValue>,
): value is Iterable<readonly [string, ToonValue]> {
  return Symbol.iterator in value;
}

// --- Type guards ---

export function isScalar(value: ToonValue): value is ToonScalar {
  return value.kind !== "list" && value.kind !== "map";
}

// --- Equality ---

/**
 * Structural equality. Map key order counts, Int 1 differs from Float 1.0,
 * and floats compare with Object.is so -0.0 and NaN behave as literals do.
 */
export function valuesEqual(a: ToonValue, b: ToonValue): boolean {
  switch (a.kind) {
    case "null":
      return b.kind === "null";
    case "bool":
      return b.kind === "bool" && b.value === a.value;
    case "int":
      return b.kind === "int" && b.value === a.value;
    case "string":
      return b.kind === "string" && b.value === a.value;
    case "float":
      return b.kind === "float" && Object.is(a.value, b.value);
    case "list": {
      if (b.kind !== "list" || a.items.length !== b.items.length) return false;
      const others = b.items;
      return a.items.every((item, i) => valuesEqual(item, others[i]));
    }
    case "map": {
      if (b.kind !== "map" || a.entries.size !== b.entries.size) return false;
      const otherKeys = [...b.entries.keys()];
      let i = 0;
      for (const [key, value] of a.entries) {
        if (otherKeys[i] !== key) return false;
        const other = b.entries.get(key);
        if (other === undefined || !valuesEqual(value, other)) return false;
        i++;
      }
      return true;
    }
  }
}
