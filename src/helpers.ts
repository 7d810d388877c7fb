import { ToonError } from "./errors.js";
import type { ToonValue } from "./value.js";

/**
 * Safely extract a message string from an unknown error value.
 * Codec errors keep their class name and location.
 */
export function errorMessage(e: unknown): string {
  if (e instanceof ToonError) return e.toString();
  if (e instanceof Error) return e.message;
  if (typeof e === "string") return e;
  return String(e);
}

/**
 * Format a value tree as JSON, laid out like JSON.stringify(value, null, indent).
 * Ints are written from their bigint digits, so none loses precision.
 */
export function formatJson(value: ToonValue, indent = 2, depth = 0): string {
  const pad = " ".repeat(indent * (depth + 1));
  const close = " ".repeat(indent * depth);
  switch (value.kind) {
    case "null":
      return "null";
    case "bool":
      return value.value ? "true" : "false";
    case "int":
      return value.value.toString();
    case "float":
      return JSON.stringify(value.value);
    case "string":
      return JSON.stringify(value.value);
    case "list": {
      if (value.items.length === 0) return "[]";
      const items = value.items.map((item) => pad + formatJson(item, indent, depth + 1));
      return `[\n${items.join(",\n")}\n${close}]`;
    }
    case "map": {
      if (value.entries.size === 0) return "{}";
      const fields = [...value.entries].map(
        ([key, item]) => `${pad}${JSON.stringify(key)}: ${formatJson(item, indent, depth + 1)}`,
      );
      return `{\n${fields.join(",\n")}\n${close}}`;
    }
  }
}
