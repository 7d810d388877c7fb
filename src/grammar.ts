/**
 * Scalar lexical grammar shared by the encoder and the decoder.
 * Whatever formatScalar writes, parseScalar must read back as the same value.
 *
 * Formatting helpers adapted from @toon-format/toon v2.1.0
 * Original: https://github.com/toon-format/toon (MIT, Johann Schopplich)
 */

import { ToonEncodeError, ToonSyntaxError } from "./errors.js";
import { toonBool, toonFloat, toonInt, toonNull, toonString } from "./value.js";
import type { ToonScalar } from "./value.js";

// --- Constants ---

export const COMMA = ",";
export const INLINE_SEPARATOR = ", ";
export const NULL_LITERAL = "null";
export const TRUE_LITERAL = "true";
export const FALSE_LITERAL = "false";
const QUOTE = '"';
const BACKSLASH = "\\";

export const INT_PATTERN = /^-?(?:0|[1-9]\d*)$/;
export const FLOAT_PATTERN = /^-?\d+\.\d+(?:[eE][+-]?\d+)?$/;

// Wider than INT/FLOAT: "1e5" and "007" decode as strings, but are still quoted
const NUMBER_LIKE = /^-?\d+(?:\.\d+)?(?:e[+-]?\d+)?$/i;
const LEADING_ZERO = /^-?0\d+/;
const RESERVED = /[,:{}[\]"\\]/;
const CONTROL = /[\n\r\t]/;
const UNQUOTED_KEY = /^[A-Z_][\w.]*$/i;

// --- Formatting ---

export function escapeString(value: string): string {
  return value
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n/g, "\\n")
    .replace(/\r/g, "\\r")
    .replace(/\t/g, "\\t");
}

export function isBooleanOrNullLiteral(token: string): boolean {
  return token === TRUE_LITERAL || token === FALSE_LITERAL || token === NULL_LITERAL;
}

/** True when a string written bare would not read back as the same string. */
export function needsQuotes(value: string): boolean {
  if (value === "" || value !== value.trim()) return true;
  if (isBooleanOrNullLiteral(value)) return true;
  if (NUMBER_LIKE.test(value) || LEADING_ZERO.test(value)) return true;
  if (RESERVED.test(value) || CONTROL.test(value)) return true;
  return value.startsWith("-");
}

export function formatString(value: string): string {
  return needsQuotes(value) ? `${QUOTE}${escapeString(value)}${QUOTE}` : value;
}

export function formatKey(key: string): string {
  return UNQUOTED_KEY.test(key) ? key : `${QUOTE}${escapeString(key)}${QUOTE}`;
}

/**
 * Shortest round-trippable decimal, always in float shape so it never reads back as an int.
 */
export function formatFloat(value: number): string {
  if (!Number.isFinite(value)) {
    throw new ToonEncodeError(`Cannot encode non-finite float ${value}`);
  }
  if (Object.is(value, -0)) return "-0.0";
  const text = String(value);
  const e = text.indexOf("e");
  if (e === -1) return text.includes(".") ? text : `${text}.0`;
  const mantissa = text.slice(0, e);
  const exponent = text.slice(e + 1).replace(/^\+/, "");
  return `${mantissa.includes(".") ? mantissa : `${mantissa}.0`}e${exponent}`;
}

export function formatScalar(value: ToonScalar): string {
  switch (value.kind) {
    case "null":
      return NULL_LITERAL;
    case "bool":
      return value.value ? TRUE_LITERAL : FALSE_LITERAL;
    case "int":
      return value.value.toString();
    case "float":
      return formatFloat(value.value);
    case "string":
      return formatString(value.value);
  }
}

// --- Parsing ---

export interface QuotedToken {
  value: string;
  /** Index just past the closing quote */
  end: number;
}

/** Read a double-quoted string starting at `start`, undoing escapes. */
export function readQuoted(text: string, start: number, line?: number): QuotedToken {
  let value = "";
  for (let i = start + 1; i < text.length; i++) {
    const c = text[i];
    if (c === QUOTE) return { value, end: i + 1 };
    if (c !== BACKSLASH) {
      value += c;
      continue;
    }
    i++;
    const next = text[i];
    if (next === QUOTE) value += QUOTE;
    else if (next === BACKSLASH) value += BACKSLASH;
    else if (next === "n") value += "\n";
    else if (next === "r") value += "\r";
    else if (next === "t") value += "\t";
    else if (next === undefined) break;
    else throw new ToonSyntaxError(`Invalid escape sequence \\${next}`, { line });
  }
  throw new ToonSyntaxError("Unterminated string", { line });
}

export type BareKind = "null" | "bool" | "int" | "float" | "string";

export function classifyBare(token: string): BareKind {
  if (token === NULL_LITERAL) return "null";
  if (token === TRUE_LITERAL || token === FALSE_LITERAL) return "bool";
  if (INT_PATTERN.test(token)) return "int";
  if (FLOAT_PATTERN.test(token)) return "float";
  return "string";
}

export function parseBare(token: string): ToonScalar {
  switch (classifyBare(token)) {
    case "null":
      return toonNull();
    case "bool":
      return toonBool(token === TRUE_LITERAL);
    case "int":
      return toonInt(BigInt(token));
    case "float":
      return toonFloat(Number(token));
    case "string":
      return toonString(token);
  }
}

/** Parse one complete quoted token; anything after the closing quote is an error. */
export function parseQuoted(token: string, line?: number): string {
  const quoted = readQuoted(token, 0, line);
  if (quoted.end !== token.length) {
    throw new ToonSyntaxError(`Unexpected text after closing quote: ${token.slice(quoted.end)}`, { line });
  }
  return quoted.value;
}

export function isQuoted(token: string): boolean {
  return token.startsWith(QUOTE);
}

export function parseScalar(raw: string, line?: number): ToonScalar {
  const token = raw.trim();
  return isQuoted(token) ? toonString(parseQuoted(token, line)) : parseBare(token);
}

export function parseKey(raw: string, line?: number): string {
  const token = raw.trim();
  if (isQuoted(token)) return parseQuoted(token, line);
  if (token === "") throw new ToonSyntaxError("Empty key", { line });
  return token;
}

/**
 * Split on commas outside quotes. Cells come back trimmed and still quoted.
 */
export function splitDelimited(text: string, line?: number): string[] {
  const cells: string[] = [];
  let start = 0;
  let inQuotes = false;
  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    if (inQuotes) {
      if (c === BACKSLASH) i++;
      else if (c === QUOTE) inQuotes = false;
    } else if (c === QUOTE) {
      inQuotes = true;
    } else if (c === COMMA) {
      cells.push(text.slice(start, i).trim());
      start = i + 1;
    }
  }
  if (inQuotes) throw new ToonSyntaxError("Unterminated string", { line });
  cells.push(text.slice(start).trim());
  return cells;
}
