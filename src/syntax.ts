/**
 * Line-shape recognition: what a single line says before the decoder decides
 * what to do with what follows it.
 */

import { ToonSyntaxError } from "./errors.js";
import { isQuoted, parseKey, readQuoted, splitDelimited } from "./grammar.js";

export const LIST_ITEM_PREFIX = "- ";
export const LIST_ITEM_MARKER = "-";

export interface ArrayHeader {
  /** Declared element count */
  length: number;
  /** Column names, present only on a tabular header */
  fields?: string[];
}

/** `key: value`, or `key:` with an empty value when a nested block follows */
export interface FieldHead {
  kind: "field";
  key: string;
  value: string;
}

/** `key[n]...` */
export interface ArrayHead {
  kind: "array";
  key: string;
  header: ArrayHeader;
  /** Inline values after the colon, "" when the body is on following lines */
  inline: string;
}

/** `[n]...` without a key */
export interface ListHead {
  kind: "list";
  header: ArrayHeader;
  inline: string;
}

export interface TextHead {
  kind: "text";
}

export type LineHead = FieldHead | ArrayHead | ListHead | TextHead;

const TEXT: TextHead = { kind: "text" };
const KEY_END = /[[:]/;
const NOT_IN_BARE_KEY = /[",{}\]]/;
const COUNT = /^\d+$/;

export function isListItem(content: string): boolean {
  return content === LIST_ITEM_MARKER || content.startsWith(LIST_ITEM_PREFIX);
}

/**
 * Classify a line's content (indentation already removed).
 *
 * A key is only recognised when its colon is followed by a space or ends the
 * line, so `10:00` and `http://host` stay text.
 */
export function parseLineHead(content: string, line?: number): LineHead {
  if (content.startsWith("[")) {
    const body = parseArrayBody(content, 0, line);
    return body ? { kind: "list", ...body } : TEXT;
  }

  const key = readKey(content, line);
  if (!key) return TEXT;

  if (content[key.end] === "[") {
    const body = parseArrayBody(content, key.end, line);
    if (!body) throw new ToonSyntaxError(`Malformed array header: ${content}`, { line });
    return { kind: "array", key: key.name, ...body };
  }
  if (content[key.end] !== ":") return TEXT;
  const after = content[key.end + 1];
  if (after !== undefined && after !== " ") return TEXT;

  const value = content.slice(key.end + 1).trim();
  if (value === "[]") return { kind: "array", key: key.name, header: { length: 0 }, inline: "" };
  if (value.startsWith("[")) {
    // `ports: [2]: 80, 443`
    const body = parseArrayBody(value, 0, line);
    if (body) return { kind: "array", key: key.name, ...body };
  }
  return { kind: "field", key: key.name, value };
}

function readKey(content: string, line?: number): { name: string; end: number } | undefined {
  if (isQuoted(content)) {
    const quoted = readQuoted(content, 0, line);
    return { name: quoted.value, end: quoted.end };
  }
  const end = content.search(KEY_END);
  if (end <= 0) return undefined;
  const name = content.slice(0, end).trim();
  if (name === "" || NOT_IN_BARE_KEY.test(name)) return undefined;
  return { name, end };
}

/**
 * Parse `[n]`, `[n]{a,b}` and what follows, starting at the `[`.
 * Returns undefined when the brackets do not hold a count.
 */
function parseArrayBody(
  text: string,
  start: number,
  line?: number,
): { header: ArrayHeader; inline: string } | undefined {
  const close = text.indexOf("]", start);
  if (close === -1) return undefined;
  const count = text.slice(start + 1, close);
  if (!COUNT.test(count)) return undefined;
  const header: ArrayHeader = { length: Number(count) };

  let pos = close + 1;
  if (text[pos] === "{") {
    const end = findClosingBrace(text, pos, line);
    const inner = text.slice(pos + 1, end);
    header.fields = inner.trim() === "" ? [] : splitDelimited(inner, line).map((f) => parseKey(f, line));
    pos = end + 1;
  }

  if (text[pos] !== ":") {
    // a tabular header may drop its colon: `[2]{id,name}`
    if (header.fields && text.slice(pos).trim() === "") return { header, inline: "" };
    throw new ToonSyntaxError(`Expected ':' after array header: ${text}`, { line });
  }
  const inline = text.slice(pos + 1).trim();
  if (header.fields && inline !== "") {
    throw new ToonSyntaxError(`Unexpected values after tabular header: ${inline}`, { line });
  }
  return { header, inline };
}

function findClosingBrace(text: string, open: number, line?: number): number {
  let inQuotes = false;
  for (let i = open + 1; i < text.length; i++) {
    const c = text[i];
    if (inQuotes) {
      if (c === "\\") i++;
      else if (c === '"') inQuotes = false;
    } else if (c === '"') {
      inQuotes = true;
    } else if (c === "}") {
      return i;
    }
  }
  throw new ToonSyntaxError("Unterminated column list", { line });
}
