/**
 * TOON (Token-Oriented Object Notation) codec.
 *
 * encode/decode work on the ToonValue model; dumps/loads on plain
 * JavaScript values.
 */

export { encode, encodeLines, encodeTableRows, DEFAULT_INDENT } from "./encoder.js";
export type { EncodeOptions } from "./encoder.js";
export { decode, decodeLines, Decoder, DEFAULT_MAX_DEPTH } from "./decoder.js";
export type { DecodeOptions } from "./decoder.js";
export { classifyList, tabularFields } from "./layout.js";
export type { LayoutOptions, ListLayout } from "./layout.js";
export { ColumnSchema } from "./columns.js";
export type { ColumnKind } from "./columns.js";
export { LineSource, linesOf, linesOfChunks } from "./line-source.js";
export type { SourceLine } from "./line-source.js";
export { dumps, loads, fromNative, toNative } from "./native.js";
export type { NativeValue } from "./native.js";
export {
  ToonError,
  ToonSyntaxError,
  ToonSchemaMismatchError,
  ToonTypeError,
  ToonEncodingInvariantError,
  ToonEncodeError,
} from "./errors.js";
export {
  toonNull,
  toonBool,
  toonInt,
  toonFloat,
  toonString,
  toonList,
  toonMap,
  isScalar,
  valuesEqual,
} from "./value.js";
export type {
  ToonValue,
  ToonScalar,
  ToonNull,
  ToonBool,
  ToonInt,
  ToonFloat,
  ToonString,
  ToonList,
  ToonMap,
} from "./value.js";
