import { decodeOptionsOf, encodeOptionsOf } from "./config.js";
import type { CodecConfig } from "./config.js";
import { decode } from "./decoder.js";
import { encode } from "./encoder.js";
import { errorMessage, formatJson } from "./helpers.js";
import { fromNative } from "./native.js";

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

export interface EncodeJsonArgs {
  json: string;
  indent?: number;
}

export interface DecodeToonArgs {
  toon: string;
}

function textResult(text: string): ToolResult {
  return { content: [{ type: "text", text }] };
}

function errorResult(e: unknown): ToolResult {
  return { content: [{ type: "text", text: `Error: ${errorMessage(e)}` }], isError: true };
}

/** toon_encode: JSON text in, TOON text out. */
export function encodeJsonTool(args: EncodeJsonArgs, config: CodecConfig): ToolResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(args.json);
  } catch (e: unknown) {
    return errorResult(`Invalid JSON: ${errorMessage(e)}`);
  }
  try {
    const options = encodeOptionsOf(config);
    return textResult(encode(fromNative(parsed), { ...options, indent: args.indent ?? options.indent }));
  } catch (e: unknown) {
    return errorResult(e);
  }
}

/** toon_decode: TOON text in, JSON text out. */
export function decodeToonTool(args: DecodeToonArgs, config: CodecConfig): ToolResult {
  try {
    return textResult(formatJson(decode(args.toon, decodeOptionsOf(config))));
  } catch (e: unknown) {
    return errorResult(e);
  }
}
