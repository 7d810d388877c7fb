import { z } from "zod";
import { DEFAULT_MAX_DEPTH } from "./decoder.js";
import type { DecodeOptions } from "./decoder.js";
import { DEFAULT_INDENT } from "./encoder.js";
import type { EncodeOptions } from "./encoder.js";

// --- Types ---

export interface CodecConfig {
  indent: number;
  /** undefined = no limit */
  maxInlineLength: number | undefined;
  maxDepth: number;
}

type Env = Record<string, string | undefined>;

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

// --- Loading ---

export function loadCodecConfig(env: Env = process.env): CodecConfig {
  const maxInline = parseSetting(env, "TOON_MAX_INLINE_LENGTH", nonNegativeInt, 0);
  return {
    indent: parseSetting(env, "TOON_INDENT", positiveInt, DEFAULT_INDENT),
    maxInlineLength: maxInline === 0 ? undefined : maxInline,
    maxDepth: parseSetting(env, "TOON_MAX_DEPTH", positiveInt, DEFAULT_MAX_DEPTH),
  };
}

function parseSetting(env: Env, name: string, schema: z.ZodType<number>, defaultValue: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return defaultValue;
  const parsed = schema.safeParse(raw.trim());
  if (parsed.success) return parsed.data;
  console.error(`Warning: ignoring ${name}=${raw} (${parsed.error.issues[0]?.message ?? "invalid"}), using ${defaultValue}`);
  return defaultValue;
}

// --- Views ---

export function encodeOptionsOf(config: CodecConfig): EncodeOptions {
  return { indent: config.indent, maxInlineLength: config.maxInlineLength };
}

export function decodeOptionsOf(config: CodecConfig): DecodeOptions {
  return { maxDepth: config.maxDepth };
}
