import { describe, it, expect, vi, afterEach } from "vitest";
import { decodeOptionsOf, encodeOptionsOf, loadCodecConfig } from "./config.js";

describe("loadCodecConfig", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns defaults when no env vars set", () => {
    expect(loadCodecConfig({})).toEqual({ indent: 2, maxInlineLength: undefined, maxDepth: 256 });
  });

  it("reads custom values from env", () => {
    const config = loadCodecConfig({ TOON_INDENT: "4", TOON_MAX_INLINE_LENGTH: "80", TOON_MAX_DEPTH: " 32 " });
    expect(config).toEqual({ indent: 4, maxInlineLength: 80, maxDepth: 32 });
  });

  it("treats a max inline length of 0 as unlimited", () => {
    expect(loadCodecConfig({ TOON_MAX_INLINE_LENGTH: "0" }).maxInlineLength).toBeUndefined();
  });

  it("treats empty values as unset", () => {
    expect(loadCodecConfig({ TOON_INDENT: "" }).indent).toBe(2);
  });

  it("falls back to defaults for invalid values, with a warning", () => {
    const warn = vi.spyOn(console, "error").mockImplementation(() => {});
    const config = loadCodecConfig({ TOON_INDENT: "abc", TOON_MAX_DEPTH: "-1", TOON_MAX_INLINE_LENGTH: "2.5" });

    expect(config).toEqual({ indent: 2, maxInlineLength: undefined, maxDepth: 256 });
    expect(warn).toHaveBeenCalledTimes(3);
    expect(warn).toHaveBeenCalledWith(expect.stringContaining("Warning: ignoring TOON_INDENT=abc"));
    expect(warn).toHaveBeenCalledWith(expect.stringContaining("Warning: ignoring TOON_MAX_DEPTH=-1"));
  });

  it("rejects a zero indent", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    expect(loadCodecConfig({ TOON_INDENT: "0" }).indent).toBe(2);
  });
});

describe("option views", () => {
  it("splits the config into encode and decode options", () => {
    const config = { indent: 3, maxInlineLength: 40, maxDepth: 10 };
    expect(encodeOptionsOf(config)).toEqual({ indent: 3, maxInlineLength: 40 });
    expect(decodeOptionsOf(config)).toEqual({ maxDepth: 10 });
  });
});
