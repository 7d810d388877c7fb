import { describe, it, expect } from "vitest";
import { ToonSyntaxError, ToonTypeError } from "./errors.js";
import { errorMessage, formatJson } from "./helpers.js";
import { toonBool, toonFloat, toonInt, toonList, toonMap, toonNull, toonString } from "./value.js";

describe("errorMessage", () => {
  it("extracts message from Error", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
  });

  it("returns string errors as-is", () => {
    expect(errorMessage("oops")).toBe("oops");
  });

  it("stringifies other values", () => {
    expect(errorMessage(42)).toBe("42");
  });

  it("keeps the class name and location of codec errors", () => {
    expect(errorMessage(new ToonSyntaxError("Unterminated string", { line: 3, column: 7 }))).toBe(
      "ToonSyntaxError: Unterminated string (line 3, column 7)",
    );
    expect(errorMessage(new ToonTypeError("bad cell", { line: 2 }))).toBe("ToonTypeError: bad cell (line 2)");
  });
});

describe("formatJson", () => {
  it("writes scalars", () => {
    expect(formatJson(toonNull())).toBe("null");
    expect(formatJson(toonBool(true))).toBe("true");
    expect(formatJson(toonFloat(2.5))).toBe("2.5");
    expect(formatJson(toonString('a "b"'))).toBe('"a \\"b\\""');
  });

  it("writes ints from their digits", () => {
    expect(formatJson(toonInt(12345678901234567890n))).toBe("12345678901234567890");
  });

  it("lays out containers like JSON.stringify", () => {
    const value = toonMap({ a: toonList([toonInt(1), toonString("x")]), b: toonMap(), c: toonList() });
    expect(formatJson(value)).toBe(JSON.stringify({ a: [1, "x"], b: {}, c: [] }, null, 2));
  });

  it("honours the indent width", () => {
    expect(formatJson(toonMap({ a: toonMap({ b: toonNull() }) }), 4)).toBe('{\n    "a": {\n        "b": null\n    }\n}');
  });
});
