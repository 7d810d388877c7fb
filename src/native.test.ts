import { describe, it, expect } from "vitest";
import { dumps, fromNative, loads, toNative } from "./native.js";
import { toonBool, toonFloat, toonInt, toonList, toonMap, toonNull, toonString } from "./value.js";

describe("fromNative", () => {
  it("maps integral numbers to ints and the rest to floats", () => {
    expect(fromNative(3)).toEqual(toonInt(3));
    expect(fromNative(3.5)).toEqual(toonFloat(3.5));
    expect(fromNative(10n ** 20n)).toEqual(toonInt(100000000000000000000n));
  });

  it("normalizes -0 to 0", () => {
    expect(fromNative(-0)).toEqual(toonInt(0));
  });

  it("maps values without a literal to null", () => {
    expect(fromNative(undefined)).toEqual(toonNull());
    expect(fromNative(Number.NaN)).toEqual(toonNull());
    expect(fromNative(Number.POSITIVE_INFINITY)).toEqual(toonNull());
    expect(fromNative(() => 1)).toEqual(toonNull());
  });

  it("writes dates as ISO strings", () => {
    expect(fromNative(new Date("2024-01-02T03:04:05.000Z"))).toEqual(toonString("2024-01-02T03:04:05.000Z"));
  });

  it("converts arrays, objects and Map instances", () => {
    const value = fromNative({ tags: ["a", true], meta: new Map([["k", null]]) });
    expect(value).toEqual(
      toonMap({
        tags: toonList([toonString("a"), toonBool(true)]),
        meta: toonMap({ k: toonNull() }),
      }),
    );
  });
});

describe("toNative", () => {
  it("returns numbers for safe ints and bigint beyond", () => {
    expect(toNative(toonInt(42))).toBe(42);
    expect(toNative(toonInt(9007199254740993n))).toBe(9007199254740993n);
    expect(toNative(toonInt(-9007199254740991n))).toBe(-9007199254740991);
  });

  it("converts containers", () => {
    expect(toNative(toonMap({ a: toonList([toonFloat(1.5), toonNull()]) }))).toEqual({ a: [1.5, null] });
  });

  it("keeps a __proto__ key as a plain property", () => {
    const native = toNative(toonMap({ ["__proto__"]: toonInt(1) }));
    expect(Object.keys(native ?? {})).toEqual(["__proto__"]);
  });
});

describe("dumps / loads", () => {
  it("encodes plain objects", () => {
    const data = {
      users: [
        { id: 1, name: "Alice", role: "admin" },
        { id: 2, name: "Bob", role: "user" },
      ],
    };
    expect(dumps(data)).toBe("users[2]{id,name,role}:\n  1,Alice,admin\n  2,Bob,user");
  });

  it("decodes to plain objects", () => {
    expect(loads("users[2]{id,name}:\n  1,Alice\n  2,Bob\ncount: 2")).toEqual({
      users: [
        { id: 1, name: "Alice" },
        { id: 2, name: "Bob" },
      ],
      count: 2,
    });
  });

  it("passes options through", () => {
    expect(dumps({ a: { b: 1 } }, { indent: 4 })).toBe("a:\n    b: 1");
    expect(() => loads("a:\n  b:\n    c: 1", { maxDepth: 1 })).toThrow("Maximum nesting depth exceeded (1)");
  });
});
