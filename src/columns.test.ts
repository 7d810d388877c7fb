import { describe, it, expect } from "vitest";
import { ColumnSchema, acceptsKind, isConsistentColumn, kindOfToken } from "./columns.js";
import { ToonTypeError } from "./errors.js";
import { toonBool, toonFloat, toonInt, toonNull, toonString } from "./value.js";

describe("kindOfToken", () => {
  it("classifies raw cells", () => {
    expect(kindOfToken("1")).toBe("int");
    expect(kindOfToken("1.5")).toBe("float");
    expect(kindOfToken("false")).toBe("bool");
    expect(kindOfToken("Ada")).toBe("string");
    expect(kindOfToken('"1"')).toBe("string");
    expect(kindOfToken("null")).toBeUndefined();
  });
});

describe("acceptsKind", () => {
  it("takes only the kind the column was fixed with", () => {
    expect(acceptsKind("int", "int")).toBe(true);
    expect(acceptsKind("int", "float")).toBe(false);
    expect(acceptsKind("float", "int")).toBe(false);
    expect(acceptsKind("int", "string")).toBe(false);
    expect(acceptsKind("string", "bool")).toBe(false);
  });
});

describe("ColumnSchema", () => {
  it("fixes each column from the first row", () => {
    const schema = new ColumnSchema(["id", "name", "active"]);
    expect(schema.convertRow(["1", "Ada", "true"])).toEqual([toonInt(1), toonString("Ada"), toonBool(true)]);
    expect(schema.columnKinds).toEqual(["int", "string", "bool"]);
    expect(schema.convertRow(["2", "Bob", "false"])).toEqual([toonInt(2), toonString("Bob"), toonBool(false)]);
  });

  it("reads int-shaped cells in a float column as floats", () => {
    const schema = new ColumnSchema(["score"]);
    expect(schema.convertRow(["1.5"])).toEqual([toonFloat(1.5)]);
    expect(schema.convertRow(["3"])).toEqual([toonFloat(3)]);
    expect(schema.convertRow(["-2"])).toEqual([toonFloat(-2)]);
  });

  it("rejects a float in an int column", () => {
    const schema = new ColumnSchema(["count"]);
    schema.convertRow(["1"]);
    expect(() => schema.convertRow(["2.5"], 3)).toThrow('Column "count" holds int values, got 2.5');
  });

  it("accepts null in any column", () => {
    const schema = new ColumnSchema(["id", "name"]);
    schema.convertRow(["1", "Ada"]);
    expect(schema.convertRow(["null", "null"])).toEqual([toonNull(), toonNull()]);
  });

  it("leaves a column open until its first non-null cell", () => {
    const schema = new ColumnSchema(["note"]);
    expect(schema.convertRow(["null"])).toEqual([toonNull()]);
    expect(schema.columnKinds).toEqual([undefined]);
    expect(schema.convertRow(["hello"])).toEqual([toonString("hello")]);
    expect(schema.columnKinds).toEqual(["string"]);
  });

  it("reads quoted cells in string columns", () => {
    const schema = new ColumnSchema(["name"]);
    schema.convertRow(["Ada"]);
    expect(schema.convertRow(['"42"'])).toEqual([toonString("42")]);
    expect(schema.convertRow(['"Smith, J"'])).toEqual([toonString("Smith, J")]);
  });

  it("rejects a cell the column converter cannot read", () => {
    const schema = new ColumnSchema(["id", "name", "active"]);
    schema.convertRow(["1", "Ada", "true"]);
    try {
      schema.convertRow(["x", "Bob", "false"], 4);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ToonTypeError);
      expect(e).toMatchObject({
        message: 'Column "id" holds int values, got x',
        line: 4,
        columnName: "id",
        expectedKind: "int",
      });
    }
  });

  it("rejects a bare number in a string column", () => {
    const schema = new ColumnSchema(["code"]);
    schema.convertRow(["abc"]);
    expect(() => schema.convertRow(["42"])).toThrow(ToonTypeError);
  });

  it("rejects a quoted cell in a bool column", () => {
    const schema = new ColumnSchema(["ok"]);
    schema.convertRow(["true"]);
    expect(() => schema.convertRow(['"true"'])).toThrow('Column "ok" holds bool values, got "true"');
  });
});

describe("isConsistentColumn", () => {
  it("accepts one kind with nulls anywhere", () => {
    expect(isConsistentColumn([toonNull(), toonString("a"), toonNull(), toonString("b")])).toBe(true);
    expect(isConsistentColumn([toonFloat(0.5), toonNull(), toonFloat(2.5)])).toBe(true);
  });

  it("rejects mixed kinds", () => {
    expect(isConsistentColumn([toonInt(1), toonString("a")])).toBe(false);
    expect(isConsistentColumn([toonBool(true), toonInt(1)])).toBe(false);
    expect(isConsistentColumn([toonInt(1), toonFloat(2.5)])).toBe(false);
  });
});
