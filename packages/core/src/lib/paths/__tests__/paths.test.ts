import { describe, expect, it } from "vitest";
import { InvalidPathError, PathMismatchError } from "../../output/errors";
import {
  concatDataPath,
  concatPath,
  hasArrayElement,
  parseDataPath,
  parseDescriptorPath,
  parsePath,
  pathEquals,
  pathToString,
  startsWith,
  stripPrefix,
  toAbsolute,
  toRelative,
  toSchemaPath,
} from "../index";
import type { DataPath } from "../types";

describe("parsePath", () => {
  it("parses absolute data paths", () => {
    expect(parsePath("#.items.[0].amount")).toEqual({
      type: "data",
      absolute: true,
      elements: [
        { type: "field", identifier: "items" },
        { type: "arrayElement", index: 0 },
        { type: "field", identifier: "amount" },
      ],
    });
  });

  it("accepts array elements glued to an identifier", () => {
    expect(pathToString(parseDataPath("items[-1].to"))).toBe("items.[-1].to");
  });

  it("parses slices and wildcards", () => {
    expect(parseDataPath("#.data.[1:3]").elements[1]).toEqual({ type: "arraySlice", start: 1, end: 3 });
    expect(parseDataPath("#.data.[:-1]").elements[1]).toEqual({ type: "arraySlice", end: -1 });
    expect(parseDataPath("#.data.[2:]").elements[1]).toEqual({ type: "arraySlice", start: 2 });
    expect(parseDataPath("#.data.[]").elements[1]).toEqual({ type: "array" });
  });

  it("parses the root data path", () => {
    expect(parseDataPath("#")).toEqual({ type: "data", absolute: true, elements: [] });
    expect(pathToString(parseDataPath("#"))).toBe("#");
  });

  it("parses container and descriptor paths", () => {
    expect(parsePath("@.from")).toEqual({ type: "container", field: "from" });
    expect(parsePath("$.metadata.constants.max")).toEqual({
      type: "descriptor",
      elements: [
        { type: "field", identifier: "metadata" },
        { type: "field", identifier: "constants" },
        { type: "field", identifier: "max" },
      ],
    });
  });

  it("round-trips through pathToString", () => {
    for (const raw of ["#.a.b", "a.[0].[1:2]", "@.value", "$.display.definitions.spender", "#.x.[]"]) {
      expect(pathToString(parsePath(raw))).toBe(raw);
    }
  });

  it("rejects malformed paths", () => {
    expect(() => parsePath("@.sender")).toThrow(InvalidPathError);
    expect(() => parsePath("#.a..b")).toThrow('unexpected character "."');
    expect(() => parsePath("#.a.")).toThrow("trailing separator");
    expect(() => parsePath("#.items.[x]")).toThrow('invalid array element "[x]"');
    expect(() => parsePath("#.items.[0")).toThrow("unterminated array element");
    expect(() => parseDescriptorPath("$.a.[]")).toThrow(InvalidPathError);
    expect(() => parseDataPath("")).toThrow(InvalidPathError);
  });
});

describe("path operations", () => {
  const prefix = parseDataPath("#.order");

  it("appends relative children to the prefix", () => {
    expect(pathToString(concatDataPath(prefix, parseDataPath("items.[0]")))).toBe("#.order.items.[0]");
  });

  it("returns absolute children unchanged", () => {
    const child = parseDataPath("#.recipient");
    expect(concatDataPath(prefix, child)).toBe(child);
  });

  it("leaves container paths untouched", () => {
    expect(concatPath(prefix, { type: "container", field: "to" })).toEqual({ type: "container", field: "to" });
  });

  it("strips a prefix added by concatenation", () => {
    const children = ["amount", "items.[2].token", "data.[1:4]", "x.[]"].map(parseDataPath);
    for (const child of children) {
      expect(pathEquals(stripPrefix(concatDataPath(prefix, child), prefix), child)).toBe(true);
    }
  });

  it("fails explicitly when the prefix does not match", () => {
    expect(() => stripPrefix(parseDataPath("#.other.amount"), prefix)).toThrow(PathMismatchError);
    expect(() => stripPrefix(parseDataPath("order.amount"), prefix)).toThrow(
      'Path "order.amount" does not start with prefix "#.order"'
    );
  });

  it("strips descriptor prefixes", () => {
    const tail = stripPrefix(
      parseDescriptorPath("$.display.definitions.spender"),
      parseDescriptorPath("$.display.definitions")
    );
    expect(tail).toEqual({ type: "descriptor", elements: [{ type: "field", identifier: "spender" }] });
  });

  it("checks prefixes element by element", () => {
    expect(startsWith(parseDataPath("#.a.b.[0]"), parseDataPath("#.a.b"))).toBe(true);
    expect(startsWith(parseDataPath("#.a.c"), parseDataPath("#.a.b"))).toBe(false);
  });

  it("round-trips relative paths through toAbsolute / toRelative", () => {
    const path: DataPath = parseDataPath("a.[0].b");
    expect(toRelative(toAbsolute(path))).toEqual(path);
  });

  it("detects array addressing", () => {
    expect(hasArrayElement(parseDataPath("#.a.b"))).toBe(false);
    expect(hasArrayElement(parseDataPath("#.a.[1].b"))).toBe(true);
  });
});

describe("toSchemaPath", () => {
  it("collapses indices and slices to the array wildcard", () => {
    const expected = parseDataPath("#.items.[]");
    for (const raw of ["#.items.[2]", "#.items.[-1]", "#.items.[0:3]", "#.items.[]"]) {
      expect(toSchemaPath(parseDataPath(raw))).toEqual(expected);
    }
  });

  it("is idempotent", () => {
    const once = toSchemaPath(parseDataPath("#.a.[1].b.[2:5].c"));
    expect(toSchemaPath(once)).toEqual(once);
    expect(pathToString(once)).toBe("#.a.[].b.[].c");
  });
});
