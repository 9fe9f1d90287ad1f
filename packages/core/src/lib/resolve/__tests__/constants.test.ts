import { describe, expect, it } from "vitest";
import { InvalidConstantError, UndefinedConstantError } from "../../output/errors";
import { parseDescriptorPath } from "../../paths/parser";
import { MetadataConstantProvider } from "../constants";

describe("MetadataConstantProvider", () => {
  const constants = new MetadataConstantProvider({
    decimals: 6,
    ticker: "USDC",
    prefixed: true,
    recipient: "@.to",
    unset: null,
  });

  it("looks up declared constants", () => {
    expect(constants.get(parseDescriptorPath("$.metadata.constants.decimals"))).toBe(6);
  });

  it("passes literals through", () => {
    expect(constants.resolve(18)).toBe(18);
    expect(constants.resolve("#.amount")).toBe("#.amount");
    expect(constants.resolveOrUndefined(undefined)).toBeUndefined();
  });

  it("dereferences descriptor path strings", () => {
    expect(constants.resolve("$.metadata.constants.ticker")).toBe("USDC");
    expect(constants.resolveBoolean("$.metadata.constants.prefixed")).toBe(true);
    expect(constants.resolveNumber("$.metadata.constants.decimals")).toBe(6);
  });

  it("resolves paths held by constants", () => {
    expect(constants.resolvePath("$.metadata.constants.recipient")).toEqual({ type: "container", field: "to" });
    expect(constants.resolvePath("amount")).toEqual({
      type: "data",
      absolute: false,
      elements: [{ type: "field", identifier: "amount" }],
    });
  });

  it("only reads from the constants namespace", () => {
    expect(() => constants.get(parseDescriptorPath("$.display.definitions.x"))).toThrow(
      'Error resolving constant "$.display.definitions.x": constants are only allowed in $.metadata.constants'
    );
    expect(() => constants.resolve("$.metadata.constants.unset")).toThrow(UndefinedConstantError);
    expect(() => constants.resolve("$.metadata.constants.[0]")).toThrow("constants must be referenced by name");
  });

  it("checks the type of resolved constants", () => {
    expect(() => constants.resolveNumber("$.metadata.constants.ticker")).toThrow(InvalidConstantError);
    expect(() => constants.resolveString("$.metadata.constants.decimals")).toThrow(
      'Constant "$.metadata.constants.decimals" must be a string, got 6'
    );
  });
});
