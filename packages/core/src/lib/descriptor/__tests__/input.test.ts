import { describe, expect, it } from "vitest";
import { parseInputDescriptor, parseInputDescriptorFromString } from "../input";

const DEPLOYMENTS = [{ chainId: 1, address: "0xA0b86991c6218b36c1d19D4a2e9Eb0cE3606eB48" }];

function descriptor(fields: unknown[]) {
  return {
    context: { contract: { deployments: DEPLOYMENTS } },
    metadata: { owner: "Example" },
    display: { formats: { "approve(address spender,uint256 value)": { fields } } },
  };
}

function parsedFields(fields: unknown[]) {
  const result = parseInputDescriptor(descriptor(fields));
  if (!result.success) throw new Error(result.error);
  return result.descriptor.display.formats["approve(address spender,uint256 value)"]?.fields;
}

describe("parseInputDescriptor", () => {
  it("tags the context variant", () => {
    const result = parseInputDescriptor(descriptor([]));
    expect(result.success && result.descriptor.context.type).toBe("contract");
  });

  it("tags fields, references and groups", () => {
    const fields = parsedFields([
      { path: "spender", label: "Spender", format: "addressName", params: { types: ["contract"] } },
      { $ref: "$.display.definitions.amount", path: "value" },
      { path: "#.orders.[]", fields: [{ path: "amount", label: "Amount", format: "amount" }] },
    ]);
    expect(fields?.map((field) => field.kind)).toEqual(["field", "reference", "group"]);
  });

  it("infers the parameter kind from the shape only when there is no format", () => {
    const fields = parsedFields([
      { path: "deadline", label: "Deadline", params: { encoding: "timestamp" } },
      { path: "value", label: "Value", format: "unit", params: { base: "%" } },
    ]);
    expect(fields?.[0]).toMatchObject({ kind: "field", paramsKind: "date" });
    expect(fields?.[1]).not.toHaveProperty("paramsKind");
  });

  it("requires at least one deployment", () => {
    const result = parseInputDescriptor({
      context: { contract: { deployments: [] } },
      metadata: {},
      display: { formats: {} },
    });
    expect(result.success).toBe(false);
    expect(!result.success && result.error).toContain("context");
  });

  it("rejects invalid addresses", () => {
    const result = parseInputDescriptor({
      context: { eip712: { deployments: [{ chainId: 1, address: "0x1234" }] } },
      metadata: {},
      display: { formats: {} },
    });
    expect(!result.success && result.error).toContain("Invalid Ethereum address");
  });

  it("reports JSON syntax errors", () => {
    const result = parseInputDescriptorFromString("{");
    expect(result.success).toBe(false);
    expect(!result.success && result.error.startsWith("JSON parse error:")).toBe(true);
  });
});
