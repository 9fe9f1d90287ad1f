import { describe, expect, it } from "vitest";
import { parseInputDescriptor } from "../../../descriptor/input";
import { OutputCollector } from "../../../output/collector";
import { inputToCalldataDescriptors, resolvedToCalldataDescriptors } from "../convert";
import { hashFieldDescriptors } from "../serialize";

const TOKEN = "0xA0b86991c6218b36c1d19D4a2e9Eb0cE3606eB48";
const TOKEN_LOWER = "0xa0b86991c6218b36c1d19d4a2e9eb0ce3606eb48";
const TRANSFER = "transfer(address to,uint256 amount)";

/** Field descriptor of `{ path: "amount", label: "Amount", format: "amount" }` on `transfer`. */
const AMOUNT_DESCRIPTOR =
  "0x0001010106416d6f756e74020101031a0001010115000101010101020120030a00010101020001040103";

const AMOUNT_FIELD = { path: "amount", label: "Amount", format: "amount" };

function descriptor(formats: Record<string, unknown>, extra: { context?: unknown; metadata?: object } = {}) {
  const parsed = parseInputDescriptor({
    context: extra.context ?? { contract: { deployments: [{ chainId: 1, address: TOKEN }] } },
    metadata: { owner: "Example", ...extra.metadata },
    display: { formats },
  });
  if (!parsed.success) throw new Error(parsed.error);
  return parsed.descriptor;
}

describe("inputToCalldataDescriptors", () => {
  it("emits one descriptor per known deployment and selector", async () => {
    const input = descriptor(
      {
        [TRANSFER]: {
          intent: "Send",
          fields: [{ path: "to", label: "To", format: "addressName", params: { types: ["eoa"] } }, AMOUNT_FIELD],
        },
      },
      {
        context: {
          contract: {
            deployments: [
              { chainId: 1, address: TOKEN },
              { chainId: 424242, address: TOKEN },
            ],
          },
        },
      }
    );

    const report = await inputToCalldataDescriptors(input);

    expect(report.status).toBe("success");
    expect(report.entries).toEqual([
      {
        level: "warning",
        kind: "unsupported",
        title: "Unknown network",
        message: "Chain id 424242 is not known, skipping it",
      },
    ]);
    expect(report.artifacts).toHaveLength(1);

    const [artifact] = report.artifacts;
    expect(artifact).toMatchObject({ network: "ethereum", chain_id: 1, address: TOKEN_LOWER, selector: "0xa9059cbb" });
    expect(artifact?.fields.map((field) => field.name)).toEqual(["To", "Amount"]);
    expect(artifact?.fields[0]?.param).toEqual({
      type: "TRUSTED_NAME",
      value: {
        type: "path",
        type_family: "ADDRESS",
        type_size: 20,
        abi_path: [
          { type: "TUPLE", offset: 0 },
          { type: "LEAF", leaf_type: "STATIC_LEAF" },
        ],
      },
      types: ["eoa"],
      sources: ["ens", "unstoppable_domain", "freename"],
    });
    expect(artifact?.fields[1]?.descriptor).toBe(AMOUNT_DESCRIPTOR);
    expect(artifact?.transaction_info).toEqual({
      chain_id: 1,
      address: TOKEN_LOWER,
      selector: "0xa9059cbb",
      hash: hashFieldDescriptors(artifact?.fields.map((field) => field.descriptor) ?? []),
      operation_type: "Send",
      creator_name: "Example",
    });
    expect(artifact?.transaction_info.hash).toMatch(/^[0-9a-f]{64}$/);
  });

  it("drops only the selector whose field is not in the function ABI", async () => {
    const input = descriptor({
      [TRANSFER]: { fields: [AMOUNT_FIELD] },
      "transferFrom(address from,address to,uint256 value)": {
        fields: [{ path: "spender", label: "Spender", format: "raw" }],
      },
    });

    const report = await inputToCalldataDescriptors(input);

    expect(report.status).toBe("partial");
    expect(report.artifacts.map((artifact) => artifact.selector)).toEqual(["0xa9059cbb"]);
    const errors = report.entries.filter((entry) => entry.level === "error");
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({ kind: "schema", title: "Invalid display field" });
  });

  it("reports an array index outside the encodable range for its selector only", async () => {
    const input = descriptor({
      [TRANSFER]: { fields: [AMOUNT_FIELD] },
      "f(uint256[] items)": { fields: [{ path: "items.[40000]", label: "Item", format: "raw" }] },
    });

    const report = await inputToCalldataDescriptors(input);

    expect(report.status).toBe("partial");
    expect(report.artifacts.map((artifact) => artifact.selector)).toEqual(["0xa9059cbb"]);
    expect(report.entries.filter((entry) => entry.level === "error")).toEqual([
      {
        level: "error",
        kind: "unsupported",
        title: "Unsupported path",
        message: "Index 40000 does not fit in a signed 16 bit integer.",
      },
    ]);
  });

  it("reports unit decimals that do not fit in a byte", async () => {
    const input = descriptor({
      [TRANSFER]: { fields: [AMOUNT_FIELD] },
      "f(uint256 v)": { fields: [{ path: "v", label: "Value", format: "unit", params: { base: "h", decimals: 300 } }] },
    });

    const report = await inputToCalldataDescriptors(input);

    expect(report.status).toBe("partial");
    expect(report.artifacts.map((artifact) => artifact.selector)).toEqual(["0xa9059cbb"]);
    expect(report.entries.filter((entry) => entry.level === "error")).toEqual([
      {
        level: "error",
        kind: "validation",
        title: "Invalid unit decimals",
        message: "Unit decimals 300 do not fit in a byte.",
      },
    ]);
  });

  it("takes the functions of selector keys from the ABI", async () => {
    const input = descriptor(
      { "0xa9059cbb": { fields: [AMOUNT_FIELD] } },
      {
        context: {
          contract: {
            abi: [
              {
                type: "function",
                name: "transfer",
                inputs: [
                  { name: "to", type: "address" },
                  { name: "amount", type: "uint256" },
                ],
              },
            ],
            deployments: [{ chainId: 1, address: TOKEN }],
          },
        },
      }
    );

    const report = await inputToCalldataDescriptors(input);

    expect(report.status).toBe("success");
    expect(report.artifacts[0]?.fields[0]?.descriptor).toBe(AMOUNT_DESCRIPTOR);
    expect(report.artifacts[0]?.transaction_info.operation_type).toBe("0xa9059cbb");
  });

  it("skips hidden fields and flattens groups", async () => {
    const input = descriptor({
      [TRANSFER]: {
        fields: [
          { path: "to", label: "To", visible: "never" },
          { label: "Details", fields: [AMOUNT_FIELD] },
        ],
      },
    });

    const report = await inputToCalldataDescriptors(input);

    expect(report.artifacts[0]?.fields.map((field) => field.descriptor)).toEqual([AMOUNT_DESCRIPTOR]);
  });

  it("numbers enum tables and references them by id", async () => {
    const input = descriptor(
      {
        "setMode(uint8 mode)": {
          fields: [{ path: "mode", label: "Mode", format: "enum", params: { $ref: "$.metadata.enums.mode" } }],
        },
      },
      { metadata: { enums: { mode: { "0": "Off", "1": "On" } } } }
    );

    const report = await inputToCalldataDescriptors(input);
    const [artifact] = report.artifacts;

    expect(artifact?.enums).toEqual([
      {
        id: 0,
        enum_id: "mode",
        entries: [
          { value: 0, name: "Off" },
          { value: 1, name: "On" },
        ],
      },
    ]);
    expect(artifact?.fields[0]?.param).toMatchObject({ type: "ENUM", id: 0, value: { type_family: "UINT", type_size: 1 } });
  });

  it("fills creator details from the owner info", async () => {
    const input = descriptor(
      { [TRANSFER]: { $id: "transfer", fields: [AMOUNT_FIELD] } },
      {
        metadata: {
          contractName: "Token",
          info: { legalName: "Example Inc.", url: "https://example.org", deploymentDate: "2021-03-04T05:06:07.000Z" },
        },
      }
    );

    const report = await inputToCalldataDescriptors(input);

    expect(report.artifacts[0]?.transaction_info).toMatchObject({
      operation_type: "transfer",
      creator_name: "Example",
      creator_legal_name: "Example Inc.",
      creator_url: "https://example.org",
      contract_name: "Token",
      deploy_date: "2021-03-04T05:06:07Z",
    });
  });

  it("fails when resolution fails", async () => {
    const input = descriptor({ [TRANSFER]: { fields: [{ path: "to", label: "To", format: "addressName" }] } });

    const report = await inputToCalldataDescriptors(input);

    expect(report.status).toBe("failure");
    expect(report.artifacts).toEqual([]);
    expect(report.entries.some((entry) => entry.title === "Missing parameters")).toBe(true);
  });
});

describe("resolvedToCalldataDescriptors", () => {
  it("rejects typed data descriptors", () => {
    const out = new OutputCollector();
    const artifacts = resolvedToCalldataDescriptors(
      { context: { type: "eip712", deployments: [] }, metadata: {}, display: { formats: {} } },
      {},
      out
    );
    expect(artifacts).toEqual([]);
    expect(out.entries).toEqual([
      {
        level: "error",
        kind: "schema",
        title: "Invalid context",
        message: "Calldata descriptors can only be generated for contract descriptors.",
      },
    ]);
  });
});
