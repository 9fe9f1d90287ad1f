import { describe, expect, it } from "vitest";
import type { z } from "zod";
import { parseInputDescriptor } from "../../descriptor/input";
import type { ResolvedField } from "../../descriptor/resolved";
import { serializeResolvedDescriptor } from "../../descriptor/serialize";
import type { Fetcher } from "../../fetch/service";
import { OutputCollector } from "../../output/collector";
import { FetchError } from "../../output/errors";
import { pathToString } from "../../paths/parser";
import { resolveDescriptor } from "../resolver";

const TOKEN = "0xA0b86991c6218b36c1d19D4a2e9Eb0cE3606eB48";
const TOKEN_LOWER = "0xa0b86991c6218b36c1d19d4a2e9eb0ce3606eb48";
const TRANSFER = "transfer(address to,uint256 amount)";

interface Parts {
  formats: Record<string, unknown>;
  definitions?: Record<string, unknown>;
  metadata?: Record<string, unknown>;
  context?: Record<string, unknown>;
}

function descriptor({ formats, definitions, metadata, context }: Parts) {
  return {
    context: context ?? { contract: { deployments: [{ chainId: 1, address: TOKEN }] } },
    metadata: { owner: "Example", ...metadata },
    display: { definitions, formats },
  };
}

async function resolve(json: unknown, fetcher?: Fetcher) {
  const parsed = parseInputDescriptor(json);
  if (!parsed.success) throw new Error(parsed.error);
  const out = new OutputCollector();
  const resolved = await resolveDescriptor(parsed.descriptor, { fetcher, out });
  return { resolved, out, titles: out.entries.map((entry) => `${entry.level}: ${entry.title}`) };
}

function fieldsOf(resolved: Awaited<ReturnType<typeof resolve>>["resolved"], key: string): ResolvedField[] {
  const format = resolved?.display.formats[key];
  if (format === undefined) throw new Error(`format ${key} missing`);
  return format.fields;
}

function sourceOf(field: ResolvedField | undefined): string {
  if (field?.kind !== "field") throw new Error("expected a field description");
  return field.source.type === "path" ? pathToString(field.source.path) : String(field.source.value);
}

class MemoryFetcher implements Fetcher {
  readonly requested: string[] = [];

  constructor(private readonly documents: Record<string, unknown>) {}

  async getJson<T>(url: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    this.requested.push(url);
    return schema.parse(this.documents[url]);
  }
}

describe("resolveDescriptor", () => {
  it("hashes signature keys to selectors and lowercases addresses", async () => {
    const { resolved, titles } = await resolve(
      descriptor({
        formats: {
          [TRANSFER]: {
            intent: "Send",
            fields: [
              { path: "to", label: "To", format: "addressName", params: { types: ["eoa"], sources: ["ens"] } },
              { path: "amount", label: "Amount", format: "tokenAmount", params: { tokenPath: "@.to" } },
            ],
          },
        },
      })
    );

    expect(titles).toEqual([]);
    expect(Object.keys(resolved?.display.formats ?? {})).toEqual(["0xa9059cbb"]);
    expect(resolved?.context.deployments[0]?.address).toBe("0xa0b86991c6218b36c1d19d4a2e9eb0ce3606eb48");

    const [to, amount] = fieldsOf(resolved, "0xa9059cbb");
    expect(to).toEqual({
      kind: "field",
      label: "To",
      format: "addressName",
      params: { kind: "addressName", types: ["eoa"], sources: ["ens"] },
      source: { type: "path", path: { type: "data", absolute: true, elements: [{ type: "field", identifier: "to" }] } },
    });
    expect(amount).toMatchObject({
      params: { kind: "tokenAmount", token: { type: "path", path: { type: "container", field: "to" } } },
    });
  });

  it("lets reference-site parameters override the definition", async () => {
    const { resolved } = await resolve(
      descriptor({
        definitions: { spender: { label: "Spender", format: "unit", params: { base: "USDC", decimals: 2 } } },
        formats: {
          [TRANSFER]: { fields: [{ $ref: "$.display.definitions.spender", path: "amount", params: { decimals: 6 } }] },
        },
      })
    );

    const [field] = fieldsOf(resolved, "0xa9059cbb");
    expect(field).toMatchObject({ kind: "field", label: "Spender", format: "unit" });
    expect(field?.kind === "field" && field.params).toEqual({ kind: "unit", base: "USDC", decimals: 6 });
  });

  it("replaces nested definition parameters as a whole", async () => {
    const { resolved, out } = await resolve(
      descriptor({
        definitions: {
          amount: {
            label: "Amount",
            format: "tokenAmount",
            params: { token: { map: "tokens", keyPath: "#.to" }, threshold: "0x10" },
          },
        },
        formats: {
          [TRANSFER]: { fields: [{ $ref: "$.display.definitions.amount", path: "amount", params: { token: TOKEN } }] },
        },
      })
    );

    expect(out.entries).toEqual([]);
    const [field] = fieldsOf(resolved, "0xa9059cbb");
    expect(field?.kind === "field" && field.params).toEqual({
      kind: "tokenAmount",
      token: { type: "constant", value: TOKEN_LOWER },
      threshold: "0x10",
    });
  });

  it("warns about reference parameters that match no format", async () => {
    const { resolved, out } = await resolve(
      descriptor({
        definitions: { amount: { label: "Amount", params: { style: "short" } } },
        formats: { [TRANSFER]: { fields: [{ $ref: "$.display.definitions.amount", path: "amount" }] } },
      })
    );

    expect(resolved).not.toBeNull();
    expect(out.entries).toEqual([
      {
        level: "warning",
        kind: "validation",
        title: "Parameters ignored",
        message: "Reference $.display.definitions.amount has parameters that match no format, they are dropped.",
      },
    ]);
    const [field] = fieldsOf(resolved, "0xa9059cbb");
    expect(field?.kind === "field" && field.params).toBeUndefined();
  });

  it("prefers the reference-site label", async () => {
    const { resolved } = await resolve(
      descriptor({
        definitions: { amount: { label: "Amount", format: "amount" } },
        formats: { [TRANSFER]: { fields: [{ $ref: "$.display.definitions.amount", path: "amount", label: "Sent" }] } },
      })
    );
    expect(fieldsOf(resolved, "0xa9059cbb")[0]).toMatchObject({ label: "Sent", format: "amount" });
  });

  it("reports references without a label on either side", async () => {
    const { resolved, titles } = await resolve(
      descriptor({
        definitions: { amount: { format: "amount" } },
        formats: { [TRANSFER]: { fields: [{ $ref: "$.display.definitions.amount", path: "amount" }] } },
      })
    );
    expect(resolved).toBeNull();
    expect(titles).toEqual(["error: Missing display field label"]);
  });

  it("rejects nested definition references", async () => {
    const { resolved, titles } = await resolve(
      descriptor({
        definitions: { amount: { label: "Amount" } },
        formats: { [TRANSFER]: { fields: [{ $ref: "$.display.definitions.amount.inner", path: "amount" }] } },
      })
    );
    expect(resolved).toBeNull();
    expect(titles).toEqual(["error: Invalid definition reference path"]);
  });

  it("flattens unlabeled field groups under their path", async () => {
    const { resolved } = await resolve(
      descriptor({
        formats: {
          "batch((address to,uint256 amount)[] recipients)": {
            fields: [
              {
                path: "#.recipients.[]",
                fields: [
                  { path: "to", label: "Recipient" },
                  { path: "amount", label: "Amount", format: "amount" },
                ],
              },
            ],
          },
        },
      })
    );
    const [key] = Object.keys(resolved?.display.formats ?? {});
    const fields = fieldsOf(resolved, key ?? "");
    expect(fields.map((field) => field.kind)).toEqual(["field", "field"]);
    expect(fields.map(sourceOf)).toEqual(["#.recipients.[].to", "#.recipients.[].amount"]);
  });

  it("keeps labeled field groups as a single node", async () => {
    const { resolved } = await resolve(
      descriptor({
        context: { eip712: { deployments: [{ chainId: 1, address: TOKEN }] } },
        formats: {
          Batch: {
            fields: [
              { path: "#.recipients.[]", label: "Recipients", iteration: "sequential", fields: [{ path: "to", label: "To" }] },
            ],
          },
        },
      })
    );
    const [group] = fieldsOf(resolved, "Batch");
    expect(group?.kind).toBe("group");
    if (group?.kind !== "group") return;
    expect(group.label).toBe("Recipients");
    expect(group.iteration).toBe("sequential");
    expect(group.path && pathToString(group.path)).toBe("#.recipients.[]");
    expect(group.fields.map(sourceOf)).toEqual(["#.recipients.[].to"]);
  });

  it("keeps labeled field groups without a path", async () => {
    const { resolved } = await resolve(
      descriptor({
        formats: { [TRANSFER]: { fields: [{ label: "Details", fields: [{ path: "amount", label: "Amount" }] }] } },
      })
    );
    const [group] = fieldsOf(resolved, "0xa9059cbb");
    expect(group).toMatchObject({ kind: "group", label: "Details", path: undefined });
    if (group?.kind !== "group") return;
    expect(group.fields.map(sourceOf)).toEqual(["#.amount"]);
  });

  it("rejects field groups on array slices", async () => {
    const { resolved, out } = await resolve(
      descriptor({
        formats: { [TRANSFER]: { fields: [{ path: "#.items.[0:2]", fields: [{ path: "to", label: "To" }] }] } },
      })
    );
    expect(resolved).toBeNull();
    expect(out.entries).toEqual([
      {
        level: "error",
        kind: "path",
        title: "Invalid field group",
        message: "Using field groups on an array slice is not allowed.",
      },
    ]);
  });

  it("resolves enum references against metadata", async () => {
    const { resolved } = await resolve(
      descriptor({
        metadata: { enums: { mode: { "0": "Stable", "1": "Variable" } } },
        formats: {
          [TRANSFER]: {
            fields: [{ path: "amount", label: "Mode", format: "enum", params: { $ref: "$.metadata.enums.mode" } }],
          },
        },
      })
    );
    expect(fieldsOf(resolved, "0xa9059cbb")[0]).toMatchObject({ params: { kind: "enum", enumId: "mode" } });
  });

  it("fails on unknown enums", async () => {
    const { resolved, titles } = await resolve(
      descriptor({
        formats: {
          [TRANSFER]: {
            fields: [{ path: "amount", label: "Mode", format: "enum", params: { $ref: "$.metadata.enums.mode" } }],
          },
        },
      })
    );
    expect(resolved).toBeNull();
    expect(titles).toEqual(["error: Invalid enum reference"]);
  });

  it("stops before display when an enum cannot be fetched", async () => {
    const fetcher: Fetcher = {
      getJson: (url) => Promise.reject(new FetchError(url, "503 Service Unavailable", 503)),
    };
    const { resolved, out } = await resolve(
      descriptor({
        metadata: { enums: { mode: "https://example.com/enum.json" } },
        formats: {
          [TRANSFER]: {
            fields: [{ path: "amount", label: "Mode", format: "enum", params: { $ref: "$.metadata.enums.mode" } }],
          },
        },
      }),
      fetcher
    );

    expect(resolved).toBeNull();
    expect(out.entries).toEqual([
      {
        level: "error",
        kind: "fetch",
        title: "Failed to fetch",
        message: "Failed to fetch https://example.com/enum.json: 503 Service Unavailable",
      },
    ]);
  });

  it("warns about field parameters that match no format", async () => {
    const { resolved, out } = await resolve(
      descriptor({
        formats: {
          [TRANSFER]: { fields: [{ path: "amount", label: "Amount", format: "raw", params: { style: "short" } }] },
        },
      })
    );

    expect(resolved).not.toBeNull();
    expect(out.entries).toEqual([
      {
        level: "warning",
        kind: "validation",
        title: "Parameters ignored",
        message: 'Field "amount" has parameters that match no format, they are dropped.',
      },
    ]);
  });

  it("drops map references with a warning", async () => {
    const { resolved, out } = await resolve(
      descriptor({
        formats: {
          [TRANSFER]: {
            fields: [
              {
                path: "amount",
                label: "Amount",
                format: "tokenAmount",
                params: { token: { map: "tokens", keyPath: "#.to" } },
              },
            ],
          },
        },
      })
    );
    expect(resolved).not.toBeNull();
    expect(out.entries).toEqual([
      {
        level: "warning",
        kind: "unsupported",
        title: "Unresolved map reference",
        message: "Map reference in token cannot be resolved at conversion time and will be dropped.",
      },
    ]);
    const [field] = fieldsOf(resolved, "0xa9059cbb");
    expect(field?.kind === "field" && field.params).toEqual({ kind: "tokenAmount" });
  });

  it("requires parameters for formats that need them", async () => {
    const { resolved, titles } = await resolve(
      descriptor({ formats: { [TRANSFER]: { fields: [{ path: "to", label: "To", format: "addressName" }] } } })
    );
    expect(resolved).toBeNull();
    expect(titles).toEqual(["error: Missing parameters"]);
  });

  it("inlines constants", async () => {
    const { resolved } = await resolve(
      descriptor({
        metadata: { constants: { recipient: "#.to", note: "Fixed fee", base: "bps" } },
        formats: {
          [TRANSFER]: {
            fields: [
              { path: "$.metadata.constants.recipient", label: "To" },
              { value: "$.metadata.constants.note", label: "Fee" },
              { path: "amount", label: "Amount", format: "unit", params: { base: "$.metadata.constants.base" } },
            ],
          },
        },
      })
    );
    const fields = fieldsOf(resolved, "0xa9059cbb");
    expect(fields.map(sourceOf)).toEqual(["#.to", "Fixed fee", "#.amount"]);
    expect(fields[2]?.kind === "field" && fields[2].params).toEqual({ kind: "unit", base: "bps" });
  });

  it("reports undefined constants", async () => {
    const { resolved, out } = await resolve(
      descriptor({ formats: { [TRANSFER]: { fields: [{ value: "$.metadata.constants.missing", label: "Fee" }] } } })
    );
    expect(resolved).toBeNull();
    expect(out.entries).toEqual([
      {
        level: "error",
        kind: "reference",
        title: "Invalid constant path",
        message: 'Error resolving constant "$.metadata.constants.missing": no constant defined at this path',
      },
    ]);
  });

  it("requires exactly one of path and value", async () => {
    const { titles } = await resolve(
      descriptor({
        formats: {
          [TRANSFER]: {
            fields: [
              { path: "to", value: "x", label: "Both" },
              { label: "Neither" },
            ],
          },
        },
      })
    );
    expect(titles).toEqual(["error: Invalid field", "error: Invalid field"]);
  });

  it("rejects duplicate format keys after normalization", async () => {
    const { resolved, out } = await resolve(
      descriptor({ formats: { [TRANSFER]: { fields: [] }, "0xA9059CBB": { fields: [] } } })
    );
    expect(resolved).toBeNull();
    expect(out.entries.map((entry) => entry.message)).toEqual([
      "Descriptor contains 2 formats sections for 0xa9059cbb",
    ]);
  });

  it("reports every failing format in one pass", async () => {
    const { titles } = await resolve(
      descriptor({
        formats: {
          "not a signature": { fields: [] },
          [TRANSFER]: { fields: [{ path: "to", label: "To", format: "date" }] },
        },
      })
    );
    expect(titles).toEqual(["error: Invalid selector", "error: Missing parameters"]);
  });

  it("fetches ABIs, schemas and enums through the fetcher", async () => {
    const fetcher = new MemoryFetcher({
      "https://example.com/schema.json": { primaryType: "Mail", types: { Mail: [{ name: "body", type: "string" }] } },
      "https://example.com/enum.json": { "1": "One" },
    });
    const { resolved, titles } = await resolve(
      descriptor({
        context: {
          eip712: {
            schemas: ["https://example.com/schema.json"],
            deployments: [{ chainId: 1, address: TOKEN }],
          },
        },
        metadata: { enums: { numbers: "https://example.com/enum.json" } },
        formats: { Mail: { fields: [{ path: "body", label: "Body" }] } },
      }),
      fetcher
    );

    expect(titles).toEqual([]);
    expect(fetcher.requested.sort()).toEqual(["https://example.com/enum.json", "https://example.com/schema.json"]);
    expect(resolved?.context.type === "eip712" && resolved.context.schemas).toEqual([
      { primaryType: "Mail", types: { Mail: [{ name: "body", type: "string" }] } },
    ]);
    expect(resolved?.metadata.enums).toEqual({ numbers: { "1": "One" } });
  });

  it("fails when a URL must be fetched without a fetcher", async () => {
    const { resolved, titles } = await resolve(
      descriptor({
        context: { contract: { abi: "https://example.com/abi.json", deployments: [{ chainId: 1, address: TOKEN }] } },
        formats: {},
      })
    );
    expect(resolved).toBeNull();
    expect(titles).toEqual(["error: Failed to fetch ABI"]);
  });

  it("warns that includes are not merged", async () => {
    const { resolved, titles } = await resolve({ ...descriptor({ formats: {} }), includes: "common.json" });
    expect(resolved).not.toBeNull();
    expect(titles).toEqual(["warning: Includes not merged"]);
  });
});

describe("serializeResolvedDescriptor", () => {
  it("renders paths as strings and parameters as path / value pairs", async () => {
    const { resolved } = await resolve(
      descriptor({
        formats: {
          [TRANSFER]: {
            fields: [{ path: "amount", label: "Amount", format: "tokenAmount", params: { tokenPath: "@.to" } }],
          },
        },
      })
    );
    if (resolved === null) throw new Error("resolution failed");
    const json = JSON.parse(JSON.stringify(serializeResolvedDescriptor(resolved)));
    expect(json.display.formats["0xa9059cbb"].fields).toEqual([
      { path: "#.amount", label: "Amount", format: "tokenAmount", params: { tokenPath: "@.to" } },
    ]);
  });
});
