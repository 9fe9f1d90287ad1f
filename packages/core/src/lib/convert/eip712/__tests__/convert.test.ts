import { describe, expect, it } from "vitest";
import { parseInputDescriptor } from "../../../descriptor/input";
import { OutputCollector } from "../../../output/collector";
import { eip712DomainFields, inputToEip712Descriptors, resolvedToEip712Descriptors } from "../convert";

const VERIFIER = "0x000000000022D473030F116dDEE9F6B43aC78BA3";
const VERIFIER_LOWER = "0x000000000022d473030f116ddee9f6b43ac78ba3";
const OTHER = "0x1111111111111111111111111111111111111111";

const MAIL = "Mail(Person from,Person to,string contents)Person(string name,address wallet)";

const ORDER_SCHEMA = {
  primaryType: "Order",
  types: {
    EIP712Domain: [{ name: "name", type: "string" }],
    Order: [
      { name: "token", type: "address" },
      { name: "amount", type: "uint256" },
      { name: "items", type: "Item[]" },
      { name: "data", type: "bytes" },
    ],
    Item: [
      { name: "token", type: "address" },
      { name: "amount", type: "uint256" },
    ],
  },
};

const FULL_DOMAIN = [
  { name: "name", type: "string" },
  { name: "version", type: "string" },
  { name: "chainId", type: "uint256" },
  { name: "verifyingContract", type: "address" },
];

function descriptor(
  formats: Record<string, unknown>,
  eip712: Record<string, unknown> = {},
  metadata: Record<string, unknown> = { owner: "Example" }
) {
  const parsed = parseInputDescriptor({
    context: {
      eip712: { domain: { name: "Mailer", version: "1" }, deployments: [{ chainId: 1, address: VERIFIER }], ...eip712 },
    },
    metadata,
    display: { formats },
  });
  if (!parsed.success) throw new Error(parsed.error);
  return parsed.descriptor;
}

describe("eip712DomainFields", () => {
  it("declares the verifying contract only with deployments", () => {
    const out = new OutputCollector();
    expect(eip712DomainFields({ name: "Mailer", version: "1" }, false, out)).toEqual(FULL_DOMAIN.slice(0, 2));
    expect(out.entries).toEqual([]);
  });

  it("warns about missing name and version", () => {
    const out = new OutputCollector();
    expect(eip712DomainFields(undefined, true, out)).toEqual(FULL_DOMAIN);
    expect(out.entries.map((entry) => entry.title)).toEqual(["Missing domain name", "Missing domain version"]);
  });
});

describe("inputToEip712Descriptors", () => {
  it("groups deployments of a chain under one descriptor", async () => {
    const input = descriptor(
      {
        [MAIL]: {
          intent: "Send mail",
          fields: [
            { path: "from.wallet", label: "From", format: "addressName", params: { types: ["eoa"], sources: ["local"] } },
            { path: "contents", label: "Contents", format: "raw" },
            { path: "to.name", label: "Recipient", visible: "never" },
          ],
        },
      },
      {
        deployments: [
          { chainId: 1, address: VERIFIER },
          { chainId: 1, address: OTHER },
        ],
      }
    );

    const report = await inputToEip712Descriptors(input);

    expect(report.status).toBe("success");
    expect(report.entries).toEqual([]);

    const message = {
      schema: {
        EIP712Domain: FULL_DOMAIN,
        Mail: [
          { name: "from", type: "Person" },
          { name: "to", type: "Person" },
          { name: "contents", type: "string" },
        ],
        Person: [
          { name: "name", type: "string" },
          { name: "wallet", type: "address" },
        ],
      },
      mapper: {
        label: "Send mail",
        fields: [
          {
            path: "from.wallet",
            label: "From",
            format: "trusted-name",
            nameTypes: ["eoa"],
            nameSources: ["ens", "unstoppable_domain", "freename", "local_address_book"],
          },
          { path: "contents", label: "Contents", format: "raw" },
        ],
      },
    };
    expect(report.artifacts).toEqual([
      {
        blockchainName: "ethereum",
        chainId: 1,
        name: "Mailer",
        contracts: [
          { address: VERIFIER_LOWER, contractName: "Example", messages: [message] },
          { address: OTHER, contractName: "Example", messages: [message] },
        ],
      },
    ]);
  });

  it("maps token amounts to asset paths and shows array tokens raw", async () => {
    const input = descriptor(
      {
        Order: {
          fields: [
            { path: "amount", label: "Amount", format: "tokenAmount", params: { tokenPath: "token" } },
            {
              path: "items.[].amount",
              label: "Item amount",
              format: "tokenAmount",
              params: { tokenPath: "items.[].token" },
            },
            { path: "amount", label: "Native", format: "tokenAmount", params: { tokenPath: "@.to" } },
            { path: "data", label: "Call", format: "calldata", params: { calleePath: "@.to", amountPath: "amount" } },
          ],
        },
      },
      { schemas: [ORDER_SCHEMA] },
      { owner: "Example", contractName: "Market" }
    );

    const report = await inputToEip712Descriptors(input);

    expect(report.status).toBe("success");
    expect(report.entries).toEqual([
      {
        level: "warning",
        kind: "unsupported",
        title: "Token amount in array",
        message: 'Field "Item amount" takes its token from an array element, it is displayed raw.',
      },
    ]);

    const [contract] = report.artifacts[0]?.contracts ?? [];
    expect(contract?.contractName).toBe("Market");
    const [message] = contract?.messages ?? [];
    expect(message?.mapper.label).toBe("Order");
    expect(message?.schema.EIP712Domain).toEqual(FULL_DOMAIN);
    expect(message?.mapper.fields).toEqual([
      { path: "amount", label: "Amount", format: "amount", assetPath: "token" },
      { path: "items.[].amount", label: "Item amount", format: "raw" },
      { path: "amount", label: "Native", format: "amount" },
      { path: "data", label: "Call", format: "calldata", calleePath: "@.to", amountPath: "amount" },
    ]);
  });

  it("drops only the messages whose fields cannot be converted", async () => {
    const input = descriptor({
      [MAIL]: { fields: [{ path: "contents", label: "Contents" }] },
      "Ping(address sender)": { fields: [{ path: "@.from", label: "Sender" }] },
    });

    const report = await inputToEip712Descriptors(input);

    expect(report.status).toBe("partial");
    expect(report.entries).toEqual([
      {
        level: "error",
        kind: "unsupported",
        title: "Unsupported path",
        message: 'Container path "@.from" is not supported in EIP-712 conversion.',
      },
    ]);
    expect(report.artifacts[0]?.contracts[0]?.messages.map((message) => message.mapper.label)).toEqual(["Mail"]);
  });

  it("fails when no schema has the primary type", async () => {
    const input = descriptor({ Order: { fields: [{ path: "amount", label: "Amount" }] } });

    const report = await inputToEip712Descriptors(input);

    expect(report.status).toBe("failure");
    expect(report.entries).toEqual([
      { level: "error", kind: "schema", title: "Missing schema", message: 'No EIP-712 schema has primary type "Order".' },
    ]);
  });

  it("reports deployments on unknown networks", async () => {
    const input = descriptor(
      { [MAIL]: { fields: [{ path: "contents", label: "Contents" }] } },
      {
        deployments: [
          { chainId: 1, address: VERIFIER },
          { chainId: 424242, address: VERIFIER },
        ],
      }
    );

    const report = await inputToEip712Descriptors(input);

    expect(report.status).toBe("partial");
    expect(report.artifacts.map((artifact) => artifact.chainId)).toEqual([1]);
    expect(report.entries).toEqual([
      { level: "error", kind: "unsupported", title: "Unsupported network", message: "Network id 424242 not supported." },
    ]);
  });

  it("names the dApp after the owner when the domain has no name", async () => {
    const input = descriptor(
      { [MAIL]: { fields: [{ path: "contents", label: "Contents" }] } },
      { domain: { version: "1" } }
    );

    const report = await inputToEip712Descriptors(input);

    expect(report.status).toBe("success");
    expect(report.artifacts[0]?.name).toBe("Example");
    expect(report.entries.map((entry) => entry.title)).toEqual(["Missing domain name"]);
  });

  it("filters deployments by chain id", async () => {
    const input = descriptor(
      { [MAIL]: { fields: [{ path: "contents", label: "Contents" }] } },
      {
        deployments: [
          { chainId: 1, address: VERIFIER },
          { chainId: 10, address: OTHER },
        ],
      }
    );

    const report = await inputToEip712Descriptors(input, { chainId: 10 });

    expect(report.artifacts).toEqual([
      expect.objectContaining({ blockchainName: "optimism", chainId: 10, contracts: [expect.objectContaining({ address: OTHER })] }),
    ]);
  });
});

describe("resolvedToEip712Descriptors", () => {
  it("rejects contract descriptors", () => {
    const out = new OutputCollector();
    const artifacts = resolvedToEip712Descriptors(
      { context: { type: "contract", deployments: [] }, metadata: {}, display: { formats: {} } },
      out
    );
    expect(artifacts).toEqual([]);
    expect(out.entries).toEqual([
      {
        level: "error",
        kind: "schema",
        title: "Invalid context",
        message: "EIP-712 descriptors can only be generated for typed data descriptors.",
      },
    ]);
  });
});
