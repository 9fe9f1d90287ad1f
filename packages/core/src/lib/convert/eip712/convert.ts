/**
 * Resolved typed data descriptor to legacy EIP-712 descriptors: one per chain,
 * listing each deployment as a contract carrying every converted message.
 */

import { isEncodeType, parseEncodeType } from "../../abi/encode-type";
import type { Eip712Field, Eip712Schema } from "../../abi/types";
import type { Eip712Domain, InputDescriptor } from "../../descriptor/input";
import type {
  ResolvedDescriptor,
  ResolvedEip712Context,
  ResolvedField,
  ResolvedFieldDescription,
  ResolvedValue,
} from "../../descriptor/resolved";
import type { Fetcher } from "../../fetch/service";
import { getNetworkId } from "../../networks";
import { OutputCollector, captureErrors } from "../../output/collector";
import { ConversionError } from "../../output/errors";
import type { OutputSink } from "../../output/types";
import { hasArrayElement, toRelative } from "../../paths/ops";
import { pathToString } from "../../paths/parser";
import { resolveDescriptor } from "../../resolve/resolver";
import { buildReport, type ConversionReport } from "../report";
import { TRUSTED_NAME_SOURCES, toTrustedNameSources, toTrustedNameTypes } from "../trusted-names";
import type { LegacyEip712Descriptor, LegacyEip712Format, LegacyEip712MapperField, LegacyEip712Message } from "./types";

const DOMAIN_TYPE = "EIP712Domain";

// ── Schema ──────────────────────────────────────────────────────────

/**
 * `EIP712Domain` fields in canonical order. `name` and `version` are always
 * declared; `chainId` and `verifyingContract` only when the descriptor has
 * deployments to fill them.
 */
export function eip712DomainFields(
  domain: Eip712Domain | undefined,
  hasDeployments: boolean,
  out: OutputCollector
): Eip712Field[] {
  for (const key of ["name", "version"] as const) {
    if (domain?.[key] === undefined) {
      out.warning(
        "schema",
        `Missing domain ${key}`,
        `EIP-712 domain "${key}" is not set in the descriptor; it is declared as a string anyway.`
      );
    }
  }
  const fields: Eip712Field[] = [
    { name: "name", type: "string" },
    { name: "version", type: "string" },
  ];
  if (hasDeployments) {
    fields.push({ name: "chainId", type: "uint256" }, { name: "verifyingContract", type: "address" });
  }
  return fields;
}

function messageSchema(key: string, context: ResolvedEip712Context, out: OutputCollector): Eip712Schema | null {
  if (isEncodeType(key)) return captureErrors(out, () => parseEncodeType(key));
  const schema = context.schemas?.find((candidate) => candidate.primaryType === key);
  if (schema === undefined) {
    return out.error("schema", "Missing schema", `No EIP-712 schema has primary type "${key}".`);
  }
  return schema;
}

// ── Fields ──────────────────────────────────────────────────────────

function unsupported(title: string, message: string): ConversionError {
  return new ConversionError("unsupported", title, message);
}

function describe(value: ResolvedValue): string {
  return value.type === "path" ? pathToString(value.path) : JSON.stringify(value.value);
}

/** Relative data path, or `@.to` for the verifying contract. */
function referencePath(value: ResolvedValue, what: string): string {
  if (value.type === "path") {
    if (value.path.type === "data") return pathToString(toRelative(value.path));
    if (value.path.field === "to") return "@.to";
  }
  throw unsupported(`Unsupported ${what}`, `${describe(value)} cannot be used as ${what} in EIP-712 descriptors.`);
}

const FORMATS: Record<NonNullable<ResolvedFieldDescription["format"]>, LegacyEip712Format> = {
  raw: "raw",
  addressName: "trusted-name",
  interoperableAddressName: "trusted-name",
  nftName: "trusted-name",
  tokenTicker: "raw",
  calldata: "calldata",
  amount: "amount",
  tokenAmount: "amount",
  date: "datetime",
  duration: "raw",
  unit: "raw",
  enum: "raw",
  chainId: "raw",
};

/**
 * Token amounts name their token by path. No token, or `@.to`, means the
 * verifying contract. Tokens inside arrays cannot be referenced per element,
 * so such amounts are shown raw.
 */
function tokenAmountField(field: ResolvedFieldDescription, mapped: LegacyEip712MapperField, out: OutputCollector) {
  const token = field.params?.kind === "tokenAmount" ? field.params.token : undefined;
  if (token === undefined) return mapped;
  if (token.type === "constant") {
    throw unsupported("Constant token not supported", "Constant token addresses cannot be converted to EIP-712 descriptors.");
  }
  if (token.path.type === "container") {
    if (token.path.field === "to") return mapped;
    throw unsupported("Unsupported token path", `Token path "${describe(token)}" is not supported.`);
  }
  if (hasArrayElement(token.path)) {
    out.warning(
      "unsupported",
      "Token amount in array",
      `Field "${field.label}" takes its token from an array element, it is displayed raw.`
    );
    return { ...mapped, format: "raw" as const };
  }
  return { ...mapped, assetPath: pathToString(toRelative(token.path)) };
}

function convertFieldDescription(field: ResolvedFieldDescription, out: OutputCollector): LegacyEip712MapperField {
  const { source } = field;
  if (source.type === "constant") {
    throw unsupported("Constant values not supported", "Constant values cannot be converted to EIP-712 fields.");
  }
  if (source.path.type === "container") {
    throw unsupported(
      "Unsupported path",
      `Container path "${pathToString(source.path)}" is not supported in EIP-712 conversion.`
    );
  }

  const mapped: LegacyEip712MapperField = {
    path: pathToString(toRelative(source.path)),
    label: field.label,
    format: field.format === undefined ? undefined : FORMATS[field.format],
  };

  const { params } = field;
  if (params === undefined) return mapped;
  switch (params.kind) {
    case "tokenAmount":
      return field.format === "tokenAmount" ? tokenAmountField(field, mapped, out) : mapped;

    case "addressName":
    case "interoperableAddressName": {
      if (mapped.format !== "trusted-name") return mapped;
      const nameTypes = params.types === undefined ? undefined : toTrustedNameTypes(params.types);
      const sources = params.sources === undefined ? undefined : toTrustedNameSources(params.sources, nameTypes ?? [], out);
      const nameSources = sources === undefined || sources.length > 0 ? sources : [...TRUSTED_NAME_SOURCES];
      return { ...mapped, nameTypes, nameSources };
    }

    case "calldata":
      return {
        ...mapped,
        calleePath: params.callee && referencePath(params.callee, "callee"),
        chainIdPath: params.chainId && referencePath(params.chainId, "chain id"),
        selectorPath: params.selector && referencePath(params.selector, "selector"),
        amountPath: params.amount && referencePath(params.amount, "amount"),
        spenderPath: params.spender && referencePath(params.spender, "spender"),
      };

    default:
      return mapped;
  }
}

function convertField(field: ResolvedField, out: OutputCollector, fields: LegacyEip712MapperField[]): boolean {
  if (field.kind === "group") {
    let ok = true;
    for (const nested of field.fields) ok = convertField(nested, out, fields) && ok;
    return ok;
  }
  if (field.visible === "never") return true;

  const mapped = captureErrors(out, () => convertFieldDescription(field, out));
  if (mapped === null) return false;
  fields.push(mapped);
  return true;
}

// ── Descriptors ─────────────────────────────────────────────────────

export interface Eip712ConversionOptions {
  /** Only emit descriptors for this chain. */
  chainId?: number;
}

export function resolvedToEip712Descriptors(
  resolved: ResolvedDescriptor,
  out: OutputCollector,
  options: Eip712ConversionOptions = {}
): LegacyEip712Descriptor[] {
  const { context, metadata } = resolved;
  if (context.type !== "eip712") {
    out.error("schema", "Invalid context", "EIP-712 descriptors can only be generated for typed data descriptors.");
    return [];
  }

  const domainFields = eip712DomainFields(context.domain, context.deployments.length > 0, out);

  const name = context.domain?.name ?? metadata.owner;
  const contractName = metadata.contractName ?? metadata.owner;
  if (name === undefined || contractName === undefined) {
    out.error("schema", "Missing owner", "EIP-712 descriptors need a domain name or metadata.owner to name the dApp.");
    return [];
  }

  const messages: LegacyEip712Message[] = [];
  for (const [key, format] of Object.entries(resolved.display.formats)) {
    const schema = messageSchema(key, context, out);
    if (schema === null) continue;

    const fields: LegacyEip712MapperField[] = [];
    let ok = true;
    for (const field of format.fields) ok = convertField(field, out, fields) && ok;
    if (!ok) continue;

    const types: [string, Eip712Field[]][] = [
      [DOMAIN_TYPE, domainFields],
      ...Object.entries(schema.types).filter(([name]) => name !== DOMAIN_TYPE),
    ];
    messages.push({
      schema: Object.fromEntries(types),
      mapper: { label: typeof format.intent === "string" ? format.intent : schema.primaryType, fields },
    });
  }
  if (messages.length === 0) return [];

  const descriptors = new Map<number, LegacyEip712Descriptor>();
  for (const deployment of context.deployments) {
    if (options.chainId !== undefined && deployment.chainId !== options.chainId) continue;

    const network = getNetworkId(deployment.chainId);
    if (network === undefined) {
      out.error("unsupported", "Unsupported network", `Network id ${deployment.chainId} not supported.`);
      continue;
    }

    let descriptor = descriptors.get(deployment.chainId);
    if (descriptor === undefined) {
      descriptor = { blockchainName: network, chainId: deployment.chainId, name, contracts: [] };
      descriptors.set(deployment.chainId, descriptor);
    }
    descriptor.contracts.push({ address: deployment.address, contractName, messages });
  }
  return [...descriptors.values()];
}

export interface InputToEip712Options extends Eip712ConversionOptions {
  fetcher?: Fetcher;
  sink?: OutputSink;
}

/** Resolve an input descriptor, then convert it to legacy EIP-712 descriptors. */
export async function inputToEip712Descriptors(
  input: InputDescriptor,
  options: InputToEip712Options = {}
): Promise<ConversionReport<LegacyEip712Descriptor>> {
  const out = new OutputCollector(options.sink);
  const resolved = await resolveDescriptor(input, { fetcher: options.fetcher, out });
  if (resolved === null) return buildReport([], out);
  return buildReport(resolvedToEip712Descriptors(resolved, out, options), out);
}
