/**
 * Resolved descriptor to calldata descriptors.
 *
 * Fields of each format are converted once against the function ABI, then
 * one descriptor is emitted per (deployment, selector) pair.
 */

import { abiToFunctions, computeSignature, isSelector, parseSignature, signatureToSelector } from "../../abi/signature";
import type { AbiFunction } from "../../abi/types";
import type { EnumDefinition, InputDescriptor } from "../../descriptor/input";
import type {
  ResolvedDescriptor,
  ResolvedDeployment,
  ResolvedField,
  ResolvedFormat,
  ResolvedMetadata,
} from "../../descriptor/resolved";
import type { Fetcher } from "../../fetch/service";
import { getNetworkId } from "../../networks";
import { OutputCollector, captureErrors } from "../../output/collector";
import type { OutputSink } from "../../output/types";
import { resolveDescriptor } from "../../resolve/resolver";
import { buildReport, type ConversionReport } from "../report";
import { functionToAbiTree } from "./abi-tree";
import { convertParam, type ParamContext } from "./params";
import { encodeField, hashFieldDescriptors } from "./serialize";
import type { CalldataDescriptor, CalldataEnum, CalldataField, CalldataTransactionInfo } from "./types";

export interface CalldataConversionOptions {
  /** Only emit descriptors for this chain. */
  chainId?: number;
}

interface ConvertedFormat {
  selector: string;
  format: ResolvedFormat;
  fields: CalldataField[];
  hash: string;
}

// ── Enums ───────────────────────────────────────────────────────────

const ENUM_VALUE = /^\d+$/;

/** Number the enum tables of the descriptor in declaration order. */
export function convertEnums(enums: Record<string, EnumDefinition>, out: OutputCollector): CalldataEnum[] {
  return Object.entries(enums).map(([enumId, definition], id) => ({
    id,
    enum_id: enumId,
    entries: Object.entries(definition).flatMap(([value, name]) => {
      if (!ENUM_VALUE.test(value) || Number(value) > 0xff) {
        out.warning(
          "unsupported",
          "Unsupported enum value",
          `Enum "${enumId}" entry "${value}" is not a single byte integer and is dropped.`
        );
        return [];
      }
      return [{ value: Number(value), name }];
    }),
  }));
}

// ── Fields ──────────────────────────────────────────────────────────

function convertField(field: ResolvedField, ctx: ParamContext, fields: CalldataField[]): boolean {
  if (field.kind === "group") {
    // Devices display a flat list; groups only contribute their members.
    let ok = true;
    for (const nested of field.fields) ok = convertField(nested, ctx, fields) && ok;
    return ok;
  }
  if (field.visible === "never") return true;

  const param = captureErrors(ctx.out, () => convertParam(field, ctx));
  if (param === null) return false;
  const descriptor = captureErrors(ctx.out, () => encodeField(field.label, param));
  if (descriptor === null) return false;
  fields.push({ name: field.label, param, descriptor });
  return true;
}

/** Convert every field of a format, reporting all failures. `null` if any failed. */
export function convertFormatFields(
  format: ResolvedFormat,
  fn: AbiFunction,
  enumIds: ReadonlyMap<string, number>,
  out: OutputCollector
): CalldataField[] | null {
  const root = captureErrors(out, () => functionToAbiTree(fn));
  if (root === null) return null;

  const ctx: ParamContext = { root, enumIds, out };
  const fields: CalldataField[] = [];
  let ok = true;
  for (const field of format.fields) ok = convertField(field, ctx, fields) && ok;
  return ok ? fields : null;
}

// ── Descriptors ─────────────────────────────────────────────────────

function formatDate(date: string): string {
  const parsed = new Date(date);
  return Number.isNaN(parsed.getTime()) ? date : parsed.toISOString().replace(/\.\d{3}Z$/, "Z");
}

function operationType({ intent, id }: ResolvedFormat, selector: string): string {
  if (typeof intent === "string") return intent;
  return (intent === undefined ? undefined : Object.values(intent)[0]) ?? id ?? selector;
}

function transactionInfo(
  deployment: ResolvedDeployment,
  converted: ConvertedFormat,
  metadata: ResolvedMetadata,
  contractName: string | undefined
): CalldataTransactionInfo {
  const { info } = metadata;
  return {
    chain_id: deployment.chainId,
    address: deployment.address,
    selector: converted.selector,
    hash: converted.hash,
    operation_type: operationType(converted.format, converted.selector),
    creator_name: metadata.owner,
    creator_legal_name: info === undefined ? undefined : (info.legalName ?? metadata.owner),
    creator_url: info?.url,
    contract_name: contractName,
    deploy_date: info?.deploymentDate === undefined ? undefined : formatDate(info.deploymentDate),
  };
}

/**
 * Generate calldata descriptors for a resolved contract descriptor.
 *
 * @param functions functions of the contract keyed by selector; formats whose
 *   selector is missing are reported and skipped
 */
export function resolvedToCalldataDescriptors(
  resolved: ResolvedDescriptor,
  functions: Readonly<Record<string, AbiFunction>>,
  out: OutputCollector,
  options: CalldataConversionOptions = {}
): CalldataDescriptor[] {
  const { context, metadata } = resolved;
  if (context.type !== "contract") {
    out.error("schema", "Invalid context", "Calldata descriptors can only be generated for contract descriptors.");
    return [];
  }

  const enums = convertEnums(metadata.enums ?? {}, out);
  const enumIds = new Map(enums.map((calldataEnum) => [calldataEnum.enum_id, calldataEnum.id]));

  const converted: ConvertedFormat[] = [];
  for (const [selector, format] of Object.entries(resolved.display.formats)) {
    const fn = functions[selector];
    if (fn === undefined) {
      out.error("schema", "Invalid selector", `Selector ${selector} has no known function signature or ABI entry.`);
      continue;
    }
    const fields = convertFormatFields(format, fn, enumIds, out);
    if (fields === null) continue;
    converted.push({ selector, format, fields, hash: hashFieldDescriptors(fields.map((field) => field.descriptor)) });
  }

  const descriptors: CalldataDescriptor[] = [];
  for (const deployment of context.deployments) {
    if (options.chainId !== undefined && deployment.chainId !== options.chainId) continue;

    const network = getNetworkId(deployment.chainId);
    if (network === undefined) {
      out.warning("unsupported", "Unknown network", `Chain id ${deployment.chainId} is not known, skipping it`);
      continue;
    }

    for (const format of converted) {
      descriptors.push({
        network,
        chain_id: deployment.chainId,
        address: deployment.address,
        selector: format.selector,
        transaction_info: transactionInfo(deployment, format, metadata, context.id ?? metadata.contractName),
        enums,
        fields: format.fields,
      });
    }
  }
  return descriptors;
}

/**
 * Functions named by the format keys of a contract descriptor. Selector keys
 * name no function; theirs come from the ABI.
 */
export function formatKeyFunctions(input: InputDescriptor, out: OutputCollector): Record<string, AbiFunction> {
  const functions: Record<string, AbiFunction> = {};
  if (input.context.type !== "contract") return functions;
  for (const key of Object.keys(input.display.formats)) {
    if (isSelector(key)) continue;
    const fn = captureErrors(out, () => parseSignature(key));
    if (fn !== null) functions[signatureToSelector(computeSignature(fn))] = fn;
  }
  return functions;
}

export interface InputToCalldataOptions extends CalldataConversionOptions {
  fetcher?: Fetcher;
  sink?: OutputSink;
}

/** Resolve an input descriptor, then convert it to calldata descriptors. */
export async function inputToCalldataDescriptors(
  input: InputDescriptor,
  options: InputToCalldataOptions = {}
): Promise<ConversionReport<CalldataDescriptor>> {
  const out = new OutputCollector(options.sink);
  const resolved = await resolveDescriptor(input, { fetcher: options.fetcher, out });
  if (resolved === null) return buildReport([], out);

  const abi = resolved.context.type === "contract" ? (resolved.context.abi ?? []) : [];
  const functions = { ...abiToFunctions(abi).functions, ...formatKeyFunctions(input, out) };
  return buildReport(resolvedToCalldataDescriptors(resolved, functions, out, options), out);
}
