import type { AbiDataType } from "../../abi/types";
import { lowercaseAddress } from "../../abi/values";
import type { ResolvedFieldDescription, ResolvedFieldParams, ResolvedValue } from "../../descriptor/resolved";
import { captureErrors, type OutputCollector } from "../../output/collector";
import { TRUSTED_NAME_SOURCES, TRUSTED_NAME_TYPES, toTrustedNameSources, toTrustedNameTypes } from "../trusted-names";
import type { AbiTupleNode } from "./abi-tree";
import type { CalldataParam, CalldataValue } from "./types";
import { constantTypeOf, lowerValue } from "./values";

export interface ParamContext {
  root: AbiTupleNode;
  /** Calldata enum id of each `metadata.enums` key. */
  enumIds: ReadonlyMap<string, number>;
  out: OutputCollector;
}

type ParamsOf<K extends ResolvedFieldParams["kind"]> = Extract<ResolvedFieldParams, { kind: K }>;

function paramsOf<K extends ResolvedFieldParams["kind"]>(
  field: ResolvedFieldDescription,
  kind: K,
  out: OutputCollector
): ParamsOf<K> | null {
  const { params } = field;
  if (params !== undefined && isKind(params, kind)) return params;
  return out.error(
    "validation",
    "Missing parameters",
    `Field "${field.label}" has format "${field.format}" but no ${kind} parameters.`
  );
}

function isKind<K extends ResolvedFieldParams["kind"]>(params: ResolvedFieldParams, kind: K): params is ParamsOf<K> {
  return params.kind === kind;
}

/** Lower an optional sub-value; `undefined` when absent, `null` after an error. */
function optionalValue(
  value: ResolvedValue | undefined,
  type: AbiDataType,
  ctx: ParamContext
): CalldataValue | undefined | null {
  return value === undefined ? undefined : lowerValue(value, type, ctx.root, ctx.out);
}

function trustedNameParam(value: CalldataValue, field: ResolvedFieldDescription, ctx: ParamContext): CalldataParam | null {
  const params = field.params?.kind === "addressName" ? field.params : undefined;
  const types = toTrustedNameTypes(params?.types ?? []);
  const sources = toTrustedNameSources(params?.sources ?? [], types, ctx.out);
  const senderAddresses = captureErrors(ctx.out, () => params?.senderAddress?.map(lowercaseAddress));
  if (senderAddresses === null) return null;
  return {
    type: "TRUSTED_NAME",
    value,
    types: types.length > 0 ? types : [...TRUSTED_NAME_TYPES],
    sources: sources.length > 0 ? sources : [...TRUSTED_NAME_SOURCES],
    sender_addresses: senderAddresses,
  };
}

function tokenAmountParam(value: CalldataValue, field: ResolvedFieldDescription, ctx: ParamContext): CalldataParam | null {
  const params = field.params?.kind === "tokenAmount" ? field.params : undefined;
  const token = optionalValue(params?.token, "address", ctx);
  if (token === null) return null;
  const nativeCurrencies = captureErrors(ctx.out, () => params?.nativeCurrencyAddress?.map(lowercaseAddress));
  if (nativeCurrencies === null) return null;
  return {
    type: "TOKEN_AMOUNT",
    value,
    token,
    native_currencies: nativeCurrencies,
    threshold: params?.threshold,
    above_threshold_message: params?.message,
  };
}

function calldataParam(value: CalldataValue, field: ResolvedFieldDescription, ctx: ParamContext): CalldataParam | null {
  const params = paramsOf(field, "calldata", ctx.out);
  if (params === null) return null;
  if (params.callee === undefined) {
    return ctx.out.error("validation", "Missing callee", `Calldata field "${field.label}" must define a callee.`);
  }
  const callee = lowerValue(params.callee, "address", ctx.root, ctx.out);
  const selector = optionalValue(params.selector, "bytes", ctx);
  const chainId = optionalValue(params.chainId, "uint", ctx);
  const amount = optionalValue(params.amount, "uint", ctx);
  const spender = optionalValue(params.spender, "address", ctx);
  if (callee === null || selector === null || chainId === null || amount === null || spender === null) return null;
  return { type: "CALLDATA", value, callee, selector, chain_id: chainId, amount, spender };
}

/**
 * Convert the format and parameters of a field to a calldata parameter.
 * Returns `null` after reporting an error.
 */
export function convertParam(field: ResolvedFieldDescription, ctx: ParamContext): CalldataParam | null {
  const { out } = ctx;
  const value = lowerValue(field.source, constantTypeOf(field.format), ctx.root, out);
  if (value === null) return null;

  switch (field.format) {
    case undefined:
    case "raw":
      return { type: "RAW", value };

    case "amount":
      return { type: "AMOUNT", value };

    case "duration":
      return { type: "DURATION", value };

    case "addressName":
      return trustedNameParam(value, field, ctx);

    case "tokenAmount":
      return tokenAmountParam(value, field, ctx);

    case "calldata":
      return calldataParam(value, field, ctx);

    case "nftName": {
      const params = paramsOf(field, "nftName", out);
      if (params === null) return null;
      if (params.collection === undefined) {
        return out.error("validation", "Missing collection", `NFT field "${field.label}" must define a collection.`);
      }
      const collection = lowerValue(params.collection, "address", ctx.root, out);
      return collection === null ? null : { type: "NFT", value, collection };
    }

    case "date": {
      const params = paramsOf(field, "date", out);
      if (params === null) return null;
      return { type: "DATETIME", value, date_type: params.encoding === "timestamp" ? "UNIX" : "BLOCK_HEIGHT" };
    }

    case "unit": {
      const params = paramsOf(field, "unit", out);
      if (params === null) return null;
      return { type: "UNIT", value, base: params.base, decimals: params.decimals, prefix: params.prefix };
    }

    case "enum": {
      const params = paramsOf(field, "enum", out);
      if (params === null) return null;
      const id = ctx.enumIds.get(params.enumId);
      if (id === undefined) {
        return out.error("reference", "Invalid enum id", `Enum "${params.enumId}" is not defined in the descriptor metadata.`);
      }
      return { type: "ENUM", value, id };
    }

    case "interoperableAddressName":
    case "tokenTicker":
    case "chainId":
      return out.error(
        "unsupported",
        "Unsupported format",
        `Field format "${field.format}" is not supported for calldata conversion.`
      );
  }
}
