/**
 * Format-specific field parameter resolution.
 *
 * Each sub-field may be a literal, a `$.metadata.constants.*` reference, a
 * path relative to the field's prefix, or a `{ map, keyPath }` lookup. Map
 * lookups are only resolvable at signing time and are dropped here, with a
 * warning, since no target format carries them.
 */

import type { z } from "zod";
import { lowercaseAddress } from "../abi/values";
import { ADDRESS_NAME_TYPES, DATE_ENCODINGS, type DateEncoding, type ParamsKind } from "../descriptor/format";
import { formatZodError, type EnumDefinition, type Scalar } from "../descriptor/input";
import {
  inputParamsSchemas,
  isMapReference,
  type InputAddressNameParams,
  type InputCalldataParams,
  type InputDateParams,
  type InputEnumParams,
  type InputNftNameParams,
  type InputTokenAmountParams,
  type InputTokenTickerParams,
  type InputUnitParams,
  type MapReference,
} from "../descriptor/params";
import type {
  ResolvedAddressNameParams,
  ResolvedCalldataParams,
  ResolvedDateParams,
  ResolvedEnumParams,
  ResolvedFieldParams,
  ResolvedNftNameParams,
  ResolvedTokenAmountParams,
  ResolvedTokenTickerParams,
  ResolvedUnitParams,
} from "../descriptor/resolved";
import type { OutputCollector } from "../output/collector";
import { parseDescriptorPath, pathToString } from "../paths/parser";
import type { DataPath } from "../paths/types";
import type { MetadataConstantProvider } from "./constants";
import { resolveValue } from "./values";

export const ENUMS_PATH = "$.metadata.enums";

export interface ParamsContext {
  prefix: DataPath;
  enums: Record<string, EnumDefinition>;
  constants: MetadataConstantProvider;
  out: OutputCollector;
}

function parseParams<S extends z.ZodTypeAny>(
  schema: S,
  raw: Record<string, unknown>,
  out: OutputCollector
): z.infer<S> | null {
  const result = schema.safeParse(raw);
  if (!result.success) {
    return out.error(
      "validation",
      "Invalid display field parameters",
      `Error parsing display field parameters: ${formatZodError(result.error)}`
    );
  }
  return result.data;
}

/** Drop a map lookup with a warning; pass anything else through. */
function withoutMap<T>(value: T | MapReference | undefined, name: string, out: OutputCollector): T | undefined {
  if (!isMapReference(value)) return value;
  out.warning(
    "unsupported",
    "Unresolved map reference",
    `Map reference in ${name} cannot be resolved at conversion time and will be dropped.`
  );
  return undefined;
}

function toList(value: string | string[] | undefined, ctx: ParamsContext): string[] | undefined {
  if (value === undefined) return undefined;
  return (typeof value === "string" ? [value] : value).map((item) => ctx.constants.resolveString(item));
}

function toHexThreshold(value: Scalar, ctx: ParamsContext): `0x${string}` | null {
  const resolved = ctx.constants.resolve(value);
  let hex: string;
  if (typeof resolved === "number" && Number.isInteger(resolved) && resolved >= 0) {
    hex = resolved.toString(16);
  } else if (typeof resolved === "string" && /^0x[0-9a-fA-F]*$/.test(resolved)) {
    return `0x${resolved.slice(2).toLowerCase()}`;
  } else if (typeof resolved === "string" && /^\d+$/.test(resolved)) {
    hex = BigInt(resolved).toString(16);
  } else {
    return ctx.out.error("validation", "Invalid threshold", `Threshold "${String(value)}" is not a hex string or integer.`);
  }
  return `0x${hex.length % 2 === 0 ? hex : `0${hex}`}`;
}

// ── Per-kind resolvers ──────────────────────────────────────────────

function resolveAddressNameParams(
  kind: "addressName" | "interoperableAddressName",
  params: InputAddressNameParams,
  ctx: ParamsContext
): ResolvedAddressNameParams | null {
  const types = toList(params.types, ctx);
  const unknownType = types?.find((type) => !ADDRESS_NAME_TYPES.some((known) => known === type));
  if (unknownType !== undefined) {
    return ctx.out.error(
      "validation",
      "Invalid address name type",
      `Address name type "${unknownType}" is not one of ${ADDRESS_NAME_TYPES.join(", ")}.`
    );
  }
  const senderAddress = toList(withoutMap(params.senderAddress, "senderAddress", ctx.out), ctx);
  return {
    kind,
    types,
    sources: toList(params.sources, ctx),
    senderAddress: senderAddress?.map(lowercaseAddress),
  };
}

function resolveCalldataParams(params: InputCalldataParams, ctx: ParamsContext): ResolvedCalldataParams | null {
  const { prefix, constants, out } = ctx;
  const callee = withoutMap(params.callee, "callee", out);
  const calleeValue = resolveValue(prefix, params.calleePath, callee, constants, { address: true });
  if (calleeValue === undefined && !isMapReference(params.callee)) {
    return out.error("validation", "Invalid calldata parameters", 'Either "calleePath" or "callee" must be set.');
  }
  return {
    kind: "calldata",
    callee: calleeValue,
    selector: resolveValue(prefix, params.selectorPath, withoutMap(params.selector, "selector", out), constants),
    amount: resolveValue(prefix, params.amountPath, withoutMap(params.amount, "amount", out), constants),
    spender: resolveValue(prefix, params.spenderPath, withoutMap(params.spender, "spender", out), constants, {
      address: true,
    }),
    chainId: resolveValue(prefix, params.chainIdPath, withoutMap(params.chainId, "chainId", out), constants),
  };
}

function resolveTokenAmountParams(
  params: InputTokenAmountParams,
  ctx: ParamsContext
): ResolvedTokenAmountParams | null {
  const { prefix, constants, out } = ctx;
  let threshold: `0x${string}` | undefined;
  if (params.threshold !== undefined) {
    const resolved = toHexThreshold(params.threshold, ctx);
    if (resolved === null) return null;
    threshold = resolved;
  }
  const message = constants.resolveOrUndefined(params.message);
  return {
    kind: "tokenAmount",
    token: resolveValue(prefix, params.tokenPath, withoutMap(params.token, "token", out), constants, {
      address: true,
    }),
    nativeCurrencyAddress: toList(params.nativeCurrencyAddress, ctx)?.map(lowercaseAddress),
    threshold,
    message: message === undefined ? undefined : String(message),
    chainId: resolveValue(prefix, params.chainIdPath, withoutMap(params.chainId, "chainId", out), constants),
  };
}

function resolveTokenTickerParams(params: InputTokenTickerParams, ctx: ParamsContext): ResolvedTokenTickerParams {
  const { prefix, constants, out } = ctx;
  return {
    kind: "tokenTicker",
    chainId: resolveValue(prefix, params.chainIdPath, withoutMap(params.chainId, "chainId", out), constants),
  };
}

function resolveNftNameParams(params: InputNftNameParams, ctx: ParamsContext): ResolvedNftNameParams {
  const { prefix, constants, out } = ctx;
  return {
    kind: "nftName",
    collection: resolveValue(
      prefix,
      params.collectionPath,
      withoutMap(params.collection, "collection", out),
      constants,
      { address: true }
    ),
  };
}

function isDateEncoding(value: string): value is DateEncoding {
  return DATE_ENCODINGS.some((encoding) => encoding === value);
}

function resolveDateParams(params: InputDateParams, ctx: ParamsContext): ResolvedDateParams | null {
  const encoding = ctx.constants.resolveString(params.encoding);
  if (!isDateEncoding(encoding)) {
    return ctx.out.error(
      "validation",
      "Invalid date encoding",
      `Date encoding "${encoding}" is not one of ${DATE_ENCODINGS.join(", ")}.`
    );
  }
  return { kind: "date", encoding };
}

function resolveUnitParams(params: InputUnitParams, ctx: ParamsContext): ResolvedUnitParams {
  const { constants } = ctx;
  return {
    kind: "unit",
    base: constants.resolveString(params.base),
    decimals: params.decimals === undefined ? undefined : constants.resolveNumber(params.decimals),
    prefix: params.prefix === undefined ? undefined : constants.resolveBoolean(params.prefix),
  };
}

/** Enum references must name a table of `$.metadata.enums`; a dangling one cannot be rendered. */
function resolveEnumParams(params: InputEnumParams, ctx: ParamsContext): ResolvedEnumParams | null {
  const path = parseDescriptorPath(params.$ref);
  const [metadata, enums, id, ...rest] = path.elements;
  if (
    metadata?.type !== "field" ||
    metadata.identifier !== "metadata" ||
    enums?.type !== "field" ||
    enums.identifier !== "enums" ||
    id?.type !== "field" ||
    rest.length > 0
  ) {
    return ctx.out.error(
      "reference",
      "Invalid enum reference path",
      `Enum references must be immediately under ${ENUMS_PATH}, ${pathToString(path)} cannot be used.`
    );
  }
  if (ctx.enums[id.identifier] === undefined) {
    const known = Object.keys(ctx.enums);
    return ctx.out.error(
      "reference",
      "Invalid enum reference",
      `Enum "${id.identifier}" does not exist, valid ones are: ${known.length > 0 ? known.join(", ") : "none"}.`
    );
  }
  return { kind: "enum", enumId: id.identifier };
}

// ── Dispatch ────────────────────────────────────────────────────────

/**
 * Validate a raw parameter bag against the schema of `kind`, then resolve it.
 *
 * Throws the errors of the constant provider and path parser; callers report
 * them with `captureErrors`.
 */
export function resolveFieldParams(
  kind: ParamsKind,
  raw: Record<string, unknown>,
  ctx: ParamsContext
): ResolvedFieldParams | null {
  const { out } = ctx;
  switch (kind) {
    case "addressName":
    case "interoperableAddressName": {
      const params = parseParams(inputParamsSchemas[kind], raw, out);
      return params && resolveAddressNameParams(kind, params, ctx);
    }
    case "calldata": {
      const params = parseParams(inputParamsSchemas.calldata, raw, out);
      return params && resolveCalldataParams(params, ctx);
    }
    case "tokenAmount": {
      const params = parseParams(inputParamsSchemas.tokenAmount, raw, out);
      return params && resolveTokenAmountParams(params, ctx);
    }
    case "tokenTicker": {
      const params = parseParams(inputParamsSchemas.tokenTicker, raw, out);
      return params && resolveTokenTickerParams(params, ctx);
    }
    case "nftName": {
      const params = parseParams(inputParamsSchemas.nftName, raw, out);
      return params && resolveNftNameParams(params, ctx);
    }
    case "date": {
      const params = parseParams(inputParamsSchemas.date, raw, out);
      return params && resolveDateParams(params, ctx);
    }
    case "unit": {
      const params = parseParams(inputParamsSchemas.unit, raw, out);
      return params && resolveUnitParams(params, ctx);
    }
    case "enum": {
      const params = parseParams(inputParamsSchemas.enum, raw, out);
      return params && resolveEnumParams(params, ctx);
    }
  }
}
