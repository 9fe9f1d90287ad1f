import { z } from "zod";

export const FIELD_FORMATS = [
  "raw",
  "addressName",
  "interoperableAddressName",
  "tokenTicker",
  "calldata",
  "amount",
  "tokenAmount",
  "nftName",
  "date",
  "duration",
  "unit",
  "enum",
  "chainId",
] as const;

export const fieldFormatSchema = z.enum(FIELD_FORMATS);

export type FieldFormat = z.infer<typeof fieldFormatSchema>;

/** Formats whose parameters carry their own schema; the tag doubles as the parameter kind. */
export const PARAMS_KINDS = [
  "addressName",
  "interoperableAddressName",
  "calldata",
  "tokenAmount",
  "tokenTicker",
  "nftName",
  "date",
  "unit",
  "enum",
] as const;

export const paramsKindSchema = z.enum(PARAMS_KINDS);

export type ParamsKind = z.infer<typeof paramsKindSchema>;

/** Formats that cannot be rendered without parameters. */
export const FORMATS_REQUIRING_PARAMS: ReadonlySet<FieldFormat> = new Set<FieldFormat>([
  "addressName",
  "interoperableAddressName",
  "tokenTicker",
  "calldata",
  "nftName",
  "date",
  "unit",
  "enum",
]);

export function formatParamsKind(format: string | undefined): ParamsKind | undefined {
  return PARAMS_KINDS.find((kind) => kind === format);
}

export const DATE_ENCODINGS = ["timestamp", "blockheight"] as const;

export type DateEncoding = (typeof DATE_ENCODINGS)[number];

export const ADDRESS_NAME_TYPES = ["wallet", "eoa", "contract", "token", "collection"] as const;

export type AddressNameType = (typeof ADDRESS_NAME_TYPES)[number];

function hasAnyProperty(value: Record<string, unknown>, ...keys: string[]): boolean {
  return keys.some((key) => key in value);
}

/**
 * Guess the parameter kind of an untagged parameter bag from the keys it uses.
 * Only used while decoding JSON, when a field carries no `format`.
 *
 * `addressName` and `interoperableAddressName` share a shape; the former wins.
 */
export function sniffParamsKind(params: Record<string, unknown>): ParamsKind | undefined {
  const tokenKeys = ["tokenPath", "token", "nativeCurrencyAddress", "threshold", "message"];
  if (hasAnyProperty(params, ...tokenKeys)) return "tokenAmount";
  if (hasAnyProperty(params, "encoding")) return "date";
  if (hasAnyProperty(params, "collectionPath", "collection")) return "nftName";
  if (hasAnyProperty(params, "base")) return "unit";
  if (hasAnyProperty(params, "$ref")) return "enum";
  if (hasAnyProperty(params, "calleePath", "callee", "selector", "selectorPath")) return "calldata";
  if (
    hasAnyProperty(params, "chainId", "chainIdPath") &&
    !hasAnyProperty(params, ...tokenKeys, "types", "sources", "senderAddress")
  ) {
    return "tokenTicker";
  }
  if (hasAnyProperty(params, "types", "sources", "senderAddress")) return "addressName";
  return undefined;
}
