import type { OutputCollector } from "../output/collector";

export const TRUSTED_NAME_TYPES = [
  "eoa",
  "smart_contract",
  "collection",
  "token",
  "wallet",
  "context_address",
] as const;

export type TrustedNameType = (typeof TRUSTED_NAME_TYPES)[number];

export const TRUSTED_NAME_SOURCES = [
  "local_address_book",
  "crypto_asset_list",
  "ens",
  "unstoppable_domain",
  "freename",
  "dns",
  "dynamic_resolver",
] as const;

export type TrustedNameSource = (typeof TRUSTED_NAME_SOURCES)[number];

const TYPE_BY_ADDRESS_NAME_TYPE: Record<string, TrustedNameType> = {
  wallet: "wallet",
  eoa: "eoa",
  contract: "smart_contract",
  token: "token",
  collection: "collection",
};

const DEFAULT_SOURCES: Record<TrustedNameType, TrustedNameSource[]> = {
  eoa: ["ens", "unstoppable_domain", "freename"],
  wallet: ["ens", "unstoppable_domain", "freename"],
  collection: ["ens", "unstoppable_domain", "freename"],
  smart_contract: ["crypto_asset_list"],
  token: ["crypto_asset_list"],
  context_address: ["dynamic_resolver"],
};

function unique<T>(values: T[]): T[] {
  return [...new Set(values)];
}

function isTrustedNameSource(value: string): value is TrustedNameSource {
  return TRUSTED_NAME_SOURCES.some((source) => source === value);
}

/** Map descriptor address name types (`contract`, `eoa`...) to device name types. */
export function toTrustedNameTypes(types: readonly string[]): TrustedNameType[] {
  return unique(
    types.flatMap((type) => {
      const mapped = TYPE_BY_ADDRESS_NAME_TYPE[type];
      return mapped === undefined ? [] : [mapped];
    })
  );
}

/**
 * Name sources a device should query: the usual sources of each name type,
 * followed by the explicitly listed ones. `local` stands for the address book.
 */
export function toTrustedNameSources(
  sources: readonly string[],
  types: readonly TrustedNameType[],
  out: OutputCollector
): TrustedNameSource[] {
  const result = types.flatMap((type) => DEFAULT_SOURCES[type]);
  for (const source of sources) {
    const normalized = source.toLowerCase();
    if (normalized === "local") {
      result.push("local_address_book");
    } else if (isTrustedNameSource(normalized)) {
      result.push(normalized);
    } else {
      out.warning("unsupported", "Unknown name source", `Address name source "${source}" is not known and is ignored.`);
    }
  }
  return unique(result);
}
