import { lowercaseAddress } from "../abi/values";
import type { Scalar } from "../descriptor/input";
import type { ResolvedValue } from "../descriptor/resolved";
import type { OutputCollector } from "../output/collector";
import { concatPath } from "../paths/ops";
import type { DataPath } from "../paths/types";
import type { MetadataConstantProvider } from "./constants";

interface PathOrValue {
  path?: string;
  value?: Scalar;
}

/**
 * Resolve the source of a field: a path made absolute against `prefix`, or a
 * constant literal. Exactly one of the two must be given.
 */
export function resolveFieldValue(
  prefix: DataPath,
  field: PathOrValue,
  constants: MetadataConstantProvider,
  out: OutputCollector
): ResolvedValue | null {
  if (field.path !== undefined && field.value !== undefined) {
    return out.error("validation", "Invalid field", "Field cannot have both a path and a value.");
  }
  if (field.path === undefined && field.value === undefined) {
    return out.error("validation", "Invalid field", "Field must have either a path or a value.");
  }
  return resolveValue(prefix, field.path, field.value, constants);
}

/**
 * Resolve an optional parameter given as a `<name>Path` / `<name>` pair.
 * Returns `undefined` when neither is set.
 *
 * With `address`, constants must be addresses and are stored lowercase.
 */
export function resolveValue(
  prefix: DataPath,
  path: string | undefined,
  value: Scalar | undefined,
  constants: MetadataConstantProvider,
  options: { address?: boolean } = {}
): ResolvedValue | undefined {
  if (path !== undefined) {
    return { type: "path", path: concatPath(prefix, constants.resolvePath(path)) };
  }
  if (value === undefined) return undefined;
  const resolved = constants.resolve(value);
  if (options.address) {
    return { type: "constant", value: lowercaseAddress(String(resolved)) };
  }
  return { type: "constant", value: resolved };
}
