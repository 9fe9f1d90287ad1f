import type { AbiFunction, AbiParameter, Eip712Field, Eip712Schema } from "../abi/types";
import type { ResolvedField, ResolvedFieldParams, ResolvedFormat, ResolvedValue } from "../descriptor/resolved";
import { ConversionError } from "../output/errors";
import { appendDataPath, toSchemaPath } from "./ops";
import { pathToString } from "./parser";
import { ROOT_DATA_PATH, type ContainerField, type DataPath } from "./types";

/**
 * Paths referenced by a format, split by kind. Data paths are schema paths
 * (array indices and slices collapsed to `[]`) rendered as strings, so sets
 * can be compared directly against the ABI / EIP-712 schema path sets.
 */
export interface FormatPaths {
  dataPaths: Set<string>;
  containerPaths: Set<ContainerField>;
}

const ARRAY_SUFFIX = /\[\d*\]$/;

/** Split `Type[2][]` into `Type` and one wildcard element per array dimension. */
function stripArraySuffixes(type: string): { base: string; dimensions: number } {
  let base = type;
  let dimensions = 0;
  while (ARRAY_SUFFIX.test(base)) {
    base = base.replace(ARRAY_SUFFIX, "");
    dimensions += 1;
  }
  return { base, dimensions };
}

/** Append one wildcard per dimension; `levels` collects each intermediate array path. */
function withArrays(path: DataPath, dimensions: number, levels?: Set<string>): DataPath {
  let current = path;
  for (let i = 0; i < dimensions; i++) {
    current = appendDataPath(current, { type: "array" });
    levels?.add(pathToString(current));
  }
  return current;
}

/**
 * Leaf schema paths of a function's inputs. Arrays and tuples contribute
 * their elements and components, not themselves.
 */
export function computeAbiSchemaPaths(fn: AbiFunction): Set<string> {
  const paths = new Set<string>();

  const visit = (path: DataPath, params: readonly AbiParameter[]): void => {
    for (const param of params) {
      const { dimensions } = stripArraySuffixes(param.type);
      const fieldPath = appendDataPath(path, { type: "field", identifier: param.name });
      const subPath = withArrays(fieldPath, dimensions);
      if (param.components !== undefined && param.components.length > 0) {
        visit(subPath, param.components);
      } else {
        paths.add(pathToString(subPath));
      }
    }
  };

  visit(ROOT_DATA_PATH, fn.inputs);
  return paths;
}

/**
 * Every addressable schema path of an EIP-712 message, starting at its
 * primary type: leaves, and each array level. Struct fields contribute their
 * members, not themselves.
 *
 * @throws {ConversionError} if the primary type is not defined
 */
export function computeEip712SchemaPaths(schema: Eip712Schema): Set<string> {
  const primary = schema.types[schema.primaryType];
  if (primary === undefined) {
    throw new ConversionError(
      "schema",
      "Invalid EIP-712 schema",
      `Invalid schema: primaryType ${schema.primaryType} not in types`
    );
  }
  const paths = new Set<string>();

  const visit = (path: DataPath, fields: readonly Eip712Field[], seen: ReadonlySet<string>): void => {
    for (const field of fields) {
      const { base, dimensions } = stripArraySuffixes(field.type);
      const fieldPath = appendDataPath(path, { type: "field", identifier: field.name });
      const subPath = withArrays(fieldPath, dimensions, paths);
      const struct = schema.types[base];
      // Recursive struct definitions are legal EIP-712; stop at the first repeat.
      if (struct !== undefined && !seen.has(base)) {
        visit(subPath, struct, new Set([...seen, base]));
      } else if (struct === undefined) {
        paths.add(pathToString(subPath));
      }
    }
  };

  visit(ROOT_DATA_PATH, primary, new Set([schema.primaryType]));
  return paths;
}

function paramsValues(params: ResolvedFieldParams | undefined): Array<ResolvedValue | undefined> {
  if (params === undefined) return [];
  switch (params.kind) {
    case "calldata":
      return [params.callee, params.selector, params.amount, params.spender, params.chainId];
    case "tokenAmount":
      return [params.token, params.chainId];
    case "tokenTicker":
      return [params.chainId];
    case "nftName":
      return [params.collection];
    case "addressName":
    case "interoperableAddressName":
    case "date":
    case "unit":
    case "enum":
      return [];
  }
}

/** Collect the paths a resolved format refers to, through fields, groups and parameters. */
export function computeFormatSchemaPaths(format: ResolvedFormat): FormatPaths {
  const result: FormatPaths = { dataPaths: new Set(), containerPaths: new Set() };

  const add = (value: ResolvedValue | undefined): void => {
    if (value === undefined || value.type !== "path") return;
    if (value.path.type === "container") {
      result.containerPaths.add(value.path.field);
    } else {
      result.dataPaths.add(pathToString(toSchemaPath(value.path)));
    }
  };

  const visit = (field: ResolvedField): void => {
    if (field.kind === "group") {
      field.fields.forEach(visit);
      return;
    }
    add(field.source);
    paramsValues(field.params).forEach(add);
  };

  format.fields.forEach(visit);
  return result;
}
