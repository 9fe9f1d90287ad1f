/**
 * Lowering of resolved values (data paths, container paths, constants) to
 * calldata values: data paths become a walk through the ABI encoding of the
 * function arguments.
 */

import { size } from "viem";
import type { AbiDataType } from "../../abi/types";
import { encodeValue } from "../../abi/values";
import type { FieldFormat } from "../../descriptor/format";
import type { ResolvedValue } from "../../descriptor/resolved";
import { captureErrors, type OutputCollector } from "../../output/collector";
import { ConversionError } from "../../output/errors";
import { pathToString } from "../../paths/parser";
import type { ContainerPath, DataPath, PathElement } from "../../paths/types";
import { headWords, type AbiTreeNode, type AbiTupleComponent, type AbiTupleNode } from "./abi-tree";
import type { AbiPathElement, CalldataValue, TypeFamily } from "./types";

const TYPE_FAMILIES: Record<AbiDataType, TypeFamily> = {
  uint: "UINT",
  int: "INT",
  ufixed: "UFIXED",
  fixed: "FIXED",
  address: "ADDRESS",
  bool: "BOOL",
  bytes: "BYTES",
  string: "STRING",
};

/** ABI type a constant is encoded as, given the format of the field displaying it. */
export function constantTypeOf(format: FieldFormat | undefined): AbiDataType {
  switch (format) {
    case undefined:
    case "raw":
      return "string";
    case "amount":
    case "tokenAmount":
    case "duration":
    case "date":
    case "unit":
    case "nftName":
    case "enum":
    case "chainId":
      return "uint";
    case "addressName":
    case "interoperableAddressName":
    case "tokenTicker":
      return "address";
    case "calldata":
      return "bytes";
  }
}

function invalidField(path: DataPath, reason: string): ConversionError {
  return new ConversionError(
    "schema",
    "Invalid display field",
    `Path "${pathToString(path)}" does not match the function ABI: ${reason}.`
  );
}

function arrayBounds(element: PathElement): { start?: number; end?: number } {
  switch (element.type) {
    case "arrayElement":
      return element.index === -1 ? { start: -1 } : { start: element.index, end: element.index + 1 };
    case "arraySlice":
      return { start: element.start, end: element.end };
    default:
      return {};
  }
}

function leafOf(path: DataPath, node: AbiTreeNode): { element: AbiPathElement; family: TypeFamily; size?: number } {
  switch (node.kind) {
    case "leaf":
      return {
        element: { type: "LEAF", leaf_type: node.dynamic ? "DYNAMIC_LEAF" : "STATIC_LEAF" },
        family: TYPE_FAMILIES[node.dataType],
        size: node.size,
      };
    case "array":
      if (node.element.kind !== "leaf") {
        throw new ConversionError(
          "unsupported",
          "Unsupported path",
          `Path "${pathToString(path)}" designates an array of structured values, which cannot be displayed.`
        );
      }
      return {
        element: { type: "LEAF", leaf_type: "ARRAY_LEAF" },
        family: TYPE_FAMILIES[node.element.dataType],
        size: node.element.size,
      };
    case "tuple":
      throw new ConversionError(
        "unsupported",
        "Unsupported path",
        `Path "${pathToString(path)}" designates a tuple, which cannot be displayed.`
      );
  }
}

/**
 * Walk a data path through the ABI tree of a function.
 *
 * Tuple members become offsets in the tuple head, dynamic values are followed
 * through their offset word, dynamic arrays are iterated with their element
 * weight and fixed-size array elements are addressed like tuple members.
 * A slice on a `bytes` or `string` leaf slices the value itself.
 *
 * @throws {ConversionError} if the path does not exist in the ABI or cannot be represented
 */
export function lowerDataPath(path: DataPath, root: AbiTupleNode): Extract<CalldataValue, { type: "path" }> {
  const elements: AbiPathElement[] = [];
  let node: AbiTreeNode = root;
  let byteSlice: { start?: number; end?: number } | undefined;

  for (const [i, element] of path.elements.entries()) {
    if (byteSlice !== undefined) {
      throw invalidField(path, "a byte slice must be the last path element");
    }

    if (element.type === "field") {
      if (node.kind !== "tuple") throw invalidField(path, `"${element.identifier}" is not a struct member`);
      let offset = 0;
      const component: AbiTupleComponent | undefined = node.components.find((candidate) => {
        if (candidate.name === element.identifier) return true;
        offset += headWords(candidate.node);
        return false;
      });
      if (component === undefined) throw invalidField(path, `no parameter named "${element.identifier}"`);
      elements.push({ type: "TUPLE", offset });
      node = component.node;
    } else if (node.kind === "array") {
      const weight = headWords(node.element);
      if (node.length === undefined) {
        elements.push({ type: "ARRAY", weight, ...arrayBounds(element) });
      } else if (element.type === "arrayElement") {
        const index = element.index < 0 ? node.length + element.index : element.index;
        if (index < 0 || index >= node.length) {
          throw invalidField(path, `index ${element.index} is out of bounds for an array of ${node.length}`);
        }
        elements.push({ type: "TUPLE", offset: index * weight });
      } else {
        throw new ConversionError(
          "unsupported",
          "Unsupported path",
          `Path "${pathToString(path)}" iterates over a fixed-size array, which is not supported.`
        );
      }
      node = node.element;
    } else if (node.kind === "leaf" && element.type === "arraySlice" && node.dynamic) {
      byteSlice = { start: element.start, end: element.end };
      continue;
    } else {
      throw invalidField(path, `element ${i} indexes a value that is not an array`);
    }

    if (node.dynamic) elements.push({ type: "REF" });
  }

  const leaf = leafOf(path, node);
  elements.push(leaf.element);
  if (byteSlice !== undefined) elements.push({ type: "SLICE", ...byteSlice });

  return { type: "path", type_family: leaf.family, type_size: leaf.size, abi_path: elements };
}

/** @throws {ConversionError} for `@.chainId`, which calldata cannot reference */
export function lowerContainerPath(path: ContainerPath): CalldataValue {
  switch (path.field) {
    case "from":
      return { type: "container", type_family: "ADDRESS", type_size: 20, container: "FROM" };
    case "to":
      return { type: "container", type_family: "ADDRESS", type_size: 20, container: "TO" };
    case "value":
      return { type: "container", type_family: "UINT", type_size: 32, container: "VALUE" };
    case "chainId":
      throw new ConversionError(
        "unsupported",
        "Unsupported path",
        `Container path "${pathToString(path)}" cannot be used in calldata descriptors.`
      );
  }
}

/**
 * Lower a resolved value. Constants are encoded as `constantType`.
 * Returns `null` after reporting an error.
 */
export function lowerValue(
  value: ResolvedValue,
  constantType: AbiDataType,
  root: AbiTupleNode,
  out: OutputCollector
): CalldataValue | null {
  if (value.type === "constant") {
    const raw = encodeValue(value.value, constantType, out);
    if (raw === null) return null;
    return { type: "constant", type_family: TYPE_FAMILIES[constantType], type_size: size(raw), value: value.value, raw };
  }
  const { path } = value;
  return captureErrors(out, () => (path.type === "data" ? lowerDataPath(path, root) : lowerContainerPath(path)));
}
