import { abiTypeSize, toAbiDataType, type AbiDataType, type AbiFunction, type AbiParameter } from "../../abi/types";
import { ConversionError } from "../../output/errors";

// ── Types ───────────────────────────────────────────────────────────

export interface AbiLeafNode {
  kind: "leaf";
  type: string;
  dataType: AbiDataType;
  /** Byte size of the value, undefined for `string` and `bytes`. */
  size?: number;
  dynamic: boolean;
}

export interface AbiTupleComponent {
  name: string;
  node: AbiTreeNode;
}

export interface AbiTupleNode {
  kind: "tuple";
  components: AbiTupleComponent[];
  dynamic: boolean;
}

export interface AbiArrayNode {
  kind: "array";
  element: AbiTreeNode;
  /** Set for fixed-size arrays. */
  length?: number;
  dynamic: boolean;
}

export type AbiTreeNode = AbiLeafNode | AbiTupleNode | AbiArrayNode;

// ── Construction ────────────────────────────────────────────────────

const ARRAY_TYPE = /^(.*)\[(\d*)\]$/;

function tupleNode(components: readonly AbiParameter[]): AbiTupleNode {
  const nodes = components.map((component) => ({ name: component.name, node: parameterToAbiTree(component) }));
  return { kind: "tuple", components: nodes, dynamic: nodes.some(({ node }) => node.dynamic) };
}

function typeToAbiTree(type: string, components: readonly AbiParameter[] | undefined): AbiTreeNode {
  const array = ARRAY_TYPE.exec(type);
  if (array) {
    const element = typeToAbiTree(array[1], components);
    const length = array[2] === "" ? undefined : Number(array[2]);
    return { kind: "array", element, length, dynamic: length === undefined || element.dynamic };
  }

  if (type === "tuple") return tupleNode(components ?? []);

  const dataType = toAbiDataType(type);
  if (dataType === undefined) {
    throw new ConversionError("schema", "Invalid ABI", `ABI type "${type}" is not supported`);
  }
  const size = abiTypeSize(type);
  return { kind: "leaf", type, dataType, size, dynamic: size === undefined };
}

export function parameterToAbiTree(param: AbiParameter): AbiTreeNode {
  return typeToAbiTree(param.type, param.components);
}

/** The calldata arguments of a function, laid out as a tuple. */
export function functionToAbiTree(fn: AbiFunction): AbiTupleNode {
  return tupleNode(fn.inputs);
}

/**
 * Number of 32-byte words a node takes in the head of its enclosing tuple or
 * array. Dynamic nodes take one word holding the offset to their data.
 */
export function headWords(node: AbiTreeNode): number {
  if (node.dynamic) return 1;
  switch (node.kind) {
    case "leaf":
      return 1;
    case "tuple":
      return node.components.reduce((total, component) => total + headWords(component.node), 0);
    case "array":
      return (node.length ?? 0) * headWords(node.element);
  }
}
