import { PathMismatchError } from "../output/errors";
import { pathToString } from "./parser";
import type { DataPath, DescriptorPath, Path, PathElement, ResolvedPath } from "./types";

export function elementEquals(a: PathElement, b: PathElement): boolean {
  switch (a.type) {
    case "field":
      return b.type === "field" && a.identifier === b.identifier;
    case "arrayElement":
      return b.type === "arrayElement" && a.index === b.index;
    case "arraySlice":
      return b.type === "arraySlice" && a.start === b.start && a.end === b.end;
    case "array":
      return b.type === "array";
  }
}

function elementsEqual(a: readonly PathElement[], b: readonly PathElement[]): boolean {
  return a.length === b.length && a.every((element, i) => elementEquals(element, b[i]));
}

export function pathEquals(a: Path, b: Path): boolean {
  switch (a.type) {
    case "container":
      return b.type === "container" && a.field === b.field;
    case "descriptor":
      return b.type === "descriptor" && elementsEqual(a.elements, b.elements);
    case "data":
      return b.type === "data" && a.absolute === b.absolute && elementsEqual(a.elements, b.elements);
  }
}

/** Concatenate data paths. An absolute child is returned unchanged. */
export function concatDataPath(parent: DataPath, child: DataPath): DataPath {
  if (child.absolute) return child;
  return { type: "data", absolute: parent.absolute, elements: [...parent.elements, ...child.elements] };
}

/** Concatenate a resolved path onto a data path prefix; container paths are already absolute. */
export function concatPath(parent: DataPath, child: ResolvedPath): ResolvedPath {
  return child.type === "container" ? child : concatDataPath(parent, child);
}

export function appendDataPath(parent: DataPath, ...elements: PathElement[]): DataPath {
  return { ...parent, elements: [...parent.elements, ...elements] };
}

export function startsWith(path: DataPath, prefix: DataPath): boolean;
export function startsWith(path: DescriptorPath, prefix: DescriptorPath): boolean;
export function startsWith(path: DataPath | DescriptorPath, prefix: DataPath | DescriptorPath): boolean {
  if (path.type === "data" && prefix.type === "data" && prefix.absolute && !path.absolute) return false;
  const elements: readonly PathElement[] = path.elements;
  const prefixElements: readonly PathElement[] = prefix.elements;
  if (elements.length < prefixElements.length) return false;
  return prefixElements.every((element, i) => elementEquals(element, elements[i]));
}

/**
 * Remove `prefix` from the start of `path`.
 *
 * @throws {PathMismatchError} if `path` does not start with every element of `prefix`
 */
export function stripPrefix(path: DataPath, prefix: DataPath): DataPath;
export function stripPrefix(path: DescriptorPath, prefix: DescriptorPath): DescriptorPath;
export function stripPrefix(
  path: DataPath | DescriptorPath,
  prefix: DataPath | DescriptorPath
): DataPath | DescriptorPath {
  if (path.type === "data" && prefix.type === "data") {
    if (!startsWith(path, prefix)) throw new PathMismatchError(pathToString(path), pathToString(prefix));
    return {
      type: "data",
      absolute: path.absolute && !prefix.absolute,
      elements: path.elements.slice(prefix.elements.length),
    };
  }
  if (path.type === "descriptor" && prefix.type === "descriptor") {
    if (!startsWith(path, prefix)) throw new PathMismatchError(pathToString(path), pathToString(prefix));
    return { type: "descriptor", elements: path.elements.slice(prefix.elements.length) };
  }
  throw new PathMismatchError(pathToString(path), pathToString(prefix));
}

/**
 * Replace concrete indices and slices with the array wildcard, so that a
 * reference such as `#.items.[3]` compares equal to the schema path `#.items.[]`.
 */
export function toSchemaPath(path: DataPath): DataPath {
  return {
    ...path,
    elements: path.elements.map((element): PathElement =>
      element.type === "field" ? element : { type: "array" }
    ),
  };
}

export function toAbsolute(path: DataPath): DataPath {
  return { ...path, absolute: true };
}

export function toRelative(path: DataPath): DataPath {
  return { ...path, absolute: false };
}

/** True if any element addresses into an array (index, slice or wildcard). */
export function hasArrayElement(path: DataPath): boolean {
  return path.elements.some((element) => element.type !== "field");
}
