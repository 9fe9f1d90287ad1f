import { InvalidPathError } from "../output/errors";
import {
  CONTAINER_FIELDS,
  type ArraySliceElement,
  type ContainerField,
  type DataPath,
  type DescriptorPath,
  type DescriptorPathElement,
  type Path,
  type PathElement,
  type ResolvedPath,
} from "./types";

const IDENTIFIER = /^[a-zA-Z_$][a-zA-Z0-9_$]*/;
const INDEX = /^-?\d+$/;
const SLICE = /^(-?\d+)?:(-?\d+)?$/;

function isContainerField(value: string): value is ContainerField {
  return CONTAINER_FIELDS.some((field) => field === value);
}

function parseBracket(raw: string, content: string): PathElement {
  if (content === "") return { type: "array" };
  if (INDEX.test(content)) return { type: "arrayElement", index: Number(content) };
  const slice = SLICE.exec(content);
  if (slice) {
    const element: ArraySliceElement = { type: "arraySlice" };
    if (slice[1] !== undefined) element.start = Number(slice[1]);
    if (slice[2] !== undefined) element.end = Number(slice[2]);
    return element;
  }
  throw new InvalidPathError(raw, `invalid array element "[${content}]"`);
}

/**
 * Parse dot-separated path elements. Array elements may follow an identifier
 * directly (`items[0]`) or as their own segment (`items.[0]`).
 */
function parseElements(raw: string, body: string): PathElement[] {
  const elements: PathElement[] = [];
  let i = 0;

  while (i < body.length) {
    if (body[i] === "[") {
      const close = body.indexOf("]", i);
      if (close === -1) throw new InvalidPathError(raw, "unterminated array element");
      elements.push(parseBracket(raw, body.slice(i + 1, close)));
      i = close + 1;
    } else {
      const match = IDENTIFIER.exec(body.slice(i));
      if (!match) throw new InvalidPathError(raw, `unexpected character "${body[i]}"`);
      elements.push({ type: "field", identifier: match[0] });
      i += match[0].length;
    }

    if (i === body.length) break;
    if (body[i] === ".") {
      i += 1;
      if (i === body.length) throw new InvalidPathError(raw, "trailing separator");
    } else if (body[i] !== "[") {
      throw new InvalidPathError(raw, `unexpected character "${body[i]}"`);
    }
  }

  return elements;
}

export function parseDataPath(raw: string): DataPath {
  if (raw === "#") return { type: "data", absolute: true, elements: [] };
  if (raw.startsWith("#.")) {
    return { type: "data", absolute: true, elements: parseElements(raw, raw.slice(2)) };
  }
  if (raw === "" || /^[#@$]/.test(raw)) {
    throw new InvalidPathError(raw, "expected a data path");
  }
  return { type: "data", absolute: false, elements: parseElements(raw, raw) };
}

export function parseDescriptorPath(raw: string): DescriptorPath {
  if (raw !== "$" && !raw.startsWith("$.")) {
    throw new InvalidPathError(raw, "expected a descriptor path");
  }
  const elements: DescriptorPathElement[] = [];
  for (const element of raw === "$" ? [] : parseElements(raw, raw.slice(2))) {
    if (element.type !== "field" && element.type !== "arrayElement") {
      throw new InvalidPathError(raw, "descriptor paths only support fields and array indices");
    }
    elements.push(element);
  }
  return { type: "descriptor", elements };
}

export function parsePath(raw: string): Path {
  if (raw.startsWith("@")) {
    const field = raw.slice(2);
    if (!raw.startsWith("@.") || !isContainerField(field)) {
      throw new InvalidPathError(raw, `unknown container field, expected one of ${CONTAINER_FIELDS.join(", ")}`);
    }
    return { type: "container", field };
  }
  if (raw.startsWith("$")) return parseDescriptorPath(raw);
  return parseDataPath(raw);
}

/** Parse a path that may appear in a resolved descriptor (data or container path). */
export function parseResolvedPath(raw: string): ResolvedPath {
  const path = parsePath(raw);
  if (path.type === "descriptor") {
    throw new InvalidPathError(raw, "descriptor paths are not allowed here");
  }
  return path;
}

export function isDescriptorPathString(value: unknown): value is string {
  return typeof value === "string" && (value === "$" || value.startsWith("$."));
}

/** True for strings carrying an explicit path sigil (`#`, `@.`, `$.`). */
export function isPathString(value: unknown): value is string {
  return (
    typeof value === "string" &&
    (value === "#" || value.startsWith("#.") || value.startsWith("@.") || isDescriptorPathString(value))
  );
}

// ── Rendering ───────────────────────────────────────────────────────

export function elementToString(element: PathElement): string {
  switch (element.type) {
    case "field":
      return element.identifier;
    case "arrayElement":
      return `[${element.index}]`;
    case "arraySlice":
      return `[${element.start ?? ""}:${element.end ?? ""}]`;
    case "array":
      return "[]";
  }
}

export function pathToString(path: Path): string {
  switch (path.type) {
    case "container":
      return `@.${path.field}`;
    case "descriptor":
      return path.elements.length === 0 ? "$" : `$.${path.elements.map(elementToString).join(".")}`;
    case "data": {
      const body = path.elements.map(elementToString).join(".");
      if (!path.absolute) return body;
      return body === "" ? "#" : `#.${body}`;
    }
  }
}
