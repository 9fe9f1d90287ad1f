import { FORMATS_REQUIRING_PARAMS, formatParamsKind, type ParamsKind } from "../descriptor/format";
import type { InputFieldDefinition, InputReference } from "../descriptor/input";
import type { ResolvedFieldDescription, ResolvedFieldParams } from "../descriptor/resolved";
import { startsWith } from "../paths/ops";
import { parseDescriptorPath, pathToString } from "../paths/parser";
import type { DescriptorPath } from "../paths/types";
import { resolveFieldParams, type ParamsContext } from "./parameters";
import { resolveFieldValue } from "./values";

export const DEFINITIONS_PATH: DescriptorPath = {
  type: "descriptor",
  elements: [
    { type: "field", identifier: "display" },
    { type: "field", identifier: "definitions" },
  ],
};

function getDefinitionId(ref: string, ctx: ParamsContext): string | null {
  const path = parseDescriptorPath(ref);
  const root = pathToString(DEFINITIONS_PATH);
  if (!startsWith(path, DEFINITIONS_PATH)) {
    return ctx.out.error(
      "reference",
      "Invalid definition reference path",
      `References to display field definitions are restricted to ${root}, ${ref} cannot be used as a field definition reference.`
    );
  }
  const tail = path.elements.slice(DEFINITIONS_PATH.elements.length);
  const [element] = tail;
  if (tail.length !== 1 || element === undefined) {
    return ctx.out.error(
      "reference",
      "Invalid definition reference path",
      `References to display field definitions are restricted to fields immediately under ${root}, deep nesting is not allowed, ${ref} cannot be used as a field definition reference.`
    );
  }
  if (element.type !== "field") {
    return ctx.out.error(
      "reference",
      "Invalid definition reference path",
      `References to display field definitions are restricted to fields immediately under ${root}, array operators are not allowed, ${ref} cannot be used as a field definition reference.`
    );
  }
  return element.identifier;
}

/**
 * Inline a `$ref` to a shared field definition.
 *
 * Parameters are merged key by key, reference site over definition, then
 * validated as a whole against the definition's format.
 */
export function resolveReference(
  reference: InputReference,
  definitions: Record<string, InputFieldDefinition>,
  ctx: ParamsContext
): ResolvedFieldDescription | null {
  const { out, constants } = ctx;
  const id = getDefinitionId(reference.$ref, ctx);
  if (id === null) return null;

  const definition = definitions[id];
  if (definition === undefined) {
    return out.error(
      "reference",
      "Invalid display definition reference",
      `Display definition "${id}" does not exist, valid ones are: ${Object.keys(definitions).join(", ")}.`
    );
  }

  const label = reference.label ?? definition.label;
  if (label === undefined) {
    return out.error(
      "reference",
      "Missing display field label",
      `Label must be defined either on display field, or on the referenced display field definition ${reference.$ref}.`
    );
  }

  const merged: Record<string, unknown> = { ...definition.params, ...reference.params };
  let params: ResolvedFieldParams | undefined;

  if (Object.keys(merged).length > 0) {
    const kind: ParamsKind | undefined =
      formatParamsKind(definition.format) ?? definition.paramsKind ?? reference.paramsKind;
    if (kind !== undefined) {
      const resolved = resolveFieldParams(kind, merged, ctx);
      if (resolved === null) return null;
      params = resolved;
    } else {
      out.warning(
        "validation",
        "Parameters ignored",
        `Reference ${reference.$ref} has parameters that match no format, they are dropped.`
      );
    }
  } else if (definition.format !== undefined && FORMATS_REQUIRING_PARAMS.has(definition.format)) {
    return out.error(
      "validation",
      "Missing parameters",
      `Field format "${definition.format}" requires parameters to be defined, they are missing for reference ${reference.$ref}.`
    );
  }

  const source = resolveFieldValue(ctx.prefix, reference, constants, out);
  if (source === null) return null;

  return {
    kind: "field",
    label: constants.resolveString(label),
    format: definition.format,
    params,
    source,
  };
}
