import { FORMATS_REQUIRING_PARAMS, formatParamsKind } from "../descriptor/format";
import type {
  InputField,
  InputFieldDefinition,
  InputFieldDescription,
  InputFieldGroup,
} from "../descriptor/input";
import type { ResolvedField, ResolvedFieldDescription, ResolvedFieldParams } from "../descriptor/resolved";
import { captureErrors } from "../output/collector";
import { concatDataPath } from "../paths/ops";
import { pathToString } from "../paths/parser";
import type { DataPath } from "../paths/types";
import { resolveFieldParams, type ParamsContext } from "./parameters";
import { resolveReference } from "./references";
import { resolveFieldValue } from "./values";

export interface FieldsContext extends Omit<ParamsContext, "prefix"> {
  definitions: Record<string, InputFieldDefinition>;
}

function resolveFieldDescription(
  field: InputFieldDescription,
  ctx: ParamsContext
): ResolvedFieldDescription | null {
  const { out, constants } = ctx;
  const where = field.path ?? field.label;

  let params: ResolvedFieldParams | undefined;
  if (field.params !== undefined) {
    const kind = formatParamsKind(field.format) ?? field.paramsKind;
    if (kind !== undefined) {
      const resolved = resolveFieldParams(kind, field.params, ctx);
      if (resolved === null) return null;
      params = resolved;
    } else {
      out.warning(
        "validation",
        "Parameters ignored",
        `Field "${where}" has parameters that match no format, they are dropped.`
      );
    }
  } else if (field.format !== undefined && FORMATS_REQUIRING_PARAMS.has(field.format)) {
    return out.error(
      "validation",
      "Missing parameters",
      `Field format "${field.format}" requires parameters to be defined, they are missing for field "${where}".`
    );
  }

  const source = resolveFieldValue(ctx.prefix, field, constants, out);
  if (source === null) return null;

  return {
    kind: "field",
    id: field.$id,
    label: constants.resolveString(field.label),
    format: field.format,
    params,
    source,
    visible: field.visible,
    separator: field.separator,
    encryption: field.encryption,
  };
}

/**
 * A group scopes its children under its path. It is kept as a node when it
 * carries presentation of its own (a label or an iteration mode) and is
 * otherwise flattened into its parent.
 */
function resolveFieldGroup(
  prefix: DataPath,
  group: InputFieldGroup,
  ctx: FieldsContext
): ResolvedField[] | null {
  let path: DataPath | undefined;
  const groupPath = group.path;
  if (groupPath !== undefined) {
    const resolved = captureErrors(ctx.out, () => ctx.constants.resolvePath(groupPath));
    if (resolved === null) return null;
    if (resolved.type === "container") {
      return ctx.out.error(
        "path",
        "Invalid path type",
        `Container path ${pathToString(resolved)} cannot be used with field groups.`
      );
    }
    path = concatDataPath(prefix, resolved);
    if (path.elements.at(-1)?.type === "arraySlice") {
      return ctx.out.error("path", "Invalid field group", "Using field groups on an array slice is not allowed.");
    }
  }

  const fields = resolveFields(path ?? prefix, group.fields, ctx);
  if (fields === null) return null;

  // Groups without a label or iteration only scope their paths and are flattened.
  // A label or iteration is displayed, so the group keeps its node even without a path.
  if (group.label === undefined && group.iteration === undefined) return fields;

  return [
    {
      kind: "group",
      id: group.$id,
      path,
      label: group.label === undefined ? undefined : ctx.constants.resolveString(group.label),
      iteration: group.iteration,
      fields,
    },
  ];
}

function resolveField(prefix: DataPath, field: InputField, ctx: FieldsContext): ResolvedField[] | null {
  const paramsContext: ParamsContext = { ...ctx, prefix };
  switch (field.kind) {
    case "reference": {
      const resolved = captureErrors(ctx.out, () => resolveReference(field, ctx.definitions, paramsContext));
      return resolved && [resolved];
    }
    case "field": {
      const resolved = captureErrors(ctx.out, () => resolveFieldDescription(field, paramsContext));
      return resolved && [resolved];
    }
    case "group":
      return resolveFieldGroup(prefix, field, ctx);
  }
}

/**
 * Resolve fields depth-first under `prefix`. Every field is attempted so that
 * all defects are reported; the result is `null` if any of them failed.
 */
export function resolveFields(
  prefix: DataPath,
  fields: readonly InputField[],
  ctx: FieldsContext
): ResolvedField[] | null {
  const resolved: ResolvedField[] = [];
  let failed = false;
  for (const field of fields) {
    const result = resolveField(prefix, field, ctx);
    if (result === null) failed = true;
    else resolved.push(...result);
  }
  return failed ? null : resolved;
}
