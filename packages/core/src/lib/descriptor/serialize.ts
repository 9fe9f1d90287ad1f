import { pathToString } from "../paths/parser";
import type {
  ResolvedDescriptor,
  ResolvedField,
  ResolvedFieldParams,
  ResolvedFormat,
  ResolvedValue,
} from "./resolved";

type JsonObject = Record<string, unknown>;

/** Write a value as the `<name>Path` / `<name>` pair used by the JSON document. */
function valueEntries(name: string, value: ResolvedValue | undefined): JsonObject {
  if (value === undefined) return {};
  return value.type === "path" ? { [`${name}Path`]: pathToString(value.path) } : { [name]: value.value };
}

function serializeParams(params: ResolvedFieldParams): JsonObject {
  switch (params.kind) {
    case "addressName":
    case "interoperableAddressName":
      return { types: params.types, sources: params.sources, senderAddress: params.senderAddress };
    case "calldata":
      return {
        ...valueEntries("callee", params.callee),
        ...valueEntries("selector", params.selector),
        ...valueEntries("amount", params.amount),
        ...valueEntries("spender", params.spender),
        ...valueEntries("chainId", params.chainId),
      };
    case "tokenAmount":
      return {
        ...valueEntries("token", params.token),
        nativeCurrencyAddress: params.nativeCurrencyAddress,
        threshold: params.threshold,
        message: params.message,
        ...valueEntries("chainId", params.chainId),
      };
    case "tokenTicker":
      return valueEntries("chainId", params.chainId);
    case "nftName":
      return valueEntries("collection", params.collection);
    case "date":
      return { encoding: params.encoding };
    case "unit":
      return { base: params.base, decimals: params.decimals, prefix: params.prefix };
    case "enum":
      return { $ref: `$.metadata.enums.${params.enumId}` };
  }
}

function serializeField(field: ResolvedField): JsonObject {
  if (field.kind === "group") {
    return {
      $id: field.id,
      path: field.path === undefined ? undefined : pathToString(field.path),
      label: field.label,
      iteration: field.iteration,
      fields: field.fields.map(serializeField),
    };
  }
  return {
    $id: field.id,
    ...(field.source.type === "path" ? { path: pathToString(field.source.path) } : { value: field.source.value }),
    label: field.label,
    format: field.format,
    params: field.params === undefined ? undefined : serializeParams(field.params),
    visible: field.visible,
    separator: field.separator,
    encryption: field.encryption,
  };
}

function serializeFormat(format: ResolvedFormat): JsonObject {
  return {
    $id: format.id,
    intent: format.intent,
    interpolatedIntent: format.interpolatedIntent,
    fields: format.fields.map(serializeField),
    required: format.required,
    excluded: format.excluded,
    screens: format.screens,
  };
}

/**
 * Render a resolved descriptor as its JSON document. Absent properties are
 * left `undefined` so that `JSON.stringify` omits them.
 */
export function serializeResolvedDescriptor(descriptor: ResolvedDescriptor): JsonObject {
  const { context } = descriptor;
  const serializedContext =
    context.type === "contract"
      ? {
          $id: context.id,
          contract: {
            abi: context.abi,
            deployments: context.deployments,
            addressMatcher: context.addressMatcher,
            factory: context.factory,
          },
        }
      : {
          $id: context.id,
          eip712: {
            domain: context.domain,
            domainSeparator: context.domainSeparator,
            schemas: context.schemas,
            deployments: context.deployments,
          },
        };

  const formats: JsonObject = {};
  for (const [key, format] of Object.entries(descriptor.display.formats)) {
    formats[key] = serializeFormat(format);
  }

  return {
    $schema: descriptor.$schema,
    $comment: descriptor.$comment,
    context: serializedContext,
    metadata: descriptor.metadata,
    display: { formats },
  };
}

export function stringifyResolvedDescriptor(descriptor: ResolvedDescriptor, compact = false): string {
  return JSON.stringify(serializeResolvedDescriptor(descriptor), null, compact ? undefined : 2);
}
