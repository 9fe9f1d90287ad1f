/**
 * Input to resolved descriptor conversion.
 *
 * Runs three stages in order, context, metadata and display, and stops at the
 * first one that fails. Within display, every format and field is attempted
 * so that all defects are reported in one pass.
 */

import { z } from "zod";
import { isSelector, reduceSignature, signatureToSelector } from "../abi/signature";
import { abiSchema, eip712SchemaSchema, type AbiEntry, type Eip712Schema } from "../abi/types";
import { lowercaseAddress } from "../abi/values";
import {
  enumDefinitionSchema,
  type EnumDefinition,
  type InputContext,
  type InputDeployment,
  type InputDescriptor,
  type InputDisplay,
  type InputFormat,
  type InputMetadata,
} from "../descriptor/input";
import type {
  ResolvedContext,
  ResolvedDeployment,
  ResolvedDescriptor,
  ResolvedFormat,
  ResolvedMetadata,
} from "../descriptor/resolved";
import type { Fetcher } from "../fetch/service";
import { OutputCollector, captureErrorsAsync } from "../output/collector";
import type { OutputSink } from "../output/types";
import { ROOT_DATA_PATH } from "../paths/types";
import { MetadataConstantProvider } from "./constants";
import { resolveFields, type FieldsContext } from "./fields";

export interface ResolveOptions {
  /** Needed when the descriptor references ABIs, schemas or enums by URL. */
  fetcher?: Fetcher;
  out: OutputCollector;
}

async function fetchJson<T>(
  url: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  what: string,
  { fetcher, out }: ResolveOptions
): Promise<T | null> {
  if (fetcher === undefined) {
    return out.error("fetch", `Failed to fetch ${what}`, `No fetcher is configured to retrieve ${what} from "${url}".`);
  }
  return captureErrorsAsync(out, () => fetcher.getJson(url, schema));
}

// ── Context ─────────────────────────────────────────────────────────

function resolveDeployments(deployments: readonly InputDeployment[]): ResolvedDeployment[] {
  return deployments.map((deployment) => ({
    chainId: deployment.chainId,
    address: lowercaseAddress(deployment.address),
  }));
}

async function resolveAbi(
  abi: string | AbiEntry[] | undefined,
  options: ResolveOptions
): Promise<AbiEntry[] | null | undefined> {
  if (typeof abi !== "string") return abi;
  return fetchJson(abi, abiSchema, "ABI", options);
}

async function resolveSchemas(
  schemas: string | Array<string | Eip712Schema> | undefined,
  options: ResolveOptions
): Promise<Eip712Schema[] | null | undefined> {
  if (schemas === undefined) return undefined;
  if (typeof schemas === "string") return fetchJson(schemas, z.array(eip712SchemaSchema), "EIP-712 schemas", options);

  const resolved = await Promise.all(
    schemas.map((schema) =>
      typeof schema === "string" ? fetchJson(schema, eip712SchemaSchema, "EIP-712 schema", options) : schema
    )
  );
  const result: Eip712Schema[] = [];
  for (const schema of resolved) {
    if (schema === null) return null;
    result.push(schema);
  }
  return result;
}

async function resolveContext(context: InputContext, options: ResolveOptions): Promise<ResolvedContext | null> {
  switch (context.type) {
    case "contract": {
      const { contract } = context;
      const abi = await resolveAbi(contract.abi, options);
      if (abi === null) return null;
      return {
        type: "contract",
        id: context.$id,
        abi,
        deployments: resolveDeployments(contract.deployments),
        addressMatcher: contract.addressMatcher,
        factory:
          contract.factory === undefined
            ? undefined
            : {
                deployments: resolveDeployments(contract.factory.deployments),
                deployEvent: contract.factory.deployEvent,
              },
      };
    }
    case "eip712": {
      const { eip712 } = context;
      const schemas = await resolveSchemas(eip712.schemas, options);
      if (schemas === null) return null;
      const domain = eip712.domain;
      return {
        type: "eip712",
        id: context.$id,
        domain:
          domain === undefined
            ? undefined
            : {
                ...domain,
                verifyingContract:
                  domain.verifyingContract === undefined ? undefined : lowercaseAddress(domain.verifyingContract),
              },
        domainSeparator: eip712.domainSeparator,
        schemas,
        deployments: resolveDeployments(eip712.deployments),
      };
    }
  }
}

// ── Metadata ────────────────────────────────────────────────────────

/** `null` once an enum could not be fetched; the fetch error is already reported. */
async function resolveMetadata(metadata: InputMetadata, options: ResolveOptions): Promise<ResolvedMetadata | null> {
  let enums: Record<string, EnumDefinition> | undefined;
  if (metadata.enums !== undefined) {
    const entries = await Promise.all(
      Object.entries(metadata.enums).map(async ([id, definition]) => {
        const resolved =
          typeof definition === "string"
            ? await fetchJson(definition, enumDefinitionSchema, `enum "${id}"`, options)
            : definition;
        return [id, resolved] as const;
      })
    );
    enums = {};
    for (const [id, definition] of entries) {
      if (definition === null) return null;
      enums[id] = definition;
    }
  }

  return {
    owner: metadata.owner,
    contractName: metadata.contractName,
    info: metadata.info,
    token: metadata.token,
    constants: metadata.constants,
    enums,
    maps: metadata.maps,
  };
}

// ── Display ─────────────────────────────────────────────────────────

/**
 * Normalize a format key: contract formats are keyed by lowercase selector,
 * human-readable signatures are hashed; EIP-712 keys are kept as they are.
 */
export function resolveFormatKey(key: string, context: ResolvedContext, out: OutputCollector): string | null {
  if (context.type === "eip712") return key;
  if (key.startsWith("0x")) {
    if (!isSelector(key)) {
      return out.error("parse", "Invalid selector", `"${key}" is not a valid function selector.`);
    }
    return key.toLowerCase();
  }
  try {
    return signatureToSelector(reduceSignature(key));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return out.error("parse", "Invalid selector", `"${key}" is not a valid function signature or selector: ${reason}`);
  }
}

function resolveFormat(format: InputFormat, ctx: FieldsContext): ResolvedFormat | null {
  const fields = resolveFields(ROOT_DATA_PATH, format.fields, ctx);
  if (fields === null) return null;
  return {
    id: format.$id,
    intent: format.intent,
    interpolatedIntent: format.interpolatedIntent,
    fields,
    required: format.required,
    excluded: format.excluded,
    screens: format.screens,
  };
}

function resolveDisplay(
  display: InputDisplay,
  context: ResolvedContext,
  ctx: FieldsContext
): Record<string, ResolvedFormat> | null {
  const { out } = ctx;
  const formats: Record<string, ResolvedFormat> = {};
  let failed = false;

  for (const [key, format] of Object.entries(display.formats)) {
    const resolvedKey = resolveFormatKey(key, context, out);
    const resolvedFormat = resolveFormat(format, ctx);
    if (resolvedKey === null || resolvedFormat === null) {
      failed = true;
      continue;
    }
    if (resolvedKey in formats) {
      out.error("validation", "Duplicate format", `Descriptor contains 2 formats sections for ${resolvedKey}`);
      failed = true;
      continue;
    }
    formats[resolvedKey] = resolvedFormat;
  }

  return failed ? null : formats;
}

// ── Entry point ─────────────────────────────────────────────────────

/**
 * Resolve an input descriptor. Returns `null` if any error was reported;
 * warnings alone do not prevent a result.
 */
export async function resolveDescriptor(
  input: InputDescriptor,
  options: ResolveOptions
): Promise<ResolvedDescriptor | null> {
  const { out } = options;
  const errorsBefore = out.errorCount;

  if (input.includes !== undefined) {
    out.warning(
      "unsupported",
      "Includes not merged",
      `Descriptor includes "${input.includes}", which is not merged; resolve the merged document instead.`
    );
  }

  const context = await captureErrorsAsync(out, () => resolveContext(input.context, options));
  if (context === null) return null;

  const metadata = await captureErrorsAsync(out, () => resolveMetadata(input.metadata, options));
  if (metadata === null || out.errorCount > errorsBefore) return null;

  const formats = resolveDisplay(input.display, context, {
    definitions: input.display.definitions ?? {},
    enums: metadata.enums ?? {},
    constants: new MetadataConstantProvider(input.metadata.constants),
    out,
  });

  if (formats === null || out.errorCount > errorsBefore) return null;

  return {
    $schema: input.$schema,
    $comment: input.$comment,
    context,
    metadata,
    display: { formats },
  };
}

/** Resolve with a fresh collector; returns the result and every reported entry. */
export async function resolveDescriptorWithReport(
  input: InputDescriptor,
  options: { fetcher?: Fetcher; sink?: OutputSink } = {}
) {
  const out = new OutputCollector(options.sink);
  const descriptor = await resolveDescriptor(input, { fetcher: options.fetcher, out });
  return { descriptor, entries: out.entries };
}
