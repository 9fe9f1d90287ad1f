/**
 * Input descriptor model and its JSON decoder.
 *
 * Input descriptors are what authors write: ABIs, schemas and enums may be
 * URLs, fields may reference shared definitions and constants, and format
 * keys may be human-readable signatures. Untagged JSON unions (fields, field
 * parameters) are tagged here, once, so that resolution never has to guess.
 */

import { z } from "zod";
import { abiSchema, eip712SchemaSchema } from "../abi/types";
import {
  fieldFormatSchema,
  formatParamsKind,
  paramsKindSchema,
  sniffParamsKind,
  type FieldFormat,
  type ParamsKind,
} from "./format";

// ── Shared ──────────────────────────────────────────────────────────

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const ADDRESS = /^0x[a-fA-F0-9]{40}$/;

export const scalarSchema = z.union([z.string(), z.number(), z.boolean()]);

export type Scalar = z.infer<typeof scalarSchema>;

const deploymentSchema = z.object({
  chainId: z.number().int().positive(),
  address: z.string().regex(ADDRESS, "Invalid Ethereum address"),
});

export type InputDeployment = z.infer<typeof deploymentSchema>;

// ── Context ─────────────────────────────────────────────────────────

const contractContextSchema = z
  .object({
    $id: z.string().optional(),
    contract: z.object({
      abi: z.union([z.string().url(), abiSchema]).optional(),
      deployments: z.array(deploymentSchema).min(1),
      addressMatcher: z.string().optional(),
      factory: z
        .object({
          deployments: z.array(deploymentSchema).min(1),
          deployEvent: z.string(),
        })
        .optional(),
    }),
  })
  .transform((context) => ({ type: "contract" as const, ...context }));

const eip712DomainSchema = z.object({
  name: z.string().optional(),
  version: z.string().optional(),
  chainId: z.number().int().optional(),
  verifyingContract: z.string().regex(ADDRESS, "Invalid Ethereum address").optional(),
});

export type Eip712Domain = z.infer<typeof eip712DomainSchema>;

const eip712ContextSchema = z
  .object({
    $id: z.string().optional(),
    eip712: z.object({
      domain: eip712DomainSchema.optional(),
      domainSeparator: z.string().optional(),
      schemas: z.union([z.string().url(), z.array(z.union([z.string().url(), eip712SchemaSchema]))]).optional(),
      deployments: z.array(deploymentSchema).min(1),
    }),
  })
  .transform((context) => ({ type: "eip712" as const, ...context }));

const contextSchema = z.union([contractContextSchema, eip712ContextSchema]);

export type InputContractContext = z.infer<typeof contractContextSchema>;
export type InputEip712Context = z.infer<typeof eip712ContextSchema>;
export type InputContext = InputContractContext | InputEip712Context;

// ── Metadata ────────────────────────────────────────────────────────

export const enumDefinitionSchema = z.record(z.string());

export type EnumDefinition = z.infer<typeof enumDefinitionSchema>;

const tokenInfoSchema = z.object({
  name: z.string(),
  ticker: z.string(),
  decimals: z.number().int().nonnegative(),
});

export type TokenInfo = z.infer<typeof tokenInfoSchema>;

const ownerInfoSchema = z.object({
  legalName: z.string().optional(),
  lastUpdate: z.string().optional(),
  deploymentDate: z.string().optional(),
  url: z.string().optional(),
});

export type OwnerInfo = z.infer<typeof ownerInfoSchema>;

const mapDefinitionSchema = z.object({
  $keyType: z.string().optional(),
  values: z.record(z.unknown()),
});

export type MapDefinition = z.infer<typeof mapDefinitionSchema>;

const metadataSchema = z.object({
  owner: z.string().optional(),
  contractName: z.string().optional(),
  info: ownerInfoSchema.optional(),
  token: tokenInfoSchema.optional(),
  constants: z.record(scalarSchema.nullable()).optional(),
  enums: z.record(z.union([z.string().url(), enumDefinitionSchema])).optional(),
  maps: z.record(mapDefinitionSchema).optional(),
});

export type InputMetadata = z.infer<typeof metadataSchema>;

// ── Display ─────────────────────────────────────────────────────────

const paramsBagSchema = z.record(z.unknown());

const visibilitySchema = z.union([
  z.string(),
  z
    .object({
      ifNotIn: z.array(z.string()).optional(),
      mustBe: z.array(z.string()).optional(),
    })
    .refine((rules) => rules.ifNotIn !== undefined || rules.mustBe !== undefined, {
      message: 'At least one of "ifNotIn" or "mustBe" must be set.',
    }),
]);

export type VisibilityRule = z.infer<typeof visibilitySchema>;

const encryptionSchema = z.object({
  scheme: z.string(),
  plaintextType: z.string().optional(),
  fallbackLabel: z.string().optional(),
});

export type Encryption = z.infer<typeof encryptionSchema>;

/**
 * Tag a raw field (or definition) with its kind and, when the format does not
 * imply one, the kind guessed from the shape of its parameters.
 */
function tagField(raw: unknown): unknown {
  if (!isRecord(raw)) return raw;
  const kind = "$ref" in raw ? "reference" : "fields" in raw ? "group" : "field";
  const tagged: Record<string, unknown> = { kind, ...raw };
  if (isRecord(raw.params) && formatParamsKind(typeof raw.format === "string" ? raw.format : undefined) === undefined) {
    const sniffed = sniffParamsKind(raw.params);
    if (sniffed !== undefined) tagged.paramsKind = sniffed;
  }
  return tagged;
}

const definitionObjectSchema = z.object({
  $id: z.string().optional(),
  label: z.string().optional(),
  format: fieldFormatSchema.optional(),
  params: paramsBagSchema.optional(),
  paramsKind: paramsKindSchema.optional(),
});

export const inputFieldDefinitionSchema = z.preprocess(tagField, definitionObjectSchema);

export type InputFieldDefinition = z.infer<typeof definitionObjectSchema>;

const referenceSchema = z.object({
  kind: z.literal("reference"),
  $ref: z.string(),
  path: z.string().optional(),
  value: scalarSchema.optional(),
  label: z.string().optional(),
  params: paramsBagSchema.optional(),
  paramsKind: paramsKindSchema.optional(),
});

export type InputReference = z.infer<typeof referenceSchema>;

const fieldDescriptionSchema = z.object({
  kind: z.literal("field"),
  $id: z.string().optional(),
  path: z.string().optional(),
  value: scalarSchema.optional(),
  label: z.string(),
  format: fieldFormatSchema.optional(),
  params: paramsBagSchema.optional(),
  paramsKind: paramsKindSchema.optional(),
  visible: visibilitySchema.optional(),
  separator: z.string().optional(),
  encryption: encryptionSchema.optional(),
});

export type InputFieldDescription = z.infer<typeof fieldDescriptionSchema>;

export interface InputFieldGroup {
  kind: "group";
  $id?: string;
  path?: string;
  label?: string;
  iteration?: string;
  fields: InputField[];
}

export type InputField = InputReference | InputFieldDescription | InputFieldGroup;

const fieldGroupSchema: z.ZodType<InputFieldGroup, z.ZodTypeDef, unknown> = z.object({
  kind: z.literal("group"),
  $id: z.string().optional(),
  path: z.string().optional(),
  label: z.string().optional(),
  iteration: z.string().optional(),
  fields: z.array(z.lazy(() => inputFieldSchema)),
});

export const inputFieldSchema: z.ZodType<InputField, z.ZodTypeDef, unknown> = z.preprocess(
  tagField,
  z.union([referenceSchema, fieldDescriptionSchema, fieldGroupSchema])
);

const formatSchema = z.object({
  $id: z.string().optional(),
  intent: z.union([z.string(), z.record(z.string())]).optional(),
  interpolatedIntent: z.string().optional(),
  fields: z.array(inputFieldSchema),
  required: z.array(z.string()).optional(),
  excluded: z.array(z.string()).optional(),
  screens: z.record(z.unknown()).optional(),
});

export type InputFormat = z.infer<typeof formatSchema>;

const displaySchema = z.object({
  definitions: z.record(inputFieldDefinitionSchema).optional(),
  formats: z.record(formatSchema),
});

export type InputDisplay = z.infer<typeof displaySchema>;

// ── Descriptor ──────────────────────────────────────────────────────

export const inputDescriptorSchema = z.object({
  $schema: z.string().optional(),
  $comment: z.string().optional(),
  includes: z.string().optional(),
  context: contextSchema,
  metadata: metadataSchema,
  display: displaySchema,
});

export type InputDescriptor = z.infer<typeof inputDescriptorSchema>;

export type { FieldFormat, ParamsKind };

// ── Parser functions ────────────────────────────────────────────────

export interface ParseResult {
  success: true;
  descriptor: InputDescriptor;
}

export interface ParseError {
  success: false;
  error: string;
}

export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Parse and validate an input descriptor from JSON.
 */
export function parseInputDescriptor(json: unknown): ParseResult | ParseError {
  const result = inputDescriptorSchema.safeParse(json);
  if (!result.success) {
    return { success: false, error: `Invalid descriptor: ${formatZodError(result.error)}` };
  }
  return { success: true, descriptor: result.data };
}

/**
 * Parse an input descriptor from a JSON string.
 */
export function parseInputDescriptorFromString(jsonString: string): ParseResult | ParseError {
  let json: unknown;
  try {
    json = JSON.parse(jsonString);
  } catch (err) {
    return {
      success: false,
      error: `JSON parse error: ${err instanceof Error ? err.message : String(err)}`,
    };
  }
  return parseInputDescriptor(json);
}
