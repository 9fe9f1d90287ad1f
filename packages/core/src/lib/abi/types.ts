import { z } from "zod";

// ── JSON ABI ────────────────────────────────────────────────────────

export interface AbiParameter {
  name: string;
  type: string;
  internalType?: string;
  indexed?: boolean;
  components?: AbiParameter[];
}

export const abiParameterSchema: z.ZodType<AbiParameter, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    name: z.string().default(""),
    type: z.string(),
    internalType: z.string().optional(),
    indexed: z.boolean().optional(),
    components: z.array(abiParameterSchema).optional(),
  })
);

export const abiEntrySchema = z
  .object({
    type: z.enum(["function", "constructor", "receive", "fallback", "event", "error"]).default("function"),
    name: z.string().optional(),
    inputs: z.array(abiParameterSchema).optional(),
    outputs: z.array(abiParameterSchema).optional(),
    stateMutability: z.enum(["pure", "view", "nonpayable", "payable"]).optional(),
    constant: z.boolean().optional(),
    payable: z.boolean().optional(),
    anonymous: z.boolean().optional(),
  })
  .passthrough();

export const abiSchema = z.array(abiEntrySchema);

export type AbiEntry = z.infer<typeof abiEntrySchema>;

/** A contract function: the part of an ABI entry needed to address and encode its inputs. */
export interface AbiFunction {
  name: string;
  inputs: AbiParameter[];
}

// ── EIP-712 ─────────────────────────────────────────────────────────

export const eip712FieldSchema = z.object({
  name: z.string(),
  type: z.string(),
});

export const eip712SchemaSchema = z.object({
  primaryType: z.string(),
  types: z.record(z.array(eip712FieldSchema)),
});

export type Eip712Field = z.infer<typeof eip712FieldSchema>;
export type Eip712Schema = z.infer<typeof eip712SchemaSchema>;

// ── Scalar ABI data types ───────────────────────────────────────────

export type AbiDataType = "uint" | "int" | "ufixed" | "fixed" | "address" | "bool" | "bytes" | "string";

/**
 * Map a concrete ABI type (`uint256`, `bytes32`, `ufixed128x18`...) to its
 * data type family. Returns `undefined` for arrays and tuples.
 */
export function toAbiDataType(type: string): AbiDataType | undefined {
  if (/^uint\d*$/.test(type)) return "uint";
  if (/^int\d*$/.test(type)) return "int";
  if (/^ufixed(\d+x\d+)?$/.test(type)) return "ufixed";
  if (/^fixed(\d+x\d+)?$/.test(type)) return "fixed";
  if (/^bytes\d*$/.test(type)) return "bytes";
  if (type === "address" || type === "bool" || type === "string") return type;
  return undefined;
}

/** Size in bytes of a fixed-width scalar ABI type, `undefined` for dynamic ones. */
export function abiTypeSize(type: string): number | undefined {
  if (type === "address") return 20;
  if (type === "bool") return 1;
  const sized = /^(?:u?int|bytes)(\d+)$/.exec(type);
  if (sized) return type.startsWith("bytes") ? Number(sized[1]) : Number(sized[1]) / 8;
  if (/^u?int$/.test(type)) return 32;
  const fixed = /^u?fixed(\d+)x\d+$/.exec(type);
  if (fixed) return Number(fixed[1]) / 8;
  if (/^u?fixed$/.test(type)) return 16;
  return undefined;
}

export function isElementaryType(type: string): boolean {
  return toAbiDataType(type) !== undefined;
}
