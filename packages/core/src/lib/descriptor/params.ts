/**
 * Input schemas of format-specific field parameters.
 *
 * Every sub-field accepts a literal or a `$.metadata.constants.*` path, and
 * the newer descriptor generation also allows `{ map, keyPath }` map lookups,
 * which are only resolvable by a wallet at signing time.
 */

import { z } from "zod";
import type { ParamsKind } from "./format";

export const mapReferenceSchema = z.object({
  map: z.string(),
  keyPath: z.string(),
});

export type MapReference = z.infer<typeof mapReferenceSchema>;

export function isMapReference(value: unknown): value is MapReference {
  return mapReferenceSchema.safeParse(value).success;
}

const stringOrList = z.union([z.string(), z.array(z.string()).min(1)]);

const addressNameParamsSchema = z.object({
  types: stringOrList.optional(),
  sources: stringOrList.optional(),
  senderAddress: z.union([stringOrList, mapReferenceSchema]).optional(),
});

const calldataParamsSchema = z
  .object({
    calleePath: z.string().optional(),
    callee: z.union([z.string(), mapReferenceSchema]).optional(),
    selectorPath: z.string().optional(),
    selector: z.union([z.string(), mapReferenceSchema]).optional(),
    amountPath: z.string().optional(),
    amount: z.union([z.number().int(), z.string(), mapReferenceSchema]).optional(),
    spenderPath: z.string().optional(),
    spender: z.union([z.string(), mapReferenceSchema]).optional(),
    chainId: z.union([z.number().int(), z.string(), mapReferenceSchema]).optional(),
    chainIdPath: z.string().optional(),
  })
  .superRefine((params, ctx) => {
    for (const [pathKey, valueKey] of [
      ["calleePath", "callee"],
      ["selectorPath", "selector"],
      ["amountPath", "amount"],
      ["spenderPath", "spender"],
      ["chainIdPath", "chainId"],
    ] as const) {
      if (params[pathKey] !== undefined && params[valueKey] !== undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${pathKey}" and "${valueKey}" are mutually exclusive.` });
      }
    }
    if (params.calleePath === undefined && params.callee === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Either "calleePath" or "callee" must be set.' });
    }
  });

const tokenAmountParamsSchema = z
  .object({
    tokenPath: z.string().optional(),
    token: z.union([z.string(), mapReferenceSchema]).optional(),
    nativeCurrencyAddress: stringOrList.optional(),
    threshold: z.union([z.string(), z.number().int().nonnegative()]).optional(),
    message: z.string().optional(),
    chainId: z.union([z.number().int(), z.string(), mapReferenceSchema]).optional(),
    chainIdPath: z.string().optional(),
  })
  .superRefine((params, ctx) => {
    if (params.tokenPath !== undefined && params.token !== undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: '"tokenPath" and "token" are mutually exclusive.' });
    }
    if (params.chainId !== undefined && params.chainIdPath !== undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: '"chainId" and "chainIdPath" are mutually exclusive.' });
    }
  });

const tokenTickerParamsSchema = z
  .object({
    chainId: z.union([z.number().int(), z.string(), mapReferenceSchema]).optional(),
    chainIdPath: z.string().optional(),
  })
  .refine((params) => params.chainId === undefined || params.chainIdPath === undefined, {
    message: '"chainId" and "chainIdPath" are mutually exclusive.',
  });

const nftNameParamsSchema = z
  .object({
    collectionPath: z.string().optional(),
    collection: z.union([z.string(), mapReferenceSchema]).optional(),
  })
  .refine((params) => (params.collectionPath === undefined) !== (params.collection === undefined), {
    message: 'Exactly one of "collectionPath" or "collection" must be set.',
  });

const dateParamsSchema = z.object({
  encoding: z.string(),
});

const unitParamsSchema = z.object({
  base: z.string(),
  decimals: z.union([z.number().int().nonnegative(), z.string()]).optional(),
  prefix: z.union([z.boolean(), z.string()]).optional(),
});

const enumParamsSchema = z.object({
  $ref: z.string(),
});

export const inputParamsSchemas = {
  addressName: addressNameParamsSchema,
  interoperableAddressName: addressNameParamsSchema,
  calldata: calldataParamsSchema,
  tokenAmount: tokenAmountParamsSchema,
  tokenTicker: tokenTickerParamsSchema,
  nftName: nftNameParamsSchema,
  date: dateParamsSchema,
  unit: unitParamsSchema,
  enum: enumParamsSchema,
} satisfies Record<ParamsKind, z.ZodTypeAny>;

export type InputAddressNameParams = z.infer<typeof addressNameParamsSchema>;
export type InputCalldataParams = z.infer<typeof calldataParamsSchema>;
export type InputTokenAmountParams = z.infer<typeof tokenAmountParamsSchema>;
export type InputTokenTickerParams = z.infer<typeof tokenTickerParamsSchema>;
export type InputNftNameParams = z.infer<typeof nftNameParamsSchema>;
export type InputDateParams = z.infer<typeof dateParamsSchema>;
export type InputUnitParams = z.infer<typeof unitParamsSchema>;
export type InputEnumParams = z.infer<typeof enumParamsSchema>;
