/**
 * Resolved descriptor model.
 *
 * Everything is inlined: ABIs and schemas are materialized, references are
 * replaced by their definitions, constants by their values, and every field
 * carries either an absolute path or a literal.
 */

import type { Hex } from "viem";
import type { AbiEntry, Eip712Schema } from "../abi/types";
import type { DataPath, ResolvedPath } from "../paths/types";
import type { DateEncoding, FieldFormat } from "./format";
import type {
  EnumDefinition,
  Eip712Domain,
  Encryption,
  MapDefinition,
  OwnerInfo,
  Scalar,
  TokenInfo,
  VisibilityRule,
} from "./input";

// ── Values ──────────────────────────────────────────────────────────

export type ResolvedValue = { type: "path"; path: ResolvedPath } | { type: "constant"; value: Scalar };

// ── Field parameters ────────────────────────────────────────────────

export interface ResolvedAddressNameParams {
  kind: "addressName" | "interoperableAddressName";
  types?: string[];
  sources?: string[];
  senderAddress?: string[];
}

export interface ResolvedCalldataParams {
  kind: "calldata";
  callee?: ResolvedValue;
  selector?: ResolvedValue;
  amount?: ResolvedValue;
  spender?: ResolvedValue;
  chainId?: ResolvedValue;
}

export interface ResolvedTokenAmountParams {
  kind: "tokenAmount";
  token?: ResolvedValue;
  nativeCurrencyAddress?: string[];
  threshold?: Hex;
  message?: string;
  chainId?: ResolvedValue;
}

export interface ResolvedTokenTickerParams {
  kind: "tokenTicker";
  chainId?: ResolvedValue;
}

export interface ResolvedNftNameParams {
  kind: "nftName";
  collection?: ResolvedValue;
}

export interface ResolvedDateParams {
  kind: "date";
  encoding: DateEncoding;
}

export interface ResolvedUnitParams {
  kind: "unit";
  base: string;
  decimals?: number;
  prefix?: boolean;
}

export interface ResolvedEnumParams {
  kind: "enum";
  /** Key of the table in `metadata.enums`. */
  enumId: string;
}

export type ResolvedFieldParams =
  | ResolvedAddressNameParams
  | ResolvedCalldataParams
  | ResolvedTokenAmountParams
  | ResolvedTokenTickerParams
  | ResolvedNftNameParams
  | ResolvedDateParams
  | ResolvedUnitParams
  | ResolvedEnumParams;

// ── Fields ──────────────────────────────────────────────────────────

export interface ResolvedFieldDescription {
  kind: "field";
  id?: string;
  label: string;
  format?: FieldFormat;
  params?: ResolvedFieldParams;
  source: ResolvedValue;
  visible?: VisibilityRule;
  separator?: string;
  encryption?: Encryption;
}

export interface ResolvedFieldGroup {
  kind: "group";
  id?: string;
  path?: DataPath;
  label?: string;
  iteration?: string;
  fields: ResolvedField[];
}

export type ResolvedField = ResolvedFieldDescription | ResolvedFieldGroup;

export interface ResolvedFormat {
  id?: string;
  intent?: string | Record<string, string>;
  interpolatedIntent?: string;
  fields: ResolvedField[];
  required?: string[];
  excluded?: string[];
  screens?: Record<string, unknown>;
}

// ── Context ─────────────────────────────────────────────────────────

export interface ResolvedDeployment {
  chainId: number;
  address: Hex;
}

export interface ResolvedContractContext {
  type: "contract";
  id?: string;
  abi?: AbiEntry[];
  deployments: ResolvedDeployment[];
  addressMatcher?: string;
  factory?: { deployments: ResolvedDeployment[]; deployEvent: string };
}

export interface ResolvedEip712Context {
  type: "eip712";
  id?: string;
  domain?: Eip712Domain;
  domainSeparator?: string;
  schemas?: Eip712Schema[];
  deployments: ResolvedDeployment[];
}

export type ResolvedContext = ResolvedContractContext | ResolvedEip712Context;

// ── Metadata ────────────────────────────────────────────────────────

export interface ResolvedMetadata {
  owner?: string;
  contractName?: string;
  info?: OwnerInfo;
  token?: TokenInfo;
  constants?: Record<string, Scalar | null>;
  enums?: Record<string, EnumDefinition>;
  maps?: Record<string, MapDefinition>;
}

// ── Descriptor ──────────────────────────────────────────────────────

export interface ResolvedDescriptor {
  $schema?: string;
  $comment?: string;
  context: ResolvedContext;
  metadata: ResolvedMetadata;
  display: { formats: Record<string, ResolvedFormat> };
}
