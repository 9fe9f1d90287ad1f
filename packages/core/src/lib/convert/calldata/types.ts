/**
 * Calldata descriptors: the instructions a signing device follows to display
 * a contract call. Every field is also serialized as a TLV byte string, see
 * `serialize.ts` for the wire layout.
 */

import type { Hex } from "viem";
import type { Scalar } from "../../descriptor/input";
import type { TrustedNameSource, TrustedNameType } from "../trusted-names";

// ── Values ──────────────────────────────────────────────────────────

export type TypeFamily = "UINT" | "INT" | "UFIXED" | "FIXED" | "ADDRESS" | "BOOL" | "BYTES" | "STRING";

export type ContainerValue = "FROM" | "TO" | "VALUE";

export type LeafType = "ARRAY_LEAF" | "TUPLE_LEAF" | "STATIC_LEAF" | "DYNAMIC_LEAF";

/** One step of a walk through ABI-encoded calldata. */
export type AbiPathElement =
  | { type: "TUPLE"; offset: number }
  | { type: "ARRAY"; weight: number; start?: number; end?: number }
  | { type: "REF" }
  | { type: "LEAF"; leaf_type: LeafType }
  | { type: "SLICE"; start?: number; end?: number };

interface CalldataValueBase {
  type_family: TypeFamily;
  type_size?: number;
}

export type CalldataValue =
  | (CalldataValueBase & { type: "path"; abi_path: AbiPathElement[] })
  | (CalldataValueBase & { type: "container"; container: ContainerValue })
  | (CalldataValueBase & { type: "constant"; value: Scalar; raw: Hex });

// ── Parameters ──────────────────────────────────────────────────────

export type DateType = "UNIX" | "BLOCK_HEIGHT";

export type CalldataParam =
  | { type: "RAW"; value: CalldataValue }
  | { type: "AMOUNT"; value: CalldataValue }
  | {
      type: "TOKEN_AMOUNT";
      value: CalldataValue;
      token?: CalldataValue;
      native_currencies?: Hex[];
      threshold?: Hex;
      above_threshold_message?: string;
    }
  | { type: "NFT"; value: CalldataValue; collection: CalldataValue }
  | { type: "DATETIME"; value: CalldataValue; date_type: DateType }
  | { type: "DURATION"; value: CalldataValue }
  | { type: "UNIT"; value: CalldataValue; base: string; decimals?: number; prefix?: boolean }
  | { type: "ENUM"; value: CalldataValue; id: number }
  | {
      type: "TRUSTED_NAME";
      value: CalldataValue;
      types: TrustedNameType[];
      sources: TrustedNameSource[];
      sender_addresses?: Hex[];
    }
  | {
      type: "CALLDATA";
      value: CalldataValue;
      callee: CalldataValue;
      selector?: CalldataValue;
      chain_id?: CalldataValue;
      amount?: CalldataValue;
      spender?: CalldataValue;
    };

export type CalldataParamType = CalldataParam["type"];

// ── Descriptor ──────────────────────────────────────────────────────

export interface CalldataField {
  name: string;
  param: CalldataParam;
  /** TLV serialization of the field, hex encoded. */
  descriptor: Hex;
}

export interface CalldataEnumEntry {
  value: number;
  name: string;
}

export interface CalldataEnum {
  /** Identifier referenced by `ENUM` parameters. */
  id: number;
  /** Key of the table in the source descriptor's `metadata.enums`. */
  enum_id: string;
  entries: CalldataEnumEntry[];
}

export interface CalldataTransactionInfo {
  chain_id: number;
  address: Hex;
  selector: string;
  /** sha3-256 over the concatenated field descriptors, without `0x`. */
  hash: string;
  operation_type: string;
  creator_name?: string;
  creator_legal_name?: string;
  creator_url?: string;
  contract_name?: string;
  deploy_date?: string;
}

export interface CalldataDescriptor {
  network: string;
  chain_id: number;
  address: Hex;
  selector: string;
  transaction_info: CalldataTransactionInfo;
  enums: CalldataEnum[];
  fields: CalldataField[];
}
