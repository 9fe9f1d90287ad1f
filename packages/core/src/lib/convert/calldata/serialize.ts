/**
 * TLV serialization of calldata field descriptors.
 *
 * Every structure starts with a `version` record (tag 0x00) followed by its
 * own records. Nested structures are carried as the value of a record.
 */

import { bytesToHex } from "@noble/hashes/utils";
import { sha3_256 } from "@noble/hashes/sha3";
import { hexToBytes, type Hex } from "viem";
import { ConversionError } from "../../output/errors";
import type { TrustedNameSource, TrustedNameType } from "../trusted-names";
import { TlvWriter } from "./tlv";
import type {
  AbiPathElement,
  CalldataParam,
  CalldataParamType,
  CalldataValue,
  ContainerValue,
  DateType,
  LeafType,
  TypeFamily,
} from "./types";

const STRUCT_VERSION = 1;

const VERSION_TAG = 0x00;

// ── Codes ───────────────────────────────────────────────────────────

const TYPE_FAMILY_CODES: Record<TypeFamily, number> = {
  UINT: 1,
  INT: 2,
  UFIXED: 3,
  FIXED: 4,
  ADDRESS: 5,
  BOOL: 6,
  BYTES: 7,
  STRING: 8,
};

const CONTAINER_CODES: Record<ContainerValue, number> = { FROM: 0, TO: 1, VALUE: 2 };

const LEAF_TYPE_CODES: Record<LeafType, number> = {
  ARRAY_LEAF: 1,
  TUPLE_LEAF: 2,
  STATIC_LEAF: 3,
  DYNAMIC_LEAF: 4,
};

export const PARAM_TYPE_CODES: Record<CalldataParamType, number> = {
  RAW: 0,
  AMOUNT: 1,
  TOKEN_AMOUNT: 2,
  NFT: 3,
  DATETIME: 4,
  DURATION: 5,
  UNIT: 6,
  ENUM: 7,
  TRUSTED_NAME: 8,
  CALLDATA: 9,
};

const TRUSTED_NAME_TYPE_CODES: Record<TrustedNameType, number> = {
  eoa: 1,
  smart_contract: 2,
  collection: 3,
  token: 4,
  wallet: 5,
  context_address: 6,
};

const TRUSTED_NAME_SOURCE_CODES: Record<TrustedNameSource, number> = {
  local_address_book: 0,
  crypto_asset_list: 1,
  ens: 2,
  unstoppable_domain: 3,
  freename: 4,
  dns: 5,
  dynamic_resolver: 6,
};

const DATE_TYPE_CODES: Record<DateType, number> = { UNIX: 0, BLOCK_HEIGHT: 1 };

// ── Tags ────────────────────────────────────────────────────────────

const VALUE_TAGS = { typeFamily: 0x01, typeSize: 0x02, dataPath: 0x03, containerPath: 0x04, constant: 0x05 };

const PATH_TAGS = { tuple: 0x01, array: 0x02, ref: 0x03, leaf: 0x04, slice: 0x05 };

const ARRAY_TAGS = { weight: 0x01, start: 0x02, end: 0x03 };

const SLICE_TAGS = { start: 0x01, end: 0x02 };

const FIELD_TAGS = { name: 0x01, paramType: 0x02, param: 0x03 };

/** Tag of the displayed value, shared by every parameter structure. */
const PARAM_VALUE_TAG = 0x01;

const TOKEN_AMOUNT_TAGS = { token: 0x02, nativeCurrency: 0x03, threshold: 0x04, aboveThresholdMessage: 0x05 };

const NFT_TAGS = { collection: 0x02 };

const DATETIME_TAGS = { type: 0x02 };

const UNIT_TAGS = { base: 0x02, decimals: 0x03, prefix: 0x04 };

const ENUM_TAGS = { id: 0x02 };

const TRUSTED_NAME_TAGS = { types: 0x02, sources: 0x03, senderAddress: 0x04 };

const CALLDATA_TAGS = { callee: 0x02, chainId: 0x03, selector: 0x04, amount: 0x05, spender: 0x06 };

// ── Bounds ──────────────────────────────────────────────────────────

const UINT8_MAX = 0xff;
const UINT16_MAX = 0xffff;
const INT16_MIN = -0x8000;
const INT16_MAX = 0x7fff;

function fits(value: number, min: number, max: number): boolean {
  return Number.isInteger(value) && value >= min && value <= max;
}

function unsupportedPath(message: string): ConversionError {
  return new ConversionError("unsupported", "Unsupported path", message);
}

function pathOffset(offset: number): number {
  if (!fits(offset, 0, UINT16_MAX)) {
    throw unsupportedPath(`Offset ${offset} in the calldata does not fit in 16 bits.`);
  }
  return offset;
}

function pathBound(bound: number): number {
  if (!fits(bound, INT16_MIN, INT16_MAX)) {
    throw unsupportedPath(`Index ${bound} does not fit in a signed 16 bit integer.`);
  }
  return bound;
}

function elementWeight(weight: number): number {
  if (!fits(weight, 0, UINT8_MAX)) {
    throw unsupportedPath(`Array elements of ${weight} words are too large to iterate.`);
  }
  return weight;
}

// ── Encoders ────────────────────────────────────────────────────────

function versioned(): TlvWriter {
  return new TlvWriter().uint(VERSION_TAG, STRUCT_VERSION);
}

function encodePathElement(writer: TlvWriter, element: AbiPathElement): void {
  switch (element.type) {
    case "TUPLE":
      writer.uint(PATH_TAGS.tuple, pathOffset(element.offset), 2);
      return;
    case "ARRAY": {
      const array = versioned().uint(ARRAY_TAGS.weight, elementWeight(element.weight));
      if (element.start !== undefined) array.int(ARRAY_TAGS.start, pathBound(element.start));
      if (element.end !== undefined) array.int(ARRAY_TAGS.end, pathBound(element.end));
      writer.nested(PATH_TAGS.array, array);
      return;
    }
    case "REF":
      writer.empty(PATH_TAGS.ref);
      return;
    case "LEAF":
      writer.uint(PATH_TAGS.leaf, LEAF_TYPE_CODES[element.leaf_type]);
      return;
    case "SLICE": {
      const slice = versioned();
      if (element.start !== undefined) slice.int(SLICE_TAGS.start, pathBound(element.start));
      if (element.end !== undefined) slice.int(SLICE_TAGS.end, pathBound(element.end));
      writer.nested(PATH_TAGS.slice, slice);
      return;
    }
  }
}

export function encodeAbiPath(elements: readonly AbiPathElement[]): TlvWriter {
  const writer = versioned();
  for (const element of elements) encodePathElement(writer, element);
  return writer;
}

export function encodeCalldataValue(value: CalldataValue): TlvWriter {
  const writer = versioned().uint(VALUE_TAGS.typeFamily, TYPE_FAMILY_CODES[value.type_family]);
  if (value.type_size !== undefined) writer.uint(VALUE_TAGS.typeSize, value.type_size);
  switch (value.type) {
    case "path":
      return writer.nested(VALUE_TAGS.dataPath, encodeAbiPath(value.abi_path));
    case "container":
      return writer.uint(VALUE_TAGS.containerPath, CONTAINER_CODES[value.container]);
    case "constant":
      return writer.raw(VALUE_TAGS.constant, value.raw);
  }
}

function addOptionalValue(writer: TlvWriter, tag: number, value: CalldataValue | undefined): void {
  if (value !== undefined) writer.nested(tag, encodeCalldataValue(value));
}

export function encodeParam(param: CalldataParam): TlvWriter {
  const writer = versioned().nested(PARAM_VALUE_TAG, encodeCalldataValue(param.value));
  switch (param.type) {
    case "RAW":
    case "AMOUNT":
    case "DURATION":
      return writer;

    case "TOKEN_AMOUNT":
      addOptionalValue(writer, TOKEN_AMOUNT_TAGS.token, param.token);
      for (const address of param.native_currencies ?? []) writer.raw(TOKEN_AMOUNT_TAGS.nativeCurrency, address);
      if (param.threshold !== undefined) writer.raw(TOKEN_AMOUNT_TAGS.threshold, param.threshold);
      if (param.above_threshold_message !== undefined) {
        writer.string(TOKEN_AMOUNT_TAGS.aboveThresholdMessage, param.above_threshold_message);
      }
      return writer;

    case "NFT":
      return writer.nested(NFT_TAGS.collection, encodeCalldataValue(param.collection));

    case "DATETIME":
      return writer.uint(DATETIME_TAGS.type, DATE_TYPE_CODES[param.date_type]);

    case "UNIT":
      writer.string(UNIT_TAGS.base, param.base);
      if (param.decimals !== undefined) {
        if (!fits(param.decimals, 0, UINT8_MAX)) {
          throw new ConversionError(
            "validation",
            "Invalid unit decimals",
            `Unit decimals ${param.decimals} do not fit in a byte.`
          );
        }
        writer.uint(UNIT_TAGS.decimals, param.decimals);
      }
      if (param.prefix !== undefined) writer.bool(UNIT_TAGS.prefix, param.prefix);
      return writer;

    case "ENUM":
      if (!fits(param.id, 0, UINT8_MAX)) {
        throw new ConversionError("unsupported", "Too many enums", `Enum id ${param.id} does not fit in a byte.`);
      }
      return writer.uint(ENUM_TAGS.id, param.id);

    case "TRUSTED_NAME":
      for (const type of param.types) writer.uint(TRUSTED_NAME_TAGS.types, TRUSTED_NAME_TYPE_CODES[type]);
      for (const source of param.sources) writer.uint(TRUSTED_NAME_TAGS.sources, TRUSTED_NAME_SOURCE_CODES[source]);
      for (const address of param.sender_addresses ?? []) writer.raw(TRUSTED_NAME_TAGS.senderAddress, address);
      return writer;

    case "CALLDATA":
      writer.nested(CALLDATA_TAGS.callee, encodeCalldataValue(param.callee));
      addOptionalValue(writer, CALLDATA_TAGS.chainId, param.chain_id);
      addOptionalValue(writer, CALLDATA_TAGS.selector, param.selector);
      addOptionalValue(writer, CALLDATA_TAGS.amount, param.amount);
      addOptionalValue(writer, CALLDATA_TAGS.spender, param.spender);
      return writer;
  }
}

/**
 * Hex TLV serialization of a field: its name, parameter type and parameter.
 *
 * @throws {ConversionError} if an offset, index, decimals or enum id does not fit its record
 */
export function encodeField(name: string, param: CalldataParam): Hex {
  return versioned()
    .string(FIELD_TAGS.name, name)
    .uint(FIELD_TAGS.paramType, PARAM_TYPE_CODES[param.type])
    .nested(FIELD_TAGS.param, encodeParam(param))
    .toHex();
}

/** sha3-256 over the concatenated field descriptors, as 64 hex characters without `0x`. */
export function hashFieldDescriptors(descriptors: readonly Hex[]): string {
  const digest = sha3_256.create();
  for (const descriptor of descriptors) digest.update(hexToBytes(descriptor));
  return bytesToHex(digest.digest());
}
