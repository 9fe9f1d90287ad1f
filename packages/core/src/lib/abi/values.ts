import { concat, isAddress, isHex, numberToHex, parseUnits, toBytes, toHex, type Hex } from "viem";
import type { OutputCollector } from "../output/collector";
import { ValueEncodingError } from "../output/errors";
import type { AbiDataType } from "./types";

export type ScalarValue = string | number | boolean;

const DECIMAL = /^-?\d+(\.\d+)?$/;

const INTEGER = /^-?\d+$/;

function toInteger(value: ScalarValue | bigint): bigint | undefined {
  if (typeof value === "bigint") return value;
  if (typeof value === "number" && Number.isSafeInteger(value)) return BigInt(value);
  if (typeof value === "string" && INTEGER.test(value)) return BigInt(value);
  return undefined;
}

function article(type: string): string {
  return /^[aeio]/.test(type) ? "an" : "a";
}

function word(value: bigint, signed: boolean): Hex {
  return numberToHex(value, { size: 32, signed });
}

/**
 * Encode a scalar as the bytes a device compares calldata values against.
 *
 * Hex strings are taken as already encoded (addresses are lowercased).
 * Integers (numbers within the safe range, bigints or decimal strings) and
 * booleans become 32-byte big-endian words, fixed-point values are
 * scaled by `decimals` first, strings become an ABI string body (length word
 * followed by right-padded UTF-8).
 */
export function encodeValue(
  value: ScalarValue | bigint,
  type: AbiDataType,
  out: OutputCollector,
  decimals = 18
): Hex | null {
  if (typeof value === "string" && isHex(value)) {
    if (type !== "address") return value;
    const lower = value.toLowerCase();
    return isHex(lower) ? lower : value;
  }

  const invalid = () =>
    out.error("unsupported", "Invalid value", `Value "${String(value)}" is not ${article(type)} ${type}`);

  try {
    switch (type) {
      case "uint":
      case "int": {
        if (typeof value === "number" && Number.isInteger(value) && !Number.isSafeInteger(value)) {
          return out.error(
            "unsupported",
            "Invalid value",
            `Value ${String(value)} is outside the safe integer range, write it as a decimal string`
          );
        }
        const integer = toInteger(value);
        if (integer === undefined) return invalid();
        if (type === "uint" && integer < 0n) return invalid();
        return word(integer, type === "int");
      }

      case "ufixed":
      case "fixed": {
        const text = typeof value === "number" || typeof value === "bigint" ? String(value) : value;
        if (typeof text !== "string" || !DECIMAL.test(text)) return invalid();
        const scaled = parseUnits(text, decimals);
        if (type === "ufixed" && scaled < 0n) return invalid();
        return word(scaled, type === "fixed");
      }

      case "bool":
        if (typeof value !== "boolean") return invalid();
        return word(value ? 1n : 0n, false);

      case "address":
      case "bytes":
        return invalid();

      case "string": {
        if (typeof value !== "string") return invalid();
        const bytes = toBytes(value);
        const data = toHex(bytes).slice(2);
        const padded = data.padEnd(Math.ceil(data.length / 64) * 64, "0");
        return concat([word(BigInt(bytes.length), false), `0x${padded}`]);
      }
    }
  } catch (err) {
    return out.error(
      "unsupported",
      "Invalid value",
      `Value "${String(value)}" cannot be encoded as ${type}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
}

/** Lowercase an address for storage in a resolved descriptor. */
export function lowercaseAddress(address: string): Hex {
  const lower = address.toLowerCase();
  if (!isAddress(lower, { strict: false })) {
    throw new ValueEncodingError(`Value "${address}" is not an address`);
  }
  return lower;
}
