import { concatHex, numberToHex, size, toHex, type Hex } from "viem";

/**
 * DER-style variable length integer: values below 0x80 take one byte, larger
 * ones a `0x80 | n` byte followed by `n` big-endian bytes.
 */
export function derEncode(value: number): Hex {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`Cannot DER encode ${value}`);
  }
  if (value < 0x80) return numberToHex(value, { size: 1 });
  let digits = value.toString(16);
  if (digits.length % 2 === 1) digits = `0${digits}`;
  const length = digits.length / 2;
  return concatHex([numberToHex(0x80 | length, { size: 1 }), `0x${digits}`]);
}

/** Builder for a sequence of tag-length-value records. */
export class TlvWriter {
  private readonly records: Hex[] = [];

  raw(tag: number, value: Hex): this {
    this.records.push(concatHex([derEncode(tag), derEncode(size(value)), value]));
    return this;
  }

  uint(tag: number, value: number, bytes = 1): this {
    return this.raw(tag, numberToHex(value, { size: bytes }));
  }

  int(tag: number, value: number, bytes = 2): this {
    return this.raw(tag, numberToHex(value, { size: bytes, signed: true }));
  }

  bool(tag: number, value: boolean): this {
    return this.uint(tag, value ? 1 : 0);
  }

  string(tag: number, value: string): this {
    return this.raw(tag, toHex(value));
  }

  empty(tag: number): this {
    return this.raw(tag, "0x");
  }

  nested(tag: number, writer: TlvWriter): this {
    return this.raw(tag, writer.toHex());
  }

  toHex(): Hex {
    return concatHex(this.records);
  }
}
