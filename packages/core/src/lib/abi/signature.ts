/**
 * Human-readable function signature parsing and selector computation.
 *
 * Grammar:
 *   function := identifier "(" params ")"
 *   params   := (param ("," param)*)?
 *   param    := type identifier? | "(" params ")" arrays identifier?
 *   type     := identifier arrays
 *   arrays   := ("[" digits? "]")*
 *
 * Parameter names default to "_" when omitted.
 */

import { keccak256, toBytes, toHex } from "viem";
import { InvalidSignatureError } from "../output/errors";
import type { AbiEntry, AbiFunction, AbiParameter } from "./types";

const IDENTIFIER = /^[a-zA-Z$_][a-zA-Z0-9$_]*/;
const ARRAY_SUFFIX = /^\[\d*\]/;

export const DEFAULT_PARAMETER_NAME = "_";

/** Small cursor over the signature string, shared by the function and encodeType parsers. */
export class SignatureScanner {
  private position = 0;

  constructor(readonly input: string) {}

  get done(): boolean {
    this.skipWhitespace();
    return this.position >= this.input.length;
  }

  peek(): string {
    this.skipWhitespace();
    return this.input[this.position] ?? "";
  }

  fail(reason: string): never {
    throw new InvalidSignatureError(this.input, this.input.slice(this.position) || "<end>", reason);
  }

  expect(token: string): void {
    if (this.peek() !== token) this.fail(`expected "${token}"`);
    this.position += token.length;
  }

  accept(token: string): boolean {
    if (this.peek() !== token) return false;
    this.position += token.length;
    return true;
  }

  identifier(): string {
    const value = this.optionalIdentifier();
    if (value === undefined) return this.fail("expected an identifier");
    return value;
  }

  optionalIdentifier(): string | undefined {
    this.skipWhitespace();
    const match = IDENTIFIER.exec(this.input.slice(this.position));
    if (!match) return undefined;
    this.position += match[0].length;
    return match[0];
  }

  /** Consume array suffixes directly following a type (`[]`, `[2][]`...). */
  arraySuffixes(): string {
    let suffixes = "";
    for (;;) {
      const match = ARRAY_SUFFIX.exec(this.input.slice(this.position));
      if (!match) return suffixes;
      suffixes += match[0];
      this.position += match[0].length;
    }
  }

  private skipWhitespace(): void {
    while (this.position < this.input.length && /\s/.test(this.input[this.position])) {
      this.position += 1;
    }
  }
}

function parseParams(scanner: SignatureScanner): AbiParameter[] {
  const params: AbiParameter[] = [];
  if (scanner.peek() === ")") return params;
  do {
    params.push(parseParam(scanner));
  } while (scanner.accept(","));
  return params;
}

function parseParam(scanner: SignatureScanner): AbiParameter {
  if (scanner.accept("(")) {
    const components = parseParams(scanner);
    scanner.expect(")");
    const suffixes = scanner.arraySuffixes();
    const name = scanner.optionalIdentifier() ?? DEFAULT_PARAMETER_NAME;
    return { name, type: `tuple${suffixes}`, components };
  }
  const type = scanner.identifier() + scanner.arraySuffixes();
  const name = scanner.optionalIdentifier() ?? DEFAULT_PARAMETER_NAME;
  return { name, type };
}

/**
 * Parse a function signature such as `transfer(address to, uint256 amount)`.
 *
 * @throws {InvalidSignatureError} if the signature is malformed
 */
export function parseSignature(signature: string): AbiFunction {
  const scanner: SignatureScanner = new SignatureScanner(signature);
  const name = scanner.identifier();
  scanner.expect("(");
  const inputs = parseParams(scanner);
  scanner.expect(")");
  if (!scanner.done) scanner.fail("unexpected trailing characters");
  return { name, inputs };
}

function canonicalType(param: AbiParameter): string {
  if (param.type.startsWith("tuple")) {
    const components = (param.components ?? []).map(canonicalType).join(",");
    return `(${components})${param.type.slice("tuple".length)}`;
  }
  return param.type;
}

/** Canonical signature of a function, e.g. `transfer(address,uint256)`. */
export function computeSignature(fn: AbiFunction): string {
  return `${fn.name}(${fn.inputs.map(canonicalType).join(",")})`;
}

/** Strip parameter names and whitespace from a signature. */
export function reduceSignature(signature: string): string {
  return computeSignature(parseSignature(signature));
}

/** 4-byte selector of a canonical signature, as `0x` + 8 lowercase hex characters. */
export function signatureToSelector(signature: string): string {
  const hash = keccak256(toBytes(signature));
  return toHex(toBytes(hash).slice(0, 4));
}

export function functionToSelector(fn: AbiFunction): string {
  return signatureToSelector(computeSignature(fn));
}

export function isSelector(key: string): boolean {
  return /^0x[0-9a-fA-F]{8}$/.test(key);
}

export interface AbiFunctions {
  /** Functions keyed by selector. */
  functions: Record<string, AbiFunction>;
  /** True when the ABI exposes one of the usual proxy accessors. */
  proxy: boolean;
}

const PROXY_FUNCTION_NAMES = new Set(["proxyType", "getImplementation", "implementation"]);

export function abiToFunctions(abi: readonly AbiEntry[]): AbiFunctions {
  const result: AbiFunctions = { functions: {}, proxy: false };
  for (const entry of abi) {
    if (entry.type !== "function" || entry.name === undefined) continue;
    const fn: AbiFunction = { name: entry.name, inputs: entry.inputs ?? [] };
    result.functions[functionToSelector(fn)] = fn;
    if (PROXY_FUNCTION_NAMES.has(fn.name)) result.proxy = true;
  }
  return result;
}
