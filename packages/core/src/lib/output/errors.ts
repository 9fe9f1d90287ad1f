import type { OutputKind } from "./types";

export const INVALID_PATH_ERROR_CODE = "invalid-path";
export const INVALID_SIGNATURE_ERROR_CODE = "invalid-signature";
export const PATH_MISMATCH_ERROR_CODE = "path-mismatch";
export const UNDEFINED_CONSTANT_ERROR_CODE = "undefined-constant";
export const INVALID_CONSTANT_ERROR_CODE = "invalid-constant";
export const VALUE_ENCODING_ERROR_CODE = "value-encoding";
export const FETCH_ERROR_CODE = "fetch-failed";
export const CONVERSION_ERROR_CODE = "conversion-failed";

/**
 * Base class for errors thrown by the throwing helpers (parsers, path
 * operations, constant lookup). Pipeline code converts them into output
 * entries with {@link captureErrors}.
 */
export abstract class ClearSignError extends Error {
  abstract readonly code: string;
  abstract readonly kind: OutputKind;
  abstract readonly title: string;
}

export class InvalidPathError extends ClearSignError {
  readonly code = INVALID_PATH_ERROR_CODE;
  readonly kind = "parse";
  readonly title = "Invalid path";

  constructor(readonly path: string, reason: string) {
    super(`Path "${path}" is invalid: ${reason}`);
    this.name = "InvalidPathError";
  }
}

export class InvalidSignatureError extends ClearSignError {
  readonly code = INVALID_SIGNATURE_ERROR_CODE;
  readonly kind = "parse";
  readonly title = "Invalid signature";

  /** The part of the input that could not be parsed. */
  readonly fragment: string;

  constructor(readonly input: string, fragment: string, reason: string) {
    super(`"${input}" is not a valid signature: ${reason} at "${fragment}"`);
    this.name = "InvalidSignatureError";
    this.fragment = fragment;
  }
}

export class PathMismatchError extends ClearSignError {
  readonly code = PATH_MISMATCH_ERROR_CODE;
  readonly kind = "path";
  readonly title = "Path mismatch";

  constructor(readonly path: string, readonly prefix: string) {
    super(`Path "${path}" does not start with prefix "${prefix}"`);
    this.name = "PathMismatchError";
  }
}

export class UndefinedConstantError extends ClearSignError {
  readonly code = UNDEFINED_CONSTANT_ERROR_CODE;
  readonly kind = "reference";
  readonly title = "Invalid constant path";

  constructor(readonly path: string, reason: string) {
    super(`Error resolving constant "${path}": ${reason}`);
    this.name = "UndefinedConstantError";
  }
}

export class InvalidConstantError extends ClearSignError {
  readonly code = INVALID_CONSTANT_ERROR_CODE;
  readonly kind = "reference";
  readonly title = "Invalid constant value";

  constructor(readonly path: string, expected: string, actual: unknown) {
    super(`Constant "${path}" must be ${expected}, got ${JSON.stringify(actual)}`);
    this.name = "InvalidConstantError";
  }
}

export class ValueEncodingError extends ClearSignError {
  readonly code = VALUE_ENCODING_ERROR_CODE;
  readonly kind = "unsupported";
  readonly title = "Invalid value";

  constructor(message: string) {
    super(message);
    this.name = "ValueEncodingError";
  }
}

export class FetchError extends ClearSignError {
  readonly code = FETCH_ERROR_CODE;
  readonly kind = "fetch";
  readonly title = "Failed to fetch";

  constructor(readonly url: string, reason: string, readonly status?: number) {
    super(`Failed to fetch ${url}: ${reason}`);
    this.name = "FetchError";
  }
}

/** A resolved construct that cannot be lowered into an output format. */
export class ConversionError extends ClearSignError {
  readonly code = CONVERSION_ERROR_CODE;

  constructor(readonly kind: OutputKind, readonly title: string, message: string) {
    super(message);
    this.name = "ConversionError";
  }
}
