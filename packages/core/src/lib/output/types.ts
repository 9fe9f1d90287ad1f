export type OutputLevel = "debug" | "info" | "warning" | "error";

/**
 * Problem categories reported while resolving or converting a descriptor.
 *
 * - `parse`: malformed signature, encodeType or path
 * - `reference`: dangling `$ref`, undefined constant or enum
 * - `path`: path of the wrong kind for where it is used
 * - `schema`: format key or field with no matching ABI function / EIP-712 type
 * - `unsupported`: construct the target format cannot represent
 * - `fetch`: a URL could not be retrieved
 * - `validation`: a JSON document did not match its expected shape
 */
export type OutputKind =
  | "parse"
  | "reference"
  | "path"
  | "schema"
  | "unsupported"
  | "fetch"
  | "validation";

export interface OutputEntry {
  level: OutputLevel;
  kind: OutputKind;
  title: string;
  message: string;
}

export interface OutputSink {
  add(entry: OutputEntry): void;
}
