import { InvalidSignatureError } from "../output/errors";
import { SignatureScanner } from "./signature";
import { isElementaryType, type Eip712Field, type Eip712Schema } from "./types";

/** True when a format key looks like an encodeType string rather than a bare primary type name. */
export function isEncodeType(key: string): boolean {
  return key.includes("(");
}

function baseType(type: string): string {
  return type.replace(/(\[\d*\])+$/, "");
}

/**
 * Rebuild an EIP-712 type graph from its `encodeType` string, e.g.
 * `Mail(Person from,Person to,string contents)Person(string name,address wallet)`.
 *
 * The first struct is the primary type. Every struct referenced by a field,
 * directly or through nested structs, must be defined in the string.
 *
 * @throws {InvalidSignatureError} on malformed input or undefined struct references
 */
export function parseEncodeType(encodeType: string): Eip712Schema {
  const scanner: SignatureScanner = new SignatureScanner(encodeType);
  const types: Record<string, Eip712Field[]> = {};
  let primaryType: string | undefined;

  while (!scanner.done) {
    const name = scanner.identifier();
    if (name in types) scanner.fail(`duplicate type "${name}"`);
    scanner.expect("(");
    const fields: Eip712Field[] = [];
    if (scanner.peek() !== ")") {
      do {
        const type = scanner.identifier() + scanner.arraySuffixes();
        fields.push({ name: scanner.identifier(), type });
      } while (scanner.accept(","));
    }
    scanner.expect(")");
    types[name] = fields;
    primaryType ??= name;
  }

  if (primaryType === undefined) return scanner.fail("expected at least one type definition");

  const visited = new Set<string>();
  const visit = (typeName: string): void => {
    if (visited.has(typeName)) return;
    visited.add(typeName);
    for (const field of types[typeName]) {
      const base = baseType(field.type);
      if (isElementaryType(base)) continue;
      if (!(base in types)) {
        throw new InvalidSignatureError(encodeType, `${field.type} ${field.name}`, `undefined type "${base}"`);
      }
      visit(base);
    }
  };
  visit(primaryType);

  return { primaryType, types };
}

/** Inverse of {@link parseEncodeType}: primary type first, then referenced types sorted by name. */
export function computeEncodeType(schema: Eip712Schema): string {
  const referenced = new Set<string>();
  const collect = (typeName: string): void => {
    for (const field of schema.types[typeName] ?? []) {
      const base = baseType(field.type);
      if (base in schema.types && base !== schema.primaryType && !referenced.has(base)) {
        referenced.add(base);
        collect(base);
      }
    }
  };
  collect(schema.primaryType);

  const encode = (typeName: string): string =>
    `${typeName}(${(schema.types[typeName] ?? []).map((field) => `${field.type} ${field.name}`).join(",")})`;

  return [schema.primaryType, ...[...referenced].sort()].map(encode).join("");
}
