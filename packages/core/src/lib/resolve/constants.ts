import type { Scalar } from "../descriptor/input";
import { InvalidConstantError, UndefinedConstantError } from "../output/errors";
import { startsWith } from "../paths/ops";
import { isDescriptorPathString, parseDescriptorPath, parseResolvedPath, pathToString } from "../paths/parser";
import type { DescriptorPath, ResolvedPath } from "../paths/types";

export const CONSTANTS_PATH: DescriptorPath = {
  type: "descriptor",
  elements: [
    { type: "field", identifier: "metadata" },
    { type: "field", identifier: "constants" },
  ],
};

export interface ConstantProvider {
  /** @throws {UndefinedConstantError} if nothing is declared at `path` */
  get(path: DescriptorPath): Scalar;
}

/**
 * Constants declared in `$.metadata.constants`. Any descriptor value written
 * as a `$.metadata.constants.<name>` string is replaced by the constant.
 */
export class MetadataConstantProvider implements ConstantProvider {
  private readonly values = new Map<string, Scalar>();

  constructor(constants: Record<string, Scalar | null> = {}) {
    for (const [name, value] of Object.entries(constants)) {
      if (value !== null) this.values.set(name, value);
    }
  }

  get(path: DescriptorPath): Scalar {
    const raw = pathToString(path);
    if (!startsWith(path, CONSTANTS_PATH)) {
      throw new UndefinedConstantError(raw, `constants are only allowed in ${pathToString(CONSTANTS_PATH)}`);
    }
    const tail = path.elements.slice(CONSTANTS_PATH.elements.length);
    const [element] = tail;
    if (tail.length !== 1 || element === undefined || element.type !== "field") {
      throw new UndefinedConstantError(raw, "constants must be referenced by name");
    }
    const value = this.values.get(element.identifier);
    if (value === undefined) {
      throw new UndefinedConstantError(raw, "no constant defined at this path");
    }
    return value;
  }

  /** Identity for literals, constant lookup for descriptor path strings. */
  resolve(value: Scalar): Scalar {
    return isDescriptorPathString(value) ? this.get(parseDescriptorPath(value)) : value;
  }

  resolveOrUndefined(value: Scalar | undefined): Scalar | undefined {
    return value === undefined ? undefined : this.resolve(value);
  }

  resolveString(value: Scalar): string {
    const resolved = this.resolve(value);
    if (typeof resolved !== "string") throw new InvalidConstantError(String(value), "a string", resolved);
    return resolved;
  }

  resolveNumber(value: Scalar): number {
    const resolved = this.resolve(value);
    if (typeof resolved !== "number") throw new InvalidConstantError(String(value), "a number", resolved);
    return resolved;
  }

  resolveBoolean(value: Scalar): boolean {
    const resolved = this.resolve(value);
    if (typeof resolved !== "boolean") throw new InvalidConstantError(String(value), "a boolean", resolved);
    return resolved;
  }

  /**
   * Parse a data or container path, given directly or through a constant
   * holding the path string.
   */
  resolvePath(value: string): ResolvedPath {
    return parseResolvedPath(this.resolveString(value));
  }
}
