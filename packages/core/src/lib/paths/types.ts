// ── Path elements ───────────────────────────────────────────────────

export interface FieldElement {
  type: "field";
  identifier: string;
}

export interface ArrayElement {
  type: "arrayElement";
  /** Negative indices count from the end of the array. */
  index: number;
}

export interface ArraySliceElement {
  type: "arraySlice";
  start?: number;
  end?: number;
}

export interface ArrayWildcardElement {
  type: "array";
}

export type PathElement = FieldElement | ArrayElement | ArraySliceElement | ArrayWildcardElement;

export type DescriptorPathElement = FieldElement | ArrayElement;

// ── Path kinds ──────────────────────────────────────────────────────

/** Reference to a value inside the structured data being signed (`#.a.b`, or `a.b` when relative). */
export interface DataPath {
  type: "data";
  absolute: boolean;
  elements: PathElement[];
}

export const CONTAINER_FIELDS = ["from", "to", "value", "chainId"] as const;

export type ContainerField = (typeof CONTAINER_FIELDS)[number];

/** Reference to a value of the transaction / message envelope (`@.to`). */
export interface ContainerPath {
  type: "container";
  field: ContainerField;
}

/** Reference to a location inside the descriptor document itself (`$.metadata.constants.x`). */
export interface DescriptorPath {
  type: "descriptor";
  elements: DescriptorPathElement[];
}

export type Path = DataPath | ContainerPath | DescriptorPath;

/** Paths that may survive into a resolved descriptor. */
export type ResolvedPath = DataPath | ContainerPath;

export const ROOT_DATA_PATH: DataPath = { type: "data", absolute: true, elements: [] };
