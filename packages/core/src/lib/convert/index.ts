export * from "./report";
export * from "./trusted-names";
export * from "./calldata";
export * from "./eip712";
