export * from "./types";
export * from "./tlv";
export * from "./abi-tree";
export * from "./values";
export * from "./params";
export * from "./serialize";
export * from "./convert";
