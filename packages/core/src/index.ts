export * from "./lib/output";
export * from "./lib/paths";
export * from "./lib/abi";
export * from "./lib/descriptor";
export * from "./lib/resolve";
export * from "./lib/fetch";
export * from "./lib/networks";
export * from "./lib/convert";
