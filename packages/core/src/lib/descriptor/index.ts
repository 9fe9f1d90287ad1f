export * from "./format";
export * from "./params";
export * from "./input";
export * from "./resolved";
export * from "./serialize";
