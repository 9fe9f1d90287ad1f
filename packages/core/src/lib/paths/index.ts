export * from "./types";
export * from "./parser";
export * from "./ops";
export * from "./schemas";
