export * from "./types";
export * from "./signature";
export * from "./encode-type";
export * from "./values";
