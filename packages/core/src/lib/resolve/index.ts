export * from "./constants";
export * from "./values";
export * from "./parameters";
export * from "./references";
export * from "./fields";
export * from "./resolver";
