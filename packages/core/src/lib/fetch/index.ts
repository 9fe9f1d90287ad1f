export * from "./config";
export * from "./rate-limit";
export * from "./cache";
export * from "./service";
