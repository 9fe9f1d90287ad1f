export * from "./types";
export * from "./convert";
