export * from "./types";
export * from "./catalog";
export * from "./store";
export * from "./seed";
export * from "./schema";
