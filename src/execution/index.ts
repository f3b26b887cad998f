export * from "./types";
export * from "./native";
export * from "./registry";
export * from "./foreign";
