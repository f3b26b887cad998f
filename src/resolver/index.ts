export * from "./rules";
export * from "./resolver";
