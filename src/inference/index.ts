export * from "./inferencer";
