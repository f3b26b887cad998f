export * from "./snippet";
