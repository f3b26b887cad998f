export * from "./flat-index";
export * from "./semantic";
export * from "./persist";
export * from "./regex";
