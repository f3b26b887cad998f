export * from "./bridge";
export * from "./values";
export * from "./script";
export * from "./rscript";
export * from "./fake";
export * from "./executor";
