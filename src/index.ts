// AutoDS - free-text data-science queries resolved to catalog functions
// and executed on the JavaScript host or an R session

export { Agent, createAgent } from "./agent";
export type { AgentContext, AgentStatus, CreateAgentOptions, HandleResult } from "./agent";

export * from "./catalog";
export * from "./config";
export * from "./embedding";
export * from "./errors";
export * from "./execution";
export * from "./inference";
export * from "./logger";
export * from "./profiler";
export * from "./resolver";
export * from "./search";
export * from "./snippet";
export { Shell, formatHandleResult, parseArgsInput } from "./shell";
export type { ShellIO, ShellStep } from "./shell";
