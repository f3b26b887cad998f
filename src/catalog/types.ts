// Runtime a catalog function belongs to
//   javascript: the Node.js host, loaded with import()
//   r: an R session reached through a bridge
export type Language = "javascript" | "r";

export const LANGUAGES: readonly Language[] = ["javascript", "r"] as const;

export type ParameterSpec = {
  name: string;
  hasDefault: boolean;
  defaultValue?: string;  // defaults are stored as text whatever the runtime
};

// Human-readable key (e.g. "R: stats::lm - Fits Linear Models")
// Embedded for search and used as the join key into the store
export type DisplayKey = string;

export type FunctionDescriptor = {
  displayKey: DisplayKey;
  language: Language;
  namespace: string;   // module specifier or R package
  name: string;        // callable name, may be "Owner.member"
  parameters: ParameterSpec[];
  signature: string;
  description: string;
};

// Summary persisted next to the index for each key
export type DescriptorSummary = Pick<FunctionDescriptor, "displayKey" | "language" | "namespace" | "name">;

// Search result
export type ResolvedMatch = {
  descriptor: FunctionDescriptor;
  distance: number;  // Euclidean distance, 0 for override matches
};

// Ordered parameterName -> value mapping handed to an executor
export type ArgumentMap = Record<string, unknown>;
