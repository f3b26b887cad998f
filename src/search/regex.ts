import type { FunctionDescriptor } from "../catalog/types";

export const MAX_REGEX_LENGTH = 200;

export type RegexSearchError = {
  code: "invalid_pattern" | "pattern_too_long";
  message: string;
};

export type KeyMatch = {
  displayKey: string;
  signature: string;
  language: FunctionDescriptor["language"];
};

/**
 * Search display keys by regex pattern
 * A leading (?i) makes the match case-insensitive
 */
export function searchKeysWithRegex(
  descriptors: FunctionDescriptor[],
  pattern: string,
  limit: number = 10
): KeyMatch[] | { error: RegexSearchError } {
  // Validate pattern length
  if (pattern.length > MAX_REGEX_LENGTH) {
    return {
      error: {
        code: "pattern_too_long",
        message: `Pattern exceeds maximum length of ${MAX_REGEX_LENGTH} characters`,
      },
    };
  }

  let flags = "";
  let searchPattern = pattern;

  if (pattern.startsWith("(?i)")) {
    flags = "i";
    searchPattern = pattern.slice(4);
  }

  // Try to compile the regex
  let regex: RegExp;
  try {
    regex = new RegExp(searchPattern, flags);
  } catch (error) {
    return {
      error: {
        code: "invalid_pattern",
        message: error instanceof Error ? error.message : "Invalid regex pattern",
      },
    };
  }

  // Alphabetical for stable ordering
  return descriptors
    .filter(descriptor => regex.test(descriptor.displayKey))
    .sort((a, b) => a.displayKey.localeCompare(b.displayKey))
    .slice(0, limit)
    .map(descriptor => ({
      displayKey: descriptor.displayKey,
      signature: descriptor.signature,
      language: descriptor.language,
    }));
}
