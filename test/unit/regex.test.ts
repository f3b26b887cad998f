import { test, expect } from "vitest";
import { MAX_REGEX_LENGTH, searchKeysWithRegex } from "../../src/search/regex";
import { SAMPLE_DESCRIPTORS } from "../fixtures";

test("regex search finds matching keys", () => {
  const results = searchKeysWithRegex(SAMPLE_DESCRIPTORS, "median");

  expect(results).toEqual([
    {
      displayKey: "R: stats::median - Compute the sample median of a numeric vector.",
      signature: "stats::median(x, na.rm = FALSE)",
      language: "r",
    },
  ]);
});

test("regex search is case-sensitive without (?i)", () => {
  expect(searchKeysWithRegex(SAMPLE_DESCRIPTORS, "K-MEANS")).toEqual([]);
});

test("regex search handles case-insensitive with (?i)", () => {
  const results = searchKeysWithRegex(SAMPLE_DESCRIPTORS, "(?i)K-MEANS");
  expect(Array.isArray(results) && results.map(r => r.displayKey)).toEqual([
    "R: stats::kmeans - K-Means Clustering of a data matrix.",
  ]);
});

test("regex search sorts alphabetically and applies the limit", () => {
  const results = searchKeysWithRegex([...SAMPLE_DESCRIPTORS].reverse(), "^R: stats::", 2);
  expect(Array.isArray(results) && results.map(r => r.displayKey)).toEqual([
    "R: stats::kmeans - K-Means Clustering of a data matrix.",
    "R: stats::lm - Fitting Linear Models. lm is used to fit linear models.",
  ]);
});

test("regex search rejects invalid patterns", () => {
  const result = searchKeysWithRegex(SAMPLE_DESCRIPTORS, "[unclosed");
  expect("error" in result && result.error.code).toBe("invalid_pattern");
});

test("regex search rejects overly long patterns", () => {
  const result = searchKeysWithRegex(SAMPLE_DESCRIPTORS, "a".repeat(MAX_REGEX_LENGTH + 1));
  expect("error" in result && result.error.code).toBe("pattern_too_long");
});
