import { test, expect, describe } from "vitest";
import { ArgumentInferencer } from "../../src/inference";
import { Profiler } from "../../src/profiler";
import { makeDescriptor, memoryLogger } from "../fixtures";

const lm = makeDescriptor("r", "stats", "lm", [["formula"], ["data"], ["weights"]]);

describe("ArgumentInferencer", () => {
  test("fills formula and data for a regression query in R", () => {
    const inferencer = new ArgumentInferencer();
    expect(inferencer.infer(lm, "linear regression", {})).toEqual({ formula: "y ~ x", data: "cars" });
  });

  test("uses JavaScript defaults for JavaScript descriptors", () => {
    const inferencer = new ArgumentInferencer();
    const jsFit = makeDescriptor("javascript", "./regression", "fit", [["formula"], ["data"]]);

    expect(inferencer.infer(jsFit, "Linear Model please", {})).toEqual({
      formula: "y ~ x",
      data: [[1, 2], [2, 3], [3, 4]],
    });
  });

  test("orders required parameters first, then the rest of the caller's keys", () => {
    const inferencer = new ArgumentInferencer();
    const args = inferencer.infer(lm, "linear regression", { extra: true, data: "mtcars" });

    expect(Object.keys(args)).toEqual(["data", "extra", "formula"]);
    expect(args).toEqual({ data: "mtcars", extra: true, formula: "y ~ x" });
  });

  test("caller values are never overwritten", () => {
    const inferencer = new ArgumentInferencer();
    expect(inferencer.infer(lm, "linear regression", { formula: "dist ~ speed" })).toEqual({
      formula: "dist ~ speed",
      data: "cars",
    });
  });

  test("without a trigger phrase only the R data fallback applies", () => {
    const inferencer = new ArgumentInferencer();
    expect(inferencer.infer(lm, "fit something", {})).toEqual({ data: "iris" });

    const jsFit = makeDescriptor("javascript", "./regression", "fit", [["formula"], ["data"]]);
    expect(inferencer.infer(jsFit, "fit something", {})).toEqual({});
  });

  test("R functions with a required data parameter default to iris", async () => {
    const { logger, lines } = memoryLogger("info");
    const inferencer = new ArgumentInferencer({ logger });
    const aggregate = makeDescriptor("r", "stats", "aggregate", [["x"], ["data"]]);

    expect(inferencer.infer(aggregate, "group totals", { x: "len ~ supp" })).toEqual({ x: "len ~ supp", data: "iris" });
    await logger.flush();
    expect(lines[0]).toContain('"defaulted":["data"]');
  });

  test("fallback defaults can be replaced or turned off", () => {
    const aggregate = makeDescriptor("r", "stats", "aggregate", [["x"], ["data"]]);

    expect(new ArgumentInferencer({ fallbackDefaults: {} }).infer(aggregate, "group totals", {})).toEqual({});
    expect(
      new ArgumentInferencer({ fallbackDefaults: { data: { r: "mtcars" } } }).infer(aggregate, "group totals", {}),
    ).toEqual({ data: "mtcars" });
  });

  test("keys that name Object.prototype members stay ordinary arguments", () => {
    const inferencer = new ArgumentInferencer({ fallbackDefaults: {} });
    const provided = Object.fromEntries([["__proto__", { a: 1 }], ["x", 2]]);
    const args = inferencer.infer(lm, "fit something", provided);

    expect(Object.keys(args)).toEqual(["__proto__", "x"]);
    expect(Object.getOwnPropertyDescriptor(args, "__proto__")?.value).toEqual({ a: 1 });
    expect(Object.getPrototypeOf(args)).toBe(Object.prototype);
  });

  test("parameters with a real default are not filled", () => {
    const inferencer = new ArgumentInferencer();
    const aov = makeDescriptor("r", "stats", "aov", [["formula"], ["data", "iris"]]);
    expect(inferencer.infer(aov, "linear model", {})).toEqual({ formula: "y ~ x" });
  });

  test("NULL defaults still count as required", () => {
    const inferencer = new ArgumentInferencer();
    const glm = makeDescriptor("r", "stats", "glm", [["formula"], ["data", "NULL"]]);
    expect(inferencer.infer(glm, "linear model", {})).toEqual({ formula: "y ~ x", data: "cars" });
  });

  test("custom rules supply their own defaults", () => {
    const inferencer = new ArgumentInferencer({
      rules: [{
        name: "median",
        triggers: ["median"],
        target: { language: "r", namespace: "stats", name: "median", keyPattern: "stats::median" },
        fallback: { parameters: [{ name: "x" }], description: "" },
        defaults: { x: { r: [4, 8, 15] } },
      }],
    });
    const median = makeDescriptor("r", "stats", "median", [["x"], ["na.rm", "FALSE"]]);

    expect(inferencer.infer(median, "median of my numbers", {})).toEqual({ x: [4, 8, 15] });
    expect(inferencer.infer(median, "linear regression", {})).toEqual({});
  });

  test("a rule without a value for the language leaves the parameter missing", () => {
    const inferencer = new ArgumentInferencer({
      rules: [{
        name: "r-only",
        triggers: ["summary"],
        target: { language: "r", namespace: "base", name: "summary", keyPattern: "summary" },
        fallback: { parameters: [{ name: "object" }], description: "" },
        defaults: { object: { r: "cars" } },
      }],
    });
    const inspect = makeDescriptor("javascript", "node:util", "inspect", [["object"]]);
    expect(inferencer.infer(inspect, "summary", {})).toEqual({});
  });

  test("logs and times each call", async () => {
    const { logger, lines } = memoryLogger("info");
    const profiler = new Profiler();
    const inferencer = new ArgumentInferencer({ logger, profiler });

    inferencer.infer(lm, "linear regression", {});
    await logger.flush();

    expect(profiler.getStats("infer")?.count).toBe(1);
    expect(lines[0]).toContain('[INFO] Inferred arguments {"displayKey":"R: stats::lm - R function stats::lm","args":{"formula":"y ~ x","data":"cars"},"defaulted":["formula","data"]}');
  });
});
