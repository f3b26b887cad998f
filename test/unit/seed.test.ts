import { test, expect, describe, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { fileURLToPath } from "url";
import { loadSeedFile, recordToDescriptor, seedCatalog, unifyRecords } from "../../src/catalog/seed";
import type { CatalogRecord } from "../../src/catalog/seed";
import { SqliteCatalogStore } from "../../src/catalog/store";

const SEED_FILE = fileURLToPath(new URL("../../data/catalog.seed.json", import.meta.url));

const medianRecord: CatalogRecord = {
  language: "r",
  package: "stats",
  function_name: "median",
  parameters: [{ name: "x" }, { name: "na.rm", default: "FALSE" }],
  description: "Compute the sample median.",
};

describe("recordToDescriptor", () => {
  test("derives key, parameters and signature", () => {
    expect(recordToDescriptor(medianRecord)).toEqual({
      displayKey: "R: stats::median - Compute the sample median.",
      language: "r",
      namespace: "stats",
      name: "median",
      parameters: [
        { name: "x", hasDefault: false },
        { name: "na.rm", hasDefault: true, defaultValue: "FALSE" },
      ],
      signature: "stats::median(x, na.rm = FALSE)",
      description: "Compute the sample median.",
    });
  });

  test("explicit key and signature win", () => {
    const descriptor = recordToDescriptor({ ...medianRecord, key: "R: stats::median - middle", signature: "median(x)" });
    expect(descriptor.displayKey).toBe("R: stats::median - middle");
    expect(descriptor.signature).toBe("median(x)");
  });
});

describe("unifyRecords", () => {
  test("empty input still covers the rule targets and common tasks", () => {
    expect(unifyRecords([]).map(d => d.displayKey)).toEqual([
      "R: stats::lm - Linear Models for regression analysis",
      "R: stats::lm - Perform linear regression on data",
      "R: stats::t.test - Perform t-test for statistical significance",
      "R: stats::cor - Calculate correlation between variables",
    ]);
  });

  test("no rule fallback when the catalog has the target", () => {
    const lm: CatalogRecord = {
      language: "r",
      package: "stats",
      function_name: "lm",
      parameters: [{ name: "formula" }, { name: "data" }],
      description: "Fitting Linear Models",
    };
    const keys = unifyRecords([lm]).map(d => d.displayKey);
    expect(keys[0]).toBe("R: stats::lm - Fitting Linear Models");
    expect(keys).not.toContain("R: stats::lm - Linear Models for regression analysis");
  });

  test("first record wins on duplicate keys", () => {
    const descriptors = unifyRecords([medianRecord, { ...medianRecord, parameters: [] }], []);
    const medians = descriptors.filter(d => d.name === "median");
    expect(medians).toHaveLength(1);
    expect(medians[0]?.parameters).toHaveLength(2);
  });

  test("an empty rule table adds no fallback", () => {
    expect(unifyRecords([], [])).toHaveLength(3);
  });
});

describe("seedCatalog", () => {
  let store: SqliteCatalogStore;

  afterEach(() => {
    store.close();
  });

  test("replaces the catalog and counts per language", () => {
    store = new SqliteCatalogStore(":memory:");
    store.replaceAll([recordToDescriptor({ ...medianRecord, function_name: "old" })]);

    const summary = seedCatalog(store, [medianRecord]);
    expect(summary).toEqual({ javascript: 0, r: 5, total: 5 });
    expect(store.findByName("stats", "old")).toBeUndefined();
    expect(store.count()).toBe(5);
  });

  test("bundled seed file", async () => {
    store = new SqliteCatalogStore(":memory:");
    const records = await loadSeedFile(SEED_FILE);
    expect(records).toHaveLength(23);

    expect(seedCatalog(store, records)).toEqual({ javascript: 9, r: 17, total: 26 });
    expect(store.findByName("node:path", "basename", "javascript")?.parameters).toEqual([
      { name: "path", hasDefault: false },
      { name: "suffix", hasDefault: true, defaultValue: "undefined" },
    ]);
  });
});

describe("loadSeedFile", () => {
  let dir: string;

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("rejects records of an unknown language", async () => {
    dir = await mkdtemp(join(tmpdir(), "autods-seed-"));
    const file = join(dir, "seed.json");
    await writeFile(file, JSON.stringify([{ language: "julia", package: "Stats", function_name: "mean" }]));

    await expect(loadSeedFile(file)).rejects.toThrow();
  });

  test("fills optional fields", async () => {
    dir = await mkdtemp(join(tmpdir(), "autods-seed-"));
    const file = join(dir, "seed.json");
    await writeFile(file, JSON.stringify([{ language: "r", package: "base", function_name: "date" }]));

    expect(await loadSeedFile(file)).toEqual([
      { language: "r", package: "base", function_name: "date", parameters: [], description: "" },
    ]);
  });
});
