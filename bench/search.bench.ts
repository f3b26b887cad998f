/**
 * Search Performance Benchmarks
 * Flat L2 index build/search and display-key regex search at various scales
 */

import { SqliteCatalogStore } from "../src/catalog/store";
import { HashEmbeddingProvider } from "../src/embedding/hash";
import { buildSemanticIndex, FlatL2Index, searchKeysWithRegex, searchSemanticIndex } from "../src/search";
import { generateMockDescriptors, runBenchmarks } from "./utils";

function randomVector(dimension: number): number[] {
  return Array.from({ length: dimension }, () => Math.random() * 2 - 1);
}

async function main() {
  console.log("\n🔍 Search Performance Benchmarks\n");

  const provider = new HashEmbeddingProvider(256);
  const sizes = [100, 1000, 10000];

  for (const size of sizes) {
    console.log(`\n📊 Catalog Size: ${size} functions\n`);

    const descriptors = generateMockDescriptors(size);
    const store = new SqliteCatalogStore(":memory:");
    store.replaceAll(descriptors);

    const built = await buildSemanticIndex(store, provider, { batchSize: 500 });
    if (!built.success) {
      throw new Error(built.error);
    }
    const index = built.index;
    const query = randomVector(index.dimension);

    await runBenchmarks(
      [
        {
          name: `Flat L2 k=1 (${size} vectors)`,
          fn: () => {
            index.vectors.search(query, 1);
          },
        },
        {
          name: `Flat L2 k=10 (${size} vectors)`,
          fn: () => {
            index.vectors.search(query, 10);
          },
        },
        {
          name: `Semantic query end-to-end (${size})`,
          fn: async () => {
            await searchSemanticIndex(index, "fit a linear model", provider, store, 1);
          },
        },
        {
          name: `Regex prefix match (${size})`,
          fn: () => {
            searchKeysWithRegex(descriptors, "^R: stats::", 10);
          },
        },
        {
          name: `Regex case-insensitive (${size})`,
          fn: () => {
            searchKeysWithRegex(descriptors, "(?i)variance", 10);
          },
        },
      ],
      { warmup: 10, iterations: 100 }
    );

    store.close();
  }

  console.log("\n📊 Index Build Performance\n");

  await runBenchmarks(
    [
      {
        name: "Add 1000 vectors (dim 256)",
        fn: () => {
          const index = new FlatL2Index(256);
          for (let i = 0; i < 1000; i++) {
            index.add(randomVector(256));
          }
        },
      },
      {
        name: "Serialize + deserialize 1000 vectors",
        fn: () => {
          const index = new FlatL2Index(256, 1000);
          for (let i = 0; i < 1000; i++) {
            index.add(randomVector(256));
          }
          FlatL2Index.deserialize(index.serialize());
        },
      },
    ],
    { warmup: 3, iterations: 20 }
  );

  console.log("\n✅ Search benchmarks complete!\n");
}

main().catch(console.error);
