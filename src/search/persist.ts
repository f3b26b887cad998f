import { randomUUID } from "crypto";
import { mkdir, readFile, rename, rm, stat, writeFile } from "fs/promises";
import { basename, dirname, join } from "path";
import { DescriptorSummarySchema } from "../catalog/schema";
import type { DescriptorSummary } from "../catalog/types";
import { IndexCorruptionError, IndexNotFoundError, isMissingFile } from "../errors";
import { FlatL2Index } from "./flat-index";
import { SemanticIndex } from "./semantic";

export const INDEX_FILE = "functions.index";
export const KEYS_FILE = "descriptions.txt";
export const MAP_FILE = "function_map.json";

/**
 * Write the three artifacts to a staging directory, then swap it in whole
 * Readers see the old set or the new set, never a mixture
 */
export async function saveSemanticIndex(index: SemanticIndex, dir: string): Promise<void> {
  const parent = dirname(dir);
  const suffix = randomUUID().slice(0, 8);
  const staging = join(parent, `.${basename(dir)}.staging-${suffix}`);
  const retired = join(parent, `.${basename(dir)}.old-${suffix}`);

  await mkdir(staging, { recursive: true });
  try {
    const map: Record<string, DescriptorSummary> = {};
    index.summaries.forEach((summary, i) => {
      map[String(i)] = summary;
    });

    await writeFile(join(staging, INDEX_FILE), index.vectors.serialize());
    await writeFile(join(staging, KEYS_FILE), index.keys.join("\n"), "utf-8");
    await writeFile(join(staging, MAP_FILE), JSON.stringify(map, null, 2), "utf-8");

    let hadPrevious = true;
    try {
      await rename(dir, retired);
    } catch (error) {
      if (!isMissingFile(error)) throw error;
      hadPrevious = false;
    }

    await rename(staging, dir);
    if (hadPrevious) {
      await rm(retired, { recursive: true, force: true });
    }
  } catch (error) {
    await rm(staging, { recursive: true, force: true });
    throw error;
  }
}

/**
 * Check whether an index directory exists
 */
export async function hasSavedIndex(dir: string): Promise<boolean> {
  try {
    return (await stat(join(dir, INDEX_FILE))).isFile();
  } catch (error) {
    if (isMissingFile(error)) return false;
    throw error;
  }
}

async function readArtifact(dir: string, file: string): Promise<Buffer | null> {
  try {
    return await readFile(join(dir, file));
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw error;
  }
}

function parseSummary(value: unknown, id: string): DescriptorSummary {
  const result = DescriptorSummarySchema.safeParse(value);
  if (!result.success) {
    throw new IndexCorruptionError(`Malformed entry "${id}" in ${MAP_FILE}`, { cause: result.error });
  }
  return result.data;
}

/**
 * Load the three artifacts and check they belong together
 */
export async function loadSemanticIndex(dir: string): Promise<SemanticIndex> {
  const [indexBuffer, keysBuffer, mapBuffer] = await Promise.all([
    readArtifact(dir, INDEX_FILE),
    readArtifact(dir, KEYS_FILE),
    readArtifact(dir, MAP_FILE),
  ]);

  if (!indexBuffer && !keysBuffer && !mapBuffer) {
    throw new IndexNotFoundError(`No index found in ${dir}. Run the index build first.`);
  }
  if (!indexBuffer || !keysBuffer || !mapBuffer) {
    const missing = [
      indexBuffer ? null : INDEX_FILE,
      keysBuffer ? null : KEYS_FILE,
      mapBuffer ? null : MAP_FILE,
    ].filter(file => file !== null);
    throw new IndexCorruptionError(`Incomplete index in ${dir}: missing ${missing.join(", ")}`);
  }

  let vectors: FlatL2Index;
  try {
    vectors = FlatL2Index.deserialize(indexBuffer);
  } catch (error) {
    throw new IndexCorruptionError(
      `Unreadable ${INDEX_FILE}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }

  const keysText = keysBuffer.toString("utf-8");
  const keys = keysText.length === 0 ? [] : keysText.split("\n");

  let rawMap: unknown;
  try {
    rawMap = JSON.parse(mapBuffer.toString("utf-8"));
  } catch (error) {
    throw new IndexCorruptionError(`Unreadable ${MAP_FILE}`, { cause: error });
  }
  if (typeof rawMap !== "object" || rawMap === null || Array.isArray(rawMap)) {
    throw new IndexCorruptionError(`${MAP_FILE} is not an object`);
  }

  const entries = Object.entries(rawMap);
  if (vectors.size !== keys.length || keys.length !== entries.length) {
    throw new IndexCorruptionError(
      `Index artifacts disagree: ${vectors.size} vectors, ${keys.length} keys, ${entries.length} map entries`,
    );
  }

  const byId = new Map<string, unknown>(entries);
  const summaries: DescriptorSummary[] = [];
  for (let i = 0; i < keys.length; i++) {
    const id = String(i);
    const entry = byId.get(id);
    if (entry === undefined) {
      throw new IndexCorruptionError(`${MAP_FILE} has no entry "${id}"`);
    }
    summaries.push(parseSummary(entry, id));
  }

  return new SemanticIndex(vectors, keys, summaries);
}
