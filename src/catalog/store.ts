import Database from "better-sqlite3";
import { CatalogError } from "../errors";
import type { DisplayKey, FunctionDescriptor, Language, ParameterSpec } from "./types";
import { LANGUAGES } from "./types";
import { ParameterListSchema } from "./schema";

/**
 * Read access to the function catalog plus bulk rebuild
 */
export interface CatalogStore {
  get(displayKey: DisplayKey): FunctionDescriptor | undefined;
  findByName(namespace: string, name: string, language?: Language): FunctionDescriptor | undefined;
  findByKeyPattern(language: Language, pattern: string): FunctionDescriptor | undefined;
  list(): FunctionDescriptor[];
  count(): number;
  replaceAll(descriptors: FunctionDescriptor[]): void;
  upsert(descriptor: FunctionDescriptor): void;
  close(): void;
}

/**
 * Row type for the functions_catalog table
 */
interface CatalogRow {
  display_key: string;
  language: string;
  namespace: string;
  name: string;
  parameters: string;
  signature: string;
  description: string;
}

function isLanguage(value: string): value is Language {
  return (LANGUAGES as readonly string[]).includes(value);
}

function parseParameters(json: string, key: string): ParameterSpec[] {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new CatalogError(`Malformed parameter list for ${key}`, { cause: error });
  }
  const result = ParameterListSchema.safeParse(raw);
  if (!result.success) {
    throw new CatalogError(`Malformed parameter list for ${key}: ${result.error.issues[0]?.message ?? "invalid"}`);
  }
  return result.data.map(({ name, hasDefault, defaultValue }) =>
    defaultValue === undefined ? { name, hasDefault } : { name, hasDefault, defaultValue },
  );
}

function fromRow(row: CatalogRow): FunctionDescriptor {
  if (!isLanguage(row.language)) {
    throw new CatalogError(`Unknown language "${row.language}" for ${row.display_key}`);
  }
  return {
    displayKey: row.display_key,
    language: row.language,
    namespace: row.namespace,
    name: row.name,
    parameters: parseParameters(row.parameters, row.display_key),
    signature: row.signature,
    description: row.description,
  };
}

function toRow(descriptor: FunctionDescriptor): CatalogRow {
  return {
    display_key: descriptor.displayKey,
    language: descriptor.language,
    namespace: descriptor.namespace,
    name: descriptor.name,
    parameters: JSON.stringify(descriptor.parameters),
    signature: descriptor.signature,
    description: descriptor.description,
  };
}

/**
 * SQLite-backed catalog store
 * Pass ":memory:" for a throwaway catalog
 */
export class SqliteCatalogStore implements CatalogStore {
  private readonly db: Database.Database;

  private readonly stmtGet: Database.Statement<[string], CatalogRow>;
  private readonly stmtByName: Database.Statement<[string, string], CatalogRow>;
  private readonly stmtByNameAndLanguage: Database.Statement<[string, string, string], CatalogRow>;
  private readonly stmtByPattern: Database.Statement<[string, string], CatalogRow>;
  private readonly stmtList: Database.Statement<[], CatalogRow>;
  private readonly stmtCount: Database.Statement<[], { count: number }>;
  private readonly stmtInsert: Database.Statement<[CatalogRow]>;
  private readonly stmtUpsert: Database.Statement<[CatalogRow]>;
  private readonly stmtClear: Database.Statement<[]>;

  constructor(filename: string | Database.Database = ":memory:") {
    this.db = typeof filename === "string" ? new Database(filename) : filename;

    // Case-insensitive regex used by findByKeyPattern
    this.db.function("regexp_i", { deterministic: true }, (pattern: unknown, value: unknown) => {
      if (typeof pattern !== "string" || typeof value !== "string") return 0;
      return new RegExp(pattern, "i").test(value) ? 1 : 0;
    });

    this.ensureTable();

    this.stmtGet = this.db.prepare<[string], CatalogRow>(`
      SELECT * FROM functions_catalog WHERE display_key = ?
    `);

    this.stmtByName = this.db.prepare<[string, string], CatalogRow>(`
      SELECT * FROM functions_catalog
      WHERE namespace = ? AND name = ?
      ORDER BY display_key LIMIT 1
    `);

    this.stmtByNameAndLanguage = this.db.prepare<[string, string, string], CatalogRow>(`
      SELECT * FROM functions_catalog
      WHERE namespace = ? AND name = ? AND language = ?
      ORDER BY display_key LIMIT 1
    `);

    this.stmtByPattern = this.db.prepare<[string, string], CatalogRow>(`
      SELECT * FROM functions_catalog
      WHERE language = ? AND regexp_i(?, display_key) = 1
      ORDER BY display_key LIMIT 1
    `);

    this.stmtList = this.db.prepare<[], CatalogRow>(`
      SELECT * FROM functions_catalog ORDER BY display_key
    `);

    this.stmtCount = this.db.prepare<[], { count: number }>(`
      SELECT COUNT(*) AS count FROM functions_catalog
    `);

    this.stmtInsert = this.db.prepare<CatalogRow>(`
      INSERT INTO functions_catalog (display_key, language, namespace, name, parameters, signature, description)
      VALUES (@display_key, @language, @namespace, @name, @parameters, @signature, @description)
    `);

    this.stmtUpsert = this.db.prepare<CatalogRow>(`
      INSERT INTO functions_catalog (display_key, language, namespace, name, parameters, signature, description)
      VALUES (@display_key, @language, @namespace, @name, @parameters, @signature, @description)
      ON CONFLICT(display_key) DO UPDATE SET
        language = excluded.language,
        namespace = excluded.namespace,
        name = excluded.name,
        parameters = excluded.parameters,
        signature = excluded.signature,
        description = excluded.description
    `);

    this.stmtClear = this.db.prepare<[]>(`
      DELETE FROM functions_catalog
    `);
  }

  private ensureTable(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS functions_catalog (
        display_key TEXT PRIMARY KEY,
        language TEXT NOT NULL,
        namespace TEXT NOT NULL,
        name TEXT NOT NULL,
        parameters TEXT NOT NULL,
        signature TEXT NOT NULL,
        description TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_functions_catalog_name ON functions_catalog(namespace, name);
    `);
  }

  get(displayKey: DisplayKey): FunctionDescriptor | undefined {
    const row = this.stmtGet.get(displayKey);
    return row ? fromRow(row) : undefined;
  }

  findByName(namespace: string, name: string, language?: Language): FunctionDescriptor | undefined {
    const row = language
      ? this.stmtByNameAndLanguage.get(namespace, name, language)
      : this.stmtByName.get(namespace, name);
    return row ? fromRow(row) : undefined;
  }

  findByKeyPattern(language: Language, pattern: string): FunctionDescriptor | undefined {
    // Compile up front so a bad pattern surfaces as a SyntaxError, not a SQLite error
    new RegExp(pattern, "i");
    const row = this.stmtByPattern.get(language, pattern);
    return row ? fromRow(row) : undefined;
  }

  list(): FunctionDescriptor[] {
    return this.stmtList.all().map(fromRow);
  }

  count(): number {
    return this.stmtCount.get()?.count ?? 0;
  }

  /**
   * Clear and reinsert in one transaction
   * Duplicate keys abort the whole rebuild
   */
  replaceAll(descriptors: FunctionDescriptor[]): void {
    const seen = new Set<string>();
    for (const descriptor of descriptors) {
      if (seen.has(descriptor.displayKey)) {
        throw new CatalogError(`Duplicate display key: ${descriptor.displayKey}`);
      }
      seen.add(descriptor.displayKey);
    }

    const rebuild = this.db.transaction((rows: CatalogRow[]) => {
      this.stmtClear.run();
      for (const row of rows) {
        this.stmtInsert.run(row);
      }
    });
    rebuild(descriptors.map(toRow));
  }

  upsert(descriptor: FunctionDescriptor): void {
    this.stmtUpsert.run(toRow(descriptor));
  }

  close(): void {
    this.db.close();
  }
}
