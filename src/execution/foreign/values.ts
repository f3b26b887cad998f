import type { Logger } from "../../logger";

/**
 * Built-in R datasets a string argument may name, with their column counts
 */
export const BUILTIN_DATASETS: Readonly<Record<string, number>> = {
  iris: 5,
  mtcars: 11,
  cars: 2,
  faithful: 2,
  airquality: 6,
  ToothGrowth: 3,
  PlantGrowth: 2,
  women: 2,
  trees: 3,
  pressure: 2,
  USArrests: 4,
  chickwts: 2,
};

export type Scalar = string | number | boolean | null;
export type VectorType = "numeric" | "logical" | "character";

export type Column = { name: string; type: VectorType; values: Scalar[] };

/**
 * An argument shaped for the R runtime
 */
export type RValue =
  | { kind: "formula"; text: string }
  | { kind: "dataset"; name: string; columns?: string[] }
  | { kind: "data.frame"; columns: Column[] }
  | { kind: "vector"; type: VectorType; values: Scalar[] }
  | { kind: "scalar"; value: Scalar }
  | { kind: "expression"; text: string }
  | { kind: "raw"; value: unknown };

export type ShapeContext = {
  /** Call is the regression entry point; two-column tables get x, y */
  regression: boolean;
  /** Formula text of the same call, if any */
  formula?: string;
  logger?: Logger;
};

const FORMULA_VARIABLE = /[A-Za-z_.][A-Za-z0-9_.]*/g;

/**
 * A named dataset is renamed to x, y only when the formula refers to nothing else
 */
function formulaUsesXY(formula: string | undefined): boolean {
  if (formula === undefined) return false;
  const variables = formula.match(FORMULA_VARIABLE) ?? [];
  return variables.length > 0 && variables.every(v => v === "x" || v === "y");
}

export function isScalar(value: unknown): value is Scalar {
  return value === null || ["string", "number", "boolean"].includes(typeof value);
}

function vectorType(values: readonly unknown[]): VectorType | undefined {
  if (!values.every(isScalar)) return undefined;
  const present = values.filter(v => v !== null);
  if (present.length > 0 && present.every(v => typeof v === "number")) return "numeric";
  if (present.length > 0 && present.every(v => typeof v === "boolean")) return "logical";
  if (present.length === 0) return "logical";
  return "character";
}

function columnNames(count: number, regression: boolean): string[] {
  if (regression && count === 2) return ["x", "y"];
  return Array.from({ length: count }, (_, i) => `col${i}`);
}

function toDataFrame(rows: unknown[][], regression: boolean): RValue | undefined {
  const width = rows[0]?.length ?? 0;
  if (width === 0 || rows.some(row => row.length !== width)) return undefined;

  const names = columnNames(width, regression);
  const columns: Column[] = [];
  for (const [i, name] of names.entries()) {
    const cells = rows.map(row => row[i]);
    const type = vectorType(cells);
    if (!type || !cells.every(isScalar)) return undefined;
    columns.push({ name, type, values: cells });
  }
  return { kind: "data.frame", columns };
}

export function renderScalar(value: Scalar, type?: VectorType): string {
  if (value === null) return "NA";
  if (typeof value === "boolean") return value ? "TRUE" : "FALSE";
  if (typeof value === "number") {
    if (Number.isNaN(value)) return "NaN";
    if (!Number.isFinite(value)) return value > 0 ? "Inf" : "-Inf";
    return type === "character" ? JSON.stringify(String(value)) : String(value);
  }
  return JSON.stringify(value);
}

function renderVector(type: VectorType, values: readonly Scalar[]): string {
  if (values.length === 0) return `${type}(0)`;
  return `c(${values.map(v => renderScalar(v, type)).join(", ")})`;
}

/**
 * Text construction for rows that failed typed conversion
 * Ragged rows are fine here; nested cells are not
 */
function toRowBindExpression(rows: unknown[][]): RValue | undefined {
  if (!rows.every(row => row.every(isScalar))) return undefined;
  const rendered = rows.map(row => {
    const type = vectorType(row) ?? "character";
    return renderVector(type, row.filter(isScalar));
  });
  return { kind: "expression", text: `as.data.frame(do.call(rbind, list(${rendered.join(", ")})))` };
}

function isRowList(value: unknown): value is unknown[][] {
  return Array.isArray(value) && value.length > 0 && value.every(row => Array.isArray(row));
}

/**
 * Shape one argument for the R runtime
 * typed conversion -> textual construction -> raw pass-through
 */
export function shapeArgument(name: string, value: unknown, context: ShapeContext): RValue {
  if (name.toLowerCase() === "formula" && typeof value === "string") {
    return { kind: "formula", text: value };
  }

  if (typeof value === "string" && Object.hasOwn(BUILTIN_DATASETS, value)) {
    const width = BUILTIN_DATASETS[value];
    if (context.regression && width === 2 && formulaUsesXY(context.formula)) {
      return { kind: "dataset", name: value, columns: ["x", "y"] };
    }
    return { kind: "dataset", name: value };
  }

  if (isRowList(value)) {
    const frame = toDataFrame(value, context.regression);
    if (frame) return frame;

    context.logger?.debug(`Typed conversion of '${name}' failed, using row bind`, { rows: value.length });
    const expression = toRowBindExpression(value);
    if (expression) return expression;

    context.logger?.warn(`ConversionFailure: passing '${name}' through unconverted`, { value });
    return { kind: "raw", value };
  }

  if (Array.isArray(value)) {
    const type = vectorType(value);
    if (type) return { kind: "vector", type, values: value.filter(isScalar) };

    context.logger?.warn(`ConversionFailure: passing '${name}' through unconverted`, { value });
    return { kind: "raw", value };
  }

  if (isScalar(value)) {
    return { kind: "scalar", value };
  }

  return { kind: "raw", value };
}

/**
 * R source text for a shaped value
 */
export function renderRValue(value: RValue): string {
  switch (value.kind) {
    case "formula":
      return `stats::as.formula(${JSON.stringify(value.text)})`;
    case "dataset": {
      const source = `datasets::${value.name}`;
      if (!value.columns) return source;
      return `stats::setNames(${source}, c(${value.columns.map(c => JSON.stringify(c)).join(", ")}))`;
    }
    case "data.frame": {
      const columns = value.columns.map(c => `${c.name} = ${renderVector(c.type, c.values)}`);
      return `data.frame(${columns.join(", ")}, stringsAsFactors = FALSE)`;
    }
    case "vector":
      return renderVector(value.type, value.values);
    case "scalar":
      return value.value === null ? "NULL" : renderScalar(value.value);
    case "expression":
      return value.text;
    case "raw":
      return JSON.stringify(JSON.stringify(value.value) ?? String(value.value));
  }
}
