/**
 * In-memory table model the engine runs queries against.
 * Tables are treated as immutable: every query produces a new one.
 */

import { TableLoadError } from "./errors";

/** An empty string is a missing (null) value */
export type CellValue = string | number;

export type ColumnType = "number" | "string";

export interface ColumnInfo {
  name: string;
  type: ColumnType;
}

export type Row = Readonly<Record<string, CellValue>>;

export interface Table {
  /** Name queries must use in FROM; unnamed tables accept any name */
  name?: string;
  columns: readonly ColumnInfo[];
  rows: readonly Row[];
}

export function isNullCell(value: CellValue): boolean {
  return value === "";
}

const NUMERIC_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

/**
 * Parse text as a plain decimal number, ignoring surrounding whitespace
 * Returns undefined for anything else (empty text, exponents, hex, words)
 */
export function parseNumeric(text: string): number | undefined {
  const trimmed = text.trim();
  return NUMERIC_PATTERN.test(trimmed) ? Number(trimmed) : undefined;
}

/**
 * Compare two strings by Unicode code point
 */
export function compareText(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const diff = (left[i].codePointAt(0) ?? 0) - (right[i].codePointAt(0) ?? 0);
    if (diff !== 0) return diff;
  }

  return left.length - right.length;
}

export interface CreateTableOptions {
  name?: string;
  /** Column order; defaults to the order keys first appear in the records */
  columns?: string[];
}

/**
 * Build a table from in-memory records, inferring each column's type
 *
 * @example
 * const students = createTable(
 *   [{ name: "Ann", age: 22 }, { name: "Bo", age: 19 }],
 *   { name: "students" },
 * );
 */
export function createTable(
  records: ReadonlyArray<Record<string, CellValue>>,
  options: CreateTableOptions = {},
): Table {
  const names = options.columns ?? collectColumnNames(records);

  if (new Set(names).size !== names.length) {
    throw new TableLoadError(`Duplicate column names: ${names.join(", ")}`, { source: options.name });
  }

  const rows = records.map((record, index): Row => {
    for (const name of names) {
      if (!Object.prototype.hasOwnProperty.call(record, name)) {
        throw new TableLoadError(`Row ${index + 1} is missing column '${name}'`, {
          source: options.name,
        });
      }
    }
    // fromEntries defines own properties, so a column named __proto__ stays a column
    return Object.fromEntries(names.map((name): [string, CellValue] => [name, record[name]]));
  });

  const columns = names.map((name): ColumnInfo => ({
    name,
    type: inferColumnType(rows.map((row) => row[name]), (value) => typeof value === "number"),
  }));

  return { name: options.name, columns, rows };
}

function collectColumnNames(records: ReadonlyArray<Record<string, CellValue>>): string[] {
  const seen = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) {
      seen.add(key);
    }
  }
  return [...seen];
}

/**
 * A column is numeric when it has at least one value and every value that is
 * not null is numeric
 */
export function inferColumnType(
  values: readonly CellValue[],
  isNumeric: (value: CellValue) => boolean,
): ColumnType {
  const present = values.filter((value) => !isNullCell(value));
  return present.length > 0 && present.every(isNumeric) ? "number" : "string";
}
