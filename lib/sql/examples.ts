/**
 * Example queries for a loaded table, built from its schema and first rows.
 * Every suggestion compiles and runs against the table it was built from.
 */

import { KEYWORDS } from "./lexer";
import type { ColumnInfo, Table } from "./table";

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const LITERAL_NUMBER_PATTERN = /^\d+(\.\d+)?$/;

function isQueryable(name: string): boolean {
  return IDENTIFIER_PATTERN.test(name) && !KEYWORDS.has(name.toUpperCase());
}

function quote(value: string): string | undefined {
  if (!value.includes("'")) return `'${value}'`;
  if (!value.includes('"')) return `"${value}"`;
  return undefined;
}

export function suggestQueries(table: Table): string[] {
  const tableName = table.name ?? "data";
  if (!isQueryable(tableName)) return [];

  const columns = table.columns.filter((column) => isQueryable(column.name));
  const firstRow = table.rows[0];
  const examples = [`SELECT * FROM ${tableName}`];

  if (columns.length >= 2) {
    examples.push(`SELECT ${columns[0].name}, ${columns[1].name} FROM ${tableName}`);
  }

  const numeric: ColumnInfo | undefined = columns.find((column) => column.type === "number");
  const text: ColumnInfo | undefined = columns.find((column) => column.type === "string");

  if (numeric && firstRow) {
    const value = String(firstRow[numeric.name]);
    if (LITERAL_NUMBER_PATTERN.test(value)) {
      examples.push(`SELECT * FROM ${tableName} WHERE ${numeric.name} >= ${value}`);
    }
  }

  if (text && firstRow) {
    const literal = quote(String(firstRow[text.name]));
    if (literal !== undefined) {
      examples.push(`SELECT * FROM ${tableName} WHERE ${text.name} = ${literal}`);
    }
  }

  const sortColumn = numeric ?? columns[0];
  if (sortColumn) {
    examples.push(`SELECT * FROM ${tableName} ORDER BY ${sortColumn.name} DESC LIMIT 5`);
  }

  return examples;
}
