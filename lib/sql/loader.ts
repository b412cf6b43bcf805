/**
 * Load delimited text files (CSV, TSV) into tables
 */

import { readFile } from "node:fs/promises";
import { basename, extname } from "node:path";
import { TableLoadError } from "./errors";
import { KEYWORDS } from "./lexer";
import {
  inferColumnType,
  parseNumeric,
  type CellValue,
  type ColumnInfo,
  type Row,
  type Table,
} from "./table";

export interface Logger {
  log(message: string): void;
}

export interface LoadTableOptions {
  /** Field delimiter; defaults to tab for .tsv files and comma otherwise */
  delimiter?: string;
  /** Table name; defaults to the file name without its extension */
  name?: string;
  logger?: Logger;
}

/**
 * Split delimited text into records of raw fields.
 * Quoted fields may contain delimiters, newlines and doubled quotes.
 */
export function parseDelimited(text: string, delimiter: string = ","): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = "";
  let inQuotes = false;
  let i = 0;

  while (i < text.length) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"' && text[i + 1] === '"') {
        field += '"';
        i += 2;
        continue;
      }
      if (char === '"') {
        inQuotes = false;
      } else {
        field += char;
      }
      i++;
      continue;
    }

    if (char === '"' && field === "") {
      inQuotes = true;
    } else if (char === delimiter) {
      record.push(field);
      field = "";
    } else if (char === "\n" || char === "\r") {
      record.push(field);
      records.push(record);
      record = [];
      field = "";
      if (char === "\r" && text[i + 1] === "\n") i++;
    } else {
      field += char;
    }
    i++;
  }

  if (inQuotes) {
    throw new TableLoadError("Unterminated quoted field");
  }

  if (field !== "" || record.length > 0) {
    record.push(field);
    records.push(record);
  }

  return records;
}

/**
 * Derive a table name usable in FROM from a file path
 */
export function tableNameFromPath(path: string): string {
  let name = basename(path, extname(path)).replace(/[^A-Za-z0-9_]/g, "");
  if (name === "") return "data";
  if (/^[0-9]/.test(name)) name = `_${name}`;
  if (KEYWORDS.has(name.toUpperCase())) name = `${name}_`;
  return name;
}

/**
 * Build a table from parsed records: the first record is the header
 */
export function tableFromRecords(records: string[][], name?: string): Table {
  const nonBlank = records.filter((record) => !(record.length === 1 && record[0].trim() === ""));

  if (nonBlank.length === 0) {
    throw new TableLoadError("File has no header row");
  }

  const [header, ...body] = nonBlank;
  const names = header.map((column) => column.trim());

  names.forEach((column, index) => {
    if (column === "") {
      throw new TableLoadError(`Header column ${index + 1} is empty`);
    }
    if (names.indexOf(column) !== index) {
      throw new TableLoadError(`Duplicate column '${column}' in header`);
    }
  });

  body.forEach((record, index) => {
    if (record.length !== names.length) {
      throw new TableLoadError(
        `Row ${index + 1} has ${record.length} fields, expected ${names.length}`,
      );
    }
  });

  const columns = names.map((column, index): ColumnInfo => ({
    name: column,
    type: inferColumnType(
      body.map((record) => record[index]),
      (value) => parseNumeric(String(value)) !== undefined,
    ),
  }));

  // Empty fields stay "" (null) in numeric columns
  const rows = body.map(
    (record): Row =>
      Object.fromEntries(
        columns.map((column, index): [string, CellValue] => {
          const raw = record[index];
          return [column.name, column.type === "number" ? (parseNumeric(raw) ?? raw) : raw];
        }),
      ),
  );

  return { name, columns, rows };
}

/**
 * Load a delimited file into a table
 *
 * @throws TableLoadError if the file cannot be read or is malformed
 *
 * @example
 * const students = await loadTable("data/students.csv");
 * const result = compileAndRun("SELECT name FROM students WHERE age > 20", students);
 */
export async function loadTable(path: string, options: LoadTableOptions = {}): Promise<Table> {
  const name = options.name ?? tableNameFromPath(path);
  const delimiter = options.delimiter ?? (extname(path).toLowerCase() === ".tsv" ? "\t" : ",");
  const logger = options.logger ?? console;

  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    throw new TableLoadError(
      `Could not read file: ${error instanceof Error ? error.message : String(error)}`,
      { source: path, cause: error },
    );
  }

  let table: Table;
  try {
    table = tableFromRecords(parseDelimited(text, delimiter), name);
  } catch (error) {
    if (error instanceof TableLoadError) {
      throw new TableLoadError(error.message, { source: path, cause: error });
    }
    throw error;
  }

  logger.log(
    `[SQL] Loaded table '${name}' from ${path}: ${table.rows.length} rows, ${table.columns.length} columns`,
  );
  return table;
}
