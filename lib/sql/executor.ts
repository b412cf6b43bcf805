/**
 * Run a query plan against an in-memory table
 */

import type { CanonicalOperator, ColumnRef, Predicate, TypedLiteral } from "./ir";
import type { Operation, QueryPlan } from "./plan";
import type { SortDirection } from "./types";
import {
  TypeMismatchError,
  UnknownColumnError,
  UnknownTableError,
} from "./errors";
import {
  compareText,
  isNullCell,
  parseNumeric,
  type CellValue,
  type ColumnInfo,
  type ColumnType,
  type Row,
  type Table,
} from "./table";

// A row as it moves through the plan: the source row stays available to SORT
// after PROJECT has narrowed the output row.
type Frame = {
  source: Row;
  output: Row;
};

type ExecutionState = {
  table: Table;
  columns: readonly ColumnInfo[];
  frames: Frame[];
};

export interface ResultTable extends Table {
  /** True when rows past the plan's maxRows were dropped */
  truncated: boolean;
}

/**
 * Execute a plan and return a new table; the input table is left untouched
 */
export function executePlan(plan: QueryPlan, table: Table): ResultTable {
  if (table.name !== undefined && table.name.toLowerCase() !== plan.table.toLowerCase()) {
    throw new UnknownTableError(plan.table, table.name);
  }

  let state: ExecutionState = {
    table,
    columns: table.columns,
    frames: table.rows.map((row) => ({ source: row, output: row })),
  };

  for (const operation of plan.operations) {
    state = applyOperation(state, operation);
  }

  const frames = plan.maxRows === null ? state.frames : state.frames.slice(0, plan.maxRows);
  const truncated = frames.length < state.frames.length;

  return {
    name: table.name,
    columns: state.columns,
    rows: frames.map((frame) => frame.output),
    truncated,
  };
}

function applyOperation(state: ExecutionState, operation: Operation): ExecutionState {
  switch (operation.type) {
    case "FILTER":
      return applyFilter(state, operation.predicate);
    case "PROJECT":
      return applyProject(state, operation.columns);
    case "DISTINCT":
      return applyDistinct(state);
    case "SORT":
      return applySort(state, operation.column, operation.direction);
    case "LIMIT":
      return {
        ...state,
        frames: state.frames.slice(operation.offset, operation.offset + operation.count),
      };
  }
}

/**
 * Resolve a column reference against the source table schema
 */
function resolveColumn(table: Table, ref: ColumnRef): ColumnInfo {
  const column = table.columns.find((c) => c.name === ref.name);
  if (!column) {
    throw new UnknownColumnError(
      ref.name,
      table.columns.map((c) => c.name),
      ref.position,
    );
  }
  return column;
}

function predicateColumns(predicate: Predicate): ColumnRef[] {
  switch (predicate.op) {
    case "and":
    case "or":
      return [...predicateColumns(predicate.left), ...predicateColumns(predicate.right)];
    default:
      return [predicate.column];
  }
}

function applyFilter(state: ExecutionState, predicate: Predicate): ExecutionState {
  for (const ref of predicateColumns(predicate)) {
    resolveColumn(state.table, ref);
  }

  const test = compilePredicate(predicate);
  return {
    ...state,
    frames: state.frames.filter((frame) => test(frame.source)),
  };
}

export type RowTest = (row: Row) => boolean;

/**
 * Turn a predicate into a row test. AND and OR evaluate left to right and
 * stop early. A null (empty) cell satisfies no comparison, LIKE or BETWEEN,
 * negated or not; only IS NULL matches it.
 */
export function compilePredicate(predicate: Predicate): RowTest {
  switch (predicate.op) {
    case "and": {
      const left = compilePredicate(predicate.left);
      const right = compilePredicate(predicate.right);
      return (row) => left(row) && right(row);
    }
    case "or": {
      const left = compilePredicate(predicate.left);
      const right = compilePredicate(predicate.right);
      return (row) => left(row) || right(row);
    }
    case "compare": {
      const { column, operator, literal } = predicate;
      return (row) => {
        const value = readCell(row, column);
        return !isNullCell(value) && testComparison(operator, compareCell(value, column, literal));
      };
    }
    case "like": {
      const { column, negated } = predicate;
      const pattern = likePattern(predicate.pattern);
      return (row) => {
        const value = readCell(row, column);
        return !isNullCell(value) && pattern.test(String(value)) !== negated;
      };
    }
    case "between": {
      const { column, low, high, negated } = predicate;
      return (row) => {
        const value = readCell(row, column);
        if (isNullCell(value)) return false;
        const inside = compareCell(value, column, low) >= 0 && compareCell(value, column, high) <= 0;
        return inside !== negated;
      };
    }
    case "is-null": {
      const { column, negated } = predicate;
      return (row) => isNullCell(readCell(row, column)) !== negated;
    }
  }
}

export function evaluatePredicate(predicate: Predicate, row: Row): boolean {
  return compilePredicate(predicate)(row);
}

/**
 * Translate a LIKE pattern into an anchored, case-sensitive regular expression
 */
export function likePattern(pattern: string): RegExp {
  let source = "";
  for (const char of pattern) {
    if (char === "%") {
      source += ".*";
    } else if (char === "_") {
      source += ".";
    } else {
      source += char.replace(/[\\^$.*+?()[\]{}|]/g, "\\$&");
    }
  }
  return new RegExp(`^${source}$`, "su");
}

function readCell(row: Row, ref: ColumnRef): CellValue {
  if (!Object.prototype.hasOwnProperty.call(row, ref.name)) {
    throw new UnknownColumnError(ref.name, Object.keys(row), ref.position);
  }
  return row[ref.name];
}

/**
 * Compare a cell with a literal; the literal's type decides how
 */
function compareCell(value: CellValue, ref: ColumnRef, literal: TypedLiteral): number {
  switch (literal.type) {
    case "number": {
      const numeric = typeof value === "number" ? value : parseNumeric(value);
      if (numeric === undefined) {
        throw new TypeMismatchError(ref.name, "number", value, ref.position);
      }
      return Math.sign(numeric - literal.value);
    }
    case "string":
      return Math.sign(compareText(String(value), literal.value));
  }
}

function testComparison(operator: CanonicalOperator, comparison: number): boolean {
  switch (operator) {
    case "=":
      return comparison === 0;
    case "!=":
      return comparison !== 0;
    case "<":
      return comparison < 0;
    case ">":
      return comparison > 0;
    case "<=":
      return comparison <= 0;
    case ">=":
      return comparison >= 0;
  }
}

function applyProject(state: ExecutionState, columns: ColumnRef[] | "ALL"): ExecutionState {
  if (columns === "ALL") {
    return {
      ...state,
      columns: state.table.columns,
      frames: state.frames.map((frame) => ({ source: frame.source, output: { ...frame.source } })),
    };
  }

  const projected = columns.map((ref) => resolveColumn(state.table, ref));

  return {
    ...state,
    columns: projected,
    frames: state.frames.map((frame) => ({
      source: frame.source,
      output: Object.fromEntries(
        projected.map((column): [string, CellValue] => [column.name, frame.source[column.name]]),
      ),
    })),
  };
}

function applyDistinct(state: ExecutionState): ExecutionState {
  const seen = new Set<string>();

  return {
    ...state,
    frames: state.frames.filter((frame) => {
      const key = JSON.stringify(state.columns.map((column) => frame.output[column.name]));
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    }),
  };
}

function sortKey(value: CellValue, type: ColumnType): number | string | undefined {
  if (isNullCell(value)) return undefined;
  if (type === "number") {
    return typeof value === "number" ? value : parseNumeric(value);
  }
  return String(value);
}

/**
 * Order two cells of a column by its declared type: numerically for number
 * columns, by code point for string columns. Null cells, and text in a
 * number column that is not a number, sort last in either direction.
 */
export function compareCells(
  a: CellValue,
  b: CellValue,
  type: ColumnType,
  direction: SortDirection = "asc",
): number {
  const left = sortKey(a, type);
  const right = sortKey(b, type);

  if (left === undefined || right === undefined) {
    if (left === right) return 0;
    return left === undefined ? 1 : -1;
  }

  const order =
    typeof left === "number" && typeof right === "number"
      ? Math.sign(left - right)
      : Math.sign(compareText(String(left), String(right)));
  return direction === "asc" ? order : -order;
}

function applySort(state: ExecutionState, ref: ColumnRef, direction: SortDirection): ExecutionState {
  const { type } = resolveColumn(state.table, ref);

  // Array.prototype.sort is stable, so equal keys keep their source order
  return {
    ...state,
    frames: state.frames
      .slice()
      .sort((a, b) => compareCells(readCell(a.source, ref), readCell(b.source, ref), type, direction)),
  };
}
