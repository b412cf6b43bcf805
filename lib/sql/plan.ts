/**
 * Translate IR into an ordered list of relational operations
 */

import type { ColumnRef, Predicate, QueryIR, TypedLiteral } from "./ir";
import type { SortDirection } from "./types";
import { QueryLimitError } from "./errors";
import { DEFAULT_LIMITS, type QueryLimits } from "./limits";

export type Operation =
  | { type: "FILTER"; predicate: Predicate }
  | { type: "PROJECT"; columns: ColumnRef[] | "ALL" }
  // Keeps the first row of each group of identical projected rows
  | { type: "DISTINCT" }
  // The sort column refers to the source row, so it need not be projected
  | { type: "SORT"; column: ColumnRef; direction: SortDirection }
  | { type: "LIMIT"; count: number; offset: number };

export type QueryPlan = {
  /** Table named in the FROM clause */
  table: string;
  /** Always in FILTER, PROJECT, DISTINCT, SORT, LIMIT order */
  operations: Operation[];
  /** Cap applied to the final row count; null for no cap */
  maxRows: number | null;
};

/**
 * Validate the query's LIMIT against configured limits
 */
function validateQueryLimits(ir: QueryIR, limits: QueryLimits): void {
  const table = ir.table.toLowerCase();
  const exempt = limits.exemptTables.some((name) => name.toLowerCase() === table);

  if (limits.requireLimit && !ir.limit && !exempt) {
    throw new QueryLimitError(
      "limit-required",
      `Query must include a LIMIT clause for table '${ir.table}'. ` +
        `Maximum allowed LIMIT is ${limits.maxLimit}.`,
    );
  }

  if (ir.limit && ir.limit.count > limits.maxLimit) {
    throw new QueryLimitError(
      "limit-exceeded",
      `LIMIT ${ir.limit.count} exceeds maximum allowed limit of ${limits.maxLimit}.`,
    );
  }
}

export function generatePlan(ir: QueryIR, limits: QueryLimits = DEFAULT_LIMITS): QueryPlan {
  validateQueryLimits(ir, limits);

  const operations: Operation[] = [];

  if (ir.filter) {
    operations.push({ type: "FILTER", predicate: ir.filter });
  }

  operations.push({ type: "PROJECT", columns: ir.columns === "*" ? "ALL" : ir.columns });

  if (ir.distinct) {
    operations.push({ type: "DISTINCT" });
  }

  if (ir.orderBy) {
    operations.push({ type: "SORT", column: ir.orderBy.column, direction: ir.orderBy.direction });
  }

  if (ir.limit) {
    operations.push({ type: "LIMIT", count: ir.limit.count, offset: ir.limit.offset });
  }

  return { table: ir.table, operations, maxRows: limits.maxRows };
}

function formatLiteral(literal: TypedLiteral): string {
  switch (literal.type) {
    case "number":
      return String(literal.value);
    case "string":
      return literal.value.includes("'") ? `"${literal.value}"` : `'${literal.value}'`;
  }
}

export function formatPredicate(predicate: Predicate): string {
  switch (predicate.op) {
    case "compare":
      return `${predicate.column.name} ${predicate.operator} ${formatLiteral(predicate.literal)}`;
    case "like":
      return `${predicate.column.name} ${predicate.negated ? "NOT LIKE" : "LIKE"} ${formatLiteral({
        type: "string",
        value: predicate.pattern,
      })}`;
    case "between":
      return (
        `${predicate.column.name} ${predicate.negated ? "NOT BETWEEN" : "BETWEEN"} ` +
        `${formatLiteral(predicate.low)} AND ${formatLiteral(predicate.high)}`
      );
    case "is-null":
      return `${predicate.column.name} ${predicate.negated ? "IS NOT NULL" : "IS NULL"}`;
    case "or":
      return `${formatPredicate(predicate.left)} OR ${formatPredicate(predicate.right)}`;
    case "and": {
      const side = (p: Predicate) => (p.op === "or" ? `(${formatPredicate(p)})` : formatPredicate(p));
      return `${side(predicate.left)} AND ${side(predicate.right)}`;
    }
  }
}

/**
 * Render a plan one operation per line, e.g. for an "explain" view
 *
 * @example
 * formatPlan(plan);
 * // FILTER age > 20
 * // PROJECT name, age
 * // SORT age DESC
 */
export function formatPlan(plan: QueryPlan): string {
  return plan.operations
    .map((operation) => {
      switch (operation.type) {
        case "FILTER":
          return `FILTER ${formatPredicate(operation.predicate)}`;
        case "PROJECT":
          return operation.columns === "ALL"
            ? "PROJECT *"
            : `PROJECT ${operation.columns.map((c) => c.name).join(", ")}`;
        case "DISTINCT":
          return "DISTINCT";
        case "SORT":
          return `SORT ${operation.column.name} ${operation.direction.toUpperCase()}`;
        case "LIMIT":
          return operation.offset > 0
            ? `LIMIT ${operation.count} OFFSET ${operation.offset}`
            : `LIMIT ${operation.count}`;
      }
    })
    .join("\n");
}
