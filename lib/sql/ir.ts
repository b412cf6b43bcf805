/**
 * Intermediate representation of a SELECT query.
 *
 * The IR is schema-agnostic: column references are names only, and nothing
 * here knows which table the query will eventually run against. Operator
 * spelling and literal typing are settled once, during lowering, so later
 * stages never look at source text again.
 */

import type {
  ComparisonOperator,
  Identifier,
  Literal,
  SelectStatement,
  SortDirection,
  WhereClause,
} from "./types";

export type CanonicalOperator = "=" | "!=" | "<" | ">" | "<=" | ">=";

export type ColumnRef = {
  name: string;
  /** Position of the reference in the query text */
  position: number;
};

export type TypedLiteral =
  | { type: "number"; value: number }
  | { type: "string"; value: string };

export type Predicate =
  | { op: "and"; left: Predicate; right: Predicate }
  | { op: "or"; left: Predicate; right: Predicate }
  | {
      op: "compare";
      column: ColumnRef;
      operator: CanonicalOperator;
      literal: TypedLiteral;
    }
  /** SQL LIKE: `%` matches any run of characters, `_` exactly one */
  | { op: "like"; column: ColumnRef; pattern: string; negated: boolean }
  /** Inclusive on both ends */
  | { op: "between"; column: ColumnRef; low: TypedLiteral; high: TypedLiteral; negated: boolean }
  | { op: "is-null"; column: ColumnRef; negated: boolean };

export type Ordering = {
  column: ColumnRef;
  direction: SortDirection;
};

export type QueryIR = {
  op: "select";
  distinct: boolean;
  columns: "*" | ColumnRef[];
  table: string;
  filter: Predicate | null;
  orderBy: Ordering | null;
  limit: { count: number; offset: number } | null;
};

export function canonicalOperator(operator: ComparisonOperator): CanonicalOperator {
  switch (operator) {
    case "<>":
      return "!=";
    default:
      return operator;
  }
}

function lowerLiteral(literal: Literal): TypedLiteral {
  switch (literal.type) {
    case "NUMBER":
      return { type: "number", value: Number(literal.value) };
    case "STRING":
      return { type: "string", value: literal.value };
  }
}

function lowerColumn(identifier: Identifier): ColumnRef {
  return { name: identifier.name, position: identifier.position };
}

function lowerWhere(where: WhereClause): Predicate {
  switch (where.type) {
    case "AND":
      return { op: "and", left: lowerWhere(where.left), right: lowerWhere(where.right) };
    case "OR":
      return { op: "or", left: lowerWhere(where.left), right: lowerWhere(where.right) };
    case "COMPARISON":
      return {
        op: "compare",
        column: lowerColumn(where.field),
        operator: canonicalOperator(where.operator),
        literal: lowerLiteral(where.value),
      };
    case "LIKE":
      return {
        op: "like",
        column: lowerColumn(where.field),
        pattern: where.pattern.value,
        negated: where.negated,
      };
    case "BETWEEN":
      return {
        op: "between",
        column: lowerColumn(where.field),
        low: lowerLiteral(where.low),
        high: lowerLiteral(where.high),
        negated: where.negated,
      };
    case "NULL_CHECK":
      return { op: "is-null", column: lowerColumn(where.field), negated: where.negated };
  }
}

/**
 * Lower a parsed statement to IR. Never fails for a statement the parser
 * produced.
 */
export function lower(statement: SelectStatement): QueryIR {
  return {
    op: "select",
    distinct: statement.distinct,
    columns:
      statement.columns.type === "STAR" ? "*" : statement.columns.columns.map(lowerColumn),
    table: statement.from.name,
    filter: statement.where ? lowerWhere(statement.where) : null,
    orderBy: statement.orderBy
      ? { column: lowerColumn(statement.orderBy.field), direction: statement.orderBy.direction }
      : null,
    limit: statement.limit ? { count: statement.limit.count, offset: statement.limit.offset } : null,
  };
}
