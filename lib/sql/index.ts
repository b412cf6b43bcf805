export { compileAndRun, compileQuery } from "./engine";
export type { CompiledQuery, QueryOptions, QueryResult } from "./engine";
export { Lexer, tokenize, KEYWORDS } from "./lexer";
export { Parser, parse } from "./parser";
export { lower, canonicalOperator } from "./ir";
export type { CanonicalOperator, ColumnRef, Ordering, Predicate, QueryIR, TypedLiteral } from "./ir";
export { generatePlan, formatPlan, formatPredicate } from "./plan";
export type { Operation, QueryPlan } from "./plan";
export { executePlan, compilePredicate, evaluatePredicate, compareCells, likePattern } from "./executor";
export type { ResultTable, RowTest } from "./executor";
export { createTable, parseNumeric, compareText, isNullCell, inferColumnType } from "./table";
export type { CellValue, ColumnInfo, ColumnType, CreateTableOptions, Row, Table } from "./table";
export { loadTable, parseDelimited, tableFromRecords, tableNameFromPath } from "./loader";
export type { LoadTableOptions, Logger } from "./loader";
export { suggestQueries } from "./examples";
export {
  QueryError,
  LexError,
  SqlSyntaxError,
  QueryLimitError,
  ExecutionError,
  UnknownColumnError,
  TypeMismatchError,
  UnknownTableError,
  TableLoadError,
  describeExpectation,
} from "./errors";
export type { Expectation, LimitViolation, QueryStage } from "./errors";
export { QueryLimitsSchema, resolveLimits, DEFAULT_LIMITS, PERMISSIVE_LIMITS, STRICT_LIMITS } from "./limits";
export type { QueryLimits } from "./limits";
export type * from "./types";
