/**
 * Error taxonomy for the query pipeline. Each pipeline stage throws its own
 * error type; compileAndRun() turns any of them into a failed QueryResult.
 */

import type { Token, TokenType } from "./types";

export type QueryStage = "lex" | "parse" | "ir" | "plan" | "exec";

/**
 * Base class for every error a query can fail with
 */
export abstract class QueryError extends Error {
  readonly stage: QueryStage;
  /** Character offset into the query text, when the error points at one */
  readonly position?: number;

  protected constructor(stage: QueryStage, message: string, position?: number) {
    super(message);
    this.name = "QueryError";
    this.stage = stage;
    this.position = position;
  }
}

export class LexError extends QueryError {
  constructor(message: string, position: number) {
    super("lex", `${message} at position ${position}`, position);
    this.name = "LexError";
  }
}

export type Expectation = {
  type: TokenType;
  value?: string;
};

export function describeExpectation(expectation: Expectation): string {
  switch (expectation.type) {
    case "KEYWORD":
      return expectation.value ?? "KEYWORD";
    case "STAR":
      return "'*'";
    case "COMMA":
      return "','";
    case "SEMICOLON":
      return "';'";
    case "EOF":
      return "end of input";
    default:
      return expectation.type;
  }
}

function describeToken(token: Token): string {
  if (token.type === "EOF") return "end of input";
  return `${token.type} '${token.value}'`;
}

export class SqlSyntaxError extends QueryError {
  readonly expected: Expectation[];
  readonly found: Token;

  constructor(found: Token, expected: Expectation[], message?: string) {
    const wanted = expected.map(describeExpectation);
    const prefix =
      wanted.length === 1 ? `Expected ${wanted[0]}` : `Expected one of ${wanted.join(", ")}`;
    super(
      "parse",
      message ?? `${prefix} but got ${describeToken(found)} at position ${found.position}`,
      found.position,
    );
    this.name = "SqlSyntaxError";
    this.expected = expected;
    this.found = found;
  }
}

export type LimitViolation = "limit-required" | "limit-exceeded";

export class QueryLimitError extends QueryError {
  readonly violation: LimitViolation;

  constructor(violation: LimitViolation, message: string) {
    super("plan", message);
    this.name = "QueryLimitError";
    this.violation = violation;
  }
}

/**
 * Errors raised while running a plan against a table
 */
export abstract class ExecutionError extends QueryError {
  protected constructor(message: string, position?: number) {
    super("exec", message, position);
    this.name = "ExecutionError";
  }
}

export class UnknownColumnError extends ExecutionError {
  readonly column: string;

  constructor(column: string, available: readonly string[], position?: number) {
    super(
      `Column '${column}' does not exist. Available columns: ${available.join(", ")}`,
      position,
    );
    this.name = "UnknownColumnError";
    this.column = column;
  }
}

export class TypeMismatchError extends ExecutionError {
  readonly column: string;
  readonly expected: "number" | "string";
  readonly found: string | number;

  constructor(column: string, expected: "number" | "string", found: string | number, position?: number) {
    super(
      `Cannot compare column '${column}' with a ${expected}: value '${found}' is not a ${expected}`,
      position,
    );
    this.name = "TypeMismatchError";
    this.column = column;
    this.expected = expected;
    this.found = found;
  }
}

export class UnknownTableError extends ExecutionError {
  readonly table: string;

  constructor(table: string, loaded: string, position?: number) {
    super(`Table '${table}' does not exist. The loaded table is '${loaded}'`, position);
    this.name = "UnknownTableError";
    this.table = table;
  }
}

/**
 * Raised by loadTable() and createTable(); not part of the query pipeline
 */
export class TableLoadError extends Error {
  readonly source?: string;

  constructor(message: string, options?: { source?: string; cause?: unknown }) {
    super(
      options?.source ? `${options.source}: ${message}` : message,
      options?.cause === undefined ? undefined : { cause: options.cause },
    );
    this.name = "TableLoadError";
    this.source = options?.source;
  }
}
