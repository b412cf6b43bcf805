/**
 * SQL query engine: text -> tokens -> AST -> IR -> plan -> result
 */

import { tokenize } from "./lexer";
import { parse } from "./parser";
import { lower, type QueryIR } from "./ir";
import { generatePlan, type QueryPlan } from "./plan";
import { executePlan } from "./executor";
import { QueryError, type QueryStage } from "./errors";
import { resolveLimits, DEFAULT_LIMITS, type QueryLimits } from "./limits";
import type { ColumnInfo, Row, Table } from "./table";
import type { SelectStatement, Token } from "./types";

export interface CompiledQuery {
  tokens: Token[];
  statement: SelectStatement;
  ir: QueryIR;
  plan: QueryPlan;
}

export interface QueryOptions {
  /** Overrides merged over DEFAULT_LIMITS */
  limits?: Partial<QueryLimits>;
}

export type QueryResult =
  | {
      success: true;
      columns: readonly ColumnInfo[];
      rows: readonly Row[];
      /** True when the limits' maxRows cut the result short */
      truncated: boolean;
      plan: QueryPlan;
    }
  | {
      success: false;
      stage: QueryStage;
      message: string;
      position?: number;
      error: QueryError;
    };

/**
 * Run every compile stage and keep each intermediate form
 *
 * @throws LexError, SqlSyntaxError or QueryLimitError from the failing stage
 */
export function compileQuery(sql: string, limits: QueryLimits = DEFAULT_LIMITS): CompiledQuery {
  const tokens = tokenize(sql);
  const statement = parse(tokens);
  const ir = lower(statement);
  const plan = generatePlan(ir, limits);

  return { tokens, statement, ir, plan };
}

/**
 * Compile a SQL SELECT query and run it against a table
 *
 * Query errors come back as a failed result naming the stage that rejected
 * the query; anything else (for example invalid limits) is thrown.
 *
 * @example
 * const result = compileAndRun("SELECT name, age FROM students WHERE age > 20 ORDER BY age DESC", students);
 * if (result.success) console.table(result.rows);
 *
 * @example
 * // With custom limits
 * compileAndRun("SELECT * FROM students LIMIT 10", students, { limits: { requireLimit: true } });
 */
export function compileAndRun(sql: string, table: Table, options: QueryOptions = {}): QueryResult {
  const limits = resolveLimits(options.limits);

  try {
    const { plan } = compileQuery(sql, limits);
    const result = executePlan(plan, table);
    return {
      success: true,
      columns: result.columns,
      rows: result.rows,
      truncated: result.truncated,
      plan,
    };
  } catch (error) {
    if (error instanceof QueryError) {
      return {
        success: false,
        stage: error.stage,
        message: error.message,
        position: error.position,
        error,
      };
    }
    throw error;
  }
}
