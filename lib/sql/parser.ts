import type {
  Token,
  TokenType,
  SelectStatement,
  ColumnList,
  ComparisonOperator,
  Identifier,
  Literal,
  StringLiteral,
  LimitClause,
  WhereClause,
  OrderByClause,
} from "./types";
import { SqlSyntaxError, type Expectation } from "./errors";

const COMPARISON_OPERATORS: readonly ComparisonOperator[] = ["=", "!=", "<>", "<", ">", "<=", ">="];

// Statements that would modify data; rejected with a dedicated message
const WRITE_COMMANDS = [
  "INSERT",
  "UPDATE",
  "DELETE",
  "DROP",
  "CREATE",
  "ALTER",
  "TRUNCATE",
  "REPLACE",
  "MERGE",
  "GRANT",
  "REVOKE",
];

function isComparisonOperator(value: string): value is ComparisonOperator {
  return COMPARISON_OPERATORS.some((operator) => operator === value);
}

export class Parser {
  private tokens: Token[];
  private current: number = 0;
  // Everything tried at the current token since the last advance()
  private expected: Expectation[] = [];

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  parse(): SelectStatement {
    const firstToken = this.peek();

    if (firstToken.type === "EOF") {
      throw new SqlSyntaxError(firstToken, [{ type: "KEYWORD", value: "SELECT" }], "Empty SQL query");
    }

    const command = firstToken.value.toUpperCase();
    if (firstToken.type === "IDENTIFIER" && WRITE_COMMANDS.includes(command)) {
      throw new SqlSyntaxError(
        firstToken,
        [{ type: "KEYWORD", value: "SELECT" }],
        `Write operations are not supported. '${command}' is a write operation. ` +
          `Only SELECT queries are allowed.`,
      );
    }

    return this.parseSelect();
  }

  private parseSelect(): SelectStatement {
    this.consume("KEYWORD", "SELECT");

    const distinct = this.check("KEYWORD", "DISTINCT");
    if (distinct) this.advance();

    const columns = this.parseColumns();

    this.consume("KEYWORD", "FROM");
    const from = this.parseIdentifier();

    let where: WhereClause | undefined;
    if (this.check("KEYWORD", "WHERE")) {
      this.advance();
      where = this.parseWhere();
    }

    let orderBy: OrderByClause | undefined;
    if (this.check("KEYWORD", "ORDER")) {
      this.advance();
      this.consume("KEYWORD", "BY");
      orderBy = this.parseOrderBy();
    }

    let limit: LimitClause | undefined;
    if (this.check("KEYWORD", "LIMIT")) {
      this.advance();
      limit = this.parseLimit();
    }

    this.match("SEMICOLON");
    this.consume("EOF");

    return {
      type: "SELECT",
      distinct,
      columns,
      from,
      where,
      orderBy,
      limit,
    };
  }

  private parseColumns(): ColumnList {
    if (this.check("STAR")) {
      const star = this.advance();
      return { type: "STAR", position: star.position };
    }

    const columns: Identifier[] = [];
    do {
      columns.push(this.parseIdentifier());
    } while (this.match("COMMA"));

    return { type: "COLUMNS", columns };
  }

  private parseIdentifier(): Identifier {
    const token = this.consume("IDENTIFIER");
    return { name: token.value, position: token.position };
  }

  private parseWhere(): WhereClause {
    return this.parseOrExpression();
  }

  private parseOrExpression(): WhereClause {
    let left = this.parseAndExpression();

    while (this.check("KEYWORD", "OR")) {
      this.advance();
      const right = this.parseAndExpression();
      left = { type: "OR", left, right };
    }

    return left;
  }

  private parseAndExpression(): WhereClause {
    let left = this.parseComparison();

    while (this.check("KEYWORD", "AND")) {
      this.advance();
      const right = this.parseComparison();
      left = { type: "AND", left, right };
    }

    return left;
  }

  private parseComparison(): WhereClause {
    const field = this.parseIdentifier();

    if (this.check("KEYWORD", "IS")) {
      this.advance();
      const negated = this.check("KEYWORD", "NOT");
      if (negated) this.advance();
      this.consume("KEYWORD", "NULL");
      return { type: "NULL_CHECK", field, negated };
    }

    // NOT only negates LIKE and BETWEEN; "!=" covers plain comparisons
    const negated = this.check("KEYWORD", "NOT");
    if (negated) this.advance();

    if (this.check("KEYWORD", "LIKE")) {
      this.advance();
      return { type: "LIKE", field, pattern: this.parseStringLiteral(), negated };
    }

    if (this.check("KEYWORD", "BETWEEN")) {
      this.advance();
      const low = this.parseLiteral();
      this.consume("KEYWORD", "AND");
      const high = this.parseLiteral();
      return { type: "BETWEEN", field, low, high, negated };
    }

    if (negated) throw this.error();

    const operatorToken = this.consume("OPERATOR");
    if (!isComparisonOperator(operatorToken.value)) {
      throw new SqlSyntaxError(operatorToken, [{ type: "OPERATOR" }]);
    }

    return {
      type: "COMPARISON",
      field,
      operator: operatorToken.value,
      value: this.parseLiteral(),
    };
  }

  private parseStringLiteral(): StringLiteral {
    const token = this.consume("STRING");
    return { type: "STRING", value: token.value, position: token.position };
  }

  private parseLiteral(): Literal {
    if (this.check("STRING")) {
      const token = this.advance();
      return { type: "STRING", value: token.value, position: token.position };
    }

    if (this.check("NUMBER")) {
      const token = this.advance();
      return { type: "NUMBER", value: token.value, position: token.position };
    }

    throw this.error();
  }

  private parseOrderBy(): OrderByClause {
    const field = this.parseIdentifier();
    let direction: "asc" | "desc" = "asc";

    if (this.check("KEYWORD", "ASC") || this.check("KEYWORD", "DESC")) {
      direction = this.advance().value === "DESC" ? "desc" : "asc";
    }

    return { field, direction };
  }

  private parseLimit(): LimitClause {
    const count = this.parseWholeNumber("LIMIT");

    let offset = 0;
    if (this.check("KEYWORD", "OFFSET")) {
      this.advance();
      offset = this.parseWholeNumber("OFFSET");
    }

    return { count, offset };
  }

  private parseWholeNumber(clause: string): number {
    const token = this.peek();
    this.consume("NUMBER");

    if (!/^\d+$/.test(token.value)) {
      throw new SqlSyntaxError(
        token,
        [{ type: "NUMBER" }],
        `${clause} must be a whole number, got '${token.value}' at position ${token.position}`,
      );
    }

    return parseInt(token.value, 10);
  }

  private check(type: TokenType, value?: string): boolean {
    const token = this.peek();
    if (token.type === type && (value === undefined || token.value === value)) return true;

    if (!this.expected.some((e) => e.type === type && e.value === value)) {
      this.expected.push(value === undefined ? { type } : { type, value });
    }
    return false;
  }

  private match(type: TokenType): boolean {
    if (this.check(type)) {
      this.advance();
      return true;
    }
    return false;
  }

  private consume(type: TokenType, value?: string): Token {
    if (this.check(type, value)) return this.advance();
    throw this.error();
  }

  private error(): SqlSyntaxError {
    return new SqlSyntaxError(this.peek(), this.expected);
  }

  private advance(): Token {
    const token = this.peek();
    if (!this.isAtEnd()) this.current++;
    this.expected = [];
    return token;
  }

  private isAtEnd(): boolean {
    return this.peek().type === "EOF";
  }

  private peek(): Token {
    return this.tokens[this.current];
  }
}

export function parse(tokens: Token[]): SelectStatement {
  return new Parser(tokens).parse();
}
