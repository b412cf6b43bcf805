// SQL token and AST types

export type TokenType =
  | "KEYWORD"
  | "IDENTIFIER"
  | "STRING"
  | "NUMBER"
  | "OPERATOR"
  | "STAR"
  | "COMMA"
  | "SEMICOLON"
  | "EOF";

export type Token = {
  type: TokenType;
  value: string;
  /** UTF-16 offset into the query text, so `sql.slice(position)` starts at the token */
  position: number;
};

export type Identifier = {
  name: string;
  position: number;
};

export type ComparisonOperator = "=" | "!=" | "<>" | "<" | ">" | "<=" | ">=";

export type SortDirection = "asc" | "desc";

// Literals keep their source text; the IR resolves them to typed values.
export type StringLiteral = { type: "STRING"; value: string; position: number };

export type Literal = StringLiteral | { type: "NUMBER"; value: string; position: number };

export type WhereClause =
  | { type: "AND"; left: WhereClause; right: WhereClause }
  | { type: "OR"; left: WhereClause; right: WhereClause }
  | {
      type: "COMPARISON";
      field: Identifier;
      operator: ComparisonOperator;
      value: Literal;
    }
  | { type: "LIKE"; field: Identifier; pattern: StringLiteral; negated: boolean }
  | { type: "BETWEEN"; field: Identifier; low: Literal; high: Literal; negated: boolean }
  | { type: "NULL_CHECK"; field: Identifier; negated: boolean };

export type ColumnList =
  | { type: "STAR"; position: number }
  | { type: "COLUMNS"; columns: Identifier[] };

export type OrderByClause = {
  field: Identifier;
  direction: SortDirection;
};

export type LimitClause = {
  count: number;
  offset: number;
};

export type SelectStatement = {
  type: "SELECT";
  distinct: boolean;
  columns: ColumnList;
  from: Identifier;
  where?: WhereClause;
  orderBy?: OrderByClause;
  limit?: LimitClause;
};
