import type { Token, TokenType } from "./types";
import { LexError } from "./errors";

export const KEYWORDS = new Set([
  "SELECT",
  "FROM",
  "WHERE",
  "ORDER",
  "BY",
  "AND",
  "OR",
  "ASC",
  "DESC",
  "LIMIT",
  "OFFSET",
  "DISTINCT",
  "LIKE",
  "BETWEEN",
  "IS",
  "NOT",
  "NULL",
]);

export class Lexer {
  private input: string;
  private position: number = 0;
  private tokens: Token[] = [];

  constructor(input: string) {
    this.input = input;
  }

  tokenize(): Token[] {
    while (this.position < this.input.length) {
      this.skipWhitespace();

      if (this.position >= this.input.length) break;

      const char = this.input[this.position];

      if (char === "*") {
        this.push("STAR", "*");
      } else if (char === ",") {
        this.push("COMMA", ",");
      } else if (char === ";") {
        this.push("SEMICOLON", ";");
      } else if (char === "=") {
        this.push("OPERATOR", "=");
      } else if (char === "!" && this.peek() === "=") {
        this.push("OPERATOR", "!=");
      } else if (char === ">") {
        this.push("OPERATOR", this.peek() === "=" ? ">=" : ">");
      } else if (char === "<") {
        const next = this.peek();
        this.push("OPERATOR", next === "=" ? "<=" : next === ">" ? "<>" : "<");
      } else if (char === "'" || char === '"') {
        this.tokenizeString(char);
      } else if (this.isDigit(char)) {
        this.tokenizeNumber();
      } else if (this.isAlpha(char)) {
        this.tokenizeIdentifierOrKeyword();
      } else {
        throw new LexError(`Unexpected character '${char}'`, this.position);
      }
    }

    this.tokens.push({ type: "EOF", value: "", position: this.input.length });
    return this.tokens;
  }

  private push(type: TokenType, value: string): void {
    this.tokens.push({ type, value, position: this.position });
    this.position += value.length;
  }

  private skipWhitespace(): void {
    while (this.position < this.input.length && /\s/.test(this.input[this.position])) {
      this.position++;
    }
  }

  private peek(offset: number = 1): string {
    return this.input[this.position + offset] || "";
  }

  private isDigit(char: string): boolean {
    return /[0-9]/.test(char);
  }

  private isAlpha(char: string): boolean {
    return /[a-zA-Z_]/.test(char);
  }

  private isAlphaNumeric(char: string): boolean {
    return /[a-zA-Z0-9_]/.test(char);
  }

  private tokenizeString(quote: string): void {
    const start = this.position;
    this.position++; // Skip opening quote
    let value = "";

    while (this.position < this.input.length && this.input[this.position] !== quote) {
      value += this.input[this.position];
      this.position++;
    }

    if (this.position >= this.input.length) {
      throw new LexError("Unterminated string", start);
    }

    this.position++; // Skip closing quote
    this.tokens.push({ type: "STRING", value, position: start });
  }

  private tokenizeNumber(): void {
    const start = this.position;
    let value = "";

    while (this.position < this.input.length && this.isDigit(this.input[this.position])) {
      value += this.input[this.position];
      this.position++;
    }

    if (this.input[this.position] === ".") {
      value += ".";
      this.position++;
      while (this.position < this.input.length && this.isDigit(this.input[this.position])) {
        value += this.input[this.position];
        this.position++;
      }
    }

    this.tokens.push({ type: "NUMBER", value, position: start });
  }

  private tokenizeIdentifierOrKeyword(): void {
    const start = this.position;
    let value = "";

    while (this.position < this.input.length && this.isAlphaNumeric(this.input[this.position])) {
      value += this.input[this.position];
      this.position++;
    }

    const upperValue = value.toUpperCase();
    const type = KEYWORDS.has(upperValue) ? "KEYWORD" : "IDENTIFIER";

    this.tokens.push({ type, value: type === "KEYWORD" ? upperValue : value, position: start });
  }
}

export function tokenize(sql: string): Token[] {
  return new Lexer(sql).tokenize();
}
