/**
 * Lexer - Tokenizes Lox source code on demand.
 *
 * The compiler pulls one token at a time through `scanToken()`. Lexical
 * errors never throw: they come back as ERROR tokens carrying the message,
 * and scanning resumes at the next character.
 */

// ============================================================================
// Token Types
// ============================================================================

export type TokenType =
  // Punctuation
  | "LEFT_PAREN"
  | "RIGHT_PAREN"
  | "LEFT_BRACE"
  | "RIGHT_BRACE"
  | "COMMA"
  | "DOT"
  | "SEMICOLON"
  // Operators
  | "MINUS"
  | "PLUS"
  | "SLASH"
  | "STAR"
  | "BANG"
  | "BANG_EQUAL"
  | "EQUAL"
  | "EQUAL_EQUAL"
  | "GREATER"
  | "GREATER_EQUAL"
  | "LESS"
  | "LESS_EQUAL"
  // Literals
  | "IDENTIFIER"
  | "STRING"
  | "NUMBER"
  // Keywords
  | "AND"
  | "CLASS"
  | "ELSE"
  | "FALSE"
  | "FOR"
  | "FUN"
  | "IF"
  | "NIL"
  | "OR"
  | "PRINT"
  | "RETURN"
  | "SUPER"
  | "THIS"
  | "TRUE"
  | "TYPEOF"
  | "VAR"
  | "WHILE"
  // Special
  | "ERROR"
  | "EOF";

export interface Token {
  type: TokenType;
  /** Lexeme text; for STRING the quotes are included; for ERROR the message. */
  value: string;
  line: number;
  column: number;
}

// ============================================================================
// Keywords
// ============================================================================

const KEYWORDS: Record<string, TokenType> = {
  and: "AND",
  class: "CLASS",
  else: "ELSE",
  false: "FALSE",
  for: "FOR",
  fun: "FUN",
  if: "IF",
  nil: "NIL",
  or: "OR",
  print: "PRINT",
  return: "RETURN",
  super: "SUPER",
  this: "THIS",
  true: "TRUE",
  typeof: "TYPEOF",
  var: "VAR",
  while: "WHILE",
};

// ============================================================================
// Lexer Class
// ============================================================================

export class Lexer {
  private source: string;
  private start: number = 0;
  private pos: number = 0;
  private line: number = 1;
  private column: number = 1;
  private startLine: number = 1;
  private startColumn: number = 1;

  constructor(source: string) {
    this.source = source;
  }

  /**
   * Produce the next token. Once the input is exhausted every call returns EOF.
   */
  scanToken(): Token {
    this.skipWhitespaceAndComments();
    this.start = this.pos;
    this.startLine = this.line;
    this.startColumn = this.column;

    if (this.isAtEnd()) return this.makeToken("EOF");

    const ch = this.advance();

    if (this.isDigit(ch)) return this.readNumber();
    if (this.isAlpha(ch)) return this.readIdentifier();
    if (ch === '"') return this.readString();

    return this.readOperator(ch);
  }

  tokenize(): Token[] {
    const tokens: Token[] = [];
    for (;;) {
      const token = this.scanToken();
      tokens.push(token);
      if (token.type === "EOF") return tokens;
    }
  }

  private isAtEnd(): boolean {
    return this.pos >= this.source.length;
  }

  private peek(): string {
    return this.source[this.pos] ?? "";
  }

  private peekNext(): string {
    return this.source[this.pos + 1] ?? "";
  }

  private advance(): string {
    const ch = this.source[this.pos];
    this.pos++;
    if (ch === "\n") {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return ch;
  }

  private match(expected: string): boolean {
    if (this.peek() !== expected) return false;
    this.advance();
    return true;
  }

  private makeToken(type: TokenType): Token {
    return {
      type,
      value: this.source.slice(this.start, this.pos),
      line: this.startLine,
      column: this.startColumn,
    };
  }

  private errorToken(message: string): Token {
    return { type: "ERROR", value: message, line: this.line, column: this.startColumn };
  }

  private skipWhitespaceAndComments(): void {
    while (!this.isAtEnd()) {
      const ch = this.peek();

      if (ch === " " || ch === "\t" || ch === "\r" || ch === "\n") {
        this.advance();
      } else if (ch === "/" && this.peekNext() === "/") {
        while (!this.isAtEnd() && this.peek() !== "\n") {
          this.advance();
        }
      } else {
        break;
      }
    }
  }

  private isDigit(ch: string): boolean {
    return ch >= "0" && ch <= "9";
  }

  private isAlpha(ch: string): boolean {
    return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z") || ch === "_";
  }

  private isAlphaNumeric(ch: string): boolean {
    return this.isAlpha(ch) || this.isDigit(ch);
  }

  private readNumber(): Token {
    while (this.isDigit(this.peek())) {
      this.advance();
    }

    // Fractional part needs a digit after the dot
    if (this.peek() === "." && this.isDigit(this.peekNext())) {
      this.advance();
      while (this.isDigit(this.peek())) {
        this.advance();
      }
    }

    return this.makeToken("NUMBER");
  }

  private readString(): Token {
    while (!this.isAtEnd() && this.peek() !== '"') {
      this.advance();
    }

    if (this.isAtEnd()) {
      return this.errorToken("Unterminated string.");
    }

    this.advance(); // closing "
    return this.makeToken("STRING");
  }

  private readIdentifier(): Token {
    while (this.isAlphaNumeric(this.peek())) {
      this.advance();
    }

    const text = this.source.slice(this.start, this.pos);
    return this.makeToken(KEYWORDS[text] ?? "IDENTIFIER");
  }

  private readOperator(ch: string): Token {
    switch (ch) {
      case "(": return this.makeToken("LEFT_PAREN");
      case ")": return this.makeToken("RIGHT_PAREN");
      case "{": return this.makeToken("LEFT_BRACE");
      case "}": return this.makeToken("RIGHT_BRACE");
      case ",": return this.makeToken("COMMA");
      case ".": return this.makeToken("DOT");
      case ";": return this.makeToken("SEMICOLON");
      case "-": return this.makeToken("MINUS");
      case "+": return this.makeToken("PLUS");
      case "/": return this.makeToken("SLASH");
      case "*": return this.makeToken("STAR");

      case "!": return this.makeToken(this.match("=") ? "BANG_EQUAL" : "BANG");
      case "=": return this.makeToken(this.match("=") ? "EQUAL_EQUAL" : "EQUAL");
      case "<": return this.makeToken(this.match("=") ? "LESS_EQUAL" : "LESS");
      case ">": return this.makeToken(this.match("=") ? "GREATER_EQUAL" : "GREATER");

      default:
        return this.errorToken("Unexpected character.");
    }
  }
}

// ============================================================================
// Convenience Function
// ============================================================================

export function tokenize(source: string): Token[] {
  return new Lexer(source).tokenize();
}
