/**
 * Expression Lexer
 *
 * Turns the body of a template expression (the text between the outer
 * brackets) into tokens: identifiers, single-quoted strings (`''` escapes a
 * quote), integers, and punctuation.
 */

import type { Token, TokenType } from "./types.js";

export class ExpressionLexer {
  private input: string;
  private pos = 0;
  private tokens: Token[] = [];

  constructor(input: string) {
    this.input = input;
  }

  tokenize(): Token[] {
    this.tokens = [];
    this.pos = 0;

    while (this.pos < this.input.length) {
      this.skipWhitespace();
      if (this.pos >= this.input.length) break;

      const ch = this.input[this.pos];

      if (ch === "'") {
        this.readString();
        continue;
      }

      if (this.isDigit(ch) || (ch === "-" && this.isDigit(this.peek(1)))) {
        this.readNumber();
        continue;
      }

      const punct = PUNCTUATION[ch];
      if (punct) {
        this.emit(punct, ch, this.pos);
        this.pos++;
        continue;
      }

      if (this.isIdentStart(ch)) {
        this.readIdentifier();
        continue;
      }

      throw new ExpressionSyntaxError(`Unexpected character '${ch}'`, this.pos, this.input);
    }

    this.emit("EOF", "", this.pos);
    return this.tokens;
  }

  private skipWhitespace(): void {
    while (this.pos < this.input.length && /\s/.test(this.input[this.pos])) {
      this.pos++;
    }
  }

  private readString(): void {
    const start = this.pos;
    this.pos++; // opening quote
    let value = "";
    for (;;) {
      if (this.pos >= this.input.length) {
        throw new ExpressionSyntaxError("Unterminated string literal", start, this.input);
      }
      const ch = this.input[this.pos];
      if (ch === "'") {
        if (this.peek(1) === "'") {
          value += "'";
          this.pos += 2;
          continue;
        }
        this.pos++; // closing quote
        break;
      }
      value += ch;
      this.pos++;
    }
    this.emit("STRING", value, start);
  }

  private readNumber(): void {
    const start = this.pos;
    let numStr = "";
    if (this.input[this.pos] === "-") {
      numStr = "-";
      this.pos++;
    }
    while (this.pos < this.input.length && this.isDigit(this.input[this.pos])) {
      numStr += this.input[this.pos];
      this.pos++;
    }
    if (this.pos < this.input.length && this.input[this.pos] === ".") {
      throw new ExpressionSyntaxError("Only integer literals are supported", this.pos, this.input);
    }
    this.emit("NUMBER", numStr, start);
  }

  private readIdentifier(): void {
    const start = this.pos;
    let value = "";
    while (this.pos < this.input.length && this.isIdentPart(this.input[this.pos])) {
      value += this.input[this.pos];
      this.pos++;
    }
    this.emit("IDENTIFIER", value, start);
  }

  private peek(offset: number): string {
    return this.input[this.pos + offset] ?? "";
  }

  private isDigit(ch: string): boolean {
    return ch >= "0" && ch <= "9";
  }

  private isIdentStart(ch: string): boolean {
    return /[a-zA-Z_$]/.test(ch);
  }

  private isIdentPart(ch: string): boolean {
    return /[a-zA-Z0-9_$]/.test(ch);
  }

  private emit(type: TokenType, value: string, position: number): void {
    this.tokens.push({ type, value, position });
  }
}

const PUNCTUATION: Partial<Record<string, TokenType>> = {
  "(": "LPAREN",
  ")": "RPAREN",
  "[": "LBRACKET",
  "]": "RBRACKET",
  ",": "COMMA",
  ".": "DOT",
};

/**
 * Syntax error thrown by the expression lexer or parser.
 * Includes position and source context.
 */
export class ExpressionSyntaxError extends Error {
  readonly position: number;
  readonly source: string;

  constructor(message: string, position: number, source: string) {
    const contextStart = Math.max(0, position - 20);
    const contextEnd = Math.min(source.length, position + 20);
    const context = source.slice(contextStart, contextEnd);
    super(`Expression syntax error at position ${position}: ${message}\n  near: ...${context}...`);
    this.name = "ExpressionSyntaxError";
    this.position = position;
    this.source = source;
  }
}
