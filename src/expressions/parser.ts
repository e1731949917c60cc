/**
 * Expression Parser
 *
 * Recursive descent over the token stream produced by {@link ExpressionLexer}.
 *
 * Grammar:
 *   expression → primary accessor*
 *   accessor   → '.' identifier | '[' expression ']'
 *   primary    → string | number | call
 *   call       → identifier ('.' identifier)? '(' (expression (',' expression)*)? ')'
 */

import type { Expression, FunctionCall, Token, TokenType } from "./types.js";
import { ExpressionLexer, ExpressionSyntaxError } from "./lexer.js";

export class ExpressionParser {
  private tokens: Token[];
  private pos = 0;
  private source: string;

  constructor(source: string) {
    this.source = source;
    this.tokens = new ExpressionLexer(source).tokenize();
  }

  parse(): Expression {
    if (this.current().type === "EOF") {
      throw this.error("Empty expression");
    }
    const expr = this.parseExpression();
    this.expect("EOF");
    return expr;
  }

  private parseExpression(): Expression {
    let expr = this.parsePrimary();

    for (;;) {
      const token = this.current();
      if (token.type === "DOT") {
        this.pos++;
        const property = this.consume("IDENTIFIER").value;
        expr = { kind: "property", target: expr, property };
        continue;
      }
      if (token.type === "LBRACKET") {
        this.pos++;
        const index = this.parseExpression();
        this.consume("RBRACKET");
        expr = { kind: "index", target: expr, index };
        continue;
      }
      return expr;
    }
  }

  private parsePrimary(): Expression {
    const token = this.current();

    if (token.type === "STRING") {
      this.pos++;
      return { kind: "string", value: token.value };
    }
    if (token.type === "NUMBER") {
      this.pos++;
      const value = Number(token.value);
      if (!Number.isSafeInteger(value)) {
        throw this.error(`Integer literal ${token.value} is out of range`, token);
      }
      return { kind: "number", value };
    }
    if (token.type === "IDENTIFIER") {
      return this.parseCall();
    }

    throw this.error(token.type === "EOF" ? "Unexpected end of expression" : `Unexpected '${token.value}'`, token);
  }

  private parseCall(): FunctionCall {
    const first = this.consume("IDENTIFIER");
    let namespace: string | undefined;
    let name = first.value;

    if (this.current().type === "DOT" && this.peek(1).type === "IDENTIFIER" && this.peek(2).type === "LPAREN") {
      this.pos++;
      namespace = first.value;
      name = this.consume("IDENTIFIER").value;
    }

    if (this.current().type !== "LPAREN") {
      throw this.error(`Expected '(' after function name '${first.value}'`);
    }
    this.pos++;

    const args: Expression[] = [];
    if (this.current().type !== "RPAREN") {
      args.push(this.parseExpression());
      while (this.current().type === "COMMA") {
        this.pos++;
        args.push(this.parseExpression());
      }
    }
    this.consume("RPAREN");

    const call: FunctionCall = { kind: "call", name, args, position: first.position };
    if (namespace !== undefined) call.namespace = namespace;
    return call;
  }

  // ---------------------------------------------------------------------------
  // Token helpers
  // ---------------------------------------------------------------------------

  private current(): Token {
    return this.tokens[Math.min(this.pos, this.tokens.length - 1)];
  }

  private peek(offset: number): Token {
    return this.tokens[Math.min(this.pos + offset, this.tokens.length - 1)];
  }

  private consume(type: TokenType): Token {
    const token = this.current();
    if (token.type !== type) {
      throw this.error(`Expected ${describeTokenType(type)}, got ${describeToken(token)}`, token);
    }
    this.pos++;
    return token;
  }

  private expect(type: TokenType): void {
    this.consume(type);
  }

  private error(message: string, token: Token = this.current()): ExpressionSyntaxError {
    return new ExpressionSyntaxError(message, token.position, this.source);
  }
}

function describeTokenType(type: TokenType): string {
  switch (type) {
    case "IDENTIFIER":
      return "identifier";
    case "STRING":
      return "string";
    case "NUMBER":
      return "number";
    case "LPAREN":
      return "'('";
    case "RPAREN":
      return "')'";
    case "LBRACKET":
      return "'['";
    case "RBRACKET":
      return "']'";
    case "COMMA":
      return "','";
    case "DOT":
      return "'.'";
    case "EOF":
      return "end of expression";
  }
}

function describeToken(token: Token): string {
  return token.type === "EOF" ? "end of expression" : `'${token.value}'`;
}

// =============================================================================
// Template string helpers
// =============================================================================

/** True when a template string value is an expression (`[...]`, not `[[...`). */
export function isExpressionString(value: string): boolean {
  return value.startsWith("[") && value.endsWith("]") && !value.startsWith("[[");
}

/**
 * The literal value of a template string that is not an expression:
 * `[[...]` loses its escaping bracket, anything else is returned as is.
 */
export function unescapeLiteral(value: string): string {
  return value.startsWith("[[") && value.endsWith("]") ? value.slice(1) : value;
}

/** Parse the body of an expression (without the outer brackets). */
export function parseExpression(source: string): Expression {
  return new ExpressionParser(source).parse();
}

/** Parse a template string of the form `[...]`. */
export function parseTemplateExpression(value: string): Expression {
  if (!isExpressionString(value)) {
    throw new ExpressionSyntaxError("Template expressions must be enclosed in '[' and ']'", 0, value);
  }
  return parseExpression(value.slice(1, -1));
}
