/**
 * Expression language types: tokens, AST nodes, and evaluation results.
 */

import type { JsonValue } from "../types.js";

// =============================================================================
// Tokens
// =============================================================================

export type TokenType =
  | "IDENTIFIER"
  | "STRING"
  | "NUMBER"
  | "LPAREN"
  | "RPAREN"
  | "LBRACKET"
  | "RBRACKET"
  | "COMMA"
  | "DOT"
  | "EOF";

export type Token = {
  type: TokenType;
  value: string;
  position: number;
};

// =============================================================================
// AST
// =============================================================================

export type StringLiteral = { kind: "string"; value: string };

export type NumberLiteral = { kind: "number"; value: number };

export type FunctionCall = {
  kind: "call";
  /** Namespace of a user-defined function (`ns.fn(...)`); absent for built-ins. */
  namespace?: string;
  name: string;
  args: Expression[];
  position: number;
};

export type PropertyAccess = { kind: "property"; target: Expression; property: string };

export type IndexAccess = { kind: "index"; target: Expression; index: Expression };

export type Expression = StringLiteral | NumberLiteral | FunctionCall | PropertyAccess | IndexAccess;

// =============================================================================
// Evaluation
// =============================================================================

/**
 * An expression that could not be reduced to a value because it depends on
 * state only the deployment service knows (e.g. `reference()`). Its
 * resolvable parts have already been replaced by literals.
 */
export class Residual {
  constructor(readonly expression: Expression) {}
}

export type EvalResult = JsonValue | Residual;

export function isResidual(value: EvalResult): value is Residual {
  return value instanceof Residual;
}
