/**
 * Binding errors.
 *
 * Every failure of the binder is a {@link BindingError} carrying a stable
 * `code` and the `target` it is about (a parameter, variable or resource
 * name, or a template path such as `resources[1].properties.osProfile`).
 */

export type BindingErrorCode =
  | "MissingParameter"
  | "InvalidParameterValue"
  | "UnresolvedReference"
  | "CyclicVariableReference"
  | "CyclicParameterReference"
  | "MalformedDocument"
  | "InvalidExpression";

export class BindingError extends Error {
  readonly code: BindingErrorCode;
  readonly target: string;
  readonly details: readonly string[];

  constructor(code: BindingErrorCode, target: string, message: string, details: string[] = []) {
    super(message);
    this.name = "BindingError";
    this.code = code;
    this.target = target;
    this.details = details;
  }
}

export class MissingParameterError extends BindingError {
  constructor(public readonly parameterName: string) {
    super("MissingParameter", parameterName, `Missing value for required parameter "${parameterName}"`);
    this.name = "MissingParameterError";
  }
}

export class InvalidParameterValueError extends BindingError {
  constructor(public readonly parameterName: string, reason: string) {
    super("InvalidParameterValue", parameterName, `Invalid value for parameter "${parameterName}": ${reason}`, [reason]);
    this.name = "InvalidParameterValueError";
  }
}

export type ReferenceKind = "parameter" | "variable" | "function" | "resource";

export class UnresolvedReferenceError extends BindingError {
  constructor(
    public readonly kind: ReferenceKind,
    public readonly reference: string,
    public readonly location: string,
  ) {
    super("UnresolvedReference", reference, `Unresolved ${kind} reference "${reference}" in ${location}`);
    this.name = "UnresolvedReferenceError";
  }
}

export class CyclicReferenceError extends BindingError {
  constructor(
    code: "CyclicVariableReference" | "CyclicParameterReference",
    public readonly cycle: readonly string[],
  ) {
    const kind = code === "CyclicVariableReference" ? "variable" : "parameter";
    super(code, cycle[0] ?? "", `Circular ${kind} reference detected: ${cycle.join(" → ")}`, [...cycle]);
    this.name = "CyclicReferenceError";
  }
}

export class MalformedDocumentError extends BindingError {
  constructor(target: string, message: string, details: string[] = []) {
    super("MalformedDocument", target, message, details);
    this.name = "MalformedDocumentError";
  }
}

export class InvalidExpressionError extends BindingError {
  constructor(
    public readonly location: string,
    public readonly expression: string,
    reason: string,
  ) {
    super("InvalidExpression", location, `Invalid expression at ${location}: ${reason}`, [expression]);
    this.name = "InvalidExpressionError";
  }
}

export function isBindingError(error: unknown): error is BindingError {
  return error instanceof BindingError;
}
