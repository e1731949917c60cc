/**
 * Expression Evaluator
 *
 * Reduces parsed expressions to JSON values against an
 * {@link EvaluationContext}. Run-time-only functions (reference, providers,
 * list*) cannot be reduced; when the context allows it they come back as a
 * {@link Residual} whose arguments have been folded to literals.
 */

import { InvalidExpressionError } from "../errors.js";
import { matchesType, type UserFunction } from "../template/types.js";
import { isJsonObject, setProperty, type JsonObject, type JsonValue } from "../types.js";
import { findKey, typeName } from "./functions.js";
import { ExpressionSyntaxError } from "./lexer.js";
import { isExpressionString, parseTemplateExpression, unescapeLiteral } from "./parser.js";
import { checkArity, FunctionEvaluationError, type FunctionContext, type FunctionRegistry } from "./registry.js";
import { literalExpression, toTemplateString } from "./serializer.js";
import { isResidual, Residual, type EvalResult, type Expression, type FunctionCall, type IndexAccess, type PropertyAccess } from "./types.js";

export interface EvaluationContext extends FunctionContext {
  /** Whether run-time-only functions may be left in place for the deployment service. */
  readonly allowDeferred: boolean;
  /** Look up a user-defined function by its lower-cased `namespace.name`. */
  userFunction(qualifiedName: string): UserFunction | undefined;
}

export type ResolvedValue = {
  value: JsonValue;
  /** Paths of the strings that still hold a (partially folded) run-time expression. */
  deferred: string[];
};

function fail(message: string): never {
  throw new FunctionEvaluationError(message);
}

function toExpression(result: EvalResult): Expression {
  return isResidual(result) ? result.expression : literalExpression(result);
}

/** `parent.key`, or `parent["key"]` when the key is not a plain identifier. */
export function childPath(parent: string, key: string): string {
  return /^[A-Za-z_$][\w$]*$/.test(key) ? `${parent}.${key}` : `${parent}[${JSON.stringify(key)}]`;
}

export class ExpressionEvaluator {
  constructor(
    private readonly registry: FunctionRegistry,
    readonly context: EvaluationContext,
  ) {}

  /** A new evaluator over the same functions with a different context. */
  withContext(context: EvaluationContext): ExpressionEvaluator {
    return new ExpressionEvaluator(this.registry, context);
  }

  // ===========================================================================
  // Template values
  // ===========================================================================

  /**
   * Resolve every expression string inside `value`. Object keys are taken
   * literally. Errors are reported as InvalidExpression at the path of the
   * string that raised them.
   */
  resolve(value: JsonValue, path: string): ResolvedValue {
    const deferred: string[] = [];
    const resolved = this.resolveInto(value, path, deferred);
    return { value: resolved, deferred };
  }

  private resolveInto(value: JsonValue, path: string, deferred: string[]): JsonValue {
    if (typeof value === "string") {
      if (!isExpressionString(value)) return unescapeLiteral(value);
      const result = this.evaluateString(value, path);
      if (isResidual(result)) {
        deferred.push(path);
        return toTemplateString(result.expression);
      }
      return result;
    }
    if (Array.isArray(value)) {
      return value.map((item, i) => this.resolveInto(item, `${path}[${i}]`, deferred));
    }
    if (isJsonObject(value)) {
      const result: JsonObject = {};
      for (const [key, entry] of Object.entries(value)) {
        setProperty(result, key, this.resolveInto(entry, childPath(path, key), deferred));
      }
      return result;
    }
    return value;
  }

  /** Parse and evaluate one `[...]` string. */
  evaluateString(text: string, path: string): EvalResult {
    try {
      return this.evaluate(parseTemplateExpression(text));
    } catch (error) {
      if (error instanceof ExpressionSyntaxError || error instanceof FunctionEvaluationError) {
        throw new InvalidExpressionError(path, text, error.message);
      }
      throw error;
    }
  }

  // ===========================================================================
  // Expressions
  // ===========================================================================

  evaluate(expr: Expression): EvalResult {
    switch (expr.kind) {
      case "string":
      case "number":
        return expr.value;
      case "property":
        return this.evaluateProperty(expr);
      case "index":
        return this.evaluateIndex(expr);
      case "call":
        return expr.namespace !== undefined ? this.evaluateUserFunction(expr, expr.namespace) : this.evaluateCall(expr);
    }
  }

  private evaluateProperty(expr: PropertyAccess): EvalResult {
    const target = this.evaluate(expr.target);
    if (isResidual(target)) {
      return new Residual({ ...expr, target: target.expression });
    }
    if (!isJsonObject(target)) {
      fail(`Cannot read property '${expr.property}' of ${typeName(target)}`);
    }
    const key = findKey(target, expr.property);
    if (key === undefined) {
      const available = Object.keys(target);
      fail(
        `Property '${expr.property}' does not exist` +
          (available.length > 0 ? `; available properties are ${available.map((k) => `'${k}'`).join(", ")}` : ""),
      );
    }
    return target[key];
  }

  private evaluateIndex(expr: IndexAccess): EvalResult {
    const target = this.evaluate(expr.target);
    const index = this.evaluate(expr.index);
    if (isResidual(target) || isResidual(index)) {
      return new Residual({ kind: "index", target: toExpression(target), index: toExpression(index) });
    }
    if (Array.isArray(target)) {
      if (typeof index !== "number" || !Number.isInteger(index)) {
        fail(`Array index must be an int, got ${typeName(index)}`);
      }
      if (index < 0 || index >= target.length) {
        fail(`Index ${index} is out of range for an array of length ${target.length}`);
      }
      return target[index];
    }
    if (isJsonObject(target)) {
      if (typeof index !== "string") fail(`Object index must be a string, got ${typeName(index)}`);
      const key = findKey(target, index);
      if (key === undefined) fail(`Property '${index}' does not exist`);
      return target[key];
    }
    fail(`Cannot index into ${typeName(target)}`);
  }

  private evaluateCall(call: FunctionCall): EvalResult {
    const definition = this.registry.get(call.name);
    if (!definition) fail(`Unknown function '${call.name}'`);
    const arityProblem = checkArity(definition, call.args.length);
    if (arityProblem) fail(arityProblem);

    switch (definition.kind) {
      case "lazy":
        return definition.evaluate(call.args, this.context, (arg) => this.evaluate(arg));

      case "runtime": {
        if (!this.context.allowDeferred) {
          fail(`'${call.name}' is only available at deployment time and cannot be used here`);
        }
        const args = call.args.map((arg) => this.evaluate(arg));
        return new Residual({ ...call, args: args.map(toExpression) });
      }

      case "eager": {
        const args = call.args.map((arg) => this.evaluate(arg));
        const values: JsonValue[] = [];
        for (const arg of args) {
          if (isResidual(arg)) {
            return new Residual({ ...call, args: args.map(toExpression) });
          }
          values.push(arg);
        }
        return definition.evaluate(values, this.context);
      }
    }
  }

  // ===========================================================================
  // User-defined functions
  // ===========================================================================

  private evaluateUserFunction(call: FunctionCall, namespace: string): EvalResult {
    const qualifiedName = `${namespace}.${call.name}`;
    const fn = this.context.userFunction(qualifiedName.toLowerCase());
    if (!fn) fail(`Unknown user-defined function '${qualifiedName}'`);
    if (call.args.length !== fn.parameters.length) {
      fail(`'${qualifiedName}' expects ${fn.parameters.length} argument${fn.parameters.length === 1 ? "" : "s"}, got ${call.args.length}`);
    }

    const args = new Map<string, JsonValue>();
    for (const [i, param] of fn.parameters.entries()) {
      const value = this.evaluate(call.args[i]);
      if (isResidual(value)) {
        fail(`Arguments of '${qualifiedName}' cannot depend on deployment-time values`);
      }
      if (!matchesType(param.type, value)) {
        fail(`'${qualifiedName}' parameter '${param.name}' must be of type ${param.type}, got ${typeName(value)}`);
      }
      args.set(param.name.toLowerCase(), value);
    }

    const body = this.withContext(userFunctionContext(fn, args, this.context));
    const { value } = body.resolve(fn.output.value, `functions.${fn.namespace}.${fn.name}.output.value`);
    if (!matchesType(fn.output.type, value)) {
      fail(`'${qualifiedName}' must return ${fn.output.type}, got ${typeName(value)}`);
    }
    return value;
  }
}

/** User-defined functions see only their own arguments and the deployment scope. */
function userFunctionContext(fn: UserFunction, args: ReadonlyMap<string, JsonValue>, outer: EvaluationContext): EvaluationContext {
  const qualifiedName = `${fn.namespace}.${fn.name}`;
  return {
    scope: outer.scope,
    contentVersion: outer.contentVersion,
    allowDeferred: false,
    parameter(name) {
      const value = args.get(name.toLowerCase());
      if (value === undefined) fail(`'${qualifiedName}' has no parameter named '${name}'`);
      return value;
    },
    variable() {
      fail(`User-defined function '${qualifiedName}' cannot reference variables`);
    },
    copyIndex() {
      fail(`copyIndex() cannot be used inside user-defined function '${qualifiedName}'`);
    },
    userFunction() {
      return undefined;
    },
  };
}
