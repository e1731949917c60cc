/**
 * Function Registry
 *
 * Holds the definitions of the functions an expression may call. Names are
 * case-insensitive. Any unregistered function whose name starts with
 * `list` is treated as a run-time-only `list*` function.
 */

import type { DeploymentScope } from "../config.js";
import type { JsonValue } from "../types.js";
import type { EvalResult, Expression } from "./types.js";

/** What built-in functions can see of the binding in progress. */
export interface FunctionContext {
  readonly scope: DeploymentScope;
  readonly contentVersion?: string;
  parameter(name: string): JsonValue;
  variable(name: string): JsonValue;
  /** Current iteration of the named (or innermost) copy loop. */
  copyIndex(loopName: string | undefined): number;
}

type Arity = {
  name: string;
  minArgs: number;
  /** Omitted for variadic functions. */
  maxArgs?: number;
};

/** Evaluated with fully reduced argument values. */
export type EagerFunction = Arity & {
  kind: "eager";
  evaluate(args: JsonValue[], ctx: FunctionContext): JsonValue;
};

/** Receives its arguments unevaluated and decides which ones to evaluate. */
export type LazyFunction = Arity & {
  kind: "lazy";
  evaluate(args: Expression[], ctx: FunctionContext, evaluateArg: (arg: Expression) => EvalResult): EvalResult;
};

/** Depends on deployment-time state; left in place for the deployment service. */
export type RuntimeFunction = Arity & {
  kind: "runtime";
};

export type FunctionDefinition = EagerFunction | LazyFunction | RuntimeFunction;

/**
 * Thrown by function implementations for bad arguments. The evaluator turns
 * it into an InvalidExpression binding error that names the template path.
 */
export class FunctionEvaluationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FunctionEvaluationError";
  }
}

export class FunctionRegistry {
  private readonly definitions = new Map<string, FunctionDefinition>();

  register(definition: FunctionDefinition): this {
    const key = definition.name.toLowerCase();
    if (this.definitions.has(key)) {
      throw new Error(`Function "${definition.name}" is already registered`);
    }
    this.definitions.set(key, definition);
    return this;
  }

  get(name: string): FunctionDefinition | undefined {
    const key = name.toLowerCase();
    const definition = this.definitions.get(key);
    if (definition) return definition;
    if (key.startsWith("list") && key.length > 4) {
      return { kind: "runtime", name, minArgs: 1, maxArgs: 3 };
    }
    return undefined;
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  list(): FunctionDefinition[] {
    return [...this.definitions.values()];
  }

  /** A new registry with the same definitions, for adding custom functions. */
  clone(): FunctionRegistry {
    const copy = new FunctionRegistry();
    for (const definition of this.definitions.values()) {
      copy.register(definition);
    }
    return copy;
  }
}

/** Check an argument count against a definition, returning the problem if any. */
export function checkArity(definition: Arity, count: number): string | null {
  if (count < definition.minArgs) {
    return `'${definition.name}' expects at least ${definition.minArgs} argument${definition.minArgs === 1 ? "" : "s"}, got ${count}`;
  }
  if (definition.maxArgs !== undefined && count > definition.maxArgs) {
    return `'${definition.name}' expects at most ${definition.maxArgs} argument${definition.maxArgs === 1 ? "" : "s"}, got ${count}`;
  }
  return null;
}
