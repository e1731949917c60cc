/**
 * Static reference analysis.
 *
 * Parses every expression in the template before anything is evaluated and
 * checks what it refers to. Because this looks at every call site, including
 * both branches of every `if`, unresolved references and reference cycles
 * are reported regardless of the parameter values supplied.
 */

import {
  CyclicReferenceError,
  InvalidExpressionError,
  UnresolvedReferenceError,
  type BindingError,
} from "../errors.js";
import { ExpressionSyntaxError } from "../expressions/lexer.js";
import { isExpressionString, parseTemplateExpression } from "../expressions/parser.js";
import { checkArity, type FunctionRegistry } from "../expressions/registry.js";
import { childPath } from "../expressions/evaluator.js";
import type { Expression, FunctionCall } from "../expressions/types.js";
import type { TemplateDocument, UserFunction } from "../template/types.js";
import { isJsonObject, type JsonValue } from "../types.js";

type Owner =
  | { kind: "parameter"; name: string }
  | { kind: "variable"; name: string }
  | { kind: "function"; fn: UserFunction }
  | { kind: "resource" }
  | { kind: "output" };

type Site = { path: string; text: string; owner: Owner };

export type ReferenceReport = {
  /** Number of expression strings in the template. */
  expressionCount: number;
  /** Declared parameters that no expression refers to. */
  unusedParameters: string[];
  /** Declared variables that no expression refers to. */
  unusedVariables: string[];
};

/**
 * Check every expression in `doc`. Throws the first problem found:
 * syntax errors, unknown functions and bad argument counts
 * (InvalidExpression) and references to undeclared names
 * (UnresolvedReference) in document order, then variable and parameter
 * cycles, then functions used where they are not allowed
 * (InvalidExpression).
 */
export function analyzeReferences(doc: TemplateDocument, registry: FunctionRegistry): ReferenceReport {
  const variableGraph = new Map<string, Set<string>>();
  const parameterGraph = new Map<string, Set<string>>();
  for (const key of doc.variables.keys()) variableGraph.set(key, new Set());
  for (const key of doc.parameters.keys()) parameterGraph.set(key, new Set());

  const usedParameters = new Set<string>();
  const usedVariables = new Set<string>();
  const placementErrors: BindingError[] = [];
  const misplaced = (error: BindingError) => {
    placementErrors.push(error);
  };

  const sites = collectSites(doc);
  for (const site of sites) {
    let expression: Expression;
    try {
      expression = parseTemplateExpression(site.text);
    } catch (error) {
      if (error instanceof ExpressionSyntaxError) {
        throw new InvalidExpressionError(site.path, site.text, error.message);
      }
      throw error;
    }

    forEachCall(expression, (call) => {
      const invalid = (reason: string) => new InvalidExpressionError(site.path, site.text, reason);

      if (call.namespace !== undefined) {
        const qualified = `${call.namespace}.${call.name}`;
        if (site.owner.kind === "function") {
          misplaced(invalid(`User-defined functions cannot call other user-defined functions ('${qualified}')`));
          return;
        }
        if (!doc.functions.has(qualified.toLowerCase())) {
          throw new UnresolvedReferenceError("function", qualified, site.path);
        }
        return;
      }

      const definition = registry.get(call.name);
      if (!definition) throw invalid(`Unknown function '${call.name}'`);
      const arityProblem = checkArity(definition, call.args.length);
      if (arityProblem) throw invalid(arityProblem);

      if (definition.kind === "runtime") {
        if (site.owner.kind === "parameter" || site.owner.kind === "variable" || site.owner.kind === "function") {
          misplaced(invalid(`'${call.name}' is only available at deployment time and cannot be used in ${describeOwner(site.owner)}`));
        }
        return;
      }

      const name = call.name.toLowerCase();
      const first = call.args.at(0);
      const literalArg = first?.kind === "string" ? first.value : undefined;
      if ((name === "parameters" || name === "variables") && literalArg === undefined) {
        throw invalid(`${call.name}() takes a literal name, not a computed one`);
      }

      if (name === "parameters" && literalArg !== undefined) {
        const key = literalArg.toLowerCase();
        if (site.owner.kind === "function") {
          if (!site.owner.fn.parameters.some((p) => p.name.toLowerCase() === key)) {
            throw new UnresolvedReferenceError("parameter", literalArg, site.path);
          }
          return;
        }
        if (!doc.parameters.has(key)) {
          throw new UnresolvedReferenceError("parameter", literalArg, site.path);
        }
        usedParameters.add(key);
        if (site.owner.kind === "parameter") {
          parameterGraph.get(site.owner.name.toLowerCase())?.add(key);
        }
      } else if (name === "variables" && literalArg !== undefined) {
        const key = literalArg.toLowerCase();
        if (site.owner.kind === "parameter" || site.owner.kind === "function") {
          misplaced(invalid(`variables() cannot be used in ${describeOwner(site.owner)}`));
          return;
        }
        if (!doc.variables.has(key)) {
          throw new UnresolvedReferenceError("variable", literalArg, site.path);
        }
        usedVariables.add(key);
        if (site.owner.kind === "variable") {
          variableGraph.get(site.owner.name.toLowerCase())?.add(key);
        }
      } else if (name === "copyindex" && site.owner.kind !== "resource") {
        misplaced(invalid(`copyIndex() can only be used inside a resource with a copy loop`));
      }
    });
  }

  const variableCycle = detectCycle(variableGraph);
  if (variableCycle) {
    throw new CyclicReferenceError("CyclicVariableReference", variableCycle.map((key) => doc.variables.get(key)?.name ?? key));
  }
  const parameterCycle = detectCycle(parameterGraph);
  if (parameterCycle) {
    throw new CyclicReferenceError("CyclicParameterReference", parameterCycle.map((key) => doc.parameters.get(key)?.name ?? key));
  }
  if (placementErrors.length > 0) throw placementErrors[0];

  return {
    expressionCount: sites.length,
    unusedParameters: [...doc.parameters.entries()].filter(([key]) => !usedParameters.has(key)).map(([, p]) => p.name),
    unusedVariables: [...doc.variables.entries()].filter(([key]) => !usedVariables.has(key)).map(([, v]) => v.name),
  };
}

function describeOwner(owner: Owner): string {
  switch (owner.kind) {
    case "parameter":
      return `the default value of parameter "${owner.name}"`;
    case "variable":
      return `variable "${owner.name}"`;
    case "function":
      return `user-defined function "${owner.fn.namespace}.${owner.fn.name}"`;
    case "resource":
      return "a resource";
    case "output":
      return "an output";
  }
}

// =============================================================================
// Sites
// =============================================================================

function collectSites(doc: TemplateDocument): Site[] {
  const sites: Site[] = [];
  const visit = (value: JsonValue, path: string, owner: Owner): void => {
    if (typeof value === "string") {
      if (isExpressionString(value)) sites.push({ path, text: value, owner });
    } else if (Array.isArray(value)) {
      value.forEach((item, i) => visit(item, `${path}[${i}]`, owner));
    } else if (isJsonObject(value)) {
      for (const [key, entry] of Object.entries(value)) visit(entry, childPath(path, key), owner);
    }
  };

  for (const param of doc.parameters.values()) {
    if (param.defaultValue !== undefined) {
      visit(param.defaultValue, `${childPath("parameters", param.name)}.defaultValue`, { kind: "parameter", name: param.name });
    }
  }
  for (const variable of doc.variables.values()) {
    visit(variable.value, childPath("variables", variable.name), { kind: "variable", name: variable.name });
  }
  for (const fn of doc.functions.values()) {
    visit(fn.output.value, `functions.${fn.namespace}.${fn.name}.output.value`, { kind: "function", fn });
  }
  for (const resource of doc.resources) {
    visit(resource.definition, resource.path, { kind: "resource" });
  }
  for (const output of doc.outputs.values()) {
    const path = childPath("outputs", output.name);
    if (output.condition !== undefined) visit(output.condition, `${path}.condition`, { kind: "output" });
    visit(output.value, `${path}.value`, { kind: "output" });
  }
  return sites;
}

function forEachCall(expr: Expression, visit: (call: FunctionCall) => void): void {
  switch (expr.kind) {
    case "call":
      visit(expr);
      for (const arg of expr.args) forEachCall(arg, visit);
      return;
    case "property":
      forEachCall(expr.target, visit);
      return;
    case "index":
      forEachCall(expr.target, visit);
      forEachCall(expr.index, visit);
      return;
    case "string":
    case "number":
      return;
  }
}

// =============================================================================
// Cycle detection
// =============================================================================

/**
 * Depth-first search for a cycle. Returns the cycle as a path that starts
 * and ends at the same node (e.g. `[a, b, a]`), or null.
 */
export function detectCycle(graph: ReadonlyMap<string, ReadonlySet<string>>): string[] | null {
  const WHITE = 0, GRAY = 1, BLACK = 2;
  const color = new Map<string, number>();
  const stack: string[] = [];

  const dfs = (node: string): string[] | null => {
    color.set(node, GRAY);
    stack.push(node);
    for (const dep of graph.get(node) ?? []) {
      if (!graph.has(dep)) continue;
      const state = color.get(dep) ?? WHITE;
      if (state === GRAY) {
        return [...stack.slice(stack.indexOf(dep)), dep];
      }
      if (state === WHITE) {
        const cycle = dfs(dep);
        if (cycle) return cycle;
      }
    }
    stack.pop();
    color.set(node, BLACK);
    return null;
  };

  for (const node of graph.keys()) {
    if ((color.get(node) ?? WHITE) === WHITE) {
      const cycle = dfs(node);
      if (cycle) return cycle;
    }
  }
  return null;
}
