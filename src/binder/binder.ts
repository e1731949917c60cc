/**
 * Template Binder
 *
 * Validates a template document, binds parameter values, evaluates
 * variables, resources and outputs, and returns the result as a
 * deep-frozen {@link ResolvedTemplate}. Binding is synchronous and has no
 * side effects besides calls to the injected logger.
 */

import { DEFAULT_DEPLOYMENT_SCOPE, type DeploymentScope } from "../config.js";
import {
  CyclicReferenceError,
  InvalidExpressionError,
  isBindingError,
  UnresolvedReferenceError,
  type BindingError,
} from "../errors.js";
import { childPath, ExpressionEvaluator, type EvaluationContext } from "../expressions/evaluator.js";
import { getBuiltinRegistry, typeName } from "../expressions/functions.js";
import { FunctionEvaluationError, type FunctionRegistry } from "../expressions/registry.js";
import { silentLogger, type Logger } from "../logging.js";
import { parseTemplate } from "../template/loader.js";
import { matchesType, type OutputDeclaration, type TemplateDocument } from "../template/types.js";
import { deepFreeze, setProperty, type JsonObject, type JsonValue } from "../types.js";
import { ParameterBinder, type BoundParameter, type ParameterValues } from "./parameters.js";
import { analyzeReferences } from "./references.js";
import { ResourceExpander, type CopyFrame } from "./resources.js";

// =============================================================================
// Types
// =============================================================================

export type BindOptions = {
  /** Deployment scope seen by subscription(), resourceGroup(), deployment() and resourceId(). */
  scope?: Partial<DeploymentScope>;
  /** Reject values for parameters the template does not declare (default true). */
  strictParameters?: boolean;
  logger?: Logger;
  /** Functions available to expressions. Defaults to the built-in functions. */
  registry?: FunctionRegistry;
};

export type ResolvedOutput = {
  type: string;
  value: JsonValue;
};

export interface ResolvedTemplate {
  readonly schema?: string;
  readonly contentVersion?: string;
  /** Bound parameters by declared name. */
  readonly parameters: Readonly<Record<string, Readonly<BoundParameter>>>;
  readonly variables: Readonly<Record<string, JsonValue>>;
  /** Resolved resources by resolved name, in template order. */
  readonly resources: Readonly<Record<string, JsonObject>>;
  readonly outputs: Readonly<Record<string, Readonly<ResolvedOutput>>>;
  /** Paths of values that still hold an expression for the deployment service. */
  readonly deferred: readonly string[];
}

export type BindResult = { ok: true; template: ResolvedTemplate } | { ok: false; error: BindingError };

// =============================================================================
// Entry points
// =============================================================================

/**
 * Bind `parameterValues` to `template` (a parsed template document or the
 * raw JSON object) and resolve every expression. Throws a BindingError.
 */
export function resolveTemplate(template: unknown, parameterValues: ParameterValues = {}, options: BindOptions = {}): ResolvedTemplate {
  const doc = isTemplateDocument(template) ? template : parseTemplate(template);
  return new TemplateBinder(doc, options).bind(parameterValues);
}

/** Like {@link resolveTemplate}, but returns binding failures instead of throwing them. */
export function bind(template: unknown, parameterValues: ParameterValues = {}, options: BindOptions = {}): BindResult {
  try {
    return { ok: true, template: resolveTemplate(template, parameterValues, options) };
  } catch (error) {
    if (isBindingError(error)) {
      (options.logger ?? silentLogger).debug(`Binding failed: ${error.code}: ${error.message}`);
      return { ok: false, error };
    }
    throw error;
  }
}

export function isTemplateDocument(value: unknown): value is TemplateDocument {
  return (
    typeof value === "object" &&
    value !== null &&
    "parameters" in value &&
    value.parameters instanceof Map &&
    "resources" in value &&
    Array.isArray(value.resources)
  );
}

// =============================================================================
// Binder
// =============================================================================

class TemplateBinder {
  private readonly scope: DeploymentScope;
  private readonly logger: Logger;
  private readonly registry: FunctionRegistry;
  private readonly strictParameters: boolean;

  private parameters: ParameterBinder | null = null;
  private readonly variables = new Map<string, JsonValue>();
  private readonly resolvingVariables: string[] = [];

  constructor(
    private readonly doc: TemplateDocument,
    options: BindOptions,
  ) {
    this.scope = { ...DEFAULT_DEPLOYMENT_SCOPE, ...options.scope };
    this.logger = options.logger ?? silentLogger;
    this.registry = options.registry ?? getBuiltinRegistry();
    this.strictParameters = options.strictParameters ?? true;
  }

  bind(parameterValues: ParameterValues): ResolvedTemplate {
    const report = analyzeReferences(this.doc, this.registry);
    this.logger.debug(`Checked ${report.expressionCount} expression(s)`);

    const parameters = new ParameterBinder(this.doc, parameterValues, {
      strictParameters: this.strictParameters,
      logger: this.logger,
      evaluateDefault: (decl) => {
        const path = `${childPath("parameters", decl.name)}.defaultValue`;
        return this.evaluator(false, []).resolve(decl.defaultValue ?? null, path).value;
      },
    });
    this.parameters = parameters;
    const boundParameters = parameters.bindAll();

    const variables: Record<string, JsonValue> = {};
    for (const decl of this.doc.variables.values()) {
      setProperty(variables, decl.name, this.variable(decl.name));
    }

    const expansion = new ResourceExpander({
      evaluatorFor: (frames) => this.evaluator(true, frames),
      logger: this.logger,
    }).expand(this.doc.resources);

    const outputEntries: [string, ResolvedOutput][] = [];
    const deferred = [...expansion.deferred];
    for (const decl of this.doc.outputs.values()) {
      const output = this.resolveOutput(decl, deferred);
      if (output) outputEntries.push([decl.name, output]);
    }
    const outputs = Object.fromEntries(outputEntries);

    const parameterRecord = Object.fromEntries(
      [...boundParameters].map(([key, bound]): [string, BoundParameter] => [this.doc.parameters.get(key)?.name ?? key, bound]),
    );

    this.logger.debug(
      `Resolved ${Object.keys(expansion.resources).length} resource(s) and ${Object.keys(outputs).length} output(s); ` +
        `${deferred.length} value(s) deferred to deployment`,
    );

    const resolved: ResolvedTemplate = {
      ...(this.doc.schema !== undefined ? { schema: this.doc.schema } : {}),
      ...(this.doc.contentVersion !== undefined ? { contentVersion: this.doc.contentVersion } : {}),
      parameters: parameterRecord,
      variables,
      resources: expansion.resources,
      outputs,
      deferred,
    };
    return deepFreeze(resolved);
  }

  // ===========================================================================
  // Evaluation context
  // ===========================================================================

  private evaluator(allowDeferred: boolean, frames: readonly CopyFrame[]): ExpressionEvaluator {
    const context: EvaluationContext = {
      scope: this.scope,
      contentVersion: this.doc.contentVersion,
      allowDeferred,
      parameter: (name) => {
        if (!this.parameters) throw new FunctionEvaluationError("Parameters are not bound yet");
        return this.parameters.value(name);
      },
      variable: (name) => this.variable(name),
      copyIndex: (loopName) => copyIndexOf(frames, loopName),
      userFunction: (qualifiedName) => this.doc.functions.get(qualifiedName),
    };
    return new ExpressionEvaluator(this.registry, context);
  }

  /** Evaluate a variable once and remember its value. */
  private variable(name: string): JsonValue {
    const key = name.toLowerCase();
    const cached = this.variables.get(key);
    if (cached !== undefined) return cached;

    const decl = this.doc.variables.get(key);
    if (!decl) throw new UnresolvedReferenceError("variable", name, "expression");
    if (this.resolvingVariables.includes(key)) {
      const start = this.resolvingVariables.indexOf(key);
      const cycle = [...this.resolvingVariables.slice(start), key].map((k) => this.doc.variables.get(k)?.name ?? k);
      throw new CyclicReferenceError("CyclicVariableReference", cycle);
    }

    this.resolvingVariables.push(key);
    try {
      const { value } = this.evaluator(false, []).resolve(decl.value, childPath("variables", decl.name));
      this.variables.set(key, value);
      this.logger.debug(`Variable "${decl.name}" resolved`);
      return value;
    } finally {
      this.resolvingVariables.pop();
    }
  }

  private resolveOutput(decl: OutputDeclaration, deferred: string[]): ResolvedOutput | null {
    const path = childPath("outputs", decl.name);
    const evaluator = this.evaluator(true, []);

    if (decl.condition !== undefined && !this.outputCondition(evaluator, decl.condition, `${path}.condition`)) {
      this.logger.debug(`Omitting output "${decl.name}": condition is false`);
      return null;
    }

    const resolved = evaluator.resolve(decl.value, `${path}.value`);
    deferred.push(...resolved.deferred);
    const type = decl.type ?? inferOutputType(resolved.value);
    if (decl.type !== undefined && resolved.deferred.length === 0 && !matchesType(type, resolved.value)) {
      throw new InvalidExpressionError(
        `${path}.value`,
        typeof decl.value === "string" ? decl.value : JSON.stringify(decl.value),
        `output "${decl.name}" is declared as ${type} but its value is ${typeName(resolved.value)}`,
      );
    }
    return { type, value: resolved.value };
  }

  private outputCondition(evaluator: ExpressionEvaluator, condition: JsonValue, path: string): boolean {
    const { value, deferred } = evaluator.resolve(condition, path);
    const text = typeof condition === "string" ? condition : JSON.stringify(condition);
    if (deferred.length > 0) {
      throw new InvalidExpressionError(path, text, "condition must not depend on deployment-time values");
    }
    if (typeof value !== "boolean") {
      throw new InvalidExpressionError(path, text, `condition must be a bool, got ${typeName(value)}`);
    }
    return value;
  }
}

function copyIndexOf(frames: readonly CopyFrame[], loopName: string | undefined): number {
  if (frames.length === 0) {
    throw new FunctionEvaluationError("copyIndex() can only be used inside a copy loop");
  }
  if (loopName === undefined) {
    return frames[frames.length - 1].index;
  }
  const frame = frames.find((f) => f.name.toLowerCase() === loopName.toLowerCase());
  if (!frame) {
    throw new FunctionEvaluationError(`copyIndex() refers to '${loopName}', which is not an enclosing copy loop`);
  }
  return frame.index;
}

function inferOutputType(value: JsonValue): string {
  if (Array.isArray(value)) return "array";
  if (typeof value === "number") return "int";
  if (typeof value === "boolean") return "bool";
  if (typeof value === "string") return "string";
  return "object";
}
