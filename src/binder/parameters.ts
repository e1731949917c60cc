/**
 * Parameter binding: supplied values and defaults checked against the
 * declared type, allowed values and bounds.
 */

import {
  CyclicReferenceError,
  InvalidParameterValueError,
  MissingParameterError,
  UnresolvedReferenceError,
} from "../errors.js";
import { typeName } from "../expressions/functions.js";
import type { Logger } from "../logging.js";
import { isSecureType, matchesType, type ParameterDeclaration, type ParameterType, type TemplateDocument } from "../template/types.js";
import { describeValue, jsonEquals, type JsonValue } from "../types.js";

export type ParameterSource = "supplied" | "default";

export interface BoundParameter {
  type: ParameterType;
  value: JsonValue;
  source: ParameterSource;
}

export type ParameterValues = Readonly<Record<string, JsonValue>>;

/** Render a parameter value for messages, hiding secure values. */
export function describeParameterValue(decl: ParameterDeclaration, value: JsonValue): string {
  return isSecureType(decl.type) ? "(secure value)" : describeValue(value);
}

/**
 * Check a value against a declaration. Returns the reason it is invalid,
 * or null when it is valid.
 */
export function checkParameterValue(decl: ParameterDeclaration, value: JsonValue): string | null {
  if (!matchesType(decl.type, value)) {
    return `expected a value of type ${decl.type}, got ${typeName(value)}`;
  }

  if (decl.allowedValues) {
    const allowed = decl.allowedValues;
    const isAllowed = (candidate: JsonValue) => allowed.some((entry) => jsonEquals(entry, candidate));
    const allowedList = allowed.map((entry) => describeValue(entry)).join(", ");
    if (decl.type === "array" && Array.isArray(value)) {
      const rejected = value.find((element) => !isAllowed(element));
      if (rejected !== undefined) {
        return `element ${describeValue(rejected)} is not one of the allowed values: ${allowedList}`;
      }
    } else if (!isAllowed(value)) {
      return `${describeParameterValue(decl, value)} is not one of the allowed values: ${allowedList}`;
    }
  }

  if (typeof value === "number") {
    if (decl.minValue !== undefined && value < decl.minValue) {
      return `${value} is less than the minimum value ${decl.minValue}`;
    }
    if (decl.maxValue !== undefined && value > decl.maxValue) {
      return `${value} is greater than the maximum value ${decl.maxValue}`;
    }
  }

  if (typeof value === "string" || Array.isArray(value)) {
    if (decl.minLength !== undefined && value.length < decl.minLength) {
      return `length ${value.length} is less than the minimum length ${decl.minLength}`;
    }
    if (decl.maxLength !== undefined && value.length > decl.maxLength) {
      return `length ${value.length} is greater than the maximum length ${decl.maxLength}`;
    }
  }

  return null;
}

export type ParameterBinderOptions = {
  strictParameters: boolean;
  logger: Logger;
  /** Evaluate a declaration's default value; may call back into {@link ParameterBinder.value}. */
  evaluateDefault: (decl: ParameterDeclaration) => JsonValue;
};

/**
 * Binds the supplied values to a template's declarations. Defaults are
 * evaluated on first use, so a default may refer to other parameters.
 */
export class ParameterBinder {
  private readonly bound = new Map<string, BoundParameter>();
  private readonly resolving: string[] = [];

  constructor(
    private readonly doc: TemplateDocument,
    private readonly supplied: ParameterValues,
    private readonly options: ParameterBinderOptions,
  ) {}

  /** Bind every declared parameter, in declaration order. */
  bindAll(): Map<string, BoundParameter> {
    const suppliedByKey = new Map<string, { name: string; value: JsonValue }>();
    for (const [name, value] of Object.entries(this.supplied)) {
      const key = name.toLowerCase();
      const previous = suppliedByKey.get(key);
      if (previous) {
        throw new InvalidParameterValueError(name, `a value was already supplied as "${previous.name}"`);
      }
      suppliedByKey.set(key, { name, value: structuredClone(value) });
    }

    for (const [key, decl] of this.doc.parameters) {
      if (!suppliedByKey.has(key) && decl.defaultValue === undefined) {
        throw new MissingParameterError(decl.name);
      }
    }

    for (const [key, decl] of this.doc.parameters) {
      const entry = suppliedByKey.get(key);
      if (!entry) continue;
      const problem = checkParameterValue(decl, entry.value);
      if (problem) throw new InvalidParameterValueError(decl.name, problem);
      this.bound.set(key, { type: decl.type, value: entry.value, source: "supplied" });
      this.options.logger.debug(`Parameter "${decl.name}" = ${describeParameterValue(decl, entry.value)} (supplied)`);
    }

    for (const [key, { name }] of suppliedByKey) {
      if (this.doc.parameters.has(key)) continue;
      if (this.options.strictParameters) {
        throw new InvalidParameterValueError(name, "the template does not declare this parameter");
      }
      this.options.logger.warn(`Ignoring value for parameter "${name}", which the template does not declare`);
    }

    const result = new Map<string, BoundParameter>();
    for (const [key, decl] of this.doc.parameters) {
      this.value(decl.name);
      const bound = this.bound.get(key);
      if (bound) result.set(key, bound);
    }
    return result;
  }

  /** The bound value of a parameter, evaluating its default if needed. */
  value(name: string): JsonValue {
    const key = name.toLowerCase();
    const existing = this.bound.get(key);
    if (existing) return existing.value;

    const decl = this.doc.parameters.get(key);
    if (!decl) {
      throw new UnresolvedReferenceError("parameter", name, "expression");
    }
    if (decl.defaultValue === undefined) {
      throw new MissingParameterError(decl.name);
    }
    if (this.resolving.includes(key)) {
      const start = this.resolving.indexOf(key);
      const cycle = [...this.resolving.slice(start), key].map((k) => this.doc.parameters.get(k)?.name ?? k);
      throw new CyclicReferenceError("CyclicParameterReference", cycle);
    }

    this.resolving.push(key);
    let value: JsonValue;
    try {
      value = this.options.evaluateDefault(decl);
    } finally {
      this.resolving.pop();
    }

    const problem = checkParameterValue(decl, value);
    if (problem) {
      throw new InvalidParameterValueError(decl.name, `default value: ${problem}`);
    }
    this.bound.set(key, { type: decl.type, value, source: "default" });
    this.options.logger.debug(`Parameter "${decl.name}" = ${describeParameterValue(decl, value)} (default)`);
    return value;
  }
}
