/**
 * Turns expression ASTs back into template expression text. Used to emit
 * deferred expressions after their resolvable parts have been folded.
 */

import type { JsonValue } from "../types.js";
import type { Expression } from "./types.js";

export function serializeExpression(expr: Expression): string {
  switch (expr.kind) {
    case "string":
      return `'${expr.value.replace(/'/g, "''")}'`;
    case "number":
      return String(expr.value);
    case "call": {
      const name = expr.namespace ? `${expr.namespace}.${expr.name}` : expr.name;
      return `${name}(${expr.args.map(serializeExpression).join(", ")})`;
    }
    case "property":
      return `${serializeExpression(expr.target)}.${expr.property}`;
    case "index":
      return `${serializeExpression(expr.target)}[${serializeExpression(expr.index)}]`;
  }
}

/** Serialise as a template string value: `[...]`. */
export function toTemplateString(expr: Expression): string {
  return `[${serializeExpression(expr)}]`;
}

/** An expression that evaluates to `value`. */
export function literalExpression(value: JsonValue): Expression {
  if (typeof value === "string") {
    return { kind: "string", value };
  }
  if (typeof value === "number") {
    return Number.isSafeInteger(value)
      ? { kind: "number", value }
      : call("json", [{ kind: "string", value: JSON.stringify(value) }]);
  }
  if (typeof value === "boolean") {
    return call(value ? "true" : "false", []);
  }
  if (value === null) {
    return call("null", []);
  }
  if (Array.isArray(value)) {
    return call("createArray", value.map(literalExpression));
  }
  const args: Expression[] = [];
  for (const [key, entry] of Object.entries(value)) {
    args.push({ kind: "string", value: key }, literalExpression(entry));
  }
  return call("createObject", args);
}

function call(name: string, args: Expression[]): Expression {
  return { kind: "call", name, args, position: 0 };
}
