/**
 * Built-in template functions.
 *
 * Semantics follow the deployment service's template function reference:
 * string search functions (`startsWith`, `endsWith`, `indexOf`,
 * `lastIndexOf`) and object key lookups are case-insensitive, `string()`
 * renders booleans as `True`/`False`, and integer division truncates.
 */

import { createHash } from "node:crypto";
import { asJsonValue, isJsonObject, jsonEquals, setProperty, type JsonObject, type JsonValue } from "../types.js";
import {
  FunctionEvaluationError,
  FunctionRegistry,
  type EagerFunction,
  type FunctionContext,
  type LazyFunction,
  type RuntimeFunction,
} from "./registry.js";
import { isResourceType, providerPath, resourceGroupId } from "./resource-id.js";
import { isResidual, Residual } from "./types.js";
import { literalExpression } from "./serializer.js";

// =============================================================================
// Argument helpers
// =============================================================================

function fail(message: string): never {
  throw new FunctionEvaluationError(message);
}

export function typeName(value: JsonValue): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "number") return Number.isInteger(value) ? "int" : "number";
  if (typeof value === "boolean") return "bool";
  return typeof value;
}

function str(fn: string, args: JsonValue[], i: number): string {
  const value = args[i];
  if (typeof value !== "string") fail(`'${fn}' argument ${i + 1} must be a string, got ${typeName(value)}`);
  return value;
}

function int(fn: string, args: JsonValue[], i: number): number {
  const value = args[i];
  if (typeof value !== "number" || !Number.isInteger(value)) fail(`'${fn}' argument ${i + 1} must be an int, got ${typeName(value)}`);
  return value;
}

function bool(fn: string, args: JsonValue[], i: number): boolean {
  const value = args[i];
  if (typeof value !== "boolean") fail(`'${fn}' argument ${i + 1} must be a bool, got ${typeName(value)}`);
  return value;
}

function arr(fn: string, args: JsonValue[], i: number): JsonValue[] {
  const value = args[i];
  if (!Array.isArray(value)) fail(`'${fn}' argument ${i + 1} must be an array, got ${typeName(value)}`);
  return value;
}

function obj(fn: string, args: JsonValue[], i: number): JsonObject {
  const value = args[i];
  if (!isJsonObject(value)) fail(`'${fn}' argument ${i + 1} must be an object, got ${typeName(value)}`);
  return value;
}

/** String conversion used by `string()`, `concat()` and `format()`. */
export function toArmString(value: JsonValue): string {
  if (typeof value === "string") return value;
  if (typeof value === "boolean") return value ? "True" : "False";
  if (typeof value === "number") return String(value);
  if (value === null) return "";
  return JSON.stringify(value);
}

/** Case-insensitive own-key lookup. */
export function findKey(target: JsonObject, key: string): string | undefined {
  if (Object.hasOwn(target, key)) return key;
  const lower = key.toLowerCase();
  return Object.keys(target).find((k) => k.toLowerCase() === lower);
}

function eager(name: string, minArgs: number, maxArgs: number | undefined, evaluate: EagerFunction["evaluate"]): EagerFunction {
  const definition: EagerFunction = { kind: "eager", name, minArgs, evaluate };
  if (maxArgs !== undefined) definition.maxArgs = maxArgs;
  return definition;
}

function runtime(name: string, minArgs: number, maxArgs?: number): RuntimeFunction {
  const definition: RuntimeFunction = { kind: "runtime", name, minArgs };
  if (maxArgs !== undefined) definition.maxArgs = maxArgs;
  return definition;
}

// =============================================================================
// Deployment functions
// =============================================================================

function resourceGroupObject(ctx: FunctionContext): JsonObject {
  const { subscriptionId, resourceGroup, location } = ctx.scope;
  return {
    id: resourceGroupId(subscriptionId, resourceGroup),
    name: resourceGroup,
    type: "Microsoft.Resources/resourceGroups",
    location,
    properties: { provisioningState: "Succeeded" },
  };
}

function subscriptionObject(ctx: FunctionContext): JsonObject {
  const { subscriptionId, tenantId } = ctx.scope;
  return {
    id: `/subscriptions/${subscriptionId}`,
    subscriptionId,
    tenantId,
    displayName: subscriptionId,
  };
}

function deploymentObject(ctx: FunctionContext): JsonObject {
  const properties: JsonObject = { provisioningState: "Accepted", mode: "Incremental" };
  if (ctx.contentVersion !== undefined) {
    properties.template = { contentVersion: ctx.contentVersion };
  }
  return { name: ctx.scope.deploymentName, properties };
}

/** Split `resourceId` arguments into the optional scope prefix, the type, and the names. */
function splitResourceIdArgs(fn: string, args: JsonValue[]): { prefix: string[]; type: string; names: string[] } {
  const strings = args.map((_, i) => str(fn, args, i));
  const typeIndex = strings.findIndex(isResourceType);
  if (typeIndex < 0) fail(`'${fn}' needs a resource type such as 'Microsoft.Network/networkInterfaces'`);
  return { prefix: strings.slice(0, typeIndex), type: strings[typeIndex], names: strings.slice(typeIndex + 1) };
}

function resourceId(args: JsonValue[], ctx: FunctionContext): JsonValue {
  const { prefix, type, names } = splitResourceIdArgs("resourceId", args);
  let subscriptionId = ctx.scope.subscriptionId;
  let resourceGroup = ctx.scope.resourceGroup;
  if (prefix.length === 1) {
    resourceGroup = prefix[0];
  } else if (prefix.length === 2) {
    [subscriptionId, resourceGroup] = prefix;
  } else if (prefix.length > 2) {
    fail(`'resourceId' takes at most a subscription ID and a resource group name before the resource type`);
  }
  const path = providerPath(type, names);
  if ("error" in path) fail(`'resourceId': ${path.error}`);
  return `${resourceGroupId(subscriptionId, resourceGroup)}/providers/${path.path}`;
}

function subscriptionResourceId(args: JsonValue[], ctx: FunctionContext): JsonValue {
  const { prefix, type, names } = splitResourceIdArgs("subscriptionResourceId", args);
  if (prefix.length > 1) fail(`'subscriptionResourceId' takes at most a subscription ID before the resource type`);
  const subscriptionId = prefix[0] ?? ctx.scope.subscriptionId;
  const path = providerPath(type, names);
  if ("error" in path) fail(`'subscriptionResourceId': ${path.error}`);
  return `/subscriptions/${subscriptionId}/providers/${path.path}`;
}

function copyIndex(args: JsonValue[], ctx: FunctionContext): JsonValue {
  let loopName: string | undefined;
  let offset = 0;
  if (args.length === 1) {
    if (typeof args[0] === "string") loopName = args[0];
    else offset = int("copyIndex", args, 0);
  } else if (args.length === 2) {
    loopName = str("copyIndex", args, 0);
    offset = int("copyIndex", args, 1);
  }
  return ctx.copyIndex(loopName) + offset;
}

// =============================================================================
// String functions
// =============================================================================

function concat(args: JsonValue[]): JsonValue {
  if (args.every(Array.isArray)) {
    return args.flatMap((_, i) => arr("concat", args, i));
  }
  return args
    .map((value, i) => {
      if (Array.isArray(value) || isJsonObject(value)) {
        fail(`'concat' argument ${i + 1} is ${typeName(value)}; arguments must be all arrays or all scalar values`);
      }
      return toArmString(value);
    })
    .join("");
}

const FORMAT_TOKEN = /\{\{|\}\}|\{(\d+)(?::([^}]*))?\}/g;

function format(args: JsonValue[]): JsonValue {
  const template = str("format", args, 0);
  const values = args.slice(1);
  return template.replace(FORMAT_TOKEN, (match, index: string | undefined, spec: string | undefined) => {
    if (match === "{{") return "{";
    if (match === "}}") return "}";
    const position = Number(index);
    if (position >= values.length) fail(`'format' placeholder {${position}} has no matching argument`);
    const value = values[position];
    if (spec === undefined || spec === "") return toArmString(value);
    const padded = /^[dD](\d+)$/.exec(spec);
    if (padded && typeof value === "number" && Number.isInteger(value)) {
      const digits = String(Math.abs(value)).padStart(Number(padded[1]), "0");
      return value < 0 ? `-${digits}` : digits;
    }
    fail(`'format' does not support the format specifier '${spec}' for ${typeName(value)}`);
  });
}

function substring(args: JsonValue[]): JsonValue {
  const value = str("substring", args, 0);
  const start = int("substring", args, 1);
  const length = args.length > 2 ? int("substring", args, 2) : value.length - start;
  if (start < 0 || start > value.length) fail(`'substring' start index ${start} is outside the string`);
  if (length < 0 || start + length > value.length) fail(`'substring' length ${length} runs past the end of the string`);
  return value.slice(start, start + length);
}

function split(args: JsonValue[]): JsonValue {
  const value = str("split", args, 0);
  const delimiter = args[1];
  const delimiters = Array.isArray(delimiter)
    ? delimiter.map((d, i) => {
        if (typeof d !== "string") fail(`'split' delimiter ${i + 1} must be a string`);
        return d;
      })
    : [str("split", args, 1)];
  if (delimiters.some((d) => d.length === 0)) fail(`'split' delimiters must not be empty`);
  const pattern = new RegExp(delimiters.map(escapeRegExp).join("|"));
  return value.split(pattern);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function padLeft(args: JsonValue[]): JsonValue {
  const source = args[0];
  if (typeof source !== "string" && !(typeof source === "number" && Number.isInteger(source))) {
    fail(`'padLeft' argument 1 must be a string or an int, got ${typeName(source)}`);
  }
  const totalLength = int("padLeft", args, 1);
  const padChar = args.length > 2 ? str("padLeft", args, 2) : " ";
  if (padChar.length !== 1) fail(`'padLeft' padding character must be a single character`);
  return String(source).padStart(totalLength, padChar);
}

const BASE32_ALPHABET = "abcdefghijklmnopqrstuvwxyz234567";

/** Deterministic 13-character hash of the arguments. */
function uniqueString(args: JsonValue[]): JsonValue {
  const input = args.map((_, i) => str("uniqueString", args, i)).join("-");
  const digest = createHash("sha256").update(input, "utf8").digest();
  let result = "";
  for (let i = 0; i < 13; i++) {
    result += BASE32_ALPHABET[digest[i] % 32];
  }
  return result;
}

/** Deterministic name-based (version 5 layout) GUID of the arguments. */
function guid(args: JsonValue[]): JsonValue {
  const input = args.map((_, i) => str("guid", args, i)).join("-");
  const bytes = createHash("sha1").update(input, "utf8").digest().subarray(0, 16);
  bytes[6] = (bytes[6] & 0x0f) | 0x50;
  bytes[8] = (bytes[8] & 0x3f) | 0x80;
  const hex = bytes.toString("hex");
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20, 32)}`;
}

function uriComponentToString(args: JsonValue[]): JsonValue {
  const value = str("uriComponentToString", args, 0);
  try {
    return decodeURIComponent(value);
  } catch {
    fail(`'uriComponentToString' argument is not a valid URI-encoded string`);
  }
}

// =============================================================================
// Array and object functions
// =============================================================================

function empty(args: JsonValue[]): JsonValue {
  const value = args[0];
  if (value === null) return true;
  if (typeof value === "string" || Array.isArray(value)) return value.length === 0;
  if (isJsonObject(value)) return Object.keys(value).length === 0;
  fail(`'empty' argument must be a string, array or object, got ${typeName(value)}`);
}

function contains(args: JsonValue[]): JsonValue {
  const [container, item] = args;
  if (typeof container === "string") {
    if (typeof item !== "string" && typeof item !== "number") fail(`'contains' on a string needs a string to find`);
    return container.includes(String(item));
  }
  if (Array.isArray(container)) {
    return container.some((entry) => jsonEquals(entry, item));
  }
  if (isJsonObject(container)) {
    if (typeof item !== "string") fail(`'contains' on an object needs a key string`);
    return findKey(container, item) !== undefined;
  }
  fail(`'contains' argument 1 must be a string, array or object, got ${typeName(container)}`);
}

function length(args: JsonValue[]): JsonValue {
  const value = args[0];
  if (typeof value === "string" || Array.isArray(value)) return value.length;
  if (isJsonObject(value)) return Object.keys(value).length;
  fail(`'length' argument must be a string, array or object, got ${typeName(value)}`);
}

function firstOrLast(fn: "first" | "last", args: JsonValue[]): JsonValue {
  const value = args[0];
  if (typeof value === "string") {
    if (value.length === 0) return "";
    return fn === "first" ? value[0] : value[value.length - 1];
  }
  if (Array.isArray(value)) {
    if (value.length === 0) return null;
    return fn === "first" ? value[0] : value[value.length - 1];
  }
  fail(`'${fn}' argument must be a string or an array, got ${typeName(value)}`);
}

function takeOrSkip(fn: "take" | "skip", args: JsonValue[]): JsonValue {
  const value = args[0];
  const count = Math.max(0, int(fn, args, 1));
  if (typeof value === "string") {
    return fn === "take" ? value.slice(0, count) : value.slice(count);
  }
  if (Array.isArray(value)) {
    return fn === "take" ? value.slice(0, count) : value.slice(count);
  }
  fail(`'${fn}' argument 1 must be a string or an array, got ${typeName(value)}`);
}

function union(args: JsonValue[]): JsonValue {
  if (args.every(Array.isArray)) {
    const result: JsonValue[] = [];
    for (const [i] of args.entries()) {
      for (const item of arr("union", args, i)) {
        if (!result.some((existing) => jsonEquals(existing, item))) result.push(item);
      }
    }
    return result;
  }
  const result: JsonObject = {};
  for (const [i] of args.entries()) {
    for (const [key, value] of Object.entries(obj("union", args, i))) {
      setProperty(result, key, value);
    }
  }
  return result;
}

function intersection(args: JsonValue[]): JsonValue {
  if (args.every(Array.isArray)) {
    const [first, ...rest] = args.map((_, i) => arr("intersection", args, i));
    return first.filter(
      (item, i) =>
        first.findIndex((other) => jsonEquals(other, item)) === i &&
        rest.every((other) => other.some((entry) => jsonEquals(entry, item))),
    );
  }
  const [first, ...rest] = args.map((_, i) => obj("intersection", args, i));
  const result: JsonObject = {};
  for (const [key, value] of Object.entries(first)) {
    if (rest.every((other) => Object.hasOwn(other, key) && jsonEquals(other[key], value))) {
      setProperty(result, key, value);
    }
  }
  return result;
}

function createObject(args: JsonValue[]): JsonValue {
  if (args.length % 2 !== 0) fail(`'createObject' needs an even number of arguments (key, value pairs)`);
  const result: JsonObject = {};
  for (let i = 0; i < args.length; i += 2) {
    setProperty(result, str("createObject", args, i), args[i + 1]);
  }
  return result;
}

function json(args: JsonValue[]): JsonValue {
  const text = str("json", args, 0);
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    fail(`'json' argument is not valid JSON`);
  }
  const value = asJsonValue(parsed);
  if (value === undefined) fail(`'json' argument is not valid JSON`);
  return value;
}

function range(args: JsonValue[]): JsonValue {
  const start = int("range", args, 0);
  const count = int("range", args, 1);
  if (count < 0 || count > 10_000) fail(`'range' count must be between 0 and 10000`);
  return Array.from({ length: count }, (_, i) => start + i);
}

// =============================================================================
// Numeric and comparison functions
// =============================================================================

function toInt(args: JsonValue[]): JsonValue {
  const value = args[0];
  if (typeof value === "number") return Math.trunc(value);
  if (typeof value === "string" && /^\s*[-+]?\d+\s*$/.test(value)) {
    const parsed = Number(value.trim());
    if (Number.isSafeInteger(parsed)) return parsed;
  }
  fail(`'int' cannot convert ${typeName(value)} ${JSON.stringify(value)} to an int`);
}

function arithmetic(name: string, op: (a: number, b: number) => number): EagerFunction {
  return eager(name, 2, 2, (args) => {
    const result = op(int(name, args, 0), int(name, args, 1));
    if (!Number.isSafeInteger(result)) fail(`'${name}' result is out of range`);
    return result;
  });
}

function minOrMax(fn: "min" | "max", args: JsonValue[]): JsonValue {
  const values = args.length === 1 && Array.isArray(args[0]) ? args[0] : args;
  if (values.length === 0) fail(`'${fn}' needs at least one value`);
  const numbers = values.map((_, i) => int(fn, values, i));
  return fn === "min" ? Math.min(...numbers) : Math.max(...numbers);
}

function toBool(args: JsonValue[]): JsonValue {
  const value = args[0];
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0;
  if (typeof value === "string") {
    const lower = value.trim().toLowerCase();
    if (lower === "true") return true;
    if (lower === "false") return false;
  }
  fail(`'bool' cannot convert ${typeName(value)} ${JSON.stringify(value)} to a bool`);
}

function compare(fn: string, args: JsonValue[]): number {
  const [a, b] = args;
  if (typeof a === "number" && typeof b === "number") return a - b;
  if (typeof a === "string" && typeof b === "string") return a < b ? -1 : a > b ? 1 : 0;
  fail(`'${fn}' compares two ints or two strings, got ${typeName(a)} and ${typeName(b)}`);
}

function caseInsensitive(fn: string, args: JsonValue[]): [string, string] {
  return [str(fn, args, 0).toLowerCase(), str(fn, args, 1).toLowerCase()];
}

// =============================================================================
// Lazy functions
// =============================================================================

const ifFunction: LazyFunction = {
  kind: "lazy",
  name: "if",
  minArgs: 3,
  maxArgs: 3,
  evaluate(args, _ctx, evaluateArg) {
    const condition = evaluateArg(args[0]);
    if (isResidual(condition)) {
      const branches = args.slice(1).map((arg) => {
        const value = evaluateArg(arg);
        return isResidual(value) ? value.expression : literalExpression(value);
      });
      return new Residual({ kind: "call", name: "if", args: [condition.expression, ...branches], position: 0 });
    }
    if (typeof condition !== "boolean") fail(`'if' condition must be a bool, got ${typeName(condition)}`);
    return evaluateArg(condition ? args[1] : args[2]);
  },
};

// =============================================================================
// Registry
// =============================================================================

/** Register every built-in function on `registry`. */
export function registerBuiltinFunctions(registry: FunctionRegistry): FunctionRegistry {
  const definitions = [
    // Deployment
    eager("parameters", 1, 1, (args, ctx) => ctx.parameter(str("parameters", args, 0))),
    eager("variables", 1, 1, (args, ctx) => ctx.variable(str("variables", args, 0))),
    eager("resourceGroup", 0, 0, (_args, ctx) => resourceGroupObject(ctx)),
    eager("subscription", 0, 0, (_args, ctx) => subscriptionObject(ctx)),
    eager("deployment", 0, 0, (_args, ctx) => deploymentObject(ctx)),
    eager("resourceId", 2, undefined, resourceId),
    eager("subscriptionResourceId", 2, undefined, subscriptionResourceId),
    eager("copyIndex", 0, 2, copyIndex),

    // String
    eager("concat", 1, undefined, concat),
    eager("format", 1, undefined, format),
    eager("toLower", 1, 1, (args) => str("toLower", args, 0).toLowerCase()),
    eager("toUpper", 1, 1, (args) => str("toUpper", args, 0).toUpperCase()),
    eager("trim", 1, 1, (args) => str("trim", args, 0).trim()),
    eager("replace", 3, 3, (args) => {
      const oldValue = str("replace", args, 1);
      if (oldValue.length === 0) fail(`'replace' search string must not be empty`);
      return str("replace", args, 0).split(oldValue).join(str("replace", args, 2));
    }),
    eager("substring", 2, 3, substring),
    eager("split", 2, 2, split),
    eager("startsWith", 2, 2, (args) => {
      const [value, prefix] = caseInsensitive("startsWith", args);
      return value.startsWith(prefix);
    }),
    eager("endsWith", 2, 2, (args) => {
      const [value, suffix] = caseInsensitive("endsWith", args);
      return value.endsWith(suffix);
    }),
    eager("indexOf", 2, 2, (args) => {
      const [value, search] = caseInsensitive("indexOf", args);
      return value.indexOf(search);
    }),
    eager("lastIndexOf", 2, 2, (args) => {
      const [value, search] = caseInsensitive("lastIndexOf", args);
      return value.lastIndexOf(search);
    }),
    eager("padLeft", 2, 3, padLeft),
    eager("string", 1, 1, (args) => toArmString(args[0])),
    eager("uniqueString", 1, undefined, uniqueString),
    eager("guid", 1, undefined, guid),
    eager("base64", 1, 1, (args) => Buffer.from(str("base64", args, 0), "utf8").toString("base64")),
    eager("base64ToString", 1, 1, (args) => Buffer.from(str("base64ToString", args, 0), "base64").toString("utf8")),
    eager("uriComponent", 1, 1, (args) => encodeURIComponent(str("uriComponent", args, 0))),
    eager("uriComponentToString", 1, 1, uriComponentToString),

    // Arrays and objects
    eager("empty", 1, 1, empty),
    eager("contains", 2, 2, contains),
    eager("length", 1, 1, length),
    eager("first", 1, 1, (args) => firstOrLast("first", args)),
    eager("last", 1, 1, (args) => firstOrLast("last", args)),
    eager("take", 2, 2, (args) => takeOrSkip("take", args)),
    eager("skip", 2, 2, (args) => takeOrSkip("skip", args)),
    eager("union", 1, undefined, union),
    eager("intersection", 1, undefined, intersection),
    eager("createArray", 0, undefined, (args) => [...args]),
    eager("array", 1, 1, (args) => (Array.isArray(args[0]) ? args[0] : [args[0]])),
    eager("createObject", 0, undefined, createObject),
    eager("json", 1, 1, json),
    eager("coalesce", 1, undefined, (args) => args.find((value) => value !== null) ?? null),
    eager("range", 2, 2, range),

    // Numeric
    eager("int", 1, 1, toInt),
    arithmetic("add", (a, b) => a + b),
    arithmetic("sub", (a, b) => a - b),
    arithmetic("mul", (a, b) => a * b),
    arithmetic("div", (a, b) => {
      if (b === 0) fail(`'div' by zero`);
      return Math.trunc(a / b);
    }),
    arithmetic("mod", (a, b) => {
      if (b === 0) fail(`'mod' by zero`);
      return a % b;
    }),
    eager("min", 1, undefined, (args) => minOrMax("min", args)),
    eager("max", 1, undefined, (args) => minOrMax("max", args)),

    // Logical and comparison
    eager("and", 2, undefined, (args) => args.every((_, i) => bool("and", args, i))),
    eager("or", 2, undefined, (args) => args.map((_, i) => bool("or", args, i)).some(Boolean)),
    eager("not", 1, 1, (args) => !bool("not", args, 0)),
    ifFunction,
    eager("bool", 1, 1, toBool),
    eager("equals", 2, 2, (args) => jsonEquals(args[0], args[1])),
    eager("less", 2, 2, (args) => compare("less", args) < 0),
    eager("lessOrEquals", 2, 2, (args) => compare("lessOrEquals", args) <= 0),
    eager("greater", 2, 2, (args) => compare("greater", args) > 0),
    eager("greaterOrEquals", 2, 2, (args) => compare("greaterOrEquals", args) >= 0),
    eager("true", 0, 0, () => true),
    eager("false", 0, 0, () => false),
    eager("null", 0, 0, () => null),

    // Run-time only
    runtime("reference", 1, 3),
    runtime("providers", 1, 2),
  ];

  for (const definition of definitions) {
    registry.register(definition);
  }
  return registry;
}

let builtinRegistry: FunctionRegistry | null = null;

/** The shared registry of built-in functions. Clone it before registering custom functions. */
export function getBuiltinRegistry(): FunctionRegistry {
  if (!builtinRegistry) {
    builtinRegistry = registerBuiltinFunctions(new FunctionRegistry());
  }
  return builtinRegistry;
}
