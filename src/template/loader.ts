/**
 * Template loading: JSON text or raw object → validated, normalised
 * {@link TemplateDocument}. Every failure here is a MalformedDocument error.
 */

import { readFile } from "node:fs/promises";
import { MalformedDocumentError } from "../errors.js";
import { isJsonObject, setProperty, type JsonObject, type JsonValue } from "../types.js";
import {
  checkTemplateDocument,
  type RawOutputDeclaration,
  type RawParameterDeclaration,
  type RawResourceSpec,
  type RawTemplateDocument,
} from "./schema.js";
import {
  PARAMETER_TYPES,
  type OutputDeclaration,
  type ParameterDeclaration,
  type ParameterType,
  type ResourceSpec,
  type TemplateDocument,
  type UserFunction,
  type VariableDeclaration,
} from "./types.js";

// =============================================================================
// Entry points
// =============================================================================

/** Validate and normalise a template given as a parsed object. */
export function parseTemplate(raw: unknown): TemplateDocument {
  const checked = checkTemplateDocument(raw);
  if (!checked.valid) {
    throw new MalformedDocumentError("template", `Template does not match the expected schema: ${checked.errors[0]}`, checked.errors);
  }
  return normalizeTemplate(checked.document);
}

/** Parse template JSON text. `source` names the input in error messages. */
export function parseTemplateJson(text: string, source = "template"): TemplateDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(stripByteOrderMark(text));
  } catch (error) {
    throw new MalformedDocumentError(source, `${source} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseTemplate(raw);
}

export async function loadTemplateFile(path: string): Promise<TemplateDocument> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    throw new MalformedDocumentError(path, `Cannot read template ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseTemplateJson(text, path);
}

export function stripByteOrderMark(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

// =============================================================================
// Normalisation
// =============================================================================

function normalizeTemplate(raw: RawTemplateDocument): TemplateDocument {
  const parameters = new Map<string, ParameterDeclaration>();
  for (const [name, decl] of Object.entries(raw.parameters ?? {})) {
    putUnique(parameters, name, normalizeParameter(name, decl), "parameter");
  }

  const variables = new Map<string, VariableDeclaration>();
  for (const [name, value] of Object.entries(raw.variables ?? {})) {
    putUnique(variables, name, { name, value: toJsonValue(value, `variables.${name}`) }, "variable");
  }

  const functions = new Map<string, UserFunction>();
  for (const [nsIndex, ns] of (raw.functions ?? []).entries()) {
    for (const [member, def] of Object.entries(ns.members)) {
      const qualifiedName = `${ns.namespace}.${member}`.toLowerCase();
      if (functions.has(qualifiedName)) {
        throw new MalformedDocumentError(`${ns.namespace}.${member}`, `Duplicate user function "${ns.namespace}.${member}"`);
      }
      functions.set(qualifiedName, {
        namespace: ns.namespace,
        name: member,
        qualifiedName,
        parameters: def.parameters ?? [],
        output: {
          type: def.output.type,
          value: toJsonValue(def.output.value, `functions[${nsIndex}].members.${member}.output.value`),
        },
      });
    }
  }

  const resources = raw.resources.map((resource, i) => normalizeResource(resource, `resources[${i}]`));

  const outputs = new Map<string, OutputDeclaration>();
  for (const [name, decl] of Object.entries(raw.outputs ?? {})) {
    putUnique(outputs, name, normalizeOutput(name, decl), "output");
  }

  return {
    schema: raw.$schema,
    contentVersion: raw.contentVersion,
    parameters,
    variables,
    functions,
    resources,
    outputs,
  };
}

function putUnique<T>(map: Map<string, T>, name: string, value: T, kind: string): void {
  const key = name.toLowerCase();
  if (map.has(key)) {
    throw new MalformedDocumentError(name, `Duplicate ${kind} "${name}" (names are case-insensitive)`);
  }
  map.set(key, value);
}

function normalizeParameter(name: string, raw: RawParameterDeclaration): ParameterDeclaration {
  const type = raw.type.toLowerCase();
  if (!isParameterType(type)) {
    throw new MalformedDocumentError(
      name,
      `Parameter "${name}" has unsupported type "${raw.type}"; expected one of ${PARAMETER_TYPES.join(", ")}`,
    );
  }

  const decl: ParameterDeclaration = { name, type };
  if (raw.defaultValue !== undefined) {
    decl.defaultValue = toJsonValue(raw.defaultValue, `parameters.${name}.defaultValue`);
  }
  if (raw.allowedValues !== undefined) {
    decl.allowedValues = raw.allowedValues.map((v, i) => toJsonValue(v, `parameters.${name}.allowedValues[${i}]`));
  }
  if (raw.minValue !== undefined) decl.minValue = raw.minValue;
  if (raw.maxValue !== undefined) decl.maxValue = raw.maxValue;
  if (raw.minLength !== undefined) decl.minLength = raw.minLength;
  if (raw.maxLength !== undefined) decl.maxLength = raw.maxLength;
  if (raw.metadata?.description !== undefined) decl.description = raw.metadata.description;

  if (decl.minValue !== undefined && decl.maxValue !== undefined && decl.minValue > decl.maxValue) {
    throw new MalformedDocumentError(name, `Parameter "${name}" has minValue greater than maxValue`);
  }
  if (decl.minLength !== undefined && decl.maxLength !== undefined && decl.minLength > decl.maxLength) {
    throw new MalformedDocumentError(name, `Parameter "${name}" has minLength greater than maxLength`);
  }
  return decl;
}

function isParameterType(value: string): value is ParameterType {
  return PARAMETER_TYPES.some((t) => t === value);
}

function normalizeResource(raw: RawResourceSpec, path: string): ResourceSpec {
  const definition = toJsonValue(raw, path);
  if (!isJsonObject(definition)) {
    throw new MalformedDocumentError(path, `${path} must be an object`);
  }

  const spec: ResourceSpec = {
    type: raw.type,
    name: raw.name,
    apiVersion: raw.apiVersion,
    dependsOn: raw.dependsOn ?? [],
    resources: (raw.resources ?? []).map((child, i) => normalizeResource(child, `${path}.resources[${i}]`)),
    definition,
    path,
  };
  if (raw.location !== undefined) spec.location = raw.location;
  if (raw.condition !== undefined) spec.condition = raw.condition;
  if (raw.copy !== undefined) {
    const mode = (raw.copy.mode ?? "parallel").toLowerCase();
    if (mode !== "parallel" && mode !== "serial") {
      throw new MalformedDocumentError(path, `${path}.copy.mode must be "parallel" or "serial"`);
    }
    spec.copy = { name: raw.copy.name, count: raw.copy.count, mode };
    if (raw.copy.batchSize !== undefined) spec.copy.batchSize = raw.copy.batchSize;
  }
  return spec;
}

function normalizeOutput(name: string, raw: RawOutputDeclaration): OutputDeclaration {
  if (typeof raw === "string") {
    return { name, value: raw };
  }
  const decl: OutputDeclaration = { name, value: toJsonValue(raw.value, `outputs.${name}.value`) };
  if (raw.type !== undefined) decl.type = raw.type;
  if (raw.condition !== undefined) decl.condition = raw.condition;
  return decl;
}

/**
 * Convert an unknown value into JSON, rejecting anything JSON cannot carry
 * (undefined, functions, non-finite numbers, class instances).
 */
export function toJsonValue(value: unknown, path: string): JsonValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new MalformedDocumentError(path, `${path} is not a finite number`);
    }
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item, i) => toJsonValue(item, `${path}[${i}]`));
  }
  if (typeof value === "object" && isPlainObject(value)) {
    const result: JsonObject = {};
    for (const [key, entry] of Object.entries(value)) {
      if (entry === undefined) continue;
      setProperty(result, key, toJsonValue(entry, `${path}.${key}`));
    }
    return result;
  }
  throw new MalformedDocumentError(path, `${path} is not a JSON value`);
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
