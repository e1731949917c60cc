/**
 * Deployment parameter files and command-line parameter overrides.
 *
 *   { "$schema": "...", "contentVersion": "1.0.0.0",
 *     "parameters": { "vmname": { "value": "box1" } } }
 */

import { readFile } from "node:fs/promises";
import { Type, type Static } from "@sinclair/typebox";
import { Check } from "@sinclair/typebox/value";
import { Errors } from "@sinclair/typebox/errors";
import { InvalidParameterValueError, MalformedDocumentError } from "../errors.js";
import { asJsonValue, setProperty, type JsonObject, type JsonValue } from "../types.js";
import { stripByteOrderMark } from "./loader.js";
import { matchesType, type ParameterDeclaration } from "./types.js";

export const ParameterFileSchema = Type.Object({
  $schema: Type.Optional(Type.String()),
  contentVersion: Type.Optional(Type.String()),
  parameters: Type.Record(
    Type.String(),
    Type.Object({
      value: Type.Optional(Type.Unknown()),
      reference: Type.Optional(Type.Unknown()),
    }),
  ),
});

export type ParameterFile = Static<typeof ParameterFileSchema>;

/** Read the `value` of every entry of a parsed parameter file. */
export function parseParameterFile(raw: unknown, source = "parameter file"): JsonObject {
  if (!Check(ParameterFileSchema, raw)) {
    const errors = [...Errors(ParameterFileSchema, raw)].map((e) => `${e.path || "(root)"}: ${e.message}`);
    throw new MalformedDocumentError(source, `${source} does not match the parameter file schema: ${errors[0] ?? "invalid document"}`, errors);
  }

  const values: JsonObject = {};
  for (const [name, entry] of Object.entries(raw.parameters)) {
    if (entry.reference !== undefined) {
      throw new MalformedDocumentError(name, `${source}: parameter "${name}" uses a secret store reference, which cannot be resolved offline`);
    }
    if (entry.value === undefined) {
      throw new MalformedDocumentError(name, `${source}: parameter "${name}" has no value`);
    }
    const value = asJsonValue(entry.value);
    if (value === undefined) {
      throw new MalformedDocumentError(name, `${source}: parameter "${name}" is not a JSON value`);
    }
    setProperty(values, name, value);
  }
  return values;
}

export function parseParameterFileJson(text: string, source = "parameter file"): JsonObject {
  let raw: unknown;
  try {
    raw = JSON.parse(stripByteOrderMark(text));
  } catch (error) {
    throw new MalformedDocumentError(source, `${source} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseParameterFile(raw, source);
}

export async function loadParameterFile(path: string): Promise<JsonObject> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    throw new MalformedDocumentError(path, `Cannot read parameter file ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseParameterFileJson(text, path);
}

// =============================================================================
// Overrides
// =============================================================================

/** Split a `name=value` override at the first `=`. */
export function parseAssignment(assignment: string): { name: string; value: string } {
  const eq = assignment.indexOf("=");
  if (eq <= 0) {
    throw new InvalidParameterValueError(assignment, "expected an assignment of the form name=value");
  }
  return { name: assignment.slice(0, eq).trim(), value: assignment.slice(eq + 1) };
}

/**
 * Convert override text to the declared type. Undeclared parameters keep the
 * text as a string; the binder decides what to do with them.
 */
export function coerceParameterValue(decl: ParameterDeclaration | undefined, name: string, text: string): JsonValue {
  if (!decl) return text;

  switch (decl.type) {
    case "string":
    case "securestring":
      return text;

    case "int": {
      const trimmed = text.trim();
      const value = Number(trimmed);
      if (!/^-?\d+$/.test(trimmed) || !Number.isSafeInteger(value)) {
        throw new InvalidParameterValueError(name, `"${text}" is not an int`);
      }
      return value;
    }

    case "bool": {
      const lower = text.trim().toLowerCase();
      if (lower === "true") return true;
      if (lower === "false") return false;
      throw new InvalidParameterValueError(name, `"${text}" is not a bool (expected true or false)`);
    }

    case "object":
    case "secureobject":
    case "array": {
      let parsed: unknown;
      try {
        parsed = JSON.parse(text);
      } catch {
        throw new InvalidParameterValueError(name, `expected JSON for a parameter of type ${decl.type}`);
      }
      const value = asJsonValue(parsed);
      if (value === undefined || !matchesType(decl.type, value)) {
        throw new InvalidParameterValueError(name, `expected JSON for a parameter of type ${decl.type}`);
      }
      return value;
    }
  }
}
