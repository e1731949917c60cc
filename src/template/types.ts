/**
 * Template document types.
 *
 * These are the normalised shapes produced by the loader after the raw
 * document has passed schema validation. Names of parameters, variables
 * and outputs are matched case-insensitively, so the maps are keyed by the
 * lower-cased name and each entry keeps the name as written.
 */

import { isJsonObject, type JsonObject, type JsonValue } from "../types.js";

export type ParameterType = "string" | "securestring" | "int" | "bool" | "object" | "secureobject" | "array";

export const PARAMETER_TYPES: readonly ParameterType[] = [
  "string",
  "securestring",
  "int",
  "bool",
  "object",
  "secureobject",
  "array",
];

export interface ParameterDeclaration {
  name: string;
  type: ParameterType;
  defaultValue?: JsonValue;
  allowedValues?: JsonValue[];
  minValue?: number;
  maxValue?: number;
  minLength?: number;
  maxLength?: number;
  description?: string;
}

export interface VariableDeclaration {
  name: string;
  value: JsonValue;
}

export interface ResourceCopy {
  name: string;
  count: JsonValue;
  mode: "parallel" | "serial";
  batchSize?: number;
}

export interface ResourceSpec {
  type: string;
  name: string;
  apiVersion: string;
  location?: string;
  dependsOn: string[];
  condition?: JsonValue;
  copy?: ResourceCopy;
  /** Child resources declared inline; their type and name are relative to this resource. */
  resources: ResourceSpec[];
  /** The resource object as written, including keys the binder passes through untouched (tags, sku, kind, ...). */
  definition: JsonObject;
  /** Template path of this resource, e.g. `resources[2]` or `resources[0].resources[1]`. */
  path: string;
}

export interface OutputDeclaration {
  name: string;
  type?: string;
  value: JsonValue;
  condition?: JsonValue;
}

export interface UserFunctionParameter {
  name: string;
  type: string;
}

export interface UserFunction {
  namespace: string;
  name: string;
  /** `namespace.name`, lower-cased, as used for lookup. */
  qualifiedName: string;
  parameters: UserFunctionParameter[];
  output: { type: string; value: JsonValue };
}

export interface TemplateDocument {
  schema?: string;
  contentVersion?: string;
  parameters: ReadonlyMap<string, ParameterDeclaration>;
  variables: ReadonlyMap<string, VariableDeclaration>;
  functions: ReadonlyMap<string, UserFunction>;
  resources: ResourceSpec[];
  outputs: ReadonlyMap<string, OutputDeclaration>;
}

export function isSecureType(type: ParameterType): boolean {
  return type === "securestring" || type === "secureobject";
}

/**
 * Whether `value` has the JSON shape of a declared type. Used for
 * parameters and for user-defined function arguments and results, whose
 * type names are matched case-insensitively.
 */
export function matchesType(type: string, value: JsonValue): boolean {
  switch (type.toLowerCase()) {
    case "string":
    case "securestring":
      return typeof value === "string";
    case "int":
      return typeof value === "number" && Number.isSafeInteger(value);
    case "bool":
      return typeof value === "boolean";
    case "object":
    case "secureobject":
      return isJsonObject(value);
    case "array":
      return Array.isArray(value);
    default:
      return false;
  }
}
