/**
 * TypeBox schema for template documents.
 *
 * The schema checks the document's shape only. Values that the binder
 * treats as opaque JSON (default values, variable values, resource
 * properties) are `Unknown` here and checked for JSON-ness by the loader.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Check } from "@sinclair/typebox/value";
import { Errors } from "@sinclair/typebox/errors";

const ConditionSchema = Type.Union([Type.Boolean(), Type.String()]);

export const ParameterDeclarationSchema = Type.Object({
  type: Type.String({ minLength: 1, description: "string, securestring, int, bool, object, secureobject or array" }),
  defaultValue: Type.Optional(Type.Unknown()),
  allowedValues: Type.Optional(Type.Array(Type.Unknown(), { minItems: 1 })),
  minValue: Type.Optional(Type.Integer()),
  maxValue: Type.Optional(Type.Integer()),
  minLength: Type.Optional(Type.Integer({ minimum: 0 })),
  maxLength: Type.Optional(Type.Integer({ minimum: 0 })),
  metadata: Type.Optional(
    Type.Object({
      description: Type.Optional(Type.String()),
    }),
  ),
});

export const ResourceCopySchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  count: Type.Union([Type.Integer({ minimum: 0 }), Type.String()]),
  mode: Type.Optional(Type.String()),
  batchSize: Type.Optional(Type.Integer({ minimum: 1 })),
});

export const ResourceSpecSchema = Type.Recursive((This) =>
  Type.Object({
    type: Type.String({ minLength: 1 }),
    name: Type.String({ minLength: 1 }),
    apiVersion: Type.String({ minLength: 1 }),
    location: Type.Optional(Type.String()),
    dependsOn: Type.Optional(Type.Array(Type.String())),
    condition: Type.Optional(ConditionSchema),
    copy: Type.Optional(ResourceCopySchema),
    properties: Type.Optional(Type.Unknown()),
    resources: Type.Optional(Type.Array(This)),
  }),
);

export const OutputDeclarationSchema = Type.Union([
  Type.String(),
  Type.Object({
    type: Type.Optional(Type.String({ minLength: 1 })),
    value: Type.Unknown(),
    condition: Type.Optional(ConditionSchema),
  }),
]);

export const UserFunctionSchema = Type.Object({
  parameters: Type.Optional(
    Type.Array(
      Type.Object({
        name: Type.String({ minLength: 1 }),
        type: Type.String({ minLength: 1 }),
      }),
    ),
  ),
  output: Type.Object({
    type: Type.String({ minLength: 1 }),
    value: Type.Unknown(),
  }),
});

export const FunctionNamespaceSchema = Type.Object({
  namespace: Type.String({ minLength: 1, pattern: "^[A-Za-z_][A-Za-z0-9_]*$" }),
  members: Type.Record(Type.String({ pattern: "^[A-Za-z_][A-Za-z0-9_]*$" }), UserFunctionSchema),
});

export const TemplateDocumentSchema = Type.Object({
  $schema: Type.Optional(Type.String()),
  contentVersion: Type.Optional(Type.String()),
  parameters: Type.Optional(Type.Record(Type.String(), ParameterDeclarationSchema)),
  variables: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  functions: Type.Optional(Type.Array(FunctionNamespaceSchema)),
  resources: Type.Array(ResourceSpecSchema),
  outputs: Type.Optional(Type.Record(Type.String(), OutputDeclarationSchema)),
});

export type RawTemplateDocument = Static<typeof TemplateDocumentSchema>;
export type RawResourceSpec = Static<typeof ResourceSpecSchema>;
export type RawParameterDeclaration = Static<typeof ParameterDeclarationSchema>;
export type RawOutputDeclaration = Static<typeof OutputDeclarationSchema>;

/**
 * Check a raw document against {@link TemplateDocumentSchema}.
 * Returns the schema errors as `path: message` strings.
 */
export function checkTemplateDocument(
  raw: unknown,
): { valid: true; document: RawTemplateDocument } | { valid: false; errors: string[] } {
  if (Check(TemplateDocumentSchema, raw)) {
    return { valid: true, document: raw };
  }

  const errors: string[] = [];
  for (const error of Errors(TemplateDocumentSchema, raw)) {
    errors.push(`${error.path || "(root)"}: ${error.message}`);
  }
  return { valid: false, errors: errors.length > 0 ? errors : ["Document does not match the template schema"] };
}
