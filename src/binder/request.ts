/**
 * Deployment request rendering: the body a deployment service accepts for a
 * resolved template. Parameters and variables are already substituted, so
 * the rendered template declares neither.
 */

import type { JsonObject, JsonValue } from "../types.js";
import type { ResolvedTemplate } from "./binder.js";

export const DEFAULT_TEMPLATE_SCHEMA = "https://schema.management.azure.com/schemas/2019-04-01/deploymentTemplate.json#";
export const DEFAULT_CONTENT_VERSION = "1.0.0.0";

export type DeploymentMode = "Incremental" | "Complete";

export interface DeploymentRequest {
  properties: {
    mode: DeploymentMode;
    template: {
      $schema: string;
      contentVersion: string;
      resources: JsonObject[];
      outputs: Record<string, { type: string; value: JsonValue }>;
    };
  };
}

export type RenderOptions = {
  mode?: DeploymentMode;
};

/** Render a mutable copy of `resolved` as a deployment request body. */
export function renderDeploymentRequest(resolved: ResolvedTemplate, options: RenderOptions = {}): DeploymentRequest {
  const outputs = Object.fromEntries(
    Object.entries(resolved.outputs).map(([name, output]) => [name, { type: output.type, value: structuredClone(output.value) }]),
  );
  return {
    properties: {
      mode: options.mode ?? "Incremental",
      template: {
        $schema: resolved.schema ?? DEFAULT_TEMPLATE_SCHEMA,
        contentVersion: resolved.contentVersion ?? DEFAULT_CONTENT_VERSION,
        resources: Object.values(resolved.resources).map((resource) => structuredClone(resource)),
        outputs,
      },
    },
  };
}
