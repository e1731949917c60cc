/**
 * Binder configuration schema (TypeBox), defaults, and loading from a JSON
 * file plus `TEMPLATE_BINDER_*` environment variables.
 */

import { readFile } from "node:fs/promises";
import { Type, type Static } from "@sinclair/typebox";
import { Check } from "@sinclair/typebox/value";
import { Errors } from "@sinclair/typebox/errors";
import { isLogLevel, type LogLevel } from "./logging.js";

export const deploymentScopeSchema = Type.Object({
  subscriptionId: Type.Optional(Type.String({ minLength: 1, description: "Subscription ID used by subscription() and resourceId()" })),
  tenantId: Type.Optional(Type.String({ description: "Tenant ID reported by subscription()" })),
  resourceGroup: Type.Optional(Type.String({ minLength: 1, description: "Target resource group name" })),
  location: Type.Optional(Type.String({ minLength: 1, description: "Location of the target resource group (e.g. eastus)" })),
  deploymentName: Type.Optional(Type.String({ minLength: 1, description: "Name reported by deployment()" })),
});

export const configSchema = Type.Object({
  deployment: Type.Optional(deploymentScopeSchema),
  strictParameters: Type.Optional(
    Type.Boolean({ description: "Reject parameter values that the template does not declare" }),
  ),
  logging: Type.Optional(
    Type.Object({
      level: Type.Optional(
        Type.Union([
          Type.Literal("debug"),
          Type.Literal("info"),
          Type.Literal("warn"),
          Type.Literal("error"),
          Type.Literal("silent"),
        ]),
      ),
    }),
  ),
});

export type BinderConfig = Static<typeof configSchema>;

/** Deployment scope with every field filled in. */
export type DeploymentScope = Required<Static<typeof deploymentScopeSchema>>;

export type ResolvedConfig = {
  deployment: DeploymentScope;
  strictParameters: boolean;
  logLevel: LogLevel;
};

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = "ConfigError";
  }
}

export const DEFAULT_DEPLOYMENT_SCOPE: DeploymentScope = {
  subscriptionId: "00000000-0000-0000-0000-000000000000",
  tenantId: "00000000-0000-0000-0000-000000000000",
  resourceGroup: "default-rg",
  location: "eastus",
  deploymentName: "template-binder",
};

export function getDefaultConfig(): ResolvedConfig {
  return {
    deployment: { ...DEFAULT_DEPLOYMENT_SCOPE },
    strictParameters: true,
    logLevel: "info",
  };
}

/** Validate a raw configuration object against {@link configSchema}. */
export function validateConfig(raw: unknown): BinderConfig {
  if (Check(configSchema, raw)) return raw;

  const issues: string[] = [];
  for (const error of Errors(configSchema, raw)) {
    issues.push(`${error.path || "(root)"}: ${error.message}`);
  }
  throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, issues);
}

/** Apply a partial configuration on top of a resolved one. */
export function mergeConfig(base: ResolvedConfig, override: BinderConfig): ResolvedConfig {
  const scope = override.deployment ?? {};
  return {
    deployment: {
      subscriptionId: scope.subscriptionId ?? base.deployment.subscriptionId,
      tenantId: scope.tenantId ?? base.deployment.tenantId,
      resourceGroup: scope.resourceGroup ?? base.deployment.resourceGroup,
      location: scope.location ?? base.deployment.location,
      deploymentName: scope.deploymentName ?? base.deployment.deploymentName,
    },
    strictParameters: override.strictParameters ?? base.strictParameters,
    logLevel: override.logging?.level ?? base.logLevel,
  };
}

const ENV_PREFIX = "TEMPLATE_BINDER_";

/** Read the `TEMPLATE_BINDER_*` variables into a partial configuration. */
export function configFromEnv(env: NodeJS.ProcessEnv): BinderConfig {
  const read = (name: string) => {
    const value = env[`${ENV_PREFIX}${name}`];
    return value === undefined || value === "" ? undefined : value;
  };

  const deployment: Static<typeof deploymentScopeSchema> = {};
  const subscriptionId = read("SUBSCRIPTION_ID");
  if (subscriptionId !== undefined) deployment.subscriptionId = subscriptionId;
  const tenantId = read("TENANT_ID");
  if (tenantId !== undefined) deployment.tenantId = tenantId;
  const resourceGroup = read("RESOURCE_GROUP");
  if (resourceGroup !== undefined) deployment.resourceGroup = resourceGroup;
  const location = read("LOCATION");
  if (location !== undefined) deployment.location = location;
  const deploymentName = read("DEPLOYMENT_NAME");
  if (deploymentName !== undefined) deployment.deploymentName = deploymentName;

  const config: BinderConfig = { deployment };

  const strict = read("STRICT_PARAMETERS");
  if (strict !== undefined) {
    config.strictParameters = !["false", "0", "no"].includes(strict.toLowerCase());
  }

  const level = read("LOG_LEVEL");
  if (level !== undefined) {
    if (!isLogLevel(level)) {
      throw new ConfigError(`Invalid ${ENV_PREFIX}LOG_LEVEL "${level}"`);
    }
    config.logging = { level };
  }

  return config;
}

/**
 * Resolve the effective configuration: defaults, then the JSON file at
 * `path` (when given), then environment variables.
 */
export async function loadConfig(path?: string, env: NodeJS.ProcessEnv = process.env): Promise<ResolvedConfig> {
  let config = getDefaultConfig();

  if (path) {
    let text: string;
    try {
      text = await readFile(path, "utf8");
    } catch (error) {
      throw new ConfigError(`Cannot read config file ${path}: ${error instanceof Error ? error.message : String(error)}`);
    }
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new ConfigError(`Config file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }
    config = mergeConfig(config, validateConfig(raw));
  }

  return mergeConfig(config, validateConfig(configFromEnv(env)));
}
