/**
 * template-binder CLI commands
 *
 * `bind` resolves a template with parameter values, `validate` checks a
 * template without binding it, `params` lists the declared parameters.
 * Results go to stdout; diagnostics go through the context logger.
 */

import { writeFile } from "node:fs/promises";
import { Option, type Command } from "commander";
import { bind, type ResolvedTemplate } from "../binder/binder.js";
import { analyzeReferences } from "../binder/references.js";
import { renderDeploymentRequest, type DeploymentMode } from "../binder/request.js";
import { ConfigError, loadConfig } from "../config.js";
import { isBindingError } from "../errors.js";
import { getBuiltinRegistry } from "../expressions/functions.js";
import { filterLogger, type Logger } from "../logging.js";
import { loadTemplateFile } from "../template/loader.js";
import { coerceParameterValue, loadParameterFile, parseAssignment } from "../template/parameter-file.js";
import { isSecureType, type TemplateDocument } from "../template/types.js";
import { describeValue, isJsonObject, setProperty, type JsonObject, type JsonValue } from "../types.js";
import { renderTable, theme } from "./theme.js";

export type CliContext = {
  program: Command;
  logger: Logger;
  /** Environment read for `TEMPLATE_BINDER_*` settings. Defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
  /** Called with 1 when a command fails. Defaults to setting `process.exitCode`. */
  setExitCode?: (code: number) => void;
};

type BindCommandOptions = {
  parameters?: string;
  set: string[];
  config?: string;
  format: "resolved" | "request";
  mode: DeploymentMode;
  output?: string;
};

type TemplateCommandOptions = {
  config?: string;
};

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function registerBinderCli(ctx: CliContext): void {
  const { program } = ctx;

  // ─── bind ───────────────────────────────────────────────────────────────────
  program
    .command("bind")
    .description("Bind parameter values to a template and print the resolved result as JSON")
    .argument("<template>", "Template file")
    .option("-p, --parameters <file>", "Deployment parameter file")
    .option("--set <name=value>", "Override a parameter value (repeatable)", collect, [])
    .option("-c, --config <file>", "Configuration file")
    .addOption(new Option("--format <format>", "Output format").choices(["resolved", "request"]).default("resolved"))
    .addOption(new Option("--mode <mode>", "Deployment mode for --format request").choices(["Incremental", "Complete"]).default("Incremental"))
    .option("-o, --output <file>", "Write the result to a file instead of stdout")
    .action(async (templatePath: string, opts: BindCommandOptions) => {
      await runCommand(ctx, async () => {
        const config = await loadConfig(opts.config, ctx.env);
        const logger = filterLogger(ctx.logger, config.logLevel);

        const doc = await loadTemplateFile(templatePath);
        const values: JsonObject = opts.parameters ? await loadParameterFile(opts.parameters) : {};
        for (const assignment of opts.set) {
          applyOverride(doc, values, assignment);
        }

        const result = bind(doc, values, {
          scope: config.deployment,
          strictParameters: config.strictParameters,
          logger,
        });
        if (!result.ok) {
          logger.error(`${result.error.code}: ${result.error.message}`);
          fail(ctx);
          return;
        }

        const body =
          opts.format === "request"
            ? renderDeploymentRequest(result.template, { mode: opts.mode })
            : redactSecureValues(result.template);
        const json = JSON.stringify(body, null, 2);

        if (result.template.deferred.length > 0) {
          logger.info(`${result.template.deferred.length} value(s) are left for the deployment service to resolve`);
        }
        if (opts.output) {
          await writeFile(opts.output, `${json}\n`, "utf8");
          logger.info(`Wrote ${opts.output}`);
        } else {
          console.log(json);
        }
      });
    });

  // ─── validate ───────────────────────────────────────────────────────────────
  program
    .command("validate")
    .description("Check a template's structure and expression references without binding it")
    .argument("<template>", "Template file")
    .option("-c, --config <file>", "Configuration file")
    .action(async (templatePath: string, opts: TemplateCommandOptions) => {
      await runCommand(ctx, async () => {
        const config = await loadConfig(opts.config, ctx.env);
        const logger = filterLogger(ctx.logger, config.logLevel);

        const doc = await loadTemplateFile(templatePath);
        const report = analyzeReferences(doc, getBuiltinRegistry());
        for (const name of report.unusedParameters) {
          logger.warn(`Parameter "${name}" is declared but never used`);
        }
        for (const name of report.unusedVariables) {
          logger.warn(`Variable "${name}" is declared but never used`);
        }

        console.log(theme.success(`✓ ${templatePath} is valid`));
        console.log(
          `  ${doc.parameters.size} parameter(s), ${doc.variables.size} variable(s), ` +
            `${doc.resources.length} resource(s), ${doc.outputs.size} output(s), ${report.expressionCount} expression(s)`,
        );
      });
    });

  // ─── params ─────────────────────────────────────────────────────────────────
  program
    .command("params")
    .description("List the parameters a template declares")
    .argument("<template>", "Template file")
    .action(async (templatePath: string) => {
      await runCommand(ctx, async () => {
        const doc = await loadTemplateFile(templatePath);
        if (doc.parameters.size === 0) {
          console.log("No parameters declared.");
          return;
        }

        const rows = [...doc.parameters.values()].map((p) => [
          p.name,
          p.type,
          p.defaultValue === undefined ? "(required)" : isSecureType(p.type) ? "(secure)" : describeValue(p.defaultValue, 40),
          p.allowedValues ? p.allowedValues.map((v) => describeValue(v, 20)).join(", ") : "",
          p.description ?? "",
        ]);
        console.log(theme.heading(`Parameters (${doc.parameters.size})`));
        for (const line of renderTable(["NAME", "TYPE", "DEFAULT", "ALLOWED", "DESCRIPTION"], rows)) {
          console.log(line);
        }
      });
    });
}

// =============================================================================
// Helpers
// =============================================================================

/** Run a command body, reporting failures through the logger with exit code 1. */
async function runCommand(ctx: CliContext, body: () => Promise<void>): Promise<void> {
  try {
    await body();
  } catch (error) {
    if (isBindingError(error)) {
      ctx.logger.error(`${error.code}: ${error.message}`);
    } else if (error instanceof ConfigError) {
      ctx.logger.error(error.message);
      for (const issue of error.issues) ctx.logger.error(`  ${issue}`);
    } else {
      ctx.logger.error(error instanceof Error ? error.message : String(error));
    }
    fail(ctx);
  }
}

function fail(ctx: CliContext): void {
  if (ctx.setExitCode) {
    ctx.setExitCode(1);
  } else {
    process.exitCode = 1;
  }
}

/** Apply a `--set name=value` override, replacing any value supplied under another casing. */
function applyOverride(doc: TemplateDocument, values: JsonObject, assignment: string): void {
  const { name, value } = parseAssignment(assignment);
  const key = name.toLowerCase();
  for (const existing of Object.keys(values)) {
    if (existing.toLowerCase() === key) delete values[existing];
  }
  setProperty(values, name, coerceParameterValue(doc.parameters.get(key), name, value));
}

const SECURE_MASK = "(secure)";

/**
 * The resolved template with secure parameter values masked, both in
 * `parameters` and wherever a secure string was copied into variables,
 * resources or outputs.
 */
function redactSecureValues(resolved: ResolvedTemplate): object {
  const secrets = Object.values(resolved.parameters).flatMap((bound) =>
    isSecureType(bound.type) && typeof bound.value === "string" && bound.value !== "" ? [bound.value] : [],
  );
  const mask = (value: JsonValue): JsonValue => {
    if (typeof value === "string") {
      return secrets.reduce((text, secret) => text.split(secret).join(SECURE_MASK), value);
    }
    if (Array.isArray(value)) return value.map((item) => mask(item));
    if (isJsonObject(value)) {
      const masked: JsonObject = {};
      for (const [key, entry] of Object.entries(value)) setProperty(masked, key, mask(entry));
      return masked;
    }
    return value;
  };
  const mapValues = <T, U>(record: Readonly<Record<string, T>>, fn: (value: T) => U): Record<string, U> =>
    Object.fromEntries(Object.entries(record).map(([name, value]): [string, U] => [name, fn(value)]));

  return {
    ...resolved,
    parameters: mapValues(resolved.parameters, (bound) => (isSecureType(bound.type) ? { ...bound, value: SECURE_MASK } : bound)),
    variables: mapValues(resolved.variables, mask),
    resources: mapValues(resolved.resources, mask),
    outputs: mapValues(resolved.outputs, (output) => ({ ...output, value: mask(output.value) })),
  };
}
