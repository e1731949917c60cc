/**
 * Resource expansion: copy loops, conditions, nested child resources and
 * dependsOn validation.
 */

import {
  InvalidExpressionError,
  MalformedDocumentError,
  UnresolvedReferenceError,
} from "../errors.js";
import { childPath, type ExpressionEvaluator } from "../expressions/evaluator.js";
import { typeName } from "../expressions/functions.js";
import { parseResourceReference } from "../expressions/resource-id.js";
import { isResidual } from "../expressions/types.js";
import type { Logger } from "../logging.js";
import type { ResourceSpec } from "../template/types.js";
import { setProperty, type JsonObject, type JsonValue } from "../types.js";

/** Largest number of instances a single copy loop may produce. */
export const MAX_COPY_COUNT = 800;

export type CopyFrame = { name: string; index: number };

export type ResourceExpansion = {
  /** Top-level resources by resolved name, in template order. */
  resources: Record<string, JsonObject>;
  /** Output paths (`resources["name"]...`) that still hold run-time expressions. */
  deferred: string[];
};

export type ResourceExpanderOptions = {
  /** An evaluator whose `copyIndex()` sees the given copy loops. */
  evaluatorFor: (frames: readonly CopyFrame[]) => ExpressionEvaluator;
  logger: Logger;
};

/** One resource instance, active or skipped by its condition. */
type Instance = {
  fullType: string;
  fullName: string;
  active: boolean;
  copyName?: string;
  /** Resolved object; only for active instances. */
  body?: JsonObject;
  /** Resolved dependsOn entries and the template path they came from. */
  dependsOn: { entry: string; path: string }[];
  /** Paths of deferred expressions, relative to `body`. */
  deferred: string[];
  children: Instance[];
  templatePath: string;
};

const STRUCTURAL_KEYS = new Set(["copy", "condition", "resources"]);

export class ResourceExpander {
  private readonly copyLoops = new Map<string, string>();

  constructor(private readonly options: ResourceExpanderOptions) {}

  expand(specs: readonly ResourceSpec[]): ResourceExpansion {
    const instances: Instance[] = [];
    const deferred: string[] = [];

    for (const spec of specs) {
      if (spec.copy) {
        const loopKey = spec.copy.name.toLowerCase();
        const existing = this.copyLoops.get(loopKey);
        if (existing !== undefined) {
          throw new MalformedDocumentError(
            `${spec.path}.copy.name`,
            `Copy loop name "${spec.copy.name}" is already used by ${existing}`,
          );
        }
        this.copyLoops.set(loopKey, spec.path);

        const count = this.copyCount(spec);
        this.options.logger.debug(`Expanding copy loop "${spec.copy.name}" at ${spec.path} to ${count} instance(s)`);
        for (let index = 0; index < count; index++) {
          const instance = this.expandOne(spec, [{ name: spec.copy.name, index }], null);
          instance.copyName = spec.copy.name;
          instances.push(instance);
        }
      } else {
        instances.push(this.expandOne(spec, [], null));
      }
    }

    const all = flatten(instances);
    this.checkDependencies(all);

    const seen = new Map<string, string>();
    for (const instance of all) {
      if (!instance.active || !instance.body) continue;
      const key = instance.fullName.toLowerCase();
      const previous = seen.get(key);
      if (previous !== undefined) {
        throw new MalformedDocumentError(
          instance.fullName,
          `Duplicate resource name "${instance.fullName}" (declared at ${previous} and ${instance.templatePath})`,
        );
      }
      seen.set(key, instance.templatePath);
    }

    const resources: Record<string, JsonObject> = {};
    for (const instance of instances) {
      if (!instance.active || !instance.body) continue;
      setProperty(resources, instance.fullName, instance.body);
      const outputPath = childPath("resources", instance.fullName);
      deferred.push(...instance.deferred.map((suffix) => outputPath + suffix));
    }

    return { resources, deferred };
  }

  // ===========================================================================
  // Expansion
  // ===========================================================================

  private copyCount(spec: ResourceSpec): number {
    const path = `${spec.path}.copy.count`;
    const raw = spec.copy?.count ?? 0;
    const { value, deferred } = this.options.evaluatorFor([]).resolve(raw, path);
    const text = typeof raw === "string" ? raw : JSON.stringify(raw);
    if (deferred.length > 0) {
      throw new InvalidExpressionError(path, text, "copy count must not depend on deployment-time values");
    }
    if (typeof value !== "number" || !Number.isInteger(value)) {
      throw new InvalidExpressionError(path, text, `copy count must be an int, got ${typeName(value)}`);
    }
    if (value < 0 || value > MAX_COPY_COUNT) {
      throw new InvalidExpressionError(path, text, `copy count must be between 0 and ${MAX_COPY_COUNT}, got ${value}`);
    }
    return value;
  }

  private expandOne(spec: ResourceSpec, frames: readonly CopyFrame[], parent: Instance | null): Instance {
    const evaluator = this.options.evaluatorFor(frames);

    const name = this.resolveIdentity(evaluator, spec.name, `${spec.path}.name`);
    const type = this.resolveIdentity(evaluator, spec.type, `${spec.path}.type`);
    const qualifiedType = parent && !type.includes("/") ? `${parent.fullType}/${type}` : type;
    const qualifiedName = parent && !type.includes("/") ? `${parent.fullName}/${name}` : name;

    const instance: Instance = {
      fullType: qualifiedType,
      fullName: qualifiedName,
      active: parent ? parent.active : true,
      dependsOn: [],
      deferred: [],
      children: [],
      templatePath: spec.path,
    };

    if (instance.active && spec.condition !== undefined) {
      instance.active = this.resolveCondition(evaluator, spec.condition, `${spec.path}.condition`);
      if (!instance.active) {
        this.options.logger.debug(`Skipping ${qualifiedType} "${qualifiedName}": condition is false`);
      }
    }

    for (const child of spec.resources) {
      if (child.copy) {
        throw new MalformedDocumentError(`${child.path}.copy`, `Child resource at ${child.path} cannot have a copy loop`);
      }
      instance.children.push(this.expandOne(child, frames, instance));
    }

    if (!instance.active) return instance;

    const body: JsonObject = {};
    const deferredPaths = new Set<string>();
    for (const [key, value] of Object.entries(spec.definition)) {
      if (key === "resources") {
        const active = instance.children.filter((child) => child.active);
        active.forEach((child, i) => {
          instance.deferred.push(...child.deferred.map((suffix) => `.resources[${i}]${suffix}`));
        });
        setProperty(body, key, active.flatMap((child) => (child.body ? [child.body] : [])));
        continue;
      }
      if (STRUCTURAL_KEYS.has(key)) continue;

      const resolved = evaluator.resolve(value, childPath(spec.path, key));
      setProperty(body, key, resolved.value);
      for (const path of resolved.deferred) {
        deferredPaths.add(path);
        instance.deferred.push(path.slice(spec.path.length));
      }
    }

    const dependsOn = body.dependsOn;
    if (Array.isArray(dependsOn)) {
      dependsOn.forEach((entry, i) => {
        const path = `${spec.path}.dependsOn[${i}]`;
        if (typeof entry !== "string") {
          throw new MalformedDocumentError(path, `${path} must be a string`);
        }
        if (deferredPaths.has(path)) {
          throw new InvalidExpressionError(path, entry, "dependsOn entries must not depend on deployment-time values");
        }
        instance.dependsOn.push({ entry, path });
      });
    }

    instance.body = body;
    return instance;
  }

  private resolveIdentity(evaluator: ExpressionEvaluator, raw: string, path: string): string {
    const { value, deferred } = evaluator.resolve(raw, path);
    if (deferred.length > 0) {
      throw new InvalidExpressionError(path, raw, "resource names and types must not depend on deployment-time values");
    }
    if (typeof value !== "string" || value.length === 0) {
      throw new InvalidExpressionError(path, raw, `expected a non-empty string, got ${typeName(value)}`);
    }
    return value;
  }

  private resolveCondition(evaluator: ExpressionEvaluator, raw: JsonValue, path: string): boolean {
    if (typeof raw === "boolean") return raw;
    const text = typeof raw === "string" ? raw : JSON.stringify(raw);
    if (typeof raw !== "string") {
      throw new InvalidExpressionError(path, text, `condition must be a bool, got ${typeName(raw)}`);
    }
    const result = evaluator.evaluateString(raw, path);
    if (isResidual(result)) {
      throw new InvalidExpressionError(path, text, "condition must not depend on deployment-time values");
    }
    if (typeof result !== "boolean") {
      throw new InvalidExpressionError(path, text, `condition must be a bool, got ${typeName(result)}`);
    }
    return result;
  }

  // ===========================================================================
  // Dependencies
  // ===========================================================================

  /**
   * Every dependsOn entry must name a declared resource: by name, by
   * `{namespace}/{type}/{name}`, by resource ID, or by copy loop name.
   * Entries whose targets are all skipped by their condition, or that name a
   * copy loop with no instances, are dropped.
   */
  private checkDependencies(all: readonly Instance[]): void {
    for (const instance of all) {
      if (!instance.active || !instance.body) continue;
      const kept: string[] = [];
      for (const { entry, path } of instance.dependsOn) {
        const targets = findTargets(all, entry);
        if (targets.some((target) => target.active)) {
          kept.push(entry);
        } else if (targets.length > 0) {
          this.options.logger.debug(`Dropping dependency "${entry}" of "${instance.fullName}": its condition is false`);
        } else if (this.copyLoops.has(entry.toLowerCase())) {
          this.options.logger.debug(`Dropping dependency "${entry}" of "${instance.fullName}": copy loop has no instances`);
        } else {
          throw new UnresolvedReferenceError("resource", entry, path);
        }
      }
      if (kept.length !== instance.dependsOn.length) {
        setProperty(instance.body, "dependsOn", kept);
      }
    }
  }
}

/** Instances and their nested children, depth first. */
function flatten(instances: readonly Instance[]): Instance[] {
  return instances.flatMap((instance) => [instance, ...flatten(instance.children)]);
}

function findTargets(all: readonly Instance[], entry: string): Instance[] {
  const lower = entry.toLowerCase();
  const reference = parseResourceReference(entry);
  return all.filter((instance) => {
    if (instance.fullName.toLowerCase() === lower) return true;
    if (instance.copyName !== undefined && instance.copyName.toLowerCase() === lower) return true;
    return (
      reference !== null &&
      instance.fullType.toLowerCase() === reference.type.toLowerCase() &&
      instance.fullName.toLowerCase() === reference.name.toLowerCase()
    );
  });
}
