import { readFileSync } from "node:fs";
import { describe, it, expect } from "vitest";
import { resolveTemplate } from "./binder.js";
import { DEFAULT_CONTENT_VERSION, DEFAULT_TEMPLATE_SCHEMA, renderDeploymentRequest } from "./request.js";

const ubuntuVm: unknown = JSON.parse(readFileSync(new URL("../../fixtures/ubuntu-vm.json", import.meta.url), "utf8"));

describe("renderDeploymentRequest", () => {
  const resolved = resolveTemplate(ubuntuVm, { vmname: "box1", adminPassword: "test-secret" });

  it("renders resources as an array and keeps outputs", () => {
    const request = renderDeploymentRequest(resolved);
    expect(request.properties.mode).toBe("Incremental");
    expect(Object.keys(request.properties.template)).toEqual(["$schema", "contentVersion", "resources", "outputs"]);
    expect(request.properties.template.$schema).toBe(DEFAULT_TEMPLATE_SCHEMA);
    expect(request.properties.template.resources.map((r) => r.name)).toEqual(["box1-nic", "box1"]);
    expect(request.properties.template.outputs.nicName).toEqual({ type: "string", value: "box1-nic" });
  });

  it("returns a mutable copy", () => {
    const request = renderDeploymentRequest(resolved, { mode: "Complete" });
    expect(request.properties.mode).toBe("Complete");
    expect(Object.isFrozen(request.properties.template.resources[0])).toBe(false);
    request.properties.template.resources[0].name = "changed";
    expect(Object.keys(resolved.resources)).toEqual(["box1-nic", "box1"]);
    expect(resolved.resources["box1-nic"].name).toBe("box1-nic");
  });

  it("fills in the schema and content version when the template has none", () => {
    const request = renderDeploymentRequest(resolveTemplate({ resources: [] }));
    expect(request.properties.template.$schema).toBe(DEFAULT_TEMPLATE_SCHEMA);
    expect(request.properties.template.contentVersion).toBe(DEFAULT_CONTENT_VERSION);
    expect(request.properties.template.resources).toEqual([]);
  });
});
