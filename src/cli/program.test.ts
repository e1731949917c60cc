/**
 * Tests for the template-binder CLI commands.
 */

import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import { afterEach, beforeEach, describe, it, expect, vi, type MockInstance } from "vitest";
import { registerBinderCli, type CliContext } from "./program.js";

const template = fileURLToPath(new URL("../../fixtures/ubuntu-vm.json", import.meta.url));
const parameterFile = fileURLToPath(new URL("../../fixtures/ubuntu-vm.parameters.json", import.meta.url));

// ── Helpers ─────────────────────────────────────────────────────────────────

function createCliContext(): { ctx: CliContext; program: Command } {
  const program = new Command();
  program.exitOverride(); // don't call process.exit
  const ctx: CliContext = {
    program,
    logger: {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    },
    env: {},
    setExitCode: vi.fn(),
  };
  return { ctx, program };
}

// ── Tests ───────────────────────────────────────────────────────────────────

describe("registerBinderCli", () => {
  let ctx: CliContext;
  let program: Command;
  let log: MockInstance<typeof console.log>;

  const printed = () => log.mock.calls.map((call) => String(call[0]));

  beforeEach(() => {
    const result = createCliContext();
    ctx = result.ctx;
    program = result.program;
    registerBinderCli(ctx);
    log = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("registers the bind, validate and params commands", () => {
    expect(program.commands.map((c) => c.name())).toEqual(["bind", "validate", "params"]);
  });

  // ── bind ────────────────────────────────────────────────────────────────

  describe("bind", () => {
    it("prints the resolved template with secure values masked", async () => {
      await program.parseAsync(["bind", template, "-p", parameterFile], { from: "user" });
      expect(log).toHaveBeenCalledTimes(1);
      const body: unknown = JSON.parse(printed()[0]);
      expect(body).toMatchObject({
        parameters: {
          vmname: { type: "string", value: "box1", source: "supplied" },
          adminPassword: { type: "securestring", value: "(secure)", source: "supplied" },
        },
        variables: { nicName: "box1-nic" },
        deferred: ["outputs.privateIp.value"],
      });
      expect(body).toMatchObject({
        resources: { box1: { properties: { osProfile: { adminPassword: "(secure)" } } } },
      });
      expect(printed()[0]).not.toContain("test-secret");
      expect(ctx.logger.info).toHaveBeenCalledWith("1 value(s) are left for the deployment service to resolve");
      expect(ctx.setExitCode).not.toHaveBeenCalled();
    });

    it("applies --set overrides on top of the parameter file", async () => {
      await program.parseAsync(["bind", template, "-p", parameterFile, "--set", "VMName=box9"], { from: "user" });
      expect(JSON.parse(printed()[0])).toMatchObject({ variables: { nicName: "box9-nic" } });
    });

    it("renders a deployment request", async () => {
      await program.parseAsync(["bind", template, "-p", parameterFile, "--format", "request", "--mode", "Complete"], {
        from: "user",
      });
      const body: unknown = JSON.parse(printed()[0]);
      expect(body).toMatchObject({ properties: { mode: "Complete", template: { contentVersion: "1.0.0.0" } } });
    });

    it("reports binding errors and sets the exit code", async () => {
      await program.parseAsync(["bind", template, "-p", parameterFile, "--set", "ubuntuosversion=18.04"], { from: "user" });
      expect(ctx.logger.error).toHaveBeenCalledWith(
        'InvalidParameterValue: Invalid value for parameter "ubuntuosversion": "18.04" is not one of the allowed values: ' +
          '"12.04.5-LTS", "14.04.5-LTS", "15.10", "16.04.0-LTS"',
      );
      expect(ctx.setExitCode).toHaveBeenCalledWith(1);
      expect(log).not.toHaveBeenCalled();
    });

    it("reports missing templates", async () => {
      await program.parseAsync(["bind", "/nonexistent/template.json"], { from: "user" });
      expect(ctx.logger.error).toHaveBeenCalledWith(
        expect.stringMatching(/^MalformedDocument: Cannot read template \/nonexistent\/template\.json: /),
      );
      expect(ctx.setExitCode).toHaveBeenCalledWith(1);
    });

    describe("with --output", () => {
      let dir: string;

      beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), "template-binder-cli-"));
      });

      afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
      });

      it("writes the result to a file", async () => {
        const output = join(dir, "resolved.json");
        await program.parseAsync(["bind", template, "-p", parameterFile, "-o", output], { from: "user" });
        const written: unknown = JSON.parse(await readFile(output, "utf8"));
        expect(written).toMatchObject({ variables: { nicName: "box1-nic" } });
        expect(ctx.logger.info).toHaveBeenCalledWith(`Wrote ${output}`);
        expect(log).not.toHaveBeenCalled();
      });
    });
  });

  // ── validate ────────────────────────────────────────────────────────────

  describe("validate", () => {
    it("summarises a valid template", async () => {
      await program.parseAsync(["validate", template], { from: "user" });
      const lines = printed();
      expect(lines[0]).toContain(`✓ ${template} is valid`);
      expect(lines[1]).toBe("  5 parameter(s), 4 variable(s), 2 resource(s), 2 output(s), 17 expression(s)");
      expect(ctx.logger.warn).not.toHaveBeenCalled();
    });
  });

  // ── params ──────────────────────────────────────────────────────────────

  describe("params", () => {
    it("lists declared parameters in a table", async () => {
      await program.parseAsync(["params", template], { from: "user" });
      const lines = printed();
      expect(lines[0]).toContain("Parameters (5)");
      expect(lines[1]).toMatch(/^NAME\s+TYPE\s+DEFAULT\s+ALLOWED\s+DESCRIPTION$/);
      const vmname = lines.find((line) => line.startsWith("vmname "));
      expect(vmname).toContain("(required)");
      expect(vmname).toContain("Name of the virtual machine");
      const version = lines.find((line) => line.startsWith("ubuntuosversion "));
      expect(version).toContain('"16.04.0-LTS"');
    });
  });
});
