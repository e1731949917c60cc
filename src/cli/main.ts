#!/usr/bin/env node
import { Command } from "commander";
import { createConsoleLogger } from "../logging.js";
import { VERSION } from "../version.js";
import { registerBinderCli } from "./program.js";

const program = new Command("template-binder")
  .description("Validate deployment templates and bind parameter values ahead of deployment")
  .version(VERSION);

// Each command narrows this to the configured level.
registerBinderCli({ program, logger: createConsoleLogger("debug") });

await program.parseAsync(process.argv);
