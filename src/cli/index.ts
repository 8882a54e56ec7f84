#!/usr/bin/env node

import { readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { Command } from "commander";
import { z } from "zod";

import { checkCommand } from "./commands/check.js";

// Read version from package.json
const __dirname = dirname(fileURLToPath(import.meta.url));
const packageJson = readFileSync(join(__dirname, "../../package.json"), "utf-8");
const pkg = z.object({ version: z.string() }).parse(JSON.parse(packageJson));

const program = new Command();

program
  .name("cslint")
  .description("Style and complexity checker for C translation units")
  .version(pkg.version)
  .addHelpText(
    "after",
    `
Functions are measured on their macro-expanded body (via cpp), so
complexity hidden behind macros still counts.

Configuration (optional) lives in cslint.toml:
  [preprocessor]
  command = "cpp"
  timeout_ms = 30000

  [files]
  exclude = ["vendor/**"]`,
  );

program.addCommand(checkCommand, { isDefault: true });

await program.parseAsync();
