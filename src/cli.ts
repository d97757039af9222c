#!/usr/bin/env node
import { Command } from "commander";
import chalk from "chalk";
import { runCommand } from "./commands/run.js";
import { validateCommand } from "./commands/validate.js";
import { explainCommand } from "./commands/explain.js";

const VERSION = "0.1.0";

const program = new Command();

program
  .name("opsline")
  .description(chalk.dim("Declarative pipelines: data, forecast, geo, weather and optimize stages wired by reference."))
  .version(VERSION);

// ── run ──
program
  .command("run <file>")
  .description("Execute a pipeline file (path, pipelines/name, examples/name)")
  .option("--json", "Print the execution result as JSON", false)
  .option("-q, --quiet", "Only log warnings and errors", false)
  .action(async (file: string, opts: { json: boolean; quiet: boolean }) => {
    await runCommand(file, opts);
  });

// ── validate ──
program
  .command("validate <file>")
  .description("Check references, cycles, block kinds and parameters without running anything")
  .action(async (file: string) => {
    await validateCommand(file);
  });

// ── explain ──
program
  .command("explain <file>")
  .description("Show execution order, dependency layers and wiring")
  .action(async (file: string) => {
    await explainCommand(file);
  });

program.parseAsync().catch((err: unknown) => {
  console.error(chalk.red(`✗ ${err instanceof Error ? err.message : String(err)}`));
  process.exit(1);
});
