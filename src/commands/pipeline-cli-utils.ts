import chalk from "chalk";
import { existsSync } from "fs";
import { dirname, resolve } from "path";
import type { Artifact } from "../core/artifacts.js";
import type { BlockRegistry } from "../core/block-registry.js";
import type { OpslineConfig } from "../core/config.js";
import type { LogLevel, Logger } from "../core/logger.js";
import type { ExecutionResult } from "../core/pipeline-executor.js";
import type { PipelineSpec } from "../core/spec-types.js";
import { createBuiltinRegistry } from "../blocks/index.js";
import { loadConfig } from "../core/config.js";
import { errorCode } from "../core/errors.js";
import { createLogger } from "../core/logger.js";
import { loadPipelineFile } from "../core/spec-parser.js";

const EXTENSIONS = ["", ".yaml", ".yml", ".json"];

export function resolvePipelinePath(input: string): string {
  const dirs = [process.cwd(), resolve(process.cwd(), "pipelines"), resolve(process.cwd(), "examples")];
  for (const dir of dirs) {
    for (const ext of EXTENSIONS) {
      const candidate = resolve(dir, `${input}${ext}`);
      if (existsSync(candidate)) return candidate;
    }
  }
  throw new Error(`Pipeline file not found: '${input}'. Tried current dir, pipelines/, and examples/.`);
}

export function loadPipelineFromFile(input: string): { spec: PipelineSpec; path: string } {
  const path = resolvePipelinePath(input);
  return { spec: loadPipelineFile(path), path };
}

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.dim,
  info: (text) => text,
  warn: chalk.yellow,
  error: chalk.red,
};

/** Log lines go to stderr so stdout stays clean for --json. */
export function createCliLogger(level: LogLevel): Logger {
  return createLogger({
    level,
    component: "opsline",
    timestamps: false,
    sink: (at, line) => console.error(LEVEL_COLORS[at](line)),
  });
}

export interface CliContext {
  config: OpslineConfig;
  logger: Logger;
  registry: BlockRegistry;
  spec: PipelineSpec;
  path: string;
}

export function loadCliContext(input: string, opts: { quiet?: boolean } = {}): CliContext {
  const config = loadConfig();
  const logger = createCliLogger(opts.quiet ? "warn" : config.log_level);
  const { spec, path } = loadPipelineFromFile(input);
  const registry = createBuiltinRegistry({ config, baseDir: dirname(path) });
  return { config, logger, registry, spec, path };
}

export function formatError(err: unknown): string {
  const message = err instanceof Error ? err.message : String(err);
  const code = errorCode(err);
  return code ? `${message} ${chalk.dim(`[${code}]`)}` : message;
}

export function failCommand(err: unknown): never {
  console.error(chalk.red(`✗ ${formatError(err)}`));
  process.exit(1);
}

export function summarizeArtifact(artifact: Artifact): string {
  switch (artifact.kind) {
    case "table":
      return `table ${artifact.rows.length} row(s) x ${artifact.columns.length} column(s)`;
    case "matrix":
      return `matrix [${artifact.shape.join(", ")}]`;
    case "series":
      return `series [${artifact.values.length}]`;
    case "model":
      return `model ${artifact.status}${artifact.objective !== undefined ? `, objective ${artifact.objective}` : ""}`
        + `, ${artifact.assignments.length} assignment(s)`;
  }
}

/** JSON-safe view of a run: failure causes become name/message pairs. */
export function resultToJson(result: ExecutionResult): Record<string, unknown> {
  const causeOf = (cause: unknown) => (cause instanceof Error ? { name: cause.name, message: cause.message } : String(cause));
  return {
    ...result,
    stages: Object.fromEntries(
      Object.entries(result.stages).map(([id, outcome]) => [
        id,
        outcome.status === "failed" ? { status: "failed", failure: { ...outcome.failure, cause: causeOf(outcome.failure.cause) } } : outcome,
      ]),
    ),
    failure: result.failure ? { ...result.failure, cause: causeOf(result.failure.cause) } : undefined,
  };
}
