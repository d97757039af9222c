import chalk from "chalk";
import { createPipelineExecutor } from "../core/pipeline-executor.js";
import type { ExecutionResult } from "../core/pipeline-executor.js";
import { failCommand, loadCliContext, resultToJson, summarizeArtifact } from "./pipeline-cli-utils.js";

export interface RunOptions {
  json?: boolean;
  quiet?: boolean;
}

function statusIcon(status: string): string {
  if (status === "completed") return "✅";
  if (status === "failed") return "❌";
  return "•";
}

function printSummary(result: ExecutionResult): void {
  for (const id of result.order) {
    const outcome = result.stages[id];
    if (!outcome) {
      console.log(`${chalk.dim("⚪")} ${id} ${chalk.dim("not run")}`);
    } else if (outcome.status === "completed") {
      console.log(`${statusIcon(outcome.status)} ${id} ${chalk.dim(`${summarizeArtifact(outcome.artifact)} (${outcome.duration_ms} ms)`)}`);
    } else {
      console.log(`${statusIcon(outcome.status)} ${id} ${chalk.red(outcome.failure.message)} ${chalk.dim(`[${outcome.failure.code}]`)}`);
    }
  }
  console.log(chalk.dim(`run ${result.runId} · ${result.duration_ms} ms`));
}

export async function runCommand(target: string, opts: RunOptions = {}): Promise<void> {
  let result: ExecutionResult;
  try {
    const { spec, registry, logger } = loadCliContext(target, { quiet: opts.quiet || opts.json });
    result = await createPipelineExecutor({ registry, logger }).execute(spec);
  } catch (err) {
    failCommand(err);
  }

  if (opts.json) {
    console.log(JSON.stringify(resultToJson(result), null, 2));
  } else {
    printSummary(result);
  }

  if (result.status === "failed") {
    const failure = result.failure;
    if (!opts.json && failure) {
      console.error(chalk.red(`✗ stage '${failure.stageId}' (${failure.blockKind}) failed: ${failure.message}`));
    }
    process.exit(1);
  }
  if (!opts.json) console.log(chalk.green(`✓ pipeline ${result.pipeline} completed`));
}
