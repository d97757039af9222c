import chalk from "chalk";
import { createPipelineExecutor } from "../core/pipeline-executor.js";
import { failCommand, loadCliContext } from "./pipeline-cli-utils.js";

export async function validateCommand(target: string): Promise<void> {
  try {
    const { spec, path, registry, logger } = loadCliContext(target, { quiet: true });
    const plan = createPipelineExecutor({ registry, logger }).plan(spec);

    const edges = [...plan.dependencies.values()].reduce((n, deps) => n + deps.size, 0);
    console.log(chalk.green(`✓ ${spec.stages.length} stage${spec.stages.length === 1 ? "" : "s"} parsed`));
    console.log(chalk.green(`✓ ${edges} reference${edges === 1 ? "" : "s"} resolved`));
    console.log(chalk.green("✓ no dependency cycles"));
    console.log(chalk.green("✓ block kinds and parameters checked"));
    console.log(chalk.dim(`order: ${plan.order.join(" -> ")}`));
    console.log(chalk.dim(`file: ${path}`));
  } catch (err) {
    failCommand(err);
  }
}
