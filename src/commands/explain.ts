import chalk from "chalk";
import { topoLayers } from "../core/graph.js";
import { createPipelineExecutor } from "../core/pipeline-executor.js";
import { collectReferences } from "../core/reference-resolver.js";
import { failCommand, loadCliContext } from "./pipeline-cli-utils.js";

export async function explainCommand(target: string): Promise<void> {
  try {
    const { spec, path, registry, logger } = loadCliContext(target, { quiet: true });
    const plan = createPipelineExecutor({ registry, logger }).plan(spec);
    const layers = topoLayers(plan.graph);

    console.log(chalk.bold(`${spec.name}: ${spec.stages.length} stages, ${layers.length} layer(s)`));
    if (spec.description) console.log(chalk.dim(spec.description.trim()));
    console.log(chalk.dim(path));
    console.log();
    console.log(chalk.cyan("Execution order:"));
    console.log(`  ${plan.order.join(" -> ")}`);
    console.log();

    for (const [i, layer] of layers.entries()) {
      console.log(chalk.cyan(`Layer ${i + 1}:`) + ` ${layer.join(", ")}`);
      for (const id of layer) {
        const stage = plan.stages.get(id);
        if (!stage) continue;
        const { block } = stage;
        console.log(`  ${chalk.bold(id)} uses ${block.kind} -> ${block.outputs.join(" | ")}  ${chalk.dim(block.summary)}`);
        for (const ref of collectReferences(stage.spec.with)) {
          const field = ref.path.length ? `.${ref.path.join(".")}` : "";
          console.log(`    <- ${ref.stage}${field}`);
        }
        const given = new Set(stage.spec.with.entries.map(([key]) => key));
        const unset = block.parameters.filter((p) => !p.required && !given.has(p.name)).map((p) => p.name);
        if (unset.length) console.log(chalk.dim(`    defaults: ${unset.join(", ")}`));
      }
    }
  } catch (err) {
    failCommand(err);
  }
}
