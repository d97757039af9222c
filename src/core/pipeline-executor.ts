/**
 * Pipeline executor: plans a pipeline (references, ordering, block lookup,
 * early parameter checks) and then runs its stages one at a time.
 *
 * Execution is strictly serial and fail-fast. The first stage that throws or
 * returns a failure stops the run; later stages are reported as not run.
 */

import { nanoid } from "nanoid";
import type { Artifact } from "./artifacts.js";
import type { BlockContext, RegisteredBlock } from "./block-types.js";
import type { BlockRegistry } from "./block-registry.js";
import type { Logger } from "./logger.js";
import type { PipelineSpec, StageSpec } from "./spec-types.js";
import { freezeArtifact, isArtifact, isBlockFailure } from "./artifacts.js";
import { bindParameters } from "./binder.js";
import { DuplicateStageError, StageExecutionError, toPipelineError } from "./errors.js";
import type { ErrorCategory } from "./errors.js";
import { buildGraph, topoSort } from "./graph.js";
import type { PipelineGraph } from "./graph.js";
import { silentLogger } from "./logger.js";
import { resolveDependencies } from "./reference-resolver.js";

export interface StageFailure {
  stageId: string;
  blockKind: string;
  category: ErrorCategory;
  code: string;
  message: string;
  cause: unknown;
}

export type StageOutcome =
  | { status: "completed"; artifact: Artifact; duration_ms: number }
  | { status: "failed"; failure: StageFailure };

export interface ExecutionResult {
  runId: string;
  pipeline: string;
  status: "completed" | "failed";
  order: string[];

  /** Outcomes for stages that ran, in execution order */
  stages: Record<string, StageOutcome>;

  /** Stages skipped after the failure, in execution order */
  notRun: string[];

  failure?: StageFailure;
  duration_ms: number;
}

export interface PlannedStage {
  spec: StageSpec;
  block: RegisteredBlock;
}

export interface ExecutionPlan {
  pipeline: string;
  order: string[];
  dependencies: Map<string, Set<string>>;
  graph: PipelineGraph;
  stages: Map<string, PlannedStage>;
}

export interface PipelineExecutorOpts {
  registry: BlockRegistry;

  logger?: Logger;

  /** Environment exposed to blocks (default: process.env) */
  env?: Record<string, string | undefined>;

  /** Called when a stage starts */
  onStageStart?: (runId: string, stageId: string, blockKind: string) => void;

  /** Called when a stage stores its artifact */
  onStageComplete?: (runId: string, stageId: string, artifact: Artifact, durationMs: number) => void;

  /** Called once, for the stage that stopped the run */
  onStageFail?: (runId: string, failure: StageFailure) => void;

  /** Called when every stage completed */
  onRunComplete?: (result: ExecutionResult) => void;

  /** Called when a stage failure stopped the run */
  onRunFail?: (result: ExecutionResult) => void;
}

export interface PipelineExecutor {
  /** Structural validation; throws the first spec error found */
  plan(spec: PipelineSpec): ExecutionPlan;

  /** Plan, then run every stage in order until one fails */
  execute(spec: PipelineSpec): Promise<ExecutionResult>;
}

function toStageFailure(stage: StageSpec, err: unknown): StageFailure {
  const e = toPipelineError(err, "STAGE_FAILED", "stage");
  return {
    stageId: stage.id,
    blockKind: stage.uses,
    category: e.category,
    code: e.code,
    message: e.message,
    cause: err,
  };
}

async function runStage(
  stage: StageSpec,
  block: RegisteredBlock,
  store: ReadonlyMap<string, Artifact>,
  ctx: BlockContext,
): Promise<{ ok: true; artifact: Artifact } | { ok: false; failure: StageFailure }> {
  try {
    const bound = bindParameters(stage.id, stage.with, store);
    const result = await block.invoke(bound, ctx);
    if (isBlockFailure(result)) {
      throw new StageExecutionError(stage.id, block.kind, result.message, result.code ?? "STAGE_FAILED", result.details);
    }
    if (!isArtifact(result)) {
      throw new StageExecutionError(stage.id, block.kind, "block returned a value that is not an artifact", "INVALID_ARTIFACT");
    }
    if (!block.outputs.includes(result.kind)) {
      throw new StageExecutionError(
        stage.id,
        block.kind,
        `block returned a ${result.kind} artifact, expected ${block.outputs.join(" or ")}`,
        "UNEXPECTED_ARTIFACT",
      );
    }
    return { ok: true, artifact: freezeArtifact(result) };
  } catch (err) {
    return { ok: false, failure: toStageFailure(stage, err) };
  }
}

export function createPipelineExecutor(opts: PipelineExecutorOpts): PipelineExecutor {
  const baseLogger = (opts.logger ?? silentLogger).child({ component: "executor" });

  function plan(spec: PipelineSpec): ExecutionPlan {
    const seen = new Set<string>();
    for (const stage of spec.stages) {
      if (seen.has(stage.id)) throw new DuplicateStageError(stage.id);
      seen.add(stage.id);
    }

    const dependencies = resolveDependencies(spec.stages);
    const graph = buildGraph(spec.stages, dependencies);
    const order = topoSort(graph);

    const stageIds = spec.stages.map((s) => s.id);
    const stages = new Map<string, PlannedStage>();
    for (const stage of spec.stages) {
      stages.set(stage.id, { spec: stage, block: opts.registry.check(stage, { stageId: stage.id, stageIds }) });
    }

    return { pipeline: spec.name, order, dependencies, graph, stages };
  }

  async function execute(spec: PipelineSpec): Promise<ExecutionResult> {
    const started = Date.now();
    const planned = plan(spec);
    const runId = `run_${nanoid(12)}`;
    const log = baseLogger.child({ runId });
    const env = opts.env ?? process.env;

    const store = new Map<string, Artifact>();
    const outcomes: Array<[string, StageOutcome]> = [];
    let failure: StageFailure | undefined;
    let notRun: string[] = [];

    log.info(`pipeline ${spec.name}: ${planned.order.length} stage(s), order ${planned.order.join(" -> ")}`);

    for (const [position, stageId] of planned.order.entries()) {
      const entry = planned.stages.get(stageId);
      if (!entry) throw new Error(`Planned stage '${stageId}' is missing`);
      const { spec: stage, block } = entry;

      opts.onStageStart?.(runId, stage.id, block.kind);
      log.info(`stage ${stage.id} (${block.kind}) starting`);
      const stageStarted = Date.now();

      const outcome = await runStage(stage, block, store, {
        runId,
        stageId: stage.id,
        logger: log.child({ component: `${block.kind}:${stage.id}` }),
        env,
      });

      if (!outcome.ok) {
        failure = outcome.failure;
        outcomes.push([stage.id, { status: "failed", failure }]);
        notRun = planned.order.slice(position + 1);
        log.error(`stage ${stage.id} (${block.kind}) failed: ${failure.message}`, { code: failure.code, category: failure.category });
        opts.onStageFail?.(runId, failure);
        break;
      }

      const artifact = outcome.artifact;
      const duration = Date.now() - stageStarted;
      store.set(stage.id, artifact);
      outcomes.push([stage.id, { status: "completed", artifact, duration_ms: duration }]);
      log.info(`stage ${stage.id} (${block.kind}) completed in ${duration} ms`);
      opts.onStageComplete?.(runId, stage.id, artifact, duration);
    }

    const result: ExecutionResult = {
      runId,
      pipeline: spec.name,
      status: failure ? "failed" : "completed",
      order: planned.order,
      stages: Object.fromEntries(outcomes),
      notRun,
      duration_ms: Date.now() - started,
    };

    if (failure) {
      result.failure = failure;
      if (notRun.length > 0) log.warn(`not run: ${notRun.join(", ")}`);
      opts.onRunFail?.(result);
    } else {
      log.info(`pipeline ${spec.name} completed in ${result.duration_ms} ms`);
      opts.onRunComplete?.(result);
    }
    return result;
  }

  return { plan, execute };
}
