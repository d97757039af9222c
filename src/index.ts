// opsline: declarative pipeline executor.
// Public API for programmatic usage

export { createPipelineExecutor } from "./core/pipeline-executor.js";
export type {
  ExecutionPlan,
  ExecutionResult,
  PipelineExecutor,
  PipelineExecutorOpts,
  PlannedStage,
  StageFailure,
  StageOutcome,
} from "./core/pipeline-executor.js";

export { createBlockRegistry } from "./core/block-registry.js";
export type { BlockRegistry } from "./core/block-registry.js";
export type {
  BlockContext,
  BlockDescription,
  BlockResult,
  CapabilityBlock,
  ParameterInfo,
  RegisteredBlock,
  ValidationContext,
} from "./core/block-types.js";

export { loadPipelineFile, parsePipeline } from "./core/spec-parser.js";
export type { ListParam, LiteralParam, MapParam, ParamValue, PipelineSpec, RefParam, StageSpec } from "./core/spec-types.js";
export { collectReferences, resolveDependencies } from "./core/reference-resolver.js";
export { buildGraph, cycleMembers, topoLayers, topoSort } from "./core/graph.js";
export type { PipelineGraph } from "./core/graph.js";
export { bindParameters } from "./core/binder.js";
export type { ArtifactStore } from "./core/binder.js";

export {
  artifactShape,
  blockFailure,
  freezeArtifact,
  isArtifact,
  isBlockFailure,
  matrix,
  selectField,
  series,
  table,
} from "./core/artifacts.js";
export type { Artifact, ArtifactKind, BlockFailure, Cell, MatrixArtifact, ModelArtifact, SeriesArtifact, TableArtifact } from "./core/artifacts.js";

export * from "./core/errors.js";
export { ConfigError, findConfigFile, loadConfig } from "./core/config.js";
export type { OpslineConfig } from "./core/config.js";
export { createLogger, silentLogger } from "./core/logger.js";
export type { LogLevel, Logger, LoggerOptions } from "./core/logger.js";

export * from "./blocks/index.js";
