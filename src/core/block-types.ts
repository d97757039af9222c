/**
 * Capability block contract. A block describes its parameters with a zod
 * object schema and runs against concrete, bound parameters.
 */
import type { z } from "zod";
import type { Artifact, ArtifactKind, BlockFailure } from "./artifacts.js";
import type { Logger } from "./logger.js";
import type { MapParam } from "./spec-types.js";

export type BlockResult = Artifact | BlockFailure;

export interface BlockDescription<P = Record<string, unknown>> {
  /** One-line summary shown by `explain` */
  summary: string;

  /** Schema for the bound parameters; object schemas also drive early key checks */
  parameters: z.ZodType<P, z.ZodTypeDef, unknown>;

  /** Artifact kind(s) the block produces */
  output: ArtifactKind | ArtifactKind[];
}

export interface ValidationContext {
  stageId: string;
  stageIds: string[];
}

export interface BlockContext {
  runId: string;
  stageId: string;
  logger: Logger;
  env: Record<string, string | undefined>;
}

export interface CapabilityBlock<P = Record<string, unknown>> {
  /** Tag referenced by a stage's `uses` */
  kind: string;

  describe(): BlockDescription<P>;

  /**
   * Optional structural check on the unbound parameters, run before any
   * stage executes. Throw a PipelineError to reject the stage.
   */
  validate?(params: MapParam, ctx: ValidationContext): void;

  run(params: P, ctx: BlockContext): BlockResult | Promise<BlockResult>;
}

export interface ParameterInfo {
  name: string;
  required: boolean;
  description?: string;
}

/** Registry view of a block with its parameter type erased. */
export interface RegisteredBlock {
  kind: string;
  summary: string;
  outputs: ArtifactKind[];

  /** Empty when the schema is not an object schema */
  parameters: ParameterInfo[];

  /** True when unknown parameter names should be rejected */
  closed: boolean;

  validate(params: MapParam, ctx: ValidationContext): void;

  /** Parse bound parameters and run the block */
  invoke(bound: Record<string, unknown>, ctx: BlockContext): Promise<BlockResult>;
}
