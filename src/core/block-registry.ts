import { z } from "zod";
import type { BlockContext, BlockResult, CapabilityBlock, ParameterInfo, RegisteredBlock, ValidationContext } from "./block-types.js";
import type { StageSpec } from "./spec-types.js";
import { hintSuffix, suggestClosest } from "./block-helpers.js";
import { DuplicateBlockKindError, InvalidParametersError, StageExecutionError, UnknownBlockKindError } from "./errors.js";

export interface BlockRegistry {
  register<P>(block: CapabilityBlock<P>): BlockRegistry;
  get(kind: string): RegisteredBlock | undefined;
  has(kind: string): boolean;
  kinds(): string[];

  /** Look up the block for a stage, failing with UnknownBlockKindError */
  resolve(stage: StageSpec): RegisteredBlock;

  /** Early parameter checks: required and unknown keys, then the block's own hook */
  check(stage: StageSpec, ctx: ValidationContext): RegisteredBlock;
}

function describeParameters(schema: z.ZodTypeAny): { parameters: ParameterInfo[]; closed: boolean } {
  if (!(schema instanceof z.ZodObject)) return { parameters: [], closed: false };
  const shape: Record<string, z.ZodTypeAny> = schema.shape;
  return {
    parameters: Object.entries(shape).map(([name, field]) => ({
      name,
      required: !field.isOptional(),
      description: field.description,
    })),
    closed: schema._def.unknownKeys !== "passthrough",
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

function erase<P>(block: CapabilityBlock<P>): RegisteredBlock {
  const description = block.describe();
  const { parameters, closed } = describeParameters(description.parameters);

  return {
    kind: block.kind,
    summary: description.summary,
    outputs: Array.isArray(description.output) ? description.output : [description.output],
    parameters,
    closed,
    validate(params, ctx) {
      block.validate?.(params, ctx);
    },
    async invoke(bound: Record<string, unknown>, ctx: BlockContext): Promise<BlockResult> {
      const parsed = description.parameters.safeParse(bound);
      if (!parsed.success) {
        throw new StageExecutionError(ctx.stageId, block.kind, `invalid parameters: ${formatIssues(parsed.error)}`, "INVALID_PARAMETERS", {
          issues: parsed.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
        });
      }
      return block.run(parsed.data, ctx);
    },
  };
}

/**
 * Registries are built explicitly and handed to an executor; there is no
 * process-wide default.
 */
export function createBlockRegistry(): BlockRegistry {
  const entries = new Map<string, RegisteredBlock>();

  const registry: BlockRegistry = {
    register(block) {
      if (entries.has(block.kind)) throw new DuplicateBlockKindError(block.kind);
      entries.set(block.kind, erase(block));
      return registry;
    },

    get: (kind) => entries.get(kind),
    has: (kind) => entries.has(kind),
    kinds: () => [...entries.keys()],

    resolve(stage) {
      const block = entries.get(stage.uses);
      if (!block) {
        const known = [...entries.keys()];
        throw new UnknownBlockKindError(stage.id, stage.uses, known, suggestClosest(stage.uses, known));
      }
      return block;
    },

    check(stage, ctx) {
      const block = registry.resolve(stage);
      const given = stage.with.entries.map(([key]) => key);
      const declared = block.parameters.map((p) => p.name);
      const problems: string[] = [];

      for (const param of block.parameters) {
        if (param.required && !given.includes(param.name)) problems.push(`missing required parameter '${param.name}'`);
      }
      if (block.closed) {
        for (const key of given) {
          if (!declared.includes(key)) {
            problems.push(`unknown parameter '${key}'${hintSuffix(suggestClosest(key, declared))}`);
          }
        }
      }
      if (problems.length > 0) throw new InvalidParametersError(stage.id, problems);

      block.validate(stage.with, ctx);
      return block;
    },
  };

  return registry;
}
