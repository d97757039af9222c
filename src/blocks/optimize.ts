import { z } from "zod";
import {
  UnknownConstraintRuleError,
  UnknownObjectiveError,
  UnknownRuleParamError,
  assembleModel,
  describeModel,
  isKnownRule,
  knownQuantities,
  knownRules,
  objectiveValue,
  ruleParams,
  violatedConstraints,
} from "@opsline/optimize";
import type {
  AssembledModel,
  ConstraintEntry,
  DataTensor,
  ObjectiveEntry,
  PenaltyPolicy,
  SolverBackend,
  SolverResult,
} from "@opsline/optimize";
import type { Artifact, ModelArtifact } from "../core/artifacts.js";
import type { CapabilityBlock } from "../core/block-types.js";
import type { MapParam, ParamValue } from "../core/spec-types.js";
import { artifactShape, blockFailure } from "../core/artifacts.js";
import { suggestClosest } from "../core/block-helpers.js";
import { PenaltyPolicySchema } from "../core/config.js";
import { artifactParam } from "./params.js";

const VariableSchema = z.object({
  name: z.string().min(1),
  shape: z.array(z.number().int().positive()).min(1),
  dims: z.array(z.string()).optional(),
  type: z.enum(["bool", "int"]).optional(),
  lower: z.number().int().optional(),
  upper: z.number().int().optional(),
});

const ConstraintSchema = z.object({
  rule: z.string(),
  dims: z.union([z.string(), z.array(z.string())]).optional(),
  params: z.record(z.string(), z.unknown()).optional(),
  severity: z.enum(["hard", "soft"]).optional(),
  weight: z.number().nonnegative().optional(),
});

const ObjectiveSchema = z.object({
  minimize: z.string().optional(),
  maximize: z.string().optional(),
  params: z.record(z.string(), z.unknown()).optional(),
}).refine((o) => (o.minimize === undefined) !== (o.maximize === undefined), {
  message: "objective needs exactly one of 'minimize' or 'maximize'",
});

const OptimizeParams = z.object({
  variables: z.array(VariableSchema).min(1).describe("decision variables with explicit shapes"),
  constraints: z.union([
    z.array(ConstraintSchema),
    z.object({ hard: z.array(ConstraintSchema).default([]), soft: z.array(ConstraintSchema).default([]) }),
  ]).default([]).describe("rule entries, or { hard: [], soft: [] }"),
  objective: ObjectiveSchema,
  data_refs: z.record(z.string(), artifactParam).default({}).describe("upstream artifacts by data name"),
  solver: z.string().optional().describe("backend name; 'none' assembles only"),
  solver_options: z.record(z.string(), z.unknown()).default({}),
  penalty_policy: PenaltyPolicySchema.optional(),
});

export type OptimizeParams = z.infer<typeof OptimizeParams>;
type ConstraintParams = z.infer<typeof ConstraintSchema>;

export interface OptimizeBlockOpts {
  backends?: Record<string, SolverBackend>;

  /** Used when the stage names no solver (default: "none") */
  defaultSolver?: string;

  /** Used when the stage sets no penalty_policy (default: additive) */
  penaltyPolicy?: PenaltyPolicy;
}

function toEntry(raw: ConstraintParams, severity?: "hard" | "soft"): ConstraintEntry {
  const dims = typeof raw.dims === "string" ? raw.dims.split(",").map((d) => d.trim()).filter(Boolean) : raw.dims;
  return {
    rule: raw.rule,
    dims,
    params: raw.params,
    severity: severity ?? raw.severity,
    weight: raw.weight,
  };
}

export function constraintEntries(constraints: OptimizeParams["constraints"]): ConstraintEntry[] {
  if (Array.isArray(constraints)) return constraints.map((c) => toEntry(c));
  return [...constraints.hard.map((c) => toEntry(c, "hard")), ...constraints.soft.map((c) => toEntry(c, "soft"))];
}

export function objectiveEntry(objective: OptimizeParams["objective"]): ObjectiveEntry {
  if (objective.minimize !== undefined) return { sense: "minimize", quantity: objective.minimize, params: objective.params };
  return { sense: "maximize", quantity: objective.maximize ?? "", params: objective.params };
}

function toTensor(name: string, artifact: Artifact): DataTensor {
  switch (artifact.kind) {
    case "matrix":
      return artifact;
    case "series":
      return { shape: artifactShape(artifact), data: artifact.values, labels: [artifact.index] };
    default:
      throw new Error(`data ref '${name}' must be a matrix or series artifact, got ${artifact.kind} [${artifactShape(artifact).join(", ")}]`);
  }
}

function assignments(model: AssembledModel, values: number[]): string[] {
  const declared = Object.values(model.tensors).reduce((n, t) => n + t.size, 0);
  return model.variables
    .slice(0, declared)
    .filter((v) => v.type === "bool" ? (values[v.id] ?? 0) > 0.5 : (values[v.id] ?? 0) !== 0)
    .map((v) => (v.type === "bool" ? v.name : `${v.name}=${values[v.id]}`));
}

function modelArtifact(model: AssembledModel, solver: string, result: SolverResult): ModelArtifact {
  const values = result.values;
  const artifact: ModelArtifact = {
    kind: "model",
    status: result.status,
    solver,
    assignments: values ? assignments(model, values) : [],
    stats: { ...model.stats, summary: describeModel(model), ...(result.stats ?? {}) },
    model,
  };
  if (result.objectiveValue !== undefined) artifact.objective = result.objectiveValue;
  else if (values) artifact.objective = objectiveValue(model, values);
  return artifact;
}

// ── plan-time checks on the unbound parameter map ──

function entry(map: MapParam, key: string): ParamValue | undefined {
  return map.entries.find(([k]) => k === key)?.[1];
}

function literalString(value: ParamValue | undefined): string | undefined {
  return value?.type === "literal" && typeof value.value === "string" ? value.value : undefined;
}

interface RuleUse {
  rule: string;
  params: string[];
}

function ruleUses(value: ParamValue | undefined): RuleUse[] {
  if (!value) return [];
  if (value.type === "list") {
    return value.items.flatMap((item) => {
      const rule = item.type === "map" ? literalString(entry(item, "rule")) : undefined;
      if (item.type !== "map" || rule === undefined) return [];
      const params = entry(item, "params");
      return [{ rule, params: params?.type === "map" ? params.entries.map(([key]) => key) : [] }];
    });
  }
  if (value.type === "map") return [...ruleUses(entry(value, "hard")), ...ruleUses(entry(value, "soft"))];
  return [];
}

export function createOptimizeBlock(opts: OptimizeBlockOpts = {}): CapabilityBlock<OptimizeParams> {
  const backends = opts.backends ?? {};

  return {
    kind: "optimize",

    describe: () => ({
      summary: "Assemble a decision-variable model from rules and an objective, then hand it to a solver backend",
      parameters: OptimizeParams,
      output: "model",
    }),

    validate(params) {
      for (const { rule, params: keys } of ruleUses(entry(params, "constraints"))) {
        if (!isKnownRule(rule)) throw new UnknownConstraintRuleError(rule, knownRules(), suggestClosest(rule, knownRules()));
        const known = ruleParams(rule);
        const unknown = keys.find((key) => !known.includes(key));
        if (unknown !== undefined) throw new UnknownRuleParamError(rule, unknown, known, suggestClosest(unknown, known));
      }
      const objective = entry(params, "objective");
      if (objective?.type === "map") {
        const quantity = literalString(entry(objective, "minimize")) ?? literalString(entry(objective, "maximize"));
        if (quantity !== undefined && !knownQuantities().includes(quantity)) {
          throw new UnknownObjectiveError(quantity, knownQuantities());
        }
      }
    },

    async run(params, ctx) {
      const data: Record<string, DataTensor> = {};
      for (const [name, artifact] of Object.entries(params.data_refs)) {
        try {
          data[name] = toTensor(name, artifact);
        } catch (err) {
          return blockFailure(err instanceof Error ? err.message : String(err), "INVALID_DATA_REF", { data: name });
        }
      }

      // assembly errors are structural; let them propagate with their codes
      const model = assembleModel({
        variables: params.variables,
        constraints: constraintEntries(params.constraints),
        objective: objectiveEntry(params.objective),
        data,
        penaltyPolicy: params.penalty_policy ?? opts.penaltyPolicy,
      });
      for (const line of describeModel(model)) ctx.logger.debug(line);

      const solverName = params.solver ?? opts.defaultSolver ?? "none";
      const backend = solverName === "none" ? undefined : backends[solverName];
      if (!backend) {
        if (solverName !== "none") ctx.logger.warn(`no solver backend '${solverName}' registered; returning the assembled model`);
        return modelArtifact(model, solverName, { status: "not_solved" });
      }

      const result = await backend.solve(model, params.solver_options);
      if (result.status === "infeasible" || result.status === "unbounded" || result.status === "timeout") {
        return blockFailure(`solver '${backend.name}' reported ${result.status}`, `SOLVER_${result.status.toUpperCase()}`, {
          solver: backend.name,
          stats: result.stats,
        });
      }
      if (result.values) {
        const violated = violatedConstraints(model, result.values);
        if (violated.length > 0) {
          return blockFailure(
            `solver '${backend.name}' returned a solution violating ${violated.length} constraint(s), first: ${violated[0].name}`,
            "INVALID_SOLUTION",
          );
        }
      }
      return modelArtifact(model, backend.name, result);
    },
  };
}
