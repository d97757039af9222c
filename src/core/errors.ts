import { hintSuffix } from "./block-helpers.js";

/**
 * Error taxonomy:
 * - spec: structural problems found while planning, before any stage runs
 * - stage: a block failed while running
 * - internal: an engine invariant was broken
 */
export type ErrorCategory = "spec" | "stage" | "internal";

export class PipelineError extends Error {
  code: string;
  category: ErrorCategory;
  details?: Record<string, unknown>;

  constructor(message: string, code = "INTERNAL_ERROR", category: ErrorCategory = "internal", details?: Record<string, unknown>) {
    super(message);
    this.name = "PipelineError";
    this.code = code;
    this.category = category;
    this.details = details;
  }
}

export class InvalidSpecError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "INVALID_SPEC", "spec", details);
    this.name = "InvalidSpecError";
  }
}

export class DuplicateStageError extends PipelineError {
  constructor(public readonly stageId: string) {
    super(`Duplicate stage id '${stageId}'`, "DUPLICATE_STAGE", "spec", { stageId });
    this.name = "DuplicateStageError";
  }
}

export class UnresolvedReferenceError extends PipelineError {
  constructor(
    public readonly stageId: string,
    public readonly reference: string,
    hint: string | null = null,
  ) {
    super(
      `Stage '${stageId}' references unknown stage '${reference}'${hintSuffix(hint)}`,
      "UNRESOLVED_REFERENCE",
      "spec",
      { stageId, reference },
    );
    this.name = "UnresolvedReferenceError";
  }
}

export class CyclicPipelineError extends PipelineError {
  constructor(public readonly stageIds: string[]) {
    super(`Pipeline contains a dependency cycle: ${stageIds.join(", ")}`, "CYCLIC_PIPELINE", "spec", { stageIds });
    this.name = "CyclicPipelineError";
  }
}

export class UnknownBlockKindError extends PipelineError {
  constructor(
    public readonly stageId: string,
    public readonly blockKind: string,
    known: string[],
    hint: string | null = null,
  ) {
    super(
      `Stage '${stageId}' uses unknown block kind '${blockKind}'${hintSuffix(hint)}`,
      "UNKNOWN_BLOCK_KIND",
      "spec",
      { stageId, blockKind, known },
    );
    this.name = "UnknownBlockKindError";
  }
}

export class DuplicateBlockKindError extends PipelineError {
  constructor(public readonly blockKind: string) {
    super(`Block kind '${blockKind}' is already registered`, "DUPLICATE_BLOCK_KIND", "spec", { blockKind });
    this.name = "DuplicateBlockKindError";
  }
}

export class InvalidParametersError extends PipelineError {
  constructor(
    public readonly stageId: string,
    public readonly problems: string[],
  ) {
    super(`Stage '${stageId}' has invalid parameters: ${problems.join("; ")}`, "INVALID_PARAMETERS", "spec", { stageId, problems });
    this.name = "InvalidParametersError";
  }
}

export class ReferenceFieldError extends PipelineError {
  constructor(stageId: string, producer: string, path: string[]) {
    super(
      `Stage '${stageId}' references missing field '${path.join(".")}' of stage '${producer}'`,
      "REFERENCE_FIELD_MISSING",
      "stage",
      { stageId, producer, path },
    );
    this.name = "ReferenceFieldError";
  }
}

export class StageExecutionError extends PipelineError {
  constructor(
    public readonly stageId: string,
    public readonly blockKind: string,
    message: string,
    code = "STAGE_FAILED",
    details?: Record<string, unknown>,
  ) {
    super(message, code, "stage", { stageId, blockKind, ...details });
    this.name = "StageExecutionError";
  }
}

export class InternalBindingError extends PipelineError {
  constructor(stageId: string, producer: string) {
    super(
      `Artifact for stage '${producer}' is missing while binding '${stageId}'`,
      "INTERNAL_BINDING",
      "internal",
      { stageId, producer },
    );
    this.name = "InternalBindingError";
  }
}

/** Codes that mark a structural problem even when raised while a stage runs. */
const STRUCTURAL_CODES = new Set([
  "UNKNOWN_CONSTRAINT_RULE",
  "SHAPE_MISMATCH",
  "LABEL_MISMATCH",
  "UNKNOWN_DIMENSION",
  "UNKNOWN_OBJECTIVE",
  "UNKNOWN_VARIABLE",
  "UNKNOWN_DATA_REF",
  "INVALID_VARIABLE",
  "INVALID_RULE_PARAMS",
  "MISSING_PENALTY_WEIGHT",
  "NO_VARIABLES",
]);

export function errorCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err && typeof err.code === "string") return err.code;
  return undefined;
}

export function isStructuralCode(code: string | undefined): boolean {
  return code !== undefined && STRUCTURAL_CODES.has(code);
}

export function toPipelineError(err: unknown, fallbackCode = "INTERNAL_ERROR", fallbackCategory: ErrorCategory = "internal"): PipelineError {
  if (err instanceof PipelineError) return err;
  if (err instanceof Error) {
    const code = errorCode(err);
    return new PipelineError(err.message, code ?? fallbackCode, isStructuralCode(code) ? "spec" : fallbackCategory);
  }
  return new PipelineError(String(err ?? "Unknown error"), fallbackCode, fallbackCategory);
}
