import { readFileSync } from "fs";
import { basename, extname } from "path";
import type { ListParam, MapParam, ParamValue, PipelineSpec, RefParam, StageSpec } from "./spec-types.js";
import { hintSuffix, suggestClosest } from "./block-helpers.js";
import { DuplicateStageError, InvalidSpecError } from "./errors.js";
import { isRecord, parseYamlWithDiagnostics } from "./yaml-utils.js";

const STAGE_ID = /^[A-Za-z_][A-Za-z0-9_-]*$/;
const STAGE_KEYS = ["id", "uses", "with", "description"];

export interface ParseOptions {
  /** Used when the document has no `name` */
  fallbackName?: string;
}

interface ParseContext {
  stageIds: Set<string>;
  implicitRefs: boolean;
  currentStage: string;
}

/**
 * Build a PipelineSpec from a parsed document. Accepts
 * `{ name, pipeline: { stages } }` or a top-level `stages` list.
 */
export function parsePipeline(raw: unknown, options: ParseOptions = {}): PipelineSpec {
  if (!isRecord(raw)) throw new InvalidSpecError("Pipeline document must be a mapping");

  const body = isRecord(raw.pipeline) ? raw.pipeline : raw;
  const name = typeof raw.name === "string" && raw.name ? raw.name : options.fallbackName;
  if (!name) throw new InvalidSpecError("Pipeline requires a name");

  const rawStages = body.stages;
  if (!Array.isArray(rawStages) || rawStages.length === 0) {
    throw new InvalidSpecError(`Pipeline '${name}' requires at least one stage`);
  }

  const implicitSetting = body.implicit_refs ?? raw.implicit_refs;
  if (implicitSetting !== undefined && typeof implicitSetting !== "boolean") {
    throw new InvalidSpecError("'implicit_refs' must be a boolean");
  }

  // ids first: references may point forward
  const headers = rawStages.map((stage, index) => parseStageHeader(stage, index));
  const stageIds = new Set<string>();
  for (const header of headers) {
    if (stageIds.has(header.id)) throw new DuplicateStageError(header.id);
    stageIds.add(header.id);
  }

  const stages: StageSpec[] = headers.map((header, index) => {
    const ctx: ParseContext = { stageIds, implicitRefs: implicitSetting !== false, currentStage: header.id };
    const empty: MapParam = { type: "map", entries: [] };
    const params = header.with === undefined ? empty : parseValue(header.with, ctx, [header.id, "with"]);
    if (params.type !== "map") {
      throw new InvalidSpecError(`Stage '${header.id}': 'with' must be a mapping`, { stageId: header.id });
    }
    return { id: header.id, uses: header.uses, with: params, index };
  });

  const spec: PipelineSpec = { name, stages };
  if (typeof raw.description === "string") spec.description = raw.description;
  if (isRecord(raw.metadata)) spec.metadata = raw.metadata;
  return spec;
}

function parseStageHeader(raw: unknown, index: number): { id: string; uses: string; with: unknown } {
  if (!isRecord(raw)) throw new InvalidSpecError(`Stage #${index + 1} must be a mapping`);

  const id = raw.id;
  if (typeof id !== "string" || !id) throw new InvalidSpecError(`Stage #${index + 1} requires an id`);
  if (!STAGE_ID.test(id)) {
    throw new InvalidSpecError(`Stage id '${id}' must start with a letter or underscore and contain only letters, digits, '_' or '-'`, { stageId: id });
  }

  const uses = raw.uses;
  if (typeof uses !== "string" || !uses) throw new InvalidSpecError(`Stage '${id}' requires 'uses'`, { stageId: id });

  for (const key of Object.keys(raw)) {
    if (!STAGE_KEYS.includes(key)) {
      const hint = suggestClosest(key, STAGE_KEYS);
      throw new InvalidSpecError(
        `Stage '${id}' has unknown key '${key}'${hintSuffix(hint)}`,
        { stageId: id, key },
      );
    }
  }

  return { id, uses, with: raw.with };
}

function parseValue(raw: unknown, ctx: ParseContext, at: string[]): ParamValue {
  if (raw === null || raw === undefined) return { type: "literal", value: null };
  if (typeof raw === "number" || typeof raw === "boolean") return { type: "literal", value: raw };
  if (typeof raw === "string") return parseString(raw, ctx);

  if (Array.isArray(raw)) {
    const list: ListParam = { type: "list", items: raw.map((item, i) => parseValue(item, ctx, [...at, String(i)])) };
    return list;
  }

  if (isRecord(raw)) {
    const keys = Object.keys(raw);
    if (keys.length === 1 && keys[0] === "$ref") {
      const target = raw.$ref;
      if (typeof target !== "string" || !target) {
        throw new InvalidSpecError(`${at.join(".")}: '$ref' must be a non-empty string`, { stageId: ctx.currentStage });
      }
      return toRef(target, target);
    }
    const map: MapParam = {
      type: "map",
      entries: keys.map((key): [string, ParamValue] => [key, parseValue(raw[key], ctx, [...at, key])]),
    };
    return map;
  }

  throw new InvalidSpecError(`${at.join(".")}: unsupported value of type ${typeof raw}`, { stageId: ctx.currentStage });
}

function parseString(raw: string, ctx: ParseContext): ParamValue {
  if (raw.startsWith("@@")) return { type: "literal", value: raw.slice(1) };
  if (raw.startsWith("@") && raw.length > 1) return toRef(raw.slice(1), raw);

  // only an exact stage id; sub-fields need '@stage.path' or '$ref'
  if (ctx.implicitRefs && raw !== ctx.currentStage && ctx.stageIds.has(raw)) {
    return { type: "ref", stage: raw, path: [], raw };
  }
  return { type: "literal", value: raw };
}

function toRef(target: string, raw: string): RefParam {
  const [stage, ...path] = target.split(".");
  return { type: "ref", stage, path: path.filter(Boolean), raw };
}

/** Read and parse a YAML or JSON pipeline document. */
export function loadPipelineFile(path: string): PipelineSpec {
  const text = readFileSync(path, "utf-8");
  const parsed = parseYamlWithDiagnostics(text, path);
  return parsePipeline(parsed, { fallbackName: basename(path, extname(path)) });
}
