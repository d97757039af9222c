/**
 * Pipeline specification model: stages and their tagged parameter values.
 */

// ── Parameter values ──

export type LiteralValue = string | number | boolean | null;

export interface LiteralParam {
  type: "literal";
  value: LiteralValue;
}

export interface RefParam {
  type: "ref";

  /** Producing stage id */
  stage: string;

  /** Optional sub-field path within the producing stage's artifact */
  path: string[];

  /** Text as written in the document, for messages */
  raw: string;
}

export interface ListParam {
  type: "list";
  items: ParamValue[];
}

export interface MapParam {
  type: "map";

  /** Key/value pairs in document order */
  entries: Array<[string, ParamValue]>;
}

export type ParamValue = LiteralParam | RefParam | ListParam | MapParam;

// ── Stages ──

export interface StageSpec {
  /** Unique stage id within the pipeline (e.g., "orders_raw", "route_plan") */
  id: string;

  /** Block-kind tag: data, forecast, geo, weather, optimize, or a registered extension */
  uses: string;

  /** Parameters passed to the block, possibly referencing other stages */
  with: MapParam;

  /** Position in the document; breaks ordering ties */
  index: number;
}

export interface PipelineSpec {
  name: string;
  description?: string;
  stages: StageSpec[];

  /** Free-form document metadata (domain, units, version tag) */
  metadata?: Record<string, unknown>;
}
