import type { Artifact } from "./artifacts.js";
import type { MapParam, ParamValue } from "./spec-types.js";
import { selectField } from "./artifacts.js";
import { InternalBindingError } from "./errors.js";

/** Append-only view the binder reads from; only the executor writes. */
export type ArtifactStore = ReadonlyMap<string, Artifact>;

/**
 * Replace every reference with the producing stage's artifact (or the
 * selected sub-field). Nesting, key order and list order are kept; literals
 * pass through as-is.
 */
export function bindParameters(stageId: string, params: MapParam, store: ArtifactStore): Record<string, unknown> {
  return Object.fromEntries(params.entries.map(([key, value]) => [key, bindValue(stageId, value, store)]));
}

export function bindValue(stageId: string, value: ParamValue, store: ArtifactStore): unknown {
  switch (value.type) {
    case "literal":
      return value.value;
    case "ref": {
      const artifact = store.get(value.stage);
      if (!artifact) throw new InternalBindingError(stageId, value.stage);
      return value.path.length ? selectField(artifact, value.path, stageId, value.stage) : artifact;
    }
    case "list":
      return value.items.map((item) => bindValue(stageId, item, store));
    case "map":
      return bindParameters(stageId, value, store);
  }
}
