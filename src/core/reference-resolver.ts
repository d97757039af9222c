import type { ParamValue, RefParam, StageSpec } from "./spec-types.js";
import { suggestClosest } from "./block-helpers.js";
import { UnresolvedReferenceError } from "./errors.js";

/** Every reference inside a parameter value, depth-first in document order. */
export function collectReferences(value: ParamValue, out: RefParam[] = []): RefParam[] {
  switch (value.type) {
    case "literal":
      break;
    case "ref":
      out.push(value);
      break;
    case "list":
      for (const item of value.items) collectReferences(item, out);
      break;
    case "map":
      for (const [, entry] of value.entries) collectReferences(entry, out);
      break;
  }
  return out;
}

/**
 * Map each stage id to the ids it depends on. Keys follow declaration order;
 * each set follows the order references appear in the stage's parameters.
 */
export function resolveDependencies(stages: StageSpec[]): Map<string, Set<string>> {
  const declared = stages.map((s) => s.id);
  const known = new Set(declared);
  const deps = new Map<string, Set<string>>();

  for (const stage of stages) {
    const set = new Set<string>();
    for (const ref of collectReferences(stage.with)) {
      if (!known.has(ref.stage)) {
        throw new UnresolvedReferenceError(stage.id, ref.stage, suggestClosest(ref.stage, declared));
      }
      set.add(ref.stage);
    }
    deps.set(stage.id, set);
  }
  return deps;
}
