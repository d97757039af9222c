import { describe, it, expect } from "vitest";
import { parsePipeline } from "../src/core/spec-parser.js";
import { collectReferences, resolveDependencies } from "../src/core/reference-resolver.js";
import { UnresolvedReferenceError } from "../src/core/errors.js";

describe("reference resolution", () => {
  it("finds references nested in lists and maps, in document order", () => {
    const spec = parsePipeline({
      name: "nested",
      stages: [
        { id: "a", uses: "data" },
        { id: "b", uses: "forecast", with: { x: [{ y: "@a" }], z: "@a.col" } },
        { id: "c", uses: "optimize", with: { p: "b", q: ["a"] } },
      ],
    });

    expect(collectReferences(spec.stages[1].with).map((r) => r.raw)).toEqual(["@a", "@a.col"]);

    const deps = resolveDependencies(spec.stages);
    expect([...deps.keys()]).toEqual(["a", "b", "c"]);
    expect([...(deps.get("a") ?? [])]).toEqual([]);
    expect([...(deps.get("b") ?? [])]).toEqual(["a"]);
    expect([...(deps.get("c") ?? [])]).toEqual(["b", "a"]);
  });

  it("rejects references to undeclared stages with a suggestion", () => {
    const spec = parsePipeline({
      name: "typo",
      stages: [
        { id: "orders", uses: "data" },
        { id: "fc", uses: "forecast", with: { input: "@ordrs" } },
      ],
    });

    let caught: unknown;
    try {
      resolveDependencies(spec.stages);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(UnresolvedReferenceError);
    expect(caught).toMatchObject({ stageId: "fc", reference: "ordrs", code: "UNRESOLVED_REFERENCE", category: "spec" });
    expect(String(caught)).toContain("Stage 'fc' references unknown stage 'ordrs' (did you mean 'orders'?)");
  });

  it("records an explicit self-reference as a dependency", () => {
    const spec = parsePipeline({ name: "self", stages: [{ id: "a", uses: "data", with: { x: "@a" } }] });
    expect([...(resolveDependencies(spec.stages).get("a") ?? [])]).toEqual(["a"]);
  });
});
