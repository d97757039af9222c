import { describe, it, expect } from "vitest";
import { writeFileSync } from "node:fs";
import { join } from "node:path";
import { loadPipelineFile, parsePipeline } from "../src/core/spec-parser.js";
import { DuplicateStageError, InvalidSpecError } from "../src/core/errors.js";
import { withTempDir } from "./helpers/pipeline.js";

describe("parsePipeline", () => {
  it("tags explicit, $ref, implicit and escaped values", () => {
    const spec = parsePipeline({
      name: "demo",
      pipeline: {
        stages: [
          { id: "orders", uses: "data", with: { rows: [{ a: 1 }] } },
          {
            id: "fc",
            uses: "forecast",
            with: {
              input: "orders",
              col: "@orders.cases",
              other: { $ref: "orders" },
              tag: "@@orders",
              label: "ordersX",
            },
          },
        ],
      },
    });

    expect(spec.name).toBe("demo");
    expect(spec.stages.map((s) => [s.id, s.uses, s.index])).toEqual([
      ["orders", "data", 0],
      ["fc", "forecast", 1],
    ]);
    expect(spec.stages[0].with.entries).toEqual([
      ["rows", { type: "list", items: [{ type: "map", entries: [["a", { type: "literal", value: 1 }]] }] }],
    ]);
    expect(spec.stages[1].with.entries).toEqual([
      ["input", { type: "ref", stage: "orders", path: [], raw: "orders" }],
      ["col", { type: "ref", stage: "orders", path: ["cases"], raw: "@orders.cases" }],
      ["other", { type: "ref", stage: "orders", path: [], raw: "orders" }],
      ["tag", { type: "literal", value: "@orders" }],
      ["label", { type: "literal", value: "ordersX" }],
    ]);
  });

  it("keeps bare strings literal when implicit_refs is off", () => {
    const spec = parsePipeline({
      name: "demo",
      implicit_refs: false,
      stages: [
        { id: "orders", uses: "data" },
        { id: "fc", uses: "forecast", with: { input: "orders", explicit: "@orders" } },
      ],
    });

    expect(spec.stages[1].with.entries).toEqual([
      ["input", { type: "literal", value: "orders" }],
      ["explicit", { type: "ref", stage: "orders", path: [], raw: "@orders" }],
    ]);
  });

  it("does not treat a stage's own id as an implicit reference", () => {
    const spec = parsePipeline({ name: "demo", stages: [{ id: "orders", uses: "data", with: { table: "orders" } }] });
    expect(spec.stages[0].with.entries).toEqual([["table", { type: "literal", value: "orders" }]]);
  });

  it("keeps dotted strings that start with a stage id literal", () => {
    const spec = parsePipeline({
      name: "demo",
      stages: [
        { id: "orders", uses: "data", with: { file: "forecast.csv" } },
        { id: "forecast", uses: "forecast", with: { input: "orders" } },
      ],
    });

    expect(spec.stages[0].with.entries).toEqual([["file", { type: "literal", value: "forecast.csv" }]]);
    expect(spec.stages[1].with.entries).toEqual([["input", { type: "ref", stage: "orders", path: [], raw: "orders" }]]);
  });

  it("keeps explicit references to undeclared stages for the resolver", () => {
    const spec = parsePipeline({ name: "demo", stages: [{ id: "a", uses: "data", with: { x: "@ghost.col" } }] });
    expect(spec.stages[0].with.entries).toEqual([["x", { type: "ref", stage: "ghost", path: ["col"], raw: "@ghost.col" }]]);
  });

  it("falls back to the given name and an empty parameter map", () => {
    const spec = parsePipeline({ stages: [{ id: "a", uses: "data" }] }, { fallbackName: "from-file" });
    expect(spec.name).toBe("from-file");
    expect(spec.stages[0].with).toEqual({ type: "map", entries: [] });
  });

  it("maps null and missing values to literal null", () => {
    const spec = parsePipeline({ name: "demo", stages: [{ id: "a", uses: "data", with: { x: null, flag: true } }] });
    expect(spec.stages[0].with.entries).toEqual([
      ["x", { type: "literal", value: null }],
      ["flag", { type: "literal", value: true }],
    ]);
  });

  it("rejects duplicate stage ids", () => {
    expect(() =>
      parsePipeline({ name: "demo", stages: [{ id: "a", uses: "data" }, { id: "a", uses: "forecast" }] }),
    ).toThrow(DuplicateStageError);
  });

  it("rejects unknown stage keys with a suggestion", () => {
    expect(() => parsePipeline({ name: "demo", stages: [{ id: "a", uses: "data", wit: {} }] })).toThrow(
      "Stage 'a' has unknown key 'wit' (did you mean 'with'?)",
    );
  });

  it("rejects malformed documents", () => {
    expect(() => parsePipeline([])).toThrow("Pipeline document must be a mapping");
    expect(() => parsePipeline({ stages: [{ id: "a", uses: "data" }] })).toThrow("Pipeline requires a name");
    expect(() => parsePipeline({ name: "demo", stages: [] })).toThrow("Pipeline 'demo' requires at least one stage");
    expect(() => parsePipeline({ name: "demo", stages: [{ uses: "data" }] })).toThrow("Stage #1 requires an id");
    expect(() => parsePipeline({ name: "demo", stages: [{ id: "a" }] })).toThrow("Stage 'a' requires 'uses'");
    expect(() => parsePipeline({ name: "demo", stages: [{ id: "a", uses: "data", with: [1] }] })).toThrow(
      "Stage 'a': 'with' must be a mapping",
    );
    expect(() => parsePipeline({ name: "demo", stages: [{ id: "a.b", uses: "data" }] })).toThrow(InvalidSpecError);
  });
});

describe("loadPipelineFile", () => {
  it("reads YAML and names the pipeline after the file", () => {
    const dir = withTempDir();
    const path = join(dir, "weekly-plan.yaml");
    writeFileSync(path, "pipeline:\n  stages:\n    - id: orders\n      uses: data\n      with:\n        file: orders.csv\n");

    const spec = loadPipelineFile(path);
    expect(spec.name).toBe("weekly-plan");
    expect(spec.stages[0].with.entries).toEqual([["file", { type: "literal", value: "orders.csv" }]]);
  });

  it("reports YAML syntax errors with the file path", () => {
    const dir = withTempDir();
    const path = join(dir, "broken.yaml");
    writeFileSync(path, "name: bad\nstages: [\n");

    expect(() => loadPipelineFile(path)).toThrow(InvalidSpecError);
    expect(() => loadPipelineFile(path)).toThrow(path);
  });
});
