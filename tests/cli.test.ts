import { describe, it, expect, vi, beforeEach } from "vitest";
import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import Database from "better-sqlite3";
import { validateCommand } from "../src/commands/validate.js";
import { runCommand } from "../src/commands/run.js";
import { explainCommand } from "../src/commands/explain.js";
import { withTempDir } from "./helpers/pipeline.js";

const WEEKLY = `name: weekly
pipeline:
  stages:
    - id: plan
      uses: optimize
      with:
        variables:
          - name: "serve[v,s,t]"
            shape: [1, 2, 2]
        constraints:
          - rule: assign_exactly_one
            dims: "s,t"
        objective:
          maximize: total_demand_served
        data_refs:
          demand: forecast
    - id: orders
      uses: data
      with:
        rows:
          - { store: s1, day: 1, cases: 2 }
          - { store: s2, day: 1, cases: 6 }
    - id: forecast
      uses: forecast
      with:
        input: orders
        target_col: cases
        ds_col: day
        group_col: store
        horizon: 2
`;

function mockExit() {
  return vi.spyOn(process, "exit").mockImplementation((code?: string | number | null) => {
    throw new Error(`EXIT:${code ?? 0}`);
  });
}

function output(spy: { mock: { calls: unknown[][] } }): string {
  return spy.mock.calls.map((call) => call.join(" ")).join("\n");
}

describe("opsline CLI commands", () => {
  let dir: string;

  beforeEach(() => {
    vi.restoreAllMocks();
    dir = withTempDir("opsline-cli-test-");
    vi.spyOn(process, "cwd").mockReturnValue(dir);
  });

  it("validate reports the plan of a valid pipeline", async () => {
    writeFileSync(join(dir, "weekly.yaml"), WEEKLY);
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});

    await expect(validateCommand("weekly.yaml")).resolves.toBeUndefined();
    const out = output(logSpy);
    expect(out).toContain("✓ 3 stages parsed");
    expect(out).toContain("✓ 2 references resolved");
    expect(out).toContain("order: orders -> forecast -> plan");
  });

  it("validate finds pipelines under pipelines/ without an extension", async () => {
    mkdirSync(join(dir, "pipelines"));
    writeFileSync(join(dir, "pipelines", "weekly.yml"), WEEKLY);
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});

    await validateCommand("weekly");
    expect(output(logSpy)).toContain(join(dir, "pipelines", "weekly.yml"));
  });

  it("validate fails with a clear error on a missing file", async () => {
    const errSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    mockExit();

    await expect(validateCommand("missing.yaml")).rejects.toThrow("EXIT:1");
    expect(output(errSpy)).toContain("Pipeline file not found: 'missing.yaml'");
  });

  it("validate names the stages on a cycle", async () => {
    writeFileSync(
      join(dir, "loop.yaml"),
      "name: loop\nstages:\n  - id: a\n    uses: data\n    with:\n      rows: b\n  - id: b\n    uses: data\n    with:\n      rows: a\n",
    );
    const errSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    mockExit();

    await expect(validateCommand("loop.yaml")).rejects.toThrow("EXIT:1");
    expect(output(errSpy)).toContain("Pipeline contains a dependency cycle: a, b");
  });

  it("run prints the result as JSON", async () => {
    writeFileSync(join(dir, "weekly.yaml"), WEEKLY);
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});

    await runCommand("weekly.yaml", { json: true });

    expect(logSpy).toHaveBeenCalledTimes(1);
    const result: unknown = JSON.parse(String(logSpy.mock.calls[0][0]));
    expect(result).toMatchObject({
      pipeline: "weekly",
      status: "completed",
      order: ["orders", "forecast", "plan"],
      notRun: [],
      stages: {
        forecast: { status: "completed", artifact: { kind: "matrix", shape: [2, 2], data: [2, 2, 6, 6] } },
        plan: { status: "completed", artifact: { kind: "model", status: "not_solved" } },
      },
    });
  });

  it("run reads a SQLite connection from opsline.yaml", async () => {
    const db = new Database(join(dir, "orders.db"));
    db.exec("CREATE TABLE orders (store TEXT, cases INTEGER)");
    db.exec("INSERT INTO orders VALUES ('s1', 4), ('s2', 9)");
    db.close();
    writeFileSync(join(dir, "opsline.yaml"), "connections:\n  warehouse:\n    path: orders.db\n");
    writeFileSync(
      join(dir, "load.yaml"),
      "name: load\nstages:\n  - id: orders\n    uses: data\n    with:\n      sql: SELECT store, cases FROM orders\n      conn: warehouse\n",
    );
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});

    await runCommand("load.yaml", { quiet: true });

    const out = output(logSpy);
    expect(out).toContain("table 2 row(s) x 2 column(s)");
    expect(out).toContain("✓ pipeline load completed");
  });

  it("run exits non-zero and names the failing stage", async () => {
    writeFileSync(
      join(dir, "bad.yaml"),
      "name: bad\nstages:\n  - id: orders\n    uses: data\n    with:\n      rows:\n        - { day: 1, cases: many }\n  - id: forecast\n    uses: forecast\n    with:\n      input: orders\n      target_col: cases\n      ds_col: day\n  - id: after\n    uses: data\n    with:\n      rows: []\n      columns: [forecast]\n",
    );
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const errSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    mockExit();

    await expect(runCommand("bad.yaml", { quiet: true })).rejects.toThrow("EXIT:1");
    expect(output(errSpy)).toContain("✗ stage 'forecast' (forecast) failed: row 1: 'cases' is not numeric");
    expect(output(logSpy)).toContain("after");
  });

  it("explain prints layers and wiring", async () => {
    writeFileSync(join(dir, "weekly.yaml"), WEEKLY);
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});

    await explainCommand("weekly.yaml");

    const out = output(logSpy);
    expect(out).toContain("weekly: 3 stages, 3 layer(s)");
    expect(out).toContain("orders -> forecast -> plan");
    expect(out).toContain("    <- forecast");
  });
});
