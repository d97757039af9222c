import { describe, it, expect } from "vitest";
import { createLogger, formatLogEntry, isLogLevel } from "../src/core/logger.js";
import type { LogLevel } from "../src/core/logger.js";

describe("logger", () => {
  it("formats level, component, run id and context", () => {
    expect(formatLogEntry("warn", "disk low", { component: "data:orders", runId: "run_1", timestamps: false }, { free: 3 })).toBe(
      '[WARN ] [data:orders] [run_1] disk low {"free":3}',
    );
    expect(formatLogEntry("info", "hello", {})).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[INFO \] hello$/);
  });

  it("drops lines below the configured level", () => {
    const lines: Array<[LogLevel, string]> = [];
    const logger = createLogger({ level: "warn", timestamps: false, sink: (level, line) => lines.push([level, line]) });

    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.error("e", {});

    expect(lines).toEqual([
      ["warn", "[WARN ] w"],
      ["error", "[ERROR] e"],
    ]);
  });

  it("child loggers add bindings and keep the sink and level", () => {
    const lines: string[] = [];
    const root = createLogger({ level: "debug", component: "executor", timestamps: false, sink: (_level, line) => lines.push(line) });
    const child = root.child({ runId: "run_abc" }).child({ component: "forecast:fc" });

    child.debug("fitting");
    root.info("idle");

    expect(child.level).toBe("debug");
    expect(lines).toEqual(["[DEBUG] [forecast:fc] [run_abc] fitting", "[INFO ] [executor] idle"]);
  });

  it("recognizes log levels", () => {
    expect(isLogLevel("error")).toBe(true);
    expect(isLogLevel("trace")).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});
