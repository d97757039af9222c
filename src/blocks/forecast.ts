import { z } from "zod";
import type { Cell, MatrixArtifact, TableArtifact } from "../core/artifacts.js";
import type { CapabilityBlock } from "../core/block-types.js";
import { blockFailure, matrix } from "../core/artifacts.js";
import { daysParam, tableParam, toNumber } from "./params.js";

const ForecastParams = z.object({
  input: tableParam.describe("history table"),
  target_col: z.string().describe("value column to forecast"),
  ds_col: z.string().describe("date/period column"),
  group_col: z.string().optional().describe("one forecast row per distinct value"),
  horizon: daysParam.default(14).describe("periods ahead, e.g. 14d"),
  season_length: z.number().int().positive().optional(),
  model_cfg: z.object({
    weekly_seasonality: z.boolean().optional(),
  }).passthrough().optional(),
});

export type ForecastParams = z.infer<typeof ForecastParams>;

const ISO_DATE = /^\d{4}-\d{2}-\d{2}/;

interface Series {
  key: string;
  /** Period key -> summed target */
  totals: Map<string, number>;
}

function periodKey(cell: Cell): string {
  return cell === null ? "" : String(cell);
}

function comparePeriods(a: string, b: string): number {
  const na = Number(a);
  const nb = Number(b);
  if (a !== "" && b !== "" && Number.isFinite(na) && Number.isFinite(nb)) return na - nb;
  return a < b ? -1 : a > b ? 1 : 0;
}

function collectSeries(input: TableArtifact, params: ForecastParams): Series[] {
  for (const col of [params.target_col, params.ds_col, params.group_col]) {
    if (col !== undefined && !input.columns.includes(col)) throw new Error(`input has no column '${col}'`);
  }

  const byGroup = new Map<string, Series>();
  for (const [i, row] of input.rows.entries()) {
    const value = toNumber(row[params.target_col] ?? null);
    if (value === null) throw new Error(`row ${i + 1}: '${params.target_col}' is not numeric`);
    const key = params.group_col ? periodKey(row[params.group_col] ?? null) : "all";
    let series = byGroup.get(key);
    if (!series) {
      series = { key, totals: new Map() };
      byGroup.set(key, series);
    }
    const period = periodKey(row[params.ds_col] ?? null);
    series.totals.set(period, (series.totals.get(period) ?? 0) + value);
  }
  return [...byGroup.values()];
}

/** Mean of the history points that share the target step's seasonal phase. */
export function seasonalMean(history: number[], horizon: number, season: number): number[] {
  const period = history.length >= season ? season : 1;
  const out: number[] = [];
  for (let h = 0; h < horizon; h++) {
    const phase = (history.length + h) % period;
    let sum = 0;
    let count = 0;
    for (let i = phase; i < history.length; i += period) {
      sum += history[i];
      count++;
    }
    out.push(count ? sum / count : 0);
  }
  return out;
}

function horizonLabels(lastPeriod: string | undefined, horizon: number): string[] {
  if (lastPeriod && ISO_DATE.test(lastPeriod)) {
    const base = Date.parse(lastPeriod.slice(0, 10));
    if (Number.isFinite(base)) {
      return Array.from({ length: horizon }, (_, h) => new Date(base + (h + 1) * 86_400_000).toISOString().slice(0, 10));
    }
  }
  return Array.from({ length: horizon }, (_, h) => `t+${h + 1}`);
}

export function forecastMatrix(params: ForecastParams): MatrixArtifact {
  const series = collectSeries(params.input, params);
  const season = params.season_length ?? (params.model_cfg?.weekly_seasonality === false ? 1 : 7);

  const data: number[] = [];
  let lastPeriod: string | undefined;
  for (const s of series) {
    const periods = [...s.totals.keys()].sort(comparePeriods);
    const last = periods[periods.length - 1];
    if (last !== undefined && (lastPeriod === undefined || comparePeriods(last, lastPeriod) > 0)) lastPeriod = last;
    data.push(...seasonalMean(periods.map((p) => s.totals.get(p) ?? 0), params.horizon, season));
  }

  return matrix(
    [series.length, params.horizon],
    data,
    [series.map((s) => s.key), horizonLabels(lastPeriod, params.horizon)],
  );
}

export function createForecastBlock(): CapabilityBlock<ForecastParams> {
  return {
    kind: "forecast",

    describe: () => ({
      summary: "Seasonal-mean baseline forecast per group over a horizon",
      parameters: ForecastParams,
      output: "matrix",
    }),

    run(params, ctx) {
      if (params.input.rows.length === 0) return blockFailure("input table is empty", "EMPTY_INPUT");
      try {
        const result = forecastMatrix(params);
        ctx.logger.debug(`forecast ${result.shape[0]} group(s) x ${result.shape[1]} period(s)`);
        return result;
      } catch (err) {
        return blockFailure(err instanceof Error ? err.message : String(err), "FORECAST_FAILED");
      }
    },
  };
}
