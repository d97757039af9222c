import { z } from "zod";
import type { MatrixArtifact } from "../core/artifacts.js";
import type { CapabilityBlock } from "../core/block-types.js";
import type { EndpointConfig } from "../core/config.js";
import { blockFailure, matrix } from "../core/artifacts.js";
import { daysParam, tableParam, toNumber } from "./params.js";

export interface RiskQuery {
  lat: number;
  lon: number;
  days: number;
  metric: string;
  apiKey?: string;
}

export interface WeatherProvider {
  /** One risk score in [0, 1] per day, starting tomorrow */
  dailyRisk(query: RiskQuery): Promise<number[]>;
}

const WeatherParams = z.object({
  input: tableParam.describe("locations table"),
  forecast_window: daysParam.default(3).describe("days ahead, e.g. 3d"),
  lat_field: z.string().default("lat"),
  lon_field: z.string().default("lon"),
  label_field: z.string().default("label"),
  risk_metric: z.string().default("precip_prob"),
  api_key_ref: z.string().optional(),
});

export type WeatherParams = z.infer<typeof WeatherParams>;

export function createHttpWeatherProvider(config: EndpointConfig): WeatherProvider {
  const Daily = z.object({ daily: z.array(z.number().min(0).max(1)) });

  return {
    async dailyRisk(query) {
      const url = new URL(config.endpoint);
      url.searchParams.set("lat", String(query.lat));
      url.searchParams.set("lon", String(query.lon));
      url.searchParams.set("days", String(query.days));
      url.searchParams.set("metric", query.metric);
      if (query.apiKey) url.searchParams.set("key", query.apiKey);

      const res = await fetch(url, { headers: { accept: "application/json" } });
      if (!res.ok) throw new Error(`weather provider returned HTTP ${res.status}`);
      return Daily.parse(await res.json()).daily;
    },
  };
}

export interface WeatherBlockOpts {
  provider?: WeatherProvider;
}

export function createWeatherBlock(opts: WeatherBlockOpts = {}): CapabilityBlock<WeatherParams> {
  async function riskMatrix(params: WeatherParams, provider: WeatherProvider, apiKey: string | undefined): Promise<MatrixArtifact> {
    const { input, forecast_window: days } = params;
    for (const col of [params.lat_field, params.lon_field]) {
      if (!input.columns.includes(col)) throw new Error(`input has no column '${col}'`);
    }

    const data: number[] = [];
    const labels: string[] = [];
    for (const [i, row] of input.rows.entries()) {
      const lat = toNumber(row[params.lat_field] ?? null);
      const lon = toNumber(row[params.lon_field] ?? null);
      if (lat === null || lon === null) throw new Error(`row ${i + 1} has no coordinates`);
      const risk = await provider.dailyRisk({ lat, lon, days, metric: params.risk_metric, apiKey });
      if (risk.length < days) throw new Error(`provider returned ${risk.length} day(s) for row ${i + 1}, expected ${days}`);
      data.push(...risk.slice(0, days));
      const label = row[params.label_field];
      labels.push(label === undefined || label === null ? String(i) : String(label));
    }
    return matrix([input.rows.length, days], data, [labels, Array.from({ length: days }, (_, d) => `day${d + 1}`)]);
  }

  return {
    kind: "weather",

    describe: () => ({
      summary: "Daily weather risk per location over a forecast window",
      parameters: WeatherParams,
      output: "matrix",
    }),

    async run(params, ctx) {
      if (!opts.provider) return blockFailure("no weather provider configured", "NO_WEATHER_PROVIDER");
      const apiKey = params.api_key_ref ? ctx.env[params.api_key_ref] : undefined;
      if (params.api_key_ref && !apiKey) {
        return blockFailure(`environment variable ${params.api_key_ref} is not set`, "MISSING_CREDENTIALS");
      }
      try {
        const result = await riskMatrix(params, opts.provider, apiKey);
        ctx.logger.debug(`risk for ${result.shape[0]} location(s) x ${result.shape[1]} day(s)`, { metric: params.risk_metric });
        return result;
      } catch (err) {
        return blockFailure(err instanceof Error ? err.message : String(err), "WEATHER_FAILED");
      }
    },
  };
}
