import type { SolverBackend } from "@opsline/optimize";
import type { BlockRegistry } from "../core/block-registry.js";
import type { OpslineConfig } from "../core/config.js";
import { createBlockRegistry } from "../core/block-registry.js";
import { createDataBlock } from "./data.js";
import { createForecastBlock } from "./forecast.js";
import { createGeoBlock, createHttpGeocoder } from "./geo.js";
import type { Geocoder } from "./geo.js";
import { createOptimizeBlock } from "./optimize.js";
import { createHttpWeatherProvider, createWeatherBlock } from "./weather.js";
import type { WeatherProvider } from "./weather.js";

export interface BuiltinBlockOpts {
  config?: Pick<OpslineConfig, "connections" | "geocoder" | "weather" | "optimize">;

  /** Base directory for relative data files */
  baseDir?: string;

  /** Override the HTTP geocoder from config */
  geocoder?: Geocoder;

  /** Override the HTTP weather provider from config */
  weatherProvider?: WeatherProvider;

  backends?: Record<string, SolverBackend>;
}

/** A fresh registry with data, forecast, geo, weather and optimize registered. */
export function createBuiltinRegistry(opts: BuiltinBlockOpts = {}): BlockRegistry {
  const config = opts.config;
  const geocoder = opts.geocoder ?? (config?.geocoder ? createHttpGeocoder(config.geocoder) : undefined);
  const provider = opts.weatherProvider ?? (config?.weather ? createHttpWeatherProvider(config.weather) : undefined);

  return createBlockRegistry()
    .register(createDataBlock({ connections: config?.connections, baseDir: opts.baseDir }))
    .register(createForecastBlock())
    .register(createGeoBlock({ geocoder }))
    .register(createWeatherBlock({ provider }))
    .register(createOptimizeBlock({
      backends: opts.backends,
      defaultSolver: config?.optimize.solver,
      penaltyPolicy: config?.optimize.penalty_policy,
    }));
}

export { createDataBlock, parseCsv } from "./data.js";
export { createForecastBlock, forecastMatrix, seasonalMean } from "./forecast.js";
export { createGeoBlock, createHttpGeocoder, distanceMatrix, haversineKm } from "./geo.js";
export type { GeoPoint, Geocoder } from "./geo.js";
export { constraintEntries, createOptimizeBlock, objectiveEntry } from "./optimize.js";
export { createHttpWeatherProvider, createWeatherBlock } from "./weather.js";
export type { RiskQuery, WeatherProvider } from "./weather.js";
