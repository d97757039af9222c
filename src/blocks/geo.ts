import { z } from "zod";
import type { Cell, MatrixArtifact, TableArtifact } from "../core/artifacts.js";
import type { CapabilityBlock } from "../core/block-types.js";
import type { EndpointConfig } from "../core/config.js";
import { blockFailure, matrix, table } from "../core/artifacts.js";
import { InvalidParametersError } from "../core/errors.js";
import { tableParam, toNumber } from "./params.js";

export interface GeoPoint {
  label: string;
  lat: number;
  lon: number;
}

export interface Geocoder {
  geocode(address: string, opts: { apiKey?: string }): Promise<GeoPoint>;
}

const PointSchema = z.object({
  lat: z.coerce.number().min(-90).max(90),
  lon: z.coerce.number().min(-180).max(180),
  label: z.string().optional(),
});

const GeoParams = z.object({
  mode: z.enum(["geocode", "distance_matrix"]),
  addresses: z.array(z.union([z.string(), PointSchema])).optional().describe("geocode: strings or {lat, lon, label}"),
  origins: tableParam.optional().describe("distance_matrix: table with lat/lon columns"),
  destinations: tableParam.optional(),
  lat_field: z.string().default("lat"),
  lon_field: z.string().default("lon"),
  label_field: z.string().default("label"),
  api_key_ref: z.string().optional().describe("env var holding the geocoder key"),
});

export type GeoParams = z.infer<typeof GeoParams>;

const EARTH_RADIUS_KM = 6371;

export function haversineKm(a: { lat: number; lon: number }, b: { lat: number; lon: number }): number {
  const rad = (deg: number) => (deg * Math.PI) / 180;
  const dLat = rad(b.lat - a.lat);
  const dLon = rad(b.lon - a.lon);
  const h = Math.sin(dLat / 2) ** 2 + Math.cos(rad(a.lat)) * Math.cos(rad(b.lat)) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.min(1, Math.sqrt(h)));
}

/** Nominatim-style search endpoint: `?q=<address>&format=json`. */
export function createHttpGeocoder(config: EndpointConfig): Geocoder {
  const GeocodeHits = z.array(z.object({
    lat: z.coerce.number(),
    lon: z.coerce.number(),
    display_name: z.string().optional(),
  }));

  return {
    async geocode(address, opts) {
      const url = new URL(config.endpoint);
      url.searchParams.set("q", address);
      url.searchParams.set("format", "json");
      if (opts.apiKey) url.searchParams.set("key", opts.apiKey);

      const res = await fetch(url, { headers: { accept: "application/json" } });
      if (!res.ok) throw new Error(`geocoder returned HTTP ${res.status} for '${address}'`);
      const hits = GeocodeHits.parse(await res.json());
      const first = hits[0];
      if (!first) throw new Error(`no geocoding result for '${address}'`);
      return { label: address, lat: first.lat, lon: first.lon };
    },
  };
}

function pointsFrom(source: TableArtifact, params: GeoParams, name: string): GeoPoint[] {
  for (const col of [params.lat_field, params.lon_field]) {
    if (!source.columns.includes(col)) throw new Error(`${name} has no column '${col}'`);
  }
  return source.rows.map((row, i) => {
    const lat = toNumber(row[params.lat_field] ?? null);
    const lon = toNumber(row[params.lon_field] ?? null);
    if (lat === null || lon === null) throw new Error(`${name} row ${i + 1} has no coordinates`);
    const label = row[params.label_field];
    return { label: label === undefined || label === null ? String(i) : String(label), lat, lon };
  });
}

export function distanceMatrix(origins: GeoPoint[], destinations: GeoPoint[]): MatrixArtifact {
  const data = origins.flatMap((o) => destinations.map((d) => Math.round(haversineKm(o, d) * 1000) / 1000));
  return matrix([origins.length, destinations.length], data, [origins.map((o) => o.label), destinations.map((d) => d.label)]);
}

export interface GeoBlockOpts {
  geocoder?: Geocoder;
}

export function createGeoBlock(opts: GeoBlockOpts = {}): CapabilityBlock<GeoParams> {
  async function geocode(params: GeoParams, env: Record<string, string | undefined>): Promise<TableArtifact> {
    const apiKey = params.api_key_ref ? env[params.api_key_ref] : undefined;

    const rows: Array<Record<string, Cell>> = [];
    for (const [i, entry] of (params.addresses ?? []).entries()) {
      let point: GeoPoint;
      if (typeof entry === "string") {
        if (!opts.geocoder) throw new Error(`no geocoder configured to resolve '${entry}'`);
        if (params.api_key_ref && !apiKey) throw new Error(`environment variable ${params.api_key_ref} is not set`);
        point = await opts.geocoder.geocode(entry, { apiKey });
      } else {
        point = { label: entry.label ?? String(i), lat: entry.lat, lon: entry.lon };
      }
      rows.push({ label: point.label, lat: point.lat, lon: point.lon });
    }
    return table(["label", "lat", "lon"], rows);
  }

  return {
    kind: "geo",

    describe: () => ({
      summary: "Geocode addresses to a coordinate table, or build a haversine distance matrix (km)",
      parameters: GeoParams,
      output: ["table", "matrix"],
    }),

    validate(params, ctx) {
      const mode = params.entries.find(([key]) => key === "mode")?.[1];
      const keys = params.entries.map(([key]) => key);
      const needs = mode?.type === "literal" && mode.value === "distance_matrix" ? ["origins"] : ["addresses"];
      const missing = needs.filter((key) => !keys.includes(key));
      if (missing.length) {
        throw new InvalidParametersError(ctx.stageId, missing.map((key) => `missing required parameter '${key}'`));
      }
    },

    async run(params, ctx) {
      try {
        if (params.mode === "geocode") {
          const result = await geocode(params, ctx.env);
          ctx.logger.debug(`geocoded ${result.rows.length} address(es)`);
          return result;
        }
        const origins = params.origins;
        const destinations = params.destinations ?? origins;
        if (!origins || !destinations) return blockFailure("distance_matrix needs 'origins'", "INVALID_PARAMETERS");
        return distanceMatrix(pointsFrom(origins, params, "origins"), pointsFrom(destinations, params, "destinations"));
      } catch (err) {
        return blockFailure(err instanceof Error ? err.message : String(err), "GEO_FAILED");
      }
    },
  };
}
