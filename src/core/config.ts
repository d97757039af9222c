import { readFileSync, existsSync } from "fs";
import { dirname, isAbsolute, resolve } from "path";
import { z } from "zod";
import { PipelineError } from "./errors.js";
import { isLogLevel } from "./logger.js";
import type { LogLevel } from "./logger.js";
import { parseYamlWithDiagnostics } from "./yaml-utils.js";

const CONFIG_FILES = ["opsline.yaml", "opsline.yml"];

export const ConnectionSchema = z.object({
  driver: z.literal("sqlite").default("sqlite"),
  path: z.string().min(1),
});

export const EndpointSchema = z.object({
  endpoint: z.string().url(),
  /** Name of the environment variable holding the API key */
  api_key_ref: z.string().optional(),
});

export const PenaltyPolicySchema = z.discriminatedUnion("mode", [
  z.object({ mode: z.literal("additive") }),
  z.object({ mode: z.literal("weighted"), weights: z.record(z.string(), z.number().nonnegative()) }),
]);

export const ConfigSchema = z.object({
  log_level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  connections: z.record(z.string(), ConnectionSchema).default({}),
  geocoder: EndpointSchema.optional(),
  weather: EndpointSchema.optional(),
  optimize: z.object({
    penalty_policy: PenaltyPolicySchema.default({ mode: "additive" }),
    solver: z.string().default("none"),
  }).default({}),
}).strict();

export type ConnectionConfig = z.infer<typeof ConnectionSchema>;
export type EndpointConfig = z.infer<typeof EndpointSchema>;

export type OpslineConfig = z.infer<typeof ConfigSchema> & {
  /** Config file the values came from, or null for defaults */
  source: string | null;
};

export class ConfigError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "INVALID_CONFIG", "spec", details);
    this.name = "ConfigError";
  }
}

export function findConfigFile(dir: string = process.cwd()): string | null {
  for (const file of CONFIG_FILES) {
    const path = resolve(dir, file);
    if (existsSync(path)) return path;
  }
  return null;
}

/**
 * Load opsline.yaml from `dir`. The file is optional; without it every
 * setting takes its default. OPSLINE_LOG_LEVEL overrides `log_level`.
 */
export function loadConfig(dir: string = process.cwd(), env: Record<string, string | undefined> = process.env): OpslineConfig {
  const configPath = findConfigFile(dir);
  const raw = configPath ? parseYamlWithDiagnostics(readFileSync(configPath, "utf-8"), configPath) : {};
  const config = validateConfig(raw ?? {}, configPath ?? "opsline.yaml");

  for (const connection of Object.values(config.connections)) {
    if (!isAbsolute(connection.path)) connection.path = resolve(configPath ? dirname(configPath) : dir, connection.path);
  }

  const override = env.OPSLINE_LOG_LEVEL;
  if (override) config.log_level = parseLogLevel(override);

  return { ...config, source: configPath };
}

export function validateConfig(raw: unknown, fileHint = "opsline.yaml"): z.infer<typeof ConfigSchema> {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ConfigError(`${fileHint}: ${problems.join("; ")}`, { problems });
  }
  return parsed.data;
}

export function parseLogLevel(value: string): LogLevel {
  const level = value.toLowerCase();
  if (!isLogLevel(level)) throw new ConfigError(`Invalid log level '${value}' (expected debug, info, warn or error)`);
  return level;
}
