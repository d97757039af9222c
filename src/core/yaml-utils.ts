import { YAMLParseError, parse as parseYaml } from "yaml";
import { InvalidSpecError } from "./errors.js";

export function parseYamlWithDiagnostics(raw: string, fileHint = "yaml"): unknown {
  try {
    return parseYaml(raw);
  } catch (err) {
    if (err instanceof YAMLParseError) {
      const pos = err.linePos?.[0];
      const where = pos ? `${fileHint}:${pos.line}:${pos.col}` : fileHint;
      throw new InvalidSpecError(`${where}: ${err.message.split("\n")[0]}`, { file: fileHint, line: pos?.line, col: pos?.col });
    }
    throw err;
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}
