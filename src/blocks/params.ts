import { z } from "zod";
import type { Artifact, Cell, TableArtifact } from "../core/artifacts.js";
import { isArtifact } from "../core/artifacts.js";

/** Bound artifacts pass through untouched so downstream blocks see the stored object. */
export const artifactParam = z.custom<Artifact>(isArtifact, { message: "expected a stage artifact" });

export const tableParam = z.custom<TableArtifact>(
  (value) => isArtifact(value) && value.kind === "table",
  { message: "expected a table artifact" },
);

export const cellParam = z.union([z.string(), z.number(), z.boolean(), z.null()]);

/** "14d", "72h", "2w" or a plain day count. */
export const daysParam = z.union([z.number().int().positive(), z.string()]).transform((value, ctx) => {
  const days = parseDays(value);
  if (days === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid duration '${value}' (use e.g. 14d, 72h, 2w)` });
    return z.NEVER;
  }
  return days;
});

export function parseDays(value: string | number): number | null {
  if (typeof value === "number") return Number.isInteger(value) && value > 0 ? value : null;
  const match = /^\s*(\d+)\s*([dhw]?)\s*$/i.exec(value);
  if (!match) return null;
  const n = Number(match[1]);
  const unit = match[2].toLowerCase();
  const days = unit === "h" ? Math.ceil(n / 24) : unit === "w" ? n * 7 : n;
  return days > 0 ? days : null;
}

export function toCell(value: unknown): Cell {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "bigint") return Number(value);
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

export function toNumber(cell: Cell): number | null {
  if (typeof cell === "number") return cell;
  if (typeof cell === "string" && cell.trim() !== "") {
    const n = Number(cell);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}
