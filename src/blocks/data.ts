import { readFileSync } from "fs";
import { extname, isAbsolute, resolve } from "path";
import Database from "better-sqlite3";
import { z } from "zod";
import type { Cell, TableArtifact } from "../core/artifacts.js";
import type { CapabilityBlock } from "../core/block-types.js";
import type { ConnectionConfig } from "../core/config.js";
import { blockFailure, table } from "../core/artifacts.js";
import { hintSuffix, suggestClosest } from "../core/block-helpers.js";
import { InvalidParametersError } from "../core/errors.js";
import { cellParam, toCell } from "./params.js";

const DataParams = z.object({
  rows: z.array(z.record(z.string(), cellParam)).optional().describe("inline rows"),
  file: z.string().optional().describe("JSON array or CSV file"),
  sql: z.string().optional().describe("query against a configured connection"),
  conn: z.string().optional().describe("connection name from opsline.yaml"),
  params: z.union([z.array(cellParam), z.record(z.string(), cellParam)]).optional().describe("query bind parameters"),
  columns: z.array(z.string()).optional().describe("keep only these columns, in this order"),
});

export type DataParams = z.infer<typeof DataParams>;

export interface DataBlockOpts {
  connections?: Record<string, ConnectionConfig>;

  /** Base for relative `file` paths (default: process.cwd()) */
  baseDir?: string;
}

const SOURCES = ["rows", "file", "sql"] as const;

function tableFromRecords(records: unknown[]): TableArtifact {
  const columns: string[] = [];
  const rows: Array<Record<string, Cell>> = [];
  for (const record of records) {
    if (!record || typeof record !== "object" || Array.isArray(record)) {
      throw new Error("every row must be an object");
    }
    const row: Record<string, Cell> = {};
    for (const [key, value] of Object.entries(record)) {
      if (!columns.includes(key)) columns.push(key);
      row[key] = toCell(value);
    }
    rows.push(row);
  }
  return table(columns, rows);
}

function splitCsvLine(line: string): string[] {
  const out: string[] = [];
  let field = "";
  let quoted = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quoted) {
      if (ch === '"' && line[i + 1] === '"') {
        field += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        field += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ",") {
      out.push(field);
      field = "";
    } else {
      field += ch;
    }
  }
  out.push(field);
  return out;
}

function csvCell(raw: string): Cell {
  const text = raw.trim();
  if (text === "") return null;
  const n = Number(text);
  return Number.isFinite(n) ? n : text;
}

export function parseCsv(text: string): TableArtifact {
  const lines = text.split(/\r?\n/).filter((line) => line.trim() !== "");
  if (lines.length === 0) return table([], []);
  const columns = splitCsvLine(lines[0]).map((c) => c.trim());
  const rows = lines.slice(1).map((line) => {
    const fields = splitCsvLine(line);
    return Object.fromEntries(columns.map((col, i): [string, Cell] => [col, csvCell(fields[i] ?? "")]));
  });
  return table(columns, rows);
}

/** SQLite has no boolean type. */
function sqlValue(value: Cell): string | number | null {
  return typeof value === "boolean" ? (value ? 1 : 0) : value;
}

function project(source: TableArtifact, columns: string[] | undefined): TableArtifact {
  if (!columns) return source;
  const missing = columns.filter((c) => !source.columns.includes(c));
  if (missing.length) throw new Error(`unknown column(s): ${missing.join(", ")}`);
  return table(columns, source.rows.map((row) => Object.fromEntries(columns.map((c): [string, Cell] => [c, row[c] ?? null]))));
}

export function createDataBlock(opts: DataBlockOpts = {}): CapabilityBlock<DataParams> {
  const connections = opts.connections ?? {};

  function query(params: DataParams): TableArtifact {
    const name = params.conn ?? "";
    const connection = connections[name];
    if (!connection) {
      throw new Error(`unknown connection '${name}'${hintSuffix(suggestClosest(name, Object.keys(connections)))}`);
    }
    const db = new Database(connection.path, { readonly: true, fileMustExist: true });
    try {
      const stmt = db.prepare(params.sql ?? "");
      const bind = params.params ?? [];
      const records: unknown[] = Array.isArray(bind)
        ? stmt.all(...bind.map(sqlValue))
        : stmt.all(Object.fromEntries(Object.entries(bind).map(([k, v]) => [k, sqlValue(v)])));
      const result = tableFromRecords(records);
      // keep declared column order even for empty results
      const columns = stmt.columns().map((c) => c.name);
      return table(columns, result.rows);
    } finally {
      db.close();
    }
  }

  function readFile(file: string): TableArtifact {
    const path = isAbsolute(file) ? file : resolve(opts.baseDir ?? process.cwd(), file);
    const text = readFileSync(path, "utf-8");
    if (extname(path).toLowerCase() === ".csv") return parseCsv(text);
    const parsed: unknown = JSON.parse(text);
    if (!Array.isArray(parsed)) throw new Error(`${file}: expected a JSON array of rows`);
    return tableFromRecords(parsed);
  }

  return {
    kind: "data",

    describe: () => ({
      summary: "Load a table from inline rows, a JSON/CSV file, or a SQL query",
      parameters: DataParams,
      output: "table",
    }),

    validate(params, ctx) {
      const keys = params.entries.map(([key]) => key);
      const given = SOURCES.filter((source) => keys.includes(source));
      if (given.length !== 1) {
        throw new InvalidParametersError(ctx.stageId, [`exactly one of ${SOURCES.join(", ")} is required, got ${given.length}`]);
      }
      if (given[0] === "sql" && !keys.includes("conn")) {
        throw new InvalidParametersError(ctx.stageId, ["'sql' requires 'conn'"]);
      }
    },

    run(params, ctx) {
      try {
        const source = params.rows ? tableFromRecords(params.rows) : params.file ? readFile(params.file) : query(params);
        const result = project(source, params.columns);
        ctx.logger.debug(`loaded ${result.rows.length} row(s)`, { columns: result.columns });
        return result;
      } catch (err) {
        return blockFailure(err instanceof Error ? err.message : String(err), "DATA_SOURCE_FAILED");
      }
    },
  };
}
