import { ReferenceFieldError } from "./errors.js";

export type Cell = string | number | boolean | null;

export interface TableArtifact {
  kind: "table";
  columns: string[];
  rows: Array<Record<string, Cell>>;
}

export interface MatrixArtifact {
  kind: "matrix";

  /** Dimension sizes, outermost first */
  shape: number[];

  /** Row-major values */
  data: number[];

  /** Optional labels per dimension */
  labels?: string[][];
}

export interface SeriesArtifact {
  kind: "series";
  index: string[];
  values: number[];
}

export interface ModelArtifact {
  kind: "model";
  status: string;
  solver: string;
  objective?: number;
  /** Selected cells of the decision tensor, by variable name */
  assignments: string[];
  stats: Record<string, unknown>;
  model?: unknown;
}

export type Artifact = TableArtifact | MatrixArtifact | SeriesArtifact | ModelArtifact;

export type ArtifactKind = Artifact["kind"];

/** A block may report failure as a value instead of throwing. */
export interface BlockFailure {
  kind: "failure";
  message: string;
  code?: string;
  details?: Record<string, unknown>;
}

export const ARTIFACT_KINDS: readonly ArtifactKind[] = ["table", "matrix", "series", "model"];

export function isArtifact(value: unknown): value is Artifact {
  if (!value || typeof value !== "object" || !("kind" in value)) return false;
  return ARTIFACT_KINDS.some((kind) => kind === value.kind);
}

export function isBlockFailure(value: unknown): value is BlockFailure {
  return !!value && typeof value === "object" && "kind" in value && value.kind === "failure";
}

export function blockFailure(message: string, code?: string, details?: Record<string, unknown>): BlockFailure {
  return { kind: "failure", message, code, details };
}

export function table(columns: string[], rows: Array<Record<string, Cell>>): TableArtifact {
  return { kind: "table", columns, rows };
}

export function matrix(shape: number[], data: number[], labels?: string[][]): MatrixArtifact {
  const expected = shape.reduce((n, size) => n * size, 1);
  if (data.length !== expected) {
    throw new Error(`Matrix of shape [${shape.join(", ")}] needs ${expected} values, got ${data.length}`);
  }
  return labels ? { kind: "matrix", shape, data, labels } : { kind: "matrix", shape, data };
}

export function series(index: string[], values: number[]): SeriesArtifact {
  return { kind: "series", index, values };
}

export function artifactShape(artifact: Artifact): number[] {
  switch (artifact.kind) {
    case "table":
      return [artifact.rows.length, artifact.columns.length];
    case "matrix":
      return [...artifact.shape];
    case "series":
      return [artifact.values.length];
    case "model":
      return [];
  }
}

export function columnValues(artifact: TableArtifact, column: string): Cell[] {
  return artifact.rows.map((row) => row[column] ?? null);
}

/**
 * Resolve a reference sub-field. A table column name yields that column's
 * values; anything else walks the artifact's own properties.
 */
export function selectField(artifact: Artifact, path: string[], consumer: string, producer: string): unknown {
  if (path.length === 0) return artifact;

  const [head, ...rest] = path;
  let current: unknown;
  if (artifact.kind === "table" && artifact.columns.includes(head)) {
    current = columnValues(artifact, head);
  } else {
    current = ownField(artifact, head, consumer, producer, path);
  }

  for (const segment of rest) {
    current = ownField(current, segment, consumer, producer, path);
  }
  return current;
}

function ownField(value: unknown, key: string, consumer: string, producer: string, path: string[]): unknown {
  if (value && typeof value === "object") {
    const entry = Object.entries(value).find(([k]) => k === key);
    if (entry) return entry[1];
  }
  throw new ReferenceFieldError(consumer, producer, path);
}

/** Freeze an artifact in place so the same object stays shared downstream. */
export function freezeArtifact<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value) && !ArrayBuffer.isView(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) freezeArtifact(child);
  }
  return value;
}
