import { ShapeMismatchError, UnknownDimensionError } from './errors.js'
import type { DataTensor, VariableTensor } from './types.js'

export interface Partition {
  /** Index over the kept dimensions */
  key: number[]
  /** Full tensor indexes summed within this partition */
  cells: number[][]
}

export function cellCount(shape: number[]): number {
  return shape.reduce((n, size) => n * size, 1)
}

export function flatIndex(shape: number[], index: number[]): number {
  let flat = 0
  for (let i = 0; i < shape.length; i += 1) {
    flat = flat * shape[i] + index[i]
  }
  return flat
}

/** Row-major walk over every index of `shape`. */
export function forEachIndex(shape: number[], fn: (index: number[]) => void): void {
  if (shape.some((size) => size <= 0)) return
  const index = shape.map(() => 0)
  while (true) {
    fn([...index])
    let pos = shape.length - 1
    while (pos >= 0) {
      index[pos] += 1
      if (index[pos] < shape[pos]) break
      index[pos] = 0
      pos -= 1
    }
    if (pos < 0) return
  }
}

const INDEXED_NAME = /^([A-Za-z_][\w-]*)\s*\[([^\]]*)\]$/

export function parseVariableName(name: string): { base: string; dims: string[] } {
  const match = INDEXED_NAME.exec(name.trim())
  if (!match) return { base: name.trim(), dims: [] }
  const dims = match[2]
    .split(',')
    .map((d) => d.trim())
    .filter(Boolean)
  return { base: match[1], dims }
}

/**
 * Exact name first, then a unique prefix match in either direction, so a rule
 * may say `store` for a tensor declared as `route[v,s,t]`.
 */
export function resolveDimension(tensor: VariableTensor, ref: string): number {
  const exact = tensor.dims.indexOf(ref)
  if (exact >= 0) return exact

  const candidates = tensor.dims
    .map((dim, pos) => ({ dim, pos }))
    .filter(({ dim }) => dim.startsWith(ref) || ref.startsWith(dim))
  if (candidates.length !== 1) {
    throw new UnknownDimensionError(ref, tensor.name, tensor.dims)
  }
  return candidates[0].pos
}

export function resolveDimensions(tensor: VariableTensor, refs: string[]): number[] {
  const positions = refs.map((ref) => resolveDimension(tensor, ref))
  return [...new Set(positions)].sort((a, b) => a - b)
}

export function complement(rank: number, positions: number[]): number[] {
  const kept = new Set(positions)
  return Array.from({ length: rank }, (_, i) => i).filter((i) => !kept.has(i))
}

export function restrictShape(shape: number[], positions: number[]): number[] {
  return positions.map((pos) => shape[pos])
}

export function partition(tensor: VariableTensor, kept: number[]): Partition[] {
  const rest = complement(tensor.shape.length, kept)
  const keptShape = restrictShape(tensor.shape, kept)
  const restShape = restrictShape(tensor.shape, rest)
  const parts: Partition[] = []

  forEachIndex(keptShape, (key) => {
    const cells: number[][] = []
    forEachIndex(restShape, (inner) => {
      const full = new Array<number>(tensor.shape.length)
      kept.forEach((pos, i) => { full[pos] = key[i] })
      rest.forEach((pos, i) => { full[pos] = inner[i] })
      cells.push(full)
    })
    parts.push({ key, cells })
  })

  return parts
}

export function sameShape(a: number[], b: number[]): boolean {
  return a.length === b.length && a.every((size, i) => size === b[i])
}

export function assertShape(subject: string, expected: number[], actual: number[]): void {
  if (!sameShape(expected, actual)) {
    throw new ShapeMismatchError(subject, expected, actual)
  }
}

export function isDataTensor(value: unknown): value is DataTensor {
  if (!value || typeof value !== 'object' || !('shape' in value) || !('data' in value)) return false
  const { shape, data } = value
  return Array.isArray(shape)
    && shape.every((n) => typeof n === 'number')
    && Array.isArray(data)
}

export function tensorValue(tensor: DataTensor, index: number[]): number {
  const value = tensor.data[flatIndex(tensor.shape, index)]
  return typeof value === 'number' && Number.isFinite(value) ? value : 0
}
