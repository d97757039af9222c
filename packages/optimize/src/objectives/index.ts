import { AssemblyError, ShapeMismatchError } from '../errors.js'
import { complement, forEachIndex, resolveDimension, restrictShape, assertShape, tensorValue } from '../shape.js'
import type { DataTensor, LinearTerm, QuantityContext, QuantityHandler, VariableTensor } from '../types.js'

function allCells(tensor: VariableTensor): number[][] {
  const cells: number[][] = []
  forEachIndex(tensor.shape, (index) => cells.push(index))
  return cells
}

function requireData(ctx: QuantityContext, key: string, quantity: string): DataTensor {
  const tensor = ctx.builder.data(key)
  if (!tensor) {
    throw new AssemblyError(`Objective '${quantity}' requires data ref '${key}'`, 'MISSING_DATA_REF', { quantity, data: key })
  }
  return tensor
}

function stopDimension(ctx: QuantityContext): number {
  const raw = ctx.params.dim
  if (typeof raw === 'string') return resolveDimension(ctx.tensor, raw)
  return Math.min(1, ctx.tensor.dims.length - 1)
}

/**
 * Out-and-back distance from the depot to each covered stop. A square matrix
 * one larger than the stop dimension has the depot at row 0; one the same
 * size uses `depot` (default 0) as the origin row.
 */
const totalDistance: QuantityHandler = (ctx) => {
  const distance = requireData(ctx, 'distance', 'total_distance')
  const stop = stopDimension(ctx)
  const stops = ctx.tensor.shape[stop]
  const [rows, cols] = distance.shape

  if (distance.shape.length !== 2 || rows !== cols || (rows !== stops && rows !== stops + 1)) {
    throw new ShapeMismatchError('total_distance distance matrix', [stops + 1, stops + 1], distance.shape)
  }

  const offset = rows - stops
  ctx.builder.alignLabels('total_distance distance matrix', ctx.tensor, distance, [stop, stop], offset)
  const depot = offset === 1 ? 0 : Number(ctx.params.depot ?? 0)
  return allCells(ctx.tensor).map((cell) => ({
    variable: ctx.builder.variable(ctx.tensor, cell),
    coefficient: 2 * tensorValue(distance, [depot, cell[stop] + offset]),
  }))
}

const totalAssignments: QuantityHandler = (ctx) =>
  allCells(ctx.tensor).map((cell) => ({ variable: ctx.builder.variable(ctx.tensor, cell), coefficient: 1 }))

const totalPenalty: QuantityHandler = () => []

const totalDemandServed: QuantityHandler = (ctx) => {
  const demand = requireData(ctx, 'demand', 'total_demand_served')
  const demandDims = complement(ctx.tensor.dims.length, [0])
  assertShape('total_demand_served demand', restrictShape(ctx.tensor.shape, demandDims), demand.shape)
  ctx.builder.alignLabels('total_demand_served demand', ctx.tensor, demand, demandDims)
  return allCells(ctx.tensor).map((cell): LinearTerm => ({
    variable: ctx.builder.variable(ctx.tensor, cell),
    coefficient: tensorValue(demand, demandDims.map((pos) => cell[pos])),
  }))
}

const QUANTITIES: Readonly<Record<string, QuantityHandler>> = Object.freeze({
  total_distance: totalDistance,
  total_distance_km: totalDistance,
  total_assignments: totalAssignments,
  total_penalty: totalPenalty,
  total_demand_served: totalDemandServed,
})

export function knownQuantities(): string[] {
  return Object.keys(QUANTITIES)
}

export function quantityHandler(quantity: string): QuantityHandler | undefined {
  return Object.prototype.hasOwnProperty.call(QUANTITIES, quantity) ? QUANTITIES[quantity] : undefined
}
