import { assertShape, complement, partition, restrictShape, tensorValue } from '../shape.js'
import type { RuleContext } from '../types.js'
import { bound, cellTerms, dimensionParam, numberParam, requireTensor, ruleLabel } from './common.js'

/** Demand loaded on one resource in one period stays within capacity. */
export function vehicleCapacity(ctx: RuleContext): void {
  const resource = dimensionParam(ctx, 'resource', 0)
  const period = dimensionParam(ctx, 'per', ctx.tensor.dims.length - 1)
  const capacity = numberParam(ctx, 'capacity')
  const demand = requireTensor(ctx, 'demand', 'demand')

  const demandDims = complement(ctx.tensor.dims.length, [resource])
  assertShape('vehicle_capacity demand', restrictShape(ctx.tensor.shape, demandDims), demand.shape)
  ctx.builder.alignLabels('vehicle_capacity demand', ctx.tensor, demand, demandDims)

  const kept = [...new Set([resource, period])].sort((a, b) => a - b)
  for (const part of partition(ctx.tensor, kept)) {
    const terms = cellTerms(ctx, part.cells, (cell) => tensorValue(demand, demandDims.map((pos) => cell[pos])))
    bound(ctx, ruleLabel('vehicle_capacity', part.key), terms, '<=', capacity)
  }
}
