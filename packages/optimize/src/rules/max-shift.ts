import { assertShape, complement, partition, restrictShape, tensorValue } from '../shape.js'
import type { RuleContext } from '../types.js'
import { bound, cellTerms, dimensionParam, numberParam, ruleLabel, tensorParam } from './common.js'

/**
 * Caps the hours a resource works in one period. Each covered cell costs
 * `stop_hours`, or its entry in a `service_time` tensor shaped like the
 * non-resource dimensions.
 */
export function maxShift(ctx: RuleContext): void {
  const resource = dimensionParam(ctx, 'resource', 0)
  const period = dimensionParam(ctx, 'per', ctx.tensor.dims.length - 1)
  const hours = numberParam(ctx, 'hours')
  const stopHours = numberParam(ctx, 'stop_hours', 1)
  const service = tensorParam(ctx, 'service_time')

  const serviceDims = complement(ctx.tensor.dims.length, [resource])
  if (service) {
    assertShape('max_shift service_time', restrictShape(ctx.tensor.shape, serviceDims), service.shape)
    ctx.builder.alignLabels('max_shift service_time', ctx.tensor, service, serviceDims)
  }

  const kept = [...new Set([resource, period])].sort((a, b) => a - b)
  for (const part of partition(ctx.tensor, kept)) {
    const terms = cellTerms(ctx, part.cells, (cell) =>
      service ? tensorValue(service, serviceDims.map((pos) => cell[pos])) : stopHours)
    bound(ctx, ruleLabel('max_shift', part.key), terms, '<=', hours)
  }
}
