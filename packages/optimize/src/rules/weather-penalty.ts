import { assertShape, partition, restrictShape, tensorValue } from '../shape.js'
import type { RuleContext } from '../types.js'
import { allButFirst, cellTerms, keptDimensions, numberParam, requireTensor } from './common.js'

/**
 * Charges `penalty` for every selection in a cell whose risk score exceeds
 * `threshold`. The risk tensor is indexed by the kept dimensions.
 */
export function weatherPenalty(ctx: RuleContext): void {
  const kept = keptDimensions(ctx, allButFirst(ctx))
  const risk = requireTensor(ctx, 'wx_ref', 'weather')
  const threshold = numberParam(ctx, 'threshold', 0)
  const penalty = numberParam(ctx, 'penalty', 1)

  assertShape('weather_penalty risk scores', restrictShape(ctx.tensor.shape, kept), risk.shape)
  ctx.builder.alignLabels('weather_penalty risk scores', ctx.tensor, risk, kept)

  for (const part of partition(ctx.tensor, kept)) {
    if (tensorValue(risk, part.key) > threshold) {
      ctx.builder.penalize(cellTerms(ctx, part.cells, () => penalty))
    }
  }
}
