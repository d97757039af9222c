import { complement, partition, resolveDimensions } from '../shape.js'
import type { RuleContext } from '../types.js'
import { allButFirst, bound, cellTerms, keptDimensions, ruleLabel } from './common.js'

/**
 * At most one selected cell per kept index. `params.over` (or `dimension`)
 * names the summed dimensions instead, e.g. `over: shift` for one shift per
 * nurse per day.
 */
export function atMostOne(ctx: RuleContext): void {
  const over = ctx.params.over ?? ctx.params.dimension
  const kept = over === undefined
    ? keptDimensions(ctx, allButFirst(ctx))
    : complement(ctx.tensor.dims.length, resolveDimensions(ctx.tensor, Array.isArray(over) ? over.map(String) : [String(over)]))

  for (const part of partition(ctx.tensor, kept)) {
    bound(ctx, ruleLabel('at_most_one', part.key), cellTerms(ctx, part.cells), '<=', 1)
  }
}
