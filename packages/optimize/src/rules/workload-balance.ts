import { partition } from '../shape.js'
import type { RuleContext } from '../types.js'
import { bound, cellTerms, dimensionParam, numberParam, ruleLabel } from './common.js'

/**
 * Keeps each resource's total within `tolerance` of an even split of the
 * cells it could cover.
 */
export function workloadBalance(ctx: RuleContext): void {
  const resource = dimensionParam(ctx, 'resource', 0)
  const tolerance = numberParam(ctx, 'tolerance', 1)
  const resources = ctx.tensor.shape[resource]
  const perResource = ctx.tensor.size / resources

  const even = Math.floor(perResource / resources)
  const lo = Math.max(0, even - tolerance)
  const hi = even + (perResource % resources ? 1 : 0) + tolerance

  for (const part of partition(ctx.tensor, [resource])) {
    const terms = cellTerms(ctx, part.cells)
    bound(ctx, `${ruleLabel('workload_balance', part.key)}:min`, terms, '>=', lo)
    bound(ctx, `${ruleLabel('workload_balance', part.key)}:max`, terms, '<=', hi)
  }
}
