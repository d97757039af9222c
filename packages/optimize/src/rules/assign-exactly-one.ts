import { partition } from '../shape.js'
import type { RuleContext } from '../types.js'
import { allButFirst, bound, cellTerms, keptDimensions, ruleLabel } from './common.js'

/** Every cell of the kept dimensions is covered exactly once. */
export function assignExactlyOne(ctx: RuleContext): void {
  const kept = keptDimensions(ctx, allButFirst(ctx))
  for (const part of partition(ctx.tensor, kept)) {
    bound(ctx, ruleLabel('assign_exactly_one', part.key), cellTerms(ctx, part.cells), '==', 1)
  }
}
