import { AssemblyError } from '../errors.js'
import { partition } from '../shape.js'
import type { LinearTerm, RuleContext } from '../types.js'
import { bound, cellTerms, dimensionParam, ruleLabel } from './common.js'

/** Every resource covers the same number of the listed shift types. */
export function equalizedShiftType(ctx: RuleContext): void {
  const resource = dimensionParam(ctx, 'resource', 0)
  const shiftDim = dimensionParam(ctx, 'dim', ctx.tensor.dims.length - 1)
  const rawIds = ctx.params.shift_ids
  if (!Array.isArray(rawIds) || rawIds.length === 0) {
    throw new AssemblyError("Rule 'equalized_shift_type' requires non-empty 'shift_ids'", 'INVALID_RULE_PARAMS', { rule: ctx.entry.rule })
  }
  const ids = new Set(rawIds.map(Number))

  const counts: LinearTerm[][] = partition(ctx.tensor, [resource]).map((part) =>
    cellTerms(ctx, part.cells.filter((cell) => ids.has(cell[shiftDim]))))

  const [first, ...others] = counts
  others.forEach((count, i) => {
    const diff = [...count, ...first.map((t) => ({ variable: t.variable, coefficient: -t.coefficient }))]
    bound(ctx, ruleLabel('equalized_shift_type', [i + 1]), diff, '==', 0)
  })
}
