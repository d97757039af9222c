import { partition } from '../shape.js'
import type { LinearTerm, RuleContext } from '../types.js'
import { bound, cellTerms, dimensionParam, ruleLabel } from './common.js'

/**
 * Every resource works the same number of days. A worked-day indicator is
 * tied to the resource's cells for that day: it is at least each cell and at
 * most their sum.
 */
export function equalDaysWorked(ctx: RuleContext): void {
  const { builder } = ctx
  const resource = dimensionParam(ctx, 'resource', 0)
  const day = dimensionParam(ctx, 'day', Math.min(1, ctx.tensor.dims.length - 1))

  const worked = new Map<number, LinearTerm[]>()
  for (const part of partition(ctx.tensor, [resource, day].sort((a, b) => a - b))) {
    const r = part.cells[0][resource]
    const d = part.cells[0][day]
    const indicator = builder.auxiliary(`equal_days_worked:worked[${r},${d}]`, 'bool', 0, 1)
    const cells = cellTerms(ctx, part.cells)

    for (const cell of cells) {
      builder.constrain(`equal_days_worked:link[${r},${d}]`, [cell, { variable: indicator, coefficient: -1 }], '<=', 0)
    }
    builder.constrain(
      `equal_days_worked:cover[${r},${d}]`,
      [{ variable: indicator, coefficient: 1 }, ...cells.map((t) => ({ variable: t.variable, coefficient: -1 }))],
      '<=',
      0,
    )

    const days = worked.get(r) ?? []
    days.push({ variable: indicator, coefficient: 1 })
    worked.set(r, days)
  }

  const counts = [...worked.values()]
  const [first, ...others] = counts
  others.forEach((count, i) => {
    const diff = [...count, ...first.map((t) => ({ variable: t.variable, coefficient: -1 }))]
    bound(ctx, ruleLabel('equal_days_worked', [i + 1]), diff, '==', 0)
  })
}
