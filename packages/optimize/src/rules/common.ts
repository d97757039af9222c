import { AssemblyError } from '../errors.js'
import { isDataTensor, resolveDimension, resolveDimensions } from '../shape.js'
import type { Comparator, DataTensor, LinearTerm, RuleContext } from '../types.js'

export function ruleLabel(rule: string, key: number[]): string {
  return key.length ? `${rule}[${key.join(',')}]` : rule
}

/** Dimensions a rule iterates over, from `dims` on the entry or in params. */
export function keptDimensions(ctx: RuleContext, fallback: number[]): number[] {
  const raw = ctx.entry.dims ?? ctx.params.dims
  const refs = typeof raw === 'string'
    ? raw.split(',').map((d) => d.trim()).filter(Boolean)
    : Array.isArray(raw) ? raw.map(String) : []
  return refs.length ? resolveDimensions(ctx.tensor, refs) : fallback
}

export function allButFirst(ctx: RuleContext): number[] {
  return ctx.tensor.dims.map((_, i) => i).slice(1)
}

export function dimensionParam(ctx: RuleContext, key: string, fallback: number): number {
  const raw = ctx.params[key]
  if (raw === undefined || raw === null) return fallback
  if (typeof raw === 'number' && Number.isInteger(raw) && raw >= 0 && raw < ctx.tensor.dims.length) return raw
  return resolveDimension(ctx.tensor, String(raw))
}

export function numberParam(ctx: RuleContext, key: string, fallback?: number): number {
  const raw = ctx.params[key]
  if (raw === undefined || raw === null) {
    if (fallback !== undefined) return fallback
    throw new AssemblyError(`Rule '${ctx.entry.rule}' requires numeric param '${key}'`, 'INVALID_RULE_PARAMS', { rule: ctx.entry.rule, param: key })
  }
  const value = Number(raw)
  if (!Number.isFinite(value)) {
    throw new AssemblyError(`Rule '${ctx.entry.rule}' param '${key}' must be a number`, 'INVALID_RULE_PARAMS', { rule: ctx.entry.rule, param: key, value: raw })
  }
  return value
}

/**
 * A tensor passed inline (a bound upstream artifact) or by name into the
 * model's data refs.
 */
export function tensorParam(ctx: RuleContext, key: string, dataKey?: string): DataTensor | undefined {
  const raw = ctx.params[key]
  if (isDataTensor(raw)) return raw
  if (typeof raw === 'string') {
    const named = ctx.builder.data(raw)
    if (!named) {
      throw new AssemblyError(`Rule '${ctx.entry.rule}' param '${key}' names unknown data '${raw}'`, 'UNKNOWN_DATA_REF', { rule: ctx.entry.rule, param: key })
    }
    return named
  }
  if (raw !== undefined && raw !== null) {
    throw new AssemblyError(`Rule '${ctx.entry.rule}' param '${key}' must be a matrix artifact or data name`, 'INVALID_RULE_PARAMS', { rule: ctx.entry.rule, param: key })
  }
  return dataKey ? ctx.builder.data(dataKey) : undefined
}

export function requireTensor(ctx: RuleContext, key: string, dataKey?: string): DataTensor {
  const tensor = tensorParam(ctx, key, dataKey)
  if (!tensor) {
    throw new AssemblyError(`Rule '${ctx.entry.rule}' requires '${key}'${dataKey ? ` or data ref '${dataKey}'` : ''}`, 'INVALID_RULE_PARAMS', { rule: ctx.entry.rule, param: key })
  }
  return tensor
}

export function cellTerms(ctx: RuleContext, cells: number[][], coefficient: (cell: number[]) => number = () => 1): LinearTerm[] {
  return cells.map((cell) => ({
    variable: ctx.builder.variable(ctx.tensor, cell),
    coefficient: coefficient(cell),
  }))
}

/**
 * Hard rules emit the constraint as-is. Soft rules relax it with surplus or
 * deficit slack and charge the slack to the objective.
 */
export function bound(ctx: RuleContext, name: string, terms: LinearTerm[], op: Comparator, rhs: number): void {
  const { builder } = ctx
  if (!ctx.soft) {
    builder.constrain(name, terms, op, rhs)
    return
  }

  const slackUpper = builder.upperBound(terms) + Math.abs(rhs)
  const relaxed = [...terms]
  const penalty: LinearTerm[] = []

  if (op === '<=' || op === '==') {
    const surplus = builder.auxiliary(`${name}:surplus`, 'int', 0, slackUpper)
    relaxed.push({ variable: surplus, coefficient: -1 })
    penalty.push({ variable: surplus, coefficient: 1 })
  }
  if (op === '>=' || op === '==') {
    const deficit = builder.auxiliary(`${name}:deficit`, 'int', 0, slackUpper)
    relaxed.push({ variable: deficit, coefficient: 1 })
    penalty.push({ variable: deficit, coefficient: 1 })
  }

  builder.constrain(name, relaxed, op, rhs)
  builder.penalize(penalty)
}
