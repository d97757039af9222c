import { AssemblyError, LabelMismatchError, UnknownConstraintRuleError, UnknownObjectiveError, UnknownRuleParamError } from './errors.js'
import { knownQuantities, quantityHandler } from './objectives/index.js'
import { PENALTY_ONLY_RULES, isKnownRule, knownRules, ruleHandler, ruleParams } from './rules/index.js'
import { cellCount, flatIndex, parseVariableName } from './shape.js'
import type {
  AssembledModel,
  AssemblyInput,
  Comparator,
  ConstraintEntry,
  DataTensor,
  DecisionVariable,
  LinearConstraint,
  LinearTerm,
  ModelBuilder,
  PenaltyPolicy,
  PenaltyTerm,
  VariableDeclaration,
  VariableTensor,
  VariableType,
} from './types.js'

export function validateConstraintEntries(entries: ConstraintEntry[]): void {
  for (const entry of entries) {
    if (!isKnownRule(entry.rule)) {
      throw new UnknownConstraintRuleError(entry.rule, knownRules())
    }
    const known = ruleParams(entry.rule)
    const unknown = Object.keys(entry.params ?? {}).find((key) => !known.includes(key))
    if (unknown !== undefined) throw new UnknownRuleParamError(entry.rule, unknown, known)
  }
}

function declareTensor(decl: VariableDeclaration, offset: number): { tensor: VariableTensor; variables: DecisionVariable[] } {
  const parsed = parseVariableName(decl.name)
  const shape = decl.shape
  if (shape.length === 0 || shape.some((n) => !Number.isInteger(n) || n <= 0)) {
    throw new AssemblyError(`Variable '${parsed.base}' needs a shape of positive integers`, 'INVALID_VARIABLE', { variable: parsed.base, shape })
  }

  const dims = decl.dims ?? (parsed.dims.length ? parsed.dims : shape.map((_, i) => `d${i}`))
  if (dims.length !== shape.length) {
    throw new AssemblyError(
      `Variable '${parsed.base}' declares ${dims.length} dimensions for a rank-${shape.length} shape`,
      'INVALID_VARIABLE',
      { variable: parsed.base, dims, shape },
    )
  }

  const type: VariableType = decl.type ?? 'bool'
  const lower = type === 'bool' ? 0 : decl.lower ?? 0
  const upper = type === 'bool' ? 1 : decl.upper
  if (upper === undefined || upper < lower) {
    throw new AssemblyError(`Integer variable '${parsed.base}' needs an upper bound >= lower`, 'INVALID_VARIABLE', { variable: parsed.base })
  }

  const tensor: VariableTensor = { name: parsed.base, dims, shape, offset, size: cellCount(shape) }
  const variables: DecisionVariable[] = []
  const index = shape.map(() => 0)
  for (let i = 0; i < tensor.size; i += 1) {
    variables.push({ id: offset + i, name: `${parsed.base}[${index.join(',')}]`, type, lower, upper, tensor: parsed.base, index: [...index] })
    for (let pos = shape.length - 1; pos >= 0; pos -= 1) {
      index[pos] += 1
      if (index[pos] < shape[pos]) break
      index[pos] = 0
    }
  }
  return { tensor, variables }
}

function penaltyWeight(policy: PenaltyPolicy, entry: ConstraintEntry): number {
  if (policy.mode === 'additive') return entry.weight ?? 1
  const weight = policy.weights[entry.rule]
  if (weight === undefined) {
    throw new AssemblyError(
      `Penalty policy 'weighted' has no weight for soft rule '${entry.rule}'`,
      'MISSING_PENALTY_WEIGHT',
      { rule: entry.rule },
    )
  }
  return weight
}

function mergeTerms(terms: LinearTerm[]): LinearTerm[] {
  const merged = new Map<number, number>()
  for (const term of terms) {
    merged.set(term.variable, (merged.get(term.variable) ?? 0) + term.coefficient)
  }
  return [...merged.entries()]
    .filter(([, coefficient]) => coefficient !== 0)
    .map(([variable, coefficient]) => ({ variable, coefficient }))
}

/**
 * Builds the decision-variable model for a set of declarative constraint
 * entries and one objective. Rule names and the objective quantity come from
 * closed registries; nothing is solved here.
 */
export function assembleModel(input: AssemblyInput): AssembledModel {
  if (input.variables.length === 0) {
    throw new AssemblyError('At least one decision variable declaration is required', 'NO_VARIABLES')
  }
  validateConstraintEntries(input.constraints)

  const policy: PenaltyPolicy = input.penaltyPolicy ?? { mode: 'additive' }
  const data: Record<string, DataTensor> = input.data ?? {}
  const variables: DecisionVariable[] = []
  const tensors: Record<string, VariableTensor> = {}
  const constraints: LinearConstraint[] = []
  const penalties: PenaltyTerm[] = []
  const labelsSeen = new Map<string, { subject: string; labels: string[] }>()

  for (const decl of input.variables) {
    const { tensor, variables: cells } = declareTensor(decl, variables.length)
    if (tensors[tensor.name]) {
      throw new AssemblyError(`Duplicate variable '${tensor.name}'`, 'INVALID_VARIABLE', { variable: tensor.name })
    }
    tensors[tensor.name] = tensor
    variables.push(...cells)
  }
  const primary = tensors[parseVariableName(input.variables[0].name).base]

  let current: ConstraintEntry | null = null

  const builder: ModelBuilder = {
    tensor(name?: string): VariableTensor {
      if (name === undefined) return primary
      const tensor = tensors[name]
      if (!tensor) throw new AssemblyError(`Unknown variable '${name}'`, 'UNKNOWN_VARIABLE', { variable: name })
      return tensor
    },
    variable(tensor: VariableTensor, index: number[]): number {
      return tensor.offset + flatIndex(tensor.shape, index)
    },
    auxiliary(name: string, type: VariableType, lower: number, upper: number): number {
      const id = variables.length
      variables.push({ id, name, type, lower, upper, rule: current?.rule })
      return id
    },
    constrain(name: string, terms: LinearTerm[], op: Comparator, rhs: number): void {
      constraints.push({ name, rule: current?.rule ?? 'objective', terms, op, rhs })
    },
    penalize(terms: LinearTerm[]): void {
      if (!current) throw new AssemblyError('Penalty terms can only be added by a rule', 'INTERNAL_ASSEMBLY')
      penalties.push({ rule: current.rule, weight: penaltyWeight(policy, current), terms })
    },
    data(key: string): DataTensor | undefined {
      return data[key]
    },
    upperBound(terms: LinearTerm[]): number {
      return terms.reduce((sum, t) => {
        const v = variables[t.variable]
        return sum + Math.abs(t.coefficient) * Math.max(Math.abs(v.lower), Math.abs(v.upper))
      }, 0)
    },
    alignLabels(subject, tensor, tensorData, positions, offset = 0): void {
      positions.forEach((dim, axis) => {
        const axisLabels = tensorData.labels?.[axis]
        if (!axisLabels || axisLabels.length !== tensor.shape[dim] + offset) return
        const labels = axisLabels.slice(offset)
        const key = `${tensor.name}:${dim}`
        const seen = labelsSeen.get(key)
        if (!seen) {
          labelsSeen.set(key, { subject, labels })
          return
        }
        // disjoint label sets (dates vs day numbers) are not comparable
        const position = new Map(seen.labels.map((label, i) => [label, i]))
        labels.forEach((label, i) => {
          const expected = position.get(label)
          if (expected !== undefined && expected !== i) {
            throw new LabelMismatchError(subject, seen.subject, tensor.dims[dim], label, i, expected)
          }
        })
      })
    },
  }

  for (const entry of input.constraints) {
    const handler = ruleHandler(entry.rule)
    if (!handler) throw new UnknownConstraintRuleError(entry.rule, knownRules())
    const params = entry.params ?? {}
    current = entry
    handler({
      builder,
      entry,
      tensor: builder.tensor(typeof params.variable === 'string' ? params.variable : undefined),
      soft: entry.severity === 'soft' || PENALTY_ONLY_RULES.has(entry.rule),
      params,
    })
  }
  current = null

  const quantity = quantityHandler(input.objective.quantity)
  if (!quantity) throw new UnknownObjectiveError(input.objective.quantity, knownQuantities())
  const objectiveParams = input.objective.params ?? {}
  const base = quantity({
    builder,
    tensor: builder.tensor(typeof objectiveParams.variable === 'string' ? objectiveParams.variable : undefined),
    params: objectiveParams,
  })

  const sign = input.objective.sense === 'minimize' ? 1 : -1
  const penaltyTerms = penalties.flatMap((p) =>
    p.terms.map((t) => ({ variable: t.variable, coefficient: sign * p.weight * t.coefficient })))

  const constraintsByRule: Record<string, number> = {}
  for (const c of constraints) constraintsByRule[c.rule] = (constraintsByRule[c.rule] ?? 0) + 1
  const declared = Object.values(tensors).reduce((n, t) => n + t.size, 0)

  return {
    variables,
    tensors,
    constraints,
    penalties,
    objective: {
      sense: input.objective.sense,
      quantity: input.objective.quantity,
      terms: mergeTerms([...base, ...penaltyTerms]),
      constant: 0,
    },
    stats: {
      variables: variables.length,
      auxiliary: variables.length - declared,
      constraints: constraints.length,
      constraintsByRule,
      penaltyTerms: penalties.reduce((n, p) => n + p.terms.length, 0),
    },
  }
}
