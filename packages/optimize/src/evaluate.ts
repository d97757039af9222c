import type { AssembledModel, LinearConstraint, LinearTerm } from './types.js'

export function evaluateTerms(terms: LinearTerm[], values: number[]): number {
  return terms.reduce((sum, t) => sum + t.coefficient * (values[t.variable] ?? 0), 0)
}

export function isSatisfied(constraint: LinearConstraint, values: number[]): boolean {
  const lhs = evaluateTerms(constraint.terms, values)
  switch (constraint.op) {
    case '==':
      return lhs === constraint.rhs
    case '<=':
      return lhs <= constraint.rhs
    case '>=':
      return lhs >= constraint.rhs
  }
}

export function violatedConstraints(model: AssembledModel, values: number[]): LinearConstraint[] {
  return model.constraints.filter((c) => !isSatisfied(c, values))
}

export function objectiveValue(model: AssembledModel, values: number[]): number {
  return model.objective.constant + evaluateTerms(model.objective.terms, values)
}

export function describeModel(model: AssembledModel): string[] {
  const lines = [
    `${model.stats.variables} variables (${model.stats.auxiliary} auxiliary)`,
    `${model.stats.constraints} constraints`,
  ]
  for (const [rule, count] of Object.entries(model.stats.constraintsByRule)) {
    lines.push(`  ${rule}: ${count}`)
  }
  lines.push(`${model.stats.penaltyTerms} penalty terms`)
  lines.push(`${model.objective.sense} ${model.objective.quantity} (${model.objective.terms.length} terms)`)
  return lines
}
