export class AssemblyError extends Error {
  code: string
  details?: Record<string, unknown>

  constructor(message: string, code = 'ASSEMBLY_ERROR', details?: Record<string, unknown>) {
    super(message)
    this.name = 'AssemblyError'
    this.code = code
    this.details = details
  }
}

export class UnknownConstraintRuleError extends AssemblyError {
  rule: string

  constructor(rule: string, known: string[], hint?: string | null) {
    super(
      `Unknown constraint rule '${rule}'${hint ? ` (did you mean '${hint}'?)` : ''}`,
      'UNKNOWN_CONSTRAINT_RULE',
      { rule, known },
    )
    this.name = 'UnknownConstraintRuleError'
    this.rule = rule
  }
}

export class UnknownRuleParamError extends AssemblyError {
  param: string

  constructor(rule: string, param: string, known: string[], hint?: string | null) {
    super(
      `Rule '${rule}' has unknown param '${param}'${hint ? ` (did you mean '${hint}'?)` : ''}`,
      'INVALID_RULE_PARAMS',
      { rule, param, known },
    )
    this.name = 'UnknownRuleParamError'
    this.param = param
  }
}

export class ShapeMismatchError extends AssemblyError {
  expected: number[]
  actual: number[]

  constructor(subject: string, expected: number[], actual: number[]) {
    super(
      `Shape mismatch for ${subject}: expected [${expected.join(', ')}], got [${actual.join(', ')}]`,
      'SHAPE_MISMATCH',
      { subject, expected, actual },
    )
    this.name = 'ShapeMismatchError'
    this.expected = expected
    this.actual = actual
  }
}

export class LabelMismatchError extends AssemblyError {
  constructor(subject: string, earlier: string, dimension: string, label: string, position: number, expected: number) {
    super(
      `Labels of ${subject} disagree with ${earlier} on dimension '${dimension}': '${label}' is at position ${position}, expected ${expected}`,
      'LABEL_MISMATCH',
      { subject, earlier, dimension, label, position, expected },
    )
    this.name = 'LabelMismatchError'
  }
}

export class UnknownDimensionError extends AssemblyError {
  constructor(dimension: string, tensor: string, dims: string[]) {
    super(
      `Dimension '${dimension}' does not name exactly one dimension of '${tensor}' [${dims.join(', ')}]`,
      'UNKNOWN_DIMENSION',
      { dimension, tensor, dims },
    )
    this.name = 'UnknownDimensionError'
  }
}

export class UnknownObjectiveError extends AssemblyError {
  constructor(quantity: string, known: string[]) {
    super(`Unknown objective quantity '${quantity}'`, 'UNKNOWN_OBJECTIVE', { quantity, known })
    this.name = 'UnknownObjectiveError'
  }
}
