// ═══ Declarations ═══

export type Sense = 'minimize' | 'maximize'
export type Severity = 'hard' | 'soft'
export type VariableType = 'bool' | 'int'
export type Comparator = '==' | '<=' | '>='

export interface VariableDeclaration {
  /** Plain name or name with index letters, e.g. `route[v,s,t]` */
  name: string
  shape: number[]
  dims?: string[]
  type?: VariableType
  lower?: number
  upper?: number
}

export interface ConstraintEntry {
  rule: string
  /** Dimensions the rule iterates over; the rest are summed */
  dims?: string[]
  params?: Record<string, unknown>
  severity?: Severity
  weight?: number
}

export interface ObjectiveEntry {
  sense: Sense
  quantity: string
  params?: Record<string, unknown>
}

export type PenaltyPolicy =
  | { mode: 'additive' }
  | { mode: 'weighted'; weights: Record<string, number> }

/** Shape/data view of an upstream artifact (matrix artifacts satisfy it). */
export interface DataTensor {
  shape: number[]
  data: number[]
  labels?: string[][]
}

export interface AssemblyInput {
  variables: VariableDeclaration[]
  constraints: ConstraintEntry[]
  objective: ObjectiveEntry
  data?: Record<string, DataTensor>
  penaltyPolicy?: PenaltyPolicy
}

// ═══ Assembled model ═══

export interface VariableTensor {
  name: string
  dims: string[]
  shape: number[]
  /** Id of the tensor's first variable */
  offset: number
  size: number
}

export interface DecisionVariable {
  id: number
  name: string
  type: VariableType
  lower: number
  upper: number
  /** Tensor name and cell index; auxiliaries have neither */
  tensor?: string
  index?: number[]
  rule?: string
}

export interface LinearTerm {
  variable: number
  coefficient: number
}

export interface LinearConstraint {
  name: string
  rule: string
  terms: LinearTerm[]
  op: Comparator
  rhs: number
}

export interface PenaltyTerm {
  rule: string
  weight: number
  terms: LinearTerm[]
}

export interface ObjectiveFunction {
  sense: Sense
  quantity: string
  terms: LinearTerm[]
  constant: number
}

export interface ModelStats {
  variables: number
  auxiliary: number
  constraints: number
  constraintsByRule: Record<string, number>
  penaltyTerms: number
}

export interface AssembledModel {
  variables: DecisionVariable[]
  tensors: Record<string, VariableTensor>
  constraints: LinearConstraint[]
  penalties: PenaltyTerm[]
  objective: ObjectiveFunction
  stats: ModelStats
}

// ═══ Rule handlers ═══

export interface ModelBuilder {
  tensor(name?: string): VariableTensor
  variable(tensor: VariableTensor, index: number[]): number
  auxiliary(name: string, type: VariableType, lower: number, upper: number): number
  constrain(name: string, terms: LinearTerm[], op: Comparator, rhs: number): void
  penalize(terms: LinearTerm[]): void
  data(key: string): DataTensor | undefined
  upperBound(terms: LinearTerm[]): number
  /**
   * Checks a data tensor's axis labels against labels seen earlier for the
   * same decision dimensions. `positions[axis]` is the decision dimension of
   * each data axis; `offset` skips leading labels (a depot row).
   */
  alignLabels(subject: string, tensor: VariableTensor, data: DataTensor, positions: number[], offset?: number): void
}

export interface RuleContext {
  builder: ModelBuilder
  entry: ConstraintEntry
  tensor: VariableTensor
  soft: boolean
  params: Record<string, unknown>
}

export type RuleHandler = (ctx: RuleContext) => void

export interface QuantityContext {
  builder: ModelBuilder
  tensor: VariableTensor
  params: Record<string, unknown>
}

export type QuantityHandler = (ctx: QuantityContext) => LinearTerm[]

// ═══ Solver boundary ═══

export type SolveStatus = 'optimal' | 'feasible' | 'infeasible' | 'unbounded' | 'timeout' | 'not_solved'

export interface SolverResult {
  status: SolveStatus
  objectiveValue?: number
  /** Values indexed by variable id */
  values?: number[]
  stats?: Record<string, number>
}

export interface SolverBackend {
  name: string
  solve(model: AssembledModel, options: Record<string, unknown>): Promise<SolverResult> | SolverResult
}
