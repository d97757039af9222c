export { assembleModel, validateConstraintEntries } from './assembler.js'
export { describeModel, evaluateTerms, isSatisfied, objectiveValue, violatedConstraints } from './evaluate.js'
export {
  AssemblyError,
  LabelMismatchError,
  ShapeMismatchError,
  UnknownConstraintRuleError,
  UnknownDimensionError,
  UnknownObjectiveError,
  UnknownRuleParamError,
} from './errors.js'
export { isKnownRule, knownRules, ruleParams } from './rules/index.js'
export { knownQuantities } from './objectives/index.js'
export { cellCount, flatIndex, isDataTensor, parseVariableName, partition } from './shape.js'

export type {
  AssembledModel,
  AssemblyInput,
  Comparator,
  ConstraintEntry,
  DataTensor,
  DecisionVariable,
  LinearConstraint,
  LinearTerm,
  ModelStats,
  ObjectiveEntry,
  ObjectiveFunction,
  PenaltyPolicy,
  PenaltyTerm,
  Sense,
  Severity,
  SolveStatus,
  SolverBackend,
  SolverResult,
  VariableDeclaration,
  VariableTensor,
  VariableType,
} from './types.js'
