import { describe, expect, it } from 'vitest'
import { assembleModel, ruleParams, UnknownRuleParamError } from '../src/index.js'
import type { ConstraintEntry } from '../src/index.js'

function nurses(constraints: ConstraintEntry[]) {
  return assembleModel({
    variables: [{ name: 'x[nurse,day,shift]', shape: [4, 3, 3] }],
    constraints,
    objective: { sense: 'minimize', quantity: 'total_penalty' },
  })
}

describe('workload_balance', () => {
  it('bounds each resource between an even split minus and plus the tolerance', () => {
    const model = nurses([{ rule: 'workload_balance', params: { tolerance: 1 } }])
    expect(model.constraints).toHaveLength(8)

    const [min, max] = model.constraints
    expect(min).toMatchObject({ name: 'workload_balance[0]:min', op: '>=', rhs: 1 })
    expect(max).toMatchObject({ name: 'workload_balance[0]:max', op: '<=', rhs: 4 })
    expect(min.terms).toHaveLength(9)
  })

  it('relaxes into penalised slack when soft', () => {
    const model = nurses([{ rule: 'workload_balance', severity: 'soft', weight: 3 }])
    expect(model.constraints).toHaveLength(8)
    expect(model.stats.auxiliary).toBe(8)
    expect(model.penalties).toHaveLength(8)
    expect(model.penalties[0]).toMatchObject({ rule: 'workload_balance', weight: 3 })
    expect(model.objective.terms.every((t) => t.coefficient === 3)).toBe(true)
  })
})

describe('at_most_one', () => {
  it('sums over the dimension named by over', () => {
    const model = nurses([{ rule: 'at_most_one', params: { over: 'shift' } }])
    expect(model.constraints).toHaveLength(12)
    expect(model.constraints[0]).toMatchObject({ name: 'at_most_one[0,0]', op: '<=', rhs: 1 })
    expect(model.constraints[0].terms.map((t) => t.variable)).toEqual([0, 1, 2])
  })
})

describe('at_most_one with dimension', () => {
  it('accepts dimension as the summed dimension', () => {
    const model = nurses([{ rule: 'at_most_one', params: { dimension: 'shift' } }])
    expect(model.constraints).toHaveLength(12)
    expect(model.constraints[11]).toMatchObject({ name: 'at_most_one[3,2]', op: '<=', rhs: 1 })
    expect(model.constraints[11].terms.map((t) => t.variable)).toEqual([33, 34, 35])
  })

  it('rejects a dimension the variable does not have', () => {
    expect(() => nurses([{ rule: 'at_most_one', params: { dimension: 'week' } }])).toThrow(
      "Dimension 'week' does not name exactly one dimension of 'x' [nurse, day, shift]",
    )
  })
})

describe('rule params', () => {
  it('rejects params the rule does not read', () => {
    expect(() => nurses([{ rule: 'workload_balance', params: { tolerence: 5 } }])).toThrow(UnknownRuleParamError)
    expect(() => nurses([{ rule: 'workload_balance', params: { tolerence: 5 } }])).toThrow(
      "Rule 'workload_balance' has unknown param 'tolerence'",
    )
  })

  it('lists shared and rule-specific params', () => {
    expect(ruleParams('workload_balance')).toEqual(['variable', 'dims', 'resource', 'tolerance'])
    expect(ruleParams('no_such_rule')).toEqual([])
  })
})

describe('equal_days_worked', () => {
  it('links a worked-day indicator to each resource and day', () => {
    const model = assembleModel({
      variables: [{ name: 'x[nurse,day,shift]', shape: [2, 2, 2] }],
      constraints: [{ rule: 'equal_days_worked' }],
      objective: { sense: 'minimize', quantity: 'total_assignments' },
    })
    expect(model.stats.auxiliary).toBe(4)
    expect(model.constraints).toHaveLength(13)
    expect(model.stats.constraintsByRule).toEqual({ equal_days_worked: 13 })
  })
})

describe('equalized_shift_type', () => {
  it('equates every resource count with the first resource', () => {
    const model = assembleModel({
      variables: [{ name: 'x[nurse,day,shift]', shape: [3, 2, 3] }],
      constraints: [{ rule: 'equalized_shift_type', params: { shift_ids: [2] } }],
      objective: { sense: 'minimize', quantity: 'total_assignments' },
    })
    expect(model.constraints).toHaveLength(2)
    expect(model.constraints[0]).toMatchObject({ name: 'equalized_shift_type[1]', op: '==', rhs: 0 })
    expect(model.constraints[0].terms).toEqual([
      { variable: 8, coefficient: 1 },
      { variable: 11, coefficient: 1 },
      { variable: 2, coefficient: -1 },
      { variable: 5, coefficient: -1 },
    ])
  })
})

describe('capacity rules', () => {
  const shape = [2, 3, 2]

  it('max_shift caps hours per resource and period', () => {
    const model = assembleModel({
      variables: [{ name: 'route[v,s,t]', shape }],
      constraints: [{ rule: 'max_shift', params: { hours: 2 } }],
      objective: { sense: 'minimize', quantity: 'total_assignments' },
    })
    expect(model.constraints).toHaveLength(4)
    expect(model.constraints[0]).toMatchObject({ name: 'max_shift[0,0]', op: '<=', rhs: 2 })
    expect(model.constraints[0].terms).toEqual([
      { variable: 0, coefficient: 1 },
      { variable: 2, coefficient: 1 },
      { variable: 4, coefficient: 1 },
    ])
  })

  it('vehicle_capacity weights cells by demand', () => {
    const model = assembleModel({
      variables: [{ name: 'route[v,s,t]', shape }],
      constraints: [{ rule: 'vehicle_capacity', params: { capacity: 5 } }],
      objective: { sense: 'maximize', quantity: 'total_demand_served' },
      data: { demand: { shape: [3, 2], data: [1, 2, 3, 4, 5, 6] } },
    })
    expect(model.constraints).toHaveLength(4)
    expect(model.constraints[0].terms).toEqual([
      { variable: 0, coefficient: 1 },
      { variable: 2, coefficient: 3 },
      { variable: 4, coefficient: 5 },
    ])
    expect(model.objective.terms[0]).toEqual({ variable: 0, coefficient: 1 })
  })

  it('vehicle_capacity requires a demand tensor', () => {
    expect(() => assembleModel({
      variables: [{ name: 'route[v,s,t]', shape }],
      constraints: [{ rule: 'vehicle_capacity', params: { capacity: 5 } }],
      objective: { sense: 'minimize', quantity: 'total_assignments' },
    })).toThrow("Rule 'vehicle_capacity' requires 'demand' or data ref 'demand'")
  })
})
