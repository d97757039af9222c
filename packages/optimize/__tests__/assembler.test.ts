import { describe, expect, it } from 'vitest'
import {
  assembleModel,
  AssemblyError,
  LabelMismatchError,
  ShapeMismatchError,
  UnknownConstraintRuleError,
  UnknownDimensionError,
  UnknownObjectiveError,
  violatedConstraints,
  objectiveValue,
} from '../src/index.js'
import type { AssemblyInput } from '../src/index.js'

const routing = (overrides: Partial<AssemblyInput> = {}): AssemblyInput => ({
  variables: [{ name: 'route[v,s,t]', shape: [4, 25, 3], dims: ['vehicle', 'store', 'time'] }],
  constraints: [],
  objective: { sense: 'minimize', quantity: 'total_assignments' },
  ...overrides,
})

describe('assembleModel', () => {
  it('allocates one boolean variable per cell', () => {
    const model = assembleModel(routing())
    expect(model.variables).toHaveLength(300)
    expect(model.variables[0]).toMatchObject({ id: 0, name: 'route[0,0,0]', type: 'bool', lower: 0, upper: 1 })
    expect(model.variables[299].name).toBe('route[3,24,2]')
    expect(model.tensors.route).toEqual({
      name: 'route',
      dims: ['vehicle', 'store', 'time'],
      shape: [4, 25, 3],
      offset: 0,
      size: 300,
    })
  })

  it('assign_exactly_one over store,time yields one constraint per (store, time) pair', () => {
    const model = assembleModel(routing({
      constraints: [{ rule: 'assign_exactly_one', dims: ['store', 'time'] }],
    }))

    expect(model.constraints).toHaveLength(25 * 3)
    expect(model.stats.constraintsByRule).toEqual({ assign_exactly_one: 75 })
    const first = model.constraints[0]
    expect(first.name).toBe('assign_exactly_one[0,0]')
    expect(first.op).toBe('==')
    expect(first.rhs).toBe(1)
    expect(first.terms).toEqual([
      { variable: 0, coefficient: 1 },
      { variable: 75, coefficient: 1 },
      { variable: 150, coefficient: 1 },
      { variable: 225, coefficient: 1 },
    ])
  })

  it('resolves dimension names from the indexed variable name by prefix', () => {
    const model = assembleModel(routing({
      variables: [{ name: 'route[v,s,t]', shape: [4, 25, 3] }],
      constraints: [{ rule: 'assign_exactly_one', dims: ['store', 'time'] }],
    }))
    expect(model.tensors.route.dims).toEqual(['v', 's', 't'])
    expect(model.constraints).toHaveLength(75)
  })

  it('defaults assign_exactly_one to every dimension but the first', () => {
    const model = assembleModel(routing({ constraints: [{ rule: 'assign_exactly_one' }] }))
    expect(model.constraints).toHaveLength(75)
  })

  it('rejects unknown rules before building anything', () => {
    expect(() => assembleModel(routing({
      constraints: [{ rule: 'assign_exactly_one' }, { rule: 'assign_exactly_two' }],
    }))).toThrow(UnknownConstraintRuleError)
  })

  it('rejects dimension names that match nothing', () => {
    expect(() => assembleModel(routing({
      constraints: [{ rule: 'assign_exactly_one', dims: ['zone'] }],
    }))).toThrow(UnknownDimensionError)
  })

  it('rejects unknown objective quantities', () => {
    expect(() => assembleModel(routing({
      objective: { sense: 'minimize', quantity: 'total_happiness' },
    }))).toThrow(UnknownObjectiveError)
  })

  it('rejects dims that do not match the shape rank', () => {
    try {
      assembleModel(routing({ variables: [{ name: 'x', shape: [2, 2], dims: ['a'] }] }))
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(AssemblyError)
      expect((err as AssemblyError).code).toBe('INVALID_VARIABLE')
    }
  })

  it('builds round-trip distance coefficients with the depot at row 0', () => {
    const model = assembleModel({
      variables: [{ name: 'route[v,s,t]', shape: [1, 2, 1] }],
      constraints: [],
      objective: { sense: 'minimize', quantity: 'total_distance_km' },
      data: { distance: { shape: [3, 3], data: [0, 10, 20, 10, 0, 5, 20, 5, 0] } },
    })
    expect(model.objective.terms).toEqual([
      { variable: 0, coefficient: 20 },
      { variable: 1, coefficient: 40 },
    ])
    expect(objectiveValue(model, [1, 1])).toBe(60)
  })

  it('reports a distance matrix that fits no stop count', () => {
    try {
      assembleModel({
        variables: [{ name: 'route[v,s,t]', shape: [1, 2, 1] }],
        constraints: [],
        objective: { sense: 'minimize', quantity: 'total_distance' },
        data: { distance: { shape: [4, 4], data: new Array<number>(16).fill(1) } },
      })
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(ShapeMismatchError)
      expect((err as ShapeMismatchError).expected).toEqual([3, 3])
      expect((err as ShapeMismatchError).actual).toEqual([4, 4])
    }
  })

  it('lists violated constraints for a candidate assignment', () => {
    const model = assembleModel({
      variables: [{ name: 'x[nurse,shift]', shape: [2, 2] }],
      constraints: [{ rule: 'assign_exactly_one' }],
      objective: { sense: 'minimize', quantity: 'total_assignments' },
    })
    expect(violatedConstraints(model, [1, 0, 0, 1])).toEqual([])
    expect(violatedConstraints(model, [1, 0, 1, 0]).map((c) => c.name)).toEqual([
      'assign_exactly_one[0]',
      'assign_exactly_one[1]',
    ])
  })
})

describe('penalty policy', () => {
  const weatherInput = (overrides: Partial<AssemblyInput> = {}): AssemblyInput => ({
    variables: [{ name: 'route[v,s,t]', shape: [2, 3, 2] }],
    constraints: [{
      rule: 'weather_penalty',
      params: {
        wx_ref: { shape: [3, 2], data: [0.1, 0.5, 0.2, 0.1, 0.9, 0.0] },
        threshold: 0.3,
        penalty: 50,
      },
    }],
    objective: { sense: 'minimize', quantity: 'total_penalty' },
    ...overrides,
  })

  it('adds penalty terms for cells above the risk threshold', () => {
    const model = assembleModel(weatherInput())
    expect(model.constraints).toEqual([])
    expect(model.stats.penaltyTerms).toBe(4)
    expect(model.objective.terms).toEqual([
      { variable: 1, coefficient: 50 },
      { variable: 7, coefficient: 50 },
      { variable: 4, coefficient: 50 },
      { variable: 10, coefficient: 50 },
    ])
  })

  it('scales penalties by explicit weights in weighted mode', () => {
    const model = assembleModel(weatherInput({
      penaltyPolicy: { mode: 'weighted', weights: { weather_penalty: 2 } },
    }))
    expect(model.objective.terms.map((t) => t.coefficient)).toEqual([100, 100, 100, 100])
  })

  it('subtracts penalties when maximizing', () => {
    const model = assembleModel(weatherInput({
      objective: { sense: 'maximize', quantity: 'total_penalty' },
    }))
    expect(model.objective.terms.map((t) => t.coefficient)).toEqual([-50, -50, -50, -50])
  })

  it('requires a weight for every penalising rule in weighted mode', () => {
    try {
      assembleModel(weatherInput({ penaltyPolicy: { mode: 'weighted', weights: {} } }))
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(AssemblyError)
      expect((err as AssemblyError).code).toBe('MISSING_PENALTY_WEIGHT')
    }
  })

  it('names both shapes when the risk scores do not fit the decision shape', () => {
    expect(() => assembleModel(weatherInput({
      constraints: [{
        rule: 'weather_penalty',
        params: { wx_ref: { shape: [4, 2], data: new Array<number>(8).fill(1) }, threshold: 0.3 },
      }],
    }))).toThrow('Shape mismatch for weather_penalty risk scores: expected [3, 2], got [4, 2]')
  })
})

describe('data labels', () => {
  const labelled = (riskStores: string[], distanceLabels?: string[]): AssemblyInput => ({
    variables: [{ name: 'route[v,s,t]', shape: [1, 2, 1] }],
    constraints: [
      { rule: 'vehicle_capacity', params: { capacity: 10, demand: { shape: [2, 1], data: [3, 4], labels: [['s1', 's2'], ['2024-03-15']] } } },
      { rule: 'weather_penalty', params: { wx_ref: { shape: [2, 1], data: [0.9, 0.1], labels: [riskStores, ['day1']] }, threshold: 0.5 } },
    ],
    objective: { sense: 'minimize', quantity: 'total_distance' },
    data: {
      distance: { shape: [3, 3], data: [0, 1, 2, 1, 0, 3, 2, 3, 0], labels: distanceLabels ? [distanceLabels, distanceLabels] : undefined },
    },
  })

  it('accepts tensors whose labels agree or do not overlap', () => {
    const model = assembleModel(labelled(['s1', 's2'], ['depot', 's1', 's2']))
    expect(model.stats.constraintsByRule).toEqual({ vehicle_capacity: 1 })
    expect(model.penalties).toHaveLength(1)
  })

  it('rejects a tensor listing the same stores in another order', () => {
    expect(() => assembleModel(labelled(['s2', 's1']))).toThrow(LabelMismatchError)
    expect(() => assembleModel(labelled(['s2', 's1']))).toThrow(
      "Labels of weather_penalty risk scores disagree with vehicle_capacity demand on dimension 's': 's2' is at position 0, expected 1",
    )
  })

  it('skips the depot row of a distance matrix before comparing', () => {
    expect(() => assembleModel(labelled(['s1', 's2'], ['depot', 's2', 's1']))).toThrow(
      "Labels of total_distance distance matrix disagree with vehicle_capacity demand on dimension 's': 's2' is at position 0, expected 1",
    )
  })
})
