import { describe, expect, it } from 'vitest'
import { cellCount, flatIndex, parseVariableName, partition } from '../src/index.js'

describe('shape helpers', () => {
  it('parses index letters out of a variable name', () => {
    expect(parseVariableName('route[v, s, t]')).toEqual({ base: 'route', dims: ['v', 's', 't'] })
    expect(parseVariableName('assign')).toEqual({ base: 'assign', dims: [] })
  })

  it('computes row-major flat indexes', () => {
    expect(cellCount([4, 25, 3])).toBe(300)
    expect(flatIndex([4, 25, 3], [1, 2, 1])).toBe(82)
  })

  it('partitions cells by the kept dimensions', () => {
    const parts = partition({ name: 'x', dims: ['a', 'b'], shape: [2, 3], offset: 0, size: 6 }, [1])
    expect(parts.map((p) => p.key)).toEqual([[0], [1], [2]])
    expect(parts[1].cells).toEqual([[0, 1], [1, 1]])
  })
})
