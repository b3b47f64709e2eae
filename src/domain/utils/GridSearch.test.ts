import { describe, it, expect } from 'vitest'
import { gridSearchMax } from './GridSearch'

describe('gridSearchMax', () => {
  it('stops after a pass with no improvement when a coarse sample hits the peak', () => {
    const result = gridSearchMax(x => -((x - 3) ** 2), 0, 10)
    expect(result.argMax).toBe(3)
    expect(result.value).toBeCloseTo(0, 12)
    expect(result.passes).toBe(2)
    // 11 coarse samples on [0, 10], then 21 samples on [2, 4]
    expect(result.evaluations).toBe(32)
  })

  it('refines toward an interior peak between grid points', () => {
    const result = gridSearchMax(x => -((x - 0.37) ** 2), 0, 1)
    expect(result.argMax).toBeCloseTo(0.37, 6)
  })

  it('returns the upper bound for an increasing function', () => {
    const result = gridSearchMax(x => 2 * x + 1, 1, 5)
    expect(result.argMax).toBe(5)
    expect(result.value).toBe(11)
  })

  it('returns the lower bound for a decreasing function', () => {
    const result = gridSearchMax(x => -x, 1, 5)
    expect(result.argMax).toBe(1)
  })

  it('narrows the window until both sides are within tolerance', () => {
    const peak = Math.SQRT2
    const result = gridSearchMax(x => -Math.abs(x - peak), 0, 4, { tolerance: 1e-6 })
    expect(Math.abs(result.argMax - peak)).toBeLessThan(1e-5)
  })

  it('honours a custom step count', () => {
    const result = gridSearchMax(x => x, 0, 1, { steps: 4 })
    // 5 samples on the first pass; the second pass brings nothing new
    expect(result.passes).toBe(2)
    expect(result.argMax).toBe(1)
  })

  it('evaluates only the lower bound of an empty interval', () => {
    const result = gridSearchMax(x => x * x, 2, 2)
    expect(result).toEqual({ argMax: 2, value: 4, passes: 0, evaluations: 1 })
  })
})
