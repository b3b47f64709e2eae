import { describe, it, expect } from 'vitest'
import { calculateMotorReport } from './MotorCalculator'
import { makeMotorParameters } from '../test-helpers'

describe('calculateMotorReport', () => {
  it('reports both operating points for the 1000 Kv 3S motor', () => {
    const result = calculateMotorReport(makeMotorParameters())
    expect(result.ok).toBe(true)
    if (!result.ok) return

    const { report } = result
    expect(report.strategy).toBe('closedForm')
    expect(report.warnings).toEqual([])
    expect(report.maxPower.current).toBe(20)
    expect(report.maxEfficiency.current).toBeCloseTo(7.4498, 4)
    expect(report.maxEfficiency.point.efficiency).toBeGreaterThan(report.maxPower.point.efficiency)
    expect(report.maxPower.point.powerOut).toBeGreaterThan(report.maxEfficiency.point.powerOut)
  })

  it('searches inside the clamped domain', () => {
    const result = calculateMotorReport(makeMotorParameters({ maxCurrent: 200 }))
    expect(result.ok).toBe(true)
    if (!result.ok) return

    expect(result.report.warnings).toHaveLength(1)
    expect(result.report.params.maxCurrent).toBeCloseTo(111.0001, 9)
    // (0.5 + 111) / 2
    expect(result.report.maxPower.current).toBeCloseTo(55.75, 9)
  })

  it('passes the strategy through to both searches', () => {
    const result = calculateMotorReport(makeMotorParameters(), 'gridSearch')
    expect(result.ok).toBe(true)
    if (!result.ok) return

    expect(result.report.strategy).toBe('gridSearch')
    expect(result.report.maxPower.strategy).toBe('gridSearch')
    expect(result.report.maxEfficiency.strategy).toBe('gridSearch')
    expect(result.report.maxEfficiency.evaluations).toBeGreaterThan(0)
  })

  it('returns the validation issue instead of operating points', () => {
    const result = calculateMotorReport(makeMotorParameters({ maxCurrent: 0.5 }))
    expect(result).toEqual({
      ok: false,
      issue: {
        code: 'degenerateDomain',
        message: 'Maximum current is less than, equal to, or very close to unloaded current.',
      },
    })
  })
})
