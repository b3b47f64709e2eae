import { describe, it, expect } from 'vitest'
import {
  armatureDrop,
  currentDomain,
  evaluateOperatingPoint,
  metricOf,
  shortCircuitCurrent,
  torqueConstant,
  wattsToHorsepower,
} from './MotorModel'
import { makeMotorParameters } from '../test-helpers'

describe('torqueConstant', () => {
  it('is inversely proportional to Kv', () => {
    expect(torqueConstant(1000)).toBeCloseTo(1.352, 12)
    expect(torqueConstant(1000) * 1000).toBeCloseTo(torqueConstant(2000) * 2000, 12)
  })
})

describe('shortCircuitCurrent', () => {
  it('is supply voltage over armature resistance', () => {
    expect(shortCircuitCurrent(makeMotorParameters())).toBeCloseTo(111, 9)
  })

  it('is infinite for a zero-resistance winding', () => {
    expect(shortCircuitCurrent(makeMotorParameters({ armatureR: 0 }))).toBe(Infinity)
  })
})

describe('armatureDrop', () => {
  it('converts milliohms to volts', () => {
    expect(armatureDrop(makeMotorParameters(), 20)).toBeCloseTo(2, 12)
  })
})

describe('currentDomain', () => {
  it('starts just above no-load current and ends at max current', () => {
    const domain = currentDomain(makeMotorParameters())
    expect(domain.lower).toBeCloseTo(0.5001, 12)
    expect(domain.upper).toBe(20)
  })
})

describe('evaluateOperatingPoint', () => {
  const params = makeMotorParameters()

  it('computes every quantity at 20 A', () => {
    const point = evaluateOperatingPoint(params, 20)
    expect(point.current).toBe(20)
    expect(point.rpm).toBeCloseTo(9100, 6)
    expect(point.torque).toBeCloseTo(0.18612984, 9)
    expect(point.powerIn).toBeCloseTo(222, 9)
    expect(point.powerOut).toBeCloseTo(177.3723885, 5)
    expect(point.efficiency).toBeCloseTo(79.8974723, 5)
  })

  it('derives output power from torque and angular velocity', () => {
    const point = evaluateOperatingPoint(params, 10)
    expect(point.powerOut).toBeCloseTo(point.torque * point.rpm * 2 * Math.PI / 60, 9)
    expect(point.efficiency).toBeCloseTo(100 * point.powerOut / point.powerIn, 9)
  })

  it('has zero torque at the no-load current', () => {
    const point = evaluateOperatingPoint(params, params.noLoadCurrent)
    expect(point.torque).toBe(0)
    expect(point.powerOut).toBe(0)
  })

  it('returns negative torque below no-load current instead of failing', () => {
    expect(evaluateOperatingPoint(params, 0.25).torque).toBeLessThan(0)
  })

  it('is idempotent', () => {
    expect(evaluateOperatingPoint(params, 7.3)).toEqual(evaluateOperatingPoint(params, 7.3))
  })

  it('has strictly decreasing rpm and strictly increasing torque over the domain', () => {
    const { lower, upper } = currentDomain(params)
    let previous = evaluateOperatingPoint(params, lower)
    for (let i = 1; i <= 200; i++) {
      const point = evaluateOperatingPoint(params, lower + (i * (upper - lower)) / 200)
      expect(point.rpm).toBeLessThan(previous.rpm)
      expect(point.torque).toBeGreaterThan(previous.torque)
      previous = point
    }
  })
})

describe('metricOf', () => {
  it('selects output power or efficiency', () => {
    const point = evaluateOperatingPoint(makeMotorParameters(), 12)
    expect(metricOf(point, 'power')).toBe(point.powerOut)
    expect(metricOf(point, 'efficiency')).toBe(point.efficiency)
  })
})

describe('wattsToHorsepower', () => {
  it('uses the mechanical horsepower factor', () => {
    expect(wattsToHorsepower(745.69987158227022)).toBe(1)
    expect(wattsToHorsepower(1000)).toBeCloseTo(1.34102, 5)
  })
})
