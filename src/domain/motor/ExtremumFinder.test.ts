import { describe, it, expect } from 'vitest'
import {
  closedFormMaxCurrent,
  findMaxCurrent,
  findOperatingPointMax,
  gridSearchMaxCurrent,
} from './ExtremumFinder'
import { currentDomain, evaluateOperatingPoint, metricOf } from './MotorModel'
import { bruteForceArgMax, makeMotorParameters } from '../test-helpers'
import type { MaximizeTarget } from '../types/Motor'

// Isc = 100 A, so both optima sit inside [1.0001, 80]
const WIDE_DOMAIN = makeMotorParameters({ voltage: 10, noLoadCurrent: 1, maxCurrent: 80, armatureR: 100 })

function scan(target: MaximizeTarget): number {
  const { lower, upper } = currentDomain(WIDE_DOMAIN)
  return bruteForceArgMax(
    current => metricOf(evaluateOperatingPoint(WIDE_DOMAIN, current), target),
    lower,
    upper,
    0.001
  )
}

describe('closedFormMaxCurrent', () => {
  it('puts maximum power halfway between no-load and short-circuit current', () => {
    expect(closedFormMaxCurrent(WIDE_DOMAIN, 'power')).toBeCloseTo(50.5, 9)
  })

  it('puts maximum efficiency at the geometric mean of no-load and short-circuit current', () => {
    expect(closedFormMaxCurrent(WIDE_DOMAIN, 'efficiency')).toBeCloseTo(10, 9)
  })

  it('matches a brute-force scan of output power', () => {
    expect(scan('power')).toBeCloseTo(closedFormMaxCurrent(WIDE_DOMAIN, 'power'), 2)
  })

  it('matches a brute-force scan of efficiency', () => {
    expect(scan('efficiency')).toBeCloseTo(closedFormMaxCurrent(WIDE_DOMAIN, 'efficiency'), 2)
  })

  it('clamps the power optimum to max current when it lies beyond the domain', () => {
    expect(closedFormMaxCurrent(makeMotorParameters(), 'power')).toBe(20)
  })

  it('clamps the efficiency optimum to the domain floor when no-load current is zero', () => {
    const params = makeMotorParameters({ noLoadCurrent: 0 })
    expect(closedFormMaxCurrent(params, 'efficiency')).toBe(currentDomain(params).lower)
  })

  it('handles a zero-resistance winding', () => {
    const params = makeMotorParameters({ armatureR: 0 })
    expect(closedFormMaxCurrent(params, 'power')).toBe(20)
    expect(closedFormMaxCurrent(params, 'efficiency')).toBe(20)
  })
})

describe('gridSearchMaxCurrent', () => {
  it('finds the power optimum at the upper bound when power is still rising', () => {
    expect(gridSearchMaxCurrent(makeMotorParameters(), 'power').current).toBe(20)
  })

  it('lands within one refinement step of the analytic efficiency optimum', () => {
    const params = makeMotorParameters()
    const { current } = gridSearchMaxCurrent(params, 'efficiency')
    expect(Math.abs(current - Math.sqrt(55.5))).toBeLessThan(0.2)
  })

  it('lands within one refinement step of an interior power optimum', () => {
    const { current } = gridSearchMaxCurrent(WIDE_DOMAIN, 'power')
    expect(Math.abs(current - 50.5)).toBeLessThan(0.8)
  })

  it('counts its model evaluations', () => {
    expect(gridSearchMaxCurrent(makeMotorParameters(), 'power').evaluations).toBeGreaterThan(10)
  })
})

describe('findMaxCurrent', () => {
  it('defaults to the closed form', () => {
    expect(findMaxCurrent(WIDE_DOMAIN, 'power')).toBe(closedFormMaxCurrent(WIDE_DOMAIN, 'power'))
  })

  it('uses the grid search when asked', () => {
    const params = makeMotorParameters()
    expect(findMaxCurrent(params, 'efficiency', 'gridSearch'))
      .toBe(gridSearchMaxCurrent(params, 'efficiency').current)
  })
})

describe('findOperatingPointMax', () => {
  const params = makeMotorParameters()

  it('reports the constrained maximum-power point at 20 A', () => {
    const result = findOperatingPointMax(params, 'power')
    expect(result.target).toBe('power')
    expect(result.strategy).toBe('closedForm')
    expect(result.evaluations).toBe(0)
    expect(result.current).toBe(20)
    expect(result.point.powerOut).toBeCloseTo(177.3723885, 5)
  })

  it('reports the maximum-efficiency point near 7.45 A', () => {
    const result = findOperatingPointMax(params, 'efficiency')
    expect(result.current).toBeCloseTo(7.4498322, 6)
    expect(result.point.rpm).toBeCloseTo(10355.0167787, 5)
    expect(result.point.torque).toBeCloseTo(0.0663369825, 9)
    expect(result.point.powerIn).toBeCloseTo(82.6931376, 6)
    expect(result.point.powerOut).toBeCloseTo(71.9341535, 6)
    expect(result.point.efficiency).toBeCloseTo(86.9892661, 6)
  })

  it('reproduces the selected metric when the point is rebuilt from its current', () => {
    for (const target of ['power', 'efficiency'] as const) {
      for (const strategy of ['closedForm', 'gridSearch'] as const) {
        const result = findOperatingPointMax(params, target, strategy)
        const rebuilt = evaluateOperatingPoint(params, result.current)
        expect(metricOf(rebuilt, target)).toBe(metricOf(result.point, target))
      }
    }
  })

  it('never beats the closed-form efficiency with the grid search', () => {
    const closed = findOperatingPointMax(params, 'efficiency', 'closedForm')
    const grid = findOperatingPointMax(params, 'efficiency', 'gridSearch')
    expect(grid.point.efficiency).toBeLessThanOrEqual(closed.point.efficiency + 1e-9)
  })
})
