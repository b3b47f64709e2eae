import type {
  ExtremumStrategy,
  MaximizeTarget,
  MaximumSearchResult,
  MotorParameters,
} from '../types/Motor'
import { gridSearchMax, type GridSearchOptions } from '../utils/GridSearch'
import { currentDomain, evaluateOperatingPoint, metricOf, shortCircuitCurrent } from './MotorModel'

function clamp(value: number, lower: number, upper: number): number {
  return Math.min(Math.max(value, lower), upper)
}

/**
 * Analytic arg-max of the series-resistance model.
 *
 * Output power ∝ (I − I0)(Isc − I) peaks halfway between I0 and Isc.
 * Efficiency ∝ (I − I0)(Isc − I) / I peaks at √(I0 · Isc).
 * Both are unimodal, so clamping the peak to the domain gives the constrained maximum.
 */
export function closedFormMaxCurrent(params: MotorParameters, target: MaximizeTarget): number {
  const { lower, upper } = currentDomain(params)
  const isc = shortCircuitCurrent(params)

  let peak: number
  if (target === 'power') {
    peak = (params.noLoadCurrent + isc) / 2
  } else {
    // With no losses at no load, efficiency only falls as current rises (0 · ∞ is NaN otherwise)
    peak = params.noLoadCurrent > 0 ? Math.sqrt(params.noLoadCurrent * isc) : lower
  }

  return clamp(peak, lower, Math.max(lower, upper))
}

/**
 * Grid-search arg-max, evaluating the motor model at every candidate current
 */
export function gridSearchMaxCurrent(
  params: MotorParameters,
  target: MaximizeTarget,
  options?: GridSearchOptions
): { current: number; evaluations: number } {
  const { lower, upper } = currentDomain(params)
  const result = gridSearchMax(
    current => metricOf(evaluateOperatingPoint(params, current), target),
    lower,
    upper,
    options
  )
  return { current: result.argMax, evaluations: result.evaluations }
}

/**
 * Current at which `target` is maximal over [noLoadCurrent + ε, maxCurrent].
 * Expects parameters that already passed validation.
 */
export function findMaxCurrent(
  params: MotorParameters,
  target: MaximizeTarget,
  strategy: ExtremumStrategy = 'closedForm'
): number {
  return findOperatingPointMax(params, target, strategy).current
}

/**
 * Locates the maximum and evaluates the operating point there
 */
export function findOperatingPointMax(
  params: MotorParameters,
  target: MaximizeTarget,
  strategy: ExtremumStrategy = 'closedForm'
): MaximumSearchResult {
  let current: number
  let evaluations = 0

  if (strategy === 'closedForm') {
    current = closedFormMaxCurrent(params, target)
  } else {
    const search = gridSearchMaxCurrent(params, target)
    current = search.current
    evaluations = search.evaluations
  }

  return {
    target,
    strategy,
    current,
    point: evaluateOperatingPoint(params, current),
    evaluations,
  }
}
