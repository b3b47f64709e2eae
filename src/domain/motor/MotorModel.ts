import type { CurrentDomain, MaximizeTarget, MotorParameters, OperatingPoint } from '../types/Motor'
import {
  CURRENT_EPSILON,
  KT_KV_PRODUCT,
  OZF_IN_TO_NM,
  RPM_TO_RAD_PER_S,
  WATTS_PER_HORSEPOWER,
} from './constants'

/**
 * Torque constant in ozf·in/A for a winding with the given Kv
 */
export function torqueConstant(kv: number): number {
  return KT_KV_PRODUCT / kv
}

/**
 * Current at which the armature drop equals the supply voltage.
 * Infinite for a zero-resistance winding.
 */
export function shortCircuitCurrent(params: MotorParameters): number {
  if (params.armatureR <= 0) return Infinity
  return (1000 * params.voltage) / params.armatureR
}

/** Voltage lost across the armature at `current` (V) */
export function armatureDrop(params: MotorParameters, current: number): number {
  return (current * params.armatureR) / 1000
}

export function currentDomain(params: MotorParameters): CurrentDomain {
  return {
    lower: params.noLoadCurrent + CURRENT_EPSILON,
    upper: params.maxCurrent,
  }
}

/**
 * Evaluates every derived quantity at one armature current.
 *
 * Pure arithmetic: a current outside the domain is not rejected, it simply
 * yields negative torque or rpm. Callers keep `current` inside
 * {@link currentDomain}.
 */
export function evaluateOperatingPoint(params: MotorParameters, current: number): OperatingPoint {
  const kt = torqueConstant(params.kv)

  const rpm = params.kv * (params.voltage - armatureDrop(params, current))
  const torque = kt * (current - params.noLoadCurrent) * OZF_IN_TO_NM
  const powerOut = torque * rpm * RPM_TO_RAD_PER_S
  const powerIn = params.voltage * current
  const efficiency = (powerOut / powerIn) * 100

  return { current, rpm, torque, powerIn, powerOut, efficiency }
}

/** Value of the maximized metric at one operating point */
export function metricOf(point: OperatingPoint, target: MaximizeTarget): number {
  return target === 'power' ? point.powerOut : point.efficiency
}

export function wattsToHorsepower(watts: number): number {
  return watts / WATTS_PER_HORSEPOWER
}
