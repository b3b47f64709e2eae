import type { MotorParameters } from './types/Motor'

/** 1000 Kv on 3S, 0.5 A unloaded, 100 mΩ winding, 20 A limit */
export function makeMotorParameters(overrides: Partial<MotorParameters> = {}): MotorParameters {
  return {
    kv: 1000,
    voltage: 11.1,
    noLoadCurrent: 0.5,
    maxCurrent: 20,
    armatureR: 100,
    ...overrides,
  }
}

/** Exhaustive arg-max of `fn` sampled every `step` on [lower, upper] */
export function bruteForceArgMax(
  fn: (x: number) => number,
  lower: number,
  upper: number,
  step: number
): number {
  let best = -Infinity
  let bestX = lower
  const count = Math.floor((upper - lower) / step)
  for (let i = 0; i <= count; i++) {
    const x = lower + i * step
    const value = fn(x)
    if (value > best) {
      best = value
      bestX = x
    }
  }
  return bestX
}
