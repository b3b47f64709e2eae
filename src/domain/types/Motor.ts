/**
 * Nameplate parameters of a brushed/brushless DC motor.
 * All values are already parsed and range-checked.
 */
export interface MotorParameters {
  readonly kv: number // RPM per volt, no load
  readonly voltage: number // V
  readonly noLoadCurrent: number // A
  readonly maxCurrent: number // A, upper bound of the searched current domain
  readonly armatureR: number // mΩ
}

export type MotorParameterKey = keyof MotorParameters

/**
 * Motor state at one armature current
 */
export interface OperatingPoint {
  readonly current: number // A
  readonly rpm: number
  readonly torque: number // N·m
  readonly powerIn: number // W
  readonly powerOut: number // W
  readonly efficiency: number // %
}

/** Metric an extremum search maximizes */
export type MaximizeTarget = 'power' | 'efficiency'

/**
 * How the arg-max current is located:
 * - closedForm: analytic optimum of the series-resistance model, clamped to the domain
 * - gridSearch: coarse-to-fine hill climb, works for any metric
 */
export type ExtremumStrategy = 'closedForm' | 'gridSearch'

export interface CurrentDomain {
  lower: number
  upper: number
}

export interface MaximumSearchResult {
  target: MaximizeTarget
  strategy: ExtremumStrategy
  current: number
  point: OperatingPoint
  /** Model evaluations spent by the search (0 for closed form) */
  evaluations: number
}

export type ValidationIssueCode = 'degenerateDomain' | 'openCircuitAtMinimum' | 'maxCurrentClamped'

interface BaseValidationIssue {
  code: ValidationIssueCode
  message: string
}

export interface FatalValidationIssue extends BaseValidationIssue {
  code: 'degenerateDomain' | 'openCircuitAtMinimum'
}

export interface ClampWarning extends BaseValidationIssue {
  code: 'maxCurrentClamped'
  originalMaxCurrent: number
  clampedMaxCurrent: number
}

export type ValidationIssue = FatalValidationIssue | ClampWarning

export type MotorValidationResult =
  | { ok: true; params: MotorParameters; warnings: ClampWarning[] }
  | { ok: false; issue: FatalValidationIssue }

/**
 * Both characteristic operating points of one calculation run
 */
export interface MotorReport {
  params: MotorParameters
  strategy: ExtremumStrategy
  maxPower: MaximumSearchResult
  maxEfficiency: MaximumSearchResult
  warnings: ClampWarning[]
}

export type MotorCalculationResult =
  | { ok: true; report: MotorReport }
  | { ok: false; issue: FatalValidationIssue }
