import type {
  ClampWarning,
  FatalValidationIssue,
  MotorParameters,
  MotorValidationResult,
} from '../types/Motor'
import { CURRENT_EPSILON, MIN_CURRENT_SPAN, SPAN_ROUNDING_SLACK } from './constants'
import { armatureDrop } from './MotorModel'

function degenerateDomainIssue(): FatalValidationIssue {
  return {
    code: 'degenerateDomain',
    message: 'Maximum current is less than, equal to, or very close to unloaded current.',
  }
}

export function hasDegenerateDomain(params: MotorParameters): boolean {
  return params.maxCurrent - params.noLoadCurrent <= MIN_CURRENT_SPAN + SPAN_ROUNDING_SLACK
}

/**
 * Checks that a current domain exists and that the motor can conduct in it.
 *
 * - Degenerate domain (maxCurrent within 0.01 A of no-load current): fatal
 * - Armature drop above supply voltage at the domain floor: fatal
 * - Armature drop at or above supply voltage at maxCurrent: maxCurrent is
 *   lowered to the voltage-limited current and a warning is returned
 *
 * Never mutates `params`; the returned `params` carries any clamped maxCurrent.
 */
export function validateMotorInputs(params: MotorParameters): MotorValidationResult {
  if (hasDegenerateDomain(params)) {
    return { ok: false, issue: degenerateDomainIssue() }
  }

  if (armatureDrop(params, params.noLoadCurrent + CURRENT_EPSILON) > params.voltage) {
    return {
      ok: false,
      issue: {
        code: 'openCircuitAtMinimum',
        message: 'At minimum current or barely above, the motor would be an open circuit (Vdrop > Vin).',
      },
    }
  }

  const warnings: ClampWarning[] = []
  let validated = params

  if (armatureDrop(params, params.maxCurrent) >= params.voltage) {
    const clampedMaxCurrent = params.voltage / (params.armatureR / 1000) + CURRENT_EPSILON
    warnings.push({
      code: 'maxCurrentClamped',
      message: `At maximum current, the motor would be an open circuit (Vdrop > Vin). Maximum current has been reduced to ${clampedMaxCurrent.toFixed(2)} A.`,
      originalMaxCurrent: params.maxCurrent,
      clampedMaxCurrent,
    })
    validated = { ...params, maxCurrent: clampedMaxCurrent }

    if (hasDegenerateDomain(validated)) {
      return { ok: false, issue: degenerateDomainIssue() }
    }
  }

  return { ok: true, params: validated, warnings }
}
