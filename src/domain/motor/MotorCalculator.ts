import type { ExtremumStrategy, MotorCalculationResult, MotorParameters } from '../types/Motor'
import { findOperatingPointMax } from './ExtremumFinder'
import { validateMotorInputs } from './MotorInputValidation'

/**
 * Validates the nameplate values and locates both characteristic points:
 * maximum output power and maximum efficiency.
 */
export function calculateMotorReport(
  params: MotorParameters,
  strategy: ExtremumStrategy = 'closedForm'
): MotorCalculationResult {
  const validation = validateMotorInputs(params)
  if (!validation.ok) {
    return { ok: false, issue: validation.issue }
  }

  const validated = validation.params

  return {
    ok: true,
    report: {
      params: validated,
      strategy,
      maxPower: findOperatingPointMax(validated, 'power', strategy),
      maxEfficiency: findOperatingPointMax(validated, 'efficiency', strategy),
      warnings: validation.warnings,
    },
  }
}
