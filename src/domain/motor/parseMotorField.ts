import type { MotorParameterKey, MotorParameters } from '../types/Motor'
import { MOTOR_FIELDS } from './motorFields'

export type FieldParseResult =
  | { ok: true; value: number }
  | { ok: false; error: string }

export type MotorFieldText = Record<MotorParameterKey, string>
export type MotorFieldErrors = Partial<Record<MotorParameterKey, string>>

export type MotorParametersParseResult =
  | { ok: true; params: MotorParameters }
  | { ok: false; errors: MotorFieldErrors }

/**
 * Parses one numeric entry. Blank input, text that is not a finite number,
 * negatives, and zero where `allowZero` is false are all rejected.
 */
export function parseMotorField(text: string, allowZero: boolean): FieldParseResult {
  const trimmed = text.trim()
  if (trimmed === '') {
    return { ok: false, error: 'Required' }
  }

  const value = Number(trimmed)
  if (!Number.isFinite(value)) {
    return { ok: false, error: 'Invalid entry, try again.' }
  }

  if (allowZero ? value < 0 : value <= 0) {
    return { ok: false, error: allowZero ? 'Must be zero or more' : 'Must be greater than zero' }
  }

  return { ok: true, value }
}

export function parseMotorParameters(fields: MotorFieldText): MotorParametersParseResult {
  const errors: MotorFieldErrors = {}
  const values: Partial<Record<MotorParameterKey, number>> = {}

  for (const field of MOTOR_FIELDS) {
    const result = parseMotorField(fields[field.key], field.allowZero)
    if (result.ok) {
      values[field.key] = result.value
    } else {
      errors[field.key] = result.error
    }
  }

  const { kv, voltage, noLoadCurrent, maxCurrent, armatureR } = values
  if (
    kv === undefined ||
    voltage === undefined ||
    noLoadCurrent === undefined ||
    maxCurrent === undefined ||
    armatureR === undefined
  ) {
    return { ok: false, errors }
  }

  return { ok: true, params: { kv, voltage, noLoadCurrent, maxCurrent, armatureR } }
}
