import type { MotorParameterKey } from '../types/Motor'

export interface MotorFieldDefinition {
  key: MotorParameterKey
  label: string
  unit: string
  /** Zero is a valid entry (otherwise strictly positive) */
  allowZero: boolean
  placeholder: string
}

/** Input order matches the nameplate order users read them in */
export const MOTOR_FIELDS: MotorFieldDefinition[] = [
  { key: 'kv', label: 'Kv', unit: 'RPM/V', allowZero: false, placeholder: '1000' },
  { key: 'voltage', label: 'Voltage', unit: 'V', allowZero: false, placeholder: '11.1' },
  { key: 'noLoadCurrent', label: 'Unloaded current', unit: 'A', allowZero: true, placeholder: '0.5' },
  { key: 'maxCurrent', label: 'Maximum current', unit: 'A', allowZero: false, placeholder: '20' },
  { key: 'armatureR', label: 'Armature resistance', unit: 'mΩ', allowZero: true, placeholder: '100' },
]
