import { makeAutoObservable } from 'mobx'
import type { MotorParameterKey } from '../domain/types/Motor'
import {
  parseMotorParameters,
  type MotorFieldErrors,
  type MotorFieldText,
  type MotorParametersParseResult,
} from '../domain/motor/parseMotorField'

function emptyFields(): MotorFieldText {
  return { kv: '', voltage: '', noLoadCurrent: '', maxCurrent: '', armatureR: '' }
}

/**
 * Raw text of the five nameplate fields and their parse state.
 * Errors are only surfaced once the user has tried to calculate.
 */
export class MotorInputStore {
  fields: MotorFieldText = emptyFields()
  submitted: boolean = false

  constructor() {
    makeAutoObservable(this)
  }

  get parseResult(): MotorParametersParseResult {
    return parseMotorParameters(this.fields)
  }

  get isValid(): boolean {
    return this.parseResult.ok
  }

  get fieldErrors(): MotorFieldErrors {
    const result = this.parseResult
    return result.ok ? {} : result.errors
  }

  /** Errors to show next to each field */
  get visibleErrors(): MotorFieldErrors {
    return this.submitted ? this.fieldErrors : {}
  }

  get isEmpty(): boolean {
    return Object.values(this.fields).every(text => text.trim() === '')
  }

  setField = (key: MotorParameterKey, text: string): void => {
    this.fields[key] = text
  }

  setFields = (fields: Partial<MotorFieldText>): void => {
    this.fields = { ...this.fields, ...fields }
  }

  markSubmitted = (): void => {
    this.submitted = true
  }

  reset = (): void => {
    this.fields = emptyFields()
    this.submitted = false
  }
}
