import { makeAutoObservable } from 'mobx'
import type {
  ClampWarning,
  ExtremumStrategy,
  FatalValidationIssue,
  MotorReport,
} from '../domain/types/Motor'
import { calculateMotorReport } from '../domain/motor/MotorCalculator'
import { formatMotorReport } from '../domain/motor/MotorReport'
import { MotorInputStore } from './MotorInputStore'

export type CalculationStatus = 'idle' | 'complete' | 'error'

export const STRATEGY_LABELS: Record<ExtremumStrategy, string> = {
  closedForm: 'Closed form',
  gridSearch: 'Grid search',
}

/**
 * Store for the two characteristic operating points of the entered motor
 */
export class CalculatorStore {
  status: CalculationStatus = 'idle'
  strategy: ExtremumStrategy = 'closedForm'
  report: MotorReport | null = null
  issue: FatalValidationIssue | null = null
  message: string = ''
  private inputStore: MotorInputStore

  constructor(inputStore: MotorInputStore) {
    this.inputStore = inputStore
    makeAutoObservable<this, 'inputStore'>(this, { inputStore: false })
  }

  get isComplete(): boolean {
    return this.report !== null
  }

  get warnings(): ClampWarning[] {
    return this.report?.warnings ?? []
  }

  get reportText(): string | null {
    return this.report ? formatMotorReport(this.report) : null
  }

  /**
   * Parses the current fields, validates them and locates both maxima.
   * Returns whether operating points were produced.
   */
  calculate = (): boolean => {
    this.inputStore.markSubmitted()
    this.report = null
    this.issue = null

    const parsed = this.inputStore.parseResult
    if (!parsed.ok) {
      this.status = 'error'
      this.message = 'Some fields are missing or invalid.'
      return false
    }

    const result = calculateMotorReport(parsed.params, this.strategy)
    if (!result.ok) {
      this.status = 'error'
      this.issue = result.issue
      this.message = result.issue.message
      return false
    }

    for (const warning of result.report.warnings) {
      console.warn(`Motor calculation: ${warning.message}`)
    }

    this.report = result.report
    this.status = 'complete'
    this.message = ''
    return true
  }

  setStrategy = (strategy: ExtremumStrategy): void => {
    this.strategy = strategy
    if (this.status === 'complete') {
      this.calculate()
    }
  }

  reset = (): void => {
    this.status = 'idle'
    this.report = null
    this.issue = null
    this.message = ''
  }
}
