import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { CalculatorStore } from './CalculatorStore'
import { MotorInputStore } from './MotorInputStore'
import type { MotorFieldText } from '../domain/motor/parseMotorField'

function makeStores(fields: Partial<MotorFieldText> = {}) {
  const inputStore = new MotorInputStore()
  inputStore.setFields({
    kv: '1000',
    voltage: '11.1',
    noLoadCurrent: '0.5',
    maxCurrent: '20',
    armatureR: '100',
    ...fields,
  })
  return { inputStore, calculatorStore: new CalculatorStore(inputStore) }
}

describe('CalculatorStore', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('computes both operating points', () => {
    const { calculatorStore } = makeStores()
    expect(calculatorStore.calculate()).toBe(true)
    expect(calculatorStore.status).toBe('complete')
    expect(calculatorStore.isComplete).toBe(true)
    expect(calculatorStore.report?.maxPower.current).toBe(20)
    expect(calculatorStore.report?.maxEfficiency.current).toBeCloseTo(7.4498, 4)
    expect(calculatorStore.reportText?.startsWith('At maximum output power:\n20.00 A current\n')).toBe(true)
  })

  it('marks the inputs as submitted and stops on parse errors', () => {
    const { inputStore, calculatorStore } = makeStores({ kv: 'abc' })
    expect(calculatorStore.calculate()).toBe(false)
    expect(inputStore.submitted).toBe(true)
    expect(calculatorStore.status).toBe('error')
    expect(calculatorStore.message).toBe('Some fields are missing or invalid.')
    expect(calculatorStore.report).toBeNull()
  })

  it('reports validation issues', () => {
    const { calculatorStore } = makeStores({ maxCurrent: '0.505' })
    expect(calculatorStore.calculate()).toBe(false)
    expect(calculatorStore.issue?.code).toBe('degenerateDomain')
    expect(calculatorStore.message).toBe('Maximum current is less than, equal to, or very close to unloaded current.')
  })

  it('logs and exposes the max-current clamp warning', () => {
    const { calculatorStore } = makeStores({ maxCurrent: '200' })
    expect(calculatorStore.calculate()).toBe(true)
    expect(calculatorStore.warnings).toHaveLength(1)
    expect(console.warn).toHaveBeenCalledWith(
      'Motor calculation: At maximum current, the motor would be an open circuit (Vdrop > Vin). Maximum current has been reduced to 111.00 A.'
    )
  })

  it('recalculates when the strategy changes after a result', () => {
    const { calculatorStore } = makeStores()
    calculatorStore.calculate()
    calculatorStore.setStrategy('gridSearch')
    expect(calculatorStore.report?.strategy).toBe('gridSearch')
    expect(calculatorStore.report?.maxPower.current).toBe(20)
  })

  it('only records the strategy when nothing has been calculated', () => {
    const { calculatorStore } = makeStores()
    calculatorStore.setStrategy('gridSearch')
    expect(calculatorStore.strategy).toBe('gridSearch')
    expect(calculatorStore.status).toBe('idle')
    expect(calculatorStore.report).toBeNull()
  })

  it('clears the previous result on reset', () => {
    const { calculatorStore } = makeStores()
    calculatorStore.calculate()
    calculatorStore.reset()
    expect(calculatorStore.status).toBe('idle')
    expect(calculatorStore.report).toBeNull()
    expect(calculatorStore.reportText).toBeNull()
  })
})
