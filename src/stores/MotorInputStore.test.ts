import { describe, it, expect } from 'vitest'
import { MotorInputStore } from './MotorInputStore'

function fillValid(store: MotorInputStore): void {
  store.setFields({ kv: '1000', voltage: '11.1', noLoadCurrent: '0.5', maxCurrent: '20', armatureR: '100' })
}

describe('MotorInputStore', () => {
  it('starts empty with no visible errors', () => {
    const store = new MotorInputStore()
    expect(store.isEmpty).toBe(true)
    expect(store.isValid).toBe(false)
    expect(store.visibleErrors).toEqual({})
    expect(store.fieldErrors.kv).toBe('Required')
  })

  it('shows field errors only after submission', () => {
    const store = new MotorInputStore()
    fillValid(store)
    store.setField('voltage', '0')
    expect(store.visibleErrors).toEqual({})

    store.markSubmitted()
    expect(store.visibleErrors).toEqual({ voltage: 'Must be greater than zero' })
  })

  it('parses a complete set of fields', () => {
    const store = new MotorInputStore()
    fillValid(store)
    expect(store.parseResult).toEqual({
      ok: true,
      params: { kv: 1000, voltage: 11.1, noLoadCurrent: 0.5, maxCurrent: 20, armatureR: 100 },
    })
  })

  it('clears fields and submission state on reset', () => {
    const store = new MotorInputStore()
    fillValid(store)
    store.markSubmitted()
    store.reset()
    expect(store.isEmpty).toBe(true)
    expect(store.submitted).toBe(false)
  })
})
