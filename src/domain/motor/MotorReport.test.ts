import { describe, it, expect } from 'vitest'
import { formatMotorReport, formatOperatingPoint, operatingPointRows } from './MotorReport'
import { calculateMotorReport } from './MotorCalculator'
import { evaluateOperatingPoint } from './MotorModel'
import { makeMotorParameters } from '../test-helpers'

describe('formatOperatingPoint', () => {
  it('renders every quantity with two decimals and torque in N·cm', () => {
    const point = evaluateOperatingPoint(makeMotorParameters(), 20)
    expect(formatOperatingPoint('At maximum output power', point)).toBe(
      [
        'At maximum output power:',
        '20.00 A current',
        '9100.00 RPM',
        '18.61 Ncm torque',
        '222.00 W in (0.30 HP)',
        '177.37 W out (0.24 HP)',
        '79.90% efficiency',
      ].join('\n')
    )
  })
})

describe('operatingPointRows', () => {
  it('lists display rows in report order', () => {
    const rows = operatingPointRows(evaluateOperatingPoint(makeMotorParameters(), 20))
    expect(rows.map(r => `${r.value} ${r.unit}`)).toEqual([
      '20.00 A',
      '9100.00 RPM',
      '18.61 Ncm',
      '222.00 W',
      '0.30 HP',
      '177.37 W',
      '0.24 HP',
      '79.90 %',
    ])
  })
})

describe('formatMotorReport', () => {
  it('renders both operating points', () => {
    const result = calculateMotorReport(makeMotorParameters())
    if (!result.ok) throw new Error('expected a report')

    expect(formatMotorReport(result.report)).toBe(
      [
        'At maximum output power:',
        '20.00 A current',
        '9100.00 RPM',
        '18.61 Ncm torque',
        '222.00 W in (0.30 HP)',
        '177.37 W out (0.24 HP)',
        '79.90% efficiency',
        '',
        'At maximum efficiency:',
        '7.45 A current',
        '10355.02 RPM',
        '6.63 Ncm torque',
        '82.69 W in (0.11 HP)',
        '71.93 W out (0.10 HP)',
        '86.99% efficiency',
        '',
      ].join('\n')
    )
  })

  it('puts warnings ahead of the operating points', () => {
    const result = calculateMotorReport(makeMotorParameters({ maxCurrent: 200 }))
    if (!result.ok) throw new Error('expected a report')

    const firstLine = formatMotorReport(result.report).split('\n')[0]
    expect(firstLine).toBe(
      'Warning: At maximum current, the motor would be an open circuit (Vdrop > Vin). Maximum current has been reduced to 111.00 A.'
    )
  })
})
