import type { MotorReport, OperatingPoint } from '../types/Motor'
import { wattsToHorsepower } from './MotorModel'

export interface DisplayValue {
  label: string
  value: string
  unit: string
}

const fixed = (n: number): string => n.toFixed(2)

/**
 * Display rows for one operating point. Torque is shown in N·cm.
 */
export function operatingPointRows(point: OperatingPoint): DisplayValue[] {
  return [
    { label: 'Current', value: fixed(point.current), unit: 'A' },
    { label: 'Speed', value: fixed(point.rpm), unit: 'RPM' },
    { label: 'Torque', value: fixed(point.torque * 100), unit: 'Ncm' },
    { label: 'Power in', value: fixed(point.powerIn), unit: 'W' },
    { label: 'Power in', value: fixed(wattsToHorsepower(point.powerIn)), unit: 'HP' },
    { label: 'Power out', value: fixed(point.powerOut), unit: 'W' },
    { label: 'Power out', value: fixed(wattsToHorsepower(point.powerOut)), unit: 'HP' },
    { label: 'Efficiency', value: fixed(point.efficiency), unit: '%' },
  ]
}

export function formatOperatingPoint(title: string, point: OperatingPoint): string {
  return [
    `${title}:`,
    `${fixed(point.current)} A current`,
    `${fixed(point.rpm)} RPM`,
    `${fixed(point.torque * 100)} Ncm torque`,
    `${fixed(point.powerIn)} W in (${fixed(wattsToHorsepower(point.powerIn))} HP)`,
    `${fixed(point.powerOut)} W out (${fixed(wattsToHorsepower(point.powerOut))} HP)`,
    `${fixed(point.efficiency)}% efficiency`,
  ].join('\n')
}

/**
 * Plain-text report of both operating points, suitable for the clipboard
 */
export function formatMotorReport(report: MotorReport): string {
  const sections: string[] = report.warnings.map(w => `Warning: ${w.message}`)
  sections.push(formatOperatingPoint('At maximum output power', report.maxPower.point))
  sections.push(formatOperatingPoint('At maximum efficiency', report.maxEfficiency.point))
  return sections.join('\n\n') + '\n'
}
