export type GlossaryCategory = 'parameters' | 'concepts' | 'units'

export interface GlossaryEntry {
  id: string
  term: string
  category: GlossaryCategory
  explanation: string
  detail?: string
}

export const GLOSSARY_CATEGORIES: GlossaryCategory[] = ['parameters', 'concepts', 'units']

export const GLOSSARY_CATEGORY_LABELS: Record<GlossaryCategory, string> = {
  parameters: 'Motor Parameters',
  concepts: 'Concepts',
  units: 'Units',
}

export const GLOSSARY_ENTRIES: GlossaryEntry[] = [
  // Parameters
  {
    id: 'kv',
    term: 'Kv',
    category: 'parameters',
    explanation: 'Velocity constant  - how many RPM the motor gains per volt applied, with nothing on the shaft.',
    detail: 'A 1000 Kv motor on 11.1 V spins at about 11,100 RPM unloaded. High Kv means speed, low Kv means torque per amp.',
  },
  {
    id: 'kt',
    term: 'Kt',
    category: 'parameters',
    explanation: 'Torque constant  - torque produced per amp drawn above the no-load current.',
    detail: 'Kt is not entered: it follows from Kv (Kt = 1352 / Kv in ozf·in/A), because both describe the same winding.',
  },
  {
    id: 'no-load-current',
    term: 'No-load current',
    category: 'parameters',
    explanation: 'Current drawn with zero mechanical load, spent on bearing friction, eddy currents and other internal losses.',
    detail: 'It produces no useful torque, so it is subtracted from the current before computing torque.',
  },
  {
    id: 'max-current',
    term: 'Maximum current',
    category: 'parameters',
    explanation: 'Highest current the motor (or its ESC and battery) may draw. The search never goes past it.',
  },
  {
    id: 'armature-resistance',
    term: 'Armature resistance',
    category: 'parameters',
    explanation: 'Resistance of the motor windings. Every amp through it costs a voltage drop and heats the motor.',
    detail: 'Usually listed as Rm or Ri on a datasheet, in milliohms.',
  },

  // Concepts
  {
    id: 'back-emf',
    term: 'Back-EMF',
    category: 'concepts',
    explanation: 'Voltage generated by the spinning motor that opposes the supply voltage, proportional to speed.',
    detail: 'Speed settles where back-EMF plus the armature drop equals the supply: RPM = Kv · (V − I · R).',
  },
  {
    id: 'short-circuit-current',
    term: 'Short-circuit current',
    category: 'concepts',
    explanation: 'Current at which the armature drop uses up the whole supply voltage (V / R). The motor is stalled there.',
  },
  {
    id: 'open-circuit',
    term: 'Open circuit condition',
    category: 'concepts',
    explanation: 'An operating point where the armature drop would equal or exceed the supply voltage, so that current cannot actually flow.',
    detail: 'A maximum current past this point is lowered to the short-circuit current automatically.',
  },
  {
    id: 'max-power',
    term: 'Maximum output power',
    category: 'concepts',
    explanation: 'Current at which shaft power peaks: halfway between the no-load and short-circuit currents.',
    detail: 'When that is above the maximum current, the best reachable point is the maximum current itself.',
  },
  {
    id: 'max-efficiency',
    term: 'Maximum efficiency',
    category: 'concepts',
    explanation: 'Current at which the most input power reaches the shaft: the geometric mean of the no-load and short-circuit currents.',
  },
  {
    id: 'grid-search',
    term: 'Grid search',
    category: 'concepts',
    explanation: 'Numeric alternative to the closed-form optimum: sample the current range in 10 steps, zoom in around the best sample, repeat.',
    detail: 'Stops once the window is narrower than 0.0001 A or a pass finds nothing better.',
  },

  // Units
  {
    id: 'ncm',
    term: 'Ncm',
    category: 'units',
    explanation: 'Newton-centimetres  - torque. 100 Ncm = 1 N·m.',
  },
  {
    id: 'mohm',
    term: 'mΩ',
    category: 'units',
    explanation: 'Milliohms  - thousandths of an ohm.',
  },
  {
    id: 'hp',
    term: 'HP',
    category: 'units',
    explanation: 'Mechanical horsepower, 745.7 W.',
  },
]
