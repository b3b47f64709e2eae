import type { Theme } from './types'

export const darkTheme: Theme = {
  colors: {
    background: {
      app: '#0f172a',       // slate-900
      panel: '#1e293b',     // slate-800
      section: '#172033',
      header: '#020617',    // slate-950
      footer: '#020617',    // slate-950
      input: '#334155',     // slate-700
      hover: '#334155',     // slate-700
      selected: '#0c4a6e',  // sky-900
      reportPreview: '#020617', // slate-950
    },
    text: {
      primary: '#e2e8f0',   // slate-200
      secondary: '#cbd5e1', // slate-300
      muted: '#64748b',     // slate-500
      inverse: '#ffffff',
      link: '#38bdf8',      // sky-400
      linkHover: '#7dd3fc', // sky-300
      heading: '#f1f5f9',   // slate-100
      headerSubtle: '#64748b', // slate-500
    },
    border: {
      main: '#334155',      // slate-700
      subtle: '#334155',    // slate-700
      focus: '#38bdf8',     // sky-400
    },
    severity: {
      high: '#f87171',      // red-400
      highBg: '#5c2020',
      highText: '#fca5a5',  // red-300
      medium: '#fbbf24',    // amber-400
      mediumBg: '#5c3a0e',
      mediumText: '#fde68a', // amber-200
    },
    button: {
      primary: '#0ea5e9',   // sky-500
      primaryHover: '#0284c7', // sky-600
      primaryText: '#ffffff',
      secondary: '#334155', // slate-700
      secondaryHover: '#475569', // slate-600
      secondaryText: '#e2e8f0', // slate-200
    },
    accent: {
      indigo: '#818cf8',    // indigo-400
      indigoBg: '#1e1b4b',  // indigo-950
      indigoText: '#c7d2fe', // indigo-200
      green: '#4ade80',     // green-400
      greenBg: '#052e16',   // green-950
      greenText: '#86efac',  // green-300
      orange: '#fb923c',    // orange-400
      orangeText: '#fed7aa', // orange-200
    },
    tooltip: {
      background: 'rgba(30, 41, 59, 0.95)',
      border: '#334155',
    },
    scrollbar: {
      track: '#1e293b',
      thumb: '#475569',
      thumbHover: '#64748b',
    },
  },
}
