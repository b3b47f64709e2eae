import type { Theme } from './types'

export const lightTheme: Theme = {
  colors: {
    background: {
      app: '#f3f4f6',       // gray-100
      panel: '#ffffff',
      section: '#f9fafb',   // gray-50
      header: '#1e293b',    // slate-800
      footer: '#1e293b',    // slate-800
      input: '#ffffff',
      hover: '#f3f4f6',     // gray-100
      selected: '#e0f2fe',  // sky-100
      reportPreview: '#0f172a', // slate-900
    },
    text: {
      primary: '#374151',   // gray-700
      secondary: '#4b5563', // gray-600
      muted: '#9ca3af',     // gray-400
      inverse: '#ffffff',
      link: '#0284c7',      // sky-600
      linkHover: '#075985', // sky-800
      heading: '#1f2937',   // gray-800
      headerSubtle: '#94a3b8', // slate-400
    },
    border: {
      main: '#e5e7eb',      // gray-200
      subtle: '#f3f4f6',    // gray-100
      focus: '#0ea5e9',     // sky-500
    },
    severity: {
      high: '#dc2626',      // red-600
      highBg: '#fef2f2',    // red-50
      highText: '#991b1b',  // red-800
      medium: '#f59e0b',    // amber-500
      mediumBg: '#fffbeb',  // amber-50
      mediumText: '#92400e', // amber-800
    },
    button: {
      primary: '#0284c7',   // sky-600
      primaryHover: '#0369a1', // sky-700
      primaryText: '#ffffff',
      secondary: '#e5e7eb', // gray-200
      secondaryHover: '#d1d5db', // gray-300
      secondaryText: '#374151', // gray-700
    },
    accent: {
      indigo: '#4f46e5',    // indigo-600
      indigoBg: '#eef2ff',  // indigo-50
      indigoText: '#312e81', // indigo-900
      green: '#16a34a',     // green-600
      greenBg: '#f0fdf4',   // green-50
      greenText: '#166534',  // green-800
      orange: '#ea580c',    // orange-600
      orangeText: '#9a3412', // orange-800
    },
    tooltip: {
      background: 'rgba(255, 255, 255, 0.95)',
      border: '#e5e7eb',
    },
    scrollbar: {
      track: '#f1f1f1',
      thumb: '#888888',
      thumbHover: '#555555',
    },
  },
}
