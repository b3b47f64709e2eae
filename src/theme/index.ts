export { GlobalStyles } from './GlobalStyles'
export { ThemeStore } from './ThemeStore'
export { lightTheme } from './lightTheme'
export { darkTheme } from './darkTheme'
export type { Theme, ThemeColors } from './types'
