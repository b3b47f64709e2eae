import { MotorInputStore } from './MotorInputStore'
import { CalculatorStore } from './CalculatorStore'
import { UIStore } from './UIStore'
import { ThemeStore } from '../theme/ThemeStore'
import { createContext, useContext } from 'react'

/**
 * Root store combining all stores
 */
export class RootStore {
  inputStore: MotorInputStore
  calculatorStore: CalculatorStore
  uiStore: UIStore
  themeStore: ThemeStore

  constructor() {
    this.inputStore = new MotorInputStore()
    this.calculatorStore = new CalculatorStore(this.inputStore)
    this.uiStore = new UIStore()
    this.themeStore = new ThemeStore()
  }

  /**
   * Start over with empty fields and no results
   */
  reset(): void {
    this.inputStore.reset()
    this.calculatorStore.reset()
    this.uiStore.reset()
  }
}

// Create React context for stores
const StoreContext = createContext<RootStore | null>(null)

export const StoreProvider = StoreContext.Provider

export function useStores(): RootStore {
  const store = useContext(StoreContext)
  if (!store) {
    throw new Error('useStores must be used within a StoreProvider')
  }
  return store
}

export function useCalculatorStore(): CalculatorStore {
  return useStores().calculatorStore
}

export function useUIStore(): UIStore {
  return useStores().uiStore
}

export function useThemeStore(): ThemeStore {
  return useStores().themeStore
}
