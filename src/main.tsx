import React from 'react'
import ReactDOM from 'react-dom/client'
import { observer } from 'mobx-react-lite'
import { ThemeProvider } from '@emotion/react'
import { App } from './App'
import { RootStore, StoreProvider } from './stores/RootStore'
import { GlobalStyles } from './theme'
import { ErrorBoundary } from './components/ErrorBoundary'

const rootStore = new RootStore()

const ThemedApp = observer(() => (
  <ThemeProvider theme={rootStore.themeStore.theme}>
    <GlobalStyles />
    <App />
  </ThemeProvider>
))

const container = document.getElementById('root')
if (!container) {
  throw new Error('Root element #root not found')
}

ReactDOM.createRoot(container).render(
  <React.StrictMode>
    <ErrorBoundary>
      <StoreProvider value={rootStore}>
        <ThemedApp />
      </StoreProvider>
    </ErrorBoundary>
  </React.StrictMode>
)
