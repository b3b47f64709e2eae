import React from 'react'
import styled from '@emotion/styled'

// Colors are hardcoded: this renders outside ThemeProvider

const CrashPage = styled.div`
  display: flex;
  flex-direction: column;
  align-items: center;
  justify-content: center;
  min-height: 100vh;
  background: #0f172a;
  padding: 2rem;
  gap: 1rem;
`

const Heading = styled.h1`
  color: #f1f5f9;
  font-size: 1.75rem;
  font-weight: 700;
  margin: 0;
`

const Subtext = styled.p`
  color: #94a3b8;
  font-size: 0.95rem;
  max-width: 28rem;
  text-align: center;
  margin: 0;
  line-height: 1.5;
`

const ButtonRow = styled.div`
  display: flex;
  gap: 0.75rem;
  margin-top: 0.5rem;
`

const ActionButton = styled.button<{ primary?: boolean }>`
  background: ${p => (p.primary ? '#0284c7' : '#334155')};
  color: #f1f5f9;
  border: 1px solid ${p => (p.primary ? '#0284c7' : '#475569')};
  border-radius: 6px;
  padding: 0.6rem 1.25rem;
  font-size: 0.9rem;
  font-weight: 600;
  cursor: pointer;

  &:hover {
    background: ${p => (p.primary ? '#0369a1' : '#475569')};
  }
`

const ErrorDetails = styled.pre`
  background: #020617;
  color: #f87171;
  font-family: 'Courier New', Courier, monospace;
  font-size: 0.75rem;
  padding: 0.75rem 1rem;
  border-radius: 6px;
  max-width: 36rem;
  max-height: 8rem;
  overflow: auto;
  white-space: pre-wrap;
  word-break: break-word;
  margin: 0;
  width: 100%;
`

interface ErrorBoundaryState {
  error: Error | null
  copied: boolean
}

export class ErrorBoundary extends React.Component<
  { children: React.ReactNode },
  ErrorBoundaryState
> {
  state: ErrorBoundaryState = {
    error: null,
    copied: false,
  }

  static getDerivedStateFromError(error: Error): Partial<ErrorBoundaryState> {
    return { error }
  }

  componentDidCatch(error: Error, info: React.ErrorInfo): void {
    console.error('Uncaught error:', error, info.componentStack)
  }

  private handleReload = (): void => {
    window.location.reload()
  }

  private handleCopy = async (): Promise<void> => {
    const { error } = this.state
    if (!error) return

    const text = `${error.name}: ${error.message}\n\n${error.stack ?? '(no stack trace)'}`
    try {
      await navigator.clipboard.writeText(text)
      this.setState({ copied: true })
      setTimeout(() => this.setState({ copied: false }), 2000)
    } catch (err) {
      console.error('Copying error details failed:', err)
    }
  }

  render(): React.ReactNode {
    const { error, copied } = this.state
    if (!error) {
      return this.props.children
    }

    return (
      <CrashPage>
        <Heading>The calculator stopped working</Heading>
        <Subtext>
          Something went wrong while rendering. Reload to start over; the
          values you entered will need to be typed in again.
        </Subtext>
        <ButtonRow>
          <ActionButton primary onClick={this.handleReload}>Reload App</ActionButton>
          <ActionButton onClick={() => void this.handleCopy()}>
            {copied ? 'Copied!' : 'Copy Error Details'}
          </ActionButton>
        </ButtonRow>
        <ErrorDetails>
          {error.name}: {error.message}
          {error.stack ? `\n\n${error.stack}` : ''}
        </ErrorDetails>
      </CrashPage>
    )
  }
}
