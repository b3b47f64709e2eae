import { observer } from 'mobx-react-lite'
import styled from '@emotion/styled'
import { useCalculatorStore, useUIStore } from '../stores/RootStore'
import { OperatingPointCard } from './OperatingPointCard'
import { ValidationBanner } from './ValidationBanner'

const PanelContainer = styled.div`
  height: 100%;
  overflow-y: auto;
  padding: 1.25rem;
  display: flex;
  flex-direction: column;
  gap: 1rem;
`

const EmptyState = styled.div`
  margin: auto;
  max-width: 26rem;
  text-align: center;
  color: ${p => p.theme.colors.text.secondary};
`

const EmptyTitle = styled.h2`
  font-size: 1.125rem;
  font-weight: 700;
  color: ${p => p.theme.colors.text.heading};
  margin-bottom: 0.5rem;
`

const EmptyText = styled.p`
  font-size: 0.875rem;
  line-height: 1.5;
`

const CardRow = styled.div`
  display: flex;
  flex-wrap: wrap;
  gap: 1rem;
`

const ReportSection = styled.div`
  display: flex;
  flex-direction: column;
  gap: 0.5rem;
`

const ReportHeader = styled.div`
  display: flex;
  align-items: center;
  justify-content: space-between;
`

const ReportTitle = styled.h3`
  font-size: 0.75rem;
  font-weight: 700;
  text-transform: uppercase;
  letter-spacing: 0.05em;
  color: ${p => p.theme.colors.text.muted};
`

const CopyButton = styled.button`
  padding: 0.375rem 0.75rem;
  border-radius: 0.375rem;
  font-size: 0.75rem;
  font-weight: 500;
  border: none;
  cursor: pointer;
  color: ${p => p.theme.colors.button.secondaryText};
  background-color: ${p => p.theme.colors.button.secondary};

  &:hover {
    background-color: ${p => p.theme.colors.button.secondaryHover};
  }
`

const ReportPreview = styled.pre`
  margin: 0;
  padding: 0.75rem 1rem;
  border-radius: 0.5rem;
  font-family: ui-monospace, 'Courier New', Courier, monospace;
  font-size: 0.75rem;
  line-height: 1.5;
  color: #e2e8f0;
  background-color: ${p => p.theme.colors.background.reportPreview};
  overflow-x: auto;
`

export const ResultsPanel = observer(() => {
  const calculatorStore = useCalculatorStore()
  const uiStore = useUIStore()
  const { report, reportText } = calculatorStore

  const handleCopy = async (): Promise<void> => {
    if (!reportText) return
    try {
      await navigator.clipboard.writeText(reportText)
      uiStore.showToast('Report copied to clipboard', 'success', 2500)
    } catch (err) {
      console.error('Copying report failed:', err)
      uiStore.showToast('Could not copy the report', 'error')
    }
  }

  if (calculatorStore.status === 'error' && calculatorStore.issue) {
    return (
      <PanelContainer>
        <ValidationBanner variant="error" message={calculatorStore.issue.message} />
      </PanelContainer>
    )
  }

  if (!report || !reportText) {
    return (
      <PanelContainer>
        <EmptyState>
          <EmptyTitle>Find your motor's sweet spots</EmptyTitle>
          <EmptyText>
            Enter the nameplate values on the left and press Calculate to see
            where the motor delivers the most power and where it runs most
            efficiently.
          </EmptyText>
        </EmptyState>
      </PanelContainer>
    )
  }

  return (
    <PanelContainer>
      {report.warnings.map(warning => (
        <ValidationBanner key={warning.code} variant="warning" message={warning.message} />
      ))}
      <CardRow>
        <OperatingPointCard title="At maximum output power" result={report.maxPower} />
        <OperatingPointCard title="At maximum efficiency" result={report.maxEfficiency} />
      </CardRow>
      <ReportSection>
        <ReportHeader>
          <ReportTitle>Text Report</ReportTitle>
          <CopyButton type="button" onClick={() => void handleCopy()}>
            Copy
          </CopyButton>
        </ReportHeader>
        <ReportPreview data-testid="report-text">{reportText}</ReportPreview>
      </ReportSection>
    </PanelContainer>
  )
})
