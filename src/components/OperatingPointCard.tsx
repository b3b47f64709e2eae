import styled from '@emotion/styled'
import type { MaximumSearchResult } from '../domain/types/Motor'
import { operatingPointRows } from '../domain/motor/MotorReport'
import { STRATEGY_LABELS } from '../stores/CalculatorStore'

const Card = styled.div`
  flex: 1;
  min-width: 16rem;
  border-radius: 0.5rem;
  border: 1px solid ${p => p.theme.colors.border.main};
  background-color: ${p => p.theme.colors.background.panel};
  overflow: hidden;
`

const CardHeader = styled.div`
  padding: 0.75rem 1rem;
  border-bottom: 1px solid ${p => p.theme.colors.border.subtle};
  background-color: ${p => p.theme.colors.background.section};
`

const CardTitle = styled.h3`
  font-size: 0.9375rem;
  font-weight: 700;
  color: ${p => p.theme.colors.text.heading};
`

const CardSubtitle = styled.p`
  font-size: 0.6875rem;
  color: ${p => p.theme.colors.text.muted};
  margin-top: 0.125rem;
`

const Rows = styled.dl`
  margin: 0;
  padding: 0.5rem 1rem 0.75rem;
  display: grid;
  grid-template-columns: 1fr auto auto;
  column-gap: 0.5rem;
  row-gap: 0.375rem;
`

const RowLabel = styled.dt`
  font-size: 0.8125rem;
  color: ${p => p.theme.colors.text.secondary};
`

const RowValue = styled.dd`
  margin: 0;
  font-size: 0.875rem;
  font-weight: 600;
  font-variant-numeric: tabular-nums;
  text-align: right;
  color: ${p => p.theme.colors.text.link};
`

const RowUnit = styled.dd`
  margin: 0;
  font-size: 0.75rem;
  color: ${p => p.theme.colors.text.muted};
`

interface OperatingPointCardProps {
  title: string
  result: MaximumSearchResult
}

export function OperatingPointCard({ title, result }: OperatingPointCardProps) {
  const method = result.strategy === 'gridSearch'
    ? `${STRATEGY_LABELS.gridSearch}, ${result.evaluations} evaluations`
    : STRATEGY_LABELS.closedForm

  return (
    <Card data-testid={`operating-point-${result.target}`}>
      <CardHeader>
        <CardTitle>{title}</CardTitle>
        <CardSubtitle>{method}</CardSubtitle>
      </CardHeader>
      <Rows>
        {operatingPointRows(result.point).map(row => (
          <RowGroup key={`${row.label}-${row.unit}`} label={row.label} value={row.value} unit={row.unit} />
        ))}
      </Rows>
    </Card>
  )
}

function RowGroup({ label, value, unit }: { label: string; value: string; unit: string }) {
  return (
    <>
      <RowLabel>{label}</RowLabel>
      <RowValue>{value}</RowValue>
      <RowUnit>{unit}</RowUnit>
    </>
  )
}
