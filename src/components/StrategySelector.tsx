import { observer } from 'mobx-react-lite'
import styled from '@emotion/styled'
import { useCalculatorStore, useUIStore } from '../stores/RootStore'
import { STRATEGY_LABELS } from '../stores/CalculatorStore'
import type { ExtremumStrategy } from '../domain/types/Motor'

const STRATEGY_ORDER: ExtremumStrategy[] = ['closedForm', 'gridSearch']

const STRATEGY_DESCRIPTIONS: Record<ExtremumStrategy, string> = {
  closedForm: 'Exact optimum of the motor model, clamped to the current range.',
  gridSearch: 'Coarse-to-fine numeric search, accurate to about 0.0001 A.',
}

const SelectorWrapper = styled.div`
  padding: 1rem;
  border-bottom: 1px solid ${p => p.theme.colors.border.main};
`

const SelectorHeader = styled.div`
  display: flex;
  align-items: center;
  justify-content: space-between;
  margin-bottom: 0.5rem;
`

const SelectorTitle = styled.h3`
  font-size: 0.75rem;
  font-weight: 700;
`

const HelpLink = styled.button`
  background: none;
  border: none;
  padding: 0;
  font-size: 0.75rem;
  cursor: pointer;
  color: ${p => p.theme.colors.text.link};

  &:hover {
    color: ${p => p.theme.colors.text.linkHover};
  }
`

const ButtonGroup = styled.div`
  display: flex;
  gap: 0.25rem;
`

const StrategyBtn = styled.button<{ isActive: boolean }>`
  flex: 1;
  padding: 0.375rem;
  border-radius: 0.25rem;
  font-size: 0.75rem;
  font-weight: 500;
  transition: background-color 0.15s, color 0.15s;
  border: none;
  cursor: pointer;
  color: ${p => p.isActive ? p.theme.colors.button.primaryText : p.theme.colors.text.secondary};
  background-color: ${p => p.isActive ? p.theme.colors.button.primary : p.theme.colors.background.section};

  &:hover {
    background-color: ${p => p.isActive ? p.theme.colors.button.primaryHover : p.theme.colors.button.secondaryHover};
  }
`

const Description = styled.p`
  font-size: 0.75rem;
  color: ${p => p.theme.colors.text.muted};
  margin-top: 0.375rem;
`

export const StrategySelector = observer(() => {
  const calculatorStore = useCalculatorStore()
  const uiStore = useUIStore()

  return (
    <SelectorWrapper>
      <SelectorHeader>
        <SelectorTitle>Search Method</SelectorTitle>
        <HelpLink type="button" onClick={() => uiStore.openGlossary('grid-search')}>
          What is this?
        </HelpLink>
      </SelectorHeader>
      <ButtonGroup>
        {STRATEGY_ORDER.map(strategy => (
          <StrategyBtn
            key={strategy}
            type="button"
            data-testid={`strategy-${strategy}`}
            isActive={calculatorStore.strategy === strategy}
            onClick={() => calculatorStore.setStrategy(strategy)}
          >
            {STRATEGY_LABELS[strategy]}
          </StrategyBtn>
        ))}
      </ButtonGroup>
      <Description>{STRATEGY_DESCRIPTIONS[calculatorStore.strategy]}</Description>
    </SelectorWrapper>
  )
})
