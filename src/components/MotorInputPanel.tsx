import { observer } from 'mobx-react-lite'
import styled from '@emotion/styled'
import { useStores } from '../stores/RootStore'
import { MOTOR_FIELDS } from '../domain/motor/motorFields'
import type { MotorParameterKey } from '../domain/types/Motor'
import { StrategySelector } from './StrategySelector'

const GLOSSARY_TERM_BY_FIELD: Partial<Record<MotorParameterKey, string>> = {
  kv: 'kv',
  noLoadCurrent: 'no-load-current',
  maxCurrent: 'max-current',
  armatureR: 'armature-resistance',
}

const PanelContainer = styled.div`
  height: 100%;
  display: flex;
  flex-direction: column;
  background-color: ${p => p.theme.colors.background.panel};
  border-right: 1px solid ${p => p.theme.colors.border.main};
  overflow-y: auto;
`

const Form = styled.form`
  padding: 1rem;
  display: flex;
  flex-direction: column;
  gap: 0.75rem;
  border-bottom: 1px solid ${p => p.theme.colors.border.main};
`

const FormTitle = styled.h2`
  font-size: 0.875rem;
  font-weight: 700;
  color: ${p => p.theme.colors.text.heading};
`

const FieldRow = styled.label`
  display: flex;
  flex-direction: column;
  gap: 0.25rem;
`

const FieldLabel = styled.span`
  display: flex;
  align-items: center;
  justify-content: space-between;
  font-size: 0.75rem;
  font-weight: 600;
  color: ${p => p.theme.colors.text.secondary};
`

const TermButton = styled.button`
  background: none;
  border: none;
  padding: 0;
  font-size: 0.6875rem;
  cursor: help;
  color: ${p => p.theme.colors.text.muted};

  &:hover {
    color: ${p => p.theme.colors.text.link};
  }
`

const InputWrapper = styled.div<{ hasError: boolean }>`
  display: flex;
  align-items: center;
  border-radius: 0.375rem;
  border: 1px solid ${p => p.hasError ? p.theme.colors.severity.high : p.theme.colors.border.main};
  background-color: ${p => p.theme.colors.background.input};

  &:focus-within {
    border-color: ${p => p.hasError ? p.theme.colors.severity.high : p.theme.colors.border.focus};
  }
`

const NumberInput = styled.input`
  flex: 1;
  min-width: 0;
  padding: 0.5rem 0.75rem;
  font-size: 0.875rem;
  border: none;
  background: transparent;
  color: ${p => p.theme.colors.text.primary};

  &:focus {
    outline: none;
  }

  &::placeholder {
    color: ${p => p.theme.colors.text.muted};
  }
`

const UnitSuffix = styled.span`
  padding: 0 0.75rem;
  font-size: 0.75rem;
  color: ${p => p.theme.colors.text.muted};
`

const FieldError = styled.span`
  font-size: 0.6875rem;
  color: ${p => p.theme.colors.severity.high};
`

const ButtonRow = styled.div`
  display: flex;
  gap: 0.5rem;
  margin-top: 0.25rem;
`

const PrimaryButton = styled.button`
  flex: 1;
  padding: 0.5rem 1rem;
  border-radius: 0.5rem;
  font-weight: 600;
  font-size: 0.875rem;
  border: none;
  cursor: pointer;
  color: ${p => p.theme.colors.button.primaryText};
  background-color: ${p => p.theme.colors.button.primary};
  transition: background-color 0.15s;

  &:hover {
    background-color: ${p => p.theme.colors.button.primaryHover};
  }
`

const SecondaryButton = styled.button`
  padding: 0.5rem 1rem;
  border-radius: 0.5rem;
  font-weight: 500;
  font-size: 0.875rem;
  border: none;
  cursor: pointer;
  color: ${p => p.theme.colors.button.secondaryText};
  background-color: ${p => p.theme.colors.button.secondary};
  transition: background-color 0.15s;

  &:hover {
    background-color: ${p => p.theme.colors.button.secondaryHover};
  }
`

export const MotorInputPanel = observer(() => {
  const rootStore = useStores()
  const { inputStore, calculatorStore, uiStore } = rootStore

  const handleSubmit = (e: React.FormEvent): void => {
    e.preventDefault()
    const ok = calculatorStore.calculate()
    if (!ok) {
      uiStore.showToast(calculatorStore.message, 'error')
      return
    }
    const [warning] = calculatorStore.warnings
    if (warning) {
      uiStore.showToast(warning.message, 'info', 8000)
    }
  }

  return (
    <PanelContainer>
      <Form onSubmit={handleSubmit} noValidate>
        <FormTitle>Motor Parameters</FormTitle>
        {MOTOR_FIELDS.map(field => {
          const error = inputStore.visibleErrors[field.key]
          const term = GLOSSARY_TERM_BY_FIELD[field.key]
          return (
            <FieldRow key={field.key}>
              <FieldLabel>
                {field.label}
                {term && (
                  <TermButton
                    type="button"
                    aria-label={`Explain ${field.label}`}
                    onClick={() => uiStore.openGlossary(term)}
                  >
                    ?
                  </TermButton>
                )}
              </FieldLabel>
              <InputWrapper hasError={Boolean(error)}>
                <NumberInput
                  type="text"
                  inputMode="decimal"
                  name={field.key}
                  data-testid={`field-${field.key}`}
                  placeholder={field.placeholder}
                  value={inputStore.fields[field.key]}
                  onChange={e => inputStore.setField(field.key, e.target.value)}
                  aria-invalid={Boolean(error)}
                />
                <UnitSuffix>{field.unit}</UnitSuffix>
              </InputWrapper>
              {error && <FieldError role="alert">{error}</FieldError>}
            </FieldRow>
          )
        })}
        <ButtonRow>
          <PrimaryButton type="submit" data-testid="calculate-button">
            Calculate
          </PrimaryButton>
          <SecondaryButton type="button" onClick={() => rootStore.reset()} disabled={inputStore.isEmpty}>
            Reset
          </SecondaryButton>
        </ButtonRow>
      </Form>
      <StrategySelector />
    </PanelContainer>
  )
})
