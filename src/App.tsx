import { observer } from 'mobx-react-lite'
import styled from '@emotion/styled'
import { MotorInputPanel } from './components/MotorInputPanel'
import { ResultsPanel } from './components/ResultsPanel'
import { ThemeToggle } from './components/ThemeToggle'
import { GlossaryModal } from './components/GlossaryModal'
import { Toast } from './components/Toast'
import { useUIStore } from './stores/RootStore'

const AppContainer = styled.div`
  height: 100vh;
  display: flex;
  flex-direction: column;
  background-color: ${p => p.theme.colors.background.app};
  position: relative;
`

const Header = styled.header`
  background-color: ${p => p.theme.colors.background.header};
  color: ${p => p.theme.colors.text.inverse};
  padding: 0.375rem 1rem;
  box-shadow: 0 4px 6px -1px rgb(0 0 0 / 0.1);
  flex-shrink: 0;
  display: flex;
  align-items: center;
  justify-content: space-between;
`

const TitleRow = styled.div`
  display: flex;
  align-items: baseline;
  gap: 0.5rem;
`

const HeaderTitle = styled.h1`
  font-size: 1rem;
  font-weight: 700;
  line-height: 1;
`

const HeaderSubtitle = styled.span`
  font-size: 0.75rem;
  color: ${p => p.theme.colors.text.headerSubtle};
`

const HeaderActions = styled.div`
  display: flex;
  align-items: center;
  gap: 0.5rem;
`

const HeaderButton = styled.button`
  padding: 0.25rem 0.625rem;
  border-radius: 0.375rem;
  font-size: 0.75rem;
  font-weight: 500;
  cursor: pointer;
  border: 1px solid rgba(255, 255, 255, 0.3);
  background: transparent;
  color: ${p => p.theme.colors.text.inverse};

  &:hover {
    background: rgba(255, 255, 255, 0.1);
  }
`

const MainContent = styled.div`
  flex: 1;
  display: flex;
  overflow: hidden;
  min-height: 0;

  @media (max-width: 768px) {
    flex-direction: column;
    overflow-y: auto;
  }
`

const InputArea = styled.aside`
  width: 22rem;
  flex-shrink: 0;
  border-right: 1px solid ${p => p.theme.colors.border.main};
  background-color: ${p => p.theme.colors.background.panel};
  overflow-y: auto;

  @media (max-width: 768px) {
    width: 100%;
    border-right: none;
    border-bottom: 1px solid ${p => p.theme.colors.border.main};
  }
`

const ResultsArea = styled.main`
  flex: 1;
  min-width: 0;
  background: linear-gradient(to bottom, ${p => p.theme.colors.background.panel}, ${p => p.theme.colors.background.app});
`

const Footer = styled.footer`
  flex-shrink: 0;
  padding: 0.375rem 1rem;
  font-size: 0.6875rem;
  color: ${p => p.theme.colors.text.muted};
  background-color: ${p => p.theme.colors.background.footer};
  border-top: 1px solid ${p => p.theme.colors.border.subtle};
`

export const App = observer(() => {
  const uiStore = useUIStore()

  return (
    <AppContainer>
      <Header>
        <TitleRow>
          <HeaderTitle>DC Motor Calculator</HeaderTitle>
          <HeaderSubtitle>Maximum power and efficiency operating points</HeaderSubtitle>
        </TitleRow>
        <HeaderActions>
          <HeaderButton type="button" onClick={() => uiStore.openGlossary()}>
            Glossary
          </HeaderButton>
          <ThemeToggle />
        </HeaderActions>
      </Header>

      <MainContent>
        <InputArea>
          <MotorInputPanel />
        </InputArea>
        <ResultsArea>
          <ResultsPanel />
        </ResultsArea>
      </MainContent>

      <Footer>
        Results assume a brushed DC motor with constant Kv and armature resistance.
      </Footer>

      <Toast />
      <GlossaryModal />
    </AppContainer>
  )
})
