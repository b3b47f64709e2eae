import { observer } from 'mobx-react-lite'
import styled from '@emotion/styled'
import { keyframes, type Theme } from '@emotion/react'
import { useUIStore } from '../stores/RootStore'
import type { ToastType } from '../stores/UIStore'

const slideIn = keyframes`
  from {
    transform: translate(-50%, -100%);
    opacity: 0;
  }
  to {
    transform: translate(-50%, 0);
    opacity: 1;
  }
`

function toastPalette(theme: Theme, type: ToastType): { bg: string; border: string; text: string } {
  const { severity, accent } = theme.colors
  switch (type) {
    case 'error':
      return { bg: severity.highBg, border: severity.high, text: severity.highText }
    case 'success':
      return { bg: accent.greenBg, border: accent.green, text: accent.greenText }
    case 'info':
      return { bg: accent.indigoBg, border: accent.indigo, text: accent.indigoText }
  }
}

const ToastContainer = styled.div<{ toastType: ToastType }>`
  position: fixed;
  top: 1rem;
  left: 50%;
  transform: translateX(-50%);
  z-index: 9999;
  display: flex;
  align-items: center;
  gap: 0.625rem;
  padding: 0.75rem 1rem;
  border-radius: 0.5rem;
  box-shadow: 0 10px 25px rgb(0 0 0 / 0.2);
  animation: ${slideIn} 0.2s ease-out;
  max-width: 90vw;
  background-color: ${p => toastPalette(p.theme, p.toastType).bg};
  border: 1px solid ${p => toastPalette(p.theme, p.toastType).border};
  color: ${p => toastPalette(p.theme, p.toastType).text};
`

const ToastMessage = styled.span`
  font-size: 0.8125rem;
  font-weight: 600;
  line-height: 1.4;
`

const DismissButton = styled.button`
  background: none;
  border: none;
  padding: 0;
  cursor: pointer;
  font-size: 1rem;
  line-height: 1;
  flex-shrink: 0;
  color: inherit;
  opacity: 0.6;

  &:hover {
    opacity: 1;
  }
`

export const Toast = observer(() => {
  const uiStore = useUIStore()

  if (!uiStore.toastVisible) return null

  return (
    <ToastContainer toastType={uiStore.toastType} role="status">
      <ToastMessage>{uiStore.toastMessage}</ToastMessage>
      <DismissButton onClick={uiStore.dismissToast} aria-label="Dismiss">
        &times;
      </DismissButton>
    </ToastContainer>
  )
})
