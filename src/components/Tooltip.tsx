import type { ReactNode } from 'react'
import styled from '@emotion/styled'

const Wrapper = styled.span`
  position: relative;
  display: inline-flex;

  &:hover > [data-tooltip] {
    opacity: 1;
  }
`

const Bubble = styled.span<{ side: 'left' | 'right' }>`
  position: absolute;
  top: 100%;
  ${p => (p.side === 'right' ? 'right: 0;' : 'left: 0;')}
  margin-top: 6px;
  white-space: nowrap;
  padding: 0.375rem 0.5rem;
  border-radius: 0.375rem;
  font-size: 0.6875rem;
  font-weight: 400;
  line-height: 1.4;
  color: ${p => p.theme.colors.text.primary};
  background-color: ${p => p.theme.colors.tooltip.background};
  border: 1px solid ${p => p.theme.colors.tooltip.border};
  box-shadow: 0 2px 8px rgba(0, 0, 0, 0.15);
  pointer-events: none;
  opacity: 0;
  z-index: 1000;
  transition: opacity 0.15s;
`

interface TooltipProps {
  text: string
  children: ReactNode
  align?: 'left' | 'right'
}

export function Tooltip({ text, children, align = 'right' }: TooltipProps): ReactNode {
  if (!text) return children

  return (
    <Wrapper>
      {children}
      <Bubble data-tooltip side={align}>{text}</Bubble>
    </Wrapper>
  )
}
