import styled from '@emotion/styled'

type BannerVariant = 'error' | 'warning'

const Container = styled.div<{ variant: BannerVariant }>`
  border-radius: 0.5rem;
  padding: 0.75rem 1rem;
  background: ${p => p.variant === 'error' ? p.theme.colors.severity.highBg : p.theme.colors.severity.mediumBg};
  border: 1px solid ${p => p.variant === 'error' ? p.theme.colors.severity.high : p.theme.colors.severity.medium}66;
  color: ${p => p.variant === 'error' ? p.theme.colors.severity.highText : p.theme.colors.severity.mediumText};
`

const Heading = styled.div`
  font-size: 0.8125rem;
  font-weight: 700;
  margin-bottom: 0.25rem;
`

const Body = styled.p`
  font-size: 0.8125rem;
  line-height: 1.5;
`

interface ValidationBannerProps {
  variant: BannerVariant
  message: string
}

export function ValidationBanner({ variant, message }: ValidationBannerProps) {
  return (
    <Container variant={variant} role={variant === 'error' ? 'alert' : 'status'}>
      <Heading>{variant === 'error' ? 'Error' : 'Warning'}</Heading>
      <Body>{message}</Body>
    </Container>
  )
}
