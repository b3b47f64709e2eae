import { useRef } from 'react'
import { observer } from 'mobx-react-lite'
import styled from '@emotion/styled'
import { useUIStore } from '../stores/RootStore'
import { useAutorun, useObservableState } from '../lib/mobx-reactivity'
import {
  GLOSSARY_ENTRIES,
  GLOSSARY_CATEGORIES,
  GLOSSARY_CATEGORY_LABELS,
} from '../data/glossary'
import type { GlossaryCategory, GlossaryEntry } from '../data/glossary'

const Backdrop = styled.div`
  position: fixed;
  inset: 0;
  z-index: 200;
  display: flex;
  align-items: center;
  justify-content: center;
  background-color: rgba(0, 0, 0, 0.4);
`

const ModalContainer = styled.div`
  position: relative;
  z-index: 201;
  max-width: 36rem;
  width: 90vw;
  max-height: 80vh;
  display: flex;
  flex-direction: column;
  background-color: ${p => p.theme.colors.background.panel};
  border: 1px solid ${p => p.theme.colors.border.main};
  border-radius: 0.75rem;
  box-shadow: 0 25px 50px -12px rgb(0 0 0 / 0.25);
`

const ModalHeader = styled.div`
  display: flex;
  align-items: center;
  justify-content: space-between;
  padding: 1rem 1.25rem;
  border-bottom: 1px solid ${p => p.theme.colors.border.subtle};
`

const ModalTitle = styled.h2`
  font-size: 1.125rem;
  font-weight: 700;
  color: ${p => p.theme.colors.text.heading};
`

const CloseButton = styled.button`
  background: none;
  border: none;
  padding: 0.25rem;
  cursor: pointer;
  color: ${p => p.theme.colors.text.muted};
  font-size: 1.25rem;
  line-height: 1;

  &:hover {
    color: ${p => p.theme.colors.text.primary};
  }
`

const SearchInput = styled.input`
  margin: 0.75rem 1.25rem 0;
  padding: 0.5rem 0.75rem;
  font-size: 0.8125rem;
  border: 1px solid ${p => p.theme.colors.border.main};
  border-radius: 0.375rem;
  background-color: ${p => p.theme.colors.background.section};
  color: ${p => p.theme.colors.text.primary};

  &::placeholder {
    color: ${p => p.theme.colors.text.muted};
  }

  &:focus {
    outline: none;
    border-color: ${p => p.theme.colors.border.focus};
  }
`

const ModalBody = styled.div`
  flex: 1;
  overflow-y: auto;
  padding: 0.75rem 1.25rem 1rem;
`

const CategoryHeading = styled.h3`
  font-size: 0.6875rem;
  font-weight: 700;
  text-transform: uppercase;
  letter-spacing: 0.05em;
  color: ${p => p.theme.colors.text.muted};
  margin: 0.5rem 0;
  padding-bottom: 0.25rem;
  border-bottom: 1px solid ${p => p.theme.colors.border.subtle};
`

const EntryRow = styled.div<{ isTarget: boolean }>`
  padding: 0.5rem 0.625rem;
  border-radius: 0.375rem;
  transition: background-color 0.3s;
  background-color: ${p => (p.isTarget ? p.theme.colors.accent.indigoBg : 'transparent')};
`

const TermName = styled.span`
  font-weight: 700;
  font-size: 0.875rem;
  color: ${p => p.theme.colors.text.heading};
`

const Explanation = styled.p`
  font-size: 0.8125rem;
  margin-top: 0.125rem;
  line-height: 1.4;
`

const Detail = styled.p`
  font-size: 0.75rem;
  color: ${p => p.theme.colors.text.secondary};
  margin-top: 0.25rem;
  line-height: 1.4;
`

const EmptyMessage = styled.p`
  color: ${p => p.theme.colors.text.muted};
  font-size: 0.875rem;
  text-align: center;
  padding: 2rem 0;
`

function matchesFilter(entry: GlossaryEntry, filter: string): boolean {
  if (!filter) return true
  const needle = filter.toLowerCase()
  return entry.term.toLowerCase().includes(needle) || entry.explanation.toLowerCase().includes(needle)
}

function entriesIn(category: GlossaryCategory, entries: GlossaryEntry[]): GlossaryEntry[] {
  return entries.filter(e => e.category === category)
}

export const GlossaryModal = observer(() => {
  const uiStore = useUIStore()
  const bodyRef = useRef<HTMLDivElement>(null)
  const [filter, setFilter] = useObservableState('')

  // Bring the requested term into view when opened from a field label
  useAutorun(() => {
    const termId = uiStore.glossaryTargetTerm
    if (!termId || !uiStore.glossaryOpen) return
    setFilter('')
    requestAnimationFrame(() => {
      bodyRef.current
        ?.querySelector(`[data-term-id="${termId}"]`)
        ?.scrollIntoView({ behavior: 'smooth', block: 'center' })
    })
  })

  if (!uiStore.glossaryOpen) return null

  const filtered = GLOSSARY_ENTRIES.filter(e => matchesFilter(e, filter))

  return (
    <Backdrop
      onClick={e => {
        if (e.target === e.currentTarget) uiStore.closeGlossary()
      }}
      onKeyDown={e => {
        if (e.key === 'Escape') uiStore.closeGlossary()
      }}
    >
      <ModalContainer role="dialog" aria-label="Glossary">
        <ModalHeader>
          <ModalTitle>Glossary</ModalTitle>
          <CloseButton onClick={uiStore.closeGlossary} aria-label="Close">&times;</CloseButton>
        </ModalHeader>
        <SearchInput
          type="text"
          placeholder="Search terms..."
          value={filter}
          onChange={e => setFilter(e.target.value)}
          autoFocus
        />
        <ModalBody ref={bodyRef}>
          {filtered.length === 0 ? (
            <EmptyMessage>No matching terms found.</EmptyMessage>
          ) : (
            GLOSSARY_CATEGORIES.map(category => {
              const entries = entriesIn(category, filtered)
              if (entries.length === 0) return null
              return (
                <section key={category}>
                  <CategoryHeading>{GLOSSARY_CATEGORY_LABELS[category]}</CategoryHeading>
                  {entries.map(entry => (
                    <EntryRow
                      key={entry.id}
                      data-term-id={entry.id}
                      isTarget={uiStore.glossaryTargetTerm === entry.id}
                    >
                      <TermName>{entry.term}</TermName>
                      <Explanation>{entry.explanation}</Explanation>
                      {entry.detail && <Detail>{entry.detail}</Detail>}
                    </EntryRow>
                  ))}
                </section>
              )
            })
          )}
        </ModalBody>
      </ModalContainer>
    </Backdrop>
  )
})
