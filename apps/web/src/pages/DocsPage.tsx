import { useEffect, useMemo, useState } from 'react'
import { useSearchParams } from 'react-router-dom'
import ReactMarkdown from 'react-markdown'

import fileFormats from '../../../../docs/file-formats.md?raw'
import glossary from '../../../../docs/glossary.md?raw'
import userGuide from '../../../../docs/user-guide.md?raw'

type DocEntry = {
  id: string
  title: string
  content: string
}

const docs: DocEntry[] = [
  { id: 'user-guide', title: 'User guide', content: userGuide },
  { id: 'file-formats', title: 'File formats', content: fileFormats },
  { id: 'glossary', title: 'Glossary', content: glossary },
]

const DEFAULT_DOC = 'user-guide'

export function DocsPage() {
  const [searchParams, setSearchParams] = useSearchParams()
  const [query, setQuery] = useState(() => searchParams.get('q') ?? '')
  const [selectedDocId, setSelectedDocId] = useState(() => searchParams.get('doc') ?? DEFAULT_DOC)

  useEffect(() => {
    if (!docs.some((d) => d.id === selectedDocId)) setSelectedDocId(DEFAULT_DOC)
  }, [selectedDocId])

  useEffect(() => {
    const next = new URLSearchParams(searchParams)
    if (query.trim() === '') next.delete('q')
    else next.set('q', query)

    if (selectedDocId === DEFAULT_DOC) next.delete('doc')
    else next.set('doc', selectedDocId)

    setSearchParams(next, { replace: true })
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [query, selectedDocId])

  const filteredDocs = useMemo(() => {
    const q = query.trim().toLowerCase()
    if (!q) return docs
    return docs.filter((d) => d.title.toLowerCase().includes(q) || d.content.toLowerCase().includes(q))
  }, [query])

  const selectedDoc = docs.find((d) => d.id === selectedDocId) ?? docs[0]

  return (
    <section>
      <h1>Help</h1>

      <div style={{ display: 'grid', gridTemplateColumns: '240px 1fr', gap: '1rem', minHeight: 0 }}>
        <aside style={{ borderRight: '1px solid var(--border)', paddingRight: '1rem' }}>
          <label htmlFor="docs-search" style={{ display: 'block', fontWeight: 700, marginBottom: '0.25rem' }}>
            Search
          </label>
          <input
            id="docs-search"
            aria-label="Search docs"
            value={query}
            onChange={(e) => setQuery(e.target.value)}
            placeholder="Try: Twinx, corner, NaN"
            style={{ width: '100%' }}
          />

          <div style={{ display: 'grid', gap: '0.25rem', marginTop: '0.75rem' }}>
            {filteredDocs.length ? (
              filteredDocs.map((d) => (
                <button
                  key={d.id}
                  type="button"
                  onClick={() => setSelectedDocId(d.id)}
                  style={{
                    textAlign: 'left',
                    padding: '0.25rem 0.5rem',
                    border: '1px solid var(--border)',
                    background: d.id === selectedDoc.id ? 'var(--accent)' : 'transparent',
                    color: 'inherit',
                    cursor: 'pointer',
                  }}
                >
                  {d.title}
                </button>
              ))
            ) : (
              <p style={{ marginTop: '0.25rem' }}>No matches.</p>
            )}
          </div>
        </aside>

        <article style={{ minWidth: 0, overflow: 'auto', maxHeight: '75vh' }}>
          <ReactMarkdown>{selectedDoc.content}</ReactMarkdown>
        </article>
      </div>
    </section>
  )
}
