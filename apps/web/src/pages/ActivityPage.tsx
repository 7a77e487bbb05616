import { useMemo, useSyncExternalStore } from 'react'

import { clearSessionEvents, listSessionEvents, subscribeSessionEvents, type SessionEvent } from '../lib/sessionLogging'

function formatTimestamp(iso: string) {
  const raw = iso.trim()
  if (!raw) return ''
  const d = new Date(raw)
  return Number.isNaN(d.getTime()) ? raw : d.toLocaleTimeString()
}

function EventRow({ event }: { event: SessionEvent }) {
  return (
    <li
      data-testid="activity-event"
      style={{ borderBottom: '1px solid var(--border)', padding: '0.25rem 0', fontSize: '0.85rem' }}
    >
      <div style={{ display: 'flex', gap: '0.5rem' }}>
        <code>{event.type}</code>
        <span style={{ marginLeft: 'auto', opacity: 0.7 }}>{formatTimestamp(event.created_at)}</span>
      </div>
      {event.message ? <div style={{ whiteSpace: 'pre-wrap' }}>{event.message}</div> : null}
    </li>
  )
}

export function ActivityPage() {
  const events = useSyncExternalStore(subscribeSessionEvents, listSessionEvents)
  const newestFirst = useMemo(() => events.slice().reverse(), [events])

  return (
    <section>
      <div style={{ display: 'flex', alignItems: 'center', gap: '0.5rem' }}>
        <h2 style={{ fontSize: '1rem', margin: 0 }}>Activity</h2>
        <button
          type="button"
          onClick={() => clearSessionEvents()}
          disabled={!events.length}
          style={{ marginLeft: 'auto' }}
        >
          Clear
        </button>
      </div>
      {newestFirst.length ? (
        <ul aria-label="Activity log" style={{ listStyle: 'none', margin: '0.5rem 0 0', padding: 0 }}>
          {newestFirst.map((e) => (
            <EventRow key={e.id} event={e} />
          ))}
        </ul>
      ) : (
        <p style={{ fontSize: '0.85rem', opacity: 0.7 }}>No activity yet.</p>
      )}
    </section>
  )
}
