import type { Notice, NoticeLevel } from '../lib/appEvents'

const levelColor: Record<NoticeLevel, string> = {
  info: '#2563eb',
  warning: '#d97706',
  error: 'crimson',
}

export function NoticeStack({ notices, onDismiss }: { notices: Notice[]; onDismiss: (id: string) => void }) {
  if (!notices.length) return null

  return (
    <div
      aria-label="Notices"
      style={{
        position: 'fixed',
        right: '1rem',
        bottom: '1rem',
        display: 'grid',
        gap: '0.5rem',
        width: 'min(420px, calc(100vw - 2rem))',
        zIndex: 100,
      }}
    >
      {notices.map((n) => (
        <div
          key={n.id}
          role={n.level === 'error' ? 'alert' : 'status'}
          style={{
            border: '1px solid var(--border)',
            borderLeft: `4px solid ${levelColor[n.level]}`,
            background: 'var(--card)',
            padding: '0.5rem 0.75rem',
            borderRadius: '0.25rem',
          }}
        >
          <div style={{ display: 'flex', alignItems: 'center', gap: '0.5rem' }}>
            <strong style={{ flex: 1 }}>{n.title}</strong>
            <button
              type="button"
              aria-label={`Dismiss ${n.title}`}
              onClick={() => onDismiss(n.id)}
              style={{ border: 'none', background: 'transparent', color: 'inherit', cursor: 'pointer' }}
            >
              ×
            </button>
          </div>
          <p style={{ margin: '0.25rem 0 0', fontSize: '0.9rem', whiteSpace: 'pre-wrap' }}>{n.message}</p>
        </div>
      ))}
    </div>
  )
}
