import { Component, type ReactNode } from 'react'
import PlotlyModule, { type PlotParams } from 'react-plotly.js'

import type { Figure } from '../lib/plotBuilders'

const PlotComponent: React.ComponentType<PlotParams> =
  ((PlotlyModule as unknown as { default?: React.ComponentType<PlotParams> }).default ??
    (PlotlyModule as unknown as React.ComponentType<PlotParams>))

class PlotErrorBoundary extends Component<
  {
    children: ReactNode
  },
  {
    hasError: boolean
    message: string
  }
> {
  state = { hasError: false, message: '' }

  static getDerivedStateFromError(error: unknown) {
    const message = error instanceof Error ? error.message : String(error)
    return { hasError: true, message }
  }

  render() {
    if (this.state.hasError) {
      return (
        <div
          style={{
            border: '1px solid var(--border)',
            padding: '1rem',
            borderRadius: '0.5rem',
            background: 'var(--card)',
          }}
        >
          <p style={{ margin: 0, color: 'crimson' }}>Plot failed to render.</p>
          <p style={{ marginTop: '0.5rem', marginBottom: 0, fontSize: '0.9rem' }}>{this.state.message}</p>
        </div>
      )
    }
    return this.props.children
  }
}

const plotConfig = { displaylogo: false, responsive: true }

export function PlotPanel({
  figure,
  height,
  label,
  emptyText,
}: {
  figure: Figure | null
  height: number
  label: string
  emptyText: string
}) {
  return (
    <div aria-label={label} style={{ border: '1px solid var(--border)', borderRadius: '0.5rem', minWidth: 0 }}>
      {figure ? (
        <PlotErrorBoundary>
          <PlotComponent
            data={figure.data}
            layout={figure.layout}
            config={plotConfig}
            useResizeHandler
            style={{ width: '100%', height: `${height}px` }}
          />
        </PlotErrorBoundary>
      ) : (
        <div
          style={{
            height: `${height}px`,
            display: 'grid',
            placeItems: 'center',
            fontSize: '0.9rem',
            opacity: 0.7,
          }}
        >
          {emptyText}
        </div>
      )}
    </div>
  )
}
