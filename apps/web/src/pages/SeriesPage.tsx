import { useMemo } from 'react'

import { CommitInput } from '../components/CommitInput'
import { PlotPanel } from '../components/PlotPanel'
import { useSeriesSnapshot, useWorkbench } from '../layout/workbenchContext'
import type { PlotLabels1D } from '../lib/config'
import { buildLineFigure } from '../lib/plotBuilders'
import type { SeriesSpec } from '../lib/seriesConfigurator'
import { plotThemes } from '../lib/theme'

const labelFields: Array<{ key: keyof PlotLabels1D; label: string }> = [
  { key: 'title', label: 'Plot Title' },
  { key: 'xAxis', label: 'X-axis Label' },
  { key: 'yAxis', label: 'Y-axis Label' },
]

function SeriesRow({ spec, position }: { spec: SeriesSpec; position: number }) {
  const { configurator } = useWorkbench()
  const name = `Series ${position + 1}`

  return (
    <div
      data-testid="series-row"
      style={{
        display: 'flex',
        gap: '0.5rem',
        alignItems: 'center',
        border: '1px solid var(--border)',
        borderRadius: '0.25rem',
        padding: '0.25rem 0.5rem',
      }}
    >
      <span style={{ fontWeight: 700 }}>{name}:</span>
      <label>
        X:{' '}
        <CommitInput
          aria-label={`${name} X column`}
          inputMode="numeric"
          value={spec.xColumn}
          onCommit={(value) => configurator.updateSeries(spec.id, { xColumn: value })}
          style={{ width: '4rem' }}
        />
      </label>
      <label>
        Y:{' '}
        <CommitInput
          aria-label={`${name} Y column`}
          inputMode="numeric"
          value={spec.yColumn}
          onCommit={(value) => configurator.updateSeries(spec.id, { yColumn: value })}
          style={{ width: '4rem' }}
        />
      </label>
      <label>
        <input
          type="checkbox"
          aria-label={`${name} secondary axis`}
          checked={spec.useSecondaryAxis}
          onChange={(e) => configurator.updateSeries(spec.id, { useSecondaryAxis: e.target.checked })}
        />{' '}
        Twinx
      </label>
    </div>
  )
}

export function SeriesPage() {
  const { configurator, theme } = useWorkbench()
  const snapshot = useSeriesSnapshot(configurator)
  const { table, specs, labels, plotted, preview } = snapshot
  const plotTheme = plotThemes[theme]

  const figure = useMemo(
    () => (plotted ? buildLineFigure(plotted, labels, plotTheme) : null),
    [plotted, labels, plotTheme],
  )

  return (
    <section>
      <h1>1D Data Plot</h1>
      <p style={{ marginTop: '0.25rem' }}>
        {table
          ? `${table.sourceName}: ${table.rows.length} rows, columns ${table.columns
              .map((c, i) => `${i}=${c}`)
              .join(', ')}`
          : 'Choose a 1D folder and click a data file.'}
      </p>

      <div style={{ display: 'grid', gridTemplateColumns: 'minmax(0, 2fr) minmax(280px, 1fr)', gap: '1rem' }}>
        <PlotPanel figure={figure} height={480} label="Line plot" emptyText="No 1D series plotted." />

        <div style={{ display: 'grid', gap: '0.75rem', alignContent: 'start' }}>
          <h2 style={{ fontSize: '1rem', margin: 0 }}>1D Plot Labels</h2>
          {labelFields.map((f) => (
            <label key={f.key} style={{ display: 'grid', gap: '0.125rem' }}>
              <span style={{ fontSize: '0.85rem' }}>{f.label}</span>
              <CommitInput
                aria-label={f.label}
                value={labels[f.key]}
                onCommit={(value) => configurator.setLabels({ ...labels, [f.key]: value })}
              />
            </label>
          ))}
        </div>

        <div style={{ display: 'grid', gap: '0.5rem', alignContent: 'start' }}>
          <h2 style={{ fontSize: '1rem', margin: 0 }}>1D Data Values</h2>
          <textarea
            readOnly
            aria-label="1D data"
            placeholder="1D Data will appear here (X vs Y)"
            value={preview}
            style={{
              width: '100%',
              minHeight: '14rem',
              fontFamily: 'ui-monospace, SFMono-Regular, Menlo, monospace',
              fontSize: '0.8rem',
            }}
          />
        </div>

        <div style={{ display: 'grid', gap: '0.5rem', alignContent: 'start' }}>
          <h2 style={{ fontSize: '1rem', margin: 0 }}>Plot Series</h2>
          <div style={{ display: 'grid', gap: '0.25rem', maxHeight: '18rem', overflow: 'auto' }}>
            {specs.map((spec, position) => (
              <SeriesRow key={spec.id} spec={spec} position={position} />
            ))}
          </div>
          <div style={{ display: 'flex', gap: '0.5rem' }}>
            <button type="button" onClick={() => configurator.addSeries()}>
              Add Plot Series
            </button>
            <button type="button" onClick={() => configurator.removeLastSeries()}>
              Remove Last Series
            </button>
          </div>
        </div>
      </div>
    </section>
  )
}
