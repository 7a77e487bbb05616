import { useMemo } from 'react'

import { CommitInput } from '../components/CommitInput'
import { PlotPanel } from '../components/PlotPanel'
import { useCutNavigatorSnapshot, useFieldValue, useWorkbench } from '../layout/workbenchContext'
import { appConfig, type PlotLabels2D } from '../lib/config'
import type { CutAxis } from '../lib/cutNavigator'
import { buildCutFigure, buildHeatmapFigure } from '../lib/plotBuilders'
import { plotThemes } from '../lib/theme'

const labelFields: Array<{ key: keyof PlotLabels2D; label: string }> = [
  { key: 'title', label: 'Plot Title' },
  { key: 'xAxis', label: 'X-axis Label' },
  { key: 'yAxis', label: 'Y-axis Label' },
  { key: 'colorbar', label: 'Colorbar Label' },
]

const previewStyle = {
  width: '100%',
  minHeight: '10rem',
  fontFamily: 'ui-monospace, SFMono-Regular, Menlo, monospace',
  fontSize: '0.8rem',
  resize: 'vertical',
} as const

function CutControl({ axis, label }: { axis: CutAxis; label: string }) {
  const { navigator } = useWorkbench()
  const field = axis === 'row' ? navigator.rowField : navigator.colField
  const text = useFieldValue(field)

  return (
    <div style={{ display: 'flex', gap: '0.5rem', alignItems: 'center' }}>
      <label style={{ minWidth: '10rem' }}>
        {label}
        <input
          aria-label={label}
          inputMode="numeric"
          value={text}
          onChange={(e) => field.set(e.target.value)}
          style={{ marginLeft: '0.5rem', width: '5rem' }}
        />
      </label>
      <button type="button" aria-label={`Previous ${label}`} onClick={() => navigator.navigate(axis, -1)}>
        Prev
      </button>
      <button type="button" aria-label={`Next ${label}`} onClick={() => navigator.navigate(axis, 1)}>
        Next
      </button>
    </div>
  )
}

export function HeatmapPage() {
  const { navigator, theme } = useWorkbench()
  const snapshot = useCutNavigatorSnapshot(navigator)
  const { matrix, labels, slices } = snapshot
  const plotTheme = plotThemes[theme]

  const heatmap = useMemo(
    () => (matrix ? buildHeatmapFigure(matrix, labels, plotTheme, appConfig) : null),
    [matrix, labels, plotTheme],
  )
  const xCutFigure = useMemo(
    () => (slices ? buildCutFigure(slices.xCut, appConfig.palette[0], plotTheme) : null),
    [slices, plotTheme],
  )
  const yCutFigure = useMemo(
    () => (slices ? buildCutFigure(slices.yCut, appConfig.palette[0], plotTheme) : null),
    [slices, plotTheme],
  )

  return (
    <section>
      <h1>2D Data Plot</h1>
      <p style={{ marginTop: '0.25rem' }}>
        {matrix
          ? `${matrix.sourceName}: ${matrix.data.length} rows × ${matrix.xCoords.length} columns`
          : 'Choose a 2D folder and click a .csv or .txt file.'}
      </p>

      <div style={{ display: 'grid', gridTemplateColumns: 'minmax(0, 2fr) minmax(280px, 1fr)', gap: '1rem' }}>
        <PlotPanel figure={heatmap} height={480} label="Heatmap" emptyText="No 2D data loaded." />

        <div style={{ display: 'grid', gap: '0.75rem', alignContent: 'start' }}>
          <h2 style={{ fontSize: '1rem', margin: 0 }}>2D Plot Labels &amp; Cut Controls</h2>
          {labelFields.map((f) => (
            <label key={f.key} style={{ display: 'grid', gap: '0.125rem' }}>
              <span style={{ fontSize: '0.85rem' }}>{f.label}</span>
              <CommitInput
                aria-label={f.label}
                value={labels[f.key]}
                onCommit={(value) => navigator.setLabels({ ...labels, [f.key]: value })}
              />
            </label>
          ))}

          <h3 style={{ fontSize: '0.95rem', marginBottom: 0 }}>Direct Cut Index Input</h3>
          <CutControl axis="row" label="Y-Index for X-Cut" />
          <CutControl axis="col" label="X-Index for Y-Cut" />
        </div>

        <PlotPanel figure={xCutFigure} height={300} label="X-Cut plot" emptyText="X-Cut appears here." />
        <textarea
          readOnly
          aria-label="X-Cut data"
          placeholder="X-Cut Data will appear here (Value vs X)"
          value={slices?.xCut.preview ?? ''}
          style={previewStyle}
        />

        <PlotPanel figure={yCutFigure} height={300} label="Y-Cut plot" emptyText="Y-Cut appears here." />
        <textarea
          readOnly
          aria-label="Y-Cut data"
          placeholder="Y-Cut Data will appear here (Value vs Y)"
          value={slices?.yCut.preview ?? ''}
          style={previewStyle}
        />
      </div>
    </section>
  )
}
