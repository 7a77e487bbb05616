import type { Data, Layout } from 'plotly.js'

import type { AppConfig, PlotLabels1D, PlotLabels2D } from './config'
import type { CutSlice } from './cutNavigator'
import type { LoadedMatrix } from './dataModel'
import type { PlotTheme } from './theme'

export type Figure = {
  data: Data[]
  layout: Partial<Layout>
}

export type LineSeries = {
  x: number[]
  y: number[]
  label: string
  color: string
  useSecondaryAxis: boolean
}

export const SECONDARY_AXIS_TITLE = 'Secondary Y-axis'

// Plotly serializes NaN poorly; gaps are expressed as null.
function gaps(values: readonly number[]): Array<number | null> {
  return values.map((v) => (Number.isFinite(v) ? v : null))
}

function baseLayout(title: string, theme: PlotTheme): Partial<Layout> {
  return {
    autosize: true,
    title: { text: title },
    margin: { l: 60, r: 60, t: 50, b: 50 },
    paper_bgcolor: theme.paper,
    plot_bgcolor: theme.plot,
    font: { color: theme.text },
  }
}

export function buildHeatmapFigure(
  matrix: LoadedMatrix,
  labels: PlotLabels2D,
  theme: PlotTheme,
  config: Pick<AppConfig, 'heatmapColorscale' | 'heatmapReverseScale'>,
): Figure {
  return {
    data: [
      {
        type: 'heatmap',
        z: matrix.data.map(gaps),
        x: gaps(matrix.xCoords),
        y: gaps(matrix.yCoords),
        colorscale: config.heatmapColorscale,
        reversescale: config.heatmapReverseScale,
        colorbar: { title: { text: labels.colorbar, font: {}, side: 'right' } },
      },
    ],
    layout: {
      ...baseLayout(labels.title, theme),
      xaxis: { title: { text: labels.xAxis } },
      yaxis: { title: { text: labels.yAxis } },
    },
  }
}

/**
 * Primary series share the left y axis. The right axis is only created once
 * some series asks for it.
 */
export function buildLineFigure(series: readonly LineSeries[], labels: PlotLabels1D, theme: PlotTheme): Figure {
  let hasSecondary = false
  const data: Data[] = series.map((s): Data => {
    if (s.useSecondaryAxis) hasSecondary = true
    return {
      type: 'scatter',
      mode: 'lines',
      x: gaps(s.x),
      y: gaps(s.y),
      name: s.label,
      line: { color: s.color },
      yaxis: s.useSecondaryAxis ? 'y2' : 'y',
    }
  })

  const layout: Partial<Layout> = {
    ...baseLayout(labels.title, theme),
    showlegend: true,
    legend: { orientation: 'h' },
    xaxis: { title: { text: labels.xAxis }, showgrid: true, gridcolor: theme.grid, griddash: 'dash' },
    yaxis: { title: { text: labels.yAxis }, showgrid: true, gridcolor: theme.grid, griddash: 'dash' },
  }
  if (hasSecondary) {
    layout.yaxis2 = { title: { text: SECONDARY_AXIS_TITLE }, overlaying: 'y', side: 'right', showgrid: false }
  }

  return { data, layout }
}

export function buildCutFigure(slice: CutSlice, color: string, theme: PlotTheme): Figure {
  return buildLineFigure(
    [{ ...slice.series, color, useSecondaryAxis: false }],
    { title: slice.title, xAxis: slice.xAxisTitle, yAxis: slice.yAxisTitle },
    theme,
  )
}
