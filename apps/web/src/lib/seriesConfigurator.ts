import { postNotice, type NoticeSink } from './appEvents'
import { appConfig, type PlotLabels1D } from './config'
import { numericColumn, type TabularDataset } from './dataModel'
import { EmptySeriesListError, NoDataError, NoPlottableSeriesError, SeriesSkipError } from './errors'
import { logSessionEvent } from './sessionLogging'
import { formatTextTable, type TextColumn } from './textTable'

export type SeriesSpec = {
  /** Stable arena id; the rendered rows are keyed by it. */
  id: number
  /** Raw column index text; validated against the dataset at recompute time. */
  xColumn: string
  yColumn: string
  useSecondaryAxis: boolean
}

export type SeriesSpecDraft = Omit<SeriesSpec, 'id'>

export type SeriesSpecPatch = Partial<SeriesSpecDraft>

export type ResolvedSeries = {
  specId: number
  position: number
  x: number[]
  y: number[]
  xName: string
  yName: string
  label: string
  useSecondaryAxis: boolean
  color: string
}

export type SeriesSkip = {
  specId: number
  error: SeriesSkipError
}

export type SeriesResolution = {
  series: ResolvedSeries[]
  skipped: SeriesSkip[]
}

const INTEGER_PATTERN = /^[+-]?\d+$/

function draft(x: number, y: number, useSecondaryAxis: boolean): SeriesSpecDraft {
  return { xColumn: String(x), yColumn: String(y), useSecondaryAxis }
}

/**
 * Starting specs for a freshly loaded dataset. `null` stands for "nothing
 * loaded yet", which gets both standard specs.
 */
export function defaultSeriesSpecs(columnCount: number | null): SeriesSpecDraft[] {
  const out: SeriesSpecDraft[] = []
  if (columnCount === null || columnCount >= 2) out.push(draft(0, 1, false))
  if (columnCount === null || columnCount >= 4) out.push(draft(0, 3, true))
  if (!out.length) out.push(draft(0, 0, false))
  return out
}

function parseColumnIndex(text: string): number | null {
  const t = text.trim()
  if (!INTEGER_PATTERN.test(t)) return null
  const n = Number(t)
  return n === 0 ? 0 : n
}

function resolveOne(
  table: TabularDataset,
  spec: SeriesSpec,
  position: number,
  palette: readonly string[],
): ResolvedSeries | SeriesSkipError {
  const columnCount = table.columns.length
  const xIdx = parseColumnIndex(spec.xColumn)
  const yIdx = parseColumnIndex(spec.yColumn)
  if (xIdx === null || yIdx === null) {
    return new SeriesSkipError('invalid-index', position, 'Please enter valid integer numbers for column indices.')
  }

  for (const [axis, idx] of [
    ['X', xIdx],
    ['Y', yIdx],
  ] as const) {
    if (idx < 0 || idx >= columnCount) {
      return new SeriesSkipError(
        'out-of-bounds',
        position,
        `${axis} Column Index ${idx} is out of bounds. Max index is ${columnCount - 1}.`,
      )
    }
  }

  const xRaw = numericColumn(table, xIdx)
  const yRaw = numericColumn(table, yIdx)
  const x: number[] = []
  const y: number[] = []
  for (let i = 0; i < xRaw.length; i += 1) {
    if (Number.isNaN(xRaw[i]) || Number.isNaN(yRaw[i])) continue
    x.push(xRaw[i])
    y.push(yRaw[i])
  }

  if (!x.length) {
    return new SeriesSkipError(
      'no-plottable-data',
      position,
      'No valid numeric data points found for the selected columns to plot.',
    )
  }

  const xName = table.columns[xIdx]
  const yName = table.columns[yIdx]
  return {
    specId: spec.id,
    position,
    x,
    y,
    xName,
    yName,
    label: `(${xName} vs ${yName})`,
    useSecondaryAxis: spec.useSecondaryAxis,
    // Colors follow list position, so a skipped spec still holds its slot.
    color: palette[position % palette.length],
  }
}

export function resolveSeries(
  table: TabularDataset,
  specs: readonly SeriesSpec[],
  palette: readonly string[],
): SeriesResolution {
  const series: ResolvedSeries[] = []
  const skipped: SeriesSkip[] = []
  specs.forEach((spec, position) => {
    const resolved = resolveOne(table, spec, position, palette)
    if (resolved instanceof SeriesSkipError) skipped.push({ specId: spec.id, error: resolved })
    else series.push(resolved)
  })
  return { series, skipped }
}

/** One column per distinct column name; the first series to use a name supplies its values. */
export function buildPreviewTable(series: readonly ResolvedSeries[], decimals: number, missing: string): string {
  const columns: TextColumn[] = []
  const seen = new Set<string>()
  for (const s of series) {
    for (const [name, values] of [
      [s.xName, s.x],
      [s.yName, s.y],
    ] as const) {
      if (seen.has(name)) continue
      seen.add(name)
      columns.push({ name, values })
    }
  }
  return formatTextTable(columns, decimals, missing)
}

export type SeriesConfiguratorSnapshot = {
  table: TabularDataset | null
  specs: readonly SeriesSpec[]
  labels: PlotLabels1D
  /** `null` when the plot is cleared. */
  plotted: ResolvedSeries[] | null
  preview: string
  revision: number
}

export type SeriesConfiguratorOptions = {
  labels?: PlotLabels1D
  palette?: readonly string[]
  decimals?: number
  missing?: string
  notify?: NoticeSink
}

export type RecomputeOutcome = SeriesResolution | NoDataError | NoPlottableSeriesError

export class SeriesConfigurator {
  private table: TabularDataset | null = null
  private specs: SeriesSpec[] = []
  private labels: PlotLabels1D
  private plotted: ResolvedSeries[] | null = null
  private preview = ''
  private revision = 0
  private nextId = 1
  private snapshot: SeriesConfiguratorSnapshot
  private readonly palette: readonly string[]
  private readonly decimals: number
  private readonly missing: string
  private readonly notify: NoticeSink
  private readonly listeners = new Set<() => void>()

  constructor(options: SeriesConfiguratorOptions = {}) {
    this.labels = options.labels ?? appConfig.labels1d
    this.palette = options.palette?.length ? options.palette : appConfig.palette
    this.decimals = options.decimals ?? appConfig.previewDecimals
    this.missing = options.missing ?? appConfig.missingMarker
    this.notify = options.notify ?? postNotice
    this.append(draft(0, 1, false))
    this.snapshot = this.buildSnapshot()
  }

  subscribe = (listener: () => void): (() => void) => {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  getSnapshot = (): SeriesConfiguratorSnapshot => this.snapshot

  addSeries(defaultX = 0, defaultY = 0, defaultUseSecondaryAxis = false): SeriesSpec {
    const spec = this.append(draft(defaultX, defaultY, defaultUseSecondaryAxis))
    logSessionEvent({ type: 'series.added', payload: { ...spec } })
    if (this.table) this.recomputeAll()
    else this.publish()
    return spec
  }

  removeLastSeries(): SeriesSpec | EmptySeriesListError {
    const removed = this.specs.at(-1)
    if (!removed) {
      const error = new EmptySeriesListError()
      this.notify(error.toNotice())
      return error
    }

    this.specs = this.specs.slice(0, -1)
    logSessionEvent({ type: 'series.removed', payload: { ...removed } })
    this.recomputeAll()
    return removed
  }

  /** Empties the list without recomputing; the caller recomputes once afterwards. */
  clearAllSeries() {
    this.specs = []
  }

  updateSeries(id: number, patch: SeriesSpecPatch) {
    const idx = this.specs.findIndex((s) => s.id === id)
    if (idx < 0) return
    const next = this.specs.slice()
    next[idx] = { ...next[idx], ...patch }
    this.specs = next
    this.recomputeAll()
  }

  setLabels(labels: PlotLabels1D) {
    this.labels = labels
    this.recomputeAll()
  }

  onDatasetLoaded(table: TabularDataset | null): RecomputeOutcome {
    this.table = table
    this.clearAllSeries()
    for (const d of defaultSeriesSpecs(table ? table.columns.length : null)) this.append(d)
    return this.recomputeAll()
  }

  /** After a failed load: nothing loaded and a single editable starting row. */
  onLoadFailed() {
    this.table = null
    this.clearAllSeries()
    this.append(draft(0, 0, false))
    this.recomputeAll()
  }

  recomputeAll(): RecomputeOutcome {
    const table = this.table
    if (!table) {
      this.plotted = null
      this.preview = ''
      this.publish()
      return new NoDataError()
    }

    const resolution = resolveSeries(table, this.specs, this.palette)
    for (const skip of resolution.skipped) {
      logSessionEvent({
        type: 'series.skipped',
        message: skip.error.message,
        payload: { specId: skip.specId, reason: skip.error.reason },
      })
      this.notify(skip.error.toNotice())
    }

    this.revision += 1
    if (!resolution.series.length) {
      this.plotted = null
      this.preview = ''
      this.publish()
      const error = new NoPlottableSeriesError()
      this.notify(error.toNotice())
      return error
    }

    this.plotted = resolution.series
    this.preview = buildPreviewTable(resolution.series, this.decimals, this.missing)
    logSessionEvent({
      type: 'series.recomputed',
      payload: { plotted: resolution.series.length, skipped: resolution.skipped.length },
    })
    this.publish()
    return resolution
  }

  private append(d: SeriesSpecDraft): SeriesSpec {
    const spec: SeriesSpec = { id: this.nextId, ...d }
    this.nextId += 1
    this.specs = [...this.specs, spec]
    return spec
  }

  private buildSnapshot(): SeriesConfiguratorSnapshot {
    return {
      table: this.table,
      specs: this.specs,
      labels: this.labels,
      plotted: this.plotted,
      preview: this.preview,
      revision: this.revision,
    }
  }

  private publish() {
    this.snapshot = this.buildSnapshot()
    for (const listener of this.listeners) listener()
  }
}
