import { postNotice, type NoticeSink } from './appEvents'
import { appConfig, type PlotLabels2D } from './config'
import { matrixShape, type LoadedMatrix } from './dataModel'
import { CutIndexParseError, CutIndexRangeError, type CutAxis } from './errors'
import { ObservableField } from './observableField'
import { logSessionEvent } from './sessionLogging'
import { formatFixed, formatTextTable } from './textTable'

export type { CutAxis } from './errors'

export type CutState = {
  rowCutIndex: number
  colCutIndex: number
}

export type CutSeries = {
  x: number[]
  y: number[]
  label: string
}

export type CutSlice = {
  title: string
  xAxisTitle: string
  yAxisTitle: string
  series: CutSeries
  preview: string
}

export type CutSlices = {
  /** Values along x at the row cursor. */
  xCut: CutSlice
  /** Values along y at the column cursor. */
  yCut: CutSlice
}

export type CutIndexParse =
  | { status: 'ok'; value: number }
  | { status: 'pending' }
  | { status: 'error'; error: CutIndexParseError | CutIndexRangeError }

export type CutEditResult = 'changed' | 'unchanged' | 'pending' | 'no-data' | CutIndexParseError | CutIndexRangeError

const INTEGER_PATTERN = /^[+-]?\d+$/

export function parseCutIndex(axis: CutAxis, rawText: string, maxIndex: number): CutIndexParse {
  const text = rawText.trim()
  // An emptied field is a half-finished edit, not an error.
  if (!text) return { status: 'pending' }
  if (!INTEGER_PATTERN.test(text)) return { status: 'error', error: new CutIndexParseError(axis, rawText) }

  const parsed = Number(text)
  const value = parsed === 0 ? 0 : parsed
  if (value < 0 || value > maxIndex) {
    return { status: 'error', error: new CutIndexRangeError(axis, value, maxIndex) }
  }
  return { status: 'ok', value }
}

export function clampCutIndex(value: number, maxIndex: number): number {
  return Math.max(0, Math.min(maxIndex, value))
}

export function maxCutIndex(matrix: LoadedMatrix, axis: CutAxis): number {
  const { rowCount, colCount } = matrixShape(matrix)
  return (axis === 'row' ? rowCount : colCount) - 1
}

export function extractCutSlices(
  matrix: LoadedMatrix,
  cut: CutState,
  labels: PlotLabels2D,
  decimals: number,
  missing: string,
): CutSlices {
  const rowValues = [...(matrix.data[cut.rowCutIndex] ?? [])]
  const colValues = matrix.data.map((row) => row[cut.colCutIndex] ?? NaN)
  const yAt = formatFixed(matrix.yCoords[cut.rowCutIndex] ?? NaN, decimals, missing)
  const xAt = formatFixed(matrix.xCoords[cut.colCutIndex] ?? NaN, decimals, missing)

  return {
    xCut: {
      title: `X-Cut at Y-coord ${yAt}`,
      xAxisTitle: labels.xAxis,
      yAxisTitle: labels.colorbar,
      series: { x: [...matrix.xCoords], y: rowValues, label: 'X-Cut Data' },
      preview:
        `Y-Coordinate: ${yAt}\n` +
        formatTextTable(
          [
            { name: labels.xAxis, values: matrix.xCoords },
            { name: labels.colorbar, values: rowValues },
          ],
          decimals,
          missing,
        ),
    },
    yCut: {
      title: `Y-Cut at X-coord ${xAt}`,
      xAxisTitle: labels.yAxis,
      yAxisTitle: labels.colorbar,
      series: { x: [...matrix.yCoords], y: colValues, label: 'Y-Cut Data' },
      preview:
        `X-Coordinate: ${xAt}\n` +
        formatTextTable(
          [
            { name: labels.yAxis, values: matrix.yCoords },
            { name: labels.colorbar, values: colValues },
          ],
          decimals,
          missing,
        ),
    },
  }
}

export type CutNavigatorSnapshot = {
  matrix: LoadedMatrix | null
  cut: CutState
  labels: PlotLabels2D
  slices: CutSlices | null
  /** Incremented on every slice recompute. */
  sliceRevision: number
}

export type CutNavigatorOptions = {
  labels?: PlotLabels2D
  decimals?: number
  missing?: string
  notify?: NoticeSink
}

/**
 * Owns the two cut cursors into the loaded matrix. The row and column fields
 * are views of the cursors: user edits arrive through `field.set`, every
 * write-back from here goes through `setSilently`.
 */
export class CutNavigator {
  readonly rowField = new ObservableField('0')
  readonly colField = new ObservableField('0')

  private matrix: LoadedMatrix | null = null
  private cut: CutState = { rowCutIndex: 0, colCutIndex: 0 }
  private labels: PlotLabels2D
  private slices: CutSlices | null = null
  private sliceRevision = 0
  private snapshot: CutNavigatorSnapshot
  private readonly decimals: number
  private readonly missing: string
  private readonly notify: NoticeSink
  private readonly listeners = new Set<() => void>()

  constructor(options: CutNavigatorOptions = {}) {
    this.labels = options.labels ?? appConfig.labels2d
    this.decimals = options.decimals ?? appConfig.previewDecimals
    this.missing = options.missing ?? appConfig.missingMarker
    this.notify = options.notify ?? postNotice
    this.snapshot = this.buildSnapshot()

    this.rowField.onChange((text) => {
      this.setRowCut(text)
    })
    this.colField.onChange((text) => {
      this.setColCut(text)
    })
  }

  subscribe = (listener: () => void): (() => void) => {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  getSnapshot = (): CutNavigatorSnapshot => this.snapshot

  load(matrix: LoadedMatrix | null, labels?: PlotLabels2D) {
    this.matrix = matrix
    if (labels) this.labels = labels
    this.cut = { rowCutIndex: 0, colCutIndex: 0 }
    this.recomputeSlices()
  }

  setLabels(labels: PlotLabels2D) {
    this.labels = labels
    if (this.matrix) {
      this.recomputeSlices()
    } else {
      this.publish()
    }
  }

  setRowCut(rawText: string): CutEditResult {
    return this.applyCutText('row', rawText)
  }

  setColCut(rawText: string): CutEditResult {
    return this.applyCutText('col', rawText)
  }

  navigate(axis: CutAxis, direction: -1 | 1) {
    if (!this.matrix) return

    const maxIndex = maxCutIndex(this.matrix, axis)
    const current = this.cursor(axis)
    const next = clampCutIndex(current + direction, maxIndex)
    this.cut = axis === 'row' ? { ...this.cut, rowCutIndex: next } : { ...this.cut, colCutIndex: next }
    logSessionEvent({ type: 'cut.changed', payload: { axis, from: current, to: next, via: 'navigate' } })

    // Explicit navigation always refreshes, even when clamped in place.
    this.recomputeSlices()
  }

  recomputeSlices() {
    const matrix = this.matrix
    if (!matrix) {
      this.slices = null
      this.rowField.setSilently('0')
      this.colField.setSilently('0')
      this.publish()
      return
    }

    this.cut = {
      rowCutIndex: clampCutIndex(this.cut.rowCutIndex, maxCutIndex(matrix, 'row')),
      colCutIndex: clampCutIndex(this.cut.colCutIndex, maxCutIndex(matrix, 'col')),
    }
    this.rowField.setSilently(String(this.cut.rowCutIndex))
    this.colField.setSilently(String(this.cut.colCutIndex))

    this.slices = extractCutSlices(matrix, this.cut, this.labels, this.decimals, this.missing)
    this.sliceRevision += 1
    this.publish()
  }

  private cursor(axis: CutAxis) {
    return axis === 'row' ? this.cut.rowCutIndex : this.cut.colCutIndex
  }

  private applyCutText(axis: CutAxis, rawText: string): CutEditResult {
    const matrix = this.matrix
    if (!matrix) return 'no-data'

    const field = axis === 'row' ? this.rowField : this.colField
    const current = this.cursor(axis)
    const parsed = parseCutIndex(axis, rawText, maxCutIndex(matrix, axis))

    if (parsed.status === 'pending') return 'pending'
    if (parsed.status === 'error') {
      field.setSilently(String(current))
      logSessionEvent({
        type: 'cut.rejected',
        message: parsed.error.message,
        payload: { axis, text: rawText, kept: current },
      })
      this.notify(parsed.error.toNotice())
      return parsed.error
    }

    if (parsed.value === current) return 'unchanged'

    this.cut = axis === 'row' ? { ...this.cut, rowCutIndex: parsed.value } : { ...this.cut, colCutIndex: parsed.value }
    logSessionEvent({ type: 'cut.changed', payload: { axis, from: current, to: parsed.value, via: 'edit' } })
    this.recomputeSlices()
    return 'changed'
  }

  private buildSnapshot(): CutNavigatorSnapshot {
    return {
      matrix: this.matrix,
      cut: this.cut,
      labels: this.labels,
      slices: this.slices,
      sliceRevision: this.sliceRevision,
    }
  }

  private publish() {
    this.snapshot = this.buildSnapshot()
    for (const listener of this.listeners) listener()
  }
}
