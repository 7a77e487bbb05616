import type { NoticeInput, NoticeLevel } from './appEvents'

export type CutAxis = 'row' | 'col'

/**
 * Errors the workbench recovers from locally. Each one carries the title and
 * message shown on the notice surface.
 */
export abstract class WorkbenchError extends Error {
  abstract readonly kind: string
  abstract readonly title: string
  readonly level: NoticeLevel = 'warning'

  toNotice(): NoticeInput {
    return { level: this.level, title: this.title, message: this.message }
  }
}

function axisLetter(axis: CutAxis) {
  // The row cursor picks a y coordinate, the column cursor an x coordinate.
  return axis === 'row' ? 'Y' : 'X'
}

export class CutIndexParseError extends WorkbenchError {
  readonly kind = 'cut-parse'
  readonly title = 'Invalid Input'

  constructor(
    readonly axis: CutAxis,
    readonly rawText: string,
  ) {
    super('Please enter a valid integer.')
    this.name = 'CutIndexParseError'
  }
}

export class CutIndexRangeError extends WorkbenchError {
  readonly kind = 'cut-range'
  readonly title: string

  constructor(
    readonly axis: CutAxis,
    readonly value: number,
    readonly maxIndex: number,
  ) {
    super(`${axisLetter(axis)}-Index must be between 0 and ${maxIndex}.`)
    this.name = 'CutIndexRangeError'
    this.title = `Invalid ${axisLetter(axis)}-Index`
  }
}

export class EmptySeriesListError extends WorkbenchError {
  readonly kind = 'empty-series-list'
  readonly title = 'No Series to Remove'
  readonly level = 'info'

  constructor() {
    super('There are no plot series to remove.')
    this.name = 'EmptySeriesListError'
  }
}

export class NoDataError extends WorkbenchError {
  readonly kind = 'no-data'
  readonly title = 'No Data Loaded'

  constructor() {
    super('Nothing is loaded.')
    this.name = 'NoDataError'
  }
}

export class NoPlottableSeriesError extends WorkbenchError {
  readonly kind = 'no-plottable-series'
  readonly title = 'No Plottable Series'
  readonly level = 'info'

  constructor() {
    super('No valid series configured or found to plot.')
    this.name = 'NoPlottableSeriesError'
  }
}

export type SeriesSkipReason = 'invalid-index' | 'out-of-bounds' | 'no-plottable-data'

const seriesSkipTitles: Record<SeriesSkipReason, string> = {
  'invalid-index': 'Invalid Column Index',
  'out-of-bounds': 'Column Index Out of Bounds',
  'no-plottable-data': 'No Plottable Data',
}

export class SeriesSkipError extends WorkbenchError {
  readonly kind = 'series-skip'
  readonly title: string

  constructor(
    readonly reason: SeriesSkipReason,
    readonly position: number,
    message: string,
  ) {
    super(`Series ${position + 1}: ${message}`)
    this.name = 'SeriesSkipError'
    this.title = seriesSkipTitles[reason]
  }
}

export class UnsupportedFileError extends WorkbenchError {
  readonly kind = 'unsupported-file'
  readonly title = 'Unsupported 2D File Type'

  constructor(readonly fileName: string) {
    super(`File '${fileName}' is not a supported 2D type (.csv, .txt).`)
    this.name = 'UnsupportedFileError'
  }
}

export class EmptyFileError extends WorkbenchError {
  readonly kind = 'empty-file'
  readonly title = 'Empty 1D Data'

  constructor(readonly fileName: string) {
    super(`File '${fileName}' is empty or contains no valid data.`)
    this.name = 'EmptyFileError'
  }
}

export class FileParseError extends WorkbenchError {
  readonly kind = 'file-parse'
  readonly title: string
  readonly level = 'error'

  constructor(
    readonly fileName: string,
    readonly reason: string,
    dimension: '1D' | '2D',
  ) {
    super(`Failed to load ${dimension} data from '${fileName}':\n${reason}`)
    this.name = 'FileParseError'
    this.title = `${dimension} Data Load Error`
  }
}

export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}
