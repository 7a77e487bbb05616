import Papa from 'papaparse'

import type { NoticeInput } from './appEvents'
import { coerceNumber, type LoadedMatrix, type TabularDataset } from './dataModel'
import { EmptyFileError, FileParseError, UnsupportedFileError, describeError } from './errors'
import { logSessionEvent } from './sessionLogging'

export type Delimiter = 'comma' | 'whitespace'

export type MatrixParseResult = {
  matrix: LoadedMatrix
  notices: NoticeInput[]
}

export function fileExtension(name: string): string {
  const idx = name.lastIndexOf('.')
  return idx >= 0 ? name.slice(idx).toLowerCase() : ''
}

export function delimiterFor2D(name: string): Delimiter {
  const ext = fileExtension(name)
  if (ext === '.csv') return 'comma'
  if (ext === '.txt') return 'whitespace'
  throw new UnsupportedFileError(name)
}

export function delimiterFor1D(name: string): Delimiter {
  return fileExtension(name) === '.csv' ? 'comma' : 'whitespace'
}

export function splitRows(text: string, delimiter: Delimiter): string[][] {
  if (delimiter === 'comma') {
    const result = Papa.parse<string[]>(text, { delimiter: ',', skipEmptyLines: 'greedy' })
    return result.data.map((row) => row.map((cell) => cell.trim()))
  }

  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean)
    .map((line) => line.split(/\s+/))
}

function hasNaN(values: readonly number[]) {
  return values.some((v) => Number.isNaN(v))
}

/**
 * Header row holds the x coordinates, first column the y coordinates. A header
 * one cell shorter than the body is read as having no corner cell.
 */
function parseStructured(rows: string[][], sourceName: string): LoadedMatrix {
  if (rows.length < 2) throw new Error('expected a header row and at least one data row')

  const header = rows[0]
  const body = rows.slice(1)
  const width = body[0].length
  if (width < 2) throw new Error('expected a coordinate column and at least one value column')

  for (let i = 0; i < body.length; i += 1) {
    if (body[i].length !== width) {
      throw new Error(`row ${i + 2} has ${body[i].length} fields, expected ${width}`)
    }
  }

  let xCells: string[]
  if (header.length === width) xCells = header.slice(1)
  else if (header.length === width - 1) xCells = header
  else throw new Error(`header has ${header.length} fields, expected ${width}`)

  return {
    data: body.map((row) => row.slice(1).map(coerceNumber)),
    xCoords: xCells.map(coerceNumber),
    yCoords: body.map((row) => coerceNumber(row[0])),
    sourceName,
  }
}

function parsePositional(rows: string[][], sourceName: string): LoadedMatrix {
  if (!rows.length) throw new Error('the file contains no data')
  const width = rows[0].length
  for (let i = 0; i < rows.length; i += 1) {
    if (rows[i].length !== width) {
      throw new Error(`Loaded data is not 2-dimensional: row ${i + 1} has ${rows[i].length} fields, expected ${width}`)
    }
  }

  return {
    data: rows.map((row) => row.map(coerceNumber)),
    xCoords: Array.from({ length: width }, (_, i) => i),
    yCoords: rows.map((_, i) => i),
    sourceName,
  }
}

export function parseMatrixText(name: string, text: string): MatrixParseResult {
  const rows = splitRows(text, delimiterFor2D(name))
  const notices: NoticeInput[] = []

  try {
    const matrix = parseStructured(rows, name)
    if (hasNaN(matrix.xCoords) || hasNaN(matrix.yCoords)) {
      notices.push({
        level: 'warning',
        title: 'Coordinate Conversion Warning',
        message:
          `Some non-numeric values were found in X or Y coordinates of '${name}' and converted to NaN. ` +
          'These might affect plotting accuracy.',
      })
    }
    return { matrix, notices }
  } catch (structuredError) {
    const reason = describeError(structuredError)
    notices.push({
      level: 'warning',
      title: '2D Data Format Warning',
      message:
        `Could not parse '${name}' with first column as Y-axis and header as X-axis. Reason: ${reason}.\n\n` +
        'Attempting fallback: loading as raw matrix with numerical indices.',
    })
    logSessionEvent({ type: 'parse.fallback', message: reason, payload: { file: name, kind: '2d' } })

    try {
      return { matrix: parsePositional(rows, name), notices }
    } catch (fallbackError) {
      throw new FileParseError(name, describeError(fallbackError), '2D')
    }
  }
}

export function parseTableText(name: string, text: string): TabularDataset {
  const rows = splitRows(text, delimiterFor1D(name))
  if (!rows.length) throw new EmptyFileError(name)

  const columns = rows[0]
  const body = rows.slice(1)
  if (!body.length) throw new EmptyFileError(name)
  if (body.every((row) => row.length === columns.length)) {
    return { columns, rows: body, sourceName: name }
  }

  // No usable header: positional column names, rows padded to the widest.
  const width = rows.reduce((max, row) => Math.max(max, row.length), 0)
  logSessionEvent({
    type: 'parse.fallback',
    message: 'header row does not match the data rows; using positional column names',
    payload: { file: name, kind: '1d' },
  })
  return {
    columns: Array.from({ length: width }, (_, i) => String(i)),
    rows: rows.map((row) => [...row, ...new Array<string>(width - row.length).fill('')]),
    sourceName: name,
  }
}

export function readFileText(file: Blob): Promise<string> {
  if (typeof file.text === 'function') return file.text()
  return new Promise((resolve, reject) => {
    const reader = new FileReader()
    reader.onload = () => resolve(typeof reader.result === 'string' ? reader.result : '')
    reader.onerror = () => reject(reader.error ?? new Error(`Could not read ${file.size} bytes`))
    reader.readAsText(file)
  })
}
