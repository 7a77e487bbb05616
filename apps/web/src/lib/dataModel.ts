export type LoadedMatrix = {
  /** Row-major values, `data[row][col]`. */
  data: number[][]
  /** One coordinate per column. */
  xCoords: number[]
  /** One coordinate per row. */
  yCoords: number[]
  sourceName: string
}

export type TabularDataset = {
  columns: string[]
  /** Raw cells; numeric coercion happens per column when a series is resolved. */
  rows: string[][]
  sourceName: string
}

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

/** Coerces a cell to a number; anything non-numeric becomes NaN. */
export function coerceNumber(cell: string | undefined): number {
  const s = (cell ?? '').trim()
  if (!s) return NaN
  const lower = s.toLowerCase()
  if (lower === 'inf' || lower === '+inf' || lower === 'infinity' || lower === '+infinity') return Infinity
  if (lower === '-inf' || lower === '-infinity') return -Infinity
  if (!DECIMAL_PATTERN.test(s)) return NaN
  return Number(s)
}

export function matrixShape(matrix: LoadedMatrix): { rowCount: number; colCount: number } {
  return { rowCount: matrix.data.length, colCount: matrix.xCoords.length }
}

export function numericColumn(table: TabularDataset, index: number): number[] {
  return table.rows.map((row) => coerceNumber(row[index]))
}
