export type TextColumn = {
  name: string
  values: readonly number[]
}

export function formatFixed(value: number, decimals: number, missing = 'NaN'): string {
  if (Number.isNaN(value)) return missing
  if (!Number.isFinite(value)) return value > 0 ? 'inf' : '-inf'
  return value.toFixed(decimals)
}

// Right-aligned columns joined by two spaces; shorter columns are padded with
// the missing marker so the result is always rectangular.
export function formatTextTable(columns: readonly TextColumn[], decimals: number, missing = 'NaN'): string {
  if (!columns.length) return ''

  const rowCount = columns.reduce((max, c) => Math.max(max, c.values.length), 0)
  const rendered = columns.map((c) => {
    const cells: string[] = []
    for (let i = 0; i < rowCount; i += 1) {
      cells.push(i < c.values.length ? formatFixed(c.values[i], decimals, missing) : missing)
    }
    const width = cells.reduce((max, s) => Math.max(max, s.length), c.name.length)
    return {
      header: c.name.padStart(width),
      cells: cells.map((s) => s.padStart(width)),
    }
  })

  const lines = [rendered.map((c) => c.header).join('  ')]
  for (let i = 0; i < rowCount; i += 1) {
    lines.push(rendered.map((c) => c.cells[i]).join('  '))
  }
  return lines.join('\n')
}
