import { describe, expect, it } from 'vitest'

import { coerceNumber, matrixShape, numericColumn } from './dataModel'

describe('coerceNumber', () => {
  it('parses decimal and exponent notation', () => {
    expect(coerceNumber(' 1e3 ')).toBe(1000)
    expect(coerceNumber('.5')).toBe(0.5)
    expect(coerceNumber('1.')).toBe(1)
    expect(coerceNumber('-2.25')).toBe(-2.25)
  })

  it('reads infinities', () => {
    expect(coerceNumber('inf')).toBe(Infinity)
    expect(coerceNumber('-Infinity')).toBe(-Infinity)
  })

  it('turns anything else into NaN', () => {
    expect(coerceNumber('')).toBeNaN()
    expect(coerceNumber(undefined)).toBeNaN()
    expect(coerceNumber('abc')).toBeNaN()
    expect(coerceNumber('0x10')).toBeNaN()
    expect(coerceNumber('1,5')).toBeNaN()
  })
})

describe('dataset helpers', () => {
  it('reports matrix shape from rows and x coordinates', () => {
    const shape = matrixShape({ data: [[1, 2, 3]], xCoords: [0, 1, 2], yCoords: [0], sourceName: 'm.csv' })
    expect(shape).toEqual({ rowCount: 1, colCount: 3 })
  })

  it('coerces one column, leaving missing cells as NaN', () => {
    const values = numericColumn(
      { columns: ['t', 'v'], rows: [['0', '1.5'], ['1', 'n/a'], ['2']], sourceName: 's.txt' },
      1,
    )
    expect(values[0]).toBe(1.5)
    expect(values[1]).toBeNaN()
    expect(values[2]).toBeNaN()
  })
})
