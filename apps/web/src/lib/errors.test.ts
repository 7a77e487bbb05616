import { describe, expect, it } from 'vitest'

import {
  CutIndexParseError,
  CutIndexRangeError,
  FileParseError,
  NoDataError,
  SeriesSkipError,
  WorkbenchError,
  describeError,
} from './errors'

describe('workbench errors', () => {
  it('turn into notices with their own title and level', () => {
    expect(new CutIndexParseError('row', 'x').toNotice()).toEqual({
      level: 'warning',
      title: 'Invalid Input',
      message: 'Please enter a valid integer.',
    })
    expect(new CutIndexRangeError('row', 7, 3).toNotice()).toEqual({
      level: 'warning',
      title: 'Invalid Y-Index',
      message: 'Y-Index must be between 0 and 3.',
    })
    expect(new FileParseError('a.txt', 'boom', '1D').toNotice().level).toBe('error')
  })

  it('number series from one in skip messages', () => {
    const error = new SeriesSkipError('out-of-bounds', 0, 'X Column Index 5 is out of bounds. Max index is 1.')
    expect(error.message).toBe('Series 1: X Column Index 5 is out of bounds. Max index is 1.')
    expect(error.title).toBe('Column Index Out of Bounds')
  })

  it('are Error instances with a kind', () => {
    const error = new NoDataError()
    expect(error).toBeInstanceOf(Error)
    expect(error).toBeInstanceOf(WorkbenchError)
    expect(error.kind).toBe('no-data')
    expect(error.name).toBe('NoDataError')
  })
})

describe('describeError', () => {
  it('uses the message of an Error and stringifies anything else', () => {
    expect(describeError(new Error('bad row'))).toBe('bad row')
    expect(describeError('plain')).toBe('plain')
    expect(describeError(42)).toBe('42')
  })
})
