import { beforeEach, describe, expect, it, vi } from 'vitest'

import type { NoticeSink } from './appEvents'
import type { PlotLabels2D } from './config'
import { CutNavigator, clampCutIndex, extractCutSlices, parseCutIndex } from './cutNavigator'
import type { LoadedMatrix } from './dataModel'
import { CutIndexParseError, CutIndexRangeError } from './errors'
import { clearSessionEvents, listSessionEvents } from './sessionLogging'

const labels: PlotLabels2D = { title: 'T', xAxis: 'X', yAxis: 'Y', colorbar: 'I' }

// 4 rows x 3 columns; row r holds 3r+1 .. 3r+3.
function sampleMatrix(): LoadedMatrix {
  return {
    data: [
      [1, 2, 3],
      [4, 5, 6],
      [7, 8, 9],
      [10, 11, 12],
    ],
    xCoords: [0.5, 1, 1.5],
    yCoords: [10, 20, 30, 40],
    sourceName: 'grid.csv',
  }
}

function setup() {
  const notify = vi.fn<NoticeSink>()
  const navigator = new CutNavigator({ labels, decimals: 2, missing: 'NaN', notify })
  return { navigator, notify }
}

describe('parseCutIndex', () => {
  it('accepts signed integers with surrounding whitespace', () => {
    expect(parseCutIndex('row', ' 2 ', 3)).toEqual({ status: 'ok', value: 2 })
    expect(parseCutIndex('row', '+1', 3)).toEqual({ status: 'ok', value: 1 })
    expect(parseCutIndex('row', '-0', 3)).toEqual({ status: 'ok', value: 0 })
  })

  it('treats blank text as a pending edit', () => {
    expect(parseCutIndex('col', '   ', 2)).toEqual({ status: 'pending' })
  })

  it('rejects non-integers and out-of-range values', () => {
    const bad = parseCutIndex('row', '1.5', 3)
    expect(bad.status === 'error' && bad.error instanceof CutIndexParseError).toBe(true)

    const low = parseCutIndex('row', '-1', 3)
    expect(low.status === 'error' && low.error instanceof CutIndexRangeError).toBe(true)

    const high = parseCutIndex('col', '3', 2)
    expect(high.status === 'error' ? high.error.message : '').toBe('X-Index must be between 0 and 2.')
  })
})

describe('clampCutIndex', () => {
  it('keeps values within 0..max', () => {
    expect(clampCutIndex(5, 3)).toBe(3)
    expect(clampCutIndex(-2, 3)).toBe(0)
    expect(clampCutIndex(1, 3)).toBe(1)
  })
})

describe('extractCutSlices', () => {
  it('takes the row along x and the column along y', () => {
    const slices = extractCutSlices(sampleMatrix(), { rowCutIndex: 1, colCutIndex: 2 }, labels, 2, 'NaN')

    expect(slices.xCut.title).toBe('X-Cut at Y-coord 20.00')
    expect(slices.xCut.series).toEqual({ x: [0.5, 1, 1.5], y: [4, 5, 6], label: 'X-Cut Data' })
    expect([slices.xCut.xAxisTitle, slices.xCut.yAxisTitle]).toEqual(['X', 'I'])

    expect(slices.yCut.title).toBe('Y-Cut at X-coord 1.50')
    expect(slices.yCut.series).toEqual({ x: [10, 20, 30, 40], y: [3, 6, 9, 12], label: 'Y-Cut Data' })
    expect([slices.yCut.xAxisTitle, slices.yCut.yAxisTitle]).toEqual(['Y', 'I'])
  })

  it('prints a coordinate line followed by the value table', () => {
    const slices = extractCutSlices(sampleMatrix(), { rowCutIndex: 2, colCutIndex: 0 }, labels, 2, 'NaN')

    expect(slices.xCut.preview.split('\n')).toEqual([
      'Y-Coordinate: 30.00',
      '   X     I',
      '0.50  7.00',
      '1.00  8.00',
      '1.50  9.00',
    ])
    expect(slices.yCut.preview.split('\n')[0]).toBe('X-Coordinate: 0.50')
  })
})

describe('CutNavigator', () => {
  beforeEach(() => {
    clearSessionEvents()
  })

  it('starts both cursors at zero on load', () => {
    const { navigator } = setup()
    navigator.load(sampleMatrix())

    const snap = navigator.getSnapshot()
    expect(snap.cut).toEqual({ rowCutIndex: 0, colCutIndex: 0 })
    expect(snap.slices?.xCut.title).toBe('X-Cut at Y-coord 10.00')
    expect(snap.slices?.yCut.series.y).toEqual([1, 4, 7, 10])
    expect(snap.sliceRevision).toBe(1)
    expect([navigator.rowField.get(), navigator.colField.get()]).toEqual(['0', '0'])
  })

  it('moves the row cursor when the row field is edited', () => {
    const { navigator, notify } = setup()
    navigator.load(sampleMatrix())

    navigator.rowField.set('2')

    const snap = navigator.getSnapshot()
    expect(snap.cut.rowCutIndex).toBe(2)
    expect(snap.slices?.xCut.title).toBe('X-Cut at Y-coord 30.00')
    expect(snap.slices?.xCut.series.y).toEqual([7, 8, 9])
    expect(snap.sliceRevision).toBe(2)
    expect(notify).not.toHaveBeenCalled()
  })

  it('reverts the field and warns on text that is not an integer', () => {
    const { navigator, notify } = setup()
    navigator.load(sampleMatrix())
    navigator.rowField.set('1')

    navigator.rowField.set('abc')

    expect(navigator.rowField.get()).toBe('1')
    expect(navigator.getSnapshot().cut.rowCutIndex).toBe(1)
    expect(navigator.getSnapshot().sliceRevision).toBe(2)
    expect(notify).toHaveBeenCalledTimes(1)
    expect(notify).toHaveBeenCalledWith({
      level: 'warning',
      title: 'Invalid Input',
      message: 'Please enter a valid integer.',
    })
    expect(listSessionEvents().at(-1)?.type).toBe('cut.rejected')
  })

  it('reverts and names the axis on an out-of-range index', () => {
    const { navigator, notify } = setup()
    navigator.load(sampleMatrix())

    const rowResult = navigator.setRowCut('4')
    const colResult = navigator.setColCut('3')

    expect(rowResult).toBeInstanceOf(CutIndexRangeError)
    expect(colResult).toBeInstanceOf(CutIndexRangeError)
    expect(notify.mock.calls.map(([n]) => [n.title, n.message])).toEqual([
      ['Invalid Y-Index', 'Y-Index must be between 0 and 3.'],
      ['Invalid X-Index', 'X-Index must be between 0 and 2.'],
    ])
    expect(navigator.getSnapshot().cut).toEqual({ rowCutIndex: 0, colCutIndex: 0 })
  })

  it('does not recompute when the index is unchanged', () => {
    const { navigator } = setup()
    navigator.load(sampleMatrix())

    expect(navigator.setColCut(' 0 ')).toBe('unchanged')
    expect(navigator.getSnapshot().sliceRevision).toBe(1)
  })

  it('recomputes once when the same index is applied twice', () => {
    const { navigator } = setup()
    navigator.load(sampleMatrix())
    const before = navigator.getSnapshot().sliceRevision

    expect(navigator.setRowCut('2')).toBe('changed')
    expect(navigator.setRowCut('2')).toBe('unchanged')

    expect(navigator.getSnapshot().sliceRevision).toBe(before + 1)
    expect(navigator.getSnapshot().cut.rowCutIndex).toBe(2)
  })

  it('leaves an emptied field alone', () => {
    const { navigator, notify } = setup()
    navigator.load(sampleMatrix())
    navigator.colField.set('2')

    navigator.colField.set('')

    expect(navigator.colField.get()).toBe('')
    expect(navigator.getSnapshot().cut.colCutIndex).toBe(2)
    expect(notify).not.toHaveBeenCalled()
  })

  it('clamps navigation at both ends but always recomputes', () => {
    const { navigator } = setup()
    navigator.load(sampleMatrix())

    navigator.navigate('row', -1)
    expect(navigator.getSnapshot().cut.rowCutIndex).toBe(0)
    expect(navigator.getSnapshot().sliceRevision).toBe(2)

    for (let i = 0; i < 5; i += 1) navigator.navigate('row', 1)
    expect(navigator.getSnapshot().cut.rowCutIndex).toBe(3)
    expect(navigator.rowField.get()).toBe('3')
    expect(navigator.getSnapshot().sliceRevision).toBe(7)
  })

  it('writes navigation back to the field without firing the edit path', () => {
    const { navigator } = setup()
    navigator.load(sampleMatrix())
    const setColCut = vi.spyOn(navigator, 'setColCut')

    navigator.navigate('col', 1)

    expect(navigator.colField.get()).toBe('1')
    expect(setColCut).not.toHaveBeenCalled()
  })

  it('is inert with nothing loaded', () => {
    const { navigator, notify } = setup()

    navigator.navigate('row', 1)
    expect(navigator.setRowCut('2')).toBe('no-data')
    navigator.recomputeSlices()

    const snap = navigator.getSnapshot()
    expect(snap.slices).toBeNull()
    expect(snap.sliceRevision).toBe(0)
    expect(navigator.rowField.get()).toBe('0')
    expect(notify).not.toHaveBeenCalled()
    expect(listSessionEvents()).toHaveLength(0)
  })

  it('clears slices and resets fields when unloaded', () => {
    const { navigator, notify } = setup()
    navigator.load(sampleMatrix())
    navigator.navigate('col', 1)

    navigator.load(null)

    expect(navigator.getSnapshot().slices).toBeNull()
    expect([navigator.rowField.get(), navigator.colField.get()]).toEqual(['0', '0'])
    expect(notify).not.toHaveBeenCalled()
  })

  it('re-renders cut axis titles when labels change', () => {
    const { navigator } = setup()
    navigator.load(sampleMatrix())

    navigator.setLabels({ ...labels, colorbar: 'Counts' })

    const snap = navigator.getSnapshot()
    expect(snap.slices?.xCut.yAxisTitle).toBe('Counts')
    expect(snap.slices?.yCut.preview.split('\n')[1]).toBe('    Y  Counts')
    expect(snap.sliceRevision).toBe(2)
  })

  it('notifies subscribers on every publish', () => {
    const { navigator } = setup()
    const listener = vi.fn()
    navigator.subscribe(listener)

    navigator.load(sampleMatrix())
    navigator.navigate('row', 1)

    expect(listener).toHaveBeenCalledTimes(2)
  })
})
