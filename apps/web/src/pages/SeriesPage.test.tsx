import { fireEvent, render, screen } from '@testing-library/react'
import { describe, expect, it, vi } from 'vitest'

import { WorkbenchProvider } from '../layout/WorkbenchProvider'
import type { NoticeSink } from '../lib/appEvents'
import { CutNavigator } from '../lib/cutNavigator'
import { SeriesConfigurator } from '../lib/seriesConfigurator'
import { SeriesPage } from './SeriesPage'

vi.mock('react-plotly.js', () => {
  return {
    default: (props: { data?: unknown; layout?: unknown }) => {
      const traces = Array.isArray(props.data) ? props.data : []
      return (
        <div
          data-testid="plotly"
          data-traces={JSON.stringify(traces)}
          data-layout={JSON.stringify(props.layout ?? {})}
        />
      )
    },
  }
})

type TraceView = { name?: string; yaxis?: string; line?: { color?: string } }

function renderPage(loaded = true) {
  const notify = vi.fn<NoticeSink>()
  const configurator = new SeriesConfigurator({
    labels: { title: 'Runs', xAxis: 'time', yAxis: 'value' },
    palette: ['red', 'green', 'blue'],
    decimals: 1,
    missing: 'NaN',
    notify,
  })
  if (loaded) {
    configurator.onDatasetLoaded({
      columns: ['t', 'a', 'b', 'c'],
      rows: [
        ['0', '1', '4', '9'],
        ['1', '2', '5', '8'],
      ],
      sourceName: 'run.csv',
    })
  }
  render(
    <WorkbenchProvider value={{ navigator: new CutNavigator({ notify }), configurator, theme: 'light' }}>
      <SeriesPage />
    </WorkbenchProvider>,
  )
  return { configurator, notify }
}

function traces(): TraceView[] {
  return JSON.parse(screen.getByTestId('plotly').getAttribute('data-traces') ?? '[]')
}

describe('SeriesPage', () => {
  it('plots the default series for a four-column table', () => {
    renderPage()

    expect(screen.getAllByTestId('series-row')).toHaveLength(2)
    expect(screen.getByLabelText('Series 2 secondary axis')).toBeChecked()
    expect(traces().map((t) => [t.name, t.yaxis, t.line?.color])).toEqual([
      ['(t vs a)', 'y', 'red'],
      ['(t vs c)', 'y2', 'green'],
    ])
    expect(screen.getByLabelText<HTMLTextAreaElement>('1D data').value.split('\n')).toEqual([
      '  t    a    c',
      '0.0  1.0  9.0',
      '1.0  2.0  8.0',
    ])
  })

  it('commits a column edit on blur', () => {
    renderPage()
    const input = screen.getByLabelText('Series 1 Y column')

    fireEvent.change(input, { target: { value: '2' } })
    expect(traces()[0].name).toBe('(t vs a)')
    fireEvent.blur(input)

    expect(traces()[0].name).toBe('(t vs b)')
  })

  it('moves a series to the secondary axis when Twinx is ticked', () => {
    renderPage()

    fireEvent.click(screen.getByLabelText('Series 1 secondary axis'))

    expect(traces()[0].yaxis).toBe('y2')
  })

  it('adds and removes rows', () => {
    renderPage()

    fireEvent.click(screen.getByRole('button', { name: 'Add Plot Series' }))
    expect(screen.getAllByTestId('series-row')).toHaveLength(3)
    expect(screen.getByLabelText('Series 3 X column')).toHaveValue('0')
    expect(screen.getByLabelText('Series 3 Y column')).toHaveValue('0')

    fireEvent.click(screen.getByRole('button', { name: 'Remove Last Series' }))
    expect(screen.getAllByTestId('series-row')).toHaveLength(2)
  })

  it('reports removing from an empty list', () => {
    const { notify } = renderPage(false)
    const remove = screen.getByRole('button', { name: 'Remove Last Series' })

    fireEvent.click(remove)
    expect(screen.queryAllByTestId('series-row')).toHaveLength(0)
    expect(notify).not.toHaveBeenCalled()

    fireEvent.click(remove)
    expect(notify).toHaveBeenCalledWith({
      level: 'info',
      title: 'No Series to Remove',
      message: 'There are no plot series to remove.',
    })
  })

  it('retitles the plot when the title label changes', () => {
    renderPage()
    const input = screen.getByLabelText('Plot Title')

    fireEvent.change(input, { target: { value: 'Run 7' } })
    fireEvent.keyDown(input, { key: 'Enter' })

    const layout = JSON.parse(screen.getByTestId('plotly').getAttribute('data-layout') ?? '{}')
    expect(layout.title.text).toBe('Run 7')
  })
})
