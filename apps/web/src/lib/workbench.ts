import type { NoticeSink } from './appEvents'
import type { CutNavigator } from './cutNavigator'
import { FileParseError, WorkbenchError, describeError } from './errors'
import type { SeriesConfigurator } from './seriesConfigurator'
import { logSessionEvent } from './sessionLogging'
import { parseMatrixText, parseTableText, readFileText } from './tableParsing'

type LoadTarget = '2d' | '1d'

// One counter per store. A load only applies if no newer load or folder reset
// has started while its file was being read.
const loadTokens = new WeakMap<CutNavigator | SeriesConfigurator, number>()

function beginLoad(owner: CutNavigator | SeriesConfigurator): number {
  const token = (loadTokens.get(owner) ?? 0) + 1
  loadTokens.set(owner, token)
  return token
}

function isCurrentLoad(owner: CutNavigator | SeriesConfigurator, token: number) {
  return loadTokens.get(owner) === token
}

function logSuperseded(target: LoadTarget, fileName: string) {
  logSessionEvent({ type: 'file.load_superseded', message: fileName, payload: { target } })
}

function reportLoadFailure(target: LoadTarget, fileName: string, e: unknown, notify: NoticeSink) {
  const error =
    e instanceof WorkbenchError ? e : new FileParseError(fileName, describeError(e), target === '2d' ? '2D' : '1D')
  logSessionEvent({
    type: 'file.load_failed',
    message: error.message,
    payload: { file: fileName, target, kind: error.kind },
  })
  notify(error.toNotice())
}

/**
 * Reads and parses a 2D file, then hands the matrix to the navigator. Any
 * failure leaves nothing loaded. Resolves `false` without touching the
 * navigator when a newer load or a folder reset overtook this one.
 */
export async function loadMatrixFile(file: File, navigator: CutNavigator, notify: NoticeSink): Promise<boolean> {
  logSessionEvent({ type: 'file.selected', message: file.name, payload: { target: '2d', size: file.size } })
  const token = beginLoad(navigator)
  try {
    const text = await readFileText(file)
    if (!isCurrentLoad(navigator, token)) {
      logSuperseded('2d', file.name)
      return false
    }
    const { matrix, notices } = parseMatrixText(file.name, text)
    for (const n of notices) notify(n)
    navigator.load(matrix, { ...navigator.getSnapshot().labels, title: file.name })
    logSessionEvent({
      type: 'file.loaded',
      message: file.name,
      payload: { target: '2d', rows: matrix.data.length, cols: matrix.xCoords.length },
    })
    return true
  } catch (e) {
    if (!isCurrentLoad(navigator, token)) {
      logSuperseded('2d', file.name)
      return false
    }
    navigator.load(null)
    reportLoadFailure('2d', file.name, e, notify)
    return false
  }
}

export async function loadTableFile(file: File, configurator: SeriesConfigurator, notify: NoticeSink): Promise<boolean> {
  logSessionEvent({ type: 'file.selected', message: file.name, payload: { target: '1d', size: file.size } })
  const token = beginLoad(configurator)
  try {
    const text = await readFileText(file)
    if (!isCurrentLoad(configurator, token)) {
      logSuperseded('1d', file.name)
      return false
    }
    const table = parseTableText(file.name, text)
    configurator.onDatasetLoaded(table)
    logSessionEvent({
      type: 'file.loaded',
      message: file.name,
      payload: { target: '1d', rows: table.rows.length, cols: table.columns.length },
    })
    return true
  } catch (e) {
    if (!isCurrentLoad(configurator, token)) {
      logSuperseded('1d', file.name)
      return false
    }
    configurator.onLoadFailed()
    reportLoadFailure('1d', file.name, e, notify)
    return false
  }
}

export function resetMatrixFolder(navigator: CutNavigator, folderName: string) {
  beginLoad(navigator)
  logSessionEvent({ type: 'folder.selected', message: folderName, payload: { target: '2d' } })
  navigator.load(null)
}

export function resetTableFolder(configurator: SeriesConfigurator, folderName: string) {
  beginLoad(configurator)
  logSessionEvent({ type: 'folder.selected', message: folderName, payload: { target: '1d' } })
  configurator.onDatasetLoaded(null)
}
