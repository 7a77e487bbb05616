import { logSessionEvent } from './sessionLogging'

export type PlotLabels2D = {
  title: string
  xAxis: string
  yAxis: string
  colorbar: string
}

export type PlotLabels1D = {
  title: string
  xAxis: string
  yAxis: string
}

export type AppConfig = {
  labels2d: PlotLabels2D
  labels1d: PlotLabels1D
  palette: readonly string[]
  heatmapColorscale: string
  heatmapReverseScale: boolean
  previewDecimals: number
  missingMarker: string
}

type EnvSource = Readonly<Record<string, string | boolean | undefined>>

// Blue, green, red, cyan, magenta, olive, black, purple, orange.
const DEFAULT_PALETTE = ['#1f3fdf', '#008000', '#d62728', '#00bfbf', '#bf00bf', '#bfbf00', '#000000', '#800080', '#ffa500']

export const DEFAULT_CONFIG: AppConfig = {
  labels2d: { title: '2D Image Plot', xAxis: 'X-axis', yAxis: 'Y-axis', colorbar: 'Intensity' },
  labels1d: { title: '1D Line Plot', xAxis: 'X-axis', yAxis: 'Y-axis' },
  palette: DEFAULT_PALETTE,
  heatmapColorscale: 'Jet',
  heatmapReverseScale: true,
  previewDecimals: 2,
  missingMarker: 'NaN',
}

function rejectOverride(key: string, value: string, reason: string) {
  logSessionEvent({
    type: 'config.invalid',
    message: `${key}: ${reason}; using the default.`,
    payload: { key, value },
  })
}

function readRaw(env: EnvSource, key: string): string | null {
  const raw = env[key]
  if (typeof raw !== 'string') return null
  const trimmed = raw.trim()
  return trimmed ? trimmed : null
}

function readString(env: EnvSource, key: string, fallback: string): string {
  return readRaw(env, key) ?? fallback
}

function readBool(env: EnvSource, key: string, fallback: boolean): boolean {
  const raw = readRaw(env, key)
  if (raw === null) return fallback
  if (raw === 'true') return true
  if (raw === 'false') return false
  rejectOverride(key, raw, 'expected true or false')
  return fallback
}

function readDecimals(env: EnvSource, key: string, fallback: number): number {
  const raw = readRaw(env, key)
  if (raw === null) return fallback
  if (!/^\d+$/.test(raw) || Number(raw) > 10) {
    rejectOverride(key, raw, 'expected an integer between 0 and 10')
    return fallback
  }
  return Number(raw)
}

function readPalette(env: EnvSource, key: string, fallback: readonly string[]): readonly string[] {
  const raw = readRaw(env, key)
  if (raw === null) return fallback
  const colors = raw
    .split(',')
    .map((c) => c.trim())
    .filter(Boolean)
  if (!colors.length) {
    rejectOverride(key, raw, 'expected a comma-separated list of colors')
    return fallback
  }
  return colors
}

export function buildAppConfig(env: EnvSource): AppConfig {
  const d = DEFAULT_CONFIG
  return Object.freeze({
    labels2d: {
      title: readString(env, 'VITE_PLOT2D_TITLE', d.labels2d.title),
      xAxis: readString(env, 'VITE_PLOT2D_XAXIS', d.labels2d.xAxis),
      yAxis: readString(env, 'VITE_PLOT2D_YAXIS', d.labels2d.yAxis),
      colorbar: readString(env, 'VITE_PLOT2D_COLORBAR', d.labels2d.colorbar),
    },
    labels1d: {
      title: readString(env, 'VITE_PLOT1D_TITLE', d.labels1d.title),
      xAxis: readString(env, 'VITE_PLOT1D_XAXIS', d.labels1d.xAxis),
      yAxis: readString(env, 'VITE_PLOT1D_YAXIS', d.labels1d.yAxis),
    },
    palette: readPalette(env, 'VITE_SERIES_PALETTE', d.palette),
    heatmapColorscale: readString(env, 'VITE_HEATMAP_COLORSCALE', d.heatmapColorscale),
    heatmapReverseScale: readBool(env, 'VITE_HEATMAP_REVERSE', d.heatmapReverseScale),
    previewDecimals: readDecimals(env, 'VITE_PREVIEW_DECIMALS', d.previewDecimals),
    missingMarker: readString(env, 'VITE_MISSING_MARKER', d.missingMarker),
  })
}

export const appConfig: AppConfig = buildAppConfig(import.meta.env)
