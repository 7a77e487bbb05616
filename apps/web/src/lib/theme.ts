export type ThemeName = 'light' | 'dark'

export type PlotTheme = {
  paper: string
  plot: string
  text: string
  grid: string
}

export const plotThemes: Record<ThemeName, PlotTheme> = {
  light: { paper: '#ffffff', plot: '#ffffff', text: '#1f2937', grid: '#d1d5db' },
  dark: { paper: '#1f2933', plot: '#111827', text: '#e5e7eb', grid: '#4b5563' },
}

export function nextTheme(theme: ThemeName): ThemeName {
  return theme === 'light' ? 'dark' : 'light'
}
