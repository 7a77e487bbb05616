import { useEffect, useState } from 'react'
import { NavLink, Navigate, Outlet, Route, Routes } from 'react-router-dom'

import { NoticeStack } from './components/NoticeStack'
import { WorkbenchProvider } from './layout/WorkbenchProvider'
import { onNotice, type Notice } from './lib/appEvents'
import { CutNavigator } from './lib/cutNavigator'
import { SeriesConfigurator } from './lib/seriesConfigurator'
import { logSessionEvent } from './lib/sessionLogging'
import { nextTheme, type ThemeName } from './lib/theme'
import { ActivityPage } from './pages/ActivityPage'
import { DocsPage } from './pages/DocsPage'
import { FilesPage } from './pages/FilesPage'
import { HeatmapPage } from './pages/HeatmapPage'
import { SeriesPage } from './pages/SeriesPage'

const MAX_VISIBLE_NOTICES = 5

const navStyle = ({ isActive }: { isActive: boolean }) => ({
  fontWeight: isActive ? 700 : 400,
  textDecoration: 'none',
  color: 'inherit',
  padding: '0.25rem 0.5rem',
})

const toggleStyle = (active: boolean) => ({
  fontWeight: active ? 700 : 400,
  padding: '0.25rem 0.5rem',
  border: '1px solid var(--border)',
  background: 'transparent',
  color: 'inherit',
  cursor: 'pointer',
})

function AppShell() {
  const [navigator] = useState(() => new CutNavigator())
  const [configurator] = useState(() => new SeriesConfigurator())
  const [theme, setTheme] = useState<ThemeName>('light')
  const [leftCollapsed, setLeftCollapsed] = useState(false)
  const [rightCollapsed, setRightCollapsed] = useState(true)
  const [notices, setNotices] = useState<Notice[]>([])

  useEffect(
    () =>
      onNotice((notice) => {
        setNotices((prev) => [...prev, notice].slice(-MAX_VISIBLE_NOTICES))
      }),
    [],
  )

  function onToggleTheme() {
    const next = nextTheme(theme)
    setTheme(next)
    logSessionEvent({ type: 'theme.changed', payload: { from: theme, to: next } })
  }

  const leftWidth = leftCollapsed ? '0px' : '340px'
  const rightWidth = rightCollapsed ? '0px' : '320px'

  return (
    <WorkbenchProvider value={{ navigator, configurator, theme }}>
      <div
        data-theme={theme}
        className="app-root"
        style={{
          display: 'grid',
          gridTemplateRows: 'auto 1fr',
          height: '100vh',
          minHeight: 0,
        }}
      >
        <header style={{ borderBottom: '1px solid var(--border)', padding: '0.75rem 1rem' }}>
          <nav style={{ display: 'flex', gap: '0.5rem', alignItems: 'center', flexWrap: 'wrap' }}>
            <button
              type="button"
              data-testid="nav-files"
              onClick={() => setLeftCollapsed((prev) => !prev)}
              style={toggleStyle(!leftCollapsed)}
              title={leftCollapsed ? 'Show Files panel' : 'Hide Files panel'}
            >
              Files
            </button>

            <NavLink to="/2d" data-testid="nav-2d" style={navStyle}>
              2D Data Plot
            </NavLink>
            <NavLink to="/1d" data-testid="nav-1d" style={navStyle}>
              1D Data Plot
            </NavLink>
            <NavLink to="/docs" data-testid="nav-docs" style={navStyle}>
              Help
            </NavLink>

            <div style={{ marginLeft: 'auto', display: 'flex', gap: '0.5rem' }}>
              <button
                type="button"
                data-testid="nav-activity"
                onClick={() => setRightCollapsed((prev) => !prev)}
                style={toggleStyle(!rightCollapsed)}
                title={rightCollapsed ? 'Show Activity panel' : 'Hide Activity panel'}
              >
                Activity
              </button>
              <button type="button" onClick={onToggleTheme} style={toggleStyle(false)}>
                Toggle Theme
              </button>
            </div>
          </nav>
        </header>

        <div
          style={{
            display: 'grid',
            gridTemplateColumns: `${leftWidth} minmax(0, 1fr) ${rightWidth}`,
            minHeight: 0,
          }}
        >
          <aside
            aria-label="Files panel"
            style={{
              borderRight: leftCollapsed ? 'none' : '1px solid var(--border)',
              overflow: 'auto',
              padding: leftCollapsed ? 0 : '0.75rem',
              minHeight: 0,
              display: leftCollapsed ? 'none' : 'block',
            }}
          >
            <FilesPage />
          </aside>

          <main style={{ padding: '0.75rem', overflow: 'auto', minHeight: 0 }}>
            <Outlet />
          </main>

          <aside
            aria-label="Activity panel"
            style={{
              borderLeft: rightCollapsed ? 'none' : '1px solid var(--border)',
              overflow: 'auto',
              padding: rightCollapsed ? 0 : '0.75rem',
              minHeight: 0,
              display: rightCollapsed ? 'none' : 'block',
            }}
          >
            <ActivityPage />
          </aside>
        </div>

        <NoticeStack
          notices={notices}
          onDismiss={(id) => setNotices((prev) => prev.filter((n) => n.id !== id))}
        />
      </div>
    </WorkbenchProvider>
  )
}

function App() {
  return (
    <Routes>
      <Route element={<AppShell />}>
        <Route path="/" element={<Navigate to="/2d" replace />} />
        <Route path="/2d" element={<HeatmapPage />} />
        <Route path="/1d" element={<SeriesPage />} />
        <Route path="/docs" element={<DocsPage />} />
        <Route path="*" element={<Navigate to="/2d" replace />} />
      </Route>
    </Routes>
  )
}

export default App
