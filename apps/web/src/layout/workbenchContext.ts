import { createContext, useContext, useSyncExternalStore } from 'react'

import type { CutNavigator, CutNavigatorSnapshot } from '../lib/cutNavigator'
import type { ObservableField } from '../lib/observableField'
import type { SeriesConfigurator, SeriesConfiguratorSnapshot } from '../lib/seriesConfigurator'
import type { ThemeName } from '../lib/theme'

export type Workbench = {
  navigator: CutNavigator
  configurator: SeriesConfigurator
  theme: ThemeName
}

export const WorkbenchContext = createContext<Workbench | null>(null)

export function useWorkbench(): Workbench {
  const ctx = useContext(WorkbenchContext)
  if (!ctx) throw new Error('useWorkbench must be used inside a WorkbenchProvider')
  return ctx
}

export function useCutNavigatorSnapshot(navigator: CutNavigator): CutNavigatorSnapshot {
  return useSyncExternalStore(navigator.subscribe, navigator.getSnapshot)
}

export function useSeriesSnapshot(configurator: SeriesConfigurator): SeriesConfiguratorSnapshot {
  return useSyncExternalStore(configurator.subscribe, configurator.getSnapshot)
}

export function useFieldValue<T>(field: ObservableField<T>): T {
  return useSyncExternalStore(field.subscribe, field.get)
}
