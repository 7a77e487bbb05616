import { type ReactNode } from 'react'

import { WorkbenchContext, type Workbench } from './workbenchContext'

export function WorkbenchProvider({ value, children }: { value: Workbench; children: ReactNode }) {
  return <WorkbenchContext.Provider value={value}>{children}</WorkbenchContext.Provider>
}
