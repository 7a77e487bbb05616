/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_PLOT2D_TITLE?: string
  readonly VITE_PLOT2D_XAXIS?: string
  readonly VITE_PLOT2D_YAXIS?: string
  readonly VITE_PLOT2D_COLORBAR?: string
  readonly VITE_PLOT1D_TITLE?: string
  readonly VITE_PLOT1D_XAXIS?: string
  readonly VITE_PLOT1D_YAXIS?: string
  readonly VITE_SERIES_PALETTE?: string
  readonly VITE_HEATMAP_COLORSCALE?: string
  readonly VITE_HEATMAP_REVERSE?: string
  readonly VITE_PREVIEW_DECIMALS?: string
  readonly VITE_MISSING_MARKER?: string
}

interface ImportMeta {
  readonly env: ImportMetaEnv
}
