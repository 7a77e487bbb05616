import '@testing-library/jest-dom/vitest'

import { cleanup } from '@testing-library/react'
import { afterEach, vi } from 'vitest'

afterEach(() => {
	cleanup()
})

// Plotly uses canvas internally; jsdom's canvas stub throws "Not implemented".
vi.spyOn(HTMLCanvasElement.prototype, 'getContext').mockReturnValue(null)
