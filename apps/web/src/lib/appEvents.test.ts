import { afterEach, describe, expect, it, vi } from 'vitest'

import { onNotice, postNotice } from './appEvents'

describe('notices', () => {
  const offs: Array<() => void> = []

  afterEach(() => {
    while (offs.length) offs.pop()?.()
  })

  it('delivers posted notices to listeners with a fresh id', () => {
    const handler = vi.fn()
    offs.push(onNotice(handler))

    const first = postNotice({ level: 'warning', title: 'Invalid Input', message: 'Please enter a valid integer.' })
    const second = postNotice({ level: 'info', title: 'No Series to Remove', message: 'There are no plot series to remove.' })

    expect(first.id).not.toBe(second.id)
    expect(handler).toHaveBeenCalledTimes(2)
    expect(handler).toHaveBeenNthCalledWith(1, first)
  })

  it('ignores malformed events on the same channel', () => {
    const handler = vi.fn()
    offs.push(onNotice(handler))

    window.dispatchEvent(new CustomEvent('notices:posted', { detail: { title: 'missing fields' } }))
    window.dispatchEvent(new Event('notices:posted'))

    expect(handler).not.toHaveBeenCalled()
  })

  it('stops delivering after unsubscribe', () => {
    const handler = vi.fn()
    const off = onNotice(handler)
    off()

    postNotice({ level: 'error', title: '2D Data Load Error', message: 'x' })

    expect(handler).not.toHaveBeenCalled()
  })
})
