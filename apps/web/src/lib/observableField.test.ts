import { describe, expect, it, vi } from 'vitest'

import { ObservableField } from './observableField'

describe('ObservableField', () => {
  it('runs edit handlers and watchers on set', () => {
    const field = new ObservableField('0')
    const handler = vi.fn()
    const watcher = vi.fn()
    field.onChange(handler)
    field.subscribe(watcher)

    field.set('3')

    expect(field.get()).toBe('3')
    expect(handler).toHaveBeenCalledWith('3')
    expect(watcher).toHaveBeenCalledTimes(1)
  })

  it('setSilently refreshes watchers but never fires edit handlers', () => {
    const field = new ObservableField('0')
    const handler = vi.fn()
    const seenSuppressed: boolean[] = []
    field.onChange(handler)
    field.subscribe(() => seenSuppressed.push(field.suppressed))

    field.setSilently('7')

    expect(field.get()).toBe('7')
    expect(handler).not.toHaveBeenCalled()
    expect(seenSuppressed).toEqual([true])
    expect(field.suppressed).toBe(false)
  })

  it('lets a handler write back into its own field without re-entering', () => {
    const field = new ObservableField('')
    const handler = vi.fn((value: string) => {
      field.setSilently(value.trim())
    })
    field.onChange(handler)

    field.set('  5 ')

    expect(handler).toHaveBeenCalledTimes(1)
    expect(field.get()).toBe('5')
  })

  it('restores handlers after a watcher throws during a silent update', () => {
    const field = new ObservableField(0)
    const handler = vi.fn()
    field.onChange(handler)
    const unsubscribe = field.subscribe(() => {
      throw new Error('boom')
    })

    expect(() => field.setSilently(1)).toThrow('boom')
    expect(field.suppressed).toBe(false)

    unsubscribe()
    field.set(2)
    expect(handler).toHaveBeenCalledWith(2)
  })

  it('stops calling a handler after it unsubscribes', () => {
    const field = new ObservableField(0)
    const handler = vi.fn()
    const off = field.onChange(handler)
    off()

    field.set(1)

    expect(handler).not.toHaveBeenCalled()
  })
})
