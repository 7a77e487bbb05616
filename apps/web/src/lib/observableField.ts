type EditHandler<T> = (value: T) => void

/**
 * A value with two kinds of listeners: view watchers, which always hear about
 * a change, and edit handlers, which only hear about edits. `setSilently` is
 * the programmatic path: the view refreshes but no edit handler runs, so a
 * handler that writes back into its own field cannot re-enter itself.
 */
export class ObservableField<T> {
  private value: T
  private suppressDepth = 0
  private readonly handlers = new Set<EditHandler<T>>()
  private readonly watchers = new Set<() => void>()

  constructor(initial: T) {
    this.value = initial
  }

  get = (): T => this.value

  set(next: T) {
    this.value = next
    for (const watcher of this.watchers) watcher()
    if (this.suppressDepth > 0) return
    for (const handler of this.handlers) handler(next)
  }

  setSilently(next: T) {
    this.suppressDepth += 1
    try {
      this.set(next)
    } finally {
      this.suppressDepth -= 1
    }
  }

  get suppressed(): boolean {
    return this.suppressDepth > 0
  }

  onChange(handler: EditHandler<T>): () => void {
    this.handlers.add(handler)
    return () => {
      this.handlers.delete(handler)
    }
  }

  subscribe = (watcher: () => void): (() => void) => {
    this.watchers.add(watcher)
    return () => {
      this.watchers.delete(watcher)
    }
  }
}
