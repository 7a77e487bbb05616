export type SessionEvent = {
  id: string
  created_at: string
  type: string
  message?: string | null
  payload?: Record<string, unknown> | null
}

type SessionAddEventRequest = {
  type: string
  message?: string | null
  payload?: Record<string, unknown> | null
}

const MAX_EVENTS = 500

let events: SessionEvent[] = []
let counter = 0
const listeners = new Set<() => void>()

function emit() {
  for (const listener of listeners) listener()
}

export function logSessionEvent(req: SessionAddEventRequest): SessionEvent {
  counter += 1
  const event: SessionEvent = {
    id: `evt-${counter}`,
    created_at: new Date().toISOString(),
    type: req.type,
    message: req.message ?? null,
    payload: req.payload ?? null,
  }

  // Replace rather than mutate so snapshot readers see a new reference.
  const next = events.length >= MAX_EVENTS ? events.slice(events.length - MAX_EVENTS + 1) : events.slice()
  next.push(event)
  events = next
  emit()
  return event
}

export function listSessionEvents(): readonly SessionEvent[] {
  return events
}

export function subscribeSessionEvents(listener: () => void): () => void {
  listeners.add(listener)
  return () => {
    listeners.delete(listener)
  }
}

export function clearSessionEvents() {
  if (!events.length) return
  events = []
  emit()
}
