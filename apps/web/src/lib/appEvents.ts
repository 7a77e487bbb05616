const NOTICE_POSTED_EVENT = 'notices:posted'

export type NoticeLevel = 'info' | 'warning' | 'error'

export type Notice = {
  id: string
  level: NoticeLevel
  title: string
  message: string
}

export type NoticeInput = Omit<Notice, 'id'>

export type NoticeSink = (notice: NoticeInput) => void

let noticeCounter = 0

function isNotice(value: unknown): value is Notice {
  if (!value || typeof value !== 'object') return false
  return (
    'id' in value &&
    typeof value.id === 'string' &&
    'level' in value &&
    (value.level === 'info' || value.level === 'warning' || value.level === 'error') &&
    'title' in value &&
    typeof value.title === 'string' &&
    'message' in value &&
    typeof value.message === 'string'
  )
}

export function postNotice(input: NoticeInput): Notice {
  noticeCounter += 1
  const notice: Notice = { id: `notice-${noticeCounter}`, ...input }
  try {
    window.dispatchEvent(new CustomEvent<Notice>(NOTICE_POSTED_EVENT, { detail: notice }))
  } catch {
    // no window (e.g. a non-DOM test); the notice is still returned
  }
  return notice
}

export function onNotice(handler: (notice: Notice) => void): () => void {
  const h = (e: Event) => {
    if (!(e instanceof CustomEvent)) return
    const detail: unknown = e.detail
    if (isNotice(detail)) handler(detail)
  }
  window.addEventListener(NOTICE_POSTED_EVENT, h)

  return () => {
    window.removeEventListener(NOTICE_POSTED_EVENT, h)
  }
}
