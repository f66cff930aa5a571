import type { NotificationMessage } from '../../core/notifications/types.js'
import { formatDateTime } from '../../utils/time.js'

const TELEGRAM_MAX_MESSAGE_LENGTH = 4096

export interface TelegramFormatOptions {
  timezone?: string
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
}

function renderMessage(message: NotificationMessage, options?: TelegramFormatOptions): string {
  switch (message.type) {
    case 'startup':
      return [
        '<b>Review status bot started</b>',
        `Watching homework reviews since ${escapeHtml(formatDateTime(message.startedAt, options?.timezone))}.`,
      ].join('\n')
    case 'status':
      return [
        `<b>${escapeHtml(message.name)}</b>: review status is now <code>${message.status}</code>`,
        escapeHtml(message.verdictText),
      ].join('\n')
    case 'failure':
      return [
        `<b>Monitor failure</b> <code>${message.kind}</code>`,
        escapeHtml(message.message),
      ].join('\n')
  }
}

function splitByLength(value: string, separator: string): string[] {
  if (value.length <= TELEGRAM_MAX_MESSAGE_LENGTH) return [value]

  const units = value.split(separator)
  const chunks: string[] = []
  let current = ''

  for (const unitRaw of units) {
    const unit = unitRaw.trim()
    if (unit.length === 0) continue
    const next = current.length > 0 ? `${current}${separator}${unit}` : unit
    if (next.length <= TELEGRAM_MAX_MESSAGE_LENGTH) {
      current = next
      continue
    }
    if (current.length > 0) {
      chunks.push(current)
      current = ''
    }
    if (unit.length <= TELEGRAM_MAX_MESSAGE_LENGTH) {
      current = unit
      continue
    }

    // hard split for a single oversized line
    let offset = 0
    while (offset < unit.length) {
      const rest = unit.length - offset
      if (rest <= TELEGRAM_MAX_MESSAGE_LENGTH) {
        current = unit.slice(offset)
        break
      }

      const windowEnd = offset + TELEGRAM_MAX_MESSAGE_LENGTH
      const window = unit.slice(offset, windowEnd)
      const breakAt = window.lastIndexOf(' ')
      if (breakAt > 0) {
        chunks.push(window.slice(0, breakAt).trim())
        offset += breakAt + 1
      }
      else {
        chunks.push(window)
        offset = windowEnd
      }
    }
  }

  if (current.length > 0) {
    chunks.push(current)
  }

  return chunks.filter(chunk => chunk.length > 0)
}

/** Renders a notification as one or more Telegram HTML messages. */
export function toTelegramTextMessages(message: NotificationMessage, options?: TelegramFormatOptions): string[] {
  const text = renderMessage(message, options).trim()
  return splitByLength(text, '\n')
}
