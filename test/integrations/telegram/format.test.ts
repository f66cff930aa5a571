import { describe, it, expect } from 'vitest'
import { escapeHtml, toTelegramTextMessages } from '../../../src/integrations/telegram/format.js'

describe('escapeHtml', () => {
  it('escapes the characters Telegram HTML treats as markup', () => {
    expect(escapeHtml('a<b>&c')).toBe('a&lt;b&gt;&amp;c')
  })
})

describe('toTelegramTextMessages', () => {
  it('renders a status change with the homework name and verdict', () => {
    expect(toTelegramTextMessages({
      type: 'status',
      name: 'hw1 <final>',
      status: 'accepted',
      verdictText: 'Reviewed & accepted.',
    })).toEqual([
      '<b>hw1 &lt;final&gt;</b>: review status is now <code>accepted</code>\nReviewed &amp; accepted.',
    ])
  })

  it('renders a failure alert with its kind', () => {
    expect(toTelegramTextMessages({
      type: 'failure',
      kind: 'unknown_status',
      message: 'Undocumented homework status: archived',
    })).toEqual([
      '<b>Monitor failure</b> <code>unknown_status</code>\nUndocumented homework status: archived',
    ])
  })

  it('renders the startup announcement in the configured timezone', () => {
    const [text] = toTelegramTextMessages(
      { type: 'startup', startedAt: new Date(Date.UTC(2026, 9, 18, 17, 34)) },
      { timezone: 'UTC' },
    )

    const [title, body] = text.split('\n')
    expect(title).toBe('<b>Review status bot started</b>')
    expect(body).toContain('18/10/2026')
    expect(body).toContain('17:34')
  })

  it('splits messages longer than the Telegram limit', () => {
    const chunks = toTelegramTextMessages({
      type: 'failure',
      kind: 'unexpected',
      message: 'x'.repeat(5000),
    })

    expect(chunks).toEqual([
      '<b>Monitor failure</b> <code>unexpected</code>',
      'x'.repeat(4096),
      'x'.repeat(904),
    ])
  })
})
