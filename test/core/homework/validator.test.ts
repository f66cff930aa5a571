import { describe, it, expect } from 'vitest'
import { validateResponse } from '../../../src/core/homework/validator.js'

describe('validateResponse', () => {
  it('rejects a payload that is not an object', () => {
    const result = validateResponse(['homeworks'])

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.kind).toBe('malformed_payload')
    expect(result.error.message).toBe('Response is array, expected an object')
  })

  it('rejects null', () => {
    const result = validateResponse(null)

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.message).toBe('Response is null, expected an object')
  })

  it('rejects a payload without homeworks', () => {
    const result = validateResponse({ current_date: 1000 })

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.kind).toBe('malformed_payload')
    expect(result.error.message).toBe('Response has no "homeworks" field')
  })

  it('rejects homeworks that is not an array', () => {
    const result = validateResponse({ homeworks: { homework_name: 'hw1' }, current_date: 1000 })

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.kind).toBe('malformed_payload')
    expect(result.error.message).toBe('Response "homeworks" is object, expected an array')
  })

  it('reports a missing current_date next to records as cursor_missing', () => {
    const result = validateResponse({ homeworks: [{ homework_name: 'hw1', status: 'pending' }] })

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.kind).toBe('cursor_missing')
    expect(result.error.message).toBe('Response has no "current_date" field')
  })

  it('treats a null current_date as missing', () => {
    const result = validateResponse({ homeworks: [{ homework_name: 'hw1', status: 'pending' }], current_date: null })

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.kind).toBe('cursor_missing')
  })

  it('returns an empty result without a cursor when current_date is absent', () => {
    expect(validateResponse({ homeworks: [] })).toEqual({
      ok: true,
      value: { kind: 'empty', cursor: undefined },
    })
    expect(validateResponse({ homeworks: [], current_date: null })).toEqual({
      ok: true,
      value: { kind: 'empty', cursor: undefined },
    })
  })

  it('rejects a current_date that is not an integer', () => {
    const result = validateResponse({ homeworks: [], current_date: '1000' })

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.kind).toBe('malformed_payload')
    expect(result.error.details).toEqual({ currentDate: '1000' })
  })

  it('returns an explicit empty result for an empty homeworks list', () => {
    expect(validateResponse({ homeworks: [], current_date: 1000 })).toEqual({
      ok: true,
      value: { kind: 'empty', cursor: 1000 },
    })
  })

  it('returns records and the new cursor', () => {
    const records = [{ homework_name: 'hw2', status: 'pending' }, { homework_name: 'hw1', status: 'accepted' }]

    expect(validateResponse({ homeworks: records, current_date: 2000 })).toEqual({
      ok: true,
      value: { kind: 'records', records, cursor: 2000 },
    })
  })
})
