import type { ValidatedResponse } from '../../types/index.js'
import { failure, success } from '../errors.js'
import type { Outcome } from '../errors.js'

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function describeType(value: unknown): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'array'
  return typeof value
}

/**
 * Structural check of a homework_statuses response. An empty `homeworks`
 * list is a valid "nothing new" answer, not a failure.
 */
export function validateResponse(payload: unknown): Outcome<ValidatedResponse> {
  if (!isRecord(payload)) {
    return failure('malformed_payload', `Response is ${describeType(payload)}, expected an object`)
  }

  if (!('homeworks' in payload)) {
    return failure('malformed_payload', 'Response has no "homeworks" field')
  }
  const records = payload.homeworks
  if (!Array.isArray(records)) {
    return failure('malformed_payload', `Response "homeworks" is ${describeType(records)}, expected an array`)
  }

  // An empty list is "nothing new" even when the server omits the cursor
  const rawCursor = payload.current_date
  if (records.length === 0 && (rawCursor === undefined || rawCursor === null)) {
    return success<ValidatedResponse>({ kind: 'empty', cursor: undefined })
  }

  if (rawCursor === undefined || rawCursor === null) {
    return failure('cursor_missing', 'Response has no "current_date" field')
  }
  if (typeof rawCursor !== 'number' || !Number.isSafeInteger(rawCursor) || rawCursor < 0) {
    return failure('malformed_payload', 'Response "current_date" is not a non-negative integer', {
      details: { currentDate: rawCursor },
    })
  }

  if (records.length === 0) {
    return success<ValidatedResponse>({ kind: 'empty', cursor: rawCursor })
  }
  return success<ValidatedResponse>({ kind: 'records', records, cursor: rawCursor })
}
