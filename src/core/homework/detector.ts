import type { ChangeDecision, HomeworkStatus, StatusRecord } from '../../types/index.js'
import { failure, success } from '../errors.js'
import type { Outcome } from '../errors.js'
import { isRecord } from './validator.js'
import { mapRawStatus, VERDICT_TEXT } from './verdicts.js'

function asNonEmptyString(value: unknown): string | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return String(value)
  if (typeof value !== 'string') return undefined
  const trimmed = value.trim()
  return trimmed.length > 0 ? trimmed : undefined
}

export function toStatusRecord(item: unknown): Outcome<StatusRecord> {
  if (!isRecord(item)) {
    return failure('incomplete_record', 'Newest homework entry is not an object')
  }

  const rawStatus = typeof item.status === 'string' ? item.status : undefined
  const status = rawStatus === undefined ? undefined : mapRawStatus(rawStatus)
  if (rawStatus === undefined || status === undefined) {
    return failure('unknown_status', `Undocumented homework status: ${rawStatus ?? 'missing'}`)
  }

  const name = asNonEmptyString(item.homework_name)
  if (!name) {
    return failure('incomplete_record', 'Homework entry has no "homework_name"', {
      details: { id: item.id },
    })
  }

  return success(Object.freeze({
    id: asNonEmptyString(item.id) ?? name,
    name,
    status,
    rawStatus,
  }))
}

/**
 * Looks only at the newest entry (the API returns newest first) and compares
 * its mapped status with what was last reported.
 */
export function detectChange(records: readonly unknown[], observed: HomeworkStatus | undefined): Outcome<ChangeDecision> {
  const parsed = toStatusRecord(records[0])
  if (!parsed.ok) return parsed

  const record = parsed.value
  if (record.status === observed) {
    return success<ChangeDecision>({ changed: false, record })
  }

  return success<ChangeDecision>({
    changed: true,
    record,
    notification: {
      name: record.name,
      status: record.status,
      verdictText: VERDICT_TEXT[record.status],
    },
  })
}
