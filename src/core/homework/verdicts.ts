import type { HomeworkStatus } from '../../types/index.js'

export const VERDICT_TEXT: Readonly<Record<HomeworkStatus, string>> = {
  pending: 'The work has been taken for review.',
  accepted: 'The work has been reviewed: the reviewer liked everything. Hooray!',
  rejected: 'The work has been reviewed: the reviewer has comments.',
}

// The API has reported review progress under both naming schemes.
const RAW_STATUS_MAP: Readonly<Record<string, HomeworkStatus>> = {
  pending: 'pending',
  reviewing: 'pending',
  accepted: 'accepted',
  approved: 'accepted',
  rejected: 'rejected',
}

export function mapRawStatus(raw: string): HomeworkStatus | undefined {
  if (!Object.prototype.hasOwnProperty.call(RAW_STATUS_MAP, raw)) return undefined
  return RAW_STATUS_MAP[raw]
}

