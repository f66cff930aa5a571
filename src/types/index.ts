export type HomeworkStatus = 'pending' | 'accepted' | 'rejected'

export interface StatusRecord {
  readonly id: string
  readonly name: string
  readonly status: HomeworkStatus
  readonly rawStatus: string
}

export interface StatusNotification {
  name: string
  status: HomeworkStatus
  verdictText: string
}

export type ValidatedResponse =
  | { kind: 'empty'; cursor: number | undefined }
  | { kind: 'records'; records: unknown[]; cursor: number }

export type ChangeDecision =
  | { changed: false; record: StatusRecord }
  | { changed: true; record: StatusRecord; notification: StatusNotification }

/**
 * `notify`: the first status seen after startup always produces a message.
 * `suppress`: the first status becomes the baseline silently.
 * `assume-pending`: start as if `pending` had already been reported.
 */
export type FirstStatusPolicy = 'notify' | 'suppress' | 'assume-pending'
