import type { Outcome } from '../errors.js'

export interface HomeworkStatusClient {
  /** Fetches entries changed at or after `cursor` (Unix seconds). */
  fetchHomeworks(cursor: number): Promise<Outcome<unknown>>
}

export type CycleOutcome =
  | 'notified'
  | 'baseline'
  | 'unchanged'
  | 'empty'
  | 'notify-failed'
  | 'failed'
