import type { MonitorErrorKind } from '../errors.js'
import type { StatusNotification } from '../../types/index.js'

export type NotificationMessage =
  | { type: 'startup'; startedAt: Date }
  | ({ type: 'status' } & StatusNotification)
  | { type: 'failure'; kind: MonitorErrorKind; message: string }

export interface Notifier {
  /** Rejects when the channel could not take the message. */
  send(message: NotificationMessage): Promise<void>
}
