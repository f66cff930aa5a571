export type MonitorErrorKind =
  | 'transport'
  | 'wrong_status_code'
  | 'malformed_payload'
  | 'cursor_missing'
  | 'unknown_status'
  | 'incomplete_record'
  | 'notification_failure'
  | 'unexpected'

/**
 * Every failure the watch loop can meet, tagged by kind. The message is part
 * of the alert signature, so it must not contain values that change from one
 * cycle to the next; put those in `details`.
 */
export class MonitorError extends Error {
  readonly kind: MonitorErrorKind
  readonly details?: Record<string, unknown>

  constructor(
    kind: MonitorErrorKind,
    message: string,
    options: { details?: Record<string, unknown>; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause })
    this.name = 'MonitorError'
    this.kind = kind
    this.details = options.details
  }

  get signature(): string {
    return `${this.kind}: ${this.message}`
  }
}

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: MonitorError }

export function success<T>(value: T): Outcome<T> {
  return { ok: true, value }
}

export function failure<T = never>(
  kind: MonitorErrorKind,
  message: string,
  options?: { details?: Record<string, unknown>; cause?: unknown },
): Outcome<T> {
  return { ok: false, error: new MonitorError(kind, message, options) }
}

export function asErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}

export function toMonitorError(error: unknown): MonitorError {
  if (error instanceof MonitorError) return error
  return new MonitorError('unexpected', asErrorMessage(error), { cause: error })
}
