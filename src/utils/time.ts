const DEFAULT_TIMEZONE = 'UTC'

export function toUnixSeconds(date: Date = new Date()): number {
  return Math.floor(date.getTime() / 1000)
}

/**
 * Resolves after `ms`, or as soon as `signal` aborts. Never rejects, so the
 * caller checks `signal.aborted` afterwards.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.resolve()
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer)
      resolve()
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

export function formatDateTime(date: Date, timezone?: string): string {
  if (!Number.isFinite(date.getTime())) return 'Unknown'
  const options: Intl.DateTimeFormatOptions = {
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    hour12: false,
    timeZoneName: 'short',
  }
  try {
    return new Intl.DateTimeFormat('en-GB', {
      ...options,
      timeZone: timezone?.trim() || DEFAULT_TIMEZONE,
    }).format(date)
  }
  catch {
    return new Intl.DateTimeFormat('en-GB', { ...options, timeZone: DEFAULT_TIMEZONE }).format(date)
  }
}
