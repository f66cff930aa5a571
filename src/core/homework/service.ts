import type { FirstStatusPolicy, HomeworkStatus } from '../../types/index.js'
import { toMonitorError } from '../errors.js'
import type { MonitorError } from '../errors.js'
import { deliverNotification } from '../notifications/deliver.js'
import type { Notifier } from '../notifications/types.js'
import { logger } from '../../utils/logger.js'
import { sleep as defaultSleep, toUnixSeconds } from '../../utils/time.js'
import { detectChange } from './detector.js'
import type { CycleOutcome, HomeworkStatusClient } from './types.js'
import { validateResponse } from './validator.js'

export interface HomeworkWatchServiceOptions {
  client: HomeworkStatusClient
  notifier: Notifier
  intervalMs: number
  firstStatusPolicy?: FirstStatusPolicy
  now?: () => Date
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
}

export interface WatchState {
  cursor: number
  observed: HomeworkStatus | undefined
  lastErrorSignature: string | undefined
}

/**
 * Polls the review API on a fixed interval and reports status changes.
 *
 * Cursor and observed status are committed together, and only once a cycle
 * has fully succeeded; a failed cycle leaves both untouched so the next one
 * repeats the same request. Failures are alerted once per distinct
 * signature until a cycle succeeds again.
 */
export class HomeworkWatchService {
  private readonly client: HomeworkStatusClient
  private readonly notifier: Notifier
  private readonly intervalMs: number
  private readonly firstStatusPolicy: FirstStatusPolicy
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>
  private cursor: number
  private observed: HomeworkStatus | undefined
  private lastErrorSignature: string | undefined

  constructor(options: HomeworkWatchServiceOptions) {
    this.client = options.client
    this.notifier = options.notifier
    this.intervalMs = options.intervalMs
    this.firstStatusPolicy = options.firstStatusPolicy ?? 'notify'
    this.sleep = options.sleep ?? defaultSleep
    this.cursor = toUnixSeconds((options.now ?? (() => new Date()))())
    this.observed = this.firstStatusPolicy === 'assume-pending' ? 'pending' : undefined
  }

  getState(): WatchState {
    return {
      cursor: this.cursor,
      observed: this.observed,
      lastErrorSignature: this.lastErrorSignature,
    }
  }

  async run(signal: AbortSignal): Promise<void> {
    logger.info('Homework watch started', {
      intervalMs: this.intervalMs,
      firstStatusPolicy: this.firstStatusPolicy,
      cursor: this.cursor,
    })

    while (!signal.aborted) {
      const outcome = await this.runCycle()
      logger.debug('Cycle finished', { outcome, ...this.getState() })
      if (signal.aborted) break
      await this.sleep(this.intervalMs, signal)
    }

    logger.info('Homework watch stopped', { cursor: this.cursor })
  }

  async runCycle(): Promise<CycleOutcome> {
    try {
      return await this.poll()
    }
    catch (error) {
      return this.handleFailure(toMonitorError(error))
    }
  }

  private async poll(): Promise<CycleOutcome> {
    const fetched = await this.client.fetchHomeworks(this.cursor)
    if (!fetched.ok) return this.handleFailure(fetched.error)

    const validated = validateResponse(fetched.value)
    if (!validated.ok) return this.handleFailure(validated.error)

    const response = validated.value
    if (response.kind === 'empty') {
      logger.info('No homework updates', { cursor: response.cursor ?? 'not reported' })
      this.commit(response.cursor)
      return 'empty'
    }

    const detected = detectChange(response.records, this.observed)
    if (!detected.ok) return this.handleFailure(detected.error)

    const decision = detected.value
    if (!decision.changed) {
      logger.info('Homework status unchanged', {
        homework: decision.record.name,
        status: decision.record.status,
      })
      this.commit(response.cursor)
      return 'unchanged'
    }

    if (this.observed === undefined && this.firstStatusPolicy === 'suppress') {
      logger.info('First homework status recorded without notification', {
        homework: decision.record.name,
        status: decision.record.status,
      })
      this.commit(response.cursor, decision.record.status)
      return 'baseline'
    }

    const delivered = await deliverNotification(this.notifier, {
      type: 'status',
      ...decision.notification,
    })
    if (!delivered.ok) {
      logger.warn('Status change not committed; it will be retried next cycle', {
        homework: decision.record.name,
        status: decision.record.status,
      })
      return 'notify-failed'
    }

    logger.info('Homework status changed', {
      homework: decision.record.name,
      from: this.observed ?? 'unknown',
      to: decision.record.status,
    })
    this.commit(response.cursor, decision.record.status)
    return 'notified'
  }

  private commit(cursor: number | undefined, status?: HomeworkStatus): void {
    if (cursor !== undefined) {
      this.cursor = Math.max(this.cursor, cursor)
    }
    if (status !== undefined) {
      this.observed = status
    }
    this.lastErrorSignature = undefined
  }

  private async handleFailure(error: MonitorError): Promise<CycleOutcome> {
    const signature = error.signature
    logger.error('Homework watch cycle failed', { kind: error.kind, error })

    if (signature === this.lastErrorSignature) {
      logger.info('Failure already reported; alert suppressed', { signature })
      return 'failed'
    }

    const delivered = await deliverNotification(this.notifier, {
      type: 'failure',
      kind: error.kind,
      message: error.message,
    })
    if (delivered.ok) {
      this.lastErrorSignature = signature
    }
    return 'failed'
  }
}
