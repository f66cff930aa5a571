import type { HomeworkStatusClient } from '../../core/homework/types.js'
import { asErrorMessage, failure, success } from '../../core/errors.js'
import type { Outcome } from '../../core/errors.js'
import { logger } from '../../utils/logger.js'

const MAX_DIAGNOSTIC_BODY_LENGTH = 500

export interface PracticumClientOptions {
  token: string
  endpoint: string
  timeoutMs: number
}

function truncate(value: string, maxLength: number): string {
  if (value.length <= maxLength) return value
  return `${value.slice(0, maxLength)}...`
}

export class PracticumClient implements HomeworkStatusClient {
  private readonly token: string
  private readonly endpoint: string
  private readonly timeoutMs: number

  constructor(options: PracticumClientOptions) {
    this.token = options.token
    this.endpoint = options.endpoint
    this.timeoutMs = options.timeoutMs
  }

  async fetchHomeworks(cursor: number): Promise<Outcome<unknown>> {
    const url = new URL(this.endpoint)
    url.searchParams.set('from_date', String(cursor))
    logger.debug('Homework statuses request', { url: url.toString() })

    let response: Response
    let text: string
    try {
      response = await fetch(url, {
        method: 'GET',
        headers: {
          accept: 'application/json',
          authorization: `OAuth ${this.token}`,
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      })
      text = await response.text()
    }
    catch (error) {
      logger.warn('Homework statuses request failed before response', {
        endpoint: this.endpoint,
        error: asErrorMessage(error),
      })
      return failure('transport', `Request to ${this.endpoint} failed: ${asErrorMessage(error)}`, {
        cause: error,
      })
    }

    logger.debug('Homework statuses response', {
      status: response.status,
      bytes: text.length,
    })

    if (response.status !== 200) {
      const reason = response.statusText || 'Unknown'
      return failure('wrong_status_code', `Endpoint ${this.endpoint} returned HTTP ${response.status} ${reason}`, {
        details: {
          status: response.status,
          reason,
          body: truncate(text, MAX_DIAGNOSTIC_BODY_LENGTH),
        },
      })
    }

    try {
      return success<unknown>(JSON.parse(text))
    }
    catch (error) {
      return failure('malformed_payload', 'Response body is not valid JSON', {
        details: { body: truncate(text, MAX_DIAGNOSTIC_BODY_LENGTH) },
        cause: error,
      })
    }
  }
}
