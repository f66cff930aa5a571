import { asErrorMessage } from '../../core/errors.js'
import { logger, maskSecret } from '../../utils/logger.js'
import type { TelegramMessageSender, TelegramSendMessageParams, TelegramSendReply } from './types.js'

const TELEGRAM_BASE_URL = 'https://api.telegram.org'

export class TelegramRequestError extends Error {
  readonly status?: number
  /** Set when Telegram asks the caller to slow down. */
  readonly retryAfterSeconds?: number

  constructor(message: string, options: { status?: number; retryAfterSeconds?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause })
    this.name = 'TelegramRequestError'
    this.status = options.status
    this.retryAfterSeconds = options.retryAfterSeconds
  }
}

function toSendReply(value: unknown): TelegramSendReply | undefined {
  if (typeof value !== 'object' || value === null || !('ok' in value)) return undefined
  if (value.ok === true) return { ok: true }
  if (value.ok !== false) return undefined

  const description = 'description' in value && typeof value.description === 'string'
    ? value.description
    : 'Telegram API rejected the message'
  const parameters = 'parameters' in value ? value.parameters : undefined
  const retryAfterSeconds = typeof parameters === 'object' && parameters !== null
    && 'retry_after' in parameters && typeof parameters.retry_after === 'number'
    ? parameters.retry_after
    : undefined
  return { ok: false, description, retryAfterSeconds }
}

/** Posts HTML messages through the Bot API `sendMessage` method. */
export class TelegramBotApiClient implements TelegramMessageSender {
  private readonly sendMessageUrl: string

  constructor(token: string, private readonly timeoutMs = 10_000) {
    this.sendMessageUrl = `${TELEGRAM_BASE_URL}/bot${token}/sendMessage`
    logger.debug('Telegram API client initialized', {
      token: maskSecret(token, 6),
    })
  }

  async sendMessage(params: TelegramSendMessageParams): Promise<void> {
    let response: Response
    let responseText: string
    try {
      response = await fetch(this.sendMessageUrl, {
        method: 'POST',
        headers: {
          'content-type': 'application/json',
        },
        body: JSON.stringify({
          chat_id: params.chatId,
          message_thread_id: params.threadId,
          text: params.text,
          parse_mode: 'HTML',
          disable_notification: params.disableNotification,
          disable_web_page_preview: params.disableWebPreview ?? true,
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      })
      responseText = await response.text()
    }
    catch (error) {
      logger.warn('Telegram sendMessage failed before response', {
        error: asErrorMessage(error),
      })
      throw new TelegramRequestError('Telegram API network request failed', { cause: error })
    }

    const reply = this.readReply(responseText, response.status)
    if (reply?.ok === false) {
      logger.warn('Telegram rejected sendMessage', {
        status: response.status,
        description: reply.description,
      })
      throw new TelegramRequestError(reply.description, {
        status: response.status,
        retryAfterSeconds: reply.retryAfterSeconds,
      })
    }
    if (!response.ok) {
      throw new TelegramRequestError(`Telegram API HTTP ${response.status}`, { status: response.status })
    }
    if (!reply) {
      throw new TelegramRequestError('Telegram API returned an invalid payload', { status: response.status })
    }
  }

  private readReply(text: string, status: number): TelegramSendReply | undefined {
    if (text.length === 0) return undefined
    try {
      return toSendReply(JSON.parse(text))
    }
    catch (error) {
      logger.warn('Telegram API response was not JSON', {
        status,
        error: asErrorMessage(error),
      })
      return undefined
    }
  }
}
