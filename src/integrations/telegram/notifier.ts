import type { NotificationMessage, Notifier } from '../../core/notifications/types.js'
import { asErrorMessage } from '../../core/errors.js'
import { logger, maskSecret } from '../../utils/logger.js'
import { sleep } from '../../utils/time.js'
import { TelegramBotApiClient, TelegramRequestError } from './api.js'
import { toTelegramTextMessages } from './format.js'
import type { TelegramMessageSender } from './types.js'

const MAX_SEND_ATTEMPTS = 3
const MAX_RETRY_AFTER_SECONDS = 60

export interface TelegramNotifierOptions {
  botToken: string
  chatId: string
  threadId?: number
  timezone?: string
  disableNotification?: boolean
  timeoutMs?: number
  api?: TelegramMessageSender
  /** Delay between attempts; tests replace it. */
  wait?: (ms: number) => Promise<void>
}

export class TelegramNotifier implements Notifier {
  private readonly api: TelegramMessageSender
  private readonly chatId: string
  private readonly threadId?: number
  private readonly timezone?: string
  private readonly disableNotification: boolean
  private readonly wait: (ms: number) => Promise<void>
  private sendChain: Promise<void> = Promise.resolve()

  constructor(options: TelegramNotifierOptions) {
    this.api = options.api ?? new TelegramBotApiClient(options.botToken.trim(), options.timeoutMs)
    this.chatId = options.chatId.trim()
    this.threadId = options.threadId
    this.timezone = options.timezone
    this.disableNotification = options.disableNotification === true
    this.wait = options.wait ?? (ms => sleep(ms))

    logger.info('Telegram notifications configured', {
      chatId: maskSecret(this.chatId, 3),
      threadId: this.threadId ?? null,
      silent: this.disableNotification,
    })
  }

  async send(message: NotificationMessage): Promise<void> {
    const chunks = toTelegramTextMessages(message, { timezone: this.timezone })
    if (chunks.length === 0) return

    const deliver = async () => {
      for (const chunk of chunks) {
        await this.sendWithRetry(chunk)
      }
    }
    // keep chunks of concurrent sends from interleaving
    const run = this.sendChain.then(deliver, deliver)
    this.sendChain = run.catch(() => undefined)
    await run
  }

  private async sendWithRetry(text: string): Promise<void> {
    for (let attempt = 1; attempt <= MAX_SEND_ATTEMPTS; attempt += 1) {
      try {
        await this.api.sendMessage({
          chatId: this.chatId,
          threadId: this.threadId,
          text,
          disableNotification: this.disableNotification,
          disableWebPreview: true,
        })
        return
      }
      catch (error) {
        if (attempt >= MAX_SEND_ATTEMPTS) {
          logger.warn('Telegram send failed', {
            attempts: attempt,
            error: asErrorMessage(error),
          })
          throw error
        }

        const retryAfter = error instanceof TelegramRequestError ? error.retryAfterSeconds : undefined
        if (typeof retryAfter === 'number' && retryAfter > 0 && retryAfter <= MAX_RETRY_AFTER_SECONDS) {
          logger.warn('Telegram send rate-limited; retrying', {
            attempt,
            retryAfterSeconds: retryAfter,
          })
          await this.wait((retryAfter + 1) * 1000)
          continue
        }

        const backoffMs = attempt * 2_000
        logger.warn('Telegram send failed; retrying', {
          attempt,
          backoffMs,
          error: asErrorMessage(error),
        })
        await this.wait(backoffMs)
      }
    }
  }
}
