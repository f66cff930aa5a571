import { loadConfig } from '../config/index.js'
import { HomeworkWatchService } from '../core/homework/service.js'
import { deliverNotification } from '../core/notifications/deliver.js'
import { PracticumClient } from '../integrations/practicum/client.js'
import { TelegramNotifier } from '../integrations/telegram/notifier.js'
import { configureLogger, logger, maskSecret } from '../utils/logger.js'

export class App {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  /** Resolves once `signal` aborts and the loop has left its current cycle. */
  async start(signal: AbortSignal): Promise<void> {
    const config = loadConfig(this.env)
    await configureLogger({
      level: config.LOG_LEVEL,
      summaryPath: config.logSummaryPath,
      detailPath: config.logDetailPath,
    })
    logger.info('App starting')
    logger.debug('App config', {
      endpoint: config.PRACTICUM_ENDPOINT,
      practicumToken: maskSecret(config.PRACTICUM_TOKEN),
      telegramChatId: maskSecret(config.TELEGRAM_CHAT_ID, 3),
      telegramThreadId: config.TELEGRAM_THREAD_ID ?? null,
      pollIntervalSeconds: config.POLL_INTERVAL_SECONDS,
      httpTimeoutMs: config.HTTP_TIMEOUT_MS,
      firstStatusPolicy: config.FIRST_STATUS_POLICY,
      timezone: config.TZ ?? 'UTC',
      logLevel: config.LOG_LEVEL,
      logSummaryPath: config.logSummaryPath,
      logDetailPath: config.logDetailPath,
    })

    const client = new PracticumClient({
      token: config.PRACTICUM_TOKEN,
      endpoint: config.PRACTICUM_ENDPOINT,
      timeoutMs: config.HTTP_TIMEOUT_MS,
    })
    const notifier = new TelegramNotifier({
      botToken: config.TELEGRAM_TOKEN,
      chatId: config.TELEGRAM_CHAT_ID,
      threadId: config.TELEGRAM_THREAD_ID,
      timezone: config.TZ,
      disableNotification: config.TELEGRAM_DISABLE_NOTIFICATION,
      timeoutMs: config.HTTP_TIMEOUT_MS,
    })

    await deliverNotification(notifier, { type: 'startup', startedAt: new Date() })

    const watch = new HomeworkWatchService({
      client,
      notifier,
      intervalMs: config.pollIntervalMs,
      firstStatusPolicy: config.FIRST_STATUS_POLICY,
    })
    logger.info('App started')
    await watch.run(signal)
  }
}
