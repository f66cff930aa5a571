import { asErrorMessage, failure, success } from '../errors.js'
import type { Outcome } from '../errors.js'
import { logger } from '../../utils/logger.js'
import type { NotificationMessage, Notifier } from './types.js'

export async function deliverNotification(notifier: Notifier, message: NotificationMessage): Promise<Outcome<void>> {
  try {
    await notifier.send(message)
    logger.info('Notification sent', { type: message.type })
    return success(undefined)
  }
  catch (error) {
    logger.error('Notification delivery failed', {
      type: message.type,
      error: asErrorMessage(error),
    })
    return failure('notification_failure', `Notification delivery failed: ${asErrorMessage(error)}`, {
      cause: error,
    })
  }
}
