export interface TelegramSendMessageParams {
  chatId: string | number
  threadId?: number
  text: string
  disableNotification?: boolean
  disableWebPreview?: boolean
}

/** What a `sendMessage` reply tells us; the sent message itself is not needed. */
export type TelegramSendReply =
  | { ok: true }
  | { ok: false; description: string; retryAfterSeconds?: number }

export interface TelegramMessageSender {
  sendMessage(params: TelegramSendMessageParams): Promise<void>
}
