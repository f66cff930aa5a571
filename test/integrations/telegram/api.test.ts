import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { TelegramBotApiClient, TelegramRequestError } from '../../../src/integrations/telegram/api.js'

vi.mock('../../../src/utils/logger.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../../src/utils/logger.js')>()
  return {
    ...actual,
    logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
  }
})

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status })
}

describe('TelegramBotApiClient', () => {
  let fetchMock: ReturnType<typeof vi.fn>

  beforeEach(() => {
    fetchMock = vi.fn()
    vi.stubGlobal('fetch', fetchMock)
  })

  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('posts sendMessage with HTML parse mode', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ ok: true, result: { message_id: 1 } }))

    const client = new TelegramBotApiClient('test-bot-token')
    await expect(client.sendMessage({ chatId: '42', text: 'hi', disableNotification: true })).resolves.toBeUndefined()

    const [url, init] = fetchMock.mock.calls[0]
    expect(url).toBe('https://api.telegram.org/bottest-bot-token/sendMessage')
    expect(init.method).toBe('POST')
    expect(JSON.parse(init.body)).toEqual({
      chat_id: '42',
      text: 'hi',
      parse_mode: 'HTML',
      disable_notification: true,
      disable_web_page_preview: true,
    })
  })

  it('exposes retry_after from a rate-limited response', async () => {
    fetchMock.mockResolvedValue(jsonResponse({
      ok: false,
      error_code: 429,
      description: 'Too Many Requests: retry after 5',
      parameters: { retry_after: 5 },
    }, 429))

    const error = await new TelegramBotApiClient('test-bot-token')
      .sendMessage({ chatId: 42, text: 'hi' })
      .catch((reason: unknown) => reason)

    expect(error).toBeInstanceOf(TelegramRequestError)
    if (!(error instanceof TelegramRequestError)) return
    expect(error.message).toBe('Too Many Requests: retry after 5')
    expect(error.status).toBe(429)
    expect(error.retryAfterSeconds).toBe(5)
  })

  it('describes an HTTP error without a JSON body by status', async () => {
    fetchMock.mockResolvedValue(new Response('bad gateway', { status: 502 }))

    await expect(new TelegramBotApiClient('test-bot-token').sendMessage({ chatId: 42, text: 'hi' }))
      .rejects.toThrow('Telegram API HTTP 502')
  })

  it('passes the forum thread id through', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ ok: true, result: { message_id: 1 } }))

    await new TelegramBotApiClient('test-bot-token').sendMessage({ chatId: 42, threadId: 7, text: 'hi' })

    const [, init] = fetchMock.mock.calls[0]
    expect(JSON.parse(init.body)).toMatchObject({ chat_id: 42, message_thread_id: 7 })
  })

  it('throws the API description when ok is false', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ ok: false, error_code: 400, description: 'Bad Request: chat not found' }))

    await expect(new TelegramBotApiClient('test-bot-token').sendMessage({ chatId: 42, text: 'hi' }))
      .rejects.toThrow('Bad Request: chat not found')
  })

  it('rejects a payload that is not a Bot API response', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ result: 'x' }))

    await expect(new TelegramBotApiClient('test-bot-token').sendMessage({ chatId: 42, text: 'hi' }))
      .rejects.toThrow('Telegram API returned an invalid payload')
  })

  it('wraps network failures', async () => {
    const cause = new TypeError('fetch failed')
    fetchMock.mockRejectedValue(cause)

    const error = await new TelegramBotApiClient('test-bot-token')
      .sendMessage({ chatId: 42, text: 'hi' })
      .catch((reason: unknown) => reason)

    expect(error).toBeInstanceOf(TelegramRequestError)
    if (!(error instanceof TelegramRequestError)) return
    expect(error.message).toBe('Telegram API network request failed')
    expect(error.cause).toBe(cause)
  })
})
