import { z } from 'zod'
import { TelegramApiError } from '../errors.js'
import { createNoopLogger, type Logger } from '../logger.js'

export interface TelegramClientConfig {
  botToken: string
  apiUrl: string
}

export interface InlineKeyboardButton {
  text: string
  callback_data: string
}

export interface SendMessageParams {
  chat_id: number
  text: string
  message_thread_id?: number
  reply_markup?: { inline_keyboard: InlineKeyboardButton[][] }
}

const apiResponseSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
  error_code: z.number().optional()
})

const sentMessageSchema = z.object({
  message_id: z.number()
}).passthrough()

const rawUpdateSchema = z.object({
  update_id: z.number().int()
}).passthrough()

export type RawUpdate = z.infer<typeof rawUpdateSchema>

export type SentMessage = z.infer<typeof sentMessageSchema>

export function createTelegramClient(
  config: TelegramClientConfig,
  logger?: Logger,
  fetchFunction: typeof fetch = fetch
) {
  const log = logger ?? createNoopLogger()
  const baseUrl = `${config.apiUrl}/bot${config.botToken}`

  async function call<S extends z.ZodTypeAny>(
    method: string,
    payload: object,
    resultSchema: S,
    signal?: AbortSignal
  ): Promise<z.infer<S>> {
    let response: Response
    try {
      response = await fetchFunction(`${baseUrl}/${method}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal
      })
    } catch (err) {
      log.error({ event: 'telegram_network_error', method, error: err })
      throw new TelegramApiError(`Network error calling ${method}`, undefined, undefined, { cause: err })
    }

    let body: unknown
    try {
      body = await response.json()
    } catch (err) {
      log.error({ event: 'telegram_json_parse_error', method, statusCode: response.status, error: err })
      throw new TelegramApiError(`Failed to parse ${method} response`, response.status, undefined, { cause: err })
    }

    const parsed = apiResponseSchema.safeParse(body)
    if (!parsed.success) {
      log.error({ event: 'telegram_invalid_response', method, statusCode: response.status })
      throw new TelegramApiError(`Unexpected ${method} response`, response.status)
    }

    const envelope = parsed.data
    if (!response.ok || !envelope.ok) {
      const statusCode = envelope.error_code ?? response.status
      log.error({ event: 'telegram_api_error', method, statusCode, description: envelope.description })
      throw new TelegramApiError(`Telegram API error: ${statusCode}`, statusCode, envelope.description)
    }

    const result = resultSchema.safeParse(envelope.result)
    if (!result.success) {
      log.error({ event: 'telegram_invalid_result', method, error: result.error.message })
      throw new TelegramApiError(`Unexpected ${method} result`, response.status)
    }
    return result.data
  }

  async function sendMessage(params: SendMessageParams): Promise<SentMessage> {
    return call('sendMessage', params, sentMessageSchema)
  }

  async function answerCallbackQuery(callbackQueryId: string, text?: string): Promise<boolean> {
    return call('answerCallbackQuery', { callback_query_id: callbackQueryId, text }, z.boolean())
  }

  async function getUpdates(offset: number, timeoutSeconds: number, signal?: AbortSignal): Promise<RawUpdate[]> {
    return call(
      'getUpdates',
      { offset, timeout: timeoutSeconds, allowed_updates: ['message', 'callback_query'] },
      z.array(rawUpdateSchema),
      signal
    )
  }

  async function setWebhook(url: string, secretToken?: string): Promise<boolean> {
    const accepted = await call(
      'setWebhook',
      { url, secret_token: secretToken, allowed_updates: ['message', 'callback_query'] },
      z.boolean()
    )
    log.info({ event: 'telegram_webhook_set', url })
    return accepted
  }

  async function deleteWebhook(): Promise<boolean> {
    return call('deleteWebhook', { drop_pending_updates: false }, z.boolean())
  }

  return { sendMessage, answerCallbackQuery, getUpdates, setWebhook, deleteWebhook }
}

export type TelegramClient = ReturnType<typeof createTelegramClient>
