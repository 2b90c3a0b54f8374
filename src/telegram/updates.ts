import { z } from 'zod'
import { UpdateError } from '../errors.js'
import { createNoopLogger, type Logger } from '../logger.js'
import type { DispatchAction, Dispatcher } from '../conversation/dispatcher.js'
import type { InboundEvent } from '../conversation/types.js'
import type { TelegramClient } from './client.js'

const userSchema = z.object({
  id: z.number().int(),
  username: z.string().optional()
}).passthrough()

const chatSchema = z.object({
  id: z.number().int()
}).passthrough()

const messageSchema = z.object({
  message_id: z.number().int(),
  from: userSchema.optional(),
  chat: chatSchema,
  message_thread_id: z.number().int().optional(),
  text: z.string().optional()
}).passthrough()

const callbackQuerySchema = z.object({
  id: z.string(),
  from: userSchema,
  message: messageSchema.optional(),
  data: z.string().optional()
}).passthrough()

export const updateSchema = z.object({
  update_id: z.number().int(),
  message: messageSchema.optional(),
  callback_query: callbackQuerySchema.optional()
}).passthrough()

export type TelegramUpdate = z.infer<typeof updateSchema>

export interface ExtractedEvent {
  userId: number
  event: InboundEvent
  callbackQueryId?: string
}

export function extractInboundEvent(update: TelegramUpdate): ExtractedEvent | null {
  const { message, callback_query: query } = update

  if (message?.from !== undefined && message.text !== undefined) {
    return {
      userId: message.from.id,
      event: {
        kind: 'text',
        text: message.text,
        surface: { chatId: message.chat.id, threadId: message.message_thread_id }
      }
    }
  }

  if (query?.message !== undefined && query.data !== undefined) {
    return {
      userId: query.from.id,
      callbackQueryId: query.id,
      event: {
        kind: 'button',
        payload: query.data,
        surface: { chatId: query.message.chat.id, threadId: query.message.message_thread_id }
      }
    }
  }

  return null
}

export interface UpdateHandlerDeps {
  dispatcher: Pick<Dispatcher, 'dispatch'>
  client?: Pick<TelegramClient, 'answerCallbackQuery'>
  logger?: Logger
}

export interface UpdateHandlerResult {
  handled: boolean
  action: DispatchAction | 'ignored_unsupported'
}

export function createUpdateHandler(deps: UpdateHandlerDeps) {
  const { dispatcher, client } = deps
  const logger = deps.logger ?? createNoopLogger()

  function parseUpdate(body: unknown): TelegramUpdate {
    const result = updateSchema.safeParse(body)
    if (!result.success) {
      const field = result.error.errors[0]?.path.join('.') ?? 'unknown'
      logger.error({ event: 'update_parse_error', error: result.error.message, field })
      throw new UpdateError(`Invalid update payload: ${result.error.message}`, field)
    }
    return result.data
  }

  async function acknowledge(callbackQueryId: string): Promise<void> {
    if (client === undefined) return
    try {
      await client.answerCallbackQuery(callbackQueryId)
    } catch (err) {
      logger.warn({ event: 'callback_answer_failed', callbackQueryId, error: err })
    }
  }

  async function handle(body: unknown): Promise<UpdateHandlerResult> {
    const update = parseUpdate(body)
    const extracted = extractInboundEvent(update)

    if (extracted === null) {
      logger.info({ event: 'ignored_unsupported_update', updateId: update.update_id })
      return { handled: false, action: 'ignored_unsupported' }
    }

    logger.info({
      event: 'update_received',
      updateId: update.update_id,
      userId: extracted.userId,
      kind: extracted.event.kind
    })

    // dispatch enqueues synchronously, so the user's events keep their arrival order
    // however long the acknowledgement takes
    const dispatched = dispatcher.dispatch(extracted.userId, extracted.event)
    if (extracted.callbackQueryId === undefined) {
      return dispatched
    }

    const [result] = await Promise.all([dispatched, acknowledge(extracted.callbackQueryId)])
    return result
  }

  return { handle, parseUpdate }
}

export type UpdateHandler = ReturnType<typeof createUpdateHandler>
