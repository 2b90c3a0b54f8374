import { describe, it, expect, vi } from 'vitest'
import { createUpdateHandler, extractInboundEvent, updateSchema } from '../../src/telegram/updates.js'
import type { InboundEvent } from '../../src/conversation/types.js'
import type { DispatchResult } from '../../src/conversation/dispatcher.js'
import { TelegramApiError, UpdateError } from '../../src/errors.js'
import { createMockLogger } from '../mocks/logger.js'
import { createCallbackUpdate, createTextUpdate } from '../mocks/telegram.js'

function createDispatcherStub() {
  return {
    dispatch: vi.fn(async (_userId: number, _event: InboundEvent): Promise<DispatchResult> => ({ handled: true, action: 'command' }))
  }
}

describe('extractInboundEvent', () => {
  it('should turn a text message into a text event', () => {
    const update = updateSchema.parse(createTextUpdate(42, '/read', -100, 8))

    expect(extractInboundEvent(update)).toEqual({
      userId: 42,
      event: { kind: 'text', text: '/read', surface: { chatId: -100, threadId: 8 } }
    })
  })

  it('should turn a callback query into a button event', () => {
    const update = updateSchema.parse(createCallbackUpdate(42, 'date:today', -100))
    const extracted = extractInboundEvent(update)

    expect(extracted?.userId).toBe(42)
    expect(extracted?.callbackQueryId).toMatch(/^cb-\d+$/)
    expect(extracted?.event).toEqual({ kind: 'button', payload: 'date:today', surface: { chatId: -100 } })
  })

  it('should skip messages without text', () => {
    const update = updateSchema.parse({
      update_id: 1,
      message: { message_id: 1, from: { id: 42 }, chat: { id: 42 }, sticker: { file_id: 'x' } }
    })

    expect(extractInboundEvent(update)).toBeNull()
  })

  it('should skip callback queries without data', () => {
    const update = updateSchema.parse({
      update_id: 1,
      callback_query: { id: 'cb', from: { id: 42 }, message: { message_id: 1, chat: { id: 42 } } }
    })

    expect(extractInboundEvent(update)).toBeNull()
  })
})

describe('UpdateHandler', () => {
  it('should dispatch a text message', async () => {
    const dispatcher = createDispatcherStub()
    const handler = createUpdateHandler({ dispatcher, logger: createMockLogger() })

    const result = await handler.handle(createTextUpdate(42, 'hello'))

    expect(result).toEqual({ handled: true, action: 'command' })
    expect(dispatcher.dispatch).toHaveBeenCalledWith(42, { kind: 'text', text: 'hello', surface: { chatId: 42 } })
  })

  it('should queue the dispatch before waiting on the acknowledgement', async () => {
    const order: string[] = []
    const dispatcher = {
      dispatch: vi.fn(async (): Promise<DispatchResult> => {
        order.push('dispatch')
        return { handled: true, action: 'step' }
      })
    }
    const client = {
      answerCallbackQuery: vi.fn(async () => {
        order.push('answer')
        return true
      })
    }
    const handler = createUpdateHandler({ dispatcher, client, logger: createMockLogger() })

    await handler.handle(createCallbackUpdate(42, 'date:today'))

    expect(order).toEqual(['dispatch', 'answer'])
    expect(client.answerCallbackQuery).toHaveBeenCalledTimes(1)
  })

  it('should still dispatch when the acknowledgement fails', async () => {
    const dispatcher = createDispatcherStub()
    const logger = createMockLogger()
    const client = {
      answerCallbackQuery: vi.fn(async (): Promise<boolean> => {
        throw new TelegramApiError('Telegram API error: 400', 400, 'query is too old')
      })
    }
    const handler = createUpdateHandler({ dispatcher, client, logger })

    await handler.handle(createCallbackUpdate(42, 'date:today'))

    expect(dispatcher.dispatch).toHaveBeenCalledTimes(1)
    expect(logger.warn).toHaveBeenCalledWith(expect.objectContaining({ event: 'callback_answer_failed' }))
  })

  it('should ignore unsupported updates', async () => {
    const dispatcher = createDispatcherStub()
    const handler = createUpdateHandler({ dispatcher })

    const result = await handler.handle({ update_id: 5, edited_message: { message_id: 1 } })

    expect(result).toEqual({ handled: false, action: 'ignored_unsupported' })
    expect(dispatcher.dispatch).not.toHaveBeenCalled()
  })

  it('should reject a malformed payload with the offending field', async () => {
    const handler = createUpdateHandler({ dispatcher: createDispatcherStub(), logger: createMockLogger() })

    const error = await handler.handle({ update_id: 'abc' }).catch((err: unknown) => err)

    expect(error).toBeInstanceOf(UpdateError)
    expect(error).toMatchObject({ field: 'update_id' })
  })
})
