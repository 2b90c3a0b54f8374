import type { Logger } from '../logger.js'
import type { OutboundMessage, ReplySender } from '../conversation/types.js'
import type { SendMessageParams, TelegramClient } from './client.js'

export function toSendMessageParams(message: OutboundMessage): SendMessageParams {
  const params: SendMessageParams = {
    chat_id: message.surface.chatId,
    text: message.text
  }
  if (message.surface.threadId !== undefined) {
    params.message_thread_id = message.surface.threadId
  }
  if (message.buttons !== undefined && message.buttons.length > 0) {
    params.reply_markup = {
      inline_keyboard: message.buttons.map(row =>
        row.map(button => ({ text: button.text, callback_data: button.payload }))
      )
    }
  }
  return params
}

export function createTelegramSender(client: Pick<TelegramClient, 'sendMessage'>, logger: Logger): ReplySender {
  async function send(message: OutboundMessage): Promise<void> {
    const sent = await client.sendMessage(toSendMessageParams(message))
    logger.info({ event: 'telegram_send_success', chatId: message.surface.chatId, messageId: sent.message_id })
  }

  return { send }
}

export function createMockSender(logger: Logger): ReplySender {
  let messageCounter = 0

  async function send(message: OutboundMessage): Promise<void> {
    messageCounter++
    logger.info({
      event: 'mock_send',
      chatId: message.surface.chatId,
      threadId: message.surface.threadId,
      text: message.text,
      buttons: message.buttons?.flat().map(b => b.payload),
      messageId: `mock-msg-${messageCounter}`
    })
  }

  return { send }
}
