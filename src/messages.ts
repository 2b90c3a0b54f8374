import { readFileSync } from 'node:fs'
import { join, dirname } from 'node:path'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import { MessagesError } from './errors.js'
import { logger } from './logger.js'

const __dirname = dirname(fileURLToPath(import.meta.url))

export type Messages = Record<string, string>

export type MessageParams = Record<string, string | number>

const messagesSchema = z.record(z.string())

export function loadMessages(filePath?: string): Messages {
  // resolves the same from src/ and dist/
  const path = filePath ?? join(__dirname, '..', 'messages', 'en.json')

  let parsed: unknown
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'))
  } catch (err) {
    logger.error({ event: 'messages_load_failed', path, error: err })
    throw new MessagesError(`Failed to load messages from ${path}`)
  }

  const result = messagesSchema.safeParse(parsed)
  if (!result.success) {
    logger.error({ event: 'messages_invalid', path, error: result.error.message })
    throw new MessagesError(`Messages file ${path} must map keys to strings`)
  }

  logger.info({ event: 'messages_loaded', path, count: Object.keys(result.data).length })
  return result.data
}

export function getMessage(messages: Messages, key: string): string {
  const message = messages[key]
  if (message === undefined) {
    logger.error({ event: 'message_key_not_found', key })
    throw new MessagesError(`Message key not found: ${key}`, key)
  }
  return message
}

export function formatMessage(messages: Messages, key: string, params: MessageParams = {}): string {
  let text = getMessage(messages, key)
  for (const [name, value] of Object.entries(params)) {
    text = text.replaceAll(`{${name}}`, String(value))
  }
  return text
}
