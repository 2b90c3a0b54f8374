import { StorageError, type StorageErrorCode } from '../errors.js'
import type { Logger } from '../logger.js'
import { formatMessage, type MessageParams, type Messages } from '../messages.js'
import type { LibraryStorage } from '../storage/types.js'
import {
  COMPLETED_STEP,
  type Button,
  type ButtonGrid,
  type Clock,
  type DialogCommand,
  type OutboundMessage,
  type ReplySurface,
  type StepResult
} from './types.js'

export interface DialogDeps {
  storage: LibraryStorage
  messages: Messages
  logger: Logger
  clock: Clock
}

const storageErrorMessageKey: Record<StorageErrorCode, string> = {
  network_error: 'error_network',
  unauthorized: 'error_unauthorized',
  query_failed: 'error_query_failed',
  invalid_response: 'error_invalid_response',
  server_error: 'error_server',
  unknown: 'error_unknown'
}

export function createReplyBuilder(messages: Messages) {
  function text(surface: ReplySurface, key: string, params?: MessageParams, buttons?: ButtonGrid): OutboundMessage {
    const message: OutboundMessage = { surface, text: formatMessage(messages, key, params) }
    if (buttons !== undefined) {
      message.buttons = buttons
    }
    return message
  }

  function button(key: string, payload: string, params?: MessageParams): Button {
    return { text: formatMessage(messages, key, params), payload }
  }

  return { text, button }
}

export type ReplyBuilder = ReturnType<typeof createReplyBuilder>

export function twoColumnGrid(buttons: readonly Button[]): ButtonGrid {
  const rows: ButtonGrid = []
  for (let i = 0; i < buttons.length; i += 2) {
    rows.push(buttons.slice(i, i + 2))
  }
  return rows
}

export function singleColumn(buttons: readonly Button[]): ButtonGrid {
  return buttons.map(b => [b])
}

/** Button values that point into a list carry its index. */
export function parseIndex(value: string): number | null {
  return /^\d+$/.test(value) ? Number(value) : null
}

export function completed(command: DialogCommand, surface: ReplySurface, replies: OutboundMessage[]): StepResult {
  return {
    state: { command, step: COMPLETED_STEP, surface, data: {} },
    replies
  }
}

export function storageFailureReply(
  err: StorageError,
  surface: ReplySurface,
  messages: Messages
): OutboundMessage {
  return { surface, text: formatMessage(messages, storageErrorMessageKey[err.errorCode]) }
}

/**
 * Ends the dialog with a user-facing message when storage fails. Anything that is
 * not a StorageError is left for the dispatcher's recovery boundary.
 */
export async function guardStorage(
  deps: Pick<DialogDeps, 'messages' | 'logger'>,
  command: DialogCommand,
  surface: ReplySurface,
  step: () => Promise<StepResult>
): Promise<StepResult> {
  try {
    return await step()
  } catch (err) {
    if (!(err instanceof StorageError)) {
      throw err
    }
    deps.logger.error({ event: 'dialog_storage_failed', command, errorCode: err.errorCode, error: err.message })
    return completed(command, surface, [storageFailureReply(err, surface, deps.messages)])
  }
}
