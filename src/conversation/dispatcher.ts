import type { Authorizer } from '../auth/allow-list.js'
import { createNoopLogger, type Logger } from '../logger.js'
import { formatMessage, type Messages } from '../messages.js'
import type { LibraryStorage } from '../storage/types.js'
import { createOneShotCommands } from './commands.js'
import { createNewBookDialog } from './dialogs/new-book.js'
import { createReadEventDialog } from './dialogs/read-event.js'
import { createStatsReportDialog } from './dialogs/stats-report.js'
import { createKeyedQueue, type KeyedQueue } from './keyed-queue.js'
import {
  COMPLETED_STEP,
  type ActiveState,
  type Clock,
  type CommandName,
  type ConversationStore,
  type DialogCommand,
  type InboundEvent,
  type OutboundMessage,
  type ReplySender,
  type ReplySurface,
  type StepResult
} from './types.js'

export interface DispatcherDeps {
  store: ConversationStore
  storage: LibraryStorage
  authorizer: Authorizer
  sender: ReplySender
  messages: Messages
  notifyUnauthorized?: boolean
  clock?: Clock
  queue?: KeyedQueue<number>
  logger?: Logger
}

export type DispatchAction =
  | 'unauthorized'
  | 'command'
  | 'unknown_command'
  | 'step'
  | 'ignored'
  | 'stale_cleared'
  | 'unmatched_button'
  | 'failed'

export interface DispatchResult {
  handled: boolean
  action: DispatchAction
}

interface Outcome {
  action: DispatchAction
  replies: OutboundMessage[]
}

const COMMAND_NAMES: ReadonlySet<string> = new Set<CommandName>([
  'start', 'new_book', 'read', 'who_is_next', 'last', 'stats', 'rare'
])

const BUTTON_ROUTES: ReadonlyMap<string, DialogCommand> = new Map<string, DialogCommand>([
  ['date', 'read'],
  ['book', 'read'],
  ['book_page', 'read'],
  ['participant', 'read'],
  ['stats_period', 'stats'],
  ['stats_participant', 'stats']
])

function isCommandName(name: string): name is CommandName {
  return COMMAND_NAMES.has(name)
}

/**
 * Extracts the command from text such as "/read" or "/read@library_bot extra".
 * Returns null for anything that is not a command token.
 */
export function parseCommandToken(text: string): string | null {
  const match = /^\/([A-Za-z0-9_]+)(?:@\S+)?(?:\s|$)/.exec(text.trim())
  return match ? (match[1] ?? '').toLowerCase() : null
}

export function createDispatcher(deps: DispatcherDeps) {
  const { store, authorizer, sender, messages } = deps
  const logger = deps.logger ?? createNoopLogger()
  const clock = deps.clock ?? (() => new Date())
  const queue = deps.queue ?? createKeyedQueue<number>()

  const dialogDeps = { storage: deps.storage, messages, logger, clock }
  const newBook = createNewBookDialog(dialogDeps)
  const readEvent = createReadEventDialog(dialogDeps)
  const statsReport = createStatsReportDialog(dialogDeps)
  const commands = createOneShotCommands(dialogDeps)

  function text(surface: ReplySurface, key: string): OutboundMessage {
    return { surface, text: formatMessage(messages, key) }
  }

  // Completed or abandoned dialogs are removed before the handler returns.
  function persist(userId: number, result: StepResult): OutboundMessage[] {
    if (result.state === null || result.state.step === COMPLETED_STEP) {
      store.delete(userId)
    } else {
      store.set(userId, result.state)
    }
    return result.replies
  }

  async function runCommand(userId: number, name: CommandName, surface: ReplySurface): Promise<OutboundMessage[]> {
    switch (name) {
      case 'start':
        return commands.start(surface)
      case 'who_is_next':
        return commands.whoIsNext(surface)
      case 'last':
        return commands.last(surface)
      case 'rare':
        return commands.rare(surface)
      case 'new_book':
        return persist(userId, await newBook.begin(surface))
      case 'read':
        return persist(userId, await readEvent.begin(surface))
      case 'stats':
        return persist(userId, await statsReport.begin(surface))
    }
  }

  async function forwardText(state: ActiveState, input: string): Promise<StepResult> {
    switch (state.command) {
      case 'new_book':
        return newBook.handleText(state, input)
      case 'read':
        return readEvent.handleText(state, input)
      case 'stats':
        return statsReport.handleText(state, input)
    }
  }

  async function forwardButton(state: ActiveState, prefix: string, value: string): Promise<StepResult> {
    switch (state.command) {
      case 'read':
        return readEvent.handleButton(state, prefix, value)
      case 'stats':
        return statsReport.handleButton(state, prefix, value)
      case 'new_book':
        return { state, replies: [] }
    }
  }

  async function handleText(userId: number, input: string, surface: ReplySurface): Promise<Outcome> {
    const token = parseCommandToken(input)
    if (token !== null) {
      store.delete(userId)
      if (!isCommandName(token)) {
        logger.info({ event: 'unknown_command', userId, command: token })
        return { action: 'unknown_command', replies: [text(surface, 'unknown_command')] }
      }
      logger.info({ event: 'command_received', userId, command: token })
      return { action: 'command', replies: await runCommand(userId, token, surface) }
    }

    const state = store.get(userId)
    if (state === undefined) {
      return { action: 'ignored', replies: [text(surface, 'use_command_hint')] }
    }
    if (state.step === COMPLETED_STEP) {
      store.delete(userId)
      logger.info({ event: 'stale_dialog_cleared', userId, command: state.command })
      return { action: 'stale_cleared', replies: [text(surface, 'use_command_hint')] }
    }

    return { action: 'step', replies: persist(userId, await forwardText(state, input)) }
  }

  async function handleButton(userId: number, payload: string): Promise<Outcome> {
    const separator = payload.indexOf(':')
    const prefix = separator === -1 ? payload : payload.slice(0, separator)
    const value = separator === -1 ? '' : payload.slice(separator + 1)
    const owner = separator === -1 ? undefined : BUTTON_ROUTES.get(prefix)

    if (owner === undefined) {
      logger.warn({ event: 'unmatched_button', userId, payload })
      return { action: 'unmatched_button', replies: [] }
    }

    const state = store.get(userId)
    if (state === undefined) {
      logger.info({ event: 'button_without_dialog', userId, payload })
      return { action: 'ignored', replies: [] }
    }
    if (state.step === COMPLETED_STEP) {
      store.delete(userId)
      logger.info({ event: 'stale_dialog_cleared', userId, command: state.command })
      return { action: 'stale_cleared', replies: [] }
    }
    if (state.command !== owner) {
      logger.warn({ event: 'button_for_other_dialog', userId, payload, command: state.command })
      return { action: 'ignored', replies: [] }
    }

    return { action: 'step', replies: persist(userId, await forwardButton(state, prefix, value)) }
  }

  async function deliver(userId: number, replies: readonly OutboundMessage[]): Promise<void> {
    for (const message of replies) {
      try {
        await sender.send(message)
      } catch (err) {
        logger.error({ event: 'reply_send_failed', userId, chatId: message.surface.chatId, error: err })
      }
    }
  }

  async function processEvent(userId: number, event: InboundEvent): Promise<DispatchResult> {
    const active = store.get(userId)

    let outcome: Outcome
    try {
      outcome = event.kind === 'text'
        ? await handleText(userId, event.text, event.surface)
        : await handleButton(userId, event.payload)
    } catch (err) {
      logger.error({
        event: 'dispatch_failed',
        userId,
        inbound: event,
        command: active?.command,
        step: active?.step,
        error: err
      })
      store.delete(userId)
      await deliver(userId, [text(event.surface, 'generic_error')])
      return { handled: false, action: 'failed' }
    }

    await deliver(userId, outcome.replies)
    return { handled: outcome.action === 'command' || outcome.action === 'step', action: outcome.action }
  }

  async function dispatch(userId: number, event: InboundEvent): Promise<DispatchResult> {
    if (!authorizer.isAllowed(userId)) {
      logger.info({ event: 'unauthorized_user', userId })
      if (deps.notifyUnauthorized) {
        await deliver(userId, [text(event.surface, 'unauthorized')])
      }
      return { handled: false, action: 'unauthorized' }
    }

    return queue.run(userId, () => processEvent(userId, event))
  }

  return { dispatch }
}

export type Dispatcher = ReturnType<typeof createDispatcher>
