import { StorageError } from '../errors.js'
import { formatMessage } from '../messages.js'
import type { RareBookStat } from '../storage/types.js'
import { computeNextReader } from './rotation.js'
import { storageFailureReply, type DialogDeps } from './replies.js'
import type { OutboundMessage, ReplySurface } from './types.js'

export const LAST_EVENTS_LIMIT = 10
export const RARE_BOOKS_LIMIT = 10

export type OneShotCommand = (surface: ReplySurface) => Promise<OutboundMessage[]>

export function createOneShotCommands(deps: DialogDeps) {
  const { storage, messages, logger } = deps

  function say(surface: ReplySurface, key: string, params?: Record<string, string | number>): OutboundMessage[] {
    return [{ surface, text: formatMessage(messages, key, params) }]
  }

  function withStorageErrors(command: string, run: OneShotCommand): OneShotCommand {
    return async (surface) => {
      try {
        return await run(surface)
      } catch (err) {
        if (!(err instanceof StorageError)) {
          throw err
        }
        logger.error({ event: 'command_storage_failed', command, errorCode: err.errorCode, error: err.message })
        return [storageFailureReply(err, surface, messages)]
      }
    }
  }

  async function start(surface: ReplySurface): Promise<OutboundMessage[]> {
    return say(surface, 'welcome')
  }

  async function whoIsNext(surface: ReplySurface): Promise<OutboundMessage[]> {
    const participants = await storage.listParticipants()
    if (participants.length === 0) {
      logger.warn({ event: 'who_is_next_no_participants' })
      return say(surface, 'no_participants')
    }

    const [lastEvent] = await storage.getLastEvents(1)
    const next = computeNextReader(participants, lastEvent?.participantName ?? '')
    if (next === '') {
      return say(surface, 'no_children')
    }
    return say(surface, 'next_reader', { name: next })
  }

  async function last(surface: ReplySurface): Promise<OutboundMessage[]> {
    const events = await storage.getLastEvents(LAST_EVENTS_LIMIT)
    if (events.length === 0) {
      return say(surface, 'last_empty')
    }

    const lines = events.map((event, i) =>
      formatMessage(messages, 'last_line', { rank: i + 1, date: event.date, book: event.bookName, reader: event.participantName })
    )
    return [{ surface, text: `${formatMessage(messages, 'last_header')}\n\n${lines.join('\n')}` }]
  }

  function rareSection(headerKey: string, stats: readonly RareBookStat[]): string {
    const header = formatMessage(messages, headerKey)
    if (stats.length === 0) {
      return `${header}\n${formatMessage(messages, 'rare_empty')}`
    }
    const lines = stats.map((stat, i) => stat.lastReadDate === null
      ? formatMessage(messages, 'rare_never_read_line', { rank: i + 1, book: stat.bookName })
      : formatMessage(messages, 'rare_line', { rank: i + 1, book: stat.bookName, days: stat.daysSinceLastRead, date: stat.lastReadDate })
    )
    return `${header}\n${lines.join('\n')}`
  }

  async function rare(surface: ReplySurface): Promise<OutboundMessage[]> {
    const byChildren = await storage.getRarelyReadBooks(RARE_BOOKS_LIMIT, true)
    const overall = await storage.getRarelyReadBooks(RARE_BOOKS_LIMIT, false)

    const text = [
      formatMessage(messages, 'rare_header'),
      rareSection('rare_children_header', byChildren),
      rareSection('rare_all_header', overall)
    ].join('\n\n')
    return [{ surface, text }]
  }

  return {
    start,
    whoIsNext: withStorageErrors('who_is_next', whoIsNext),
    last: withStorageErrors('last', last),
    rare: withStorageErrors('rare', rare)
  }
}

export type OneShotCommands = ReturnType<typeof createOneShotCommands>
