import { randomUUID } from 'node:crypto'
import { daysBetween } from '../conversation/dates.js'
import type { Clock } from '../conversation/types.js'
import { createNoopLogger, type Logger } from '../logger.js'
import type { Book, BookStat, LibraryStorage, Participant, RareBookStat, ReadingEvent } from './types.js'

export const DEFAULT_PARTICIPANTS: ReadonlyArray<Omit<Participant, 'id'>> = [
  { name: 'Alice', isParent: false },
  { name: 'Bob', isParent: false },
  { name: 'Dad', isParent: true },
  { name: 'Mom', isParent: true }
]

export interface MemoryStorageOptions {
  participants?: ReadonlyArray<Omit<Participant, 'id'>>
  clock?: Clock
  logger?: Logger
}

function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

export function createMemoryStorage(options: MemoryStorageOptions = {}): LibraryStorage {
  const seed = options.participants ?? DEFAULT_PARTICIPANTS
  const clock = options.clock ?? (() => new Date())
  const logger = options.logger ?? createNoopLogger()

  const books = new Map<string, Book>()
  const participants = new Map<string, Participant>()
  const events: ReadingEvent[] = []

  async function initialize(): Promise<void> {
    if (participants.size > 0) {
      return
    }
    for (const participant of seed) {
      participants.set(participant.name, { id: randomUUID(), ...participant })
    }
    logger.info({ event: 'memory_storage_seeded', participants: participants.size })
  }

  async function createBook(name: string): Promise<string> {
    const id = randomUUID()
    books.set(name, { id, name, isReadable: true })
    return id
  }

  async function listReadableBooks(): Promise<Book[]> {
    return [...books.values()]
      .filter(book => book.isReadable)
      .sort((a, b) => compareNames(a.name, b.name))
  }

  async function listParticipants(): Promise<Participant[]> {
    return [...participants.values()].sort((a, b) => compareNames(a.name, b.name))
  }

  async function createEvent(date: string, bookName: string, participantName: string): Promise<void> {
    events.push({ date, bookName, participantName })
  }

  async function getLastEvents(limit: number): Promise<ReadingEvent[]> {
    // newest insert wins among events on the same day
    return [...events]
      .reverse()
      .sort((a, b) => compareNames(b.date, a.date))
      .slice(0, limit)
  }

  function isChild(name: string): boolean {
    const participant = participants.get(name)
    return participant !== undefined && !participant.isParent
  }

  async function getTopBooks(limit: number, startDate: string, endDate: string, participantName: string): Promise<BookStat[]> {
    const counts = new Map<string, number>()
    for (const event of events) {
      if (event.date < startDate || event.date > endDate) continue
      if (participantName !== '' ? event.participantName !== participantName : !isChild(event.participantName)) continue
      counts.set(event.bookName, (counts.get(event.bookName) ?? 0) + 1)
    }

    return [...counts.entries()]
      .map(([bookName, readCount]) => ({ bookName, readCount }))
      .sort((a, b) => b.readCount - a.readCount || compareNames(a.bookName, b.bookName))
      .slice(0, limit)
  }

  async function getRarelyReadBooks(limit: number, childrenOnly: boolean): Promise<RareBookStat[]> {
    const lastRead = new Map<string, string>()
    for (const event of events) {
      if (childrenOnly && !isChild(event.participantName)) continue
      const previous = lastRead.get(event.bookName)
      if (previous === undefined || event.date > previous) {
        lastRead.set(event.bookName, event.date)
      }
    }

    const today = clock()
    const stats: RareBookStat[] = (await listReadableBooks()).map(book => {
      const lastReadDate = lastRead.get(book.name) ?? null
      return {
        bookName: book.name,
        lastReadDate,
        daysSinceLastRead: lastReadDate === null ? -1 : daysBetween(lastReadDate, today)
      }
    })

    return stats
      .sort((a, b) => {
        if (a.lastReadDate === null || b.lastReadDate === null) {
          if (a.lastReadDate !== b.lastReadDate) return a.lastReadDate === null ? -1 : 1
          return compareNames(a.bookName, b.bookName)
        }
        return compareNames(a.lastReadDate, b.lastReadDate) || compareNames(a.bookName, b.bookName)
      })
      .slice(0, limit)
  }

  async function close(): Promise<void> {}

  return {
    initialize,
    createBook,
    listReadableBooks,
    listParticipants,
    createEvent,
    getLastEvents,
    getTopBooks,
    getRarelyReadBooks,
    close
  }
}
