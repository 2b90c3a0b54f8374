import type { Book, Participant } from '../../storage/types.js'
import { formatDate, parseIsoDate, shiftDays } from '../dates.js'
import { completed, createReplyBuilder, guardStorage, parseIndex, singleColumn, twoColumnGrid, type DialogDeps } from '../replies.js'
import type { Button, ButtonGrid, ReadState, ReplySurface, StepResult } from '../types.js'

export const BOOK_PAGE_SIZE = 10

const DATE_OFFSETS: ReadonlyMap<string, number> = new Map([
  ['today', 0],
  ['yesterday', 1],
  ['2daysago', 2],
  ['3daysago', 3]
])

type AwaitingDate = Extract<ReadState, { step: 1 }>
type ChoosingBook = Extract<ReadState, { step: 2 }>
type ChoosingReader = Extract<ReadState, { step: 3 }>

export function createReadEventDialog(deps: DialogDeps) {
  const { storage, logger, clock } = deps
  const reply = createReplyBuilder(deps.messages)

  function dateButtons(): ButtonGrid {
    return [
      [reply.button('read_date_today', 'date:today'), reply.button('read_date_yesterday', 'date:yesterday')],
      [reply.button('read_date_2daysago', 'date:2daysago'), reply.button('read_date_3daysago', 'date:3daysago')],
      [reply.button('read_date_custom', 'date:custom')]
    ]
  }

  function bookPage(books: readonly Book[], page: number): { text: string; params?: Record<string, number>; buttons: ButtonGrid } {
    const pageCount = Math.ceil(books.length / BOOK_PAGE_SIZE)
    const offset = page * BOOK_PAGE_SIZE
    const buttons: Button[] = books
      .slice(offset, offset + BOOK_PAGE_SIZE)
      .map((book, i) => ({ text: book.name, payload: `book:${offset + i}` }))
    const grid = twoColumnGrid(buttons)

    if (pageCount <= 1) {
      return { text: 'read_book_prompt', buttons: grid }
    }

    const navigation: Button[] = []
    if (page > 0) {
      navigation.push(reply.button('read_page_previous', `book_page:${page - 1}`))
    }
    if (page < pageCount - 1) {
      navigation.push(reply.button('read_page_next', `book_page:${page + 1}`))
    }
    grid.push(navigation)
    return { text: 'read_book_page_prompt', params: { page: page + 1, pages: pageCount }, buttons: grid }
  }

  // indexes keep callback data short whatever the names are
  function participantButtons(participants: readonly Participant[]): ButtonGrid {
    return singleColumn(participants.map((p, i) => ({
      text: `${p.isParent ? '👨' : '👶'} ${p.name}`,
      payload: `participant:${i}`
    })))
  }

  async function begin(surface: ReplySurface): Promise<StepResult> {
    return guardStorage(deps, 'read', surface, async () => {
      const books = await storage.listReadableBooks()
      if (books.length === 0) {
        logger.info({ event: 'read_no_books' })
        return { state: null, replies: [reply.text(surface, 'read_no_books')] }
      }
      return {
        state: { command: 'read', step: 1, surface, data: { awaitingCustomDate: false } },
        replies: [reply.text(surface, 'read_date_prompt', undefined, dateButtons())]
      }
    })
  }

  async function showBooks(state: AwaitingDate, date: string): Promise<StepResult> {
    const { surface } = state
    return guardStorage(deps, 'read', surface, async () => {
      const books = await storage.listReadableBooks()
      if (books.length === 0) {
        return completed('read', surface, [reply.text(surface, 'read_no_books')])
      }
      const page = bookPage(books, 0)
      return {
        state: { command: 'read', step: 2, surface, data: { date, page: 0 } },
        replies: [reply.text(surface, page.text, page.params, page.buttons)]
      }
    })
  }

  async function turnPage(state: ChoosingBook, value: string): Promise<StepResult> {
    const requested = parseIndex(value)
    if (requested === null) {
      return { state, replies: [] }
    }
    return guardStorage(deps, 'read', state.surface, async () => {
      const books = await storage.listReadableBooks()
      if (books.length === 0) {
        return completed('read', state.surface, [reply.text(state.surface, 'read_no_books')])
      }
      const pageCount = Math.ceil(books.length / BOOK_PAGE_SIZE)
      if (requested >= pageCount) {
        return { state, replies: [] }
      }
      const page = bookPage(books, requested)
      return {
        state: { ...state, data: { ...state.data, page: requested } },
        replies: [reply.text(state.surface, page.text, page.params, page.buttons)]
      }
    })
  }

  async function chooseBook(state: ChoosingBook, value: string): Promise<StepResult> {
    const { surface } = state
    const index = parseIndex(value)
    if (index === null) {
      return { state, replies: [reply.text(surface, 'read_invalid_book')] }
    }

    return guardStorage(deps, 'read', surface, async () => {
      // the list may have changed since the grid was rendered
      const books = await storage.listReadableBooks()
      const book: Book | undefined = books[index]
      if (book === undefined) {
        logger.warn({ event: 'read_invalid_book_index', index, bookCount: books.length })
        return { state, replies: [reply.text(surface, 'read_invalid_book')] }
      }

      const participants = await storage.listParticipants()
      if (participants.length === 0) {
        return completed('read', surface, [reply.text(surface, 'read_no_participants')])
      }
      return {
        state: { command: 'read', step: 3, surface, data: { date: state.data.date, bookName: book.name } },
        replies: [reply.text(surface, 'read_participant_prompt', undefined, participantButtons(participants))]
      }
    })
  }

  async function recordEvent(state: ChoosingReader, value: string): Promise<StepResult> {
    const { surface } = state
    const index = parseIndex(value)
    if (index === null) {
      return { state, replies: [reply.text(surface, 'read_invalid_participant')] }
    }
    const { date, bookName } = state.data

    return guardStorage(deps, 'read', surface, async () => {
      const participants = await storage.listParticipants()
      const participant: Participant | undefined = participants[index]
      if (participant === undefined) {
        logger.warn({ event: 'read_invalid_participant_index', index, participantCount: participants.length })
        return { state, replies: [reply.text(surface, 'read_invalid_participant')] }
      }

      const participantName = participant.name
      await storage.createEvent(date, bookName, participantName)
      logger.info({ event: 'reading_event_recorded', date, bookName, participantName })
      return completed('read', surface, [
        reply.text(surface, 'read_event_recorded', { date, book: bookName, reader: participantName })
      ])
    })
  }

  async function handleText(state: ReadState, text: string): Promise<StepResult> {
    switch (state.step) {
      case 1: {
        if (!state.data.awaitingCustomDate) {
          return { state, replies: [reply.text(state.surface, 'read_use_date_buttons')] }
        }
        const input = text.trim()
        const date = input.toLowerCase() === 'today' ? formatDate(clock()) : parseIsoDate(input)
        if (date === null) {
          return { state, replies: [reply.text(state.surface, 'read_invalid_date')] }
        }
        return showBooks(state, date)
      }
      case 2:
        return { state, replies: [reply.text(state.surface, 'read_use_book_buttons')] }
      case 3:
        return { state, replies: [reply.text(state.surface, 'read_use_participant_buttons')] }
    }
  }

  async function handleButton(state: ReadState, prefix: string, value: string): Promise<StepResult> {
    if (state.step === 1 && prefix === 'date') {
      if (value === 'custom') {
        return {
          state: { ...state, data: { awaitingCustomDate: true } },
          replies: [reply.text(state.surface, 'read_custom_date_prompt')]
        }
      }
      const offset = DATE_OFFSETS.get(value)
      if (offset === undefined) {
        return { state, replies: [] }
      }
      return showBooks(state, formatDate(shiftDays(clock(), -offset)))
    }
    if (state.step === 2 && prefix === 'book') {
      return chooseBook(state, value)
    }
    if (state.step === 2 && prefix === 'book_page') {
      return turnPage(state, value)
    }
    if (state.step === 3 && prefix === 'participant') {
      return recordEvent(state, value)
    }

    logger.warn({ event: 'read_stale_button', step: state.step, prefix, value })
    return { state, replies: [] }
  }

  return { begin, handleText, handleButton }
}

export type ReadEventDialog = ReturnType<typeof createReadEventDialog>
