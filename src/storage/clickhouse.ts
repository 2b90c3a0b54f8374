import { randomUUID } from 'node:crypto'
import { z } from 'zod'
import { StorageError, type StorageErrorCode } from '../errors.js'
import { daysBetween } from '../conversation/dates.js'
import type { Clock } from '../conversation/types.js'
import { createNoopLogger, type Logger } from '../logger.js'
import type { Book, BookStat, LibraryStorage, Participant, RareBookStat, ReadingEvent } from './types.js'

export interface ClickHouseConfig {
  url: string
  database: string
  user: string
  password: string
}

type QueryParams = Record<string, string | number>

const SCHEMA_STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS books (
    id String,
    name String,
    is_readable Bool
  ) ENGINE = MergeTree()
  ORDER BY id`,
  `CREATE TABLE IF NOT EXISTS participants (
    id String,
    name String,
    is_parent Bool
  ) ENGINE = MergeTree()
  ORDER BY id`,
  `CREATE TABLE IF NOT EXISTS events (
    date DateTime,
    book_name String,
    participant_name String,
    inserted_at DateTime64(6) DEFAULT now64(6)
  ) ENGINE = MergeTree()
  ORDER BY date`,
  // events tables created before inserted_at existed
  'ALTER TABLE events ADD COLUMN IF NOT EXISTS inserted_at DateTime64(6) DEFAULT now64(6)'
]

const CHILDREN_SUBQUERY = 'SELECT name FROM participants WHERE is_parent = false'

const bookRowSchema = z.object({
  id: z.string(),
  name: z.string(),
  isReadable: z.boolean()
})

const participantRowSchema = z.object({
  id: z.string(),
  name: z.string(),
  isParent: z.boolean()
})

const eventRowSchema = z.object({
  date: z.string(),
  bookName: z.string(),
  participantName: z.string()
})

// 64-bit integers arrive quoted in JSON output
const bookStatRowSchema = z.object({
  bookName: z.string(),
  readCount: z.coerce.number().int()
})

const rareBookRowSchema = z.object({
  bookName: z.string(),
  lastReadDate: z.string(),
  hasRead: z.union([z.boolean(), z.coerce.number()]).transform(val => Boolean(val))
})

export function createClickHouseStorage(
  config: ClickHouseConfig,
  logger?: Logger,
  fetchFunction: typeof fetch = fetch,
  clock: Clock = () => new Date()
): LibraryStorage {
  const log = logger ?? createNoopLogger()

  function parseErrorCode(statusCode: number): StorageErrorCode {
    if (statusCode === 401 || statusCode === 403) return 'unauthorized'
    if (statusCode >= 500) return 'server_error'
    if (statusCode >= 400) return 'query_failed'
    return 'unknown'
  }

  function buildUrl(params: QueryParams): string {
    const search = new URLSearchParams({ database: config.database })
    for (const [name, value] of Object.entries(params)) {
      search.set(`param_${name}`, String(value))
    }
    return `${config.url}/?${search.toString()}`
  }

  async function execute(operation: string, query: string, params: QueryParams = {}): Promise<string> {
    let response: Response
    try {
      response = await fetchFunction(buildUrl(params), {
        method: 'POST',
        headers: {
          'X-ClickHouse-User': config.user,
          'X-ClickHouse-Key': config.password,
          'Content-Type': 'text/plain; charset=utf-8'
        },
        body: query
      })
    } catch (err) {
      log.error({ event: 'clickhouse_network_error', operation, error: err })
      throw new StorageError(`Network error during ${operation}`, undefined, 'network_error', { cause: err })
    }

    let body: string
    try {
      body = await response.text()
    } catch (err) {
      log.error({ event: 'clickhouse_response_read_error', operation, error: err })
      throw new StorageError(`Failed to read response for ${operation}`, response.status, 'invalid_response', { cause: err })
    }

    if (!response.ok) {
      log.error({ event: 'clickhouse_query_error', operation, statusCode: response.status, body })
      throw new StorageError(`ClickHouse error during ${operation}: ${response.status}`, response.status, parseErrorCode(response.status))
    }

    return body
  }

  function parseRows<S extends z.ZodTypeAny>(operation: string, body: string, schema: S): z.infer<S>[] {
    const lines = body.split('\n').filter(line => line.trim().length > 0)
    return lines.map(line => {
      let raw: unknown
      try {
        raw = JSON.parse(line)
      } catch (err) {
        log.error({ event: 'clickhouse_json_parse_error', operation, error: err })
        throw new StorageError(`Failed to parse ClickHouse response for ${operation}`, undefined, 'invalid_response', { cause: err })
      }
      const result = schema.safeParse(raw)
      if (!result.success) {
        log.error({ event: 'clickhouse_row_invalid', operation, error: result.error.message })
        throw new StorageError(`Unexpected row shape in ${operation}`, undefined, 'invalid_response')
      }
      return result.data
    })
  }

  async function query<S extends z.ZodTypeAny>(operation: string, sql: string, schema: S, params: QueryParams = {}): Promise<z.infer<S>[]> {
    const body = await execute(operation, `${sql}\nFORMAT JSONEachRow`, params)
    return parseRows(operation, body, schema)
  }

  async function initialize(): Promise<void> {
    for (const statement of SCHEMA_STATEMENTS) {
      await execute('initialize', statement)
    }
    log.info({ event: 'clickhouse_initialized', database: config.database })
  }

  async function createBook(name: string): Promise<string> {
    const id = randomUUID()
    await execute(
      'createBook',
      'INSERT INTO books (id, name, is_readable) VALUES ({id:String}, {name:String}, true)',
      { id, name }
    )
    log.info({ event: 'clickhouse_book_created', id, name })
    return id
  }

  async function listReadableBooks(): Promise<Book[]> {
    return query(
      'listReadableBooks',
      'SELECT id, name, is_readable AS isReadable FROM books WHERE is_readable = true ORDER BY name',
      bookRowSchema
    )
  }

  async function listParticipants(): Promise<Participant[]> {
    return query(
      'listParticipants',
      'SELECT id, name, is_parent AS isParent FROM participants ORDER BY name',
      participantRowSchema
    )
  }

  async function createEvent(date: string, bookName: string, participantName: string): Promise<void> {
    await execute(
      'createEvent',
      'INSERT INTO events (date, book_name, participant_name) SELECT toDateTime({date:Date}), {bookName:String}, {participantName:String}',
      { date, bookName, participantName }
    )
    log.info({ event: 'clickhouse_event_created', date, bookName, participantName })
  }

  async function getLastEvents(limit: number): Promise<ReadingEvent[]> {
    return query(
      'getLastEvents',
      `SELECT toString(toDate(date)) AS date, book_name AS bookName, participant_name AS participantName
      FROM events
      ORDER BY date DESC, inserted_at DESC LIMIT {limit:UInt32}`,
      eventRowSchema,
      { limit }
    )
  }

  async function getTopBooks(limit: number, startDate: string, endDate: string, participantName: string): Promise<BookStat[]> {
    const participantFilter = participantName === ''
      ? `participant_name IN (${CHILDREN_SUBQUERY})`
      : 'participant_name = {participantName:String}'
    const params: QueryParams = { limit, startDate, endDate }
    if (participantName !== '') {
      params.participantName = participantName
    }

    return query(
      'getTopBooks',
      `SELECT book_name AS bookName, count() AS readCount
      FROM events
      WHERE toDate(date) BETWEEN {startDate:Date} AND {endDate:Date} AND ${participantFilter}
      GROUP BY book_name
      ORDER BY readCount DESC, bookName ASC
      LIMIT {limit:UInt32}`,
      bookStatRowSchema,
      params
    )
  }

  async function getRarelyReadBooks(limit: number, childrenOnly: boolean): Promise<RareBookStat[]> {
    const readerFilter = childrenOnly ? `WHERE participant_name IN (${CHILDREN_SUBQUERY})` : ''
    const rows = await query(
      'getRarelyReadBooks',
      `SELECT b.name AS bookName, last.last_read AS lastReadDate, last.book_name != '' AS hasRead
      FROM books AS b
      LEFT JOIN (
        SELECT book_name, toString(toDate(max(date))) AS last_read
        FROM events ${readerFilter}
        GROUP BY book_name
      ) AS last ON last.book_name = b.name
      WHERE b.is_readable = true
      ORDER BY hasRead ASC, lastReadDate ASC, bookName ASC
      LIMIT {limit:UInt32}`,
      rareBookRowSchema,
      { limit }
    )

    const today = clock()
    return rows.map(row => ({
      bookName: row.bookName,
      lastReadDate: row.hasRead ? row.lastReadDate : null,
      daysSinceLastRead: row.hasRead ? daysBetween(row.lastReadDate, today) : -1
    }))
  }

  async function close(): Promise<void> {
    log.info({ event: 'clickhouse_closed' })
  }

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
