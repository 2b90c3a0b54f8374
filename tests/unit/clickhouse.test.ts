import { describe, it, expect, vi } from 'vitest'
import { createClickHouseStorage } from '../../src/storage/clickhouse.js'
import { StorageError } from '../../src/errors.js'
import { createMockLogger } from '../mocks/logger.js'

const config = { url: 'http://clickhouse.test:8123', database: 'library', user: 'bot', password: 'test-secret' }
const clock = () => new Date(2024, 2, 15, 12)

function createFetch(body = '', status = 200) {
  return vi.fn<typeof fetch>(async () => new Response(body, { status }))
}

function rows(...values: object[]): string {
  return values.map(value => JSON.stringify(value)).join('\n') + '\n'
}

describe('ClickHouseStorage', () => {
  it('should create the three tables and migrate events on initialize', async () => {
    const mockFetch = createFetch()
    const storage = createClickHouseStorage(config, createMockLogger(), mockFetch, clock)

    await storage.initialize()

    expect(mockFetch).toHaveBeenCalledTimes(4)
    const statements = mockFetch.mock.calls.map(([, init]) => String(init?.body))
    expect(statements[0]).toMatch(/^CREATE TABLE IF NOT EXISTS books/)
    expect(statements[1]).toMatch(/^CREATE TABLE IF NOT EXISTS participants/)
    expect(statements[2]).toMatch(/^CREATE TABLE IF NOT EXISTS events/)
    expect(statements[2]).toContain('inserted_at DateTime64(6) DEFAULT now64(6)')
    expect(statements[3]).toBe('ALTER TABLE events ADD COLUMN IF NOT EXISTS inserted_at DateTime64(6) DEFAULT now64(6)')
    expect(mockFetch.mock.calls[0]?.[0]).toBe('http://clickhouse.test:8123/?database=library')
    expect(mockFetch.mock.calls[0]?.[1]?.headers).toEqual({
      'X-ClickHouse-User': 'bot',
      'X-ClickHouse-Key': 'test-secret',
      'Content-Type': 'text/plain; charset=utf-8'
    })
  })

  it('should bind the book name as a query parameter', async () => {
    const mockFetch = createFetch()
    const storage = createClickHouseStorage(config, createMockLogger(), mockFetch, clock)

    const id = await storage.createBook("Alice's Adventures")

    const url = new URL(String(mockFetch.mock.calls[0]?.[0]))
    expect(url.searchParams.get('param_name')).toBe("Alice's Adventures")
    expect(url.searchParams.get('param_id')).toBe(id)
    expect(String(mockFetch.mock.calls[0]?.[1]?.body)).toContain('{name:String}')
  })

  it('should leave the insertion time of an event to the column default', async () => {
    const mockFetch = createFetch()
    const storage = createClickHouseStorage(config, createMockLogger(), mockFetch, clock)

    await storage.createEvent('2024-03-10', 'Gruffalo', 'Alice')

    expect(String(mockFetch.mock.calls[0]?.[1]?.body)).toBe(
      'INSERT INTO events (date, book_name, participant_name) SELECT toDateTime({date:Date}), {bookName:String}, {participantName:String}'
    )
  })

  it('should list the latest events with later inserts first within a day', async () => {
    const mockFetch = createFetch(rows(
      { date: '2024-03-10', bookName: 'Moomins', participantName: 'Bob' },
      { date: '2024-03-10', bookName: 'Gruffalo', participantName: 'Alice' }
    ))
    const storage = createClickHouseStorage(config, createMockLogger(), mockFetch, clock)

    expect(await storage.getLastEvents(2)).toEqual([
      { date: '2024-03-10', bookName: 'Moomins', participantName: 'Bob' },
      { date: '2024-03-10', bookName: 'Gruffalo', participantName: 'Alice' }
    ])
    expect(String(mockFetch.mock.calls[0]?.[1]?.body)).toContain('ORDER BY date DESC, inserted_at DESC LIMIT {limit:UInt32}')
    expect(new URL(String(mockFetch.mock.calls[0]?.[0])).searchParams.get('param_limit')).toBe('2')
  })

  it('should parse participants from JSONEachRow output', async () => {
    const mockFetch = createFetch(rows(
      { id: 'p1', name: 'Alice', isParent: false },
      { id: 'p2', name: 'Mom', isParent: true }
    ))
    const storage = createClickHouseStorage(config, createMockLogger(), mockFetch, clock)

    expect(await storage.listParticipants()).toEqual([
      { id: 'p1', name: 'Alice', isParent: false },
      { id: 'p2', name: 'Mom', isParent: true }
    ])
    expect(String(mockFetch.mock.calls[0]?.[1]?.body)).toMatch(/\nFORMAT JSONEachRow$/)
  })

  it('should rank children reads when no participant is given', async () => {
    const mockFetch = createFetch(rows({ bookName: 'Gruffalo', readCount: '3' }))
    const storage = createClickHouseStorage(config, createMockLogger(), mockFetch, clock)

    expect(await storage.getTopBooks(10, '2024-03-01', '2024-03-31', '')).toEqual([{ bookName: 'Gruffalo', readCount: 3 }])
    expect(mockFetch.mock.calls[0]?.[0]).toBe(
      'http://clickhouse.test:8123/?database=library&param_limit=10&param_startDate=2024-03-01&param_endDate=2024-03-31'
    )
    expect(String(mockFetch.mock.calls[0]?.[1]?.body)).toContain('participant_name IN (SELECT name FROM participants WHERE is_parent = false)')
  })

  it('should filter the ranking by one participant', async () => {
    const mockFetch = createFetch(rows())
    const storage = createClickHouseStorage(config, createMockLogger(), mockFetch, clock)

    await storage.getTopBooks(10, '2024-03-01', '2024-03-31', 'Bob')

    const url = new URL(String(mockFetch.mock.calls[0]?.[0]))
    expect(url.searchParams.get('param_participantName')).toBe('Bob')
    expect(String(mockFetch.mock.calls[0]?.[1]?.body)).toContain('participant_name = {participantName:String}')
  })

  it('should mark unread books and count days for read ones', async () => {
    const mockFetch = createFetch(rows(
      { bookName: 'Pippi', lastReadDate: '', hasRead: 0 },
      { bookName: 'Gruffalo', lastReadDate: '2024-03-10', hasRead: 1 }
    ))
    const storage = createClickHouseStorage(config, createMockLogger(), mockFetch, clock)

    expect(await storage.getRarelyReadBooks(10, true)).toEqual([
      { bookName: 'Pippi', lastReadDate: null, daysSinceLastRead: -1 },
      { bookName: 'Gruffalo', lastReadDate: '2024-03-10', daysSinceLastRead: 5 }
    ])
  })

  describe('errors', () => {
    it.each([
      [401, 'unauthorized'],
      [403, 'unauthorized'],
      [400, 'query_failed'],
      [404, 'query_failed'],
      [500, 'server_error'],
      [503, 'server_error']
    ])('should map HTTP %i to %s', async (status, errorCode) => {
      const storage = createClickHouseStorage(config, createMockLogger(), createFetch('Code: 62. DB::Exception', status), clock)

      await expect(storage.getLastEvents(10)).rejects.toMatchObject({ name: 'StorageError', statusCode: status, errorCode })
    })

    it('should report network failures', async () => {
      const cause = new Error('ECONNREFUSED')
      const logger = createMockLogger()
      const storage = createClickHouseStorage(config, logger, vi.fn<typeof fetch>().mockRejectedValue(cause), clock)

      const error = await storage.listReadableBooks().catch((err: unknown) => err)

      expect(error).toBeInstanceOf(StorageError)
      expect(error).toMatchObject({ errorCode: 'network_error', cause })
      expect(logger.error).toHaveBeenCalledWith({ event: 'clickhouse_network_error', operation: 'listReadableBooks', error: cause })
    })

    it('should reject a line that is not JSON', async () => {
      const storage = createClickHouseStorage(config, createMockLogger(), createFetch('{"id":\n'), clock)

      await expect(storage.listReadableBooks()).rejects.toMatchObject({ errorCode: 'invalid_response' })
    })

    it('should reject a row of the wrong shape', async () => {
      const storage = createClickHouseStorage(config, createMockLogger(), createFetch(rows({ date: '2024-03-10' })), clock)

      await expect(storage.getLastEvents(1)).rejects.toMatchObject({
        errorCode: 'invalid_response',
        message: 'Unexpected row shape in getLastEvents'
      })
    })
  })
})
