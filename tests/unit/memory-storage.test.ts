import { describe, it, expect, beforeEach } from 'vitest'
import { createMemoryStorage } from '../../src/storage/memory.js'
import type { LibraryStorage } from '../../src/storage/types.js'

describe('MemoryStorage', () => {
  let storage: LibraryStorage

  beforeEach(async () => {
    storage = createMemoryStorage({ clock: () => new Date(2024, 2, 15, 12) })
    await storage.initialize()
  })

  it('should seed the default family on initialize', async () => {
    const participants = await storage.listParticipants()
    expect(participants.map(p => [p.name, p.isParent])).toEqual([
      ['Alice', false],
      ['Bob', false],
      ['Dad', true],
      ['Mom', true]
    ])
  })

  it('should not reseed when initialized twice', async () => {
    await storage.initialize()
    expect(await storage.listParticipants()).toHaveLength(4)
  })

  it('should list created books ordered by name', async () => {
    const id = await storage.createBook('Moomins')
    await storage.createBook('Gruffalo')

    const books = await storage.listReadableBooks()
    expect(books.map(b => b.name)).toEqual(['Gruffalo', 'Moomins'])
    expect(books[1]).toEqual({ id, name: 'Moomins', isReadable: true })
  })

  it('should return the most recent events first', async () => {
    await storage.createEvent('2024-03-01', 'Gruffalo', 'Alice')
    await storage.createEvent('2024-03-10', 'Moomins', 'Bob')
    await storage.createEvent('2024-03-05', 'Gruffalo', 'Mom')
    await storage.createEvent('2024-03-10', 'Matilda', 'Alice')

    expect(await storage.getLastEvents(3)).toEqual([
      { date: '2024-03-10', bookName: 'Matilda', participantName: 'Alice' },
      { date: '2024-03-10', bookName: 'Moomins', participantName: 'Bob' },
      { date: '2024-03-05', bookName: 'Gruffalo', participantName: 'Mom' }
    ])
  })

  describe('getTopBooks', () => {
    beforeEach(async () => {
      await storage.createEvent('2024-02-28', 'Gruffalo', 'Alice')
      await storage.createEvent('2024-03-01', 'Moomins', 'Alice')
      await storage.createEvent('2024-03-02', 'Gruffalo', 'Bob')
      await storage.createEvent('2024-03-03', 'Matilda', 'Bob')
      await storage.createEvent('2024-03-04', 'Moomins', 'Mom')
      await storage.createEvent('2024-03-04', 'Moomins', 'Dad')
      await storage.createEvent('2024-03-31', 'Matilda', 'Alice')
      await storage.createEvent('2024-04-01', 'Matilda', 'Alice')
    })

    it('should count only children when no participant is given, ties by name', async () => {
      expect(await storage.getTopBooks(10, '2024-03-01', '2024-03-31', '')).toEqual([
        { bookName: 'Matilda', readCount: 2 },
        { bookName: 'Gruffalo', readCount: 1 },
        { bookName: 'Moomins', readCount: 1 }
      ])
    })

    it('should filter by a single participant', async () => {
      expect(await storage.getTopBooks(10, '2024-03-01', '2024-03-31', 'Mom')).toEqual([
        { bookName: 'Moomins', readCount: 1 }
      ])
    })

    it('should apply the limit after ranking', async () => {
      expect(await storage.getTopBooks(1, '2024-01-01', '2024-12-31', 'Alice')).toEqual([
        { bookName: 'Matilda', readCount: 2 }
      ])
    })
  })

  describe('getRarelyReadBooks', () => {
    beforeEach(async () => {
      for (const name of ['Gruffalo', 'Matilda', 'Moomins', 'Pippi']) {
        await storage.createBook(name)
      }
      await storage.createEvent('2024-03-01', 'Gruffalo', 'Alice')
      await storage.createEvent('2024-03-10', 'Gruffalo', 'Bob')
      await storage.createEvent('2024-02-15', 'Matilda', 'Bob')
      await storage.createEvent('2024-03-14', 'Moomins', 'Mom')
    })

    it('should list never-read books first, then the oldest reads', async () => {
      expect(await storage.getRarelyReadBooks(10, false)).toEqual([
        { bookName: 'Pippi', lastReadDate: null, daysSinceLastRead: -1 },
        { bookName: 'Matilda', lastReadDate: '2024-02-15', daysSinceLastRead: 29 },
        { bookName: 'Gruffalo', lastReadDate: '2024-03-10', daysSinceLastRead: 5 },
        { bookName: 'Moomins', lastReadDate: '2024-03-14', daysSinceLastRead: 1 }
      ])
    })

    it('should ignore parent reads when only children count', async () => {
      const stats = await storage.getRarelyReadBooks(2, true)
      expect(stats).toEqual([
        { bookName: 'Moomins', lastReadDate: null, daysSinceLastRead: -1 },
        { bookName: 'Pippi', lastReadDate: null, daysSinceLastRead: -1 }
      ])
    })
  })
})
