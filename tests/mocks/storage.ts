import { vi } from 'vitest'
import { createMemoryStorage, type MemoryStorageOptions } from '../../src/storage/memory.js'
import type { LibraryStorage } from '../../src/storage/types.js'

// Memory storage with every method wrapped in a spy, so tests can assert calls
// and inject failures with mockRejectedValueOnce.
export function createSpyStorage(options: MemoryStorageOptions = {}) {
  const memory = createMemoryStorage(options)
  return {
    initialize: vi.fn(memory.initialize),
    createBook: vi.fn(memory.createBook),
    listReadableBooks: vi.fn(memory.listReadableBooks),
    listParticipants: vi.fn(memory.listParticipants),
    createEvent: vi.fn(memory.createEvent),
    getLastEvents: vi.fn(memory.getLastEvents),
    getTopBooks: vi.fn(memory.getTopBooks),
    getRarelyReadBooks: vi.fn(memory.getRarelyReadBooks),
    close: vi.fn(memory.close)
  } satisfies LibraryStorage
}

export type SpyStorage = ReturnType<typeof createSpyStorage>
