import type { ConversationState, ConversationStore } from './types.js'

interface StoreEntry {
  state: ConversationState
  expiresAt: number
}

// Every operation is synchronous, so each call runs to completion before any other
// event's handler can touch the map.
export function createConversationStore(timeoutMs: number, now: () => number = Date.now): ConversationStore {
  const entries = new Map<number, StoreEntry>()

  function get(userId: number): ConversationState | undefined {
    const entry = entries.get(userId)
    if (!entry) {
      return undefined
    }
    if (now() > entry.expiresAt) {
      entries.delete(userId)
      return undefined
    }
    return entry.state
  }

  function set(userId: number, state: ConversationState): void {
    entries.set(userId, { state, expiresAt: now() + timeoutMs })
  }

  function deleteState(userId: number): void {
    entries.delete(userId)
  }

  function cleanup(): number {
    const current = now()
    let removed = 0
    for (const [userId, entry] of entries) {
      if (current > entry.expiresAt) {
        entries.delete(userId)
        removed++
      }
    }
    return removed
  }

  return {
    get,
    set,
    delete: deleteState,
    cleanup,
    size: () => entries.size
  }
}
