import type { NewBookState, ReplySurface, StepResult } from '../types.js'
import { completed, createReplyBuilder, guardStorage, type DialogDeps } from '../replies.js'

export function createNewBookDialog(deps: DialogDeps) {
  const { storage, logger } = deps
  const reply = createReplyBuilder(deps.messages)

  async function begin(surface: ReplySurface): Promise<StepResult> {
    return {
      state: { command: 'new_book', step: 1, surface, data: {} },
      replies: [reply.text(surface, 'new_book_prompt')]
    }
  }

  async function handleText(state: NewBookState, text: string): Promise<StepResult> {
    const name = text.trim()
    if (name === '') {
      return { state, replies: [reply.text(state.surface, 'new_book_empty_name')] }
    }

    return guardStorage(deps, 'new_book', state.surface, async () => {
      const id = await storage.createBook(name)
      logger.info({ event: 'book_created', id, name })
      return completed('new_book', state.surface, [reply.text(state.surface, 'new_book_created', { name })])
    })
  }

  return { begin, handleText }
}

export type NewBookDialog = ReturnType<typeof createNewBookDialog>
