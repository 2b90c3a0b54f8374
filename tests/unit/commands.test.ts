import { describe, it, expect, beforeEach } from 'vitest'
import { createOneShotCommands } from '../../src/conversation/commands.js'
import { StorageError } from '../../src/errors.js'
import { loadMessages } from '../../src/messages.js'
import { createMockLogger } from '../mocks/logger.js'
import { createSpyStorage, type SpyStorage } from '../mocks/storage.js'

const messages = loadMessages()
const surface = { chatId: 11 }
const clock = () => new Date(2024, 2, 15, 12)

describe('OneShotCommands', () => {
  let storage: SpyStorage

  function createSubject() {
    return createOneShotCommands({ storage, messages, logger: createMockLogger(), clock })
  }

  beforeEach(async () => {
    storage = createSpyStorage({ clock })
    await storage.initialize()
  })

  describe('whoIsNext', () => {
    it('should start with the first child when nobody has read', async () => {
      expect(await createSubject().whoIsNext(surface)).toEqual([{ surface, text: 'Next to read: Alice' }])
    })

    it('should offer the parents after the last child', async () => {
      await storage.createEvent('2024-03-10', 'Gruffalo', 'Bob')

      expect(await createSubject().whoIsNext(surface)).toEqual([{ surface, text: 'Next to read: Dad or Mom' }])
    })

    it('should report an empty participant list', async () => {
      storage = createSpyStorage({ participants: [] })
      await storage.initialize()

      expect(await createSubject().whoIsNext(surface)).toEqual([{ surface, text: 'No participants found in database' }])
    })

    it('should report when there are only parents', async () => {
      storage = createSpyStorage({ participants: [{ name: 'Mom', isParent: true }] })
      await storage.initialize()

      expect(await createSubject().whoIsNext(surface)).toEqual([{ surface, text: 'No child participants found in database' }])
    })
  })

  describe('last', () => {
    it('should list the latest events', async () => {
      await storage.createEvent('2024-03-01', 'Gruffalo', 'Alice')
      await storage.createEvent('2024-03-10', 'Moomins', 'Bob')

      const [reply] = await createSubject().last(surface)

      expect(storage.getLastEvents).toHaveBeenCalledWith(10)
      expect(reply?.text).toBe('Last reading events:\n\n1. 2024-03-10 - Moomins (Bob)\n2. 2024-03-01 - Gruffalo (Alice)')
    })

    it('should say when nothing was read yet', async () => {
      expect(await createSubject().last(surface)).toEqual([{ surface, text: 'No reading events recorded yet.' }])
    })

    it('should turn storage failures into a message', async () => {
      storage.getLastEvents.mockRejectedValueOnce(new StorageError('bad sql', 400, 'query_failed'))

      expect(await createSubject().last(surface)).toEqual([
        { surface, text: '⚠️ The library database rejected the request. Please try again.' }
      ])
    })

    it('should let unexpected errors through', async () => {
      storage.getLastEvents.mockRejectedValueOnce(new TypeError('bug'))

      await expect(createSubject().last(surface)).rejects.toThrow(TypeError)
    })
  })

  describe('rare', () => {
    it('should list rarely read books for children and overall', async () => {
      await storage.createBook('Gruffalo')
      await storage.createBook('Pippi')
      await storage.createEvent('2024-03-10', 'Gruffalo', 'Mom')

      const [reply] = await createSubject().rare(surface)

      expect(reply?.text).toBe(
        '📚 Rarely read books:\n\n' +
        "👶 By children's choice:\n1. Gruffalo (never read)\n2. Pippi (never read)\n\n" +
        '📖 Overall (all participants):\n1. Pippi (never read)\n2. Gruffalo (5 days ago, last: 2024-03-10)'
      )
      expect(storage.getRarelyReadBooks).toHaveBeenNthCalledWith(1, 10, true)
      expect(storage.getRarelyReadBooks).toHaveBeenNthCalledWith(2, 10, false)
    })

    it('should say when there are no books', async () => {
      const [reply] = await createSubject().rare(surface)

      expect(reply?.text).toBe(
        "📚 Rarely read books:\n\n👶 By children's choice:\nNo data available\n\n📖 Overall (all participants):\nNo data available"
      )
    })
  })
})
