import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify'
import { z } from 'zod'
import type { Authorizer } from '../auth/allow-list.js'
import { parseIsoDate } from '../conversation/dates.js'
import type { Clock } from '../conversation/types.js'
import { InitDataError } from '../errors.js'
import type { Logger } from '../logger.js'
import type { LibraryStorage } from '../storage/types.js'
import { verifyInitData } from './init-data.js'

export const AUTH_SCHEME = 'tma '

const createEventBodySchema = z.object({
  date: z.string().min(1),
  book_name: z.string().min(1),
  participant_name: z.string().min(1)
})

export interface MiniAppDeps {
  storage: LibraryStorage
  authorizer: Authorizer
  botToken: string
  clock: Clock
  logger: Logger
}

export function registerMiniAppRoutes(server: FastifyInstance, deps: MiniAppDeps): void {
  const { storage, authorizer, botToken, clock, logger } = deps

  function userIdFrom(header: string | undefined): number | null {
    if (header === undefined || !header.startsWith(AUTH_SCHEME)) {
      logger.warn({ event: 'miniapp_missing_authorization' })
      return null
    }
    try {
      return verifyInitData(header.slice(AUTH_SCHEME.length), botToken, clock())
    } catch (err) {
      if (err instanceof InitDataError) {
        logger.warn({ event: 'miniapp_init_data_rejected', reason: err.reason })
        return null
      }
      throw err
    }
  }

  async function authenticate(request: FastifyRequest, reply: FastifyReply) {
    const userId = userIdFrom(request.headers.authorization)
    if (userId === null) {
      return reply.status(401).send({ error: 'Unauthorized' })
    }
    if (!authorizer.isAllowed(userId)) {
      logger.warn({ event: 'miniapp_user_not_allowed', userId })
      return reply.status(401).send({ error: 'Unauthorized' })
    }
    logger.info({ event: 'miniapp_request', userId, url: request.url })
  }

  server.get('/api/books', { preHandler: authenticate }, async (_request, reply) => {
    try {
      return await storage.listReadableBooks()
    } catch (err) {
      logger.error({ event: 'miniapp_list_books_failed', error: err })
      return reply.status(500).send({ error: 'Failed to fetch books' })
    }
  })

  server.get('/api/participants', { preHandler: authenticate }, async (_request, reply) => {
    try {
      return await storage.listParticipants()
    } catch (err) {
      logger.error({ event: 'miniapp_list_participants_failed', error: err })
      return reply.status(500).send({ error: 'Failed to fetch participants' })
    }
  })

  server.post('/api/events', { preHandler: authenticate }, async (request, reply) => {
    const body = createEventBodySchema.safeParse(request.body)
    if (!body.success) {
      return reply.status(400).send({ error: 'Missing required fields' })
    }

    const { book_name: bookName, participant_name: participantName } = body.data
    const date = parseIsoDate(body.data.date)
    if (date === null) {
      logger.warn({ event: 'miniapp_invalid_date', date: body.data.date })
      return reply.status(400).send({ error: 'Invalid date format' })
    }

    try {
      await storage.createEvent(date, bookName, participantName)
    } catch (err) {
      logger.error({ event: 'miniapp_create_event_failed', bookName, participantName, error: err })
      return reply.status(500).send({ error: 'Failed to create event' })
    }

    logger.info({ event: 'miniapp_event_created', date, bookName, participantName })
    return reply.status(201).send({ status: 'success' })
  })
}
