import Fastify from 'fastify'
import type { Config } from './config.js'
import type { Logger } from './logger.js'
import { registerMiniAppRoutes, type MiniAppDeps } from './miniapp/routes.js'
import type { UpdateHandler } from './telegram/updates.js'

export const WEBHOOK_PATH = '/telegram-webhook'
export const SECRET_HEADER = 'x-telegram-bot-api-secret-token'

export function createServer(
  config: Config,
  logger: Logger,
  updateHandler: Pick<UpdateHandler, 'handle'>,
  miniApp: Omit<MiniAppDeps, 'botToken' | 'logger'>
) {
  const server = Fastify({
    logger: {
      level: config.logLevel,
      formatters: {
        level: (label) => ({ level: label })
      },
      timestamp: () => `,"time":"${new Date().toISOString()}"`
    }
  })

  server.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() }
  })

  server.get('/', async () => {
    return {
      name: 'home-library-bot',
      status: 'running',
      updateMode: config.updateMode,
      mockMode: config.mockMode
    }
  })

  server.post(WEBHOOK_PATH, async (request, reply) => {
    const expectedSecret = config.telegram.webhookSecret
    if (expectedSecret !== undefined && request.headers[SECRET_HEADER] !== expectedSecret) {
      logger.warn({ event: 'webhook_secret_mismatch', ip: request.ip })
      return reply.status(401).send({ ok: false, error: 'Unauthorized' })
    }

    try {
      const result = await updateHandler.handle(request.body)
      return { ok: true, ...result }
    } catch (err) {
      logger.error({ event: 'webhook_error', error: err })
      // 200 keeps Telegram from redelivering an update that will fail again
      return reply.status(200).send({ ok: false, error: 'Processing failed' })
    }
  })

  registerMiniAppRoutes(server, { ...miniApp, botToken: config.telegram.botToken, logger })

  return server
}
