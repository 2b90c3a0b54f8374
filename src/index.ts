import 'dotenv/config'
import { createApp } from './app.js'

const SESSION_CLEANUP_INTERVAL_MS = 60_000

async function main() {
  const { server, dependencies } = createApp()
  const { config, logger, storage, store, client, poller } = dependencies

  try {
    await storage.initialize()
    await server.listen({ port: config.port, host: '0.0.0.0' })
    logger.info({ event: 'server_started', port: config.port })

    if (config.mockMode) {
      logger.warn({ event: 'telegram_updates_disabled', reason: 'mock mode' })
    } else if (config.updateMode === 'webhook' && config.telegram.webhookUrl !== undefined) {
      await client.setWebhook(config.telegram.webhookUrl, config.telegram.webhookSecret)
    } else if (poller !== null) {
      await client.deleteWebhook()
      poller.start()
    }
  } catch (err) {
    logger.error({ event: 'server_start_failed', error: err })
    process.exit(1)
  }

  const cleanupTimer = setInterval(() => {
    const removed = store.cleanup()
    if (removed > 0) {
      logger.info({ event: 'sessions_expired', removed, active: store.size() })
    }
  }, SESSION_CLEANUP_INTERVAL_MS)
  cleanupTimer.unref()

  let shuttingDown = false
  async function shutdown(signal: string) {
    if (shuttingDown) return
    shuttingDown = true
    logger.info({ event: 'shutdown_started', signal })
    clearInterval(cleanupTimer)
    try {
      await poller?.stop()
      await server.close()
      await storage.close()
      logger.info({ event: 'shutdown_complete' })
      process.exit(0)
    } catch (err) {
      logger.error({ event: 'shutdown_failed', error: err })
      process.exit(1)
    }
  }

  process.once('SIGINT', () => void shutdown('SIGINT'))
  process.once('SIGTERM', () => void shutdown('SIGTERM'))
}

main().catch((err: unknown) => {
  console.error(err)
  process.exit(1)
})
