import { createNoopLogger, type Logger } from '../logger.js'
import type { TelegramClient } from './client.js'
import type { UpdateHandler } from './updates.js'

export interface PollerDeps {
  client: Pick<TelegramClient, 'getUpdates'>
  handler: Pick<UpdateHandler, 'handle'>
  timeoutSeconds: number
  retryDelayMs?: number
  logger?: Logger
}

function wait(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    const timer = setTimeout(resolve, ms)
    signal.addEventListener('abort', () => {
      clearTimeout(timer)
      resolve()
    }, { once: true })
  })
}

export function createPoller(deps: PollerDeps) {
  const { client, handler, timeoutSeconds } = deps
  const retryDelayMs = deps.retryDelayMs ?? 3000
  const logger = deps.logger ?? createNoopLogger()

  let offset = 0
  let controller = new AbortController()
  let loop: Promise<void> | null = null

  /** Fetches one batch and hands every update to the handler concurrently. */
  async function pollOnce(signal: AbortSignal = controller.signal): Promise<number> {
    const updates = await client.getUpdates(offset, timeoutSeconds, signal)
    if (updates.length === 0) {
      return 0
    }

    offset = Math.max(...updates.map(u => u.update_id)) + 1

    const results = await Promise.allSettled(updates.map(update => handler.handle(update)))
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        logger.error({ event: 'update_handling_failed', updateId: updates[i]?.update_id, error: result.reason })
      }
    })
    return updates.length
  }

  async function run(signal: AbortSignal): Promise<void> {
    logger.info({ event: 'polling_started', timeoutSeconds })
    while (!signal.aborted) {
      try {
        await pollOnce(signal)
      } catch (err) {
        if (signal.aborted) break
        logger.error({ event: 'polling_failed', retryDelayMs, error: err })
        await wait(retryDelayMs, signal)
      }
    }
    logger.info({ event: 'polling_stopped', offset })
  }

  function start(): void {
    if (loop !== null) return
    controller = new AbortController()
    loop = run(controller.signal)
  }

  async function stop(): Promise<void> {
    if (loop === null) return
    controller.abort()
    await loop
    loop = null
  }

  return {
    start,
    stop,
    pollOnce,
    currentOffset: () => offset
  }
}

export type Poller = ReturnType<typeof createPoller>
