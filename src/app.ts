import type { FastifyInstance } from 'fastify'
import { loadConfig, type Config } from './config.js'
import { createLogger, type Logger } from './logger.js'
import { loadMessages, type Messages } from './messages.js'
import { createAllowListAuthorizer } from './auth/allow-list.js'
import { createConversationStore } from './conversation/store.js'
import { createDispatcher, type Dispatcher } from './conversation/dispatcher.js'
import type { Clock, ConversationStore, ReplySender } from './conversation/types.js'
import { createMemoryStorage } from './storage/memory.js'
import { createClickHouseStorage } from './storage/clickhouse.js'
import type { LibraryStorage } from './storage/types.js'
import { createTelegramClient, type TelegramClient } from './telegram/client.js'
import { createMockSender, createTelegramSender } from './telegram/sender.js'
import { createUpdateHandler, type UpdateHandler } from './telegram/updates.js'
import { createPoller, type Poller } from './telegram/poller.js'
import { createServer } from './server.js'

export interface AppDependencies {
  config: Config
  logger: Logger
  messages: Messages
  storage: LibraryStorage
  store: ConversationStore
  client: TelegramClient
  sender: ReplySender
  dispatcher: Dispatcher
  updateHandler: UpdateHandler
  poller: Poller | null
}

export interface App {
  server: FastifyInstance
  dependencies: AppDependencies
}

export interface AppOptions {
  env?: NodeJS.ProcessEnv
  fetchFunction?: typeof fetch
  clock?: Clock
}

export function createApp(options: AppOptions = {}): App {
  const config = loadConfig(options.env ?? process.env)
  const logger = createLogger('home-library-bot', config.logLevel)
  const messages = loadMessages()
  const fetchFunction = options.fetchFunction ?? fetch
  const clock = options.clock ?? (() => new Date())

  const client = createTelegramClient(config.telegram, logger, fetchFunction)

  let sender: ReplySender
  if (config.mockMode) {
    sender = createMockSender(logger)
    logger.warn({ event: 'mock_mode_enabled' })
  } else {
    sender = createTelegramSender(client, logger)
  }

  let storage: LibraryStorage
  if (config.useMockDb) {
    storage = createMemoryStorage({ clock, logger })
    logger.warn({ event: 'mock_db_enabled' })
  } else {
    storage = createClickHouseStorage(config.clickHouse, logger, fetchFunction, clock)
  }

  const store = createConversationStore(config.sessionTimeoutMs)
  const authorizer = createAllowListAuthorizer(config.allowedUserIds)

  const dispatcher = createDispatcher({
    store,
    storage,
    authorizer,
    sender,
    messages,
    notifyUnauthorized: config.notifyUnauthorized,
    clock,
    logger
  })

  const updateHandler = createUpdateHandler({
    dispatcher,
    client: config.mockMode ? undefined : client,
    logger
  })

  const poller = config.updateMode === 'polling' && !config.mockMode
    ? createPoller({ client, handler: updateHandler, timeoutSeconds: config.telegram.pollTimeoutSeconds, logger })
    : null

  logger.info({ event: 'dependencies_loaded', messageKeys: Object.keys(messages).length, updateMode: config.updateMode })

  const server = createServer(config, logger, updateHandler, { storage, authorizer, clock })

  return {
    server,
    dependencies: { config, logger, messages, storage, store, client, sender, dispatcher, updateHandler, poller }
  }
}
