import { z } from 'zod'
import { ConfigError } from './errors.js'
import { logger } from './logger.js'

const coerceBooleanFromEnvVar = z
  .union([z.boolean(), z.string()])
  .transform((val) => {
    if (typeof val === 'boolean') return val
    return val.toLowerCase() === 'true'
  })
  .default(false)

const userIdList = z
  .string({ required_error: 'ALLOWED_USER_IDS is required' })
  .transform((val, ctx) => {
    const parts = val.split(',').map(part => part.trim()).filter(part => part.length > 0)
    const ids: number[] = []
    for (const part of parts) {
      if (!/^-?\d+$/.test(part)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `ALLOWED_USER_IDS contains an invalid user id: ${part}` })
        return z.NEVER
      }
      ids.push(Number(part))
    }
    return ids
  })
  .pipe(z.array(z.number().int()).min(1, 'ALLOWED_USER_IDS must list at least one user id'))

const configSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).default(3000),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  mockMode: coerceBooleanFromEnvVar,
  useMockDb: coerceBooleanFromEnvVar,
  updateMode: z.enum(['polling', 'webhook']).default('polling'),
  notifyUnauthorized: coerceBooleanFromEnvVar,
  sessionTimeoutMs: z.coerce.number().int().min(1000).default(1800000),
  allowedUserIds: userIdList,
  telegram: z.object({
    botToken: z.string({ required_error: 'TELEGRAM_BOT_TOKEN is required' }).min(1, 'TELEGRAM_BOT_TOKEN cannot be empty'),
    apiUrl: z.string().url().default('https://api.telegram.org'),
    pollTimeoutSeconds: z.coerce.number().int().min(0).max(50).default(30),
    webhookUrl: z.string().url().optional(),
    webhookSecret: z.string().min(1).optional()
  }),
  clickHouse: z.object({
    url: z.string().url().default('http://localhost:8123'),
    database: z.string().min(1).default('library'),
    user: z.string().min(1).default('default'),
    password: z.string().default('')
  })
}).superRefine((config, ctx) => {
  if (config.updateMode === 'webhook' && config.telegram.webhookUrl === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['telegram', 'webhookUrl'],
      message: 'TELEGRAM_WEBHOOK_URL is required when UPDATE_MODE is webhook'
    })
  }
})

export type Config = z.infer<typeof configSchema>

function fieldToEnvVar(field: string): string {
  const mapping: Record<string, string> = {
    'port': 'PORT',
    'logLevel': 'LOG_LEVEL',
    'mockMode': 'MOCK_MODE',
    'useMockDb': 'USE_MOCK_DB',
    'updateMode': 'UPDATE_MODE',
    'notifyUnauthorized': 'NOTIFY_UNAUTHORIZED',
    'sessionTimeoutMs': 'SESSION_TIMEOUT_MS',
    'allowedUserIds': 'ALLOWED_USER_IDS',
    'telegram.botToken': 'TELEGRAM_BOT_TOKEN',
    'telegram.apiUrl': 'TELEGRAM_API_URL',
    'telegram.pollTimeoutSeconds': 'TELEGRAM_POLL_TIMEOUT_SECONDS',
    'telegram.webhookUrl': 'TELEGRAM_WEBHOOK_URL',
    'telegram.webhookSecret': 'TELEGRAM_WEBHOOK_SECRET',
    'clickHouse.url': 'CLICKHOUSE_URL',
    'clickHouse.database': 'CLICKHOUSE_DATABASE',
    'clickHouse.user': 'CLICKHOUSE_USER',
    'clickHouse.password': 'CLICKHOUSE_PASSWORD'
  }
  return mapping[field] ?? field.toUpperCase()
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = configSchema.safeParse({
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    mockMode: env.MOCK_MODE,
    useMockDb: env.USE_MOCK_DB,
    updateMode: env.UPDATE_MODE,
    notifyUnauthorized: env.NOTIFY_UNAUTHORIZED,
    sessionTimeoutMs: env.SESSION_TIMEOUT_MS,
    allowedUserIds: env.ALLOWED_USER_IDS,
    telegram: {
      botToken: env.TELEGRAM_BOT_TOKEN,
      apiUrl: env.TELEGRAM_API_URL,
      pollTimeoutSeconds: env.TELEGRAM_POLL_TIMEOUT_SECONDS,
      webhookUrl: env.TELEGRAM_WEBHOOK_URL,
      webhookSecret: env.TELEGRAM_WEBHOOK_SECRET
    },
    clickHouse: {
      url: env.CLICKHOUSE_URL,
      database: env.CLICKHOUSE_DATABASE,
      user: env.CLICKHOUSE_USER,
      password: env.CLICKHOUSE_PASSWORD
    }
  })

  if (!result.success) {
    const missingVars: string[] = []
    const errors = result.error.errors.map(e => {
      const field = e.path.join('.')
      const envVarName = fieldToEnvVar(field)
      if (e.code === 'invalid_type' && e.received === 'undefined') {
        missingVars.push(envVarName)
      }
      return { field, envVar: envVarName, message: e.message }
    })

    logger.error({ event: 'config_validation_failed', errors })

    if (missingVars.length > 0) {
      logger.error({
        event: 'missing_environment_variables',
        missing: missingVars,
        hint: 'Add these variables to your environment or .env file'
      })
    }

    const [firstError] = errors
    throw new ConfigError(firstError?.message ?? 'Invalid configuration', firstError?.field)
  }

  logger.info({
    event: 'config_loaded',
    port: result.data.port,
    logLevel: result.data.logLevel,
    updateMode: result.data.updateMode,
    allowedUsers: result.data.allowedUserIds.length
  })
  return result.data
}
