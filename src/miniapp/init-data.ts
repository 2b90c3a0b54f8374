import { createHmac, timingSafeEqual } from 'node:crypto'
import { z } from 'zod'
import { InitDataError } from '../errors.js'

export const INIT_DATA_MAX_AGE_SECONDS = 86_400

const initDataUserSchema = z.object({
  id: z.number().int()
}).passthrough()

function parseUser(raw: string): number {
  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch (err) {
    throw new InitDataError(`User field is not JSON: ${String(err)}`, 'invalid_user')
  }
  const result = initDataUserSchema.safeParse(json)
  if (!result.success) {
    throw new InitDataError(`Invalid user field: ${result.error.message}`, 'invalid_user')
  }
  return result.data.id
}

/** Lines of `key=value` for every field except `hash`, sorted by key. */
export function buildDataCheckString(params: URLSearchParams): string {
  return [...params.entries()]
    .filter(([key]) => key !== 'hash')
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, value]) => `${key}=${value}`)
    .join('\n')
}

export function signDataCheckString(dataCheckString: string, botToken: string): string {
  const secret = createHmac('sha256', 'WebAppData').update(botToken).digest()
  return createHmac('sha256', secret).update(dataCheckString).digest('hex')
}

/**
 * Checks the signature and age of Mini App launch data and returns the Telegram
 * user id it was issued for.
 */
export function verifyInitData(initData: string, botToken: string, now: Date): number {
  const params = new URLSearchParams(initData)

  const hash = params.get('hash')
  if (hash === null || hash === '') {
    throw new InitDataError('Init data has no hash', 'missing_hash')
  }

  const expected = Buffer.from(signDataCheckString(buildDataCheckString(params), botToken), 'hex')
  const received = Buffer.from(hash, 'hex')
  if (received.length !== expected.length || !timingSafeEqual(received, expected)) {
    throw new InitDataError('Init data hash does not match', 'bad_hash')
  }

  const authDate = Number(params.get('auth_date') ?? '')
  if (!Number.isInteger(authDate) || authDate <= 0) {
    throw new InitDataError('Init data has no auth_date', 'missing_auth_date')
  }
  if (Math.floor(now.getTime() / 1000) - authDate > INIT_DATA_MAX_AGE_SECONDS) {
    throw new InitDataError('Init data is too old', 'expired')
  }

  const user = params.get('user')
  if (user === null || user === '') {
    throw new InitDataError('Init data has no user', 'missing_user')
  }
  return parseUser(user)
}
