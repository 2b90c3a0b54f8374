export class ConfigError extends Error {
  readonly name = 'ConfigError'

  constructor(message: string, public readonly field?: string) {
    super(message)
  }
}

export class MessagesError extends Error {
  readonly name = 'MessagesError'

  constructor(message: string, public readonly key?: string) {
    super(message)
  }
}

export class TelegramApiError extends Error {
  readonly name = 'TelegramApiError'

  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly description?: string,
    options?: ErrorOptions
  ) {
    super(message, options)
  }
}

export class UpdateError extends Error {
  readonly name = 'UpdateError'

  constructor(message: string, public readonly field?: string) {
    super(message)
  }
}

export type InitDataFailure =
  | 'missing_hash'
  | 'bad_hash'
  | 'missing_auth_date'
  | 'expired'
  | 'missing_user'
  | 'invalid_user'

export class InitDataError extends Error {
  readonly name = 'InitDataError'

  constructor(message: string, public readonly reason: InitDataFailure) {
    super(message)
  }
}

export type StorageErrorCode =
  | 'network_error'
  | 'unauthorized'
  | 'query_failed'
  | 'invalid_response'
  | 'server_error'
  | 'unknown'

export class StorageError extends Error {
  readonly name = 'StorageError'

  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly errorCode: StorageErrorCode = 'unknown',
    options?: ErrorOptions
  ) {
    super(message, options)
  }
}
