export type SessionErrorCode =
  | 'CONNECTION_FAILED'
  | 'PROMPT_NOT_FOUND'
  | 'INVALID_PATTERN'
  | 'LOST_CONNECTION'
  | 'READ_IN_PROGRESS'

export class SessionError extends Error {
  constructor(
    readonly code: SessionErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = new.target.name
  }
}

export class ConnectionError extends SessionError {
  constructor(host: string, port: number, cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : ''
    super('CONNECTION_FAILED', `Unable to establish connection to ${host}:${port}${reason}`, { cause })
  }
}

export class PromptNotFoundError extends SessionError {
  constructor(
    readonly promptPattern: string,
    /** Whatever arrived before the prompt wait gave up. */
    readonly output: string,
  ) {
    super('PROMPT_NOT_FOUND', `Unable to locate prompt matching /${promptPattern}/`)
  }
}

export class InvalidPatternError extends SessionError {
  constructor(
    readonly pattern: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super('INVALID_PATTERN', `Invalid pattern /${pattern}/: ${reason}`, { cause })
  }
}

export class LostConnectionError extends SessionError {
  constructor(cause?: unknown) {
    super('LOST_CONNECTION', 'Lost connection and unable to re-establish', { cause })
  }
}

export class ReadInProgressError extends SessionError {
  constructor() {
    super('READ_IN_PROGRESS', 'Another read is already waiting on this session')
  }
}
