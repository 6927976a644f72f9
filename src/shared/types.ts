export interface TerminalOptions {
  term: string
  rows: number
  cols: number
}

export interface SessionSettings {
  host: string
  port: number
  user: string
  password: string
  /** Regular expression that matches the remote shell prompt. */
  promptPattern: string
  /** Default budget for every read-until call. */
  timeoutSeconds: number
  /** Budget for locating the first prompt right after connecting. */
  promptTimeoutSeconds: number
  pollIntervalMs: number
  connectTimeoutSeconds: number
  terminal: TerminalOptions
  /** Queued chunks at which the reader pauses the stream until the matcher catches up. */
  handoffHighWaterMark: number
  stripAnsi: boolean
  /** Shell binary for local sessions; falls back to $SHELL. */
  shell?: string
}

export type SessionOptions = Pick<SessionSettings, 'host' | 'user' | 'password'> &
  Partial<Omit<SessionSettings, 'host' | 'user' | 'password'>>

/** Settings that may be stored on disk. Credentials never are. */
export type StoredSettings = Omit<SessionSettings, 'host' | 'user' | 'password'>

export type MatchStatus = 'matched' | 'no-match' | 'closed'

export interface ReadResult {
  output: string
  status: MatchStatus
  /** Index into the caller's pattern list of the pattern that matched. */
  patternIndex?: number
}

export type MatchPattern = string | RegExp

/**
 * Duplex byte stream to an interactive shell. Data arrives as decoded text,
 * in the order the remote side produced it.
 */
export interface ShellChannel {
  write(data: string): void
  onData(callback: (data: string) => void): void
  onClose(callback: (error?: Error) => void): void
  pause(): void
  resume(): void
  close(): void
}

export type Connector = (settings: SessionSettings) => Promise<ShellChannel>
