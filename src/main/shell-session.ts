import { v4 as uuidv4 } from 'uuid'
import type {
  Connector,
  MatchPattern,
  ReadResult,
  SessionOptions,
  SessionSettings,
  ShellChannel,
} from '../shared/types'
import { HandoffChannel } from './handoff-channel'
import { StreamReader } from './stream-reader'
import { BufferedMatcher } from './buffered-matcher'
import { MatchEngine, compilePattern } from './match-engine'
import { ConnectionError, LostConnectionError, PromptNotFoundError } from './errors'
import { stripAnsi, stripCommandEcho } from './terminal-text'
import { connectSsh } from './transport/ssh-transport'
import { resolveSessionSettings } from './store/settings-store'
import type { SettingsStore } from './store/settings-store'
import { debugLog } from './debug-log'

type CloseListener = (error?: Error) => void

/**
 * One interactive shell and the reader feeding it. Reads and writes are
 * meant to be issued by a single caller, one at a time.
 */
export class ShellSession {
  readonly id = uuidv4()
  private handoff: HandoffChannel
  private reader: StreamReader
  private matcher: BufferedMatcher
  private engine: MatchEngine
  private open = true
  private released = false
  private closeListeners: CloseListener[] = []
  /** Output consumed while waiting for the first prompt (login banner, motd). */
  private greeting = ''

  private constructor(
    readonly settings: SessionSettings,
    private channel: ShellChannel,
  ) {
    this.handoff = new HandoffChannel(settings.handoffHighWaterMark)
    this.reader = new StreamReader(channel, this.handoff, `reader ${this.id.slice(0, 8)}`)
    this.matcher = new BufferedMatcher(this.handoff, settings.pollIntervalMs)
    this.engine = new MatchEngine(this.matcher)

    this.handoff.on('close', (reason?: Error) => {
      if (!this.open) return
      this.open = false
      debugLog(`[session] ${this.id} closed by remote after ${this.reader.totalRead} chars${reason ? `: ${reason.message}` : ''}`)
      this.release()
      this.notifyClose(reason)
    })
  }

  /**
   * Connects, starts reading and waits for the first prompt. The session is
   * closed again if no prompt shows up within `promptTimeoutSeconds`.
   */
  static async open(settings: SessionSettings, connector: Connector = connectSsh): Promise<ShellSession> {
    compilePattern(settings.promptPattern)

    let channel: ShellChannel
    try {
      channel = await connector(settings)
    } catch (err) {
      throw err instanceof ConnectionError ? err : new ConnectionError(settings.host, settings.port, err)
    }

    const session = new ShellSession(settings, channel)
    debugLog(`[session] ${session.id} opened ${settings.user}@${settings.host}:${settings.port}`)
    session.reader.start()

    const result = await session.readUntilPattern(settings.promptPattern, settings.promptTimeoutSeconds)
    if (result.status !== 'matched') {
      debugLog(`[session] ${session.id} no prompt within ${settings.promptTimeoutSeconds}s (${result.status})`)
      session.close()
      throw new PromptNotFoundError(settings.promptPattern, result.output)
    }
    session.greeting = result.output
    return session
  }

  get isOpen(): boolean {
    return this.open
  }

  get banner(): string {
    return this.greeting
  }

  /** Text received but not yet returned by any read. */
  get pending(): string {
    return this.matcher.pending
  }

  onClose(listener: CloseListener): void {
    if (!this.open) {
      listener(this.handoff.reason)
      return
    }
    this.closeListeners.push(listener)
  }

  /** Writes `text` followed by a newline. */
  write(text: string): void {
    if (!this.open) throw new LostConnectionError()
    this.channel.write(text + '\n')
  }

  readUntil(literal: string, timeoutSeconds = this.settings.timeoutSeconds): Promise<ReadResult> {
    return this.finish(this.engine.readUntilLiteral(literal, timeoutSeconds))
  }

  readUntilPattern(pattern: MatchPattern, timeoutSeconds = this.settings.timeoutSeconds): Promise<ReadResult> {
    return this.finish(this.engine.readUntilRegex(pattern, timeoutSeconds))
  }

  readUntilAnyPattern(patterns: readonly MatchPattern[], timeoutSeconds = this.settings.timeoutSeconds): Promise<ReadResult> {
    return this.finish(this.engine.readUntilRegexList(patterns, timeoutSeconds))
  }

  async writeThenReadUntil(text: string, literal: string, timeoutSeconds = this.settings.timeoutSeconds): Promise<ReadResult> {
    this.write(text)
    return this.readUntil(literal, timeoutSeconds)
  }

  /** Sends a command and reads up to and including the next prompt. */
  async sendCommand(command: string): Promise<ReadResult> {
    this.write(command)
    return this.readUntilPattern(this.settings.promptPattern)
  }

  /**
   * Sends a command and stops at the first of `patterns` or the prompt. The
   * caller's patterns take precedence over the prompt on the same scan.
   */
  async sendCommandWaitForList(command: string, patterns: readonly MatchPattern[]): Promise<ReadResult> {
    this.write(command)
    return this.readUntilAnyPattern([...patterns, this.settings.promptPattern])
  }

  /** Like sendCommand, minus the echoed command line. */
  async sendCommandStripCommand(command: string): Promise<ReadResult> {
    const result = await this.sendCommand(command)
    return { ...result, output: stripCommandEcho(result.output, command) }
  }

  close(): void {
    if (!this.open) return
    this.open = false
    debugLog(`[session] ${this.id} closing after ${this.reader.totalRead} chars`)
    this.release()
    this.handoff.close()
    this.notifyClose()
  }

  /** Ends the transport, whichever side closed the session first. */
  private release(): void {
    if (this.released) return
    this.released = true
    this.channel.close()
  }

  private async finish(pending: Promise<ReadResult>): Promise<ReadResult> {
    const result = await pending
    return this.settings.stripAnsi ? { ...result, output: stripAnsi(result.output) } : result
  }

  private notifyClose(error?: Error): void {
    const listeners = this.closeListeners
    this.closeListeners = []
    for (const listener of listeners) {
      listener(error)
    }
  }
}

/**
 * Opens a session from partial options, filling the rest from the settings
 * store when one is given, else from the built-in defaults.
 */
export async function openSession(
  options: SessionOptions,
  connector?: Connector,
  store?: SettingsStore,
): Promise<ShellSession> {
  const settings = resolveSessionSettings(options, store?.getSettings())
  return ShellSession.open(settings, connector)
}
