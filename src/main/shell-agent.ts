import type { Connector, MatchPattern, ReadResult, SessionSettings } from '../shared/types'
import { ShellSession } from './shell-session'
import { LostConnectionError } from './errors'
import { stripCommandEcho } from './terminal-text'
import { connectSsh } from './transport/ssh-transport'
import { debugLog } from './debug-log'

const DEFAULT_HISTORY_LIMIT = 100

/**
 * Keeps one session to a host and reconnects lazily: every command first
 * re-opens the session if it is not connected, once, and gives up with
 * LostConnectionError when that fails. Not safe for concurrent callers.
 */
export class ShellAgent {
  private session: ShellSession | null = null
  private isConnected = false
  private commands: string[] = []

  constructor(
    readonly settings: SessionSettings,
    private connector: Connector = connectSsh,
    private historyLimit = DEFAULT_HISTORY_LIMIT,
  ) {}

  /** Creates an agent and connects it. Rejects if the first connection fails. */
  static async create(settings: SessionSettings, connector?: Connector): Promise<ShellAgent> {
    const agent = new ShellAgent(settings, connector)
    await agent.connect()
    return agent
  }

  get connected(): boolean {
    return this.isConnected
  }

  setConnected(connected: boolean): void {
    this.isConnected = connected
  }

  /** Commands sent through this agent, oldest first. */
  get history(): readonly string[] {
    return [...this.commands]
  }

  async connect(): Promise<void> {
    if (this.isConnected) return
    this.session?.close()
    const session = await ShellSession.open(this.settings, this.connector)
    session.onClose(() => {
      if (this.session !== session) return
      debugLog(`[agent] session ${session.id} to ${this.settings.host} went away`)
      this.isConnected = false
    })
    this.session = session
    this.isConnected = true
  }

  logout(): void {
    this.session?.close()
    this.session = null
    this.isConnected = false
  }

  async sendCommandNoWait(command: string): Promise<void> {
    const session = await this.ensureSession()
    session.write(command)
    this.record(command)
  }

  /** Sends a command and reads up to the prompt. */
  async sendCommand(command: string): Promise<ReadResult> {
    await this.sendCommandNoWait(command)
    return this.requireSession().readUntilPattern(this.settings.promptPattern)
  }

  /** Like sendCommand, minus the echoed command line. */
  async sendCommandStripCommand(command: string): Promise<ReadResult> {
    const result = await this.sendCommand(command)
    return { ...result, output: stripCommandEcho(result.output, command) }
  }

  /** The prompt pattern is appended to `patterns` automatically. */
  async sendCommandWaitForList(command: string, patterns: readonly MatchPattern[]): Promise<ReadResult> {
    await this.sendCommandNoWait(command)
    return this.requireSession().readUntilAnyPattern([...patterns, this.settings.promptPattern])
  }

  private async ensureSession(): Promise<ShellSession> {
    try {
      await this.connect()
    } catch (err) {
      debugLog(`[agent] reconnect to ${this.settings.host} failed: ${err instanceof Error ? err.message : String(err)}`)
      throw new LostConnectionError(err)
    }
    return this.requireSession()
  }

  private requireSession(): ShellSession {
    if (!this.session) throw new LostConnectionError()
    return this.session
  }

  private record(command: string): void {
    this.commands.push(command)
    if (this.commands.length > this.historyLimit) {
      this.commands.splice(0, this.commands.length - this.historyLimit)
    }
  }
}
