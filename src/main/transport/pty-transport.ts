import * as pty from 'node-pty'
import { homedir } from 'node:os'
import type { SessionSettings, ShellChannel } from '../../shared/types'
import { ConnectionError } from '../errors'
import { debugLog } from '../debug-log'

class PtyShellChannel implements ShellChannel {
  private exited = false
  private closeListeners: Array<(error?: Error) => void> = []

  constructor(private proc: pty.IPty) {
    proc.onExit(({ exitCode, signal }: { exitCode: number; signal?: number }) => {
      debugLog(`[pty] exit pid=${proc.pid} code=${exitCode} signal=${signal}`)
      this.exited = true
      for (const listener of this.closeListeners) {
        listener()
      }
    })
  }

  write(data: string): void {
    this.proc.write(data)
  }

  onData(callback: (data: string) => void): void {
    this.proc.onData(callback)
  }

  onClose(callback: (error?: Error) => void): void {
    if (this.exited) {
      callback()
      return
    }
    this.closeListeners.push(callback)
  }

  pause(): void {
    this.proc.pause()
  }

  resume(): void {
    this.proc.resume()
  }

  close(): void {
    if (this.exited) return
    this.proc.kill()
  }
}

/** Runs a local interactive shell on a pseudo-terminal instead of a remote host. */
export async function connectLocalShell(settings: SessionSettings): Promise<ShellChannel> {
  const file = settings.shell ?? process.env.SHELL ?? '/bin/sh'
  const { term, rows, cols } = settings.terminal
  const env: Record<string, string> = {}
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) env[key] = value
  }

  debugLog(`[pty] spawn file=${file} term=${term} rows=${rows} cols=${cols}`)
  let proc: pty.IPty
  try {
    proc = pty.spawn(file, [], { name: term, cols, rows, cwd: homedir(), env })
  } catch (err) {
    throw new ConnectionError('localhost', 0, err)
  }
  debugLog(`[pty] spawned pid=${proc.pid}`)

  return new PtyShellChannel(proc)
}
