import { Client } from 'ssh2'
import type { ClientChannel } from 'ssh2'
import type { SessionSettings, ShellChannel } from '../../shared/types'
import { ConnectionError } from '../errors'
import { debugLog } from '../debug-log'

class SshShellChannel implements ShellChannel {
  constructor(
    private client: Client,
    private stream: ClientChannel,
  ) {
    this.stream.setEncoding('utf8')
  }

  write(data: string): void {
    this.stream.write(data)
  }

  onData(callback: (data: string) => void): void {
    this.stream.on('data', (data: string) => callback(data))
  }

  onClose(callback: (error?: Error) => void): void {
    let fired = false
    const fire = (error?: Error): void => {
      if (fired) return
      fired = true
      callback(error)
    }
    this.stream.on('close', () => fire())
    this.stream.on('error', (err: Error) => fire(err))
    this.client.on('error', (err: Error) => fire(err))
    this.client.on('close', () => fire())
  }

  pause(): void {
    this.stream.pause()
  }

  resume(): void {
    this.stream.resume()
  }

  close(): void {
    this.stream.end()
    this.client.end()
  }
}

/**
 * Opens an SSH connection with password authentication and starts an
 * interactive shell on a pty with echo disabled. Host keys are not verified.
 */
export function connectSsh(
  settings: SessionSettings,
  createClient: () => Client = () => new Client(),
): Promise<ShellChannel> {
  return new Promise((resolve, reject) => {
    const client = createClient()
    let settled = false
    const target = `${settings.user}@${settings.host}:${settings.port}`

    const fail = (err: Error): void => {
      if (settled) return
      settled = true
      debugLog(`[ssh] connect ${target} failed: ${err.message}`)
      client.end()
      reject(new ConnectionError(settings.host, settings.port, err))
    }

    client.on('error', fail)

    client.once('ready', () => {
      debugLog(`[ssh] authenticated ${target}`)
      const { term, rows, cols } = settings.terminal
      client.shell({ term, rows, cols, modes: { ECHO: 0 } }, (err, stream) => {
        if (err) {
          fail(err)
          return
        }
        settled = true
        client.off('error', fail)
        debugLog(`[ssh] shell open on ${target} term=${term} rows=${rows} cols=${cols}`)
        resolve(new SshShellChannel(client, stream))
      })
    })

    debugLog(`[ssh] connecting ${target}`)
    client.connect({
      host: settings.host,
      port: settings.port,
      username: settings.user,
      password: settings.password,
      readyTimeout: settings.connectTimeoutSeconds * 1000,
    })
  })
}
