import type { ShellChannel } from '../shared/types'
import type { HandoffChannel } from './handoff-channel'
import { debugLog } from './debug-log'

/**
 * Forwards everything the shell channel produces into the handoff channel.
 * Pauses the channel while the matcher lags behind and resumes on drain.
 * A closed or failed channel ends the reader quietly; the matcher learns
 * about it through the closed handoff.
 */
export class StreamReader {
  private started = false
  private paused = false
  private bytesRead = 0

  constructor(
    private channel: ShellChannel,
    private handoff: HandoffChannel,
    private tag = 'reader',
  ) {}

  get totalRead(): number {
    return this.bytesRead
  }

  start(): void {
    if (this.started) return
    this.started = true

    this.handoff.on('drain', () => {
      if (!this.paused) return
      this.paused = false
      debugLog(`[${this.tag}] resumed`)
      this.channel.resume()
    })

    this.channel.onData((data: string) => {
      if (data.length === 0) return
      this.bytesRead += data.length
      const accepting = this.handoff.push(data)
      if (!accepting && !this.handoff.isClosed && !this.paused) {
        this.paused = true
        debugLog(`[${this.tag}] paused with ${this.handoff.size} chunks queued`)
        this.channel.pause()
      }
    })

    this.channel.onClose((error?: Error) => {
      if (error) {
        debugLog(`[${this.tag}] stream failed after ${this.bytesRead} chars: ${error.message}`)
      } else {
        debugLog(`[${this.tag}] stream ended after ${this.bytesRead} chars`)
      }
      this.handoff.close(error)
    })
  }
}
